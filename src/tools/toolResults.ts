import { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { AnswerGenerationError, describeFailure } from "../domain/errors.js";
import { TransactionFilter } from "../domain/types.js";

export const filterInputSchema = z
  .object({
    fuel_types: z.array(z.string()).optional().describe("Fuel types to keep, e.g. diesel"),
    station_ids: z.array(z.string()).optional().describe("Station ids to keep"),
    payment_methods: z.array(z.string()).optional().describe("Payment methods to keep"),
    from: z.string().optional().describe("Earliest transaction time (ISO or DD/MM/YYYY)"),
    to: z.string().optional().describe("Latest transaction time; a bare date covers the whole day"),
  })
  .optional()
  .describe("Optional metadata filter applied before ranking");

export type FilterInput = z.infer<typeof filterInputSchema>;

export function toTransactionFilter(input: FilterInput): TransactionFilter | undefined {
  if (!input) {
    return undefined;
  }
  return {
    fuelTypes: input.fuel_types,
    stationIds: input.station_ids,
    paymentMethods: input.payment_methods,
    from: input.from,
    to: input.to,
  };
}

export function jsonResult(value: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(value, null, 2),
      },
    ],
  };
}

/** Failures become `isError` results; a question with no matches never gets here. */
export function errorResult(error: unknown): CallToolResult {
  const failure = describeFailure(error);
  const body =
    error instanceof AnswerGenerationError
      ? { ...failure, evidence_transaction_ids: error.partial.evidenceIds }
      : failure;

  return {
    isError: true,
    content: [
      {
        type: "text",
        text: JSON.stringify(body, null, 2),
      },
    ],
  };
}

export async function runTool(task: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await task());
  } catch (error) {
    return errorResult(error);
  }
}
