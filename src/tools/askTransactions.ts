import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { MAX_TOP_K } from "../pipelines/query.js";
import { FuelSalesQaService } from "../services/fuelSalesQaService.js";
import { filterInputSchema, runTool, toTransactionFilter } from "./toolResults.js";

export function registerAskTransactionsTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "ask_transactions",
    {
      title: "Ask Transactions",
      description:
        "Answers a question about fuel sales from the indexed transactions and lists the transaction ids used as evidence.",
      inputSchema: {
        question: z.string().min(2).describe("Question about the fuel sales data"),
        top_k: z
          .number()
          .int()
          .min(1)
          .max(MAX_TOP_K)
          .optional()
          .describe("Number of transactions to retrieve"),
        filter: filterInputSchema,
      },
    },
    async ({ question, top_k, filter }, extra) =>
      runTool(() =>
        service.ask({
          question,
          topK: top_k,
          filter: toTransactionFilter(filter),
          signal: extra.signal,
        }),
      ),
  );
}
