import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { getSupportedDatasetExtensions } from "../infra/parsers/datasetLoader.js";
import { FuelSalesQaService } from "../services/fuelSalesQaService.js";
import { runTool } from "./toolResults.js";

export function registerIngestTransactionsTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "ingest_transactions",
    {
      title: "Ingest Transactions",
      description: `Parses local transaction datasets (${getSupportedDatasetExtensions().join(", ")}), embeds each transaction and upserts it into the index.`,
      inputSchema: {
        paths: z.array(z.string()).min(1).describe("Dataset file paths"),
      },
    },
    async ({ paths }, extra) =>
      runTool(() => service.ingestFiles(paths, { signal: extra.signal })),
  );
}

export function registerIngestRecordsTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "ingest_records",
    {
      title: "Ingest Records",
      description:
        "Ingests transaction records passed inline (id, timestamp, fuelType, quantity, unitPrice, totalAmount, stationId, pumpId, paymentMethod).",
      inputSchema: {
        records: z
          .array(z.record(z.unknown()))
          .min(1)
          .max(5000)
          .describe("Transaction records"),
      },
    },
    async ({ records }, extra) =>
      runTool(() => service.ingestRecords(records, { signal: extra.signal })),
  );
}
