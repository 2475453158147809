import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { FuelSalesQaService } from "../services/fuelSalesQaService.js";
import { runTool } from "./toolResults.js";

export function registerIndexStatsTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "index_stats",
    {
      title: "Index Stats",
      description: "Reports the entry count, embedding model, a sample entry and storage details of the index.",
      inputSchema: {},
    },
    async () => runTool(() => service.describeIndex()),
  );
}

export function registerDeleteTransactionTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "delete_transaction",
    {
      title: "Delete Transaction",
      description: "Removes one transaction from the index. Unknown ids report deleted=false.",
      inputSchema: {
        transaction_id: z.string().min(1).describe("Transaction id to remove"),
      },
    },
    async ({ transaction_id }) => runTool(() => service.deleteTransaction(transaction_id)),
  );
}

export function registerResetIndexTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "reset_index",
    {
      title: "Reset Index",
      description: "Deletes every entry and the embedding model binding of the index.",
      inputSchema: {
        confirm: z.literal(true).describe("Must be true"),
      },
    },
    async () => runTool(() => service.resetIndex()),
  );
}
