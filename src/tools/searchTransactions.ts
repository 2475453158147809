import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { MAX_TOP_K } from "../pipelines/query.js";
import { FuelSalesQaService } from "../services/fuelSalesQaService.js";
import { filterInputSchema, runTool, toTransactionFilter } from "./toolResults.js";

export function registerSearchTransactionsTool(server: McpServer, service: FuelSalesQaService) {
  server.registerTool(
    "search_transactions",
    {
      title: "Search Transactions",
      description: "Returns the indexed transactions most similar to a query, without generating an answer.",
      inputSchema: {
        query: z.string().min(2).describe("Search query"),
        top_k: z.number().int().min(1).max(MAX_TOP_K).optional().describe("Result size"),
        filter: filterInputSchema,
      },
    },
    async ({ query, top_k, filter }, extra) =>
      runTool(() =>
        service.searchTransactions({
          query,
          topK: top_k,
          filter: toTransactionFilter(filter),
          signal: extra.signal,
        }),
      ),
  );
}
