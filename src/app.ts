import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { FuelSalesQaService } from "./services/fuelSalesQaService.js";
import { registerAskTransactionsTool } from "./tools/askTransactions.js";
import { registerIngestRecordsTool, registerIngestTransactionsTool } from "./tools/ingestTransactions.js";
import {
  registerDeleteTransactionTool,
  registerIndexStatsTool,
  registerResetIndexTool,
} from "./tools/manageIndex.js";
import { registerSearchTransactionsTool } from "./tools/searchTransactions.js";

export const SERVER_NAME = "fuel-sales-qa-mcp";
export const SERVER_VERSION = "0.1.0";

export function createAppServer(service: FuelSalesQaService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerIngestTransactionsTool(server, service);
  registerIngestRecordsTool(server, service);
  registerAskTransactionsTool(server, service);
  registerSearchTransactionsTool(server, service);
  registerIndexStatsTool(server, service);
  registerDeleteTransactionTool(server, service);
  registerResetIndexTool(server, service);

  return server;
}
