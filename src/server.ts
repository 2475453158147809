import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer } from "./app.js";
import { createRuntime } from "./bootstrap.js";
import { loadConfig } from "./config/env.js";
import { startHttpTransport } from "./transport/httpTransport.js";
import { createComponentLogger } from "./utils/logger.js";

const log = createComponentLogger("server");

async function main() {
  const config = loadConfig();
  const runtime = await createRuntime(config);
  const stopTasks: Array<() => Promise<void>> = [];

  let stopping: Promise<void> | null = null;
  const stop = (reason: string): Promise<void> => {
    if (!stopping) {
      stopping = (async () => {
        log.info({ reason }, "Shutting down");
        // Cancel work in flight before the transports wait for it.
        runtime.service.stop();
        for (const task of stopTasks) {
          await task();
        }
        await runtime.close();
      })();
    }
    return stopping;
  };

  if (config.transport === "http") {
    const http = await startHttpTransport({
      host: config.host,
      port: config.port,
      createServer: () => createAppServer(runtime.service),
    });
    stopTasks.push(() => http.close());
  } else {
    const server = createAppServer(runtime.service);
    await server.connect(new StdioServerTransport());
    stopTasks.push(() => server.close());
    log.info("MCP stdio server ready");
  }

  const onSignal = (signal: NodeJS.Signals) => {
    stop(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error({ err: error }, "Shutdown failed");
        process.exit(1);
      });
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "Failed to start MCP server");
  process.exit(1);
});
