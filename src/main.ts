#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./runtime/config.js";
import { createLogger, setLogLevel } from "./runtime/logger.js";
import { createServer, SERVER_VERSION } from "./tools/server.js";
import { createServices } from "./tools/services.js";

const log = createLogger("main");

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);
  const services = createServices(config);
  const server = createServer(services);

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (stopping) return;
    stopping = true;
    log.info({ signal }, "shutting down");
    try {
      await services.sessions.closeAll();
      await server.close();
    } catch (err) {
      log.error({ err }, "shutdown failed");
      process.exitCode = 1;
    }
    process.exit();
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      void shutdown(signal);
    });
  }

  services.sessions.start();
  await server.connect(new StdioServerTransport());
  log.info({ version: SERVER_VERSION, scratch: config.scratchDir, maxSessions: config.render.maxSessions }, "pocketdock server listening on stdio");
}

main().catch((err: unknown) => {
  log.fatal({ err }, "failed to start");
  process.exit(1);
});
