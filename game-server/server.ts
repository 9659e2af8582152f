// game-server/server.ts

import { SessionRegistry } from "../gamecore/core/SessionRegistry";
import { DatagramServer } from "../gamecore/net/DatagramServer";
import { installFileLogTap } from "../gamecore/utils/FileLogTap";
import { Logger } from "../gamecore/utils/logger";
import { loadServerConfig } from "./config";

const log = Logger.scope("SERVER");

async function main(): Promise<void> {
  const cfg = loadServerConfig();
  if (cfg.fileLog) installFileLogTap(cfg.fileLog);

  log.info("Starting session server...", {
    host: cfg.host,
    port: cfg.port,
    idleWakeMs: cfg.idleWakeMs,
  });

  // One registry per process, owned by the server loop.
  const registry = new SessionRegistry();
  const server = new DatagramServer(registry, cfg);

  await server.start();

  const shutdown = (signal: string) => {
    log.info("Shutting down", { signal, games: registry.count() });
    server
      .stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error("Error during shutdown", { err });
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  log.error("Fatal error in session server", { err });
  process.exit(1);
});
