import "dotenv/config";

import { loadConfig } from "./config.js";
import { createLogger, setLogLevel } from "./logger.js";
import { createRelayServer } from "./server.js";

const log = createLogger("main");

async function main() {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const relay = createRelayServer(config);
  await relay.listen();

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info("Shutting down...");
    try {
      await relay.close();
      process.exit(0);
    } catch (err) {
      log.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
