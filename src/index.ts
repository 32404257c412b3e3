import { startDaemon } from "./app.js";
import { logger } from "./config/logger.js";
import { describeError } from "./errors/index.js";

async function main(): Promise<void> {
  process.on("uncaughtException", (err) => {
    logger.fatal({ error: err.message }, "Uncaught exception");
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    logger.fatal({ reason: describeError(reason) }, "Unhandled rejection");
    process.exit(1);
  });

  await startDaemon({ once: process.argv.includes("--once") });
  process.exit(0);
}

main().catch((err) => {
  logger.fatal({ error: describeError(err) }, "Daemon stopped");
  process.exit(1);
});
