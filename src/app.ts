import { loadDaemonConfig, withPassword } from "./config/daemon.js";
import { logger } from "./config/logger.js";
import { loadProfile } from "./config/profile.js";
import { FatalConfigurationError } from "./errors/index.js";
import type { PassResult } from "./pipeline/index.js";
import { buildRuleTable } from "./rules/index.js";
import { verifyTransport } from "./sender/index.js";
import { run } from "./supervisor/index.js";

export interface StartOptions {
  once: boolean;
  /** Overrides `IMAP_PASSWORD`. */
  password?: string;
}

/**
 * Load configuration and run until stopped. SIGINT and SIGTERM let the
 * current step finish, then stop.
 */
export async function startDaemon(options: StartOptions): Promise<PassResult | undefined> {
  const env = loadDaemonConfig();
  const config = options.password ? withPassword(env, options.password) : env;
  if (!config.imap.pass) {
    throw new FatalConfigurationError("No IMAP password: set IMAP_PASSWORD or pass --password");
  }

  const profile = loadProfile(config.profilePath);
  const rules = buildRuleTable(profile);
  logger.info({ rules: rules.length, once: options.once }, "Rule table loaded");

  await verifyTransport(config.smtp);

  const controller = new AbortController();
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutting down...");
    controller.abort();
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  const result = await run({
    config,
    rules,
    userAgent: profile.proxy.userAgent,
    once: options.once,
    signal: controller.signal,
  });

  logger.info("Shutdown complete");
  return result;
}
