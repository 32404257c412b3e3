import { setTimeout as delay } from "node:timers/promises";
import type { DaemonConfig } from "../config/daemon.js";
import { logger } from "../config/logger.js";
import { FatalConfigurationError, describeError } from "../errors/index.js";
import { HttpFetcher } from "../fetcher/index.js";
import { imapSessionFactory, type SessionFactory } from "../imap/session.js";
import { EventLoop } from "../loop/index.js";
import type { PassResult } from "../pipeline/index.js";
import { sendViaSmtp } from "../sender/index.js";
import { HtmlTransformer } from "../transform/index.js";
import type { MailboxSession, RuleTable, SendFn } from "../types/index.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves early, without error, when `signal` aborts. */
export const abortableSleep: Sleep = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (!signal?.aborted) throw err;
  }
};

export interface SuperviseOptions {
  connect: SessionFactory;
  loop: EventLoop;
  once: boolean;
  initialDelayMs: number;
  maxDelayMs: number;
  signal?: AbortSignal;
  sleep?: Sleep;
}

async function closeQuietly(session: MailboxSession): Promise<void> {
  try {
    await session.close();
  } catch (err) {
    logger.debug({ error: describeError(err) }, "Session close failed");
  }
}

/**
 * Keep a session running. Connection failures are retried with doubling
 * delays up to `maxDelayMs`; a session that completed a pass starts the
 * delay over. Configuration errors and single-pass runs are not retried.
 */
export async function supervise(options: SuperviseOptions): Promise<void> {
  const { connect, loop, once, initialDelayMs, maxDelayMs, signal } = options;
  const sleep = options.sleep ?? abortableSleep;

  if (once) {
    const session = await connect();
    try {
      await loop.runSession(session, { once: true, signal });
    } finally {
      await closeQuietly(session);
    }
    return;
  }

  let nextDelay = initialDelayMs;

  while (!signal?.aborted) {
    const passesBefore = loop.completedPasses;
    let session: MailboxSession | undefined;
    try {
      logger.info("Connecting");
      session = await connect();
      await loop.runSession(session, { once: false, signal });
      nextDelay = initialDelayMs;
      if (!signal?.aborted) logger.info("Session ended, reconnecting");
    } catch (err) {
      if (err instanceof FatalConfigurationError) throw err;
      if (signal?.aborted) break;

      if (loop.completedPasses > passesBefore) nextDelay = initialDelayMs;
      const wait = nextDelay;
      nextDelay = Math.min(nextDelay * 2, maxDelayMs);

      logger.error(
        { at: new Date().toISOString(), error: describeError(err), retryInMs: wait },
        "Session failed, backing off"
      );
      if (session) await closeQuietly(session);
      session = undefined;
      await sleep(wait, signal);
    } finally {
      if (session) await closeQuietly(session);
    }
  }

  logger.info("Supervisor stopped");
}

export interface RunOptions {
  config: DaemonConfig;
  rules: RuleTable;
  userAgent: string;
  once: boolean;
  signal?: AbortSignal;
  connect?: SessionFactory;
  send?: SendFn;
}

/**
 * Wire the mailbox session, the rule loop and the supervisor. Resolves with
 * the outcome of the last pass once stopped.
 */
export async function run(options: RunOptions): Promise<PassResult | undefined> {
  const { config, rules, once, signal } = options;
  const fetcher = new HttpFetcher({ cacheDir: config.cache.dir, userAgent: options.userAgent });

  const loop = new EventLoop({
    rules,
    credentials: config.smtp,
    send: options.send ?? sendViaSmtp,
    fetcher,
    transformer: new HtmlTransformer(fetcher),
    idleTimeoutMs: config.idleTimeoutMs,
  });

  await supervise({
    connect: options.connect ?? imapSessionFactory(config),
    loop,
    once,
    initialDelayMs: config.reconnect.initialDelayMs,
    maxDelayMs: config.reconnect.maxDelayMs,
    signal,
  });
  return loop.lastPass;
}
