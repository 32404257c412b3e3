import type { SmtpCredentials } from "../config/daemon.js";
import { logger } from "../config/logger.js";
import { DedupWindow } from "../dedup/index.js";
import { FatalConfigurationError } from "../errors/index.js";
import { runRuleTable, type PassResult } from "../pipeline/index.js";
import type {
  ContentFetcher,
  ContentTransformer,
  MailboxSession,
  RuleTable,
  SendFn,
} from "../types/index.js";

export interface EventLoopOptions {
  rules: RuleTable;
  credentials: SmtpCredentials;
  send: SendFn;
  fetcher: ContentFetcher;
  transformer: ContentTransformer;
  idleTimeoutMs: number;
}

export interface RunSessionOptions {
  once: boolean;
  signal?: AbortSignal;
}

/**
 * Runs the rule table once when a session starts and again on every
 * mailbox change. The dedup window lives as long as the loop, so it
 * carries over between sessions.
 */
export class EventLoop {
  readonly window = new DedupWindow();
  completedPasses = 0;
  lastPass: PassResult | undefined;

  constructor(private readonly options: EventLoopOptions) {}

  async runSession(session: MailboxSession, { once, signal }: RunSessionOptions): Promise<void> {
    if (!once && !session.supportsChangeNotification()) {
      throw new FatalConfigurationError("Server does not support IDLE");
    }

    await this.pass(session, signal);
    if (once) return;

    while (!signal?.aborted) {
      const wait = await session.waitForChange(this.options.idleTimeoutMs, signal);
      if (wait.status !== "OK") {
        logger.warn({ status: wait.status }, "IDLE ended, closing session");
        return;
      }
      if (signal?.aborted) return;
      if (wait.data) {
        await this.pass(session, signal);
      } else {
        logger.debug("IDLE timed out, re-issuing");
      }
    }
  }

  private async pass(session: MailboxSession, signal?: AbortSignal): Promise<void> {
    const { rules, credentials, send, fetcher, transformer } = this.options;
    logger.info({ at: new Date().toISOString() }, "Running rules");
    this.lastPass = await runRuleTable(
      rules,
      this.window,
      { session, credentials, send, fetcher, transformer },
      signal
    );
    this.completedPasses++;
  }
}
