import { ImapFlow, type ImapFlowOptions } from "imapflow";
import type { DaemonConfig } from "../config/daemon.js";
import { logger } from "../config/logger.js";
import { TransportError, describeError } from "../errors/index.js";
import type {
  FetchedMessage,
  MailboxReply,
  MailboxSession,
  MailboxStatus,
  SearchQuery,
} from "../types/index.js";
import { toSearchObject } from "./search.js";

const CHANGE_EVENTS = ["exists", "expunge", "flags"] as const;

function refusedStatus(err: unknown): MailboxStatus | undefined {
  if (err instanceof Error && "responseStatus" in err) {
    const status = err.responseStatus;
    if (status === "NO" || status === "BAD") return status;
  }
  return undefined;
}

/**
 * Run a command, turning a NO/BAD answer into a status and anything else
 * into `TransportError`.
 */
async function command<T>(
  name: string,
  run: () => Promise<MailboxReply<T>>,
  fallback: T
): Promise<MailboxReply<T>> {
  try {
    return await run();
  } catch (err) {
    const status = refusedStatus(err);
    if (status) {
      logger.warn({ command: name, status, error: describeError(err) }, "Mailbox command refused");
      return { status, data: fallback };
    }
    throw new TransportError(`${name} failed: ${describeError(err)}`, { cause: err });
  }
}

/** The part of `ImapFlow` that IDLE handling needs. */
export interface IdleClient {
  readonly usable: boolean;
  idle(): Promise<unknown>;
  noop(): Promise<unknown>;
  on(event: string, listener: () => void): unknown;
  off(event: string, listener: () => void): unknown;
}

/**
 * IDLE until the mailbox changes, the timeout passes or `signal` aborts.
 * Any of these issues a NOOP, which ends the IDLE. The client must be built
 * with `disableAutoIdle`, otherwise `idle()` returns at once while imapflow
 * idles on its own.
 */
export async function waitForMailboxChange(
  client: IdleClient,
  timeoutMs: number,
  signal?: AbortSignal
): Promise<MailboxReply<boolean>> {
  if (signal?.aborted) return { status: "OK", data: false };

  let changed = false;
  const breakIdle = (): void => {
    client.noop().catch((err: unknown) => {
      logger.debug({ error: describeError(err) }, "NOOP after IDLE failed");
    });
  };
  const onChange = (): void => {
    changed = true;
    breakIdle();
  };

  const timer = setTimeout(breakIdle, timeoutMs);
  signal?.addEventListener("abort", breakIdle, { once: true });
  for (const event of CHANGE_EVENTS) client.on(event, onChange);

  try {
    await client.idle();
  } catch (err) {
    throw new TransportError(`IDLE failed: ${describeError(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener("abort", breakIdle);
    for (const event of CHANGE_EVENTS) client.off(event, onChange);
  }

  if (!client.usable) {
    throw new TransportError("Connection closed while idling");
  }
  return { status: "OK", data: changed };
}

export class ImapFlowSession implements MailboxSession {
  constructor(private readonly client: ImapFlow) {}

  search(query: SearchQuery): Promise<MailboxReply<number[]>> {
    logger.debug({ query: query.text }, "SEARCH");
    return command<number[]>(
      "SEARCH",
      async () => {
        const uids = await this.client.search(toSearchObject(query.filter), { uid: true });
        return Array.isArray(uids) ? { status: "OK", data: uids } : { status: "NO", data: [] };
      },
      []
    );
  }

  fetch(uids: readonly number[]): Promise<MailboxReply<FetchedMessage[]>> {
    return command<FetchedMessage[]>(
      "FETCH",
      async () => {
        const messages: FetchedMessage[] = [];
        for await (const msg of this.client.fetch([...uids], { uid: true, source: true }, { uid: true })) {
          if (msg.source) messages.push({ uid: msg.uid, source: msg.source });
        }
        return { status: "OK", data: messages };
      },
      []
    );
  }

  storeFlags(uids: readonly number[], flags: readonly string[]): Promise<MailboxReply> {
    return command<unknown>(
      "STORE",
      async () => {
        const ok = await this.client.messageFlagsAdd([...uids], [...flags], { uid: true });
        return { status: ok ? "OK" : "NO", data: ok };
      },
      false
    );
  }

  copy(uids: readonly number[], folder: string): Promise<MailboxReply> {
    return command<unknown>(
      "COPY",
      async () => {
        const copied = await this.client.messageCopy([...uids], folder, { uid: true });
        return { status: copied ? "OK" : "NO", data: copied };
      },
      false
    );
  }

  /**
   * imapflow has no bare EXPUNGE; deleting the `\Deleted` set issues one. An
   * empty set is not an error.
   */
  expunge(): Promise<MailboxReply> {
    return command<unknown>(
      "EXPUNGE",
      async () => ({
        status: "OK",
        data: await this.client.messageDelete({ deleted: true }, { uid: true }),
      }),
      false
    );
  }

  append(folder: string, flags: readonly string[], date: Date, raw: Buffer): Promise<MailboxReply> {
    return command<unknown>(
      "APPEND",
      async () => {
        const appended = await this.client.append(folder, raw, [...flags], date);
        return { status: appended ? "OK" : "NO", data: appended };
      },
      false
    );
  }

  waitForChange(timeoutMs: number, signal?: AbortSignal): Promise<MailboxReply<boolean>> {
    return waitForMailboxChange(this.client, timeoutMs, signal);
  }

  supportsChangeNotification(): boolean {
    return this.client.capabilities.has("IDLE");
  }

  async close(): Promise<void> {
    try {
      await this.client.logout();
    } catch (err) {
      logger.debug({ error: describeError(err) }, "Logout failed, closing socket");
      this.client.close();
    }
  }
}

export type SessionFactory = () => Promise<MailboxSession>;

/** The session drives IDLE itself, so imapflow's automatic IDLE stays off. */
export function imapClientOptions(config: DaemonConfig): ImapFlowOptions {
  return {
    host: config.imap.host,
    port: config.imap.port,
    secure: config.imap.secure,
    auth: { user: config.imap.user, pass: config.imap.pass },
    disableAutoIdle: true,
    logger: false,
  };
}

/** Connect, log in and select the configured mailbox. */
export function imapSessionFactory(config: DaemonConfig): SessionFactory {
  return async () => {
    const client = new ImapFlow(imapClientOptions(config));

    client.on("error", (err: Error) => {
      logger.error({ error: err.message }, "IMAP connection error");
    });

    try {
      await client.connect();
      await client.mailboxOpen(config.imap.mailbox);
    } catch (err) {
      client.close();
      throw new TransportError(`Cannot open ${config.imap.mailbox} on ${config.imap.host}: ${describeError(err)}`, {
        cause: err,
      });
    }

    logger.info({ host: config.imap.host, mailbox: config.imap.mailbox }, "Mailbox selected");
    return new ImapFlowSession(client);
  };
}
