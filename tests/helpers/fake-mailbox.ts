import type {
  FetchedMessage,
  FilterExpression,
  MailboxReply,
  MailboxSession,
  MailboxStatus,
  SearchQuery,
} from "../../src/types/index.js";

export interface StoredMessage {
  uid: number;
  from: string;
  to: string;
  cc?: string;
  subject: string;
  flags: Set<string>;
  source: Buffer;
}

export interface NewMessage {
  from: string;
  to: string;
  cc?: string;
  subject: string;
  messageId?: string;
  replyTo?: string;
  sender?: string;
  contentLanguage?: string;
  body?: string;
}

type Operation = "search" | "fetch" | "store" | "copy" | "expunge" | "append";

/** What the next `waitForChange` reports: a change, a timeout, a refusal or a failure. */
export type IdleOutcome = boolean | "NO" | Error;

export function rawMessage(message: NewMessage): Buffer {
  const lines = [`From: ${message.from}`, `To: ${message.to}`];
  if (message.cc) lines.push(`Cc: ${message.cc}`);
  if (message.replyTo) lines.push(`Reply-To: ${message.replyTo}`);
  if (message.sender) lines.push(`Sender: ${message.sender}`);
  lines.push(`Subject: ${message.subject}`);
  if (message.messageId) lines.push(`Message-ID: ${message.messageId}`);
  if (message.contentLanguage) lines.push(`Content-Language: ${message.contentLanguage}`);
  lines.push("MIME-Version: 1.0", "Content-Type: text/plain; charset=utf-8", "");
  lines.push(message.body ?? "Hello.", "");
  return Buffer.from(lines.join("\r\n"), "utf-8");
}

function contains(haystack: string | undefined, needle: string): boolean {
  return (haystack ?? "").toLowerCase().includes(needle.toLowerCase());
}

/**
 * In-memory mailbox. Searches evaluate the filter tree the way a server
 * reads the compiled criteria; every mutating call is written to `journal`.
 */
export class FakeMailbox implements MailboxSession {
  readonly messages: StoredMessage[] = [];
  readonly folders = new Map<string, Buffer[]>();
  readonly failures = new Map<Operation, MailboxStatus>();
  readonly idleOutcomes: IdleOutcome[] = [];
  closed = false;
  private nextUid = 1;

  constructor(
    readonly journal: string[] = [],
    private readonly options: { idle?: boolean; onIdleDrained?: () => void } = {}
  ) {}

  add(message: NewMessage): number {
    const uid = this.nextUid++;
    this.messages.push({
      uid,
      from: message.from,
      to: message.to,
      cc: message.cc,
      subject: message.subject,
      flags: new Set(),
      source: rawMessage(message),
    });
    return uid;
  }

  failNext(operation: Operation, status: MailboxStatus = "NO"): void {
    this.failures.set(operation, status);
  }

  private failure(operation: Operation): MailboxStatus | undefined {
    const status = this.failures.get(operation);
    this.failures.delete(operation);
    return status;
  }

  private matches(message: StoredMessage, expression: FilterExpression): boolean {
    switch (expression.kind) {
      case "match": {
        const field = {
          FROM: message.from,
          TO: message.to,
          CC: message.cc,
          SUBJECT: message.subject,
        }[expression.field];
        return contains(field, expression.value);
      }
      case "or":
        return expression.children.some((child) => this.matches(message, child));
      case "and":
        return expression.children.every((child) => this.matches(message, child));
      case "not": {
        const [first, ...rest] = expression.children;
        return !this.matches(message, first) && rest.every((child) => this.matches(message, child));
      }
    }
  }

  async search(query: SearchQuery): Promise<MailboxReply<number[]>> {
    this.journal.push(`SEARCH ${query.text}`);
    const failed = this.failure("search");
    if (failed) return { status: failed, data: [] };
    const uids = this.messages.filter((m) => this.matches(m, query.filter)).map((m) => m.uid);
    return { status: "OK", data: uids };
  }

  async fetch(uids: readonly number[]): Promise<MailboxReply<FetchedMessage[]>> {
    this.journal.push(`FETCH ${uids.join(",")}`);
    const failed = this.failure("fetch");
    if (failed) return { status: failed, data: [] };
    const data = this.messages
      .filter((m) => uids.includes(m.uid))
      .map((m) => ({ uid: m.uid, source: m.source }));
    return { status: "OK", data };
  }

  async storeFlags(uids: readonly number[], flags: readonly string[]): Promise<MailboxReply> {
    this.journal.push(`STORE ${uids.join(",")} ${flags.join(" ")}`);
    const failed = this.failure("store");
    if (failed) return { status: failed, data: null };
    for (const message of this.messages) {
      if (uids.includes(message.uid)) flags.forEach((flag) => message.flags.add(flag));
    }
    return { status: "OK", data: null };
  }

  async copy(uids: readonly number[], folder: string): Promise<MailboxReply> {
    this.journal.push(`COPY ${uids.join(",")} ${folder}`);
    const failed = this.failure("copy");
    if (failed) return { status: failed, data: null };
    const target = this.folders.get(folder) ?? [];
    for (const message of this.messages) {
      if (uids.includes(message.uid)) target.push(message.source);
    }
    this.folders.set(folder, target);
    return { status: "OK", data: null };
  }

  async expunge(): Promise<MailboxReply> {
    this.journal.push("EXPUNGE");
    const failed = this.failure("expunge");
    if (failed) return { status: failed, data: null };
    const kept = this.messages.filter((m) => !m.flags.has("\\Deleted"));
    this.messages.splice(0, this.messages.length, ...kept);
    return { status: "OK", data: null };
  }

  async append(
    folder: string,
    _flags: readonly string[],
    _date: Date,
    raw: Buffer
  ): Promise<MailboxReply> {
    this.journal.push(`APPEND ${folder}`);
    const failed = this.failure("append");
    if (failed) return { status: failed, data: null };
    this.folders.set(folder, [...(this.folders.get(folder) ?? []), raw]);
    return { status: "OK", data: null };
  }

  async waitForChange(): Promise<MailboxReply<boolean>> {
    const next = this.idleOutcomes.shift();
    if (next === undefined) {
      this.options.onIdleDrained?.();
      return { status: "OK", data: false };
    }
    if (next instanceof Error) throw next;
    if (next === "NO") return { status: "NO", data: false };
    return { status: "OK", data: next };
  }

  supportsChangeNotification(): boolean {
    return this.options.idle ?? true;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
