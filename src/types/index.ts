import type { SmtpCredentials } from "../config/daemon.js";

// --- Filter expressions ------------------------------------------------------

export type FilterField = "FROM" | "TO" | "CC" | "SUBJECT";

export type FilterExpression =
  | { readonly kind: "match"; readonly field: FilterField; readonly value: string }
  | { readonly kind: "or"; readonly children: readonly FilterExpression[] }
  | { readonly kind: "and"; readonly children: readonly FilterExpression[] }
  | { readonly kind: "not"; readonly children: readonly FilterExpression[] };

// --- Mailbox session ---------------------------------------------------------

export type MailboxStatus = "OK" | "NO" | "BAD";

export interface MailboxReply<T = unknown> {
  status: MailboxStatus;
  data: T;
}

export interface FetchedMessage {
  uid: number;
  source: Buffer;
}

export interface SearchQuery {
  /** IMAP SEARCH criteria for logging; the session sends `filter`. */
  text: string;
  filter: FilterExpression;
}

/**
 * Authenticated connection with a selected mailbox. NO/BAD answers come back
 * as statuses; connection failures are thrown as `TransportError`.
 */
export interface MailboxSession {
  search(query: SearchQuery): Promise<MailboxReply<number[]>>;
  fetch(uids: readonly number[]): Promise<MailboxReply<FetchedMessage[]>>;
  storeFlags(uids: readonly number[], flags: readonly string[]): Promise<MailboxReply>;
  copy(uids: readonly number[], folder: string): Promise<MailboxReply>;
  expunge(): Promise<MailboxReply>;
  append(
    folder: string,
    flags: readonly string[],
    date: Date,
    raw: Buffer
  ): Promise<MailboxReply>;
  /** Resolves with `data: true` on a mailbox change, `false` on timeout or abort. */
  waitForChange(timeoutMs: number, signal?: AbortSignal): Promise<MailboxReply<boolean>>;
  supportsChangeNotification(): boolean;
  close(): Promise<void>;
}

// --- Parsed and outgoing messages -------------------------------------------

export interface ParsedMessage {
  messageId?: string;
  subject?: string;
  from?: string;
  to?: string;
  replyTo?: string;
  sender?: string;
  contentLanguage?: string;
  textBody?: string;
  htmlBody?: string;
  raw: Buffer;
}

export interface MessageAttachment {
  content: Buffer;
  contentType: string;
  filename?: string;
}

export interface OutgoingMessageInput {
  subject: string;
  from: string;
  to: string;
  body: string;
  subjectPrefix?: string;
  inReplyTo?: string;
  replyTo?: string;
  messageId?: string;
  messageIdDomain?: string;
  contentLanguage?: string;
  attachment?: MessageAttachment;
}

export type SendFn = (
  credentials: SmtpCredentials,
  from: string,
  to: string,
  message: Buffer
) => Promise<void>;

// --- Content fetching and transformation ------------------------------------

export interface FetchedContent {
  content: Buffer;
  finalUrl: string;
  /** Lower-cased header names. */
  headers: Record<string, string>;
}

export interface ContentFetcher {
  fetch(url: string, timeoutMs: number, maxBytes: number): Promise<FetchedContent>;
  getCached(key: string): Promise<Buffer | undefined>;
  storeCached(key: string, content: Buffer): Promise<void>;
}

export type DeobfuscatorVariant = "shiftedAlphabet";

export interface DeobfuscatorRule {
  domainSuffix: string;
  variant: DeobfuscatorVariant;
}

export interface HtmlTransformOptions {
  baseUrl: string;
  bleach: boolean;
  includeImages: boolean;
  asText: boolean;
  withoutLinks: boolean;
  deobfuscators: readonly DeobfuscatorRule[];
  imageTimeoutMs: number;
  maxImages: number;
}

export interface HtmlTransformResult {
  content: string;
  title?: string;
  subtype: "plain" | "html";
  /** Marks which transforms ran, e.g. `TLIB`. */
  prefix: string;
}

export interface ContentTransformer {
  transformHtml(html: string, options: HtmlTransformOptions): Promise<HtmlTransformResult>;
}

// --- Rules and handler steps -------------------------------------------------

/** Reply templates keyed by language tag; `en` is the fallback. */
export type LanguageTemplates = Readonly<{ en: string } & Record<string, string>>;

export interface AutoForwardReplyParams {
  forwardTo: string;
  forwardBy: string;
  replyFrom: string;
  reply: LanguageTemplates;
  /** `{sender}` is replaced by the original sender. */
  forwardNote: LanguageTemplates;
}

export interface RejectAndDeleteParams {
  replyFrom: string;
  reply: LanguageTemplates;
}

export interface FetchProxyParams {
  sendFrom: string;
  storeFolder: string;
  device: { from: string; to: string };
  fetchTimeoutMs: number;
  maxDownloadBytes: number;
  imageTimeoutMs: number;
  maxImages: number;
  deobfuscators: readonly DeobfuscatorRule[];
}

export type ContentHandler =
  | { readonly kind: "autoForwardReply"; readonly params: AutoForwardReplyParams }
  | { readonly kind: "rejectAndDelete"; readonly params: RejectAndDeleteParams }
  | { readonly kind: "fetchProxy"; readonly params: FetchProxyParams };

export type HandlerStep =
  | { readonly kind: "expunge" }
  | { readonly kind: "delete" }
  | { readonly kind: "copy"; readonly folder: string }
  | { readonly kind: "move"; readonly folder: string }
  | { readonly kind: "setFlags"; readonly flags: readonly string[] }
  | {
      readonly kind: "setFlagsAndMove";
      readonly flags: readonly string[];
      readonly folder: string;
    }
  | { readonly kind: "content"; readonly handler: ContentHandler };

export interface Rule {
  readonly name: string;
  readonly filter: FilterExpression;
  readonly steps: readonly HandlerStep[];
}

export type RuleTable = readonly Rule[];

export interface StepResult {
  status: MailboxStatus;
  data: unknown;
  /** Message-IDs handled so far, including those inherited from earlier rules. */
  seen: Set<string>;
}

/** Collaborators shared by every step of a pass. */
export interface HandlerContext {
  session: MailboxSession;
  credentials: SmtpCredentials;
  send: SendFn;
  fetcher: ContentFetcher;
  transformer: ContentTransformer;
}
