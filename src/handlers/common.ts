import { createHash } from "node:crypto";
import { logger } from "../config/logger.js";
import { claimMessage } from "../dedup/index.js";
import { DeliveryError, describeError } from "../errors/index.js";
import { detectLanguage, parseMessage, resolveSender } from "../parser/index.js";
import type {
  FetchedMessage,
  HandlerContext,
  LanguageTemplates,
  ParsedMessage,
} from "../types/index.js";

export interface IncomingItem {
  uid: number;
  message: ParsedMessage;
  /** Dedup key: the trimmed Message-ID, or a content hash when it is missing. */
  canonicalId: string;
  sender?: string;
}

export function canonicalId(message: ParsedMessage): string {
  if (message.messageId) return message.messageId;
  return `sha256:${createHash("sha256").update(message.raw).digest("hex")}`;
}

/**
 * Parse one fetched message and claim it. Returns undefined when the item
 * was handled before or cannot be parsed.
 */
export async function claimItem(
  fetched: FetchedMessage,
  seen: Set<string>,
  handler: string
): Promise<IncomingItem | undefined> {
  let message: ParsedMessage;
  try {
    message = await parseMessage(fetched.source);
  } catch (err) {
    logger.warn({ handler, uid: fetched.uid, error: describeError(err) }, "Skipping unparsable message");
    return undefined;
  }

  const id = canonicalId(message);
  if (!claimMessage(id, seen)) {
    logger.debug({ handler, uid: fetched.uid, messageId: id }, "Already handled");
    return undefined;
  }

  return { uid: fetched.uid, message, canonicalId: id, sender: resolveSender(message) };
}

export function pickTemplate(
  templates: LanguageTemplates,
  message: ParsedMessage
): { lang: string; text: string } {
  const lang = detectLanguage(message, Object.keys(templates));
  return { lang, text: templates[lang] ?? templates.en };
}

/**
 * Send and swallow delivery failures, which are never retried. Returns
 * whether the message was accepted.
 */
export async function sendBestEffort(
  ctx: HandlerContext,
  from: string,
  to: string,
  message: Buffer,
  what: string
): Promise<boolean> {
  try {
    await ctx.send(ctx.credentials, from, to, message);
    logger.info({ what, to }, "Message sent");
    return true;
  } catch (err) {
    if (!(err instanceof DeliveryError)) throw err;
    logger.error({ what, to, error: err.message }, "Failed to send message");
    return false;
  }
}
