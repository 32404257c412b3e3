import { simpleParser, type AddressObject, type HeaderValue, type ParsedMail } from "mailparser";
import type { ParsedMessage } from "../types/index.js";

function formatAddresses(addr: AddressObject): string {
  return addr.value
    .map((a) => (a.name ? `${a.name} <${a.address}>` : a.address ?? ""))
    .filter(Boolean)
    .join(", ");
}

function addressListToString(
  addr: ParsedMail["to"]
): string | undefined {
  if (!addr) return undefined;
  const list = Array.isArray(addr) ? addr : [addr];
  return list.map(formatAddresses).join(", ") || undefined;
}

function isAddressObject(value: HeaderValue): value is AddressObject {
  return (
    typeof value === "object" &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    "value" in value &&
    Array.isArray(value.value)
  );
}

function headerText(parsed: ParsedMail, name: string): string | undefined {
  const value = parsed.headers.get(name);
  if (value === undefined) return undefined;
  if (typeof value === "string") return value.trim() || undefined;
  if (isAddressObject(value)) return formatAddresses(value) || undefined;
  if (Array.isArray(value)) return value.join(", ") || undefined;
  return undefined;
}

export async function parseMessage(raw: Buffer): Promise<ParsedMessage> {
  const parsed = await simpleParser(raw);

  return {
    messageId: parsed.messageId?.trim() || undefined,
    subject: parsed.subject,
    from: addressListToString(parsed.from),
    to: addressListToString(parsed.to),
    replyTo: addressListToString(parsed.replyTo),
    sender: headerText(parsed, "sender"),
    contentLanguage: headerText(parsed, "content-language"),
    textBody: parsed.text,
    htmlBody: parsed.html || undefined,
    raw,
  };
}

/** Reply target: Reply-To, then From, then Sender. */
export function resolveSender(message: ParsedMessage): string | undefined {
  return message.replyTo || message.from || message.sender;
}

/**
 * First template language mentioned in Content-Language, else `fallback`.
 * Matching is by substring, so `de-DE` selects `de`.
 */
export function detectLanguage(
  message: ParsedMessage,
  available: Iterable<string>,
  fallback = "en"
): string {
  const contentLanguage = (message.contentLanguage ?? "").toLowerCase();
  for (const lang of available) {
    if (contentLanguage.includes(lang)) return lang;
  }
  return fallback;
}
