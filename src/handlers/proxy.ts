import { buildMessage } from "../composer/index.js";
import { logger } from "../config/logger.js";
import { TransportError, describeError } from "../errors/index.js";
import { filenameFromHeadersOrUrl } from "../fetcher/index.js";
import { htmlToPlainText } from "../transform/index.js";
import type {
  FetchProxyParams,
  HandlerContext,
  MessageAttachment,
  ParsedMessage,
  StepResult,
} from "../types/index.js";
import { claimItem } from "./common.js";

const PROXY_ID_DOMAIN = "proxy";

const URL_PATTERN = /https?:\/\/[^\s<>"{}|\\^`[\]'()]+/g;
const TRAILING_PUNCTUATION = /[.,;:!?*]+$/;

export interface ProxyOptions {
  asText: boolean;
  bleach: boolean;
  includeImages: boolean;
  withoutLinks: boolean;
  inline: boolean;
  sendUsingSmtp: boolean;
  sendFrom: string;
  sendTo: string;
}

/**
 * Options are encoded in the recipient address, e.g. `txt+kindle@…`.
 * Without `kindle` the result goes back to the sender and is only stored.
 */
export function parseProxyOptions(
  to: string | undefined,
  params: FetchProxyParams,
  sender: string | undefined
): ProxyOptions {
  const address = (to ?? "").toLowerCase();
  const kindle = address.includes("kindle");

  return {
    asText: address.includes("txt"),
    bleach: address.includes("bleach"),
    includeImages: address.includes("images"),
    withoutLinks: address.includes("wolinks"),
    inline: address.includes("inline"),
    sendUsingSmtp: kindle,
    sendFrom: kindle ? params.device.from : params.sendFrom,
    sendTo: kindle ? params.device.to : sender ?? params.sendFrom,
  };
}

export function extractUrlsFromText(text: string): string[] {
  return [...text.matchAll(URL_PATTERN)].map((m) => m[0].replace(TRAILING_PUNCTUATION, ""));
}

/** Unique URLs of the body parts and the subject, in order of appearance. */
export function extractUrls(message: ParsedMessage): string[] {
  const sources: string[] = [];
  if (message.textBody) sources.push(message.textBody);
  if (message.htmlBody) sources.push(htmlToPlainText(message.htmlBody, { withoutLinks: false }));
  if (message.subject) sources.push(message.subject);

  const urls = new Set<string>();
  for (const source of sources) {
    for (const url of extractUrlsFromText(source)) {
      if (url) urls.add(url);
    }
  }
  return [...urls];
}

/** Decode with the declared charset, then UTF-8, then Latin-1. */
export function decodeText(content: Buffer, charset: string): string {
  let text: string | undefined;
  for (const encoding of [charset, "utf-8", "latin1"]) {
    try {
      text = new TextDecoder(encoding, { fatal: true }).decode(content);
      break;
    } catch {
      continue;
    }
  }
  text ??= new TextDecoder("utf-8").decode(content);
  return text.replace(/\r\n/g, "\n").replace(/\n\r/g, "\n").replace(/\r/g, "\n");
}

export function fixFilenameExtension(filename: string, subtype: string): string {
  if (subtype === "plain" && !filename.endsWith(".txt")) return `${filename}.txt`;
  if (subtype === "html" && !filename.endsWith(".html")) return `${filename}.html`;
  return filename;
}

function contentTypeParts(contentType: string): { mainType: string; subtype: string; charset?: string } {
  const [mainType, rest = ""] = contentType.split("/", 2);
  const subtype = rest.split(";", 1)[0];
  const charset = /charset\s*=\s*"?([^";\s]+)"?/i.exec(contentType)?.[1];
  return { mainType, subtype, charset };
}

function formatHeaders(headers: Record<string, string>): string {
  return Object.entries(headers)
    .map(([name, value]) => `${name}: ${value}`)
    .join("\n");
}

/** Fetch one URL and package it as a message for the store folder. */
export async function buildProxyMessage(
  url: string,
  subject: string,
  inReplyTo: string | undefined,
  options: ProxyOptions,
  params: FetchProxyParams,
  ctx: HandlerContext
): Promise<Buffer> {
  logger.info({ url }, "Fetching URL");
  const fetched = await ctx.fetcher.fetch(url, params.fetchTimeoutMs, params.maxDownloadBytes);

  const contentType = fetched.headers["content-type"] ?? "application/octet-stream";
  const { mainType, charset, ...parts } = contentTypeParts(contentType);
  let subtype = parts.subtype;
  let filename = filenameFromHeadersOrUrl(fetched.headers, fetched.finalUrl);
  let title = subject;
  let prefix = "";
  const info = formatHeaders(fetched.headers);

  const base = {
    from: options.sendFrom,
    to: options.sendTo,
    inReplyTo,
    messageIdDomain: PROXY_ID_DOMAIN,
  };

  if (!contentType.startsWith("text/")) {
    let fullFilename = `${subject}: ${filename}`;
    if (mainType === "application" && subtype.includes("pdf") && !filename.endsWith(".pdf")) {
      fullFilename = `${fullFilename}.pdf`;
    }
    const attachment: MessageAttachment = {
      content: fetched.content,
      contentType: `${mainType}/${subtype}`,
      filename: fullFilename,
    };
    return buildMessage({ ...base, subject, body: info, attachment });
  }

  let text = decodeText(fetched.content, charset ?? "utf-8");

  if (subtype.includes("html")) {
    const result = await ctx.transformer.transformHtml(text, {
      baseUrl: fetched.finalUrl,
      bleach: options.bleach,
      includeImages: options.includeImages,
      asText: options.asText,
      withoutLinks: options.withoutLinks,
      deobfuscators: params.deobfuscators,
      imageTimeoutMs: params.imageTimeoutMs,
      maxImages: params.maxImages,
    });
    text = result.content;
    subtype = result.subtype;
    prefix = result.prefix;
    if (result.title) title = result.title;
    filename = fixFilenameExtension(filename, subtype);
  } else if (subtype.includes("plain")) {
    filename = fixFilenameExtension(filename, "plain");
  }

  const finalSubject = prefix ? `[${prefix}]: ${title}` : title;

  if (options.inline) {
    return buildMessage({ ...base, subject: finalSubject, body: `${info}\n\n${text}` });
  }

  return buildMessage({
    ...base,
    subject: finalSubject,
    body: info,
    attachment: {
      content: Buffer.from(text, "utf-8"),
      contentType: `text/${subtype}; charset=utf-8`,
      filename: `${subject}: ${filename}`,
    },
  });
}

async function proxyUrl(
  url: string,
  item: { message: ParsedMessage },
  options: ProxyOptions,
  params: FetchProxyParams,
  ctx: HandlerContext
): Promise<void> {
  const subject = item.message.subject ?? "";
  try {
    const raw = await buildProxyMessage(url, subject, item.message.messageId, options, params, ctx);

    const appended = await ctx.session.append(params.storeFolder, [], new Date(), raw);
    logger.info({ url, folder: params.storeFolder, status: appended.status }, "Stored proxied content");

    if (options.sendUsingSmtp) {
      await ctx.send(ctx.credentials, options.sendFrom, options.sendTo, raw);
      logger.info({ url, to: options.sendTo }, "Proxied content sent");
    }
  } catch (err) {
    if (err instanceof TransportError) throw err;
    logger.error({ url, error: describeError(err) }, "Failed to proxy URL");
  }
}

/** Fetch every URL found in new messages and store the result. */
export async function fetchProxy(
  params: FetchProxyParams,
  uids: readonly number[],
  seen: Set<string>,
  ctx: HandlerContext
): Promise<StepResult> {
  const fetched = await ctx.session.fetch(uids);
  if (fetched.status !== "OK") {
    return { status: fetched.status, data: fetched.data, seen };
  }

  for (const raw of fetched.data) {
    const item = await claimItem(raw, seen, "fetchProxy");
    if (!item) continue;

    const options = parseProxyOptions(item.message.to, params, item.sender);
    const urls = extractUrls(item.message);
    logger.info({ uid: item.uid, sender: item.sender, urls: urls.length }, "Proxy URLs");

    for (const url of urls) {
      await proxyUrl(url, item, options, params, ctx);
    }
  }

  return { status: "OK", data: fetched.data, seen };
}
