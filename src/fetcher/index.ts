import { createHash } from "node:crypto";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { logger } from "../config/logger.js";
import { ContentFetchError, describeError } from "../errors/index.js";
import type { ContentFetcher, FetchedContent } from "../types/index.js";

export interface HttpFetcherOptions {
  cacheDir: string;
  userAgent: string;
}

function cacheKey(url: string): string {
  return createHash("sha256").update(url).digest("hex");
}

async function readLimited(
  body: NonNullable<Response["body"]>,
  url: string,
  maxBytes: number
): Promise<Buffer> {
  const reader = body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new ContentFetchError(url, `content exceeds max size of ${maxBytes} bytes`);
    }
    chunks.push(Buffer.from(value));
  }
  return Buffer.concat(chunks);
}

/**
 * HTTP client for the proxy handler. Responses are size-capped while
 * streaming. The disk cache is keyed by the sha256 of the URL.
 */
export class HttpFetcher implements ContentFetcher {
  constructor(private readonly options: HttpFetcherOptions) {}

  async fetch(url: string, timeoutMs: number, maxBytes: number): Promise<FetchedContent> {
    let response: Response;
    try {
      response = await fetch(url, {
        headers: {
          "Cache-Control": "no-transform",
          "User-Agent": this.options.userAgent,
        },
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      throw new ContentFetchError(url, describeError(err), { cause: err });
    }

    if (!response.ok) {
      throw new ContentFetchError(url, `HTTP ${response.status} ${response.statusText}`);
    }

    const content = response.body
      ? await readLimited(response.body, url, maxBytes)
      : Buffer.alloc(0);

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key.toLowerCase()] = value;
    });

    return { content, finalUrl: response.url || url, headers };
  }

  async getCached(key: string): Promise<Buffer | undefined> {
    try {
      return await readFile(join(this.options.cacheDir, cacheKey(key)));
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return undefined;
      }
      throw err;
    }
  }

  async storeCached(key: string, content: Buffer): Promise<void> {
    await mkdir(this.options.cacheDir, { recursive: true });
    const filePath = join(this.options.cacheDir, cacheKey(key));
    await writeFile(filePath, content);
    logger.debug({ key, size: content.length, path: filePath }, "Content cached to disk");
  }
}

/** Filename from Content-Disposition, else derived from the URL. */
export function filenameFromHeadersOrUrl(headers: Record<string, string>, url: string): string {
  const disposition = headers["content-disposition"];
  if (disposition) {
    const match = /filename=("[^"]*"|'[^']*'|[^;]*)/i.exec(disposition);
    if (match) {
      const name = match[1].trim().replace(/^["']|["']$/g, "");
      if (name) return name;
    }
  }

  const name = url
    .replace(/^https?:\/\//, "")
    .replace(/[/.]/g, " ")
    .trim();
  return name || "download";
}
