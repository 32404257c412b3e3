import { load, type CheerioAPI } from "cheerio";
import type { Element } from "domhandler";
import { convert, type HtmlToTextOptions } from "html-to-text";
import { logger } from "../config/logger.js";
import { describeError } from "../errors/index.js";
import type {
  ContentFetcher,
  ContentTransformer,
  HtmlTransformOptions,
  HtmlTransformResult,
} from "../types/index.js";
import { applyDeobfuscators } from "./deobfuscate.js";

/** Removed together with their content. */
const KILL_TAGS = [
  "script",
  "style",
  "link",
  "meta",
  "noscript",
  "iframe",
  "frame",
  "frameset",
  "object",
  "embed",
  "applet",
  "param",
  "button",
  "input",
  "select",
  "textarea",
];

/** Removed, children kept in place. */
const UNWRAP_TAGS = ["span", "form", "blink", "marquee"];

const SAFE_ATTRIBUTES = new Set([
  "abbr",
  "accesskey",
  "alt",
  "border",
  "charset",
  "checked",
  "cite",
  "clear",
  "cols",
  "colspan",
  "datetime",
  "descr",
  "dir",
  "disabled",
  "download",
  "height",
  "href",
  "hreflang",
  "id",
  "label",
  "lang",
  "longdesc",
  "maxlength",
  "media",
  "name",
  "nohref",
  "rows",
  "rowspan",
  "selected",
  "src",
  "summary",
  "tabindex",
  "title",
  "type",
  "usemap",
  "value",
  "width",
  "xml:lang",
]);

const LINK_ATTRIBUTES = ["href", "src", "action", "longdesc", "cite", "usemap"];

/** Images with a declared area below this are treated as trackers or icons. */
const MIN_IMAGE_AREA = 100 * 100;

function resolveUrl(value: string, base: string): string | undefined {
  try {
    return new URL(value, base).toString();
  } catch {
    return undefined;
  }
}

/** Rewrite link attributes against the page URL, honouring `<base href>`. */
export function makeLinksAbsolute($: CheerioAPI, pageUrl: string): void {
  const declaredBase = $("base[href]").first().attr("href");
  const base = (declaredBase && resolveUrl(declaredBase, pageUrl)) || pageUrl;

  for (const attribute of LINK_ATTRIBUTES) {
    $(`[${attribute}]`).each((_, el) => {
      const value = $(el).attr(attribute);
      if (!value || value.startsWith("#") || /^(data|mailto|javascript):/i.test(value)) {
        return;
      }
      const absolute = resolveUrl(value.trim(), base);
      if (absolute) $(el).attr(attribute, absolute);
    });
  }
}

export function bleach($: CheerioAPI): void {
  $(KILL_TAGS.join(",")).remove();

  $("*")
    .contents()
    .filter((_, node) => node.nodeType === 8)
    .remove();

  for (const tag of UNWRAP_TAGS) {
    $(tag).each((_, el) => {
      $(el).replaceWith($(el).contents());
    });
  }

  $<Element, "*">("*").each((_, el) => {
    for (const name of Object.keys(el.attribs)) {
      if (!SAFE_ATTRIBUTES.has(name.toLowerCase())) {
        $(el).removeAttr(name);
      }
    }
  });

  $("[href], [src]").each((_, el) => {
    for (const name of ["href", "src"]) {
      if (/^\s*javascript:/i.test($(el).attr(name) ?? "")) {
        $(el).removeAttr(name);
      }
    }
  });
}

/**
 * Declared image size in pixels. Relative sizes and anything unparsable
 * count as 100.
 */
export function parseDimension(value: string): number {
  if (value.includes("%") || value.includes("auto") || value.length < 1) {
    return 100;
  }
  let digits = value;
  if (value.includes("px")) {
    digits = value.slice(0, value.indexOf("px"));
  } else if (value.includes(".")) {
    digits = value.slice(0, value.indexOf("."));
  }
  return /^\d+$/.test(digits.trim()) ? Number.parseInt(digits.trim(), 10) : 100;
}

export interface HtmlTransformerOptions {
  /** Upper bound for one inlined image. */
  maxImageBytes: number;
}

export class HtmlTransformer implements ContentTransformer {
  constructor(
    private readonly fetcher: ContentFetcher,
    private readonly options: HtmlTransformerOptions = { maxImageBytes: 10 * 1024 * 1024 }
  ) {}

  async transformHtml(html: string, options: HtmlTransformOptions): Promise<HtmlTransformResult> {
    const $ = load(html);
    makeLinksAbsolute($, options.baseUrl);

    let prefix = "";

    if (options.bleach) {
      prefix = "B" + prefix;
      applyDeobfuscators($, options.baseUrl, options.deobfuscators);
      bleach($);
    }

    if (options.includeImages) {
      prefix = "I" + prefix;
      await this.inlineImages($, options.imageTimeoutMs, options.maxImages);
    }

    const title = $("title").first().text().trim() || undefined;
    let content = $.html();
    let subtype: HtmlTransformResult["subtype"] = "html";

    if (options.asText) {
      prefix = (options.withoutLinks ? "TP" : "TL") + prefix;
      content = htmlToPlainText(content, { withoutLinks: options.withoutLinks });
      subtype = "plain";
    }

    return { content, title, subtype, prefix };
  }

  /** Replace image sources by data URIs; dropped images are removed. */
  private async inlineImages($: CheerioAPI, timeoutMs: number, maxImages: number): Promise<void> {
    let inlined = 0;

    for (const el of $("img").toArray()) {
      const img = $(el);
      if (inlined >= maxImages) {
        img.remove();
        continue;
      }

      const src = img.attr("src");
      const area =
        parseDimension(img.attr("width") ?? "0") * parseDimension(img.attr("height") ?? "0");

      if (!src || (area >= 1 && area < MIN_IMAGE_AREA)) {
        img.remove();
        continue;
      }

      const dataUri = await this.loadImage(src, timeoutMs);
      if (!dataUri) {
        img.remove();
        continue;
      }

      img.attr("src", dataUri);
      img.attr("width", "100%");
      img.attr("height", "auto");
      inlined++;
    }

    logger.debug({ inlined }, "Images inlined");
  }

  private async loadImage(src: string, timeoutMs: number): Promise<string | undefined> {
    const cached = await this.fetcher.getCached(src);
    if (cached && cached.length > 0) {
      return cached.toString("ascii");
    }

    try {
      const { content, finalUrl, headers } = await this.fetcher.fetch(
        src,
        timeoutMs,
        this.options.maxImageBytes
      );
      const mimeType = headers["content-type"] ?? "application/octet-stream";
      const dataUri = `data:${mimeType};base64,${content.toString("base64")}`;
      const stored = Buffer.from(dataUri, "ascii");
      await this.fetcher.storeCached(src, stored);
      if (finalUrl !== src) {
        await this.fetcher.storeCached(finalUrl, stored);
      }
      return dataUri;
    } catch (err) {
      logger.debug({ src, error: describeError(err) }, "Image dropped");
      return undefined;
    }
  }
}

/**
 * Plain-text rendering, also used to scan HTML bodies for URLs. Links are
 * written as `text [href]` unless `withoutLinks` is set.
 */
export function htmlToPlainText(html: string, options: { withoutLinks: boolean }): string {
  const convertOptions: HtmlToTextOptions = {
    wordwrap: false,
    selectors: [
      { selector: "img", format: "skip" },
      {
        selector: "a",
        options: { ignoreHref: options.withoutLinks, hideLinkHrefIfSameAsText: true },
      },
    ],
  };
  return convert(html, convertOptions);
}
