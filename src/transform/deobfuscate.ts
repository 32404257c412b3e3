import type { CheerioAPI } from "cheerio";
import type { DeobfuscatorRule, DeobfuscatorVariant } from "../types/index.js";

const ASCII_LETTERS = "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
const DIGITS = "0123456789";
const PUNCTUATION = "!\"#$%&'()*+,-./:;<=>?@[\\]^_`{|}~";
const ALPHABET = `${ASCII_LETTERS}${DIGITS}${PUNCTUATION}äöüÄÖÜß`;

/** Each character of the page text is its original code point plus one. */
const SHIFTED_ALPHABET = new Map<string, string>(
  [...ALPHABET].map((c) => [String.fromCodePoint((c.codePointAt(0) ?? 0) + 1), c])
);

export function unshiftText(text: string): string {
  let out = "";
  for (const c of text) {
    out += SHIFTED_ALPHABET.get(c) ?? c;
  }
  return out;
}

/**
 * Translate text under `.obfuscated` containers. Link text is left alone,
 * the publisher only shifts running prose.
 */
function deobfuscateShiftedAlphabet($: CheerioAPI): void {
  $(".obfuscated").each((_, container) => {
    $(container)
      .find("*")
      .addBack()
      .contents()
      .each((_, node) => {
        if (node.nodeType !== 3 || !("data" in node)) return;
        if ($(node).parent().is("a")) return;
        node.data = unshiftText(node.data);
      });
  });
}

const VARIANTS: Record<DeobfuscatorVariant, ($: CheerioAPI) => void> = {
  shiftedAlphabet: deobfuscateShiftedAlphabet,
};

/** Apply every rule whose domain suffix occurs in the page URL. */
export function applyDeobfuscators(
  $: CheerioAPI,
  url: string,
  rules: readonly DeobfuscatorRule[]
): DeobfuscatorVariant[] {
  const applied: DeobfuscatorVariant[] = [];
  for (const rule of rules) {
    if (url.includes(rule.domainSuffix)) {
      VARIANTS[rule.variant]($);
      applied.push(rule.variant);
    }
  }
  return applied;
}
