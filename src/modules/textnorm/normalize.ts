import { isAscii, isLetter, isVietnameseLetter } from "./letters";

/**
 * Abbreviations expanded by {@link normalize}, tried in this order.
 * Every literal ends in a period so a bare syllable such as "tt" is never touched.
 * Matching is case-insensitive: "TP." and "ThS." hit the same rows.
 */
export const ABBREVIATIONS: ReadonlyArray<readonly [literal: string, expansion: string]> = [
  ["tp.", "thành phố"],
  ["ths.", "thạc sĩ"],
  ["ts.", "tiến sĩ"],
  ["gs.", "giáo sư"],
  ["pgs.", "phó giáo sư"],
  ["q.", "quận"],
  ["p.", "phường"],
  ["tx.", "thị xã"],
  ["tt.", "thị trấn"],
];

const PUNCTUATION_ALLOWED = new Set([" ", ".", ",", "!", "?", ";", ":", "'", '"', "(", ")", "-"]);

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

// Token boundary: start of input or directly after whitespace.
const ABBREVIATION_PATTERNS = ABBREVIATIONS.map(
  ([literal, expansion]) => [new RegExp(`(?<=^|\\s)${escapeRegExp(literal)}`, "giu"), expansion] as const,
);

export interface NormalizeOptions {
  expandAbbreviations?: boolean;
}

export const collapseWhitespace = (text: string): string => text.split(/\s+/u).filter(Boolean).join(" ");

export const expandAbbreviations = (text: string): string => {
  let out = text;
  for (const [pattern, expansion] of ABBREVIATION_PATTERNS) {
    // A function replacement keeps "$" in an expansion literal.
    out = out.replace(pattern, () => expansion);
  }
  return out;
};

const isAllowedChar = (char: string): boolean =>
  isAscii(char) || isVietnameseLetter(char) || PUNCTUATION_ALLOWED.has(char) || isLetter(char);

export const stripDisallowed = (text: string): string => {
  let out = "";
  for (const char of text) {
    if (isAllowedChar(char)) out += char;
  }
  return out;
};

/**
 * Canonicalizes Vietnamese text: NFC, abbreviation expansion, single spacing,
 * and removal of characters outside the allowed set (emoji, symbols, stray marks).
 */
export const normalize = (text: string, opts?: NormalizeOptions): string => {
  if (!text) return text;

  let out = text.normalize("NFC");
  if (opts?.expandAbbreviations ?? true) {
    out = expandAbbreviations(out);
  }
  out = collapseWhitespace(out);
  out = stripDisallowed(out);

  // Dropped characters can leave doubled spaces behind.
  return collapseWhitespace(out);
};
