import { collapseWhitespace, normalize, type NormalizeOptions } from "./normalize";
import { expandNumbers } from "./numbers";

const PROSODY_PUNCTUATION = /([.,!?;:])/g;

/** Isolates sentence punctuation as its own token so the synthesizer sees a break hint. */
export const spacePunctuation = (text: string): string =>
  collapseWhitespace(text.replace(PROSODY_PUNCTUATION, " $1 "));

const LOWERCASE_LETTER = /^\p{Ll}$/u;

export const capitalizeFirst = (text: string): string => {
  const first = text.codePointAt(0);
  if (first === undefined) return text;
  const char = String.fromCodePoint(first);
  if (!LOWERCASE_LETTER.test(char)) return text;
  return char.toUpperCase() + text.slice(char.length);
};

/** normalize -> expandNumbers -> spacePunctuation -> capitalizeFirst. Segmentation is separate. */
export const preprocessForTts = (text: string, opts?: NormalizeOptions): string =>
  capitalizeFirst(spacePunctuation(expandNumbers(normalize(text, opts))));
