// Vowel bases that carry tone marks, in alphabetical order.
const VOWEL_BASES = ["a", "ă", "â", "e", "ê", "i", "o", "ô", "ơ", "u", "ư", "y"] as const;

// Unmarked, grave, hook above, tilde, acute, dot below.
const TONE_MARKS = ["", "\u0300", "\u0309", "\u0303", "\u0301", "\u0323"] as const;

const buildLetterSet = (): ReadonlySet<string> => {
  const lower: string[] = [];
  for (const base of VOWEL_BASES) {
    for (const tone of TONE_MARKS) {
      lower.push((base + tone).normalize("NFC"));
    }
  }
  lower.push("đ");
  return new Set([...lower, ...lower.map((c) => c.toUpperCase())]);
};

/** Every precomposed (NFC) Vietnamese letter, both cases. */
export const VIETNAMESE_LETTERS: ReadonlySet<string> = buildLetterSet();

export const isVietnameseLetter = (char: string): boolean => VIETNAMESE_LETTERS.has(char);

export const isAscii = (char: string): boolean => {
  const cp = char.codePointAt(0);
  return cp !== undefined && cp < 0x80;
};

const LETTER = /^\p{L}$/u;

export const isLetter = (char: string): boolean => LETTER.test(char);
