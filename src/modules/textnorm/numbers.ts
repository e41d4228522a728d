const DIGIT_WORDS: Readonly<Record<string, string>> = {
  "0": "không",
  "1": "một",
  "2": "hai",
  "3": "ba",
  "4": "bốn",
  "5": "năm",
  "6": "sáu",
  "7": "bảy",
  "8": "tám",
  "9": "chín",
  "10": "mười",
};

const digitWord = (d: number): string => DIGIT_WORDS[String(d)] ?? String(d);

const readDigits = (digits: string): string => Array.from(digits, (d) => DIGIT_WORDS[d] ?? d).join(" ");

/**
 * Reads an integer aloud in Vietnamese.
 *
 * Magnitudes up to 999,999 follow the spoken grammar ("mốt", "lăm", "lẻ",
 * "không trăm"); from one million up the digits are read one by one, so any
 * integer, however large, has a reading.
 *
 * @throws RangeError when `n` is not an integer (fractions, NaN, Infinity).
 */
export const numberToVietnamese = (n: number | bigint): string => {
  if (typeof n === "bigint") {
    if (n < 0n) return "âm " + numberToVietnamese(-n);
    if (n >= 1_000_000n) return readDigits(n.toString());
    return numberToVietnamese(Number(n));
  }
  if (!Number.isInteger(n)) {
    throw new RangeError(`not an integer: ${n}`);
  }
  // Past 2^53 String() may switch to exponent form; BigInt keeps every digit.
  if (!Number.isSafeInteger(n)) return numberToVietnamese(BigInt(n));

  if (n < 0) return "âm " + numberToVietnamese(-n);
  if (n === 0) return "không";
  if (n < 10) return digitWord(n);

  if (n < 20) {
    if (n === 10) return "mười";
    const ones = n % 10;
    if (ones === 5) return "mười lăm";
    return "mười " + digitWord(ones);
  }

  if (n < 100) {
    const tens = Math.floor(n / 10);
    const ones = n % 10;
    const head = digitWord(tens) + " mươi";
    if (ones === 0) return head;
    if (ones === 1) return head + " mốt";
    if (ones === 5) return head + " lăm";
    return head + " " + digitWord(ones);
  }

  if (n < 1000) {
    const hundreds = Math.floor(n / 100);
    const rest = n % 100;
    const head = digitWord(hundreds) + " trăm";
    if (rest === 0) return head;
    if (rest < 10) return head + " lẻ " + digitWord(rest);
    return head + " " + numberToVietnamese(rest);
  }

  if (n < 1_000_000) {
    const thousands = Math.floor(n / 1000);
    const rest = n % 1000;
    const head = numberToVietnamese(thousands) + " nghìn";
    if (rest === 0) return head;
    if (rest < 100) return head + " không trăm " + numberToVietnamese(rest);
    return head + " " + numberToVietnamese(rest);
  }

  return readDigits(String(n));
};

// Longer runs may not fit in a double exactly.
const MAX_EXACT_DIGITS = 15;

// Digit runs glued to a letter, digit or underscore belong to a code ("ISO9001", "A4").
const STANDALONE_NUMBER = /(?<![\p{L}\p{N}_])[0-9]+(?![\p{L}\p{N}_])/gu;

export const expandNumbers = (text: string): string =>
  text.replace(STANDALONE_NUMBER, (digits) => {
    try {
      return numberToVietnamese(digits.length > MAX_EXACT_DIGITS ? BigInt(digits) : Number(digits));
    } catch {
      return digits;
    }
  });
