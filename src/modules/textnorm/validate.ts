import { isAscii, isLetter, isVietnameseLetter } from "./letters";

/** False when the text contains letters from another script (CJK, Cyrillic, ...). */
export const validateVietnameseText = (text: string): boolean => {
  for (const char of text) {
    if (isLetter(char) && !isAscii(char) && !isVietnameseLetter(char)) return false;
  }
  return true;
};
