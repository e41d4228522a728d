export { VIETNAMESE_LETTERS, isVietnameseLetter } from "./letters";
export { ABBREVIATIONS, normalize, type NormalizeOptions } from "./normalize";
export { expandNumbers, numberToVietnamese } from "./numbers";
export { capitalizeFirst, preprocessForTts, spacePunctuation } from "./pipeline";
export { validateVietnameseText } from "./validate";
