export {
  ABBREVIATIONS,
  VIETNAMESE_LETTERS,
  capitalizeFirst,
  expandNumbers,
  isVietnameseLetter,
  normalize,
  numberToVietnamese,
  preprocessForTts,
  spacePunctuation,
  validateVietnameseText,
  type NormalizeOptions,
} from "./modules/textnorm";
export { UndertheseaSegmenter, WordSegmentation, type SegmentFormat, type WordSegmenter } from "./modules/segmenter";
export {
  DEFAULT_SYNTHESIS_OPTIONS,
  prepareSynthesisRequest,
  resolveSynthesisOptions,
} from "./modules/synthesis/options";
export type { SynthesisOptions, SynthesisOptionsInput, SynthesisRequest } from "./modules/synthesis/types";
export { createApp, type AppDeps } from "./app";
export { loadConfig, type ServiceConfig } from "./config";
