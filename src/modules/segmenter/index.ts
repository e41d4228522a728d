export { WordSegmentation } from "./segmentation";
export { UndertheseaSegmenter } from "./underthesea";
export type { SegmentFormat, WordSegmenter } from "./types";
