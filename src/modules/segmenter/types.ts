export type SegmentFormat = "text";

export interface WordSegmenter {
  ready(): Promise<{ ok: boolean; details?: Record<string, unknown> }>;
  /** With format "text", compound words come back joined by underscores ("thành_phố"). */
  tokenize(text: string, opts: { format: SegmentFormat }): Promise<string>;
}
