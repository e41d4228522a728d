import { errorMessage, log } from "../../util/log";
import type { WordSegmenter } from "./types";

/**
 * Optional word segmentation. Whether a segmenter is usable is decided once, in
 * {@link WordSegmentation.init}; afterwards {@link segmentWords} either delegates
 * or hands the text straight back.
 */
export class WordSegmentation {
  private constructor(
    private readonly segmenter: WordSegmenter | null,
    readonly available: boolean,
  ) {}

  static async init(segmenter: WordSegmenter | null): Promise<WordSegmentation> {
    if (!segmenter) return WordSegmentation.disabled();

    let readiness: { ok: boolean; details?: Record<string, unknown> };
    try {
      readiness = await segmenter.ready();
    } catch (e) {
      readiness = { ok: false, details: { error: errorMessage(e) } };
    }

    if (!readiness.ok) {
      log.info("word segmenter unavailable; segmentation is a no-op", readiness.details);
      return WordSegmentation.disabled();
    }
    log.info("word segmenter ready", readiness.details);
    return new WordSegmentation(segmenter, true);
  }

  static disabled(): WordSegmentation {
    return new WordSegmentation(null, false);
  }

  /** Never rejects: on any failure the input comes back unchanged. */
  async segmentWords(text: string): Promise<string> {
    if (!this.available || !this.segmenter || !text) return text;
    try {
      return await this.segmenter.tokenize(text, { format: "text" });
    } catch (e) {
      log.warn("word segmentation failed", { error: errorMessage(e) });
      return text;
    }
  }
}
