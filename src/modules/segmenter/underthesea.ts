import { execFile } from "../../util/exec";
import { log } from "../../util/log";
import type { SegmentFormat, WordSegmenter } from "./types";

interface UndertheseaOptions {
  pythonBin: string;
  timeoutMs: number;
}

const PROBE_SCRIPT = "import underthesea";

// Reads the whole of stdin so multi-line input survives the round trip.
const TOKENIZE_SCRIPT = [
  "import sys",
  "from underthesea import word_tokenize",
  "fmt = sys.argv[1]",
  "sys.stdout.write(word_tokenize(sys.stdin.read(), format=fmt))",
].join("\n");

const PYTHON_ENV = { PYTHONIOENCODING: "utf-8" };

/** Word segmentation through the `underthesea` package, run in a Python child process. */
export class UndertheseaSegmenter implements WordSegmenter {
  constructor(private opts: UndertheseaOptions) {}

  async ready(): Promise<{ ok: boolean; details?: Record<string, unknown> }> {
    try {
      const res = await execFile(this.opts.pythonBin, ["-c", PROBE_SCRIPT], {
        timeoutMs: this.opts.timeoutMs,
        env: PYTHON_ENV,
      });
      return {
        ok: res.code === 0,
        details: {
          pythonBin: this.opts.pythonBin,
          ...(res.code === 0 ? {} : { code: res.code, stderr: res.stderr.slice(0, 500) }),
        },
      };
    } catch (e) {
      return {
        ok: false,
        details: {
          pythonBin: this.opts.pythonBin,
          error: e instanceof Error ? e.message : String(e),
        },
      };
    }
  }

  async tokenize(text: string, opts: { format: SegmentFormat }): Promise<string> {
    const started = Date.now();
    const res = await execFile(this.opts.pythonBin, ["-c", TOKENIZE_SCRIPT, opts.format], {
      inputText: text,
      timeoutMs: this.opts.timeoutMs,
      env: PYTHON_ENV,
    });

    if (res.timedOut) {
      throw new Error(`underthesea timed out after ${this.opts.timeoutMs}ms`);
    }
    if (res.code !== 0) {
      log.debug("underthesea exited non-zero", { code: res.code, stderr: res.stderr.slice(0, 500) });
      throw new Error(`underthesea failed (code ${res.code})`);
    }

    log.debug("words segmented", { elapsedMs: Date.now() - started, chars: text.length });
    return res.stdout;
  }
}
