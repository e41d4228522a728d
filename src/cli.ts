import { loadConfig } from "./config";
import { normalize } from "./modules/textnorm/normalize";
import { expandNumbers } from "./modules/textnorm/numbers";
import { preprocessForTts } from "./modules/textnorm/pipeline";
import { validateVietnameseText } from "./modules/textnorm/validate";
import { WordSegmentation } from "./modules/segmenter/segmentation";
import { UndertheseaSegmenter } from "./modules/segmenter/underthesea";
import { log, setLogWriter } from "./util/log";

const STAGES = ["normalize", "numbers", "full"] as const;
type Stage = (typeof STAGES)[number];

const isStage = (value: string): value is Stage => (STAGES as readonly string[]).includes(value);

export interface CliIo {
  stdout: (chunk: string) => void;
  stderr: (chunk: string) => void;
  /** Resolves to undefined when nothing is piped in. */
  readStdin: () => Promise<string | undefined>;
}

const runStage = (stage: Stage, text: string, expandAbbreviations: boolean): string => {
  switch (stage) {
    case "normalize":
      return normalize(text, { expandAbbreviations });
    case "numbers":
      return expandNumbers(normalize(text, { expandAbbreviations }));
    case "full":
      return preprocessForTts(text, { expandAbbreviations });
  }
};

/**
 * Command-line pipeline. stdout carries only the processed text; log records
 * go to stderr for the duration of the run.
 */
export const runCli = async (argv: string[], io: CliIo, env: NodeJS.ProcessEnv = process.env): Promise<void> => {
  const arg = (name: string): string | undefined => {
    const idx = argv.indexOf(name);
    if (idx === -1) return undefined;
    return argv[idx + 1];
  };
  const has = (name: string) => argv.includes(name);

  const restoreWriter = setLogWriter((line) => io.stderr(line + "\n"));
  try {
    const stage = arg("--stage") ?? "full";
    if (!isStage(stage)) {
      throw new Error(`--stage must be one of ${STAGES.join(", ")}`);
    }

    const text = arg("--text") ?? (await io.readStdin());
    if (text === undefined) {
      throw new Error("Provide --text or pipe text on stdin");
    }

    let out = runStage(stage, text, !has("--no-abbreviations"));

    if (has("--segment")) {
      const { segmenter } = loadConfig(env);
      if (segmenter.enabled) {
        const segmentation = await WordSegmentation.init(
          new UndertheseaSegmenter({ pythonBin: segmenter.pythonBin, timeoutMs: segmenter.timeoutMs }),
        );
        out = await segmentation.segmentWords(out);
      } else {
        log.info("word segmentation disabled by SEGMENTER_ENABLED");
      }
    }

    io.stdout(out + "\n");
    if (has("--validate")) {
      io.stderr(`valid: ${validateVietnameseText(text)}\n`);
    }
  } finally {
    setLogWriter(restoreWriter);
  }
};
