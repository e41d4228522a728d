export type ServiceConfig = {
  port: number;
  /** Limit in code points (an emoji counts once); longer text is refused with 413. */
  maxTextChars: number;
  segmenter: {
    enabled: boolean;
    pythonBin: string;
    timeoutMs: number;
  };
};

const positiveInt = (raw: string | undefined, fallback: number): number => {
  if (raw === undefined || !raw.trim()) return fallback;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : fallback;
};

const flag = (raw: string | undefined, fallback: boolean): boolean => {
  if (!raw) return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  return fallback;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): ServiceConfig => ({
  port: positiveInt(env.NORMALIZER_PORT ?? env.PORT, 5070),
  maxTextChars: positiveInt(env.MAX_TEXT_CHARS, 20_000),
  segmenter: {
    enabled: flag(env.SEGMENTER_ENABLED, true),
    pythonBin: env.SEGMENTER_PYTHON_BIN?.trim() || "python3",
    timeoutMs: positiveInt(env.SEGMENTER_TIMEOUT_MS, 10_000),
  },
});
