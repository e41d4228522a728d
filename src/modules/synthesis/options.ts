import { preprocessForTts } from "../textnorm/pipeline";
import type {
  ResolvedSynthesisOptions,
  SynthesisOptions,
  SynthesisOptionsInput,
  SynthesisRequest,
} from "./types";

export const DEFAULT_SYNTHESIS_OPTIONS: Readonly<SynthesisOptions> = {
  exaggeration: 0.5,
  cfgWeight: 0.2,
  temperature: 0.8,
};

export const RECOMMENDED_CLONING_CFG = { min: 0.1, max: 0.3 } as const;

const readNumber = (
  name: string,
  value: unknown,
  fallback: number,
  errors: string[],
): number => {
  if (value === undefined || value === null) return fallback;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    errors.push(`${name} must be a finite number`);
    return fallback;
  }
  return value;
};

export const resolveSynthesisOptions = (input: SynthesisOptionsInput = {}): ResolvedSynthesisOptions => {
  const errors: string[] = [];
  const warnings: string[] = [];

  const exaggeration = readNumber("exaggeration", input.exaggeration, DEFAULT_SYNTHESIS_OPTIONS.exaggeration, errors);
  const cfgWeight = readNumber("cfgWeight", input.cfgWeight, DEFAULT_SYNTHESIS_OPTIONS.cfgWeight, errors);
  const temperature = readNumber("temperature", input.temperature, DEFAULT_SYNTHESIS_OPTIONS.temperature, errors);

  let audioPromptPath: string | undefined;
  if (input.audioPromptPath !== undefined && input.audioPromptPath !== null) {
    if (typeof input.audioPromptPath !== "string" || !input.audioPromptPath.trim()) {
      errors.push("audioPromptPath must be a non-empty string");
    } else {
      audioPromptPath = input.audioPromptPath.trim();
    }
  }

  if (exaggeration < 0 || exaggeration > 1) {
    errors.push("exaggeration must be between 0 and 1");
  }
  if (cfgWeight <= 0 || cfgWeight > 1) {
    errors.push("cfgWeight must be greater than 0 and at most 1");
  }
  if (temperature <= 0) {
    errors.push("temperature must be greater than 0");
  }

  if (errors.length) return { ok: false, errors };

  if (
    audioPromptPath &&
    (cfgWeight < RECOMMENDED_CLONING_CFG.min || cfgWeight > RECOMMENDED_CLONING_CFG.max)
  ) {
    warnings.push(
      `cfgWeight ${cfgWeight} is outside ${RECOMMENDED_CLONING_CFG.min}-${RECOMMENDED_CLONING_CFG.max}; the cloned voice may drift from the reference`,
    );
  }

  return {
    ok: true,
    options: { ...(audioPromptPath ? { audioPromptPath } : {}), exaggeration, cfgWeight, temperature },
    warnings,
  };
};

/** Normalizes text and validates voice settings for one synthesis call. */
export const prepareSynthesisRequest = (
  text: string,
  input?: SynthesisOptionsInput,
): { ok: true; request: SynthesisRequest } | { ok: false; errors: string[] } => {
  const resolved = resolveSynthesisOptions(input);
  if (!resolved.ok) return resolved;
  return {
    ok: true,
    request: { text: preprocessForTts(text), options: resolved.options, warnings: resolved.warnings },
  };
};
