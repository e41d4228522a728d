/**
 * Voice settings handed to the synthesis engine together with normalized text.
 * The engine itself lives outside this service.
 */
export interface SynthesisOptions {
  /** Reference recording to clone the voice from. */
  audioPromptPath?: string;
  /** Emotion / expressiveness, 0 (flat) to 1. */
  exaggeration: number;
  /** Classifier-free guidance weight. Never 0; 0.1-0.3 tracks a reference voice closely. */
  cfgWeight: number;
  temperature: number;
}

export type SynthesisOptionsInput = {
  audioPromptPath?: unknown;
  exaggeration?: unknown;
  cfgWeight?: unknown;
  temperature?: unknown;
};

export type ResolvedSynthesisOptions =
  | { ok: true; options: SynthesisOptions; warnings: string[] }
  | { ok: false; errors: string[] };

export interface SynthesisRequest {
  text: string;
  options: SynthesisOptions;
  warnings: string[];
}
