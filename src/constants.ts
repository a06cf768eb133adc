/**
 * Shared defaults. Runtime values come from loadConfig(); these are the
 * fallbacks it applies and the values tests construct components with.
 */

export const DEFAULT_SKIP_FORWARD_SECONDS = 30;
export const DEFAULT_SKIP_BACKWARD_SECONDS = 15;

// ~2 Hz position observation
export const POSITION_INTERVAL_MS = 500;

export const DEFAULT_FALLBACK_LOCALE = "en-US";

export const NOW_PLAYING_FALLBACK_TITLE = "Episode Sync";

// Default model for the local ASR service
export const DEFAULT_WHISPER_MODEL = "distil-large-v3";

export const VALID_WHISPER_MODELS = [
  // Multilingual models
  "base",
  "small",
  "medium",
  "large",
  "large-v2",
  "large-v3",
  "turbo",

  // Distil models
  "distil-large-v2",
  "distil-large-v3",
  "distil-medium.en",
  "distil-small.en",

  // English-only models
  "base.en",
  "small.en",
  "medium.en",
  "tiny.en",
] as const;

export type WhisperModel = (typeof VALID_WHISPER_MODELS)[number];

export function isValidModel(model: string): model is WhisperModel {
  return (VALID_WHISPER_MODELS as readonly string[]).includes(model);
}

// English-only models carry a ".en" suffix; distil-large-v* are English-output too
export function isEnglishOnlyModel(model: string): boolean {
  return model.endsWith(".en") || model.startsWith("distil-large");
}
