/**
 * Centralized model, backend and format configuration.
 * This is the single source of truth for accepted option values.
 */

export const DEFAULT_MODEL = "base";
export const DEFAULT_BACKEND = "openai";

// Whisper model sizes accepted by both backends
export const MODEL_SIZES = ["tiny", "base", "small", "medium", "large"] as const;
export type ModelSize = (typeof MODEL_SIZES)[number];

// openai: OpenAI-compatible cloud API; faster: local faster-whisper service
export const BACKENDS = ["openai", "faster"] as const;
export type Backend = (typeof BACKENDS)[number];

export const OUTPUT_FORMATS = ["json", "srt"] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const TRANSCRIPTION_TASKS = ["transcribe", "translate"] as const;
export type TranscriptionTask = (typeof TRANSCRIPTION_TASKS)[number];

export const DEVICES = ["auto", "cpu", "cuda"] as const;
export type Device = (typeof DEVICES)[number];

export const COMPUTE_TYPES = ["auto", "float32", "float16", "int8", "int8_float16"] as const;
export type ComputeType = (typeof COMPUTE_TYPES)[number];

export const VIDEO_EXTENSIONS = new Set([".mp4", ".avi", ".mkv", ".mov", ".wmv", ".flv", ".webm", ".m4v"]);
export const AUDIO_EXTENSIONS = new Set([".mp3", ".wav", ".m4a", ".aac", ".ogg", ".flac", ".wma"]);

// Whisper expects 16kHz mono PCM
export const TARGET_SAMPLE_RATE = 16000;
export const TARGET_CHANNELS = 1;

export function isModelSize(value: string): value is ModelSize {
  return MODEL_SIZES.some((candidate) => candidate === value);
}

export function isBackend(value: string): value is Backend {
  return BACKENDS.some((candidate) => candidate === value);
}

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((candidate) => candidate === value);
}

// Helper to check if a backend can return word-level timestamps
export function supportsWordTimestamps(backend: Backend): boolean {
  return backend === "faster";
}
