import type { Backend, ModelSize, TranscriptionTask } from "./constants.js";

export interface WordTimestamp {
  readonly start: number; // seconds
  readonly end: number; // seconds
  readonly word: string; // may keep the engine's leading/trailing whitespace
}

export interface TranscriptSegment {
  readonly start: number;
  readonly end: number;
  readonly text: string;
  // Absent when word-level timestamps were not requested or not supported
  readonly words?: readonly WordTimestamp[];
}

export interface Transcript {
  readonly language: string | null;
  readonly segments: readonly TranscriptSegment[];
}

// Serialized shapes written to JSON output

export interface WordTimestampDict {
  start: number;
  end: number;
  word: string;
}

export interface TranscriptSegmentDict {
  start: number;
  end: number;
  text: string;
  words?: WordTimestampDict[];
}

export interface TranscriptDict {
  language: string | null;
  segments: TranscriptSegmentDict[];
}

// Normalized output of a transcription backend
export interface TranscriptionResult {
  language: string | null;
  segments: TranscriptSegment[];
}

export interface TranscribeRequest {
  language?: string; // e.g., en; auto-detected when omitted
  task: TranscriptionTask;
}

export interface TranscriptionJobOptions {
  model?: ModelSize;
  backend?: Backend;
  language?: string;
}

export interface TranscriptionJobData {
  jobId: string;
  filePath: string;
  originalFilename: string;
  opts: TranscriptionJobOptions;
}

export interface TranscriptionJobResult {
  srtPath: string;
  filename: string;
  language: string | null;
  segmentCount: number;
}
