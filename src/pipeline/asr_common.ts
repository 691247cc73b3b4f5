import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { TranscribeRequest, TranscriptSegment, TranscriptionResult, WordTimestamp } from "../types.js";
import type { Backend } from "../constants.js";
import { InputNotFoundError, TranscriptionError, errorMessage } from "../errors.js";
import { createSegment, createWord } from "../transcript/model.js";

/**
 * A speech-to-text engine. Implementations hide their wire format and always
 * hand back a normalized result; callers never branch on the backend.
 */
export interface TranscriptionBackend {
  readonly name: Backend;
  transcribe(audioPath: string, request: TranscribeRequest): Promise<TranscriptionResult>;
}

// OpenAI-compatible verbose_json, as returned by the OpenAI API and by the local service
const wordSchema = z.object({
  start: z.number(),
  end: z.number(),
  word: z.string(),
});

const segmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
  words: z.array(wordSchema).nullish(),
});

export const verboseJsonSchema = z.object({
  language: z.string().nullish(),
  text: z.string().optional(),
  duration: z.number().optional(),
  segments: z.array(segmentSchema).default([]),
  words: z.array(wordSchema).nullish(),
});

export type VerboseJson = z.infer<typeof verboseJsonSchema>;
type RawWord = z.infer<typeof wordSchema>;

export interface NormalizeOptions {
  wordTimestamps: boolean;
}

export function normalizeVerboseJson(raw: unknown, opts: NormalizeOptions): TranscriptionResult {
  const parsed = verboseJsonSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join(".") || "<root>"}: ${issue.message}` : "unknown issue";
    throw new TranscriptionError(`Invalid transcription response (${where})`);
  }
  const data = parsed.data;

  // Segment-level words win; top-level words (OpenAI API) are spread over segments by time
  const hasSegmentWords = data.segments.some((s) => s.words && s.words.length > 0);
  const spread =
    opts.wordTimestamps && !hasSegmentWords && data.words
      ? distributeWords(data.segments, data.words)
      : undefined;

  const segments: TranscriptSegment[] = data.segments.map((s, idx) => {
    const text = s.text.trim();
    if (!opts.wordTimestamps) {
      return createSegment(s.start, s.end, text);
    }
    const words = cleanWords(s.words ?? spread?.[idx] ?? []);
    return createSegment(s.start, s.end, text, words.length > 0 ? words : undefined);
  });

  return { language: data.language ?? null, segments };
}

function cleanWords(words: RawWord[]): WordTimestamp[] {
  return words
    .filter((w) => w.word.trim() !== "")
    .map((w) => createWord(w.start, w.end, w.word.trim()));
}

export function distributeWords(
  segments: ReadonlyArray<{ end: number }>,
  words: RawWord[]
): RawWord[][] {
  const buckets: RawWord[][] = segments.map(() => []);
  if (buckets.length === 0) return buckets;
  let i = 0;
  for (const w of words) {
    while (i < buckets.length - 1 && w.start >= segments[i].end) i++;
    buckets[i].push(w);
  }
  return buckets;
}

export async function readJsonBody(res: { json(): Promise<unknown> }): Promise<unknown> {
  return await res.json().catch((err: unknown) => {
    throw new TranscriptionError(`Invalid transcription response: ${errorMessage(err)}`, { cause: err });
  });
}

export function assertAudioExists(audioPath: string): void {
  if (!fs.existsSync(audioPath)) {
    throw new InputNotFoundError(audioPath, "Audio file");
  }
}

export function getAudioMimeType(fileName: string): string {
  const ext = path.extname(fileName).toLowerCase();
  const mimeTypes: Record<string, string> = {
    ".mp3": "audio/mpeg",
    ".wav": "audio/wav",
    ".m4a": "audio/mp4",
    ".aac": "audio/aac",
    ".ogg": "audio/ogg",
    ".flac": "audio/flac",
    ".wma": "audio/x-ms-wma",
  };
  return mimeTypes[ext] || "audio/wav";
}
