import fs from "node:fs";
import type { Transcript } from "../types.js";
import { StorageError, UnsupportedFormatError } from "../errors.js";
import { transcriptToDict } from "./model.js";

export function formatJson(transcript: Transcript): string {
  return JSON.stringify(transcriptToDict(transcript), null, 2);
}

export function formatSrt(transcript: Transcript): string {
  const lines: string[] = [];
  transcript.segments.forEach((segment, i) => {
    lines.push(String(i + 1));
    lines.push(`${secondsToSrtTime(segment.start)} --> ${secondsToSrtTime(segment.end)}`);
    lines.push(segment.text);
    lines.push(""); // blank line between entries
  });
  return lines.join("\n");
}

/**
 * HH:MM:SS,mmm. Every field is truncated, never rounded, so 59.9996s stays
 * in the 59th second instead of carrying into the next minute.
 */
export function secondsToSrtTime(seconds: number): string {
  const h = Math.floor(seconds / 3600);
  const m = Math.floor((seconds % 3600) / 60);
  const s = Math.floor(seconds % 60);
  const ms = Math.floor((seconds % 1) * 1000);
  return `${pad2(h)}:${pad2(m)}:${pad2(s)},${pad3(ms)}`;
}

export function formatTranscript(transcript: Transcript, format: string): string {
  switch (format) {
    case "json":
      return formatJson(transcript);
    case "srt":
      return formatSrt(transcript);
    default:
      throw new UnsupportedFormatError(format);
  }
}

// Single full-content write; parent directories are not created.
export function saveTranscriptToFile(transcript: Transcript, outputPath: string, format: string): void {
  const content = formatTranscript(transcript, format);
  try {
    fs.writeFileSync(outputPath, content, "utf-8");
  } catch (err) {
    throw new StorageError(outputPath, err);
  }
}

function pad2(n: number) {
  return n.toString().padStart(2, "0");
}
function pad3(n: number) {
  return n.toString().padStart(3, "0");
}
