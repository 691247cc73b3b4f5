import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import crypto from "node:crypto";
import { runCommand } from "../utils/process.js";
import { componentLogger } from "../utils/logger.js";
import { removeQuietly } from "../utils/cleanup.js";
import { AudioExtractionError, InputNotFoundError, errorMessage } from "../errors.js";
import {
  AUDIO_EXTENSIONS,
  TARGET_CHANNELS,
  TARGET_SAMPLE_RATE,
  VIDEO_EXTENSIONS,
} from "../constants.js";

const log = componentLogger("extract");

export interface ExtractOptions {
  ffmpegCmd: string;
  outputPath?: string; // defaults to a fresh file in the OS temp dir
  keepTemp?: boolean;
}

export interface ExtractedAudio {
  path: string;
  temporary: boolean; // true when produced by ffmpeg rather than the input itself
  cleanup(): Promise<void>;
}

export function isVideoFile(filePath: string): boolean {
  return VIDEO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export function isAudioFile(filePath: string): boolean {
  return AUDIO_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export async function checkFfmpeg(ffmpegCmd: string): Promise<void> {
  try {
    await runCommand(ffmpegCmd, ["-version"]);
  } catch (err) {
    throw new AudioExtractionError(
      "ffmpeg is not installed or not found in PATH. Please install ffmpeg to use audio extraction functionality.",
      { cause: err }
    );
  }
}

/**
 * Return a mono 16kHz audio file for the input. Audio inputs are used as-is;
 * video inputs go through ffmpeg. The caller owns the returned handle and
 * should call `cleanup()` once transcription is done.
 */
export async function extractAudio(inputPath: string, opts: ExtractOptions): Promise<ExtractedAudio> {
  if (!fs.existsSync(inputPath)) {
    throw new InputNotFoundError(inputPath);
  }

  if (isAudioFile(inputPath)) {
    return { path: inputPath, temporary: false, cleanup: async () => {} };
  }

  if (!isVideoFile(inputPath)) {
    throw new AudioExtractionError(
      `Unsupported file format: ${inputPath}. Expected video or audio file.`
    );
  }

  await checkFfmpeg(opts.ffmpegCmd);

  const outputPath = opts.outputPath ?? path.join(os.tmpdir(), `audio_${crypto.randomUUID()}.wav`);
  const args = [
    "-i", inputPath,
    "-vn",
    "-acodec", "pcm_s16le",
    "-ar", String(TARGET_SAMPLE_RATE),
    "-ac", String(TARGET_CHANNELS),
    "-y",
    outputPath,
  ];

  log.debug({ inputPath, outputPath }, "extracting audio");
  try {
    await runCommand(opts.ffmpegCmd, args);
  } catch (err) {
    throw new AudioExtractionError(`Failed to extract audio: ${errorMessage(err)}`, { cause: err });
  }

  return {
    path: outputPath,
    temporary: true,
    cleanup: async () => {
      if (opts.keepTemp) return;
      await removeQuietly(outputPath);
    },
  };
}
