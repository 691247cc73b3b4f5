import fs from "node:fs";
import path from "node:path";
import type { Transcript } from "../types.js";
import type { ComputeType, Device, OutputFormat, TranscriptionTask } from "../constants.js";
import { InputNotFoundError, InvalidArgumentError } from "../errors.js";
import { createTranscript } from "../transcript/model.js";
import { splitSegmentsByMaxWords } from "../transcript/segmenter.js";
import { saveTranscriptToFile } from "../transcript/formatters.js";
import { componentLogger } from "../utils/logger.js";
import { extractAudio as defaultExtractAudio } from "./extract_audio.js";
import type { ExtractOptions, ExtractedAudio } from "./extract_audio.js";
import { createTranscriber as defaultCreateTranscriber } from "./transcribe.js";
import type { BackendSettings, TranscriberOptions, TranscriptionBackend } from "./transcribe.js";

const log = componentLogger("pipeline");

export type PipelineStage = "extract" | "audio_ready" | "transcribe" | "transcribed" | "save";

export interface RunPipelineOptions {
  model: string;
  backend: string;
  wordTimestamps?: boolean;
  maxWords?: number; // required with wordTimestamps
  device?: Device;
  computeType?: ComputeType;
  language?: string;
  task?: TranscriptionTask;
  formats: readonly OutputFormat[];
  outputDir?: string;
  outputName?: string;
  keepAudio?: boolean;
  ffmpegCmd: string;
  onStage?: (stage: PipelineStage) => void | Promise<void>;
}

export interface PipelineDeps {
  extractAudio: (inputPath: string, opts: ExtractOptions) => Promise<ExtractedAudio>;
  createTranscriber: (options: TranscriberOptions, settings: BackendSettings) => TranscriptionBackend;
  settings: BackendSettings;
}

export interface RunPipelineResult {
  transcript: Transcript;
  audioPath: string;
  outputs: Partial<Record<OutputFormat, string>>;
}

export function defaultPipelineDeps(settings: BackendSettings): PipelineDeps {
  return {
    extractAudio: defaultExtractAudio,
    createTranscriber: defaultCreateTranscriber,
    settings,
  };
}

export function getOutputPaths(
  inputFile: string,
  outputDir?: string,
  outputName?: string
): Record<OutputFormat, string> {
  const parsed = path.parse(inputFile);
  const dir = outputDir ?? parsed.dir;
  if (outputDir !== undefined) {
    fs.mkdirSync(outputDir, { recursive: true });
  }
  const name = outputName ?? parsed.name;
  return {
    json: path.join(dir, `${name}.json`),
    srt: path.join(dir, `${name}.srt`),
  };
}

export function validatePipelineOptions(opts: Pick<RunPipelineOptions, "backend" | "wordTimestamps" | "maxWords">): void {
  if (opts.wordTimestamps && opts.backend !== "faster") {
    throw new InvalidArgumentError("Word-level timestamps are only supported with --backend faster.");
  }
  if (opts.wordTimestamps && opts.maxWords === undefined) {
    throw new InvalidArgumentError("--max-words is required when --word-timestamps is enabled.");
  }
}

/**
 * Extract → transcribe → (split) → save. Temporary audio is cleaned up on
 * every exit path unless `keepAudio` is set.
 */
export async function runPipeline(
  inputFile: string,
  opts: RunPipelineOptions,
  deps: PipelineDeps
): Promise<RunPipelineResult> {
  if (!fs.existsSync(inputFile)) {
    throw new InputNotFoundError(inputFile);
  }
  validatePipelineOptions(opts);

  const transcriber = deps.createTranscriber(
    {
      model: opts.model,
      backend: opts.backend,
      wordTimestamps: opts.wordTimestamps,
      device: opts.device,
      computeType: opts.computeType,
    },
    deps.settings
  );

  await opts.onStage?.("extract");
  const audio = await deps.extractAudio(inputFile, {
    ffmpegCmd: opts.ffmpegCmd,
    keepTemp: opts.keepAudio,
  });
  log.info({ inputFile, audioPath: audio.path, extracted: audio.temporary }, "audio ready");

  try {
    await opts.onStage?.("audio_ready");
    await opts.onStage?.("transcribe");
    const result = await transcriber.transcribe(audio.path, {
      language: opts.language,
      task: opts.task ?? "transcribe",
    });
    await opts.onStage?.("transcribed");

    let segments = result.segments;
    if (opts.wordTimestamps && opts.maxWords !== undefined) {
      segments = splitSegmentsByMaxWords(segments, opts.maxWords);
    }
    const transcript = createTranscript(segments, result.language);
    log.info({ language: transcript.language, segments: segments.length }, "transcript assembled");

    await opts.onStage?.("save");
    const paths = getOutputPaths(inputFile, opts.outputDir, opts.outputName);
    const outputs: Partial<Record<OutputFormat, string>> = {};
    for (const format of opts.formats) {
      saveTranscriptToFile(transcript, paths[format], format);
      outputs[format] = paths[format];
      log.info({ format, path: paths[format] }, "transcript saved");
    }

    return { transcript, audioPath: audio.path, outputs };
  } finally {
    await audio.cleanup();
  }
}
