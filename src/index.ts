export * from "./types.js";
export * from "./constants.js";
export * from "./errors.js";
export {
  createWord,
  createSegment,
  createTranscript,
  wordToDict,
  segmentToDict,
  transcriptToDict,
} from "./transcript/model.js";
export { splitSegmentsByMaxWords } from "./transcript/segmenter.js";
export {
  formatJson,
  formatSrt,
  formatTranscript,
  saveTranscriptToFile,
  secondsToSrtTime,
} from "./transcript/formatters.js";
export { extractAudio, checkFfmpeg, isAudioFile, isVideoFile } from "./pipeline/extract_audio.js";
export type { ExtractOptions, ExtractedAudio } from "./pipeline/extract_audio.js";
export { createTranscriber } from "./pipeline/transcribe.js";
export type { BackendSettings, TranscriberOptions, TranscriptionBackend } from "./pipeline/transcribe.js";
export { OpenAIBackend } from "./pipeline/transcribe_openai.js";
export { LocalAsrBackend } from "./pipeline/transcribe_local.js";
export { runPipeline, defaultPipelineDeps, getOutputPaths } from "./pipeline/run.js";
export type { PipelineDeps, PipelineStage, RunPipelineOptions, RunPipelineResult } from "./pipeline/run.js";
export { loadConfig } from "./config.js";
export type { ServiceConfig } from "./config.js";
export { buildApp } from "./app.js";
export type { AppDeps } from "./app.js";
