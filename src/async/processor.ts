import path from "node:path";
import type { TranscriptionJobData, TranscriptionJobResult } from "../types.js";
import type { Backend, ModelSize } from "../constants.js";
import { runPipeline } from "../pipeline/run.js";
import type { PipelineDeps, PipelineStage } from "../pipeline/run.js";
import { removeQuietly } from "../utils/cleanup.js";
import { componentLogger } from "../utils/logger.js";
import { errorMessage } from "../errors.js";

const log = componentLogger("processor");

// Subset of a BullMQ Job used by the processor
export interface TranscriptionJob {
  id?: string;
  data: TranscriptionJobData;
  updateProgress(progress: number): Promise<void>;
}

export interface ProcessorDeps {
  pipeline: PipelineDeps;
  outputDir: string;
  ffmpegCmd: string;
  defaultModel: ModelSize;
  defaultBackend: Backend;
}

const STAGE_PROGRESS: Record<PipelineStage, number> = {
  extract: 20,
  audio_ready: 30,
  transcribe: 40,
  transcribed: 70,
  save: 85,
};

export function createTranscriptionProcessor(deps: ProcessorDeps) {
  return async function processTranscription(job: TranscriptionJob): Promise<TranscriptionJobResult> {
    const { jobId, filePath, originalFilename, opts } = job.data;
    log.info({ jobId }, "processing job");
    try {
      await job.updateProgress(10);
      const { transcript, outputs } = await runPipeline(
        filePath,
        {
          model: opts.model ?? deps.defaultModel,
          backend: opts.backend ?? deps.defaultBackend,
          language: opts.language,
          formats: ["srt"],
          outputDir: deps.outputDir,
          outputName: jobId,
          ffmpegCmd: deps.ffmpegCmd,
          onStage: (stage) => job.updateProgress(STAGE_PROGRESS[stage]),
        },
        deps.pipeline
      );

      const srtPath = outputs.srt ?? path.join(deps.outputDir, `${jobId}.srt`);
      await job.updateProgress(100);
      log.info({ jobId, segments: transcript.segments.length }, "job completed");
      return {
        srtPath,
        filename: `${path.parse(originalFilename).name}.srt`,
        language: transcript.language,
        segmentCount: transcript.segments.length,
      };
    } catch (err) {
      log.error({ jobId, err: errorMessage(err) }, "job failed");
      throw err;
    } finally {
      await removeQuietly(filePath);
    }
  };
}
