import { Worker } from "bullmq";
import { loadConfig } from "../config.js";
import type { TranscriptionJobData, TranscriptionJobResult } from "../types.js";
import { defaultPipelineDeps } from "../pipeline/run.js";
import { componentLogger } from "../utils/logger.js";
import { createTranscriptionProcessor } from "./processor.js";
import { TRANSCRIPTION_QUEUE_NAME } from "./queue.js";

const cfg = loadConfig();
const log = componentLogger("worker");

const processor = createTranscriptionProcessor({
  pipeline: defaultPipelineDeps(cfg),
  outputDir: cfg.tempDir,
  ffmpegCmd: cfg.ffmpegCmd,
  defaultModel: cfg.defaultModel,
  defaultBackend: cfg.defaultBackend,
});

const worker = new Worker<TranscriptionJobData, TranscriptionJobResult>(
  TRANSCRIPTION_QUEUE_NAME,
  (job) => processor(job),
  {
    connection: {
      host: cfg.redisHost,
      port: cfg.redisPort,
    },
    concurrency: cfg.workerConcurrency,
  }
);

log.info({ concurrency: cfg.workerConcurrency }, "worker started");

worker.on("completed", (job) => {
  log.info({ jobId: job.id }, "job has completed");
});

worker.on("failed", (job, err) => {
  log.warn({ jobId: job?.id, err: err.message }, "job has failed");
});

async function shutdown() {
  await worker.close();
  process.exit(0);
}

function onSignal() {
  shutdown().catch((err: unknown) => {
    log.error({ err }, "worker shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
