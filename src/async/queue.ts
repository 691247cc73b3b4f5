import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { TranscriptionJobData, TranscriptionJobResult } from "../types.js";

export const TRANSCRIPTION_QUEUE_NAME = "transcription";

export type JobStatus = "pending" | "processing" | "completed" | "error";

export interface JobSnapshot {
  status: JobStatus;
  progress: number; // 0-100
  error?: string;
  result?: TranscriptionJobResult;
}

/**
 * What the HTTP layer needs from the job queue. Backed by BullMQ in production
 * and by an in-memory map in tests.
 */
export interface TranscriptionQueue {
  enqueue(data: TranscriptionJobData): Promise<void>;
  getSnapshot(jobId: string): Promise<JobSnapshot | null>;
  close(): Promise<void>;
}

export function toJobStatus(state: string): JobStatus {
  switch (state) {
    case "active":
      return "processing";
    case "completed":
      return "completed";
    case "failed":
      return "error";
    default:
      // waiting, delayed, prioritized, waiting-children, unknown
      return "pending";
  }
}

export function createBullTranscriptionQueue(connection: ConnectionOptions): TranscriptionQueue {
  const queue = new Queue<TranscriptionJobData, TranscriptionJobResult>(TRANSCRIPTION_QUEUE_NAME, {
    connection,
    defaultJobOptions: {
      // Transcription is expensive and the upload is removed after the first
      // run, so failed jobs are not retried.
      attempts: 1,
      removeOnComplete: { age: 60 * 60 * 24 },
      removeOnFail: { age: 60 * 60 * 24 },
    },
  });

  return {
    async enqueue(data) {
      await queue.add(TRANSCRIPTION_QUEUE_NAME, data, { jobId: data.jobId });
    },
    async getSnapshot(jobId) {
      const job = await queue.getJob(jobId);
      if (!job) return null;
      const status = toJobStatus(await job.getState());
      const snapshot: JobSnapshot = {
        status,
        progress: typeof job.progress === "number" ? job.progress : 0,
      };
      if (status === "error" && job.failedReason) snapshot.error = job.failedReason;
      if (status === "completed" && job.returnvalue) snapshot.result = job.returnvalue;
      return snapshot;
    },
    async close() {
      await queue.close();
    },
  };
}
