import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, File } from "undici";
import type { Dispatcher } from "undici";
import type { TranscribeRequest, TranscriptionResult } from "../types.js";
import type { ComputeType, Device, ModelSize } from "../constants.js";
import { TranscriptionError, errorMessage } from "../errors.js";
import { componentLogger } from "../utils/logger.js";
import { assertAudioExists, getAudioMimeType, normalizeVerboseJson, readJsonBody } from "./asr_common.js";
import type { TranscriptionBackend } from "./asr_common.js";

const log = componentLogger("transcribe.local");

export interface LocalAsrBackendOptions {
  baseUrl: string; // e.g., http://localhost:5689
  model: ModelSize;
  timeoutMs: number;
  wordTimestamps: boolean;
  device?: Device;
  computeType?: ComputeType;
  dispatcher?: Dispatcher;
}

/**
 * Local faster-whisper service speaking the OpenAI verbose_json dialect.
 * This is the only backend that returns word-level timestamps.
 */
export class LocalAsrBackend implements TranscriptionBackend {
  readonly name = "faster" as const;

  constructor(private readonly opts: LocalAsrBackendOptions) {}

  async transcribe(audioPath: string, request: TranscribeRequest): Promise<TranscriptionResult> {
    assertAudioExists(audioPath);
    await this.checkHealth();

    log.debug({ audioPath, model: this.opts.model, task: request.task }, "transcribing entire file");
    const raw = await this.transcribeFile(audioPath, request);
    const result = normalizeVerboseJson(raw, { wordTimestamps: this.opts.wordTimestamps });
    log.info({ audioPath, segments: result.segments.length, language: result.language }, "transcription complete");
    return result;
  }

  private async checkHealth(): Promise<void> {
    const res = await fetch(`${this.opts.baseUrl}/healthz`, { dispatcher: this.opts.dispatcher }).catch(
      (err: unknown) => {
        throw new TranscriptionError(
          `Local ASR service is not available at ${this.opts.baseUrl}. Please ensure the faster-whisper service is running.`,
          { cause: err }
        );
      }
    );
    await res.body?.cancel();
    if (!res.ok) {
      throw new TranscriptionError(`Local ASR service health check failed: ${res.status}`, { status: res.status });
    }
  }

  private async transcribeFile(audioPath: string, request: TranscribeRequest): Promise<unknown> {
    const buf = await fs.promises.readFile(audioPath);
    const fileName = path.basename(audioPath);
    const form = new FormData();
    form.append("file", new File([buf], fileName, { type: getAudioMimeType(fileName) }));
    form.append("model", this.opts.model);
    form.append("task", request.task);
    if (request.language) {
      form.append("language", request.language);
    }
    form.append("response_format", "verbose_json");
    if (this.opts.wordTimestamps) {
      form.append("timestamp_granularities[]", "segment");
      form.append("timestamp_granularities[]", "word");
    }
    if (this.opts.device) form.append("device", this.opts.device);
    if (this.opts.computeType) form.append("compute_type", this.opts.computeType);

    const res = await fetch(`${this.opts.baseUrl}/openai/v1/audio/transcriptions`, {
      method: "POST",
      body: form,
      signal: AbortSignal.timeout(this.opts.timeoutMs),
      dispatcher: this.opts.dispatcher,
    }).catch((err: unknown) => {
      throw new TranscriptionError(`Local ASR request failed: ${errorMessage(err)}`, { cause: err });
    });
    if (!res.ok) {
      const errorText = await res.text();
      throw new TranscriptionError(`Local ASR transcription failed: ${res.status} ${errorText}`, {
        status: res.status,
      });
    }
    return await readJsonBody(res);
  }
}
