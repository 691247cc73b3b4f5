import fs from "node:fs";
import path from "node:path";
import { fetch, FormData, File } from "undici";
import type { Dispatcher } from "undici";
import type { TranscribeRequest, TranscriptionResult } from "../types.js";
import { TranscriptionError, errorMessage } from "../errors.js";
import { componentLogger } from "../utils/logger.js";
import { assertAudioExists, getAudioMimeType, normalizeVerboseJson, readJsonBody } from "./asr_common.js";
import type { TranscriptionBackend } from "./asr_common.js";

const log = componentLogger("transcribe.openai");

export interface OpenAIBackendOptions {
  baseUrl: string; // e.g., https://api.openai.com/v1
  apiKey?: string;
  model: string; // e.g., whisper-1
  dispatcher?: Dispatcher;
  retryDelaysMs?: number[]; // one entry per retry after a 429/5xx
}

const DEFAULT_RETRY_DELAYS_MS = [1000, 3000];

/**
 * OpenAI-compatible cloud transcription. Segment timestamps only: the remote
 * API reports words outside of segments, so word mode is left to the local backend.
 */
export class OpenAIBackend implements TranscriptionBackend {
  readonly name = "openai" as const;

  constructor(private readonly opts: OpenAIBackendOptions) {}

  async transcribe(audioPath: string, request: TranscribeRequest): Promise<TranscriptionResult> {
    if (!this.opts.apiKey) {
      throw new TranscriptionError("OpenAI transcription requested but OPENAI_API_KEY not configured");
    }
    assertAudioExists(audioPath);

    const raw = await this.transcribeWithRetries(audioPath, request);
    const result = normalizeVerboseJson(raw, { wordTimestamps: false });
    log.info({ audioPath, segments: result.segments.length, language: result.language }, "transcription complete");
    return result;
  }

  private async transcribeWithRetries(audioPath: string, request: TranscribeRequest): Promise<unknown> {
    const delays = this.opts.retryDelaysMs ?? DEFAULT_RETRY_DELAYS_MS;
    const maxAttempts = delays.length + 1;
    for (let attempt = 1; ; attempt++) {
      try {
        return await this.transcribeSingleFile(audioPath, request);
      } catch (err) {
        const retryable =
          err instanceof TranscriptionError &&
          err.status !== undefined &&
          (err.status === 429 || err.status >= 500);
        if (!retryable || attempt >= maxAttempts) throw err;
        const backoffMs = delays[attempt - 1];
        log.warn({ attempt, backoffMs, err: errorMessage(err) }, "transcription request failed, retrying");
        await new Promise((r) => setTimeout(r, backoffMs));
      }
    }
  }

  private async transcribeSingleFile(audioPath: string, request: TranscribeRequest): Promise<unknown> {
    const buf = await fs.promises.readFile(audioPath);
    const fileName = path.basename(audioPath);
    const form = new FormData();
    form.append("file", new File([buf], fileName, { type: getAudioMimeType(fileName) }));
    form.append("model", this.opts.model);
    form.append("response_format", "verbose_json");

    // The translations endpoint always targets English and takes no language hint
    const endpoint = request.task === "translate" ? "translations" : "transcriptions";
    if (request.task !== "translate" && request.language) {
      form.append("language", request.language);
    }

    const res = await fetch(`${this.opts.baseUrl}/audio/${endpoint}`, {
      method: "POST",
      headers: { Authorization: `Bearer ${this.opts.apiKey}` },
      body: form,
      dispatcher: this.opts.dispatcher,
    }).catch((err: unknown) => {
      throw new TranscriptionError(`OpenAI transcription request failed: ${errorMessage(err)}`, { cause: err });
    });
    if (!res.ok) {
      const text = await res.text();
      throw new TranscriptionError(`OpenAI transcription failed: ${res.status} ${text}`, { status: res.status });
    }
    return await readJsonBody(res);
  }
}
