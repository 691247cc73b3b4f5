import type { Dispatcher } from "undici";
import type { ServiceConfig } from "../config.js";
import {
  BACKENDS,
  MODEL_SIZES,
  isBackend,
  isModelSize,
  supportsWordTimestamps,
} from "../constants.js";
import type { ComputeType, Device } from "../constants.js";
import { InvalidArgumentError } from "../errors.js";
import type { TranscriptionBackend } from "./asr_common.js";
import { OpenAIBackend } from "./transcribe_openai.js";
import { LocalAsrBackend } from "./transcribe_local.js";

export type { TranscriptionBackend };

export interface TranscriberOptions {
  model: string;
  backend: string;
  wordTimestamps?: boolean;
  device?: Device;
  computeType?: ComputeType;
}

export type BackendSettings = Pick<
  ServiceConfig,
  "openaiBaseUrl" | "openaiApiKey" | "openaiModel" | "localAsrBaseUrl" | "localTimeoutMs"
> & {
  dispatcher?: Dispatcher; // undici dispatcher override, e.g. a MockAgent
};

export function createTranscriber(options: TranscriberOptions, settings: BackendSettings): TranscriptionBackend {
  const { model, backend } = options;
  if (!isModelSize(model)) {
    throw new InvalidArgumentError(
      `Invalid model size: ${model}. Available options: ${MODEL_SIZES.join(", ")}`
    );
  }
  if (!isBackend(backend)) {
    throw new InvalidArgumentError(
      `Invalid backend: ${backend}. Available options: ${BACKENDS.join(", ")}`
    );
  }
  const wordTimestamps = options.wordTimestamps ?? false;
  if (wordTimestamps && !supportsWordTimestamps(backend)) {
    throw new InvalidArgumentError("Word-level timestamps are only supported with backend='faster'.");
  }

  if (backend === "openai") {
    return new OpenAIBackend({
      baseUrl: settings.openaiBaseUrl,
      apiKey: settings.openaiApiKey,
      model: settings.openaiModel,
      dispatcher: settings.dispatcher,
    });
  }
  return new LocalAsrBackend({
    baseUrl: settings.localAsrBaseUrl,
    model,
    timeoutMs: settings.localTimeoutMs,
    wordTimestamps,
    device: options.device,
    computeType: options.computeType,
    dispatcher: settings.dispatcher,
  });
}
