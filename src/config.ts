import "dotenv/config";
import path from "node:path";
import fs from "node:fs";
import { DEFAULT_BACKEND, DEFAULT_MODEL, isBackend, isModelSize } from "./constants.js";
import type { Backend, ModelSize } from "./constants.js";

export interface ServiceConfig {
  port: number;
  tempDir: string; // uploads, extracted audio and generated SRT files for server jobs
  ffmpegCmd: string;
  defaultModel: ModelSize;
  defaultBackend: Backend;
  // OpenAI-compatible cloud backend
  openaiBaseUrl: string;
  openaiApiKey?: string;
  openaiModel: string;
  // Local faster-whisper ASR service
  localAsrBaseUrl: string; // e.g., http://localhost:5689
  localTimeoutMs: number; // timeout for local transcription requests
  // Job queue
  redisHost: string;
  redisPort: number;
  workerConcurrency: number;
  apiKey?: string;
  logLevel: string;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export const rootDir = path.resolve(process.cwd());

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const tempDir = env.TEMP_DIR || path.join(rootDir, "temp");
  const ffmpegCmd = env.FFMPEG_CMD || "ffmpeg";
  const port = parseInt(env.PORT || "8000", 10);

  const model = env.DEFAULT_MODEL || DEFAULT_MODEL;
  const backend = env.DEFAULT_BACKEND || DEFAULT_BACKEND;
  if (!isModelSize(model)) {
    throw new Error(`DEFAULT_MODEL must be one of tiny, base, small, medium, large (got ${model})`);
  }
  if (!isBackend(backend)) {
    throw new Error(`DEFAULT_BACKEND must be openai or faster (got ${backend})`);
  }

  const openaiBaseUrl = (env.OPENAI_BASE_URL || "https://api.openai.com/v1").replace(/\/+$/, "");
  const openaiModel = env.OPENAI_WHISPER_MODEL || "whisper-1";

  const localAsrBaseUrl = (env.LOCAL_ASR_BASE_URL || "http://localhost:5689").replace(/\/+$/, "");
  const localTimeoutMs = Math.max(
    60000,
    parseInt(env.LOCAL_TIMEOUT_MS || "7200000", 10) || 7200000
  ); // Default 2 hours for full file processing

  const redisHost = env.REDIS_HOST || "localhost";
  const redisPort = parseInt(env.REDIS_PORT || "6379", 10);
  const workerConcurrency = Math.max(1, parseInt(env.WORKER_CONCURRENCY || "2", 10) || 2);

  ensureDir(tempDir);

  return {
    port,
    tempDir,
    ffmpegCmd,
    defaultModel: model,
    defaultBackend: backend,
    openaiBaseUrl,
    openaiApiKey: env.OPENAI_API_KEY || undefined,
    openaiModel,
    localAsrBaseUrl,
    localTimeoutMs,
    redisHost,
    redisPort,
    workerConcurrency,
    apiKey: env.API_KEY || undefined,
    logLevel: env.LOG_LEVEL || "info",
  };
}
