import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { MockAgent } from "undici";
import { createTranscriber } from "../../src/pipeline/transcribe.js";
import type { BackendSettings } from "../../src/pipeline/transcribe.js";
import { OpenAIBackend } from "../../src/pipeline/transcribe_openai.js";
import { LocalAsrBackend } from "../../src/pipeline/transcribe_local.js";
import { InputNotFoundError, InvalidArgumentError, TranscriptionError } from "../../src/errors.js";
import { makeTempDir, removeDir, writeFile } from "../helpers/tmp.js";

const OPENAI_URL = "http://openai.test";
const LOCAL_URL = "http://asr.test";

const verboseJson = {
  language: "en",
  segments: [
    {
      start: 0,
      end: 1.5,
      text: " Hi there.",
      words: [
        { start: 0, end: 0.6, word: " Hi" },
        { start: 0.6, end: 1.5, word: " there." },
      ],
    },
  ],
};

function settings(overrides: Partial<BackendSettings> = {}): BackendSettings {
  return {
    openaiBaseUrl: OPENAI_URL,
    openaiApiKey: "test-secret",
    openaiModel: "whisper-1",
    localAsrBaseUrl: LOCAL_URL,
    localTimeoutMs: 60000,
    ...overrides,
  };
}

describe("createTranscriber", () => {
  it("should reject unknown model sizes", () => {
    expect(() => createTranscriber({ model: "huge", backend: "openai" }, settings())).toThrow(
      "Invalid model size: huge. Available options: tiny, base, small, medium, large"
    );
  });

  it("should reject unknown backends", () => {
    expect(() => createTranscriber({ model: "base", backend: "cloud" }, settings())).toThrow(
      "Invalid backend: cloud. Available options: openai, faster"
    );
  });

  it("should only allow word timestamps on the faster backend", () => {
    expect(() => createTranscriber({ model: "base", backend: "openai", wordTimestamps: true }, settings())).toThrow(
      InvalidArgumentError
    );
    expect(createTranscriber({ model: "base", backend: "faster", wordTimestamps: true }, settings())).toBeInstanceOf(
      LocalAsrBackend
    );
  });

  it("should build the cloud backend for openai", () => {
    const backend = createTranscriber({ model: "small", backend: "openai" }, settings());

    expect(backend).toBeInstanceOf(OpenAIBackend);
    expect(backend.name).toBe("openai");
  });
});

describe("transcription backends", () => {
  let dir: string;
  let audioPath: string;
  let agent: MockAgent;

  beforeEach(() => {
    dir = makeTempDir("transcribe");
    audioPath = writeFile(dir, "speech.wav");
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
    removeDir(dir);
  });

  describe("OpenAIBackend", () => {
    it("should post to the transcriptions endpoint with a bearer token", async () => {
      agent
        .get(OPENAI_URL)
        .intercept({
          path: "/audio/transcriptions",
          method: "POST",
          headers: { authorization: "Bearer test-secret" },
        })
        .reply(200, verboseJson);

      const backend = new OpenAIBackend({ baseUrl: OPENAI_URL, apiKey: "test-secret", model: "whisper-1", dispatcher: agent });
      const result = await backend.transcribe(audioPath, { task: "transcribe", language: "en" });

      expect(result).toEqual({ language: "en", segments: [{ start: 0, end: 1.5, text: "Hi there." }] });
      agent.assertNoPendingInterceptors();
    });

    it("should use the translations endpoint for translate", async () => {
      agent.get(OPENAI_URL).intercept({ path: "/audio/translations", method: "POST" }).reply(200, verboseJson);

      const backend = new OpenAIBackend({ baseUrl: OPENAI_URL, apiKey: "test-secret", model: "whisper-1", dispatcher: agent });
      const result = await backend.transcribe(audioPath, { task: "translate" });

      expect(result.segments).toHaveLength(1);
      agent.assertNoPendingInterceptors();
    });

    it("should retry rate-limited requests", async () => {
      const pool = agent.get(OPENAI_URL);
      pool.intercept({ path: "/audio/transcriptions", method: "POST" }).reply(429, "slow down");
      pool.intercept({ path: "/audio/transcriptions", method: "POST" }).reply(200, verboseJson);

      const backend = new OpenAIBackend({
        baseUrl: OPENAI_URL,
        apiKey: "test-secret",
        model: "whisper-1",
        dispatcher: agent,
        retryDelaysMs: [0],
      });
      const result = await backend.transcribe(audioPath, { task: "transcribe" });

      expect(result.language).toBe("en");
      agent.assertNoPendingInterceptors();
    });

    it("should not retry client errors", async () => {
      agent.get(OPENAI_URL).intercept({ path: "/audio/transcriptions", method: "POST" }).reply(400, "bad file");

      const backend = new OpenAIBackend({
        baseUrl: OPENAI_URL,
        apiKey: "test-secret",
        model: "whisper-1",
        dispatcher: agent,
        retryDelaysMs: [0, 0],
      });

      await expect(backend.transcribe(audioPath, { task: "transcribe" })).rejects.toThrow(
        "OpenAI transcription failed: 400 bad file"
      );
    });

    it("should reject a successful reply that is not JSON", async () => {
      agent
        .get(OPENAI_URL)
        .intercept({ path: "/audio/transcriptions", method: "POST" })
        .reply(200, "<html>proxy error</html>", { headers: { "content-type": "text/html" } });

      const backend = new OpenAIBackend({ baseUrl: OPENAI_URL, apiKey: "test-secret", model: "whisper-1", dispatcher: agent });
      const attempt = backend.transcribe(audioPath, { task: "transcribe" });

      await expect(attempt).rejects.toBeInstanceOf(TranscriptionError);
      await expect(attempt).rejects.toThrow(/^Invalid transcription response: /);
    });

    it("should require an API key", async () => {
      const backend = new OpenAIBackend({ baseUrl: OPENAI_URL, model: "whisper-1", dispatcher: agent });

      await expect(backend.transcribe(audioPath, { task: "transcribe" })).rejects.toThrow(
        "OpenAI transcription requested but OPENAI_API_KEY not configured"
      );
    });

    it("should reject a missing audio file", async () => {
      const backend = new OpenAIBackend({ baseUrl: OPENAI_URL, apiKey: "test-secret", model: "whisper-1", dispatcher: agent });

      await expect(backend.transcribe(`${dir}/gone.wav`, { task: "transcribe" })).rejects.toThrow(InputNotFoundError);
    });
  });

  describe("LocalAsrBackend", () => {
    function localBackend(wordTimestamps: boolean) {
      return new LocalAsrBackend({
        baseUrl: LOCAL_URL,
        model: "base",
        timeoutMs: 60000,
        wordTimestamps,
        dispatcher: agent,
      });
    }

    it("should check health and return word timestamps when requested", async () => {
      const pool = agent.get(LOCAL_URL);
      pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
      pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(200, verboseJson);

      const result = await localBackend(true).transcribe(audioPath, { task: "transcribe" });

      expect(result.segments[0]).toEqual({
        start: 0,
        end: 1.5,
        text: "Hi there.",
        words: [
          { start: 0, end: 0.6, word: "Hi" },
          { start: 0.6, end: 1.5, word: "there." },
        ],
      });
      agent.assertNoPendingInterceptors();
    });

    it("should leave words out when they were not requested", async () => {
      const pool = agent.get(LOCAL_URL);
      pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
      pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(200, verboseJson);

      const result = await localBackend(false).transcribe(audioPath, { task: "transcribe" });

      expect(result.segments[0].words).toBeUndefined();
    });

    it("should fail when the service is unreachable", async () => {
      await expect(localBackend(false).transcribe(audioPath, { task: "transcribe" })).rejects.toThrow(
        "Local ASR service is not available at http://asr.test. Please ensure the faster-whisper service is running."
      );
    });

    it("should reject a successful reply that is not JSON", async () => {
      const pool = agent.get(LOCAL_URL);
      pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
      pool
        .intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" })
        .reply(200, "<html>proxy error</html>", { headers: { "content-type": "text/html" } });

      const attempt = localBackend(false).transcribe(audioPath, { task: "transcribe" });

      await expect(attempt).rejects.toBeInstanceOf(TranscriptionError);
      await expect(attempt).rejects.toThrow(/^Invalid transcription response: /);
    });

    it("should surface transcription errors with their status", async () => {
      const pool = agent.get(LOCAL_URL);
      pool.intercept({ path: "/healthz", method: "GET" }).reply(200, { ok: true });
      pool.intercept({ path: "/openai/v1/audio/transcriptions", method: "POST" }).reply(500, "model crashed");

      const attempt = localBackend(false).transcribe(audioPath, { task: "transcribe" });

      await expect(attempt).rejects.toBeInstanceOf(TranscriptionError);
      await expect(attempt).rejects.toMatchObject({
        status: 500,
        message: "Local ASR transcription failed: 500 model crashed",
      });
    });
  });
});
