import { vi } from "vitest";
import type { Mock } from "vitest";
import type { PipelineDeps } from "../../src/pipeline/run.js";
import type { TranscriberOptions } from "../../src/pipeline/transcribe.js";
import type { TranscribeRequest, TranscriptionResult } from "../../src/types.js";
import { createSegment, createWord } from "../../src/transcript/model.js";

export const sampleResult: TranscriptionResult = {
  language: "en",
  segments: [
    createSegment(0, 2, "one two three", [
      createWord(0, 0.5, "one"),
      createWord(0.5, 1.2, "two"),
      createWord(1.2, 2, "three"),
    ]),
    createSegment(2, 3, "four", [createWord(2, 3, "four")]),
  ],
};

export interface FakePipeline {
  deps: PipelineDeps;
  cleanup: Mock<() => Promise<void>>;
  transcriberOptions: TranscriberOptions[];
  requests: TranscribeRequest[];
}

/**
 * Pipeline deps that never touch ffmpeg or the network. Audio is "extracted"
 * to `<input>.wav` and transcription returns `result` (or throws `failWith`).
 */
export function fakePipeline(result: TranscriptionResult = sampleResult, failWith?: Error): FakePipeline {
  const cleanup = vi.fn(async () => {});
  const transcriberOptions: TranscriberOptions[] = [];
  const requests: TranscribeRequest[] = [];

  const deps: PipelineDeps = {
    settings: {
      openaiBaseUrl: "http://openai.test",
      openaiApiKey: "test-secret",
      openaiModel: "whisper-1",
      localAsrBaseUrl: "http://asr.test",
      localTimeoutMs: 60000,
    },
    extractAudio: async (inputPath) => ({ path: `${inputPath}.wav`, temporary: true, cleanup }),
    createTranscriber: (options) => {
      transcriberOptions.push(options);
      return {
        name: "faster",
        transcribe: async (_audioPath, request) => {
          requests.push(request);
          if (failWith) throw failWith;
          return result;
        },
      };
    },
  };

  return { deps, cleanup, transcriberOptions, requests };
}
