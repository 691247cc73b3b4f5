import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { MockInstance } from "vitest";
import { main } from "../src/cli.js";
import { fakePipeline } from "./helpers/fakes.js";
import { makeTempDir, removeDir, writeFile } from "./helpers/tmp.js";

describe("cli main", () => {
  let dir: string;
  let input: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    dir = makeTempDir("cli");
    input = writeFile(dir, "lecture.mp4");
    vi.stubEnv("TEMP_DIR", path.join(dir, "temp"));
    logSpy = vi.spyOn(console, "log").mockImplementation(() => {});
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    removeDir(dir);
  });

  function printed(): string[] {
    return logSpy.mock.calls.map((args) => String(args[0]));
  }

  it("should run every step and report the saved files", async () => {
    const code = await main([input], fakePipeline().deps);

    expect(code).toBe(0);
    expect(printed()).toEqual([
      "Step 1: Processing audio...",
      `  Extracting audio from video: ${input}`,
      "\nStep 2: Transcribing audio (model: base, backend: openai)...",
      "\nStep 3: Saving transcript files...",
      "  Transcription complete. Language: en",
      "  Found 2 segments",
      `  Saved JSON: ${path.join(dir, "lecture.json")}`,
      `  Saved SRT: ${path.join(dir, "lecture.srt")}`,
      "\n✓ Transcription completed successfully!",
    ]);
  });

  it("should split by max words on the faster backend", async () => {
    const fake = fakePipeline();
    const code = await main(
      [input, "--backend", "faster", "--model", "small", "--word-timestamps", "--max-words", "2", "--format", "srt"],
      fake.deps
    );

    expect(code).toBe(0);
    expect(fake.transcriberOptions[0]).toMatchObject({ model: "small", backend: "faster", wordTimestamps: true });
    expect(printed()).toContain("  Found 3 segments");
    expect(printed()).toContain(`  Saved SRT: ${path.join(dir, "lecture.srt")}`);
    expect(printed()).not.toContain(`  Saved JSON: ${path.join(dir, "lecture.json")}`);
  });

  it("should forward language and task", async () => {
    const fake = fakePipeline();
    await main([input, "--language", "fr", "--task", "translate"], fake.deps);

    expect(fake.requests).toEqual([{ language: "fr", task: "translate" }]);
  });

  it("should fail with exit code 1 for a missing input", async () => {
    const missing = path.join(dir, "missing.mp4");
    const code = await main([missing], fakePipeline().deps);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith(`Error: Input file not found: ${missing}`);
  });

  it("should report pipeline errors", async () => {
    const code = await main([input, "--word-timestamps", "--max-words", "3"], fakePipeline().deps);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("\n✗ Error: Word-level timestamps are only supported with --backend faster.");
  });

  it("should require max words with word timestamps", async () => {
    const code = await main([input, "--backend", "faster", "--word-timestamps"], fakePipeline().deps);

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith("\n✗ Error: --max-words is required when --word-timestamps is enabled.");
  });
});
