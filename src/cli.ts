#!/usr/bin/env node
import fs from "node:fs";
import { pathToFileURL } from "node:url";
import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { loadConfig } from "./config.js";
import {
  BACKENDS,
  COMPUTE_TYPES,
  DEVICES,
  MODEL_SIZES,
  OUTPUT_FORMATS,
  TRANSCRIPTION_TASKS,
} from "./constants.js";
import { errorMessage } from "./errors.js";
import { isVideoFile } from "./pipeline/extract_audio.js";
import { defaultPipelineDeps, runPipeline } from "./pipeline/run.js";
import type { PipelineDeps, PipelineStage } from "./pipeline/run.js";

export function buildParser(argv: string[]) {
  return yargs(argv)
    .scriptName("media-transcriber")
    .usage("$0 <input_file> [options]\n\nExtract audio from video and generate timed transcript using Whisper")
    .option("model", { type: "string", choices: MODEL_SIZES, default: "base", describe: "Whisper model size" })
    .option("backend", { type: "string", choices: BACKENDS, default: "openai", describe: "Transcription backend to use" })
    .option("word-timestamps", { type: "boolean", default: false, describe: "Enable word-level timestamps (faster backend only)" })
    .option("max-words", { type: "number", describe: "Max words per subtitle segment (required with --word-timestamps)" })
    .option("device", { type: "string", choices: DEVICES, describe: "Device for the faster backend" })
    .option("compute-type", { type: "string", choices: COMPUTE_TYPES, describe: "Compute type for the faster backend" })
    .option("output-dir", { type: "string", describe: "Output directory for transcript files (default: same as input file)" })
    .option("output-name", { type: "string", describe: "Base name for output files (default: input file name without extension)" })
    .option("format", { type: "array", string: true, choices: OUTPUT_FORMATS, default: [...OUTPUT_FORMATS], describe: "Output format(s)" })
    .option("keep-audio", { type: "boolean", default: false, describe: "Keep extracted audio file after transcription" })
    .option("language", { type: "string", describe: "Language code for transcription (e.g. en, es). Auto-detected if not specified." })
    .option("task", { type: "string", choices: TRANSCRIPTION_TASKS, describe: "transcribe (default) or translate to English" })
    .demandCommand(1, "input_file is required: path to input video or audio file")
    .help();
}

export async function main(argv: string[], deps?: PipelineDeps): Promise<number> {
  const args = await buildParser(argv).parse();
  const inputFile = String(args._[0]);

  if (!fs.existsSync(inputFile)) {
    console.error(`Error: Input file not found: ${inputFile}`);
    return 1;
  }

  try {
    const cfg = loadConfig();
    const stageLines: Partial<Record<PipelineStage, string>> = {
      extract: "Step 1: Processing audio...",
      transcribe: `\nStep 2: Transcribing audio (model: ${args.model}, backend: ${args.backend})...`,
      save: "\nStep 3: Saving transcript files...",
    };

    const result = await runPipeline(
      inputFile,
      {
        model: args.model,
        backend: args.backend,
        wordTimestamps: args["word-timestamps"],
        maxWords: args["max-words"],
        device: args.device,
        computeType: args["compute-type"],
        language: args.language,
        task: args.task ?? "transcribe",
        formats: args.format,
        outputDir: args["output-dir"],
        outputName: args["output-name"],
        keepAudio: args["keep-audio"],
        ffmpegCmd: cfg.ffmpegCmd,
        onStage: (stage) => {
          const line = stageLines[stage];
          if (line) console.log(line);
          if (stage === "extract") {
            console.log(
              isVideoFile(inputFile)
                ? `  Extracting audio from video: ${inputFile}`
                : `  Using audio file directly: ${inputFile}`
            );
          }
        },
      },
      deps ?? defaultPipelineDeps(cfg)
    );

    if (args["keep-audio"] && result.audioPath !== inputFile) {
      console.log(`  Audio extracted to: ${result.audioPath}`);
    }
    console.log(`  Transcription complete. Language: ${result.transcript.language ?? "auto-detected"}`);
    console.log(`  Found ${result.transcript.segments.length} segments`);
    for (const [format, outPath] of Object.entries(result.outputs)) {
      console.log(`  Saved ${format.toUpperCase()}: ${outPath}`);
    }
    console.log("\n✓ Transcription completed successfully!");
    return 0;
  } catch (err) {
    console.error(`\n✗ Error: ${errorMessage(err)}`);
    return 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry || !fs.existsSync(entry)) return false;
  return import.meta.url === pathToFileURL(fs.realpathSync(entry)).href;
}

if (invokedDirectly()) {
  main(hideBin(process.argv)).then(
    (code) => process.exit(code),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    }
  );
}
