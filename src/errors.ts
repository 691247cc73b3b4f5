export type TranscriptErrorCode =
  | "INVALID_ARGUMENT"
  | "MISSING_WORD_TIMESTAMPS"
  | "UNSUPPORTED_FORMAT"
  | "STORAGE"
  | "INPUT_NOT_FOUND"
  | "AUDIO_EXTRACTION"
  | "TRANSCRIPTION";

export class TranscriptError extends Error {
  readonly code: TranscriptErrorCode;

  constructor(code: TranscriptErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends TranscriptError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
  }
}

export class MissingWordTimestampsError extends TranscriptError {
  constructor(message = "Word-level timestamps are required to split by max words.") {
    super("MISSING_WORD_TIMESTAMPS", message);
  }
}

export class UnsupportedFormatError extends TranscriptError {
  readonly format: string;

  constructor(format: string) {
    super("UNSUPPORTED_FORMAT", `Unsupported output format: ${format}`);
    this.format = format;
  }
}

export class StorageError extends TranscriptError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super("STORAGE", `Failed to write ${path}: ${reason}`, { cause });
    this.path = path;
  }
}

export class InputNotFoundError extends TranscriptError {
  readonly path: string;

  constructor(path: string, kind = "Input file") {
    super("INPUT_NOT_FOUND", `${kind} not found: ${path}`);
    this.path = path;
  }
}

export class AudioExtractionError extends TranscriptError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("AUDIO_EXTRACTION", message, options);
  }
}

export class TranscriptionError extends TranscriptError {
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super("TRANSCRIPTION", message, options);
    this.status = options?.status;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
