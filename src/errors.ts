// Meeting Scribe - Error taxonomy
// Each error carries a stable `code` so callers can branch without string matching.

import type { WorkerName } from "./types.js";

export type RecorderErrorCode =
  | "WORKER_START_FAILED"
  | "MISSING_INPUTS"
  | "FILE_UNREADABLE"
  | "SUMMARY_UNAVAILABLE"
  | "MERGE_WRITE_FAILED";

export abstract class RecorderError extends Error {
  abstract readonly code: RecorderErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A capture worker exited during the settle window. */
export class WorkerStartFailedError extends RecorderError {
  readonly code = "WORKER_START_FAILED";

  constructor(
    readonly which: WorkerName,
    readonly exitCode: number | null,
  ) {
    super(`${which} worker failed to start (exit code ${exitCode ?? "none"})`);
  }
}

/** One or both transcript artifacts are absent. */
export class MissingInputsError extends RecorderError {
  readonly code = "MISSING_INPUTS";

  constructor(
    readonly paths: string[],
    options?: { cause?: unknown },
  ) {
    super(`Missing transcript files: ${paths.join(", ")}`, options);
  }
}

export class FileUnreadableError extends RecorderError {
  readonly code = "FILE_UNREADABLE";

  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Cannot read ${path}`, options);
  }
}

/** The external summary step failed; the combined transcript is still valid. */
export class SummaryUnavailableError extends RecorderError {
  readonly code = "SUMMARY_UNAVAILABLE";

  constructor(reason: string, options?: { cause?: unknown }) {
    super(`Summary unavailable: ${reason}`, options);
  }
}

export class MergeWriteError extends RecorderError {
  readonly code = "MERGE_WRITE_FAILED";

  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to write combined transcript ${path}`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
