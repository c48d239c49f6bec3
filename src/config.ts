// Meeting Scribe - Configuration
// Read from the environment (populated from .env by dotenv in the entry point).

import { resolve, join } from "node:path";
import type { ArtifactSet, WorkerSpec } from "./types.js";

export const ARTIFACT_FILE_NAMES = {
  micTranscript: "Mic_transcript.txt",
  speakerTranscript: "Speaker_transcript.txt",
  combinedTranscript: "Combined_transcript.txt",
  summary: "Meeting_summary.txt",
} as const satisfies Record<keyof ArtifactSet, string>;

export interface AppConfig {
  port: number;
  workDir: string;
  workers: WorkerSpec[];
  artifacts: ArtifactSet;
  openaiApiKey: string | null;
  summaryModel: string;
  presencePollMs: number;
  workerSettleMs: number;
  workerStopTimeoutMs: number;
  artifactPollMs: number;
  artifactWaitTimeoutMs: number;
  summaryTimeoutMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string, fallback: string): string {
  const value = env[key]?.trim();
  return value ? value : fallback;
}

function readNonNegativeInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be a non-negative integer, got "${raw}"`);
  }
  return parseInt(raw, 10);
}

/** Like readNonNegativeInt, but 0 is rejected. */
function readPositiveInt(env: Env, key: string, fallback: number): number {
  const value = readNonNegativeInt(env, key, fallback);
  if (value < 1) {
    throw new ConfigError(`${key} must be a positive integer, got "${value}"`);
  }
  return value;
}

export function buildArtifactSet(workDir: string): ArtifactSet {
  return {
    micTranscript: join(workDir, ARTIFACT_FILE_NAMES.micTranscript),
    speakerTranscript: join(workDir, ARTIFACT_FILE_NAMES.speakerTranscript),
    combinedTranscript: join(workDir, ARTIFACT_FILE_NAMES.combinedTranscript),
    summary: join(workDir, ARTIFACT_FILE_NAMES.summary),
  };
}

/**
 * Build the application config from environment variables.
 * @throws ConfigError when a numeric setting is malformed.
 */
export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): AppConfig {
  const workDir = resolve(cwd, readString(env, "WORK_DIR", "."));
  const workerCommand = readString(env, "WORKER_COMMAND", "python");

  const apiKey = env.OPENAI_API_KEY?.trim();

  return {
    port: readNonNegativeInt(env, "PORT", 3000),
    workDir,
    workers: [
      { name: "mic", command: workerCommand, args: [readString(env, "MIC_WORKER_SCRIPT", "mic_worker.py")] },
      { name: "speaker", command: workerCommand, args: [readString(env, "SPEAKER_WORKER_SCRIPT", "speaker_worker.py")] },
    ],
    artifacts: buildArtifactSet(workDir),
    openaiApiKey: apiKey ? apiKey : null,
    summaryModel: readString(env, "SUMMARY_MODEL", "gpt-4o"),
    presencePollMs: readPositiveInt(env, "PRESENCE_POLL_MS", 2000),
    workerSettleMs: readNonNegativeInt(env, "WORKER_SETTLE_MS", 2000),
    workerStopTimeoutMs: readNonNegativeInt(env, "WORKER_STOP_TIMEOUT_MS", 180_000),
    artifactPollMs: readPositiveInt(env, "ARTIFACT_POLL_MS", 2000),
    artifactWaitTimeoutMs: readNonNegativeInt(env, "ARTIFACT_WAIT_TIMEOUT_MS", 120_000),
    summaryTimeoutMs: readNonNegativeInt(env, "SUMMARY_TIMEOUT_MS", 300_000),
  };
}

/** Worker script paths, resolved against the working directory. */
export function workerScriptPaths(config: AppConfig): string[] {
  return config.workers.flatMap((worker) => worker.args.slice(0, 1).map((script) => resolve(config.workDir, script)));
}
