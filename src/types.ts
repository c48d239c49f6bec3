// Meeting Scribe - Shared TypeScript interfaces and types
// Type-only apart from SessionState; error classes live in errors.ts.

// ─── Session State Machine ──────────────────────────────────────────────────────

export enum SessionState {
  IDLE = "idle",
  RECORDING = "recording",
  STOPPING = "stopping",
  WAITING_ARTIFACTS = "waiting_artifacts",
  MERGING = "merging",
  SUMMARIZING = "summarizing",
  COMPLETE = "complete",
  FAILED = "failed",
}

// ─── Transcript ─────────────────────────────────────────────────────────────────

/** Identifies which capture worker produced a segment. */
export type SourceLabel = "MIC" | "SPEAKER";

export interface Segment {
  readonly start: number; // seconds, >= 0
  readonly end: number; // seconds, >= start
  readonly text: string;
  readonly label: SourceLabel;
}

// ─── Artifacts ──────────────────────────────────────────────────────────────────

export interface ArtifactSet {
  micTranscript: string;
  speakerTranscript: string;
  combinedTranscript: string;
  summary: string;
}

// ─── Workers ────────────────────────────────────────────────────────────────────

export type WorkerName = "mic" | "speaker";

export interface WorkerSpec {
  name: WorkerName;
  command: string;
  args: string[];
}

export interface WorkerStopReport {
  name: WorkerName;
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  forced: boolean; // true when the worker ignored the interrupt and was killed
}

// ─── Session ────────────────────────────────────────────────────────────────────

export type FailureCode = "WORKER_START_FAILED" | "MISSING_INPUTS" | "MERGE_FAILED";

export interface SessionFailure {
  code: FailureCode;
  message: string;
  missing: string[]; // absent artifact paths, empty unless code is MISSING_INPUTS
}

export interface Session {
  id: string;
  state: SessionState;
  startedAt: Date | null;
  stoppedAt: Date | null;
  completedAt: Date | null;
  partial: boolean; // complete, but the summary could not be produced
  failure: SessionFailure | null;
  workers: WorkerStopReport[];
}

// ─── Status surface ─────────────────────────────────────────────────────────────

export type StatusLabel =
  | "idle"
  | "detected"
  | "recording"
  | "stopping"
  | "processing"
  | "merging"
  | "summarizing"
  | "complete"
  | "partial"
  | "failed";

export type IndicatorColor = "gray" | "green" | "red" | "blue" | "orange";

export interface StatusUpdate {
  status: StatusLabel;
  detail: string | null;
  sessionId: string | null;
  timestamp: Date;
}

/**
 * On-screen indicator capability. The controller only drives these calls;
 * rendering belongs to whatever implements them.
 */
export interface StatusIndicator {
  show(): void;
  hide(): void;
  setColor(color: IndicatorColor): void;
  onToggle(handler: () => void): void;
}

// ─── WebSocket protocol ─────────────────────────────────────────────────────────

export interface IndicatorSnapshot {
  visible: boolean;
  color: IndicatorColor;
}

export type ClientMessage = { type: "toggle" };

export type ServerMessage =
  | { type: "indicator"; visible: boolean; color: IndicatorColor }
  | { type: "status"; status: StatusLabel; detail: string | null; sessionId: string | null; timestamp: string }
  | { type: "error"; message: string };
