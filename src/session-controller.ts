// Meeting Scribe - Session Controller
// Top-level state machine for one recording cycle at a time:
//
//   IDLE → RECORDING → STOPPING → WAITING_ARTIFACTS → MERGING → SUMMARIZING → COMPLETE
//                                         ↓                ↓
//                                       FAILED           FAILED
//
// A new cycle may start from IDLE, COMPLETE or FAILED. Toggles in any other
// state are ignored. All transitions run on the event loop in order; the
// `starting` flag covers the settle window while the workers launch.

import { v4 as uuidv4 } from "uuid";
import { waitForArtifacts } from "./artifact-watcher.js";
import { MergeWriteError, MissingInputsError, WorkerStartFailedError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { MergeEngine } from "./merge-engine.js";
import type { SummaryGenerator } from "./summary-generator.js";
import type { WorkerSupervisor } from "./worker-supervisor.js";
import { SessionState } from "./types.js";
import type {
  ArtifactSet,
  FailureCode,
  IndicatorColor,
  Session,
  StatusIndicator,
  StatusLabel,
  StatusUpdate,
} from "./types.js";

// ─── Transitions ────────────────────────────────────────────────────────────────

const VALID_TRANSITIONS: ReadonlyMap<SessionState, readonly SessionState[]> = new Map([
  [SessionState.IDLE, [SessionState.RECORDING]],
  [SessionState.RECORDING, [SessionState.STOPPING]],
  [SessionState.STOPPING, [SessionState.WAITING_ARTIFACTS]],
  [SessionState.WAITING_ARTIFACTS, [SessionState.MERGING, SessionState.FAILED]],
  [SessionState.MERGING, [SessionState.SUMMARIZING, SessionState.FAILED]],
  [SessionState.SUMMARIZING, [SessionState.COMPLETE]],
  [SessionState.COMPLETE, []],
  [SessionState.FAILED, []],
]);

/** States from which a toggle begins a new recording cycle. */
const CYCLE_START_STATES: ReadonlySet<SessionState> = new Set([
  SessionState.IDLE,
  SessionState.COMPLETE,
  SessionState.FAILED,
]);

export const STATUS_COLORS: Readonly<Record<StatusLabel, IndicatorColor>> = {
  idle: "gray",
  detected: "gray",
  recording: "green",
  stopping: "red",
  processing: "red",
  merging: "red",
  summarizing: "blue",
  complete: "green",
  partial: "orange",
  failed: "gray",
};

// ─── Dependency injection interface ─────────────────────────────────────────────

export interface SessionTiming {
  stopTimeoutMs: number;
  artifactPollIntervalMs: number;
  artifactWaitTimeoutMs: number;
}

export interface SessionControllerDeps {
  supervisor: Pick<WorkerSupervisor, "start" | "stop" | "isRunning">;
  mergeEngine: Pick<MergeEngine, "merge">;
  /** Optional: without one every cycle completes as partial. */
  summaryGenerator?: Pick<SummaryGenerator, "summarize">;
  indicator: StatusIndicator;
  artifacts: ArtifactSet;
  timing: SessionTiming;
  artifactExists?: (path: string) => Promise<boolean>;
  logger?: Logger;
}

export type StatusListener = (update: StatusUpdate) => void;

export class SessionController {
  private readonly deps: SessionControllerDeps;
  private readonly logger: Logger;
  private readonly listeners = new Set<StatusListener>();
  private session: Session | null = null;
  private starting = false;
  private inFlight: Promise<void> | null = null;
  private currentMeeting: string | null = null;
  private lastStatus: StatusUpdate | null = null;

  constructor(deps: SessionControllerDeps) {
    this.deps = deps;
    this.logger = deps.logger ?? createLogger("SessionController");
    this.logger.info(`Summaries: ${deps.summaryGenerator ? "enabled" : "disabled (no generator configured)"}`);

    deps.indicator.onToggle(() => {
      void this.toggle();
    });
  }

  // ── Queries ──────────────────────────────────────────────────────────────────

  get state(): SessionState {
    return this.session?.state ?? SessionState.IDLE;
  }

  get meetingApp(): string | null {
    return this.currentMeeting;
  }

  /** Copy of the current session record, or null before the first cycle. */
  getSession(): Session | null {
    if (!this.session) return null;
    return {
      ...this.session,
      failure: this.session.failure ? { ...this.session.failure, missing: [...this.session.failure.missing] } : null,
      workers: this.session.workers.map((w) => ({ ...w })),
    };
  }

  getLastStatus(): StatusUpdate | null {
    return this.lastStatus;
  }

  /** Subscribe to status updates. Returns an unsubscribe function. */
  onStatus(listener: StatusListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ── Presence events ──────────────────────────────────────────────────────────

  handleMeetingEntered(app: string): void {
    this.currentMeeting = app;
    this.deps.indicator.show();
    if (!this.isCycleActive()) {
      this.report("detected", `${app} detected`);
    }
  }

  handleMeetingExited(app: string): void {
    this.currentMeeting = null;
    // Never hide the indicator mid-cycle; the user still needs the stop toggle
    if (!this.isCycleActive()) {
      this.report("idle", `${app} closed`);
      this.deps.indicator.hide();
    }
  }

  // ── User toggle ──────────────────────────────────────────────────────────────

  /**
   * Start a cycle from IDLE/COMPLETE/FAILED, or stop the running one.
   * Resolves once the triggered work is finished; never rejects.
   */
  async toggle(): Promise<void> {
    if (this.starting) {
      this.logger.info("Toggle ignored: workers are starting");
      return;
    }

    const state = this.state;
    let step: Promise<void>;
    if (CYCLE_START_STATES.has(state)) {
      step = this.startCycle();
    } else if (state === SessionState.RECORDING) {
      step = this.stopCycle();
    } else {
      this.logger.info(`Toggle ignored in "${state}" state`);
      return;
    }

    const settled = step.catch((err: unknown) => {
      this.abortCycle(err);
    });
    this.inFlight = settled;
    try {
      await settled;
    } finally {
      if (this.inFlight === settled) this.inFlight = null;
    }
  }

  /**
   * Used on process shutdown. A start or stop already under way owns the
   * workers and is awaited to completion; otherwise running workers are stopped.
   */
  async shutdown(): Promise<void> {
    if (this.inFlight) {
      this.logger.info("Shutdown waiting for the current cycle step to finish");
      await this.inFlight;
    }

    const session = this.session;
    if (session && session.state === SessionState.RECORDING) {
      this.logger.info(`Shutting down during recording, stopping workers for session ${session.id}`);
      this.assertTransition(session, SessionState.STOPPING);
      session.state = SessionState.STOPPING;
      session.stoppedAt = new Date();
    }
    if (this.deps.supervisor.isRunning()) {
      const reports = await this.deps.supervisor.stop(this.deps.timing.stopTimeoutMs);
      if (session) session.workers = reports;
    }
  }

  // ── Cycle ────────────────────────────────────────────────────────────────────

  private async startCycle(): Promise<void> {
    const session = this.createSession();
    this.starting = true;
    try {
      await this.deps.supervisor.start();
    } catch (err) {
      // Stays IDLE: the supervisor has already cleaned up any worker it launched
      const message = errorMessage(err);
      this.logger.error(`Recording failed to start for session ${session.id}: ${message}`);
      session.failure = {
        code: "WORKER_START_FAILED",
        message: err instanceof WorkerStartFailedError ? message : `Failed to start: ${message}`,
        missing: [],
      };
      this.report("failed", session.failure.message);
      this.hideIfNoMeeting();
      return;
    } finally {
      this.starting = false;
    }

    this.transition(session, SessionState.RECORDING);
    session.startedAt = new Date();
    this.report("recording", null);
  }

  private async stopCycle(): Promise<void> {
    const session = this.requireSession();
    const { supervisor, mergeEngine, artifacts, timing } = this.deps;

    this.transition(session, SessionState.STOPPING);
    session.stoppedAt = new Date();
    this.report("stopping", null);

    // Workers are always considered stopped once this returns
    session.workers = await supervisor.stop(timing.stopTimeoutMs);
    this.transition(session, SessionState.WAITING_ARTIFACTS);
    this.report("processing", "Waiting for transcripts");

    const wait = await waitForArtifacts([artifacts.micTranscript, artifacts.speakerTranscript], {
      intervalMs: timing.artifactPollIntervalMs,
      timeoutMs: timing.artifactWaitTimeoutMs,
      exists: this.deps.artifactExists,
      logger: this.logger,
    });
    if (!wait.found) {
      this.fail(session, "MISSING_INPUTS", `Missing files: ${wait.missing.join(", ")}`, wait.missing);
      return;
    }

    this.transition(session, SessionState.MERGING);
    this.report("merging", null);
    try {
      await mergeEngine.merge();
    } catch (err) {
      if (err instanceof MissingInputsError) {
        this.fail(session, "MISSING_INPUTS", err.message, err.paths);
      } else if (err instanceof MergeWriteError) {
        this.fail(session, "MERGE_FAILED", err.message, []);
      } else {
        this.fail(session, "MERGE_FAILED", `Merge failed: ${errorMessage(err)}`, []);
      }
      return;
    }

    this.transition(session, SessionState.SUMMARIZING);
    this.report("summarizing", null);
    const summarized = await this.summarize(session);

    this.transition(session, SessionState.COMPLETE);
    session.partial = !summarized;
    session.completedAt = new Date();
    this.report(session.partial ? "partial" : "complete", session.partial ? "Summary unavailable" : null);
    this.hideIfNoMeeting();
  }

  /** Returns false when no summary was produced; the session is then partial. */
  private async summarize(session: Session): Promise<boolean> {
    const generator = this.deps.summaryGenerator;
    if (!generator) {
      this.logger.warn(`No SummaryGenerator configured — summary skipped for session ${session.id}`);
      return false;
    }
    try {
      await generator.summarize(this.deps.artifacts.combinedTranscript, this.deps.artifacts.summary);
      return true;
    } catch (err) {
      this.logger.warn(`Summary failed for session ${session.id}: ${errorMessage(err)}`);
      return false;
    }
  }

  private fail(session: Session, code: FailureCode, message: string, missing: string[]): void {
    this.transition(session, SessionState.FAILED);
    session.failure = { code, message, missing };
    session.completedAt = new Date();
    this.logger.error(`Session ${session.id} failed (${code}): ${message}`);
    this.report("failed", message);
    this.hideIfNoMeeting();
  }

  /**
   * Last resort for errors no stage anticipated (e.g. the supervisor rejecting a stop).
   * The session is marked FAILED outside the transition table so a new cycle
   * can begin.
   */
  private abortCycle(err: unknown): void {
    const message = errorMessage(err);
    this.logger.error(`Unexpected error in session cycle: ${message}`);
    const session = this.session;
    if (!session) return;
    session.state = SessionState.FAILED;
    session.failure = { code: session.failure?.code ?? "MERGE_FAILED", message, missing: [] };
    session.completedAt = new Date();
    this.report("failed", message);
    this.hideIfNoMeeting();
  }

  // ── Helpers ──────────────────────────────────────────────────────────────────

  private createSession(): Session {
    const session: Session = {
      id: uuidv4(),
      state: SessionState.IDLE,
      startedAt: null,
      stoppedAt: null,
      completedAt: null,
      partial: false,
      failure: null,
      workers: [],
    };
    this.session = session;
    this.logger.info(`Created session ${session.id}`);
    return session;
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new Error("No active session");
    }
    return this.session;
  }

  private isCycleActive(): boolean {
    return this.starting || !CYCLE_START_STATES.has(this.state);
  }

  private hideIfNoMeeting(): void {
    if (this.currentMeeting === null) {
      this.deps.indicator.hide();
    }
  }

  private transition(session: Session, to: SessionState): void {
    this.assertTransition(session, to);
    this.logger.info(`Session ${session.id}: ${session.state} → ${to}`);
    session.state = to;
  }

  private assertTransition(session: Session, to: SessionState): void {
    const allowed = VALID_TRANSITIONS.get(session.state) ?? [];
    if (!allowed.includes(to)) {
      throw new Error(`Invalid state transition: "${session.state}" → "${to}"`);
    }
  }

  private report(status: StatusLabel, detail: string | null): void {
    const update: StatusUpdate = {
      status,
      detail,
      sessionId: this.session?.id ?? null,
      timestamp: new Date(),
    };
    this.lastStatus = update;
    this.deps.indicator.setColor(STATUS_COLORS[status]);
    this.logger.info(detail ? `Status: ${status} (${detail})` : `Status: ${status}`);

    for (const listener of this.listeners) {
      try {
        listener(update);
      } catch (err) {
        this.logger.warn(`Status listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
