// Worker Supervisor
// Owns the child-process handles of the two capture workers.
//
// Stopping is a two-phase escalation per worker:
//   1. SIGINT, then wait up to the stop timeout for a natural exit
//      (workers flush their transcript on interrupt);
//   2. SIGKILL, then wait without a bound.
// Start is atomic: if either worker dies during the settle window, the other is
// killed and no handle is left behind.
//
// Windows has no signal a parent can use to interrupt a console child (Node's
// kill() terminates it outright), so there phase 1 is skipped and workers are
// killed without flushing.

import { spawn } from "node:child_process";
import { WorkerStartFailedError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { sleep, withTimeout } from "./utils/bounded-poll.js";
import type { WorkerName, WorkerSpec, WorkerStopReport } from "./types.js";

/** Cooperative interrupt: the same signal an interactive Ctrl+C delivers. */
const INTERRUPT_SIGNAL: NodeJS.Signals = "SIGINT";
const KILL_SIGNAL: NodeJS.Signals = "SIGKILL";

/** The part of ChildProcess the supervisor relies on. */
export interface WorkerProcess {
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals | number): boolean;
  once(event: "exit", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  once(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnWorker = (spec: WorkerSpec, options: { cwd: string; env: NodeJS.ProcessEnv }) => WorkerProcess;

export const spawnChildWorker: SpawnWorker = (spec, options) =>
  spawn(spec.command, spec.args, {
    cwd: options.cwd,
    env: options.env,
    stdio: "ignore",
    windowsHide: true,
    // Own process group on POSIX: a terminal Ctrl+C reaches only this process,
    // which then interrupts each worker exactly once
    detached: process.platform !== "win32",
  });

/** Whether `platform` lets a parent deliver a catchable interrupt to a child. */
export function supportsCooperativeStop(platform: NodeJS.Platform): boolean {
  return platform !== "win32";
}

interface WorkerExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

interface TrackedWorker {
  name: WorkerName;
  process: WorkerProcess;
  exit: WorkerExit | null; // null while running
  killed: boolean; // SIGKILL was sent
  exited: Promise<WorkerExit>;
}

export interface WorkerSupervisorOptions {
  workers: WorkerSpec[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  settleDelayMs: number;
  spawnWorker?: SpawnWorker;
  /** Default: process.platform */
  platform?: NodeJS.Platform;
  logger?: Logger;
}

export class WorkerSupervisor {
  private readonly spawnWorker: SpawnWorker;
  private readonly logger: Logger;
  private tracked: TrackedWorker[] = [];
  private stopping: Promise<WorkerStopReport[]> | null = null;

  constructor(private readonly options: WorkerSupervisorOptions) {
    this.spawnWorker = options.spawnWorker ?? spawnChildWorker;
    this.logger = options.logger ?? createLogger("WorkerSupervisor");
  }

  /** True while any tracked worker has not exited. */
  isRunning(): boolean {
    return this.tracked.some((worker) => worker.exit === null);
  }

  /** Names of tracked workers that have not exited. */
  liveWorkers(): WorkerName[] {
    return this.tracked.filter((worker) => worker.exit === null).map((worker) => worker.name);
  }

  /**
   * Launch every configured worker with a shared environment, then check that
   * all of them survived the settle delay.
   *
   * @throws WorkerStartFailedError naming the first worker found dead. Every
   *         other worker has been killed and awaited by then.
   */
  async start(): Promise<void> {
    if (this.tracked.length > 0) {
      throw new Error("Workers are already running");
    }

    const env: NodeJS.ProcessEnv = { ...(this.options.env ?? process.env), PYTHONIOENCODING: "utf-8" };

    for (const spec of this.options.workers) {
      this.logger.info(`Starting ${spec.name} worker: ${spec.command} ${spec.args.join(" ")}`);
      try {
        this.tracked.push(this.launch(spec, env));
      } catch (err) {
        this.logger.error(`Failed to spawn ${spec.name} worker: ${errorMessage(err)}`);
        await this.abortStart();
        throw new WorkerStartFailedError(spec.name, null);
      }
    }

    await sleep(this.options.settleDelayMs);

    const dead = this.tracked.find((worker) => worker.exit !== null);
    if (!dead || !dead.exit) {
      this.logger.info(`All ${this.tracked.length} workers running`);
      return;
    }

    const exitCode = dead.exit.exitCode;
    this.logger.error(`${dead.name} worker exited immediately with code ${exitCode ?? "none"}`);

    await this.abortStart();
    throw new WorkerStartFailedError(dead.name, exitCode);
  }

  /**
   * Interrupt every live worker and wait for each one, killing any that
   * outlast `timeoutMs`. Always resolves, and always clears the handle table.
   * A call made while a stop is in flight joins it; no worker is interrupted
   * twice.
   */
  stop(timeoutMs: number): Promise<WorkerStopReport[]> {
    if (!this.stopping) {
      this.stopping = this.stopAll(timeoutMs).finally(() => {
        this.stopping = null;
      });
    }
    return this.stopping;
  }

  // ── Internals ────────────────────────────────────────────────────────────────

  private async stopAll(timeoutMs: number): Promise<WorkerStopReport[]> {
    const workers = this.tracked;
    const cooperative = supportsCooperativeStop(this.options.platform ?? process.platform);
    try {
      if (!cooperative && workers.length > 0) {
        this.logger.warn("No cooperative interrupt on this platform, killing workers without a transcript flush");
      }
      for (const worker of workers) {
        if (worker.exit !== null) continue;
        if (cooperative) this.interrupt(worker);
        else this.sendKill(worker);
      }

      this.logger.info(`Waiting up to ${timeoutMs}ms for ${workers.length} worker(s) to finish`);
      return await Promise.all(workers.map((worker) => this.awaitStop(worker, timeoutMs)));
    } finally {
      this.tracked = [];
    }
  }

  /** Kill and await whatever was launched, then forget it. */
  private async abortStart(): Promise<void> {
    const survivors = this.tracked.filter((worker) => worker.exit === null);
    try {
      await Promise.all(survivors.map((worker) => this.kill(worker)));
    } finally {
      this.tracked = [];
    }
  }

  private launch(spec: WorkerSpec, env: NodeJS.ProcessEnv): TrackedWorker {
    const child = this.spawnWorker(spec, { cwd: this.options.cwd, env });

    let markExited: (exit: WorkerExit) => void = () => undefined;
    const worker: TrackedWorker = {
      name: spec.name,
      process: child,
      exit: null,
      killed: false,
      exited: new Promise<WorkerExit>((resolve) => {
        markExited = resolve;
      }),
    };

    const settle = (exit: WorkerExit) => {
      if (worker.exit !== null) return;
      worker.exit = exit;
      markExited(exit);
    };

    child.once("exit", (code: number | null, signal: NodeJS.Signals | null) => {
      settle({ exitCode: code, signal });
    });
    // Spawn failures (e.g. command not found) emit "error" without "exit"
    child.once("error", (err: Error) => {
      this.logger.error(`${spec.name} worker error: ${err.message}`);
      settle({ exitCode: null, signal: null });
    });

    return worker;
  }

  private interrupt(worker: TrackedWorker): void {
    let delivered = false;
    try {
      delivered = worker.process.kill(INTERRUPT_SIGNAL);
    } catch (err) {
      this.logger.warn(`Error sending ${INTERRUPT_SIGNAL} to ${worker.name}: ${errorMessage(err)}`);
    }
    if (!delivered && worker.exit === null) {
      this.logger.warn(`${INTERRUPT_SIGNAL} not delivered to ${worker.name}, killing`);
      this.sendKill(worker);
    }
  }

  private async awaitStop(worker: TrackedWorker, timeoutMs: number): Promise<WorkerStopReport> {
    let exit: WorkerExit;

    const result = await withTimeout(worker.exited, timeoutMs);
    if (result.timedOut) {
      this.logger.warn(`${worker.name} did not exit within ${timeoutMs}ms, killing`);
      exit = await this.kill(worker);
    } else {
      exit = result.value;
    }

    if (exit.exitCode !== null && exit.exitCode !== 0) {
      this.logger.warn(`${worker.name} finished with code ${exit.exitCode}`);
    } else {
      this.logger.info(`${worker.name} finished (code ${exit.exitCode ?? "none"}, signal ${exit.signal ?? "none"})`);
    }

    return { name: worker.name, exitCode: exit.exitCode, signal: exit.signal, forced: worker.killed };
  }

  /** Force-kill and wait for the exit without a bound. */
  private kill(worker: TrackedWorker): Promise<WorkerExit> {
    if (worker.exit === null) this.sendKill(worker);
    return worker.exited;
  }

  private sendKill(worker: TrackedWorker): void {
    worker.killed = true;
    try {
      worker.process.kill(KILL_SIGNAL);
    } catch (err) {
      this.logger.error(`Error killing ${worker.name}: ${errorMessage(err)}`);
    }
  }
}
