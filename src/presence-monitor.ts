// Presence Monitor
// Polls the process table for a known meeting application and reports
// edge-triggered enter/exit events. Steady presence produces no events.

import { createLogger, type Logger } from "./logger.js";
import { listProcessNames, type ProcessLister } from "./process-table.js";
import { errorMessage } from "./errors.js";

/**
 * Meeting applications and the process names that identify them, checked in
 * order. Google Meet runs inside a browser, so its only identifiers are
 * browser processes, which are never accepted on their own (see
 * BROWSER_PROCESS_NAMES).
 */
export const MEETING_APPS: ReadonlyArray<{ name: string; processNames: readonly string[] }> = [
  { name: "Zoom", processNames: ["Zoom.exe", "CptHost.exe", "zoom", "zoom.us"] },
  { name: "Teams", processNames: ["ms-teams.exe", "Teams.exe", "ms-teams", "teams"] },
  { name: "Google Meet", processNames: ["chrome.exe", "msedge.exe", "firefox.exe"] },
];

/** A running browser says nothing about whether a meeting is in progress. */
export const BROWSER_PROCESS_NAMES: ReadonlySet<string> = new Set([
  "chrome.exe",
  "msedge.exe",
  "firefox.exe",
  "chrome",
  "msedge",
  "firefox",
  "google chrome",
]);

/**
 * Return the first meeting app whose identifying process is running, or null.
 * Comparison is case-insensitive.
 */
export function detectMeetingApp(
  processNames: Iterable<string>,
  apps: typeof MEETING_APPS = MEETING_APPS,
): string | null {
  const running = new Set<string>();
  for (const name of processNames) {
    running.add(name.toLowerCase());
  }

  for (const app of apps) {
    for (const processName of app.processNames) {
      const key = processName.toLowerCase();
      if (BROWSER_PROCESS_NAMES.has(key)) continue;
      if (running.has(key)) return app.name;
    }
  }
  return null;
}

// ─── Monitor ────────────────────────────────────────────────────────────────────

export type PresenceEvent = { type: "entered"; app: string } | { type: "exited"; app: string };

export type PresenceEventCallback = {
  onEntered: (app: string) => void;
  onExited: (app: string) => void;
};

export interface PresenceMonitorOptions {
  pollIntervalMs: number;
  listProcesses?: ProcessLister;
  logger?: Logger;
}

export class PresenceMonitor {
  private readonly listProcesses: ProcessLister;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;
  private polling = false;
  private currentApp: string | null = null;

  constructor(
    private readonly options: PresenceMonitorOptions,
    private readonly callbacks: PresenceEventCallback,
  ) {
    this.listProcesses = options.listProcesses ?? (() => listProcessNames());
    this.logger = options.logger ?? createLogger("PresenceMonitor");
  }

  /** The meeting app seen by the last successful poll. */
  get meetingApp(): string | null {
    return this.currentApp;
  }

  get isMonitoring(): boolean {
    return this.timer !== null;
  }

  /** Poll once immediately, then every `pollIntervalMs`. */
  start(): void {
    if (this.timer) return;
    this.logger.info(`Monitoring for meeting apps every ${this.options.pollIntervalMs}ms`);
    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.pollIntervalMs);
    void this.tick();
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("Stopped monitoring");
  }

  /**
   * Scan the process table once and emit at most one edge event.
   * Returns the event emitted, or null when presence did not change.
   * A failed scan is logged and treated as no change.
   */
  async poll(): Promise<PresenceEvent | null> {
    let processNames: string[];
    try {
      processNames = await this.listProcesses();
    } catch (err) {
      this.logger.warn(`Process scan failed: ${errorMessage(err)}`);
      return null;
    }

    const app = detectMeetingApp(processNames);

    if (app && !this.currentApp) {
      this.currentApp = app;
      this.logger.info(`${app} detected`);
      this.callbacks.onEntered(app);
      return { type: "entered", app };
    }

    if (!app && this.currentApp) {
      const previous = this.currentApp;
      this.currentApp = null;
      this.logger.info(`${previous} no longer running`);
      this.callbacks.onExited(previous);
      return { type: "exited", app: previous };
    }

    return null;
  }

  private async tick(): Promise<void> {
    // A slow scan must not overlap with the next one
    if (this.polling) return;
    this.polling = true;
    try {
      await this.poll();
    } catch (err) {
      this.logger.error(`Presence callback failed: ${errorMessage(err)}`);
    } finally {
      this.polling = false;
    }
  }
}
