// Unit tests for PresenceMonitor

import { describe, it, expect, vi } from "vitest";
import { PresenceMonitor, detectMeetingApp } from "./presence-monitor.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

/** A process lister that replays one scan result per call, repeating the last. */
function scripted(...scans: Array<string[] | Error>) {
  let index = 0;
  return vi.fn(() => {
    const scan = scans[Math.min(index, scans.length - 1)];
    index++;
    return scan instanceof Error ? Promise.reject(scan) : Promise.resolve(scan);
  });
}

function createMonitor(listProcesses: () => Promise<string[]>) {
  const callbacks = { onEntered: vi.fn(), onExited: vi.fn() };
  const monitor = new PresenceMonitor({ pollIntervalMs: 10, listProcesses, logger: createSilentLogger() }, callbacks);
  return { monitor, callbacks };
}

// ─── detectMeetingApp ───────────────────────────────────────────────────────────

describe("detectMeetingApp()", () => {
  it("recognizes Zoom and Teams process names", () => {
    expect(detectMeetingApp(["explorer.exe", "Zoom.exe"])).toBe("Zoom");
    expect(detectMeetingApp(["zoom.us"])).toBe("Zoom");
    expect(detectMeetingApp(["ms-teams.exe"])).toBe("Teams");
    expect(detectMeetingApp(["teams"])).toBe("Teams");
  });

  it("matches case-insensitively", () => {
    expect(detectMeetingApp(["ZOOM.EXE"])).toBe("Zoom");
    expect(detectMeetingApp(["MS-Teams"])).toBe("Teams");
  });

  it("never reports a meeting for a browser alone", () => {
    expect(detectMeetingApp(["chrome.exe", "msedge.exe", "firefox.exe", "Google Chrome"])).toBeNull();
  });

  it("prefers the earlier app when several are running", () => {
    expect(detectMeetingApp(["Teams.exe", "CptHost.exe"])).toBe("Zoom");
  });

  it("returns null when nothing matches", () => {
    expect(detectMeetingApp([])).toBeNull();
    expect(detectMeetingApp(["zoomer", "steams"])).toBeNull();
  });
});

// ─── PresenceMonitor ────────────────────────────────────────────────────────────

describe("PresenceMonitor", () => {
  it("emits entered once while the app keeps running", async () => {
    const { monitor, callbacks } = createMonitor(scripted(["Zoom.exe"]));

    expect(await monitor.poll()).toEqual({ type: "entered", app: "Zoom" });
    expect(await monitor.poll()).toBeNull();
    expect(await monitor.poll()).toBeNull();

    expect(callbacks.onEntered).toHaveBeenCalledTimes(1);
    expect(callbacks.onEntered).toHaveBeenCalledWith("Zoom");
    expect(monitor.meetingApp).toBe("Zoom");
  });

  it("emits exited with the app that was seen", async () => {
    const { monitor, callbacks } = createMonitor(scripted(["ms-teams.exe"], ["explorer.exe"], ["explorer.exe"]));

    await monitor.poll();
    expect(await monitor.poll()).toEqual({ type: "exited", app: "Teams" });
    expect(await monitor.poll()).toBeNull();

    expect(callbacks.onExited).toHaveBeenCalledTimes(1);
    expect(callbacks.onExited).toHaveBeenCalledWith("Teams");
    expect(monitor.meetingApp).toBeNull();
  });

  it("emits nothing when switching apps without a gap", async () => {
    const { monitor, callbacks } = createMonitor(scripted(["Zoom.exe"], ["Teams.exe"]));

    await monitor.poll();
    expect(await monitor.poll()).toBeNull();

    expect(callbacks.onEntered).toHaveBeenCalledTimes(1);
    expect(callbacks.onExited).not.toHaveBeenCalled();
    expect(monitor.meetingApp).toBe("Zoom");
  });

  it("ignores a browser-only process table", async () => {
    const { monitor, callbacks } = createMonitor(scripted(["chrome.exe", "firefox"]));

    expect(await monitor.poll()).toBeNull();
    expect(callbacks.onEntered).not.toHaveBeenCalled();
  });

  it("treats a failed scan as no change", async () => {
    const logger = createSilentLogger();
    const callbacks = { onEntered: vi.fn(), onExited: vi.fn() };
    const monitor = new PresenceMonitor(
      { pollIntervalMs: 10, listProcesses: scripted(["Zoom.exe"], new Error("ps not found"), []), logger },
      callbacks,
    );

    await monitor.poll();
    expect(await monitor.poll()).toBeNull();
    expect(monitor.meetingApp).toBe("Zoom");
    expect(logger.warn).toHaveBeenCalledWith("Process scan failed: ps not found");

    expect(await monitor.poll()).toEqual({ type: "exited", app: "Zoom" });
  });

  it("polls on an interval between start and stop", async () => {
    vi.useFakeTimers();
    try {
      const lister = scripted([]);
      const { monitor } = createMonitor(lister);

      monitor.start();
      expect(monitor.isMonitoring).toBe(true);
      await vi.advanceTimersByTimeAsync(35);
      monitor.stop();
      const calls = lister.mock.calls.length;
      await vi.advanceTimersByTimeAsync(100);

      // One immediate scan plus one per elapsed interval
      expect(calls).toBe(4);
      expect(lister.mock.calls.length).toBe(calls);
      expect(monitor.isMonitoring).toBe(false);
    } finally {
      vi.useRealTimers();
    }
  });
});
