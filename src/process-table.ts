// Process table scan: lists the names of running processes.
// Windows uses tasklist's CSV output; everything else uses ps.

import { execFile } from "node:child_process";
import { basename } from "node:path";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

const SCAN_TIMEOUT_MS = 10_000;

export type ProcessLister = () => Promise<string[]>;

/** First column of `tasklist /fo csv /nh`, e.g. `"Zoom.exe","1234",...` */
export function parseTasklistOutput(stdout: string): string[] {
  const names: string[] = [];
  for (const line of stdout.split(/\r?\n/)) {
    const match = /^"([^"]+)"/.exec(line.trim());
    if (match) names.push(match[1]);
  }
  return names;
}

/** `ps -A -o comm=` prints one command per line, sometimes as a full path. */
export function parsePsOutput(stdout: string): string[] {
  return stdout
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map((line) => basename(line));
}

export async function listProcessNames(platform: NodeJS.Platform = process.platform): Promise<string[]> {
  if (platform === "win32") {
    const { stdout } = await execFileAsync("tasklist", ["/fo", "csv", "/nh"], {
      timeout: SCAN_TIMEOUT_MS,
      windowsHide: true,
    });
    return parseTasklistOutput(stdout);
  }

  const { stdout } = await execFileAsync("ps", ["-A", "-o", "comm="], {
    timeout: SCAN_TIMEOUT_MS,
    maxBuffer: 4 * 1024 * 1024,
  });
  return parsePsOutput(stdout);
}
