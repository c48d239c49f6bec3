// Artifact Watcher
// Workers flush their transcripts some time after they exit, so the two files
// are polled for on a fixed interval up to a ceiling.

import { pollUntil } from "./utils/bounded-poll.js";
import { fileExists } from "./utils/file-exists.js";
import { createLogger, type Logger } from "./logger.js";

export interface ArtifactWaitOptions {
  intervalMs: number;
  timeoutMs: number;
  /** Log which files are still missing every N attempts. Default: 5 */
  reportEvery?: number;
  exists?: (path: string) => Promise<boolean>;
  logger?: Logger;
}

export type ArtifactWaitResult = { found: true; attempts: number } | { found: false; missing: string[]; attempts: number };

async function missingOf(paths: readonly string[], exists: (path: string) => Promise<boolean>): Promise<string[]> {
  const present = await Promise.all(paths.map((path) => exists(path)));
  return paths.filter((_, i) => !present[i]);
}

/**
 * Wait until every path exists.
 *
 * Resolves `{ found: false, missing }` once the ceiling passes, listing only the
 * paths still absent at that point.
 */
export async function waitForArtifacts(
  paths: readonly string[],
  options: ArtifactWaitOptions,
): Promise<ArtifactWaitResult> {
  const exists = options.exists ?? fileExists;
  const logger = options.logger ?? createLogger("ArtifactWatcher");
  const reportEvery = options.reportEvery ?? 5;

  let lastMissing: string[] = [...paths];
  const result = await pollUntil(
    async () => {
      lastMissing = await missingOf(paths, exists);
      return lastMissing.length === 0 ? true : null;
    },
    {
      intervalMs: options.intervalMs,
      timeoutMs: options.timeoutMs,
      onAttempt: (attempt) => {
        if (attempt % reportEvery === 1 || reportEvery === 1) {
          logger.info(`Waiting for transcripts... missing: ${lastMissing.join(", ")}`);
        }
      },
    },
  );

  if (result.ok) {
    logger.info(`All transcript files present after ${result.attempts} check(s)`);
    return { found: true, attempts: result.attempts };
  }

  logger.warn(`Gave up waiting after ${result.attempts} check(s); missing: ${lastMissing.join(", ")}`);
  return { found: false, missing: lastMissing, attempts: result.attempts };
}
