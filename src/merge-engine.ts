// Transcript Merge Engine
// Combines the mic and speaker transcripts into one chronologically ordered
// file, then retires the two sources.
//
// Merge is all-or-nothing: the combined file is written to a temporary sibling
// and renamed into place, and the sources are only deleted after that rename.

import { readFile, rename, unlink, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { FileUnreadableError, MergeWriteError, MissingInputsError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { renderTimestamp } from "./timestamp.js";
import { parseTranscriptFile } from "./transcript-parser.js";
import { fileExists } from "./utils/file-exists.js";
import type { ArtifactSet, Segment, SourceLabel } from "./types.js";

// ─── Ordering ───────────────────────────────────────────────────────────────────

/** Fixed tie-break order between sources. */
const LABEL_ORDER: Record<SourceLabel, number> = {
  MIC: 0,
  SPEAKER: 1,
};

/**
 * Total order over segments: start, then end, then source label, then text.
 * Text only separates records that agree on every other key, which makes the
 * rendered output independent of input order.
 */
export function compareSegments(a: Segment, b: Segment): number {
  if (a.start !== b.start) return a.start - b.start;
  if (a.end !== b.end) return a.end - b.end;
  if (a.label !== b.label) return LABEL_ORDER[a.label] - LABEL_ORDER[b.label];
  if (a.text === b.text) return 0;
  return a.text < b.text ? -1 : 1;
}

/** Returns a new, stably sorted array. */
export function sortSegments(segments: readonly Segment[]): Segment[] {
  return [...segments].sort(compareSegments);
}

// ─── Rendering ──────────────────────────────────────────────────────────────────

/** `[MM:SS.hh → MM:SS.hh] (LABEL) text` */
export function formatSegment(segment: Segment): string {
  return `[${renderTimestamp(segment.start)} → ${renderTimestamp(segment.end)}] (${segment.label}) ${segment.text}`;
}

/** Every line is newline-terminated; no segments renders as an empty file. */
export function renderCombinedTranscript(segments: readonly Segment[]): string {
  return segments.map((segment) => `${formatSegment(segment)}\n`).join("");
}

export function mergeSegments(mic: readonly Segment[], speaker: readonly Segment[]): Segment[] {
  return sortSegments([...mic, ...speaker]);
}

// ─── File system port ───────────────────────────────────────────────────────────

/** The slice of `node:fs/promises` the merge needs; injectable for tests. */
export interface MergeFileSystem {
  exists(path: string): Promise<boolean>;
  readText(path: string): Promise<string>;
  writeText(path: string, content: string): Promise<void>;
  rename(from: string, to: string): Promise<void>;
  remove(path: string): Promise<void>;
}

export const nodeFileSystem: MergeFileSystem = {
  exists: fileExists,
  readText: (path) => readFile(path, "utf-8"),
  writeText: (path, content) => writeFile(path, content, "utf-8"),
  rename: (from, to) => rename(from, to),
  remove: (path) => unlink(path),
};

// ─── MergeEngine ────────────────────────────────────────────────────────────────

export interface MergeResult {
  combinedPath: string;
  segmentCount: number;
}

export interface MergeEngineDeps {
  fs?: MergeFileSystem;
  logger?: Logger;
}

export class MergeEngine {
  private readonly fs: MergeFileSystem;
  private readonly logger: Logger;

  constructor(
    private readonly artifacts: Pick<ArtifactSet, "micTranscript" | "speakerTranscript" | "combinedTranscript">,
    deps: MergeEngineDeps = {},
  ) {
    this.fs = deps.fs ?? nodeFileSystem;
    this.logger = deps.logger ?? createLogger("MergeEngine");
  }

  /** Paths of the two source transcripts that do not currently exist. */
  async findMissingInputs(): Promise<string[]> {
    const sources = [this.artifacts.micTranscript, this.artifacts.speakerTranscript];
    const present = await Promise.all(sources.map((path) => this.fs.exists(path)));
    return sources.filter((_, i) => !present[i]);
  }

  /**
   * Merge both transcripts into the combined artifact and delete the sources.
   *
   * @throws MissingInputsError if either source is absent or unreadable, before
   *         or during the merge. Nothing is written or deleted in that case.
   * @throws MergeWriteError if the combined file cannot be written. Sources are kept.
   */
  async merge(): Promise<MergeResult> {
    const { micTranscript, speakerTranscript, combinedTranscript } = this.artifacts;

    const missingBefore = await this.findMissingInputs();
    if (missingBefore.length > 0) {
      throw new MissingInputsError(missingBefore);
    }

    let mic: Segment[];
    let speaker: Segment[];
    try {
      mic = await parseTranscriptFile(micTranscript, "MIC", this.fs.readText);
      speaker = await parseTranscriptFile(speakerTranscript, "SPEAKER", this.fs.readText);
    } catch (err) {
      if (err instanceof FileUnreadableError) {
        throw new MissingInputsError([err.path], { cause: err });
      }
      throw err;
    }

    const merged = mergeSegments(mic, speaker);
    this.logger.info(`Merging ${mic.length} mic + ${speaker.length} speaker segments`);

    const tempPath = join(dirname(combinedTranscript), `.${basename(combinedTranscript)}.tmp`);
    try {
      await this.fs.writeText(tempPath, renderCombinedTranscript(merged));
    } catch (err) {
      await this.discard(tempPath);
      throw new MergeWriteError(combinedTranscript, { cause: err });
    }

    // Sources may have been removed while we were parsing or writing
    const missingAfter = await this.findMissingInputs();
    if (missingAfter.length > 0) {
      await this.discard(tempPath);
      throw new MissingInputsError(missingAfter);
    }

    try {
      await this.fs.rename(tempPath, combinedTranscript);
    } catch (err) {
      await this.discard(tempPath);
      throw new MergeWriteError(combinedTranscript, { cause: err });
    }

    for (const source of [micTranscript, speakerTranscript]) {
      try {
        await this.fs.remove(source);
      } catch (err) {
        this.logger.warn(`Could not delete ${source}: ${errorMessage(err)}`);
      }
    }

    this.logger.info(`Combined transcript written to ${combinedTranscript} (${merged.length} segments)`);
    return { combinedPath: combinedTranscript, segmentCount: merged.length };
  }

  private async discard(tempPath: string): Promise<void> {
    if (!(await this.fs.exists(tempPath))) return;
    try {
      await this.fs.remove(tempPath);
    } catch (err) {
      this.logger.warn(`Could not remove temporary file ${tempPath}: ${errorMessage(err)}`);
    }
  }
}
