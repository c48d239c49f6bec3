// Unit tests for MergeEngine

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, readFile, readdir, rm, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  MergeEngine,
  compareSegments,
  formatSegment,
  mergeSegments,
  nodeFileSystem,
  renderCombinedTranscript,
  type MergeFileSystem,
} from "./merge-engine.js";
import { MergeWriteError, MissingInputsError } from "./errors.js";
import { buildArtifactSet } from "./config.js";
import { fileExists } from "./utils/file-exists.js";
import type { ArtifactSet, Segment } from "./types.js";

function createSilentLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

function seg(start: number, end: number, label: Segment["label"], text: string): Segment {
  return { start, end, label, text };
}

// ─── Pure helpers ───────────────────────────────────────────────────────────────

describe("compareSegments()", () => {
  it("orders by start, then end, then label, then text", () => {
    const segments = [
      seg(5, 9, "MIC", "d"),
      seg(5, 7, "SPEAKER", "c"),
      seg(5, 7, "MIC", "b"),
      seg(1, 20, "SPEAKER", "a"),
      seg(5, 7, "MIC", "a"),
    ];

    expect([...segments].sort(compareSegments).map((s) => `${s.start}-${s.end}-${s.label}-${s.text}`)).toEqual([
      "1-20-SPEAKER-a",
      "5-7-MIC-a",
      "5-7-MIC-b",
      "5-7-SPEAKER-c",
      "5-9-MIC-d",
    ]);
  });
});

describe("formatSegment()", () => {
  it("renders canonical timestamps and the source label", () => {
    expect(formatSegment(seg(0, 18.5, "MIC", "Hello there"))).toBe("[00:00.00 → 00:18.50] (MIC) Hello there");
  });
});

describe("renderCombinedTranscript()", () => {
  it("terminates every line with a newline", () => {
    expect(renderCombinedTranscript([seg(1, 2, "MIC", "a"), seg(3, 4, "SPEAKER", "b")])).toBe(
      "[00:01.00 → 00:02.00] (MIC) a\n[00:03.00 → 00:04.00] (SPEAKER) b\n",
    );
  });

  it("renders nothing for no segments", () => {
    expect(renderCombinedTranscript([])).toBe("");
  });
});

describe("mergeSegments()", () => {
  it("interleaves both sources chronologically", () => {
    const merged = mergeSegments([seg(0, 3, "MIC", "m1"), seg(10, 12, "MIC", "m2")], [seg(5, 6, "SPEAKER", "s1")]);
    expect(merged.map((s) => s.text)).toEqual(["m1", "s1", "m2"]);
  });

  it("puts MIC before SPEAKER when the times are equal", () => {
    const merged = mergeSegments([seg(2, 4, "MIC", "zzz")], [seg(2, 4, "SPEAKER", "aaa")]);
    expect(merged.map((s) => s.label)).toEqual(["MIC", "SPEAKER"]);
  });
});

// ─── MergeEngine on disk ────────────────────────────────────────────────────────

describe("MergeEngine", () => {
  let dir: string;
  let artifacts: ArtifactSet;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "merge-test-"));
    artifacts = buildArtifactSet(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("merges mixed dialects into the combined file and deletes the sources", async () => {
    await writeFile(artifacts.micTranscript, "[00:00:00.000 → 00:00:18.500] Hello there\n", "utf-8");
    await writeFile(artifacts.speakerTranscript, "[00:06.00 → 00:10.00] Quick reply\n", "utf-8");

    const engine = new MergeEngine(artifacts, { logger: createSilentLogger() });
    const result = await engine.merge();

    expect(result).toEqual({ combinedPath: artifacts.combinedTranscript, segmentCount: 2 });
    expect(await readFile(artifacts.combinedTranscript, "utf-8")).toBe(
      "[00:00.00 → 00:18.50] (MIC) Hello there\n[00:06.00 → 00:10.00] (SPEAKER) Quick reply\n",
    );
    expect(await fileExists(artifacts.micTranscript)).toBe(false);
    expect(await fileExists(artifacts.speakerTranscript)).toBe(false);
    expect(await readdir(dir)).toEqual(["Combined_transcript.txt"]);
  });

  it("writes an empty combined file when neither source has segments", async () => {
    await writeFile(artifacts.micTranscript, "no timestamps here\n", "utf-8");
    await writeFile(artifacts.speakerTranscript, "", "utf-8");

    const result = await new MergeEngine(artifacts, { logger: createSilentLogger() }).merge();

    expect(result.segmentCount).toBe(0);
    expect(await readFile(artifacts.combinedTranscript, "utf-8")).toBe("");
  });

  it("replaces an existing combined transcript", async () => {
    await writeFile(artifacts.combinedTranscript, "stale\n", "utf-8");
    await writeFile(artifacts.micTranscript, "[00:01.00 → 00:02.00] fresh\n", "utf-8");
    await writeFile(artifacts.speakerTranscript, "", "utf-8");

    await new MergeEngine(artifacts, { logger: createSilentLogger() }).merge();

    expect(await readFile(artifacts.combinedTranscript, "utf-8")).toBe("[00:01.00 → 00:02.00] (MIC) fresh\n");
  });

  it("names exactly the missing source and touches nothing", async () => {
    await writeFile(artifacts.micTranscript, "[00:01.00 → 00:02.00] only mic\n", "utf-8");

    const engine = new MergeEngine(artifacts, { logger: createSilentLogger() });

    expect(await engine.findMissingInputs()).toEqual([artifacts.speakerTranscript]);
    const err = await engine.merge().catch((e: unknown) => e);
    expect(err).toBeInstanceOf(MissingInputsError);
    expect(err).toMatchObject({ code: "MISSING_INPUTS", paths: [artifacts.speakerTranscript] });
    expect(await readFile(artifacts.micTranscript, "utf-8")).toBe("[00:01.00 → 00:02.00] only mic\n");
    expect(await fileExists(artifacts.combinedTranscript)).toBe(false);
  });

  it("names both sources when both are missing", async () => {
    const err = await new MergeEngine(artifacts, { logger: createSilentLogger() }).merge().catch((e: unknown) => e);
    expect(err).toMatchObject({ paths: [artifacts.micTranscript, artifacts.speakerTranscript] });
  });

  it("aborts without deleting anything when a source disappears mid-merge", async () => {
    await writeFile(artifacts.micTranscript, "[00:01.00 → 00:02.00] mic\n", "utf-8");
    await writeFile(artifacts.speakerTranscript, "[00:03.00 → 00:04.00] speaker\n", "utf-8");

    const fs: MergeFileSystem = {
      ...nodeFileSystem,
      writeText: async (path, content) => {
        await nodeFileSystem.writeText(path, content);
        // Speaker file vanishes after the combined text was produced
        await unlink(artifacts.speakerTranscript);
      },
      remove: vi.fn(nodeFileSystem.remove),
    };

    const err = await new MergeEngine(artifacts, { fs, logger: createSilentLogger() })
      .merge()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MissingInputsError);
    expect(err).toMatchObject({ paths: [artifacts.speakerTranscript] });
    expect(await fileExists(artifacts.combinedTranscript)).toBe(false);
    expect(await readFile(artifacts.micTranscript, "utf-8")).toBe("[00:01.00 → 00:02.00] mic\n");
    // Only the temporary file was cleaned up
    expect(fs.remove).toHaveBeenCalledTimes(1);
    expect(await readdir(dir)).toEqual(["Mic_transcript.txt"]);
  });

  it("reports an unreadable source as missing", async () => {
    await writeFile(artifacts.micTranscript, "x", "utf-8");
    await writeFile(artifacts.speakerTranscript, "y", "utf-8");

    const fs: MergeFileSystem = {
      ...nodeFileSystem,
      readText: (path) =>
        path === artifacts.micTranscript ? Promise.reject(new Error("EACCES")) : nodeFileSystem.readText(path),
    };

    const err = await new MergeEngine(artifacts, { fs, logger: createSilentLogger() })
      .merge()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MissingInputsError);
    expect(err).toMatchObject({ paths: [artifacts.micTranscript] });
    expect(await fileExists(artifacts.speakerTranscript)).toBe(true);
  });

  it("keeps the sources when the combined file cannot be written", async () => {
    await writeFile(artifacts.micTranscript, "[00:01.00 → 00:02.00] mic\n", "utf-8");
    await writeFile(artifacts.speakerTranscript, "[00:03.00 → 00:04.00] speaker\n", "utf-8");

    const fs: MergeFileSystem = {
      ...nodeFileSystem,
      writeText: () => Promise.reject(new Error("ENOSPC")),
    };

    const err = await new MergeEngine(artifacts, { fs, logger: createSilentLogger() })
      .merge()
      .catch((e: unknown) => e);

    expect(err).toBeInstanceOf(MergeWriteError);
    expect(err).toMatchObject({ code: "MERGE_WRITE_FAILED", path: artifacts.combinedTranscript });
    expect(await fileExists(artifacts.micTranscript)).toBe(true);
    expect(await fileExists(artifacts.speakerTranscript)).toBe(true);
    expect(await fileExists(artifacts.combinedTranscript)).toBe(false);
  });

  it("logs but does not fail when a source cannot be deleted", async () => {
    await writeFile(artifacts.micTranscript, "[00:01.00 → 00:02.00] mic\n", "utf-8");
    await writeFile(artifacts.speakerTranscript, "", "utf-8");
    const logger = createSilentLogger();

    const fs: MergeFileSystem = {
      ...nodeFileSystem,
      remove: () => Promise.reject(new Error("EBUSY")),
    };

    const result = await new MergeEngine(artifacts, { fs, logger }).merge();

    expect(result.segmentCount).toBe(1);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(await fileExists(artifacts.combinedTranscript)).toBe(true);
  });
});
