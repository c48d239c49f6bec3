// Transcript Parser
// Extracts ordered segments from a worker's transcript file. Lines that match
// neither dialect are skipped; only an unreadable file is an error.

import { readFile } from "node:fs/promises";
import { FileUnreadableError } from "./errors.js";
import { parseTimestamp } from "./timestamp.js";
import type { Segment, SourceLabel } from "./types.js";

/** Dialect A: `[00:00:00.000 → 00:00:18.500] text` */
const HOURS_LINE = /\[(\d{2}:\d{2}:\d{2}\.\d+)\s*→\s*(\d{2}:\d{2}:\d{2}\.\d+)\]\s*(.*)/;

/** Dialect B: `[00:06.00 → 00:10.00] text` */
const MINUTES_LINE = /\[(\d{2}:\d{2}\.\d+)\s*→\s*(\d{2}:\d{2}\.\d+)\]\s*(.*)/;

/**
 * Parse a single line. Returns null for lines that match neither dialect or
 * whose end precedes its start.
 */
export function parseTranscriptLine(line: string, label: SourceLabel): Segment | null {
  const trimmed = line.trim();
  const match = HOURS_LINE.exec(trimmed) ?? MINUTES_LINE.exec(trimmed);
  if (!match) return null;

  const [, rawStart, rawEnd, text] = match;
  const start = parseTimestamp(rawStart);
  const end = parseTimestamp(rawEnd);
  if (end < start) return null;

  return { start, end, text, label };
}

/** Parse transcript content, preserving line order. */
export function parseTranscriptText(content: string, label: SourceLabel): Segment[] {
  const segments: Segment[] = [];
  for (const line of content.split(/\r?\n/)) {
    const segment = parseTranscriptLine(line, label);
    if (segment) segments.push(segment);
  }
  return segments;
}

/**
 * Read and parse a transcript file.
 * @throws FileUnreadableError if the file cannot be opened or read.
 */
export async function parseTranscriptFile(
  path: string,
  label: SourceLabel,
  read: (path: string) => Promise<string> = (p) => readFile(p, "utf-8"),
): Promise<Segment[]> {
  let content: string;
  try {
    content = await read(path);
  } catch (err) {
    throw new FileUnreadableError(path, { cause: err });
  }
  return parseTranscriptText(content, label);
}
