// Summary Generator
// Asks an LLM for a meeting summary of the combined transcript and writes it
// next to the transcript.
//
// Failures of any kind surface as SummaryUnavailableError; the caller treats
// them as a partial completion, never as a failed session.

import { readFile, writeFile } from "node:fs/promises";
import { SummaryUnavailableError, errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { withTimeout, type TimedResult } from "./utils/bounded-poll.js";

// ─── OpenAI client interface (for testability / dependency injection) ──────────

/**
 * Minimal interface for the OpenAI chat completions surface we use.
 * This allows injecting a mock client in tests without importing the full SDK.
 */
export interface OpenAIChatClient {
  chat: {
    completions: {
      create(params: {
        model: string;
        messages: Array<{ role: "system" | "user"; content: string }>;
        temperature?: number;
      }): Promise<{
        choices: Array<{
          message: {
            content: string | null;
          };
        }>;
      }>;
    };
  };
}

type ChatCompletion = Awaited<ReturnType<OpenAIChatClient["chat"]["completions"]["create"]>>;

export interface SummaryGeneratorOptions {
  model?: string;
  timeoutMs?: number;
  logger?: Logger;
}

const DEFAULT_MODEL = "gpt-4o";
const DEFAULT_TIMEOUT_MS = 300_000;

export const SUMMARY_SYSTEM_PROMPT = [
  "You summarize meeting transcripts.",
  "Each transcript line has the form `[MM:SS.hh → MM:SS.hh] (LABEL) text`, where",
  "MIC is the local participant and SPEAKER is everyone heard through the speakers.",
  "Reply in plain text: first a single title line for the meeting, then a blank line,",
  "then a bullet list (lines starting with `- `) covering the topics discussed,",
  "decisions made and action items with owners where they are named.",
  "Do not invent content that is not in the transcript.",
].join("\n");

export class SummaryGenerator {
  private readonly model: string;
  private readonly timeoutMs: number;
  private readonly logger: Logger;

  constructor(
    private readonly openai: OpenAIChatClient,
    options: SummaryGeneratorOptions = {},
  ) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("SummaryGenerator");
  }

  /**
   * Summarize the combined transcript at `transcriptPath` into `summaryPath`.
   * @returns the summary path
   * @throws SummaryUnavailableError
   */
  async summarize(transcriptPath: string, summaryPath: string): Promise<string> {
    let transcript: string;
    try {
      transcript = await readFile(transcriptPath, "utf-8");
    } catch (err) {
      throw new SummaryUnavailableError(`cannot read ${transcriptPath}`, { cause: err });
    }

    if (transcript.trim().length === 0) {
      throw new SummaryUnavailableError("transcript is empty");
    }

    const summary = await this.requestSummary(transcript);

    try {
      await writeFile(summaryPath, summary.endsWith("\n") ? summary : `${summary}\n`, "utf-8");
    } catch (err) {
      throw new SummaryUnavailableError(`cannot write ${summaryPath}`, { cause: err });
    }

    this.logger.info(`Summary written to ${summaryPath}`);
    return summaryPath;
  }

  private async requestSummary(transcript: string): Promise<string> {
    this.logger.info(`Requesting summary from ${this.model} (${transcript.length} chars)`);

    const request = this.openai.chat.completions.create({
      model: this.model,
      messages: [
        { role: "system", content: SUMMARY_SYSTEM_PROMPT },
        { role: "user", content: transcript },
      ],
      temperature: 0.3,
    });

    let result: TimedResult<ChatCompletion>;
    try {
      result = await withTimeout(request, this.timeoutMs);
    } catch (err) {
      throw new SummaryUnavailableError(errorMessage(err), { cause: err });
    }

    if (result.timedOut) {
      // The request keeps running; make sure its eventual rejection is observed
      void request.catch((err: unknown) => {
        this.logger.warn(`Late summary request failure: ${errorMessage(err)}`);
      });
      throw new SummaryUnavailableError(`no response within ${this.timeoutMs}ms`);
    }

    const content = result.value.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new SummaryUnavailableError("LLM returned empty response");
    }
    return content;
  }
}
