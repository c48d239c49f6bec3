// Meeting Scribe - Entry point
// Wires up the presence monitor, worker supervisor, merge and summary steps,
// and starts the status server.

import "dotenv/config";
import OpenAI from "openai";
import { ConfigError, loadConfig, workerScriptPaths, type AppConfig } from "./config.js";
import { MergeEngine } from "./merge-engine.js";
import { PresenceMonitor } from "./presence-monitor.js";
import { createAppServer, WebSocketIndicator } from "./server.js";
import { SessionController } from "./session-controller.js";
import { SummaryGenerator } from "./summary-generator.js";
import type { OpenAIChatClient } from "./summary-generator.js";
import { WorkerSupervisor, supportsCooperativeStop } from "./worker-supervisor.js";
import { fileExists } from "./utils/file-exists.js";
import { errorMessage } from "./errors.js";

export const APP_NAME = "Meeting Scribe";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

function loadConfigOrExit(): AppConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logFatal(err.message);
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  // ─── Configuration ──────────────────────────────────────────────────────────

  const config = loadConfigOrExit();

  logInit(`Working directory: ${config.workDir}`);

  const scripts = workerScriptPaths(config);
  const present = await Promise.all(scripts.map((script) => fileExists(script)));
  const missingScripts = scripts.filter((_, i) => !present[i]);
  if (missingScripts.length > 0) {
    logFatal(`Missing worker scripts: ${missingScripts.join(", ")}`);
    process.exit(1);
  }

  // ─── Pipeline components ────────────────────────────────────────────────────

  logInit("Initializing WorkerSupervisor...");
  const supervisor = new WorkerSupervisor({
    workers: config.workers,
    cwd: config.workDir,
    settleDelayMs: config.workerSettleMs,
  });
  if (!supportsCooperativeStop(process.platform)) {
    logInit("Workers cannot be interrupted on this platform; stopping a recording kills them without a transcript flush");
  }

  logInit("Initializing MergeEngine...");
  const mergeEngine = new MergeEngine(config.artifacts);

  let summaryGenerator: SummaryGenerator | undefined;
  if (config.openaiApiKey) {
    logInit(`Initializing SummaryGenerator (${config.summaryModel})...`);
    const openaiClient = new OpenAI({ apiKey: config.openaiApiKey });
    summaryGenerator = new SummaryGenerator(openaiClient as unknown as OpenAIChatClient, {
      model: config.summaryModel,
      timeoutMs: config.summaryTimeoutMs,
    });
  } else {
    logInit("OPENAI_API_KEY is not set — summaries disabled, sessions will complete as partial");
  }

  const indicator = new WebSocketIndicator();

  logInit("Wiring SessionController...");
  const controller = new SessionController({
    supervisor,
    mergeEngine,
    summaryGenerator,
    indicator,
    artifacts: config.artifacts,
    timing: {
      stopTimeoutMs: config.workerStopTimeoutMs,
      artifactPollIntervalMs: config.artifactPollMs,
      artifactWaitTimeoutMs: config.artifactWaitTimeoutMs,
    },
  });

  const monitor = new PresenceMonitor(
    { pollIntervalMs: config.presencePollMs },
    {
      onEntered: (app) => controller.handleMeetingEntered(app),
      onExited: (app) => controller.handleMeetingExited(app),
    },
  );

  // ─── Start ──────────────────────────────────────────────────────────────────

  const server = createAppServer({ controller, indicator });
  await server.listen(config.port);
  monitor.start();

  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit("Pipeline: presence → workers → transcripts → merge → summary");

  let shuttingDown = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logInit(`Received ${signal}, shutting down...`);
    monitor.stop();
    controller
      .shutdown()
      .then(() => server.close())
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${errorMessage(err)}`);
        process.exit(1);
      });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  logFatal(errorMessage(err));
  process.exit(1);
});
