// Meeting Scribe - Status server
// Express + WebSocket surface for the presentation layer: clients receive
// indicator and status updates, and send `toggle` to start or stop recording.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import { WebSocketServer, WebSocket } from "ws";
import { createLogger, type Logger } from "./logger.js";
import type { SessionController } from "./session-controller.js";
import type {
  ClientMessage,
  IndicatorColor,
  IndicatorSnapshot,
  ServerMessage,
  StatusIndicator,
  StatusUpdate,
} from "./types.js";

// ─── Indicator ──────────────────────────────────────────────────────────────────

/**
 * StatusIndicator backed by connected WebSocket clients. Tracks visibility and
 * color so late joiners get the current state, and forwards client toggles to
 * the registered handler.
 */
export class WebSocketIndicator implements StatusIndicator {
  private visible = false;
  private color: IndicatorColor = "gray";
  private toggleHandler: (() => void) | null = null;
  private readonly subscribers = new Set<(snapshot: IndicatorSnapshot) => void>();

  show(): void {
    if (this.visible) return;
    this.visible = true;
    this.publish();
  }

  hide(): void {
    if (!this.visible) return;
    this.visible = false;
    this.publish();
  }

  setColor(color: IndicatorColor): void {
    if (this.color === color) return;
    this.color = color;
    this.publish();
  }

  onToggle(handler: () => void): void {
    this.toggleHandler = handler;
  }

  /** Deliver a toggle request from a client. Returns false if nobody listens. */
  requestToggle(): boolean {
    if (!this.toggleHandler) return false;
    this.toggleHandler();
    return true;
  }

  snapshot(): IndicatorSnapshot {
    return { visible: this.visible, color: this.color };
  }

  subscribe(listener: (snapshot: IndicatorSnapshot) => void): () => void {
    this.subscribers.add(listener);
    return () => {
      this.subscribers.delete(listener);
    };
  }

  private publish(): void {
    const snapshot = this.snapshot();
    for (const listener of this.subscribers) {
      listener(snapshot);
    }
  }
}

// ─── Message helpers ────────────────────────────────────────────────────────────

export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

export function toStatusMessage(update: StatusUpdate): ServerMessage {
  return {
    type: "status",
    status: update.status,
    detail: update.detail,
    sessionId: update.sessionId,
    timestamp: update.timestamp.toISOString(),
  };
}

/** Validates an incoming client frame. Returns null for anything unrecognized. */
export function parseClientMessage(text: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  if (typeof parsed === "object" && parsed !== null && "type" in parsed && parsed.type === "toggle") {
    return { type: "toggle" };
  }
  return null;
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  controller: SessionController;
  indicator: WebSocketIndicator;
  logger?: Logger;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server. */
  close(): Promise<void>;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions): AppServer {
  const { controller, indicator, logger = createLogger("Server") } = options;

  const app = express();
  const httpServer = createServer(app);

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/status", (_req, res) => {
    const last = controller.getLastStatus();
    res.json({
      state: controller.state,
      status: last ? toStatusMessage(last) : null,
      session: controller.getSession(),
      meetingApp: controller.meetingApp,
      indicator: indicator.snapshot(),
    });
  });

  const wss = new WebSocketServer({ server: httpServer });

  const broadcast = (message: ServerMessage) => {
    for (const client of wss.clients) {
      sendMessage(client, message);
    }
  };

  const unsubscribeIndicator = indicator.subscribe((snapshot) => {
    broadcast({ type: "indicator", ...snapshot });
  });
  const unsubscribeStatus = controller.onStatus((update) => {
    broadcast(toStatusMessage(update));
  });

  wss.on("connection", (ws: WebSocket) => {
    logger.info(`Client connected (${wss.clients.size} total)`);

    sendMessage(ws, { type: "indicator", ...indicator.snapshot() });
    const last = controller.getLastStatus();
    if (last) sendMessage(ws, toStatusMessage(last));

    ws.on("message", (data: WebSocket.RawData, isBinary: boolean) => {
      if (isBinary) {
        sendMessage(ws, { type: "error", message: "Binary messages are not supported" });
        return;
      }
      const message = parseClientMessage(data.toString());
      if (!message) {
        sendMessage(ws, { type: "error", message: "Unrecognized message" });
        return;
      }
      logger.info("Toggle requested by client");
      if (!indicator.requestToggle()) {
        sendMessage(ws, { type: "error", message: "Recording control is not available" });
      }
    });

    ws.on("close", () => {
      logger.info(`Client disconnected (${wss.clients.size} remaining)`);
    });

    // Protocol violations (e.g. an invalid frame) surface here; ws closes the socket itself
    ws.on("error", (err: Error) => {
      logger.warn(`WebSocket error: ${err.message}`);
    });
  });

  return {
    app,
    httpServer,
    wss,
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.once("error", reject);
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
      });
    },
    close(): Promise<void> {
      unsubscribeIndicator();
      unsubscribeStatus();
      return new Promise((resolve, reject) => {
        for (const client of wss.clients) {
          client.close();
        }
        wss.close(() => {
          httpServer.close((err) => {
            if (err) reject(err);
            else resolve();
          });
        });
      });
    },
  };
}
