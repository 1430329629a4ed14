// Sideline Assessment - WebSocket Bridge and Express Server
// The rendering/display client connects over WebSocket. It drives the session
// (start, commands, typed utterances, exit), reports the immersive display's
// shown/hidden state and manual interaction back, and may stream examiner
// audio for voice control. Typed utterances count as voice input.
// The server answers with session snapshots, display requests and help lists.
//
// One assessment runs at a time: a second connection can watch /session but
// cannot start its own session while another is in progress.

import express, { type Express } from "express";
import { createServer, type Server as HttpServer } from "node:http";
import path from "node:path";
import { WebSocketServer, WebSocket, type RawData } from "ws";
import type {
  ClientMessage,
  Command,
  CommandContext,
  DisplayMode,
  ModuleId,
  ResultSink,
  ServerMessage,
  SessionType,
} from "./types.js";
import { CommandRouter, type CommandSource } from "./command-router.js";
import { CommandParser, isSimpleCommandType } from "./command-parser.js";
import { SessionOrchestrator } from "./session-orchestrator.js";
import type { ResultOptions } from "./module-results.js";
import type { VoiceCommandSource } from "./voice-command-source.js";
import { isRecord } from "./utils.js";
import { createLogger, type Logger } from "./logger.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

const COMMAND_CONTEXTS: ReadonlySet<string> = new Set<CommandContext>([
  "dashboard",
  "sessionStart",
  "module",
  "transition",
  "summary",
]);

// ─── Display over WebSocket ─────────────────────────────────────────────────────

/**
 * DisplayMode backed by the connected client. Requests go out as
 * display_request messages and resolve once sent; the client confirms with
 * display_state, which is the signal the orchestrator waits on.
 */
export class WebSocketDisplay implements DisplayMode {
  private shown = false;
  private readonly listeners = new Set<(shown: boolean) => void>();
  private readonly send: (message: ServerMessage) => void;

  constructor(send: (message: ServerMessage) => void) {
    this.send = send;
  }

  get isShown(): boolean {
    return this.shown;
  }

  requestShow(moduleId: ModuleId): Promise<void> {
    this.send({ type: "display_request", action: "show", moduleId });
    return Promise.resolve();
  }

  requestHide(): Promise<void> {
    this.send({ type: "display_request", action: "hide", moduleId: null });
    return Promise.resolve();
  }

  onShownChanged(listener: (shown: boolean) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Apply a display_state report. Listeners hear only actual changes. */
  setShown(shown: boolean): void {
    if (shown === this.shown) return;
    this.shown = shown;
    for (const listener of [...this.listeners]) {
      listener(shown);
    }
  }
}

// ─── Message validation ─────────────────────────────────────────────────────────

export class ProtocolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolError";
  }
}

/** Validate a command object received from a client. Returns null if malformed. */
export function toCommand(raw: unknown): Command | null {
  if (!isRecord(raw) || typeof raw.type !== "string") return null;
  const type = raw.type;
  if (isSimpleCommandType(type)) return { type };

  switch (type) {
    case "rate":
    case "setPercentNormal":
      return typeof raw.value === "number" ? { type, value: raw.value } : null;
    case "setSymptomRating":
      return typeof raw.symptom === "string" && typeof raw.rating === "number"
        ? { type, symptom: raw.symptom, rating: raw.rating }
        : null;
    case "setToggle":
      return (raw.question === "physical" || raw.question === "mental") && typeof raw.value === "boolean"
        ? { type, question: raw.question, value: raw.value }
        : null;
    case "digitResponse":
      return typeof raw.text === "string" ? { type, text: raw.text } : null;
    case "recallWord":
      return typeof raw.word === "string" ? { type, word: raw.word } : null;
    default:
      return null;
  }
}

function isSessionType(value: unknown): value is SessionType {
  return value === "full" || value === "emergency";
}

function isCommandContext(value: unknown): value is CommandContext {
  return typeof value === "string" && COMMAND_CONTEXTS.has(value);
}

/** Parse one JSON text frame into a ClientMessage. Throws ProtocolError. */
export function parseClientMessage(text: string): ClientMessage {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new ProtocolError("Message is not valid JSON");
  }
  if (!isRecord(raw) || typeof raw.type !== "string") {
    throw new ProtocolError("Message must be an object with a string type");
  }

  switch (raw.type) {
    case "start_session":
      if (!isSessionType(raw.sessionType)) throw new ProtocolError('sessionType must be "full" or "emergency"');
      return { type: "start_session", sessionType: raw.sessionType };
    case "command": {
      const command = toCommand(raw.command);
      if (!command) throw new ProtocolError("Malformed command");
      return { type: "command", command };
    }
    case "utterance":
      if (typeof raw.text !== "string") throw new ProtocolError("utterance text must be a string");
      return { type: "utterance", text: raw.text };
    case "display_state":
      if (typeof raw.shown !== "boolean") throw new ProtocolError("display_state shown must be a boolean");
      return { type: "display_state", shown: raw.shown };
    case "context":
      if (!isCommandContext(raw.context)) throw new ProtocolError("Unknown context");
      return { type: "context", context: raw.context };
    case "interaction":
      if (typeof raw.active !== "boolean") throw new ProtocolError("interaction active must be a boolean");
      return { type: "interaction", active: raw.active };
    case "exit":
      return { type: "exit" };
    default:
      throw new ProtocolError(`Unknown message type: ${raw.type}`);
  }
}

// ─── Server Factory ─────────────────────────────────────────────────────────────

export interface CreateServerOptions {
  /** Directory to serve static files from. Defaults to "public" relative to cwd. */
  staticDir?: string;
  logger?: Logger;
  sink?: ResultSink;
  parser?: CommandParser;
  /** Creates a voice source per session. Voice control is off when omitted. */
  voiceSourceFactory?: () => VoiceCommandSource;
  resultOptions?: ResultOptions;
  confirmTimeoutMs?: number;
  balanceWindowMs?: number;
  helpAutoHideMs?: number;
}

export interface AppServer {
  app: Express;
  httpServer: HttpServer;
  wss: WebSocketServer;
  /** The session currently in progress or most recently run, if any. */
  readonly activeSession: SessionOrchestrator | null;
  /** Start listening on the given port. Returns a promise that resolves when listening. */
  listen(port: number): Promise<void>;
  /** Gracefully shut down the server once pending result writes have settled. */
  close(): Promise<void>;
}

interface ServerContext {
  options: CreateServerOptions;
  parser: CommandParser;
  logger: Logger;
  active: { session: SessionOrchestrator | null; owner: WebSocket | null };
}

interface ConnectionState {
  id: number;
  router: CommandRouter;
  display: WebSocketDisplay;
  session: SessionOrchestrator | null;
  voice: VoiceCommandSource | null;
}

/**
 * Creates the Express app, HTTP server, and WebSocket server.
 * Does NOT start listening; call `listen(port)` explicitly.
 */
export function createAppServer(options: CreateServerOptions = {}): AppServer {
  const {
    staticDir = path.resolve(process.cwd(), "public"),
    logger = createLogger("Server"),
    parser = new CommandParser(),
  } = options;

  const ctx: ServerContext = { options, parser, logger, active: { session: null, owner: null } };

  const app = express();
  const httpServer = createServer(app);

  app.use(express.static(staticDir));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok" });
  });

  app.get("/session", (_req, res) => {
    const session = ctx.active.session;
    if (!session) {
      res.status(404).json({ error: "No session" });
      return;
    }
    res.json(session.snapshot());
  });

  const wss = new WebSocketServer({ server: httpServer });
  let nextConnectionId = 1;

  wss.on("connection", (ws: WebSocket) => {
    handleConnection(ws, nextConnectionId++, ctx);
  });

  return {
    app,
    httpServer,
    wss,
    get activeSession() {
      return ctx.active.session;
    },
    listen(port: number): Promise<void> {
      return new Promise((resolve, reject) => {
        httpServer.listen(port, () => {
          logger.info(`Server listening on port ${port}`);
          resolve();
        });
        httpServer.on("error", reject);
      });
    },
    async close(): Promise<void> {
      await ctx.active.session?.flush();
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

// ─── WebSocket Connection Handler ───────────────────────────────────────────────

function handleConnection(ws: WebSocket, id: number, ctx: ServerContext): void {
  const { logger } = ctx;
  const connState: ConnectionState = {
    id,
    router: new CommandRouter({
      logger: ctx.options.logger ?? createLogger(`CommandRouter#${id}`),
      helpAutoHideMs: ctx.options.helpAutoHideMs,
      onHelpChanged: (visible, commands) => sendMessage(ws, { type: "help", visible, commands }),
      onRepeat: () => sendSnapshot(ws, connState),
      onExit: () => exitSession(ws, connState, logger),
      onVoiceChanged: (enabled) => sendMessage(ws, { type: "voice_state", enabled }),
    }),
    display: new WebSocketDisplay((message) => sendMessage(ws, message)),
    session: null,
    voice: null,
  };

  logger.info(`New WebSocket connection #${id}`);
  sendSnapshot(ws, connState);

  ws.on("message", (data: RawData, isBinary: boolean) => {
    try {
      if (isBinary) {
        handleAudio(ws, toBuffer(data), connState);
      } else {
        handleClientMessage(ws, parseClientMessage(toBuffer(data).toString("utf-8")), connState, ctx);
      }
    } catch (err) {
      const errorMessage = err instanceof Error ? err.message : String(err);
      logger.error(`Error handling message on connection #${id}: ${errorMessage}`);
      sendMessage(ws, { type: "error", message: errorMessage, recoverable: true });
    }
  });

  ws.on("close", () => {
    logger.info(`WebSocket #${id} closed`);
    cleanupConnection(ws, connState, ctx);
  });

  ws.on("error", (err) => {
    logger.error(`WebSocket error on connection #${id}: ${err.message}`);
    cleanupConnection(ws, connState, ctx);
  });
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

// ─── Client Message Handler ─────────────────────────────────────────────────────

function handleClientMessage(ws: WebSocket, message: ClientMessage, connState: ConnectionState, ctx: ServerContext): void {
  switch (message.type) {
    case "start_session":
      handleStartSession(ws, message.sessionType, connState, ctx);
      break;

    case "command":
      routeCommand(ws, message.command, connState);
      break;

    case "utterance": {
      const command = ctx.parser.parse(message.text);
      if (!command) {
        sendMessage(ws, { type: "error", message: `No command recognized in "${message.text}"`, recoverable: true });
        return;
      }
      routeCommand(ws, command, connState, "voice");
      break;
    }

    case "display_state":
      connState.display.setShown(message.shown);
      break;

    case "context":
      if (isRunning(connState.session)) {
        sendMessage(ws, {
          type: "error",
          message: "Context is managed by the session while an assessment is running",
          recoverable: true,
        });
        return;
      }
      connState.router.setContext(message.context);
      break;

    case "interaction":
      connState.router.setUserInteracting(message.active);
      break;

    case "exit":
      exitSession(ws, connState, ctx.logger);
      break;

    default: {
      const exhaustiveCheck: never = message;
      throw new ProtocolError(`Unhandled message: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

// ─── Session lifecycle ──────────────────────────────────────────────────────────

function isRunning(session: SessionOrchestrator | null): session is SessionOrchestrator {
  return session !== null && session.state.phase !== "finished";
}

function handleStartSession(ws: WebSocket, sessionType: SessionType, connState: ConnectionState, ctx: ServerContext): void {
  const { logger, options } = ctx;

  if (isRunning(ctx.active.session)) {
    sendMessage(ws, {
      type: "error",
      message: ctx.active.owner === ws ? "A session is already in progress" : "Another connection is running a session",
      recoverable: true,
    });
    return;
  }

  const session = new SessionOrchestrator({
    display: connState.display,
    router: connState.router,
    sessionType,
    sink: options.sink,
    resultOptions: options.resultOptions,
    confirmTimeoutMs: options.confirmTimeoutMs,
    balanceWindowMs: options.balanceWindowMs,
    logger: options.logger ?? createLogger(`SessionOrchestrator#${connState.id}`),
    onStateChange: () => sendSnapshot(ws, connState),
    onFinished: (_session, scores) => {
      stopVoice(connState);
      sendMessage(ws, { type: "assessment_finished", outcome: "completed", scores });
    },
    onExited: (_session, scores) => {
      stopVoice(connState);
      sendMessage(ws, { type: "assessment_finished", outcome: "exited", scores });
    },
  });

  connState.session = session;
  ctx.active.session = session;
  ctx.active.owner = ws;

  if (options.voiceSourceFactory) {
    const voice = options.voiceSourceFactory();
    connState.voice = voice;
    voice.start((command) => routeCommand(ws, command, connState, "voice"));
  }

  logger.info(`Starting ${sessionType} session ${session.id} on connection #${connState.id}`);
  session.start();
}

function routeCommand(ws: WebSocket, command: Command, connState: ConnectionState, source: CommandSource = "manual"): void {
  const outcome = connState.router.route(command, source);
  if (outcome === "dispatched") {
    sendSnapshot(ws, connState);
  }
}

function exitSession(ws: WebSocket, connState: ConnectionState, logger: Logger): void {
  const session = connState.session;
  if (!isRunning(session)) {
    sendMessage(ws, { type: "error", message: "No assessment in progress", recoverable: true });
    return;
  }
  void session.exit().catch((err: unknown) => {
    const errorMessage = err instanceof Error ? err.message : String(err);
    logger.error(`Exit failed for session ${session.id}: ${errorMessage}`);
    sendMessage(ws, { type: "error", message: errorMessage, recoverable: false });
  });
}

// ─── Audio ──────────────────────────────────────────────────────────────────────

function handleAudio(ws: WebSocket, data: Buffer, connState: ConnectionState): void {
  if (!connState.voice) {
    sendMessage(ws, { type: "error", message: "Voice control is not active", recoverable: true });
    return;
  }

  // 16-bit PCM = 2 bytes per sample
  if (data.length % 2 !== 0) {
    sendMessage(ws, {
      type: "error",
      message: `Audio chunk byte length (${data.length}) is not a multiple of 2. Expected 16-bit aligned PCM data.`,
      recoverable: true,
    });
    return;
  }

  connState.voice.feedAudio(data);
}

function stopVoice(connState: ConnectionState): void {
  connState.voice?.stop();
  connState.voice = null;
}

// ─── Message Sending ────────────────────────────────────────────────────────────

function sendSnapshot(ws: WebSocket, connState: ConnectionState): void {
  sendMessage(ws, { type: "session_state", snapshot: connState.session?.snapshot() ?? null });
}

/**
 * Sends a ServerMessage to the client as JSON text.
 * Silently ignores if the WebSocket is not in OPEN state.
 */
export function sendMessage(ws: WebSocket, message: ServerMessage): void {
  if (ws.readyState === WebSocket.OPEN) {
    ws.send(JSON.stringify(message));
  }
}

// ─── Connection Cleanup ─────────────────────────────────────────────────────────

function cleanupConnection(ws: WebSocket, connState: ConnectionState, ctx: ServerContext): void {
  stopVoice(connState);
  connState.router.dispose();

  const session = connState.session;
  if (isRunning(session)) {
    ctx.logger.warn(`Connection #${connState.id} dropped mid-assessment; exiting session ${session.id}`);
    void session.exit().catch((err: unknown) => {
      ctx.logger.error(`Exit on disconnect failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  }
  if (ctx.active.owner === ws) {
    ctx.active.owner = null;
  }
}
