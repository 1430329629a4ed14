// Sideline Assessment - Server Unit Tests
// WebSocket bridge, HTTP routes and client message validation.

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import {
  WebSocketDisplay,
  createAppServer,
  parseClientMessage,
  toCommand,
  type AppServer,
} from "./server.js";
import type { ModuleResult, ResultSink, ServerMessage } from "./types.js";
import { VoiceCommandSource, type LiveTranscriber } from "./voice-command-source.js";
import { CommandParser } from "./command-parser.js";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import { silentLogger } from "./logger.js";
import { isRecord } from "./utils.js";

// ─── Test Helpers ───────────────────────────────────────────────────────────────

const TEST_PORT = 0; // Let OS assign a random port

type MessageOfType<T extends ServerMessage["type"]> = Extract<ServerMessage, { type: T }>;

function isServerMessage(value: unknown): value is ServerMessage {
  return isRecord(value) && typeof value.type === "string";
}

function isOfType<T extends ServerMessage["type"]>(msg: ServerMessage, type: T): msg is MessageOfType<T> {
  return msg.type === type;
}

/**
 * A test WebSocket client that queues all incoming messages.
 * Messages are buffered so none are lost to race conditions.
 */
class TestClient {
  ws: WebSocket;
  private messageQueue: ServerMessage[] = [];
  private waiters: Array<(msg: ServerMessage) => void> = [];

  constructor(url: string) {
    this.ws = new WebSocket(url);
    this.ws.on("message", (data: WebSocket.RawData) => {
      const parsed: unknown = JSON.parse(data.toString());
      if (!isServerMessage(parsed)) return;
      const waiter = this.waiters.shift();
      if (waiter) {
        waiter(parsed);
      } else {
        this.messageQueue.push(parsed);
      }
    });
  }

  /** Wait for the WebSocket to open */
  async waitForOpen(): Promise<void> {
    if (this.ws.readyState === WebSocket.OPEN) return;
    return new Promise((resolve, reject) => {
      this.ws.on("open", resolve);
      this.ws.on("error", reject);
    });
  }

  /** Get the next message (from queue or wait for one) */
  nextMessage(timeoutMs = 3000): Promise<ServerMessage> {
    const queued = this.messageQueue.shift();
    if (queued) return Promise.resolve(queued);

    return new Promise((resolve, reject) => {
      const waiterFn = (msg: ServerMessage) => {
        clearTimeout(timer);
        resolve(msg);
      };
      const timer = setTimeout(() => {
        const idx = this.waiters.indexOf(waiterFn);
        if (idx >= 0) this.waiters.splice(idx, 1);
        reject(new Error(`nextMessage timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.waiters.push(waiterFn);
    });
  }

  /** Get the next message of a type that also passes `accept`, skipping the rest */
  async nextMessageOfType<T extends ServerMessage["type"]>(
    type: T,
    accept: (msg: MessageOfType<T>) => boolean = () => true,
    timeoutMs = 3000,
  ): Promise<MessageOfType<T>> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) throw new Error(`nextMessageOfType("${type}") timed out after ${timeoutMs}ms`);
      const msg = await this.nextMessage(remaining);
      if (isOfType(msg, type) && accept(msg)) return msg;
    }
  }

  sendJson(message: unknown): void {
    this.ws.send(JSON.stringify(message));
  }

  sendRaw(text: string): void {
    this.ws.send(text);
  }

  sendBinary(data: Buffer): void {
    this.ws.send(data);
  }

  close(): void {
    if (this.ws.readyState === WebSocket.OPEN || this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.close();
    }
  }
}

class MemorySink implements ResultSink {
  modules: ModuleResult[] = [];
  sessions = 0;

  async saveModuleResult(_session: unknown, result: ModuleResult): Promise<void> {
    this.modules.push(result);
  }

  async saveSession(): Promise<void> {
    this.sessions++;
  }
}

function createMockDeepgramClient() {
  const handlers: Record<string, Array<(data: unknown) => void>> = {};
  const liveClient = {
    on: vi.fn((event: string, handler: (data: unknown) => void) => {
      if (!handlers[event]) {
        handlers[event] = [];
      }
      handlers[event].push(handler);
    }),
    send: vi.fn((_data: ArrayBufferLike) => {}),
    requestClose: vi.fn(),
  };
  const client: LiveTranscriber = { listen: { live: vi.fn(() => liveClient) } };
  const emit = (event: string, data?: unknown) => {
    for (const handler of handlers[event] ?? []) handler(data);
  };
  return { client, liveClient, emit };
}

function getPort(server: AppServer): number {
  const addr = server.httpServer.address();
  if (typeof addr === "string" || addr === null) {
    throw new Error("Unexpected server address format");
  }
  return addr.port;
}

/** Creates a connected TestClient and consumes the initial session_state message */
async function connect(server: AppServer): Promise<TestClient> {
  const client = new TestClient(`ws://127.0.0.1:${getPort(server)}`);
  await client.waitForOpen();
  await client.nextMessageOfType("session_state");
  return client;
}

// ─── Message validation ─────────────────────────────────────────────────────────

describe("parseClientMessage", () => {
  it("parses a command with a payload", () => {
    expect(parseClientMessage('{"type":"command","command":{"type":"rate","value":3}}')).toEqual({
      type: "command",
      command: { type: "rate", value: 3 },
    });
  });

  it("rejects invalid JSON", () => {
    expect(() => parseClientMessage("{nope")).toThrow("Message is not valid JSON");
  });

  it("rejects an unknown command", () => {
    expect(() => parseClientMessage('{"type":"command","command":{"type":"fly"}}')).toThrow("Malformed command");
  });

  it("rejects an unknown session type", () => {
    expect(() => parseClientMessage('{"type":"start_session","sessionType":"quick"}')).toThrow(
      'sessionType must be "full" or "emergency"',
    );
  });

  it("parses an interaction report", () => {
    expect(parseClientMessage('{"type":"interaction","active":true}')).toEqual({ type: "interaction", active: true });
    expect(() => parseClientMessage('{"type":"interaction","active":"yes"}')).toThrow(
      "interaction active must be a boolean",
    );
  });

  it("rejects an unknown message type", () => {
    expect(() => parseClientMessage('{"type":"reboot"}')).toThrow("Unknown message type: reboot");
  });
});

describe("toCommand", () => {
  it("accepts well-formed commands", () => {
    expect(toCommand({ type: "markCorrect" })).toEqual({ type: "markCorrect" });
    expect(toCommand({ type: "setToggle", question: "mental", value: true })).toEqual({
      type: "setToggle",
      question: "mental",
      value: true,
    });
    expect(toCommand({ type: "recallWord", word: "harbor" })).toEqual({ type: "recallWord", word: "harbor" });
  });

  it("rejects missing or mistyped payloads", () => {
    expect(toCommand({ type: "rate", value: "3" })).toBeNull();
    expect(toCommand({ type: "setToggle", question: "social", value: true })).toBeNull();
    expect(toCommand("next")).toBeNull();
  });
});

describe("WebSocketDisplay", () => {
  it("sends requests and notifies listeners of real changes only", async () => {
    const sent: ServerMessage[] = [];
    const display = new WebSocketDisplay((m) => sent.push(m));
    const listener = vi.fn();
    const unsubscribe = display.onShownChanged(listener);

    await display.requestShow("balance");
    await display.requestHide();
    expect(sent).toEqual([
      { type: "display_request", action: "show", moduleId: "balance" },
      { type: "display_request", action: "hide", moduleId: null },
    ]);

    display.setShown(true);
    display.setShown(true);
    unsubscribe();
    display.setShown(false);
    expect(listener.mock.calls).toEqual([[true]]);
    expect(display.isShown).toBe(false);
  });
});

// ─── Server ─────────────────────────────────────────────────────────────────────

describe("Server", () => {
  let server: AppServer;
  let sink: MemorySink;
  let voice: ReturnType<typeof createMockDeepgramClient> | null;
  const clients: TestClient[] = [];

  async function startServer(withVoice = false): Promise<void> {
    sink = new MemorySink();
    voice = withVoice ? createMockDeepgramClient() : null;
    const deepgram = voice;
    server = createAppServer({
      logger: silentLogger,
      sink,
      helpAutoHideMs: 0,
      voiceSourceFactory: deepgram
        ? () => new VoiceCommandSource(deepgram.client, new CommandParser(), { logger: silentLogger })
        : undefined,
    });
    await server.listen(TEST_PORT);
  }

  async function client(): Promise<TestClient> {
    const c = await connect(server);
    clients.push(c);
    return c;
  }

  beforeEach(async () => {
    await startServer();
  });

  afterEach(async () => {
    for (const c of clients.splice(0)) c.close();
    await server.close();
  });

  it("answers the health check", async () => {
    const res = await fetch(`http://127.0.0.1:${getPort(server)}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok" });
  });

  it("reports no session before one starts", async () => {
    const res = await fetch(`http://127.0.0.1:${getPort(server)}/session`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "No session" });
  });

  it("runs the display handshake through a session and exit", async () => {
    const c = await client();
    c.sendJson({ type: "start_session", sessionType: "emergency" });

    expect(await c.nextMessageOfType("display_request")).toEqual({
      type: "display_request",
      action: "show",
      moduleId: "orientation",
    });
    c.sendJson({ type: "display_state", shown: true });
    await c.nextMessageOfType("session_state", (m) => {
      const state = m.snapshot?.state;
      return state?.phase === "moduleActive" && state.presentation === "shown";
    });

    c.sendJson({ type: "utterance", text: "correct" });
    const afterAnswer = await c.nextMessageOfType("session_state");
    expect(afterAnswer.snapshot?.scores.orientation).toBe(1);

    c.sendJson({ type: "command", command: { type: "completeModule" } });
    expect(await c.nextMessageOfType("display_request")).toEqual({
      type: "display_request",
      action: "hide",
      moduleId: null,
    });
    c.sendJson({ type: "display_state", shown: false });
    expect(await c.nextMessageOfType("display_request")).toEqual({
      type: "display_request",
      action: "show",
      moduleId: "immediateMemory",
    });

    const res = await fetch(`http://127.0.0.1:${getPort(server)}/session`);
    expect(await res.json()).toMatchObject({ currentModule: "immediateMemory" });

    c.sendJson({ type: "exit" });
    const finished = await c.nextMessageOfType("assessment_finished");
    expect(finished.outcome).toBe("exited");
    expect(finished.scores.orientation).toBe(1);
    expect(finished.scores.cognitiveTotal).toBe(1);

    await server.activeSession?.flush();
    expect(sink.modules.map((r) => r.kind)).toEqual(["orientation"]);
    expect(sink.sessions).toBe(1);
  });

  it("allows one running session across connections", async () => {
    const first = await client();
    const second = await client();
    first.sendJson({ type: "start_session", sessionType: "full" });
    await first.nextMessageOfType("display_request");

    second.sendJson({ type: "start_session", sessionType: "full" });
    const error = await second.nextMessageOfType("error");
    expect(error.message).toBe("Another connection is running a session");
  });

  it("shows help for the current context", async () => {
    const c = await client();
    c.sendJson({ type: "utterance", text: "help" });
    expect(await c.nextMessageOfType("help")).toEqual({
      type: "help",
      visible: true,
      commands: ['"Start concussion test"', '"Emergency assessment"', '"Help"'],
    });
  });

  it("reports unusable input as recoverable errors", async () => {
    const c = await client();

    c.sendRaw("{nope");
    expect(await c.nextMessageOfType("error")).toEqual({
      type: "error",
      message: "Message is not valid JSON",
      recoverable: true,
    });

    c.sendJson({ type: "utterance", text: "lovely weather" });
    expect((await c.nextMessageOfType("error")).message).toBe('No command recognized in "lovely weather"');

    c.sendJson({ type: "exit" });
    expect((await c.nextMessageOfType("error")).message).toBe("No assessment in progress");

    c.sendBinary(Buffer.from([1, 2]));
    expect((await c.nextMessageOfType("error")).message).toBe("Voice control is not active");
  });

  it("holds back spoken commands while the examiner works the screen", async () => {
    const c = await client();
    c.sendJson({ type: "start_session", sessionType: "emergency" });
    await c.nextMessageOfType("display_request");

    c.sendJson({ type: "interaction", active: true });
    c.sendJson({ type: "utterance", text: "correct" });
    c.sendJson({ type: "command", command: { type: "markIncorrect" } });
    await c.nextMessageOfType("session_state", (m) => m.snapshot?.controller?.position === 1);

    const answers = server.activeSession?.getResult("orientation")?.answers;
    expect(answers?.slice(0, 2)).toEqual([false, null]);
  });

  it("turns voice control off and on from an utterance", async () => {
    const c = await client();
    c.sendJson({ type: "start_session", sessionType: "emergency" });
    await c.nextMessageOfType("display_request");

    c.sendJson({ type: "utterance", text: "voice off" });
    expect(await c.nextMessageOfType("voice_state")).toEqual({ type: "voice_state", enabled: false });
    c.sendJson({ type: "utterance", text: "correct" });
    c.sendJson({ type: "utterance", text: "voice on" });
    expect(await c.nextMessageOfType("voice_state")).toEqual({ type: "voice_state", enabled: true });

    expect(server.activeSession?.getResult("orientation")?.answers[0]).toBeNull();
  });

  it("waits for pending result writes before closing", async () => {
    let saved = 0;
    const slowSink: ResultSink = {
      saveModuleResult: () => Promise.resolve(),
      saveSession: () =>
        new Promise((resolve) => {
          setTimeout(() => {
            saved++;
            resolve();
          }, 200);
        }),
    };
    const other = createAppServer({ logger: silentLogger, sink: slowSink });
    await other.listen(TEST_PORT);
    const c = await connect(other);

    c.sendJson({ type: "start_session", sessionType: "emergency" });
    await c.nextMessageOfType("display_request");
    c.sendJson({ type: "exit" });
    await c.nextMessageOfType("assessment_finished");
    expect(saved).toBe(0);

    await other.close();
    expect(saved).toBe(1);
  });

  it("exits the session when its connection drops", async () => {
    const c = await client();
    c.sendJson({ type: "start_session", sessionType: "emergency" });
    await c.nextMessageOfType("display_request");
    c.close();

    await vi.waitFor(() => {
      expect(server.activeSession?.state).toEqual({ phase: "finished", outcome: "exited" });
    });
  });

  describe("with voice control", () => {
    beforeEach(async () => {
      await server.close();
      await startServer(true);
    });

    it("streams audio and routes final transcripts", async () => {
      const c = await client();
      c.sendJson({ type: "start_session", sessionType: "emergency" });
      await c.nextMessageOfType("display_request");

      c.sendBinary(Buffer.from([1, 2, 3]));
      expect((await c.nextMessageOfType("error")).message).toBe(
        "Audio chunk byte length (3) is not a multiple of 2. Expected 16-bit aligned PCM data.",
      );

      c.sendBinary(Buffer.from([1, 2, 3, 4]));
      await vi.waitFor(() => {
        expect(voice?.liveClient.send).toHaveBeenCalledTimes(1);
      });

      voice?.emit(LiveTranscriptionEvents.Transcript, {
        is_final: true,
        channel: { alternatives: [{ transcript: "Correct." }] },
      });
      expect(server.activeSession?.getResult("orientation")?.answers[0]).toBe(true);
    });
  });
});
