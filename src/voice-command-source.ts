// Sideline Assessment - Voice Command Source
// Streams examiner audio to Deepgram live transcription and turns each final
// transcript into a Command for the router. Interim results are ignored so a
// phrase is acted on once, after the recognizer has settled on it.
//
// Audio format: mono LINEAR16 16kHz, the same frames the display client sends.

import type { LiveSchema } from "@deepgram/sdk";
import { LiveTranscriptionEvents } from "@deepgram/sdk";
import type { Command } from "./types.js";
import type { CommandParser } from "./command-parser.js";
import { createLogger, type Logger } from "./logger.js";

/** The slice of a Deepgram live connection this module uses. */
export interface LiveConnection {
  on(event: string, handler: (data: unknown) => void): void;
  send(data: ArrayBufferLike): void;
  requestClose(): void;
}

/** The slice of the Deepgram client this module uses. DeepgramClient satisfies it. */
export interface LiveTranscriber {
  listen: {
    live(options: LiveSchema): LiveConnection;
  };
}

const DEFAULT_LIVE_CONFIG: LiveSchema = {
  model: "nova-2",
  language: "en",
  encoding: "linear16",
  sample_rate: 16000,
  channels: 1,
  interim_results: true,
  punctuate: false,
  smart_format: false,
  endpointing: 300,
};

export interface VoiceCommandSourceOptions {
  config?: Partial<LiveSchema>;
  logger?: Logger;
  /** Every final transcript, matched or not. */
  onTranscript?: (text: string, command: Command | null) => void;
}

/**
 * Pull the transcript text out of a Deepgram "Results" event when it is final.
 * Returns null for interim results, silence and anything not shaped like a result.
 */
export function finalTranscriptOf(data: unknown): string | null {
  if (typeof data !== "object" || data === null) return null;
  if (!("is_final" in data) || data.is_final !== true) return null;
  if (!("channel" in data) || typeof data.channel !== "object" || data.channel === null) return null;
  if (!("alternatives" in data.channel) || !Array.isArray(data.channel.alternatives)) return null;

  const alternative: unknown = data.channel.alternatives[0];
  if (typeof alternative !== "object" || alternative === null || !("transcript" in alternative)) return null;
  const { transcript } = alternative;
  if (typeof transcript !== "string" || transcript.trim() === "") return null;
  return transcript.trim();
}

export class VoiceCommandSource {
  private readonly client: LiveTranscriber;
  private readonly parser: CommandParser;
  private readonly liveConfig: LiveSchema;
  private readonly options: VoiceCommandSourceOptions;
  private readonly logger: Logger;
  private connection: LiveConnection | null = null;
  private onCommand: ((command: Command) => void) | null = null;
  private _connectionLost = false;

  constructor(client: LiveTranscriber, parser: CommandParser, options: VoiceCommandSourceOptions = {}) {
    this.client = client;
    this.parser = parser;
    this.options = options;
    this.liveConfig = { ...DEFAULT_LIVE_CONFIG, ...options.config };
    this.logger = options.logger ?? createLogger("VoiceCommandSource");
  }

  get isListening(): boolean {
    return this.connection !== null;
  }

  /** True when the connection dropped or errored while listening. No reconnect is attempted. */
  get connectionLost(): boolean {
    return this._connectionLost;
  }

  /**
   * Open the live connection. Each final transcript that parses to a command
   * is passed to onCommand.
   *
   * @throws Error if already listening.
   */
  start(onCommand: (command: Command) => void): void {
    if (this.connection) {
      throw new Error("Voice command source already listening. Call stop() first.");
    }

    this._connectionLost = false;
    this.onCommand = onCommand;
    const connection = this.client.listen.live(this.liveConfig);
    this.connection = connection;

    connection.on(LiveTranscriptionEvents.Transcript, (data) => {
      const text = finalTranscriptOf(data);
      if (text !== null) this.handleTranscript(text);
    });

    connection.on(LiveTranscriptionEvents.Error, (error) => {
      this._connectionLost = true;
      this.logger.error(`Deepgram error: ${error instanceof Error ? error.message : String(error)}`);
    });

    connection.on(LiveTranscriptionEvents.Close, () => {
      // Still set means we did not initiate the close
      if (this.connection === connection) {
        this._connectionLost = true;
        this.logger.warn("Deepgram connection closed unexpectedly");
      }
    });

    this.logger.info("Listening for voice commands");
  }

  /** Forward one PCM frame. Dropped when not listening. */
  feedAudio(chunk: Buffer): void {
    if (!this.connection) return;
    const copy = new Uint8Array(chunk.byteLength);
    copy.set(chunk);
    this.connection.send(copy.buffer);
  }

  /**
   * Parse a recognized phrase and deliver the resulting command. Also the
   * entry point for typed utterances that bypass speech recognition.
   */
  handleTranscript(text: string): Command | null {
    const command = this.parser.parse(text);
    this.options.onTranscript?.(text, command);
    if (command === null) {
      this.logger.info(`No command in "${text}"`);
      return null;
    }
    this.onCommand?.(command);
    return command;
  }

  stop(): void {
    const connection = this.connection;
    if (!connection) return;
    this.connection = null;
    this.onCommand = null;

    try {
      connection.requestClose();
    } catch (err) {
      this.logger.warn(`Closing Deepgram connection failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
}
