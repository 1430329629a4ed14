// Sideline Assessment - Entry point
// Loads configuration, wires the engine's collaborators and starts the server.

import "dotenv/config";
import { createClient as createDeepgramClient } from "@deepgram/sdk";
import { createAppServer } from "./server.js";
import { loadConfig, type AppConfig } from "./config.js";
import { CommandParser } from "./command-parser.js";
import { FilePersistence } from "./file-persistence.js";
import { VoiceCommandSource } from "./voice-command-source.js";
import { DIGIT_SEQUENCES, WORD_LISTS } from "./module-results.js";

export const APP_NAME = "Sideline Assessment Engine";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  logFatal(err instanceof Error ? err.message : String(err));
  process.exit(1);
}

// ─── Collaborators ──────────────────────────────────────────────────────────────

logInit("Loading command phrases...");
const parser = new CommandParser();

logInit(`Initializing FilePersistence (${config.outputDir}/)...`);
const filePersistence = new FilePersistence(config.outputDir);

let voiceSourceFactory: (() => VoiceCommandSource) | undefined;
const deepgramKey = config.deepgramApiKey;
if (deepgramKey) {
  logInit("Creating Deepgram client for voice commands...");
  const deepgramClient = createDeepgramClient(deepgramKey);
  voiceSourceFactory = () => new VoiceCommandSource(deepgramClient, parser);
} else {
  logInit("DEEPGRAM_API_KEY not set; voice commands disabled (typed utterances still work)");
}

// ─── Start server ───────────────────────────────────────────────────────────────

const server = createAppServer({
  parser,
  sink: filePersistence,
  voiceSourceFactory,
  resultOptions: { wordList: WORD_LISTS[config.wordListSize], digitSequences: DIGIT_SEQUENCES },
  confirmTimeoutMs: config.displayConfirmTimeoutMs,
  balanceWindowMs: config.balanceWindowMs,
});

server
  .listen(config.port)
  .then(() => {
    logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
    logInit("Ready for connections");
  })
  .catch((err: unknown) => {
    logFatal(`Failed to start server: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  });
