// Sideline Assessment - Configuration
// Reads settings from the environment (.env is loaded by the entry point via
// dotenv). Parsing is separate from process.env so tests can pass their own.

import { DEFAULT_BALANCE_WINDOW_MS } from "./module-controllers.js";
import { DEFAULT_CONFIRM_TIMEOUT_MS } from "./session-orchestrator.js";

export interface AppConfig {
  port: number;
  /** Voice control is disabled when absent. */
  deepgramApiKey: string | null;
  outputDir: string;
  displayConfirmTimeoutMs: number;
  wordListSize: 5 | 10;
  balanceWindowMs: number;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

type Env = Readonly<Record<string, string | undefined>>;

function positiveInt(env: Env, key: string, fallback: number): number {
  const raw = env[key]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`${key} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseConfig(env: Env): AppConfig {
  const port = positiveInt(env, "PORT", 3000);
  if (port > 65535) throw new ConfigError(`PORT must be at most 65535, got ${port}`);

  const wordListSize = positiveInt(env, "WORD_LIST_SIZE", 5);
  if (wordListSize !== 5 && wordListSize !== 10) {
    throw new ConfigError(`WORD_LIST_SIZE must be 5 or 10, got ${wordListSize}`);
  }

  return {
    port,
    deepgramApiKey: env.DEEPGRAM_API_KEY?.trim() || null,
    outputDir: env.OUTPUT_DIR?.trim() || "output",
    displayConfirmTimeoutMs: positiveInt(env, "DISPLAY_CONFIRM_TIMEOUT_MS", DEFAULT_CONFIRM_TIMEOUT_MS),
    wordListSize,
    balanceWindowMs: positiveInt(env, "BALANCE_WINDOW_MS", DEFAULT_BALANCE_WINDOW_MS),
  };
}

export function loadConfig(): AppConfig {
  return parseConfig(process.env);
}
