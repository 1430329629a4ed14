// Sideline Assessment - Command Parser
// Turns one recognized utterance into a Command. Phrase tables live in
// data/command-phrases.json; matching is on whole words of the normalized text.
//
// Match order, first hit wins:
//   1. exact phrase
//   2. percent of normal ("80 percent", "percent normal 75")
//   3. symptom keyword + rating ("headache four", "set neck pain to 3")
//   4. symptom toggle ("physical yes", "mental no")
//   5. bare rating ("three", "5") and "rate"/"set" + rating
//   6. digit response ("seven two four", "digits 7 2 4")
//   7. recalled word ("recall harbor")
//   8. partial phrase anywhere in the utterance

import { readFileSync } from "node:fs";
import type { Command, CommandType, SymptomToggle } from "./types.js";
import { isRecord, normalizeUtterance } from "./utils.js";
import { MAX_SYMPTOM_RATING } from "./scoring.js";

// ─── Phrase table ───────────────────────────────────────────────────────────────

const SIMPLE_COMMAND_TYPES = [
  "next",
  "previous",
  "goBack",
  "markCorrect",
  "markIncorrect",
  "completeModule",
  "skipModule",
  "showHelp",
  "hideHelp",
  "toggleHelp",
  "repeat",
  "exitAssessment",
  "enableVoice",
  "disableVoice",
  "nextTrial",
  "startTimer",
  "stopTimer",
  "addError",
  "resetTest",
] as const satisfies readonly CommandType[];

/** Commands that carry no payload and can be named directly in the phrase table. */
export type SimpleCommandType = (typeof SIMPLE_COMMAND_TYPES)[number];

const SIMPLE_COMMAND_SET: ReadonlySet<string> = new Set<string>(SIMPLE_COMMAND_TYPES);

export function isSimpleCommandType(value: string): value is SimpleCommandType {
  return SIMPLE_COMMAND_SET.has(value);
}

export interface PhraseTable {
  exact: ReadonlyMap<string, SimpleCommandType>;
  /** Checked in order; put longer phrases first. */
  partial: ReadonlyArray<readonly [string, SimpleCommandType]>;
  numberWords: ReadonlyMap<string, number>;
  /** Spoken keyword → checklist symptom name. */
  symptoms: ReadonlyArray<readonly [string, string]>;
  toggles: readonly SymptomToggle[];
  digitPrefixes: readonly string[];
  recallPrefixes: readonly string[];
}

export class PhraseTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PhraseTableError";
  }
}

const DEFAULT_PHRASES_URL = new URL("../data/command-phrases.json", import.meta.url);

function stringList(raw: Record<string, unknown>, key: string): string[] {
  const value = raw[key];
  if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
    throw new PhraseTableError(`"${key}" must be an array of strings`);
  }
  return value.map(normalizeUtterance);
}

function commandType(value: unknown, where: string): SimpleCommandType {
  if (typeof value !== "string" || !isSimpleCommandType(value)) {
    throw new PhraseTableError(`${where}: unknown command "${String(value)}"`);
  }
  return value;
}

/** Validate a parsed phrase file. Throws PhraseTableError on the first problem. */
export function parsePhraseTable(raw: unknown): PhraseTable {
  if (!isRecord(raw)) throw new PhraseTableError("Phrase table must be an object");

  const { exact, partial, numberWords, symptoms } = raw;
  if (!isRecord(exact)) throw new PhraseTableError('"exact" must be an object');
  if (!Array.isArray(partial)) throw new PhraseTableError('"partial" must be an array');
  if (!isRecord(numberWords)) throw new PhraseTableError('"numberWords" must be an object');
  if (!isRecord(symptoms)) throw new PhraseTableError('"symptoms" must be an object');

  const exactMap = new Map<string, SimpleCommandType>();
  for (const [phrase, type] of Object.entries(exact)) {
    exactMap.set(normalizeUtterance(phrase), commandType(type, `exact "${phrase}"`));
  }

  const partialEntries: unknown[] = partial;
  const partialList: Array<readonly [string, SimpleCommandType]> = [];
  for (const entry of partialEntries) {
    if (!Array.isArray(entry) || entry.length !== 2 || typeof entry[0] !== "string") {
      throw new PhraseTableError(`partial entry ${JSON.stringify(entry)} must be [phrase, command]`);
    }
    partialList.push([normalizeUtterance(entry[0]), commandType(entry[1], `partial "${entry[0]}"`)]);
  }

  const numbers = new Map<string, number>();
  for (const [word, n] of Object.entries(numberWords)) {
    if (typeof n !== "number" || !Number.isInteger(n) || n < 0 || n > 9) {
      throw new PhraseTableError(`number word "${word}" must map to a digit`);
    }
    numbers.set(word.toLowerCase(), n);
  }

  const symptomList: Array<readonly [string, string]> = [];
  for (const [keyword, name] of Object.entries(symptoms)) {
    if (typeof name !== "string") throw new PhraseTableError(`symptom "${keyword}" must map to a name`);
    symptomList.push([normalizeUtterance(keyword), name]);
  }

  const toggles = stringList(raw, "toggles").map((t) => {
    if (t !== "physical" && t !== "mental") throw new PhraseTableError(`unknown toggle "${t}"`);
    return t;
  });

  return {
    exact: exactMap,
    partial: partialList,
    numberWords: numbers,
    symptoms: symptomList,
    toggles,
    digitPrefixes: stringList(raw, "digitPrefixes"),
    recallPrefixes: stringList(raw, "recallPrefixes"),
  };
}

export function loadPhraseTable(url: URL = DEFAULT_PHRASES_URL): PhraseTable {
  const raw: unknown = JSON.parse(readFileSync(url, "utf-8"));
  return parsePhraseTable(raw);
}

// ─── Parser ─────────────────────────────────────────────────────────────────────

function containsPhrase(text: string, phrase: string): boolean {
  return ` ${text} `.includes(` ${phrase} `);
}

export class CommandParser {
  private readonly table: PhraseTable;

  constructor(table: PhraseTable = loadPhraseTable()) {
    this.table = table;
  }

  /** Parse an utterance. Returns null when nothing matches. */
  parse(utterance: string): Command | null {
    const text = normalizeUtterance(utterance);
    if (text === "") return null;
    const tokens = text.split(" ");

    const exact = this.table.exact.get(text);
    if (exact) return { type: exact };

    return (
      this.parsePercentNormal(text, tokens) ??
      this.parseSymptomRating(text, tokens) ??
      this.parseToggle(text, tokens) ??
      this.parseRating(text, tokens) ??
      this.parseDigitResponse(tokens) ??
      this.parseRecall(tokens) ??
      this.parsePartial(text)
    );
  }

  private parsePercentNormal(text: string, tokens: string[]): Command | null {
    if (!containsPhrase(text, "percent") && !containsPhrase(text, "normal") && !text.includes("%")) return null;
    for (const token of tokens) {
      const match = /^(\d+)%?$/.exec(token);
      if (!match) continue;
      const value = Number(match[1]);
      return value <= 100 ? { type: "setPercentNormal", value } : null;
    }
    return null;
  }

  private parseSymptomRating(text: string, tokens: string[]): Command | null {
    for (const [keyword, symptom] of this.table.symptoms) {
      if (!containsPhrase(text, keyword)) continue;
      const rating = this.extractRating(tokens);
      if (rating !== null) return { type: "setSymptomRating", symptom, rating };
    }
    return null;
  }

  private parseToggle(text: string, tokens: string[]): Command | null {
    for (const question of this.table.toggles) {
      if (!containsPhrase(text, question)) continue;
      if (tokens.includes("yes")) return { type: "setToggle", question, value: true };
      if (tokens.includes("no")) return { type: "setToggle", question, value: false };
    }
    return null;
  }

  private parseRating(text: string, tokens: string[]): Command | null {
    const standalone = this.ratingOf(text);
    if (standalone !== null) return { type: "rate", value: standalone };

    if (tokens.includes("rate") || tokens.includes("set")) {
      const rating = this.extractRating(tokens);
      if (rating !== null) return { type: "rate", value: rating };
    }
    return null;
  }

  /**
   * A run of spoken or written digits, optionally after a prefix such as
   * "digits". Needs at least two digits so a bare rating stays a rating.
   */
  private parseDigitResponse(tokens: string[]): Command | null {
    const body = this.table.digitPrefixes.includes(tokens[0]) ? tokens.slice(1) : tokens;
    let digits = "";
    for (const token of body) {
      if (/^\d+$/.test(token)) {
        digits += token;
        continue;
      }
      const n = this.table.numberWords.get(token);
      if (n === undefined) return null;
      digits += String(n);
    }
    return digits.length >= 2 ? { type: "digitResponse", text: digits } : null;
  }

  private parseRecall(tokens: string[]): Command | null {
    if (tokens.length < 2 || !this.table.recallPrefixes.includes(tokens[0])) return null;
    return { type: "recallWord", word: tokens.slice(1).join(" ") };
  }

  private parsePartial(text: string): Command | null {
    for (const [phrase, type] of this.table.partial) {
      if (containsPhrase(text, phrase)) return { type };
    }
    return null;
  }

  /** A single token that is a rating 0–6, as digits or a number word. */
  private ratingOf(token: string): number | null {
    const n = /^\d+$/.test(token) ? Number(token) : this.table.numberWords.get(token);
    return n !== undefined && n <= MAX_SYMPTOM_RATING ? n : null;
  }

  /** First rating-shaped token anywhere in the utterance. */
  private extractRating(tokens: string[]): number | null {
    for (const token of tokens) {
      const n = this.ratingOf(token);
      if (n !== null) return n;
    }
    return null;
  }
}
