// Sideline Assessment - Scoring Rules
// Pure, total functions from raw module responses to sub-scores.
// Degenerate input (empty lists, NaN, negative counts) scores 0, never throws.

import type { ModuleResult, ScoreSummary } from "./types.js";
import { digitsOnly, normalizeWord } from "./utils.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const ORIENTATION_QUESTION_COUNT = 5;

/** Digit span presentation stops after this many misses in a row. */
export const DIGIT_SPAN_STOP_AFTER_FAILS = 2;

export const MONTHS_REVERSE_POINTS = 1;

export const MEMORY_TRIAL_COUNT = 3;

export const MAX_BALANCE_ERRORS_PER_TRIAL = 10;

export const MAX_SYMPTOM_RATING = 6;

// ─── Orientation ────────────────────────────────────────────────────────────────

/**
 * One point per correctly answered question. Only the first five answers
 * count; unanswered (null) questions score nothing.
 */
export function scoreOrientation(answers: ReadonlyArray<boolean | null>): number {
  return answers.slice(0, ORIENTATION_QUESTION_COUNT).filter((a) => a === true).length;
}

// ─── Concentration: digit span backwards ────────────────────────────────────────

/** The response a presented sequence expects: its digits in reverse, as text. */
export function expectedDigitResponse(sequence: readonly number[]): string {
  return sequence
    .slice()
    .reverse()
    .map((d) => String(d))
    .join("");
}

/**
 * 1 if the response, stripped to its digits, equals the reversed sequence
 * character for character; otherwise 0. An empty sequence never matches.
 */
export function scoreDigitResponse(sequence: readonly number[], response: string): 0 | 1 {
  if (sequence.length === 0) return 0;
  return digitsOnly(response) === expectedDigitResponse(sequence) ? 1 : 0;
}

export interface DigitSpanOutcome {
  score: number;
  consecutiveFails: number;
  /** Number of responses that were actually scored (responses past the stop point are ignored). */
  attempted: number;
  /** Two misses in a row: no further sequence may be presented. */
  stopped: boolean;
  /** Every sequence has a scored response. */
  exhausted: boolean;
}

/**
 * Replays the responses in presentation order. Scoring halts at the second
 * consecutive miss; anything recorded after that point is not counted.
 */
export function scoreDigitSpan(
  sequences: ReadonlyArray<readonly number[]>,
  responses: readonly string[],
): DigitSpanOutcome {
  let score = 0;
  let consecutiveFails = 0;
  let attempted = 0;

  const limit = Math.min(sequences.length, responses.length);
  for (let i = 0; i < limit; i++) {
    if (consecutiveFails >= DIGIT_SPAN_STOP_AFTER_FAILS) break;
    attempted++;
    if (scoreDigitResponse(sequences[i], responses[i]) === 1) {
      score++;
      consecutiveFails = 0;
    } else {
      consecutiveFails++;
    }
  }

  const stopped = consecutiveFails >= DIGIT_SPAN_STOP_AFTER_FAILS;
  return { score, consecutiveFails, attempted, stopped, exhausted: attempted >= sequences.length };
}

// ─── Concentration: months in reverse ───────────────────────────────────────────

export function scoreMonthsReverse(correct: boolean | null): number {
  return correct === true ? MONTHS_REVERSE_POINTS : 0;
}

// ─── Memory ─────────────────────────────────────────────────────────────────────

function normalizedSet(words: readonly string[]): Set<string> {
  const set = new Set<string>();
  for (const word of words) {
    const normalized = normalizeWord(word);
    if (normalized.length > 0) set.add(normalized);
  }
  return set;
}

/**
 * |presented ∩ recalled| after normalization. Recall order and duplicates do
 * not matter. Capped at the presented list length.
 */
export function scoreRecall(presented: readonly string[], recalled: readonly string[]): number {
  const target = normalizedSet(presented);
  let hits = 0;
  for (const word of normalizedSet(recalled)) {
    if (target.has(word)) hits++;
  }
  return Math.min(hits, presented.length);
}

/** Immediate memory trial score. Same rule as delayed recall. */
export const scoreMemoryTrial = scoreRecall;

/**
 * Delayed recall is always scored against the word list of the first
 * immediate-memory trial.
 */
export function scoreDelayedRecall(
  trials: ReadonlyArray<{ words: readonly string[] }>,
  recalled: readonly string[],
): number {
  if (trials.length === 0) return 0;
  return scoreRecall(trials[0].words, recalled);
}

// ─── Balance ────────────────────────────────────────────────────────────────────

export function scoreBalanceTrial(errorCount: number): number {
  if (!Number.isFinite(errorCount) || errorCount <= 0) return 0;
  return Math.min(Math.floor(errorCount), MAX_BALANCE_ERRORS_PER_TRIAL);
}

export function scoreBalance(errorCounts: readonly number[]): number {
  return errorCounts.reduce((sum, count) => sum + scoreBalanceTrial(count), 0);
}

// ─── Symptoms & coordination ────────────────────────────────────────────────────

export function clampSymptomRating(rating: number): number {
  if (!Number.isFinite(rating) || rating <= 0) return 0;
  return Math.min(Math.round(rating), MAX_SYMPTOM_RATING);
}

export function scoreSymptoms(ratings: Readonly<Record<string, number>>): { symptomCount: number; severityScore: number } {
  let symptomCount = 0;
  let severityScore = 0;
  for (const rating of Object.values(ratings)) {
    const clamped = clampSymptomRating(rating);
    if (clamped > 0) symptomCount++;
    severityScore += clamped;
  }
  return { symptomCount, severityScore };
}

/** Count of coordination findings recorded as normal. */
export function scoreCoordination(findings: ReadonlyArray<boolean | null>): number {
  return findings.filter((f) => f === true).length;
}

// ─── Aggregation ────────────────────────────────────────────────────────────────

/**
 * Per-domain totals over whatever results exist. Domains without a result are
 * null; the cognitive total sums the cognitive domains that are present.
 */
export function summarizeScores(results: readonly ModuleResult[]): ScoreSummary {
  const summary: ScoreSummary = {
    symptomCount: null,
    symptomSeverity: null,
    orientation: null,
    immediateMemory: null,
    concentration: null,
    delayedRecall: null,
    coordination: null,
    balanceErrors: null,
    cognitiveTotal: 0,
  };

  for (const result of results) {
    switch (result.kind) {
      case "symptoms":
        summary.symptomCount = result.symptomCount;
        summary.symptomSeverity = result.severityScore;
        break;
      case "orientation":
        summary.orientation = result.score;
        break;
      case "immediateMemory":
        summary.immediateMemory = result.score;
        break;
      case "concentration":
        summary.concentration = result.score;
        break;
      case "delayedRecall":
        summary.delayedRecall = result.score;
        break;
      case "coordination":
        summary.coordination = result.score;
        break;
      case "balance":
        summary.balanceErrors = result.score;
        break;
    }
  }

  summary.cognitiveTotal =
    (summary.orientation ?? 0) +
    (summary.immediateMemory ?? 0) +
    (summary.concentration ?? 0) +
    (summary.delayedRecall ?? 0);

  return summary;
}
