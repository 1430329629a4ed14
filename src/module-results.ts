// Sideline Assessment - Module Result Entities
// One mutable record per module kind. Every mutator validates that the
// record is still open, applies the raw change and recomputes the derived
// score fields from raw data, so derived values never drift from their inputs.
// Sealing a record freezes it; any later mutation is an invariant violation.

import type {
  BalanceResult,
  BalanceStance,
  ConcentrationResult,
  CoordinationItem,
  CoordinationResult,
  DelayedRecallResult,
  ImmediateMemoryResult,
  MemoryTrial,
  ModuleId,
  ModuleResult,
  OrientationResult,
  SymptomResult,
  SymptomToggle,
} from "./types.js";
import {
  MEMORY_TRIAL_COUNT,
  ORIENTATION_QUESTION_COUNT,
  clampSymptomRating,
  scoreBalance,
  scoreBalanceTrial,
  scoreCoordination,
  scoreDigitSpan,
  scoreMemoryTrial,
  scoreMonthsReverse,
  scoreOrientation,
  scoreRecall,
  scoreSymptoms,
} from "./scoring.js";
import { deepFreeze, digitsOnly, invariant, normalizeWord } from "./utils.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const SYMPTOMS: readonly string[] = [
  "Headache",
  "Pressure in head",
  "Neck pain",
  "Nausea or vomiting",
  "Dizziness",
  "Blurred vision",
  "Balance problems",
  "Sensitivity to light",
  "Sensitivity to noise",
  "Feeling slowed down",
  "Feeling like in a fog",
  "Don't feel right",
  "Difficulty concentrating",
  "Difficulty remembering",
  "Fatigue or low energy",
  "Confusion",
  "Drowsiness",
  "More emotional",
  "Irritability",
  "Sadness",
  "Nervous or anxious",
  "Trouble falling asleep",
];

export const ORIENTATION_QUESTIONS: readonly string[] = [
  "What month is it?",
  "What is the date today?",
  "What is the day of the week?",
  "What year is it?",
  "What time is it right now? (within 1 hour)",
];

export const BALANCE_STANCES: readonly BalanceStance[] = [
  "doubleLegFirm",
  "singleLegFirm",
  "tandemFirm",
  "doubleLegFoam",
  "singleLegFoam",
  "tandemFoam",
];

export const WORD_LISTS: Readonly<Record<5 | 10, readonly string[]>> = {
  5: ["Harbor", "Pencil", "Orange", "Blanket", "Violin"],
  10: ["Harbor", "Pencil", "Orange", "Blanket", "Violin", "Garden", "Rocket", "Candle", "Tiger", "Window"],
};

export const DIGIT_SEQUENCES: readonly (readonly number[])[] = [
  [3, 9, 1],
  [6, 2, 8, 4],
  [5, 1, 7, 3, 9],
  [8, 4, 2, 6, 1, 7],
];

export interface ResultOptions {
  /** Word list presented in every immediate-memory trial. */
  wordList: readonly string[];
  /** Digit sequences for the digit span, shortest first. */
  digitSequences: readonly (readonly number[])[];
  /**
   * Word list for delayed recall. The orchestrator passes the list captured
   * from the first immediate-memory trial; `wordList` is used when absent.
   */
  delayedRecallWords?: readonly string[];
}

export const DEFAULT_RESULT_OPTIONS: ResultOptions = {
  wordList: WORD_LISTS[5],
  digitSequences: DIGIT_SEQUENCES,
};

// ─── Factories ──────────────────────────────────────────────────────────────────

function base(): { createdAt: Date; completedAt: null; skipped: false } {
  return { createdAt: new Date(), completedAt: null, skipped: false };
}

/** Create an empty result for a module that is becoming active for the first time. */
export function createModuleResult(moduleId: ModuleId, options: ResultOptions = DEFAULT_RESULT_OPTIONS): ModuleResult {
  switch (moduleId) {
    case "symptoms": {
      const ratings: Record<string, number> = {};
      for (const symptom of SYMPTOMS) ratings[symptom] = 0;
      return {
        kind: "symptoms",
        ...base(),
        ratings,
        worsensWithPhysicalActivity: false,
        worsensWithMentalActivity: false,
        percentOfNormal: 100,
        symptomCount: 0,
        severityScore: 0,
      };
    }
    case "orientation":
      return {
        kind: "orientation",
        ...base(),
        answers: new Array<boolean | null>(ORIENTATION_QUESTION_COUNT).fill(null),
        score: 0,
      };
    case "concentration":
      return {
        kind: "concentration",
        ...base(),
        sequences: options.digitSequences.map((seq) => [...seq]),
        responses: [],
        monthsCorrect: null,
        digitScore: 0,
        consecutiveFails: 0,
        presentationStopped: false,
        monthsScore: 0,
        score: 0,
      };
    case "immediateMemory": {
      const trials: MemoryTrial[] = [];
      for (let n = 1; n <= MEMORY_TRIAL_COUNT; n++) {
        trials.push({ trialNumber: n, words: [...options.wordList], recalledWords: [], score: 0 });
      }
      return { kind: "immediateMemory", ...base(), trials, score: 0 };
    }
    case "delayedRecall":
      return {
        kind: "delayedRecall",
        ...base(),
        words: [...(options.delayedRecallWords ?? options.wordList)],
        recalledWords: [],
        score: 0,
      };
    case "coordination":
      return { kind: "coordination", ...base(), fingerToNoseNormal: null, tandemGaitNormal: null, score: 0 };
    case "balance":
      return {
        kind: "balance",
        ...base(),
        trials: BALANCE_STANCES.map((stance) => ({ stance, errorCount: 0, score: 0 })),
        score: 0,
      };
  }
}

// ─── Derived fields ─────────────────────────────────────────────────────────────

/** Recompute every derived field of a result from its raw fields, in place. */
export function recomputeScores(result: ModuleResult): void {
  switch (result.kind) {
    case "symptoms": {
      const { symptomCount, severityScore } = scoreSymptoms(result.ratings);
      result.symptomCount = symptomCount;
      result.severityScore = severityScore;
      break;
    }
    case "orientation":
      result.score = scoreOrientation(result.answers);
      break;
    case "concentration": {
      const outcome = scoreDigitSpan(result.sequences, result.responses);
      result.digitScore = outcome.score;
      result.consecutiveFails = outcome.consecutiveFails;
      result.presentationStopped = outcome.stopped;
      result.monthsScore = scoreMonthsReverse(result.monthsCorrect);
      result.score = result.digitScore + result.monthsScore;
      break;
    }
    case "immediateMemory":
      for (const trial of result.trials) {
        trial.score = scoreMemoryTrial(trial.words, trial.recalledWords);
      }
      result.score = result.trials.reduce((sum, t) => sum + t.score, 0);
      break;
    case "delayedRecall":
      result.score = scoreRecall(result.words, result.recalledWords);
      break;
    case "coordination":
      result.score = scoreCoordination([result.fingerToNoseNormal, result.tandemGaitNormal]);
      break;
    case "balance":
      for (const trial of result.trials) {
        trial.score = scoreBalanceTrial(trial.errorCount);
      }
      result.score = scoreBalance(result.trials.map((t) => t.errorCount));
      break;
  }
}

// ─── Sealing ────────────────────────────────────────────────────────────────────

export function isSealed(result: ModuleResult): boolean {
  return result.completedAt !== null;
}

function assertOpen(result: ModuleResult, operation: string): void {
  invariant(!isSealed(result), `Cannot ${operation}: ${result.kind} result is already complete`);
}

/**
 * Mark a result complete and freeze it. Sealing twice is a programming error:
 * the sequencer admits each module into the completed set exactly once.
 */
export function sealResult(result: ModuleResult, options: { skipped?: boolean } = {}): ModuleResult {
  assertOpen(result, "seal result");
  result.skipped = options.skipped ?? false;
  result.completedAt = new Date();
  recomputeScores(result);
  return deepFreeze(result);
}

// ─── Symptom mutators ───────────────────────────────────────────────────────────

/**
 * Rate a symptom 0–6. Out-of-range ratings are clamped. Returns false (and
 * changes nothing) when the symptom name is not on the checklist.
 */
export function setSymptomRating(result: SymptomResult, symptom: string, rating: number): boolean {
  assertOpen(result, "rate symptom");
  const key = findSymptom(symptom);
  if (key === null) return false;
  result.ratings[key] = clampSymptomRating(rating);
  recomputeScores(result);
  return true;
}

function findSymptom(name: string): string | null {
  const wanted = normalizeWord(name);
  return SYMPTOMS.find((s) => normalizeWord(s) === wanted) ?? null;
}

export function setSymptomToggle(result: SymptomResult, question: SymptomToggle, value: boolean): void {
  assertOpen(result, "set symptom toggle");
  if (question === "physical") {
    result.worsensWithPhysicalActivity = value;
  } else {
    result.worsensWithMentalActivity = value;
  }
}

export function setPercentOfNormal(result: SymptomResult, percent: number): void {
  assertOpen(result, "set percent of normal");
  result.percentOfNormal = Number.isFinite(percent) ? Math.max(0, Math.min(100, Math.round(percent))) : 100;
}

// ─── Orientation mutators ───────────────────────────────────────────────────────

export function answerOrientation(result: OrientationResult, questionIndex: number, correct: boolean): void {
  assertOpen(result, "answer orientation question");
  invariant(
    Number.isInteger(questionIndex) && questionIndex >= 0 && questionIndex < result.answers.length,
    `Orientation question index out of range: ${questionIndex}`,
  );
  result.answers[questionIndex] = correct;
  recomputeScores(result);
}

// ─── Concentration mutators ─────────────────────────────────────────────────────

/**
 * Index of the sequence awaiting a response, or null once presentation has
 * stopped or every sequence has been answered.
 */
export function nextDigitSequenceIndex(result: ConcentrationResult): number | null {
  if (result.presentationStopped || result.responses.length >= result.sequences.length) return null;
  return result.responses.length;
}

/**
 * Record the athlete's response to the sequence currently presented. The
 * response is reduced to its digits; text with no digits simply fails to match.
 *
 * @returns 1 if the response matched, 0 otherwise.
 */
export function recordDigitResponse(result: ConcentrationResult, rawResponse: string): 0 | 1 {
  assertOpen(result, "record digit response");
  const index = nextDigitSequenceIndex(result);
  invariant(index !== null, "Digit span is over; no sequence awaits a response");
  const previousScore = result.digitScore;
  result.responses.push(digitsOnly(rawResponse));
  recomputeScores(result);
  return result.digitScore > previousScore ? 1 : 0;
}

export function setMonthsCorrect(result: ConcentrationResult, correct: boolean): void {
  assertOpen(result, "set months in reverse");
  result.monthsCorrect = correct;
  recomputeScores(result);
}

// ─── Memory mutators ────────────────────────────────────────────────────────────

type RecallResult = ImmediateMemoryResult | DelayedRecallResult;

function recallList(result: RecallResult, trialIndex: number): string[] {
  if (result.kind === "delayedRecall") return result.recalledWords;
  invariant(
    Number.isInteger(trialIndex) && trialIndex >= 0 && trialIndex < result.trials.length,
    `Memory trial index out of range: ${trialIndex}`,
  );
  return result.trials[trialIndex].recalledWords;
}

/**
 * Add the word to the recall list, or remove it when a word with the same
 * normalized form is already there. Words that normalize to nothing are ignored.
 *
 * @returns true if the word is now recalled, false if it was removed or ignored.
 */
export function toggleRecalledWord(result: RecallResult, word: string, trialIndex = 0): boolean {
  assertOpen(result, "toggle recalled word");
  const normalized = normalizeWord(word);
  if (normalized.length === 0) return false;

  const list = recallList(result, trialIndex);
  const existing = list.findIndex((w) => normalizeWord(w) === normalized);
  if (existing >= 0) {
    list.splice(existing, 1);
    recomputeScores(result);
    return false;
  }
  list.push(word.trim());
  recomputeScores(result);
  return true;
}

// ─── Coordination mutators ──────────────────────────────────────────────────────

export function setCoordinationFinding(result: CoordinationResult, item: CoordinationItem, normal: boolean): void {
  assertOpen(result, "set coordination finding");
  if (item === "fingerToNose") {
    result.fingerToNoseNormal = normal;
  } else {
    result.tandemGaitNormal = normal;
  }
  recomputeScores(result);
}

// ─── Balance mutators ───────────────────────────────────────────────────────────

function balanceTrial(result: BalanceResult, stanceIndex: number) {
  invariant(
    Number.isInteger(stanceIndex) && stanceIndex >= 0 && stanceIndex < result.trials.length,
    `Balance stance index out of range: ${stanceIndex}`,
  );
  return result.trials[stanceIndex];
}

/** Count one error event for the stance. The raw count is kept; the trial score caps it. */
export function recordBalanceError(result: BalanceResult, stanceIndex: number): number {
  assertOpen(result, "record balance error");
  const trial = balanceTrial(result, stanceIndex);
  trial.errorCount++;
  recomputeScores(result);
  return trial.score;
}

/** Overwrite a stance's error count; a stance reset writes 0. Negative counts become 0. */
export function setBalanceErrors(result: BalanceResult, stanceIndex: number, errorCount: number): void {
  assertOpen(result, "set balance errors");
  const trial = balanceTrial(result, stanceIndex);
  trial.errorCount = Number.isFinite(errorCount) ? Math.max(0, Math.floor(errorCount)) : 0;
  recomputeScores(result);
}
