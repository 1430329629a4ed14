// Unit tests for FilePersistence

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readFile, readdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FilePersistence, buildDirectoryName, formatReport } from "./file-persistence.js";
import {
  answerOrientation,
  createModuleResult,
  recordDigitResponse,
  sealResult,
  setMonthsCorrect,
  setPercentOfNormal,
  setSymptomRating,
} from "./module-results.js";
import { summarizeScores } from "./scoring.js";
import { silentLogger } from "./logger.js";
import type { ModuleResult, Session } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

function makeSession(overrides: Partial<Session> = {}): Session {
  return {
    id: "test-session-123",
    createdAt: new Date(2025, 0, 15, 12, 30, 5),
    sessionType: "full",
    modules: ["symptoms", "orientation", "concentration", "balance", "delayedRecall"],
    completedModules: ["symptoms", "orientation", "concentration", "balance"],
    skippedModules: ["balance"],
    currentIndex: 4,
    ...overrides,
  };
}

function makeResults(): ModuleResult[] {
  const symptoms = createModuleResult("symptoms");
  if (symptoms.kind !== "symptoms") throw new Error("unexpected kind");
  setSymptomRating(symptoms, "Headache", 3);
  setSymptomRating(symptoms, "Neck pain", 2);
  setPercentOfNormal(symptoms, 80);

  const orientation = createModuleResult("orientation");
  if (orientation.kind !== "orientation") throw new Error("unexpected kind");
  [true, true, false, true, true].forEach((correct, i) => answerOrientation(orientation, i, correct));

  const concentration = createModuleResult("concentration", {
    wordList: [],
    digitSequences: [
      [4, 2, 7],
      [8, 1, 5, 3],
    ],
  });
  if (concentration.kind !== "concentration") throw new Error("unexpected kind");
  recordDigitResponse(concentration, "724");
  recordDigitResponse(concentration, "531");
  setMonthsCorrect(concentration, true);

  const balance = createModuleResult("balance");

  return [
    sealResult(symptoms),
    sealResult(orientation),
    sealResult(concentration),
    sealResult(balance, { skipped: true }),
  ];
}

// ─── Formatting ───────────────────────────────────────────────────────────────

describe("buildDirectoryName", () => {
  it("prefixes the session id with the local creation time", () => {
    expect(buildDirectoryName(makeSession())).toBe("2025-01-15_12-30-05_test-session-123");
  });
});

describe("formatReport", () => {
  it("lists every module in sequence order with its score", () => {
    const results = makeResults();
    const report = formatReport(makeSession(), results, summarizeScores(results));
    expect(report.split("\n")).toEqual([
      "=== Sideline Assessment Report ===",
      "",
      "Date: 2025-01-15",
      "Session ID: test-session-123",
      "Session Type: full",
      "Completed: 4/5",
      "Skipped: balance",
      "",
      "---",
      "",
      "Symptoms: 2 reported, severity 5, 80% of normal",
      "Orientation: 4/5",
      "Concentration: 2/3 (digits 1, months 1)",
      "Balance errors: 0 (skipped)",
      "delayedRecall: not administered",
      "",
      "Cognitive total: 6",
    ]);
  });

  it("omits the skipped line when nothing was skipped", () => {
    const session = makeSession({ modules: ["orientation"], completedModules: [], skippedModules: [] });
    const lines = formatReport(session, [], summarizeScores([])).split("\n");
    expect(lines.slice(5, 7)).toEqual(["Completed: 0/1", ""]);
    expect(lines).toContain("orientation: not administered");
  });
});

// ─── FilePersistence ──────────────────────────────────────────────────────────

describe("FilePersistence", () => {
  let baseDir: string;

  beforeEach(async () => {
    baseDir = await mkdtemp(join(tmpdir(), "sideline-test-"));
  });

  afterEach(async () => {
    await rm(baseDir, { recursive: true, force: true });
  });

  it("writes one file per module result", async () => {
    const persistence = new FilePersistence(baseDir, silentLogger);
    const session = makeSession();
    const [, orientation] = makeResults();

    await persistence.saveModuleResult(session, orientation);

    const dir = persistence.sessionDirectory(session);
    expect(await readdir(dir)).toEqual(["module-orientation.json"]);
    const saved: unknown = JSON.parse(await readFile(join(dir, "module-orientation.json"), "utf-8"));
    expect(saved).toMatchObject({ kind: "orientation", score: 4, answers: [true, true, false, true, true] });
  });

  it("writes the session record and report", async () => {
    const persistence = new FilePersistence(baseDir, silentLogger);
    const session = makeSession();
    const results = makeResults();
    const summary = summarizeScores(results);

    await persistence.saveSession(session, results, summary);

    const dir = join(baseDir, "2025-01-15_12-30-05_test-session-123");
    expect((await readdir(dir)).sort()).toEqual(["report.txt", "session.json"]);
    expect(await readFile(join(dir, "report.txt"), "utf-8")).toBe(formatReport(session, results, summary));

    const record: unknown = JSON.parse(await readFile(join(dir, "session.json"), "utf-8"));
    expect(record).toMatchObject({
      session: { id: "test-session-123", skippedModules: ["balance"] },
      summary: { orientation: 4, concentration: 2, cognitiveTotal: 6 },
    });
  });

  it("rejects when the directory cannot be created", async () => {
    const blocker = join(baseDir, "not-a-directory");
    await writeFile(blocker, "x", "utf-8");
    const persistence = new FilePersistence(blocker, silentLogger);

    await expect(persistence.saveModuleResult(makeSession(), makeResults()[1])).rejects.toThrow();
  });
});
