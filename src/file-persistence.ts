// Sideline Assessment - File Persistence
// Result sink that writes each sealed module result, and the session summary
// at the end, under one directory per session. Write-only: nothing here is
// read back by the engine.
//
// Output directory structure:
//   {baseDir}/{YYYY-MM-DD_HH-mm-ss}_{sessionId}/
//     module-{moduleId}.json   one per completed or skipped module
//     session.json             session, every result and the score summary
//     report.txt               plain-text score sheet

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { ModuleResult, ResultSink, ScoreSummary, Session } from "./types.js";
import { ORIENTATION_QUESTION_COUNT } from "./scoring.js";
import { createLogger, type Logger } from "./logger.js";

/**
 * Generates the output directory name from a session.
 * Format: `{YYYY-MM-DD_HH-mm-ss}_{sessionId}`
 */
export function buildDirectoryName(session: Session): string {
  const date = session.createdAt;
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  const hours = String(date.getHours()).padStart(2, "0");
  const minutes = String(date.getMinutes()).padStart(2, "0");
  const seconds = String(date.getSeconds()).padStart(2, "0");

  const timestamp = `${year}-${month}-${day}_${hours}-${minutes}-${seconds}`;
  return `${timestamp}_${session.id}`;
}

export function formatModuleResult(result: ModuleResult): string {
  return JSON.stringify(result, null, 2);
}

export function formatSessionRecord(
  session: Session,
  results: readonly ModuleResult[],
  summary: ScoreSummary,
): string {
  return JSON.stringify({ session, summary, results }, null, 2);
}

/** "score/max" for one module, using the result's own item counts for the maximum. */
function resultLine(result: ModuleResult): string {
  const suffix = result.skipped ? " (skipped)" : "";
  switch (result.kind) {
    case "symptoms":
      return `Symptoms: ${result.symptomCount} reported, severity ${result.severityScore}, ${result.percentOfNormal}% of normal${suffix}`;
    case "orientation":
      return `Orientation: ${result.score}/${ORIENTATION_QUESTION_COUNT}${suffix}`;
    case "immediateMemory": {
      const max = result.trials.reduce((sum, t) => sum + t.words.length, 0);
      return `Immediate Memory: ${result.score}/${max}${suffix}`;
    }
    case "concentration":
      return `Concentration: ${result.score}/${result.sequences.length + 1} (digits ${result.digitScore}, months ${result.monthsScore})${suffix}`;
    case "coordination":
      return `Coordination: ${result.score}/2${suffix}`;
    case "balance":
      return `Balance errors: ${result.score}${suffix}`;
    case "delayedRecall":
      return `Delayed Recall: ${result.score}/${result.words.length}${suffix}`;
  }
}

/**
 * Renders report.txt: a session header followed by one line per module in
 * sequence order. Modules never reached are listed as not administered.
 */
export function formatReport(session: Session, results: readonly ModuleResult[], summary: ScoreSummary): string {
  const lines: string[] = [];

  lines.push("=== Sideline Assessment Report ===");
  lines.push("");
  lines.push(`Date: ${session.createdAt.toISOString().split("T")[0]}`);
  lines.push(`Session ID: ${session.id}`);
  lines.push(`Session Type: ${session.sessionType}`);
  lines.push(`Completed: ${session.completedModules.length}/${session.modules.length}`);
  if (session.skippedModules.length > 0) {
    lines.push(`Skipped: ${session.skippedModules.join(", ")}`);
  }
  lines.push("");
  lines.push("---");
  lines.push("");

  for (const moduleId of session.modules) {
    const result = results.find((r) => r.kind === moduleId);
    lines.push(result ? resultLine(result) : `${moduleId}: not administered`);
  }

  lines.push("");
  lines.push(`Cognitive total: ${summary.cognitiveTotal}`);

  return lines.join("\n");
}

/**
 * FilePersistence writes results to disk as they are produced. Failures
 * reject; the orchestrator logs them and carries on.
 */
export class FilePersistence implements ResultSink {
  private readonly baseDir: string;
  private readonly logger: Logger;

  constructor(baseDir: string = "output", logger: Logger = createLogger("FilePersistence")) {
    this.baseDir = baseDir;
    this.logger = logger;
  }

  /** Directory a session's files are written to. */
  sessionDirectory(session: Session): string {
    return join(this.baseDir, buildDirectoryName(session));
  }

  async saveModuleResult(session: Session, result: ModuleResult): Promise<void> {
    const dirPath = this.sessionDirectory(session);
    await mkdir(dirPath, { recursive: true });

    const filePath = join(dirPath, `module-${result.kind}.json`);
    await writeFile(filePath, formatModuleResult(result), "utf-8");
    this.logger.info(`Saved ${result.kind} to ${filePath}`);
  }

  async saveSession(session: Session, results: readonly ModuleResult[], summary: ScoreSummary): Promise<void> {
    const dirPath = this.sessionDirectory(session);
    await mkdir(dirPath, { recursive: true });

    await writeFile(join(dirPath, "session.json"), formatSessionRecord(session, results, summary), "utf-8");
    await writeFile(join(dirPath, "report.txt"), formatReport(session, results, summary), "utf-8");
    this.logger.info(`Saved session ${session.id} to ${dirPath}`);
  }
}
