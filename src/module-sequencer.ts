// Sideline Assessment - Module Sequencer
// Owns the ordered module list of one session, the completed set and the
// current index. Index is -1 before start, a valid index while running and
// modules.length once the flow has finished.

import type { ModuleId, SessionType } from "./types.js";
import { invariant } from "./utils.js";

export const MODULE_ORDERS: Readonly<Record<SessionType, readonly ModuleId[]>> = {
  full: ["symptoms", "orientation", "immediateMemory", "concentration", "coordination", "balance", "delayedRecall"],
  emergency: ["orientation", "immediateMemory", "concentration", "delayedRecall"],
};

export type AdvanceResult =
  | { kind: "advanced"; moduleId: ModuleId; index: number }
  | { kind: "finished" };

export class ModuleSequencer {
  readonly modules: readonly ModuleId[];
  private completed: Set<ModuleId> = new Set();
  private skipped: Set<ModuleId> = new Set();
  private index = -1;

  constructor(modules: readonly ModuleId[]) {
    invariant(new Set(modules).size === modules.length, `Duplicate module in sequence: ${modules.join(", ")}`);
    this.modules = [...modules];
  }

  get currentIndex(): number {
    return this.index;
  }

  /** The active module, or null before start and after finish. */
  get currentModule(): ModuleId | null {
    return this.index >= 0 && this.index < this.modules.length ? this.modules[this.index] : null;
  }

  get isStarted(): boolean {
    return this.index >= 0;
  }

  get isFinished(): boolean {
    return this.index === this.modules.length;
  }

  get completedCount(): number {
    return this.completed.size;
  }

  /** Completed modules in completion order. */
  get completedModules(): ModuleId[] {
    return [...this.completed];
  }

  get skippedModules(): ModuleId[] {
    return [...this.skipped];
  }

  /** Fraction of modules completed, 0..1. An empty sequence counts as fully done. */
  get progress(): number {
    return this.modules.length === 0 ? 1 : this.completed.size / this.modules.length;
  }

  isCompleted(moduleId: ModuleId): boolean {
    return this.completed.has(moduleId);
  }

  /**
   * Enter the first module, or go straight to the terminal index when the
   * sequence is empty. Starting twice is a programming error.
   */
  start(): AdvanceResult {
    invariant(this.index === -1, "Sequencer already started");
    if (this.modules.length === 0) {
      this.index = 0;
      return { kind: "finished" };
    }
    this.index = 0;
    return { kind: "advanced", moduleId: this.modules[0], index: 0 };
  }

  /**
   * Record completion of the current module and advance.
   *
   * Idempotent: a signal for a module already in the completed set, or for a
   * module that is no longer current (a stale duplicate arriving after the
   * sequencer moved on), returns null and changes nothing. Only a real
   * insertion advances the index.
   *
   * @param moduleId - Module the completion signal refers to. Defaults to the current module.
   */
  completeCurrent(moduleId?: ModuleId): AdvanceResult | null {
    const current = this.currentModule;
    if (current === null) return null;
    const target = moduleId ?? current;
    if (target !== current || this.completed.has(target)) return null;

    this.completed.add(target);
    return this.advance();
  }

  /** Record the current module as skipped. It also counts as completed. */
  markSkipped(): AdvanceResult | null {
    const current = this.currentModule;
    if (current === null || this.completed.has(current)) return null;
    this.skipped.add(current);
    return this.completeCurrent(current);
  }

  /**
   * Move to the next module, or to the terminal index when there is none.
   * Never un-completes anything.
   */
  advance(): AdvanceResult {
    invariant(this.index >= 0 && !this.isFinished, `Cannot advance from index ${this.index}`);
    if (this.index + 1 < this.modules.length) {
      this.index++;
      return { kind: "advanced", moduleId: this.modules[this.index], index: this.index };
    }
    this.index = this.modules.length;
    return { kind: "finished" };
  }

  /**
   * Step back one module. Never below 0, never from the terminal index, and
   * never removes anything from the completed set.
   *
   * @returns The module now current, or null when nothing moved.
   */
  retreat(): ModuleId | null {
    if (this.index <= 0 || this.isFinished) return null;
    this.index--;
    return this.modules[this.index];
  }
}
