// Sideline Assessment - Session Orchestrator
// Runs one assessment session: sequences modules, keeps the command router's
// target in step with the active module, and drives the show/hide handshake
// with the immersive display.
//
// State machine:
//
//   notStarted → moduleActive(0) → transitioning → moduleActive(1) → … → finished
//
// moduleActive(i)  entered when module i's controller is installed and a show
//                  is requested; presentation flips to "shown" on confirmation
// transitioning    entered when module i completes (or on goBack); the router
//                  target is cleared and a hide is requested
// finished         after the hide that follows the last module, or exit()
//
// Everything runs on one event loop turn at a time. Display requests are the
// only suspension points; confirmation is the display's shown/hidden signal.

import { v4 as uuidv4 } from "uuid";
import type {
  DisplayMode,
  ModuleId,
  ModuleResult,
  OrchestratorState,
  ResultOf,
  ResultSink,
  ScoreSummary,
  Session,
  SessionSnapshot,
  SessionType,
} from "./types.js";
import { ModuleSequencer, MODULE_ORDERS, type AdvanceResult } from "./module-sequencer.js";
import type { CommandRouter } from "./command-router.js";
import {
  createModuleController,
  DEFAULT_BALANCE_WINDOW_MS,
  type AssessmentController,
  type ModuleControllerContext,
} from "./module-controllers.js";
import {
  createModuleResult,
  DEFAULT_RESULT_OPTIONS,
  isSealed,
  sealResult,
  type ResultOptions,
} from "./module-results.js";
import { summarizeScores } from "./scoring.js";
import { createDeferred } from "./utils/deferred.js";
import { invariant } from "./utils.js";
import { createLogger, type Logger } from "./logger.js";

export const DEFAULT_CONFIRM_TIMEOUT_MS = 10_000;

/** A show or hide request is tried this many times before it counts as failed. */
const MAX_DISPLAY_ATTEMPTS = 2;

export interface SessionOrchestratorOptions {
  display: DisplayMode;
  router: CommandRouter;
  sessionType?: SessionType;
  /** Explicit module order. Defaults to the fixed order of the session type. */
  modules?: readonly ModuleId[];
  sink?: ResultSink;
  resultOptions?: ResultOptions;
  balanceWindowMs?: number;
  /** Bound on waiting for each display confirmation. */
  confirmTimeoutMs?: number;
  logger?: Logger;
  onStateChange?: (state: OrchestratorState) => void;
  onFinished?: (session: Session, scores: ScoreSummary) => void;
  onExited?: (session: Session, scores: ScoreSummary) => void;
}

interface PendingConfirmation {
  /** Display state that confirms the request: true for show, false for hide. */
  expect: boolean;
  moduleId: ModuleId | null;
  attempt: number;
  timer: ReturnType<typeof setTimeout> | null;
  onConfirmed: () => void;
  onFailed: (reason: string) => void;
}

function isResultOf<K extends ModuleId>(result: ModuleResult, moduleId: K): result is ResultOf<K> {
  return result.kind === moduleId;
}

export class SessionOrchestrator {
  readonly id: string = uuidv4();
  readonly createdAt: Date = new Date();
  readonly sessionType: SessionType;

  private _state: OrchestratorState = { phase: "notStarted" };
  private readonly sequencer: ModuleSequencer;
  private readonly results: Map<ModuleId, ModuleResult> = new Map();
  private controller: AssessmentController | null = null;
  private pending: PendingConfirmation | null = null;
  private lastObservedCompletedCount = 0;
  private unsubscribeDisplay: (() => void) | null = null;
  private pendingWrites: Promise<void>[] = [];

  private readonly display: DisplayMode;
  private readonly router: CommandRouter;
  private readonly options: SessionOrchestratorOptions;
  private readonly confirmTimeoutMs: number;
  private readonly logger: Logger;

  private readonly controllerContext: ModuleControllerContext = {
    complete: (moduleId) => this.completeModule(moduleId),
    skip: (moduleId) => this.skipModule(moduleId),
    goBack: (moduleId) => this.goBack(moduleId),
  };

  constructor(options: SessionOrchestratorOptions) {
    this.options = options;
    this.display = options.display;
    this.router = options.router;
    this.sessionType = options.sessionType ?? "full";
    this.sequencer = new ModuleSequencer(options.modules ?? MODULE_ORDERS[this.sessionType]);
    this.confirmTimeoutMs = options.confirmTimeoutMs ?? DEFAULT_CONFIRM_TIMEOUT_MS;
    this.logger = options.logger ?? createLogger("SessionOrchestrator");
  }

  // ─── Read-only accessors ────────────────────────────────────────────────────

  get state(): OrchestratorState {
    return this._state;
  }

  get currentModule(): ModuleId | null {
    return this._state.phase === "moduleActive" ? this._state.moduleId : null;
  }

  get session(): Session {
    return {
      id: this.id,
      createdAt: this.createdAt,
      sessionType: this.sessionType,
      modules: this.sequencer.modules,
      completedModules: this.sequencer.completedModules,
      skippedModules: this.sequencer.skippedModules,
      currentIndex: this.sequencer.currentIndex,
    };
  }

  get progress(): number {
    return this.sequencer.progress;
  }

  getResult<K extends ModuleId>(moduleId: K): ResultOf<K> | undefined {
    const result = this.results.get(moduleId);
    return result && isResultOf(result, moduleId) ? result : undefined;
  }

  scores(): ScoreSummary {
    return summarizeScores([...this.results.values()]);
  }

  snapshot(): SessionSnapshot {
    return {
      session: this.session,
      state: this._state,
      currentModule: this.currentModule,
      controller: this.controller?.status() ?? null,
      results: [...this.results.values()],
      scores: this.scores(),
    };
  }

  /** Resolves once every result write issued so far has settled. */
  async flush(): Promise<void> {
    while (this.pendingWrites.length > 0) {
      const writes = this.pendingWrites;
      this.pendingWrites = [];
      await Promise.all(writes);
    }
  }

  // ─── Lifecycle ──────────────────────────────────────────────────────────────

  /** Begin the flow: subscribe to the display and present the first module. */
  start(): void {
    invariant(this._state.phase === "notStarted", `Cannot start from "${this._state.phase}"`);
    this.unsubscribeDisplay = this.display.onShownChanged((shown) => this.handleDisplayChange(shown));
    this.router.setContext("sessionStart");
    this.logger.info(`Session ${this.id} (${this.sessionType}) starting: ${this.sequencer.modules.join(" → ")}`);

    const step = this.sequencer.start();
    if (step.kind === "finished") {
      this.finish();
      return;
    }
    this.activate(step.moduleId, step.index);
  }

  /**
   * Completion signal for the active module. Signals for any other module, or
   * arriving outside moduleActive (e.g. a duplicate after the flow moved on),
   * are absorbed.
   */
  completeModule(moduleId?: ModuleId): void {
    const active = this.activeModuleFor(moduleId, "complete");
    if (active === null) return;

    // Revisited after goBack: already complete, just move forward again
    if (this.sequencer.isCompleted(active)) {
      this.beginTransition(this.sequencer.advance(), "advance");
      return;
    }

    const step = this.sequencer.completeCurrent(active);
    if (!this.observeCompletion(step)) return;

    this.sealAndPersist(active, false);
    this.beginTransition(step, "advance");
  }

  /** Skip the active module: sealed as skipped, then the flow advances. */
  skipModule(moduleId?: ModuleId): void {
    const active = this.activeModuleFor(moduleId, "skip");
    if (active === null || this.sequencer.isCompleted(active)) return;

    const step = this.sequencer.markSkipped();
    if (!this.observeCompletion(step)) return;

    this.sealAndPersist(active, true);
    this.beginTransition(step, "advance");
  }

  /** Step back to the previous module through a hide/show handshake. */
  goBack(moduleId?: ModuleId): void {
    const active = this.activeModuleFor(moduleId, "go back");
    if (active === null) return;

    const previous = this.sequencer.retreat();
    if (previous === null) {
      this.logger.info(`Go back ignored: ${active} is the first module`);
      return;
    }
    this.beginTransition(
      { kind: "advanced", moduleId: previous, index: this.sequencer.currentIndex },
      "retreat",
    );
  }

  /**
   * Leave the assessment from any state. Issues exactly one best-effort hide,
   * leaves the module index where it is, persists what was collected and
   * reports the exit.
   */
  async exit(): Promise<void> {
    if (this._state.phase === "finished") return;

    this.logger.info(`Exit requested during "${this._state.phase}" at index ${this.sequencer.currentIndex}`);
    this.cancelPending();
    this.detachController();
    this.router.setContext("summary");
    this.setState({ phase: "finished", outcome: "exited" });

    const hidden = await this.boundedWait(this.callDisplay(() => this.display.requestHide()));
    if (!hidden) {
      this.logger.warn("Display did not confirm hide on exit");
    }

    this.releaseDisplay();
    const scores = this.scores();
    this.persistSession(scores);
    this.options.onExited?.(this.session, scores);
  }

  // ─── Transitions ────────────────────────────────────────────────────────────

  private activate(moduleId: ModuleId, index: number): void {
    let result = this.results.get(moduleId);
    if (!result) {
      result = createModuleResult(moduleId, this.resultOptionsFor(moduleId));
      this.results.set(moduleId, result);
    }

    const controller = createModuleController(result, this.controllerContext, {
      balanceWindowMs: this.options.balanceWindowMs ?? DEFAULT_BALANCE_WINDOW_MS,
      logger: this.logger,
      onUpdate: () => this.options.onStateChange?.(this._state),
    });
    this.controller = controller;
    this.router.setTarget(controller);
    this.router.setContext("module");
    this.setState({ phase: "moduleActive", index, moduleId, presentation: "opening" });
    this.logger.info(`Module ${index + 1}/${this.sequencer.modules.length} active: ${moduleId}`);

    this.request(
      true,
      moduleId,
      () => this.markPresentation(moduleId, "shown"),
      (reason) => {
        // The module stays usable by voice even if the surface never opened
        this.logger.error(`Showing ${moduleId} failed: ${reason}`);
        this.markPresentation(moduleId, "unconfirmed");
      },
    );
  }

  private beginTransition(step: AdvanceResult, reason: "advance" | "retreat"): void {
    invariant(this._state.phase === "moduleActive", `Cannot transition from "${this._state.phase}"`);
    const from = this._state.moduleId;

    this.detachController();
    this.router.setContext("transition");
    this.setState({ phase: "transitioning", reason: step.kind === "finished" ? "finish" : reason, from });

    this.request(
      false,
      null,
      () => this.afterHidden(),
      (reason) => {
        // Never skip: carry on with whatever module the sequencer points at
        this.logger.error(`Hiding ${from} failed: ${reason}; continuing with the current module`);
        this.afterHidden();
      },
    );
  }

  private afterHidden(): void {
    if (this._state.phase !== "transitioning") return;
    const next = this.sequencer.currentModule;
    if (next === null) {
      this.finish();
      return;
    }
    this.activate(next, this.sequencer.currentIndex);
  }

  private finish(): void {
    this.detachController();
    this.router.setContext("summary");
    this.setState({ phase: "finished", outcome: "completed" });
    this.releaseDisplay();

    const scores = this.scores();
    this.logger.info(`Session ${this.id} finished, cognitive total ${scores.cognitiveTotal}`);
    this.persistSession(scores);
    this.options.onFinished?.(this.session, scores);
  }

  // ─── Display handshake ──────────────────────────────────────────────────────

  private handleDisplayChange(shown: boolean): void {
    const pending = this.pending;
    if (pending && pending.expect === shown) {
      this.confirm(pending);
      return;
    }

    if (!shown && !pending && this._state.phase === "moduleActive") {
      // Dismissed from outside: present the same module again rather than lose our place
      const { moduleId } = this._state;
      this.logger.warn(`Display hidden unexpectedly while ${moduleId} active; re-presenting it`);
      this.setState({ ...this._state, presentation: "opening" });
      this.request(
        true,
        moduleId,
        () => this.markPresentation(moduleId, "shown"),
        (reason) => {
          this.logger.error(`Re-presenting ${moduleId} failed: ${reason}`);
          this.markPresentation(moduleId, "unconfirmed");
        },
      );
      return;
    }

    this.logger.info(`Display ${shown ? "shown" : "hidden"} signal ignored in "${this._state.phase}"`);
  }

  private request(
    expect: boolean,
    moduleId: ModuleId | null,
    onConfirmed: () => void,
    onFailed: (reason: string) => void,
  ): void {
    this.cancelPending();
    const pending: PendingConfirmation = { expect, moduleId, attempt: 0, timer: null, onConfirmed, onFailed };
    this.pending = pending;
    this.issue(pending);
  }

  private issue(pending: PendingConfirmation): void {
    pending.attempt++;
    pending.timer = setTimeout(() => this.retryOrFail(pending, "timed out"), this.confirmTimeoutMs);

    const { moduleId } = pending;
    const call = this.callDisplay(() =>
      pending.expect && moduleId !== null ? this.display.requestShow(moduleId) : this.display.requestHide(),
    );

    void call.then(
      () => {
        // The request completed; if the display already reflects it, that is the confirmation
        if (this.pending === pending && this.display.isShown === pending.expect) {
          this.confirm(pending);
        }
      },
      (err: unknown) => {
        if (this.pending !== pending) return;
        const message = err instanceof Error ? err.message : String(err);
        this.retryOrFail(pending, `request rejected: ${message}`);
      },
    );
  }

  private confirm(pending: PendingConfirmation): void {
    if (this.pending !== pending) return;
    this.clearTimer(pending);
    this.pending = null;
    pending.onConfirmed();
  }

  private retryOrFail(pending: PendingConfirmation, reason: string): void {
    if (this.pending !== pending) return;
    this.clearTimer(pending);

    const action = pending.expect ? "show" : "hide";
    if (pending.attempt < MAX_DISPLAY_ATTEMPTS) {
      this.logger.warn(`Display ${action} ${reason} (attempt ${pending.attempt}); retrying`);
      this.issue(pending);
      return;
    }
    this.pending = null;
    pending.onFailed(`${action} ${reason} after ${pending.attempt} attempts`);
  }

  private cancelPending(): void {
    if (this.pending) {
      this.clearTimer(this.pending);
      this.pending = null;
    }
  }

  private clearTimer(pending: PendingConfirmation): void {
    if (pending.timer) {
      clearTimeout(pending.timer);
      pending.timer = null;
    }
  }

  /** Wrap a display call so a synchronous throw becomes a rejection. */
  private callDisplay(fn: () => Promise<void>): Promise<void> {
    try {
      return fn();
    } catch (err) {
      return Promise.reject(err);
    }
  }

  /** Wait for a request to settle, at most confirmTimeoutMs. Never rejects. */
  private async boundedWait(call: Promise<void>): Promise<boolean> {
    const deferred = createDeferred<boolean>();
    const timer = setTimeout(() => deferred.resolve(false), this.confirmTimeoutMs);
    void call.then(
      () => deferred.resolve(true),
      (err: unknown) => {
        this.logger.error(`Display request failed: ${err instanceof Error ? err.message : String(err)}`);
        deferred.resolve(false);
      },
    );
    const settled = await deferred.promise;
    clearTimeout(timer);
    return settled;
  }

  private releaseDisplay(): void {
    this.cancelPending();
    this.unsubscribeDisplay?.();
    this.unsubscribeDisplay = null;
  }

  // ─── Helpers ────────────────────────────────────────────────────────────────

  /** The active module if a session-level signal for `moduleId` should be honoured now. */
  private activeModuleFor(moduleId: ModuleId | undefined, action: string): ModuleId | null {
    if (this._state.phase !== "moduleActive") {
      this.logger.info(`Ignored ${action} signal in "${this._state.phase}"`);
      return null;
    }
    const active = this._state.moduleId;
    if (moduleId !== undefined && moduleId !== active) {
      this.logger.info(`Ignored stale ${action} signal for ${moduleId}; ${active} is active`);
      return null;
    }
    return active;
  }

  /**
   * Accept a sequencer step only when the completed count grew since the last
   * observation, so a duplicate notification can never advance twice.
   */
  private observeCompletion(step: AdvanceResult | null): step is AdvanceResult {
    const count = this.sequencer.completedCount;
    if (step === null || count <= this.lastObservedCompletedCount) {
      this.logger.info(`Duplicate completion absorbed (completed ${count})`);
      return false;
    }
    this.lastObservedCompletedCount = count;
    return true;
  }

  private sealAndPersist(moduleId: ModuleId, skipped: boolean): void {
    const result = this.results.get(moduleId);
    invariant(result !== undefined, `No result recorded for ${moduleId}`);
    if (!isSealed(result)) sealResult(result, { skipped });
    this.persistModule(result);
  }

  private resultOptionsFor(moduleId: ModuleId): ResultOptions {
    const base = this.options.resultOptions ?? DEFAULT_RESULT_OPTIONS;
    if (moduleId !== "delayedRecall") return base;
    // Delayed recall always uses the list from the first immediate-memory trial
    const memory = this.getResult("immediateMemory");
    const firstTrial = memory?.trials[0];
    return firstTrial ? { ...base, delayedRecallWords: firstTrial.words } : base;
  }

  private detachController(): void {
    this.router.setTarget(null);
    this.controller?.dispose();
    this.controller = null;
  }

  private markPresentation(moduleId: ModuleId, presentation: "shown" | "unconfirmed"): void {
    if (this._state.phase === "moduleActive" && this._state.moduleId === moduleId) {
      this.setState({ ...this._state, presentation });
    }
  }

  private setState(state: OrchestratorState): void {
    this._state = state;
    this.options.onStateChange?.(state);
  }

  private persistModule(result: ModuleResult): void {
    const sink = this.options.sink;
    if (!sink) return;
    this.pendingWrites.push(
      sink.saveModuleResult(this.session, result).catch((err: unknown) => {
        this.logger.error(`Saving ${result.kind} failed: ${err instanceof Error ? err.message : String(err)}`);
      }),
    );
  }

  private persistSession(scores: ScoreSummary): void {
    const sink = this.options.sink;
    if (!sink) return;
    this.pendingWrites.push(
      sink.saveSession(this.session, [...this.results.values()], scores).catch((err: unknown) => {
        this.logger.error(`Saving session failed: ${err instanceof Error ? err.message : String(err)}`);
      }),
    );
  }
}
