// Sideline Assessment - Module Controllers
// One controller per module kind. A controller is what the command router
// talks to while its module is on screen: it turns commands into result
// mutations and keeps its own cursor (question, stance, trial).

import type { ModuleController } from "./command-router.js";
import type {
  BalanceResult,
  Command,
  ConcentrationResult,
  ControllerStatus,
  CoordinationItem,
  CoordinationResult,
  DelayedRecallResult,
  ImmediateMemoryResult,
  ModuleId,
  ModuleResult,
  OrientationResult,
  SymptomResult,
} from "./types.js";
import {
  BALANCE_STANCES,
  SYMPTOMS,
  answerOrientation,
  isSealed,
  nextDigitSequenceIndex,
  recordBalanceError,
  recordDigitResponse,
  setCoordinationFinding,
  setMonthsCorrect,
  setBalanceErrors,
  setPercentOfNormal,
  setSymptomRating,
  setSymptomToggle,
  toggleRecalledWord,
} from "./module-results.js";
import { expectedDigitResponse } from "./scoring.js";
import { createLogger, type Logger } from "./logger.js";

/** Session-level actions a controller may ask for. Implemented by the orchestrator. */
export interface ModuleControllerContext {
  complete(moduleId: ModuleId): void;
  skip(moduleId: ModuleId): void;
  goBack(moduleId: ModuleId): void;
}

export interface ControllerOptions {
  /** Length of one balance observation window. */
  balanceWindowMs: number;
  logger?: Logger;
  /** Called when a controller changes on its own, e.g. a balance window running out. */
  onUpdate?: () => void;
}

export const DEFAULT_BALANCE_WINDOW_MS = 20_000;

// ─── Base ───────────────────────────────────────────────────────────────────────

abstract class BaseController<R extends ModuleResult> implements ModuleController {
  abstract readonly kind: R["kind"];
  protected readonly logger: Logger;

  constructor(
    readonly result: R,
    protected readonly context: ModuleControllerContext,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger("ModuleController");
  }

  get moduleId(): ModuleId {
    return this.result.kind;
  }

  dispatch(command: Command): boolean {
    switch (command.type) {
      case "completeModule":
        this.context.complete(this.moduleId);
        return true;
      case "skipModule":
        if (isSealed(this.result)) return false;
        this.context.skip(this.moduleId);
        return true;
      case "goBack":
        this.context.goBack(this.moduleId);
        return true;
      default:
        break;
    }

    // A revisited module is read-only; "next" moves on past it.
    if (isSealed(this.result)) {
      if (command.type === "next") {
        this.context.complete(this.moduleId);
        return true;
      }
      return false;
    }

    return this.handle(command);
  }

  commandHints(): readonly string[] {
    return [...this.hints(), '"Complete test"', '"Go back"'];
  }

  status(): ControllerStatus {
    return { moduleId: this.moduleId, position: this.position };
  }

  protected abstract get position(): number;

  /** Release timers. Called when the controller leaves the router. */
  dispose(): void {}

  protected abstract handle(command: Command): boolean;
  protected abstract hints(): readonly string[];
}

function step(cursor: number, delta: number, length: number): number {
  return Math.max(0, Math.min(length - 1, cursor + delta));
}

// ─── Symptoms ───────────────────────────────────────────────────────────────────

export class SymptomController extends BaseController<SymptomResult> {
  readonly kind = "symptoms";
  private cursor = 0;

  get currentSymptom(): string {
    return SYMPTOMS[this.cursor];
  }

  protected get position(): number {
    return this.cursor;
  }

  protected handle(command: Command): boolean {
    switch (command.type) {
      case "rate":
        setSymptomRating(this.result, this.currentSymptom, command.value);
        this.cursor = step(this.cursor, 1, SYMPTOMS.length);
        return true;
      case "setSymptomRating":
        return setSymptomRating(this.result, command.symptom, command.rating);
      case "setToggle":
        setSymptomToggle(this.result, command.question, command.value);
        return true;
      case "setPercentNormal":
        setPercentOfNormal(this.result, command.value);
        return true;
      case "next":
        this.cursor = step(this.cursor, 1, SYMPTOMS.length);
        return true;
      case "previous":
        this.cursor = step(this.cursor, -1, SYMPTOMS.length);
        return true;
      default:
        return false;
    }
  }

  protected hints(): readonly string[] {
    return ['"Rate 0" through "Rate 6"', '"Headache three"', '"Physical yes"', '"Eighty percent"', '"Next question"', '"Previous question"'];
  }
}

// ─── Orientation ────────────────────────────────────────────────────────────────

export class OrientationController extends BaseController<OrientationResult> {
  readonly kind = "orientation";
  private cursor = 0;

  get currentQuestion(): number {
    return this.cursor;
  }

  protected get position(): number {
    return this.cursor;
  }

  protected handle(command: Command): boolean {
    const count = this.result.answers.length;
    switch (command.type) {
      case "markCorrect":
      case "markIncorrect":
        answerOrientation(this.result, this.cursor, command.type === "markCorrect");
        this.cursor = step(this.cursor, 1, count);
        return true;
      case "next":
        this.cursor = step(this.cursor, 1, count);
        return true;
      case "previous":
        this.cursor = step(this.cursor, -1, count);
        return true;
      default:
        return false;
    }
  }

  protected hints(): readonly string[] {
    return ['"Correct"', '"Incorrect"', '"Next question"', '"Previous question"'];
  }
}

// ─── Concentration ──────────────────────────────────────────────────────────────

export type ConcentrationStep = "digitSpan" | "months";

export class ConcentrationController extends BaseController<ConcentrationResult> {
  readonly kind = "concentration";
  private _step: ConcentrationStep;

  constructor(result: ConcentrationResult, context: ModuleControllerContext, logger?: Logger) {
    super(result, context, logger);
    this._step = nextDigitSequenceIndex(result) === null ? "months" : "digitSpan";
  }

  get step(): ConcentrationStep {
    return this._step;
  }

  /** Index of the sequence on screen; the sequence count once on months. */
  protected get position(): number {
    const index = nextDigitSequenceIndex(this.result);
    return this._step === "months" || index === null ? this.result.sequences.length : index;
  }

  /** The digit sequence on screen, or null when digit span presentation is over. */
  get currentSequence(): readonly number[] | null {
    const index = nextDigitSequenceIndex(this.result);
    return index === null ? null : this.result.sequences[index];
  }

  protected handle(command: Command): boolean {
    if (this._step === "months") {
      switch (command.type) {
        case "markCorrect":
        case "markIncorrect":
          setMonthsCorrect(this.result, command.type === "markCorrect");
          return true;
        case "previous":
          if (nextDigitSequenceIndex(this.result) === null) return false;
          this._step = "digitSpan";
          return true;
        default:
          return false;
      }
    }

    const sequence = this.currentSequence;
    switch (command.type) {
      case "digitResponse":
        this.respond(command.text);
        return true;
      case "markCorrect":
        // Examiner confirms the athlete said it right
        this.respond(sequence ? expectedDigitResponse(sequence) : "");
        return true;
      case "markIncorrect":
        this.respond("");
        return true;
      case "next":
        this._step = "months";
        return true;
      default:
        return false;
    }
  }

  private respond(text: string): void {
    recordDigitResponse(this.result, text);
    if (nextDigitSequenceIndex(this.result) === null) {
      this.logger.info(
        `Digit span finished after ${this.result.responses.length} sequence(s), score ${this.result.digitScore}`,
      );
      this._step = "months";
    }
  }

  protected hints(): readonly string[] {
    return this._step === "digitSpan"
      ? ['Say the digits backwards, e.g. "seven two four"', '"Correct"', '"Incorrect"', '"Next"']
      : ['"Correct"', '"Incorrect"', '"Previous"'];
  }
}

// ─── Immediate memory ───────────────────────────────────────────────────────────

export class ImmediateMemoryController extends BaseController<ImmediateMemoryResult> {
  readonly kind = "immediateMemory";
  private trialIndex = 0;

  get currentTrial(): number {
    return this.trialIndex;
  }

  protected get position(): number {
    return this.trialIndex;
  }

  protected handle(command: Command): boolean {
    const count = this.result.trials.length;
    switch (command.type) {
      case "recallWord":
        toggleRecalledWord(this.result, command.word, this.trialIndex);
        return true;
      case "nextTrial":
      case "next":
        if (this.trialIndex + 1 >= count) return false;
        this.trialIndex++;
        return true;
      case "previous":
        if (this.trialIndex === 0) return false;
        this.trialIndex--;
        return true;
      default:
        return false;
    }
  }

  protected hints(): readonly string[] {
    return ["Say each recalled word", '"Next trial"', '"Previous"'];
  }
}

// ─── Delayed recall ─────────────────────────────────────────────────────────────

export class DelayedRecallController extends BaseController<DelayedRecallResult> {
  readonly kind = "delayedRecall";

  protected get position(): number {
    return 0;
  }

  protected handle(command: Command): boolean {
    if (command.type !== "recallWord") return false;
    toggleRecalledWord(this.result, command.word);
    return true;
  }

  protected hints(): readonly string[] {
    return ["Say each recalled word"];
  }
}

// ─── Coordination ───────────────────────────────────────────────────────────────

const COORDINATION_ITEMS: readonly CoordinationItem[] = ["fingerToNose", "tandemGait"];

export class CoordinationController extends BaseController<CoordinationResult> {
  readonly kind = "coordination";
  private cursor = 0;

  get currentItem(): CoordinationItem {
    return COORDINATION_ITEMS[this.cursor];
  }

  protected get position(): number {
    return this.cursor;
  }

  protected handle(command: Command): boolean {
    switch (command.type) {
      case "markCorrect":
      case "markIncorrect":
        setCoordinationFinding(this.result, this.currentItem, command.type === "markCorrect");
        this.cursor = step(this.cursor, 1, COORDINATION_ITEMS.length);
        return true;
      case "next":
      case "nextTrial":
        this.cursor = step(this.cursor, 1, COORDINATION_ITEMS.length);
        return true;
      case "previous":
        this.cursor = step(this.cursor, -1, COORDINATION_ITEMS.length);
        return true;
      default:
        return false;
    }
  }

  protected hints(): readonly string[] {
    return ['"Correct" (normal)', '"Incorrect" (abnormal)', '"Next trial"'];
  }
}

// ─── Balance ────────────────────────────────────────────────────────────────────

/**
 * Each stance gets a single observation window of windowMs. "Stop timer"
 * pauses it and "start timer" resumes with the time left; once a stance has
 * used its whole window it takes no more errors until it is reset. Errors only
 * count while the window is open. When a window runs out the controller moves
 * on to the next stance by itself.
 */
export class BalanceController extends BaseController<BalanceResult> {
  readonly kind = "balance";
  private stanceIndex = 0;
  private windowTimer: ReturnType<typeof setTimeout> | null = null;
  private windowOpenedAt = 0;
  private readonly remaining: number[];
  private readonly windowMs: number;
  private readonly onUpdate: (() => void) | undefined;

  constructor(
    result: BalanceResult,
    context: ModuleControllerContext,
    windowMs: number,
    logger?: Logger,
    onUpdate?: () => void,
  ) {
    super(result, context, logger);
    this.windowMs = windowMs;
    this.remaining = result.trials.map(() => windowMs);
    this.onUpdate = onUpdate;
  }

  get currentStance(): number {
    return this.stanceIndex;
  }

  get isObserving(): boolean {
    return this.windowTimer !== null;
  }

  /** Observation time left for the current stance. */
  get remainingMs(): number {
    const left = this.remaining[this.stanceIndex];
    return this.isObserving ? Math.max(0, left - (Date.now() - this.windowOpenedAt)) : left;
  }

  protected get position(): number {
    return this.stanceIndex;
  }

  status(): ControllerStatus {
    return { ...super.status(), observing: this.isObserving, remainingMs: this.remainingMs };
  }

  protected handle(command: Command): boolean {
    switch (command.type) {
      case "startTimer":
        return this.openWindow();
      case "stopTimer":
        if (!this.isObserving) return false;
        this.pauseWindow();
        return true;
      case "addError":
        if (!this.isObserving) return false;
        recordBalanceError(this.result, this.stanceIndex);
        return true;
      case "resetTest":
        this.clearTimer();
        this.remaining[this.stanceIndex] = this.windowMs;
        setBalanceErrors(this.result, this.stanceIndex, 0);
        this.logger.info(`Balance stance ${BALANCE_STANCES[this.stanceIndex]} reset`);
        return true;
      case "next":
      case "nextTrial":
        if (this.stanceIndex + 1 >= this.result.trials.length) return false;
        this.pauseWindow();
        this.stanceIndex++;
        return true;
      case "previous":
        if (this.stanceIndex === 0) return false;
        this.pauseWindow();
        this.stanceIndex--;
        return true;
      default:
        return false;
    }
  }

  dispose(): void {
    this.clearTimer();
  }

  private openWindow(): boolean {
    if (this.isObserving) return false;
    const left = this.remaining[this.stanceIndex];
    if (left <= 0) {
      this.logger.info(`Balance window for ${BALANCE_STANCES[this.stanceIndex]} already used; reset to observe again`);
      return false;
    }
    this.windowOpenedAt = Date.now();
    this.windowTimer = setTimeout(() => this.expireWindow(), left);
    return true;
  }

  private pauseWindow(): void {
    if (!this.isObserving) return;
    this.remaining[this.stanceIndex] = this.remainingMs;
    this.clearTimer();
  }

  private expireWindow(): void {
    this.windowTimer = null;
    this.remaining[this.stanceIndex] = 0;
    this.logger.info(`Balance window closed for ${BALANCE_STANCES[this.stanceIndex]}`);
    if (this.stanceIndex + 1 < this.result.trials.length) {
      this.stanceIndex++;
    }
    this.onUpdate?.();
  }

  private clearTimer(): void {
    if (this.windowTimer) {
      clearTimeout(this.windowTimer);
      this.windowTimer = null;
    }
  }

  protected hints(): readonly string[] {
    return ['"Start timer"', '"Stop timer"', '"Add error"', '"Reset test"', '"Next stance"', '"Previous stance"'];
  }
}

// ─── Factory ────────────────────────────────────────────────────────────────────

export type AssessmentController =
  | SymptomController
  | OrientationController
  | ConcentrationController
  | ImmediateMemoryController
  | DelayedRecallController
  | CoordinationController
  | BalanceController;

export function createModuleController(
  result: ModuleResult,
  context: ModuleControllerContext,
  options: ControllerOptions = { balanceWindowMs: DEFAULT_BALANCE_WINDOW_MS },
): AssessmentController {
  switch (result.kind) {
    case "symptoms":
      return new SymptomController(result, context, options.logger);
    case "orientation":
      return new OrientationController(result, context, options.logger);
    case "concentration":
      return new ConcentrationController(result, context, options.logger);
    case "immediateMemory":
      return new ImmediateMemoryController(result, context, options.logger);
    case "delayedRecall":
      return new DelayedRecallController(result, context, options.logger);
    case "coordination":
      return new CoordinationController(result, context, options.logger);
    case "balance":
      return new BalanceController(result, context, options.balanceWindowMs, options.logger, options.onUpdate);
  }
}
