// Sideline Assessment - Shared TypeScript interfaces and types
// Module results, commands, session state and the collaborator contracts
// the engine talks to (display, storage, command source).

// ─── Modules & Sessions ─────────────────────────────────────────────────────────

export type ModuleId =
  | "symptoms"
  | "orientation"
  | "concentration"
  | "immediateMemory"
  | "coordination"
  | "balance"
  | "delayedRecall";

export type SessionType = "full" | "emergency";

export interface Session {
  id: string;
  createdAt: Date;
  sessionType: SessionType;
  modules: readonly ModuleId[];
  completedModules: ModuleId[]; // insertion order = completion order
  skippedModules: ModuleId[];
  currentIndex: number; // -1 before start, modules.length when finished
}

// ─── Module Results ─────────────────────────────────────────────────────────────

interface ResultBase {
  createdAt: Date;
  completedAt: Date | null; // non-null once sealed
  skipped: boolean;
}

export type SymptomToggle = "physical" | "mental";

export interface SymptomResult extends ResultBase {
  kind: "symptoms";
  ratings: Record<string, number>; // 0–6 per symptom
  worsensWithPhysicalActivity: boolean;
  worsensWithMentalActivity: boolean;
  percentOfNormal: number; // 0–100
  symptomCount: number;
  severityScore: number;
}

export interface OrientationResult extends ResultBase {
  kind: "orientation";
  answers: Array<boolean | null>; // null = not yet answered
  score: number;
}

export interface ConcentrationResult extends ResultBase {
  kind: "concentration";
  sequences: number[][]; // presented catalogue, shortest first
  responses: string[]; // digits-only responses, one per attempted sequence
  monthsCorrect: boolean | null;
  digitScore: number;
  consecutiveFails: number;
  presentationStopped: boolean;
  monthsScore: number;
  score: number;
}

export interface MemoryTrial {
  trialNumber: number;
  words: string[];
  recalledWords: string[];
  score: number;
}

export interface ImmediateMemoryResult extends ResultBase {
  kind: "immediateMemory";
  trials: MemoryTrial[];
  score: number;
}

export interface DelayedRecallResult extends ResultBase {
  kind: "delayedRecall";
  words: string[]; // captured from the first immediate-memory trial
  recalledWords: string[];
  score: number;
}

export type CoordinationItem = "fingerToNose" | "tandemGait";

export interface CoordinationResult extends ResultBase {
  kind: "coordination";
  fingerToNoseNormal: boolean | null;
  tandemGaitNormal: boolean | null;
  score: number;
}

export type BalanceStance =
  | "doubleLegFirm"
  | "singleLegFirm"
  | "tandemFirm"
  | "doubleLegFoam"
  | "singleLegFoam"
  | "tandemFoam";

export interface BalanceTrial {
  stance: BalanceStance;
  errorCount: number; // raw observed errors
  score: number; // capped per trial
}

export interface BalanceResult extends ResultBase {
  kind: "balance";
  trials: BalanceTrial[];
  score: number;
}

export type ModuleResult =
  | SymptomResult
  | OrientationResult
  | ConcentrationResult
  | ImmediateMemoryResult
  | DelayedRecallResult
  | CoordinationResult
  | BalanceResult;

export type ResultOf<K extends ModuleId> = Extract<ModuleResult, { kind: K }>;

export interface ScoreSummary {
  symptomCount: number | null;
  symptomSeverity: number | null;
  orientation: number | null;
  immediateMemory: number | null;
  concentration: number | null;
  delayedRecall: number | null;
  coordination: number | null;
  balanceErrors: number | null;
  /** Orientation + immediate memory + concentration + delayed recall, over the modules present. */
  cognitiveTotal: number;
}

// ─── Commands ───────────────────────────────────────────────────────────────────

export type Command =
  | { type: "next" }
  | { type: "previous" }
  | { type: "goBack" }
  | { type: "markCorrect" }
  | { type: "markIncorrect" }
  | { type: "completeModule" }
  | { type: "skipModule" }
  | { type: "showHelp" }
  | { type: "hideHelp" }
  | { type: "toggleHelp" }
  | { type: "repeat" }
  | { type: "exitAssessment" }
  | { type: "enableVoice" }
  | { type: "disableVoice" }
  | { type: "rate"; value: number }
  | { type: "setSymptomRating"; symptom: string; rating: number }
  | { type: "setToggle"; question: SymptomToggle; value: boolean }
  | { type: "setPercentNormal"; value: number }
  | { type: "digitResponse"; text: string }
  | { type: "recallWord"; word: string }
  | { type: "nextTrial" }
  | { type: "startTimer" }
  | { type: "stopTimer" }
  | { type: "addError" }
  | { type: "resetTest" };

export type CommandType = Command["type"];

/** Named contexts mirroring the screen the examiner is looking at. */
export type CommandContext = "dashboard" | "sessionStart" | "module" | "transition" | "summary";

// ─── Orchestrator State Machine ─────────────────────────────────────────────────

export type OrchestratorState =
  | { phase: "notStarted" }
  | { phase: "moduleActive"; index: number; moduleId: ModuleId; presentation: "opening" | "shown" | "unconfirmed" }
  | { phase: "transitioning"; reason: "advance" | "retreat" | "finish"; from: ModuleId }
  | { phase: "finished"; outcome: "completed" | "exited" };

// ─── External Collaborators ─────────────────────────────────────────────────────

/**
 * The immersive display subsystem. Only its open/dismiss requests and its
 * shown/hidden signal matter to the engine.
 */
export interface DisplayMode {
  readonly isShown: boolean;
  requestShow(moduleId: ModuleId): Promise<void>;
  requestHide(): Promise<void>;
  /** Subscribe to shown/hidden transitions. Returns an unsubscribe function. */
  onShownChanged(listener: (shown: boolean) => void): () => void;
}

/** Storage for completed results. Written at module completion and session end, never read back. */
export interface ResultSink {
  saveModuleResult(session: Session, result: ModuleResult): Promise<void>;
  saveSession(session: Session, results: readonly ModuleResult[], summary: ScoreSummary): Promise<void>;
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

// ─── WebSocket Protocol ─────────────────────────────────────────────────────────

/** Where the examiner is inside the active module. */
export interface ControllerStatus {
  moduleId: ModuleId;
  /** Question, symptom, sequence, trial, item or stance index. */
  position: number;
  /** Balance only. */
  observing?: boolean;
  remainingMs?: number;
}

export interface SessionSnapshot {
  session: Session;
  state: OrchestratorState;
  currentModule: ModuleId | null;
  controller: ControllerStatus | null;
  results: ModuleResult[];
  scores: ScoreSummary;
}

// Client → Server messages
export type ClientMessage =
  | { type: "start_session"; sessionType: SessionType }
  | { type: "command"; command: Command }
  | { type: "utterance"; text: string }
  | { type: "display_state"; shown: boolean }
  | { type: "context"; context: CommandContext }
  | { type: "interaction"; active: boolean }
  | { type: "exit" };

// Server → Client messages
export type ServerMessage =
  | { type: "session_state"; snapshot: SessionSnapshot | null }
  | { type: "display_request"; action: "show" | "hide"; moduleId: ModuleId | null }
  | { type: "help"; visible: boolean; commands: string[] }
  | { type: "voice_state"; enabled: boolean }
  | { type: "assessment_finished"; outcome: "completed" | "exited"; scores: ScoreSummary }
  | { type: "error"; message: string; recoverable: boolean };
