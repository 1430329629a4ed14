// Sideline Assessment - Command Router
// Holds the single "controller currently on screen" slot and forwards inbound
// commands to it. Session-global commands (help, repeat, exit, voice on/off)
// are handled here regardless of the target. The command channel is
// best-effort: route() logs and drops anything it cannot deliver and never
// throws.
//
// Voice commands pass through two gates: voice control can be switched off
// (only "voice on" is heard while it is off), and every voice command is held
// back while the examiner is operating the screen by hand.

import type { Command, CommandContext, CommandType, ModuleId } from "./types.js";
import { createLogger, type Logger } from "./logger.js";

/**
 * Anything that can receive routed commands while its module is on screen.
 * dispatch() returns false when the command means nothing to the controller.
 */
export interface ModuleController {
  readonly moduleId: ModuleId;
  dispatch(command: Command): boolean;
  /** Human-readable phrases for the commands this controller understands. */
  commandHints(): readonly string[];
}

export type RouteOutcome = "global" | "dispatched" | "ignored" | "suppressed";

/** Where a command came from. Manual commands are never gated. */
export type CommandSource = "voice" | "manual";

export interface CommandRouterOptions {
  logger?: Logger;
  /** Called for "repeat" so the rendering side can re-announce the current prompt. */
  onRepeat?: () => void;
  /** Called for "exit assessment"; honoured even with no target installed. */
  onExit?: () => void;
  onHelpChanged?: (visible: boolean, commands: string[]) => void;
  onVoiceChanged?: (enabled: boolean) => void;
  /** Hide help automatically after this many ms. 0 keeps it up until dismissed. */
  helpAutoHideMs?: number;
}

const GLOBAL_COMMANDS: ReadonlySet<CommandType> = new Set<CommandType>([
  "showHelp",
  "hideHelp",
  "toggleHelp",
  "repeat",
  "exitAssessment",
  "enableVoice",
  "disableVoice",
]);

const DEFAULT_HELP_AUTO_HIDE_MS = 8000;

const CONTEXT_COMMANDS: Readonly<Record<Exclude<CommandContext, "module">, readonly string[]>> = {
  dashboard: ['"Start concussion test"', '"Emergency assessment"', '"Help"'],
  sessionStart: ['"Exit assessment"', '"Help"'],
  transition: ['"Exit assessment"', '"Repeat"', '"Help"'],
  summary: ['"Go to dashboard"', '"Help"'],
};

const MODULE_GLOBAL_COMMANDS: readonly string[] = ['"Skip module"', '"Repeat"', '"Exit assessment"'];

export function isGlobalCommand(command: Command): boolean {
  return GLOBAL_COMMANDS.has(command.type);
}

export class CommandRouter {
  private target: ModuleController | null = null;
  private _context: CommandContext = "dashboard";
  private _helpVisible = false;
  private _voiceEnabled = true;
  private _userInteracting = false;
  private helpTimer: ReturnType<typeof setTimeout> | null = null;
  private readonly logger: Logger;
  private readonly options: CommandRouterOptions;

  constructor(options: CommandRouterOptions = {}) {
    this.options = options;
    this.logger = options.logger ?? createLogger("CommandRouter");
  }

  get context(): CommandContext {
    return this._context;
  }

  get helpVisible(): boolean {
    return this._helpVisible;
  }

  get voiceEnabled(): boolean {
    return this._voiceEnabled;
  }

  get userInteracting(): boolean {
    return this._userInteracting;
  }

  get currentTarget(): ModuleController | null {
    return this.target;
  }

  /**
   * Replace the active target. The previous target, if any, is dropped; targets
   * never stack. null means no module currently accepts commands.
   */
  setTarget(controller: ModuleController | null): void {
    const previous = this.target?.moduleId ?? "none";
    this.target = controller;
    this.logger.info(`Target ${previous} → ${controller?.moduleId ?? "none"}`);
  }

  setContext(context: CommandContext): void {
    if (context === this._context) return;
    this._context = context;
    if (this._helpVisible) this.emitHelp();
  }

  setVoiceEnabled(enabled: boolean): void {
    if (enabled === this._voiceEnabled) return;
    this._voiceEnabled = enabled;
    this.logger.info(`Voice control ${enabled ? "on" : "off"}`);
    this.options.onVoiceChanged?.(enabled);
  }

  /** While true, voice commands are held back so they cannot fight manual input. */
  setUserInteracting(active: boolean): void {
    this._userInteracting = active;
  }

  /**
   * Deliver one command. Global commands are handled here; everything else
   * goes to the current target. Failures inside a controller are logged, not
   * rethrown.
   */
  route(command: Command, source: CommandSource = "manual"): RouteOutcome {
    if (source === "voice") {
      if (this._userInteracting) {
        this.logger.info(`Voice "${command.type}" suppressed during manual interaction`);
        return "suppressed";
      }
      if (!this._voiceEnabled && command.type !== "enableVoice") {
        this.logger.info(`Voice "${command.type}" suppressed: voice control is off`);
        return "suppressed";
      }
    }

    try {
      if (isGlobalCommand(command)) {
        this.handleGlobal(command);
        return "global";
      }

      if (!this.target) {
        this.logger.info(`Dropped "${command.type}": no active target (context ${this._context})`);
        return "ignored";
      }

      const handled = this.target.dispatch(command);
      if (!handled) {
        this.logger.info(`"${command.type}" not understood by ${this.target.moduleId}; ignored`);
        return "ignored";
      }
      return "dispatched";
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error(`Command "${command.type}" failed: ${message}`);
      return "ignored";
    }
  }

  /**
   * Help phrases for the current context. The returned iterable is lazy and
   * can be iterated any number of times; each pass reflects the state at the
   * time iteration starts.
   */
  availableCommands(): Iterable<string> {
    return {
      [Symbol.iterator]: () => this.generateCommands(),
    };
  }

  /** Clear the help timer and target. */
  dispose(): void {
    this.clearHelpTimer();
    this.target = null;
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private *generateCommands(): Generator<string> {
    if (this._context !== "module") {
      yield* CONTEXT_COMMANDS[this._context];
      return;
    }
    if (this.target) {
      yield* this.target.commandHints();
    }
    yield* MODULE_GLOBAL_COMMANDS;
    yield this._voiceEnabled ? '"Voice off"' : '"Voice on"';
    yield '"Help"';
  }

  private handleGlobal(command: Command): void {
    switch (command.type) {
      case "showHelp":
        this.setHelpVisible(true);
        break;
      case "hideHelp":
        this.setHelpVisible(false);
        break;
      case "toggleHelp":
        this.setHelpVisible(!this._helpVisible);
        break;
      case "repeat":
        this.options.onRepeat?.();
        break;
      case "exitAssessment":
        if (this.options.onExit) {
          this.options.onExit();
        } else {
          this.logger.warn("Exit requested but no exit handler is installed");
        }
        break;
      case "enableVoice":
        this.setVoiceEnabled(true);
        break;
      case "disableVoice":
        this.setVoiceEnabled(false);
        break;
      default:
        break;
    }
  }

  private setHelpVisible(visible: boolean): void {
    this.clearHelpTimer();
    this._helpVisible = visible;
    this.emitHelp();

    const autoHideMs = this.options.helpAutoHideMs ?? DEFAULT_HELP_AUTO_HIDE_MS;
    if (visible && autoHideMs > 0) {
      this.helpTimer = setTimeout(() => {
        this.helpTimer = null;
        this.setHelpVisible(false);
      }, autoHideMs);
    }
  }

  private emitHelp(): void {
    this.options.onHelpChanged?.(this._helpVisible, this._helpVisible ? [...this.availableCommands()] : []);
  }

  private clearHelpTimer(): void {
    if (this.helpTimer) {
      clearTimeout(this.helpTimer);
      this.helpTimer = null;
    }
  }
}
