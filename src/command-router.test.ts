import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { CommandRouter, isGlobalCommand, type ModuleController } from "./command-router.js";
import type { Command } from "./types.js";
import { silentLogger } from "./logger.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function fakeController(handles: (command: Command) => boolean = () => true): ModuleController & {
  received: Command[];
} {
  const received: Command[] = [];
  return {
    moduleId: "orientation",
    received,
    dispatch(command: Command): boolean {
      received.push(command);
      return handles(command);
    },
    commandHints: () => ['"Correct"', '"Incorrect"'],
  };
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("CommandRouter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("classifies help, repeat and exit as global", () => {
    expect(isGlobalCommand({ type: "showHelp" })).toBe(true);
    expect(isGlobalCommand({ type: "exitAssessment" })).toBe(true);
    expect(isGlobalCommand({ type: "markCorrect" })).toBe(false);
  });

  it("drops module commands when no target is installed", () => {
    const router = new CommandRouter({ logger: silentLogger });
    expect(router.route({ type: "markCorrect" })).toBe("ignored");
  });

  it("forwards module commands to the target", () => {
    const router = new CommandRouter({ logger: silentLogger });
    const controller = fakeController();
    router.setTarget(controller);
    expect(router.route({ type: "markCorrect" })).toBe("dispatched");
    expect(controller.received).toEqual([{ type: "markCorrect" }]);
  });

  it("reports commands the target does not understand as ignored", () => {
    const router = new CommandRouter({ logger: silentLogger });
    router.setTarget(fakeController(() => false));
    expect(router.route({ type: "addError" })).toBe("ignored");
  });

  it("replaces the target instead of stacking", () => {
    const router = new CommandRouter({ logger: silentLogger });
    const first = fakeController();
    const second = fakeController();
    router.setTarget(first);
    router.setTarget(second);
    router.route({ type: "next" });
    expect(first.received).toEqual([]);
    expect(second.received).toEqual([{ type: "next" }]);
  });

  it("logs and swallows an error thrown by the target", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const router = new CommandRouter({ logger });
    router.setTarget(
      fakeController(() => {
        throw new Error("result sealed");
      }),
    );
    expect(router.route({ type: "markCorrect" })).toBe("ignored");
    expect(logger.error).toHaveBeenCalledWith('Command "markCorrect" failed: result sealed');
  });

  it("never forwards global commands to the target", () => {
    const onRepeat = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onRepeat });
    const controller = fakeController();
    router.setTarget(controller);
    expect(router.route({ type: "repeat" })).toBe("global");
    expect(onRepeat).toHaveBeenCalledTimes(1);
    expect(controller.received).toEqual([]);
  });

  it("honours exit with no target", () => {
    const onExit = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onExit });
    expect(router.route({ type: "exitAssessment" })).toBe("global");
    expect(onExit).toHaveBeenCalledTimes(1);
  });

  it("shows help with the context's commands and hides it after the delay", () => {
    const onHelpChanged = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onHelpChanged });
    router.setContext("sessionStart");

    router.route({ type: "showHelp" });
    expect(router.helpVisible).toBe(true);
    expect(onHelpChanged).toHaveBeenLastCalledWith(true, ['"Exit assessment"', '"Help"']);

    vi.advanceTimersByTime(7999);
    expect(router.helpVisible).toBe(true);
    vi.advanceTimersByTime(1);
    expect(router.helpVisible).toBe(false);
    expect(onHelpChanged).toHaveBeenLastCalledWith(false, []);
  });

  it("keeps help up when auto-hide is disabled", () => {
    const router = new CommandRouter({ logger: silentLogger, helpAutoHideMs: 0 });
    router.route({ type: "showHelp" });
    vi.advanceTimersByTime(60_000);
    expect(router.helpVisible).toBe(true);
    router.route({ type: "toggleHelp" });
    expect(router.helpVisible).toBe(false);
  });

  it("re-emits help when the context changes while visible", () => {
    const onHelpChanged = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onHelpChanged });
    router.route({ type: "showHelp" });
    router.setContext("summary");
    expect(onHelpChanged).toHaveBeenLastCalledWith(true, ['"Go to dashboard"', '"Help"']);
  });

  it("lists target hints followed by module-wide commands in module context", () => {
    const router = new CommandRouter({ logger: silentLogger });
    router.setContext("module");
    router.setTarget(fakeController());
    expect([...router.availableCommands()]).toEqual([
      '"Correct"',
      '"Incorrect"',
      '"Skip module"',
      '"Repeat"',
      '"Exit assessment"',
      '"Voice off"',
      '"Help"',
    ]);
  });

  it("yields a fresh pass on every iteration", () => {
    const router = new CommandRouter({ logger: silentLogger });
    const commands = router.availableCommands();
    expect([...commands]).toEqual(['"Start concussion test"', '"Emergency assessment"', '"Help"']);
    router.setContext("transition");
    expect([...commands]).toEqual(['"Exit assessment"', '"Repeat"', '"Help"']);
  });

  it("switches voice control off and back on by voice", () => {
    const onVoiceChanged = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onVoiceChanged });
    const controller = fakeController();
    router.setTarget(controller);

    expect(router.route({ type: "disableVoice" }, "voice")).toBe("global");
    expect(router.voiceEnabled).toBe(false);
    expect(router.route({ type: "markCorrect" }, "voice")).toBe("suppressed");
    expect(router.route({ type: "showHelp" }, "voice")).toBe("suppressed");
    expect(router.helpVisible).toBe(false);

    expect(router.route({ type: "enableVoice" }, "voice")).toBe("global");
    expect(router.route({ type: "markCorrect" }, "voice")).toBe("dispatched");
    expect(controller.received).toEqual([{ type: "markCorrect" }]);
    expect(onVoiceChanged.mock.calls).toEqual([[false], [true]]);
  });

  it("still delivers manual commands while voice is off", () => {
    const router = new CommandRouter({ logger: silentLogger });
    const controller = fakeController();
    router.setTarget(controller);
    router.setVoiceEnabled(false);
    expect(router.route({ type: "next" })).toBe("dispatched");
    expect(controller.received).toEqual([{ type: "next" }]);
  });

  it("offers voice on in help while voice is off", () => {
    const router = new CommandRouter({ logger: silentLogger });
    router.setContext("module");
    router.setVoiceEnabled(false);
    expect([...router.availableCommands()]).toEqual([
      '"Skip module"',
      '"Repeat"',
      '"Exit assessment"',
      '"Voice on"',
      '"Help"',
    ]);
  });

  it("holds back every voice command during manual interaction", () => {
    const onExit = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onExit });
    const controller = fakeController();
    router.setTarget(controller);

    router.setUserInteracting(true);
    expect(router.route({ type: "markCorrect" }, "voice")).toBe("suppressed");
    expect(router.route({ type: "exitAssessment" }, "voice")).toBe("suppressed");
    expect(router.route({ type: "enableVoice" }, "voice")).toBe("suppressed");
    expect(router.route({ type: "markIncorrect" })).toBe("dispatched");

    router.setUserInteracting(false);
    expect(router.route({ type: "markCorrect" }, "voice")).toBe("dispatched");
    expect(onExit).not.toHaveBeenCalled();
    expect(controller.received).toEqual([{ type: "markIncorrect" }, { type: "markCorrect" }]);
  });

  it("clears the target and help timer on dispose", () => {
    const onHelpChanged = vi.fn();
    const router = new CommandRouter({ logger: silentLogger, onHelpChanged });
    router.setTarget(fakeController());
    router.route({ type: "showHelp" });
    router.dispose();
    vi.advanceTimersByTime(10_000);
    expect(onHelpChanged).toHaveBeenCalledTimes(1);
    expect(router.currentTarget).toBeNull();
  });
});
