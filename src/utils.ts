// Shared utilities for the Sideline Assessment engine.
//
// Text normalization used by scoring and command parsing, and the invariant
// helper that guards programming errors (sealed results, bad indexes).

// ─── Invariants ─────────────────────────────────────────────────────────────────

/**
 * Thrown when the engine is driven into a state correct integration code never
 * produces. Never caught by the engine itself outside the command router.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolationError";
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(message);
  }
}

// ─── Text normalization ─────────────────────────────────────────────────────────

/**
 * Normalize a single recalled or presented word for comparison:
 * lowercase, letters and digits only.
 *
 *   "Harbor."  → "harbor"
 *   " PENCIL " → "pencil"
 *   "--"       → ""
 */
export function normalizeWord(word: string): string {
  return word.toLowerCase().replace(/[^\p{L}\p{N}]/gu, "");
}

/** Strip everything except ASCII digits. "7-2, 4" → "724". */
export function digitsOnly(text: string): string {
  return text.replace(/[^0-9]/g, "");
}

/**
 * Clean an utterance before phrase matching: lowercase, drop sentence
 * punctuation, hyphens become spaces, whitespace collapsed.
 */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/[.?!,;:]/g, "")
    .replace(/-/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

// ─── Narrowing ───────────────────────────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// ─── Freezing ───────────────────────────────────────────────────────────────────

/** Recursively freeze plain objects and arrays. Dates are left as they are. */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !(value instanceof Date) && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
