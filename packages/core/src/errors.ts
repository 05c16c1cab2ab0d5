/**
 * packages/core/src/errors.ts — Error taxonomy for the box runtime.
 *
 * Why: Structural violations (cycles, unfocusable targets, bad props) are
 * rejected at the mutating call before any state changes. Every rejection is a
 * BoxError with a stable `code`, so callers can branch on the code instead of
 * parsing messages.
 *
 * Conditions that are NOT errors: a pointer event that hits nothing, a key event
 * with no focused box, and a press while a drag is active. Those are reported
 * through DispatchResult / diagnostics instead.
 */

export type BoxErrorCode =
  | "BOX_CYCLE"
  | "BOX_CYCLIC_ANCHOR"
  | "BOX_NOT_FOCUSABLE"
  | "BOX_INVALID_PROPS"
  | "BOX_INVALID_CONFIG"
  | "BOX_DESTROYED"
  | "BOX_FOREIGN_SURFACE"
  | "BOX_USER_CODE_THROW";

/**
 * Error class for all deterministic runtime violations.
 * The `code` property identifies the specific violation.
 */
export class BoxError extends Error {
  override readonly name: string = "BoxError";
  readonly code: BoxErrorCode;

  constructor(code: BoxErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** `addChild` would make a box its own ancestor. */
export class CycleError extends BoxError {
  override readonly name: string = "CycleError";

  constructor(detail: string) {
    super("BOX_CYCLE", detail);
  }
}

/** The anchor dependency graph contains a cycle; `path` lists it, closing node repeated. */
export class CyclicAnchorError extends BoxError {
  override readonly name: string = "CyclicAnchorError";
  readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super("BOX_CYCLIC_ANCHOR", `anchor cycle: ${path.join(" -> ")}`);
    this.path = Object.freeze(path.slice());
  }
}

export type NotFocusableReason = "not-focus-capable" | "detached" | "disabled" | "outside-modal";

export class NotFocusableError extends BoxError {
  override readonly name: string = "NotFocusableError";
  readonly reason: NotFocusableReason;

  constructor(boxId: string, reason: NotFocusableReason) {
    super("BOX_NOT_FOCUSABLE", `box#${boxId} cannot take focus (${reason})`);
    this.reason = reason;
  }
}

export function invalidProps(detail: string): never {
  throw new BoxError("BOX_INVALID_PROPS", detail);
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  try {
    return String(v);
  } catch {
    return "[unstringifiable thrown value]";
  }
}
