/**
 * Error types for widgetflow.
 *
 * Only API misuse throws. Runtime conditions (dead dependents, handler faults,
 * budget exhaustion, degenerate rectangles) are handled in place and reported
 * through the logger.
 */

/**
 * Deterministic error codes for all contract violations.
 * These are surfaced as WidgetFlowError instances.
 */
export type WidgetFlowErrorCode =
  | "WF_INVALID_CONFIG"
  | "WF_INVALID_ARGUMENT"
  | "WF_INVALID_TARGET"
  | "WF_INVALID_STATE"
  | "WF_REENTRANT_CALL"
  | "WF_DEAD_HANDLE"
  | "WF_USER_CODE_THROW";

/**
 * Error class for contract violations.
 * The `code` property identifies the specific violation.
 */
export class WidgetFlowError extends Error {
  override readonly name = "WidgetFlowError";
  readonly code: WidgetFlowErrorCode;

  constructor(code: WidgetFlowErrorCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WidgetFlowError);
    }
  }
}

export function isWidgetFlowError(v: unknown): v is WidgetFlowError {
  return v instanceof WidgetFlowError;
}

/** Render an unknown thrown value as a single diagnostic line. */
export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
