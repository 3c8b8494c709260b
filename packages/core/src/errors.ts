import type { LayoutFatal, LayoutFatalCode, LayoutResult } from "./layout/validateProps.js";

/**
 * Error class for layout failures surfaced as exceptions.
 * The `code` property identifies the specific violation.
 */
export class FoldbarError extends Error {
  override readonly name = "FoldbarError";
  readonly code: LayoutFatalCode;

  constructor(code: LayoutFatalCode, message?: string) {
    super(message ?? code);
    this.code = code;

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, FoldbarError);
    }
  }

  static fromFatal(fatal: LayoutFatal): FoldbarError {
    return new FoldbarError(fatal.code, `${fatal.code}: ${fatal.detail}`);
  }
}

/** Return the value of a successful result, throwing FoldbarError otherwise. */
export function unwrapLayout<T>(res: LayoutResult<T>): T {
  if (!res.ok) throw FoldbarError.fromFatal(res.fatal);
  return res.value;
}

export function describeThrown(v: unknown): string {
  if (v instanceof Error) return `${v.name}: ${v.message}`;
  return String(v);
}
