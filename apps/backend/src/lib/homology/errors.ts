/**
 * Homology Errors
 *
 * Every failure the matching engine raises carries a `kind` from a closed
 * union, so callers switch on the kind instead of on the error class.
 */

export type HomologyErrorKind =
  // user input
  | "ILLEGAL_INPUT"
  | "NO_SUCH_NAMESPACE"
  | "INVALID_SKETCH"
  | "INCOMPATIBLE_NAMESPACES"
  | "INCOMPATIBLE_SKETCHES"
  | "UNKNOWN_IMPLEMENTATION"
  // store
  | "NO_SUCH_SEQUENCE"
  // fatal
  | "MISCONFIGURED"
  | "TOOL_FAILURE"
  | "DATA_CORRUPTION";

/**
 * Context attached to an error for operators. Never shown to API clients.
 */
export interface HomologyErrorDetails {
  namespaceId?: string;
  implementation?: string;
  /** Raw output captured from an external tool */
  diagnostic?: string;
  [key: string]: unknown;
}

const USER_ERROR_KINDS: ReadonlySet<HomologyErrorKind> = new Set([
  "ILLEGAL_INPUT",
  "NO_SUCH_NAMESPACE",
  "INVALID_SKETCH",
  "INCOMPATIBLE_NAMESPACES",
  "INCOMPATIBLE_SKETCHES",
  "UNKNOWN_IMPLEMENTATION",
]);

export class HomologyError extends Error {
  public readonly kind: HomologyErrorKind;
  public readonly details: HomologyErrorDetails;

  constructor(
    kind: HomologyErrorKind,
    message: string,
    options: { details?: HomologyErrorDetails; cause?: unknown } = {},
  ) {
    super(message, { cause: options.cause });
    this.name = "HomologyError";
    this.kind = kind;
    this.details = options.details ?? {};
  }

  /**
   * True when the caller caused the failure and may fix it by changing input
   */
  get isUserError(): boolean {
    return isUserError(this.kind);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      details: this.details,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
    };
  }
}

export function isHomologyError(error: unknown): error is HomologyError {
  return error instanceof HomologyError;
}

export function isUserError(kind: HomologyErrorKind): boolean {
  return USER_ERROR_KINDS.has(kind);
}

/**
 * HTTP-equivalent status for an error kind
 */
export function statusCodeFor(kind: HomologyErrorKind): number {
  switch (kind) {
    case "NO_SUCH_NAMESPACE":
    case "NO_SUCH_SEQUENCE":
      return 404;
    case "ILLEGAL_INPUT":
    case "INVALID_SKETCH":
    case "INCOMPATIBLE_NAMESPACES":
    case "INCOMPATIBLE_SKETCHES":
    case "UNKNOWN_IMPLEMENTATION":
      return 400;
    case "MISCONFIGURED":
    case "TOOL_FAILURE":
    case "DATA_CORRUPTION":
      return 500;
  }
}
