export const ErrorCode = {
  Validation: "VALIDATION",
  NotFound: "NOT_FOUND",
  Parse: "PARSE",
  Upstream: "UPSTREAM",
  InvalidLigand: "INVALID_LIGAND",
  SessionStart: "SESSION_START",
  Render: "RENDER",
  DockingEngine: "DOCKING_ENGINE",
  DockingTimeout: "DOCKING_TIMEOUT",
  Capacity: "CAPACITY",
  EmptyPocket: "EMPTY_POCKET",
  ProcessTimeout: "PROCESS_TIMEOUT",
  ProcessSpawn: "PROCESS_SPAWN",
  Cancelled: "CANCELLED"
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppErrorOptions {
  details?: Record<string, unknown>;
  cause?: unknown;
  retryable?: boolean;
}

/** Base of every error the core raises on purpose; anything else is a bug. */
export class AppError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.details = options.details ?? {};
    this.retryable = options.retryable ?? false;
  }

  toJSON(): { code: ErrorCode; message: string; details: Record<string, unknown> } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.Validation, message, options);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.NotFound, message, options);
  }
}

export class ParseError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.Parse, message, options);
  }
}

export class UpstreamError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.Upstream, message, { retryable: true, ...options });
  }
}

export class InvalidLigandError extends AppError {
  readonly position: number | null;

  constructor(message: string, position: number | null, options?: AppErrorOptions) {
    super(ErrorCode.InvalidLigand, message, { ...options, details: { position, ...options?.details } });
    this.position = position;
  }
}

export class SessionStartError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.SessionStart, message, { retryable: true, ...options });
  }
}

export class RenderError extends AppError {
  /** True when the session survived and stays usable. */
  readonly recoverable: boolean;

  constructor(message: string, recoverable: boolean, options?: AppErrorOptions) {
    super(ErrorCode.Render, message, { ...options, details: { recoverable, ...options?.details } });
    this.recoverable = recoverable;
  }
}

export class DockingEngineError extends AppError {
  readonly stderr: string;

  constructor(message: string, stderr: string, options?: AppErrorOptions) {
    super(ErrorCode.DockingEngine, message, { ...options, details: { stderr: tail(stderr), ...options?.details } });
    this.stderr = stderr;
  }
}

export class DockingTimeoutError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.DockingTimeout, message, { retryable: true, ...options });
  }
}

export class CapacityError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.Capacity, message, { retryable: true, ...options });
  }
}

export class EmptyPocketError extends AppError {
  constructor(message = "pocket has no residues", options?: AppErrorOptions) {
    super(ErrorCode.EmptyPocket, message, options);
  }
}

export class ProcessTimeoutError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.ProcessTimeout, message, { retryable: true, ...options });
  }
}

export class ProcessSpawnError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super(ErrorCode.ProcessSpawn, message, options);
  }
}

export class CancelledError extends AppError {
  constructor(message = "operation cancelled", options?: AppErrorOptions) {
    super(ErrorCode.Cancelled, message, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function tail(text: string, max = 4000): string {
  return text.length > max ? text.slice(text.length - max) : text;
}
