/**
 * Compiler error taxonomy.
 *
 * Every error is compile-time and non-retriable. Errors carry the offending
 * node's uid and, where the scheduler already assigned one, its time window
 * in tiny samples.
 */

export const ErrorCode = {
  STRUCTURE: 'structure',
  UNMAPPED_SIGNAL: 'unmapped_signal',
  UNKNOWN_HANDLE: 'unknown_handle',
  SCHEDULING_CONFLICT: 'scheduling_conflict',
  GRID_VIOLATION: 'grid_violation',
  UNSUPPORTED_CONSTRUCT: 'unsupported_construct',
  AMBIGUOUS_CASE: 'ambiguous_case',
} as const;
export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export interface TimeWindow {
  start: number;
  end: number;
}

export interface ErrorDetails {
  nodeId?: string;
  window?: TimeWindow;
}

export abstract class CompilerError extends Error {
  abstract readonly code: ErrorCode;
  readonly nodeId?: string;
  readonly window?: TimeWindow;

  constructor(message: string, details: ErrorDetails = {}) {
    super(message);
    this.name = new.target.name;
    this.nodeId = details.nodeId;
    this.window = details.window;
  }
}

/** Malformed declaration */
export class StructureError extends CompilerError {
  readonly code = ErrorCode.STRUCTURE;
}

export class UnmappedSignalError extends CompilerError {
  readonly code = ErrorCode.UNMAPPED_SIGNAL;
}

export class UnknownHandleError extends CompilerError {
  readonly code = ErrorCode.UNKNOWN_HANDLE;
}

export class SchedulingConflictError extends CompilerError {
  readonly code = ErrorCode.SCHEDULING_CONFLICT;
}

export class GridViolationError extends CompilerError {
  readonly code = ErrorCode.GRID_VIOLATION;
}

/** Requested construct exceeds the capability of the target device class */
export class UnsupportedConstructError extends CompilerError {
  readonly code = ErrorCode.UNSUPPORTED_CONSTRUCT;
}

export class AmbiguousCaseError extends CompilerError {
  readonly code = ErrorCode.AMBIGUOUS_CASE;
}

function isCompilerError(value: unknown): value is CompilerError {
  return value instanceof CompilerError;
}

/**
 * Run a stage body that reports through exceptions and convert the first
 * CompilerError into the collected-errors convention. Anything else is a bug
 * and propagates.
 */
export function collectErrors<T>(body: () => T): { value?: T; errors: CompilerError[] } {
  try {
    return { value: body(), errors: [] };
  } catch (err) {
    if (isCompilerError(err)) return { errors: [err] };
    throw err;
  }
}
