/**
 * Error taxonomy. Every failure the engine raises is a `TracegraphError`.
 */

import type { AttributeId } from './types.js';

export type ErrorCode =
  | 'INVALID_OPERATION'
  | 'CYCLIC_DEPENDENCY'
  | 'COMPUTE_FAILED'
  | 'SHEET_INVALID';

export class TracegraphError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Misuse of the API: writing a derived attribute, writing during evaluation,
 * a handle from another engine.
 */
export class InvalidOperationError extends TracegraphError {
  constructor(message: string) {
    super('INVALID_OPERATION', message);
  }
}

/**
 * A compute function read an attribute that is being computed further up the
 * same evaluation stack.
 */
export class CyclicDependencyError extends TracegraphError {
  readonly cycle: AttributeId[];

  constructor(cycle: AttributeId[]) {
    const [entry] = cycle;
    super(
      'CYCLIC_DEPENDENCY',
      `Cyclic dependency: ${[...cycle, entry].join(' -> ')}`
    );
    this.cycle = cycle;
  }
}

/**
 * The compute function of `attributeId` threw. The thrown value is kept as
 * `cause`.
 */
export class ComputeFailedError extends TracegraphError {
  readonly attributeId: AttributeId;

  constructor(attributeId: AttributeId, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super('COMPUTE_FAILED', `Computing "${attributeId}" failed: ${reason}`, {
      cause,
    });
    this.attributeId = attributeId;
  }
}

/**
 * A sheet document or one of its formulas is invalid.
 */
export class SheetError extends TracegraphError {
  constructor(message: string) {
    super('SHEET_INVALID', message);
  }
}
