import type { HierarchyViolation, HierarchyViolationKind } from '../engine/hierarchy/types.js';

export class NotFoundError extends Error {
  public statusCode = 404;

  constructor(resource: string, id?: string, scope?: string) {
    const base = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(scope ? `${base} in ${scope}` : base);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends Error {
  public statusCode = 400;
  public details?: Record<string, unknown>;

  constructor(message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ValidationError';
    this.details = details;
  }
}

/**
 * A manager assignment or reparenting rejected by the hierarchy engine.
 * Carries the violation so the error handler can expose its kind.
 */
export class HierarchyError extends ValidationError {
  public kind: HierarchyViolationKind;

  constructor(violation: HierarchyViolation) {
    super(violation.message, { kind: violation.kind, ...violation.context });
    this.name = 'HierarchyError';
    this.kind = violation.kind;
  }
}

/**
 * The store could not complete a unit of work (unreachable, or a transaction
 * conflict that outlived its retries). Safe to retry.
 */
export class TransientStoreError extends Error {
  public statusCode = 503;
  public attempts: number;

  constructor(message: string, attempts: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransientStoreError';
    this.attempts = attempts;
  }
}
