export type GenerationFailureKind =
  | 'timeout'
  | 'rate_limit'
  | 'server_error'
  | 'network'
  | 'client_error'
  | 'cancelled'
  | 'invalid_response'
  | 'unknown';

const TRANSIENT_KINDS: ReadonlySet<GenerationFailureKind> = new Set([
  'timeout',
  'rate_limit',
  'server_error',
  'network',
]);

export interface SessionIdentity {
  readonly userId: string;
  readonly conversationId: string;
}

export class PlannerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PlannerError';
  }
}

/**
 * A stage needed a context key that no earlier stage produced.
 * Raised by startup validation; at run time it indicates a wiring defect.
 */
export class MissingContextKey extends PlannerError {
  constructor(
    readonly stageName: string,
    readonly key: string,
  ) {
    super(`Stage '${stageName}' requires context key '${key}' which is not available`);
    this.name = 'MissingContextKey';
  }
}

export class EmptyGeneration extends PlannerError {
  constructor(readonly stageName: string) {
    super(`Stage '${stageName}' produced empty text`);
    this.name = 'EmptyGeneration';
  }
}

export class GenerationFailure extends PlannerError {
  readonly transient: boolean;
  readonly status?: number;

  constructor(
    readonly kind: GenerationFailureKind,
    message: string,
    options?: { cause?: unknown; status?: number },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'GenerationFailure';
    this.transient = TRANSIENT_KINDS.has(kind);
    this.status = options?.status;
  }
}

export class PipelineConfigError extends PlannerError {
  constructor(message: string) {
    super(message);
    this.name = 'PipelineConfigError';
  }
}

export class PipelineError extends PlannerError {
  constructor(
    readonly stageName: string,
    cause: unknown,
  ) {
    super(`Pipeline failed at stage '${stageName}': ${describeError(cause)}`, { cause });
    this.name = 'PipelineError';
  }
}

export class InvalidQuery extends PlannerError {
  constructor(message = 'Query must not be empty') {
    super(message);
    this.name = 'InvalidQuery';
  }
}

/**
 * The only error type webhook handlers need to understand.
 */
export class DispatchError extends PlannerError {
  constructor(
    readonly identity: SessionIdentity,
    cause: unknown,
  ) {
    super(
      `Dispatch failed for ${identity.userId}/${identity.conversationId}: ${describeError(cause)}`,
      { cause },
    );
    this.name = 'DispatchError';
  }
}

export function isTransientFailure(error: unknown): boolean {
  return error instanceof GenerationFailure && error.transient;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Follows the `cause` chain down to the innermost error.
 */
export function rootCause(error: unknown): unknown {
  let current = error;
  const seen = new Set<unknown>();
  while (current instanceof Error && current.cause !== undefined && !seen.has(current)) {
    seen.add(current);
    current = current.cause;
  }
  return current;
}
