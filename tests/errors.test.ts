import { describe, expect, it } from '@jest/globals';
import {
  DispatchError,
  EmptyGeneration,
  GenerationFailure,
  MissingContextKey,
  PipelineError,
  PlannerError,
  isTransientFailure,
  rootCause,
} from '../src/core/errors.js';

describe('error taxonomy', () => {
  it('classifies generation failures by kind', () => {
    expect(new GenerationFailure('timeout', 't').transient).toBe(true);
    expect(new GenerationFailure('rate_limit', 'r').transient).toBe(true);
    expect(new GenerationFailure('server_error', 's').transient).toBe(true);
    expect(new GenerationFailure('network', 'n').transient).toBe(true);
    expect(new GenerationFailure('client_error', 'c').transient).toBe(false);
    expect(new GenerationFailure('cancelled', 'x').transient).toBe(false);
    expect(new GenerationFailure('invalid_response', 'i').transient).toBe(false);
    expect(new GenerationFailure('unknown', 'u').transient).toBe(false);
  });

  it('only treats transient generation failures as retryable', () => {
    expect(isTransientFailure(new GenerationFailure('rate_limit', 'slow down'))).toBe(true);
    expect(isTransientFailure(new GenerationFailure('client_error', 'bad'))).toBe(false);
    expect(isTransientFailure(new EmptyGeneration('idea'))).toBe(false);
    expect(isTransientFailure(new Error('boom'))).toBe(false);
  });

  it('keeps the root cause reachable through every layer', () => {
    const root = new GenerationFailure('server_error', 'HTTP 500: oops', { status: 500 });
    const error = new DispatchError({ userId: 'u1', conversationId: 'c1' }, new PipelineError('shopping', root));

    expect(rootCause(error)).toBe(root);
    expect(error.message).toBe("Dispatch failed for u1/c1: Pipeline failed at stage 'shopping': HTTP 500: oops");
    expect(error).toBeInstanceOf(PlannerError);
    expect(error.name).toBe('DispatchError');
  });

  it('names the stage and key that are missing', () => {
    const error = new MissingContextKey('recipe', 'shopping_list');

    expect(error.message).toBe("Stage 'recipe' requires context key 'shopping_list' which is not available");
    expect(error).toMatchObject({ stageName: 'recipe', key: 'shopping_list' });
  });

  it('returns a non-error value as its own root cause', () => {
    expect(rootCause('plain')).toBe('plain');
  });
});
