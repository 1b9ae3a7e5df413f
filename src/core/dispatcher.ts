import type { Logger } from 'pino';
import { copyContext } from './context.js';
import { DispatchError, InvalidQuery, PipelineError, describeError } from './errors.js';
import type { Pipeline } from './pipeline.js';
import type { SessionIdentity } from './session.js';
import type { SessionStore } from './session_store.js';

export interface DispatchOptions {
  /** Aborts lock waits and in-flight generation; nothing is saved for an aborted turn. */
  readonly signal?: AbortSignal;
}

export interface Dispatcher {
  handle(userId: string, conversationId: string, query: string, options?: DispatchOptions): Promise<string>;
  /** Forgets the conversation's carryover once any in-flight turn has finished. */
  reset(userId: string, conversationId: string, options?: DispatchOptions): Promise<void>;
}

export interface DispatcherDeps {
  readonly store: SessionStore;
  readonly pipeline: Pipeline;
  readonly log: Logger;
  readonly now?: () => number;
}

/**
 * Entry point for chat adapters and the only writer of session state.
 * A turn runs on a copy of the session context and commits it only on success.
 */
export function createDispatcher(deps: DispatcherDeps): Dispatcher {
  const { store, pipeline, log } = deps;
  const now = deps.now ?? Date.now;

  return {
    async handle(userId, conversationId, query, options = {}) {
      const identity: SessionIdentity = { userId, conversationId };
      if (!query.trim()) {
        throw new DispatchError(identity, new InvalidQuery());
      }

      const { signal } = options;
      const started = Date.now();
      log.info({ userId, conversationId }, 'dispatch:start');

      try {
        return await store.withLock(
          identity,
          async () => {
            const session = await store.getOrCreate(identity);
            const result = await pipeline.run(query, copyContext(session.context), { signal });
            signal?.throwIfAborted();

            await store.save({ ...session, context: result.context, lastActive: now() });
            log.info(
              { userId, conversationId, stages: result.completed, ms: Date.now() - started },
              'dispatch:done',
            );
            return result.text;
          },
          signal,
        );
      } catch (error) {
        log.warn(
          {
            userId,
            conversationId,
            stage: error instanceof PipelineError ? error.stageName : undefined,
            error: describeError(error),
            ms: Date.now() - started,
          },
          'dispatch:failed',
        );
        throw new DispatchError(identity, error);
      }
    },

    async reset(userId, conversationId, options = {}) {
      const identity: SessionIdentity = { userId, conversationId };
      try {
        await store.withLock(identity, () => store.delete(identity), options.signal);
      } catch (error) {
        throw new DispatchError(identity, error);
      }
      log.info({ userId, conversationId }, 'dispatch:reset');
    },
  };
}
