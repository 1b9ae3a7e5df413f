import type pino from 'pino';
import { loadLlmConfig } from './config/llm.js';
import { loadPipelineConfig, type PipelineConfig } from './config/pipeline.js';
import { loadSessionConfig, type SessionConfig } from './config/session.js';
import { createDinnerStages } from './core/dinner.js';
import { createDispatcher, type Dispatcher } from './core/dispatcher.js';
import type { GenerationCapability } from './core/generation.js';
import { createChatCompletionsGenerator } from './core/llm.js';
import { createPipeline, type Pipeline } from './core/pipeline.js';
import { loadPrompts } from './core/prompts.js';
import type { SessionStore } from './core/session_store.js';
import { createInMemoryStore } from './core/stores/inmemory.js';

export interface Planner {
  readonly dispatcher: Dispatcher;
  readonly pipeline: Pipeline;
  readonly store: SessionStore;
}

export interface PlannerOptions {
  readonly log: pino.Logger;
  /** Defaults to the chat-completions client configured from the environment. */
  readonly generator?: GenerationCapability;
  readonly pipelineConfig?: PipelineConfig;
  readonly sessionConfig?: SessionConfig;
  readonly promptsDir?: string;
}

/**
 * Wires prompts, stages, pipeline, session store and dispatcher. Stage wiring
 * is validated here, so a misconfigured pipeline fails before serving traffic.
 */
export async function createPlanner(options: PlannerOptions): Promise<Planner> {
  const { log } = options;
  const pipelineConfig = options.pipelineConfig ?? loadPipelineConfig();
  const sessionConfig = options.sessionConfig ?? loadSessionConfig();
  const generator = options.generator ?? createChatCompletionsGenerator(loadLlmConfig(), { log });

  const prompts = await loadPrompts(options.promptsDir);
  const pipeline = createPipeline(createDinnerStages(prompts), generator, {
    retry: {
      maxAttempts: pipelineConfig.maxAttempts,
      initialDelayMs: pipelineConfig.initialDelayMs,
      maxDelayMs: pipelineConfig.maxDelayMs,
    },
    vars: { language: pipelineConfig.language },
    log,
  });

  const store = createInMemoryStore(sessionConfig);
  log.info(
    { ttlSec: sessionConfig.ttlSec, maxSessions: sessionConfig.maxSessions, stages: pipeline.stages.map((s) => s.name) },
    'Planner initialized',
  );

  return {
    pipeline,
    store,
    dispatcher: createDispatcher({ store, pipeline, log }),
  };
}
