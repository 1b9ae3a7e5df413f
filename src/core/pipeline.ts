import type { Logger } from 'pino';
import { copyContext, type Context } from './context.js';
import { MissingContextKey, PipelineConfigError, PipelineError, describeError } from './errors.js';
import type { GenerationCapability } from './generation.js';
import { executeStage, type PromptVars, type StageResult, type StageSpec } from './stage.js';
import {
  DEFAULT_STAGE_RETRY,
  createStageRetryPolicy,
  type StageRetryOptions,
} from '../util/resilience.js';

export interface PipelineOptions {
  readonly retry?: StageRetryOptions;
  readonly vars?: PromptVars;
  readonly log?: Logger;
}

export interface PipelineRunOptions {
  readonly signal?: AbortSignal;
}

export interface PipelineResult {
  /** The terminal stage's text, verbatim. */
  readonly text: string;
  readonly context: Context;
  readonly completed: readonly string[];
}

export interface Pipeline {
  readonly stages: readonly StageSpec[];
  run(query: string, initialContext: Context, options?: PipelineRunOptions): Promise<PipelineResult>;
}

/**
 * Checks stage wiring once at startup: every required key must be the output
 * of an earlier stage, names are unique, and exactly the last stage is terminal.
 */
export function validatePipeline(stages: readonly StageSpec[]): void {
  if (stages.length === 0) {
    throw new PipelineConfigError('Pipeline must contain at least one stage');
  }

  const names = new Set<string>();
  const produced = new Set<string>();

  stages.forEach((stage, index) => {
    if (names.has(stage.name)) {
      throw new PipelineConfigError(`Duplicate stage name '${stage.name}'`);
    }
    names.add(stage.name);

    for (const key of stage.requires) {
      if (!produced.has(key)) {
        throw new MissingContextKey(stage.name, key);
      }
    }

    const isLast = index === stages.length - 1;
    if (stage.outputKey === null && !isLast) {
      throw new PipelineConfigError(`Terminal stage '${stage.name}' must be the last stage`);
    }
    if (stage.outputKey !== null && isLast) {
      throw new PipelineConfigError(`Last stage '${stage.name}' must be terminal (no output key)`);
    }
    if (stage.outputKey !== null) {
      produced.add(stage.outputKey);
    }
  });
}

export function createPipeline(
  stages: readonly StageSpec[],
  generator: GenerationCapability,
  options: PipelineOptions = {},
): Pipeline {
  validatePipeline(stages);

  const ordered = Object.freeze([...stages]);
  const policy = createStageRetryPolicy(options.retry ?? DEFAULT_STAGE_RETRY);
  const vars = options.vars ?? {};
  const log = options.log;

  async function run(
    query: string,
    initialContext: Context,
    runOptions: PipelineRunOptions = {},
  ): Promise<PipelineResult> {
    let context: Context = copyContext(initialContext);
    const completed: string[] = [];

    for (const stage of ordered) {
      const started = Date.now();
      log?.debug({ stage: stage.name }, 'stage:start');

      let result: StageResult;
      try {
        result = await policy.execute(({ attempt, signal }) => {
          if (attempt > 0) {
            log?.info({ stage: stage.name, attempt: attempt + 1 }, 'stage:retry');
          }
          return executeStage(stage, context, query, generator, { signal, vars });
        }, runOptions.signal);
      } catch (error) {
        log?.warn(
          { stage: stage.name, ms: Date.now() - started, error: describeError(error) },
          'stage:failed',
        );
        throw new PipelineError(stage.name, error);
      }

      context = result.context;
      completed.push(stage.name);
      log?.debug({ stage: stage.name, ms: Date.now() - started }, 'stage:done');

      if (stage.outputKey === null) {
        return { text: result.text, context, completed };
      }
    }

    // validatePipeline guarantees a terminal last stage.
    throw new PipelineConfigError('Pipeline ended without a terminal stage');
  }

  return { stages: ordered, run };
}
