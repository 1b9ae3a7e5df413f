import { hasKey, withEntry, type Context } from './context.js';
import { EmptyGeneration, GenerationFailure, MissingContextKey, describeError } from './errors.js';
import type { GenerationCapability } from './generation.js';

/** Static values available to every prompt, e.g. the reply language. */
export type PromptVars = Readonly<Record<string, string>>;

export type PromptBuilder = (context: Context, query: string, vars: PromptVars) => string;

export interface StageSpec {
  readonly name: string;
  readonly requires: readonly string[];
  /** `null` marks the terminal stage: its text is the pipeline's answer. */
  readonly outputKey: string | null;
  readonly buildPrompt: PromptBuilder;
}

export interface StageResult {
  readonly context: Context;
  readonly text: string;
}

export interface StageRunOptions {
  readonly signal?: AbortSignal;
  readonly vars?: PromptVars;
}

export function defineStage(spec: StageSpec): StageSpec {
  return Object.freeze({
    name: spec.name,
    requires: Object.freeze([...spec.requires]),
    outputKey: spec.outputKey,
    buildPrompt: spec.buildPrompt,
  });
}

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Replaces `{name}` slots with, in order of precedence, the raw query
 * (`{query}`), a context value, or a static var. Unknown slots become empty.
 */
export function fillTemplate(
  template: string,
  context: Context,
  query: string,
  vars: PromptVars = {},
): string {
  return template.replace(PLACEHOLDER, (_match, name: string) => {
    if (name === 'query') return query;
    if (hasKey(context, name)) return context[name];
    if (hasKey(vars, name)) return vars[name];
    return '';
  });
}

export function templateStage(options: {
  name: string;
  requires?: readonly string[];
  outputKey: string | null;
  template: string;
}): StageSpec {
  const { template } = options;
  return defineStage({
    name: options.name,
    requires: options.requires ?? [],
    outputKey: options.outputKey,
    buildPrompt: (context, query, vars) => fillTemplate(template, context, query, vars),
  });
}

export async function executeStage(
  stage: StageSpec,
  context: Context,
  query: string,
  generator: GenerationCapability,
  options: StageRunOptions = {},
): Promise<StageResult> {
  for (const key of stage.requires) {
    if (!hasKey(context, key)) {
      throw new MissingContextKey(stage.name, key);
    }
  }

  const prompt = stage.buildPrompt(context, query, options.vars ?? {});

  let text: string;
  try {
    text = await generator.generate({ prompt, stageName: stage.name, signal: options.signal });
  } catch (error) {
    if (error instanceof GenerationFailure) throw error;
    if (options.signal?.aborted) {
      throw new GenerationFailure('cancelled', `Stage '${stage.name}' was cancelled`, { cause: error });
    }
    throw new GenerationFailure('unknown', `Generation failed: ${describeError(error)}`, { cause: error });
  }

  // A generator that ignores the signal must not commit work for a cancelled run.
  if (options.signal?.aborted) {
    throw new GenerationFailure('cancelled', `Stage '${stage.name}' was cancelled`, {
      cause: options.signal.reason,
    });
  }

  const trimmed = text.trim();
  if (!trimmed) {
    throw new EmptyGeneration(stage.name);
  }

  if (stage.outputKey === null) {
    return { context, text };
  }
  return { context: withEntry(context, stage.outputKey, trimmed), text: trimmed };
}
