import Bottleneck from 'bottleneck';
import type { Logger } from 'pino';
import { fetch, type Dispatcher as HttpDispatcher } from 'undici';
import { z } from 'zod';
import type { LlmConfig } from '../config/llm.js';
import { GenerationFailure, describeError, type GenerationFailureKind } from './errors.js';
import type { GenerationCapability, GenerationRequest } from './generation.js';

const ChatCompletionResponse = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().optional(),
      completion_tokens: z.number().optional(),
    })
    .optional(),
});

export interface ChatCompletionsDeps {
  readonly log?: Logger;
  /** undici dispatcher for outbound requests; tests pass a MockAgent. */
  readonly dispatcher?: HttpDispatcher;
}

export function classifyStatus(status: number): GenerationFailureKind {
  if (status === 429) return 'rate_limit';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server_error';
  return 'client_error';
}

// Simple token counter (approximate, for logs only)
function countTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/**
 * Text generation over an OpenAI-compatible /chat/completions endpoint.
 * Every failure surfaces as a GenerationFailure classified for retry.
 */
export function createChatCompletionsGenerator(
  config: LlmConfig,
  deps: ChatCompletionsDeps = {},
): GenerationCapability {
  const url = `${config.baseUrl.replace(/\/$/, '')}/chat/completions`;
  const limiter = new Bottleneck({
    maxConcurrent: config.maxConcurrent,
    minTime: config.minTimeMs,
  });
  const log = deps.log;

  async function complete(request: GenerationRequest): Promise<string> {
    const { signal: callerSignal, stageName } = request;
    if (callerSignal?.aborted) {
      throw new GenerationFailure('cancelled', 'Generation cancelled by caller', {
        cause: callerSignal.reason,
      });
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error('llm_timeout')), config.timeoutMs);
    const signal = callerSignal ? AbortSignal.any([controller.signal, callerSignal]) : controller.signal;
    const reqStart = Date.now();

    let status: number;
    let bodyText: string;
    try {
      const res = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${config.apiKey}`,
        },
        body: JSON.stringify({
          model: config.model,
          messages: [{ role: 'user', content: request.prompt }],
          temperature: config.temperature,
          ...(config.maxTokens !== undefined ? { max_tokens: config.maxTokens } : {}),
        }),
        signal,
        dispatcher: deps.dispatcher,
      });
      status = res.status;
      bodyText = await res.text();
    } catch (error) {
      if (callerSignal?.aborted) {
        throw new GenerationFailure('cancelled', 'Generation cancelled by caller', { cause: error });
      }
      if (controller.signal.aborted) {
        throw new GenerationFailure('timeout', `Generation timed out after ${config.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw new GenerationFailure('network', `Generation request failed: ${describeError(error)}`, {
        cause: error,
      });
    } finally {
      clearTimeout(timer);
    }

    const ms = Date.now() - reqStart;
    if (status < 200 || status >= 300) {
      log?.debug({ stage: stageName, model: config.model, status, ms }, 'llm:http_error');
      throw new GenerationFailure(classifyStatus(status), `HTTP ${status}: ${bodyText.slice(0, 200)}`, {
        status,
      });
    }

    let json: unknown;
    try {
      json = JSON.parse(bodyText);
    } catch (error) {
      throw new GenerationFailure('invalid_response', 'Generation response is not JSON', { cause: error });
    }

    const parsed = ChatCompletionResponse.safeParse(json);
    if (!parsed.success) {
      throw new GenerationFailure(
        'invalid_response',
        `Unexpected generation response: ${parsed.error.issues.map((i) => i.message).join('; ')}`,
      );
    }

    const text = parsed.data.choices[0]?.message.content ?? '';
    log?.debug(
      {
        stage: stageName,
        model: config.model,
        ms,
        inputTokens: parsed.data.usage?.prompt_tokens ?? countTokens(request.prompt),
        outputTokens: parsed.data.usage?.completion_tokens ?? countTokens(text),
      },
      'llm:done',
    );
    return text;
  }

  return {
    generate(request: GenerationRequest): Promise<string> {
      return limiter.schedule(() => complete(request));
    },
  };
}
