import { afterEach, beforeEach, describe, expect, it } from '@jest/globals';
import { MockAgent } from 'undici';
import { LlmConfigSchema } from '../src/config/llm.js';
import { GenerationFailure } from '../src/core/errors.js';
import { classifyStatus, createChatCompletionsGenerator } from '../src/core/llm.js';

const config = LlmConfigSchema.parse({
  baseUrl: 'https://llm.test/v1',
  apiKey: 'test-secret',
  model: 'test-model',
  temperature: 0.2,
});

function completion(content: string | null) {
  return { choices: [{ message: { role: 'assistant', content } }] };
}

async function failureOf(promise: Promise<unknown>): Promise<GenerationFailure> {
  const error = await promise.catch((e: unknown) => e);
  if (!(error instanceof GenerationFailure)) {
    throw new Error(`expected a GenerationFailure, got ${String(error)}`);
  }
  return error;
}

describe('chat completions generator', () => {
  let agent: MockAgent;

  beforeEach(() => {
    agent = new MockAgent();
    agent.disableNetConnect();
  });

  afterEach(async () => {
    await agent.close();
  });

  it('posts the prompt and returns the first choice', async () => {
    let sent = '';
    agent
      .get('https://llm.test')
      .intercept({
        path: '/v1/chat/completions',
        method: 'POST',
        headers: { authorization: 'Bearer test-secret' },
        body: (body: string) => {
          sent = body;
          return true;
        },
      })
      .reply(200, completion('Mapo Tofu'));
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    const text = await generator.generate({ prompt: 'one dish please', stageName: 'idea' });

    expect(text).toBe('Mapo Tofu');
    expect(JSON.parse(sent)).toEqual({
      model: 'test-model',
      messages: [{ role: 'user', content: 'one dish please' }],
      temperature: 0.2,
    });
  });

  it('sends max_tokens when configured', async () => {
    let sent = '';
    agent
      .get('https://llm.test')
      .intercept({
        path: '/v1/chat/completions',
        method: 'POST',
        body: (body: string) => {
          sent = body;
          return true;
        },
      })
      .reply(200, completion('ok'));
    const generator = createChatCompletionsGenerator({ ...config, maxTokens: 256 }, { dispatcher: agent });

    await generator.generate({ prompt: 'p' });

    expect(JSON.parse(sent)).toMatchObject({ max_tokens: 256 });
  });

  it('returns empty content as-is', async () => {
    agent.get('https://llm.test').intercept({ path: '/v1/chat/completions', method: 'POST' }).reply(200, completion(null));
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    await expect(generator.generate({ prompt: 'p' })).resolves.toBe('');
  });

  it.each([
    [429, 'rate_limit', true],
    [500, 'server_error', true],
    [503, 'server_error', true],
    [400, 'client_error', false],
    [401, 'client_error', false],
  ] as const)('classifies HTTP %i as %s', async (status, kind, transient) => {
    agent
      .get('https://llm.test')
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(status, 'upstream said no');
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    const failure = await failureOf(generator.generate({ prompt: 'p' }));

    expect(failure.kind).toBe(kind);
    expect(failure.transient).toBe(transient);
    expect(failure.status).toBe(status);
    expect(failure.message).toBe(`HTTP ${status}: upstream said no`);
  });

  it('reports a connection error as a transient network failure', async () => {
    agent
      .get('https://llm.test')
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .replyWithError(new Error('socket hang up'));
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    const failure = await failureOf(generator.generate({ prompt: 'p' }));

    expect(failure.kind).toBe('network');
    expect(failure.transient).toBe(true);
  });

  it('rejects a body that is not JSON', async () => {
    agent
      .get('https://llm.test')
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(200, 'definitely not json');
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    const failure = await failureOf(generator.generate({ prompt: 'p' }));

    expect(failure.kind).toBe('invalid_response');
    expect(failure.message).toBe('Generation response is not JSON');
    expect(failure.transient).toBe(false);
  });

  it('rejects a response without choices', async () => {
    agent
      .get('https://llm.test')
      .intercept({ path: '/v1/chat/completions', method: 'POST' })
      .reply(200, { choices: [] });
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    const failure = await failureOf(generator.generate({ prompt: 'p' }));

    expect(failure.kind).toBe('invalid_response');
  });

  it('does not call out when the caller already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('client gone'));
    const generator = createChatCompletionsGenerator(config, { dispatcher: agent });

    const failure = await failureOf(generator.generate({ prompt: 'p', signal: controller.signal }));

    expect(failure.kind).toBe('cancelled');
    expect(failure.transient).toBe(false);
  });
});

describe('classifyStatus', () => {
  it('maps statuses to failure kinds', () => {
    expect(classifyStatus(408)).toBe('timeout');
    expect(classifyStatus(429)).toBe('rate_limit');
    expect(classifyStatus(502)).toBe('server_error');
    expect(classifyStatus(404)).toBe('client_error');
  });
});
