/**
 * LLM Client Tests
 * Both SDKs are mocked; retries use millisecond delays
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockOpenAICreate, mockAnthropicCreate, MockAPIError } = vi.hoisted(() => {
  class MockAPIError extends Error {
    constructor(readonly status: number, message: string) {
      super(message);
    }
  }
  return { mockOpenAICreate: vi.fn(), mockAnthropicCreate: vi.fn(), MockAPIError };
});

vi.mock('openai', () => {
  class OpenAI {
    static APIError = MockAPIError;
    chat = { completions: { create: mockOpenAICreate } };
  }
  return { default: OpenAI };
});

vi.mock('@anthropic-ai/sdk', () => {
  class Anthropic {
    static APIError = MockAPIError;
    messages = { create: mockAnthropicCreate };
  }
  return { default: Anthropic };
});

import { LLMClient } from '../src/services/llm/client.js';
import type { LLMConfig } from '../src/config/llm.js';
import { ProviderError } from '../src/types/errors.js';

const TEST_CONFIG: LLMConfig = {
  openai: { apiKey: 'test-key' },
  anthropic: { apiKey: 'test-key' },
  defaultProvider: 'openai',
  defaultModels: { openai: 'gpt-4o', anthropic: 'claude-3-5-sonnet-20241022' },
  timeoutMs: 5000,
  retry: { maxRetries: 2, baseDelay: 1, maxDelay: 5 },
};

const OPENAI_COMPLETION = {
  model: 'gpt-4o',
  choices: [{ message: { content: 'Next week.' }, finish_reason: 'stop' }],
  usage: { prompt_tokens: 10, completion_tokens: 3, total_tokens: 13 },
};

describe('LLMClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should answer through the default provider', async () => {
    mockOpenAICreate.mockResolvedValueOnce(OPENAI_COMPLETION);
    const client = new LLMClient(TEST_CONFIG);

    const answer = await client.chat([{ role: 'user', content: 'When is it due?' }], { temperature: 0.2, maxTokens: 100 });

    expect(answer).toBe('Next week.');
    expect(mockOpenAICreate).toHaveBeenCalledWith({
      model: 'gpt-4o',
      messages: [{ role: 'user', content: 'When is it due?' }],
      temperature: 0.2,
      max_tokens: 100,
    });
  });

  it('should report usage and finish reason', async () => {
    mockOpenAICreate.mockResolvedValueOnce({
      ...OPENAI_COMPLETION,
      choices: [{ message: { content: 'Cut off' }, finish_reason: 'length' }],
    });
    const client = new LLMClient(TEST_CONFIG);

    const response = await client.complete({ provider: 'openai', model: 'gpt-4o', messages: [] });

    expect(response).toEqual({
      content: 'Cut off',
      model: 'gpt-4o',
      usage: { promptTokens: 10, completionTokens: 3, totalTokens: 13 },
      finishReason: 'length',
      provider: 'openai',
    });
  });

  it('should pass the system prompt separately to Anthropic', async () => {
    mockAnthropicCreate.mockResolvedValueOnce({
      model: 'claude-3-5-sonnet-20241022',
      content: [{ type: 'text', text: 'Next week.' }],
      usage: { input_tokens: 8, output_tokens: 3 },
      stop_reason: 'end_turn',
    });
    const client = new LLMClient({ ...TEST_CONFIG, defaultProvider: 'anthropic' });

    const answer = await client.chat([
      { role: 'system', content: 'Answer from evidence.' },
      { role: 'user', content: 'When is it due?' },
    ]);

    expect(answer).toBe('Next week.');
    expect(mockAnthropicCreate).toHaveBeenCalledWith({
      model: 'claude-3-5-sonnet-20241022',
      system: 'Answer from evidence.',
      messages: [{ role: 'user', content: 'When is it due?' }],
      temperature: 0.3,
      max_tokens: 2048,
    });
  });

  it('should retry server errors', async () => {
    mockOpenAICreate
      .mockRejectedValueOnce(new MockAPIError(503, 'overloaded'))
      .mockResolvedValueOnce(OPENAI_COMPLETION);
    const client = new LLMClient(TEST_CONFIG);

    expect(await client.chat([{ role: 'user', content: 'q' }])).toBe('Next week.');
    expect(mockOpenAICreate).toHaveBeenCalledTimes(2);
  });

  it('should give up after the configured retries', async () => {
    mockOpenAICreate.mockRejectedValue(new MockAPIError(429, 'slow down'));
    const client = new LLMClient(TEST_CONFIG);

    const error = await client.chat([{ role: 'user', content: 'q' }]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ code: 'rate_limit', provider: 'answer', retryable: true, statusCode: 429 });
    expect(mockOpenAICreate).toHaveBeenCalledTimes(3);
  });

  it('should not retry authentication failures', async () => {
    mockOpenAICreate.mockRejectedValueOnce(new MockAPIError(401, 'bad key'));
    const client = new LLMClient(TEST_CONFIG);

    await expect(client.chat([{ role: 'user', content: 'q' }])).rejects.toMatchObject({
      code: 'authentication',
      retryable: false,
    });
    expect(mockOpenAICreate).toHaveBeenCalledTimes(1);
  });

  it('should report a response without choices as empty', async () => {
    mockOpenAICreate.mockResolvedValue({ ...OPENAI_COMPLETION, choices: [] });
    const client = new LLMClient({ ...TEST_CONFIG, retry: { maxRetries: 0, baseDelay: 1, maxDelay: 5 } });

    await expect(client.chat([{ role: 'user', content: 'q' }])).rejects.toMatchObject({
      code: 'empty_response',
      provider: 'answer',
    });
  });

  it('should not retry bad requests', async () => {
    mockOpenAICreate.mockRejectedValueOnce(new MockAPIError(400, 'bad input'));
    const client = new LLMClient(TEST_CONFIG);

    await expect(client.chat([{ role: 'user', content: 'q' }])).rejects.toMatchObject({
      code: 'unknown',
      retryable: false,
      statusCode: 400,
    });
    expect(mockOpenAICreate).toHaveBeenCalledTimes(1);
  });

  it('should fail when the provider has no API key', async () => {
    const client = new LLMClient({ ...TEST_CONFIG, openai: { apiKey: '' } });

    await expect(client.chat([{ role: 'user', content: 'q' }])).rejects.toMatchObject({ code: 'authentication' });
    expect(mockOpenAICreate).not.toHaveBeenCalled();
  });
});
