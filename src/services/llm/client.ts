/**
 * LLM Client Implementation
 *
 * Client used by the answer generator. Talks to OpenAI or Anthropic with
 * retry logic, timeout handling, and token usage tracking.
 */

import OpenAI from 'openai';
import Anthropic from '@anthropic-ai/sdk';
import pino from 'pino';
import type {
  ChatMessage,
  FinishReason,
  LLMRequest,
  LLMResponse,
  RetryConfig,
  TokenUsage,
} from '../../types/llm.js';
import { ProviderError } from '../../types/errors.js';
import { llmConfig, type LLMConfig } from '../../config/llm.js';

const logger = pino({
  name: 'llm-client',
  level: process.env.LOG_LEVEL || 'info',
});

export class LLMClient {
  private openaiClient: OpenAI | null = null;
  private anthropicClient: Anthropic | null = null;
  private retryConfig: RetryConfig;

  constructor(
    private config: LLMConfig = llmConfig,
    retryConfig?: Partial<RetryConfig>
  ) {
    this.retryConfig = { ...config.retry, ...retryConfig };

    if (config.openai.apiKey) {
      this.openaiClient = new OpenAI({
        apiKey: config.openai.apiKey,
        baseURL: config.openai.baseURL,
      });
      logger.info('OpenAI client initialized');
    }

    if (config.anthropic.apiKey) {
      this.anthropicClient = new Anthropic({
        apiKey: config.anthropic.apiKey,
        baseURL: config.anthropic.baseURL,
      });
      logger.info('Anthropic client initialized');
    }

    if (!this.openaiClient && !this.anthropicClient) {
      logger.warn('No LLM providers configured - answer generation will fail');
    }
  }

  /**
   * Non-streaming chat using the configured default provider and model
   */
  async chat(
    messages: ChatMessage[],
    options?: { temperature?: number; maxTokens?: number }
  ): Promise<string> {
    const provider = this.config.defaultProvider;
    const response = await this.complete({
      provider,
      model: this.config.defaultModels[provider],
      messages,
      temperature: options?.temperature,
      maxTokens: options?.maxTokens,
    });
    return response.content;
  }

  /**
   * Complete a chat request with automatic retry logic
   */
  async complete(request: LLMRequest): Promise<LLMResponse> {
    const startTime = Date.now();

    logger.info({
      provider: request.provider,
      model: request.model,
      messageCount: request.messages.length,
    }, 'Starting LLM completion request');

    try {
      const response = await this.executeWithRetry(request);

      logger.info({
        provider: response.provider,
        model: response.model,
        usage: response.usage,
        duration: Date.now() - startTime,
        finishReason: response.finishReason,
      }, 'LLM completion successful');

      return response;
    } catch (error) {
      const providerError = ProviderError.fromError(error, 'answer');

      logger.error({
        provider: request.provider,
        model: request.model,
        duration: Date.now() - startTime,
        error: {
          code: providerError.code,
          message: providerError.message,
          retryable: providerError.retryable,
          statusCode: providerError.statusCode,
        },
      }, 'LLM completion failed');

      throw providerError;
    }
  }

  /**
   * Execute request with exponential backoff retry logic
   */
  private async executeWithRetry(request: LLMRequest, attempt: number = 0): Promise<LLMResponse> {
    try {
      return await this.executeRequest(request);
    } catch (error) {
      const providerError = ProviderError.fromError(error, 'answer');

      if (providerError.retryable && attempt < this.retryConfig.maxRetries) {
        const delay = this.calculateBackoff(attempt);

        logger.warn({
          provider: request.provider,
          attempt: attempt + 1,
          maxRetries: this.retryConfig.maxRetries,
          delay,
          errorCode: providerError.code,
        }, 'Retrying LLM request after error');

        await new Promise(resolve => setTimeout(resolve, delay));
        return this.executeWithRetry(request, attempt + 1);
      }

      throw providerError;
    }
  }

  /**
   * Exponential backoff with 0-30% jitter
   */
  private calculateBackoff(attempt: number): number {
    const exponentialDelay = this.retryConfig.baseDelay * Math.pow(2, attempt);
    const jitter = Math.random() * 0.3 * exponentialDelay;
    return Math.min(exponentialDelay + jitter, this.retryConfig.maxDelay);
  }

  private async executeRequest(request: LLMRequest): Promise<LLMResponse> {
    const timeout = request.timeout ?? this.config.timeoutMs;
    let timer: NodeJS.Timeout | undefined;

    const timeoutPromise = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new ProviderError(`Request timeout after ${timeout}ms`, 'timeout', 'answer', true));
      }, timeout);
    });

    const requestPromise = request.provider === 'openai'
      ? this.executeOpenAIRequest(request)
      : this.executeAnthropicRequest(request);

    try {
      return await Promise.race([requestPromise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async executeOpenAIRequest(request: LLMRequest): Promise<LLMResponse> {
    if (!this.openaiClient) {
      throw new ProviderError('OpenAI client not initialized - missing API key', 'authentication', 'answer', false);
    }

    try {
      const completion = await this.openaiClient.chat.completions.create({
        model: request.model,
        messages: request.messages.map(msg => ({ role: msg.role, content: msg.content })),
        temperature: request.temperature ?? 0.3,
        max_tokens: request.maxTokens ?? 2048,
      });

      const choice = completion.choices[0];
      if (!choice) {
        throw new ProviderError('No completion choices returned from OpenAI', 'empty_response', 'answer', true);
      }

      const usage: TokenUsage = {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      };

      return {
        content: choice.message.content ?? '',
        model: completion.model,
        usage,
        finishReason: this.mapOpenAIFinishReason(choice.finish_reason),
        provider: 'openai',
      };
    } catch (error: unknown) {
      throw ProviderError.fromError(error, 'answer');
    }
  }

  private async executeAnthropicRequest(request: LLMRequest): Promise<LLMResponse> {
    if (!this.anthropicClient) {
      throw new ProviderError('Anthropic client not initialized - missing API key', 'authentication', 'answer', false);
    }

    try {
      // Anthropic takes the system prompt separately
      const systemMessage = request.messages.find(m => m.role === 'system');
      const conversationMessages: { role: 'user' | 'assistant'; content: string }[] = [];
      for (const msg of request.messages) {
        if (msg.role !== 'system') {
          conversationMessages.push({ role: msg.role, content: msg.content });
        }
      }

      const response = await this.anthropicClient.messages.create({
        model: request.model,
        system: systemMessage?.content,
        messages: conversationMessages,
        temperature: request.temperature ?? 0.3,
        max_tokens: request.maxTokens ?? 2048,
      });

      const textContent = response.content
        .map(block => (block.type === 'text' ? block.text : ''))
        .filter(Boolean)
        .join('\n');

      return {
        content: textContent,
        model: response.model,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
        finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
        provider: 'anthropic',
      };
    } catch (error: unknown) {
      throw ProviderError.fromError(error, 'answer');
    }
  }

  private mapOpenAIFinishReason(reason: string | null): FinishReason {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      case 'tool_calls':
      case 'function_call':
        return 'tool_calls';
      default:
        return 'stop';
    }
  }
}
