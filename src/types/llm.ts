/**
 * LLM API Integration Types
 *
 * Request and response shapes for the answer-generation client.
 * Failures surface as ProviderError with provider 'answer'.
 */

export type LLMProviderName = 'openai' | 'anthropic';

export type MessageRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

/**
 * LLM completion request
 */
export interface LLMRequest {
  provider: LLMProviderName;
  /** Model identifier (e.g., 'gpt-4o', 'claude-3-5-sonnet-20241022') */
  model: string;
  messages: ChatMessage[];
  /** Temperature for response randomness (0.0 - 2.0) */
  temperature?: number;
  maxTokens?: number;
  /** Request timeout in milliseconds */
  timeout?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export type FinishReason = 'stop' | 'length' | 'content_filter' | 'tool_calls' | 'error';

/**
 * LLM completion response
 */
export interface LLMResponse {
  content: string;
  model: string;
  usage: TokenUsage;
  finishReason: FinishReason;
  provider: LLMProviderName;
}

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Maximum number of retry attempts */
  maxRetries: number;
  /** Base delay in milliseconds */
  baseDelay: number;
  /** Maximum delay in milliseconds */
  maxDelay: number;
}
