/**
 * LLM Configuration
 *
 * Configuration for the answer-generation model loaded from environment variables.
 * Supports OpenAI and Anthropic with configurable retry and timeout settings.
 */

import { config } from 'dotenv';
import type { LLMProviderName, RetryConfig } from '../types/llm.js';
import { getEnvInt, getEnvVar } from './env.js';

// Load environment variables
config();

/**
 * LLM configuration interface
 */
export interface LLMConfig {
  openai: {
    apiKey: string;
    baseURL?: string;
  };
  anthropic: {
    apiKey: string;
    baseURL?: string;
  };
  /** Provider used for answer generation */
  defaultProvider: LLMProviderName;
  /** Default model for each provider */
  defaultModels: {
    openai: string;
    anthropic: string;
  };
  /** Request timeout in milliseconds */
  timeoutMs: number;
  retry: RetryConfig;
}

/**
 * Validate provider name
 */
function validateProvider(provider: string): LLMProviderName {
  if (provider !== 'openai' && provider !== 'anthropic') {
    throw new Error(`Invalid LLM provider: ${provider}. Must be 'openai' or 'anthropic'`);
  }
  return provider;
}

/**
 * LLM configuration loaded from environment variables
 *
 * Environment variables:
 * - OPENAI_API_KEY / OPENAI_BASE_URL
 * - ANTHROPIC_API_KEY / ANTHROPIC_BASE_URL
 * - LLM_PROVIDER: 'openai' | 'anthropic' (default: 'openai')
 * - LLM_DEFAULT_MODEL_OPENAI (default: 'gpt-4o')
 * - LLM_DEFAULT_MODEL_ANTHROPIC (default: 'claude-3-5-sonnet-20241022')
 * - LLM_TIMEOUT_MS (default: 60000)
 * - LLM_MAX_RETRIES (default: 3)
 * - LLM_RETRY_BASE_DELAY (default: 1000)
 * - LLM_RETRY_MAX_DELAY (default: 10000)
 */
export const llmConfig: LLMConfig = {
  openai: {
    apiKey: getEnvVar('OPENAI_API_KEY'),
    baseURL: getEnvVar('OPENAI_BASE_URL') || undefined,
  },
  anthropic: {
    apiKey: getEnvVar('ANTHROPIC_API_KEY'),
    baseURL: getEnvVar('ANTHROPIC_BASE_URL') || undefined,
  },
  defaultProvider: validateProvider(getEnvVar('LLM_PROVIDER', false, 'openai')),
  defaultModels: {
    openai: getEnvVar('LLM_DEFAULT_MODEL_OPENAI', false, 'gpt-4o'),
    anthropic: getEnvVar('LLM_DEFAULT_MODEL_ANTHROPIC', false, 'claude-3-5-sonnet-20241022'),
  },
  timeoutMs: getEnvInt('LLM_TIMEOUT_MS', 60000),
  retry: {
    maxRetries: getEnvInt('LLM_MAX_RETRIES', 3),
    baseDelay: getEnvInt('LLM_RETRY_BASE_DELAY', 1000),
    maxDelay: getEnvInt('LLM_RETRY_MAX_DELAY', 10000),
  },
};

/**
 * Validate configuration at startup
 */
export function validateLLMConfig(): void {
  const errors: string[] = [];

  if (llmConfig.defaultProvider === 'openai' && !llmConfig.openai.apiKey) {
    errors.push('OPENAI_API_KEY is required when LLM_PROVIDER is set to "openai"');
  }

  if (llmConfig.defaultProvider === 'anthropic' && !llmConfig.anthropic.apiKey) {
    errors.push('ANTHROPIC_API_KEY is required when LLM_PROVIDER is set to "anthropic"');
  }

  if (llmConfig.retry.maxRetries < 0) {
    errors.push('LLM_MAX_RETRIES must be >= 0');
  }

  if (llmConfig.retry.maxDelay < llmConfig.retry.baseDelay) {
    errors.push('LLM_RETRY_MAX_DELAY must be >= LLM_RETRY_BASE_DELAY');
  }

  if (llmConfig.timeoutMs < 1000) {
    errors.push('LLM_TIMEOUT_MS must be >= 1000 (1 second)');
  }

  if (errors.length > 0) {
    throw new Error(`LLM configuration validation failed:\n${errors.join('\n')}`);
  }
}
