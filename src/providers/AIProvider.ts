/**
 * AIProvider - LLM Provider Abstraction Layer
 *
 * Every agent in the pipeline talks to its model through this class, so the
 * chat, research and job-launcher flows stay provider agnostic.
 *
 * Supported providers:
 * - Azure OpenAI (deployment-based, default)
 * - OpenAI
 * - Anthropic (Claude)
 */

// ==================== TYPES ====================

export type ProviderName = 'azure' | 'openai' | 'anthropic';

export interface QueryOptions {
  model?: string;
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
}

export interface CompletionResult {
  content: string;
  model: string;
  provider: ProviderName;
  usage: {
    inputTokens: number;
    outputTokens: number;
    totalTokens: number;
  };
  finishReason: 'stop' | 'length' | 'error';
  latencyMs: number;
}

export interface ProviderConfig {
  apiKey?: string;
  baseUrl?: string;
  defaultModel?: string;
  maxTokens?: number;
  timeout?: number;
}

// ==================== ABSTRACT PROVIDER ====================

export abstract class AIProvider {
  abstract readonly name: ProviderName;
  abstract readonly displayName: string;

  protected config: ProviderConfig;

  constructor(config: ProviderConfig = {}) {
    this.config = {
      timeout: 120000,
      maxTokens: 4096,
      ...config,
    };
  }

  /**
   * Complete a conversation (non-streaming). No retries: a transport failure
   * rejects the promise.
   */
  abstract complete(messages: Message[], options?: QueryOptions): Promise<CompletionResult>;
}
