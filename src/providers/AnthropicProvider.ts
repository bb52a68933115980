/**
 * AnthropicProvider - Claude API Implementation
 */

import Anthropic from '@anthropic-ai/sdk';
import { AIProvider, ProviderConfig, Message, QueryOptions, CompletionResult } from './AIProvider';
import { ExternalServiceError, getErrorMessage } from '../utils/errors';

export class AnthropicProvider extends AIProvider {
  readonly name = 'anthropic' as const;
  readonly displayName = 'Anthropic (Claude)';

  private client: Anthropic;

  constructor(config: ProviderConfig = {}) {
    super({
      defaultModel: 'claude-sonnet-4-20250514',
      ...config,
    });

    this.client = new Anthropic({
      apiKey: config.apiKey,
      timeout: this.config.timeout,
      ...(config.baseUrl && { baseURL: config.baseUrl }),
    });
  }

  async complete(messages: Message[], options: QueryOptions = {}): Promise<CompletionResult> {
    const startTime = Date.now();
    const model = options.model || this.config.defaultModel || 'claude-sonnet-4-20250514';

    // Claude takes system text as a separate parameter
    const system = [options.systemPrompt, ...messages.filter((m) => m.role === 'system').map((m) => m.content)]
      .filter((part): part is string => Boolean(part))
      .join('\n\n');

    const anthropicMessages: Anthropic.MessageParam[] = [];
    for (const msg of messages) {
      if (msg.role === 'user' || msg.role === 'assistant') {
        anthropicMessages.push({ role: msg.role, content: msg.content });
      }
    }

    try {
      const response = await this.client.messages.create({
        model,
        max_tokens: options.maxTokens || this.config.maxTokens || 4096,
        messages: anthropicMessages,
        ...(system && { system }),
        ...(options.temperature !== undefined && { temperature: options.temperature }),
      });

      const latencyMs = Date.now() - startTime;

      let content = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          content += block.text;
        }
      }

      const inputTokens = response.usage.input_tokens;
      const outputTokens = response.usage.output_tokens;

      return {
        content,
        model,
        provider: 'anthropic',
        usage: {
          inputTokens,
          outputTokens,
          totalTokens: inputTokens + outputTokens,
        },
        finishReason: response.stop_reason === 'max_tokens' ? 'length' : 'stop',
        latencyMs,
      };
    } catch (error) {
      throw new ExternalServiceError('anthropic', `Anthropic API error: ${getErrorMessage(error)}`);
    }
  }
}
