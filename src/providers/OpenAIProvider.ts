/**
 * OpenAIProvider - GPT API Implementation
 *
 * Serves both OpenAI and Azure OpenAI deployments through the openai SDK.
 * With an Azure endpoint the model name is the deployment name.
 */

import OpenAI, { AzureOpenAI } from 'openai';
import { AIProvider, ProviderConfig, Message, QueryOptions, CompletionResult } from './AIProvider';
import { ExternalServiceError, getErrorMessage } from '../utils/errors';

export interface AzureDeploymentConfig {
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

export class OpenAIProvider extends AIProvider {
  readonly name: 'openai' | 'azure';
  readonly displayName: string;

  private client: OpenAI;

  constructor(config: ProviderConfig = {}, azure?: AzureDeploymentConfig) {
    super({
      defaultModel: azure?.deployment ?? 'gpt-4o',
      ...config,
    });

    if (azure) {
      this.name = 'azure';
      this.displayName = 'Azure OpenAI';
      this.client = new AzureOpenAI({
        apiKey: config.apiKey,
        endpoint: azure.endpoint,
        deployment: azure.deployment,
        apiVersion: azure.apiVersion,
        timeout: this.config.timeout,
      });
    } else {
      this.name = 'openai';
      this.displayName = 'OpenAI (GPT)';
      this.client = new OpenAI({
        apiKey: config.apiKey,
        timeout: this.config.timeout,
        ...(config.baseUrl && { baseURL: config.baseUrl }),
      });
    }
  }

  async complete(messages: Message[], options: QueryOptions = {}): Promise<CompletionResult> {
    const startTime = Date.now();
    const model = options.model || this.config.defaultModel || 'gpt-4o';

    try {
      const response = await this.client.chat.completions.create({
        model,
        max_tokens: options.maxTokens || this.config.maxTokens,
        messages: this.convertMessages(messages, options.systemPrompt),
        ...(options.temperature !== undefined && { temperature: options.temperature }),
      });

      const latencyMs = Date.now() - startTime;

      const choice = response.choices[0];
      const inputTokens = response.usage?.prompt_tokens || 0;
      const outputTokens = response.usage?.completion_tokens || 0;

      return {
        content: choice?.message.content || '',
        model,
        provider: this.name,
        usage: {
          inputTokens,
          outputTokens,
          totalTokens: inputTokens + outputTokens,
        },
        finishReason: choice?.finish_reason === 'length' ? 'length' : 'stop',
        latencyMs,
      };
    } catch (error) {
      throw new ExternalServiceError(this.name, `${this.displayName} API error: ${getErrorMessage(error)}`);
    }
  }

  // ==================== PRIVATE METHODS ====================

  private convertMessages(messages: Message[], systemPrompt?: string): OpenAI.ChatCompletionMessageParam[] {
    const result: OpenAI.ChatCompletionMessageParam[] = [];

    if (systemPrompt) {
      result.push({ role: 'system', content: systemPrompt });
    }

    for (const msg of messages) {
      switch (msg.role) {
        case 'system':
          result.push({ role: 'system', content: msg.content });
          break;
        case 'assistant':
          result.push({ role: 'assistant', content: msg.content });
          break;
        case 'user':
          result.push({ role: 'user', content: msg.content });
          break;
      }
    }

    return result;
  }
}
