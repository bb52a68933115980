/**
 * Providers Module
 *
 * createProvider() resolves the configured LLM backend. An incomplete Azure
 * OpenAI setup falls back to OpenAI when an OpenAI key is present.
 */

import { AIProvider } from './AIProvider';
import { AnthropicProvider } from './AnthropicProvider';
import { OpenAIProvider } from './OpenAIProvider';
import { LlmConfig } from '../config/AppConfig';
import { ConfigurationError } from '../utils/errors';
import { Logger } from '../utils/logger';

export { AIProvider, ProviderName, QueryOptions, Message, CompletionResult, ProviderConfig } from './AIProvider';
export { AnthropicProvider } from './AnthropicProvider';
export { OpenAIProvider, AzureDeploymentConfig } from './OpenAIProvider';

export function createProvider(llm: LlmConfig): AIProvider {
  switch (llm.provider) {
    case 'anthropic':
      if (!llm.anthropic.apiKey) {
        throw new ConfigurationError('ANTHROPIC_API_KEY');
      }
      return new AnthropicProvider({ apiKey: llm.anthropic.apiKey, defaultModel: llm.anthropic.model });

    case 'openai':
      if (!llm.openai.apiKey) {
        throw new ConfigurationError('OPENAI_API_KEY');
      }
      return new OpenAIProvider({ apiKey: llm.openai.apiKey, defaultModel: llm.openai.model });

    case 'azure': {
      const { apiKey, endpoint, deployment, apiVersion } = llm.azure;
      if (apiKey && endpoint && deployment) {
        return new OpenAIProvider({ apiKey }, { endpoint, deployment, apiVersion });
      }
      if (llm.openai.apiKey) {
        Logger.warn('Azure OpenAI configuration incomplete, falling back to OpenAI', {
          endpoint: endpoint ? 'set' : 'not set',
          deployment: deployment ? 'set' : 'not set',
          apiKey: apiKey ? 'set' : 'not set',
        });
        return new OpenAIProvider({ apiKey: llm.openai.apiKey, defaultModel: llm.openai.model });
      }
      throw new ConfigurationError(
        !endpoint ? 'AZURE_OPENAI_ENDPOINT' : !deployment ? 'AZURE_OPENAI_DEPLOYMENT_NAME' : 'AZURE_OPENAI_API_KEY'
      );
    }
  }
}
