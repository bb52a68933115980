/**
 * AppConfig
 *
 * Centralized application configuration, grouped by concern.
 *
 * Usage:
 *   import { AppConfig } from '../config/AppConfig';
 *   const interval = AppConfig.containers.pollIntervalSeconds;
 */

import { env, Env } from './env';
import { ConfigurationError } from '../utils/errors';

export type LlmProviderName = 'azure' | 'openai' | 'anthropic';

export interface LlmConfig {
  provider: LlmProviderName;
  azure: {
    apiKey?: string;
    endpoint?: string;
    deployment?: string;
    apiVersion: string;
  };
  openai: {
    apiKey?: string;
    model: string;
  };
  anthropic: {
    apiKey?: string;
    model: string;
  };
}

export interface ContainerConfig {
  subscriptionId?: string;
  resourceGroup?: string;
  claudeImage?: string;
  codexImage?: string;
  location: string;
  cpu: number;
  memoryInGB: number;
  pollIntervalSeconds: number;
  timeoutSeconds: number;
  registry: {
    server?: string;
    username?: string;
    password?: string;
  };
  servicePrincipal: {
    tenantId?: string;
    clientId?: string;
    clientSecret?: string;
  };
  anthropicApiKey?: string;
  openaiApiKey?: string;
}

export interface PipelineConfig {
  issueResearchEndpoint?: string;
  codeJobUrl: string;
  devopsPat?: string;
  devopsOrgUrl?: string;
  researchMaxMessages: number;
}

export function buildAppConfig(source: Env) {
  return {
    env: source.NODE_ENV,
    isProduction: source.NODE_ENV === 'production',
    isTest: source.NODE_ENV === 'test',

    server: {
      port: source.PORT,
      corsOrigins: source.CORS_ORIGINS
        ? source.CORS_ORIGINS.split(',').map((origin) => origin.trim())
        : ['http://localhost:3000', 'http://localhost:5173'],
    },

    llm: {
      provider: source.LLM_PROVIDER,
      azure: {
        apiKey: source.AZURE_OPENAI_API_KEY,
        endpoint: source.AZURE_OPENAI_ENDPOINT,
        deployment: source.AZURE_OPENAI_DEPLOYMENT_NAME,
        apiVersion: source.AZURE_OPENAI_API_VERSION,
      },
      openai: {
        apiKey: source.OPENAI_API_KEY,
        model: source.OPENAI_CHAT_MODEL_ID,
      },
      anthropic: {
        apiKey: source.ANTHROPIC_API_KEY,
        model: source.ANTHROPIC_MODEL_ID,
      },
    } satisfies LlmConfig,

    pipeline: {
      issueResearchEndpoint: source.ISSUE_RESEARCH_ENDPOINT,
      codeJobUrl: source.CODE_JOB_URL,
      devopsPat: source.AZURE_DEVOPS_PAT,
      devopsOrgUrl: source.AZURE_DEVOPS_ORG_URL,
      researchMaxMessages: source.RESEARCH_MAX_MESSAGES,
    } satisfies PipelineConfig,

    containers: {
      subscriptionId: source.SUBSCRIPTION_ID,
      resourceGroup: source.RESOURCE_GROUP,
      claudeImage: source.CONTAINER_IMAGE,
      codexImage: source.CONTAINER_IMAGE_CODEX,
      location: source.CONTAINER_LOCATION,
      cpu: source.CONTAINER_CPU,
      memoryInGB: source.CONTAINER_MEMORY_GB,
      pollIntervalSeconds: source.CONTAINER_POLL_INTERVAL_SECONDS,
      timeoutSeconds: source.CONTAINER_TIMEOUT_SECONDS,
      registry: {
        server: source.REGISTRY_SERVER,
        username: source.REGISTRY_USERNAME,
        password: source.REGISTRY_PASSWORD,
      },
      servicePrincipal: {
        tenantId: source.AZURE_TENANT_ID,
        clientId: source.AZURE_CLIENT_ID,
        clientSecret: source.AZURE_CLIENT_SECRET,
      },
      anthropicApiKey: source.ANTHROPIC_API_KEY,
      openaiApiKey: source.OPENAI_API_KEY,
    } satisfies ContainerConfig,
  };
}

export type AppConfigShape = ReturnType<typeof buildAppConfig>;

export const AppConfig: AppConfigShape = buildAppConfig(env);

/**
 * Returns the value or throws a ConfigurationError naming the variable.
 */
export function requireSetting(value: string | undefined, variable: string): string {
  if (!value) {
    throw new ConfigurationError(variable);
  }
  return value;
}
