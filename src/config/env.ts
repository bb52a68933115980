import { z } from 'zod';
import dotenv from 'dotenv';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() !== '' ? value : undefined));

const envSchema = z.object({
  // Server
  PORT: z.string().default('3001').transform(Number),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).optional(),
  CORS_ORIGINS: optionalString,

  // LLM provider
  LLM_PROVIDER: z.enum(['azure', 'openai', 'anthropic']).default('azure'),
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_ENDPOINT: optionalString,
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString,
  AZURE_OPENAI_API_VERSION: z.string().default('2024-10-21'),
  OPENAI_API_KEY: optionalString,
  OPENAI_CHAT_MODEL_ID: z.string().default('gpt-4o'),
  ANTHROPIC_API_KEY: optionalString,
  ANTHROPIC_MODEL_ID: z.string().default('claude-sonnet-4-20250514'),

  // Pipeline endpoints
  ISSUE_RESEARCH_ENDPOINT: optionalString,
  CODE_JOB_URL: z.string().default('http://localhost:3001/api/code-job'),
  AZURE_DEVOPS_PAT: optionalString,
  AZURE_DEVOPS_ORG_URL: optionalString,
  RESEARCH_MAX_MESSAGES: z.string().default('20').transform(Number),

  // Container instances
  SUBSCRIPTION_ID: optionalString,
  RESOURCE_GROUP: optionalString,
  CONTAINER_IMAGE: optionalString,
  CONTAINER_IMAGE_CODEX: optionalString,
  CONTAINER_LOCATION: z.string().default('westeurope'),
  CONTAINER_CPU: z.string().default('1').transform(Number),
  CONTAINER_MEMORY_GB: z.string().default('4').transform(Number),
  CONTAINER_POLL_INTERVAL_SECONDS: z.string().default('15').transform(Number),
  CONTAINER_TIMEOUT_SECONDS: z.string().default('600').transform(Number),
  REGISTRY_SERVER: optionalString,
  REGISTRY_USERNAME: optionalString,
  REGISTRY_PASSWORD: optionalString,
  AZURE_TENANT_ID: optionalString,
  AZURE_CLIENT_ID: optionalString,
  AZURE_CLIENT_SECRET: optionalString,
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

function validateEnv(): Env {
  try {
    return parseEnv(process.env);
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error('❌ Invalid environment variables:');
      error.errors.forEach((err) => {
        console.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
    }
    process.exit(1);
  }
}

export const env = validateEnv();
