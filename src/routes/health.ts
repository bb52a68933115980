/**
 * Health Check Routes
 *
 * - /health - Basic health (for load balancers, always fast)
 * - /health/live - Liveness probe (is the process alive?)
 * - /health/ready - Readiness probe (reports which integrations are configured)
 */

import { Router, Request, Response } from 'express';
import { AppConfigShape } from '../config/AppConfig';

interface HealthStatus {
  status: 'healthy' | 'degraded';
  timestamp: string;
  uptime: number;
  checks: {
    [key: string]: {
      status: 'ok' | 'not_configured';
      message?: string;
    };
  };
}

// Track start time for uptime calculation
const startTime = Date.now();

function uptimeSeconds(): number {
  return Math.floor((Date.now() - startTime) / 1000);
}

function hasLlmCredentials(config: AppConfigShape): boolean {
  const { llm } = config;
  switch (llm.provider) {
    case 'azure':
      return Boolean((llm.azure.apiKey && llm.azure.endpoint && llm.azure.deployment) || llm.openai.apiKey);
    case 'openai':
      return Boolean(llm.openai.apiKey);
    case 'anthropic':
      return Boolean(llm.anthropic.apiKey);
  }
}

export function createHealthRouter(config: AppConfigShape): Router {
  const router = Router();

  /**
   * GET /health
   * Basic health check - always returns quickly
   */
  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * GET /health/live
   */
  router.get('/live', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      uptime: uptimeSeconds(),
    });
  });

  /**
   * GET /health/ready
   * Configuration only; no outbound calls are made.
   */
  router.get('/ready', (_req: Request, res: Response) => {
    const configured = (value: boolean, message: string) =>
      value ? { status: 'ok' as const } : { status: 'not_configured' as const, message };

    const checks: HealthStatus['checks'] = {
      llm: configured(hasLlmCredentials(config), `No credentials for provider "${config.llm.provider}"`),
      issueResearch: configured(Boolean(config.pipeline.issueResearchEndpoint), 'ISSUE_RESEARCH_ENDPOINT is not set'),
      containers: configured(
        Boolean(config.containers.subscriptionId && config.containers.resourceGroup),
        'SUBSCRIPTION_ID or RESOURCE_GROUP is not set'
      ),
    };

    const health: HealthStatus = {
      status: checks.llm.status === 'ok' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      uptime: uptimeSeconds(),
      checks,
    };

    res.status(checks.llm.status === 'ok' ? 200 : 503).json(health);
  });

  return router;
}
