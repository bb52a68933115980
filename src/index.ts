import express, { Request, Response, NextFunction } from 'express';
import { createServer, Server } from 'http';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import rateLimit from 'express-rate-limit';
import { AppConfig, AppConfigShape } from './config/AppConfig';
import { createProvider, AIProvider } from './providers';
import { createResearchAgents, createSpecAgents } from './agents';
import { SPEC_AGENT_NAMES } from './prompts';
import { AzureDevOpsClient } from './services/devops/AzureDevOpsClient';
import { DevOpsClientFactory, DevOpsIntegration } from './services/devops/DevOpsIntegration';
import { AzureContainerProvisioner } from './services/jobs/ContainerProvisioner';
import { CodeJobClient } from './services/jobs/CodeJobClient';
import { CodeJobService } from './services/jobs/CodeJobService';
import { IssueResearchRunner } from './services/research/IssueResearchRunner';
import { IssueResearchService } from './services/research/IssueResearchService';
import { IssueResearchTrigger, ResearchTrigger } from './services/research/IssueResearchTrigger';
import { CollaborativeSpecService } from './services/spec/CollaborativeSpecService';
import { ProjectImplementation } from './services/spec/ProjectImplementation';
import { SessionStore } from './services/spec/SessionStore';
import { ApiResponse, ErrorCodes, HttpStatus } from './utils/ApiResponse';
import { ConfigurationError, ExternalServiceError, ValidationError, ensureError, isAppError } from './utils/errors';
import { Logger } from './utils/logger';

// Routes
import { createChatRouter } from './routes/chat';
import { createCodeJobRouter } from './routes/codeJob';
import { createHealthRouter } from './routes/health';
import { createIssueResearchRouter } from './routes/issueResearch';
import { createDevOpsWebhookRouter } from './routes/webhooks/devops';

export interface AppDependencies {
  config: AppConfigShape;
  store: SessionStore;
  chat: CollaborativeSpecService;
  researchTrigger: ResearchTrigger;
  research: IssueResearchService;
  codeJobs: CodeJobService;
}

/**
 * Wires the services for a running process. Tests build their own
 * dependencies around fakes.
 */
export function buildDependencies(
  config: AppConfigShape = AppConfig,
  provider: AIProvider = createProvider(config.llm)
): AppDependencies {
  const specAgents = createSpecAgents(provider);
  const createDevOpsClient: DevOpsClientFactory = (settings) =>
    new AzureDevOpsClient({ orgUrl: settings.orgUrl, pat: settings.pat });
  const jobClient = new CodeJobClient({ url: config.pipeline.codeJobUrl });
  const store = new SessionStore();

  const chat = new CollaborativeSpecService({
    store,
    agents: specAgents,
    devops: new DevOpsIntegration(specAgents[SPEC_AGENT_NAMES.DEVOPS], createDevOpsClient),
    implementation: new ProjectImplementation(specAgents[SPEC_AGENT_NAMES.JOB_LAUNCHER], jobClient, createDevOpsClient),
  });

  const { containers } = config;

  return {
    config,
    store,
    chat,
    researchTrigger: new IssueResearchTrigger({ endpoint: config.pipeline.issueResearchEndpoint }),
    research: new IssueResearchService({
      runner: new IssueResearchRunner(createResearchAgents(provider), config.pipeline.researchMaxMessages),
      jobs: jobClient,
      devopsPat: config.pipeline.devopsPat,
      devopsOrgUrl: config.pipeline.devopsOrgUrl,
    }),
    codeJobs: new CodeJobService({
      createProvisioner: () => new AzureContainerProvisioner(containers),
      claudeImage: containers.claudeImage,
      codexImage: containers.codexImage,
      anthropicApiKey: containers.anthropicApiKey,
      openaiApiKey: containers.openaiApiKey,
      pollIntervalMs: containers.pollIntervalSeconds * 1000,
      timeoutMs: containers.timeoutSeconds * 1000,
    }),
  };
}

/**
 * Spec Pipeline Backend
 * Collaborative specification chat, bug intake, issue research and code jobs
 */
class SpecPipelineApp {
  readonly app: express.Application;
  private httpServer?: Server;
  private isShuttingDown: boolean = false;

  constructor(private readonly deps: AppDependencies) {
    this.app = express();
    this.app.set('trust proxy', 1);

    this.initializeMiddleware();
    this.initializeRoutes();
    this.initializeErrorHandling();
  }

  private initializeMiddleware(): void {
    const { config } = this.deps;

    // Security
    this.app.use(
      helmet({
        contentSecurityPolicy: config.isProduction ? undefined : false,
      })
    );

    // CORS
    this.app.use(
      cors({
        origin: config.server.corsOrigins,
        credentials: true,
        methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
      })
    );

    // Compression
    this.app.use(compression());

    // Rate limiting; webhooks come from the work tracker and are not limited
    const limiter = rateLimit({
      windowMs: 15 * 60 * 1000, // 15 minutes
      max: 100,
      statusCode: HttpStatus.TOO_MANY_REQUESTS,
      message: {
        success: false,
        error: 'Too many requests from this IP. Please try again later.',
        code: ErrorCodes.RATE_LIMITED,
      },
      standardHeaders: true,
      legacyHeaders: false,
      skip: (req) => req.path.startsWith('/webhooks/'),
    });

    this.app.use('/api/', limiter);
  }

  private initializeRoutes(): void {
    const { config, store, chat, researchTrigger, research, codeJobs } = this.deps;

    // Health check
    this.app.use('/health', createHealthRouter(config));

    // Pipeline endpoints read their own bodies
    this.app.use('/api/webhooks/devops', createDevOpsWebhookRouter(researchTrigger));
    this.app.use('/api/issue-research', createIssueResearchRouter(research));
    this.app.use('/api/code-job', createCodeJobRouter(codeJobs));

    // Chat API
    this.app.use('/api/chat', createChatRouter(store, chat));

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      ApiResponse.error(res, `Endpoint not found: ${req.path}`, HttpStatus.NOT_FOUND, ErrorCodes.NOT_FOUND);
    });
  }

  private initializeErrorHandling(): void {
    const { config } = this.deps;

    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      const error = ensureError(err);
      const statusCode = isAppError(error) ? error.statusCode : HttpStatus.INTERNAL_SERVER_ERROR;

      Logger.error('Request failed', error, { method: req.method, path: req.path, statusCode });

      const code =
        error instanceof ValidationError
          ? ErrorCodes.VALIDATION_ERROR
          : error instanceof ExternalServiceError
            ? ErrorCodes.EXTERNAL_SERVICE_ERROR
            : error instanceof ConfigurationError
              ? ErrorCodes.CONFIG_ERROR
              : ErrorCodes.INTERNAL_ERROR;

      const message =
        config.isProduction && statusCode >= HttpStatus.INTERNAL_SERVER_ERROR ? 'Internal server error' : error.message;

      ApiResponse.error(res, message, statusCode, code);
    });
  }

  start(): void {
    const { port } = this.deps.config.server;

    this.httpServer = createServer(this.app);
    this.httpServer.listen(port, () => {
      Logger.info('Spec pipeline backend started', {
        port,
        environment: this.deps.config.env,
        llmProvider: this.deps.config.llm.provider,
      });
    });

    // Graceful shutdown
    process.on('SIGTERM', () => this.shutdown());
    process.on('SIGINT', () => this.shutdown());
  }

  private shutdown(): void {
    if (this.isShuttingDown) return;
    this.isShuttingDown = true;

    Logger.info('Shutting down');
    if (this.httpServer) {
      this.httpServer.close(() => process.exit(0));
    } else {
      process.exit(0);
    }
  }
}

export function createApp(deps: AppDependencies): express.Application {
  return new SpecPipelineApp(deps).app;
}

if (require.main === module) {
  try {
    new SpecPipelineApp(buildDependencies()).start();
  } catch (error) {
    Logger.error('Failed to start server', error);
    process.exit(1);
  }
}
