/**
 * CodeJobService
 *
 * Runs a code agent against a project repository inside a one-shot container
 * and waits, within a bounded time, for it to finish. A job that outlives the
 * wait keeps running; it is reported, never cancelled.
 */

import { randomBytes } from 'crypto';
import { ContainerEnvVar, ContainerProvisioner } from './ContainerProvisioner';
import { CodeJobRequest, isSupportedJobType } from './schemas';
import { requireSetting } from '../../config/AppConfig';
import { getErrorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export type CodeJobResult =
  | { kind: 'terminated'; message: string; containerGroup: string; exitCode: number | null }
  | { kind: 'timeout'; containerGroup: string; result: string }
  | { kind: 'error'; error: string }
  | { kind: 'unsupported'; error: string };

export const UNSUPPORTED_JOB_MESSAGE = 'No job was processed or job_type not supported.';

export const TERMINATED_STATE = 'Terminated';

export interface CodeJobServiceOptions {
  /** Created per job so missing cloud settings surface as a job error. */
  createProvisioner: () => ContainerProvisioner;
  claudeImage?: string;
  codexImage?: string;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  pollIntervalMs: number;
  timeoutMs: number;
}

type AgentFlavor = 'claude' | 'codex';

interface PreparedJob {
  flavor: AgentFlavor;
  prompt: string;
  successMessage: string;
}

export function implementationPrompt(functionalSpec: string, testPlan: string): string {
  return `/project:implement functional spec: '${functionalSpec}' and implement the following tests: '${testPlan}'. Important: Push code to origin.`;
}

export function fixPrompt(issue: string, report: string): string {
  return `/project:fix-issue '${issue}', Report: '${report}'. Important: Push code to origin repository.`;
}

/**
 * The Codex image takes a plain query, so the slash-command prompt is wrapped
 * in an explicit checklist.
 */
export function codexQuery(prompt: string): string {
  return `Implement the following: ${prompt}

Follow these steps:
1. Understand the functional spec and tests described
2. Create the project structure and files
3. Implement a solution that addresses the functional spec
4. Implement tests
5. Prepare a concise PR title and description
6. Create a new branch with the change and make a push to origin

Check the following before push:
- Exclude the \`.claude\` folder from the commit.
- Place all tests inside the \`tests/\` folder.
- List the project dependencies without pinning versions (include test dependencies).
- Include \`azure-pipelines.yml\` in the commit.`;
}

/**
 * Organization segment of an org URL: `https://dev.azure.com/<org>` or
 * `https://<org>.visualstudio.com`.
 */
export function organizationFromUrl(orgUrl: string): string {
  try {
    const url = new URL(orgUrl);
    const legacy = /^([^.]+)\.visualstudio\.com$/i.exec(url.hostname);
    if (legacy) {
      return legacy[1];
    }
    return url.pathname.split('/').filter(Boolean)[0] ?? '';
  } catch {
    return orgUrl.replace(/\/+$/, '').split('/').pop() ?? '';
  }
}

export function repositoryUrl(pat: string, orgUrl: string, projectName: string): string {
  const project = encodeURIComponent(projectName);
  return `https://${encodeURIComponent(pat)}@dev.azure.com/${organizationFromUrl(orgUrl)}/${project}/_git/${project}`;
}

export function containerGroupName(flavor: AgentFlavor): string {
  return `${flavor}-job-${randomBytes(4).toString('hex')}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class CodeJobService {
  constructor(private readonly options: CodeJobServiceOptions) {}

  async run(request: CodeJobRequest): Promise<CodeJobResult> {
    const jobType = request.job_type;
    if (!isSupportedJobType(jobType)) {
      Logger.warn('Unsupported code job type', { jobType });
      return { kind: 'unsupported', error: UNSUPPORTED_JOB_MESSAGE };
    }

    // Fix jobs always run on the Claude Code image
    const job: PreparedJob =
      jobType === 'fix'
        ? {
            flavor: 'claude',
            prompt: fixPrompt(request.issue, request.report),
            successMessage: 'The code agent has fixed the issue',
          }
        : {
            flavor: request.code_agent.includes('codex') ? 'codex' : 'claude',
            prompt: implementationPrompt(request.functional_spec, request.test_plan),
            successMessage: 'The code agent has implemented the project',
          };

    Logger.info('Code job accepted', {
      jobType,
      codeAgent: request.code_agent,
      projectName: request.project_name,
      pat: request.pat ? 'set' : 'not set',
    });

    try {
      const provisioner = this.options.createProvisioner();
      const created = await provisioner.create({
        name: containerGroupName(job.flavor),
        image: this.imageFor(job.flavor),
        env: this.environmentFor(job, request),
      });

      Logger.job(created.name, 'Waiting for container to terminate', {
        pollIntervalMs: this.options.pollIntervalMs,
        timeoutMs: this.options.timeoutMs,
      });

      const exitCode = await this.waitForTermination(provisioner, created.name);
      if (exitCode === undefined) {
        const message = `Container ${created.name} did not terminate within the timeout period. Container job is still running.`;
        Logger.job(created.name, message);
        return { kind: 'timeout', containerGroup: created.name, result: `container instance: ${created.name}. ${message}` };
      }

      Logger.job(created.name, `Container terminated with exit code: ${exitCode ?? 'unknown'}`);
      return { kind: 'terminated', message: job.successMessage, containerGroup: created.name, exitCode };
    } catch (error) {
      Logger.error('Code job failed', error, { jobType });
      return { kind: 'error', error: `Error processing: ${getErrorMessage(error)}` };
    }
  }

  /**
   * Resolves with the exit code (null when the container reported none), or
   * undefined once the deadline passes.
   */
  private async waitForTermination(
    provisioner: ContainerProvisioner,
    name: string
  ): Promise<number | null | undefined> {
    const deadline = Date.now() + this.options.timeoutMs;

    for (;;) {
      const current = await provisioner.getState(name);
      if (current.state === TERMINATED_STATE) {
        return current.exitCode ?? null;
      }
      if (Date.now() >= deadline) {
        return undefined;
      }
      Logger.debug('Container still running', { name, state: current.state ?? 'unknown' });
      await sleep(this.options.pollIntervalMs);
    }
  }

  private imageFor(flavor: AgentFlavor): string {
    return flavor === 'codex'
      ? requireSetting(this.options.codexImage, 'CONTAINER_IMAGE_CODEX')
      : requireSetting(this.options.claudeImage, 'CONTAINER_IMAGE');
  }

  private environmentFor(job: PreparedJob, request: CodeJobRequest): ContainerEnvVar[] {
    const repository: ContainerEnvVar = {
      name: 'REPOSITORY_URL',
      value: repositoryUrl(request.pat, request.org_url, request.project_name),
      secure: true,
    };

    if (job.flavor === 'codex') {
      return [
        repository,
        { name: 'OPENAI_API_KEY', value: requireSetting(this.options.openaiApiKey, 'OPENAI_API_KEY'), secure: true },
        { name: 'QUERY', value: codexQuery(job.prompt) },
      ];
    }

    return [
      repository,
      { name: 'ANTHROPIC_API_KEY', value: requireSetting(this.options.anthropicApiKey, 'ANTHROPIC_API_KEY'), secure: true },
      { name: 'PROMPT', value: job.prompt },
    ];
  }
}
