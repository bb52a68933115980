/**
 * ProjectImplementation - launches the code job for an approved project and
 * reports back in the chat.
 */

import { ChatAgent } from '../../agents/ChatAgent';
import { SPEC_AGENT_NAMES } from '../../prompts/spec-agents';
import { DevOpsClientFactory } from '../devops/DevOpsIntegration';
import { LatestCommit } from '../devops/AzureDevOpsClient';
import { CodeJobClient, CodeJobResponse } from '../jobs/CodeJobClient';
import { CodeJobPayload } from '../jobs/schemas';
import { ChatTurn, SYSTEM_AUTHOR } from './ChatTurn';
import { hasDevOpsSettings } from './ProjectSession';
import { getErrorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export const NEW_PROJECT_PROMPT = "Your project is all set! Tell me about a new idea you'd like to start";

function describeJobResponse(response: CodeJobResponse): string {
  const body = typeof response.body === 'string' ? response.body : JSON.stringify(response.body);
  return `Status code: ${response.statusCode}\nResponse: ${body}`;
}

export function formatLatestCommit(commit: LatestCommit): string {
  const shortId = commit.commitId.slice(0, 8);
  const commitPart = `\`${shortId}\` ([view commit](${commit.commitUrl}))`;
  const branchPart =
    commit.branch && commit.branchUrl ? ` on branch \`${commit.branch}\` ([view branch](${commit.branchUrl}))` : '';
  const summary = commit.comment ? `: ${commit.comment.split('\n')[0]}` : '';
  return `The latest commit is ${commitPart}${branchPart}${summary}`;
}

export class ProjectImplementation {
  constructor(
    private readonly agent: ChatAgent,
    private readonly jobs: CodeJobClient,
    private readonly createDevOpsClient: DevOpsClientFactory
  ) {}

  async run(turn: ChatTurn): Promise<void> {
    const { session } = turn;
    const { state, settings } = session;

    session.implementing = true;
    try {
      const payload: CodeJobPayload = {
        pat: settings.pat,
        org_url: settings.orgUrl,
        project_name: state.devopsProjectName,
        functional_spec: state.functionalSpec,
        test_plan: state.testPlan,
        code_agent: settings.codeAgent,
        job_type: 'implementation',
      };

      const response = await this.jobs.launch(payload);

      const reply = await this.agent.send(
        `The code generation job for project "${state.devopsProjectName || state.idea}" was launched with the ` +
          `${settings.codeAgent} code agent.\n\n${describeJobResponse(response)}\n\nReturn a one sentence message for the user.`,
        session.threads.get(SPEC_AGENT_NAMES.JOB_LAUNCHER)
      );
      session.threads.set(SPEC_AGENT_NAMES.JOB_LAUNCHER, reply.thread);
      turn.say(SPEC_AGENT_NAMES.JOB_LAUNCHER, reply.content);

      if (state.devopsProjectName && hasDevOpsSettings(settings)) {
        await this.reportLatestCommit(turn, state.devopsProjectName);
      }

      turn.say(SYSTEM_AUTHOR, NEW_PROJECT_PROMPT);
    } catch (error) {
      Logger.error('Project implementation failed', error, { sessionId: session.id });
      turn.say(SYSTEM_AUTHOR, `Error during project implementation: ${getErrorMessage(error)}`);
    } finally {
      session.implementing = false;
    }
  }

  private async reportLatestCommit(turn: ChatTurn, projectName: string): Promise<void> {
    const client = this.createDevOpsClient(turn.session.settings);
    try {
      const commit = await client.findLatestCommit(projectName);
      turn.say(SPEC_AGENT_NAMES.DEVOPS, formatLatestCommit(commit));
    } catch (error) {
      // Commit details are informational only
      Logger.warn('Could not fetch latest commit', { projectName, error: getErrorMessage(error) });
    } finally {
      client.dispose();
    }
  }
}
