/**
 * DevOpsIntegration
 *
 * Turns an approved specification into a work-tracker project:
 * name the project, create it, wait for provisioning, add one backlog item
 * per epic, then one test plan holding every test case. Steps run strictly
 * in order; the first failure stops the run and nothing already created is
 * rolled back.
 */

import { ChatAgent } from '../../agents/ChatAgent';
import { SPEC_AGENT_NAMES } from '../../prompts/spec-agents';
import { ChatSettings } from '../../types/chat';
import { ChatTurn, SYSTEM_AUTHOR } from '../spec/ChatTurn';
import { hasDevOpsSettings, hasSpecAndPlan } from '../spec/ProjectSession';
import {
  DevOpsProjectNaming,
  DevOpsProjectNamingSchema,
  FunctionalSpecSchema,
  TestPlanSchema,
  readAgentJson,
  testCaseTitles,
} from '../spec/schemas';
import { AzureDevOpsClient } from './AzureDevOpsClient';
import { getErrorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export type DevOpsClientFactory = (settings: ChatSettings) => AzureDevOpsClient;

export const DEVOPS_SETTINGS_MISSING =
  'To use Azure DevOps integration, please provide your organization URL and PAT in the settings.';
export const DEVOPS_ARTIFACTS_MISSING =
  'To set up a project on Azure DevOps, we need both a functional specification and test plan. Please let us complete those steps first.';

interface IntegrationProgress {
  projectName?: string;
  projectUrl?: string;
  workItems: number;
  testCases: number;
}

function escapeHtml(value: string): string {
  return value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Project names carry no spaces or special characters.
 */
export function slugifyProjectName(text: string): string {
  const words = text
    .replace(/[^A-Za-z0-9 ]+/g, ' ')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 4);
  const name = words.map((word) => word.charAt(0).toUpperCase() + word.slice(1)).join('');
  return name || `Project${Date.now().toString(36)}`;
}

function asSentence(text: string): string {
  return text.endsWith('.') ? text : `${text}.`;
}

function describeProgress(progress: IntegrationProgress): string {
  if (!progress.projectName) {
    return '';
  }
  const parts = [`project **${progress.projectName}** created`];
  if (progress.workItems > 0) parts.push(`${progress.workItems} work item(s) created`);
  if (progress.testCases > 0) parts.push(`${progress.testCases} test case(s) created`);
  return ` Completed before the failure: ${parts.join(', ')}.`;
}

export class DevOpsIntegration {
  constructor(
    private readonly agent: ChatAgent,
    private readonly createClient: DevOpsClientFactory
  ) {}

  async run(turn: ChatTurn): Promise<void> {
    const { session } = turn;
    const { state, settings } = session;

    if (!hasDevOpsSettings(settings)) {
      turn.system(DEVOPS_SETTINGS_MISSING);
      return;
    }
    if (!hasSpecAndPlan(state)) {
      turn.system(DEVOPS_ARTIFACTS_MISSING);
      return;
    }

    const client = this.createClient(settings);
    const progress: IntegrationProgress = { workItems: 0, testCases: 0 };

    try {
      const naming = await this.nameProject(turn);

      const created = await client.createProject(naming.project_name, naming.description);
      state.devopsProjectName = created.projectName;
      state.devopsProjectUrl = created.projectUrl;
      progress.projectName = created.projectName;
      progress.projectUrl = created.projectUrl;

      await client.waitForOperation(created.operationId);

      const spec = FunctionalSpecSchema.safeParse(this.readJson(state.functionalSpec));
      if (spec.success) {
        for (const epic of spec.data.epics) {
          const description = `<ul>${epic.features.map((feature) => `<li>${escapeHtml(feature)}</li>`).join('')}</ul>`;
          await client.createWorkItem(created.projectName, epic.name, description);
          progress.workItems++;
        }
      }

      const plan = TestPlanSchema.safeParse(this.readJson(state.testPlan));
      if (plan.success) {
        const titles = testCaseTitles(plan.data);
        const result = await client.createTestPlanWithCases(
          created.projectName,
          plan.data.name,
          `Test plan for ${created.projectName}`,
          `${created.projectName} Test Suite`,
          titles
        );
        progress.testCases = result.testCaseIds.length;
      }

      turn.say(
        SPEC_AGENT_NAMES.DEVOPS,
        `New Azure DevOps project **${created.projectName}** created with ${progress.workItems} work item(s) and ` +
          `${progress.testCases} test case(s), access it [here](${created.projectUrl}).`
      );
      Logger.session(session.id, 'DevOps integration completed', { ...progress });
    } catch (error) {
      Logger.error('DevOps integration failed', error, { sessionId: session.id, ...progress });
      turn.say(
        SPEC_AGENT_NAMES.DEVOPS,
        `Error during Azure DevOps integration: ${asSentence(getErrorMessage(error))}${describeProgress(progress)}`
      );
    } finally {
      client.dispose();
      turn.say(SYSTEM_AUTHOR, 'Would you like to generate the code for this project now?', {
        actions: [
          {
            name: 'implement_project',
            label: 'Generate code',
            description: 'Start implementing the project by generating code',
            payload: {},
          },
        ],
      });
    }
  }

  /**
   * The DevOps agent proposes a name and description. Unusable answers fall
   * back to a name derived from the idea.
   */
  private async nameProject(turn: ChatTurn): Promise<DevOpsProjectNaming> {
    const { session } = turn;
    const { state } = session;

    const prompt = `
Based on the project idea, generate a project name and a short description for a new Azure DevOps project.

Idea: ${state.idea}

Respond in JSON with the following keys:
- project_name: the name of the new project (no spaces or special characters)
- description: a one-sentence description of the project
`;

    const response = await this.agent.send(prompt, session.threads.get(SPEC_AGENT_NAMES.DEVOPS));
    session.threads.set(SPEC_AGENT_NAMES.DEVOPS, response.thread);

    const naming = DevOpsProjectNamingSchema.safeParse(this.readJson(response.content));
    if (naming.success) {
      return { ...naming.data, project_name: slugifyProjectName(naming.data.project_name) };
    }

    Logger.warn('DevOps agent returned no usable project name, deriving one from the idea', { sessionId: session.id });
    return { project_name: slugifyProjectName(state.idea), description: state.idea };
  }

  private readJson(text: string): unknown {
    const json = readAgentJson(text);
    return json.ok ? json.data : undefined;
  }
}
