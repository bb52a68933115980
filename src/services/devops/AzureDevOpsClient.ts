/**
 * Azure DevOps REST Client
 *
 * Basic-auth calls for project creation, work items, test plans and
 * commit lookup. One client serves one integration run; dispose() aborts
 * whatever is still in flight.
 */

import axios, { AxiosAdapter, AxiosInstance, Method } from 'axios';
import { z } from 'zod';
import { ExternalServiceError, getErrorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export const SCRUM_PROCESS_TEMPLATE_ID = '6b724908-ef14-45cf-84f8-768b5384da45';
export const DEFAULT_WORK_ITEM_TYPE = 'Product Backlog Item';
export const AUTHENTICATION_FAILED_MESSAGE = 'Authentication failed. Please check your PAT and organization URL.';

const SERVICE = 'azure-devops';

// ==================== RESPONSE SHAPES ====================

const OperationReferenceSchema = z.object({ id: z.string() });
const OperationSchema = z.object({ id: z.string(), status: z.string() });
const WorkItemSchema = z.object({ id: z.number(), url: z.string().optional() });
const TestPlanResponseSchema = z.object({ id: z.number(), rootSuite: z.object({ id: z.union([z.number(), z.string()]) }) });
const TestSuiteResponseSchema = z.object({ id: z.number() });
const RepositoryListSchema = z.object({
  value: z.array(z.object({ id: z.string(), name: z.string(), isDefault: z.boolean().optional() })),
});
const CommitListSchema = z.object({
  value: z.array(
    z.object({
      commitId: z.string(),
      comment: z.string().optional(),
      author: z.object({ name: z.string().optional(), date: z.string().optional() }).optional(),
    })
  ),
});
const RefListSchema = z.object({
  value: z.array(z.object({ name: z.string(), objectId: z.string() })),
});

// ==================== TYPES ====================

export interface AzureDevOpsClientOptions {
  orgUrl: string;
  pat: string;
  timeoutMs?: number;
  operationPollIntervalMs?: number;
  operationTimeoutMs?: number;
  /** Transport override; tests pass an in-process adapter. */
  adapter?: AxiosAdapter;
}

export interface CreatedProject {
  operationId: string;
  projectName: string;
  projectUrl: string;
}

export interface CreatedWorkItem {
  id: number;
  url?: string;
}

export interface CreatedTestPlan {
  planId: number;
  suiteId: number;
  testCaseIds: number[];
}

export interface LatestCommit {
  commitId: string;
  author?: string;
  date?: string;
  comment?: string;
  repoName: string;
  branch?: string;
  commitUrl: string;
  branchUrl?: string;
}

interface RequestSpec {
  method: Method;
  url: string;
  context: string;
  data?: unknown;
  contentType?: string;
  expect?: number[];
}

// ==================== CLIENT ====================

export class AzureDevOpsClient {
  readonly orgUrl: string;

  private readonly http: AxiosInstance;
  private readonly abortController = new AbortController();
  private readonly operationPollIntervalMs: number;
  private readonly operationTimeoutMs: number;

  constructor(options: AzureDevOpsClientOptions) {
    this.orgUrl = options.orgUrl.replace(/\/+$/, '');
    this.operationPollIntervalMs = options.operationPollIntervalMs ?? 2000;
    this.operationTimeoutMs = options.operationTimeoutMs ?? 120000;

    const authorization = Buffer.from(`:${options.pat}`, 'ascii').toString('base64');
    this.http = axios.create({
      timeout: options.timeoutMs ?? 30000,
      headers: {
        Authorization: `Basic ${authorization}`,
        'Content-Type': 'application/json',
      },
      // Status codes are checked per call
      validateStatus: () => true,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  /**
   * Starts project creation (Scrum process, Git). Provisioning continues
   * asynchronously; see waitForOperation().
   */
  async createProject(projectName: string, description: string): Promise<CreatedProject> {
    const data = await this.request(
      {
        method: 'POST',
        url: `${this.orgUrl}/_apis/projects?api-version=7.1-preview.4`,
        context: 'creating project',
        data: {
          name: projectName,
          description,
          capabilities: {
            versioncontrol: { sourceControlType: 'Git' },
            processTemplate: { templateTypeId: SCRUM_PROCESS_TEMPLATE_ID },
          },
        },
        expect: [202],
      },
      OperationReferenceSchema
    );

    Logger.devops('createProject', `Project '${projectName}' creation has started`, { operationId: data.id });
    return { operationId: data.id, projectName, projectUrl: `${this.orgUrl}/${projectName}` };
  }

  async waitForOperation(operationId: string): Promise<void> {
    const deadline = Date.now() + this.operationTimeoutMs;

    for (;;) {
      const operation = await this.request(
        {
          method: 'GET',
          url: `${this.orgUrl}/_apis/operations/${encodeURIComponent(operationId)}?api-version=7.1`,
          context: 'checking project provisioning',
        },
        OperationSchema
      );

      switch (operation.status) {
        case 'succeeded':
          return;
        case 'failed':
        case 'cancelled':
          throw new ExternalServiceError(SERVICE, `Project provisioning ${operation.status}.`);
      }

      if (Date.now() >= deadline) {
        throw new ExternalServiceError(SERVICE, 'Project provisioning did not finish in time.');
      }
      await this.sleep(this.operationPollIntervalMs);
    }
  }

  async createWorkItem(
    project: string,
    title: string,
    description: string,
    workItemType: string = DEFAULT_WORK_ITEM_TYPE
  ): Promise<CreatedWorkItem> {
    const workItem = await this.request(
      {
        method: 'POST',
        url: `${this.projectApi(project)}/wit/workitems/$${encodeURIComponent(workItemType)}?api-version=7.1-preview.3`,
        context: `creating work item '${title}'`,
        contentType: 'application/json-patch+json',
        data: [
          { op: 'add', path: '/fields/System.Title', from: null, value: title },
          { op: 'add', path: '/fields/System.Description', from: null, value: description },
        ],
      },
      WorkItemSchema
    );

    Logger.devops('createWorkItem', `Work item '${title}' of type '${workItemType}' created`, { id: workItem.id });
    return { id: workItem.id, url: workItem.url };
  }

  /**
   * Plan, then a static suite under the plan's root suite, then one Test
   * Case work item per title, then a single call linking them to the suite.
   */
  async createTestPlanWithCases(
    project: string,
    planName: string,
    planDescription: string,
    suiteName: string,
    testCaseTitles: string[]
  ): Promise<CreatedTestPlan> {
    const plan = await this.request(
      {
        method: 'POST',
        url: `${this.projectApi(project)}/test/plans?api-version=5.0`,
        context: 'creating test plan',
        data: { name: planName, description: planDescription },
      },
      TestPlanResponseSchema
    );

    const suite = await this.request(
      {
        method: 'POST',
        url: `${this.projectApi(project)}/testplan/Plans/${plan.id}/suites?api-version=5.0`,
        context: 'creating test suite',
        data: { suiteType: 'StaticTestSuite', name: suiteName, parentSuite: { id: plan.rootSuite.id } },
      },
      TestSuiteResponseSchema
    );

    const testCaseIds: number[] = [];
    for (const title of testCaseTitles) {
      const testCase = await this.request(
        {
          method: 'POST',
          url: `${this.projectApi(project)}/wit/workitems/$Test%20Case?api-version=5.0`,
          context: `creating test case '${title}'`,
          contentType: 'application/json-patch+json',
          data: [{ op: 'add', path: '/fields/System.Title', from: null, value: title }],
        },
        WorkItemSchema
      );
      testCaseIds.push(testCase.id);
    }

    if (testCaseIds.length > 0) {
      await this.request(
        {
          method: 'POST',
          url: `${this.projectApi(project)}/test/Plans/${plan.id}/suites/${suite.id}/testcases/${testCaseIds.join(',')}?api-version=5.0`,
          context: 'adding test cases to suite',
        },
        z.unknown()
      );
    }

    Logger.devops('createTestPlanWithCases', `Test plan '${planName}' created`, {
      planId: plan.id,
      suiteId: suite.id,
      testCases: testCaseIds.length,
    });
    return { planId: plan.id, suiteId: suite.id, testCaseIds };
  }

  /**
   * Latest commit of the project's default repository and, when one points
   * at it, the branch whose head it is.
   */
  async findLatestCommit(project: string): Promise<LatestCommit> {
    const repos = await this.request(
      {
        method: 'GET',
        url: `${this.projectApi(project)}/git/repositories?api-version=7.1`,
        context: 'fetching repositories',
        expect: [200],
      },
      RepositoryListSchema
    );

    const repo = repos.value.find((candidate) => candidate.isDefault) ?? repos.value[0];
    if (!repo) {
      throw new ExternalServiceError(SERVICE, 'No repositories found in the project.');
    }

    const commits = await this.request(
      {
        method: 'GET',
        url: `${this.projectApi(project)}/git/repositories/${repo.id}/commits?$top=1&api-version=7.1`,
        context: 'fetching commits',
        expect: [200],
      },
      CommitListSchema
    );

    const commit = commits.value[0];
    if (!commit) {
      throw new ExternalServiceError(SERVICE, 'No commits found in the repository.');
    }

    let branch: string | undefined;
    try {
      const refs = await this.request(
        {
          method: 'GET',
          url: `${this.projectApi(project)}/git/repositories/${repo.id}/refs?filter=heads/&api-version=7.1`,
          context: 'fetching branches',
          expect: [200],
        },
        RefListSchema
      );
      branch = refs.value.find((ref) => ref.objectId === commit.commitId)?.name.replace(/^refs\/heads\//, '');
    } catch (error) {
      // The commit is still worth reporting without its branch
      Logger.warn('Branch lookup failed', { project, error: getErrorMessage(error) });
    }

    const repoWebUrl = `${this.orgUrl}/${project}/_git/${encodeURIComponent(repo.name)}`;
    return {
      commitId: commit.commitId,
      author: commit.author?.name,
      date: commit.author?.date,
      comment: commit.comment,
      repoName: repo.name,
      branch,
      commitUrl: `${repoWebUrl}/commit/${commit.commitId}`,
      branchUrl: branch ? `${repoWebUrl}?version=GB${encodeURIComponent(branch)}` : undefined,
    };
  }

  /**
   * Aborts in-flight requests. The client is unusable afterwards.
   */
  dispose(): void {
    if (!this.abortController.signal.aborted) {
      this.abortController.abort();
    }
  }

  // ==================== PRIVATE ====================

  private projectApi(project: string): string {
    return `${this.orgUrl}/${encodeURIComponent(project)}/_apis`;
  }

  private async request<S extends z.ZodTypeAny>(spec: RequestSpec, schema: S): Promise<z.output<S>> {
    let status: number;
    let body: unknown;

    try {
      const response = await this.http.request({
        method: spec.method,
        url: spec.url,
        data: spec.data,
        signal: this.abortController.signal,
        ...(spec.contentType && { headers: { 'Content-Type': spec.contentType } }),
      });
      status = response.status;
      body = response.data;
    } catch (error) {
      throw new ExternalServiceError(SERVICE, `Error ${spec.context}: ${getErrorMessage(error)}`);
    }

    if (status === 401) {
      throw new ExternalServiceError(SERVICE, AUTHENTICATION_FAILED_MESSAGE, status);
    }

    const accepted = spec.expect ?? [200, 201];
    if (!accepted.includes(status)) {
      const text = typeof body === 'string' ? body : JSON.stringify(body);
      throw new ExternalServiceError(SERVICE, `Error ${spec.context}: ${status} ${text}`, status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new ExternalServiceError(SERVICE, `Unexpected response while ${spec.context}.`, status);
    }
    return parsed.data;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve, reject) => {
      const signal = this.abortController.signal;
      if (signal.aborted) {
        reject(new ExternalServiceError(SERVICE, 'Request aborted.'));
        return;
      }
      const timer = setTimeout(() => {
        signal.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      const onAbort = () => {
        clearTimeout(timer);
        reject(new ExternalServiceError(SERVICE, 'Request aborted.'));
      };
      signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
