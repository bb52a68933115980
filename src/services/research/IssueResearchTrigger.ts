/**
 * IssueResearchTrigger - hands a bug to the research endpoint without
 * waiting for it. The webhook answers before the research runs.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { getErrorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export interface IssueResearchRequest {
  issue: string;
  project_name: string;
}

export interface ResearchTrigger {
  trigger(request: IssueResearchRequest): void;
}

export interface IssueResearchTriggerOptions {
  endpoint?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export class IssueResearchTrigger implements ResearchTrigger {
  private readonly http: AxiosInstance;
  private readonly endpoint?: string;

  constructor(options: IssueResearchTriggerOptions) {
    this.endpoint = options.endpoint;
    this.http = axios.create({
      timeout: options.timeoutMs ?? 5000,
      headers: { 'Content-Type': 'application/json' },
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  trigger(request: IssueResearchRequest): void {
    void this.send(request);
  }

  /** Resolves once the request settles; failures are logged, never thrown. */
  async send(request: IssueResearchRequest): Promise<void> {
    if (!this.endpoint) {
      Logger.warn('ISSUE_RESEARCH_ENDPOINT is not set, research not triggered', { projectName: request.project_name });
      return;
    }

    try {
      const response = await this.http.post(this.endpoint, request);
      Logger.info('Issue research triggered', { projectName: request.project_name, statusCode: response.status });
    } catch (error) {
      Logger.error('Issue research trigger failed', error, {
        projectName: request.project_name,
        detail: getErrorMessage(error),
      });
    }
  }
}
