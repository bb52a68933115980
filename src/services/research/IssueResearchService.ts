import { IssueResearchRunner } from './IssueResearchRunner';
import { CodeJobClient } from '../jobs/CodeJobClient';
import { Logger } from '../../utils/logger';

export interface IssueResearchOutcome {
  status_code: number;
  report: string;
}

export interface IssueResearchServiceOptions {
  runner: IssueResearchRunner;
  jobs: CodeJobClient;
  /** Work-tracker credentials the fix job pushes with. */
  devopsPat?: string;
  devopsOrgUrl?: string;
}

/**
 * Researches a bug and hands the report to a fix job.
 */
export class IssueResearchService {
  constructor(private readonly options: IssueResearchServiceOptions) {}

  async research(issue: string, projectName: string): Promise<IssueResearchOutcome> {
    Logger.info('Running issue research', {
      projectName,
      devopsPat: this.options.devopsPat ? 'set' : 'not set',
      devopsOrgUrl: this.options.devopsOrgUrl ? 'set' : 'not set',
    });

    const { report } = await this.options.runner.run(issue);

    const response = await this.options.jobs.launch({
      pat: this.options.devopsPat ?? '',
      org_url: this.options.devopsOrgUrl ?? '',
      project_name: projectName,
      issue,
      report,
      code_agent: 'claude-code',
      job_type: 'fix',
    });

    return { status_code: response.statusCode, report };
  }
}
