/**
 * CodeJobClient - posts jobs to the job launch endpoint.
 *
 * HTTP error statuses are returned, not thrown: the research pipeline only
 * forwards the status code, the chat decides what a failure means.
 */

import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { CodeJobPayload } from './schemas';
import { ExternalServiceError, getErrorMessage } from '../../utils/errors';
import { Logger } from '../../utils/logger';

export interface CodeJobResponse {
  statusCode: number;
  body: unknown;
}

export interface CodeJobClientOptions {
  url: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export class CodeJobClient {
  private readonly http: AxiosInstance;
  private readonly url: string;

  constructor(options: CodeJobClientOptions) {
    this.url = options.url;
    this.http = axios.create({
      timeout: options.timeoutMs ?? 20 * 60 * 1000,
      headers: { 'Content-Type': 'application/json' },
      validateStatus: () => true,
      ...(options.adapter && { adapter: options.adapter }),
    });
  }

  async launch(payload: CodeJobPayload): Promise<CodeJobResponse> {
    Logger.info('Launching code job', {
      jobType: payload.job_type,
      codeAgent: payload.code_agent,
      projectName: payload.project_name,
      pat: payload.pat ? 'set' : 'not set',
    });

    try {
      const response = await this.http.post(this.url, payload);
      Logger.info('Code job response', { statusCode: response.status });
      return { statusCode: response.status, body: response.data };
    } catch (error) {
      throw new ExternalServiceError('code-job', `Code job request failed: ${getErrorMessage(error)}`);
    }
  }
}
