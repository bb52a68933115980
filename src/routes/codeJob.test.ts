/**
 * Code Job Endpoint Tests
 */

import express from 'express';
import request from 'supertest';
import { ContainerProvisioner, ContainerState } from '../services/jobs/ContainerProvisioner';
import { CodeJobService, UNSUPPORTED_JOB_MESSAGE } from '../services/jobs/CodeJobService';
import { createCodeJobRouter } from './codeJob';

function appWith(state: ContainerState, timeoutMs = 60000): express.Application {
  const provisioner: ContainerProvisioner = {
    create: (spec) => Promise.resolve({ name: spec.name }),
    getState: () => Promise.resolve(state),
  };
  const service = new CodeJobService({
    createProvisioner: () => provisioner,
    claudeImage: 'registry.test/claude-agent:latest',
    anthropicApiKey: 'test-anthropic-key',
    pollIntervalMs: 0,
    timeoutMs,
  });

  const app = express();
  app.use('/api/code-job', createCodeJobRouter(service));
  return app;
}

const FIX_JOB = JSON.stringify({
  pat: 'test-secret',
  org_url: 'https://dev.azure.com/example-org',
  project_name: 'TodoApp',
  issue: 'Crash on save',
  report: 'Report',
  job_type: 'fix',
});

describe('Code job endpoint', () => {
  it('answers 200 once the container terminates', async () => {
    const response = await request(appWith({ state: 'Terminated', exitCode: 0 }))
      .post('/api/code-job')
      .set('Content-Type', 'application/json')
      .send(FIX_JOB);

    expect(response.status).toBe(200);
    expect(response.body.message).toBe('The code agent has fixed the issue');
    expect(response.body.container_group).toMatch(/^claude-job-/);
    expect(response.body.exit_code).toBe(0);
  });

  it('answers 202 while the container is still running', async () => {
    const response = await request(appWith({ state: 'Running' }, 0))
      .post('/api/code-job')
      .set('Content-Type', 'application/json')
      .send(FIX_JOB);

    expect(response.status).toBe(202);
    expect(response.body.result).toMatch(/Container job is still running\.$/);
  });

  it('answers 400 for an unsupported job type', async () => {
    const response = await request(appWith({ state: 'Terminated' }))
      .post('/api/code-job')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify({ job_type: 'deploy' }));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: UNSUPPORTED_JOB_MESSAGE });
  });

  it('reads a body that is not JSON as an empty request', async () => {
    const response = await request(appWith({ state: 'Terminated' }))
      .post('/api/code-job')
      .set('Content-Type', 'text/plain')
      .send('garbage');

    expect(response.status).toBe(400);
    expect(response.body).toEqual({ error: UNSUPPORTED_JOB_MESSAGE });
  });

  it('answers 400 when a field has the wrong type', async () => {
    const response = await request(appWith({ state: 'Terminated' }))
      .post('/api/code-job')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify({ job_type: 'fix', issue: 42 }));

    expect(response.status).toBe(400);
    expect(response.body.error).toMatch(/^Invalid job request: /);
  });

  it('answers 500 when the job cannot start', async () => {
    const response = await request(appWith({ state: 'Terminated' }))
      .post('/api/code-job')
      .set('Content-Type', 'application/json')
      .send(JSON.stringify({ job_type: 'implementation', code_agent: 'codex' }));

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ error: 'Error processing: Missing required configuration: CONTAINER_IMAGE_CODEX' });
  });
});
