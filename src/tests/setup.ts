// Runs before each test file, ahead of the env module's validation
process.env.NODE_ENV = 'test';
process.env.LLM_PROVIDER = 'openai';
process.env.OPENAI_API_KEY = 'test-key';
process.env.CODE_JOB_URL = 'http://code-job.test/api/code-job';
process.env.CONTAINER_POLL_INTERVAL_SECONDS = '0';
