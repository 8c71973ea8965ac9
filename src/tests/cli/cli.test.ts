import { describe, test, expect, jest, beforeEach, afterEach } from '@jest/globals';
import path from 'path';
import { main } from '../../cli/cli';
import { DeploymentClient } from '../../core/deployment/deployment.client';
import logger from '../../shared/utils/logger';
import { createStubHttp, sentBody, StubReply } from '../helpers/http.stub';

jest.mock('../../shared/utils/logger', () => ({
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  logError: jest.fn(),
  configureLogger: jest.fn(),
}));

const ENV_KEYS = ['MODEL_API_URL', 'LOG_LEVEL', 'LOG_FORMAT'] as const;

function stubClient(reply: StubReply) {
  const stub = createStubHttp(() => reply);
  return { client: new DeploymentClient(stub.http), requests: stub.requests };
}

describe('CLI', () => {
  const savedEnv: Partial<Record<(typeof ENV_KEYS)[number], string>> = {};

  beforeEach(() => {
    jest.clearAllMocks();
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    for (const key of ENV_KEYS) {
      savedEnv[key] = process.env[key];
      delete process.env[key];
    }
  });

  afterEach(() => {
    jest.restoreAllMocks();
    for (const key of ENV_KEYS) {
      const value = savedEnv[key];
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  });

  test('should register against the default endpoint', async () => {
    const { client, requests } = stubClient({ status: 200, body: '{"status":"success"}' });

    const exitCode = await main(['register'], { client });

    expect(exitCode).toBe(0);
    expect(requests[0].url).toBe(
      'https://backoffice.dev.api.discomax.com/mlp-metadata-manager/meta-manager/v1/models/register'
    );
    expect(logger.info).toHaveBeenLastCalledWith('Deployment completed successfully', { action: 'register' });
  });

  test('should take the base url from MODEL_API_URL', async () => {
    process.env.MODEL_API_URL = 'http://localhost:9000/meta-manager/';
    const { client, requests } = stubClient({ status: 200 });

    await main(['update'], { client });

    expect(requests[0].url).toBe(
      'http://localhost:9000/meta-manager/v1/models/update/CD:personalization:mlt-batch:sllim-tg-pkg-3'
    );
  });

  test('should prefer --api-url over the environment', async () => {
    process.env.MODEL_API_URL = 'http://localhost:9000';
    const { client, requests } = stubClient({ status: 200 });

    await main(['register', '--api-url', 'http://localhost:7000'], { client });

    expect(requests[0].url).toBe('http://localhost:7000/v1/models/register');
  });

  test('should deploy the record from --config', async () => {
    const { client, requests } = stubClient({ status: 200 });
    const configPath = path.join(__dirname, '..', 'fixtures', 'model.config.json');

    const exitCode = await main(['update', '--config', configPath, '--api-url', 'http://localhost:7000'], { client });

    expect(exitCode).toBe(0);
    expect(requests[0].url).toBe('http://localhost:7000/v1/models/update/CD:search:ranker-lite:v7');
    expect(sentBody(requests[0])).toMatchObject({
      model: { serving_configuration: { machine_type: 'ml.m5.large', min_instance: 2 } },
    });
  });

  test('should return 1 when the deployment fails', async () => {
    const { client } = stubClient({ status: 500, body: 'internal error' });

    await expect(main(['update'], { client })).resolves.toBe(1);
  });

  test('should print usage and return 0 for --help', async () => {
    await expect(main(['--help'])).resolves.toBe(0);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Usage: model-deploy <register|update>'));
  });

  test('should return 2 for an invalid action without sending anything', async () => {
    const { client, requests } = stubClient({ status: 200 });

    await expect(main(['deploy'], { client })).resolves.toBe(2);
    expect(requests).toHaveLength(0);
    expect(logger.logError).toHaveBeenCalledTimes(1);
  });

  test('should return 2 for an invalid MODEL_API_URL', async () => {
    process.env.MODEL_API_URL = 'ftp://files.example.test';
    const { client, requests } = stubClient({ status: 200 });

    await expect(main(['register'], { client })).resolves.toBe(2);
    expect(requests).toHaveLength(0);
  });

  test('should return 2 for an invalid config file', async () => {
    const configPath = path.join(__dirname, '..', 'fixtures', 'invalid-model.config.json');

    await expect(main(['register', '--config', configPath])).resolves.toBe(2);
  });
});
