import { DEFAULT_API_URL } from '../../config/env.config';
import { DEFAULT_MODEL_CONFIG } from '../../config/model.config';
import { DeploymentError } from '../../shared/utils/errors';
import logger from '../../shared/utils/logger';
import { DeploymentClient, deploymentClient } from './deployment.client';
import {
  DeploymentAction,
  DeploymentRequest,
  EXIT_CODES,
  ExitCode,
  ModelConfig,
} from './deployment.types';
import { buildDeploymentRequest } from './request.builder';
import { classifyResponse } from './response.classifier';

export interface RunOptions {
  config?: ModelConfig;
  baseUrl?: string;
  modelId?: string;
  dryRun?: boolean;
  client?: Pick<DeploymentClient, 'send'>;
}

/**
 * Short description of a request payload for failure logs
 */
export function summarizePayload(request: DeploymentRequest): Record<string, unknown> {
  switch (request.action) {
    case 'register':
      return {
        model_name: request.body.model_name,
        variant: request.body.variant,
        owner_team: request.body.owner_team,
      };
    case 'update':
      return { fields: Object.keys(request.body.model.serving_configuration) };
  }
}

function requestContext(request: DeploymentRequest): Record<string, unknown> {
  return {
    action: request.action,
    method: request.method,
    url: request.url,
  };
}

/**
 * Registers or updates the model and reports the outcome as a process exit code.
 * Never rejects: every failure is logged and mapped to a non-zero code.
 */
export async function run(action: DeploymentAction, options: RunOptions = {}): Promise<ExitCode> {
  const config = options.config ?? DEFAULT_MODEL_CONFIG;
  const client = options.client ?? deploymentClient;
  let request: DeploymentRequest | undefined;

  try {
    request = buildDeploymentRequest(action, config, {
      baseUrl: options.baseUrl ?? DEFAULT_API_URL,
      modelId: options.modelId,
    });

    if (options.dryRun) {
      logger.info('Dry run, no request sent', {
        ...requestContext(request),
        payload: request.body,
      });
      return EXIT_CODES.SUCCESS;
    }

    logger.info(action === 'register' ? 'Registering model' : 'Updating model', {
      ...requestContext(request),
      model_name: config.model_name,
      variant: config.variant,
    });

    const response = await client.send(request);
    const result = classifyResponse(action, request.url, response);

    logger.info(result.alreadyExists ? 'Model already exists, nothing to register' : 'Deployment succeeded', {
      ...requestContext(request),
      payload: request.body,
      statusCode: result.statusCode,
      response: result.body,
    });

    return EXIT_CODES.SUCCESS;
  } catch (error) {
    const context: Record<string, unknown> = request
      ? { ...requestContext(request), payload: summarizePayload(request) }
      : { action };

    if (!(error instanceof DeploymentError)) {
      context.unexpected = true;
    }
    logger.logError(error, context);

    return EXIT_CODES.FAILURE;
  }
}
