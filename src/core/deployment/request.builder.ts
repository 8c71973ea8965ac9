import { buildModelId } from '../../config/model.config';
import { DeploymentAction, DeploymentRequest, ModelConfig, UpdatePayload } from './deployment.types';

export const REGISTER_PATH = '/v1/models/register';
export const UPDATE_PATH = '/v1/models/update';

export interface BuildRequestOptions {
  baseUrl: string;
  modelId?: string;
}

/**
 * Percent-encodes a model id for use as one path segment.
 * Colons are valid in a segment and the service expects them verbatim.
 */
export function encodeModelId(modelId: string): string {
  return encodeURIComponent(modelId).replace(/%3A/gi, ':');
}

export function buildUpdatePayload(config: ModelConfig): UpdatePayload {
  return {
    model: {
      serving_configuration: config.serving_configuration ?? {},
    },
  };
}

/**
 * Maps an action and model record to the HTTP call that performs it
 */
export function buildDeploymentRequest(
  action: DeploymentAction,
  config: ModelConfig,
  options: BuildRequestOptions
): DeploymentRequest {
  const baseUrl = options.baseUrl.replace(/\/+$/, '');

  switch (action) {
    case 'register':
      return {
        action,
        method: 'POST',
        url: `${baseUrl}${REGISTER_PATH}`,
        body: config,
      };
    case 'update': {
      const modelId = options.modelId ?? buildModelId(config);
      return {
        action,
        method: 'PUT',
        url: `${baseUrl}${UPDATE_PATH}/${encodeModelId(modelId)}`,
        body: buildUpdatePayload(config),
      };
    }
  }
}
