import { ModelConfig } from '../core/deployment/deployment.types';

// Model record deployed when no --config file is given
export const DEFAULT_MODEL_CONFIG: ModelConfig = {
  model_name: 'mlt-batch',
  variant: 'sllim-tg-pkg-3',
  owner_team: 'personalization',
  omd_business_service: 'content-discovery',
  related_features: {},
  inference_configuration: {
    response_item_limit: -1,
  },
  serving_configuration: {
    autoscaling: true,
    autoscale_conditions: {
      rps: 20,
    },
    min_instance: 1,
    max_instance: 5,
    machine_type: 'ml.c5.xlarge',
    processor: 'cpu',
    framework: {
      framework_name: 'tensorflow',
      framework_version: '2.9.2',
    },
    shadow_config: {},
  },
  serving_regions: ['us-east-1'],
};

/**
 * Composite key the metadata service uses to address a model on update
 */
export function buildModelId(config: Pick<ModelConfig, 'owner_team' | 'model_name' | 'variant'>): string {
  return `CD:${config.owner_team}:${config.model_name}:${config.variant}`;
}
