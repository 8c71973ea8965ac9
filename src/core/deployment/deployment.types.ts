import { z } from 'zod';

export const DEPLOYMENT_ACTIONS = ['register', 'update'] as const;

export const deploymentActionSchema = z.enum(DEPLOYMENT_ACTIONS);

export type DeploymentAction = z.infer<typeof deploymentActionSchema>;

/**
 * Runtime serving parameters, the only field set sent on update
 */
export const servingConfigurationSchema = z
  .object({
    autoscaling: z.boolean(),
    autoscale_conditions: z.object({ rps: z.number().positive() }).passthrough(),
    min_instance: z.number().int().nonnegative(),
    max_instance: z.number().int().positive(),
    machine_type: z.string().min(1),
    processor: z.string().min(1),
    framework: z
      .object({
        framework_name: z.string().min(1),
        framework_version: z.string().min(1),
      })
      .passthrough(),
    shadow_config: z.record(z.unknown()),
  })
  .passthrough()
  .refine((value) => value.min_instance <= value.max_instance, {
    message: 'min_instance must not exceed max_instance',
    path: ['min_instance'],
  });

export type ServingConfiguration = z.infer<typeof servingConfigurationSchema>;

/**
 * Model record as registered with the metadata service.
 * Keys the schema does not know about are kept and sent as-is.
 */
export const modelConfigSchema = z
  .object({
    model_name: z.string().min(1),
    variant: z.string().min(1),
    owner_team: z.string().min(1),
    omd_business_service: z.string().min(1),
    related_features: z.record(z.unknown()).optional(),
    inference_configuration: z
      .object({ response_item_limit: z.number().int() })
      .passthrough()
      .optional(),
    serving_configuration: servingConfigurationSchema.optional(),
    serving_regions: z.array(z.string().min(1)).optional(),
  })
  .passthrough();

export type ModelConfig = Readonly<z.infer<typeof modelConfigSchema>>;

export interface UpdatePayload {
  model: {
    serving_configuration: ServingConfiguration | Record<string, never>;
  };
}

export interface RegisterRequest {
  action: 'register';
  method: 'POST';
  url: string;
  body: ModelConfig;
}

export interface UpdateRequest {
  action: 'update';
  method: 'PUT';
  url: string;
  body: UpdatePayload;
}

export type DeploymentRequest = RegisterRequest | UpdateRequest;

/**
 * What came back over the wire, before any interpretation
 */
export interface RawResponse {
  statusCode: number;
  rawBody: string;
}

export interface DeploymentResult {
  statusCode: number;
  body: unknown;
  success: boolean;
  alreadyExists: boolean;
}

export const EXIT_CODES = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
