import fs from 'fs/promises';
import path from 'path';
import { formatIssues } from '../../config/env.config';
import { ConfigurationError } from '../../shared/utils/errors';
import logger from '../../shared/utils/logger';
import { ModelConfig, modelConfigSchema } from './deployment.types';

/**
 * Validates an already-parsed model config value
 */
export function parseModelConfig(value: unknown, source = 'model config'): ModelConfig {
  const result = modelConfigSchema.safeParse(value);

  if (!result.success) {
    throw new ConfigurationError(`Invalid ${source}`, formatIssues(result.error));
  }

  return result.data;
}

/**
 * Reads and validates a JSON model config file
 */
export async function loadModelConfig(configPath: string): Promise<ModelConfig> {
  const resolved = path.resolve(configPath);
  let contents: string;

  try {
    contents = await fs.readFile(resolved, 'utf8');
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? String(error.code) : undefined;
    if (code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${resolved}`);
    }
    throw new ConfigurationError(
      `Unable to read configuration file ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    throw new ConfigurationError(
      `Invalid JSON in configuration file ${resolved}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const config = parseModelConfig(parsed, `configuration file ${resolved}`);
  logger.debug('Loaded model configuration', {
    path: resolved,
    model_name: config.model_name,
    variant: config.variant,
  });

  return config;
}
