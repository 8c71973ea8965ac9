import { loadEnv, parseApiUrl } from '../config/env.config';
import { DEFAULT_MODEL_CONFIG } from '../config/model.config';
import { loadModelConfig } from '../core/deployment/config.loader';
import { RunOptions, run } from '../core/deployment/deployment.invoker';
import { EXIT_CODES, ExitCode } from '../core/deployment/deployment.types';
import { ConfigurationError } from '../shared/utils/errors';
import logger, { configureLogger } from '../shared/utils/logger';
import { USAGE, parseArgs } from './args';

/**
 * Entry point shared by the bin script and tests
 */
export async function main(argv: string[], overrides: Pick<RunOptions, 'client'> = {}): Promise<ExitCode> {
  try {
    const args = parseArgs(argv);
    if (args.help) {
      console.log(USAGE);
      return EXIT_CODES.SUCCESS;
    }

    const env = loadEnv();
    configureLogger({ level: env.LOG_LEVEL, format: env.LOG_FORMAT });
    const baseUrl = args.apiUrl ? parseApiUrl(args.apiUrl) : env.MODEL_API_URL;
    const config = args.configPath ? await loadModelConfig(args.configPath) : DEFAULT_MODEL_CONFIG;

    const exitCode = await run(args.action, {
      config,
      baseUrl,
      modelId: args.modelId,
      dryRun: args.dryRun,
      client: overrides.client,
    });

    if (exitCode === EXIT_CODES.SUCCESS && !args.dryRun) {
      logger.info('Deployment completed successfully', { action: args.action });
    }
    return exitCode;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.logError(error);
      console.error(USAGE);
      return EXIT_CODES.USAGE;
    }
    logger.logError(error, { unexpected: true });
    return EXIT_CODES.FAILURE;
  }
}
