import { DEPLOYMENT_ACTIONS, DeploymentAction, deploymentActionSchema } from '../core/deployment/deployment.types';
import { ConfigurationError } from '../shared/utils/errors';

export interface CliOptions {
  action: DeploymentAction;
  configPath?: string;
  apiUrl?: string;
  modelId?: string;
  dryRun: boolean;
}

export type ParsedArgs = { help: true } | ({ help: false } & CliOptions);

export const USAGE = `Usage: model-deploy <${DEPLOYMENT_ACTIONS.join('|')}> [options]

Register or update a model in the model metadata service.

Options:
  --config <path>    JSON model configuration (default: built-in model record)
  --api-url <url>    API base URL (default: MODEL_API_URL or the dev endpoint)
  --model-id <id>    Model id for update (default: CD:<owner_team>:<model_name>:<variant>)
  --dry-run          Log the request without sending it
  -h, --help         Show this help`;

const VALUE_FLAGS = {
  '--config': 'configPath',
  '--api-url': 'apiUrl',
  '--model-id': 'modelId',
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(arg: string): arg is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, arg);
}

/**
 * Parses command line arguments (without the node and script entries).
 * Accepts both "--flag value" and "--flag=value".
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const values: Partial<Record<(typeof VALUE_FLAGS)[ValueFlag], string>> = {};
  const positionals: string[] = [];
  let dryRun = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '-h' || arg === '--help') {
      return { help: true };
    }
    if (arg === '--dry-run') {
      dryRun = true;
      continue;
    }

    const separator = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = separator === -1 ? arg : arg.slice(0, separator);
    const inline = separator === -1 ? undefined : arg.slice(separator + 1);

    if (isValueFlag(flag)) {
      const value = inline ?? argv[++i];
      if (value === undefined || value === '' || (inline === undefined && value.startsWith('--'))) {
        throw new ConfigurationError(`Missing value for ${flag}`);
      }
      values[VALUE_FLAGS[flag]] = value;
      continue;
    }

    if (arg.startsWith('-')) {
      throw new ConfigurationError(`Unknown option: ${arg}`);
    }
    positionals.push(arg);
  }

  if (positionals.length === 0) {
    throw new ConfigurationError(`Missing action, expected one of: ${DEPLOYMENT_ACTIONS.join(', ')}`);
  }
  if (positionals.length > 1) {
    throw new ConfigurationError(`Unexpected arguments: ${positionals.slice(1).join(' ')}`);
  }

  const action = deploymentActionSchema.safeParse(positionals[0]);
  if (!action.success) {
    throw new ConfigurationError(
      `Invalid action "${positionals[0]}", expected one of: ${DEPLOYMENT_ACTIONS.join(', ')}`
    );
  }

  return {
    help: false,
    action: action.data,
    configPath: values.configPath,
    apiUrl: values.apiUrl,
    modelId: values.modelId,
    dryRun,
  };
}
