import type { Argv, ParserConfigurationOptions } from 'yargs';
import type { ConfigField, PartialConfig } from '../config.js';
import { readEnvConfig } from '../config-resolver.js';
import { getDefaultConfigPath, loadConfigFile } from '../config-manager.js';

/**
 * Flags shared by every command that resolves a configuration. None of them
 * has a default: an absent flag must fall through to env, file and defaults.
 */
export interface ConfigFlagArgs {
  'api-key'?: string;
  endpoint?: string;
  model?: string;
  'max-tokens'?: number;
  temperature?: number;
  'top-p'?: number;
  'frequency-penalty'?: number;
  'presence-penalty'?: number;
  stop?: string;
  timeout?: number;
  config?: string;
  verbose: boolean;
  log?: string;
}

/** A repeated flag keeps its last value instead of becoming an array. */
export const PARSER_CONFIGURATION: Partial<ParserConfigurationOptions> = {
  'duplicate-arguments-array': false,
};

/** Command-line flag for each field, used in error hints. */
export const FIELD_FLAGS: Record<ConfigField, string> = {
  apiKey: '--api-key',
  endpoint: '--endpoint',
  model: '--model',
  maxTokens: '--max-tokens',
  temperature: '--temperature',
  topP: '--top-p',
  frequencyPenalty: '--frequency-penalty',
  presencePenalty: '--presence-penalty',
  stopSequence: '--stop',
  timeoutSeconds: '--timeout',
};

export function applyConfigOptions<T>(yargs: Argv<T>): Argv<T & ConfigFlagArgs> {
  return yargs
    .option('api-key', {
      alias: 'k',
      describe: 'API key (overrides OPENAI_API_KEY and the config file)',
      type: 'string',
    })
    .option('endpoint', {
      alias: 'e',
      describe: 'Base URL of the completion API',
      type: 'string',
    })
    .option('model', {
      alias: 'm',
      describe: 'Model identifier (overrides OPENAI_MODEL)',
      type: 'string',
    })
    .option('max-tokens', {
      alias: 'l',
      describe: 'Maximum tokens per completion',
      type: 'number',
    })
    .option('temperature', {
      alias: 't',
      describe: 'Sampling temperature (0-2)',
      type: 'number',
    })
    .option('top-p', {
      alias: 'p',
      describe: 'Nucleus sampling probability mass (0-1)',
      type: 'number',
    })
    .option('frequency-penalty', {
      alias: 'f',
      describe: 'Frequency penalty (-2 to 2)',
      type: 'number',
    })
    .option('presence-penalty', {
      alias: 'r',
      describe: 'Presence penalty (-2 to 2)',
      type: 'number',
    })
    .option('stop', {
      alias: 'd',
      describe: 'Stop sequence',
      type: 'string',
    })
    .option('timeout', {
      describe: 'Request timeout in seconds',
      type: 'number',
    })
    .option('config', {
      alias: 'c',
      describe:
        'Path to the config file (default: $XDG_CONFIG_HOME/winston/config.toml)',
      type: 'string',
    })
    .option('verbose', {
      describe: 'Print diagnostic details to stderr',
      type: 'boolean',
      default: false,
    })
    .option('log', {
      describe: 'Append diagnostic details to this file',
      type: 'string',
    });
}

/**
 * Converts parsed flags into the highest-priority config layer.
 */
export function cliArgsToPartial(argv: ConfigFlagArgs): PartialConfig {
  const config: PartialConfig = {};
  if (argv['api-key'] !== undefined) config.apiKey = argv['api-key'];
  if (argv.endpoint !== undefined) config.endpoint = argv.endpoint;
  if (argv.model !== undefined) config.model = argv.model;
  if (argv['max-tokens'] !== undefined) config.maxTokens = argv['max-tokens'];
  if (argv.temperature !== undefined) config.temperature = argv.temperature;
  if (argv['top-p'] !== undefined) config.topP = argv['top-p'];
  if (argv['frequency-penalty'] !== undefined) {
    config.frequencyPenalty = argv['frequency-penalty'];
  }
  if (argv['presence-penalty'] !== undefined) {
    config.presencePenalty = argv['presence-penalty'];
  }
  if (argv.stop !== undefined) config.stopSequence = argv.stop;
  if (argv.timeout !== undefined) config.timeoutSeconds = argv.timeout;
  return config;
}

export interface ConfigLayers {
  cli: PartialConfig;
  env: PartialConfig;
  file: PartialConfig;
  configPath: string;
}

export function resolveConfigPath(
  argv: Pick<ConfigFlagArgs, 'config'>,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return argv.config ?? getDefaultConfigPath(env);
}

/**
 * Gathers the three layered sources. The environment is read once here and
 * the file is read completely before anything is merged.
 */
export async function loadConfigLayers(
  argv: ConfigFlagArgs,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ConfigLayers> {
  const configPath = resolveConfigPath(argv, env);
  const file = await loadConfigFile(configPath);
  return {
    cli: cliArgsToPartial(argv),
    env: readEnvConfig(env),
    file,
    configPath,
  };
}
