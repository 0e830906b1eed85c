import {
  validateConfig,
  type ConfigDefaults,
  type ConfigField,
  type ConfigRecord,
  type PartialConfig,
} from './config.js';
import { MissingCredentialError } from './errors.js';

export type ConfigSource = 'cli' | 'env' | 'file' | 'default';

export type ConfigSources = Record<ConfigField, ConfigSource>;

export interface MergedConfig {
  record: ConfigRecord;
  /** Which source supplied each field */
  sources: ConfigSources;
}

/** Folds -0 into 0 so a saved record reads back identical. */
function unsignedZero(value: number): number {
  return value === 0 ? 0 : value;
}

/**
 * Merges the layered sources field by field. For each field the first
 * source (cli, env, file) that holds a value other than `undefined` wins;
 * `defaults` fills whatever is left, except the API key, which must come
 * from one of the layered sources.
 */
export function mergeConfig(
  cli: PartialConfig,
  env: PartialConfig,
  file: PartialConfig | undefined,
  defaults: ConfigDefaults,
): MergedConfig {
  const layers: Array<[Exclude<ConfigSource, 'default'>, PartialConfig]> = [
    ['cli', cli],
    ['env', env],
    ['file', file ?? {}],
  ];
  const sources: ConfigSources = {
    apiKey: 'default',
    endpoint: 'default',
    model: 'default',
    maxTokens: 'default',
    temperature: 'default',
    topP: 'default',
    frequencyPenalty: 'default',
    presencePenalty: 'default',
    stopSequence: 'default',
    timeoutSeconds: 'default',
  };

  function pick<K extends ConfigField>(field: K): PartialConfig[K] {
    for (const [source, layer] of layers) {
      const value = layer[field];
      if (value !== undefined) {
        sources[field] = source;
        return value;
      }
    }
    return undefined;
  }

  const apiKey = pick('apiKey');
  if (apiKey === undefined) {
    throw new MissingCredentialError(layers.map(([source]) => source));
  }

  const record: ConfigRecord = {
    apiKey,
    endpoint: pick('endpoint') ?? defaults.endpoint,
    model: pick('model') ?? defaults.model,
    maxTokens: unsignedZero(pick('maxTokens') ?? defaults.maxTokens),
    temperature: unsignedZero(pick('temperature') ?? defaults.temperature),
    topP: unsignedZero(pick('topP') ?? defaults.topP),
    frequencyPenalty: unsignedZero(
      pick('frequencyPenalty') ?? defaults.frequencyPenalty,
    ),
    presencePenalty: unsignedZero(
      pick('presencePenalty') ?? defaults.presencePenalty,
    ),
    timeoutSeconds: unsignedZero(
      pick('timeoutSeconds') ?? defaults.timeoutSeconds,
    ),
  };
  const stopSequence = pick('stopSequence') ?? defaults.stopSequence;
  if (stopSequence !== undefined) {
    record.stopSequence = stopSequence;
  }

  return { record, sources };
}

/**
 * Produces one validated, frozen record from the four layers, in priority
 * order cli > env > file > defaults. Validation errors propagate unchanged.
 */
export function resolveConfig(
  cli: PartialConfig,
  env: PartialConfig,
  file: PartialConfig | undefined,
  defaults: ConfigDefaults,
): Readonly<ConfigRecord> {
  const { record } = mergeConfig(cli, env, file, defaults);
  validateConfig(record);
  return Object.freeze(record);
}

/** Config fields that can be read from the environment. */
export type EnvConfigField = 'apiKey' | 'endpoint' | 'model' | 'stopSequence';

/** Environment variables that carry config fields. */
export const ENV_VARS: ReadonlyArray<{ field: EnvConfigField; name: string }> = [
  { field: 'apiKey', name: 'OPENAI_API_KEY' },
  { field: 'model', name: 'OPENAI_MODEL' },
];

export function envVarOf(field: ConfigField): string | undefined {
  return ENV_VARS.find((entry) => entry.field === field)?.name;
}

/**
 * Extracts config fields from an environment snapshot. Unset and empty
 * variables contribute nothing.
 */
export function readEnvConfig(env: NodeJS.ProcessEnv): PartialConfig {
  const config: PartialConfig = {};
  for (const { field, name } of ENV_VARS) {
    const value = env[name];
    if (value) {
      config[field] = value;
    }
  }
  return config;
}
