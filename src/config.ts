import { z } from 'zod';
import {
  InvalidValueError,
  MissingCredentialError,
  OutOfRangeError,
} from './errors.js';

/**
 * A fully resolved configuration for one completion request.
 */
export interface ConfigRecord {
  apiKey: string;
  endpoint: string;
  model: string;
  maxTokens: number;
  temperature: number;
  topP: number;
  frequencyPenalty: number;
  presencePenalty: number;
  stopSequence?: string;
  timeoutSeconds: number;
}

export type PartialConfig = Partial<ConfigRecord>;

/** Every field except the credential, which is never defaulted. */
export type ConfigDefaults = Omit<ConfigRecord, 'apiKey'>;

export type ConfigField = keyof ConfigRecord;

export const DEFAULT_CONFIG: Readonly<ConfigDefaults> = Object.freeze({
  endpoint: 'https://api.openai.com',
  model: 'gpt-4o-mini',
  maxTokens: 2048,
  temperature: 0.7,
  topP: 1,
  frequencyPenalty: 0,
  presencePenalty: 0,
  timeoutSeconds: 60,
});

export interface ConfigKeyInfo {
  field: ConfigField;
  /** Canonical key in the config file */
  key: string;
  /** Other spellings accepted when reading the file */
  aliases: readonly string[];
  type: 'string' | 'number';
}

/**
 * Field table in display and validation order.
 */
export const CONFIG_KEYS: readonly ConfigKeyInfo[] = [
  { field: 'apiKey', key: 'api_key', aliases: [], type: 'string' },
  {
    field: 'endpoint',
    key: 'endpoint',
    aliases: ['api_endpoint'],
    type: 'string',
  },
  { field: 'model', key: 'model', aliases: [], type: 'string' },
  { field: 'maxTokens', key: 'max_tokens', aliases: [], type: 'number' },
  { field: 'temperature', key: 'temperature', aliases: [], type: 'number' },
  { field: 'topP', key: 'top_p', aliases: [], type: 'number' },
  {
    field: 'frequencyPenalty',
    key: 'frequency_penalty',
    aliases: [],
    type: 'number',
  },
  {
    field: 'presencePenalty',
    key: 'presence_penalty',
    aliases: [],
    type: 'number',
  },
  {
    field: 'stopSequence',
    key: 'stop',
    aliases: ['stop_sequence'],
    type: 'string',
  },
  { field: 'timeoutSeconds', key: 'timeout', aliases: [], type: 'number' },
];

/**
 * Looks up a field by its canonical file key or one of its aliases.
 */
export function findConfigKey(name: string): ConfigKeyInfo | undefined {
  return CONFIG_KEYS.find(
    (entry) => entry.key === name || entry.aliases.includes(name),
  );
}

/**
 * Canonical file key of a field, e.g. `maxTokens` -> `max_tokens`.
 */
export function fieldKey(field: ConfigField): string {
  return CONFIG_KEYS.find((entry) => entry.field === field)?.key ?? field;
}

const NUMERIC_BOUNDS: Partial<Record<ConfigField, string>> = {
  maxTokens: 'a positive integer',
  temperature: 'a number between 0 and 2',
  topP: 'a number between 0 and 1',
  frequencyPenalty: 'a number between -2 and 2',
  presencePenalty: 'a number between -2 and 2',
  timeoutSeconds: 'a positive number of seconds',
};

const utf8 = { encoder: new TextEncoder(), decoder: new TextDecoder() };

/** False for strings holding lone surrogates, which UTF-8 cannot encode. */
function isWellFormed(value: string): boolean {
  return utf8.decoder.decode(utf8.encoder.encode(value)) === value;
}

const Text = z.string().refine(isWellFormed, 'must be valid Unicode text');

const ConfigRecordSchema = z.object({
  apiKey: Text,
  endpoint: z.url({
    protocol: /^https?$/,
    error: 'must be an http(s) URL',
  }),
  model: Text.min(1, 'must not be empty'),
  maxTokens: z.number().int().positive(),
  temperature: z.number().min(0).max(2),
  topP: z.number().min(0).max(1),
  frequencyPenalty: z.number().min(-2).max(2),
  presencePenalty: z.number().min(-2).max(2),
  stopSequence: Text.min(1, 'must not be empty').optional(),
  timeoutSeconds: z.number().positive(),
});

/**
 * Checks a resolved record. Throws MissingCredentialError for an empty key,
 * OutOfRangeError for the first numeric field outside its bounds, and
 * InvalidValueError for an unusable endpoint, model or stop sequence.
 */
export function validateConfig(record: ConfigRecord): void {
  if (record.apiKey.trim() === '') {
    throw new MissingCredentialError(undefined, { empty: true });
  }

  const result = ConfigRecordSchema.safeParse(record);
  if (result.success) {
    return;
  }

  // Report the first failing field in table order, not zod's issue order
  for (const entry of CONFIG_KEYS) {
    const issue = result.error.issues.find((i) => i.path[0] === entry.field);
    if (!issue) {
      continue;
    }
    const value =
      entry.field === 'apiKey'
        ? redactApiKey(record.apiKey)
        : record[entry.field];
    if (entry.type === 'number') {
      throw new OutOfRangeError(
        entry.key,
        value,
        NUMERIC_BOUNDS[entry.field] ?? 'a valid number',
      );
    }
    throw new InvalidValueError(entry.key, value, issue.message);
  }

  throw new InvalidValueError(
    'config',
    redactConfig(record),
    z.prettifyError(result.error),
  );
}

export function configEquals(a: ConfigRecord, b: ConfigRecord): boolean {
  return CONFIG_KEYS.every(({ field }) => a[field] === b[field]);
}

export function redactApiKey(apiKey: string): string {
  if (apiKey.length <= 8) {
    return '****';
  }
  return `${apiKey.slice(0, 3)}…${apiKey.slice(-4)}`;
}

export function redactConfig<T extends PartialConfig>(config: T): T {
  if (config.apiKey === undefined) {
    return { ...config };
  }
  return { ...config, apiKey: redactApiKey(config.apiKey) };
}
