import chalk from 'chalk';
import { fieldKey, findConfigKey, type ConfigField } from '../config.js';
import { envVarOf, type ConfigSource } from '../config-resolver.js';
import {
  InvalidFileFormatError,
  InvalidValueError,
  MissingCredentialError,
  OutOfRangeError,
} from '../errors.js';
import { logError } from '../logger.js';
import { FIELD_FLAGS, type ConfigLayers } from './config-options.js';

/**
 * Finds the layer a field's value was taken from, following the same
 * priority as the merge.
 */
export function sourceOfField(
  field: ConfigField,
  layers: Pick<ConfigLayers, 'cli' | 'env' | 'file'>,
): ConfigSource {
  if (layers.cli[field] !== undefined) return 'cli';
  if (layers.env[field] !== undefined) return 'env';
  if (layers.file[field] !== undefined) return 'file';
  return 'default';
}

export function describeSource(
  field: ConfigField,
  source: ConfigSource,
  configPath: string,
): string {
  switch (source) {
    case 'cli':
      return `the ${FIELD_FLAGS[field]} flag`;
    case 'env':
      return `the ${envVarOf(field) ?? 'environment'} environment variable`;
    case 'file':
      return `${fieldKey(field)} in ${configPath}`;
    case 'default':
      return 'the built-in default';
  }
}

/**
 * Turns a failure into user-facing lines: the error message first, then a
 * hint naming where the offending value came from when that is known.
 */
export function describeError(
  error: unknown,
  layers?: ConfigLayers,
): string[] {
  if (error instanceof OutOfRangeError || error instanceof InvalidValueError) {
    const lines = [error.message];
    const entry = findConfigKey(error.field);
    if (entry && layers) {
      const source = sourceOfField(entry.field, layers);
      lines.push(
        `Value came from ${describeSource(entry.field, source, layers.configPath)}`,
      );
    }
    return lines;
  }

  if (error instanceof MissingCredentialError) {
    const lines = [error.message];
    const source = layers ? sourceOfField('apiKey', layers) : 'default';
    if (layers && source !== 'default') {
      lines.push(
        `Value came from ${describeSource('apiKey', source, layers.configPath)}`,
      );
    }
    return lines;
  }

  if (error instanceof InvalidFileFormatError) {
    return [error.message, 'Fix the file, or pass --config <path> to use another one.'];
  }

  if (error instanceof Error) {
    return [error.message];
  }
  return [`Unknown error: ${String(error)}`];
}

export async function reportError(
  error: unknown,
  layers?: ConfigLayers,
): Promise<void> {
  const [message, ...hints] = describeError(error, layers);
  await logError(message, error);
  for (const hint of hints) {
    console.error(chalk.dim(`  ${hint}`));
  }
}
