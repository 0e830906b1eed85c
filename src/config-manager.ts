import { promises as fs } from 'fs';
import path from 'path';
import os from 'os';
import { parse, stringify, TomlError } from 'smol-toml';
import { z } from 'zod';
import {
  CONFIG_KEYS,
  findConfigKey,
  type ConfigKeyInfo,
  type ConfigRecord,
  type PartialConfig,
} from './config.js';
import {
  ConfigIoError,
  InvalidFileFormatError,
  InvalidValueError,
  NoHomeDirectoryError,
  isNodeError,
} from './errors.js';
import { logDebug } from './logger.js';

const APP_DIR = 'winston';
const CONFIG_FILE = 'config.toml';

export type ConfigTable = Record<string, unknown>;

/**
 * Value types of the known keys. Unknown keys are dropped by z.object.
 */
const FileConfigSchema = z.object({
  api_key: z.string().optional(),
  endpoint: z.string().optional(),
  api_endpoint: z.string().optional(),
  model: z.string().optional(),
  max_tokens: z.number().optional(),
  temperature: z.number().optional(),
  top_p: z.number().optional(),
  frequency_penalty: z.number().optional(),
  presence_penalty: z.number().optional(),
  stop: z.string().optional(),
  stop_sequence: z.string().optional(),
  timeout: z.number().optional(),
});

type FileConfig = z.infer<typeof FileConfigSchema>;

/**
 * Returns `$XDG_CONFIG_HOME/winston/config.toml` when XDG_CONFIG_HOME is an
 * absolute path, else `~/.config/winston/config.toml`.
 */
export function getDefaultConfigPath(
  env: NodeJS.ProcessEnv = process.env,
  homedir: () => string = os.homedir,
): string {
  const configHome = env.XDG_CONFIG_HOME;
  if (configHome && path.isAbsolute(configHome)) {
    return path.join(configHome, APP_DIR, CONFIG_FILE);
  }

  let home: string;
  try {
    home = homedir();
  } catch (error) {
    throw new NoHomeDirectoryError({ cause: error });
  }
  if (!home || !path.isAbsolute(home)) {
    throw new NoHomeDirectoryError();
  }
  return path.join(home, '.config', APP_DIR, CONFIG_FILE);
}

function isMissingFileError(error: unknown): boolean {
  return (
    isNodeError(error) && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export async function configFileExists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      return false;
    }
    throw new ConfigIoError(filePath, 'read', error);
  }
}

/**
 * Reads the raw TOML table. A file that does not exist yields `{}`.
 */
export async function readConfigTable(filePath: string): Promise<ConfigTable> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error: unknown) {
    if (isMissingFileError(error)) {
      await logDebug(`No config file at ${filePath}`);
      return {};
    }
    throw new ConfigIoError(filePath, 'read', error);
  }

  try {
    return parse(content);
  } catch (error: unknown) {
    if (error instanceof TomlError) {
      throw new InvalidFileFormatError(filePath, error.message, {
        cause: error,
      });
    }
    throw error;
  }
}

function parseFileTable(filePath: string, table: ConfigTable): FileConfig {
  const result = FileConfigSchema.safeParse(table);
  if (!result.success) {
    throw new InvalidFileFormatError(
      filePath,
      z.prettifyError(result.error),
      { cause: result.error },
    );
  }
  return result.data;
}

function toPartialConfig(file: FileConfig): PartialConfig {
  const candidates: PartialConfig = {
    apiKey: file.api_key,
    endpoint: file.endpoint ?? file.api_endpoint,
    model: file.model,
    maxTokens: file.max_tokens,
    temperature: file.temperature,
    topP: file.top_p,
    frequencyPenalty: file.frequency_penalty,
    presencePenalty: file.presence_penalty,
    stopSequence: file.stop ?? file.stop_sequence,
    timeoutSeconds: file.timeout,
  };

  // Absent keys must stay absent, not present-as-undefined
  const config: PartialConfig = {};
  for (const { field } of CONFIG_KEYS) {
    const value = candidates[field];
    if (value !== undefined) {
      Object.assign(config, { [field]: value });
    }
  }
  return config;
}

function toFileTable(config: PartialConfig): Record<string, string | number> {
  const table: Record<string, string | number> = {};
  for (const { field, key } of CONFIG_KEYS) {
    const value = config[field];
    if (value !== undefined) {
      table[key] = value;
    }
  }
  return table;
}

/**
 * Loads the config file as a partial layer. A missing file contributes
 * nothing; unreadable files, bad TOML and wrongly typed known keys throw.
 */
export async function loadConfigFile(filePath: string): Promise<PartialConfig> {
  const table = await readConfigTable(filePath);
  const config = toPartialConfig(parseFileTable(filePath, table));
  await logDebug(
    `Loaded ${Object.keys(config).length} setting(s) from ${filePath}`,
  );
  return config;
}

async function writeFileAtomic(
  filePath: string,
  content: string,
): Promise<void> {
  const dir = path.dirname(filePath);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${Date.now()}.tmp`,
  );

  try {
    await fs.mkdir(dir, { recursive: true });
    // The file holds the API key
    await fs.writeFile(tempPath, content, { encoding: 'utf-8', mode: 0o600 });
    await fs.rename(tempPath, filePath);
  } catch (error: unknown) {
    await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) =>
      logDebug(
        `Could not remove temp file ${tempPath}: ${String(cleanupError)}`,
      ),
    );
    throw new ConfigIoError(filePath, 'write', error);
  }
}

/**
 * Writes every field of the record under its canonical key, replacing the
 * file in one rename so readers never see a partial write.
 */
export async function saveConfigFile(
  record: ConfigRecord,
  filePath: string,
): Promise<void> {
  await writeFileAtomic(filePath, stringify(toFileTable(record)) + '\n');
  await logDebug(`Saved configuration to ${filePath}`);
}

function coerceValue(entry: ConfigKeyInfo, raw: string): string | number {
  if (entry.type === 'string') {
    return raw;
  }
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new InvalidValueError(entry.key, raw, 'expected a number');
  }
  return value;
}

function requireConfigKey(name: string): ConfigKeyInfo {
  const entry = findConfigKey(name);
  if (!entry) {
    const known = CONFIG_KEYS.map(({ key }) => key).join(', ');
    throw new InvalidValueError('key', name, `expected one of ${known}`);
  }
  return entry;
}

/**
 * Sets one key in the config file, keeping every other key (unknown ones
 * included) and dropping alias spellings of the same field.
 */
export async function setConfigValue(
  filePath: string,
  name: string,
  raw: string,
): Promise<string | number> {
  const entry = requireConfigKey(name);
  const value = coerceValue(entry, raw);
  const table = await readConfigTable(filePath);

  for (const alias of entry.aliases) {
    delete table[alias];
  }
  table[entry.key] = value;
  parseFileTable(filePath, table);

  await writeFileAtomic(filePath, stringify(table) + '\n');
  await logDebug(`Set ${entry.key} in ${filePath}`);
  return value;
}

/**
 * Removes a key and its aliases. Returns false when nothing was removed;
 * the file is then left as it was (or not created).
 */
export async function unsetConfigValue(
  filePath: string,
  name: string,
): Promise<boolean> {
  const entry = requireConfigKey(name);
  const table = await readConfigTable(filePath);

  const present = [entry.key, ...entry.aliases].filter((key) => key in table);
  if (present.length === 0) {
    return false;
  }
  for (const key of present) {
    delete table[key];
  }

  await writeFileAtomic(filePath, stringify(table) + '\n');
  await logDebug(`Removed ${present.join(', ')} from ${filePath}`);
  return true;
}
