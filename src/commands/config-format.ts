import { stringify } from 'smol-toml';
import {
  CONFIG_KEYS,
  redactApiKey,
  type ConfigField,
  type ConfigRecord,
} from '../config.js';
import type { ConfigSources } from '../config-resolver.js';
import type { ConfigTable } from '../config-manager.js';

const KEY_WIDTH = Math.max(...CONFIG_KEYS.map(({ key }) => key.length));

/**
 * Value as printed by `config get`: raw, except the masked credential.
 */
export function formatValue(field: ConfigField, value: string | number): string {
  if (field === 'apiKey' && typeof value === 'string') {
    return redactApiKey(value);
  }
  return String(value);
}

/**
 * One `key = value  # source` line per field of a resolved record.
 */
export function formatResolvedConfig(
  record: ConfigRecord,
  sources: ConfigSources,
): string[] {
  return CONFIG_KEYS.map(({ field, key }) => {
    const value = record[field];
    let shown = '(not set)';
    if (typeof value === 'string') {
      shown = JSON.stringify(formatValue(field, value));
    } else if (value !== undefined) {
      shown = String(value);
    }
    return `${key.padEnd(KEY_WIDTH)} = ${shown}  # ${sources[field]}`;
  });
}

/**
 * Renders the file's table as TOML with the credential masked.
 */
export function formatConfigTable(table: ConfigTable): string {
  const apiKey = table.api_key;
  const shown =
    typeof apiKey === 'string'
      ? { ...table, api_key: redactApiKey(apiKey) }
      : table;
  return stringify(shown).trimEnd();
}
