import chalk from 'chalk';
import {
  DEFAULT_CONFIG,
  findConfigKey,
  validateConfig,
  type ConfigKeyInfo,
} from '../config.js';
import { mergeConfig, resolveConfig } from '../config-resolver.js';
import {
  configFileExists,
  loadConfigFile,
  readConfigTable,
  saveConfigFile,
  setConfigValue,
  unsetConfigValue,
} from '../config-manager.js';
import { InvalidValueError } from '../errors.js';
import { initLogger, logInfo } from '../logger.js';
import type { Command } from './types.js';
import {
  applyConfigOptions,
  loadConfigLayers,
  resolveConfigPath,
  type ConfigFlagArgs,
  type ConfigLayers,
} from './config-options.js';
import {
  formatConfigTable,
  formatResolvedConfig,
  formatValue,
} from './config-format.js';
import { reportError } from './report-error.js';

const ACTION_CHOICES = [
  'get',
  'set',
  'unset',
  'list',
  'path',
  'show',
  'init',
] as const;
type ConfigAction = (typeof ACTION_CHOICES)[number];

interface ConfigArgs extends ConfigFlagArgs {
  action: ConfigAction;
  key?: string;
  value?: string;
  force: boolean;
}

function requireKey(key: string | undefined, action: ConfigAction): ConfigKeyInfo {
  if (!key) {
    throw new Error(`The "${action}" action requires a key.`);
  }
  const entry = findConfigKey(key);
  if (!entry) {
    throw new InvalidValueError('key', key, 'not a known configuration key');
  }
  return entry;
}

const command: Command<ConfigArgs> = {
  command: 'config <action> [key] [value]',
  describe: 'Inspect and manage the persistent configuration file',

  builder: (yargs) => {
    return applyConfigOptions(
      yargs
        .positional('action', {
          describe: 'The configuration action',
          type: 'string',
          choices: ACTION_CHOICES,
          demandOption: true,
        })
        .positional('key', {
          describe: 'The configuration key (e.g. model, max_tokens)',
          type: 'string',
        })
        .positional('value', {
          describe: 'The configuration value (for "set")',
          type: 'string',
        })
        .option('force', {
          describe: 'Overwrite an existing config file (for "init")',
          type: 'boolean',
          default: false,
        }),
    )
      .check((argv) => {
        if (argv.action === 'set' && (!argv.key || argv.value === undefined)) {
          throw new Error('The "set" action requires a key and a value.');
        }
        if ((argv.action === 'get' || argv.action === 'unset') && !argv.key) {
          throw new Error(`The "${argv.action}" action requires a key.`);
        }
        return true;
      })
      .example('$0 config set model gpt-4o', 'Set the default model')
      .example('$0 config get max_tokens', 'Get a configured value')
      .example('$0 config show', 'Show the resolved configuration and sources')
      .example('$0 config init -k <key>', 'Write a complete config file')
      .example('$0 config path', 'Show config file path');
  },

  handler: async (argv) => {
    const { action, key, value } = argv;
    let layers: ConfigLayers | undefined;

    try {
      await initLogger(argv.log, argv.verbose);
      const configPath = resolveConfigPath(argv);

      switch (action) {
        case 'path': {
          logInfo(configPath);
          break;
        }

        case 'list': {
          const table = await readConfigTable(configPath);
          if (Object.keys(table).length === 0) {
            logInfo(chalk.yellow('No configuration settings found.'));
            logInfo(chalk.dim(`Config file: ${configPath}`));
          } else {
            logInfo(formatConfigTable(table));
            logInfo(chalk.dim(`\nConfig file: ${configPath}`));
          }
          break;
        }

        case 'get': {
          const entry = requireKey(key, action);
          const file = await loadConfigFile(configPath);
          const configValue = file[entry.field];
          if (configValue !== undefined) {
            logInfo(formatValue(entry.field, configValue));
          } else {
            logInfo(chalk.yellow('Not set'));
          }
          break;
        }

        case 'set': {
          const entry = requireKey(key, action);
          if (value === undefined) {
            throw new Error('The "set" action requires both key and value.');
          }
          const stored = await setConfigValue(configPath, entry.key, value);
          logInfo(
            chalk.green(
              `✓ Set "${entry.key}" to "${formatValue(entry.field, stored)}"`,
            ),
          );
          logInfo(chalk.dim(`  Config file: ${configPath}`));
          break;
        }

        case 'unset': {
          const entry = requireKey(key, action);
          if (await unsetConfigValue(configPath, entry.key)) {
            logInfo(chalk.green(`✓ Removed "${entry.key}"`));
          } else {
            logInfo(chalk.yellow(`"${entry.key}" was not set`));
          }
          logInfo(chalk.dim(`  Config file: ${configPath}`));
          break;
        }

        case 'show': {
          layers = await loadConfigLayers(argv);
          const { record, sources } = mergeConfig(
            layers.cli,
            layers.env,
            layers.file,
            DEFAULT_CONFIG,
          );
          for (const line of formatResolvedConfig(record, sources)) {
            logInfo(line);
          }
          logInfo(chalk.dim(`\nConfig file: ${configPath}`));
          validateConfig(record);
          break;
        }

        case 'init': {
          layers = await loadConfigLayers(argv);
          const config = resolveConfig(
            layers.cli,
            layers.env,
            layers.file,
            DEFAULT_CONFIG,
          );
          if (!argv.force && (await configFileExists(configPath))) {
            throw new Error(
              `${configPath} already exists. Use --force to overwrite it.`,
            );
          }
          await saveConfigFile(config, configPath);
          logInfo(chalk.green(`✓ Wrote configuration to ${configPath}`));
          break;
        }
      }
    } catch (error) {
      await reportError(error, layers);
      process.exit(1);
    }
  },
};

export default command;
