import type { Command } from './types.js';
import { DEFAULT_CONFIG, redactConfig } from '../config.js';
import { resolveConfig } from '../config-resolver.js';
import {
  createClient,
  requestCompletion,
  toBaseUrl,
} from '../completion.js';
import { initLogger, logInfo, logVerbose } from '../logger.js';
import {
  applyConfigOptions,
  loadConfigLayers,
  type ConfigFlagArgs,
  type ConfigLayers,
} from './config-options.js';
import { reportError } from './report-error.js';

interface AskArgs extends ConfigFlagArgs {
  prompt: string[];
  retries: number;
}

const command: Command<AskArgs> = {
  command: 'ask <prompt..>',
  describe: 'Send a prompt to the completion API and print the reply',

  builder: (yargs) => {
    return applyConfigOptions(
      yargs
        .positional('prompt', {
          describe: 'Prompt text',
          type: 'string',
          array: true,
          demandOption: true,
        })
        .option('retries', {
          describe: 'Number of retries for failed requests',
          type: 'number',
          default: 2,
        }),
    )
      .example('$0 ask "Summarize RFC 2119 in one line"', 'Ask a question')
      .example(
        '$0 ask -m gpt-4o -t 0.2 "Name three prime numbers"',
        'Override model and temperature for one call',
      )
      .example('$0 ask --stop "\\n" "Complete: Once upon"', 'Stop at newline');
  },

  handler: async (argv) => {
    let layers: ConfigLayers | undefined;
    try {
      await initLogger(argv.log, argv.verbose);
      layers = await loadConfigLayers(argv);
      const config = resolveConfig(
        layers.cli,
        layers.env,
        layers.file,
        DEFAULT_CONFIG,
      );

      await logVerbose(`Config file: ${layers.configPath}`);
      await logVerbose(
        `Resolved config: ${JSON.stringify(redactConfig(config))}`,
      );
      await logVerbose(`Endpoint: ${toBaseUrl(config.endpoint)}`);

      const result = await requestCompletion({
        client: createClient(config),
        config,
        prompt: argv.prompt.join(' '),
        retries: argv.retries,
      });

      logInfo(result.text);
      if (result.usage) {
        await logVerbose(
          `Tokens: ${result.usage.inputTokens} input + ${result.usage.outputTokens} output`,
        );
      }
    } catch (error) {
      await reportError(error, layers);
      process.exit(1);
    }
  },
};

export default command;
