#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';

import askCmd from './commands/ask.js';
import configCmd from './commands/config.js';
import { PARSER_CONFIGURATION } from './commands/config-options.js';

void yargs(hideBin(process.argv))
  .parserConfiguration(PARSER_CONFIGURATION)
  .command(askCmd)
  .command(configCmd)
  .scriptName('winston')
  .usage(
    '$0 <command> [options]\n\nSettings are taken from flags, then OPENAI_API_KEY / OPENAI_MODEL, then the config file, then built-in defaults.',
  )
  .demandCommand(1, 'You must provide a valid command.')
  .strict()
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .parse();
