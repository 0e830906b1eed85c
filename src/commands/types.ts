import type { CommandModule } from 'yargs';

/**
 * A yargs command module. Each file under commands/ default-exports one and
 * cli.ts registers it.
 */
export type Command<T = object> = CommandModule<object, T>;
