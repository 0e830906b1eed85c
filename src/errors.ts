export type ConfigErrorKind =
  | 'MissingCredential'
  | 'OutOfRange'
  | 'InvalidValue'
  | 'InvalidFileFormat'
  | 'IoError'
  | 'NoHomeDirectory';

/**
 * Base class for every failure of configuration loading, merging,
 * validation and persistence.
 */
export abstract class ConfigError extends Error {
  abstract readonly kind: ConfigErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * No source supplied an API key.
 */
export class MissingCredentialError extends ConfigError {
  readonly kind = 'MissingCredential';
  /** Sources that were consulted, highest priority first */
  readonly consulted: readonly string[];
  /** A source supplied the key, but it was blank */
  readonly empty: boolean;

  constructor(
    consulted: readonly string[] = ['cli', 'env', 'file'],
    options: { empty?: boolean } = {},
  ) {
    const empty = options.empty ?? false;
    super(
      empty
        ? 'The API key is empty. Pass a non-empty --api-key, set OPENAI_API_KEY, or fix api_key in the config file.'
        : `No API key found. Checked: ${consulted.join(', ')}. Pass --api-key, set OPENAI_API_KEY, or add api_key to the config file.`,
    );
    this.name = 'MissingCredentialError';
    this.consulted = consulted;
    this.empty = empty;
  }
}

/**
 * A numeric field lies outside its declared bounds.
 */
export class OutOfRangeError extends ConfigError {
  readonly kind = 'OutOfRange';
  readonly field: string;
  readonly value: unknown;
  readonly bound: string;

  constructor(field: string, value: unknown, bound: string) {
    super(`${field} = ${String(value)} is out of range (expected ${bound})`);
    this.name = 'OutOfRangeError';
    this.field = field;
    this.value = value;
    this.bound = bound;
  }
}

/**
 * A non-numeric field holds an unusable value, or a raw value could not be
 * converted to the field's type.
 */
export class InvalidValueError extends ConfigError {
  readonly kind = 'InvalidValue';
  readonly field: string;
  readonly value: unknown;

  constructor(field: string, value: unknown, reason: string) {
    super(`Invalid ${field} ${JSON.stringify(value)}: ${reason}`);
    this.name = 'InvalidValueError';
    this.field = field;
    this.value = value;
  }
}

/**
 * The config file exists but is not valid TOML, or a known key has the
 * wrong value type.
 */
export class InvalidFileFormatError extends ConfigError {
  readonly kind = 'InvalidFileFormat';
  readonly path: string;
  readonly detail: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super(`Invalid config file ${path}: ${detail}`, options);
    this.name = 'InvalidFileFormatError';
    this.path = path;
    this.detail = detail;
  }
}

export class ConfigIoError extends ConfigError {
  readonly kind = 'IoError';
  readonly path: string;
  readonly operation: 'read' | 'write';

  constructor(path: string, operation: 'read' | 'write', cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to ${operation} config file ${path}: ${reason}`, { cause });
    this.name = 'ConfigIoError';
    this.path = path;
    this.operation = operation;
  }
}

export class NoHomeDirectoryError extends ConfigError {
  readonly kind = 'NoHomeDirectory';

  constructor(options?: { cause?: unknown }) {
    super(
      'Could not determine a config directory: XDG_CONFIG_HOME is not set and no home directory was found. Use --config <path>.',
      options,
    );
    this.name = 'NoHomeDirectoryError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string'
  );
}
