import { describe, it, expect } from 'vitest';
import {
  DEFAULT_CONFIG,
  configEquals,
  fieldKey,
  findConfigKey,
  redactApiKey,
  redactConfig,
  validateConfig,
  type ConfigRecord,
} from './config.js';
import {
  InvalidValueError,
  MissingCredentialError,
  OutOfRangeError,
} from './errors.js';

const base: ConfigRecord = { apiKey: 'test-secret', ...DEFAULT_CONFIG };

function validationError(overrides: Partial<ConfigRecord>): unknown {
  try {
    validateConfig({ ...base, ...overrides });
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('validateConfig', () => {
  it('accepts the defaults with a key', () => {
    expect(() => validateConfig(base)).not.toThrow();
  });

  it('accepts values on the range boundaries', () => {
    expect(() =>
      validateConfig({
        ...base,
        temperature: 2,
        topP: 0,
        frequencyPenalty: -2,
        presencePenalty: 2,
        maxTokens: 1,
      }),
    ).not.toThrow();
  });

  it('rejects an empty API key as a missing credential', () => {
    expect(validationError({ apiKey: '' })).toBeInstanceOf(
      MissingCredentialError,
    );
    expect(validationError({ apiKey: '   ' })).toBeInstanceOf(
      MissingCredentialError,
    );
  });

  it('says the key is empty rather than absent', () => {
    expect(validationError({ apiKey: '' })).toMatchObject({
      kind: 'MissingCredential',
      empty: true,
      message:
        'The API key is empty. Pass a non-empty --api-key, set OPENAI_API_KEY, or fix api_key in the config file.',
    });
  });

  it('rejects text with a lone surrogate', () => {
    expect(validationError({ stopSequence: '\uD800' })).toMatchObject({
      kind: 'InvalidValue',
      field: 'stop',
    });
    expect(validationError({ model: 'gpt-\uDC00' })).toMatchObject({
      kind: 'InvalidValue',
      field: 'model',
    });
  });

  it('masks the key when it is rejected', () => {
    expect(validationError({ apiKey: 'sk-test-secret\uD800' })).toMatchObject({
      kind: 'InvalidValue',
      field: 'api_key',
      value: 'sk-…ret\uD800',
    });
  });

  it('reports an out-of-range temperature with its field and value', () => {
    const error = validationError({ temperature: 3.5 });
    expect(error).toBeInstanceOf(OutOfRangeError);
    expect(error).toMatchObject({
      kind: 'OutOfRange',
      field: 'temperature',
      value: 3.5,
    });
    expect(() => validateConfig({ ...base, temperature: 3.5 })).toThrow(
      'temperature = 3.5 is out of range (expected a number between 0 and 2)',
    );
  });

  it('uses file key names for fields', () => {
    expect(validationError({ maxTokens: 0 })).toMatchObject({
      field: 'max_tokens',
    });
    expect(validationError({ topP: 1.5 })).toMatchObject({ field: 'top_p' });
    expect(validationError({ frequencyPenalty: -2.01 })).toMatchObject({
      field: 'frequency_penalty',
    });
    expect(validationError({ presencePenalty: 2.5 })).toMatchObject({
      field: 'presence_penalty',
    });
    expect(validationError({ timeoutSeconds: 0 })).toMatchObject({
      field: 'timeout',
    });
  });

  it('rejects a fractional max_tokens', () => {
    expect(validationError({ maxTokens: 1.5 })).toBeInstanceOf(
      OutOfRangeError,
    );
  });

  it('rejects NaN', () => {
    expect(validationError({ temperature: Number.NaN })).toMatchObject({
      kind: 'OutOfRange',
      field: 'temperature',
    });
  });

  it('reports the first failing field in table order', () => {
    expect(validationError({ timeoutSeconds: -1, temperature: 9 })).toMatchObject(
      { field: 'temperature' },
    );
  });

  it('rejects a non-http endpoint', () => {
    const error = validationError({ endpoint: 'ftp://files.example.com' });
    expect(error).toBeInstanceOf(InvalidValueError);
    expect(error).toMatchObject({ field: 'endpoint' });
    expect(validationError({ endpoint: 'not a url' })).toBeInstanceOf(
      InvalidValueError,
    );
  });

  it('accepts a local http endpoint', () => {
    expect(validationError({ endpoint: 'http://localhost:8080' })).toBe(
      undefined,
    );
  });

  it('rejects an empty model and an empty stop sequence', () => {
    expect(validationError({ model: '' })).toMatchObject({
      kind: 'InvalidValue',
      field: 'model',
    });
    expect(validationError({ stopSequence: '' })).toMatchObject({
      kind: 'InvalidValue',
      field: 'stop',
    });
  });
});

describe('findConfigKey', () => {
  it('finds fields by canonical key and alias', () => {
    expect(findConfigKey('max_tokens')?.field).toBe('maxTokens');
    expect(findConfigKey('api_endpoint')?.field).toBe('endpoint');
    expect(findConfigKey('stop_sequence')?.field).toBe('stopSequence');
    expect(findConfigKey('maxTokens')).toBeUndefined();
  });

  it('maps fields back to canonical keys', () => {
    expect(fieldKey('timeoutSeconds')).toBe('timeout');
    expect(fieldKey('stopSequence')).toBe('stop');
  });
});

describe('configEquals', () => {
  it('compares records field by field', () => {
    expect(configEquals(base, { ...base })).toBe(true);
    expect(configEquals(base, { ...base, stopSequence: '\n' })).toBe(false);
    expect(configEquals(base, { ...base, topP: 0.99 })).toBe(false);
  });
});

describe('redactApiKey', () => {
  it('keeps a short prefix and suffix of long keys', () => {
    expect(redactApiKey('sk-test-secret-1234')).toBe('sk-…1234');
    expect(redactApiKey('abcdefghi')).toBe('abc…fghi');
  });

  it('hides short keys entirely', () => {
    expect(redactApiKey('12345678')).toBe('****');
    expect(redactApiKey('')).toBe('****');
  });

  it('masks the key inside a config without mutating it', () => {
    const record = { ...base, apiKey: 'sk-test-secret-1234' };
    expect(redactConfig(record).apiKey).toBe('sk-…1234');
    expect(record.apiKey).toBe('sk-test-secret-1234');
    expect(redactConfig({ model: 'gpt-4' })).toEqual({ model: 'gpt-4' });
  });
});
