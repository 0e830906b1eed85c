import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import askCmd from './ask.js';

type AskHandlerArgs = Parameters<typeof askCmd.handler>[0];

function askArgs(
  configPath: string,
  extra: Partial<AskHandlerArgs> = {},
): AskHandlerArgs {
  return {
    _: ['ask'],
    $0: 'winston',
    prompt: ['Say', 'hello'],
    retries: 0,
    config: configPath,
    verbose: false,
    ...extra,
  };
}

describe('ask command', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'winston-ask-'));
    configPath = path.join(tempDir, 'missing', 'config.toml');
    vi.stubEnv('OPENAI_API_KEY', '');
    vi.stubEnv('OPENAI_MODEL', '');
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  async function runFailing(args: AskHandlerArgs): Promise<string[]> {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const exit = vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${String(code)})`);
    });
    await expect(askCmd.handler(args)).rejects.toThrow('process.exit(1)');
    expect(exit).toHaveBeenCalledTimes(1);
    return error.mock.calls.map((call) => String(call[0]));
  }

  it('exits with status 1 when no source has a key', async () => {
    const output = await runFailing(askArgs(configPath));
    expect(output).toHaveLength(1);
    expect(output[0]).toContain(
      'No API key found. Checked: cli, env, file. Pass --api-key, set OPENAI_API_KEY, or add api_key to the config file.',
    );
  });

  it('names the flag that supplied an empty key', async () => {
    const output = await runFailing(askArgs(configPath, { 'api-key': '' }));
    expect(output[0]).toContain('The API key is empty.');
    expect(output[1]).toContain('Value came from the --api-key flag');
  });

  it('names the flag that supplied an out-of-range value', async () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-secret');
    const output = await runFailing(askArgs(configPath, { temperature: 3 }));
    expect(output[0]).toContain(
      'temperature = 3 is out of range (expected a number between 0 and 2)',
    );
    expect(output[1]).toContain('Value came from the --temperature flag');
  });

  it('reports a malformed config file', async () => {
    const filePath = path.join(tempDir, 'config.toml');
    await fs.writeFile(filePath, 'temperature = "hot"\n');
    const output = await runFailing(
      askArgs(filePath, { 'api-key': 'test-secret' }),
    );
    expect(output[0]).toContain(`Invalid config file ${filePath}:`);
    expect(output[1]).toContain(
      'Fix the file, or pass --config <path> to use another one.',
    );
  });
});
