import { beforeEach, describe, expect, it, vi } from 'vitest';
import { execa } from 'execa';

import { ExternalToolError, ExternalToolNotFoundError } from '../errors.js';
import { buildToolArgs, createExecaRunner, hasFlag } from './runner.js';

vi.mock('execa', () => ({ execa: vi.fn() }));

const mockedExeca = vi.mocked(execa);

function execaResult(stdout: string, stderr = '') {
  return { exitCode: 0, stdout, stderr, isCanceled: false } as unknown as Awaited<ReturnType<typeof execa>>;
}

const gatewayOptions = {
  mode: 'sync',
  token: 'test-token',
  controlPlaneName: 'edge',
  address: 'https://api.example.test',
};

describe('buildToolArgs', () => {
  it('injects connection flags after the gateway subcommand', () => {
    expect(buildToolArgs({ ...gatewayOptions, args: ['gateway', '{{mode}}', '--no-color', 'kong.yaml'] })).toEqual([
      'gateway',
      'sync',
      '--konnect-token',
      'test-token',
      '--konnect-control-plane-name',
      'edge',
      '--konnect-addr',
      'https://api.example.test',
      '--no-color',
      'kong.yaml',
    ]);
  });

  it('passes other commands through', () => {
    expect(buildToolArgs({ args: ['version'], mode: 'apply' })).toEqual(['version']);
  });

  it('rejects flags the engine owns', () => {
    expect(() =>
      buildToolArgs({ ...gatewayOptions, args: ['gateway', 'sync', '--konnect-token=other', 'kong.yaml'] }),
    ).toThrow('flag --konnect-token is set by the engine and cannot be supplied');
  });

  it('requires credentials for gateway commands', () => {
    expect(() => buildToolArgs({ args: ['gateway', 'sync'], mode: 'sync' })).toThrow(
      'an API token is required for gateway steps',
    );
    expect(() => buildToolArgs({ args: ['gateway', 'sync'], mode: 'sync', token: 'test-token' })).toThrow(
      'a control plane name is required for gateway steps',
    );
  });

  it('validates the mode placeholder', () => {
    expect(() => buildToolArgs({ args: ['{{mode}}'], mode: 'diff' })).toThrow(
      'mode placeholder requires apply or sync',
    );
    expect(() => buildToolArgs({ args: ['--mode={{mode}}'], mode: 'sync' })).toThrow(
      'mode placeholder must be a standalone argument',
    );
    expect(() => buildToolArgs({ args: [], mode: 'sync' })).toThrow('external tool args cannot be empty');
  });

  it('matches flags with and without values', () => {
    expect(hasFlag(['--json-output'], '--json-output')).toBe(true);
    expect(hasFlag(['--select-tag=a'], '--select-tag')).toBe(true);
    expect(hasFlag(['--json'], '--json-output')).toBe(false);
  });
});

describe('createExecaRunner', () => {
  beforeEach(() => {
    mockedExeca.mockReset();
  });

  it('runs the command with the built args', async () => {
    mockedExeca.mockResolvedValueOnce(execaResult('{"summary":{}}'));
    const controller = new AbortController();
    const runner = createExecaRunner({ command: 'deck-test' });

    const result = await runner.run({
      ...gatewayOptions,
      args: ['gateway', 'apply', 'kong.yaml'],
      cwd: '/plans/gateway',
      signal: controller.signal,
    });

    expect(result).toEqual({ stdout: '{"summary":{}}', stderr: '' });
    expect(mockedExeca).toHaveBeenCalledWith(
      'deck-test',
      [
        'gateway',
        'apply',
        '--konnect-token',
        'test-token',
        '--konnect-control-plane-name',
        'edge',
        '--konnect-addr',
        'https://api.example.test',
        'kong.yaml',
      ],
      { cwd: '/plans/gateway', signal: controller.signal, stripFinalNewline: true },
    );
  });

  it('reports a missing binary', async () => {
    mockedExeca.mockRejectedValueOnce(Object.assign(new Error('spawn deck ENOENT'), { code: 'ENOENT' }));
    const runner = createExecaRunner();

    const failure = runner.run({ args: ['version'], mode: 'apply' });
    await expect(failure).rejects.toBeInstanceOf(ExternalToolNotFoundError);
    await expect(failure).rejects.toThrow('deck executable not found in PATH');
  });

  it('keeps the output of a failed run', async () => {
    mockedExeca.mockRejectedValueOnce(
      Object.assign(new Error('Command failed with exit code 1'), { stdout: 'partial', stderr: 'bad file' }),
    );
    const runner = createExecaRunner();

    let caught: unknown;
    try {
      await runner.run({ args: ['version'], mode: 'apply' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ExternalToolError);
    if (caught instanceof ExternalToolError) {
      expect(caught.message).toBe('deck failed: Command failed with exit code 1');
      expect(caught.stdout).toBe('partial');
      expect(caught.stderr).toBe('bad file');
    }
  });
});
