import { execa } from 'execa';

import { ExternalToolError, ExternalToolNotFoundError, ValidationError, toError } from '../errors.js';

export const MODE_PLACEHOLDER = '{{mode}}';

const INJECTED_FLAGS = ['--konnect-token', '--konnect-control-plane-name', '--konnect-addr'] as const;

export interface ExternalToolRunOptions {
  args: string[];
  mode: string;
  token?: string;
  controlPlaneName?: string;
  address?: string;
  cwd?: string;
  signal?: AbortSignal;
}

export interface ExternalToolRunResult {
  stdout: string;
  stderr: string;
}

export interface ExternalToolRunner {
  run(options: ExternalToolRunOptions): Promise<ExternalToolRunResult>;
}

export function hasFlag(args: readonly string[], flag: string): boolean {
  return args.some((arg) => arg === flag || arg.startsWith(`${flag}=`));
}

/**
 * Substitutes the mode placeholder and, for `gateway` commands, inserts the
 * connection flags after the subcommand.
 */
export function buildToolArgs(options: ExternalToolRunOptions): string[] {
  if (options.args.length === 0) {
    throw new ValidationError('external tool args cannot be empty');
  }

  const args = options.args.map((arg) => {
    if (arg === MODE_PLACEHOLDER) {
      const mode = options.mode.trim();
      if (mode !== 'apply' && mode !== 'sync') {
        throw new ValidationError('mode placeholder requires apply or sync');
      }
      return mode;
    }
    if (arg.includes(MODE_PLACEHOLDER)) {
      throw new ValidationError('mode placeholder must be a standalone argument');
    }
    return arg;
  });

  if (args[0] !== 'gateway') {
    return args;
  }

  const token = options.token?.trim() ?? '';
  const controlPlaneName = options.controlPlaneName?.trim() ?? '';
  const address = options.address?.trim() ?? '';
  if (!token) {
    throw new ValidationError('an API token is required for gateway steps');
  }
  if (!controlPlaneName) {
    throw new ValidationError('a control plane name is required for gateway steps');
  }
  if (!address) {
    throw new ValidationError('an API address is required for gateway steps');
  }
  for (const flag of INJECTED_FLAGS) {
    if (hasFlag(args, flag)) {
      throw new ValidationError(`flag ${flag} is set by the engine and cannot be supplied`);
    }
  }

  const injected = [
    '--konnect-token',
    token,
    '--konnect-control-plane-name',
    controlPlaneName,
    '--konnect-addr',
    address,
  ];
  return [...args.slice(0, 2), ...injected, ...args.slice(2)];
}

export interface ExecaRunnerOptions {
  command?: string;
}

export function createExecaRunner(options: ExecaRunnerOptions = {}): ExternalToolRunner {
  const command = options.command ?? 'deck';

  return {
    async run(runOptions: ExternalToolRunOptions): Promise<ExternalToolRunResult> {
      const args = buildToolArgs(runOptions);
      try {
        const result = await execa(command, args, {
          cwd: runOptions.cwd,
          signal: runOptions.signal,
          stripFinalNewline: true,
        });
        return { stdout: String(result.stdout), stderr: String(result.stderr) };
      } catch (error) {
        if (errorCode(error) === 'ENOENT') {
          throw new ExternalToolNotFoundError(command, { cause: error });
        }
        const err = toError(error);
        throw new ExternalToolError(
          `${command} failed: ${err.message}`,
          { stdout: outputOf(error, 'stdout'), stderr: outputOf(error, 'stderr') },
          { cause: err },
        );
      }
    },
  };
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function outputOf(error: unknown, stream: 'stdout' | 'stderr'): string {
  if (typeof error === 'object' && error !== null && stream in error) {
    const value: unknown = Reflect.get(error, stream);
    return typeof value === 'string' ? value : '';
  }
  return '';
}
