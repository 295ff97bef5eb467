/**
 * Azure CLI runner
 *
 * Every provider call goes through an AzRunner so commands can be exercised
 * against an in-process fake. The default runner uses execFile, so argument
 * values are never interpreted by a shell.
 */

import { execFile } from 'child_process';
import { promisify } from 'util';
import { logCommand, logOutput } from '../logger';

const execFileAsync = promisify(execFile);

const MAX_BUFFER = 20 * 1024 * 1024;

export interface AzResult {
  stdout: string;
  stderr: string;
}

export interface AzRunner {
  run(args: string[]): Promise<AzResult>;
}

export interface AzRunnerOptions {
  /** Path to the az binary */
  azPath?: string;
  timeoutMs?: number;
  cwd?: string;
}

export class AzCliError extends Error {
  override name = 'AzCliError';

  constructor(
    message: string,
    public readonly args: string[],
    public readonly exitCode: number | null,
    public readonly stderr: string,
    public readonly notInstalled: boolean = false
  ) {
    super(message);
  }
}

/**
 * First meaningful line of az's stderr ("ERROR: ..." prefix removed)
 */
export function summarizeStderr(stderr: string): string {
  const lines = stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !line.startsWith('WARNING:'));

  const errorLine = lines.find((line) => line.startsWith('ERROR:')) ?? lines[0] ?? '';
  return errorLine.replace(/^ERROR:\s*/, '');
}

/**
 * The command words before the first flag, e.g. `az deployment sub create`
 */
export function describeCommand(azPath: string, args: string[]): string {
  const words: string[] = [];
  for (const arg of args) {
    if (arg.startsWith('-')) break;
    words.push(arg);
  }
  return [azPath, ...words].join(' ');
}

function toAzCliError(azPath: string, args: string[], error: unknown): AzCliError {
  const command = describeCommand(azPath, args);

  if (!(error instanceof Error)) {
    return new AzCliError(`${command} failed: ${String(error)}`, args, null, '');
  }

  const code = 'code' in error ? error.code : undefined;
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';

  if (code === 'ENOENT') {
    return new AzCliError(`${azPath} was not found on PATH`, args, null, stderr, true);
  }

  const exitCode = typeof code === 'number' ? code : null;
  const detail = summarizeStderr(stderr) || error.message;
  return new AzCliError(`${command} failed: ${detail}`, args, exitCode, stderr);
}

/**
 * Create the default runner backed by the az executable
 */
export function createAzRunner(options: AzRunnerOptions = {}): AzRunner {
  const azPath = options.azPath ?? 'az';
  const timeout = options.timeoutMs ?? 0;

  return {
    async run(args: string[]): Promise<AzResult> {
      logCommand(`${azPath} ${args.join(' ')}`);

      try {
        const { stdout, stderr } = await execFileAsync(azPath, args, {
          cwd: options.cwd,
          timeout,
          maxBuffer: MAX_BUFFER,
          env: { ...process.env, AZURE_CORE_NO_COLOR: 'true' },
        });
        logOutput('stdout', stdout);
        logOutput('stderr', stderr);
        return { stdout, stderr };
      } catch (error) {
        const azError = toAzCliError(azPath, args, error);
        logOutput('stderr', azError.stderr || azError.message);
        throw azError;
      }
    },
  };
}

/**
 * Run a command with `--output json` and parse stdout
 */
export async function runAzJson(runner: AzRunner, args: string[]): Promise<unknown> {
  const { stdout } = await runner.run([...args, '--output', 'json']);
  const trimmed = stdout.trim();
  if (!trimmed) {
    return null;
  }

  try {
    return JSON.parse(trimmed);
  } catch {
    throw new AzCliError(`${describeCommand('az', args)} returned invalid JSON`, args, 0, '');
  }
}

/**
 * Run a command with `--output tsv` and return the trimmed value
 */
export async function runAzTsv(runner: AzRunner, args: string[]): Promise<string> {
  const { stdout } = await runner.run([...args, '--output', 'tsv']);
  return stdout.trim();
}
