import { spawn } from 'node:child_process';
import path from 'node:path';
import { ToolInvocationError } from '../errors';
import { isExecutableFile } from './fs';

export type CommandResult = {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
};

export type CommandOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Receives a copy of the child's stdout and stderr as they arrive. */
  echo?: NodeJS.WritableStream;
};

export interface CommandRunner {
  run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult>;
}

export function createCommandRunner(): CommandRunner {
  return {
    run(command, args, options = {}) {
      return new Promise<CommandResult>((resolve) => {
        const child = spawn(command, args, {
          cwd: options.cwd,
          env: options.env ?? process.env,
          stdio: ['ignore', 'pipe', 'pipe']
        });
        let stdout = '';
        let stderr = '';
        let settled = false;

        child.stdout.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => {
          stdout += chunk;
          options.echo?.write(chunk);
        });

        child.stderr.setEncoding('utf8');
        child.stderr.on('data', (chunk: string) => {
          stderr += chunk;
          options.echo?.write(chunk);
        });

        child.once('close', (code, signal) => {
          if (settled) {
            return;
          }
          settled = true;
          resolve({ exitCode: code, signal, stdout, stderr });
        });

        child.once('error', (err) => {
          if (settled) {
            return;
          }
          settled = true;
          resolve({ exitCode: null, signal: null, stdout, stderr: `${stderr}${stderr ? '\n' : ''}${err.message}` });
        });
      });
    }
  } satisfies CommandRunner;
}

export type RunToolOptions = CommandOptions & {
  /** Short human label used in the failure message, e.g. "hdiutil create". */
  label?: string;
};

/**
 * Runs a command and turns anything but a zero exit into a ToolInvocationError.
 */
export async function runTool(
  runner: CommandRunner,
  command: string,
  args: string[],
  options: RunToolOptions = {}
): Promise<CommandResult> {
  const { label, ...commandOptions } = options;
  const result = await runner.run(command, args, commandOptions);
  if (result.exitCode === 0) {
    return result;
  }
  const name = label ?? command;
  const reason = result.signal
    ? `${name} terminated with signal ${result.signal}`
    : result.exitCode === null
      ? `${name} could not be started`
      : `${name} exited with code ${result.exitCode}`;
  const detail = result.stderr.trim() || result.stdout.trim();
  throw new ToolInvocationError(detail ? `${reason}: ${detail}` : reason, {
    command,
    args,
    exitCode: result.exitCode,
    stderr: result.stderr
  });
}

export interface ToolLocator {
  find(name: string): Promise<string | null>;
}

export function createPathToolLocator(env: NodeJS.ProcessEnv = process.env): ToolLocator {
  return {
    async find(name) {
      const searchPath = env.PATH ?? '';
      for (const directory of searchPath.split(path.delimiter)) {
        if (!directory) {
          continue;
        }
        const candidate = path.join(directory, name);
        if (await isExecutableFile(candidate)) {
          return candidate;
        }
      }
      return null;
    }
  } satisfies ToolLocator;
}

/**
 * Splits a configured command line on whitespace; quoting is not supported.
 */
export function splitCommandLine(commandLine: string): { command: string; args: string[] } {
  const parts = commandLine.trim().split(/\s+/).filter((part) => part.length > 0);
  const [command, ...args] = parts;
  if (!command) {
    throw new Error('Command line is empty');
  }
  return { command, args };
}
