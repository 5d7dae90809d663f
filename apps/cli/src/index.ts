#!/usr/bin/env tsx

import { Command, CommanderError } from 'commander';
import { describeError } from '@orchestraterm/release-kit';
import { registerBuildCommand } from './commands/build';
import { registerVerifyCommand } from './commands/verify';
import { createDefaultRuntime, type CliRuntime } from './runtime';

export function createProgram(runtime: CliRuntime = createDefaultRuntime()): Command {
  const program = new Command();

  program
    .name('orchestraterm-release')
    .description('OrchestraTerm macOS release tooling')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => runtime.stdout(text.replace(/\n$/, '')),
      writeErr: (text) => runtime.stderr(text.replace(/\n$/, ''))
    });

  registerBuildCommand(program, runtime);
  registerVerifyCommand(program, runtime);

  return program;
}

/**
 * Parses and runs one invocation, returning the process exit code.
 */
export async function runCli(argv: string[], runtime: CliRuntime = createDefaultRuntime()): Promise<number> {
  const program = createProgram(runtime);

  try {
    await program.parseAsync(argv, { from: 'user' });
    return 0;
  } catch (err) {
    if (err instanceof CommanderError) {
      return err.exitCode;
    }
    runtime.stderr(describeError(err));
    return 1;
  }
}

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

if (require.main === module) {
  void main();
}
