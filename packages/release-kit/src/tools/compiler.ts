import type { BinaryCompiler } from '../capabilities';
import { runTool, splitCommandLine, type CommandRunner } from '../lib/exec';

export const DEFAULT_BUILD_COMMAND = 'cargo build --release';

/**
 * Runs the project's own build command. Its output is echoed to stderr so stdout stays reserved
 * for the artifact path.
 */
export class CommandLineCompiler implements BinaryCompiler {
  readonly requiredTool: string;
  private readonly args: string[];

  constructor(
    private readonly runner: CommandRunner,
    commandLine: string = DEFAULT_BUILD_COMMAND,
    private readonly echo: NodeJS.WritableStream | undefined = process.stderr
  ) {
    const { command, args } = splitCommandLine(commandLine);
    this.requiredTool = command;
    this.args = args;
  }

  async compile(projectRoot: string): Promise<void> {
    await runTool(this.runner, this.requiredTool, this.args, {
      cwd: projectRoot,
      echo: this.echo,
      label: [this.requiredTool, ...this.args].join(' ')
    });
  }
}
