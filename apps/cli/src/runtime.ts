import {
  HdiutilImageInspector,
  createCommandRunner,
  createMacToolkit,
  createPathToolLocator,
  createReleaseLogger,
  detectArchitecture,
  type DiskImageInspector,
  type LogLevel,
  type ReleaseConfig,
  type ReleaseLogger,
  type ReleaseToolkit,
  type ToolLocator
} from '@orchestraterm/release-kit';

/**
 * Host facilities the commands use. Tests replace any of them.
 */
export type CliRuntime = {
  cwd: string;
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  architecture: string;
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  locator: ToolLocator;
  createToolkit: (config: ReleaseConfig, locator: ToolLocator) => Promise<ReleaseToolkit>;
  createInspector: (platform: NodeJS.Platform) => DiskImageInspector | null;
  createLogger: (level: LogLevel) => ReleaseLogger;
};

async function createHostToolkit(config: ReleaseConfig, locator: ToolLocator): Promise<ReleaseToolkit> {
  return createMacToolkit({
    runner: createCommandRunner(),
    resizer: config.iconResizer,
    buildCommand: config.buildCommand,
    setFilePath: await locator.find('SetFile')
  });
}

export function createDefaultRuntime(overrides: Partial<CliRuntime> = {}): CliRuntime {
  const env = overrides.env ?? process.env;
  return {
    cwd: process.cwd(),
    env,
    platform: process.platform,
    architecture: detectArchitecture(),
    stdout: (line) => {
      process.stdout.write(`${line}\n`);
    },
    stderr: (line) => {
      process.stderr.write(`${line}\n`);
    },
    locator: createPathToolLocator(env),
    createToolkit: createHostToolkit,
    createInspector: (platform) => (platform === 'darwin' ? new HdiutilImageInspector(createCommandRunner()) : null),
    createLogger: (level) => createReleaseLogger(level),
    ...overrides
  };
}
