import path from 'node:path';
import { Command } from 'commander';
import { loadReleaseConfig, runReleasePipeline } from '@orchestraterm/release-kit';
import type { CliRuntime } from '../runtime';

type BuildOptions = {
  root?: string;
  outputDir?: string;
  skipCompile?: boolean;
};

export function registerBuildCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('build')
    .description('Compile, bundle and package the macOS disk image with its checksum record')
    .option('--root <dir>', 'Project root containing the build manifest (default: current directory)')
    .option('--output-dir <dir>', 'Directory for release artifacts (default: dist)')
    .option('--skip-compile', 'Package the existing binary instead of running the build command')
    .action(async (options: BuildOptions) => {
      const projectRoot = path.resolve(runtime.cwd, options.root ?? '.');
      const config = loadReleaseConfig({
        env: runtime.env,
        projectRoot,
        overrides: {
          outputDir: options.outputDir,
          skipCompile: options.skipCompile ? true : undefined
        }
      });
      const logger = runtime.createLogger(config.logLevel);
      const toolkit = await runtime.createToolkit(config, runtime.locator);

      const result = await runReleasePipeline({
        config,
        toolkit,
        locator: runtime.locator,
        logger,
        platform: runtime.platform,
        architecture: runtime.architecture,
        onProgress: (event) => {
          logger.debug({ stage: event.stage, status: event.status }, 'Release stage progress');
        }
      });

      if (result.status === 'failed') {
        throw result.error;
      }

      runtime.stdout(path.relative(runtime.cwd, result.imagePath) || result.imagePath);
    });
}
