import path from 'node:path';
import { Command } from 'commander';
import {
  ORCHESTRATERM_PROFILE,
  loadReleaseConfig,
  resolveVersion,
  verifyRelease,
  type DiskImageMetadata
} from '@orchestraterm/release-kit';
import type { CliRuntime } from '../runtime';

type VerifyOptions = {
  root?: string;
  outputDir?: string;
  arch?: string;
};

export function formatMetadata(metadata: DiskImageMetadata): string[] {
  const lines: string[] = [];
  if (metadata.format !== null) {
    lines.push(`Format: ${metadata.format}`);
  }
  if (metadata.className !== null) {
    lines.push(`Class Name: ${metadata.className}`);
  }
  if (metadata.totalBytes !== null) {
    lines.push(`Total Bytes: ${metadata.totalBytes}`);
  }
  return lines;
}

export function registerVerifyCommand(program: Command, runtime: CliRuntime): void {
  program
    .command('verify [version]')
    .description('Check that the disk image and checksum record exist and still match')
    .option('--root <dir>', 'Project root containing the build manifest (default: current directory)')
    .option('--output-dir <dir>', 'Directory holding the release artifacts (default: dist)')
    .option('--arch <arch>', 'Architecture the artifact was built for (default: this host)')
    .action(async (versionArgument: string | undefined, options: VerifyOptions) => {
      const projectRoot = path.resolve(runtime.cwd, options.root ?? '.');
      const config = loadReleaseConfig({
        env: runtime.env,
        projectRoot,
        overrides: { outputDir: options.outputDir }
      });
      const logger = runtime.createLogger(config.logLevel);

      const explicitVersion = versionArgument?.trim();
      const version = explicitVersion ? explicitVersion : await resolveVersion(config.manifestPath);

      const report = await verifyRelease({
        outputDir: config.outputDir,
        binaryName: ORCHESTRATERM_PROFILE.binaryName,
        version,
        architecture: options.arch?.trim() || runtime.architecture,
        inspector: runtime.createInspector(runtime.platform),
        logger
      });

      runtime.stdout(`${path.basename(report.imagePath)}: OK`);
      if (report.metadata) {
        for (const line of formatMetadata(report.metadata)) {
          runtime.stdout(line);
        }
      } else if (report.metadataError) {
        runtime.stdout(`metadata unavailable: ${report.metadataError}`);
      }
    });
}
