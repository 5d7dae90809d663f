import { promises as fs } from 'node:fs';
import path from 'node:path';
import { ConfigurationError, ToolInvocationError } from './errors';
import { DESCRIPTOR_FILENAME, descriptorFieldsFor, renderDescriptor } from './descriptor';
import { copyFile, ensureDir, isExecutableFile, isFile, writeFile } from './lib/fs';
import type { ReleaseLogger } from './logger';
import type { AppBundle, ReleaseProfile } from './types';

export const EXECUTABLE_MODE = 0o755;

export type AssembleAppBundleInput = {
  workDir: string;
  profile: ReleaseProfile;
  version: string;
  binaryPath: string;
  /** Icon container to embed, or null to ship without one. */
  iconContainerPath: string | null;
  logger: ReleaseLogger;
};

export function bundleDirectoryName(profile: ReleaseProfile): string {
  return `${profile.appName}.app`;
}

export async function assertBinaryPresent(binaryPath: string): Promise<void> {
  if (!(await isFile(binaryPath))) {
    throw new ConfigurationError(`Source binary not found at ${binaryPath}`);
  }
}

export async function assembleAppBundle(input: AssembleAppBundleInput): Promise<AppBundle> {
  const { workDir, profile, version, binaryPath, iconContainerPath, logger } = input;
  await assertBinaryPresent(binaryPath);

  const bundlePath = path.join(workDir, bundleDirectoryName(profile));
  const contentsDir = path.join(bundlePath, 'Contents');
  const executableDir = path.join(contentsDir, 'MacOS');
  const resourcesDir = path.join(contentsDir, 'Resources');
  await ensureDir(executableDir);
  await ensureDir(resourcesDir);

  const executablePath = path.join(executableDir, profile.binaryName);
  await copyFile(binaryPath, executablePath);
  await fs.chmod(executablePath, EXECUTABLE_MODE);
  if (!(await isExecutableFile(executablePath))) {
    throw new ToolInvocationError(`Bundled executable at ${executablePath} is not runnable`, {
      command: 'chmod',
      args: [EXECUTABLE_MODE.toString(8), executablePath],
      exitCode: null,
      stderr: ''
    });
  }

  let iconPath: string | null = null;
  if (iconContainerPath) {
    iconPath = path.join(resourcesDir, `${profile.iconName}.icns`);
    await copyFile(iconContainerPath, iconPath);
  }

  const descriptorPath = path.join(contentsDir, DESCRIPTOR_FILENAME);
  await writeFile(descriptorPath, renderDescriptor(descriptorFieldsFor(profile, version)));

  logger.info({ bundlePath, icon: iconPath !== null }, 'App bundle assembled');
  return { path: bundlePath, executablePath, resourcesDir, descriptorPath, iconPath };
}
