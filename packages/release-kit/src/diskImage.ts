import path from 'node:path';
import type { DiskImageCreator } from './capabilities';
import { ToolInvocationError, toReleaseError } from './errors';
import { ensureDir, fileSize, isFile, removePath } from './lib/fs';
import type { ReleaseLogger } from './logger';

export type BuildDiskImageInput = {
  stagingRoot: string;
  volumeName: string;
  outputPath: string;
  creator: DiskImageCreator;
  logger: ReleaseLogger;
};

/**
 * Creates the compressed read-only image. A file left at `outputPath` by a failed run is removed
 * so it can never be mistaken for a finished image.
 */
export async function buildDiskImage(input: BuildDiskImageInput): Promise<string> {
  const { stagingRoot, volumeName, outputPath, creator, logger } = input;
  await ensureDir(path.dirname(outputPath));
  await removePath(outputPath);

  logger.info({ outputPath, volumeName }, 'Creating disk image');
  try {
    await creator.create({ volumeName, sourceDir: stagingRoot, outputPath });
  } catch (err) {
    await removePath(outputPath);
    throw toReleaseError(err);
  }

  if (!(await isFile(outputPath)) || (await fileSize(outputPath)) === 0) {
    await removePath(outputPath);
    throw new ToolInvocationError(`Disk image creation reported success but ${outputPath} is missing or empty`, {
      command: 'create',
      args: [outputPath],
      exitCode: 0,
      stderr: ''
    });
  }
  return outputPath;
}
