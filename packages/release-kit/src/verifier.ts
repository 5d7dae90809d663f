import path from 'node:path';
import type { DiskImageInspector } from './capabilities';
import { computeDigest, readChecksumRecord } from './checksum';
import { IntegrityError, MissingArtifactError } from './errors';
import { isFile } from './lib/fs';
import type { ReleaseLogger } from './logger';
import { artifactBaseName, artifactPaths } from './naming';
import type { DiskImageMetadata, VerificationReport } from './types';

export type VerifyReleaseInput = {
  outputDir: string;
  binaryName: string;
  version: string;
  architecture: string;
  inspector: DiskImageInspector | null;
  logger: ReleaseLogger;
};

async function readMetadata(
  inspector: DiskImageInspector | null,
  imagePath: string,
  logger: ReleaseLogger
): Promise<{ metadata: DiskImageMetadata | null; metadataError: string | null }> {
  if (!inspector) {
    return { metadata: null, metadataError: 'no disk image inspector available on this host' };
  }
  try {
    return { metadata: await inspector.inspect(imagePath), metadataError: null };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    logger.warn({ imagePath, reason }, 'Disk image metadata unavailable');
    return { metadata: null, metadataError: reason };
  }
}

/**
 * Checks an already-built release using only the image and its checksum record.
 */
export async function verifyRelease(input: VerifyReleaseInput): Promise<VerificationReport> {
  const { outputDir, binaryName, version, architecture, inspector, logger } = input;
  const baseName = artifactBaseName({ binaryName, version, architecture });
  const { imagePath, checksumPath } = artifactPaths(outputDir, baseName);

  for (const candidate of [imagePath, checksumPath]) {
    if (!(await isFile(candidate))) {
      throw new MissingArtifactError(candidate);
    }
  }

  const record = await readChecksumRecord(checksumPath);
  const imageFileName = path.basename(imagePath);
  if (record.fileName !== imageFileName) {
    throw new IntegrityError(imageFileName, record.digest, '', {
      detail: `checksum record describes ${record.fileName}`
    });
  }

  const digest = await computeDigest(imagePath);
  if (digest !== record.digest) {
    throw new IntegrityError(imageFileName, record.digest, digest);
  }
  logger.info({ imagePath, digest }, 'Checksum verified');

  const { metadata, metadataError } = await readMetadata(inspector, imagePath, logger);

  return { version, baseName, imagePath, checksumPath, digest, metadata, metadataError };
}
