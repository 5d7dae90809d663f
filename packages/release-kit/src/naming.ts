import os from 'node:os';
import path from 'node:path';
import { ConfigurationError } from './errors';
import type { ArtifactPaths, ReleaseArtifact } from './types';

export const IMAGE_EXTENSION = '.dmg';
export const CHECKSUM_EXTENSION = '.sha256';

const ARCHITECTURE_ALIASES: Record<string, string> = {
  x64: 'x86_64',
  ia32: 'i386'
};

/**
 * Host architecture spelled the way `uname -m` reports it on macOS.
 */
export function detectArchitecture(nodeArch: string = os.arch()): string {
  return ARCHITECTURE_ALIASES[nodeArch] ?? nodeArch;
}

function assertSegment(label: string, value: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ConfigurationError(`Artifact ${label} must not be empty`);
  }
  if (trimmed.includes('/') || trimmed.includes('\\')) {
    throw new ConfigurationError(`Artifact ${label} must not contain path separators, received "${value}"`);
  }
  return trimmed;
}

export function artifactBaseName(artifact: Pick<ReleaseArtifact, 'binaryName' | 'version' | 'architecture'>): string {
  const binaryName = assertSegment('binary name', artifact.binaryName);
  const version = assertSegment('version', artifact.version);
  const architecture = assertSegment('architecture', artifact.architecture);
  return `${binaryName}-${version}-macos-${architecture}`;
}

export function artifactPaths(outputDir: string, baseName: string): ArtifactPaths {
  return {
    baseName,
    imagePath: path.join(outputDir, `${baseName}${IMAGE_EXTENSION}`),
    checksumPath: path.join(outputDir, `${baseName}${CHECKSUM_EXTENSION}`)
  };
}
