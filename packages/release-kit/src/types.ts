export type ReleaseProfile = {
  /** Display name; also the bundle directory name (`<appName>.app`). */
  appName: string;
  binaryName: string;
  bundleIdentifier: string;
  minimumSystemVersion: string;
  /** Icon file reference written into the descriptor, without extension. */
  iconName: string;
  volumeName: string;
};

export type ReleaseArtifact = {
  appName: string;
  binaryName: string;
  version: string;
  architecture: string;
};

export type ArtifactPaths = {
  baseName: string;
  imagePath: string;
  checksumPath: string;
};

export type IconVariant = {
  fileName: string;
  /** Logical point size the variant is declared for. */
  size: number;
  scale: 1 | 2;
  pixels: number;
};

export type IconSetResult =
  | { status: 'skipped'; reason: string }
  | {
      status: 'built';
      iconsetDir: string;
      containerPath: string;
      variants: IconVariant[];
    };

export type AppBundle = {
  path: string;
  executablePath: string;
  resourcesDir: string;
  descriptorPath: string;
  iconPath: string | null;
};

export type StagingRoot = {
  path: string;
  bundlePath: string;
  applicationsLink: string;
  volumeIconPath: string | null;
  customIconMarked: boolean;
};

export type ChecksumAlgorithm = 'SHA-256';

export type ChecksumRecord = {
  algorithm: ChecksumAlgorithm;
  digest: string;
  fileName: string;
};

export type DiskImageMetadata = {
  format: string | null;
  className: string | null;
  totalBytes: number | null;
};

export type VerificationReport = {
  version: string;
  baseName: string;
  imagePath: string;
  checksumPath: string;
  digest: string;
  metadata: DiskImageMetadata | null;
  metadataError: string | null;
};
