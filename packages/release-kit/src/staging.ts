import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { CustomIconMarker } from './capabilities';
import { copyFile, copyTree, ensureDir, removePath } from './lib/fs';
import type { ReleaseLogger } from './logger';
import type { AppBundle, StagingRoot } from './types';

export const STAGING_DIRECTORY = 'dmg-root';
export const APPLICATIONS_LINK_NAME = 'Applications';
export const APPLICATIONS_TARGET = '/Applications';
export const VOLUME_ICON_FILENAME = '.VolumeIcon.icns';

export type StageDiskImageInput = {
  workDir: string;
  bundle: AppBundle;
  iconContainerPath: string | null;
  marker: CustomIconMarker | null;
  logger: ReleaseLogger;
};

export async function stageDiskImage(input: StageDiskImageInput): Promise<StagingRoot> {
  const { workDir, bundle, iconContainerPath, marker, logger } = input;
  const root = path.join(workDir, STAGING_DIRECTORY);
  await removePath(root);
  await ensureDir(root);

  const bundlePath = path.join(root, path.basename(bundle.path));
  await copyTree(bundle.path, bundlePath);

  const applicationsLink = path.join(root, APPLICATIONS_LINK_NAME);
  await fs.symlink(APPLICATIONS_TARGET, applicationsLink);

  let volumeIconPath: string | null = null;
  let customIconMarked = false;
  if (iconContainerPath) {
    volumeIconPath = path.join(root, VOLUME_ICON_FILENAME);
    await copyFile(iconContainerPath, volumeIconPath);

    if (marker) {
      try {
        await marker.markCustomIcon(root);
        customIconMarked = true;
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.warn({ root, reason }, 'Could not flag staging root with a custom icon; continuing');
      }
    } else {
      logger.warn({ root }, 'SetFile unavailable; volume icon copied but not flagged');
    }
  }

  logger.info({ root }, 'Disk image staging root prepared');
  return { path: root, bundlePath, applicationsLink, volumeIconPath, customIconMarked };
}
