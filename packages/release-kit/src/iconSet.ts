import path from 'node:path';
import type { IconContainerAssembler, ImageResizer } from './capabilities';
import { AssetError, ConfigurationError, ToolInvocationError, toReleaseError } from './errors';
import { ensureDir, isFile, pathExists, removePath } from './lib/fs';
import type { ReleaseLogger } from './logger';
import type { IconSetResult, IconVariant } from './types';

export const ICONSET_DIRECTORY = 'AppIcon.iconset';
export const ICON_CONTAINER_FILENAME = 'AppIcon.icns';

function variant(size: number, scale: 1 | 2): IconVariant {
  const suffix = scale === 2 ? '@2x' : '';
  return {
    fileName: `icon_${size}x${size}${suffix}.png`,
    size,
    scale,
    pixels: size * scale
  };
}

export const ICON_VARIANTS: readonly IconVariant[] = Object.freeze(
  [16, 32, 128, 256, 512].flatMap((size) => [variant(size, 1), variant(size, 2)])
);

export const LARGEST_ICON_PIXELS = Math.max(...ICON_VARIANTS.map((entry) => entry.pixels));

export type BuildIconSetInput = {
  masterPath: string;
  workDir: string;
  resizer: ImageResizer;
  assembler: IconContainerAssembler;
  logger: ReleaseLogger;
};

/** Returns the master's edge length in pixels. */
async function probeSquareMaster(masterPath: string, resizer: ImageResizer): Promise<number> {
  const { width, height } = await resizer.probe(masterPath);
  if (width !== height) {
    throw new ConfigurationError(`Master icon ${masterPath} must be square, received ${width}x${height}`);
  }
  return width;
}

function asToolFailure(err: unknown, message: string): ToolInvocationError {
  if (err instanceof ToolInvocationError) {
    return err;
  }
  const reason = err instanceof Error ? err.message : String(err);
  return new ToolInvocationError(`${message}: ${reason}`, { command: 'resize', args: [], exitCode: null, stderr: '' }, {
    cause: err
  });
}

/**
 * Derives every variant from the master image and assembles the icon container. All or nothing:
 * on any failure the partial iconset and container are removed and the error is rethrown.
 */
export async function buildIconSet(input: BuildIconSetInput): Promise<IconSetResult> {
  const { masterPath, workDir, resizer, assembler, logger } = input;

  if (!(await isFile(masterPath))) {
    const notice = new AssetError(`Master icon not found at ${masterPath}; building without an application icon`);
    logger.warn({ masterPath }, notice.message);
    return { status: 'skipped', reason: notice.message };
  }

  const masterPixels = await probeSquareMaster(masterPath, resizer);
  if (masterPixels < LARGEST_ICON_PIXELS) {
    logger.warn(
      { masterPath, masterPixels, recommended: LARGEST_ICON_PIXELS },
      'Master icon is smaller than the largest variant; larger variants keep the source resolution'
    );
  }

  const iconsetDir = path.join(workDir, ICONSET_DIRECTORY);
  const containerPath = path.join(workDir, ICON_CONTAINER_FILENAME);
  await removePath(iconsetDir);
  await removePath(containerPath);
  await ensureDir(iconsetDir);

  try {
    for (const entry of ICON_VARIANTS) {
      const target = path.join(iconsetDir, entry.fileName);
      const pixels = Math.min(entry.pixels, masterPixels);
      try {
        await resizer.resize(masterPath, target, pixels);
      } catch (err) {
        throw asToolFailure(err, `Failed to render ${entry.fileName}`);
      }
      logger.debug({ variant: entry.fileName, pixels }, 'Rendered icon variant');
    }

    const missing: string[] = [];
    for (const entry of ICON_VARIANTS) {
      if (!(await isFile(path.join(iconsetDir, entry.fileName)))) {
        missing.push(entry.fileName);
      }
    }
    if (missing.length > 0) {
      throw new ToolInvocationError(
        `Icon variants missing after resize: ${missing.join(', ')}`,
        { command: 'resize', args: [], exitCode: null, stderr: '' }
      );
    }

    await assembler.assemble(iconsetDir, containerPath);
    if (!(await pathExists(containerPath))) {
      throw new ToolInvocationError(`Icon container was not produced at ${containerPath}`, {
        command: 'assemble',
        args: [iconsetDir, containerPath],
        exitCode: null,
        stderr: ''
      });
    }
  } catch (err) {
    await removePath(iconsetDir);
    await removePath(containerPath);
    throw toReleaseError(err);
  }

  logger.info({ containerPath, variants: ICON_VARIANTS.length }, 'Icon container assembled');
  return { status: 'built', iconsetDir, containerPath, variants: [...ICON_VARIANTS] };
}
