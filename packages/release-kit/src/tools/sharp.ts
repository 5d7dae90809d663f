import type { Sharp } from 'sharp';
import type { ImageDimensions, ImageResizer } from '../capabilities';

/** Loaded on first use so hosts that never resize do not need the native module. */
async function openImage(sourcePath: string): Promise<Sharp> {
  const { default: sharp } = await import('sharp');
  return sharp(sourcePath);
}

/**
 * In-process resizer. Useful where sips is unavailable; output is always PNG.
 */
export class SharpImageResizer implements ImageResizer {
  readonly requiredTool = null;

  async probe(sourcePath: string): Promise<ImageDimensions> {
    const metadata = await (await openImage(sourcePath)).metadata();
    if (!metadata.width || !metadata.height) {
      throw new Error(`Unable to read pixel dimensions of ${sourcePath}`);
    }
    return { width: metadata.width, height: metadata.height };
  }

  async resize(sourcePath: string, targetPath: string, pixels: number): Promise<void> {
    const image = await openImage(sourcePath);
    await image
      .resize(pixels, pixels, { fit: 'fill', withoutEnlargement: true })
      .png()
      .toFile(targetPath);
  }
}
