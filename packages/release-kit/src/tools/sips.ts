import type { ImageDimensions, ImageResizer } from '../capabilities';
import { runTool, type CommandRunner } from '../lib/exec';

const PIXEL_WIDTH_PATTERN = /^\s*pixelWidth:\s*(\d+)\s*$/m;
const PIXEL_HEIGHT_PATTERN = /^\s*pixelHeight:\s*(\d+)\s*$/m;

export function parseSipsDimensions(output: string): ImageDimensions | null {
  const width = PIXEL_WIDTH_PATTERN.exec(output)?.[1];
  const height = PIXEL_HEIGHT_PATTERN.exec(output)?.[1];
  if (!width || !height) {
    return null;
  }
  return { width: Number.parseInt(width, 10), height: Number.parseInt(height, 10) };
}

export class SipsImageResizer implements ImageResizer {
  readonly requiredTool = 'sips';

  constructor(private readonly runner: CommandRunner) {}

  async probe(sourcePath: string): Promise<ImageDimensions> {
    const result = await runTool(this.runner, 'sips', ['-g', 'pixelWidth', '-g', 'pixelHeight', sourcePath], {
      label: 'sips -g'
    });
    const dimensions = parseSipsDimensions(result.stdout);
    if (!dimensions) {
      throw new Error(`sips did not report pixel dimensions for ${sourcePath}`);
    }
    return dimensions;
  }

  async resize(sourcePath: string, targetPath: string, pixels: number): Promise<void> {
    const size = String(pixels);
    await runTool(this.runner, 'sips', ['-z', size, size, sourcePath, '--out', targetPath], {
      label: 'sips -z'
    });
  }
}
