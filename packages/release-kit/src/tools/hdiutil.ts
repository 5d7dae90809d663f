import type { CreateDiskImageInput, DiskImageCreator, DiskImageInspector } from '../capabilities';
import { runTool, type CommandRunner } from '../lib/exec';
import type { DiskImageMetadata } from '../types';

export const DISK_IMAGE_FORMAT = 'UDZO';

export class HdiutilDiskImageCreator implements DiskImageCreator {
  readonly requiredTool = 'hdiutil';

  constructor(private readonly runner: CommandRunner) {}

  async create(input: CreateDiskImageInput): Promise<void> {
    await runTool(
      this.runner,
      'hdiutil',
      [
        'create',
        '-volname',
        input.volumeName,
        '-srcfolder',
        input.sourceDir,
        '-ov',
        '-format',
        DISK_IMAGE_FORMAT,
        input.outputPath
      ],
      { label: 'hdiutil create' }
    );
  }
}

function firstMatch(output: string, pattern: RegExp): string | null {
  const value = pattern.exec(output)?.[1]?.trim();
  return value ? value : null;
}

export function parseImageInfo(output: string): DiskImageMetadata {
  const totalBytes = firstMatch(output, /^\s*Total Bytes:\s*(\d+)\s*$/m);
  return {
    format: firstMatch(output, /^\s*Format:\s*(.+)$/m),
    className: firstMatch(output, /^\s*Class Name:\s*(.+)$/m),
    totalBytes: totalBytes === null ? null : Number.parseInt(totalBytes, 10)
  };
}

export class HdiutilImageInspector implements DiskImageInspector {
  constructor(private readonly runner: CommandRunner) {}

  async inspect(imagePath: string): Promise<DiskImageMetadata> {
    const result = await runTool(this.runner, 'hdiutil', ['imageinfo', imagePath], {
      label: 'hdiutil imageinfo'
    });
    return parseImageInfo(result.stdout);
  }
}
