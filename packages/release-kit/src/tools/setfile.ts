import type { CustomIconMarker } from '../capabilities';
import { runTool, type CommandRunner } from '../lib/exec';

/** Sets the Finder "has custom icon" attribute so `.VolumeIcon.icns` is picked up. */
export class SetFileIconMarker implements CustomIconMarker {
  constructor(
    private readonly runner: CommandRunner,
    private readonly executable = 'SetFile'
  ) {}

  async markCustomIcon(directory: string): Promise<void> {
    await runTool(this.runner, this.executable, ['-a', 'C', directory], { label: 'SetFile' });
  }
}
