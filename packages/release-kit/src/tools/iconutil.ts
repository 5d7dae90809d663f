import type { IconContainerAssembler } from '../capabilities';
import { runTool, type CommandRunner } from '../lib/exec';

export class IconutilAssembler implements IconContainerAssembler {
  readonly requiredTool = 'iconutil';

  constructor(private readonly runner: CommandRunner) {}

  async assemble(iconsetDir: string, outputPath: string): Promise<void> {
    await runTool(this.runner, 'iconutil', ['-c', 'icns', iconsetDir, '-o', outputPath], {
      label: 'iconutil'
    });
  }
}
