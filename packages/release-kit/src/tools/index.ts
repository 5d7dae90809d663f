import type { IconResizerKind, ImageResizer, ReleaseToolkit } from '../capabilities';
import { createCommandRunner, type CommandRunner } from '../lib/exec';
import { CommandLineCompiler, DEFAULT_BUILD_COMMAND } from './compiler';
import { HdiutilDiskImageCreator } from './hdiutil';
import { IconutilAssembler } from './iconutil';
import { SetFileIconMarker } from './setfile';
import { SharpImageResizer } from './sharp';
import { SipsImageResizer } from './sips';

export type MacToolkitOptions = {
  runner?: CommandRunner;
  resizer?: IconResizerKind;
  buildCommand?: string;
  /** Absolute path of SetFile when the host has it; the marker is left out otherwise. */
  setFilePath?: string | null;
};

export function createImageResizer(kind: IconResizerKind, runner: CommandRunner): ImageResizer {
  return kind === 'sharp' ? new SharpImageResizer() : new SipsImageResizer(runner);
}

export function createMacToolkit(options: MacToolkitOptions = {}): ReleaseToolkit {
  const runner = options.runner ?? createCommandRunner();
  return {
    resizer: createImageResizer(options.resizer ?? 'sips', runner),
    iconAssembler: new IconutilAssembler(runner),
    diskImageCreator: new HdiutilDiskImageCreator(runner),
    compiler: new CommandLineCompiler(runner, options.buildCommand ?? DEFAULT_BUILD_COMMAND),
    customIconMarker: options.setFilePath ? new SetFileIconMarker(runner, options.setFilePath) : null
  };
}

export { CommandLineCompiler, DEFAULT_BUILD_COMMAND } from './compiler';
export { HdiutilDiskImageCreator, HdiutilImageInspector, parseImageInfo, DISK_IMAGE_FORMAT } from './hdiutil';
export { IconutilAssembler } from './iconutil';
export { SetFileIconMarker } from './setfile';
export { SharpImageResizer } from './sharp';
export { SipsImageResizer, parseSipsDimensions } from './sips';
