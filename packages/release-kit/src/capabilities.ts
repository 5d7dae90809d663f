import type { DiskImageMetadata } from './types';

export type ImageDimensions = {
  width: number;
  height: number;
};

/** `sips` shells out on macOS; `sharp` resizes in process. */
export type IconResizerKind = 'sips' | 'sharp';

export interface ImageResizer {
  /** Name of the external tool the resizer needs on PATH, or null when it runs in-process. */
  readonly requiredTool: string | null;
  probe(sourcePath: string): Promise<ImageDimensions>;
  resize(sourcePath: string, targetPath: string, pixels: number): Promise<void>;
}

export interface IconContainerAssembler {
  readonly requiredTool: string | null;
  assemble(iconsetDir: string, outputPath: string): Promise<void>;
}

export type CreateDiskImageInput = {
  volumeName: string;
  sourceDir: string;
  outputPath: string;
};

export interface DiskImageCreator {
  readonly requiredTool: string | null;
  create(input: CreateDiskImageInput): Promise<void>;
}

export interface DiskImageInspector {
  inspect(imagePath: string): Promise<DiskImageMetadata>;
}

export interface CustomIconMarker {
  markCustomIcon(directory: string): Promise<void>;
}

export interface BinaryCompiler {
  readonly requiredTool: string | null;
  compile(projectRoot: string): Promise<void>;
}

/**
 * Everything the pipeline needs from the host, injected so the stages can run against fakes.
 */
export type ReleaseToolkit = {
  resizer: ImageResizer;
  iconAssembler: IconContainerAssembler;
  diskImageCreator: DiskImageCreator;
  compiler: BinaryCompiler;
  /** Optional; when absent the staging root keeps its volume icon but is not flagged. */
  customIconMarker: CustomIconMarker | null;
};
