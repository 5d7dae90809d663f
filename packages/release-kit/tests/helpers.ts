import { mkdtemp, readdir, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type {
  BinaryCompiler,
  CreateDiskImageInput,
  CustomIconMarker,
  DiskImageCreator,
  DiskImageInspector,
  IconContainerAssembler,
  ImageDimensions,
  ImageResizer,
  ReleaseToolkit
} from '../src/capabilities';
import type { CommandOptions, CommandResult, CommandRunner, ToolLocator } from '../src/lib/exec';
import { loadReleaseConfig, type ReleaseConfig } from '../src/config';
import type { DiskImageMetadata } from '../src/types';

export async function createTempDir(prefix = 'release-kit-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export class FakeResizer implements ImageResizer {
  readonly requiredTool = 'sips';
  readonly calls: Array<{ target: string; pixels: number }> = [];

  constructor(
    private readonly dimensions: ImageDimensions = { width: 1024, height: 1024 },
    private readonly failOnPixels: number | null = null
  ) {}

  async probe(): Promise<ImageDimensions> {
    return this.dimensions;
  }

  async resize(_source: string, target: string, pixels: number): Promise<void> {
    this.calls.push({ target, pixels });
    if (pixels === this.failOnPixels) {
      throw new Error(`cannot resize to ${pixels}`);
    }
    await writeFile(target, `png:${pixels}`);
  }
}

export class FakeAssembler implements IconContainerAssembler {
  readonly requiredTool = 'iconutil';
  calls = 0;

  async assemble(iconsetDir: string, outputPath: string): Promise<void> {
    this.calls += 1;
    const entries = (await readdir(iconsetDir)).sort();
    await writeFile(outputPath, `icns:${entries.join(',')}`);
  }
}

/** Writes an image whose bytes are the sorted listing of the staging root. */
export class FakeDiskImageCreator implements DiskImageCreator {
  readonly requiredTool = 'hdiutil';
  readonly calls: CreateDiskImageInput[] = [];

  constructor(private readonly fail = false) {}

  async create(input: CreateDiskImageInput): Promise<void> {
    this.calls.push(input);
    if (this.fail) {
      await writeFile(input.outputPath, 'partial');
      throw new Error('hdiutil: create failed - Resource busy');
    }
    const entries = (await readdir(input.sourceDir)).sort();
    await writeFile(input.outputPath, `dmg:${input.volumeName}:${entries.join(',')}`);
  }
}

export class FakeCompiler implements BinaryCompiler {
  readonly requiredTool = 'cargo';
  calls = 0;

  constructor(private readonly binaryPath: string | null = null) {}

  async compile(): Promise<void> {
    this.calls += 1;
    if (this.binaryPath) {
      await mkdir(path.dirname(this.binaryPath), { recursive: true });
      await writeFile(this.binaryPath, '#!/bin/sh\necho orchestraterm\n');
    }
  }
}

export class FakeMarker implements CustomIconMarker {
  readonly marked: string[] = [];

  constructor(private readonly fail = false) {}

  async markCustomIcon(directory: string): Promise<void> {
    if (this.fail) {
      throw new Error('SetFile: ERROR: Unexpected Error. (-5000)');
    }
    this.marked.push(directory);
  }
}

export class FakeInspector implements DiskImageInspector {
  constructor(private readonly metadata: DiskImageMetadata | Error) {}

  async inspect(): Promise<DiskImageMetadata> {
    if (this.metadata instanceof Error) {
      throw this.metadata;
    }
    return this.metadata;
  }
}

export function createFakeToolkit(overrides: Partial<ReleaseToolkit> = {}): ReleaseToolkit {
  return {
    resizer: new FakeResizer(),
    iconAssembler: new FakeAssembler(),
    diskImageCreator: new FakeDiskImageCreator(),
    compiler: new FakeCompiler(),
    customIconMarker: new FakeMarker(),
    ...overrides
  };
}

export function createFakeLocator(available: string[] | 'all' = 'all'): ToolLocator {
  return {
    async find(name) {
      if (available === 'all' || available.includes(name)) {
        return `/usr/bin/${name}`;
      }
      return null;
    }
  };
}

export type RecordedCommand = { command: string; args: string[]; options: CommandOptions | undefined };

export class RecordingRunner implements CommandRunner {
  readonly commands: RecordedCommand[] = [];

  constructor(private readonly respond: (command: string, args: string[]) => CommandResult = () => ok('')) {}

  async run(command: string, args: string[], options?: CommandOptions): Promise<CommandResult> {
    this.commands.push({ command, args, options });
    return this.respond(command, args);
  }
}

export function ok(stdout: string): CommandResult {
  return { exitCode: 0, signal: null, stdout, stderr: '' };
}

export function failed(exitCode: number, stderr: string): CommandResult {
  return { exitCode, signal: null, stdout: '', stderr };
}

export type ProjectFixture = {
  root: string;
  config: ReleaseConfig;
};

/**
 * A project root with a manifest, a pre-built binary and (optionally) a master icon.
 */
export async function createProjectFixture(
  options: { version?: string | null; icon?: boolean; binary?: boolean } = {}
): Promise<ProjectFixture> {
  const root = await createTempDir('release-kit-project-');
  const version = options.version === undefined ? '0.2.0' : options.version;
  const manifest = [
    '[package]',
    'name = "orchestraterm"',
    ...(version === null ? [] : [`version = "${version}"`]),
    'edition = "2021"',
    ''
  ].join('\n');
  await writeFile(path.join(root, 'Cargo.toml'), manifest);

  if (options.binary ?? true) {
    await mkdir(path.join(root, 'target', 'release'), { recursive: true });
    await writeFile(path.join(root, 'target', 'release', 'orchestraterm'), '#!/bin/sh\necho orchestraterm\n');
  }
  if (options.icon ?? true) {
    await mkdir(path.join(root, 'assets'), { recursive: true });
    await writeFile(path.join(root, 'assets', 'AppIcon.png'), 'master-png');
  }

  const config = loadReleaseConfig({ env: {}, projectRoot: root, overrides: { skipCompile: true } });
  return { root, config };
}
