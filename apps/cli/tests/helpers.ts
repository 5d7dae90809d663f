import { mkdir, mkdtemp, readdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import {
  createSilentLogger,
  type CreateDiskImageInput,
  type DiskImageMetadata,
  type ReleaseToolkit,
  type ToolLocator
} from '@orchestraterm/release-kit';
import type { CliRuntime } from '../src/runtime';

export async function createTempDir(prefix = 'release-cli-test-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export function createFakeToolkit(): ReleaseToolkit {
  return {
    resizer: {
      requiredTool: 'sips',
      async probe() {
        return { width: 1024, height: 1024 };
      },
      async resize(_source: string, target: string, pixels: number) {
        await writeFile(target, `png:${pixels}`);
      }
    },
    iconAssembler: {
      requiredTool: 'iconutil',
      async assemble(_iconsetDir: string, outputPath: string) {
        await writeFile(outputPath, 'icns');
      }
    },
    diskImageCreator: {
      requiredTool: 'hdiutil',
      async create(input: CreateDiskImageInput) {
        const entries = (await readdir(input.sourceDir)).sort();
        await writeFile(input.outputPath, `dmg:${input.volumeName}:${entries.join(',')}`);
      }
    },
    compiler: {
      requiredTool: 'cargo',
      async compile() {}
    },
    customIconMarker: null
  };
}

const allTools: ToolLocator = {
  async find(name) {
    return `/usr/bin/${name}`;
  }
};

export type CapturedRuntime = CliRuntime & {
  out: string[];
  err: string[];
};

export function createTestRuntime(
  cwd: string,
  overrides: Partial<CliRuntime> & { metadata?: DiskImageMetadata | null } = {}
): CapturedRuntime {
  const { metadata = null, ...rest } = overrides;
  const out: string[] = [];
  const err: string[] = [];
  return {
    cwd,
    env: {},
    platform: 'darwin',
    architecture: 'arm64',
    stdout: (line) => {
      out.push(line);
    },
    stderr: (line) => {
      err.push(line);
    },
    locator: allTools,
    createToolkit: async () => createFakeToolkit(),
    createInspector: () =>
      metadata
        ? {
            async inspect() {
              return metadata;
            }
          }
        : null,
    createLogger: () => createSilentLogger(),
    ...rest,
    out,
    err
  };
}

/**
 * A project root with a manifest, a pre-built binary and a master icon.
 */
export async function createProject(version = '0.3.1'): Promise<string> {
  const root = await createTempDir('release-cli-project-');
  await writeFile(path.join(root, 'Cargo.toml'), `[package]\nname = "orchestraterm"\nversion = "${version}"\n`);
  await mkdir(path.join(root, 'target', 'release'), { recursive: true });
  await writeFile(path.join(root, 'target', 'release', 'orchestraterm'), '#!/bin/sh\necho orchestraterm\n');
  await mkdir(path.join(root, 'assets'), { recursive: true });
  await writeFile(path.join(root, 'assets', 'AppIcon.png'), 'master-png');
  return root;
}
