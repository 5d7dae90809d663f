import type { ReleaseToolkit } from './capabilities';
import { EnvironmentError } from './errors';
import type { ToolLocator } from './lib/exec';

export const SUPPORTED_PLATFORM: NodeJS.Platform = 'darwin';

export type CapabilityGuardOptions = {
  platform?: NodeJS.Platform;
  locator: ToolLocator;
  requiredTools: string[];
};

export type CapabilityReport = {
  platform: NodeJS.Platform;
  tools: Record<string, string>;
};

export function requiredToolsFor(toolkit: ReleaseToolkit, options: { compile: boolean }): string[] {
  const candidates = [
    options.compile ? toolkit.compiler.requiredTool : null,
    toolkit.resizer.requiredTool,
    toolkit.iconAssembler.requiredTool,
    toolkit.diskImageCreator.requiredTool
  ];
  const tools = new Set<string>();
  for (const candidate of candidates) {
    if (candidate) {
      tools.add(candidate);
    }
  }
  return [...tools];
}

/**
 * Platform identity and tool availability, checked once before anything is written.
 */
export async function assertReleaseCapabilities(options: CapabilityGuardOptions): Promise<CapabilityReport> {
  const platform = options.platform ?? process.platform;
  if (platform !== SUPPORTED_PLATFORM) {
    throw new EnvironmentError(`macOS only: unsupported host platform "${platform}"`);
  }

  const tools: Record<string, string> = {};
  const missing: string[] = [];
  for (const tool of options.requiredTools) {
    const location = await options.locator.find(tool);
    if (location) {
      tools[tool] = location;
    } else {
      missing.push(tool);
    }
  }

  if (missing.length > 0) {
    throw new EnvironmentError(`Required tool${missing.length === 1 ? '' : 's'} not found on PATH: ${missing.join(', ')}`);
  }

  return { platform, tools };
}
