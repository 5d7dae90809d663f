import { promises as fs } from 'node:fs';
import { ConfigurationError } from './errors';

const VERSION_LINE_PATTERN = /^version = "([^"\r\n]*)"/m;

const SEMVER_PATTERN =
  /^(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?(?:\+[0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*)?$/;

export function isSemver(value: string): boolean {
  return SEMVER_PATTERN.test(value);
}

/**
 * Value of the first `version = "..."` line that starts at column zero, or null.
 */
export function parseManifestVersion(manifest: string): string | null {
  const match = VERSION_LINE_PATTERN.exec(manifest);
  return match ? (match[1] ?? null) : null;
}

export async function resolveVersion(manifestPath: string): Promise<string> {
  let contents: string;
  try {
    contents = await fs.readFile(manifestPath, 'utf8');
  } catch (err) {
    throw new ConfigurationError(`Build manifest not found at ${manifestPath}`, { cause: err });
  }

  const version = parseManifestVersion(contents);
  if (version === null) {
    throw new ConfigurationError(`No \`version = "X.Y.Z"\` line found in ${manifestPath}`);
  }
  if (!isSemver(version)) {
    throw new ConfigurationError(
      `Manifest version must be a valid semver string, received "${version}" in ${manifestPath}`
    );
  }
  return version;
}
