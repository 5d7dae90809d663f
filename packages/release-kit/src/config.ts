import path from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { IconResizerKind } from './capabilities';
import { DEFAULT_BUILD_COMMAND } from './tools/compiler';
import type { ReleaseProfile } from './types';

export const ORCHESTRATERM_PROFILE: ReleaseProfile = Object.freeze({
  appName: 'OrchestraTerm',
  binaryName: 'orchestraterm',
  bundleIdentifier: 'com.orchestraterm.app',
  minimumSystemVersion: '12.0',
  iconName: 'AppIcon',
  volumeName: 'OrchestraTerm'
});

export const DEFAULT_MANIFEST_PATH = 'Cargo.toml';
export const DEFAULT_OUTPUT_DIR = 'dist';
export const DEFAULT_ICON_PATH = path.join('assets', 'AppIcon.png');
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type EnvSource = Record<string, string | undefined>;

export type ReleaseConfig = {
  projectRoot: string;
  manifestPath: string;
  outputDir: string;
  iconPath: string;
  binaryPath: string;
  buildCommand: string;
  iconResizer: IconResizerKind;
  skipCompile: boolean;
  logLevel: LogLevel;
};

export type ReleaseConfigOverrides = Partial<
  Pick<ReleaseConfig, 'manifestPath' | 'outputDir' | 'iconPath' | 'binaryPath' | 'skipCompile' | 'logLevel'>
>;

export type LoadReleaseConfigOptions = {
  env?: EnvSource;
  projectRoot?: string;
  profile?: ReleaseProfile;
  overrides?: ReleaseConfigOverrides;
};

const TRUE_VALUES = new Set(['1', 'true', 'yes', 'on']);
const FALSE_VALUES = new Set(['0', 'false', 'no', 'off']);

function blankToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined;
  }
  return typeof value === 'string' ? value.trim() : value;
}

const optionalText = z.preprocess(blankToUndefined, z.string().optional());

const flag = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return false;
      }
      const normalized = value.toLowerCase();
      if (TRUE_VALUES.has(normalized)) {
        return true;
      }
      if (FALSE_VALUES.has(normalized)) {
        return false;
      }
      const accepted = [...TRUE_VALUES, ...FALSE_VALUES].map((entry) => `'${entry}'`).join(', ');
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected one of ${accepted}, received '${value}'`
      });
      return z.NEVER;
    })
);

const releaseEnvSchema = z.object({
  RELEASE_MANIFEST_PATH: optionalText,
  RELEASE_OUTPUT_DIR: optionalText,
  RELEASE_ICON_PATH: optionalText,
  RELEASE_BINARY_PATH: optionalText,
  RELEASE_BUILD_COMMAND: optionalText,
  RELEASE_ICON_RESIZER: z.preprocess(blankToUndefined, z.enum(['sips', 'sharp']).default('sips')),
  RELEASE_SKIP_COMPILE: flag,
  LOG_LEVEL: z.preprocess(
    (value) => {
      const trimmed = blankToUndefined(value);
      return typeof trimmed === 'string' ? trimmed.toLowerCase() : trimmed;
    },
    z.enum(LOG_LEVELS).default('info')
  )
});

function formatIssues(issues: z.ZodIssue[]): string {
  const details = issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    return `  • ${location}: ${issue.message}`;
  });
  return ['[release] Invalid environment configuration', ...details].join('\n');
}

export function loadReleaseConfig(options: LoadReleaseConfigOptions = {}): ReleaseConfig {
  const env = options.env ?? process.env;
  const projectRoot = path.resolve(options.projectRoot ?? process.cwd());
  const profile = options.profile ?? ORCHESTRATERM_PROFILE;
  const overrides = options.overrides ?? {};

  const parsed = releaseEnvSchema.safeParse({ ...env });
  if (!parsed.success) {
    throw new ConfigurationError(formatIssues(parsed.error.issues));
  }
  const values = parsed.data;

  const resolve = (candidate: string) => path.resolve(projectRoot, candidate);

  return {
    projectRoot,
    manifestPath: resolve(overrides.manifestPath ?? values.RELEASE_MANIFEST_PATH ?? DEFAULT_MANIFEST_PATH),
    outputDir: resolve(overrides.outputDir ?? values.RELEASE_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR),
    iconPath: resolve(overrides.iconPath ?? values.RELEASE_ICON_PATH ?? DEFAULT_ICON_PATH),
    binaryPath: resolve(
      overrides.binaryPath ?? values.RELEASE_BINARY_PATH ?? path.join('target', 'release', profile.binaryName)
    ),
    buildCommand: values.RELEASE_BUILD_COMMAND ?? DEFAULT_BUILD_COMMAND,
    iconResizer: values.RELEASE_ICON_RESIZER,
    skipCompile: overrides.skipCompile ?? values.RELEASE_SKIP_COMPILE,
    logLevel: overrides.logLevel ?? values.LOG_LEVEL
  } satisfies ReleaseConfig;
}
