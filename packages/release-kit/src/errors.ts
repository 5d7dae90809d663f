export type ReleaseErrorKind =
  | 'environment'
  | 'configuration'
  | 'asset'
  | 'tool'
  | 'missing-artifact'
  | 'integrity';

export type ReleaseErrorOptions = {
  stage?: string;
  cause?: unknown;
};

export class ReleaseError extends Error {
  readonly kind: ReleaseErrorKind;
  stage: string | undefined;

  constructor(kind: ReleaseErrorKind, message: string, options: ReleaseErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ReleaseError';
    this.kind = kind;
    this.stage = options.stage;
  }
}

export class EnvironmentError extends ReleaseError {
  constructor(message: string, options?: ReleaseErrorOptions) {
    super('environment', message, options);
    this.name = 'EnvironmentError';
  }
}

export class ConfigurationError extends ReleaseError {
  constructor(message: string, options?: ReleaseErrorOptions) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

/**
 * Only ever logged: a missing optional asset degrades the release instead of failing it.
 */
export class AssetError extends ReleaseError {
  constructor(message: string, options?: ReleaseErrorOptions) {
    super('asset', message, options);
    this.name = 'AssetError';
  }
}

export type ToolInvocationDetails = {
  command: string;
  args: string[];
  exitCode: number | null;
  stderr: string;
};

export class ToolInvocationError extends ReleaseError {
  readonly command: string;
  readonly args: string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, details: ToolInvocationDetails, options?: ReleaseErrorOptions) {
    super('tool', message, options);
    this.name = 'ToolInvocationError';
    this.command = details.command;
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr;
  }
}

export class MissingArtifactError extends ReleaseError {
  readonly path: string;

  constructor(targetPath: string, options?: ReleaseErrorOptions) {
    super('missing-artifact', `missing: ${targetPath}`, options);
    this.name = 'MissingArtifactError';
    this.path = targetPath;
  }
}

export class IntegrityError extends ReleaseError {
  readonly fileName: string;
  readonly expected: string;
  readonly actual: string;

  constructor(
    fileName: string,
    expected: string,
    actual: string,
    options: ReleaseErrorOptions & { detail?: string } = {}
  ) {
    super(
      'integrity',
      `integrity mismatch: ${fileName} (${options.detail ?? `expected ${expected}, computed ${actual}`})`,
      options
    );
    this.name = 'IntegrityError';
    this.fileName = fileName;
    this.expected = expected;
    this.actual = actual;
  }
}

export function toReleaseError(err: unknown, fallbackKind: ReleaseErrorKind = 'tool'): ReleaseError {
  if (err instanceof ReleaseError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new ReleaseError(fallbackKind, message, { cause: err });
}

/**
 * One-line diagnostic for the error stream.
 */
export function describeError(err: unknown): string {
  if (err instanceof MissingArtifactError || err instanceof IntegrityError) {
    return err.message;
  }
  const message = err instanceof Error ? err.message : String(err);
  const singleLine = message.replace(/\s*\n\s*/g, '; ').trim();
  if (err instanceof ReleaseError && err.stage) {
    return `error: [${err.stage}] ${singleLine}`;
  }
  return `error: ${singleLine}`;
}
