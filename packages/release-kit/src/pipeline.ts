import { promises as fs } from 'node:fs';
import path from 'node:path';
import { assembleAppBundle, assertBinaryPresent } from './appBundle';
import type { ReleaseToolkit } from './capabilities';
import { writeChecksumRecord } from './checksum';
import type { ReleaseConfig } from './config';
import { ORCHESTRATERM_PROFILE } from './config';
import { buildDiskImage } from './diskImage';
import { toReleaseError, type ReleaseError } from './errors';
import { assertReleaseCapabilities, requiredToolsFor } from './guard';
import { buildIconSet } from './iconSet';
import type { ToolLocator } from './lib/exec';
import { ensureDir, removePath } from './lib/fs';
import type { ReleaseLogger } from './logger';
import { artifactBaseName, artifactPaths, detectArchitecture } from './naming';
import { stageDiskImage } from './staging';
import type {
  AppBundle,
  ChecksumRecord,
  IconSetResult,
  ReleaseArtifact,
  ReleaseProfile,
  StagingRoot
} from './types';
import { resolveVersion } from './version';

export const RELEASE_STAGES = [
  'guard',
  'resolve-version',
  'compile',
  'locate-binary',
  'prepare-workspace',
  'icon-set',
  'app-bundle',
  'stage-disk-image',
  'disk-image',
  'checksum',
  'publish'
] as const;

export type ReleaseStageName = (typeof RELEASE_STAGES)[number];

export type ReleaseStageStatus = 'started' | 'completed' | 'skipped' | 'failed';

export type ReleaseProgressEvent = {
  stage: ReleaseStageName;
  status: ReleaseStageStatus;
  message?: string;
};

export type ReleasePipelineOptions = {
  config: ReleaseConfig;
  toolkit: ReleaseToolkit;
  locator: ToolLocator;
  logger: ReleaseLogger;
  profile?: ReleaseProfile;
  platform?: NodeJS.Platform;
  architecture?: string;
  onProgress?: (event: ReleaseProgressEvent) => void;
};

export type ReleaseBuildSuccess = {
  status: 'succeeded';
  artifact: ReleaseArtifact;
  baseName: string;
  imagePath: string;
  checksumPath: string;
  checksum: ChecksumRecord;
  icon: IconSetResult;
  completedStages: ReleaseStageName[];
};

export type ReleaseBuildFailure = {
  status: 'failed';
  stage: ReleaseStageName;
  error: ReleaseError;
  completedStages: ReleaseStageName[];
};

export type ReleaseBuildResult = ReleaseBuildSuccess | ReleaseBuildFailure;

type StageOutcome = 'completed' | 'skipped';

type ReleaseStage = {
  name: ReleaseStageName;
  run: () => Promise<StageOutcome>;
};

export const PARTIAL_WORKSPACE_MARKER = '.partial-';

function required<T>(value: T | null, description: string): T {
  if (value === null) {
    throw new Error(`Release pipeline invariant violated: ${description} is not available`);
  }
  return value;
}

/**
 * Runs the release stages strictly in order and stops at the first failure. Everything is built in
 * a sibling workspace of the output directory which replaces the output directory only once the
 * checksum record exists.
 */
export class ReleasePipeline {
  private readonly config: ReleaseConfig;
  private readonly toolkit: ReleaseToolkit;
  private readonly locator: ToolLocator;
  private readonly logger: ReleaseLogger;
  private readonly profile: ReleaseProfile;
  private readonly platform: NodeJS.Platform;
  private readonly architecture: string;
  private readonly onProgress?: (event: ReleaseProgressEvent) => void;

  private version: string | null = null;
  private workDir: string | null = null;
  private icon: IconSetResult | null = null;
  private bundle: AppBundle | null = null;
  private staging: StagingRoot | null = null;
  private imagePath: string | null = null;
  private checksum: ChecksumRecord | null = null;
  private published = false;

  constructor(options: ReleasePipelineOptions) {
    this.config = options.config;
    this.toolkit = options.toolkit;
    this.locator = options.locator;
    this.logger = options.logger;
    this.profile = options.profile ?? ORCHESTRATERM_PROFILE;
    this.platform = options.platform ?? process.platform;
    this.architecture = options.architecture ?? detectArchitecture();
    this.onProgress = options.onProgress;
  }

  private stages(): ReleaseStage[] {
    return [
      { name: 'guard', run: () => this.runGuard() },
      { name: 'resolve-version', run: () => this.runResolveVersion() },
      { name: 'compile', run: () => this.runCompile() },
      { name: 'locate-binary', run: () => this.runLocateBinary() },
      { name: 'prepare-workspace', run: () => this.runPrepareWorkspace() },
      { name: 'icon-set', run: () => this.runIconSet() },
      { name: 'app-bundle', run: () => this.runAppBundle() },
      { name: 'stage-disk-image', run: () => this.runStageDiskImage() },
      { name: 'disk-image', run: () => this.runDiskImage() },
      { name: 'checksum', run: () => this.runChecksum() },
      { name: 'publish', run: () => this.runPublish() }
    ];
  }

  private reset(): void {
    this.version = null;
    this.workDir = null;
    this.icon = null;
    this.bundle = null;
    this.staging = null;
    this.imagePath = null;
    this.checksum = null;
    this.published = false;
  }

  async run(): Promise<ReleaseBuildResult> {
    this.reset();
    const completedStages: ReleaseStageName[] = [];

    for (const stage of this.stages()) {
      this.emit({ stage: stage.name, status: 'started' });
      try {
        const outcome = await stage.run();
        completedStages.push(stage.name);
        this.emit({ stage: stage.name, status: outcome });
      } catch (err) {
        const error = toReleaseError(err);
        error.stage ??= stage.name;
        this.emit({ stage: stage.name, status: 'failed', message: error.message });
        this.logger.error({ stage: stage.name, kind: error.kind, err: error }, 'Release stage failed');
        await this.discardWorkspace();
        return { status: 'failed', stage: stage.name, error, completedStages };
      }
    }

    return this.success(completedStages);
  }

  private success(completedStages: ReleaseStageName[]): ReleaseBuildSuccess {
    const version = required(this.version, 'version');
    const artifact: ReleaseArtifact = {
      appName: this.profile.appName,
      binaryName: this.profile.binaryName,
      version,
      architecture: this.architecture
    };
    const baseName = artifactBaseName(artifact);
    const { imagePath, checksumPath } = artifactPaths(this.config.outputDir, baseName);
    return {
      status: 'succeeded',
      artifact,
      baseName,
      imagePath,
      checksumPath,
      checksum: required(this.checksum, 'checksum record'),
      icon: required(this.icon, 'icon result'),
      completedStages
    };
  }

  private emit(event: ReleaseProgressEvent): void {
    this.onProgress?.(event);
  }

  private async discardWorkspace(): Promise<void> {
    if (!this.workDir || this.published) {
      return;
    }
    const workDir = this.workDir;
    this.workDir = null;
    try {
      await removePath(workDir);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.logger.warn({ workDir, reason }, 'Failed to remove partial release workspace');
    }
  }

  private async runGuard(): Promise<StageOutcome> {
    const report = await assertReleaseCapabilities({
      platform: this.platform,
      locator: this.locator,
      requiredTools: requiredToolsFor(this.toolkit, { compile: !this.config.skipCompile })
    });
    this.logger.debug({ tools: report.tools }, 'Host capabilities confirmed');
    return 'completed';
  }

  private async runResolveVersion(): Promise<StageOutcome> {
    this.version = await resolveVersion(this.config.manifestPath);
    // Validates the base name before anything is written.
    artifactBaseName({ binaryName: this.profile.binaryName, version: this.version, architecture: this.architecture });
    this.logger.info({ version: this.version, architecture: this.architecture }, 'Resolved release version');
    return 'completed';
  }

  private async runCompile(): Promise<StageOutcome> {
    if (this.config.skipCompile) {
      this.logger.info('Skipping compile; packaging the existing binary');
      return 'skipped';
    }
    this.logger.info({ projectRoot: this.config.projectRoot }, 'Compiling release binary');
    await this.toolkit.compiler.compile(this.config.projectRoot);
    return 'completed';
  }

  private async runLocateBinary(): Promise<StageOutcome> {
    await assertBinaryPresent(this.config.binaryPath);
    return 'completed';
  }

  private async runPrepareWorkspace(): Promise<StageOutcome> {
    const outputDir = this.config.outputDir;
    const parent = path.dirname(outputDir);
    const prefix = `${path.basename(outputDir)}${PARTIAL_WORKSPACE_MARKER}`;
    await ensureDir(parent);

    for (const entry of await fs.readdir(parent)) {
      if (entry.startsWith(prefix)) {
        this.logger.info({ path: path.join(parent, entry) }, 'Removing stale release workspace');
        await removePath(path.join(parent, entry));
      }
    }

    this.workDir = await fs.mkdtemp(path.join(parent, prefix));
    return 'completed';
  }

  private async runIconSet(): Promise<StageOutcome> {
    this.icon = await buildIconSet({
      masterPath: this.config.iconPath,
      workDir: required(this.workDir, 'workspace'),
      resizer: this.toolkit.resizer,
      assembler: this.toolkit.iconAssembler,
      logger: this.logger
    });
    return this.icon.status === 'built' ? 'completed' : 'skipped';
  }

  private iconContainerPath(): string | null {
    const icon = required(this.icon, 'icon result');
    return icon.status === 'built' ? icon.containerPath : null;
  }

  private async runAppBundle(): Promise<StageOutcome> {
    this.bundle = await assembleAppBundle({
      workDir: required(this.workDir, 'workspace'),
      profile: this.profile,
      version: required(this.version, 'version'),
      binaryPath: this.config.binaryPath,
      iconContainerPath: this.iconContainerPath(),
      logger: this.logger
    });
    return 'completed';
  }

  private async runStageDiskImage(): Promise<StageOutcome> {
    this.staging = await stageDiskImage({
      workDir: required(this.workDir, 'workspace'),
      bundle: required(this.bundle, 'app bundle'),
      iconContainerPath: this.iconContainerPath(),
      marker: this.toolkit.customIconMarker,
      logger: this.logger
    });
    return 'completed';
  }

  private workspaceArtifactPaths() {
    const baseName = artifactBaseName({
      binaryName: this.profile.binaryName,
      version: required(this.version, 'version'),
      architecture: this.architecture
    });
    return artifactPaths(required(this.workDir, 'workspace'), baseName);
  }

  private async runDiskImage(): Promise<StageOutcome> {
    const { imagePath } = this.workspaceArtifactPaths();
    this.imagePath = await buildDiskImage({
      stagingRoot: required(this.staging, 'staging root').path,
      volumeName: this.profile.volumeName,
      outputPath: imagePath,
      creator: this.toolkit.diskImageCreator,
      logger: this.logger
    });
    return 'completed';
  }

  private async runChecksum(): Promise<StageOutcome> {
    const { checksumPath } = this.workspaceArtifactPaths();
    this.checksum = await writeChecksumRecord(required(this.imagePath, 'disk image'), checksumPath);
    this.logger.info({ digest: this.checksum.digest, file: this.checksum.fileName }, 'Checksum recorded');
    return 'completed';
  }

  private async runPublish(): Promise<StageOutcome> {
    const workDir = required(this.workDir, 'workspace');
    await removePath(this.config.outputDir);
    await fs.rename(workDir, this.config.outputDir);
    this.published = true;
    this.workDir = null;
    this.logger.info({ outputDir: this.config.outputDir }, 'Release published');
    return 'completed';
  }
}

export async function runReleasePipeline(options: ReleasePipelineOptions): Promise<ReleaseBuildResult> {
  return new ReleasePipeline(options).run();
}
