import assert from 'node:assert/strict';
import { readFile, readdir, readlink, rm, stat, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { assembleAppBundle } from '../src/appBundle';
import { ORCHESTRATERM_PROFILE } from '../src/config';
import { createSilentLogger } from '../src/logger';
import { stageDiskImage } from '../src/staging';
import type { AppBundle } from '../src/types';
import { FakeMarker, createProjectFixture } from './helpers';

const logger = createSilentLogger();

async function setup(): Promise<{ root: string; bundle: AppBundle; container: string }> {
  const { root, config } = await createProjectFixture();
  const container = path.join(root, 'AppIcon.icns');
  await writeFile(container, 'icns-bytes');
  const bundle = await assembleAppBundle({
    workDir: root,
    profile: ORCHESTRATERM_PROFILE,
    version: '0.2.0',
    binaryPath: config.binaryPath,
    iconContainerPath: container,
    logger
  });
  return { root, bundle, container };
}

test('stages bundle, Applications link and volume icon', async (t) => {
  const { root, bundle, container } = await setup();
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });
  const marker = new FakeMarker();

  const staging = await stageDiskImage({ workDir: root, bundle, iconContainerPath: container, marker, logger });

  assert.equal(staging.path, path.join(root, 'dmg-root'));
  assert.deepEqual((await readdir(staging.path)).sort(), ['.VolumeIcon.icns', 'Applications', 'OrchestraTerm.app']);
  assert.equal(await readlink(staging.applicationsLink), '/Applications');
  assert.equal(await readFile(path.join(staging.path, '.VolumeIcon.icns'), 'utf8'), 'icns-bytes');
  const stagedExecutable = path.join(staging.bundlePath, 'Contents', 'MacOS', 'orchestraterm');
  assert.equal((await stat(stagedExecutable)).mode & 0o777, 0o755);
  assert.deepEqual(marker.marked, [staging.path]);
  assert.equal(staging.customIconMarked, true);
});

test('a failing custom-icon marker does not abort staging', async (t) => {
  const { root, bundle, container } = await setup();
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });

  const staging = await stageDiskImage({
    workDir: root,
    bundle,
    iconContainerPath: container,
    marker: new FakeMarker(true),
    logger
  });

  assert.equal(staging.customIconMarked, false);
  assert.equal(staging.volumeIconPath, path.join(staging.path, '.VolumeIcon.icns'));
});

test('without an icon container no volume icon is staged', async (t) => {
  const { root, bundle } = await setup();
  t.after(async () => {
    await rm(root, { recursive: true, force: true });
  });
  const marker = new FakeMarker();

  const staging = await stageDiskImage({ workDir: root, bundle, iconContainerPath: null, marker, logger });

  assert.deepEqual((await readdir(staging.path)).sort(), ['Applications', 'OrchestraTerm.app']);
  assert.equal(staging.volumeIconPath, null);
  assert.deepEqual(marker.marked, []);
});
