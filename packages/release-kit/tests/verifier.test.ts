import assert from 'node:assert/strict';
import { rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { test } from 'node:test';
import { writeChecksumRecord } from '../src/checksum';
import { IntegrityError, MissingArtifactError } from '../src/errors';
import { createSilentLogger } from '../src/logger';
import { verifyRelease, type VerifyReleaseInput } from '../src/verifier';
import { FakeInspector, createTempDir } from './helpers';

const logger = createSilentLogger();
const BASE = 'orchestraterm-0.2.0-macos-arm64';

async function releaseFixture(): Promise<{ dir: string; input: VerifyReleaseInput }> {
  const dir = await createTempDir();
  const image = path.join(dir, `${BASE}.dmg`);
  await writeFile(image, 'compressed image bytes');
  await writeChecksumRecord(image, path.join(dir, `${BASE}.sha256`));
  return {
    dir,
    input: {
      outputDir: dir,
      binaryName: 'orchestraterm',
      version: '0.2.0',
      architecture: 'arm64',
      inspector: new FakeInspector({ format: 'UDZO', className: 'CUDIFDiskImage', totalBytes: 4096 }),
      logger
    }
  };
}

test('verifyRelease validates digest and reports metadata', async (t) => {
  const { dir, input } = await releaseFixture();
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const report = await verifyRelease(input);

  assert.equal(report.baseName, BASE);
  assert.equal(report.imagePath, path.join(dir, `${BASE}.dmg`));
  assert.deepEqual(report.metadata, { format: 'UDZO', className: 'CUDIFDiskImage', totalBytes: 4096 });
  assert.equal(report.metadataError, null);
});

test('verifyRelease names the missing checksum file', async (t) => {
  const { dir, input } = await releaseFixture();
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  const checksumPath = path.join(dir, `${BASE}.sha256`);
  await rm(checksumPath);

  await assert.rejects(verifyRelease(input), (err: unknown) => {
    assert.ok(err instanceof MissingArtifactError);
    assert.equal(err.path, checksumPath);
    assert.equal(err.message, `missing: ${checksumPath}`);
    return true;
  });
});

test('verifyRelease checks the image before the record', async (t) => {
  const { dir, input } = await releaseFixture();
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  await rm(path.join(dir, `${BASE}.dmg`));
  await rm(path.join(dir, `${BASE}.sha256`));

  await assert.rejects(verifyRelease(input), { path: path.join(dir, `${BASE}.dmg`) });
});

test('verifyRelease reports an integrity mismatch after a byte changes', async (t) => {
  const { dir, input } = await releaseFixture();
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  await writeFile(path.join(dir, `${BASE}.dmg`), 'compressed image byteS');

  await assert.rejects(verifyRelease(input), (err: unknown) => {
    assert.ok(err instanceof IntegrityError);
    assert.equal(err.kind, 'integrity');
    assert.notEqual(err.expected, err.actual);
    return true;
  });
});

test('verifyRelease rejects a record written for another file', async (t) => {
  const { dir, input } = await releaseFixture();
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });
  await writeFile(path.join(dir, `${BASE}.sha256`), `${'0'.repeat(64)}  other.dmg\n`);

  await assert.rejects(verifyRelease(input), {
    message: `integrity mismatch: ${BASE}.dmg (checksum record describes other.dmg)`
  });
});

test('metadata problems never fail verification', async (t) => {
  const { dir, input } = await releaseFixture();
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const failing = await verifyRelease({ ...input, inspector: new FakeInspector(new Error('hdiutil: imageinfo failed')) });
  assert.equal(failing.metadata, null);
  assert.equal(failing.metadataError, 'hdiutil: imageinfo failed');

  const absent = await verifyRelease({ ...input, inspector: null });
  assert.equal(absent.metadataError, 'no disk image inspector available on this host');
});
