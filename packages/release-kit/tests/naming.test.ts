import assert from 'node:assert/strict';
import path from 'node:path';
import { test } from 'node:test';
import { ConfigurationError } from '../src/errors';
import { artifactBaseName, artifactPaths, detectArchitecture } from '../src/naming';

test('artifactBaseName joins binary, version and architecture', () => {
  const input = { binaryName: 'orchestraterm', version: '0.2.0', architecture: 'arm64' };
  assert.equal(artifactBaseName(input), 'orchestraterm-0.2.0-macos-arm64');
  assert.equal(artifactBaseName({ ...input }), artifactBaseName(input));
});

test('artifactPaths places image and checksum side by side', () => {
  const paths = artifactPaths('dist', 'orchestraterm-0.2.0-macos-arm64');
  assert.equal(paths.imagePath, path.join('dist', 'orchestraterm-0.2.0-macos-arm64.dmg'));
  assert.equal(paths.checksumPath, path.join('dist', 'orchestraterm-0.2.0-macos-arm64.sha256'));
});

test('artifactBaseName rejects empty or path-like segments', () => {
  assert.throws(
    () => artifactBaseName({ binaryName: 'orchestraterm', version: '  ', architecture: 'arm64' }),
    ConfigurationError
  );
  assert.throws(
    () => artifactBaseName({ binaryName: 'orchestraterm', version: '0.2.0', architecture: '../arm64' }),
    /must not contain path separators/
  );
});

test('detectArchitecture uses uname spelling', () => {
  assert.equal(detectArchitecture('x64'), 'x86_64');
  assert.equal(detectArchitecture('arm64'), 'arm64');
});
