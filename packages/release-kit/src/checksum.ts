import { createHash } from 'node:crypto';
import { createReadStream, promises as fs } from 'node:fs';
import path from 'node:path';
import { pipeline } from 'node:stream/promises';
import { ConfigurationError } from './errors';
import { writeFile } from './lib/fs';
import type { ChecksumRecord } from './types';

const RECORD_LINE_PATTERN = /^([0-9a-fA-F]{64}) [ *](.+)$/;

export async function computeDigest(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  await pipeline(createReadStream(filePath), hash);
  return hash.digest('hex');
}

/** `shasum -a 256` text-mode line, newline-terminated. */
export function formatChecksumRecord(record: Pick<ChecksumRecord, 'digest' | 'fileName'>): string {
  return `${record.digest.toLowerCase()}  ${record.fileName}\n`;
}

export function parseChecksumRecord(contents: string, source = 'checksum record'): ChecksumRecord {
  const line = contents.split(/\r?\n/).find((entry) => entry.trim().length > 0);
  const match = line ? RECORD_LINE_PATTERN.exec(line.trimEnd()) : null;
  if (!match?.[1] || !match[2]) {
    throw new ConfigurationError(`Malformed ${source}: expected "<sha256>  <file>"`);
  }
  return { algorithm: 'SHA-256', digest: match[1].toLowerCase(), fileName: match[2] };
}

/**
 * Hashes the finished image and overwrites the record beside it.
 */
export async function writeChecksumRecord(imagePath: string, recordPath: string): Promise<ChecksumRecord> {
  const digest = await computeDigest(imagePath);
  const record: ChecksumRecord = { algorithm: 'SHA-256', digest, fileName: path.basename(imagePath) };
  await writeFile(recordPath, formatChecksumRecord(record));
  return record;
}

export async function readChecksumRecord(recordPath: string): Promise<ChecksumRecord> {
  const contents = await fs.readFile(recordPath, 'utf8');
  return parseChecksumRecord(contents, path.basename(recordPath));
}

/**
 * True when the file at `filePath` still hashes to the recorded digest.
 */
export async function matchesChecksumRecord(filePath: string, record: ChecksumRecord): Promise<boolean> {
  const digest = await computeDigest(filePath);
  return digest === record.digest.toLowerCase();
}
