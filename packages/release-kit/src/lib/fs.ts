import { constants, promises as fs } from 'node:fs';
import path from 'node:path';

/** True for anything at the path, including a dangling symlink. */
export async function pathExists(targetPath: string): Promise<boolean> {
  const stats = await fs.lstat(targetPath).catch(() => null);
  return stats !== null;
}

export async function isFile(targetPath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return stats.isFile();
  } catch {
    return false;
  }
}

export async function isExecutableFile(targetPath: string): Promise<boolean> {
  if (!(await isFile(targetPath))) {
    return false;
  }
  try {
    await fs.access(targetPath, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDir(directory: string): Promise<string> {
  await fs.mkdir(directory, { recursive: true });
  return directory;
}

/** Writes `contents`, creating parent directories first. */
export async function writeFile(targetPath: string, contents: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  await fs.writeFile(targetPath, contents, 'utf8');
}

export async function removePath(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export async function copyFile(source: string, destination: string): Promise<void> {
  await ensureDir(path.dirname(destination));
  await fs.copyFile(source, destination);
}

/**
 * Recursive copy that keeps symlinks as links and preserves file modes.
 */
export async function copyTree(source: string, destination: string): Promise<void> {
  await ensureDir(path.dirname(destination));
  await fs.cp(source, destination, {
    recursive: true,
    dereference: false,
    verbatimSymlinks: true,
    errorOnExist: true,
    force: false
  });
}

export async function fileSize(targetPath: string): Promise<number> {
  const stats = await fs.stat(targetPath);
  return stats.size;
}
