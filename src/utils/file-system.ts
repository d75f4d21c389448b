/**
 * File system operations - reading, writing, and listing source files.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/** Files that never hold interfaces worth decorating. */
export const SOURCE_EXCLUDES = ['**/*.d.ts', '**/*.test.ts', '**/*.spec.ts', '**/node_modules/**'];

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Write content to a file, creating parent directories and replacing
 * whatever the file held before.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory (sync).
 */
export function isDirectorySync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * List the TypeScript sources directly inside a directory, sorted.
 * Subdirectories are separate locations and are not descended into.
 */
export function listSourceFiles(dirPath: string): string[] {
  return fg
    .sync(['*.ts', '*.tsx'], {
      cwd: dirPath,
      ignore: SOURCE_EXCLUDES,
      absolute: true,
      onlyFiles: true,
    })
    .sort();
}

/**
 * Convert a path to forward slashes, as module specifiers require.
 */
export function toPosixPath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}
