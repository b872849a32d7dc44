/**
 * Filesystem utilities
 * Pure fs operations - no manager imports
 */
import fs from 'fs';
import path from 'path';

/**
 * Ensure directory exists (create recursively if needed)
 * @param dirPath - Absolute path to directory
 */
export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

/**
 * Read file as string (returns null if not found)
 */
export function readFile(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch {
    return null;
  }
}

/**
 * Write file atomically (temp file + rename in the same directory).
 * Either the whole content lands or the original file is left as it was.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  ensureDir(dir);
  const tempFile = path.join(dir, `.${path.basename(filePath)}.tmp.${process.pid}`);
  try {
    fs.writeFileSync(tempFile, content, 'utf8');
    fs.renameSync(tempFile, filePath);
  } catch (e) {
    fs.rmSync(tempFile, { force: true });
    throw e;
  }
}

/**
 * List subdirectory names of a directory, sorted (empty if missing)
 */
export function listDirs(dirPath: string): string[] {
  if (!fs.existsSync(dirPath)) return [];
  return fs.readdirSync(dirPath, { withFileTypes: true })
    .filter(entry => entry.isDirectory() && !entry.name.startsWith('.'))
    .map(entry => entry.name)
    .sort();
}
