/**
 * Safe file backup/rewrite utilities.
 *
 * The rewrite of a history file always goes through a sibling temp file and
 * a rename, and a requested backup is written and synced before that starts.
 * If anything fails the original file keeps its previous content.
 */

import fs from 'node:fs/promises';
import { constants as fsConstants } from 'node:fs';
import path from 'node:path';
import { BackupError, IoError, describeCause } from './errors.js';

// ── Constants ────────────────────────────────────────────────────────────────

/** Inserted between the history path and the backup timestamp. */
export const BACKUP_SUFFIX = '.backup-';

// ── Backup helpers ───────────────────────────────────────────────────────────

/**
 * Local time with millisecond precision, e.g. `2024-03-26-09h05m07s042ms`.
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number, width = 2) => String(n).padStart(width, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `-${pad(date.getHours())}h${pad(date.getMinutes())}m${pad(date.getSeconds())}s` +
    `${pad(date.getMilliseconds(), 3)}ms`
  );
}

/** `<filePath>.backup-<local timestamp>` */
export function getBackupPath(filePath: string, now: Date = new Date()): string {
  return `${filePath}${BACKUP_SUFFIX}${formatBackupTimestamp(now)}`;
}

/**
 * Copy `filePath` byte-for-byte next to itself and flush the copy to disk.
 * Never overwrites an existing file.
 *
 * @returns The backup file path.
 * @throws {BackupError} when the copy cannot be written.
 */
export async function createBackup(filePath: string, now: Date = new Date()): Promise<string> {
  const backupPath = getBackupPath(filePath, now);

  try {
    await fs.copyFile(filePath, backupPath, fsConstants.COPYFILE_EXCL);
    await syncFile(backupPath);
  } catch (error) {
    throw new BackupError(backupPath, error);
  }

  return backupPath;
}

// ── Write helpers ────────────────────────────────────────────────────────────

/**
 * Replace a file's content in one step.
 *
 * A symlink is followed, so the link stays in place and its target receives
 * the new content. Writes to a hidden `.<name>.<pid>.tmp` beside the target,
 * gives it the target's permission bits, syncs it, then renames it over the
 * target. On failure the temp file is removed and the error rethrown.
 *
 * @throws {IoError}
 */
export async function replaceFileContents(filePath: string, content: Uint8Array): Promise<void> {
  const target = await resolveFilePath(filePath);
  const mode = await permissionBits(target);
  const tmpPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

  try {
    const handle = await fs.open(tmpPath, 'w');
    try {
      await handle.writeFile(content);
      if (mode !== undefined) await handle.chmod(mode);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(tmpPath, target);
  } catch (error) {
    const cleanupError = await removeTempFile(tmpPath);
    if (cleanupError === undefined) throw new IoError(filePath, error);
    throw new IoError(
      filePath,
      new AggregateError(
        [error, cleanupError],
        `${describeCause(error)} (leaving '${tmpPath}' behind: ${describeCause(cleanupError)})`,
      ),
    );
  }
}

/**
 * The path a rewrite must target: the final target of a symlink, otherwise
 * `filePath` itself (also when nothing exists there yet).
 *
 * @throws {IoError} when the path cannot be inspected.
 */
export async function resolveFilePath(filePath: string): Promise<string> {
  try {
    const stats = await fs.lstat(filePath);
    return stats.isSymbolicLink() ? await fs.realpath(filePath) : filePath;
  } catch (error) {
    if (isNotFound(error)) return filePath;
    throw new IoError(filePath, error);
  }
}

/** Permission bits of an existing file, `undefined` if there is none. */
async function permissionBits(filePath: string): Promise<number | undefined> {
  try {
    const stats = await fs.stat(filePath);
    return stats.mode & 0o7777;
  } catch (error) {
    if (isNotFound(error)) return undefined;
    throw new IoError(filePath, error);
  }
}

/** Resolves to the removal error, if any, so it cannot replace the write error. */
async function removeTempFile(tmpPath: string): Promise<unknown> {
  try {
    await fs.rm(tmpPath, { force: true });
    return undefined;
  } catch (error) {
    return error;
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

async function syncFile(filePath: string): Promise<void> {
  const handle = await fs.open(filePath, 'r+');
  try {
    await handle.sync();
  } finally {
    await handle.close();
  }
}

// ── File existence ───────────────────────────────────────────────────────────

/**
 * Check whether a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}
