import {
  chmodSync,
  copyFileSync,
  existsSync,
  mkdirSync,
  statSync,
  utimesSync,
} from 'fs';
import { basename, dirname, extname, join } from 'path';
import { errorMessage } from './errors.ts';
import { expandPattern } from './layout.ts';
import type {
  BackupRecord,
  SkillConfig,
  SkippedFile,
  SyncResult,
  SyncSettings,
} from './types.ts';
import { isDirectory, toPosixRelative, walkFiles } from './walk.ts';

export const DRY_RUN_MARKER = '[DRY RUN]';
export const SOURCE_NOT_FOUND = 'source not found';

export interface SyncOptions {
  config: SkillConfig;
  dryRun?: boolean;
  /** Clock used for backup timestamps */
  now?: () => Date;
}

interface SyncDraft {
  copiedFiles: string[];
  skippedFiles: SkippedFile[];
  backups: BackupRecord[];
  errors: string[];
}

interface FileCopy {
  source: string;
  target: string;
  targetRoot: string;
}

/**
 * Copy the configured skill files from a standalone skill repo into a
 * marketplace tree.
 *
 * Patterns come from `sync.files_to_sync`; `{skill_name}` is expanded and a
 * trailing `/` marks a directory copied recursively. Missing sources are
 * skipped, copy failures are recorded and the walk carries on. In dry-run
 * mode nothing is written.
 */
export function syncSkillFiles(
  sourceDir: string,
  targetDir: string,
  skillName: string,
  options: SyncOptions,
): SyncResult {
  const draft: SyncDraft = { copiedFiles: [], skippedFiles: [], backups: [], errors: [] };

  if (!isDirectory(sourceDir)) {
    draft.errors.push(`Source directory not found: ${sourceDir}`);
    return finish(draft);
  }
  if (!isDirectory(targetDir)) {
    draft.errors.push(`Target directory not found: ${targetDir}`);
    return finish(draft);
  }

  const settings = options.config.sync;
  const dryRun = options.dryRun ?? false;
  const now = options.now ?? (() => new Date());

  for (const pattern of settings.files_to_sync) {
    const expanded = expandPattern(pattern, skillName);

    if (isDirectoryPattern(expanded)) {
      const relDir = stripTrailingSlashes(expanded);
      const sourceSubdir = join(sourceDir, relDir);

      if (!existsSync(sourceSubdir)) {
        draft.skippedFiles.push({ file: sourceSubdir, reason: SOURCE_NOT_FOUND });
        continue;
      }
      if (!isDirectory(sourceSubdir)) {
        draft.skippedFiles.push({ file: sourceSubdir, reason: 'source is not a directory' });
        continue;
      }

      try {
        for (const source of walkFiles(sourceSubdir)) {
          const target = join(targetDir, relDir, toPosixRelative(sourceSubdir, source));
          syncFile({ source, target, targetRoot: targetDir }, settings, draft, dryRun, now);
        }
      } catch (e) {
        draft.errors.push(`Failed to read ${sourceSubdir}: ${errorMessage(e)}`);
      }
    } else {
      syncFile(
        { source: join(sourceDir, expanded), target: join(targetDir, expanded), targetRoot: targetDir },
        settings,
        draft,
        dryRun,
        now,
      );
    }
  }

  return finish(draft);
}

/**
 * Files the sync patterns would touch, relative to `sourceDir`.
 * Read-only; patterns whose source is missing or unreadable are left out.
 */
export function listSyncFiles(
  sourceDir: string,
  skillName: string,
  config: SkillConfig,
): string[] {
  const files: string[] = [];

  for (const pattern of config.sync.files_to_sync) {
    const expanded = expandPattern(pattern, skillName);

    if (isDirectoryPattern(expanded)) {
      const dir = join(sourceDir, stripTrailingSlashes(expanded));
      if (!isDirectory(dir)) continue;
      try {
        const found = [...walkFiles(dir)];
        files.push(...found.map((file) => toPosixRelative(sourceDir, file)));
      } catch {
        // unreadable directory; list nothing for this pattern
      }
    } else {
      const file = join(sourceDir, expanded);
      if (existsSync(file)) {
        files.push(toPosixRelative(sourceDir, file));
      }
    }
  }

  return files;
}

/**
 * Backup location for `file`: `<stem><suffix>.<YYYYMMDD_HHMMSS><ext>` in the
 * same directory, e.g. `notes.md` → `notes.backup.20250131_090500.md`.
 */
export function backupPathFor(file: string, suffix: string, date: Date): string {
  const ext = extname(file);
  const stem = basename(file, ext);
  return join(dirname(file), `${stem}${suffix}.${formatBackupTimestamp(date)}${ext}`);
}

/** Local time as `YYYYMMDD_HHMMSS` */
export function formatBackupTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** Copy a file, keeping its permission bits and timestamps */
export function copyPreservingMetadata(source: string, target: string): void {
  copyFileSync(source, target);
  const stats = statSync(source);
  chmodSync(target, stats.mode & 0o7777);
  utimesSync(target, stats.atime, stats.mtime);
}

function syncFile(
  { source, target, targetRoot }: FileCopy,
  settings: SyncSettings,
  draft: SyncDraft,
  dryRun: boolean,
  now: () => Date,
): void {
  if (!existsSync(source)) {
    draft.skippedFiles.push({ file: source, reason: SOURCE_NOT_FOUND });
    return;
  }
  if (isDirectory(source)) {
    draft.skippedFiles.push({ file: source, reason: 'source is not a file' });
    return;
  }

  if (settings.backup_enabled && existsSync(target)) {
    const backup = createBackup(target, settings.backup_suffix, now(), dryRun);
    if (backup) {
      draft.backups.push({ original: target, backup });
    }
  }

  if (dryRun) {
    draft.copiedFiles.push(`${DRY_RUN_MARKER} ${target}`);
    return;
  }

  try {
    mkdirSync(dirname(target), { recursive: true });
    copyPreservingMetadata(source, target);
    draft.copiedFiles.push(toPosixRelative(targetRoot, target));
  } catch (e) {
    draft.errors.push(`Failed to copy ${source}: ${errorMessage(e)}`);
  }
}

/** Returns the backup path, or null when the copy could not be made */
function createBackup(file: string, suffix: string, date: Date, dryRun: boolean): string | null {
  const backup = backupPathFor(file, suffix, date);
  if (dryRun) {
    return backup;
  }

  try {
    copyPreservingMetadata(file, backup);
    return backup;
  } catch {
    // no backup; the copy still goes ahead
    return null;
  }
}

function finish(draft: SyncDraft): SyncResult {
  return { success: draft.errors.length === 0, ...draft };
}

function isDirectoryPattern(pattern: string): boolean {
  return pattern.endsWith('/');
}

function stripTrailingSlashes(pattern: string): string {
  return pattern.replace(/\/+$/, '');
}
