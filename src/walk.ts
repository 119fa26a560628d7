import { readdirSync, statSync, type Dirent } from 'fs';
import { join, relative, sep } from 'path';

/**
 * Recursively yield every file under `dir`, in name order. Symlinks to files
 * count as files; symlinked directories are not descended into.
 */
export function* walkFiles(dir: string): Generator<string> {
  const entries = readdirSync(dir, { withFileTypes: true }).sort((a, b) =>
    a.name < b.name ? -1 : a.name > b.name ? 1 : 0,
  );
  for (const entry of entries) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      yield* walkFiles(path);
    } else if (isFileEntry(dir, entry)) {
      yield path;
    }
  }
}

/** A regular file, or a symlink whose target is one */
export function isFileEntry(dir: string, entry: Dirent): boolean {
  if (entry.isFile()) return true;
  return entry.isSymbolicLink() && isFile(join(dir, entry.name));
}

/** `relative()` with forward slashes on every platform */
export function toPosixRelative(from: string, to: string): string {
  return relative(from, to).split(sep).join('/');
}

export function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

export function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}
