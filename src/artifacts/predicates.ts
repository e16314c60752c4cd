import {
  cpSync,
  existsSync,
  mkdirSync,
  readFileSync,
  readdirSync,
  renameSync,
  statSync,
  writeFileSync,
} from 'node:fs';
import { dirname } from 'node:path';

// ── Read-only predicates ──
// Every predicate answers false on any filesystem error: an unreadable
// artifact counts as "not there".

export function fileExists(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

export function dirExists(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Directory exists and has at least one entry */
export function dirExistsWithFiles(path: string): boolean {
  try {
    return statSync(path).isDirectory() && readdirSync(path).length > 0;
  } catch {
    return false;
  }
}

/** File exists and its content includes `needle` */
export function fileContains(path: string, needle: string): boolean {
  if (!needle) return false;
  try {
    return readFileSync(path, 'utf-8').includes(needle);
  } catch {
    return false;
  }
}

// ── Writers ──

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

/** Write through a temp file + rename so readers never see a half-written file */
export function writeFileAtomic(path: string, content: string): void {
  mkdirSync(dirname(path), { recursive: true });
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, content);
  renameSync(tmp, path);
}

/** Recursively copy the contents of `src` into `dst` */
export function copyDir(src: string, dst: string): void {
  if (!existsSync(src)) {
    throw new Error(`source directory not found: ${src}`);
  }
  mkdirSync(dst, { recursive: true });
  cpSync(src, dst, { recursive: true });
}
