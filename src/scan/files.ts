/**
 * File enumeration — list candidate sequence members under one or more roots,
 * filtered by include/exclude wildcards on the file name.
 */
import { readdir, stat } from 'fs/promises';
import { join, basename, resolve } from 'path';
import { logger } from '../utils/logger.js';

export interface ScanOptions {
  /** Descend into subdirectories (default: false) */
  recurse?: boolean;
  /** File name wildcards to keep (default: ['*']) */
  include?: string[];
  /** File name wildcards to drop (default: []) */
  exclude?: string[];
}

// ── Wildcards ────────────────────────────────────────────────────────────────

/**
 * Compile a file name wildcard: `*` any run, `?` one character,
 * `[abc]` / `[a-z]` a set. Everything else is literal.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '*') {
      source += '.*';
    } else if (ch === '?') {
      source += '.';
    } else if (ch === '[') {
      const close = pattern.indexOf(']', i + 1);
      if (close === -1) {
        source += '\\[';
        continue;
      }
      const set = pattern.slice(i + 1, close).replace(/[\\^\]]/g, '\\$&');
      source += `[${set}]`;
      i = close;
    } else {
      source += ch.replace(/[.+^${}()|\\\]]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

function matchesAny(name: string, patterns: RegExp[]): boolean {
  return patterns.some(p => p.test(name));
}

// ── Enumeration ──────────────────────────────────────────────────────────────

/** Resolve a symlink to a file path, or null when it is dangling or not a file. */
async function linkedFile(fullPath: string): Promise<string | null> {
  try {
    return (await stat(fullPath)).isFile() ? fullPath : null;
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
    logger.warn('Scan: skipping dangling symlink', { path: fullPath });
    return null;
  }
}

async function walkDir(directory: string, recurse: boolean, out: string[]): Promise<void> {
  const entries = await readdir(directory, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(directory, entry.name);
    if (entry.isDirectory()) {
      if (recurse) await walkDir(fullPath, recurse, out);
    } else if (entry.isFile()) {
      out.push(fullPath);
    } else if (entry.isSymbolicLink()) {
      // Linked directories are not followed.
      const target = await linkedFile(fullPath);
      if (target) out.push(target);
    }
  }
}

/**
 * Collect regular files under `roots` (files or directories), including
 * symlinks to files, as absolute paths sorted by code point so zero-padded frames come out in order.
 * Throws when a root does not exist.
 */
export async function scanFiles(roots: string[], options: ScanOptions = {}): Promise<string[]> {
  const { recurse = false, include = ['*'], exclude = [] } = options;
  const includePatterns = include.map(wildcardToRegExp);
  const excludePatterns = exclude.map(wildcardToRegExp);

  const found = new Set<string>();
  for (const root of roots) {
    const absolute = resolve(root);
    const info = await stat(absolute);
    const candidates: string[] = [];
    if (info.isDirectory()) {
      await walkDir(absolute, recurse, candidates);
    } else {
      candidates.push(absolute);
    }

    for (const file of candidates) {
      const name = basename(file);
      if (!matchesAny(name, includePatterns)) continue;
      if (matchesAny(name, excludePatterns)) continue;
      found.add(file);
    }
  }

  const files = [...found].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  logger.debug('Scan: files collected', { roots, recurse, count: files.length });
  return files;
}
