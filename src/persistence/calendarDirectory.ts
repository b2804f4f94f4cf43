import { createHash } from 'node:crypto';
import { readdir, readFile, rename, stat, unlink, writeFile, mkdir } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { Fingerprint, FingerprintMode } from '../types';
import { logger } from '../utils/logger';

export const CALENDAR_EXTENSION = '.ics';

export interface CalendarFileSnapshot {
  path: string;
  fingerprint: Fingerprint;
  // filled in when the hash was computed, so the caller can parse it directly
  content: string | null;
}

export function sameFingerprint(a: Fingerprint, b: Fingerprint): boolean {
  if (a.hash !== null && b.hash !== null) {
    return a.hash === b.hash;
  }
  return a.mtimeMs === b.mtimeMs && a.size === b.size;
}

export function contentHash(content: string): string {
  return createHash('sha256').update(content, 'utf8').digest('hex');
}

/**
 * File system access for a directory of calendar files, one per group
 */
export class CalendarDirectory {
  constructor(
    readonly dir: string,
    private readonly mode: FingerprintMode = 'metadata'
  ) {}

  pathForGroup(group: string): string {
    const safe = group.replace(/[/\\:*?"<>|\0]/g, '_');
    return join(this.dir, `${safe}${CALENDAR_EXTENSION}`);
  }

  groupForPath(path: string): string {
    return basename(path, extname(path));
  }

  async ensureExists(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  async list(): Promise<string[]> {
    const entries = await readdir(this.dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && extname(entry.name) === CALENDAR_EXTENSION)
      .map(entry => join(this.dir, entry.name))
      .sort();
  }

  async snapshot(path: string): Promise<CalendarFileSnapshot> {
    const stats = await stat(path);
    if (this.mode === 'metadata') {
      return {
        path,
        fingerprint: { mtimeMs: stats.mtimeMs, size: stats.size, hash: null },
        content: null,
      };
    }

    const content = await readFile(path, 'utf8');
    return {
      path,
      fingerprint: {
        mtimeMs: stats.mtimeMs,
        size: stats.size,
        hash: contentHash(content),
      },
      content,
    };
  }

  async read(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  /**
   * Replace the file through a temporary sibling and a rename, then return
   * the fingerprint of what was written
   */
  async write(path: string, content: string): Promise<Fingerprint> {
    const temp = `${path}.${process.pid}.tmp`;
    try {
      await writeFile(temp, content, 'utf8');
      await rename(temp, path);
    } catch (error) {
      await unlink(temp).catch((cleanupError: unknown) =>
        logger.debug(`Could not remove ${temp}`, cleanupError)
      );
      throw error;
    }

    const stats = await stat(path);
    return {
      mtimeMs: stats.mtimeMs,
      size: stats.size,
      hash: this.mode === 'content-hash' ? contentHash(content) : null,
    };
  }
}
