/**
 * ArtifactStore: content-addressed image files under the images directory.
 *
 * Files are named `<fingerprint>.<ext>`, so the entry ↔ file mapping can be
 * rebuilt from the directory alone. Writes go through a temp file, fsync and
 * rename: once persist() returns, the file is complete on disk.
 */

import * as fs from 'fs';
import * as path from 'path';
import { createLogger } from './logger';
import { isFingerprint } from './fingerprint';
import { IMAGE_EXTENSIONS } from '@shared/constants';
import type { ImageFormat } from '@shared/types';
import { ClipkeepError, ErrorCode } from '@shared/types/errors';

const log = createLogger('Artifacts');

export class ArtifactStore {
  constructor(private readonly imageDir: string) {}

  get directory(): string {
    return this.imageDir;
  }

  ensureDir(): void {
    fs.mkdirSync(this.imageDir, { recursive: true });
  }

  pathFor(contentHash: string, format: ImageFormat): string {
    return path.join(this.imageDir, `${contentHash}.${IMAGE_EXTENSIONS[format]}`);
  }

  /**
   * Durably write image bytes for a fingerprint. An existing file with the
   * same name already holds these bytes and is left alone.
   */
  persist(contentHash: string, format: ImageFormat, data: Uint8Array): string {
    const target = this.pathFor(contentHash, format);
    if (fs.existsSync(target)) return target;

    const tmpPath = `${target}.${process.pid}.tmp`;
    try {
      this.ensureDir();
      const fd = fs.openSync(tmpPath, 'w');
      try {
        fs.writeSync(fd, data);
        fs.fsyncSync(fd);
      } finally {
        fs.closeSync(fd);
      }
      fs.renameSync(tmpPath, target);
    } catch (err) {
      fs.rmSync(tmpPath, { force: true });
      throw new ClipkeepError(`Failed to write image artifact ${target}`, ErrorCode.STORAGE_IO_ERROR, {
        context: { contentHash },
        originalError: err instanceof Error ? err : undefined,
      });
    }
    return target;
  }

  read(artifactPath: string): Buffer {
    try {
      return fs.readFileSync(artifactPath);
    } catch (err) {
      throw new ClipkeepError(`Image artifact ${artifactPath} is unavailable`, ErrorCode.INTEGRITY_VIOLATION, {
        context: { artifactPath },
        originalError: err instanceof Error ? err : undefined,
      });
    }
  }

  exists(artifactPath: string): boolean {
    return fs.existsSync(artifactPath);
  }

  /**
   * Delete an artifact. Returns false when it was already gone; any other
   * failure is raised as a storage error.
   */
  remove(artifactPath: string): boolean {
    try {
      fs.unlinkSync(artifactPath);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === 'ENOENT') return false;
      throw new ClipkeepError(`Failed to delete image artifact ${artifactPath}`, ErrorCode.STORAGE_IO_ERROR, {
        context: { artifactPath },
        originalError: err instanceof Error ? err : undefined,
      });
    }
  }

  /**
   * Fingerprints of every artifact on disk, recovered from file names.
   */
  list(): Map<string, string> {
    const found = new Map<string, string>();
    if (!fs.existsSync(this.imageDir)) return found;

    for (const name of fs.readdirSync(this.imageDir)) {
      const hash = name.split('.')[0];
      if (isFingerprint(hash) && !name.endsWith('.tmp')) {
        found.set(hash, path.join(this.imageDir, name));
      }
    }
    return found;
  }

  /**
   * Delete artifacts whose fingerprint no entry owns, plus leftover temp
   * files from interrupted writes. Returns the number of files removed.
   */
  pruneOrphans(ownedHashes: ReadonlySet<string>): number {
    if (!fs.existsSync(this.imageDir)) return 0;

    let removed = 0;
    for (const name of fs.readdirSync(this.imageDir)) {
      const hash = name.split('.')[0];
      const orphan = name.endsWith('.tmp') || (isFingerprint(hash) && !ownedHashes.has(hash));
      if (orphan && this.remove(path.join(this.imageDir, name))) {
        removed++;
      }
    }
    if (removed > 0) {
      log.info(`Removed ${removed} orphaned image artifact(s)`);
    }
    return removed;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
