/**
 * File-stamped memoization
 *
 * Caches one computed value per source file. The cache key is the file's
 * modification time (or its absence), so an edited or removed file is picked
 * up on the next `get()`; `clear()` forces a recompute regardless. Rejected
 * computations are not cached.
 *
 * @module core/file-memo
 */

import { stat } from 'node:fs/promises';

export type FileStamp = number | 'absent';

export async function fileStamp(path: string): Promise<FileStamp> {
  try {
    const stats = await stat(path);
    return stats.mtimeMs;
  } catch (error) {
    if (isNotFound(error)) {
      return 'absent';
    }
    throw error;
  }
}

function isNotFound(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'ENOENT' || error.code === 'ENOTDIR')
  );
}

export class FileMemo<T> {
  private cached: { readonly stamp: FileStamp; readonly value: T } | null = null;
  private computations = 0;

  constructor(
    private readonly path: string,
    private readonly compute: (path: string) => Promise<T>
  ) {}

  /**
   * Cached value, recomputed when the file's stamp changed since last time
   */
  async get(): Promise<T> {
    const stamp = await fileStamp(this.path);
    if (this.cached && this.cached.stamp === stamp) {
      return this.cached.value;
    }

    this.computations++;
    const value = await this.compute(this.path);
    this.cached = { stamp, value };
    return value;
  }

  clear(): void {
    this.cached = null;
  }

  /** Number of times `compute` has run */
  get computeCount(): number {
    return this.computations;
  }
}
