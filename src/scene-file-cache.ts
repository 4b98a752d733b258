/**
 * Shared cache of opened scene files, keyed by normalized absolute path.
 *
 * Concurrent requests for the same file share one in-flight parse.
 */
import { normalizeAbsolute } from './blend-path.js';
import { SceneBinary } from './scene-binary.js';
import type { SceneFile } from './scene-file.js';

export class SceneFileCache {
  private readonly entries = new Map<string, Promise<SceneFile>>();

  /**
   * Opens `filePath`, or returns the file already opened (or being opened)
   * under the same normalized path. A failed open is evicted so that a later
   * request can retry it.
   */
  open(filePath: string): Promise<SceneFile> {
    const key = normalizeAbsolute(filePath);
    const existing = this.entries.get(key);
    if (existing) {
      return existing;
    }
    const pending = SceneBinary.read({ filePath: key });
    this.entries.set(key, pending);
    pending.catch(() => {
      if (this.entries.get(key) === pending) {
        this.entries.delete(key);
      }
    });
    return pending;
  }

  /** Registers a file opened elsewhere, such as the root of a trace. */
  add(file: SceneFile): void {
    const key = normalizeAbsolute(file.filePath);
    if (!this.entries.has(key)) {
      this.entries.set(key, Promise.resolve(file));
    }
  }

  has(filePath: string): boolean {
    return this.entries.has(normalizeAbsolute(filePath));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Releases every cached file except `keep`. */
  async clear(keep?: SceneFile): Promise<void> {
    const pending = Array.from(this.entries.values());
    this.entries.clear();
    const settled = await Promise.allSettled(pending);
    for (const result of settled) {
      if (result.status === 'fulfilled' && result.value !== keep) {
        result.value.close();
      }
    }
  }
}
