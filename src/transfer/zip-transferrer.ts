/**
 * Writes the pack as a single ZIP archive, streamed through fflate.
 */
import { createWriteStream, type WriteStream } from 'node:fs';
import { mkdir, open, rm } from 'node:fs/promises';
import { once } from 'node:events';
import { finished } from 'node:stream/promises';
import { Zip, ZipDeflate, ZipPassThrough } from 'fflate';
import { dirnameOf, normalizeAbsolute } from '../blend-path.js';
import { DEFAULT_CONFIG, type ZipConfig } from '../config.js';
import { PackError } from '../types/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Transferrer } from './transferrer.js';

/** Extensions stored without compression; their contents are already compressed. */
export const STORE_ONLY_EXTENSIONS: ReadonlySet<string> = new Set([
  '.jpg', '.jpeg', '.png', '.webp',
  '.exr',
  '.mp4', '.mov', '.mkv', '.avi',
  '.mp3', '.ogg', '.flac',
  '.zip', '.rar', '.7z', '.gz', '.bz2', '.xz', '.zst',
  '.ktx2', '.dds',
  '.blend',
]);

const READ_CHUNK_SIZE = 1024 * 1024;

export interface ZipTransferrerOptions {
  readonly zip?: ZipConfig;
  /** Directory prepended to every entry name, e.g. `project/`. */
  readonly rootPrefix?: string;
  readonly logger?: Logger;
}

function extensionOf(name: string): string {
  const slash = name.lastIndexOf('/');
  const dot = name.lastIndexOf('.');
  return dot > slash + 1 ? name.slice(dot).toLowerCase() : '';
}

/**
 * Chooses stored or deflated for one entry.
 */
export function shouldStore(entryName: string, size: number, config: ZipConfig): boolean {
  if (config.noCompress || config.level === 0) {
    return true;
  }
  if (STORE_ONLY_EXTENSIONS.has(extensionOf(entryName))) {
    return true;
  }
  return config.storeBigFilesBytes > 0 && size >= config.storeBigFilesBytes;
}

export class ZipTransferrer implements Transferrer {
  readonly outputPath: string;
  readonly archivePath: string;
  private readonly config: ZipConfig;
  private readonly rootPrefix: string;
  private readonly logger: Logger;
  private output: WriteStream | undefined;
  private zip: Zip | undefined;
  /** Entries are written one after the other through this chain. */
  private chain: Promise<void> = Promise.resolve();
  private failure: Error | undefined;
  /** Entries closed early because their source could not be read to the end. */
  private readonly incomplete: string[] = [];
  private closed = false;

  constructor(archivePath: string, options: ZipTransferrerOptions = {}) {
    this.archivePath = normalizeAbsolute(archivePath);
    this.outputPath = this.archivePath;
    this.config = options.zip ?? DEFAULT_CONFIG.zip;
    const prefix = (options.rootPrefix ?? '').replace(/^\/+|\/+$/g, '');
    this.rootPrefix = prefix ? `${prefix}/` : '';
    this.logger = options.logger ?? silentLogger;
  }

  writeFile(source: string, entryName: string): Promise<number> {
    return this.enqueue(() => this.addFile(source, this.entryName(entryName)));
  }

  writeBuffer(data: Uint8Array, entryName: string): Promise<void> {
    return this.enqueue(async () => {
      const name = this.entryName(entryName);
      const entry = this.createEntry(name, data.byteLength);
      (await this.archive()).add(entry);
      entry.push(data, true);
      await this.drain();
    });
  }

  async finish(): Promise<void> {
    await this.settle();
    this.closed = true;
    const zip = await this.archive();
    zip.end();
    if (this.output) {
      await finished(this.output);
    }
    if (this.failure) {
      throw this.failure;
    }
    if (this.incomplete.length > 0) {
      throw new PackError(`Archive ${this.archivePath} has incomplete entries: ${this.incomplete.join(', ')}`);
    }
    this.logger.info(`📦 Archive written: ${this.archivePath}`);
  }

  async abort(): Promise<void> {
    this.closed = true;
    await this.settle();
    this.zip?.terminate();
    const output = this.output;
    if (output && !output.closed) {
      // The file is only created once the stream has opened it.
      const closed = once(output, 'close');
      output.destroy();
      await closed;
    }
    await rm(this.archivePath, { force: true });
  }

  private entryName(entryName: string): string {
    return `${this.rootPrefix}${entryName.replace(/^\/+/, '')}`;
  }

  private enqueue<T>(write: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new Error(`Archive ${this.archivePath} is closed`));
    }
    const result = this.chain.then(write);
    this.chain = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  /** Waits for every queued write. Their errors reach their own callers. */
  private async settle(): Promise<void> {
    await this.chain;
  }

  private async archive(): Promise<Zip> {
    if (this.zip) {
      return this.zip;
    }
    await mkdir(dirnameOf(this.archivePath), { recursive: true });
    const output = createWriteStream(this.archivePath);
    output.on('error', (error) => {
      this.failure ??= error;
    });
    const zip = new Zip((error, chunk, final) => {
      if (error) {
        this.failure ??= error;
        output.destroy(error);
        return;
      }
      output.write(chunk);
      if (final) {
        output.end();
      }
    });
    this.output = output;
    this.zip = zip;
    return zip;
  }

  private createEntry(name: string, size: number): ZipPassThrough | ZipDeflate {
    if (shouldStore(name, size, this.config)) {
      return new ZipPassThrough(name);
    }
    return new ZipDeflate(name, { level: this.config.level });
  }

  private async drain(): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }
    if (this.output?.writableNeedDrain) {
      await once(this.output, 'drain');
    }
  }

  private async addFile(source: string, name: string): Promise<number> {
    const handle = await open(source, 'r');
    try {
      const { size } = await handle.stat();
      const entry = this.createEntry(name, size);
      (await this.archive()).add(entry);
      const buffer = Buffer.alloc(Math.min(READ_CHUNK_SIZE, Math.max(size, 1)));
      let total = 0;
      try {
        for (;;) {
          const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
          if (bytesRead === 0) {
            break;
          }
          // The stream keeps chunks until flushed, so each one gets its own copy.
          entry.push(Buffer.from(buffer.subarray(0, bytesRead)));
          total += bytesRead;
          await this.drain();
        }
      } catch (error) {
        // An entry cannot be taken back once added; close it so later entries stay valid.
        this.incomplete.push(name);
        this.logger.error(`Archive entry ${name} is incomplete: ${error instanceof Error ? error.message : String(error)}`);
        throw error;
      } finally {
        entry.push(new Uint8Array(0), true);
      }
      await this.drain();
      return total;
    } finally {
      await handle.close();
    }
  }
}
