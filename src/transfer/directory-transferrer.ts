import { copyFile, mkdir, stat, writeFile } from 'node:fs/promises';
import { dirnameOf, normalizeAbsolute } from '../blend-path.js';
import type { Transferrer } from './transferrer.js';

/**
 * Writes the pack as a plain directory tree.
 */
export class DirectoryTransferrer implements Transferrer {
  readonly outputPath: string;
  private closed = false;

  constructor(root: string) {
    this.outputPath = normalizeAbsolute(root);
  }

  async writeFile(source: string, entryName: string): Promise<number> {
    const destination = await this.prepare(entryName);
    await copyFile(source, destination);
    return (await stat(destination)).size;
  }

  async writeBuffer(data: Uint8Array, entryName: string): Promise<void> {
    const destination = await this.prepare(entryName);
    await writeFile(destination, data);
  }

  async finish(): Promise<void> {
    this.closed = true;
  }

  async abort(): Promise<void> {
    this.closed = true;
  }

  private async prepare(entryName: string): Promise<string> {
    if (this.closed) {
      throw new Error(`Pack ${this.outputPath} is closed; cannot write ${entryName}`);
    }
    const destination = normalizeAbsolute(`${this.outputPath}/${entryName}`);
    await mkdir(dirnameOf(destination), { recursive: true });
    return destination;
  }
}
