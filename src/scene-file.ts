/**
 * One opened scene file: header, structure-type table and the block arena.
 */
import { gzipSync } from 'node:zlib';
import { Block, type Dereference } from './block.js';
import type { StructTable } from './sdna.js';
import type { BlockHeader, Compression, SceneHeader } from './types/scene-header.js';

export class SceneFile {
  readonly blocks: readonly Block[];
  /** Addresses that were dereferenced but matched no block. */
  readonly unresolvedAddresses = new Set<bigint>();
  private readonly addressIndex = new Map<bigint, number>();
  private data: Buffer;
  private modified = false;

  constructor(
    readonly filePath: string,
    readonly header: SceneHeader,
    readonly compression: Compression,
    readonly structs: StructTable,
    blockHeaders: readonly BlockHeader[],
    data: Buffer,
  ) {
    this.data = data;
    this.blocks = blockHeaders.map((blockHeader) => new Block(this, blockHeader, structs.byIndex(blockHeader.sdnaIndex)));
    this.blocks.forEach((block, index) => {
      if (block.address !== 0n && !this.addressIndex.has(block.address)) {
        this.addressIndex.set(block.address, index);
      }
    });
  }

  get littleEndian(): boolean {
    return this.header.endianness === 'little';
  }

  /** Decompressed file contents, including any in-memory patches. */
  get bytes(): Buffer {
    return this.data;
  }

  get isModified(): boolean {
    return this.modified;
  }

  /**
   * Subversion stored in the global block, or 0 when the file has none.
   */
  get fileSubversion(): number {
    const glob = this.blocks.find((block) => block.code === 'GLOB');
    if (!glob || !glob.hasField('subversion')) {
      return 0;
    }
    return glob.getNumber('subversion');
  }

  readAddress(offset: number): bigint {
    if (this.header.pointerSize === 8) {
      return this.littleEndian ? this.data.readBigUInt64LE(offset) : this.data.readBigUInt64BE(offset);
    }
    return BigInt(this.littleEndian ? this.data.readUInt32LE(offset) : this.data.readUInt32BE(offset));
  }

  /**
   * Looks up the block written at `address`. Never throws.
   */
  dereference(address: bigint): Dereference {
    if (address === 0n) {
      return { kind: 'null' };
    }
    const index = this.addressIndex.get(address);
    const block = index === undefined ? undefined : this.blocks[index];
    if (!block) {
      this.unresolvedAddresses.add(address);
      return { kind: 'unresolved', address };
    }
    return { kind: 'resolved', block };
  }

  blocksWithCode(code: string): Block[] {
    return this.blocks.filter((block) => block.code === code);
  }

  /** All datablock records, in file order. */
  idBlocks(): Block[] {
    return this.blocks.filter((block) => block.isIdBlock);
  }

  /** Overwrites bytes of the in-memory copy. The file on disk is never touched. */
  patch(offset: number, bytes: Buffer): void {
    bytes.copy(this.data, offset);
    this.modified = true;
  }

  /**
   * Serialises the (possibly patched) contents in the original container.
   * Gzip files are re-compressed; zstd files are written uncompressed since
   * the reader accepts both.
   */
  toBuffer(): Buffer {
    if (this.compression === 'gzip') {
      return gzipSync(this.data);
    }
    return Buffer.from(this.data);
  }

  /** Releases the decompressed contents. */
  close(): void {
    this.data = Buffer.alloc(0);
  }
}
