/**
 * Container-level metadata of an opened scene file.
 */

export type Compression = 'none' | 'gzip' | 'zstd';

export type Endianness = 'little' | 'big';

export interface SceneHeader {
  /** 4 or 8. */
  readonly pointerSize: number;
  readonly endianness: Endianness;
  /** Application version that wrote the file, e.g. 405 for 4.5. */
  readonly version: number;
  /** 0 for the legacy 12-byte header, 1 or higher for the large header. */
  readonly fileFormatVersion: number;
  /** Byte size of the file header. */
  readonly headerSize: number;
}

export interface BlockHeader {
  /** Block code with trailing NUL bytes removed, e.g. "IM", "DATA", "DNA1". */
  readonly code: string;
  /** Payload length in bytes. */
  readonly length: number;
  /** Memory address the block had when written; pointers refer to it. */
  readonly address: bigint;
  /** Index into the structure-type table. */
  readonly sdnaIndex: number;
  /** Number of struct elements stored in the payload. */
  readonly count: number;
  /** Absolute offset of the block header in the decompressed file. */
  readonly headerOffset: number;
  /** Absolute offset of the payload in the decompressed file. */
  readonly dataOffset: number;
}
