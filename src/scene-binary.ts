/**
 * Scene file binary helpers: container detection, header and block table parsing.
 */
import { readFile } from 'node:fs/promises';
import { gunzipSync } from 'node:zlib';
import { decompress as zstdDecompress } from 'fzstd';
import { parseStructTable } from './sdna.js';
import { SceneFile } from './scene-file.js';
import { BinaryCursor } from './utils/binary-cursor.js';
import { SceneBinaryError } from './types/errors.js';
import type { BlockHeader, Compression, SceneHeader } from './types/scene-header.js';

const SCENE_MAGIC = 'BLENDER';
const LEGACY_HEADER_SIZE = 12;
const LARGE_BLOCK_HEADER_SIZE = 32;
const GZIP_MAGIC = Buffer.from([0x1f, 0x8b]);
const ZSTD_MAGIC = Buffer.from([0x28, 0xb5, 0x2f, 0xfd]);
const DNA_CODE = 'DNA1';
const END_CODE = 'ENDB';

function isDigit(byte: number | undefined): boolean {
  return byte !== undefined && byte >= 0x30 && byte <= 0x39;
}

function parseDecimal(buffer: Buffer, start: number, end: number, what: string, filePath: string): number {
  const text = buffer.toString('latin1', start, end);
  if (!/^\d+$/.test(text)) {
    throw new SceneBinaryError(`Invalid ${what} "${text}" in header of ${filePath}`);
  }
  return Number.parseInt(text, 10);
}

/**
 * Identifies the outer container by its magic bytes.
 */
function detectCompression(buffer: Buffer): Compression {
  if (buffer.subarray(0, GZIP_MAGIC.length).equals(GZIP_MAGIC)) {
    return 'gzip';
  }
  if (buffer.subarray(0, ZSTD_MAGIC.length).equals(ZSTD_MAGIC)) {
    return 'zstd';
  }
  return 'none';
}

function decompress(buffer: Buffer, compression: Compression, filePath: string): Buffer {
  try {
    switch (compression) {
      case 'gzip':
        return gunzipSync(buffer);
      case 'zstd': {
        const output = zstdDecompress(new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength));
        return Buffer.from(output.buffer, output.byteOffset, output.byteLength);
      }
      default:
        return buffer;
    }
  } catch (error) {
    throw new SceneBinaryError(
      `Failed to decompress ${compression} container of ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      error,
    );
  }
}

/**
 * Parses either the legacy 12-byte header (`BLENDER-v405`) or the large
 * header (`BLENDER17-01v0500`).
 */
function readHeader(buffer: Buffer, filePath: string): SceneHeader {
  if (buffer.length < LEGACY_HEADER_SIZE || buffer.toString('latin1', 0, SCENE_MAGIC.length) !== SCENE_MAGIC) {
    throw new SceneBinaryError(`Invalid scene file magic in ${filePath}`);
  }

  if (isDigit(buffer[7]) && isDigit(buffer[8])) {
    const headerSize = parseDecimal(buffer, 7, 9, 'header size', filePath);
    if (buffer.length < headerSize || headerSize < 17) {
      throw new SceneBinaryError(`Truncated ${headerSize}-byte header in ${filePath}`);
    }
    if (buffer[9] !== 0x2d) {
      throw new SceneBinaryError(`Unsupported pointer size marker in ${filePath}`);
    }
    const fileFormatVersion = parseDecimal(buffer, 10, 12, 'file format version', filePath);
    const endianness = readEndianness(buffer[12], filePath);
    const version = parseDecimal(buffer, 13, 17, 'version', filePath);
    return { pointerSize: 8, endianness, version, fileFormatVersion, headerSize };
  }

  const pointerMarker = buffer[7];
  let pointerSize: number;
  if (pointerMarker === 0x5f) {
    pointerSize = 4;
  } else if (pointerMarker === 0x2d) {
    pointerSize = 8;
  } else {
    throw new SceneBinaryError(`Unsupported pointer size marker in ${filePath}`);
  }
  const endianness = readEndianness(buffer[8], filePath);
  const version = parseDecimal(buffer, 9, 12, 'version', filePath);
  return { pointerSize, endianness, version, fileFormatVersion: 0, headerSize: LEGACY_HEADER_SIZE };
}

function readEndianness(marker: number | undefined, filePath: string): SceneHeader['endianness'] {
  if (marker === 0x76) return 'little';
  if (marker === 0x56) return 'big';
  throw new SceneBinaryError(`Unsupported endianness marker in ${filePath}`);
}

function blockHeaderSize(header: SceneHeader): number {
  return header.fileFormatVersion >= 1 ? LARGE_BLOCK_HEADER_SIZE : 4 + 4 + header.pointerSize + 4 + 4;
}

function toSafeLength(value: bigint, what: string, offset: number, filePath: string): number {
  if (value < 0n || value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new SceneBinaryError(`Invalid block ${what} ${value} at offset ${offset} in ${filePath}`);
  }
  return Number(value);
}

/**
 * Walks the block table sequentially until the end marker.
 */
function readBlockHeaders(buffer: Buffer, header: SceneHeader, filePath: string): BlockHeader[] {
  const headerSize = blockHeaderSize(header);
  const littleEndian = header.endianness === 'little';
  const headers: BlockHeader[] = [];
  let offset = header.headerSize;

  while (offset < buffer.length) {
    const code = buffer.toString('latin1', offset, Math.min(offset + 4, buffer.length)).replace(/\0+$/, '');
    if (code === END_CODE) {
      break;
    }
    if (offset + headerSize > buffer.length) {
      throw new SceneBinaryError(`Truncated block header at offset ${offset} in ${filePath}`);
    }

    const cursor = new BinaryCursor(buffer, littleEndian, offset + 4);
    let length: number;
    let address: bigint;
    let sdnaIndex: number;
    let count: number;
    if (header.fileFormatVersion >= 1) {
      sdnaIndex = cursor.readInt32();
      address = cursor.readUint64();
      length = toSafeLength(cursor.readInt64(), 'length', offset, filePath);
      count = toSafeLength(cursor.readInt64(), 'count', offset, filePath);
    } else {
      length = cursor.readInt32();
      address = cursor.readPointer(header.pointerSize);
      sdnaIndex = cursor.readInt32();
      count = cursor.readInt32();
    }

    const dataOffset = offset + headerSize;
    if (length < 0 || dataOffset + length > buffer.length) {
      throw new SceneBinaryError(`Block "${code}" at offset ${offset} extends beyond file bounds: length=${length}, fileSize=${buffer.length}`);
    }

    headers.push({ code, length, address, sdnaIndex, count, headerOffset: offset, dataOffset });
    offset = dataOffset + length;
  }

  return headers;
}

/**
 * Builds a complete scene file model from decompressed bytes.
 */
function buildSceneFile(buffer: Buffer, filePath: string, compression: Compression): SceneFile {
  const header = readHeader(buffer, filePath);
  const blockHeaders = readBlockHeaders(buffer, header, filePath);
  const dnaBlock = blockHeaders.find((blockHeader) => blockHeader.code === DNA_CODE);
  if (!dnaBlock) {
    throw new SceneBinaryError(`No structure-type table (${DNA_CODE}) in ${filePath}`);
  }
  const payload = buffer.subarray(dnaBlock.dataOffset, dnaBlock.dataOffset + dnaBlock.length);
  const structs = parseStructTable(payload, header.endianness === 'little', header.pointerSize);
  return new SceneFile(filePath, header, compression, structs, blockHeaders, buffer);
}

/**
 * Scene file reading utilities.
 * Provides low-level operations for opening plain, gzip and zstd scene files.
 */
export class SceneBinary {
  /** Error class for malformed scene files. */
  static readonly Error: typeof SceneBinaryError = SceneBinaryError;

  /**
   * Reads a scene file from disk and parses its header, block table and
   * structure-type table.
   *
   * @param filePath - Path to the scene file
   * @throws {SceneBinaryError} If the file cannot be read or is malformed
   */
  static async read({ filePath }: { readonly filePath: string }): Promise<SceneFile> {
    let buffer: Buffer;
    try {
      buffer = await readFile(filePath);
    } catch (error) {
      throw new SceneBinaryError(`Cannot read scene file ${filePath}: ${error instanceof Error ? error.message : String(error)}`, error);
    }
    return SceneBinary.parse({ buffer, filePath });
  }

  /**
   * Parses an in-memory scene file. The buffer is copied, so patches applied
   * to the returned model never reach the caller's bytes.
   */
  static parse({ buffer, filePath }: { readonly buffer: Buffer; readonly filePath: string }): SceneFile {
    const compression = detectCompression(buffer);
    const decompressed = decompress(buffer, compression, filePath);
    return buildSceneFile(Buffer.from(decompressed), filePath, compression);
  }

  static detectCompression({ buffer }: { readonly buffer: Buffer }): Compression {
    return detectCompression(buffer);
  }
}
