/**
 * Writes small but well-formed scene files for tests: a chosen header form,
 * a block table and a structure-type table describing the structs used.
 */
import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { gzipSync } from 'node:zlib';

export type FieldValue = number | bigint | string | Buffer | BlockHandle | FieldValues | readonly (number | bigint | BlockHandle)[];

export interface FieldValues {
  readonly [field: string]: FieldValue | undefined;
}

/** `[type, name]` pairs; names use the table syntax (`*next`, `name[66]`, `**mat`). */
export type StructDefinition = readonly (readonly [string, string])[];

const PRIMITIVE_SIZES: Readonly<Record<string, number>> = {
  char: 1,
  uchar: 1,
  short: 2,
  ushort: 2,
  int: 4,
  uint: 4,
  float: 4,
  double: 8,
  int64_t: 8,
  uint64_t: 8,
  void: 0,
};

const ID: StructDefinition = [
  ['void', '*next'],
  ['void', '*prev'],
  ['ID', '*newid'],
  ['Library', '*lib'],
  ['char', 'name[66]'],
  ['short', 'flag'],
  ['int', 'tag'],
  ['int', 'us'],
];

const LINKED: StructDefinition = [
  ['void', '*next'],
  ['void', '*prev'],
];

/** Struct layouts close to those of recent application versions. */
export const STANDARD_STRUCTS: Readonly<Record<string, StructDefinition>> = {
  Link: LINKED,
  ID,
  ListBase: [
    ['void', '*first'],
    ['void', '*last'],
  ],
  FileGlobal: [
    ['char', 'subvstr[4]'],
    ['short', 'subversion'],
    ['short', 'minversion'],
    ['Scene', '*curscene'],
  ],
  AnimData: [['bAction', '*action']],
  bAction: [['ID', 'id']],
  Library: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['PackedFile', '*packedfile'],
  ],
  PackedFile: [['int', 'size']],
  Image: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['PackedFile', '*packedfile'],
    ['short', 'source'],
    ['short', 'type'],
  ],
  CacheFile: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['char', 'is_sequence'],
  ],
  bSound: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['PackedFile', '*packedfile'],
  ],
  VFont: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['PackedFile', '*packedfile'],
  ],
  MovieClip: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['int', 'source'],
  ],
  Volume: [
    ['ID', 'id'],
    ['char', 'filepath[1024]'],
    ['PackedFile', '*packedfile'],
    ['char', 'is_sequence'],
  ],
  Object: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['void', '*data'],
    ['Material', '**mat'],
    ['short', 'totcol'],
    ['int', 'transflag'],
    ['Collection', '*instance_collection'],
    ['ListBase', 'modifiers'],
    ['ListBase', 'particlesystem'],
  ],
  ModifierData: [
    ['ModifierData', '*next'],
    ['ModifierData', '*prev'],
    ['int', 'type'],
    ['int', 'mode'],
    ['char', 'name[64]'],
  ],
  MeshCacheModifierData: [
    ['ModifierData', 'modifier'],
    ['char', 'filepath[1024]'],
  ],
  OceanModifierData: [
    ['ModifierData', 'modifier'],
    ['char', 'cachepath[1024]'],
    ['char', 'cached'],
  ],
  FluidModifierData: [
    ['ModifierData', 'modifier'],
    ['FluidDomainSettings', '*domain'],
    ['int', 'type'],
  ],
  FluidDomainSettings: [['char', 'cache_directory[1024]']],
  MeshSeqCacheModifierData: [
    ['ModifierData', 'modifier'],
    ['CacheFile', '*cache_file'],
  ],
  NodesModifierSettings: [['IDProperty', '*properties']],
  NodesModifierData: [
    ['ModifierData', 'modifier'],
    ['bNodeTree', '*node_group'],
    ['NodesModifierSettings', 'settings'],
  ],
  IDPropertyData: [
    ['void', '*pointer'],
    ['ListBase', 'group'],
  ],
  IDProperty: [
    ['IDProperty', '*next'],
    ['IDProperty', '*prev'],
    ['char', 'type'],
    ['IDPropertyData', 'data'],
    ['char', 'name[64]'],
  ],
  ParticleSystem: [
    ['ParticleSystem', '*next'],
    ['ParticleSystem', '*prev'],
    ['ParticleSettings', '*part'],
  ],
  ParticleSettings: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['short', 'ren_as'],
    ['Collection', '*instance_collection'],
    ['Object', '*instance_object'],
  ],
  Mesh: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['Material', '**mat'],
    ['short', 'totcol'],
    ['Mesh', '*texcomesh'],
  ],
  Material: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['bNodeTree', '*nodetree'],
  ],
  World: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['bNodeTree', '*nodetree'],
  ],
  Tex: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['Image', '*ima'],
    ['bNodeTree', '*nodetree'],
  ],
  bNodeTree: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['ListBase', 'nodes'],
  ],
  bNode: [
    ['bNode', '*next'],
    ['bNode', '*prev'],
    ['ListBase', 'inputs'],
    ['ID', '*id'],
    ['short', 'type'],
  ],
  bNodeSocket: [
    ['bNodeSocket', '*next'],
    ['bNodeSocket', '*prev'],
    ['void', '*default_value'],
    ['short', 'type'],
  ],
  bNodeSocketValueObject: [['Object', '*value']],
  Collection: [
    ['ID', 'id'],
    ['ListBase', 'gobject'],
    ['ListBase', 'children'],
  ],
  CollectionObject: [
    ['CollectionObject', '*next'],
    ['CollectionObject', '*prev'],
    ['Object', '*ob'],
  ],
  CollectionChild: [
    ['CollectionChild', '*next'],
    ['CollectionChild', '*prev'],
    ['Collection', '*collection'],
  ],
  Base: [
    ['Base', '*next'],
    ['Base', '*prev'],
    ['Object', '*object'],
  ],
  Scene: [
    ['ID', 'id'],
    ['AnimData', '*adt'],
    ['Object', '*camera'],
    ['World', '*world'],
    ['Scene', '*set'],
    ['ListBase', 'base'],
    ['Editing', '*ed'],
    ['Collection', '*master_collection'],
    ['bNodeTree', '*nodetree'],
  ],
  Editing: [['ListBase', 'seqbase']],
  Strip: [
    ['Strip', '*next'],
    ['Strip', '*prev'],
    ['StripData', '*data'],
    ['Scene', '*scene'],
    ['MovieClip', '*clip'],
    ['bSound', '*sound'],
    ['ListBase', 'seqbase'],
    ['int', 'type'],
    ['char', 'name[64]'],
  ],
  StripData: [
    ['StripElem', '*stripdata'],
    ['char', 'dir[768]'],
  ],
  StripElem: [
    ['char', 'name[256]'],
    ['int', 'orig_width'],
  ],
};

export interface SceneBuilderOptions {
  readonly pointerSize?: 4 | 8;
  readonly endianness?: 'little' | 'big';
  /** Three digits for the legacy header, four for the large one. */
  readonly version?: number;
  /** `legacy` writes the 12-byte header, `large` the 17-byte one with 32-byte block headers. */
  readonly header?: 'legacy' | 'large';
  readonly structs?: Readonly<Record<string, StructDefinition>>;
}

export type Compression = 'none' | 'gzip' | 'zstd';

interface LaidOutField {
  readonly type: string;
  readonly name: string;
  readonly isPointer: boolean;
  readonly arrayLength: number;
  readonly elementSize: number;
  readonly offset: number;
}

interface Layout {
  readonly size: number;
  readonly fields: readonly LaidOutField[];
}

/** A block added to a builder. Field values can be changed until the file is written. */
export class BlockHandle {
  readonly elements: FieldValues[];

  constructor(
    readonly address: bigint,
    readonly code: string,
    readonly structName: string | undefined,
    elements: readonly FieldValues[],
    readonly raw?: Buffer,
  ) {
    this.elements = [...elements];
  }

  /** Merges `values` into the given element. */
  set(values: FieldValues, element = 0): this {
    this.elements[element] = { ...this.elements[element], ...values };
    return this;
  }
}

function parseName(raw: string): { name: string; isPointer: boolean; arrayLength: number } {
  const isPointer = raw.startsWith('*') || raw.startsWith('(');
  let arrayLength = 1;
  for (const match of raw.matchAll(/\[(\d+)\]/g)) {
    arrayLength *= Number(match[1]);
  }
  return { name: raw.replace(/^\(?\**/, '').replace(/[[)].*$/, ''), isPointer, arrayLength };
}

function isElementList(values: FieldValues | readonly FieldValues[]): values is readonly FieldValues[] {
  return Array.isArray(values);
}

function isScalarList(value: FieldValue): value is readonly (number | bigint | BlockHandle)[] {
  return Array.isArray(value);
}

function align4(parts: Buffer[]): void {
  const length = parts.reduce((total, part) => total + part.length, 0);
  const padding = (4 - (length % 4)) % 4;
  if (padding > 0) {
    parts.push(Buffer.alloc(padding));
  }
}

/** Wraps `data` in a zstd frame made of raw (stored) blocks. */
export function zstdStoredFrame(data: Buffer): Buffer {
  const maxBlock = 128 * 1024;
  const header = Buffer.alloc(9);
  header.writeUInt32LE(0xfd2fb528, 0);
  // Single segment, four-byte content size, no checksum, no dictionary.
  header.writeUInt8(0xa0, 4);
  header.writeUInt32LE(data.length, 5);
  const parts: Buffer[] = [header];
  let offset = 0;
  do {
    const size = Math.min(maxBlock, data.length - offset);
    const last = offset + size >= data.length ? 1 : 0;
    const blockHeader = Buffer.alloc(3);
    blockHeader.writeUIntLE((size << 3) | last, 0, 3);
    parts.push(blockHeader, data.subarray(offset, offset + size));
    offset += size;
  } while (offset < data.length);
  return Buffer.concat(parts);
}

export class SceneBuilder {
  readonly pointerSize: 4 | 8;
  readonly littleEndian: boolean;
  readonly version: number;
  readonly headerForm: 'legacy' | 'large';
  private readonly structs: Readonly<Record<string, StructDefinition>>;
  private readonly blocks: BlockHandle[] = [];
  private nextAddress = 0x10000n;

  constructor(options: SceneBuilderOptions = {}) {
    this.headerForm = options.header ?? 'legacy';
    this.pointerSize = this.headerForm === 'large' ? 8 : options.pointerSize ?? 8;
    this.littleEndian = (options.endianness ?? 'little') === 'little';
    this.version = options.version ?? (this.headerForm === 'large' ? 500 : 405);
    this.structs = options.structs ?? STANDARD_STRUCTS;
  }

  /** Adds a block of `structName` with one element per entry of `values`. */
  add(code: string, structName: string, values: FieldValues | readonly FieldValues[] = {}): BlockHandle {
    if (!this.structs[structName]) {
      throw new Error(`Unknown struct ${structName}`);
    }
    const elements = isElementList(values) ? values : [values];
    const handle = new BlockHandle(this.allocateAddress(), code, structName, elements);
    this.blocks.push(handle);
    return handle;
  }

  /** Adds an untyped `DATA` block holding an array of pointers. */
  addPointerArray(targets: readonly (BlockHandle | bigint)[]): BlockHandle {
    const raw = Buffer.alloc(Math.max(targets.length, 1) * this.pointerSize);
    targets.forEach((target, index) => this.writePointer(raw, index * this.pointerSize, target));
    const handle = new BlockHandle(this.allocateAddress(), 'DATA', undefined, [], raw);
    this.blocks.push(handle);
    return handle;
  }

  /** Adds the global block carrying the file subversion. */
  addGlobal(subversion: number): BlockHandle {
    return this.add('GLOB', 'FileGlobal', { subversion });
  }

  toBuffer(compression: Compression = 'none'): Buffer {
    const structNames = Object.keys(this.structs);
    const layouts = new Map<string, Layout>();
    for (const name of structNames) {
      this.layout(name, layouts);
    }

    const parts: Buffer[] = [this.fileHeader()];
    for (const block of this.blocks) {
      const payload = block.raw ?? this.payload(block, layouts);
      const sdnaIndex = block.structName === undefined ? 0 : structNames.indexOf(block.structName);
      parts.push(this.blockHeader(block.code, payload.length, block.address, sdnaIndex, block.raw ? 1 : block.elements.length), payload);
    }
    const dna = this.dnaPayload(structNames, layouts);
    parts.push(this.blockHeader('DNA1', dna.length, 0n, 0, 1), dna);
    parts.push(this.blockHeader('ENDB', 0, 0n, 0, 0));

    const plain = Buffer.concat(parts);
    if (compression === 'gzip') {
      return gzipSync(plain);
    }
    if (compression === 'zstd') {
      return zstdStoredFrame(plain);
    }
    return plain;
  }

  async write(filePath: string, compression: Compression = 'none'): Promise<string> {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFile(filePath, this.toBuffer(compression));
    return filePath;
  }

  private allocateAddress(): bigint {
    const address = this.nextAddress;
    this.nextAddress += 0x100n;
    return address;
  }

  private fileHeader(): Buffer {
    const endian = this.littleEndian ? 'v' : 'V';
    if (this.headerForm === 'large') {
      return Buffer.from(`BLENDER17-01${endian}${String(this.version).padStart(4, '0')}`, 'latin1');
    }
    const pointer = this.pointerSize === 4 ? '_' : '-';
    return Buffer.from(`BLENDER${pointer}${endian}${String(this.version).padStart(3, '0')}`, 'latin1');
  }

  private blockHeader(code: string, length: number, address: bigint, sdnaIndex: number, count: number): Buffer {
    const codeBytes = Buffer.alloc(4);
    codeBytes.write(code, 'latin1');
    if (this.headerForm === 'large') {
      const header = Buffer.alloc(32);
      codeBytes.copy(header, 0);
      this.writeInt(header, 4, 4, sdnaIndex);
      this.writeBig(header, 8, address);
      this.writeBig(header, 16, BigInt(length));
      this.writeBig(header, 24, BigInt(count));
      return header;
    }
    const header = Buffer.alloc(16 + this.pointerSize);
    codeBytes.copy(header, 0);
    this.writeInt(header, 4, 4, length);
    this.writePointer(header, 8, address);
    this.writeInt(header, 8 + this.pointerSize, 4, sdnaIndex);
    this.writeInt(header, 12 + this.pointerSize, 4, count);
    return header;
  }

  private layout(structName: string, layouts: Map<string, Layout>): Layout {
    const cached = layouts.get(structName);
    if (cached) {
      return cached;
    }
    const definition = this.structs[structName];
    if (!definition) {
      throw new Error(`Unknown struct ${structName}`);
    }
    const fields: LaidOutField[] = [];
    let offset = 0;
    for (const [type, rawName] of definition) {
      const { name, isPointer, arrayLength } = parseName(rawName);
      const elementSize = isPointer ? this.pointerSize : this.typeSize(type, layouts);
      fields.push({ type, name, isPointer, arrayLength, elementSize, offset });
      offset += elementSize * arrayLength;
    }
    const layout = { size: offset, fields };
    layouts.set(structName, layout);
    return layout;
  }

  private typeSize(type: string, layouts: Map<string, Layout>): number {
    const primitive = PRIMITIVE_SIZES[type];
    return primitive ?? this.layout(type, layouts).size;
  }

  private payload(block: BlockHandle, layouts: Map<string, Layout>): Buffer {
    const layout = this.layout(block.structName ?? '', layouts);
    const buffer = Buffer.alloc(layout.size * block.elements.length);
    block.elements.forEach((values, index) => this.writeStruct(buffer, index * layout.size, layout, values, layouts));
    return buffer;
  }

  private writeStruct(buffer: Buffer, base: number, layout: Layout, values: FieldValues, layouts: Map<string, Layout>): void {
    for (const [name, value] of Object.entries(values)) {
      if (value === undefined) {
        continue;
      }
      const field = layout.fields.find((candidate) => candidate.name === name);
      if (!field) {
        throw new Error(`No field ${name}`);
      }
      this.writeField(buffer, base + field.offset, field, value, layouts);
    }
  }

  private writeField(buffer: Buffer, offset: number, field: LaidOutField, value: FieldValue, layouts: Map<string, Layout>): void {
    if (typeof value === 'string' || Buffer.isBuffer(value)) {
      const bytes = typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
      if (bytes.length >= field.arrayLength) {
        throw new Error(`Value too long for ${field.name}`);
      }
      bytes.copy(buffer, offset);
      return;
    }
    if (typeof value === 'number' || typeof value === 'bigint' || value instanceof BlockHandle) {
      this.writeScalar(buffer, offset, field, value);
      return;
    }
    if (isScalarList(value)) {
      value.forEach((item, index) => this.writeScalar(buffer, offset + index * field.elementSize, field, item));
      return;
    }
    this.writeStruct(buffer, offset, this.layout(field.type, layouts), value, layouts);
  }

  private writeScalar(buffer: Buffer, offset: number, field: LaidOutField, value: number | bigint | BlockHandle): void {
    if (field.isPointer) {
      this.writePointer(buffer, offset, typeof value === 'number' ? BigInt(value) : value);
      return;
    }
    if (typeof value !== 'number') {
      throw new Error(`Field ${field.name} takes a number`);
    }
    if (field.type === 'float') {
      if (this.littleEndian) buffer.writeFloatLE(value, offset);
      else buffer.writeFloatBE(value, offset);
      return;
    }
    if (field.elementSize === 8) {
      this.writeBig(buffer, offset, BigInt(value));
      return;
    }
    this.writeInt(buffer, offset, field.elementSize, value);
  }

  private writeInt(buffer: Buffer, offset: number, size: number, value: number): void {
    if (this.littleEndian) buffer.writeIntLE(value, offset, size);
    else buffer.writeIntBE(value, offset, size);
  }

  private writeBig(buffer: Buffer, offset: number, value: bigint): void {
    if (this.littleEndian) buffer.writeBigUInt64LE(value, offset);
    else buffer.writeBigUInt64BE(value, offset);
  }

  private writePointer(buffer: Buffer, offset: number, target: BlockHandle | bigint): void {
    const address = target instanceof BlockHandle ? target.address : target;
    if (this.pointerSize === 8) {
      this.writeBig(buffer, offset, address);
    } else {
      this.writeInt(buffer, offset, 4, Number(address));
    }
  }

  private dnaPayload(structNames: readonly string[], layouts: Map<string, Layout>): Buffer {
    const names: string[] = [];
    const types: string[] = [...Object.keys(PRIMITIVE_SIZES), ...structNames];
    const nameIndex = (name: string): number => {
      const index = names.indexOf(name);
      if (index >= 0) return index;
      names.push(name);
      return names.length - 1;
    };
    const typeIndex = (type: string): number => {
      const index = types.indexOf(type);
      if (index >= 0) return index;
      types.push(type);
      return types.length - 1;
    };

    const structRecords: number[][] = structNames.map((structName) => {
      const definition = this.structs[structName] ?? [];
      const record = [typeIndex(structName), definition.length];
      for (const [type, rawName] of definition) {
        record.push(typeIndex(type), nameIndex(rawName));
      }
      return record;
    });

    const parts: Buffer[] = [Buffer.from('SDNA', 'latin1')];
    const strings = (tag: string, values: readonly string[]): void => {
      parts.push(Buffer.from(tag, 'latin1'), this.uint32(values.length));
      for (const value of values) {
        parts.push(Buffer.from(`${value}\0`, 'latin1'));
      }
      align4(parts);
    };
    strings('NAME', names);
    strings('TYPE', types);

    parts.push(Buffer.from('TLEN', 'latin1'));
    for (const type of types) {
      const size = PRIMITIVE_SIZES[type] ?? layouts.get(type)?.size ?? 0;
      parts.push(this.uint16(size));
    }
    align4(parts);

    parts.push(Buffer.from('STRC', 'latin1'), this.uint32(structRecords.length));
    for (const record of structRecords) {
      for (const value of record) {
        parts.push(this.uint16(value));
      }
    }
    return Buffer.concat(parts);
  }

  private uint16(value: number): Buffer {
    const buffer = Buffer.alloc(2);
    if (this.littleEndian) buffer.writeUInt16LE(value);
    else buffer.writeUInt16BE(value);
    return buffer;
  }

  private uint32(value: number): Buffer {
    const buffer = Buffer.alloc(4);
    if (this.littleEndian) buffer.writeUInt32LE(value);
    else buffer.writeUInt32BE(value);
    return buffer;
  }
}

/** `id` values of a datablock named `name` with `users` users. */
export function idValues(name: string, users = 1): FieldValues {
  return { name, us: users };
}
