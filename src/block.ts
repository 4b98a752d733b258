/**
 * Typed, bounds-checked view over one block (or one element of an array block).
 */
import { StructTable } from './sdna.js';
import { FieldNotFoundError, FieldOutOfBoundsError, FieldOverflowError, StructNotFoundError } from './types/errors.js';
import type { BlockHeader } from './types/scene-header.js';
import type { Field, StructType } from './types/struct-type.js';
import type { SceneFile } from './scene-file.js';

/** A field path, either dotted (`"id.name"`) or pre-split (`["id", "name"]`). */
export type FieldPath = string | readonly string[];

/**
 * Outcome of following a pointer. Null and dangling pointers are values, not
 * exceptions.
 */
export type Dereference =
  | { readonly kind: 'null' }
  | { readonly kind: 'unresolved'; readonly address: bigint }
  | { readonly kind: 'resolved'; readonly block: Block };

interface LocatedField {
  readonly field: Field;
  /** Offset of the field relative to the start of this element. */
  readonly offset: number;
  readonly path: string;
}

const FLOAT_TYPES = new Set(['float', 'double']);

function isUnsignedType(typeName: string): boolean {
  return typeName === 'bool' || typeName.startsWith('u');
}

export function splitFieldPath(path: FieldPath): readonly string[] {
  return typeof path === 'string' ? path.split('.') : path;
}

export class Block {
  constructor(
    readonly file: SceneFile,
    readonly header: BlockHeader,
    readonly dnaType: StructType | undefined,
    readonly elementIndex = 0,
  ) {}

  get code(): string {
    return this.header.code;
  }

  get address(): bigint {
    return this.header.address;
  }

  get count(): number {
    return this.header.count;
  }

  get dnaTypeName(): string {
    return this.dnaType?.name ?? '';
  }

  /** True for datablock records (two-letter codes such as "IM", "OB" or the "ID" placeholder). */
  get isIdBlock(): boolean {
    return this.header.code.length === 2;
  }

  /** The datablock name including its two-letter prefix, e.g. "IMwood.png". */
  get idName(): string | undefined {
    if (this.dnaTypeName === 'ID') {
      return this.getString('name');
    }
    if (this.hasField(['id', 'name'])) {
      return this.getString(['id', 'name']);
    }
    return undefined;
  }

  private get elementOffset(): number {
    const structSize = this.dnaType?.size ?? 0;
    return this.header.dataOffset + this.elementIndex * structSize;
  }

  toString(): string {
    const address = `0x${this.address.toString(16)}`;
    const element = this.elementIndex > 0 ? `[${this.elementIndex}]` : '';
    return `${this.code}(${this.dnaTypeName})@${address}${element}`;
  }

  /**
   * Re-interprets this block as another struct of the same file.
   *
   * @throws {StructNotFoundError} If the struct is absent from this file's table
   */
  refine(structName: string): Block {
    const struct = this.file.structs.byName(structName);
    if (!struct) {
      throw new StructNotFoundError(structName, this.file.filePath);
    }
    return new Block(this.file, this.header, struct, this.elementIndex);
  }

  tryRefine(structName: string): Block | undefined {
    const struct = this.file.structs.byName(structName);
    return struct ? new Block(this.file, this.header, struct, this.elementIndex) : undefined;
  }

  /**
   * View of the `index`-th struct stored in this block.
   */
  element(index: number): Block {
    if (!Number.isInteger(index) || index < 0 || index >= this.header.count) {
      throw new FieldOutOfBoundsError(`Element ${index} out of range for ${this.toString()} with ${this.header.count} elements`);
    }
    return new Block(this.file, this.header, this.dnaType, index);
  }

  *elements(): Generator<Block> {
    for (let index = 0; index < this.header.count; index++) {
      yield this.element(index);
    }
  }

  hasField(path: FieldPath): boolean {
    return this.tryLocate(path) !== undefined;
  }

  fieldInfo(path: FieldPath): Field {
    return this.locate(path).field;
  }

  /**
   * Reads a numeric field. 64-bit integers are converted to `number`.
   */
  getNumber(path: FieldPath, index = 0): number {
    const located = this.locate(path);
    const { field } = located;
    if (field.isPointer) {
      throw new FieldNotFoundError(this.dnaTypeName, `${located.path} (pointer read as number)`);
    }
    const position = this.absoluteOffset(located, index);
    const buffer = this.file.bytes;
    const le = this.file.littleEndian;
    const size = field.elementSize;

    if (FLOAT_TYPES.has(field.typeName)) {
      if (size === 8) return le ? buffer.readDoubleLE(position) : buffer.readDoubleBE(position);
      return le ? buffer.readFloatLE(position) : buffer.readFloatBE(position);
    }
    const unsigned = isUnsignedType(field.typeName);
    switch (size) {
      case 1:
        return unsigned ? buffer.readUInt8(position) : buffer.readInt8(position);
      case 2:
        if (unsigned) return le ? buffer.readUInt16LE(position) : buffer.readUInt16BE(position);
        return le ? buffer.readInt16LE(position) : buffer.readInt16BE(position);
      case 4:
        if (unsigned) return le ? buffer.readUInt32LE(position) : buffer.readUInt32BE(position);
        return le ? buffer.readInt32LE(position) : buffer.readInt32BE(position);
      case 8:
        if (unsigned) return Number(le ? buffer.readBigUInt64LE(position) : buffer.readBigUInt64BE(position));
        return Number(le ? buffer.readBigInt64LE(position) : buffer.readBigInt64BE(position));
      default:
        throw new FieldNotFoundError(this.dnaTypeName, `${located.path} (unsupported numeric size ${size})`);
    }
  }

  /** Reads the raw address stored in a pointer field. */
  getPointer(path: FieldPath, index = 0): bigint {
    const located = this.locate(path);
    if (!located.field.isPointer) {
      throw new FieldNotFoundError(this.dnaTypeName, `${located.path} (not a pointer)`);
    }
    return this.file.readAddress(this.absoluteOffset(located, index));
  }

  /** Raw bytes of a field, untrimmed. */
  getRaw(path: FieldPath): Buffer {
    const located = this.locate(path);
    const position = this.absoluteOffset(located, 0, located.field.size);
    return this.file.bytes.subarray(position, position + located.field.size);
  }

  /** Bytes of a character-array field up to (excluding) the first NUL. */
  getCString(path: FieldPath): Buffer {
    const raw = this.getRaw(path);
    const terminator = raw.indexOf(0);
    return Buffer.from(terminator < 0 ? raw : raw.subarray(0, terminator));
  }

  getString(path: FieldPath): string {
    return this.getCString(path).toString('utf8');
  }

  /** Follows a pointer field. */
  dereference(path: FieldPath, index = 0): Dereference {
    return this.file.dereference(this.getPointer(path, index));
  }

  /**
   * Follows a pointer field and returns the target block, or `undefined` for
   * null, dangling and missing pointers.
   */
  getBlock(path: FieldPath, index = 0): Block | undefined {
    if (!this.hasField(path)) {
      return undefined;
    }
    const target = this.dereference(path, index);
    return target.kind === 'resolved' ? target.block : undefined;
  }

  /**
   * Follows a pointer to an array of `count` pointers (e.g. `**mat`) and
   * dereferences each entry.
   */
  pointerArray(path: FieldPath, count: number): Dereference[] {
    const target = this.dereference(path);
    if (target.kind !== 'resolved') {
      return [];
    }
    const pointerSize = this.file.header.pointerSize;
    const available = Math.floor(target.block.header.length / pointerSize);
    const results: Dereference[] = [];
    for (let i = 0; i < Math.min(count, available); i++) {
      const address = this.file.readAddress(target.block.header.dataOffset + i * pointerSize);
      results.push(this.file.dereference(address));
    }
    return results;
  }

  /**
   * Writes a NUL-terminated value into a character-array field of the
   * in-memory buffer, zero-filling the rest of the field.
   *
   * @returns Number of bytes written including the terminator
   * @throws {FieldOverflowError} If the value does not fit
   */
  set(path: FieldPath, value: Buffer | string): number {
    const located = this.locate(path);
    const { field } = located;
    if (field.isPointer) {
      throw new FieldNotFoundError(this.dnaTypeName, `${located.path} (cannot write a path into a pointer)`);
    }
    const data = typeof value === 'string' ? Buffer.from(value, 'utf8') : value;
    if (data.length + 1 > field.size) {
      throw new FieldOverflowError(located.path, field.size, data.length);
    }
    const position = this.absoluteOffset(located, 0, field.size);
    const patch = Buffer.alloc(field.size);
    data.copy(patch, 0);
    this.file.patch(position, patch);
    return data.length + 1;
  }

  private absoluteOffset(located: LocatedField, index: number, length = located.field.elementSize): number {
    if (!Number.isInteger(index) || index < 0 || index >= located.field.arrayLength) {
      throw new FieldOutOfBoundsError(`Index ${index} out of range for field "${located.path}" of ${this.toString()}`);
    }
    const position = this.elementOffset + located.offset + index * located.field.elementSize;
    const payloadEnd = this.header.dataOffset + this.header.length;
    if (position + length > payloadEnd) {
      throw new FieldOutOfBoundsError(
        `Field "${located.path}" of ${this.toString()} ends at ${position + length - this.header.dataOffset}, past the ${this.header.length}-byte payload`,
      );
    }
    return position;
  }

  private locate(path: FieldPath): LocatedField {
    const located = this.tryLocate(path);
    if (!located) {
      throw new FieldNotFoundError(this.dnaTypeName || '<untyped>', splitFieldPath(path).join('.'));
    }
    return located;
  }

  private tryLocate(path: FieldPath): LocatedField | undefined {
    const segments = splitFieldPath(path);
    let struct = this.dnaType;
    let offset = 0;
    let field: Field | undefined;

    for (let i = 0; i < segments.length; i++) {
      if (!struct) {
        return undefined;
      }
      const segment = segments[i];
      field = segment === undefined ? undefined : StructTable.field(struct, segment);
      if (!field) {
        return undefined;
      }
      offset += field.offset;
      if (i < segments.length - 1) {
        if (field.isPointer) {
          return undefined;
        }
        struct = this.file.structs.byName(field.typeName);
      }
    }

    return field ? { field, offset, path: segments.join('.') } : undefined;
  }
}
