/**
 * Structure-type table ("DNA") parsing.
 *
 * Every scene file carries a description of the structs it was written with.
 * Layouts differ between application versions, so all typed access goes
 * through the table of the file being read.
 */
import { BinaryCursor } from './utils/binary-cursor.js';
import { SceneBinaryError } from './types/errors.js';
import type { Field, StructType } from './types/struct-type.js';

interface ParsedFieldName {
  readonly name: string;
  readonly isPointer: boolean;
  readonly arrayLength: number;
}

/**
 * Splits a raw table field name such as `*next`, `name[64]`, `mat[4][4]` or
 * `(*callback)()` into its bare name, pointer flag and array length.
 */
export function parseFieldName(raw: string): ParsedFieldName {
  const isPointer = raw.startsWith('*') || raw.startsWith('(');
  let arrayLength = 1;
  for (const match of raw.matchAll(/\[(\d+)\]/g)) {
    arrayLength *= Number.parseInt(match[1] ?? '1', 10);
  }
  const name = raw.replace(/^\(?\**/, '').replace(/[[)].*$/, '');
  return { name, isPointer, arrayLength };
}

function expectTag(cursor: BinaryCursor, tag: string): void {
  const found = cursor.readAscii(4);
  if (found !== tag) {
    throw new SceneBinaryError(`Malformed structure table: expected "${tag}" at offset ${cursor.position - 4}, found "${found}"`);
  }
}

function readStrings(cursor: BinaryCursor, tag: string): string[] {
  expectTag(cursor, tag);
  const count = cursor.readUint32();
  const values: string[] = [];
  for (let i = 0; i < count; i++) {
    values.push(cursor.readCString());
  }
  cursor.align(4);
  return values;
}

/**
 * Immutable, per-file table of struct layouts.
 */
export class StructTable {
  private readonly byNameMap: Map<string, StructType>;

  constructor(readonly structs: readonly StructType[]) {
    this.byNameMap = new Map(structs.map((struct) => [struct.name, struct]));
  }

  byIndex(index: number): StructType | undefined {
    return this.structs[index];
  }

  byName(name: string): StructType | undefined {
    return this.byNameMap.get(name);
  }

  has(name: string): boolean {
    return this.byNameMap.has(name);
  }

  /** Looks up a direct field of a struct by bare name. */
  static field(struct: StructType, name: string): Field | undefined {
    return struct.fields.find((field) => field.name === name);
  }
}

/**
 * Parses the payload of a `DNA1` block.
 *
 * @param payload - Block payload starting with the `SDNA` tag
 * @param littleEndian - Byte order of the owning file
 * @param pointerSize - Pointer width of the owning file, used for pointer field sizes
 * @throws {SceneBinaryError} If the table is truncated or inconsistent
 */
export function parseStructTable(payload: Buffer, littleEndian: boolean, pointerSize: number): StructTable {
  const cursor = new BinaryCursor(payload, littleEndian);
  expectTag(cursor, 'SDNA');
  const names = readStrings(cursor, 'NAME');
  const types = readStrings(cursor, 'TYPE');

  expectTag(cursor, 'TLEN');
  const typeLengths: number[] = [];
  for (let i = 0; i < types.length; i++) {
    typeLengths.push(cursor.readUint16());
  }
  cursor.align(4);

  expectTag(cursor, 'STRC');
  const structCount = cursor.readUint32();
  const structs: StructType[] = [];
  for (let index = 0; index < structCount; index++) {
    const typeIndex = cursor.readUint16();
    const fieldCount = cursor.readUint16();
    const structName = types[typeIndex];
    const structSize = typeLengths[typeIndex];
    if (structName === undefined || structSize === undefined) {
      throw new SceneBinaryError(`Malformed structure table: struct ${index} refers to unknown type ${typeIndex}`);
    }

    const fields: Field[] = [];
    let offset = 0;
    for (let f = 0; f < fieldCount; f++) {
      const fieldTypeIndex = cursor.readUint16();
      const nameIndex = cursor.readUint16();
      const typeName = types[fieldTypeIndex];
      const typeLength = typeLengths[fieldTypeIndex];
      const rawName = names[nameIndex];
      if (typeName === undefined || typeLength === undefined || rawName === undefined) {
        throw new SceneBinaryError(`Malformed structure table: field ${f} of "${structName}" refers to unknown type or name`);
      }
      const parsed = parseFieldName(rawName);
      const elementSize = parsed.isPointer ? pointerSize : typeLength;
      const size = elementSize * parsed.arrayLength;
      fields.push({ name: parsed.name, typeName, isPointer: parsed.isPointer, arrayLength: parsed.arrayLength, offset, size, elementSize });
      offset += size;
    }

    structs.push({ index, name: structName, size: structSize, fields });
  }

  return new StructTable(structs);
}
