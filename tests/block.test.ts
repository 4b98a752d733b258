import { describe, expect, it } from 'vitest';
import { SceneBinary } from '../src/scene-binary.js';
import { FieldNotFoundError, FieldOutOfBoundsError, FieldOverflowError, StructNotFoundError } from '../src/types/errors.js';
import { SceneBuilder, idValues } from './fixtures/scene-builder.js';
import { blockAt, findBlock } from './fixtures/files.js';

function objectScene() {
  const builder = new SceneBuilder();
  const mesh = builder.add('ME', 'Mesh', { id: idValues('MECube') });
  const wood = builder.add('MA', 'Material', { id: idValues('MAWood') });
  const metal = builder.add('MA', 'Material', { id: idValues('MAMetal') });
  const materials = builder.addPointerArray([wood, metal]);
  const object = builder.add('OB', 'Object', { id: idValues('OBCube'), data: mesh, mat: materials, totcol: 2 });
  const frames = builder.add('DATA', 'StripElem', [{ name: 'f_0001.png' }, { name: 'f_0002.png' }, { name: 'f_0003.png' }]);
  const image = builder.add('IM', 'Image', { id: idValues('IMwood.png'), filepath: '//textures/wood.png' });
  const file = SceneBinary.parse({ buffer: builder.toBuffer(), filePath: '/proj/scene.blend' });
  return { file, handles: { mesh, wood, metal, materials, object, frames, image } };
}

describe('Block', () => {
  it('follows pointers to the blocks written at their address', () => {
    const { file, handles } = objectScene();
    const object = findBlock(file, 'OBCube');

    const data = object.dereference('data');
    expect(data.kind).toBe('resolved');
    expect(object.getBlock('data')?.address).toBe(handles.mesh.address);
    expect(object.getBlock('data')?.idName).toBe('MECube');
  });

  it('reports null pointers as values', () => {
    const { file } = objectScene();
    expect(findBlock(file, 'OBCube').dereference('adt')).toEqual({ kind: 'null' });
  });

  it('reports dangling pointers as unresolved and records them on the file', () => {
    const builder = new SceneBuilder();
    builder.add('OB', 'Object', { id: idValues('OBCube'), data: 0xdead00n });
    const file = SceneBinary.parse({ buffer: builder.toBuffer(), filePath: '/proj/scene.blend' });
    const object = findBlock(file, 'OBCube');

    expect(object.dereference('data')).toEqual({ kind: 'unresolved', address: 0xdead00n });
    expect(object.getBlock('data')).toBeUndefined();
    expect(file.unresolvedAddresses.has(0xdead00n)).toBe(true);
  });

  it('dereferences pointer arrays up to the stored count', () => {
    const { file, handles } = objectScene();
    const materials = findBlock(file, 'OBCube').pointerArray('mat', 2);

    expect(materials.map((target) => (target.kind === 'resolved' ? target.block.idName : target.kind))).toEqual(['MAWood', 'MAMetal']);
    expect(findBlock(file, 'OBCube').pointerArray('mat', 5)).toHaveLength(2);
    expect(blockAt(file, handles.materials.address).code).toBe('DATA');
  });

  it('refines a block to another struct of the same file', () => {
    const { file } = objectScene();
    const object = findBlock(file, 'OBCube');

    expect(object.refine('Mesh').dnaTypeName).toBe('Mesh');
    expect(() => object.refine('NoSuchStruct')).toThrow(StructNotFoundError);
    expect(object.tryRefine('NoSuchStruct')).toBeUndefined();
  });

  it('rejects unknown fields', () => {
    const { file } = objectScene();
    expect(() => findBlock(file, 'OBCube').getNumber('nonexistent')).toThrow(FieldNotFoundError);
    expect(findBlock(file, 'OBCube').hasField(['id', 'name'])).toBe(true);
    expect(findBlock(file, 'OBCube').hasField(['data', 'name'])).toBe(false);
  });

  it('rejects reads past the end of the payload', () => {
    const { file, handles } = objectScene();
    const single = new SceneBuilder();
    const target = single.add('MA', 'Material', { id: idValues('MAOnly') });
    single.addPointerArray([target]);
    const small = SceneBinary.parse({ buffer: single.toBuffer(), filePath: '/proj/small.blend' });
    const array = blockAt(small, target.address + 0x100n);

    // Untyped data blocks are read through the first struct of the table.
    expect(array.dnaTypeName).toBe('Link');
    expect(array.getPointer('next')).toBe(target.address);
    expect(() => array.getPointer('prev')).toThrow(FieldOutOfBoundsError);
    expect(blockAt(file, handles.materials.address).getPointer('prev')).toBe(handles.metal.address);
  });

  it('addresses the elements of array blocks', () => {
    const { file, handles } = objectScene();
    const frames = blockAt(file, handles.frames.address);

    expect(frames.count).toBe(3);
    expect(frames.element(2).getString('name')).toBe('f_0003.png');
    expect([...frames.elements()].map((element) => element.getString('name'))).toEqual(['f_0001.png', 'f_0002.png', 'f_0003.png']);
    expect(() => frames.element(3)).toThrow(FieldOutOfBoundsError);
  });

  it('patches only the bytes of the written field', () => {
    const { file, handles } = objectScene();
    const image = blockAt(file, handles.image.address);
    const original = Buffer.from(file.bytes);
    const start = image.header.dataOffset + image.fieldInfo('filepath').offset;
    const end = start + image.fieldInfo('filepath').size;

    expect(image.set('filepath', '//maps/oak.png')).toBe(15);
    expect(image.getString('filepath')).toBe('//maps/oak.png');
    expect(file.isModified).toBe(true);
    expect(file.bytes.subarray(0, start).equals(original.subarray(0, start))).toBe(true);
    expect(file.bytes.subarray(end).equals(original.subarray(end))).toBe(true);
  });

  it('zero-fills the remainder when a shorter value is written', () => {
    const { file, handles } = objectScene();
    const image = blockAt(file, handles.image.address);
    image.set('filepath', '//a.png');
    const raw = image.getRaw('filepath');

    expect(raw.subarray(0, 7).toString('utf8')).toBe('//a.png');
    expect(raw.subarray(7).every((byte) => byte === 0)).toBe(true);
  });

  it('refuses values that do not fit with their terminator', () => {
    const { file, handles } = objectScene();
    const image = blockAt(file, handles.image.address);

    expect(() => image.set('filepath', 'x'.repeat(1024))).toThrow(FieldOverflowError);
    expect(image.set('filepath', 'x'.repeat(1023))).toBe(1024);
    expect(() => image.set('packedfile', '//x')).toThrow(FieldNotFoundError);
  });
});
