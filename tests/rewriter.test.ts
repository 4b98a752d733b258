import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { BlendPath } from '../src/blend-path.js';
import { applyRewrites, rewriteSceneFile } from '../src/rewriter.js';
import { SceneBinary } from '../src/scene-binary.js';
import { PackError } from '../src/types/errors.js';
import type { FieldRewrite } from '../src/types/pack-plan.js';
import { SceneBuilder, idValues } from './fixtures/scene-builder.js';
import { findBlock, makeTempDir, removeDir } from './fixtures/files.js';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

function imageRewrite(address: bigint, from: string, to: string, asset = `/assets${to.slice(1)}`): FieldRewrite {
  return {
    asset,
    location: { blockAddress: address, structName: 'Image', elementIndex: 0, field: ['filepath'] },
    oldValue: new BlendPath(from),
    newValue: new BlendPath(to),
  };
}

function twoImages(): { builder: SceneBuilder; wood: bigint; env: bigint } {
  const builder = new SceneBuilder();
  const wood = builder.add('IM', 'Image', { id: idValues('IMwood.png'), filepath: '//textures/wood.png', source: 1 });
  const env = builder.add('IM', 'Image', { id: idValues('IMenv.hdr'), filepath: '/other/env.hdr', source: 1 });
  return { builder, wood: wood.address, env: env.address };
}

describe('applyRewrites', () => {
  it('patches each addressed field and counts them', () => {
    const { builder, wood, env } = twoImages();
    const file = SceneBinary.parse({ buffer: builder.toBuffer(), filePath: '/proj/scene.blend' });

    const outcome = applyRewrites(file, [
      imageRewrite(wood, '//textures/wood.png', '//maps/wood.png'),
      imageRewrite(env, '/other/env.hdr', '//_outside/other-0123456789/env.hdr'),
    ]);

    expect(outcome.patched).toBe(2);
    expect(outcome.rejected.size).toBe(0);
    expect(findBlock(file, 'IMwood.png').getString('filepath')).toBe('//maps/wood.png');
    expect(findBlock(file, 'IMenv.hdr').getString('filepath')).toBe('//_outside/other-0123456789/env.hdr');
  });

  it('rejects a location with no block behind it', () => {
    const { builder } = twoImages();
    const file = SceneBinary.parse({ buffer: builder.toBuffer(), filePath: '/proj/scene.blend' });

    expect(() => applyRewrites(file, [imageRewrite(0x999000n, '//a.png', '//b.png')])).toThrow(PackError);
    expect(() => applyRewrites(file, [imageRewrite(0x999000n, '//a.png', '//b.png')])).toThrow(
      'No block at Image@0x999000[0].filepath in /proj/scene.blend',
    );
  });

  it('leaves an asset alone when one of its paths does not fit and patches the others', () => {
    const { builder, wood, env } = twoImages();
    const file = SceneBinary.parse({ buffer: builder.toBuffer(), filePath: '/proj/scene.blend' });
    const long = `//${'x'.repeat(1100)}`;

    const outcome = applyRewrites(file, [
      imageRewrite(wood, '//textures/wood.png', long, '/proj/textures/wood.png'),
      imageRewrite(env, '/other/env.hdr', '//_outside/other-0123456789/env.hdr', '/other/env.hdr'),
    ]);

    expect(outcome.patched).toBe(1);
    expect([...outcome.rejected]).toEqual([
      ['/proj/textures/wood.png', `Path "${long}" is too long for Image@0x${wood.toString(16)}[0].filepath (1102 bytes, room for 1023)`],
    ]);
    expect(findBlock(file, 'IMwood.png').getString('filepath')).toBe('//textures/wood.png');
    expect(findBlock(file, 'IMenv.hdr').getString('filepath')).toBe('//_outside/other-0123456789/env.hdr');
  });

  it('skips every field of a rejected asset, including ones that would fit', () => {
    const { builder, wood, env } = twoImages();
    const file = SceneBinary.parse({ buffer: builder.toBuffer(), filePath: '/proj/scene.blend' });

    const outcome = applyRewrites(file, [
      imageRewrite(wood, '//textures/wood.png', '//maps/wood.png', '/proj/shared.png'),
      imageRewrite(env, '/other/env.hdr', `//${'y'.repeat(1030)}`, '/proj/shared.png'),
    ]);

    expect(outcome.patched).toBe(0);
    expect([...outcome.rejected.keys()]).toEqual(['/proj/shared.png']);
    expect(findBlock(file, 'IMwood.png').getString('filepath')).toBe('//textures/wood.png');
  });
});

describe('rewriteSceneFile', () => {
  it('returns patched contents in the original container and leaves the file alone', async () => {
    const { builder, wood } = twoImages();
    const scene = await builder.write(join(dir, 'scene.blend'), 'gzip');
    const before = await readFile(scene);

    const { data: patched, rejected } = await rewriteSceneFile(scene, [imageRewrite(wood, '//textures/wood.png', '//maps/wood.png')]);

    expect(rejected.size).toBe(0);
    expect(patched.subarray(0, 2).equals(Buffer.from([0x1f, 0x8b]))).toBe(true);
    const reread = SceneBinary.parse({ buffer: patched, filePath: scene });
    expect(reread.compression).toBe('gzip');
    expect(findBlock(reread, 'IMwood.png').getString('filepath')).toBe('//maps/wood.png');
    expect((await readFile(scene)).equals(before)).toBe(true);
  });
});
