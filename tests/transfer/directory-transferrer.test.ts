import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DirectoryTransferrer } from '../../src/transfer/directory-transferrer.js';
import { makeTempDir, removeDir, writeFiles } from '../fixtures/files.js';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeDir(dir);
});

describe('DirectoryTransferrer', () => {
  it('copies files and writes buffers below its root', async () => {
    await writeFiles(dir, { 'src/wood.png': 'wood' });
    const transferrer = new DirectoryTransferrer(join(dir, 'out'));

    const size = await transferrer.writeFile(join(dir, 'src', 'wood.png'), 'textures/deep/wood.png');
    await transferrer.writeBuffer(Buffer.from('info'), 'pack-info.txt');
    await transferrer.finish();

    expect(size).toBe(4);
    expect(await readFile(join(dir, 'out', 'textures', 'deep', 'wood.png'), 'utf8')).toBe('wood');
    expect(await readFile(join(dir, 'out', 'pack-info.txt'), 'utf8')).toBe('info');
  });

  it('refuses writes once closed', async () => {
    const root = join(dir, 'out');
    const transferrer = new DirectoryTransferrer(root);
    await transferrer.abort();

    await expect(transferrer.writeBuffer(Buffer.from('x'), 'a.txt')).rejects.toThrow(`Pack ${root} is closed; cannot write a.txt`);
  });
});
