import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { buildFilename, normalizeQuery, writeAsset } from '../src/download/assetWriter';

describe('asset naming', () => {
  it('should lowercase the query and replace spaces', () => {
    expect(normalizeQuery('Red Panda Cub')).toBe('red_panda_cub');
  });

  it('should always use the jpg extension', () => {
    expect(buildFilename('Red Panda', 7)).toBe('red_panda_7.jpg');
  });
});

describe('writeAsset', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'asset-writer-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  it('should create the folder and write the bytes', async () => {
    const target = path.join(dir, 'nested', 'otter');

    const filePath = await writeAsset(target, 'otter_1.jpg', Buffer.from([1, 2, 3]));

    expect(filePath).toBe(path.join(target, 'otter_1.jpg'));
    expect([...(await fs.readFile(filePath))]).toEqual([1, 2, 3]);
  });

  it('should fail when nothing was written', async () => {
    await expect(writeAsset(dir, 'empty.jpg', Buffer.alloc(0))).rejects.toThrow('Failed to save file: empty.jpg');
  });
});
