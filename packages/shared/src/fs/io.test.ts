import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { remove } from 'fs-extra';
import { atomicWrite, fileExists } from './io';

describe('io', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cartwright-io-'));
  });

  afterEach(async () => {
    await remove(tmpDir);
  });

  it('atomicWrite creates missing parent directories', async () => {
    const target = path.join(tmpDir, 'Carthage', 'nested', 'file.txt');
    await atomicWrite(target, 'hello\n');
    expect(await fs.readFile(target, 'utf8')).toBe('hello\n');
  });

  it('atomicWrite overwrites an existing file', async () => {
    const target = path.join(tmpDir, 'file.txt');
    await fs.writeFile(target, 'old');
    await atomicWrite(target, 'new');
    expect(await fs.readFile(target, 'utf8')).toBe('new');
    expect(await fs.readdir(tmpDir)).toEqual(['file.txt']);
  });

  it('fileExists reports presence', async () => {
    const target = path.join(tmpDir, 'Cartfile');
    expect(await fileExists(target)).toBe(false);
    await fs.writeFile(target, '');
    expect(await fileExists(target)).toBe(true);
  });
});
