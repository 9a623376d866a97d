import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { atomicWriteFileSync } from '../../engine/utils/atomic-write.js';

describe('atomicWriteFileSync', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'kraken-atomic-'));
  });
  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('creates missing parent directories', () => {
    const target = path.join(tmpDir, 'nested', 'file.json');
    atomicWriteFileSync(target, '{}\n');
    expect(fs.readFileSync(target, 'utf-8')).toBe('{}\n');
  });

  it('replaces existing content', () => {
    const target = path.join(tmpDir, 'file.json');
    fs.writeFileSync(target, 'old');
    atomicWriteFileSync(target, 'new');
    expect(fs.readFileSync(target, 'utf-8')).toBe('new');
    expect(fs.readdirSync(tmpDir)).toEqual(['file.json']);
  });

  it('removes the temp file when the rename fails', () => {
    const target = path.join(tmpDir, 'occupied');
    fs.mkdirSync(path.join(target, 'child'), { recursive: true });
    expect(() => atomicWriteFileSync(target, 'data')).toThrow();
    expect(fs.readdirSync(tmpDir)).toEqual(['occupied']);
  });
});
