import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { IngestError } from '@/lib/errors';
import { hashFile } from './content-hash';

describe('hashFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'content-hash-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('returns the hex SHA-256 of the file bytes', async () => {
    const filePath = path.join(dir, 'abc.m4a');
    await fs.writeFile(filePath, 'abc');

    expect(await hashFile(filePath)).toBe('ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad');
  });

  it('gives byte-identical files the same fingerprint regardless of name', async () => {
    const bytes = Buffer.from([0, 1, 2, 3, 255, 254]);
    await fs.writeFile(path.join(dir, 'one.m4a'), bytes);
    await fs.writeFile(path.join(dir, 'two.m4a'), bytes);

    expect(await hashFile(path.join(dir, 'one.m4a'))).toBe(await hashFile(path.join(dir, 'two.m4a')));
  });

  it('gives different files different fingerprints', async () => {
    const contents = ['memo one', 'memo two', 'memo one ', ''];
    const fingerprints = await Promise.all(
      contents.map(async (content, i) => {
        const filePath = path.join(dir, `${i}.m4a`);
        await fs.writeFile(filePath, content);
        return hashFile(filePath);
      })
    );

    expect(new Set(fingerprints).size).toBe(contents.length);
  });

  it('fails with a hashing error when the file cannot be read', async () => {
    const missing = path.join(dir, 'missing.m4a');

    const error = await hashFile(missing).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(IngestError);
    expect(error).toMatchObject({ kind: 'hashing', filePath: missing });
  });
});
