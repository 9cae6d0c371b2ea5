import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FilePathSource } from '../../../src/infrastructure/sources/FilePathSource.js';

const TEST_DIR = join(tmpdir(), 'fixedwidth-test-filepathsource');

beforeAll(() => {
  mkdirSync(TEST_DIR, { recursive: true });
});

afterAll(() => {
  rmSync(TEST_DIR, { recursive: true, force: true });
});

function writeTempFile(name: string, content: string | Buffer): string {
  const filePath = join(TEST_DIR, name);
  writeFileSync(filePath, content);
  return filePath;
}

async function collect(source: FilePathSource): Promise<Buffer> {
  const chunks: Uint8Array[] = [];
  for await (const chunk of source.read()) {
    chunks.push(chunk);
  }
  return Buffer.concat(chunks);
}

describe('FilePathSource', () => {
  describe('read()', () => {
    it('should stream the raw bytes of the file', async () => {
      const filePath = writeTempFile('read-basic.dat', '000112345.6\n0002\n');
      const content = await collect(new FilePathSource(filePath));

      expect(content.toString('utf-8')).toBe('000112345.6\n0002\n');
    });

    it('should stream large content in multiple chunks', async () => {
      const content = '0001ACME      000075\n'.repeat(2000);
      const filePath = writeTempFile('read-large.dat', content);

      // Use small highWaterMark to force multiple chunks
      const source = new FilePathSource(filePath, { highWaterMark: 256 });

      let chunkCount = 0;
      const chunks: Uint8Array[] = [];
      for await (const chunk of source.read()) {
        chunkCount++;
        chunks.push(chunk);
      }

      expect(chunkCount).toBeGreaterThan(1);
      expect(Buffer.concat(chunks).toString('utf-8')).toBe(content);
    });

    it('should yield bytes untouched, leaving decoding to the loader', async () => {
      const bytes = Buffer.from([0x41, 0xff, 0x42]);
      const filePath = writeTempFile('read-bytes.dat', bytes);

      expect(await collect(new FilePathSource(filePath))).toEqual(bytes);
    });

    it('should reject when the file does not exist', async () => {
      const source = new FilePathSource(join(TEST_DIR, 'does-not-exist.dat'));
      await expect(collect(source)).rejects.toThrow(/ENOENT/);
    });
  });

  describe('metadata()', () => {
    it('should return the file name', () => {
      const filePath = writeTempFile('meta.dat', 'abc');
      const source = new FilePathSource(filePath);

      expect(source.metadata()).toEqual({ name: 'meta.dat' });
      expect(source.path).toBe(filePath);
    });

    it('should not touch the file system', () => {
      expect(new FilePathSource(join(TEST_DIR, 'absent.dat')).metadata().name).toBe('absent.dat');
    });
  });
});
