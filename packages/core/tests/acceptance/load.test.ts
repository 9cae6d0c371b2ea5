import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import { writeFileSync, mkdirSync, rmSync, readdirSync } from 'node:fs';
import { Readable } from 'node:stream';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { tryLoad, load, loadLines } from '../../src/load.js';
import { FixedWidthReader } from '../../src/FixedWidthReader.js';
import { BufferSource } from '../../src/infrastructure/sources/BufferSource.js';
import { StreamSource } from '../../src/infrastructure/sources/StreamSource.js';
import { FilePathSource } from '../../src/infrastructure/sources/FilePathSource.js';
import { LoadError, ConfigurationError } from '../../src/domain/errors/FixedWidthError.js';
import { decimal, integer } from '../../src/domain/processors/numeric.js';
import type { FieldSpec } from '../../src/domain/model/FieldDef.js';
import type { DomainEvent } from '../../src/domain/events/DomainEvents.js';
import type { EmptyLinePolicy } from '../../src/domain/model/LoadOptions.js';

const TEST_DIR = join(tmpdir(), 'fixedwidth-test-load');

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

const ID_AMOUNT: FieldSpec[] = [
  { name: 'id', start: 0, length: 4 },
  { name: 'amount', start: 4, length: 6 },
];

describe('tryLoad', () => {
  it('should slice each line into its fields', async () => {
    const path = writeTempFile('basic.dat', '000112345.6\n');
    const result = await tryLoad(ID_AMOUNT, path, { emptyLines: 'skip' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.records.map((r) => r.toObject())).toEqual([{ id: '0001', amount: '12345.' }]);
    expect(result.data.warnings).toEqual([]);
  });

  it('should keep loading past a truncated field and report it', async () => {
    const path = writeTempFile('truncated.dat', '000112345.6\n0002\n');
    const result = await tryLoad(ID_AMOUNT, path, { emptyLines: 'skip' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.records.map((r) => r.toObject())).toEqual([
      { id: '0001', amount: '12345.' },
      { id: '0002', amount: '' },
    ]);
    expect(result.data.warnings).toEqual([
      {
        line: 2,
        field: 'amount',
        code: 'TRUNCATED_FIELD',
        message: "Field 'amount' truncated/missing on line 2",
      },
    ]);
  });

  it('should resolve to an IO error for a path that cannot be read', async () => {
    const result = await tryLoad(ID_AMOUNT, join(TEST_DIR, 'missing.dat'), { emptyLines: 'skip' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(LoadError);
    expect(result.error.code).toBe('IO');
    expect(result.error.message).toMatch(/^Cannot read source 'missing\.dat': ENOENT/);
  });

  it('should resolve to INVALID_DEFINITIONS for a bad field definition', async () => {
    const result = await tryLoad(
      [
        { name: 'id', start: 0, length: 4 },
        { name: 'amount', start: 4, length: 0 },
      ],
      new BufferSource('0001\n'),
      { emptyLines: 'skip' },
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('INVALID_DEFINITIONS');
    expect(result.error.message).toBe("Invalid field definitions: Field 'amount': length must be an integer > 0 (got 0)");
    expect(result.error.details).toEqual({ field: 'amount' });
  });

  it('should resolve to INVALID_DEFINITIONS for duplicate names', async () => {
    const result = await tryLoad(
      [
        { name: 'id', start: 0, length: 4 },
        { name: 'id', start: 4, length: 2 },
      ],
      new BufferSource('000112\n'),
      { emptyLines: 'skip' },
    );

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('INVALID_DEFINITIONS');
  });

  it('should resolve to DECODE for content that is not text', async () => {
    const result = await tryLoad(ID_AMOUNT, new BufferSource(Buffer.from([0x30, 0x30, 0xfe, 0x0a])), {
      emptyLines: 'skip',
    });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DECODE');
  });

  it('should reject invalid options with ConfigurationError', async () => {
    await expect(tryLoad(ID_AMOUNT, new BufferSource(''), { emptyLines: 'skip', minLineLength: -1 })).rejects.toThrow(
      ConfigurationError,
    );
  });

  it('should return an empty data file for an empty source', async () => {
    const result = await tryLoad(ID_AMOUNT, new BufferSource(''), { emptyLines: 'record' });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.records).toEqual([]);
    expect(result.data.warnings).toEqual([]);
    expect(result.data.linesRead).toBe(0);
  });

  it('should run processors and keep typed values', async () => {
    const result = await tryLoad(
      [
        { name: 'id', start: 0, length: 4, processor: integer() },
        { name: 'amount', start: 4, length: 6, processor: decimal({ impliedDecimals: 2 }) },
      ],
      new BufferSource('0001001250\n0002  abc \n'),
      { emptyLines: 'skip' },
    );

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.data.records.map((r) => r.toObject())).toEqual([
      { id: 1, amount: 12.5 },
      { id: 2, amount: '' },
    ]);
    expect(result.data.warnings).toEqual([
      { line: 2, field: 'amount', code: 'FIELD_REJECTED', message: "Value 'abc' is not a number" },
    ]);
  });
});

describe('load', () => {
  it('should resolve to the data file', async () => {
    const data = await load(ID_AMOUNT, new BufferSource('000112345.6'), { emptyLines: 'skip' });
    expect(data.records[0]?.get('amount')).toBe('12345.');
  });

  it('should reject with the LoadError', async () => {
    await expect(load(ID_AMOUNT, join(TEST_DIR, 'missing.dat'), { emptyLines: 'skip' })).rejects.toMatchObject({
      code: 'IO',
    });
  });
});

describe('loadLines', () => {
  it('should process in-memory lines synchronously', () => {
    const data = loadLines(ID_AMOUNT, ['000112345.6', '', '0002'], { emptyLines: 'record' });

    expect(data.records.map((r) => r.line)).toEqual([1, 2, 3]);
    expect(data.records[1]?.toObject()).toEqual({ id: '', amount: '' });
    expect(data.warnings.map((w) => w.code)).toEqual(['EMPTY_LINE', 'TRUNCATED_FIELD']);
  });

  it('should throw INVALID_DEFINITIONS for a bad definition set', () => {
    expect(() => loadLines([{ name: 'id', start: -1, length: 4 }], ['0001'], { emptyLines: 'skip' })).toThrow(
      "Invalid field definitions: Field 'id': start must be an integer >= 0 (got -1)",
    );
  });
});

describe('FixedWidthReader', () => {
  it('should load every generated line and field exactly', async () => {
    const fieldCount = 7;
    const lineCount = 250;
    const fields: FieldSpec[] = Array.from({ length: fieldCount }, (_, i) => ({
      name: `f${i}`,
      start: i * 5,
      length: 5,
    }));
    const expected = Array.from({ length: lineCount }, (_, line) =>
      Object.fromEntries(fields.map((f, i) => [f.name, `${line}`.padStart(3, '0') + `-${i}`])),
    );
    const text = expected.map((row) => Object.values(row).join('')).join('\n');

    const data = await new FixedWidthReader({ fields, emptyLines: 'skip' }).load(new BufferSource(text));

    expect(data.records.map((r) => r.toObject())).toEqual(expected);
    expect(data.warnings).toEqual([]);
    expect(data.linesRead).toBe(lineCount);
  });

  it('should read a wide record with many columns of mixed widths', () => {
    const widths = [2, 8, 1, 10, 3, 6, 4, 12, 1, 5, 7, 2, 9, 3, 8, 1, 4, 6, 2, 10, 5];
    let start = 0;
    const fields: FieldSpec[] = widths.map((length, i) => {
      const field = { name: `col${String(i + 1).padStart(2, '0')}`, start, length };
      start += length;
      return field;
    });
    const values = widths.map((length, i) => String.fromCharCode(65 + i).repeat(length));

    const data = new FixedWidthReader({ fields, emptyLines: 'skip' }).loadLines([values.join('')]);

    expect(data.fields.size).toBe(21);
    expect(data.records[0]?.pick(data.fields.names)).toEqual(values);
    expect(data.records[0]?.get('col21')).toBe('UUUUU');
  });

  it('should emit lifecycle events in order', async () => {
    const events: DomainEvent[] = [];
    const reader = new FixedWidthReader({ fields: ID_AMOUNT, emptyLines: 'skip' }).onAny((e) => events.push(e));

    await reader.load(new BufferSource('000112345.6\n0002\n', { name: 'events.dat' }));

    expect(events.map((e) => e.type)).toEqual(['load:started', 'load:warning', 'load:completed']);
    expect(events[0]).toMatchObject({ type: 'load:started', source: 'events.dat', fieldCount: 2 });
    expect(events[2]).toMatchObject({ recordCount: 2, warningCount: 1, linesRead: 2, skippedLines: 0 });
    expect(new Set(events.map((e) => e.loadId)).size).toBe(1);
  });

  it('should emit load:failed when the source cannot be decoded', async () => {
    const failures: string[] = [];
    const reader = new FixedWidthReader({ fields: ID_AMOUNT, emptyLines: 'skip' }).on('load:failed', (e) =>
      failures.push(e.code),
    );

    const result = await reader.tryLoad(new BufferSource(Buffer.from([0x30, 0x00, 0x31])));

    expect(result.ok).toBe(false);
    expect(failures).toEqual(['DECODE']);
  });

  it('should map a failing stream to an IO error', async () => {
    async function* failing(): AsyncIterable<string> {
      yield '000112345.6\n';
      await Promise.resolve();
      throw new Error('connection reset');
    }

    const reader = new FixedWidthReader({ fields: ID_AMOUNT, emptyLines: 'skip' });
    const result = await reader.tryLoad(new StreamSource(failing(), { name: 'remote.dat' }));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('IO');
    expect(result.error.message).toBe("Cannot read source 'remote.dat': connection reset");
  });

  it('should serve concurrent loads without mixing their results', async () => {
    const reader = new FixedWidthReader({ fields: [{ name: 'id', start: 0, length: 4 }], emptyLines: 'skip' });
    const loadIds = new Set<string>();
    reader.on('load:started', (e) => loadIds.add(e.loadId));

    const [a, b] = await Promise.all([
      reader.load(new BufferSource(['A001', 'A002', 'A003'].join('\n'))),
      reader.load(new BufferSource(['B001', '', 'B002'].join('\n'))),
    ]);

    expect(a.records.map((r) => r.get('id'))).toEqual(['A001', 'A002', 'A003']);
    expect(b.records.map((r) => r.get('id'))).toEqual(['B001', 'B002']);
    expect(b.skippedLines).toBe(1);
    expect(loadIds.size).toBe(2);
  });

  it('should reject an unknown empty-line policy at construction', () => {
    const emptyLines: EmptyLinePolicy = JSON.parse('"drop"');
    expect(() => new FixedWidthReader({ fields: ID_AMOUNT, emptyLines })).toThrow(
      "emptyLines must be 'skip' or 'record' (got drop)",
    );
  });
});

describe('source release', () => {
  const GOOD_LINE = Buffer.from('000112345.6\n');

  it('should destroy the source stream when decoding fails part-way', async () => {
    const stream = Readable.from([GOOD_LINE, GOOD_LINE, GOOD_LINE, Buffer.from([0x30, 0xff, 0x0a]), GOOD_LINE, GOOD_LINE]);
    const reader = new FixedWidthReader({ fields: ID_AMOUNT, emptyLines: 'skip' });

    const result = await reader.tryLoad(new StreamSource(stream));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DECODE');
    expect(stream.destroyed).toBe(true);
  });

  it.skipIf(process.platform !== 'linux')('should close the file when decoding fails part-way', async () => {
    const lines = Buffer.concat(Array.from({ length: 10 }, () => GOOD_LINE));
    const path = writeTempFile('bad-byte.dat', Buffer.concat([lines, Buffer.from([0xff]), lines]));
    const openFiles = (): number => readdirSync('/proc/self/fd').length;
    const before = openFiles();

    const result = await tryLoad(ID_AMOUNT, new FilePathSource(path, { highWaterMark: 16 }), { emptyLines: 'skip' });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.code).toBe('DECODE');
    await vi.waitFor(() => expect(openFiles()).toBe(before));
  });
});
