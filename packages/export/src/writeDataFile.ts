import { writeFile } from 'node:fs/promises';
import type { DataFile } from '@fixedwidth/core';
import type { DataFileWriter, WriteOptions } from './domain/ports/DataFileWriter.js';

/**
 * Serialize `data` with `writer` and write it to `filePath` as UTF-8.
 * Overwrites an existing file.
 */
export async function writeDataFile<O extends WriteOptions>(
  data: DataFile,
  filePath: string,
  writer: DataFileWriter<O>,
  options?: O,
): Promise<void> {
  await writeFile(filePath, writer.write(data, options), 'utf-8');
}
