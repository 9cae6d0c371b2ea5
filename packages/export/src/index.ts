// Writers
export { CsvWriter } from './infrastructure/writers/CsvWriter.js';
export type { CsvWriteOptions } from './infrastructure/writers/CsvWriter.js';
export { JsonWriter } from './infrastructure/writers/JsonWriter.js';
export type { JsonWriteOptions } from './infrastructure/writers/JsonWriter.js';
export { writeDataFile } from './writeDataFile.js';

// Ports
export type { DataFileWriter, WriteOptions } from './domain/ports/DataFileWriter.js';
