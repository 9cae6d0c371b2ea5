import type { Logger } from 'pino';
import type { EventType, EventPayload, DomainEvent } from './domain/events/DomainEvents.js';
import { ConfigurationError, LoadError } from './domain/errors/FixedWidthError.js';
import type { DataFile } from './domain/model/DataFile.js';
import type { FieldDefsInput, FieldSet } from './domain/model/FieldSet.js';
import { toFieldSet } from './domain/model/FieldSet.js';
import type { LoadOptions, ResolvedLoadOptions } from './domain/model/LoadOptions.js';
import { resolveLoadOptions } from './domain/model/LoadOptions.js';
import type { LoadResult } from './domain/model/LoadResult.js';
import { loadFailed } from './domain/model/LoadResult.js';
import type { DataSource } from './domain/ports/DataSource.js';
import { EventBus } from './application/EventBus.js';
import { LoadFile } from './application/usecases/LoadFile.js';
import { LoadLines } from './application/usecases/LoadLines.js';
import { FilePathSource } from './infrastructure/sources/FilePathSource.js';
import { logger as defaultLogger } from './infrastructure/logging/logger.js';

/** Configuration for a reader: the field layout plus per-load options. */
export interface FixedWidthReaderConfig extends LoadOptions {
  /** Field definitions, validated when the reader is built. */
  readonly fields: FieldDefsInput;
}

/** A file path or any `DataSource`. */
export type SourceInput = string | DataSource;

/**
 * Facade over the load engine: fields and options are fixed at construction,
 * and the reader can then load any number of sources.
 *
 * Holds no per-load state; each call runs in its own session, so a reader
 * can be shared and called concurrently on different sources.
 *
 * @example
 * ```typescript
 * const reader = new FixedWidthReader({
 *   fields: [
 *     { name: 'id', start: 0, length: 4 },
 *     { name: 'amount', start: 4, length: 6, processor: decimal() },
 *   ],
 *   emptyLines: 'skip',
 * });
 * const result = await reader.tryLoad('./export.dat');
 * if (result.ok) console.log(result.data.records.length);
 * ```
 */
export class FixedWidthReader {
  readonly fields: FieldSet;
  private readonly options: ResolvedLoadOptions;
  private readonly logger: Logger;
  private readonly eventBus: EventBus;

  /** @throws ConfigurationError when the field definitions or options are invalid. */
  constructor(config: FixedWidthReaderConfig) {
    this.fields = toFieldSet(config.fields);
    this.options = resolveLoadOptions(config);
    assertOptions(this.options);
    this.logger = config.logger ?? defaultLogger;
    this.eventBus = new EventBus(this.logger);
  }

  /**
   * Load a source. Resolves to the `DataFile` or to the fatal `LoadError`;
   * never rejects.
   */
  async tryLoad(source: SourceInput): Promise<LoadResult> {
    const fields = this.recheckFields();
    if (fields instanceof LoadError) return loadFailed(fields);

    return new LoadFile(fields, this.options, this.eventBus, this.logger).execute(toDataSource(source));
  }

  /** Like `tryLoad()`, but rejects with the `LoadError` instead of returning it. */
  async load(source: SourceInput): Promise<DataFile> {
    const result = await this.tryLoad(source);
    if (!result.ok) throw result.error;
    return result.data;
  }

  /**
   * Process in-memory lines synchronously. Each element is one line, without its terminator.
   *
   * @throws LoadError with code `INVALID_DEFINITIONS` when the field set fails re-validation.
   */
  loadLines(lines: Iterable<string>): DataFile {
    const fields = this.recheckFields();
    if (fields instanceof LoadError) throw fields;

    return new LoadLines(fields, this.options, this.eventBus, this.logger).execute(lines);
  }

  // --- Event subscription ---

  on<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.on(type, handler);
    return this;
  }

  onAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.onAny(handler);
    return this;
  }

  off<T extends EventType>(type: T, handler: (event: EventPayload<T>) => void): this {
    this.eventBus.off(type, handler);
    return this;
  }

  offAny(handler: (event: DomainEvent) => void): this {
    this.eventBus.offAny(handler);
    return this;
  }

  private recheckFields(): FieldSet | LoadError {
    try {
      this.fields.revalidate();
      return this.fields;
    } catch (error) {
      if (error instanceof ConfigurationError) return LoadError.invalidDefinitions(error);
      throw error;
    }
  }
}

function toDataSource(source: SourceInput): DataSource {
  return typeof source === 'string' ? new FilePathSource(source) : source;
}

function assertOptions(options: ResolvedLoadOptions): void {
  if (options.emptyLines !== 'skip' && options.emptyLines !== 'record') {
    throw new ConfigurationError(`emptyLines must be 'skip' or 'record' (got ${String(options.emptyLines)})`, 'INVALID_OPTION', {
      parameter: 'emptyLines',
      value: options.emptyLines,
    });
  }
  if (options.offsets !== 'character' && options.offsets !== 'byte') {
    throw new ConfigurationError(`offsets must be 'character' or 'byte' (got ${String(options.offsets)})`, 'INVALID_OPTION', {
      parameter: 'offsets',
      value: options.offsets,
    });
  }
  if (options.minLineLength !== undefined && (!Number.isInteger(options.minLineLength) || options.minLineLength < 0)) {
    throw new ConfigurationError(`minLineLength must be an integer >= 0 (got ${options.minLineLength})`, 'INVALID_OPTION', {
      parameter: 'minLineLength',
      value: options.minLineLength,
    });
  }
}
