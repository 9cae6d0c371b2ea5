import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import { DataFile } from '../domain/model/DataFile.js';
import type { DataRecord } from '../domain/model/DataRecord.js';
import type { FieldSet } from '../domain/model/FieldSet.js';
import type { ResolvedLoadOptions } from '../domain/model/LoadOptions.js';
import type { LoadWarning } from '../domain/model/LoadWarning.js';
import { formatWarning } from '../domain/model/LoadWarning.js';
import { LineProcessor } from '../domain/services/LineProcessor.js';
import type { EventBus } from './EventBus.js';

/**
 * Mutable state of a single load: the records and warnings gathered so far.
 *
 * One session per call, never shared, so concurrent loads on the same reader
 * do not interfere.
 */
export class LoadSession {
  readonly loadId = randomUUID();
  readonly startedAt = Date.now();
  private readonly processor: LineProcessor;
  private readonly records: DataRecord[] = [];
  private readonly warnings: LoadWarning[] = [];
  private lineNumber = 0;
  private skipped = 0;

  constructor(
    readonly fields: FieldSet,
    readonly options: ResolvedLoadOptions,
    private readonly eventBus: EventBus,
    private readonly logger: Logger,
  ) {
    this.processor = new LineProcessor(fields, options);
  }

  get linesRead(): number {
    return this.lineNumber;
  }

  /** Process the next physical line of the source. */
  accept(line: string): void {
    this.lineNumber++;

    const outcome = this.processor.process(line, this.lineNumber);

    if (outcome.record) {
      this.records.push(outcome.record);
    } else {
      this.skipped++;
    }

    for (const warning of outcome.warnings) {
      this.warnings.push(warning);
      this.logger.debug({ loadId: this.loadId }, formatWarning(warning));
      this.eventBus.emit({ type: 'load:warning', loadId: this.loadId, warning, timestamp: Date.now() });
    }
  }

  /** Seal the session into its result. */
  complete(): DataFile {
    return new DataFile(this.fields, this.records, this.warnings, {
      linesRead: this.lineNumber,
      skippedLines: this.skipped,
    });
  }
}
