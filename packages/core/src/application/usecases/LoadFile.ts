import type { Logger } from 'pino';
import { LoadError } from '../../domain/errors/FixedWidthError.js';
import type { FieldSet } from '../../domain/model/FieldSet.js';
import type { ResolvedLoadOptions } from '../../domain/model/LoadOptions.js';
import type { LoadResult } from '../../domain/model/LoadResult.js';
import { loadFailed, loadSucceeded } from '../../domain/model/LoadResult.js';
import type { DataSource } from '../../domain/ports/DataSource.js';
import { decodeLines } from '../../infrastructure/text/decodeLines.js';
import type { EventBus } from '../EventBus.js';
import { LoadSession } from '../LoadSession.js';
import { announceStart, announceCompletion, announceFailure } from './lifecycle.js';

/**
 * Use case: read a whole source and turn it into a `DataFile`.
 *
 * Source-level problems (open/read failures, undecodable bytes) end the load
 * with a `LoadError`; everything line- or field-level becomes a warning.
 */
export class LoadFile {
  constructor(
    private readonly fields: FieldSet,
    private readonly options: ResolvedLoadOptions,
    private readonly eventBus: EventBus,
    private readonly logger: Logger,
  ) {}

  async execute(source: DataSource): Promise<LoadResult> {
    const sourceName = source.metadata().name ?? 'unknown';
    const session = new LoadSession(this.fields, this.options, this.eventBus, this.logger);

    announceStart(session, sourceName, this.eventBus, this.logger);

    const lines = decodeLines(source.read(), this.options.encoding);
    try {
      for (;;) {
        let next: IteratorResult<string, void>;
        try {
          next = await lines.next();
        } catch (error) {
          const loadError = error instanceof LoadError ? error : LoadError.io(error, sourceName);
          announceFailure(session, loadError, this.eventBus, this.logger);
          return loadFailed(loadError);
        }
        if (next.done) break;
        session.accept(next.value);
      }
    } finally {
      await lines.return();
    }

    const data = session.complete();
    announceCompletion(session, data, this.eventBus, this.logger);
    return loadSucceeded(data);
  }
}
