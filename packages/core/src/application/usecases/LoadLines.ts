import type { Logger } from 'pino';
import type { DataFile } from '../../domain/model/DataFile.js';
import type { FieldSet } from '../../domain/model/FieldSet.js';
import type { ResolvedLoadOptions } from '../../domain/model/LoadOptions.js';
import type { EventBus } from '../EventBus.js';
import { LoadSession } from '../LoadSession.js';
import { announceStart, announceCompletion } from './lifecycle.js';

/** Use case: process lines that are already in memory. Synchronous; no I/O, no fatal conditions. */
export class LoadLines {
  constructor(
    private readonly fields: FieldSet,
    private readonly options: ResolvedLoadOptions,
    private readonly eventBus: EventBus,
    private readonly logger: Logger,
  ) {}

  execute(lines: Iterable<string>, sourceName = 'lines'): DataFile {
    const session = new LoadSession(this.fields, this.options, this.eventBus, this.logger);

    announceStart(session, sourceName, this.eventBus, this.logger);
    for (const line of lines) {
      session.accept(line);
    }

    const data = session.complete();
    announceCompletion(session, data, this.eventBus, this.logger);
    return data;
  }
}
