import type { Logger } from 'pino';
import type { LoadError } from '../../domain/errors/FixedWidthError.js';
import type { DataFile } from '../../domain/model/DataFile.js';
import type { EventBus } from '../EventBus.js';
import type { LoadSession } from '../LoadSession.js';

export function announceStart(session: LoadSession, source: string, eventBus: EventBus, logger: Logger): void {
  logger.debug({ loadId: session.loadId, source, fields: session.fields.size }, 'load started');
  eventBus.emit({
    type: 'load:started',
    loadId: session.loadId,
    source,
    fieldCount: session.fields.size,
    timestamp: Date.now(),
  });
}

export function announceCompletion(session: LoadSession, data: DataFile, eventBus: EventBus, logger: Logger): void {
  const durationMs = Date.now() - session.startedAt;

  logger.info(
    {
      loadId: session.loadId,
      records: data.records.length,
      warnings: data.warnings.length,
      linesRead: data.linesRead,
      skippedLines: data.skippedLines,
      durationMs,
    },
    'load completed',
  );
  eventBus.emit({
    type: 'load:completed',
    loadId: session.loadId,
    recordCount: data.records.length,
    warningCount: data.warnings.length,
    linesRead: data.linesRead,
    skippedLines: data.skippedLines,
    durationMs,
    timestamp: Date.now(),
  });
}

export function announceFailure(session: LoadSession, error: LoadError, eventBus: EventBus, logger: Logger): void {
  logger.error({ loadId: session.loadId, code: error.code, err: error, linesRead: session.linesRead }, 'load failed');
  eventBus.emit({
    type: 'load:failed',
    loadId: session.loadId,
    code: error.code,
    error: error.message,
    linesRead: session.linesRead,
    timestamp: Date.now(),
  });
}
