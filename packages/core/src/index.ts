// Main entry points
export { tryLoad, load, loadLines } from './load.js';
export { FixedWidthReader } from './FixedWidthReader.js';
export type { FixedWidthReaderConfig, SourceInput } from './FixedWidthReader.js';

// Domain model
export { FieldDef, createFieldDef, validateFieldSpec } from './domain/model/FieldDef.js';
export type { FieldSpec } from './domain/model/FieldDef.js';
export { FieldSet, defineFields, toFieldSet } from './domain/model/FieldSet.js';
export type { FieldDefsInput } from './domain/model/FieldSet.js';
export { DataRecord, EMPTY_VALUE } from './domain/model/DataRecord.js';
export { DataFile } from './domain/model/DataFile.js';
export type { LoadStats } from './domain/model/DataFile.js';
export type { LoadWarning, LoadWarningCode } from './domain/model/LoadWarning.js';
export { fieldWarning, lineWarning, formatWarning } from './domain/model/LoadWarning.js';
export type { LoadOptions, EmptyLinePolicy, OffsetMode } from './domain/model/LoadOptions.js';
export type { LoadResult } from './domain/model/LoadResult.js';
export type { ProcessOutcome, AcceptedOutcome, WarnedOutcome, RejectedOutcome } from './domain/model/ProcessOutcome.js';
export { accepted, acceptedWithWarning, rejected, isAccepted } from './domain/model/ProcessOutcome.js';

// Errors
export { FixedWidthError, ConfigurationError, LoadError, FieldNotFoundError } from './domain/errors/FixedWidthError.js';
export type { FixedWidthErrorCode, ConfigurationErrorCode, LoadErrorCode } from './domain/errors/FixedWidthError.js';

// Built-in processors
export { trimmed, required, oneOf, matches } from './domain/processors/text.js';
export type { TrimSide, OneOfOptions } from './domain/processors/text.js';
export { integer, decimal } from './domain/processors/numeric.js';
export type { NumericOptions, DecimalOptions } from './domain/processors/numeric.js';
export { dateYmd } from './domain/processors/date.js';
export { chain } from './domain/processors/chain.js';

// Domain services (for custom pipelines over in-memory text)
export { LineSplitter, splitLines } from './domain/services/LineSplitter.js';

// Ports (for custom implementations)
export type { DataSource, SourceMetadata } from './domain/ports/DataSource.js';
export type { FieldProcessor, FieldProcessorFn, ProcessorLike } from './domain/ports/FieldProcessor.js';

// Domain events
export type {
  DomainEvent,
  EventType,
  EventPayload,
  LoadStartedEvent,
  LoadWarningEvent,
  LoadCompletedEvent,
  LoadFailedEvent,
} from './domain/events/DomainEvents.js';

// Infrastructure adapters (built-in sources, logging)
export { BufferSource } from './infrastructure/sources/BufferSource.js';
export { FilePathSource } from './infrastructure/sources/FilePathSource.js';
export type { FilePathSourceOptions } from './infrastructure/sources/FilePathSource.js';
export { StreamSource } from './infrastructure/sources/StreamSource.js';
export type { StreamSourceOptions } from './infrastructure/sources/StreamSource.js';
export { createLogger, logger } from './infrastructure/logging/logger.js';
export type { LoggerOptions } from './infrastructure/logging/logger.js';
