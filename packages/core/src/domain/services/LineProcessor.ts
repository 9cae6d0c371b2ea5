import { DataRecord, EMPTY_VALUE } from '../model/DataRecord.js';
import type { FieldDef } from '../model/FieldDef.js';
import type { FieldSet } from '../model/FieldSet.js';
import type { ResolvedLoadOptions } from '../model/LoadOptions.js';
import type { LoadWarning } from '../model/LoadWarning.js';
import { isProcessOutcome } from '../model/ProcessOutcome.js';
import { fieldWarning, lineWarning } from '../model/LoadWarning.js';
import type { SlicedLine } from './LineSlicer.js';
import { sliceLine } from './LineSlicer.js';

/** What one line produced. `record` is absent when the line was skipped. */
export interface LineOutcome {
  readonly record?: DataRecord;
  readonly warnings: readonly LoadWarning[];
}

/**
 * Domain service that turns one raw line into a record.
 *
 * Every per-field problem is recovered locally: the field gets `EMPTY_VALUE`
 * and a warning is produced. Nothing here throws for bad data.
 */
export class LineProcessor {
  constructor(
    private readonly fields: FieldSet,
    private readonly options: ResolvedLoadOptions,
  ) {}

  process(line: string, lineNumber: number): LineOutcome {
    if (line === '') {
      return this.emptyLine(lineNumber);
    }

    const warnings: LoadWarning[] = [];
    const sliced = sliceLine(line, this.options.offsets);

    const { minLineLength } = this.options;
    if (minLineLength !== undefined && sliced.length < minLineLength) {
      warnings.push(
        lineWarning(
          lineNumber,
          'SHORT_LINE',
          `Line ${lineNumber} is ${sliced.length} long, expected at least ${minLineLength}`,
        ),
      );
    }

    const entries: [string, unknown][] = [];
    for (const field of this.fields) {
      entries.push([field.name, this.extractField(field, sliced, lineNumber, warnings)]);
    }

    return { record: new DataRecord(lineNumber, entries), warnings };
  }

  private emptyLine(lineNumber: number): LineOutcome {
    if (this.options.emptyLines === 'skip') {
      return { warnings: [] };
    }

    const entries = this.fields.names.map((name): [string, unknown] => [name, EMPTY_VALUE]);
    return {
      record: new DataRecord(lineNumber, entries),
      warnings: [lineWarning(lineNumber, 'EMPTY_LINE', `Line ${lineNumber} is empty`)],
    };
  }

  private extractField(field: FieldDef, line: SlicedLine, lineNumber: number, warnings: LoadWarning[]): unknown {
    const slice = line.slice(field.start, field.end);

    if (slice.kind === 'short') {
      warnings.push(
        fieldWarning(lineNumber, field.name, 'TRUNCATED_FIELD', `Field '${field.name}' truncated/missing on line ${lineNumber}`),
      );
      return EMPTY_VALUE;
    }

    if (slice.kind === 'split') {
      warnings.push(
        fieldWarning(
          lineNumber,
          field.name,
          'SPLIT_CHARACTER',
          `Field '${field.name}' on line ${lineNumber} starts or ends inside a multi-byte character`,
        ),
      );
      return EMPTY_VALUE;
    }

    if (!field.processor) {
      return slice.text;
    }

    let outcome: unknown;
    try {
      outcome = field.processor.process(slice.text);
    } catch (error) {
      return processorFailed(field, lineNumber, error instanceof Error ? error.message : String(error), warnings);
    }

    if (!isProcessOutcome(outcome)) {
      return processorFailed(field, lineNumber, `returned ${describeValue(outcome)} instead of an outcome`, warnings);
    }

    switch (outcome.status) {
      case 'accepted':
        return outcome.value;
      case 'warned':
        warnings.push(fieldWarning(lineNumber, field.name, 'FIELD_WARNING', outcome.message));
        return outcome.value;
      case 'rejected':
        warnings.push(fieldWarning(lineNumber, field.name, 'FIELD_REJECTED', outcome.reason));
        return EMPTY_VALUE;
    }
  }
}

function processorFailed(field: FieldDef, lineNumber: number, reason: string, warnings: LoadWarning[]): unknown {
  warnings.push(
    fieldWarning(lineNumber, field.name, 'PROCESSOR_ERROR', `Processor for field '${field.name}' failed: ${reason}`),
  );
  return EMPTY_VALUE;
}

function describeValue(value: unknown): string {
  if (value === null || typeof value !== 'object') return String(value);
  return 'status' in value ? `status '${String(value.status)}'` : 'an object without a status';
}
