import type { FieldProcessor, ProcessorLike } from '../ports/FieldProcessor.js';
import { toFieldProcessor } from '../ports/FieldProcessor.js';
import { accepted, acceptedWithWarning } from '../model/ProcessOutcome.js';

/**
 * Run processors left to right, feeding each one the previous value.
 *
 * Stops at the first rejection. Non-string intermediate values are passed on
 * through `String()`. Warnings from several steps are joined into one message,
 * so the field still produces at most one warning per line.
 */
export function chain(...steps: readonly ProcessorLike[]): FieldProcessor {
  const processors = steps.map((step) => toFieldProcessor(step));

  return {
    process(raw) {
      let value: unknown = raw;
      const messages: string[] = [];

      for (const processor of processors) {
        const outcome = processor.process(typeof value === 'string' ? value : String(value));
        if (outcome.status === 'rejected') return outcome;
        if (outcome.status === 'warned') messages.push(outcome.message);
        value = outcome.value;
      }

      return messages.length > 0 ? acceptedWithWarning(value, messages.join('; ')) : accepted(value);
    },
  };
}
