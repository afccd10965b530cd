import type { ClassificationMode, ClassificationOutcome, FileReference, RecordContext } from '../types.js';

/**
 * The active classification strategy for a run. Chosen once before the
 * walk starts; the walker only ever sees this interface.
 */
export interface Classifier {
  readonly mode: ClassificationMode;
  /** Whether the classifier reads the record's EINs */
  readonly usesPlanIdentifiers: boolean;
  classify(context: RecordContext, fileReference: FileReference): Promise<ClassificationOutcome>;
}

export const SKIPPED: ClassificationOutcome = { kind: 'skipped' };
export const COLLECTED: ClassificationOutcome = { kind: 'collected' };
