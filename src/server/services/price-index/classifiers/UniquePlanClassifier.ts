import { COLLECTED, SKIPPED, type Classifier } from './Classifier.js';
import type { ExtractionSession } from '../ExtractionSession.js';
import type { ClassificationOutcome, FileReference, RecordContext } from '../types.js';

/** Description the index format uses when a file carries no plan information */
export const NO_PLAN_INFORMATION_DESCRIPTION = 'in-network negotiated rates files';

/**
 * Collects every distinct lower-cased plan description.
 */
export class UniquePlanClassifier implements Classifier {
  readonly mode = 'unique-plans';
  readonly usesPlanIdentifiers = false;

  constructor(private readonly session: ExtractionSession) {}

  async classify(_context: RecordContext, fileReference: FileReference): Promise<ClassificationOutcome> {
    const description = fileReference.description.toLowerCase();
    if (description === NO_PLAN_INFORMATION_DESCRIPTION) {
      return SKIPPED;
    }
    this.session.uniquePlanDescriptions.add(description);
    return COLLECTED;
  }
}
