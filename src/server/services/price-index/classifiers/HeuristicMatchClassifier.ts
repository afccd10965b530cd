import { COLLECTED, SKIPPED, type Classifier } from './Classifier.js';
import { matchesRegionCode } from './signals.js';
import type { HeuristicTables } from '../HeuristicTables.js';
import type { ExtractionSession } from '../ExtractionSession.js';
import type { ClassificationOutcome, FileReference, RecordContext } from '../types.js';

/**
 * Table-driven match: the description must be a known PPO plan and the
 * location's plan code a known region code. Matching locations are
 * collected once each.
 */
export class HeuristicMatchClassifier implements Classifier {
  readonly mode = 'heuristics';
  readonly usesPlanIdentifiers = false;

  constructor(
    private readonly tables: HeuristicTables,
    private readonly session: ExtractionSession
  ) {}

  async classify(_context: RecordContext, fileReference: FileReference): Promise<ClassificationOutcome> {
    // The plan table gates the region check entirely
    if (!this.tables.ppoPlanDescriptions.has(fileReference.description.toLowerCase())) {
      return SKIPPED;
    }
    if (!matchesRegionCode(fileReference.location, this.tables, this.session)) {
      return SKIPPED;
    }
    this.session.uniqueMatchedLocations.add(fileReference.location);
    return COLLECTED;
  }
}
