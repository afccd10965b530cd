import type { Classifier } from './Classifier.js';
import { matchesNaiveHints, matchesRegionCode } from './signals.js';
import type { ClassificationOracle } from '../../llm/ClassificationOracle.js';
import type { HeuristicTables } from '../HeuristicTables.js';
import type { ExtractionSession } from '../ExtractionSession.js';
import type { ClassificationOutcome, FileReference, RecordContext } from '../types.js';
import { logger } from '../../../utils/logger.js';
import { errorMessage } from '../../../types/errors.js';

export const NEW_YORK_INSTRUCTION = `Does the given insurance plan descriptive name operate in New York?
Your answer should be true for yes, false for no.`;

export const PPO_INSTRUCTION = `Should the given insurance plan descriptive name be considered a PPO plan?
Your answer should be true for yes, false for no.`;

/**
 * Combines the naive substring signal, the region-code signal and two
 * oracle questions. Any positive signal emits a match carrying the EINs
 * known at that point of the record; duplicates are emitted every time.
 */
export class AssistedMatchClassifier implements Classifier {
  readonly mode = 'assisted';
  readonly usesPlanIdentifiers = true;

  constructor(
    private readonly tables: HeuristicTables,
    private readonly oracle: ClassificationOracle,
    private readonly session: ExtractionSession
  ) {}

  async classify(context: RecordContext, fileReference: FileReference): Promise<ClassificationOutcome> {
    const { description, location } = fileReference;
    const heuristicMatch = matchesNaiveHints(description.toLowerCase(), this.tables);
    const regionCodeMatch = matchesRegionCode(location, this.tables, this.session);
    const aiMatch =
      (await this.verdict(NEW_YORK_INSTRUCTION, description, context)) &&
      (await this.verdict(PPO_INSTRUCTION, description, context));

    if (!heuristicMatch && !regionCodeMatch && !aiMatch) {
      return { kind: 'skipped' };
    }

    return {
      kind: 'matched',
      result: {
        description,
        location,
        eins: [...context.eins],
        aiMatch,
        heuristicMatch,
        regionCodeMatch,
      },
    };
  }

  /**
   * Ask one question; an oracle failure is a negative verdict.
   */
  private async verdict(instruction: string, text: string, context: RecordContext): Promise<boolean> {
    this.session.recordOracleQuestion();
    try {
      return await this.oracle.ask(instruction, text);
    } catch (error) {
      const failures = this.session.recordOracleFailure();
      const fields = { recordIndex: context.recordIndex, failures, error: errorMessage(error) };
      if (failures === 1) {
        logger.warn(fields, 'Classification oracle failed; treating its answers as negative');
      } else {
        logger.debug(fields, 'Classification oracle failed');
      }
      return false;
    }
  }
}
