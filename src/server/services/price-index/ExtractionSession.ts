import type { ResultSink } from './ResultSink.js';
import type { PlanCodeFailure } from './PlanCodeExtractor.js';
import type { ClassificationOutcome } from './types.js';

export interface SessionStats {
  classified: number;
  skipped: number;
  collected: number;
  matchesEmitted: number;
  planCodeFailures: Record<PlanCodeFailure, number>;
  oracleQuestions: number;
  oracleFailures: number;
}

/**
 * State of one extraction run: the accumulator sets, run statistics and
 * the output sink. Created when a run starts and drained once at its end.
 */
export class ExtractionSession {
  /** Lower-cased plan descriptions (unique-plans mode) */
  readonly uniquePlanDescriptions = new Set<string>();
  /** Locations passing both heuristic tables (heuristics mode) */
  readonly uniqueMatchedLocations = new Set<string>();

  private readonly stats: SessionStats = {
    classified: 0,
    skipped: 0,
    collected: 0,
    matchesEmitted: 0,
    planCodeFailures: {
      InvalidUrl: 0,
      NoFilename: 0,
      InsufficientSeparators: 0,
      InvalidSeparatorSpacing: 0,
    },
    oracleQuestions: 0,
    oracleFailures: 0,
  };
  private drained = false;

  constructor(private readonly sink: ResultSink) {}

  recordPlanCodeFailure(reason: PlanCodeFailure): void {
    this.stats.planCodeFailures[reason]++;
  }

  recordOracleQuestion(): void {
    this.stats.oracleQuestions++;
  }

  /**
   * @returns the number of oracle failures so far, this one included
   */
  recordOracleFailure(): number {
    return ++this.stats.oracleFailures;
  }

  /**
   * Account for one classified file reference, emitting it if it matched.
   */
  async record(outcome: ClassificationOutcome): Promise<void> {
    this.stats.classified++;
    switch (outcome.kind) {
      case 'skipped':
        this.stats.skipped++;
        break;
      case 'collected':
        this.stats.collected++;
        break;
      case 'matched':
        this.stats.matchesEmitted++;
        await this.sink.write(outcome.result);
        break;
    }
  }

  /**
   * Write the accumulated sets to the sink. Only one of them is populated
   * in any given mode.
   */
  async drain(): Promise<void> {
    if (this.drained) {
      throw new Error('Extraction session has already been drained');
    }
    this.drained = true;
    for (const description of this.uniquePlanDescriptions) {
      await this.sink.write(description);
    }
    for (const location of this.uniqueMatchedLocations) {
      await this.sink.write(location);
    }
  }

  getStats(): SessionStats {
    return {
      ...this.stats,
      planCodeFailures: { ...this.stats.planCodeFailures },
    };
  }
}
