/**
 * Price Index Extractor
 *
 * Streams an index document through the walker and the classifier for the
 * selected mode, writing results to a sink.
 */

import type { Readable } from 'stream';
import { JsonTokenReader } from './JsonTokenReader.js';
import { IndexDocumentWalker, type WalkStats } from './IndexDocumentWalker.js';
import { ExtractionSession, type SessionStats } from './ExtractionSession.js';
import { ClassificationPipeline } from './ClassificationPipeline.js';
import { createClassifier } from './classifiers/index.js';
import type { ResultSink } from './ResultSink.js';
import type { HeuristicTables } from './HeuristicTables.js';
import type { ClassificationMode } from './types.js';
import type { ClassificationOracle } from '../llm/ClassificationOracle.js';
import { logger } from '../../utils/logger.js';

export interface ExtractOptions {
  input: Readable;
  mode: ClassificationMode;
  sink: ResultSink;
  tables: HeuristicTables;
  /** Required for the assisted mode */
  oracle?: ClassificationOracle;
  /** Classifications in flight at once; defaults to 1 */
  concurrency?: number;
}

export interface ExtractionSummary {
  mode: ClassificationMode;
  walk: WalkStats;
  classification: SessionStats;
  uniquePlanDescriptions: number;
  uniqueMatchedLocations: number;
  duration: number;
}

export class PriceIndexExtractor {
  /**
   * Run one extraction. Structural errors in the document abort the run
   * and propagate to the caller; nothing is drained after a failure.
   */
  async extract(options: ExtractOptions): Promise<ExtractionSummary> {
    const { input, mode, sink, tables, oracle, concurrency = 1 } = options;
    const startTime = Date.now();

    const session = new ExtractionSession(sink);
    const classifier = createClassifier(mode, { tables, session, oracle });
    const pipeline = new ClassificationPipeline(classifier, session, concurrency);
    const reader = JsonTokenReader.fromStream(input);

    logger.info({ mode, concurrency }, 'Starting price index extraction');

    try {
      const walker = new IndexDocumentWalker(reader, {
        collectPlanIdentifiers: classifier.usesPlanIdentifiers,
        onFileReference: (context, fileReference) => pipeline.dispatch(context, fileReference),
        onFileReferencesEnd: () => pipeline.flush(),
      });

      const walk = await walker.walk();
      await pipeline.flush();
      await session.drain();

      const summary: ExtractionSummary = {
        mode,
        walk,
        classification: session.getStats(),
        uniquePlanDescriptions: session.uniquePlanDescriptions.size,
        uniqueMatchedLocations: session.uniqueMatchedLocations.size,
        duration: Date.now() - startTime,
      };
      logger.info(summary, 'Price index extraction completed');
      return summary;
    } finally {
      await reader.close();
    }
  }
}
