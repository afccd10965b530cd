#!/usr/bin/env node
/**
 * Extract PPO price file locations from a price-transparency index file.
 *
 * Usage:
 *   extract-price-index <file> [mode flag]
 *
 *   <file>        index document, `.json` or `.json.gz` (`-` for stdin)
 *   -uniquePlans  print every unique plan description
 *   -heuristics   print locations matching the plan and region tables (default)
 *   -analysis     print per-reference matches using heuristics and the local LLM
 *   --mode <unique-plans|heuristics|assisted>   long form of the above
 *
 * Results are written to stdout as JSON lines; logs go to stderr.
 */

import { getEnv } from '../config/env.js';
import { closeHttpAgents } from '../config/httpClient.js';
import { LocalLLMProvider } from '../services/llm/LocalLLMProvider.js';
import { LlmClassificationOracle } from '../services/llm/ClassificationOracle.js';
import { loadHeuristicTables } from '../services/price-index/HeuristicTables.js';
import { openIndexStream } from '../services/price-index/IndexStream.js';
import { PriceIndexExtractor } from '../services/price-index/PriceIndexExtractor.js';
import { JsonLinesSink } from '../services/price-index/ResultSink.js';
import { UsageError, errorMessage, isAppError } from '../types/errors.js';
import { USAGE, parseArgs } from './extractArgs.js';
import { logger } from '../utils/logger.js';

/**
 * Main execution function
 */
async function main(): Promise<void> {
  const startTime = Date.now();
  const options = parseArgs(process.argv.slice(2));
  const env = getEnv();

  const tables = await loadHeuristicTables(env.HEURISTIC_TABLES_PATH);

  let oracle: LlmClassificationOracle | undefined;
  if (options.mode === 'assisted') {
    oracle = new LlmClassificationOracle(new LocalLLMProvider());
    if (!(await oracle.checkAvailability())) {
      logger.info(
        { apiUrl: env.OLLAMA_API_URL, model: env.OLLAMA_MODEL },
        `Install Ollama and run \`ollama pull ${env.OLLAMA_MODEL}\` to enable LLM analysis`
      );
    }
  }

  const input = await openIndexStream(options.filePath);
  const summary = await new PriceIndexExtractor().extract({
    input,
    mode: options.mode,
    sink: new JsonLinesSink(process.stdout),
    tables,
    oracle,
    concurrency: env.CLASSIFY_CONCURRENCY,
  });

  logger.info(
    {
      filePath: options.filePath,
      startTime: new Date(startTime).toISOString(),
      endTime: new Date().toISOString(),
      duration: Date.now() - startTime,
      records: summary.walk.records,
      fileReferences: summary.walk.fileReferences,
    },
    'Run finished'
  );
}

// Run the script
main()
  .catch((error: unknown) => {
    if (error instanceof UsageError) {
      console.error(`${error.message}\n\n${USAGE}`);
    } else {
      logger.error(
        {
          error: errorMessage(error),
          ...(isAppError(error) ? { code: error.code, context: error.context } : {}),
          // Unexpected errors keep their stack
          ...(!isAppError(error) || !error.isOperational ? { stack: error instanceof Error ? error.stack : undefined } : {}),
        },
        'Extraction failed'
      );
    }
    process.exitCode = 1;
  })
  .finally(() => {
    closeHttpAgents();
  });
