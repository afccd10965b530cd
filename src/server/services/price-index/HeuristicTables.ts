import { readFile } from 'fs/promises';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../../types/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Static lookup tables used by the heuristic and assisted classifiers.
 * Every entry is lower-cased when the tables are built, and callers compare
 * lower-cased input against them.
 */
export interface HeuristicTables {
  readonly ppoPlanDescriptions: ReadonlySet<string>;
  readonly regionCodes: ReadonlySet<string>;
  /** Substrings that place a plan description in the target region */
  readonly regionHints: readonly string[];
  /** Substrings that mark a plan description as a PPO-type plan */
  readonly planTypeHints: readonly string[];
}

export const heuristicTablesSchema = z.object({
  ppoPlanDescriptions: z.array(z.string()),
  regionCodes: z.array(z.string()),
  regionHints: z.array(z.string().min(1)).min(1),
  planTypeHints: z.array(z.string().min(1)).min(1),
});

export type HeuristicTablesSource = z.infer<typeof heuristicTablesSchema>;

export const DEFAULT_HEURISTIC_TABLES_PATH = fileURLToPath(
  new URL('../../../../data/heuristic-tables.json', import.meta.url)
);

export function createHeuristicTables(source: HeuristicTablesSource): HeuristicTables {
  const lower = (values: string[]) => values.map((value) => value.toLowerCase());
  return {
    ppoPlanDescriptions: new Set(lower(source.ppoPlanDescriptions)),
    regionCodes: new Set(lower(source.regionCodes)),
    regionHints: Object.freeze(lower(source.regionHints)),
    planTypeHints: Object.freeze(lower(source.planTypeHints)),
  };
}

/**
 * Load and validate the heuristic tables from a JSON file.
 *
 * @throws {ConfigurationError} when the file is missing, is not JSON, or
 * does not match the table schema
 */
export async function loadHeuristicTables(
  filePath: string = DEFAULT_HEURISTIC_TABLES_PATH
): Promise<HeuristicTables> {
  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read heuristic tables from ${filePath}`, {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const parsed = heuristicTablesSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid heuristic tables in ${filePath}`, {
      filePath,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const tables = createHeuristicTables(parsed.data);
  logger.debug(
    {
      filePath,
      ppoPlanDescriptions: tables.ppoPlanDescriptions.size,
      regionCodes: tables.regionCodes.size,
    },
    'Heuristic tables loaded'
  );
  return tables;
}
