import { extractPlanCode } from '../PlanCodeExtractor.js';
import type { HeuristicTables } from '../HeuristicTables.js';
import type { ExtractionSession } from '../ExtractionSession.js';

/**
 * Whether the location's plan code is a known region code. Extraction
 * failures count as no match and are tallied on the session.
 */
export function matchesRegionCode(
  location: string,
  tables: HeuristicTables,
  session: ExtractionSession
): boolean {
  const planCode = extractPlanCode(location);
  if (!planCode.ok) {
    session.recordPlanCodeFailure(planCode.reason);
    return false;
  }
  return tables.regionCodes.has(planCode.code.toLowerCase());
}

/**
 * Substring test: the lower-cased description names the region and a
 * PPO-type plan.
 */
export function matchesNaiveHints(lowerDescription: string, tables: HeuristicTables): boolean {
  const mentions = (hints: readonly string[]) => hints.some((hint) => lowerDescription.includes(hint));
  return mentions(tables.regionHints) && mentions(tables.planTypeHints);
}
