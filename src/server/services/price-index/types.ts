/**
 * Price index domain types.
 *
 * Index documents follow the Transparency-in-Coverage table-of-contents
 * layout: a root object whose `reporting_structure` array holds reporting
 * records, each with `reporting_plans` and `in_network_files`.
 */

/** Wire keys read by the walker. Everything else is skipped. */
export const INDEX_FIELDS = {
  reportingRecords: 'reporting_structure',
  planIdentifiers: 'reporting_plans',
  fileReferences: 'in_network_files',
  idType: 'plan_id_type',
  id: 'plan_id',
  description: 'description',
  location: 'location',
} as const;

export interface PlanIdentifier {
  idType: string;
  id: string;
}

export interface FileReference {
  description: string;
  location: string;
}

export type ClassificationMode = 'unique-plans' | 'heuristics' | 'assisted';

export const CLASSIFICATION_MODES: readonly ClassificationMode[] = ['unique-plans', 'heuristics', 'assisted'];

export function isClassificationMode(value: string): value is ClassificationMode {
  return CLASSIFICATION_MODES.some((mode) => mode === value);
}

/**
 * One assisted-match hit. `heuristicMatch` is the naive substring signal;
 * the three signals are reported separately so consumers can tell which
 * one fired.
 */
export interface MatchResult {
  description: string;
  location: string;
  eins: string[];
  aiMatch: boolean;
  heuristicMatch: boolean;
  regionCodeMatch: boolean;
}

/**
 * What the classifier sees of the enclosing reporting record.
 * `eins` is a snapshot taken when the file reference was dispatched.
 */
export interface RecordContext {
  recordIndex: number;
  eins: readonly string[];
}

export type ClassificationOutcome =
  | { kind: 'skipped' }
  | { kind: 'collected' }
  | { kind: 'matched'; result: MatchResult };

/** A value written to the output stream: a match, or a bare string from an accumulator. */
export type OutputRecord = MatchResult | string;
