import type { Classifier } from './Classifier.js';
import { UniquePlanClassifier } from './UniquePlanClassifier.js';
import { HeuristicMatchClassifier } from './HeuristicMatchClassifier.js';
import { AssistedMatchClassifier } from './AssistedMatchClassifier.js';
import type { ClassificationOracle } from '../../llm/ClassificationOracle.js';
import type { HeuristicTables } from '../HeuristicTables.js';
import type { ExtractionSession } from '../ExtractionSession.js';
import type { ClassificationMode } from '../types.js';
import { ConfigurationError } from '../../../types/errors.js';

export type { Classifier } from './Classifier.js';
export { UniquePlanClassifier, NO_PLAN_INFORMATION_DESCRIPTION } from './UniquePlanClassifier.js';
export { HeuristicMatchClassifier } from './HeuristicMatchClassifier.js';
export { AssistedMatchClassifier, NEW_YORK_INSTRUCTION, PPO_INSTRUCTION } from './AssistedMatchClassifier.js';

export interface ClassifierDependencies {
  tables: HeuristicTables;
  session: ExtractionSession;
  oracle?: ClassificationOracle;
}

export function createClassifier(mode: ClassificationMode, deps: ClassifierDependencies): Classifier {
  switch (mode) {
    case 'unique-plans':
      return new UniquePlanClassifier(deps.session);
    case 'heuristics':
      return new HeuristicMatchClassifier(deps.tables, deps.session);
    case 'assisted':
      if (!deps.oracle) {
        throw new ConfigurationError('Assisted classification requires a classification oracle');
      }
      return new AssistedMatchClassifier(deps.tables, deps.oracle, deps.session);
  }
}
