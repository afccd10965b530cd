import { isClassificationMode, type ClassificationMode } from '../services/price-index/types.js';
import { UsageError } from '../types/errors.js';

export interface ScriptOptions {
  filePath: string;
  mode: ClassificationMode;
}

const MODE_FLAGS = new Map<string, ClassificationMode>([
  ['-uniquePlans', 'unique-plans'],
  ['-heuristics', 'heuristics'],
  ['-analysis', 'assisted'],
]);

export const USAGE = `price index extractor - find PPO price file locations in an index file
  <filename>    path to the index file (.json or .json.gz, - for stdin)
  <mode flag>   optional, defaults to -heuristics
                -uniquePlans - extract all unique plan names
                -heuristics  - extract ppo price urls based on heuristics
                -analysis    - extract per-file match records, with llm assistance
                --mode <unique-plans|heuristics|assisted> - same, by name`;

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ScriptOptions {
  let filePath: string | undefined;
  let mode: ClassificationMode | undefined;

  const setMode = (next: ClassificationMode) => {
    if (mode) {
      throw new UsageError('Only one mode may be given');
    }
    mode = next;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    const flagMode = MODE_FLAGS.get(arg);
    if (flagMode) {
      setMode(flagMode);
    } else if (arg === '--mode') {
      const value = args[++i];
      if (value === undefined || !isClassificationMode(value)) {
        throw new UsageError(`Invalid mode: ${value ?? '(missing)'}`);
      }
      setMode(value);
    } else if (arg.startsWith('-') && arg !== '-') {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (filePath === undefined) {
      filePath = arg;
    } else {
      throw new UsageError('Exactly one file argument expected');
    }
  }

  if (filePath === undefined) {
    throw new UsageError('Exactly one file argument expected');
  }

  return { filePath, mode: mode ?? 'heuristics' };
}
