import { Readable } from 'stream';
import { JsonTokenReader } from '../JsonTokenReader.js';
import { createHeuristicTables } from '../HeuristicTables.js';
import type { ClassificationOracle } from '../../llm/ClassificationOracle.js';

export const REGION_LOCATION = 'https://mrf.example.com/files/2024-01-01_301_71A0_in-network-rates.json';
export const OTHER_REGION_LOCATION = 'https://mrf.example.com/files/2024-01-01_999_00Z0_in-network-rates.json';
export const NO_SEPARATOR_LOCATION = 'https://mrf.example.com/files/noseparators.json';

export const testTables = createHeuristicTables({
  ppoPlanDescriptions: ['Excellus BCBS : BluePPO', 'bcbs kansas : blue choice'],
  regionCodes: ['301_71A0', '302_42b0'],
  regionHints: ['ny', 'new york'],
  planTypeHints: ['ppo', 'preferred'],
});

/**
 * Stream a JSON text in small chunks so tokens straddle chunk boundaries.
 */
export function jsonStream(document: unknown, chunkSize = 7): Readable {
  const text = typeof document === 'string' ? document : JSON.stringify(document);
  const chunks: string[] = [];
  for (let offset = 0; offset < text.length; offset += chunkSize) {
    chunks.push(text.slice(offset, offset + chunkSize));
  }
  return Readable.from(chunks);
}

export function readerFor(document: unknown, chunkSize?: number): JsonTokenReader {
  return JsonTokenReader.fromStream(jsonStream(document, chunkSize));
}

type Answer = boolean | Error;

/**
 * Oracle answering from a function of the question; an Error answer rejects.
 */
export class FakeOracle implements ClassificationOracle {
  readonly calls: Array<{ instruction: string; text: string }> = [];

  constructor(private readonly answer: (instruction: string, text: string) => Answer) {}

  static always(answer: Answer): FakeOracle {
    return new FakeOracle(() => answer);
  }

  async ask(instruction: string, text: string): Promise<boolean> {
    this.calls.push({ instruction, text });
    const answer = this.answer(instruction, text);
    if (answer instanceof Error) {
      throw answer;
    }
    return answer;
  }
}
