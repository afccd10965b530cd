import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { gzipSync } from 'zlib';
import { PriceIndexExtractor } from '../PriceIndexExtractor.js';
import { openIndexStream } from '../IndexStream.js';
import { CollectingSink } from '../ResultSink.js';
import type { ClassificationMode, OutputRecord } from '../types.js';
import type { ClassificationOracle } from '../../llm/ClassificationOracle.js';
import { ConfigurationError, StructuralError, UsageError } from '../../../types/errors.js';
import {
  FakeOracle,
  NO_SEPARATOR_LOCATION,
  OTHER_REGION_LOCATION,
  REGION_LOCATION,
  jsonStream,
  testTables,
} from './fixtures.js';

const indexDocument = {
  reporting_entity_name: 'Example Insurer',
  reporting_entity_type: 'health insurance issuer',
  reporting_structure: [
    {
      reporting_plans: [
        { plan_name: 'Example PPO', plan_id_type: 'EIN', plan_id: '123', plan_market_type: 'group' },
      ],
      in_network_files: [
        { description: 'Excellus BCBS : BluePPO', location: REGION_LOCATION },
        { description: 'Excellus BCBS : BluePPO', location: REGION_LOCATION },
        { description: 'Unknown Plan', location: REGION_LOCATION },
        { description: 'In-network negotiated rates files', location: OTHER_REGION_LOCATION },
      ],
      allowed_amount_file: { description: 'allowed amounts', location: REGION_LOCATION },
    },
    {
      in_network_files: [
        { description: 'bcbs kansas : blue choice', location: OTHER_REGION_LOCATION },
        { description: 'Highmark BS Northeastern NY : PPO', location: NO_SEPARATOR_LOCATION },
      ],
    },
  ],
  version: '1.0.0',
};

async function run(
  mode: ClassificationMode,
  document: unknown = indexDocument,
  options: { oracle?: ClassificationOracle; concurrency?: number } = {}
) {
  const sink = new CollectingSink();
  const summary = await new PriceIndexExtractor().extract({
    input: jsonStream(document),
    mode,
    sink,
    tables: testTables,
    ...options,
  });
  return { summary, records: sink.records };
}

function descriptionOf(record: OutputRecord): string {
  return typeof record === 'string' ? record : record.description;
}

describe('PriceIndexExtractor', () => {
  it('lists unique plan descriptions', async () => {
    const { summary, records } = await run('unique-plans');

    expect(records).toEqual([
      'excellus bcbs : blueppo',
      'unknown plan',
      'bcbs kansas : blue choice',
      'highmark bs northeastern ny : ppo',
    ]);
    expect(summary.uniquePlanDescriptions).toBe(4);
    expect(summary.walk).toEqual({ records: 2, fileReferences: 6, planIdentifiers: 0, lateIdentifierRecords: 0 });
  });

  it('lists each matching location once in heuristics mode', async () => {
    const { summary, records } = await run('heuristics');

    expect(records).toEqual([REGION_LOCATION]);
    expect(summary.classification).toMatchObject({ classified: 6, collected: 2, skipped: 4, matchesEmitted: 0 });
    expect(summary.classification.planCodeFailures.InsufficientSeparators).toBe(0);
  });

  it('emits a match per reference in assisted mode, duplicates included', async () => {
    const { summary, records } = await run('assisted', indexDocument, { oracle: FakeOracle.always(false) });

    expect(records).toEqual([
      {
        description: 'Excellus BCBS : BluePPO',
        location: REGION_LOCATION,
        eins: ['123'],
        aiMatch: false,
        heuristicMatch: false,
        regionCodeMatch: true,
      },
      {
        description: 'Excellus BCBS : BluePPO',
        location: REGION_LOCATION,
        eins: ['123'],
        aiMatch: false,
        heuristicMatch: false,
        regionCodeMatch: true,
      },
      {
        description: 'Unknown Plan',
        location: REGION_LOCATION,
        eins: ['123'],
        aiMatch: false,
        heuristicMatch: false,
        regionCodeMatch: true,
      },
      {
        description: 'Highmark BS Northeastern NY : PPO',
        location: NO_SEPARATOR_LOCATION,
        eins: [],
        aiMatch: false,
        heuristicMatch: true,
        regionCodeMatch: false,
      },
    ]);
    expect(summary.walk.planIdentifiers).toBe(1);
    expect(summary.classification).toMatchObject({ matchesEmitted: 4, oracleQuestions: 6, oracleFailures: 0 });
    expect(summary.classification.planCodeFailures.InsufficientSeparators).toBe(1);
  });

  it('keeps document order with several classifications in flight', async () => {
    const oracle = FakeOracle.always(true);

    const sequential = await run('assisted', indexDocument, { oracle, concurrency: 1 });
    const concurrent = await run('assisted', indexDocument, { oracle, concurrency: 4 });

    expect(concurrent.records).toEqual(sequential.records);
    expect(concurrent.records.map(descriptionOf)).toEqual([
      'Excellus BCBS : BluePPO',
      'Excellus BCBS : BluePPO',
      'Unknown Plan',
      'In-network negotiated rates files',
      'bcbs kansas : blue choice',
      'Highmark BS Northeastern NY : PPO',
    ]);
  });

  it('keeps going when the oracle fails', async () => {
    const { summary, records } = await run('assisted', indexDocument, {
      oracle: FakeOracle.always(new Error('connection refused')),
    });

    expect(records).toHaveLength(4);
    expect(summary.classification).toMatchObject({ oracleQuestions: 6, oracleFailures: 6 });
  });

  it('requires an oracle in assisted mode', async () => {
    await expect(run('assisted')).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('writes nothing from the accumulators when the document is malformed', async () => {
    const document = {
      reporting_structure: [
        { in_network_files: [{ description: 'Excellus BCBS : BluePPO', location: REGION_LOCATION }] },
        7,
      ],
    };

    const sink = new CollectingSink();
    const extraction = new PriceIndexExtractor().extract({
      input: jsonStream(document),
      mode: 'heuristics',
      sink,
      tables: testTables,
    });

    await expect(extraction).rejects.toMatchObject({ position: { path: '$.reporting_structure[1]' } });
    expect(sink.records).toEqual([]);
  });

  it('keeps assisted matches emitted before a structural error', async () => {
    const document = {
      reporting_structure: [
        { in_network_files: [{ description: 'Unknown Plan', location: REGION_LOCATION }] },
        { in_network_files: [{ description: 7 }] },
      ],
    };

    const sink = new CollectingSink();
    const extraction = new PriceIndexExtractor().extract({
      input: jsonStream(document),
      mode: 'assisted',
      sink,
      tables: testTables,
      oracle: FakeOracle.always(false),
    });

    await expect(extraction).rejects.toBeInstanceOf(StructuralError);
    expect(sink.records.map(descriptionOf)).toEqual(['Unknown Plan']);
  });

  it.each([
    ['one chunk', Number.MAX_SAFE_INTEGER],
    ['small chunks', 5],
  ])('reports a syntax error at the record where it occurs (%s)', async (_label, chunkSize) => {
    const text =
      `{"reporting_structure":[{"in_network_files":[{"description":"Unknown Plan","location":"${REGION_LOCATION}"}]},` +
      '{"in_network_files":[{"description":"x", oops}]}]}';

    const sink = new CollectingSink();
    const extraction = new PriceIndexExtractor().extract({
      input: jsonStream(text, chunkSize),
      mode: 'assisted',
      sink,
      tables: testTables,
      oracle: FakeOracle.always(false),
    });

    await expect(extraction).rejects.toMatchObject({
      message: expect.stringMatching(/^Malformed JSON input: /),
      position: { path: '$.reporting_structure[1].in_network_files[0]' },
    });
    expect(sink.records.map(descriptionOf)).toEqual(['Unknown Plan']);
  });

  it('collects scheme-less locations in heuristics mode', async () => {
    const location = '/files/2024-01-01_301_71A0_in-network-rates.json';

    const { records } = await run('heuristics', {
      reporting_structure: [{ in_network_files: [{ description: 'Excellus BCBS : BluePPO', location }] }],
    });

    expect(records).toEqual([location]);
  });
});

describe('openIndexStream', () => {
  let directory: string;

  beforeAll(async () => {
    directory = await mkdtemp(path.join(tmpdir(), 'price-index-'));
  });

  afterAll(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  async function extractFile(filePath: string) {
    const sink = new CollectingSink();
    await new PriceIndexExtractor().extract({
      input: await openIndexStream(filePath),
      mode: 'unique-plans',
      sink,
      tables: testTables,
    });
    return sink.records;
  }

  it('reads a plain JSON file', async () => {
    const filePath = path.join(directory, 'index.json');
    await writeFile(filePath, JSON.stringify(indexDocument));

    expect(await extractFile(filePath)).toHaveLength(4);
  });

  it('gunzips a .gz file', async () => {
    const filePath = path.join(directory, 'index.json.gz');
    await writeFile(filePath, gzipSync(JSON.stringify(indexDocument)));

    expect(await extractFile(filePath)).toEqual([
      'excellus bcbs : blueppo',
      'unknown plan',
      'bcbs kansas : blue choice',
      'highmark bs northeastern ny : ppo',
    ]);
  });

  it('reports a corrupt archive as malformed input', async () => {
    const filePath = path.join(directory, 'corrupt.json.gz');
    await writeFile(filePath, 'this is not gzip data');

    await expect(extractFile(filePath)).rejects.toThrow(/Malformed JSON input/);
  });

  it('rejects a missing file as a usage error', async () => {
    const filePath = path.join(directory, 'missing.json');

    await expect(openIndexStream(filePath)).rejects.toThrow(new UsageError(`File not found: ${filePath}`));
  });

  it('reads standard input for "-"', async () => {
    expect(await openIndexStream('-')).toBe(process.stdin);
  });

  it.each([
    ['plain', 'aborted.json', (text: string): string | Buffer => text],
    ['gzipped', 'aborted.json.gz', (text: string): string | Buffer => gzipSync(text)],
  ])('releases a %s file when the run aborts', async (_label, name, encode) => {
    const filePath = path.join(directory, name);
    await writeFile(filePath, encode(`{"reporting_structure":[7],"padding":"${'x'.repeat(200_000)}"}`));
    const input = await openIndexStream(filePath);

    await expect(
      new PriceIndexExtractor().extract({ input, mode: 'heuristics', sink: new CollectingSink(), tables: testTables })
    ).rejects.toBeInstanceOf(StructuralError);

    await vi.waitFor(() => expect(input.destroyed).toBe(true));
  });
});
