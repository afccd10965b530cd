import { z } from 'zod';
import type { JsonTokenReader, JsonValue } from './JsonTokenReader.js';
import { RecordCorrelator } from './RecordCorrelator.js';
import { INDEX_FIELDS, type FileReference, type PlanIdentifier, type RecordContext } from './types.js';
import { logger } from '../../utils/logger.js';

// Absent and null string fields decode to ''
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const planIdentifierSchema = z
  .object({
    [INDEX_FIELDS.idType]: optionalString,
    [INDEX_FIELDS.id]: optionalString,
  })
  .transform((entry): PlanIdentifier => ({
    idType: entry[INDEX_FIELDS.idType],
    id: entry[INDEX_FIELDS.id],
  }));

const fileReferenceSchema = z
  .object({
    [INDEX_FIELDS.description]: optionalString,
    [INDEX_FIELDS.location]: optionalString,
  })
  .transform((entry): FileReference => ({
    description: entry[INDEX_FIELDS.description],
    location: entry[INDEX_FIELDS.location],
  }));

export interface WalkHandlers {
  /** Decode `reporting_plans`; when false they are skipped like unknown keys */
  collectPlanIdentifiers: boolean;
  onFileReference(context: RecordContext, fileReference: FileReference): Promise<void>;
  /** Called once each `in_network_files` array has been fully read */
  onFileReferencesEnd(context: RecordContext): Promise<void>;
}

export interface WalkStats {
  records: number;
  fileReferences: number;
  planIdentifiers: number;
  /** Records whose EINs arrived after their file references were classified */
  lateIdentifierRecords: number;
}

/**
 * Recursive-descent walk over an index document.
 *
 * Only `reporting_structure` at the root is descended into; inside each
 * record the keys are dispatched in document order. Any other value at any
 * depth is skipped token by token. At most one plan identifier or file
 * reference is decoded at a time.
 */
export class IndexDocumentWalker {
  private readonly stats: WalkStats = {
    records: 0,
    fileReferences: 0,
    planIdentifiers: 0,
    lateIdentifierRecords: 0,
  };

  constructor(
    private readonly reader: JsonTokenReader,
    private readonly handlers: WalkHandlers
  ) {}

  async walk(): Promise<WalkStats> {
    await this.reader.expect('startObject', 'Expected index document to be an object');

    for (let key = await this.reader.nextKey(); key !== null; key = await this.reader.nextKey()) {
      this.reader.enter(key);
      if (key === INDEX_FIELDS.reportingRecords) {
        await this.walkReportingRecords();
      } else {
        await this.reader.skipValue();
      }
      this.reader.leave();
    }

    return { ...this.stats };
  }

  private async walkReportingRecords(): Promise<void> {
    await this.reader.expect('startArray', `Expected ${INDEX_FIELDS.reportingRecords} to be an array`);

    for (let index = 0; await this.reader.hasNextElement(); index++) {
      this.reader.enter(index);
      await this.walkRecord(index);
      this.reader.leave();
    }
  }

  private async walkRecord(recordIndex: number): Promise<void> {
    await this.reader.expect('startObject', 'Expected reporting record to be an object');
    const correlator = new RecordCorrelator(recordIndex);
    this.stats.records++;

    for (let key = await this.reader.nextKey(); key !== null; key = await this.reader.nextKey()) {
      this.reader.enter(key);
      switch (key) {
        case INDEX_FIELDS.planIdentifiers:
          if (this.handlers.collectPlanIdentifiers) {
            await this.walkPlanIdentifiers(correlator);
          } else {
            await this.reader.skipValue();
          }
          break;
        case INDEX_FIELDS.fileReferences:
          await this.walkFileReferences(correlator);
          break;
        default:
          await this.reader.skipValue();
      }
      this.reader.leave();
    }

    if (correlator.hasLateIdentifiers) {
      this.stats.lateIdentifierRecords++;
      logger.debug(
        { recordIndex, eins: correlator.einCount },
        'Plan identifiers followed file references; they were not attached to earlier matches'
      );
    }
  }

  private async walkPlanIdentifiers(correlator: RecordCorrelator): Promise<void> {
    const field = INDEX_FIELDS.planIdentifiers;
    await this.reader.expect('startArray', `Expected ${field} to be an array`);

    for (let index = 0; await this.reader.hasNextElement(); index++) {
      this.reader.enter(index);
      const entry = await this.readEntry([INDEX_FIELDS.idType, INDEX_FIELDS.id], correlator.recordIndex, field);
      const parsed = planIdentifierSchema.safeParse(entry);
      if (!parsed.success) {
        throw this.reader.error(`Cannot decode plan identifier: ${formatIssues(parsed.error)}`, {
          recordIndex: correlator.recordIndex,
          field,
        });
      }
      correlator.addPlanIdentifier(parsed.data);
      this.stats.planIdentifiers++;
      this.reader.leave();
    }
  }

  private async walkFileReferences(correlator: RecordCorrelator): Promise<void> {
    const field = INDEX_FIELDS.fileReferences;
    await this.reader.expect('startArray', `Expected ${field} to be an array`);
    correlator.markFileReferences();

    for (let index = 0; await this.reader.hasNextElement(); index++) {
      this.reader.enter(index);
      const entry = await this.readEntry(
        [INDEX_FIELDS.description, INDEX_FIELDS.location],
        correlator.recordIndex,
        field
      );
      const parsed = fileReferenceSchema.safeParse(entry);
      if (!parsed.success) {
        throw this.reader.error(`Cannot decode file reference: ${formatIssues(parsed.error)}`, {
          recordIndex: correlator.recordIndex,
          field,
        });
      }
      this.stats.fileReferences++;
      await this.handlers.onFileReference(correlator.context(), parsed.data);
      this.reader.leave();
    }

    await this.handlers.onFileReferencesEnd(correlator.context());
  }

  /**
   * Read one array entry that must be an object, building only the wanted
   * fields and skipping the rest.
   */
  private async readEntry(
    wanted: readonly string[],
    recordIndex: number,
    field: string
  ): Promise<Record<string, JsonValue>> {
    const start = await this.reader.next();
    if (start.type !== 'startObject') {
      throw this.reader.error(`Expected ${field} entry to be an object (found ${start.type})`, {
        recordIndex,
        field,
      });
    }

    const entry: Record<string, JsonValue> = {};
    for (let key = await this.reader.nextKey(); key !== null; key = await this.reader.nextKey()) {
      if (wanted.includes(key)) {
        // Wanted fields are strings; never build a nested value for them
        const token = await this.reader.peek();
        if (token.type === 'startObject' || token.type === 'startArray') {
          throw this.reader.error(`Expected ${key} in ${field} entry to be a string (found ${token.type})`, {
            recordIndex,
            field,
          });
        }
        entry[key] = await this.reader.readValue();
      } else {
        await this.reader.skipValue();
      }
    }
    return entry;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}
