import type { PlanIdentifier, RecordContext } from './types.js';

const EIN_ID_TYPE = 'ein';

/**
 * EIN set of one reporting record, in the order identifiers were met.
 *
 * File references only see the identifiers that precede them in the
 * document; identifiers arriving after the record's file references are
 * still collected but are flagged as late.
 */
export class RecordCorrelator {
  private readonly eins = new Set<string>();
  private snapshot: readonly string[] | null = null;
  private fileReferencesSeen = false;
  private lateIdentifiers = false;

  constructor(readonly recordIndex: number) {}

  /**
   * @returns whether the identifier is an EIN not already in the set
   */
  addPlanIdentifier(identifier: PlanIdentifier): boolean {
    if (identifier.idType.toLowerCase() !== EIN_ID_TYPE || this.eins.has(identifier.id)) {
      return false;
    }
    this.eins.add(identifier.id);
    this.snapshot = null;
    if (this.fileReferencesSeen) {
      this.lateIdentifiers = true;
    }
    return true;
  }

  markFileReferences(): void {
    this.fileReferencesSeen = true;
  }

  get hasLateIdentifiers(): boolean {
    return this.lateIdentifiers;
  }

  get einCount(): number {
    return this.eins.size;
  }

  context(): RecordContext {
    if (!this.snapshot) {
      this.snapshot = Object.freeze([...this.eins]);
    }
    return { recordIndex: this.recordIndex, eins: this.snapshot };
  }
}
