/**
 * GedcomDatabase - owner of every top-level record read from one input
 */

import {
  FamilyRecord,
  GedcomHeader,
  GedcomRecord,
  IndividualRecord,
  MultimediaRecord,
  NoteRecord,
  RepositoryRecord,
  SourceRecord,
  SubmissionRecord,
  SubmitterRecord,
} from './records';

export class GedcomDatabase {
  name = '';
  header?: GedcomHeader | undefined;

  readonly individuals: IndividualRecord[] = [];
  readonly families: FamilyRecord[] = [];
  readonly sources: SourceRecord[] = [];
  readonly repositories: RepositoryRecord[] = [];
  readonly submitters: SubmitterRecord[] = [];
  readonly submissions: SubmissionRecord[] = [];
  readonly notes: NoteRecord[] = [];
  readonly media: MultimediaRecord[] = [];

  private readonly table = new Map<string, GedcomRecord>();
  private readonly placeNames = new Map<string, string>();
  private xrefCounter = 0;

  get size(): number {
    return this.table.size;
  }

  /** Returns false when the id is empty or already taken. */
  add(record: GedcomRecord): boolean {
    if (!record.xrefId || this.table.has(record.xrefId)) {
      return false;
    }
    this.table.set(record.xrefId, record);
    record.database = this;
    this.project(record, (list, item) => {
      list.push(item);
    });
    return true;
  }

  remove(xrefId: string): GedcomRecord | undefined {
    const record = this.table.get(xrefId);
    if (!record) {
      return undefined;
    }
    this.table.delete(xrefId);
    this.project(record, (list, item) => {
      const index = list.indexOf(item);
      if (index >= 0) {
        list.splice(index, 1);
      }
    });
    return record;
  }

  get(xrefId: string): GedcomRecord | undefined {
    return this.table.get(xrefId);
  }

  contains(xrefId: string): boolean {
    return this.table.has(xrefId);
  }

  records(): IterableIterator<GedcomRecord> {
    return this.table.values();
  }

  getIndividual(xrefId: string): IndividualRecord | undefined {
    const record = this.table.get(xrefId);
    return record instanceof IndividualRecord ? record : undefined;
  }

  getFamily(xrefId: string): FamilyRecord | undefined {
    const record = this.table.get(xrefId);
    return record instanceof FamilyRecord ? record : undefined;
  }

  /** Identical place names share one string instance. */
  internPlaceName(name: string): string {
    const existing = this.placeNames.get(name);
    if (existing !== undefined) {
      return existing;
    }
    this.placeNames.set(name, name);
    return name;
  }

  get placeNameCount(): number {
    return this.placeNames.size;
  }

  generateXref(prefix: string): string {
    let xrefId: string;
    do {
      this.xrefCounter += 1;
      xrefId = `@${prefix}${this.xrefCounter}@`;
    } while (this.table.has(xrefId));
    return xrefId;
  }

  private project(record: GedcomRecord, apply: <T extends GedcomRecord>(list: T[], item: T) => void): void {
    if (record instanceof IndividualRecord) {
      apply(this.individuals, record);
    } else if (record instanceof FamilyRecord) {
      apply(this.families, record);
    } else if (record instanceof SourceRecord) {
      apply(this.sources, record);
    } else if (record instanceof RepositoryRecord) {
      apply(this.repositories, record);
    } else if (record instanceof SubmitterRecord) {
      apply(this.submitters, record);
    } else if (record instanceof SubmissionRecord) {
      apply(this.submissions, record);
    } else if (record instanceof NoteRecord) {
      apply(this.notes, record);
    } else if (record instanceof MultimediaRecord) {
      apply(this.media, record);
    }
  }
}
