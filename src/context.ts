/**
 * ParseSession - state owned by a single parse run
 */

import { GedcomDatabase } from './database';
import { XrefInterner } from './interner';
import { AnyRecord, RepositoryCitation, SourceCitation } from './records';

export interface TagLevel {
  tag: string;
  level: number;
}

export class ParseSession {
  readonly database: GedcomDatabase;
  readonly interner: XrefInterner;

  /** Open records, innermost last. */
  readonly stack: AnyRecord[] = [];
  /** Tags seen on the way down to the current line, innermost last. */
  readonly tagHistory: TagLevel[] = [];

  readonly referencedIds: string[] = [];
  readonly sourceCitations: SourceCitation[] = [];
  readonly repositoryCitations: RepositoryCitation[] = [];
  /** Notes dropped because their text was blank. */
  readonly removedNotes = new Set<string>();

  /** Value of the header's `CHAR` line, once seen. */
  declaredCharset?: string | undefined;

  constructor(replaceXrefs = false) {
    this.database = new GedcomDatabase();
    this.interner = new XrefInterner(this.database, replaceXrefs);
  }

  get current(): AnyRecord | undefined {
    return this.stack[this.stack.length - 1];
  }

  get previousTag(): TagLevel | undefined {
    return this.tagHistory[this.tagHistory.length - 1];
  }

  pushTag(tag: string, level: number): void {
    this.tagHistory.push({ tag, level });
  }

  /** Drops history entries at `level` or deeper. */
  popTags(level: number): void {
    let top = this.previousTag;
    while (top && top.level >= level) {
      this.tagHistory.pop();
      top = this.previousTag;
    }
  }

  referenced(xrefId: string): void {
    this.referencedIds.push(xrefId);
  }
}
