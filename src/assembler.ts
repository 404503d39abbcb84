/**
 * RecordAssembler - stack machine building the record graph from tokens
 *
 * Every token first closes the open records at its level or deeper, then
 * either starts a top-level record or goes to the variant tables in
 * `handlers/` for the innermost open record.
 */

import { ParseSession } from './context';
import { GedcomDatabase } from './database';
import { DateParser } from './dates';
import { dispatchToken, finalizeRecord } from './handlers';
import { Logger } from './logger';
import {
  AnyRecord,
  CustomRecord,
  FamilyRecord,
  GedcomDate,
  GedcomHeader,
  GedcomRecord,
  IndividualRecord,
  MultimediaRecord,
  NoteRecord,
  PlaceRecord,
  RepositoryRecord,
  SourceCitation,
  SourceRecord,
  SubmissionRecord,
  SubmitterRecord,
  TopLevelRecord,
} from './records';
import { GedcomToken } from './types';

export interface AssemblerServices {
  logger: Logger;
  dateParser: DateParser;
}

const TOP_LEVEL_FACTORIES: Readonly<Record<string, () => TopLevelRecord>> = {
  FAM: () => new FamilyRecord(),
  INDI: () => new IndividualRecord(),
  OBJE: () => new MultimediaRecord(),
  NOTE: () => new NoteRecord(),
  REPO: () => new RepositoryRecord(),
  SOUR: () => new SourceRecord(),
  SUBM: () => new SubmitterRecord(),
  SUBN: () => new SubmissionRecord(),
};

export class RecordAssembler {
  readonly session: ParseSession;
  readonly logger: Logger;
  readonly dateParser: DateParser;

  constructor(session: ParseSession, services: AssemblerServices) {
    this.session = session;
    this.logger = services.logger;
    this.dateParser = services.dateParser;
  }

  get database(): GedcomDatabase {
    return this.session.database;
  }

  process(token: GedcomToken): void {
    const parent = this.popStack(token.level);
    if (parent) {
      dispatchToken(this, parent, token);
    } else {
      this.startTopLevel(token);
    }
    this.session.pushTag(token.tag, token.level);
  }

  /** Closes every open record at end of input. */
  flush(): void {
    this.popStack(0);
  }

  push(record: AnyRecord): void {
    record.database = this.database;
    this.session.stack.push(record);
  }

  // ==========================================================================
  // Anomalies
  // ==========================================================================

  unexpected(record: GedcomRecord, token: GedcomToken): void {
    this.logger.debug(`Unexpected ${token.tag} at level ${token.level} in ${record.recordType}`, {
      line: token.fragment.lineNumber,
      xrefId: record.xrefId || undefined,
    });
  }

  anomaly(message: string, token: GedcomToken): void {
    this.logger.debug(message, { line: token.fragment.lineNumber, tag: token.tag, value: token.value });
  }

  // ==========================================================================
  // Shared child builders
  // ==========================================================================

  /** Pointer to a note, or an inline note synthesized under a generated id. */
  addNote(token: GedcomToken, target: string[]): string {
    if (token.valueKind === 'pointer') {
      if (!this.session.removedNotes.has(token.value)) {
        target.push(token.value);
      }
      this.session.referenced(token.value);
      return token.value;
    }
    const note = new NoteRecord();
    note.level = 0;
    note.parsingLevel = token.level;
    note.xrefId = this.database.generateXref('NOTE');
    if (token.valueKind === 'data') {
      note.parsedText.push(token.value);
    }
    this.push(note);
    target.push(note.xrefId);
    return note.xrefId;
  }

  /**
   * A citation of a source record, or of an inline source created from the
   * line's text and stored right away.
   */
  addSourceCitation(token: GedcomToken, target: SourceCitation[]): SourceCitation {
    const citation = new SourceCitation();
    citation.level = token.level;
    if (token.valueKind === 'pointer') {
      citation.source = token.value;
      this.session.referenced(token.value);
    } else {
      const source = new SourceRecord();
      source.level = 0;
      source.parsingLevel = token.level;
      source.xrefId = this.database.generateXref('SOUR');
      if (token.value.trim()) {
        source.title = token.value;
      }
      this.database.add(source);
      citation.source = source.xrefId;
    }
    target.push(citation);
    this.session.sourceCitations.push(citation);
    this.push(citation);
    return citation;
  }

  addMultimedia(token: GedcomToken, target: string[]): string {
    if (token.valueKind === 'pointer') {
      target.push(token.value);
      this.session.referenced(token.value);
      return token.value;
    }
    const media = new MultimediaRecord();
    media.level = 0;
    media.parsingLevel = token.level;
    media.xrefId = this.database.generateXref('OBJE');
    this.push(media);
    target.push(media.xrefId);
    return media.xrefId;
  }

  addSubmitter(token: GedcomToken): string {
    if (token.valueKind === 'pointer') {
      this.session.referenced(token.value);
      return token.value;
    }
    const submitter = new SubmitterRecord();
    submitter.level = 0;
    submitter.parsingLevel = token.level;
    submitter.xrefId = this.database.generateXref('SUBM');
    if (token.valueKind === 'data') {
      submitter.name = token.value;
    }
    this.push(submitter);
    return submitter.xrefId;
  }

  /** Keeps an unrecognised extension tag and its subtree on `parent`. */
  addCustom(parent: GedcomRecord, token: GedcomToken): CustomRecord {
    const custom = new CustomRecord(token.tag);
    custom.level = token.level;
    custom.xrefId = token.xrefId ?? '';
    custom.classification = token.value;
    parent.customRecords.push(custom);
    this.push(custom);
    return custom;
  }

  readDate(token: GedcomToken): GedcomDate {
    const date = new GedcomDate();
    date.level = token.level;
    date.database = this.database;
    date.dateString = token.value;
    date.parsed = token.value ? this.dateParser.parseDate(token.value) : undefined;
    return date;
  }

  readPlace(token: GedcomToken): PlaceRecord {
    const place = new PlaceRecord();
    place.level = token.level;
    place.database = this.database;
    place.name = this.database.internPlaceName(token.value);
    return place;
  }

  /** `CHAN` block; its `DATE` and `TIME` arrive as children. */
  readChangeDate(record: GedcomRecord, token: GedcomToken): void {
    const date = new GedcomDate();
    date.level = token.level;
    record.changeDate = date;
    this.push(date);
  }

  // ==========================================================================
  // Stack handling
  // ==========================================================================

  private popStack(level: number): AnyRecord | undefined {
    this.session.popTags(level);
    let current = this.session.current;
    while (current && level <= current.parsingLevel) {
      this.session.stack.pop();
      this.close(current);
      current = this.session.current;
    }
    return current;
  }

  private close(record: AnyRecord): void {
    if (!finalizeRecord(this, record)) {
      return;
    }
    if (record.level !== 0 || record.recordType === 'header') {
      return;
    }
    if (!this.database.add(record)) {
      this.logger.debug(`Duplicate or missing anchor id on ${record.recordType}`, { xrefId: record.xrefId });
    }
  }

  private startTopLevel(token: GedcomToken): void {
    if (token.tag === 'HEAD') {
      const header = new GedcomHeader();
      header.level = token.level;
      this.database.header = header;
      this.push(header);
      return;
    }
    if (token.tag === 'TRLR') {
      return;
    }

    const factory = TOP_LEVEL_FACTORIES[token.tag];
    if (!factory) {
      this.anomaly(`Unknown top level tag ${token.tag}`, token);
      return;
    }
    if (!token.xrefId) {
      this.anomaly(`${token.tag} record without an anchor id skipped`, token);
      return;
    }

    const record = factory();
    record.xrefId = token.xrefId;
    record.level = token.level;
    if (record instanceof NoteRecord) {
      if (token.valueKind === 'data') {
        record.parsedText.push(token.value);
      } else if (token.valueKind === 'pointer') {
        this.anomaly('Spurious note pointer', token);
      }
    }
    this.push(record);
  }
}
