/**
 * Record model populated by the assembler.
 *
 * Relations between top-level records are stored as anchor ids and looked up
 * through the owning database; nested structures are owned by value.
 */

import { GedcomAge, ParsedDate } from './dates';
import { EventType } from './event-types';
import {
  AdoptionType,
  Certainty,
  ChildLinkageStatus,
  FamilyLinkRole,
  MarriageStartStatus,
  PedigreeLinkage,
  RestrictionNotice,
  Sex,
  SourceMediaType,
  SpouseSealingStatus,
} from './types';
import { GedcomDatabase } from './database';

export type RecordType =
  | 'header'
  | 'family'
  | 'individual'
  | 'multimedia'
  | 'note'
  | 'repository'
  | 'source'
  | 'submitter'
  | 'submission'
  | 'event'
  | 'familyEvent'
  | 'individualEvent'
  | 'custom'
  | 'place'
  | 'sourceCitation'
  | 'repositoryCitation'
  | 'spouseSealing'
  | 'familyLink'
  | 'association'
  | 'name'
  | 'date';

export type ContactKind = 'phone' | 'email' | 'fax' | 'www';

const MAX_CONTACTS = 3;

export class GedcomAddress {
  addressLine = '';
  line1 = '';
  line2 = '';
  line3 = '';
  city = '';
  state = '';
  postCode = '';
  country = '';
  phone: string[] = [];
  email: string[] = [];
  fax: string[] = [];
  www: string[] = [];

  /** Keeps the first three values of each kind; later ones are dropped. */
  addContact(kind: ContactKind, value: string): boolean {
    const list = this[kind];
    if (list.length >= MAX_CONTACTS) {
      return false;
    }
    list.push(value);
    return true;
  }
}

export abstract class GedcomRecord {
  abstract readonly recordType: RecordType;

  xrefId = '';
  /** Depth from which children are read; follows `level` unless set afterwards. */
  parsingLevel = 0;
  database?: GedcomDatabase | undefined;
  refCount = 0;

  notes: string[] = [];
  multimedia: string[] = [];
  sources: SourceCitation[] = [];
  customRecords: CustomRecord[] = [];
  userReferenceNumber = '';
  userReferenceType = '';
  automatedRecordId = '';
  changeDate?: GedcomDate | undefined;
  restrictionNotice: RestrictionNotice = 'none';

  private recordLevel = 0;

  get level(): number {
    return this.recordLevel;
  }

  set level(value: number) {
    this.recordLevel = value;
    this.parsingLevel = value;
  }
}

export class GedcomHeader extends GedcomRecord {
  readonly recordType = 'header';

  applicationSystemId = '';
  applicationName = '';
  applicationVersion = '';
  corporation = '';
  corporationAddress?: GedcomAddress | undefined;
  sourceName = '';
  sourceDate?: GedcomDate | undefined;
  sourceCopyright = '';
  destination = '';
  transmissionDate?: GedcomDate | undefined;
  submitterXref = '';
  submissionXref = '';
  copyright = '';
  filename = '';
  language = '';
  placeForm = '';
  gedcomVersion = '';
  gedcomForm = '';
  charset = '';
  charsetVersion = '';
  contentDescription?: NoteRecord | undefined;
}

export class FamilyRecord extends GedcomRecord {
  readonly recordType = 'family';

  husband = '';
  wife = '';
  children: string[] = [];
  events: FamilyEvent[] = [];
  numberOfChildren = 0;
  submitters: string[] = [];
  spouseSealings: SpouseSealing[] = [];
  startStatus: MarriageStartStatus = 'unknown';

  private childLinkage = new Map<string, PedigreeLinkage>();
  private husbandLinkage = new Map<string, PedigreeLinkage>();
  private wifeLinkage = new Map<string, PedigreeLinkage>();

  /** Records how `childId` relates to one or both parents of this family. */
  setLinkage(childId: string, linkage: PedigreeLinkage, side: AdoptionType = 'both'): void {
    if (side === 'husband') {
      this.husbandLinkage.set(childId, linkage);
    } else if (side === 'wife') {
      this.wifeLinkage.set(childId, linkage);
    } else {
      this.childLinkage.set(childId, linkage);
    }
  }

  getLinkage(childId: string): PedigreeLinkage | undefined {
    return this.childLinkage.get(childId);
  }

  getHusbandLinkage(childId: string): PedigreeLinkage | undefined {
    return this.husbandLinkage.get(childId);
  }

  getWifeLinkage(childId: string): PedigreeLinkage | undefined {
    return this.wifeLinkage.get(childId);
  }

  clearLinkageTypes(): void {
    this.childLinkage.clear();
    this.husbandLinkage.clear();
    this.wifeLinkage.clear();
  }
}

export class IndividualRecord extends GedcomRecord {
  readonly recordType = 'individual';

  names: NameRecord[] = [];
  sex: Sex = 'undetermined';
  events: IndividualEvent[] = [];
  attributes: IndividualEvent[] = [];
  childIn: FamilyLink[] = [];
  spouseIn: FamilyLink[] = [];
  associations: Association[] = [];
  aliases: string[] = [];
  ancestorInterest: string[] = [];
  descendantInterest: string[] = [];
  submitters: string[] = [];
  permanentRecordFileNumber = '';
  ancestralFileNumber = '';
  address?: GedcomAddress | undefined;

  get preferredName(): NameRecord | undefined {
    return this.names.find(name => name.preferred) ?? this.names[0];
  }

  childInFamily(familyId: string): FamilyLink | undefined {
    return this.childIn.find(link => link.family === familyId);
  }

  spouseInFamily(familyId: string): FamilyLink | undefined {
    return this.spouseIn.find(link => link.family === familyId);
  }
}

export class NoteRecord extends GedcomRecord {
  readonly recordType = 'note';

  text = '';
  /** Raw pieces gathered from the note line and its continuations. */
  parsedText: string[] = [];
}

export interface MultimediaFile {
  filename: string;
  format: string;
  mediaType: string;
  sourceMediaType: string;
}

export class MultimediaRecord extends GedcomRecord {
  readonly recordType = 'multimedia';

  title = '';
  files: MultimediaFile[] = [];

  addFile(): MultimediaFile {
    const file: MultimediaFile = { filename: '', format: '', mediaType: '', sourceMediaType: '' };
    this.files.push(file);
    return file;
  }

  get lastFile(): MultimediaFile | undefined {
    return this.files[this.files.length - 1];
  }
}

export class RepositoryRecord extends GedcomRecord {
  readonly recordType = 'repository';

  name = '';
  address?: GedcomAddress | undefined;
  citations: RepositoryCitation[] = [];
}

export interface RecordedEvent {
  types: EventType[];
  date?: GedcomDate | undefined;
  place?: PlaceRecord | undefined;
}

export type SourceTextField = 'originator' | 'title' | 'publicationFacts' | 'text';

export class SourceRecord extends GedcomRecord {
  readonly recordType = 'source';

  title = '';
  originator = '';
  publicationFacts = '';
  text = '';
  filedBy = '';
  agency = '';
  eventsRecorded: RecordedEvent[] = [];
  dataNotes: string[] = [];
  repositoryCitations: RepositoryCitation[] = [];
  citations: SourceCitation[] = [];

  private pending?: { field: SourceTextField; parts: string[] } | undefined;

  /** Starts collecting a multi-line field; the previous one is flushed first. */
  startText(field: SourceTextField, value: string): void {
    this.flushText();
    this.pending = { field, parts: [value] };
  }

  appendText(value: string, newline: boolean): boolean {
    if (!this.pending) {
      return false;
    }
    this.pending.parts.push(newline ? `\n${value}` : value);
    return true;
  }

  flushText(): void {
    if (!this.pending) {
      return;
    }
    const { field, parts } = this.pending;
    const value = parts.join('');
    if (field === 'text' && this.text) {
      this.text = `${this.text}\n${value}`;
    } else {
      this[field] = value;
    }
    this.pending = undefined;
  }
}

export class SubmitterRecord extends GedcomRecord {
  readonly recordType = 'submitter';

  name = '';
  address?: GedcomAddress | undefined;
  languages: string[] = [];
  recordFileNumber = '';
}

export class SubmissionRecord extends GedcomRecord {
  readonly recordType = 'submission';

  submitter = '';
  familyFile = '';
  templeCode = '';
  generationsOfAncestors = 0;
  generationsOfDescendants = 0;
  orderedProcessing = false;
}

export class GedcomEvent extends GedcomRecord {
  readonly recordType: 'event' | 'familyEvent' | 'individualEvent' | 'custom' = 'event';

  eventType: EventType;
  eventName = '';
  classification = '';
  date?: GedcomDate | undefined;
  place?: PlaceRecord | undefined;
  address?: GedcomAddress | undefined;
  responsibleAgency = '';
  religiousAffiliation = '';
  cause = '';
  certainty?: Certainty | undefined;

  constructor(eventType: EventType = 'EVEN') {
    super();
    this.eventType = eventType;
  }
}

export class FamilyEvent extends GedcomEvent {
  readonly recordType = 'familyEvent';

  husbandAge?: GedcomAge | undefined;
  wifeAge?: GedcomAge | undefined;
}

export class IndividualEvent extends GedcomEvent {
  readonly recordType = 'individualEvent';

  age?: GedcomAge | undefined;
  /** Family a birth, christening or adoption refers to. */
  famc = '';
  adoptedBy: AdoptionType = 'none';
}

/** An unrecognised extension tag, kept with its value and children. */
export class CustomRecord extends GedcomEvent {
  readonly recordType = 'custom';

  readonly tag: string;

  constructor(tag: string) {
    super('CUSTOM');
    this.tag = tag;
  }
}

export interface PlaceVariation {
  value: string;
  type: string;
}

export class PlaceRecord extends GedcomRecord {
  readonly recordType = 'place';

  name = '';
  form = '';
  phoneticVariations: PlaceVariation[] = [];
  romanizedVariations: PlaceVariation[] = [];
  latitude = '';
  longitude = '';
}

export class SourceCitation extends GedcomRecord {
  readonly recordType = 'sourceCitation';

  source = '';
  page = '';
  text = '';
  eventType = '';
  role = '';
  date?: GedcomDate | undefined;
  certainty?: Certainty | undefined;
  parsedText: string[] = [];
}

export interface CallNumber {
  callNumber: string;
  mediaType: SourceMediaType;
  /** Raw `MEDI` value when it named no known media type. */
  otherMediaType: string;
}

export class RepositoryCitation extends GedcomRecord {
  readonly recordType = 'repositoryCitation';

  repository = '';
  callNumbers: CallNumber[] = [];
}

export class SpouseSealing extends GedcomRecord {
  readonly recordType = 'spouseSealing';

  description = '';
  date?: GedcomDate | undefined;
  place?: PlaceRecord | undefined;
  status: SpouseSealingStatus = 'not_set';
  statusChangeDate?: GedcomDate | undefined;
  temple = '';
}

export class FamilyLink extends GedcomRecord {
  readonly recordType = 'familyLink';

  individual: string;
  family: string;
  role: FamilyLinkRole;
  fatherPedigree: PedigreeLinkage = 'unknown';
  motherPedigree: PedigreeLinkage = 'unknown';
  preferredSpouse = false;
  status: ChildLinkageStatus = 'unknown';

  private overall: PedigreeLinkage = 'unknown';

  constructor(individual: string, family: string, role: FamilyLinkRole) {
    super();
    this.individual = individual;
    this.family = family;
    this.role = role;
  }

  get pedigree(): PedigreeLinkage {
    return this.overall;
  }

  /** Applies to both parents. */
  set pedigree(value: PedigreeLinkage) {
    this.overall = value;
    this.fatherPedigree = value;
    this.motherPedigree = value;
  }
}

export class Association extends GedcomRecord {
  readonly recordType = 'association';

  individual = '';
  description = '';
}

export class NameRecord extends GedcomRecord {
  readonly recordType = 'name';

  name = '';
  given = '';
  surname = '';
  prefix = '';
  surnamePrefix = '';
  suffix = '';
  nick = '';
  type = '';
  preferred = false;
  phoneticVariations: PlaceVariation[] = [];
  romanizedVariations: PlaceVariation[] = [];

  /** Stores the raw value and splits it as `given /surname/ suffix`. */
  setName(value: string): void {
    this.name = value;
    const first = value.indexOf('/');
    if (first >= 0) {
      const last = value.indexOf('/', first + 1);
      this.given = value.slice(0, first).trim();
      if (last >= 0) {
        this.surname = value.slice(first + 1, last).trim();
        this.suffix = value.slice(last + 1).trim();
      } else {
        this.surname = value.slice(first + 1).trim();
      }
      return;
    }
    const trimmed = value.trim();
    const space = trimmed.lastIndexOf(' ');
    if (space < 0) {
      this.given = trimmed;
    } else {
      this.given = trimmed.slice(0, space).trim();
      this.surname = trimmed.slice(space + 1);
    }
  }
}

export class GedcomDate extends GedcomRecord {
  readonly recordType = 'date';

  dateString = '';
  time = '';
  parsed?: ParsedDate | undefined;
}

export type TopLevelRecord =
  | FamilyRecord
  | IndividualRecord
  | MultimediaRecord
  | NoteRecord
  | RepositoryRecord
  | SourceRecord
  | SubmitterRecord
  | SubmissionRecord;

export type AnyRecord =
  | GedcomHeader
  | TopLevelRecord
  | GedcomEvent
  | FamilyEvent
  | IndividualEvent
  | CustomRecord
  | PlaceRecord
  | SourceCitation
  | RepositoryCitation
  | SpouseSealing
  | FamilyLink
  | Association
  | NameRecord
  | GedcomDate;
