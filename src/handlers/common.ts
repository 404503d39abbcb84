import { RecordAssembler } from '../assembler';
import { TagLevel } from '../context';
import { GedcomAddress, GedcomRecord } from '../records';
import { CERTAINTY_BY_QUAY, Certainty, GedcomToken, RestrictionNotice } from '../types';

export interface TagInput<R> {
  assembler: RecordAssembler;
  record: R;
  token: GedcomToken;
  /** Top of the tag history when the token arrived. */
  previous: TagLevel | undefined;
  /** Raw value of a vendor tag that was translated into `token.tag`. */
  classification?: string | undefined;
}

export type TagHandler<R> = (input: TagInput<R>) => void;

/**
 * Handles tags nested below a record's direct fields. A rule applies when the
 * token sits `depth` levels below the record and the top of the history
 * stack is one of `after`.
 */
export interface NestedRule<R> {
  depth: number;
  after?: readonly string[];
  tags?: readonly string[];
  handle: TagHandler<R>;
}

export type VendorOutcome =
  | 'handled'
  | 'custom'
  | { tag: string; value: string; classification?: string };

export interface RecordReader<R extends GedcomRecord> {
  /** Direct fields, one level below the record. */
  fields: Readonly<Record<string, TagHandler<R>>>;
  nested?: readonly NestedRule<R>[];
  /** Extension tags this variant knows; anything else becomes a custom node. */
  vendor?: Readonly<Record<string, (input: TagInput<R>) => VendorOutcome>>;
  /** Runs when the record is popped; false discards it. */
  finalize?: (assembler: RecordAssembler, record: R) => boolean;
}

export function runReader<R extends GedcomRecord>(
  reader: RecordReader<R>,
  assembler: RecordAssembler,
  record: R,
  token: GedcomToken,
): void {
  let input: TagInput<R> = { assembler, record, token, previous: assembler.session.previousTag };

  if (token.tag.startsWith('_')) {
    const vendor = reader.vendor?.[token.tag];
    const outcome = vendor ? vendor(input) : 'custom';
    if (outcome === 'handled') {
      return;
    }
    if (outcome === 'custom') {
      assembler.addCustom(record, token);
      return;
    }
    input = {
      ...input,
      token: { ...token, tag: outcome.tag, value: outcome.value, valueKind: outcome.value ? 'data' : 'none' },
      classification: outcome.classification,
    };
  }

  const depth = input.token.level - record.parsingLevel;
  if (depth === 1) {
    const handler = reader.fields[input.token.tag];
    if (handler) {
      handler(input);
      return;
    }
  } else {
    const rule = reader.nested?.find(candidate => matches(candidate, depth, input));
    if (rule) {
      rule.handle(input);
      return;
    }
  }
  assembler.unexpected(record, input.token);
}

function matches<R>(rule: NestedRule<R>, depth: number, input: TagInput<R>): boolean {
  if (rule.depth !== depth) {
    return false;
  }
  if (rule.after && !(input.previous && rule.after.includes(input.previous.tag))) {
    return false;
  }
  return !rule.tags || rule.tags.includes(input.token.tag);
}

// ============================================================================
// Value parsing
// ============================================================================

const RESTRICTIONS: readonly RestrictionNotice[] = ['locked', 'privacy', 'confidential'];

export function parseRestriction(input: TagInput<unknown>): RestrictionNotice {
  const value = input.token.value.trim().toLowerCase();
  const found = RESTRICTIONS.find(candidate => candidate === value);
  if (found) {
    return found;
  }
  input.assembler.anomaly('Invalid restriction notice, treated as confidential', input.token);
  return 'confidential';
}

export function parseCertainty(input: TagInput<unknown>): Certainty | undefined {
  const quay = Number.parseInt(input.token.value, 10);
  if (Number.isNaN(quay)) {
    input.assembler.anomaly('Invalid certainty assessment', input.token);
    return undefined;
  }
  return CERTAINTY_BY_QUAY[quay] ?? 'unreliable';
}

export function parseCount(input: TagInput<unknown>): number {
  const count = Number.parseInt(input.token.value, 10);
  if (Number.isNaN(count)) {
    input.assembler.anomaly(`Invalid number for ${input.token.tag}`, input.token);
    return 0;
  }
  return count;
}

/** Data value, or empty for pointers and bare tags. */
export function dataOf(token: GedcomToken): string {
  return token.valueKind === 'data' ? token.value : '';
}

// ============================================================================
// Fields shared by several variants
// ============================================================================

export function noteField<R extends GedcomRecord>(): TagHandler<R> {
  return ({ assembler, record, token }) => {
    assembler.addNote(token, record.notes);
  };
}

export function sourceField<R extends GedcomRecord>(): TagHandler<R> {
  return ({ assembler, record, token }) => {
    assembler.addSourceCitation(token, record.sources);
  };
}

export function multimediaField<R extends GedcomRecord>(): TagHandler<R> {
  return ({ assembler, record, token }) => {
    assembler.addMultimedia(token, record.multimedia);
  };
}

export function restrictionField<R extends GedcomRecord>(): TagHandler<R> {
  return input => {
    input.record.restrictionNotice = parseRestriction(input);
  };
}

/** `REFN`, `RIN` and `CHAN`, present on every top-level record. */
export function recordKeepingFields<R extends GedcomRecord>(): Record<string, TagHandler<R>> {
  return {
    REFN: ({ record, token }) => {
      record.userReferenceNumber = token.value;
    },
    RIN: ({ record, token }) => {
      record.automatedRecordId = token.value;
    },
    CHAN: ({ assembler, record, token }) => {
      assembler.readChangeDate(record, token);
    },
  };
}

export function referenceTypeRule<R extends GedcomRecord>(): NestedRule<R> {
  return {
    depth: 2,
    after: ['REFN'],
    tags: ['TYPE'],
    handle: ({ record, token }) => {
      record.userReferenceType = token.value;
    },
  };
}

// ============================================================================
// Addresses
// ============================================================================

export type AddressOwner<R> = (record: R) => GedcomAddress;

/** `ADDR` and the contact tags written beside it. */
export function addressFields<R>(ensure: AddressOwner<R>): Record<string, TagHandler<R>> {
  return {
    ADDR: ({ record, token }) => {
      ensure(record).addressLine = dataOf(token);
    },
    PHON: contactField(ensure, 'phone'),
    EMAIL: contactField(ensure, 'email'),
    FAX: contactField(ensure, 'fax'),
    WWW: contactField(ensure, 'www'),
  };
}

function contactField<R>(ensure: AddressOwner<R>, kind: 'phone' | 'email' | 'fax' | 'www'): TagHandler<R> {
  return input => {
    if (!ensure(input.record).addContact(kind, input.token.value)) {
      input.assembler.anomaly(`More than three ${kind} entries, extra dropped`, input.token);
    }
  };
}

/** Structured lines under an `ADDR` that sits `depth - 1` below the record. */
export function addressRule<R extends GedcomRecord>(
  depth: number,
  find: (record: R) => GedcomAddress | undefined,
): NestedRule<R> {
  return {
    depth,
    after: ['ADDR'],
    handle: input => {
      const address = find(input.record);
      if (!address || !applyAddressLine(address, input.token)) {
        input.assembler.unexpected(input.record, input.token);
      }
    },
  };
}

export function applyAddressLine(address: GedcomAddress, token: GedcomToken): boolean {
  const value = dataOf(token);
  switch (token.tag) {
    case 'CONT':
      address.addressLine += `\n${value}`;
      return true;
    case 'CONC':
      address.addressLine += value;
      return true;
    case 'ADR1':
      address.line1 = value;
      return true;
    case 'ADR2':
      address.line2 = value;
      return true;
    case 'ADR3':
      address.line3 = value;
      return true;
    case 'CITY':
      address.city = value;
      return true;
    case 'STAE':
      address.state = value;
      return true;
    case 'POST':
      address.postCode = value;
      return true;
    case 'CTRY':
      address.country = value;
      return true;
    default:
      return false;
  }
}
