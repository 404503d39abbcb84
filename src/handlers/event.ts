import { EventScope, readableToEventType } from '../event-types';
import { FamilyEvent, GedcomAddress, GedcomEvent, IndividualEvent } from '../records';
import { AdoptionType } from '../types';
import {
  RecordReader,
  TagHandler,
  addressFields,
  addressRule,
  dataOf,
  multimediaField,
  noteField,
  parseCertainty,
  restrictionField,
  sourceField,
} from './common';

const ADOPTING_PARTIES: Readonly<Record<string, AdoptionType>> = {
  HUSB: 'husband',
  WIFE: 'wife',
  BOTH: 'both',
};

function ensureAddress(event: GedcomEvent): GedcomAddress {
  if (!event.address) {
    event.address = new GedcomAddress();
  }
  return event.address;
}

function typeScopes(event: GedcomEvent): readonly EventScope[] {
  if (event.eventType === 'FACT') {
    return ['fact'];
  }
  if (event instanceof FamilyEvent) {
    return ['family'];
  }
  if (event instanceof IndividualEvent) {
    return ['individual'];
  }
  return ['family', 'individual'];
}

/**
 * `TYPE` names the kind of a generic `EVEN`/`FACT`; when it spells a known
 * event the record becomes that event, otherwise it is kept as classification.
 */
const readType: TagHandler<GedcomEvent> = ({ record, token, previous }) => {
  if ((record.eventType === 'EVEN' || record.eventType === 'FACT') && !record.eventName) {
    const converted = readableToEventType(token.value, typeScopes(record));
    if (converted) {
      record.eventType = converted;
      return;
    }
  }
  if (token.value !== previous?.tag) {
    record.classification = token.value;
  }
};

/** Individual events sometimes carry an age such as `INFANT` as their date; both are kept. */
const readDate: TagHandler<GedcomEvent> = ({ assembler, record, token }) => {
  const date = assembler.readDate(token);
  record.date = date;
  if (!date.parsed && record instanceof IndividualEvent && token.value) {
    record.age = assembler.dateParser.parseAge(token.value) ?? record.age;
  }
};

const readContinuation: TagHandler<GedcomEvent> = ({ assembler, record, token }) => {
  if (record.eventType !== 'DSCR') {
    assembler.unexpected(record, token);
    return;
  }
  record.eventName += token.tag === 'CONT' ? `\n${token.value}` : token.value;
};

/** Shared by generic, family and individual events and by custom nodes. */
export const eventReader: RecordReader<GedcomEvent> = {
  fields: {
    TYPE: readType,
    DATE: readDate,
    PLAC: ({ assembler, record, token }) => {
      if (!token.value) {
        assembler.anomaly('Place without a name', token);
      }
      const place = assembler.readPlace(token);
      record.place = place;
      assembler.push(place);
    },
    ...addressFields(ensureAddress),
    AGNC: ({ record, token }) => {
      record.responsibleAgency = token.value;
    },
    RELI: ({ record, token }) => {
      record.religiousAffiliation = token.value;
    },
    CAUS: ({ record, token }) => {
      record.cause = token.value;
    },
    RESN: restrictionField(),
    NOTE: noteField(),
    SOUR: sourceField(),
    OBJE: multimediaField(),
    QUAY: input => {
      input.record.certainty = parseCertainty(input);
    },
    CONT: readContinuation,
    CONC: readContinuation,
    // Husband and wife blocks only carry an AGE below them.
    HUSB: ({ assembler, record, token }) => {
      if (!(record instanceof FamilyEvent)) {
        assembler.unexpected(record, token);
      }
    },
    WIFE: ({ assembler, record, token }) => {
      if (!(record instanceof FamilyEvent)) {
        assembler.unexpected(record, token);
      }
    },
    AGE: ({ assembler, record, token }) => {
      if (!(record instanceof IndividualEvent)) {
        assembler.unexpected(record, token);
        return;
      }
      record.age = assembler.dateParser.parseAge(token.value);
    },
    FAMC: ({ assembler, record, token }) => {
      const linksFamily = record.eventType === 'BIRT' || record.eventType === 'CHR' || record.eventType === 'ADOP';
      if (!(record instanceof IndividualEvent) || !linksFamily || token.valueKind !== 'pointer') {
        assembler.unexpected(record, token);
        return;
      }
      record.famc = token.value;
      assembler.session.referenced(token.value);
    },
  },
  nested: [
    addressRule(2, event => event.address),
    {
      depth: 2,
      after: ['HUSB', 'WIFE'],
      tags: ['AGE'],
      handle: ({ assembler, record, token, previous }) => {
        if (!(record instanceof FamilyEvent)) {
          assembler.unexpected(record, token);
          return;
        }
        const age = assembler.dateParser.parseAge(token.value);
        if (previous?.tag === 'HUSB') {
          record.husbandAge = age;
        } else {
          record.wifeAge = age;
        }
      },
    },
    {
      depth: 2,
      after: ['FAMC'],
      tags: ['ADOP'],
      handle: ({ assembler, record, token }) => {
        if (!(record instanceof IndividualEvent) || record.eventType !== 'ADOP') {
          assembler.unexpected(record, token);
          return;
        }
        record.adoptedBy = ADOPTING_PARTIES[dataOf(token).trim().toUpperCase()] ?? 'both';
      },
    },
  ],
};
