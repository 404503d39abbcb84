import { EventType } from '../event-types';
import { Association, FamilyLink, GedcomAddress, IndividualEvent, IndividualRecord, NameRecord } from '../records';
import { Sex } from '../types';
import {
  RecordReader,
  TagHandler,
  VendorOutcome,
  TagInput,
  addressFields,
  addressRule,
  dataOf,
  multimediaField,
  noteField,
  recordKeepingFields,
  referenceTypeRule,
  restrictionField,
  sourceField,
} from './common';

const INDIVIDUAL_EVENTS: readonly EventType[] = [
  'BIRT', 'CHR', 'DEAT', 'BURI', 'CREM', 'ADOP', 'BAPM', 'BARM', 'BASM', 'BLES', 'CHRA', 'CONF',
  'FCOM', 'ORDN', 'NATU', 'EMIG', 'IMMI', 'CENS', 'PROB', 'WILL', 'GRAD', 'RETI',
];

const INDIVIDUAL_FACTS: readonly EventType[] = [
  'CAST', 'DSCR', 'EDUC', 'IDNO', 'NATI', 'NCHI', 'NMR', 'OCCU', 'PROP', 'RELI', 'RESI', 'SSN', 'TITL', 'FACT',
];

const SEX_CODES: Readonly<Record<string, Sex>> = {
  M: 'male',
  F: 'female',
  B: 'both',
  N: 'neuter',
  U: 'unknown',
};

function ensureAddress(individual: IndividualRecord): GedcomAddress {
  if (!individual.address) {
    individual.address = new GedcomAddress();
  }
  return individual.address;
}

function eventField(type: EventType, fact: boolean): TagHandler<IndividualRecord> {
  return ({ assembler, record, token, classification }) => {
    const event = new IndividualEvent(type);
    event.level = token.level;
    if (fact || type === 'EVEN') {
      event.eventName = dataOf(token);
    }
    if (classification !== undefined) {
      event.classification = classification;
    }
    (fact ? record.attributes : record.events).push(event);
    assembler.push(event);
  };
}

function familyLinkField(role: 'child' | 'spouse'): TagHandler<IndividualRecord> {
  return ({ assembler, record, token }) => {
    if (token.valueKind !== 'pointer') {
      assembler.unexpected(record, token);
      return;
    }
    const link = new FamilyLink(record.xrefId, token.value, role);
    link.level = token.level;
    if (role === 'child') {
      record.childIn.push(link);
    } else {
      link.preferredSpouse = record.spouseIn.length === 0;
      record.spouseIn.push(link);
    }
    assembler.session.referenced(token.value);
    assembler.push(link);
  };
}

function akaName({ record, token }: TagInput<IndividualRecord>): void {
  const name = new NameRecord();
  name.level = token.level;
  name.type = 'aka';
  name.setName(token.value);
  record.names.push(name);
}

function pointerList(pick: (record: IndividualRecord) => string[]): TagHandler<IndividualRecord> {
  return ({ assembler, record, token }) => {
    if (token.valueKind !== 'pointer') {
      assembler.unexpected(record, token);
      return;
    }
    pick(record).push(token.value);
    assembler.session.referenced(token.value);
  };
}

/** Vendor facts written as their own extension tag. */
function translated(tag: string, value: string): (input: TagInput<IndividualRecord>) => VendorOutcome {
  return ({ token }) => ({ tag, value, classification: token.value });
}

const eventFields: Record<string, TagHandler<IndividualRecord>> = {};
for (const type of INDIVIDUAL_EVENTS) {
  eventFields[type] = eventField(type, false);
}
for (const type of INDIVIDUAL_FACTS) {
  eventFields[type] = eventField(type, true);
}

export const individualReader: RecordReader<IndividualRecord> = {
  fields: {
    ...eventFields,
    EVEN: eventField('EVEN', false),
    FAMC: familyLinkField('child'),
    FAMS: familyLinkField('spouse'),
    ASSO: ({ assembler, record, token }) => {
      const association = new Association();
      association.level = token.level;
      association.individual = token.value;
      if (token.valueKind === 'pointer') {
        assembler.session.referenced(token.value);
      }
      record.associations.push(association);
      assembler.push(association);
    },
    RESN: restrictionField(),
    NAME: ({ assembler, record, token }) => {
      const name = new NameRecord();
      name.level = token.level;
      name.setName(token.value);
      name.preferred = record.names.length === 0;
      record.names.push(name);
      assembler.push(name);
    },
    AKA: akaName,
    SEX: ({ assembler, record, token }) => {
      const sex = SEX_CODES[token.value.trim().toUpperCase()];
      if (sex) {
        record.sex = sex;
      } else {
        assembler.anomaly('Unknown sex value', token);
      }
    },
    SUBM: ({ assembler, record, token }) => {
      record.submitters.push(assembler.addSubmitter(token));
    },
    ALIA: input => {
      if (input.token.valueKind === 'pointer') {
        input.record.aliases.push(input.token.value);
        input.assembler.session.referenced(input.token.value);
      } else {
        akaName(input);
      }
    },
    ANCI: pointerList(record => record.ancestorInterest),
    DESI: pointerList(record => record.descendantInterest),
    RFN: ({ record, token }) => {
      record.permanentRecordFileNumber = token.value;
    },
    AFN: ({ record, token }) => {
      record.ancestralFileNumber = token.value;
    },
    ...recordKeepingFields<IndividualRecord>(),
    NOTE: noteField(),
    SOUR: sourceField(),
    OBJE: multimediaField(),
    ...addressFields(ensureAddress),
  },
  nested: [
    referenceTypeRule(),
    addressRule(2, individual => individual.address),
  ],
  vendor: {
    _MILT: translated('EVEN', 'Military Service'),
    _MDCL: translated('FACT', 'Medical'),
    _HEIG: translated('FACT', 'Height'),
    _WEIG: translated('FACT', 'Weight'),
  },
  // Some producers put ADDR straight on the individual; keep it as a residence.
  finalize: (assembler, record) => {
    if (record.address) {
      const residence = new IndividualEvent('RESI');
      residence.level = record.level + 1;
      residence.database = assembler.database;
      residence.address = record.address;
      record.attributes.push(residence);
      record.address = undefined;
    }
    return true;
  },
};
