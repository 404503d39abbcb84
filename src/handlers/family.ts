import { EventType } from '../event-types';
import { FamilyEvent, FamilyRecord, SpouseSealing } from '../records';
import { AdoptionType, MarriageStartStatus, PedigreeLinkage } from '../types';
import {
  RecordReader,
  TagHandler,
  TagInput,
  VendorOutcome,
  multimediaField,
  noteField,
  parseCount,
  recordKeepingFields,
  referenceTypeRule,
  restrictionField,
  sourceField,
} from './common';

const FAMILY_EVENTS: Readonly<Record<string, EventType>> = {
  ANUL: 'ANUL',
  CENS: 'CENS_FAM',
  DIV: 'DIV',
  DIVF: 'DIVF',
  ENGA: 'ENGA',
  MARB: 'MARB',
  MARC: 'MARC',
  MARR: 'MARR',
  MARL: 'MARL',
  MARS: 'MARS',
  RESI: 'RESI_FAM',
  EVEN: 'EVEN',
};

const START_STATUSES: readonly MarriageStartStatus[] = ['unknown', 'married', 'friends', 'partners', 'single', 'other'];

const PARENT_SIDES: Readonly<Record<string, AdoptionType>> = {
  HUSB: 'husband',
  WIFE: 'wife',
  BOTH: 'both',
};

/** Vendor relationship values written after a `CHIL` line. */
const RELATIONSHIP_VALUES: Readonly<Record<string, PedigreeLinkage>> = {
  Natural: 'birth',
  Adopted: 'adopted',
};

function eventField(type: EventType): TagHandler<FamilyRecord> {
  return ({ assembler, record, token }) => {
    const event = new FamilyEvent(type);
    event.level = token.level;
    if (type === 'EVEN' && token.valueKind === 'data') {
      event.eventName = token.value;
    }
    record.events.push(event);
    assembler.push(event);
  };
}

function spouseField(side: 'husband' | 'wife'): TagHandler<FamilyRecord> {
  return ({ assembler, record, token }) => {
    if (token.valueKind !== 'pointer') {
      assembler.unexpected(record, token);
      return;
    }
    record[side] = token.value;
    assembler.session.referenced(token.value);
  };
}

function lastChild({ assembler, record, token }: TagInput<FamilyRecord>): string | undefined {
  const child = record.children[record.children.length - 1];
  if (child === undefined) {
    assembler.anomaly(`${token.tag} without a child reference`, token);
  }
  return child;
}

/** Legacy `ADOP` / `FOST` under `CHIL`, naming the parent side as value. */
function legacyLinkage(linkage: PedigreeLinkage): TagHandler<FamilyRecord> {
  return input => {
    const child = lastChild(input);
    if (child !== undefined) {
      const side = PARENT_SIDES[input.token.value.trim().toUpperCase()] ?? 'both';
      input.record.setLinkage(child, linkage, side);
    }
  };
}

function relationship(side: 'husband' | 'wife'): (input: TagInput<FamilyRecord>) => VendorOutcome {
  return input => {
    const { assembler, token, previous } = input;
    if (previous?.tag !== 'CHIL' || token.level !== previous.level + 1) {
      assembler.anomaly(`${token.tag} outside a child reference`, token);
      return 'handled';
    }
    const child = lastChild(input);
    const linkage = RELATIONSHIP_VALUES[token.value.trim()];
    if (child === undefined) {
      return 'handled';
    }
    if (linkage) {
      input.record.setLinkage(child, linkage, side);
    } else {
      assembler.anomaly(`Unsupported value for ${token.tag}`, token);
    }
    return 'handled';
  };
}

const eventFields: Record<string, TagHandler<FamilyRecord>> = {};
for (const [tag, type] of Object.entries(FAMILY_EVENTS)) {
  eventFields[tag] = eventField(type);
}

export const familyReader: RecordReader<FamilyRecord> = {
  fields: {
    ...eventFields,
    HUSB: spouseField('husband'),
    WIFE: spouseField('wife'),
    CHIL: ({ assembler, record, token }) => {
      if (token.valueKind !== 'pointer') {
        assembler.unexpected(record, token);
        return;
      }
      record.children.push(token.value);
      assembler.session.referenced(token.value);
    },
    NCHI: input => {
      input.record.numberOfChildren = parseCount(input);
    },
    SUBM: ({ assembler, record, token }) => {
      record.submitters.push(assembler.addSubmitter(token));
    },
    SLGS: ({ assembler, record, token }) => {
      const sealing = new SpouseSealing();
      sealing.level = token.level;
      sealing.description = token.value;
      record.spouseSealings.push(sealing);
      assembler.push(sealing);
    },
    RESN: restrictionField(),
    ...recordKeepingFields<FamilyRecord>(),
    NOTE: noteField(),
    SOUR: sourceField(),
    OBJE: multimediaField(),
  },
  nested: [
    referenceTypeRule(),
    { depth: 2, after: ['CHIL'], tags: ['ADOP'], handle: legacyLinkage('adopted') },
    { depth: 2, after: ['CHIL'], tags: ['FOST'], handle: legacyLinkage('foster') },
  ],
  vendor: {
    _MSTAT: ({ assembler, record, token }) => {
      const value = token.value.trim().toLowerCase();
      const status = START_STATUSES.find(candidate => candidate === value);
      if (status) {
        record.startStatus = status;
      } else {
        assembler.anomaly('Unknown marriage start status', token);
      }
      return 'handled';
    },
    _FREL: relationship('husband'),
    _MREL: relationship('wife'),
  },
};
