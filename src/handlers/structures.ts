import {
  Association,
  FamilyLink,
  GedcomDate,
  NameRecord,
  PlaceRecord,
  PlaceVariation,
  RepositoryCitation,
  SourceCitation,
  SourceRecord,
  SpouseSealing,
} from '../records';
import { ChildLinkageStatus, PedigreeLinkage, SourceMediaType, SpouseSealingStatus } from '../types';
import {
  NestedRule,
  RecordReader,
  TagHandler,
  TagInput,
  multimediaField,
  noteField,
  parseCertainty,
  sourceField,
} from './common';

const PEDIGREE_VALUES: Readonly<Record<string, PedigreeLinkage>> = {
  adopted: 'adopted',
  birth: 'birth',
  foster: 'foster',
  sealing: 'sealing',
  sealed: 'sealing',
};

const CHILD_STATUS_VALUES: readonly ChildLinkageStatus[] = ['challenged', 'disproven', 'proven'];

const SEALING_STATUS_VALUES: readonly SpouseSealingStatus[] = [
  'canceled',
  'child',
  'dns',
  'dns_can',
  'pre_1970',
  'submitted',
  'uncleared',
];

const MEDIA_TYPE_VALUES: readonly SourceMediaType[] = [
  'audio',
  'book',
  'card',
  'electronic',
  'fiche',
  'film',
  'magazine',
  'manuscript',
  'map',
  'newspaper',
  'photo',
  'tombstone',
  'video',
];

function pick<T extends string>(values: readonly T[], raw: string): T | undefined {
  return values.find(candidate => candidate === raw);
}

function variationType<R>(tag: 'FONE' | 'ROMN', list: (record: R) => PlaceVariation[]): NestedRule<R> {
  return {
    depth: 2,
    after: [tag],
    tags: ['TYPE'],
    handle: ({ assembler, record, token }) => {
      const variations = list(record);
      const variation = variations[variations.length - 1];
      if (variation) {
        variation.type = token.value;
      } else {
        assembler.anomaly('Variation type without a variation', token);
      }
    },
  };
}

// ============================================================================
// Place
// ============================================================================

export const placeReader: RecordReader<PlaceRecord> = {
  fields: {
    FORM: ({ record, token }) => {
      record.form = token.value;
    },
    FONE: ({ record, token }) => {
      record.phoneticVariations.push({ value: token.value, type: '' });
    },
    ROMN: ({ record, token }) => {
      record.romanizedVariations.push({ value: token.value, type: '' });
    },
    MAP: () => undefined,
    NOTE: noteField(),
  },
  nested: [
    variationType('FONE', place => place.phoneticVariations),
    variationType('ROMN', place => place.romanizedVariations),
    {
      depth: 2,
      after: ['MAP'],
      tags: ['LATI', 'LONG'],
      handle: ({ record, token }) => {
        if (token.tag === 'LATI') {
          record.latitude = token.value;
        } else {
          record.longitude = token.value;
        }
      },
    },
  ],
};

// ============================================================================
// Citations
// ============================================================================

function appendCitationText({ record, token }: TagInput<SourceCitation>): void {
  if (token.tag === 'CONC') {
    record.parsedText.push(token.value);
  } else if (token.tag === 'CONT' || record.parsedText.length > 0) {
    record.parsedText.push(`\n${token.value}`);
  } else {
    record.parsedText.push(token.value);
  }
}

/** Continuation of an inline source's title, written under its citation. */
const continueSourceTitle: TagHandler<SourceCitation> = ({ assembler, record, token }) => {
  const source = assembler.database.get(record.source);
  if (!(source instanceof SourceRecord)) {
    assembler.unexpected(record, token);
    return;
  }
  source.title += token.tag === 'CONT' ? `\n${token.value}` : token.value;
};

export const sourceCitationReader: RecordReader<SourceCitation> = {
  fields: {
    PAGE: ({ record, token }) => {
      record.page = token.value;
    },
    CONT: continueSourceTitle,
    CONC: continueSourceTitle,
    TEXT: appendCitationText,
    DATA: () => undefined,
    EVEN: ({ record, token }) => {
      record.eventType = token.value;
    },
    OBJE: multimediaField(),
    NOTE: noteField(),
    QUAY: input => {
      input.record.certainty = parseCertainty(input);
    },
  },
  nested: [
    {
      depth: 2,
      after: ['EVEN'],
      tags: ['ROLE'],
      handle: ({ record, token }) => {
        record.role = token.value;
      },
    },
    {
      depth: 2,
      after: ['DATA'],
      tags: ['DATE'],
      handle: ({ assembler, record, token }) => {
        record.date = assembler.readDate(token);
      },
    },
    { depth: 2, after: ['DATA', 'TEXT'], tags: ['TEXT', 'CONT', 'CONC'], handle: appendCitationText },
    {
      depth: 2,
      after: ['PAGE'],
      tags: ['CONT', 'CONC'],
      handle: ({ record, token }) => {
        record.page += token.tag === 'CONT' ? `\n${token.value}` : token.value;
      },
    },
    { depth: 3, after: ['TEXT'], tags: ['CONT', 'CONC'], handle: appendCitationText },
  ],
  finalize: (_assembler, record) => {
    if (record.parsedText.length > 0) {
      record.text = record.parsedText.join('');
      record.parsedText = [];
    }
    return true;
  },
};

export const repositoryCitationReader: RecordReader<RepositoryCitation> = {
  fields: {
    NOTE: noteField(),
    CALN: ({ record, token }) => {
      record.callNumbers.push({ callNumber: token.value, mediaType: 'none', otherMediaType: '' });
    },
  },
  nested: [
    {
      depth: 2,
      after: ['CALN'],
      tags: ['MEDI'],
      handle: ({ assembler, record, token }) => {
        const callNumber = record.callNumbers[record.callNumbers.length - 1];
        if (!callNumber) {
          assembler.unexpected(record, token);
          return;
        }
        const mediaType = pick(MEDIA_TYPE_VALUES, token.value.trim().toLowerCase().replace(/\s+/g, ''));
        if (mediaType) {
          callNumber.mediaType = mediaType;
        } else {
          callNumber.mediaType = 'other';
          callNumber.otherMediaType = token.value;
        }
      },
    },
  ],
};

// ============================================================================
// Family structures
// ============================================================================

export const spouseSealingReader: RecordReader<SpouseSealing> = {
  fields: {
    DATE: ({ assembler, record, token }) => {
      record.date = assembler.readDate(token);
    },
    PLAC: ({ assembler, record, token }) => {
      const place = assembler.readPlace(token);
      record.place = place;
      assembler.push(place);
    },
    NOTE: noteField(),
    SOUR: sourceField(),
    STAT: ({ assembler, record, token }) => {
      const status = pick(SEALING_STATUS_VALUES, token.value.trim().toLowerCase().replace('-', '_'));
      if (!status) {
        assembler.anomaly('Unknown sealing status', token);
      }
      record.status = status ?? 'not_set';
    },
    TEMP: ({ record, token }) => {
      record.temple = token.value;
    },
  },
  nested: [
    {
      depth: 2,
      after: ['STAT'],
      tags: ['DATE'],
      handle: ({ assembler, record, token }) => {
        const date = assembler.readDate(token);
        record.statusChangeDate = date;
        assembler.push(date);
      },
    },
  ],
};

export const familyLinkReader: RecordReader<FamilyLink> = {
  fields: {
    PEDI: ({ assembler, record, token }) => {
      const pedigree = PEDIGREE_VALUES[token.value.trim().toLowerCase()];
      if (!pedigree) {
        assembler.anomaly('Unknown pedigree', token);
      }
      record.pedigree = pedigree ?? 'unknown';
    },
    STAT: ({ assembler, record, token }) => {
      const status = pick(CHILD_STATUS_VALUES, token.value.trim().toLowerCase());
      if (!status) {
        assembler.anomaly('Unknown child linkage status', token);
      }
      record.status = status ?? 'unknown';
    },
    NOTE: noteField(),
  },
};

export const associationReader: RecordReader<Association> = {
  fields: {
    RELA: ({ record, token }) => {
      record.description = token.value;
    },
    NOTE: noteField(),
    SOUR: sourceField(),
  },
};

// ============================================================================
// Names and dates
// ============================================================================

function namePart(apply: (name: NameRecord, value: string) => void): TagHandler<NameRecord> {
  return ({ record, token }) => {
    const value = token.value.trim();
    if (value) {
      apply(record, value);
    }
  };
}

export const nameReader: RecordReader<NameRecord> = {
  fields: {
    TYPE: ({ record, token }) => {
      record.type = token.value;
    },
    FONE: ({ record, token }) => {
      record.phoneticVariations.push({ value: token.value, type: '' });
    },
    ROMN: ({ record, token }) => {
      record.romanizedVariations.push({ value: token.value, type: '' });
    },
    NPFX: namePart((name, value) => {
      if (!name.prefix) {
        name.prefix = value;
      }
    }),
    GIVN: namePart((name, value) => {
      name.given = value;
    }),
    NICK: namePart((name, value) => {
      name.nick = value;
    }),
    SPFX: namePart((name, value) => {
      name.surnamePrefix = value;
    }),
    SURN: namePart((name, value) => {
      name.surname = value;
    }),
    NSFX: namePart((name, value) => {
      name.suffix = value;
    }),
    NOTE: noteField(),
    SOUR: sourceField(),
  },
  nested: [
    variationType('FONE', name => name.phoneticVariations),
    variationType('ROMN', name => name.romanizedVariations),
  ],
};

export const dateReader: RecordReader<GedcomDate> = {
  fields: {
    DATE: ({ assembler, record, token }) => {
      const parsed = assembler.readDate(token);
      record.dateString = parsed.dateString;
      record.parsed = parsed.parsed;
    },
    TIME: ({ record, token }) => {
      record.time = token.value;
    },
    NOTE: noteField(),
    SOUR: sourceField(),
  },
  nested: [
    {
      depth: 2,
      after: ['DATE'],
      tags: ['TIME'],
      handle: ({ record, token }) => {
        record.time = token.value;
      },
    },
  ],
};
