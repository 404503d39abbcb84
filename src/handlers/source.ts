import { EventType, eventTypeForTag } from '../event-types';
import { RepositoryCitation, SourceRecord, SourceTextField } from '../records';
import {
  RecordReader,
  TagHandler,
  multimediaField,
  noteField,
  recordKeepingFields,
  referenceTypeRule,
} from './common';

function textField(field: SourceTextField): TagHandler<SourceRecord> {
  return ({ record, token }) => {
    record.startText(field, token.value);
  };
}

function recordedEventType(tag: string): EventType | undefined {
  return eventTypeForTag(tag, ['generic', 'family', 'individual']) ?? eventTypeForTag(tag, ['fact']);
}

/** A new direct field ends whichever multi-line field was being collected. */
function flushFirst(fields: Record<string, TagHandler<SourceRecord>>): Record<string, TagHandler<SourceRecord>> {
  const wrapped: Record<string, TagHandler<SourceRecord>> = {};
  for (const [tag, handler] of Object.entries(fields)) {
    wrapped[tag] = input => {
      input.record.flushText();
      handler(input);
    };
  }
  return wrapped;
}

export const sourceReader: RecordReader<SourceRecord> = {
  fields: flushFirst({
    DATA: () => undefined,
    AUTH: textField('originator'),
    TITL: textField('title'),
    PUBL: textField('publicationFacts'),
    TEXT: textField('text'),
    ABBR: ({ record, token }) => {
      record.filedBy = token.value;
    },
    REPO: ({ assembler, record, token }) => {
      const citation = new RepositoryCitation();
      citation.level = token.level;
      if (token.valueKind === 'pointer') {
        citation.repository = token.value;
        assembler.session.referenced(token.value);
        assembler.session.repositoryCitations.push(citation);
      } else {
        assembler.anomaly('Repository citation without a repository pointer', token);
      }
      record.repositoryCitations.push(citation);
      assembler.push(citation);
    },
    ...recordKeepingFields<SourceRecord>(),
    NOTE: noteField(),
    OBJE: multimediaField(),
  }),
  nested: [
    referenceTypeRule(),
    {
      depth: 2,
      tags: ['CONT', 'CONC'],
      handle: ({ assembler, record, token }) => {
        if (!record.appendText(token.value, token.tag === 'CONT')) {
          assembler.unexpected(record, token);
        }
      },
    },
    {
      depth: 2,
      after: ['DATA'],
      tags: ['AGNC'],
      handle: ({ record, token }) => {
        record.agency = token.value;
      },
    },
    {
      depth: 2,
      after: ['DATA'],
      tags: ['EVEN'],
      handle: ({ assembler, record, token }) => {
        const types: EventType[] = [];
        for (const tag of token.value.split(',')) {
          const type = recordedEventType(tag.trim());
          if (type) {
            types.push(type);
          } else if (tag.trim()) {
            assembler.anomaly(`Unknown recorded event ${tag.trim()}`, token);
          }
        }
        record.eventsRecorded.push({ types });
      },
    },
    {
      depth: 2,
      after: ['DATA'],
      tags: ['NOTE'],
      handle: ({ assembler, record, token }) => {
        assembler.addNote(token, record.dataNotes);
      },
    },
    {
      depth: 3,
      after: ['EVEN'],
      tags: ['DATE', 'PLAC'],
      handle: ({ assembler, record, token }) => {
        const recorded = record.eventsRecorded[record.eventsRecorded.length - 1];
        if (!recorded) {
          assembler.unexpected(record, token);
        } else if (token.tag === 'DATE') {
          recorded.date = assembler.readDate(token);
        } else {
          recorded.place = assembler.readPlace(token);
        }
      },
    },
  ],
  finalize: (_assembler, record) => {
    record.flushText();
    return true;
  },
};
