import {
  GedcomAddress,
  MultimediaFile,
  MultimediaRecord,
  NoteRecord,
  RepositoryRecord,
  SubmissionRecord,
  SubmitterRecord,
} from '../records';
import {
  RecordReader,
  addressFields,
  addressRule,
  multimediaField,
  noteField,
  parseCount,
  recordKeepingFields,
  referenceTypeRule,
  sourceField,
} from './common';

const MAX_SUBMITTER_LANGUAGES = 3;

export const noteReader: RecordReader<NoteRecord> = {
  fields: {
    CONT: ({ record, token }) => {
      record.parsedText.push(`\n${token.value}`);
    },
    CONC: ({ record, token }) => {
      record.parsedText.push(token.value);
    },
    ...recordKeepingFields<NoteRecord>(),
    SOUR: sourceField(),
  },
  nested: [referenceTypeRule()],
  // Blank notes are dropped; their id is remembered so references to it are not reported.
  finalize: (assembler, record) => {
    record.text = record.parsedText.join('');
    record.parsedText = [];
    if (record.text.trim()) {
      return true;
    }
    assembler.session.removedNotes.add(record.xrefId);
    return false;
  },
};

function currentFile(record: MultimediaRecord): MultimediaFile {
  return record.lastFile ?? record.addFile();
}

export const multimediaReader: RecordReader<MultimediaRecord> = {
  fields: {
    FORM: ({ record, token }) => {
      currentFile(record).format = token.value;
    },
    TITL: ({ record, token }) => {
      record.title = token.value;
    },
    FILE: ({ record, token }) => {
      const last = record.lastFile;
      const file = last && !last.filename ? last : record.addFile();
      file.filename = token.value;
    },
    ...recordKeepingFields<MultimediaRecord>(),
    NOTE: noteField(),
    SOUR: sourceField(),
  },
  nested: [
    referenceTypeRule(),
    {
      depth: 2,
      after: ['FILE'],
      tags: ['FORM', 'TITL'],
      handle: ({ record, token }) => {
        if (token.tag === 'FORM') {
          currentFile(record).format = token.value;
        } else {
          record.title = token.value;
        }
      },
    },
    {
      depth: 2,
      after: ['FORM'],
      tags: ['MEDI', 'TYPE'],
      handle: ({ record, token }) => {
        currentFile(record).sourceMediaType = token.value;
      },
    },
    {
      depth: 3,
      after: ['FORM'],
      tags: ['TYPE', 'MEDI'],
      handle: ({ record, token }) => {
        currentFile(record).mediaType = token.value;
      },
    },
  ],
};

function ensureRepositoryAddress(record: RepositoryRecord): GedcomAddress {
  if (!record.address) {
    record.address = new GedcomAddress();
  }
  return record.address;
}

export const repositoryReader: RecordReader<RepositoryRecord> = {
  fields: {
    NAME: ({ record, token }) => {
      record.name = token.value;
    },
    ...addressFields(ensureRepositoryAddress),
    ...recordKeepingFields<RepositoryRecord>(),
    NOTE: noteField(),
  },
  nested: [referenceTypeRule(), addressRule(2, record => record.address)],
};

function ensureSubmitterAddress(record: SubmitterRecord): GedcomAddress {
  if (!record.address) {
    record.address = new GedcomAddress();
  }
  return record.address;
}

export const submitterReader: RecordReader<SubmitterRecord> = {
  fields: {
    NAME: ({ record, token }) => {
      record.name = token.value;
    },
    ...addressFields(ensureSubmitterAddress),
    OBJE: multimediaField(),
    LANG: ({ assembler, record, token }) => {
      if (record.languages.length < MAX_SUBMITTER_LANGUAGES) {
        record.languages.push(token.value);
      } else {
        assembler.anomaly('More than three submitter languages, extra dropped', token);
      }
    },
    RFN: ({ record, token }) => {
      record.recordFileNumber = token.value;
    },
    ...recordKeepingFields<SubmitterRecord>(),
    NOTE: noteField(),
  },
  nested: [referenceTypeRule(), addressRule(2, record => record.address)],
};

export const submissionReader: RecordReader<SubmissionRecord> = {
  fields: {
    SUBM: ({ assembler, record, token }) => {
      record.submitter = assembler.addSubmitter(token);
    },
    FAMF: ({ record, token }) => {
      record.familyFile = token.value;
    },
    TEMP: ({ record, token }) => {
      record.templeCode = token.value;
    },
    ANCE: input => {
      input.record.generationsOfAncestors = parseCount(input);
    },
    DESC: input => {
      input.record.generationsOfDescendants = parseCount(input);
    },
    ORDI: ({ record, token }) => {
      record.orderedProcessing = token.value.trim().toUpperCase() === 'YES';
    },
    ...recordKeepingFields<SubmissionRecord>(),
    NOTE: noteField(),
  },
};
