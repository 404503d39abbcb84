import { GedcomAddress, GedcomHeader } from '../records';
import { NestedRule, RecordReader, TagHandler, addressFields, addressRule, noteField } from './common';

function ensureCorporationAddress(header: GedcomHeader): GedcomAddress {
  if (!header.corporationAddress) {
    header.corporationAddress = new GedcomAddress();
  }
  return header.corporationAddress;
}

function under(depth: number, parent: string, fields: Record<string, TagHandler<GedcomHeader>>): NestedRule<GedcomHeader> {
  return {
    depth,
    after: [parent],
    tags: Object.keys(fields),
    handle: input => {
      fields[input.token.tag]?.(input);
    },
  };
}

export const headerReader: RecordReader<GedcomHeader> = {
  fields: {
    CHAR: ({ assembler, record, token }) => {
      record.charset = token.value;
      assembler.session.declaredCharset = token.value;
    },
    SOUR: ({ record, token }) => {
      record.applicationSystemId = token.value;
    },
    DEST: ({ record, token }) => {
      record.destination = token.value;
    },
    SUBM: ({ assembler, record, token }) => {
      record.submitterXref = assembler.addSubmitter(token);
    },
    SUBN: ({ assembler, record, token }) => {
      record.submissionXref = token.value;
      if (token.valueKind === 'pointer') {
        assembler.session.referenced(token.value);
      }
    },
    COPR: ({ record, token }) => {
      record.copyright = token.value;
    },
    FILE: ({ record, token }) => {
      record.filename = token.value;
    },
    LANG: ({ record, token }) => {
      record.language = token.value;
    },
    DATE: ({ assembler, record, token }) => {
      record.transmissionDate = assembler.readDate(token);
    },
    NOTE: noteField(),
    // Containers whose content arrives on the lines below them.
    PLAC: () => undefined,
    GEDC: () => undefined,
  },
  nested: [
    under(2, 'SOUR', {
      NAME: ({ record, token }) => {
        record.applicationName = token.value;
      },
      VERS: ({ record, token }) => {
        record.applicationVersion = token.value;
      },
      CORP: ({ record, token }) => {
        record.corporation = token.value;
      },
      DATA: ({ record, token }) => {
        record.sourceName = token.value;
      },
    }),
    under(2, 'GEDC', {
      VERS: ({ record, token }) => {
        record.gedcomVersion = token.value;
      },
      FORM: ({ record, token }) => {
        record.gedcomForm = token.value;
      },
    }),
    under(2, 'CHAR', {
      VERS: ({ record, token }) => {
        record.charsetVersion = token.value;
      },
    }),
    under(2, 'PLAC', {
      FORM: ({ record, token }) => {
        record.placeForm = token.value;
      },
    }),
    under(2, 'DATE', {
      TIME: ({ record, token }) => {
        if (record.transmissionDate) {
          record.transmissionDate.time = token.value;
        }
      },
    }),
    under(3, 'DATA', {
      DATE: ({ assembler, record, token }) => {
        record.sourceDate = assembler.readDate(token);
      },
      COPR: ({ record, token }) => {
        record.sourceCopyright = token.value;
      },
    }),
    under(3, 'CORP', addressFields(ensureCorporationAddress)),
    addressRule(4, header => header.corporationAddress),
  ],
};
