/**
 * Routes a token to the tag table of the innermost open record.
 */

import { RecordAssembler } from '../assembler';
import { AnyRecord } from '../records';
import { GedcomToken } from '../types';
import { runReader } from './common';
import { eventReader } from './event';
import { familyReader } from './family';
import { headerReader } from './header';
import { individualReader } from './individual';
import { multimediaReader, noteReader, repositoryReader, submissionReader, submitterReader } from './records';
import { sourceReader } from './source';
import {
  associationReader,
  dateReader,
  familyLinkReader,
  nameReader,
  placeReader,
  repositoryCitationReader,
  sourceCitationReader,
  spouseSealingReader,
} from './structures';

export function dispatchToken(assembler: RecordAssembler, record: AnyRecord, token: GedcomToken): void {
  switch (record.recordType) {
    case 'header':
      return runReader(headerReader, assembler, record, token);
    case 'family':
      return runReader(familyReader, assembler, record, token);
    case 'individual':
      return runReader(individualReader, assembler, record, token);
    case 'multimedia':
      return runReader(multimediaReader, assembler, record, token);
    case 'note':
      return runReader(noteReader, assembler, record, token);
    case 'repository':
      return runReader(repositoryReader, assembler, record, token);
    case 'source':
      return runReader(sourceReader, assembler, record, token);
    case 'submitter':
      return runReader(submitterReader, assembler, record, token);
    case 'submission':
      return runReader(submissionReader, assembler, record, token);
    case 'event':
    case 'familyEvent':
    case 'individualEvent':
    case 'custom':
      return runReader(eventReader, assembler, record, token);
    case 'place':
      return runReader(placeReader, assembler, record, token);
    case 'sourceCitation':
      return runReader(sourceCitationReader, assembler, record, token);
    case 'repositoryCitation':
      return runReader(repositoryCitationReader, assembler, record, token);
    case 'spouseSealing':
      return runReader(spouseSealingReader, assembler, record, token);
    case 'familyLink':
      return runReader(familyLinkReader, assembler, record, token);
    case 'association':
      return runReader(associationReader, assembler, record, token);
    case 'name':
      return runReader(nameReader, assembler, record, token);
    case 'date':
      return runReader(dateReader, assembler, record, token);
  }
}

/** Returns false when the record should be discarded. */
export function finalizeRecord(assembler: RecordAssembler, record: AnyRecord): boolean {
  switch (record.recordType) {
    case 'individual':
      return individualReader.finalize?.(assembler, record) ?? true;
    case 'note':
      return noteReader.finalize?.(assembler, record) ?? true;
    case 'source':
      return sourceReader.finalize?.(assembler, record) ?? true;
    case 'sourceCitation':
      return sourceCitationReader.finalize?.(assembler, record) ?? true;
    default:
      return true;
  }
}
