/**
 * Shared type definitions for the GEDCOM reader
 */

import { CharsetProvider } from './charset';
import { DateParser } from './dates';
import { GedcomSyntaxError, ParseErrorCode } from './errors';
import { Logger } from './logger';
import { SourceFragment } from './source';

export type LineValueKind = 'none' | 'pointer' | 'data';

export interface GedcomToken {
  level: number;
  /** Anchor id defined by this line, `@` delimiters included. */
  xrefId?: string | undefined;
  tag: string;
  value: string;
  valueKind: LineValueKind;
  fragment: SourceFragment;
}

export interface TokenizerFlags {
  allowTabs: boolean;
  allowLineTabs: boolean;
  allowInformationSeparatorOne: boolean;
  ignoreInvalidDelim: boolean;
  ignoreMissingTerms: boolean;
  allowHyphenOrUnderscoreInTag: boolean;
  applyConcContOnNewLineHack: boolean;
  allowLongXrefs: boolean;
}

export const LENIENT_TOKENIZER_FLAGS: Readonly<TokenizerFlags> = {
  allowTabs: true,
  allowLineTabs: true,
  allowInformationSeparatorOne: true,
  ignoreInvalidDelim: true,
  ignoreMissingTerms: true,
  allowHyphenOrUnderscoreInTag: true,
  applyConcContOnNewLineHack: true,
  allowLongXrefs: true,
};

export const STRICT_TOKENIZER_FLAGS: Readonly<TokenizerFlags> = {
  allowTabs: false,
  allowLineTabs: false,
  allowInformationSeparatorOne: false,
  ignoreInvalidDelim: false,
  ignoreMissingTerms: false,
  allowHyphenOrUnderscoreInTag: false,
  applyConcContOnNewLineHack: false,
  allowLongXrefs: false,
};

// Parser configuration options
export interface GedcomParserOptions extends Partial<TokenizerFlags> {
  /** Halt at the first syntax error (default true). */
  stopOnError?: boolean;
  /** Replace every anchor id with a generated one (default false). */
  replaceXrefs?: boolean;
  sourceName?: string;
  logger?: Logger;
  dateParser?: DateParser;
  charsetProvider?: CharsetProvider;
  onErrorStateChange?: (code: ParseErrorCode, error: GedcomSyntaxError) => void;
  onProgress?: (percent: number) => void;
}

export interface ResolvedParserOptions {
  flags: TokenizerFlags;
  stopOnError: boolean;
  replaceXrefs: boolean;
  sourceName: string;
  logger: Logger;
  dateParser: DateParser;
  charsetProvider: CharsetProvider;
  onErrorStateChange?: ((code: ParseErrorCode, error: GedcomSyntaxError) => void) | undefined;
  onProgress?: ((percent: number) => void) | undefined;
}

// Enumerations of the record model

export type Sex = 'undetermined' | 'male' | 'female' | 'both' | 'neuter' | 'unknown';

export type PedigreeLinkage = 'unknown' | 'adopted' | 'birth' | 'foster' | 'sealing';

export type ChildLinkageStatus = 'unknown' | 'challenged' | 'disproven' | 'proven';

export type AdoptionType = 'none' | 'husband' | 'wife' | 'both';

export type RestrictionNotice = 'none' | 'locked' | 'privacy' | 'confidential';

export type Certainty = 'unreliable' | 'questionable' | 'secondary' | 'primary';

export const CERTAINTY_BY_QUAY: readonly Certainty[] = ['unreliable', 'questionable', 'secondary', 'primary'];

export type SourceMediaType =
  | 'none'
  | 'audio'
  | 'book'
  | 'card'
  | 'electronic'
  | 'fiche'
  | 'film'
  | 'magazine'
  | 'manuscript'
  | 'map'
  | 'newspaper'
  | 'photo'
  | 'tombstone'
  | 'video'
  | 'other';

export type SpouseSealingStatus =
  | 'not_set'
  | 'canceled'
  | 'child'
  | 'dns'
  | 'dns_can'
  | 'pre_1970'
  | 'submitted'
  | 'uncleared';

export type MarriageStartStatus = 'unknown' | 'married' | 'friends' | 'partners' | 'single' | 'other';

export type FamilyLinkRole = 'child' | 'spouse';
