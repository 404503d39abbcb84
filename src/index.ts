/**
 * GEDCOM reader
 * Builds a typed genealogical record graph from GEDCOM 5.5 / 5.5.1 files
 */

export { GedcomReader, parse, load, loads, resolveOptions } from './parser';
export type { GedcomInput, GedcomParseResult } from './parser';
export { GedcomDatabase } from './database';
export * from './records';
export * from './types';
export { GedcomError, GedcomSyntaxError, createGedcomError, describeParseError } from './errors';
export type { GedcomLocation, ParseErrorCode } from './errors';
export { createConsoleLogger, silentLogger } from './logger';
export type { LogContext, LogLevel, Logger } from './logger';
export { FALLBACK_ENCODING, createDecoder, defaultCharsetProvider, detectEncoding } from './charset';
export type { CharsetDecoder, CharsetProvider, DetectedEncoding } from './charset';
export { SimpleDateParser } from './dates';
export type { AgeQualifier, DateModifier, DateParser, DatePart, GedcomAge, ParsedDate } from './dates';
export { EVENT_TYPES, eventTypeForTag, readableToEventType } from './event-types';
export type { EventScope, EventType, EventTypeInfo } from './event-types';
export { XrefInterner } from './interner';
export { GedcomLexer } from './lexer';
export type { LexResult } from './lexer';
export { SourceFragment, coerceContentToFragments } from './source';

// Default export for convenience
export { load as default } from './parser';
