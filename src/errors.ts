/** Where a GEDCOM line sits in its input; line numbers and columns count from 1. */
export interface GedcomLocation {
  source?: string | undefined;
  lineNumber?: number | undefined;
  column?: number | undefined;
  /** The offending line as read, without its terminator. */
  line?: string | undefined;
}

export type ParseErrorCode =
  | 'none'
  | 'level_expected'
  | 'level_missing_delim'
  | 'level_invalid'
  | 'xref_missing_delim'
  | 'xref_too_long'
  | 'tag_expected'
  | 'tag_missing_delim_or_term'
  | 'value_expected'
  | 'value_missing_term'
  | 'value_invalid'
  | 'unknown';

const PARSE_ERROR_DESCRIPTIONS: Record<ParseErrorCode, string> = {
  none: 'No error',
  level_expected: 'Level expected but not found',
  level_missing_delim: 'Level needs trailing delimiter',
  level_invalid: 'Level is invalid',
  xref_missing_delim: 'Xref id needs trailing delimiter',
  xref_too_long: 'Xref too long',
  tag_expected: 'Tag expected',
  tag_missing_delim_or_term: 'Tag needs trailing delimiter or newline',
  value_expected: 'Line value expected',
  value_missing_term: 'Line value needs trailing newline',
  value_invalid: 'Line value invalid',
  unknown: 'Unknown error',
};

export function describeParseError(code: ParseErrorCode): string {
  return PARSE_ERROR_DESCRIPTIONS[code];
}

/** Raised by the reader; `code` is `unknown` for anything the tokenizer did not report. */
export class GedcomError extends Error {
  readonly code: ParseErrorCode;
  readonly location: GedcomLocation;

  constructor(message: string, location: GedcomLocation = {}, code: ParseErrorCode = 'unknown') {
    super(withLocation(message, location));
    this.name = 'GedcomError';
    this.code = code;
    this.location = location;
  }

  get lineNumber(): number | undefined {
    return this.location.lineNumber;
  }
}

/** A line the tokenizer could not turn into a token. */
export class GedcomSyntaxError extends GedcomError {
  constructor(code: ParseErrorCode, location: GedcomLocation) {
    super(describeParseError(code), location, code);
    this.name = 'GedcomSyntaxError';
  }
}

// `family.ged:12:3 - Level is invalid`, then the line itself indented below.
function withLocation(message: string, { source, lineNumber, column, line }: GedcomLocation): string {
  let position = '';
  if (lineNumber !== undefined) {
    position = column === undefined ? `${lineNumber}` : `${lineNumber}:${column}`;
  }
  const where = source && position ? `${source}:${position}` : source || position;
  const head = where ? `${where} - ${message}` : message;
  return line ? `${head}\n    ${line}` : head;
}

export function createGedcomError(message: string, location?: GedcomLocation): GedcomError {
  return new GedcomError(message, location);
}
