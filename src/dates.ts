/**
 * Date and age values. The assembler only needs a parsed value or
 * `undefined`; `SimpleDateParser` covers the common GEDCOM 5.5.1 forms.
 */

export type DateModifier =
  | 'exact'
  | 'about'
  | 'calculated'
  | 'estimated'
  | 'before'
  | 'after'
  | 'between'
  | 'from'
  | 'to'
  | 'from_to'
  | 'interpreted';

export interface DatePart {
  year: number;
  month?: number | undefined;
  day?: number | undefined;
}

export interface ParsedDate {
  modifier: DateModifier;
  calendar?: string | undefined;
  start: DatePart;
  end?: DatePart | undefined;
  phrase?: string | undefined;
}

export type AgeQualifier = 'exact' | 'less' | 'greater';

export interface GedcomAge {
  qualifier: AgeQualifier;
  keyword?: 'child' | 'infant' | 'stillborn' | undefined;
  years?: number | undefined;
  months?: number | undefined;
  days?: number | undefined;
}

export interface DateParser {
  parseDate(text: string): ParsedDate | undefined;
  parseAge(text: string): GedcomAge | undefined;
}

const MONTHS = ['JAN', 'FEB', 'MAR', 'APR', 'MAY', 'JUN', 'JUL', 'AUG', 'SEP', 'OCT', 'NOV', 'DEC'];

const SINGLE_MODIFIERS: Record<string, DateModifier> = {
  ABT: 'about',
  CAL: 'calculated',
  EST: 'estimated',
  BEF: 'before',
  AFT: 'after',
};

const AGE_KEYWORDS: Record<string, GedcomAge['keyword']> = {
  CHILD: 'child',
  INFANT: 'infant',
  STILLBORN: 'stillborn',
};

export class SimpleDateParser implements DateParser {
  private static readonly CALENDAR_REGEX = /^@#D([^@]+)@\s*/;
  private static readonly YEAR_REGEX = /^(\d{1,4})(?:\/\d{1,2})?$/;
  private static readonly INTERPRETED_REGEX = /^INT\s+(.+?)\s*\((.*)\)$/;
  private static readonly AGE_PART_REGEX = /^(\d+)([YMD])$/;

  parseDate(text: string): ParsedDate | undefined {
    let rest = text.trim().toUpperCase();
    let calendar: string | undefined;
    const calendarMatch = rest.match(SimpleDateParser.CALENDAR_REGEX);
    if (calendarMatch) {
      calendar = calendarMatch[1]?.trim();
      rest = rest.slice(calendarMatch[0].length);
    }
    if (!rest) {
      return undefined;
    }

    const interpreted = rest.match(SimpleDateParser.INTERPRETED_REGEX);
    if (interpreted) {
      const start = this.parsePart(interpreted[1] ?? '');
      const phrase = text.slice(text.indexOf('(') + 1, text.lastIndexOf(')'));
      return start ? { modifier: 'interpreted', calendar, start, phrase } : undefined;
    }

    const words = rest.split(/\s+/);
    const head = words[0] ?? '';
    const single = SINGLE_MODIFIERS[head];
    if (single) {
      const start = this.parsePart(words.slice(1).join(' '));
      return start ? { modifier: single, calendar, start } : undefined;
    }
    if (head === 'BET') {
      return this.parseRange(words.slice(1), 'AND', 'between', calendar);
    }
    if (head === 'FROM') {
      if (words.includes('TO')) {
        return this.parseRange(words.slice(1), 'TO', 'from_to', calendar);
      }
      const start = this.parsePart(words.slice(1).join(' '));
      return start ? { modifier: 'from', calendar, start } : undefined;
    }
    if (head === 'TO') {
      const start = this.parsePart(words.slice(1).join(' '));
      return start ? { modifier: 'to', calendar, start } : undefined;
    }

    const start = this.parsePart(rest);
    return start ? { modifier: 'exact', calendar, start } : undefined;
  }

  parseAge(text: string): GedcomAge | undefined {
    let rest = text.trim().toUpperCase();
    let qualifier: AgeQualifier = 'exact';
    if (rest.startsWith('<')) {
      qualifier = 'less';
      rest = rest.slice(1).trim();
    } else if (rest.startsWith('>')) {
      qualifier = 'greater';
      rest = rest.slice(1).trim();
    }
    const keyword = AGE_KEYWORDS[rest];
    if (keyword) {
      return { qualifier, keyword };
    }
    if (!rest) {
      return undefined;
    }

    const age: GedcomAge = { qualifier };
    for (const word of rest.split(/\s+/)) {
      const match = word.match(SimpleDateParser.AGE_PART_REGEX);
      if (!match) {
        return undefined;
      }
      const amount = Number(match[1]);
      if (match[2] === 'Y') {
        age.years = amount;
      } else if (match[2] === 'M') {
        age.months = amount;
      } else {
        age.days = amount;
      }
    }
    return age;
  }

  private parseRange(
    words: string[],
    separator: string,
    modifier: DateModifier,
    calendar: string | undefined,
  ): ParsedDate | undefined {
    const at = words.indexOf(separator);
    if (at < 0) {
      return undefined;
    }
    const start = this.parsePart(words.slice(0, at).join(' '));
    const end = this.parsePart(words.slice(at + 1).join(' '));
    if (!start || !end) {
      return undefined;
    }
    return { modifier, calendar, start, end };
  }

  private parsePart(text: string): DatePart | undefined {
    const words = text.trim().split(/\s+/).filter(word => word.length > 0);
    let negative = false;
    if (words.length > 1 && (words[words.length - 1] === 'B.C.' || words[words.length - 1] === 'BC')) {
      negative = true;
      words.pop();
    }
    if (words.length === 0 || words.length > 3) {
      return undefined;
    }
    const yearMatch = (words[words.length - 1] ?? '').match(SimpleDateParser.YEAR_REGEX);
    if (!yearMatch) {
      return undefined;
    }
    const year = Number(yearMatch[1]) * (negative ? -1 : 1);
    if (words.length === 1) {
      return { year };
    }

    const month = MONTHS.indexOf(words[words.length - 2] ?? '') + 1;
    if (month === 0) {
      return undefined;
    }
    if (words.length === 2) {
      return { year, month };
    }

    const day = Number(words[0]);
    if (!Number.isInteger(day) || day < 1 || day > 31) {
      return undefined;
    }
    return { year, month, day };
  }
}
