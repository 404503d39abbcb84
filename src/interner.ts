/**
 * XrefInterner - canonical storage for anchor ids
 *
 * Ids are kept sorted so a lookup is a binary search that compares the
 * caller's substring in place.
 */

import { GedcomDatabase } from './database';

export const DEFAULT_XREF_PREFIX = 'XREF';

export class XrefInterner {
  private readonly ids: string[] = [];
  private readonly replacements: string[] = [];
  private readonly database: GedcomDatabase;
  readonly replaceXrefs: boolean;

  constructor(database: GedcomDatabase, replaceXrefs = false) {
    this.database = database;
    this.replaceXrefs = replaceXrefs;
  }

  get size(): number {
    return this.ids.length;
  }

  /**
   * Canonical id for `source.slice(start, end)`, or its generated replacement
   * when replacement is enabled.
   */
  intern(source: string, start = 0, end = source.length): string {
    let low = 0;
    let high = this.ids.length - 1;
    while (low <= high) {
      const mid = (low + high) >>> 1;
      const candidate = this.ids[mid] ?? '';
      const order = compareRange(candidate, source, start, end);
      if (order === 0) {
        return this.replaceXrefs ? this.replacements[mid] ?? candidate : candidate;
      }
      if (order < 0) {
        low = mid + 1;
      } else {
        high = mid - 1;
      }
    }

    const id = source.slice(start, end);
    this.ids.splice(low, 0, id);
    if (!this.replaceXrefs) {
      return id;
    }
    const replacement = this.database.generateXref(xrefPrefix(id));
    this.replacements.splice(low, 0, replacement);
    return replacement;
  }
}

/** Leading letters of an id, ignoring its `@` delimiter. */
export function xrefPrefix(xrefId: string): string {
  const match = xrefId.match(/^@?([A-Za-z]+)/);
  return match?.[1] ?? DEFAULT_XREF_PREFIX;
}

function compareRange(candidate: string, source: string, start: number, end: number): number {
  const length = end - start;
  const shared = Math.min(candidate.length, length);
  for (let i = 0; i < shared; i += 1) {
    const diff = candidate.charCodeAt(i) - source.charCodeAt(start + i);
    if (diff !== 0) {
      return diff;
    }
  }
  return candidate.length - length;
}
