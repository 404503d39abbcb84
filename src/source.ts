import { GedcomLocation } from './errors';

export interface SourceFragmentInit {
  lineNumber?: number | undefined;
  source?: string | undefined;
  terminated?: boolean | undefined;
  end?: number | undefined;
}

/**
 * One GEDCOM line of decoded input, without its terminator.
 */
export class SourceFragment {
  readonly text: string;
  readonly lineNumber: number;
  readonly source?: string | undefined;
  /** False only for a final line that ran into the end of input. */
  readonly terminated: boolean;
  /** Character offset just past this line (and its terminator) in the decoded content. */
  readonly end: number;

  constructor(text: string, init: SourceFragmentInit = {}) {
    this.text = text;
    this.lineNumber = init.lineNumber ?? 1;
    this.source = init.source;
    this.terminated = init.terminated ?? true;
    this.end = init.end ?? text.length;
  }

  /** Location of the character at `offset`, which the tokenizer keeps within the line. */
  locate(offset = 0): GedcomLocation {
    return {
      source: this.source,
      lineNumber: this.lineNumber,
      column: Math.min(Math.max(offset, 0), this.text.length) + 1,
      line: this.text,
    };
  }
}

/**
 * Splits decoded content into line fragments. CR LF, LF and a lone CR all
 * terminate a line.
 */
export function coerceContentToFragments(content: string, source?: string): SourceFragment[] {
  if (!content) {
    return [];
  }
  const fragments: SourceFragment[] = [];
  let lineNumber = 1;
  let start = 0;

  for (let i = 0; i < content.length; i += 1) {
    const ch = content[i];
    if (ch !== '\n' && ch !== '\r') {
      continue;
    }
    const text = content.slice(start, i);
    if (ch === '\r' && content[i + 1] === '\n') {
      i += 1;
    }
    fragments.push(new SourceFragment(text, { lineNumber, source, end: i + 1 }));
    lineNumber += 1;
    start = i + 1;
  }

  if (start < content.length) {
    fragments.push(new SourceFragment(content.slice(start), {
      lineNumber,
      source,
      terminated: false,
      end: content.length,
    }));
  }

  return fragments;
}
