/**
 * GEDCOM reader - public entry points
 *
 * Main entry points: load(path), loads(content) and parse(content)
 */

import * as fs from 'fs';
import { RecordAssembler } from './assembler';
import { CharsetDecoder, FALLBACK_ENCODING, createDecoder, defaultCharsetProvider, detectEncoding } from './charset';
import { ParseSession } from './context';
import { GedcomDatabase } from './database';
import { SimpleDateParser } from './dates';
import { GedcomSyntaxError, ParseErrorCode, createGedcomError } from './errors';
import { GedcomLexer } from './lexer';
import { createConsoleLogger } from './logger';
import { PostParseResolver } from './resolver';
import { coerceContentToFragments } from './source';
import { GedcomParserOptions, LENIENT_TOKENIZER_FLAGS, ResolvedParserOptions } from './types';

export type GedcomInput = string | Uint8Array;

export interface GedcomParseResult {
  database: GedcomDatabase;
  /** First syntax error seen, or `none`. */
  errorState: ParseErrorCode;
  error?: GedcomSyntaxError | undefined;
  /** Encoding the bytes were decoded with; absent for string input. */
  charset?: string | undefined;
  /** True when a declared `CHAR` forced a second pass. */
  restarted: boolean;
  missingReferences: string[];
}

type PassOutcome =
  | { kind: 'restart'; decoder: CharsetDecoder }
  | { kind: 'complete'; session: ParseSession; error?: GedcomSyntaxError | undefined; halted: boolean };

export function resolveOptions(options: GedcomParserOptions = {}): ResolvedParserOptions {
  const lenient = LENIENT_TOKENIZER_FLAGS;
  return {
    flags: {
      allowTabs: options.allowTabs ?? lenient.allowTabs,
      allowLineTabs: options.allowLineTabs ?? lenient.allowLineTabs,
      allowInformationSeparatorOne: options.allowInformationSeparatorOne ?? lenient.allowInformationSeparatorOne,
      ignoreInvalidDelim: options.ignoreInvalidDelim ?? lenient.ignoreInvalidDelim,
      ignoreMissingTerms: options.ignoreMissingTerms ?? lenient.ignoreMissingTerms,
      allowHyphenOrUnderscoreInTag: options.allowHyphenOrUnderscoreInTag ?? lenient.allowHyphenOrUnderscoreInTag,
      applyConcContOnNewLineHack: options.applyConcContOnNewLineHack ?? lenient.applyConcContOnNewLineHack,
      allowLongXrefs: options.allowLongXrefs ?? lenient.allowLongXrefs,
    },
    stopOnError: options.stopOnError ?? true,
    replaceXrefs: options.replaceXrefs ?? false,
    sourceName: options.sourceName ?? '',
    logger: options.logger ?? createConsoleLogger(),
    dateParser: options.dateParser ?? new SimpleDateParser(),
    charsetProvider: options.charsetProvider ?? defaultCharsetProvider,
    onErrorStateChange: options.onErrorStateChange,
    onProgress: options.onProgress,
  };
}

// ============================================================================
// Progress
// ============================================================================

/** Reports whole percentages, never going backwards across a restart. */
class ProgressTracker {
  private percent = -1;
  private readonly listener?: ((percent: number) => void) | undefined;

  constructor(listener?: (percent: number) => void) {
    this.listener = listener;
  }

  update(position: number, total: number): void {
    const percent = total > 0 ? Math.floor((position * 100) / total) : 100;
    if (percent > this.percent) {
      this.percent = percent;
      this.listener?.(percent);
    }
  }

  complete(): void {
    this.percent = 100;
    this.listener?.(100);
  }
}

// ============================================================================
// GedcomReader
// ============================================================================

export class GedcomReader {
  private readonly options: ResolvedParserOptions;

  constructor(options: GedcomParserOptions = {}) {
    this.options = resolveOptions(options);
  }

  read(content: GedcomInput, sourceName: string = this.options.sourceName): GedcomParseResult {
    const progress = new ProgressTracker(this.options.onProgress);

    if (typeof content === 'string') {
      const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;
      const outcome = this.pass(text, sourceName, undefined, progress);
      if (outcome.kind === 'restart') {
        throw createGedcomError('Restart requested for already decoded content', { source: sourceName });
      }
      return this.finish(outcome, sourceName, undefined, false, progress);
    }

    const detected = detectEncoding(content);
    const body = content.subarray(detected ? detected.bomLength : 0);
    let decoder = createDecoder(detected ? detected.encoding : FALLBACK_ENCODING);
    let locked = detected !== undefined;
    let restarted = false;

    while (true) {
      const outcome = this.pass(decoder.decode(body), sourceName, locked ? undefined : decoder.encoding, progress);
      if (outcome.kind === 'complete') {
        return this.finish(outcome, sourceName, decoder.encoding, restarted, progress);
      }
      this.options.logger.info(`Restarting with declared character set ${outcome.decoder.encoding}`, {
        source: sourceName || undefined,
      });
      decoder = outcome.decoder;
      locked = true;
      restarted = true;
    }
  }

  /**
   * One run over the decoded text. `encoding` is the active decoder while the
   * charset may still change, and undefined once it is fixed.
   */
  private pass(text: string, sourceName: string, encoding: string | undefined, progress: ProgressTracker): PassOutcome {
    const { flags, logger, dateParser, stopOnError, replaceXrefs, onErrorStateChange } = this.options;
    const session = new ParseSession(replaceXrefs);
    const lexer = new GedcomLexer(flags, session.interner);
    const assembler = new RecordAssembler(session, { logger, dateParser });
    let charsetChecked = encoding === undefined;
    let error: GedcomSyntaxError | undefined;

    for (const fragment of coerceContentToFragments(text, sourceName || undefined)) {
      const result = lexer.tokenize(fragment);
      if (result.kind === 'error') {
        const syntaxError = new GedcomSyntaxError(result.code, fragment.locate(result.offset));
        logger.error(syntaxError.message, { code: result.code });
        if (!error) {
          error = syntaxError;
          onErrorStateChange?.(result.code, syntaxError);
        }
        if (stopOnError) {
          assembler.flush();
          return { kind: 'complete', session, error, halted: true };
        }
      } else if (result.kind === 'token') {
        assembler.process(result.token);
        if (!charsetChecked && session.declaredCharset !== undefined) {
          charsetChecked = true;
          const decoder = this.declaredDecoder(session.declaredCharset, encoding);
          if (decoder && decoder.encoding !== encoding) {
            return { kind: 'restart', decoder };
          }
        }
      }
      progress.update(fragment.end, text.length);
    }

    assembler.flush();
    return { kind: 'complete', session, error, halted: false };
  }

  private declaredDecoder(charset: string, active: string | undefined): CharsetDecoder | undefined {
    const decoder = this.options.charsetProvider.getDecoder(charset);
    if (!decoder) {
      this.options.logger.warn(`Unsupported character set ${charset}, keeping ${active ?? FALLBACK_ENCODING}`);
    }
    return decoder;
  }

  private finish(
    outcome: Extract<PassOutcome, { kind: 'complete' }>,
    sourceName: string,
    charset: string | undefined,
    restarted: boolean,
    progress: ProgressTracker,
  ): GedcomParseResult {
    const { session, error, halted } = outcome;
    const missingReferences = halted ? [] : new PostParseResolver(session, this.options.logger).resolve().missingReferences;
    session.database.name = sourceName;
    progress.complete();
    return {
      database: session.database,
      errorState: error ? error.code : 'none',
      error,
      charset,
      restarted,
      missingReferences,
    };
  }
}

// ============================================================================
// Public API
// ============================================================================

/** Parses content without throwing on syntax errors. */
export function parse(content: GedcomInput, options?: GedcomParserOptions): GedcomParseResult {
  return new GedcomReader(options).read(content);
}

export function loads(content: GedcomInput, options?: GedcomParserOptions): GedcomDatabase {
  const result = parse(content, options);
  if (result.error) {
    throw result.error;
  }
  return result.database;
}

export function load(filePath: string, options: GedcomParserOptions = {}): GedcomDatabase {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw createGedcomError(`Can only load path if is a regular file: ${filePath}`, { source: filePath });
  }
  const bytes = fs.readFileSync(filePath);
  const result = new GedcomReader(options).read(bytes, options.sourceName ?? filePath);
  if (result.error) {
    throw result.error;
  }
  return result.database;
}
