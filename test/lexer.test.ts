import {
  GedcomDatabase,
  GedcomLexer,
  LENIENT_TOKENIZER_FLAGS,
  LexResult,
  STRICT_TOKENIZER_FLAGS,
  SourceFragment,
  TokenizerFlags,
  XrefInterner,
} from '../src/index';

function lexer(flags: TokenizerFlags = LENIENT_TOKENIZER_FLAGS): GedcomLexer {
  return new GedcomLexer(flags, new XrefInterner(new GedcomDatabase()));
}

function tokenOf(result: LexResult) {
  if (result.kind !== 'token') {
    throw new Error(`expected a token, got ${JSON.stringify(result)}`);
  }
  return result.token;
}

describe('GedcomLexer', () => {
  describe('Line grammar', () => {
    test('should read level, anchor id and tag', () => {
      const token = tokenOf(lexer().tokenize(new SourceFragment('0 @I1@ INDI')));

      expect(token.level).toBe(0);
      expect(token.xrefId).toBe('@I1@');
      expect(token.tag).toBe('INDI');
      expect(token.value).toBe('');
      expect(token.valueKind).toBe('none');
    });

    test('should classify data and pointer values', () => {
      const lex = lexer();
      const name = tokenOf(lex.tokenize(new SourceFragment('1 NAME John /Smith/')));
      const famc = tokenOf(lex.tokenize(new SourceFragment('1 FAMC @F1@')));

      expect(name.value).toBe('John /Smith/');
      expect(name.valueKind).toBe('data');
      expect(famc.value).toBe('@F1@');
      expect(famc.valueKind).toBe('pointer');
    });

    test('should skip blank lines', () => {
      expect(lexer().tokenize(new SourceFragment('   '))).toEqual({ kind: 'skip' });
    });

    test('should normalise misspelled tags', () => {
      const lex = lexer();

      expect(tokenOf(lex.tokenize(new SourceFragment('1 _EMAIL someone@example.com'))).tag).toBe('EMAIL');
      expect(tokenOf(lex.tokenize(new SourceFragment('1 URL http://example.com'))).tag).toBe('WWW');
    });

    test('should keep leading blanks of continuation values', () => {
      const lex = lexer();

      expect(tokenOf(lex.tokenize(new SourceFragment('2 CONT   indented'))).value).toBe('  indented');
      expect(tokenOf(lex.tokenize(new SourceFragment('1 NOTE   trimmed'))).value).toBe('trimmed');
    });
  });

  describe('Syntax errors', () => {
    test.each([
      ['x1 NAME', 'level_expected', 0],
      ['123 NAME', 'level_invalid', 0],
      ['01 NAME', 'level_invalid', 0],
      ['1NAME', 'level_missing_delim', 1],
      ['0 @I1 INDI', 'xref_missing_delim', 2],
      ['0 @I1@INDI', 'xref_missing_delim', 6],
      ['1 @', 'xref_missing_delim', 2],
      ['1 NAME ', 'value_expected', 7],
      ['1 NOTE a\tb', 'value_invalid', 8],
      ['1 MY-TAG x', 'tag_missing_delim_or_term', 4],
    ])('should reject %j as %s in strict mode', (line, code, offset) => {
      expect(lexer(STRICT_TOKENIZER_FLAGS).tokenize(new SourceFragment(line))).toEqual({ kind: 'error', code, offset });
    });

    test('should reject over-long anchor ids unless allowed', () => {
      const line = '0 @ABCDEFGHIJKLMNOPQRSTUVWXYZ@ INDI';

      expect(lexer(STRICT_TOKENIZER_FLAGS).tokenize(new SourceFragment(line))).toEqual({
        kind: 'error',
        code: 'xref_too_long',
        offset: 2,
      });
      expect(tokenOf(lexer().tokenize(new SourceFragment(line))).xrefId).toBe('@ABCDEFGHIJKLMNOPQRSTUVWXYZ@');
    });

    test('should require a terminator on the last line in strict mode', () => {
      const strict = lexer(STRICT_TOKENIZER_FLAGS);

      expect(strict.tokenize(new SourceFragment('0 TRLR', { terminated: false }))).toEqual({
        kind: 'error',
        code: 'tag_missing_delim_or_term',
        offset: 6,
      });
      expect(strict.tokenize(new SourceFragment('1 NAME X', { terminated: false }))).toEqual({
        kind: 'error',
        code: 'value_missing_term',
        offset: 8,
      });
      expect(tokenOf(lexer().tokenize(new SourceFragment('0 TRLR', { terminated: false }))).tag).toBe('TRLR');
    });
  });

  describe('Leniency', () => {
    test('should accept what strict mode rejects', () => {
      const lex = lexer();

      expect(tokenOf(lex.tokenize(new SourceFragment('1 NAME '))).valueKind).toBe('none');
      expect(tokenOf(lex.tokenize(new SourceFragment('1 NOTE a\tb'))).value).toBe('a\tb');
      expect(tokenOf(lex.tokenize(new SourceFragment('1 MY-TAG x'))).tag).toBe('MY-TAG');
      expect(tokenOf(lex.tokenize(new SourceFragment('1  NAME  Jane'))).value).toBe('Jane');
    });

    test('should accept the information separator as delimiter', () => {
      const token = tokenOf(lexer().tokenize(new SourceFragment('1\u001fNAME\u001fJane')));

      expect(token.tag).toBe('NAME');
      expect(token.value).toBe('Jane');
    });

    test('should turn lines without a level into continuations', () => {
      const lex = lexer();
      lex.tokenize(new SourceFragment('1 NOTE first'));
      const second = tokenOf(lex.tokenize(new SourceFragment('second line')));
      const third = tokenOf(lex.tokenize(new SourceFragment('third line')));

      expect(second).toMatchObject({ level: 2, tag: 'CONT', value: 'second line', valueKind: 'data' });
      expect(third).toMatchObject({ level: 2, tag: 'CONT', value: 'third line' });
    });

    test('should not invent a continuation before the first line', () => {
      expect(lexer().tokenize(new SourceFragment('orphan text'))).toEqual({
        kind: 'error',
        code: 'level_expected',
        offset: 0,
      });
    });
  });
});
