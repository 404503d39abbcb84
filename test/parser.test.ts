import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import gedcomLoad, {
  GedcomError,
  GedcomReader,
  GedcomSyntaxError,
  STRICT_TOKENIZER_FLAGS,
  load,
  loads,
  parse,
} from '../src/index';
import { captureLogger, gedcom, messagesOf } from './helpers';

const SAMPLE = gedcom('0 HEAD', '1 CHAR UTF8', '0 @I1@ INDI', '1 NAME John /Doe/', '1 SEX M', '0 TRLR');

const LATIN_TEXT = gedcom('0 HEAD', '1 CHAR ANSI', '0 @I1@ INDI', '1 NAME José /Núñez/', '0 TRLR');

describe('GedcomReader', () => {
  describe('Basic Parsing', () => {
    test('should read the sample file', () => {
      const logger = captureLogger();
      const result = parse(SAMPLE, { logger });
      const person = result.database.getIndividual('@I1@');

      expect(result.errorState).toBe('none');
      expect(result.error).toBeUndefined();
      expect(result.restarted).toBe(false);
      expect(result.database.individuals).toHaveLength(1);
      expect(person?.names).toHaveLength(1);
      expect(person?.names[0]?.given).toBe('John');
      expect(person?.names[0]?.surname).toBe('Doe');
      expect(person?.sex).toBe('male');
      expect(result.database.header?.charset).toBe('UTF8');
      expect(logger.warn).not.toHaveBeenCalled();
      expect(logger.error).not.toHaveBeenCalled();
    });

    test('should return the database from loads', () => {
      const database = loads(SAMPLE, { logger: captureLogger() });

      expect(database.size).toBe(1);
      expect(database.contains('@I1@')).toBe(true);
    });

    test('should strip a byte order mark from string input', () => {
      const result = parse(`\ufeff${SAMPLE}`, { logger: captureLogger() });

      expect(result.errorState).toBe('none');
      expect(result.database.individuals).toHaveLength(1);
    });

    test('should name the database after the source', () => {
      const result = parse(SAMPLE, { logger: captureLogger(), sourceName: 'family.ged' });

      expect(result.database.name).toBe('family.ged');
    });

    test('should replace anchor ids when asked', () => {
      const content = gedcom('0 @P7@ INDI', '0 @FAM9@ FAM', '1 HUSB @P7@', '0 TRLR');
      const database = loads(content, { logger: captureLogger(), replaceXrefs: true });

      expect(database.getIndividual('@P1@')).toBeDefined();
      expect(database.getFamily('@FAM2@')?.husband).toBe('@P1@');
      expect(database.contains('@P7@')).toBe(false);
    });

    test('should export load as default', () => {
      expect(gedcomLoad).toBe(load);
    });
  });

  describe('Error Handling', () => {
    const BROKEN = gedcom('0 HEAD', '0 @I1@ INDI', '1 NAME Ann /Lee/', '1NAME broken', '0 @I2@ INDI', '0 TRLR');

    test('should throw a located syntax error from loads', () => {
      const options = { ...STRICT_TOKENIZER_FLAGS, logger: captureLogger() };

      expect(() => loads(gedcom('0 HEAD', '1NAME x'), options)).toThrow(GedcomSyntaxError);
      expect(() => loads(gedcom('0 HEAD', '1NAME x'), options)).toThrow('2:2 - Level needs trailing delimiter');
    });

    test('should halt at the first error by default', () => {
      const logger = captureLogger();
      const onErrorStateChange = jest.fn();
      const result = parse(BROKEN, { logger, onErrorStateChange });

      expect(result.errorState).toBe('level_missing_delim');
      expect(result.error?.lineNumber).toBe(4);
      expect(result.database.individuals.map(person => person.xrefId)).toEqual(['@I1@']);
      expect(onErrorStateChange).toHaveBeenCalledTimes(1);
      expect(onErrorStateChange).toHaveBeenCalledWith('level_missing_delim', result.error);
      expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test('should keep going when stopOnError is off', () => {
      const logger = captureLogger();
      const onErrorStateChange = jest.fn();
      const result = parse(BROKEN, { logger, onErrorStateChange, stopOnError: false });

      expect(result.errorState).toBe('level_missing_delim');
      expect(result.database.individuals.map(person => person.xrefId)).toEqual(['@I1@', '@I2@']);
      expect(result.database.getIndividual('@I1@')?.names).toHaveLength(1);
      expect(onErrorStateChange).toHaveBeenCalledTimes(1);
    });

    test('should prefix errors with the source name', () => {
      const result = parse(gedcom('0 HEAD', '1NAME x'), { logger: captureLogger(), sourceName: 'family.ged' });

      expect(result.error?.message).toBe('family.ged:2:2 - Level needs trailing delimiter\n    1NAME x');
      expect(result.error?.code).toBe('level_missing_delim');
      expect(result.error?.location).toEqual({ source: 'family.ged', lineNumber: 2, column: 2, line: '1NAME x' });
    });
  });

  describe('Progress', () => {
    test('should report non-decreasing percentages ending at 100', () => {
      const onProgress = jest.fn();
      parse(SAMPLE, { logger: captureLogger(), onProgress });
      const reported = onProgress.mock.calls.map(call => Number(call[0]));

      expect(reported.length).toBeGreaterThan(2);
      expect([...reported].sort((a, b) => a - b)).toEqual(reported);
      expect(reported[reported.length - 1]).toBe(100);
      expect(reported[reported.length - 2]).toBe(100);
    });
  });

  describe('Character sets', () => {
    test('should decode a UTF-16 file with a byte order mark without restarting', () => {
      const text = gedcom('0 HEAD', '0 @I1@ INDI', '1 NAME José /Núñez/', '0 TRLR');
      const bytes = Buffer.concat([Buffer.from([0xff, 0xfe]), Buffer.from(text, 'utf16le')]);
      const result = new GedcomReader({ logger: captureLogger() }).read(bytes);

      expect(result.charset).toBe('utf-16le');
      expect(result.restarted).toBe(false);
      expect(result.database.getIndividual('@I1@')?.names[0]?.given).toBe('José');
    });

    test('should restart once for a declared legacy code page', () => {
      const logger = captureLogger();
      const legacy = parse(Buffer.from(LATIN_TEXT, 'latin1'), { logger });
      const utf8 = parse(Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from(LATIN_TEXT, 'utf8')]), {
        logger: captureLogger(),
      });
      const legacyName = legacy.database.getIndividual('@I1@')?.names[0];
      const utf8Name = utf8.database.getIndividual('@I1@')?.names[0];

      expect(legacy.restarted).toBe(true);
      expect(legacy.charset).toBe('windows-1252');
      expect(messagesOf(logger.info)).toEqual(['Restarting with declared character set windows-1252']);
      expect(utf8.restarted).toBe(false);
      expect(utf8.charset).toBe('utf-8');
      expect(legacyName?.given).toBe('José');
      expect(legacyName?.surname).toBe('Núñez');
      expect(legacyName?.name).toBe(utf8Name?.name);
      expect(legacy.database.size).toBe(utf8.database.size);
      expect(legacy.database.header?.charset).toBe(utf8.database.header?.charset);
    });

    test('should not restart when the declaration matches', () => {
      const result = parse(Buffer.from(SAMPLE, 'utf8'), { logger: captureLogger() });

      expect(result.charset).toBe('utf-8');
      expect(result.restarted).toBe(false);
    });

    test('should keep the fallback for an unsupported declaration', () => {
      const logger = captureLogger();
      const text = gedcom('0 HEAD', '1 CHAR ANSEL', '0 @I1@ INDI', '0 TRLR');
      const result = parse(Buffer.from(text, 'utf8'), { logger });

      expect(result.restarted).toBe(false);
      expect(result.charset).toBe('utf-8');
      expect(messagesOf(logger.warn)).toEqual(['Unsupported character set ANSEL, keeping utf-8']);
      expect(result.database.individuals).toHaveLength(1);
    });

    test('should never restart for string input', () => {
      const result = parse(LATIN_TEXT, { logger: captureLogger() });

      expect(result.restarted).toBe(false);
      expect(result.charset).toBeUndefined();
      expect(result.database.getIndividual('@I1@')?.names[0]?.given).toBe('José');
    });
  });

  describe('Files', () => {
    test('should load a file from disk', () => {
      const directory = fs.mkdtempSync(path.join(os.tmpdir(), 'gedcom-'));
      const filePath = path.join(directory, 'sample.ged');
      fs.writeFileSync(filePath, SAMPLE);
      try {
        const database = load(filePath, { logger: captureLogger() });

        expect(database.name).toBe(filePath);
        expect(database.getIndividual('@I1@')?.sex).toBe('male');
      } finally {
        fs.rmSync(directory, { recursive: true, force: true });
      }
    });

    test('should refuse a path that is not a regular file', () => {
      const missing = path.join(os.tmpdir(), 'no-such-dir', 'missing.ged');

      expect(() => load(missing)).toThrow(GedcomError);
      expect(() => load(os.tmpdir())).toThrow(`Can only load path if is a regular file: ${os.tmpdir()}`);
    });

    test('should report file errors without a line or tokenizer code', () => {
      let thrown: unknown;
      try {
        load(os.tmpdir());
      } catch (error) {
        thrown = error;
      }

      expect(thrown).toBeInstanceOf(GedcomError);
      expect(thrown).toMatchObject({ code: 'unknown', location: { source: os.tmpdir() } });
      expect(thrown instanceof GedcomError ? thrown.lineNumber : 0).toBeUndefined();
    });
  });
});
