import { GedcomDatabase, GedcomParserOptions, SourceRecord, loads } from '../src/index';
import { captureLogger, gedcom, messagesOf } from './helpers';

function read(lines: string[], options: GedcomParserOptions = {}): GedcomDatabase {
  return loads(gedcom(...lines, '0 TRLR'), { logger: captureLogger(), ...options });
}

describe('RecordAssembler', () => {
  describe('Notes', () => {
    test('should rebuild text from continuation lines', () => {
      const database = read(['0 @N1@ NOTE First line', '1 CONT second line', '1 CONC  continued']);

      expect(database.notes).toHaveLength(1);
      expect(database.notes[0]?.text).toBe('First line\nsecond line continued');
    });

    test('should file an inline note under a generated id', () => {
      const database = read(['0 @I1@ INDI', '1 NOTE Some text', '2 CONT more']);

      expect(database.getIndividual('@I1@')?.notes).toEqual(['@NOTE1@']);
      expect(database.notes.map(note => note.text)).toEqual(['Some text\nmore']);
    });

    test('should drop notes without text', () => {
      const logger = captureLogger();
      const database = read(['0 @I1@ INDI', '1 NOTE @N1@', '0 @N1@ NOTE'], { logger });

      expect(database.notes).toHaveLength(0);
      expect(database.contains('@N1@')).toBe(false);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });

  describe('Individuals', () => {
    test('should split names and keep the first as preferred', () => {
      const database = read(['0 @I1@ INDI', '1 NAME Mary Ann /Smith/ Jr.', '2 NICK Polly', '1 NAME Molly Smith']);
      const [first, second] = database.getIndividual('@I1@')?.names ?? [];

      expect(first).toMatchObject({ given: 'Mary Ann', surname: 'Smith', suffix: 'Jr.', nick: 'Polly', preferred: true });
      expect(second).toMatchObject({ given: 'Molly', surname: 'Smith', preferred: false });
    });

    test('should tell a REFN type from a phonetic name type', () => {
      const database = read([
        '0 @I1@ INDI',
        '1 REFN 42',
        '2 TYPE user',
        '1 NAME Anna /Berg/',
        '2 FONE Ana Berk',
        '3 TYPE phonetic',
      ]);
      const person = database.getIndividual('@I1@');

      expect(person?.userReferenceNumber).toBe('42');
      expect(person?.userReferenceType).toBe('user');
      expect(person?.names[0]?.phoneticVariations).toEqual([{ value: 'Ana Berk', type: 'phonetic' }]);
    });

    test('should keep an address as a residence fact', () => {
      const database = read([
        '0 @I1@ INDI',
        '1 ADDR 12 High Street',
        '2 CITY Springfield',
        '1 PHON 555-0100',
      ]);
      const person = database.getIndividual('@I1@');
      const residence = person?.attributes[0];

      expect(person?.address).toBeUndefined();
      expect(person?.attributes).toHaveLength(1);
      expect(residence?.eventType).toBe('RESI');
      expect(residence?.level).toBe(1);
      expect(residence?.address?.addressLine).toBe('12 High Street');
      expect(residence?.address?.city).toBe('Springfield');
      expect(residence?.address?.phone).toEqual(['555-0100']);
    });

    test('should read events with dates, places and ages', () => {
      const database = read([
        '0 @I1@ INDI',
        '1 BIRT',
        '2 DATE 12 MAR 1901',
        '2 PLAC Springfield, Illinois',
        '1 DEAT',
        '2 DATE INFANT',
        '2 PLAC Springfield, Illinois',
      ]);
      const [birth, death] = database.getIndividual('@I1@')?.events ?? [];

      expect(birth?.eventType).toBe('BIRT');
      expect(birth?.date?.parsed).toEqual({ modifier: 'exact', start: { year: 1901, month: 3, day: 12 } });
      expect(birth?.place?.name).toBe('Springfield, Illinois');
      expect(death?.date?.dateString).toBe('INFANT');
      expect(death?.date?.parsed).toBeUndefined();
      expect(death?.age).toEqual({ qualifier: 'exact', keyword: 'infant' });
      expect(database.placeNameCount).toBe(1);
    });

    test('should file facts as attributes with their value as name', () => {
      const database = read(['0 @I1@ INDI', '1 OCCU Blacksmith', '2 DATE ABT 1880']);
      const occupation = database.getIndividual('@I1@')?.attributes[0];

      expect(occupation?.eventType).toBe('OCCU');
      expect(occupation?.eventName).toBe('Blacksmith');
      expect(occupation?.date?.parsed).toEqual({ modifier: 'about', start: { year: 1880 } });
    });

    test('should turn a generic event into the type its TYPE names', () => {
      const database = read(['0 @I1@ INDI', '1 EVEN', '2 TYPE Graduation', '1 EVEN', '2 TYPE Party']);
      const [graduation, party] = database.getIndividual('@I1@')?.events ?? [];

      expect(graduation?.eventType).toBe('GRAD');
      expect(party?.eventType).toBe('EVEN');
      expect(party?.classification).toBe('Party');
    });

    test('should translate vendor military service', () => {
      const database = read(['0 @I1@ INDI', '1 _MILT Navy', '2 DATE 1942']);
      const service = database.getIndividual('@I1@')?.events[0];

      expect(service?.eventType).toBe('EVEN');
      expect(service?.eventName).toBe('Military Service');
      expect(service?.classification).toBe('Navy');
      expect(service?.date?.dateString).toBe('1942');
    });

    test('should keep unknown extension tags as custom nodes', () => {
      const database = read(['0 @I1@ INDI', '1 _PRIM Y', '2 DATE 1900', '1 SEX F']);
      const person = database.getIndividual('@I1@');
      const custom = person?.customRecords[0];

      expect(person?.customRecords).toHaveLength(1);
      expect(custom?.tag).toBe('_PRIM');
      expect(custom?.classification).toBe('Y');
      expect(custom?.date?.dateString).toBe('1900');
      expect(person?.sex).toBe('female');
    });

    test('should read the change date block', () => {
      const database = read(['0 @I1@ INDI', '1 CHAN', '2 DATE 1 JAN 2001', '3 TIME 10:00']);
      const changed = database.getIndividual('@I1@')?.changeDate;

      expect(changed?.dateString).toBe('1 JAN 2001');
      expect(changed?.time).toBe('10:00');
    });
  });

  describe('Sources', () => {
    test('should create an inline source for a text citation', () => {
      const database = read(['0 @I1@ INDI', '1 SOUR Parish register', '2 PAGE 12', '2 QUAY 3']);
      const citation = database.getIndividual('@I1@')?.sources[0];
      const source = database.get('@SOUR1@');

      expect(citation?.source).toBe('@SOUR1@');
      expect(citation?.page).toBe('12');
      expect(citation?.certainty).toBe('primary');
      expect(source).toBeInstanceOf(SourceRecord);
      expect(source instanceof SourceRecord ? source.title : '').toBe('Parish register');
      expect(source instanceof SourceRecord ? source.citations : []).toHaveLength(1);
    });

    test('should join multi-line source fields', () => {
      const database = read(['0 @S1@ SOUR', '1 TITL Long', '2 CONC  title', '2 CONT next', '1 AUTH Someone']);
      const source = database.sources[0];

      expect(source?.title).toBe('Long title\nnext');
      expect(source?.originator).toBe('Someone');
    });

    test('should read repository citations with call numbers', () => {
      const database = read([
        '0 @R1@ REPO',
        '1 NAME City Archive',
        '0 @S1@ SOUR',
        '1 TITL Deeds',
        '1 REPO @R1@',
        '2 CALN 12/A',
        '3 MEDI Book',
      ]);
      const source = database.sources[0];

      expect(source?.title).toBe('Deeds');
      expect(source?.repositoryCitations[0]?.callNumbers).toEqual([
        { callNumber: '12/A', mediaType: 'book', otherMediaType: '' },
      ]);
      expect(database.repositories[0]?.name).toBe('City Archive');
      expect(database.repositories[0]?.citations).toHaveLength(1);
    });
  });

  describe('Families', () => {
    test('should read spouse ages below a family event', () => {
      const database = read([
        '0 @F1@ FAM',
        '1 MARR',
        '2 DATE 5 MAY 1900',
        '2 HUSB',
        '3 AGE 25y',
        '2 WIFE',
        '3 AGE 22y',
        '1 EVEN',
        '2 TYPE Engagement',
      ]);
      const [marriage, engagement] = database.getFamily('@F1@')?.events ?? [];

      expect(marriage?.eventType).toBe('MARR');
      expect(marriage?.husbandAge).toEqual({ qualifier: 'exact', years: 25 });
      expect(marriage?.wifeAge).toEqual({ qualifier: 'exact', years: 22 });
      expect(engagement?.eventType).toBe('ENGA');
    });

    test('should read the place of a spouse sealing with its children', () => {
      const logger = captureLogger();
      const database = read(['0 @F1@ FAM', '1 SLGS', '2 PLAC Salt Lake', '3 FORM City', '2 TEMP SLAKE'], { logger });
      const sealing = database.getFamily('@F1@')?.spouseSealings[0];

      expect(sealing?.place?.name).toBe('Salt Lake');
      expect(sealing?.place?.form).toBe('City');
      expect(sealing?.temple).toBe('SLAKE');
      expect(logger.debug).not.toHaveBeenCalled();
    });

    test('should read the vendor marriage status', () => {
      const database = read(['0 @F1@ FAM', '1 _MSTAT Partners']);

      expect(database.getFamily('@F1@')?.startStatus).toBe('partners');
    });
  });

  describe('Media', () => {
    test('should synthesize inline multimedia', () => {
      const database = read(['0 @I1@ INDI', '1 OBJE', '2 FILE photo.jpg', '2 FORM jpg', '2 TITL Portrait']);

      expect(database.getIndividual('@I1@')?.multimedia).toEqual(['@OBJE1@']);
      expect(database.media[0]?.title).toBe('Portrait');
      expect(database.media[0]?.files).toEqual([
        { filename: 'photo.jpg', format: 'jpg', mediaType: '', sourceMediaType: '' },
      ]);
    });
  });

  describe('Anomalies', () => {
    test('should skip records it cannot keep and log them at debug', () => {
      const logger = captureLogger();
      const database = read(['0 INDI', '0 @X1@ FOO', '0 @I1@ INDI', '0 @I1@ INDI'], { logger });

      expect(database.individuals).toHaveLength(1);
      expect(messagesOf(logger.debug)).toEqual([
        'INDI record without an anchor id skipped',
        'Unknown top level tag FOO',
        'Duplicate or missing anchor id on individual',
      ]);
      expect(logger.warn).not.toHaveBeenCalled();
    });
  });
});
