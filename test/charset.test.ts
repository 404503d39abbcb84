import { FALLBACK_ENCODING, createDecoder, defaultCharsetProvider, detectEncoding } from '../src/index';

describe('Charset detection', () => {
  test.each([
    [[0xef, 0xbb, 0xbf, 0x30], 'utf-8', 3],
    [[0xfe, 0xff, 0x00, 0x30], 'utf-16be', 2],
    [[0xff, 0xfe, 0x30, 0x00], 'utf-16le', 2],
    [[0xff, 0xfe, 0x00, 0x00], 'utf-32le', 4],
    [[0x00, 0x00, 0xfe, 0xff], 'utf-32be', 4],
    [[0x00, 0x30, 0x00, 0x20], 'utf-16be', 0],
    [[0x30, 0x00, 0x20, 0x00], 'utf-16le', 0],
  ])('should detect %j as %s', (bytes, encoding, bomLength) => {
    expect(detectEncoding(Uint8Array.from(bytes))).toEqual({ encoding, bomLength });
  });

  test('should leave single byte text undetected', () => {
    expect(detectEncoding(Uint8Array.from([0x30, 0x20, 0x48, 0x45]))).toBeUndefined();
    expect(FALLBACK_ENCODING).toBe('utf-8');
  });
});

describe('Decoders', () => {
  test('should decode 32 bit text in both byte orders', () => {
    const little = Uint8Array.from([0x41, 0, 0, 0, 0xac, 0x20, 0, 0]);
    const big = Uint8Array.from([0, 0, 0, 0x41, 0, 0x01, 0xf6, 0x00]);

    expect(createDecoder('utf-32le').decode(little)).toBe('A€');
    expect(createDecoder('utf-32be').decode(big)).toBe('A\u{1f600}');
  });

  test('should decode windows-1252 bytes', () => {
    expect(createDecoder('windows-1252').decode(Uint8Array.from([0x4a, 0x6f, 0x73, 0xe9]))).toBe('José');
  });

  test('should map declared character sets', () => {
    expect(defaultCharsetProvider.getDecoder('ANSI')?.encoding).toBe('windows-1252');
    expect(defaultCharsetProvider.getDecoder(' utf-8 ')?.encoding).toBe('utf-8');
    expect(defaultCharsetProvider.getDecoder('UNICODE')?.encoding).toBe('utf-16le');
    expect(defaultCharsetProvider.getDecoder('ANSEL')).toBeUndefined();
    expect(defaultCharsetProvider.getDecoder('IBMPC')).toBeUndefined();
  });
});
