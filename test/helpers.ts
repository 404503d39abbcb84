import { Logger } from '../src/index';

export interface CapturingLogger extends Logger {
  debug: jest.Mock;
  info: jest.Mock;
  warn: jest.Mock;
  error: jest.Mock;
}

export function captureLogger(): CapturingLogger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}

/** Joins lines with LF and terminates the last one. */
export function gedcom(...lines: string[]): string {
  return `${lines.join('\n')}\n`;
}

export function messagesOf(mock: jest.Mock): string[] {
  return mock.mock.calls.map(call => String(call[0]));
}
