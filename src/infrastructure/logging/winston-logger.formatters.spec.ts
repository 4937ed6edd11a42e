import { renderConsoleLine } from './winston-logger.formatters';

const LEVEL = Symbol.for('level');

describe('renderConsoleLine', () => {
  it('renders the request id, context label and extra fields', () => {
    const line = renderConsoleLine({
      level: 'info',
      [LEVEL]: 'info',
      message: 'Request completed',
      timestamp: '2024-05-01 00:00:00.000',
      requestId: 'req-1',
      context: 'LoggingInterceptor',
      statusCode: 200,
    });

    expect(line).toBe(
      '2024-05-01 00:00:00.000 ℹ INFO    [req:req-1] [LoggingInterceptor]: Request completed statusCode=200',
    );
  });

  it('reads the plain level when the visible one is colourised', () => {
    const line = renderConsoleLine({
      level: '\u001b[33mwarn\u001b[39m',
      [LEVEL]: 'warn',
      message: 'Listing skipped',
      timestamp: 't',
      context: '{"bucket":"reports","pages":3}',
    });

    expect(line).toBe('t ⚠ WARN   : Listing skipped bucket=reports pages=3');
  });

  it('appends the trace on its own line', () => {
    const line = renderConsoleLine({
      level: 'error',
      [LEVEL]: 'error',
      message: 'Unexpected error',
      timestamp: 't',
      source: 'src/main.ts:10:3',
      trace: 'Error: boom\n    at main',
    });

    expect(line).toBe(
      't ⛔ ERROR   (src/main.ts:10:3): Unexpected error\nError: boom\n    at main',
    );
  });
});
