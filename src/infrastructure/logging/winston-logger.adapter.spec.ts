import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import { RequestContextService } from './request-context.service';
import { WinstonLoggerAdapter } from './winston-logger.adapter';

const mockWinstonLogger = {
  info: jest.fn(),
  debug: jest.fn(),
  warn: jest.fn(),
  error: jest.fn(),
  verbose: jest.fn(),
  level: 'info',
};

jest.mock('winston', () => {
  const actual = jest.requireActual<typeof import('winston')>('winston');
  return {
    format: actual.format,
    transports: actual.transports,
    createLogger: jest.fn(() => mockWinstonLogger),
  };
});

describe('WinstonLoggerAdapter', () => {
  let adapter: WinstonLoggerAdapter;
  let requestContext: RequestContextService;

  beforeEach(() => {
    jest.clearAllMocks();
    requestContext = new RequestContextService();
    adapter = new WinstonLoggerAdapter(
      new ConfigService({
        LOG_LEVEL: 'debug',
        LOG_ENABLE_FILES: 'false',
        LOG_ENABLE_CONSOLE: 'false',
      }),
      requestContext,
    );
  });

  it('creates a console-only logger when file logging is disabled', () => {
    expect(winston.createLogger).toHaveBeenCalledWith(
      expect.objectContaining({
        level: 'debug',
        transports: [expect.any(winston.transports.Console)],
        exceptionHandlers: [],
        rejectionHandlers: [],
      }),
    );
  });

  it('passes a plain string context through as a label', () => {
    adapter.info('Listing bucket', 'BucketInspectorService');

    expect(mockWinstonLogger.info).toHaveBeenCalledWith(
      'Listing bucket',
      expect.objectContaining({ context: 'BucketInspectorService' }),
    );
  });

  it('serializes structured context and keeps metadata fields', () => {
    adapter.warn('Slow listing', { bucket: 'reports' }, { pages: 3 });

    expect(mockWinstonLogger.warn).toHaveBeenCalledWith(
      'Slow listing',
      expect.objectContaining({ context: '{"bucket":"reports"}', pages: 3 }),
    );
  });

  it('merges the request context', () => {
    requestContext.runWith({ requestId: 'req-1' }, () =>
      adapter.debug('Inside request', 'Ctx'),
    );

    expect(mockWinstonLogger.debug).toHaveBeenCalledWith(
      'Inside request',
      expect.objectContaining({
        context: '{"requestId":"req-1","context":"Ctx"}',
      }),
    );
  });

  it('attaches error details', () => {
    const error = new Error('boom');

    adapter.error('Inspection failed', error, 'Ctx');

    expect(mockWinstonLogger.error).toHaveBeenCalledWith(
      'Inspection failed',
      expect.objectContaining({
        trace: error.stack,
        error: { name: 'Error', message: 'boom', stack: error.stack },
      }),
    );
  });

  it('writes fatal entries at error level', () => {
    adapter.fatal('Shutting down', 'not-an-error');

    expect(mockWinstonLogger.error).toHaveBeenCalledWith(
      'Shutting down',
      expect.objectContaining({ error: 'not-an-error' }),
    );
  });

  it('maps fatal to error when changing the level', () => {
    adapter.setLevel('fatal');
    expect(adapter.getLevel()).toBe('error');

    adapter.setLevel('warn');
    expect(adapter.getLevel()).toBe('warn');
  });
});
