import { Injectable, LoggerService, Optional, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as fs from 'fs';
import * as path from 'path';
import { ILoggerPort, LogContext, LogLevel } from './logger.port';
import { RequestContextService } from './request-context.service';
import { computeCallSite } from './utils/callsite.util';
import {
  makeJsonFileFormat,
  makePrettyConsoleFormat,
} from './winston-logger.formatters';

@Injectable({ scope: Scope.DEFAULT })
export class WinstonLoggerAdapter implements ILoggerPort, LoggerService {
  private readonly logger: winston.Logger;
  private static isInitialized = false;

  constructor(
    private readonly configService: ConfigService,
    @Optional() private readonly requestContext?: RequestContextService,
  ) {
    const logLevel = this.configService.get<string>('LOG_LEVEL', 'info');
    const logDir = this.configService.get<string>('LOG_DIR', 'logs');
    const appName = this.configService.get<string>('APP_NAME', 'bucket-health');
    const enableConsole =
      this.configService.get<string>('LOG_ENABLE_CONSOLE', 'true') === 'true';
    let enableFiles =
      this.configService.get<string>('LOG_ENABLE_FILES', 'true') === 'true';

    if (enableFiles) {
      try {
        const absDir = path.isAbsolute(logDir)
          ? logDir
          : path.join(process.cwd(), logDir);
        if (!fs.existsSync(absDir)) {
          fs.mkdirSync(absDir, { recursive: true });
        }
      } catch (e) {
        enableFiles = false;
        const reason = e instanceof Error ? e.message : String(e);
        console.warn(
          `[WinstonLogger] Cannot create log directory ${logDir}: ${reason}`,
        );
      }
    }

    const consoleTransport = new winston.transports.Console({
      level: logLevel,
      format: makePrettyConsoleFormat(this.requestContext),
      silent: !enableConsole,
    });

    const jsonFormat = makeJsonFileFormat(this.requestContext);
    const rotateFile = (filename: string, level?: string) =>
      new DailyRotateFile({
        dirname: logDir,
        filename: `${appName}-%DATE%-${filename}.log`,
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: this.configService.get<string>('LOG_MAX_SIZE', '20m'),
        maxFiles: this.configService.get<string>('LOG_MAX_FILES', '14d'),
        level: level || logLevel,
        format: jsonFormat,
      });

    // Exception and rejection handlers are process-wide; register them once.
    const registerHandlers = enableFiles && !WinstonLoggerAdapter.isInitialized;
    const fileTransports = enableFiles
      ? [rotateFile('combined'), rotateFile('error', 'error')]
      : [];

    this.logger = winston.createLogger({
      level: logLevel,
      transports: [consoleTransport, ...fileTransports],
      exceptionHandlers: registerHandlers
        ? [rotateFile('exceptions', 'error')]
        : [],
      rejectionHandlers: registerHandlers
        ? [rotateFile('rejections', 'error')]
        : [],
      exitOnError: false,
    });

    if (registerHandlers) WinstonLoggerAdapter.isInitialized = true;
  }

  private buildWinstonMeta(
    level: LogLevel,
    error?: Error | unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): Record<string, unknown> {
    const callsite = computeCallSite(this[level]);

    let logContext: LogContext = { ...this.requestContext?.getStore() };
    if (typeof context === 'object' && context) {
      logContext = { ...logContext, ...context };
    } else if (typeof context === 'string') {
      logContext.context = context;
    }

    const meta: Record<string, unknown> = {
      ...this.serializeContext(logContext),
      ...metadata,
      ...callsite,
    };

    if (error instanceof Error) {
      meta.trace = error.stack;
      meta.error = {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };
    } else if (error !== undefined && error !== null) {
      meta.error = error;
    }
    return meta;
  }

  // A bare string context becomes a console label; richer ones are JSON.
  private serializeContext(logContext: LogContext): Record<string, unknown> {
    const keys = Object.keys(logContext);
    if (keys.length === 0) return {};
    if (keys.length === 1 && typeof logContext.context === 'string') {
      return { context: logContext.context };
    }
    try {
      return { context: JSON.stringify(logContext) };
    } catch {
      return { context: '[Unserializable Context]' };
    }
  }

  log(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.info(
      message,
      this.buildWinstonMeta('info', undefined, context, metadata),
    );
  }

  info(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.info(
      message,
      this.buildWinstonMeta('info', undefined, context, metadata),
    );
  }

  debug(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.debug(
      message,
      this.buildWinstonMeta('debug', undefined, context, metadata),
    );
  }

  warn(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.warn(
      message,
      this.buildWinstonMeta('warn', undefined, context, metadata),
    );
  }

  error(
    message: string,
    error?: Error | unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(
      message,
      this.buildWinstonMeta('error', error, context, metadata),
    );
  }

  fatal(
    message: string,
    error?: Error | unknown,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.error(
      message,
      this.buildWinstonMeta('fatal', error, context, metadata),
    );
  }

  verbose(
    message: string,
    context?: string | LogContext,
    metadata?: Record<string, unknown>,
  ): void {
    this.logger.verbose(
      message,
      this.buildWinstonMeta('debug', undefined, context, metadata),
    );
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level === 'fatal' ? 'error' : level;
  }

  getLevel(): string {
    return this.logger.level;
  }
}
