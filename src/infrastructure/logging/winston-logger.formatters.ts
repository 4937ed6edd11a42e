import * as winston from 'winston';
import { RequestContextService } from './request-context.service';
import { deepRedact } from './utils/redaction.util';

const levelIcon: Record<string, string> = {
  error: '⛔',
  warn: '⚠',
  info: 'ℹ',
  http: '🌐',
  verbose: '🔍',
  debug: '🐞',
};

// Keys rendered in the line prefix, or dropped from console output.
const CONSOLE_RESERVED = new Set([
  'timestamp',
  'level',
  'message',
  'context',
  'trace',
  'requestId',
  'correlationId',
  'serviceName',
  'source',
  'file',
  'line',
  'column',
  'function',
]);

function humanizeValueInline(value: unknown): string {
  if (value == null) return String(value);
  if (Array.isArray(value)) return value.map(humanizeValueInline).join(', ');
  if (value instanceof Date) return value.toISOString();
  if (typeof value === 'object') {
    return humanizeObjectInline(Object.entries(value));
  }
  return String(value);
}

function humanizeObjectInline(entries: Array<[string, unknown]>): string {
  return entries.map(([k, v]) => `${k}=${humanizeValueInline(v)}`).join(' ');
}

function asString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'message' || key === 'level') continue;
    info[key] = deepRedact(info[key]);
  }
  return info;
});

export function makeAttachRequestContextFormat(ctx?: RequestContextService) {
  return winston.format((info) => {
    if (!ctx) return info;
    const requestId = ctx.getRequestId();
    const correlationId = ctx.getCorrelationId();
    const serviceName = ctx.getServiceName();

    if (requestId && !info.requestId) info.requestId = requestId;
    if (correlationId && !info.correlationId) {
      info.correlationId = correlationId;
    }
    if (serviceName && !info.serviceName) info.serviceName = serviceName;
    return info;
  });
}

const LEVEL = Symbol.for('level');

export function renderConsoleLine(
  info: winston.Logform.TransformableInfo,
): string {
  // info.level may already carry colour codes; the symbol keeps the plain name.
  const rawLevel = asString(info[LEVEL]) ?? info.level;
  const timestamp = asString(info.timestamp) ?? '';
  const requestId = asString(info.requestId);
  const source = asString(info.source);
  const context = asString(info.context);
  const trace = asString(info.trace);

  const requestPart = requestId ? ` [req:${requestId}]` : '';
  const sourceLabel = source ? ` (${source})` : '';
  let contextLabel = '';
  let detailsPart = '';
  if (context) {
    if (context.startsWith('{') && context.endsWith('}')) {
      try {
        const parsed: unknown = JSON.parse(context);
        detailsPart = ` ${humanizeValueInline(parsed)}`;
      } catch {
        detailsPart = ` ${context}`;
      }
    } else {
      contextLabel = ` [${context}]`;
    }
  }

  const extra = Object.entries(info).filter(
    ([key]) => !CONSOLE_RESERVED.has(key),
  );
  const restPart = extra.length ? ` ${humanizeObjectInline(extra)}` : '';
  const icon = levelIcon[rawLevel] ?? '•';
  const body = `${String(info.message)}${detailsPart}${restPart}`.trim();
  const levelLabel = rawLevel.toUpperCase().padEnd(7);
  const prefix = `${requestPart}${contextLabel}${sourceLabel}`;
  const line = `${timestamp} ${icon} ${levelLabel}${prefix}: ${body}`;
  return `${line}${trace ? `\n${trace}` : ''}`.trimEnd();
}

export function makePrettyConsoleFormat(ctx?: RequestContextService) {
  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    winston.format.colorize({ all: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
    winston.format.printf(renderConsoleLine),
  );
}

export function makeJsonFileFormat(ctx?: RequestContextService) {
  const pruneCallSiteFormat = winston.format((info) => {
    delete info.file;
    delete info.line;
    delete info.column;
    delete info.function;
    return info;
  });

  return winston.format.combine(
    makeAttachRequestContextFormat(ctx)(),
    redactFormat(),
    pruneCallSiteFormat(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  );
}
