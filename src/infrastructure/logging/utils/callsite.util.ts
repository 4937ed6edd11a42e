import * as path from 'path';

export interface CallSite {
  source?: string;
  file?: string;
  line?: number;
  column?: number;
  function?: string;
}

const FRAME_PATTERN = /^at\s+(?:(.+?)\s+\()?(.*?):(\d+):(\d+)\)?$/;

function isInternal(p: string): boolean {
  return (
    !p ||
    p.startsWith('node:') ||
    p.includes(`${path.sep}node_modules${path.sep}`) ||
    p.includes(`${path.sep}logging${path.sep}`)
  );
}

/**
 * First stack frame outside node_modules and the logging module itself,
 * relative to the working directory.
 */
export function computeCallSite(skipUntil?: Function): CallSite {
  const err = new Error();
  if (skipUntil) Error.captureStackTrace(err, skipUntil);

  const lines = (err.stack ?? '').split('\n').slice(1);
  for (const raw of lines) {
    const match = FRAME_PATTERN.exec(raw.trim());
    if (!match) continue;
    const [, functionName, absPath, line, column] = match;
    if (isInternal(absPath)) continue;

    const file = path.relative(process.cwd(), absPath).replace(/\\/g, '/');
    return {
      source: `${file}:${line}:${column}`,
      file,
      line: Number(line),
      column: Number(column),
      function: functionName,
    };
  }
  return {};
}
