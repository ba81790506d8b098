export type LogLevel = 'debug' | 'info' | 'error';

export type LogEventInput = {
  event_type: string;
  message?: string;
} & Record<string, unknown>;

export type CollectorLogger = {
  debug: (event: LogEventInput) => void;
  info: (event: LogEventInput) => void;
  error: (event: LogEventInput) => void;
};

export type LoggerOptions = {
  service: string;
  /** 0 = info and error only, 1 = debug, 2 = debug with output excerpts. */
  debugLevel: number;
  write?: (line: string) => void;
  now?: () => Date;
};

const EXCERPT_LIMIT = 2000;

function levelRank(level: LogLevel): number {
  if (level === 'debug') return 10;
  if (level === 'info') return 20;
  return 30;
}

function truncateExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => truncateExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt') && typeof value === 'string') {
      out[key] = value.length > EXCERPT_LIMIT ? value.slice(0, EXCERPT_LIMIT) : value;
      continue;
    }
    out[key] = truncateExcerptsDeep(value);
  }
  return out;
}

function dropExcerptsDeep(input: unknown): unknown {
  if (Array.isArray(input)) return input.map((v) => dropExcerptsDeep(v));
  if (!input || typeof input !== 'object') return input;

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(input)) {
    if (key.endsWith('_excerpt')) continue;
    out[key] = dropExcerptsDeep(value);
  }
  return out;
}

function safeJsonLine(value: unknown): string {
  try {
    return `${JSON.stringify(value)}\n`;
  } catch {
    return `${JSON.stringify({ ts: new Date().toISOString(), level: 'error', message: 'log serialization failed' })}\n`;
  }
}

/**
 * JSON-lines logger bound to stderr. stdout is reserved for the collector payload,
 * so nothing here may ever write to it.
 */
export function createLogger(options: LoggerOptions): CollectorLogger {
  const write = options.write ?? ((line: string) => void process.stderr.write(line));
  const now = options.now ?? (() => new Date());
  const minRank = options.debugLevel > 0 ? levelRank('debug') : levelRank('info');
  const keepExcerpts = options.debugLevel >= 2;

  function log(level: LogLevel, event: LogEventInput) {
    if (levelRank(level) < minRank) return;

    const payload = { ts: now().toISOString(), level, service: options.service, ...event };
    const shaped = keepExcerpts ? truncateExcerptsDeep(payload) : dropExcerptsDeep(payload);
    try {
      write(safeJsonLine(shaped));
    } catch {
      // A closed stderr must not change the collector's stdout or exit code.
    }
  }

  return {
    debug: (e) => log('debug', e),
    info: (e) => log('info', e),
    error: (e) => log('error', e),
  };
}

export function createSilentLogger(): CollectorLogger {
  const noop = () => undefined;
  return { debug: noop, info: noop, error: noop };
}
