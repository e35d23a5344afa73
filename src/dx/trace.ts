import { performance } from 'node:perf_hooks';

export type TraceLevel = 'error' | 'warn' | 'info' | 'debug';

type TraceSettings = { enabled: boolean; level: TraceLevel };

type TraceEvent = {
  t: number;
  pid: number;
  level: TraceLevel;
  event: string;
  data?: unknown;
};

const severity: Record<TraceLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isTraceLevel(v: string): v is TraceLevel {
  return Object.hasOwn(severity, v);
}

/** Read on every call so tests and long-lived processes can flip the env. */
function settings(): TraceSettings {
  const flag = process.env.OBJC_ENCODING_TRACE;
  const level = (process.env.OBJC_ENCODING_TRACE_LEVEL ?? '').toLowerCase();
  return {
    enabled: flag === '1' || flag === 'true' || flag === 'yes',
    level: isTraceLevel(level) ? level : 'info',
  };
}

export function isTraceEnabled(): boolean {
  return settings().enabled;
}

export function shouldTrace(level: TraceLevel): boolean {
  const s = settings();
  return s.enabled && severity[level] <= severity[s.level];
}

/** One JSON line per event on stdout, e.g. `decode.failed` or `header.parsed`. */
export function trace(level: TraceLevel, event: string, data?: unknown) {
  if (!shouldTrace(level)) return;

  const line: TraceEvent = {
    t: Number(performance.now().toFixed(3)),
    pid: process.pid,
    level,
    event,
  };
  if (data !== undefined) line.data = data;

  // eslint-disable-next-line no-console
  console.log('[objc-encoding:trace]', JSON.stringify(line));
}

export function traceInfo(event: string, data?: unknown) {
  trace('info', event, data);
}

export function traceDebug(event: string, data?: unknown) {
  trace('debug', event, data);
}
