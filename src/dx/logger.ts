export type LogLevel = 'debug' | 'warn';

const PREFIX = '[objc-encoding]';
const DEBUG_ENV = 'OBJC_ENCODING_DEBUG';

let enabled = false;

export function isDebugEnabled(): boolean {
  return enabled || process.env[DEBUG_ENV] === '1';
}

/** The CLI turns this on from `debug: true` in the config file. */
export function setDebugEnabled(v: boolean) {
  enabled = v;
}

function emit(level: LogLevel, args: unknown[]) {
  if (!isDebugEnabled()) return;
  // eslint-disable-next-line no-console
  const write = level === 'warn' ? console.warn : console.log;
  write(PREFIX, ...args);
}

export function logDebug(...args: unknown[]) {
  emit('debug', args);
}

export function logWarn(...args: unknown[]) {
  emit('warn', args);
}
