import { logWarn } from './logger.js';
import { trace } from './trace.js';

export type EncodingWarningCode =
  | 'UNKNOWN_TYPE_NAME'
  | 'SKIPPED_DECLARATION'
  | 'LAYOUT_UNAVAILABLE';

export type EncodingWarning = {
  code: EncodingWarningCode;
  message: string;
  hint?: string;
};

/**
 * Reports a non-fatal condition: the header importer's unresolved names and
 * skipped declarations, signatures built without offsets.
 *
 * Prints only with debug logging on; traced as `warning.<CODE>` either way.
 */
export function warn(w: EncodingWarning) {
  trace('warn', `warning.${w.code}`, { message: w.message });
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  logWarn(`warning(${w.code}): ${w.message}${hint}`);
}
