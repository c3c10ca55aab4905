import { logWarn } from './logger.js';

export type AbiforgeWarningCode =
  | 'UNSUPPORTED_FIELD_SKIPPED'
  | 'LAYOUT_OVERRIDDEN'
  | 'MISSING_DEALLOCATOR';

export type AbiforgeWarning = {
  code: AbiforgeWarningCode;
  message: string;
  hint?: string;
};

/**
 * Emit a non-fatal warning.
 *
 * Warnings never change the generated output and only print when debug
 * logging is enabled.
 */
export function warn(w: AbiforgeWarning) {
  const hint = w.hint ? ` Hint: ${w.hint}` : '';
  logWarn(`warning(${w.code}): ${w.message}${hint}`);
}
