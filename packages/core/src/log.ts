// glyphproof/log - Debug prints and warnings

export let DEBUG = process.env.GLYPHPROOF_DEBUG === '1' || process.env.GLYPHPROOF_DEBUG === 'true';

let warningsEnabled = true;

export function setDebug(value: boolean) {
  DEBUG = value;
}

export function dp(...args: unknown[]) {
  if (DEBUG) {
    console.log('[DEBUG]', ...args);
  }
}

/**
 * Enable or silence warnings printed when a word cannot be produced
 * and the generator falls back to an empty string.
 */
export function setWarnings(value: boolean) {
  warningsEnabled = value;
}

export function warn(message: string) {
  if (warningsEnabled) {
    console.warn(`[glyphproof] ${message}`);
  }
}
