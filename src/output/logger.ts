/**
 * Console logger for chunkline.
 *
 * Machine-readable output (json) must be the only thing written to stdout, so the
 * CLI switches the logger to silent mode before printing it. Library callers can
 * hand the engine their own `Logger`; this module is the default.
 */

export interface Logger {
    debug(...args: unknown[]): void;
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
}

let silentMode = false;
let verboseMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, log(), debug() and warn() output nothing.
 * error() always outputs to stderr.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

export function isSilentMode(): boolean {
    return silentMode;
}

/**
 * Enable debug output. Debug lines go to stderr so they never mix with chunk output.
 */
export function setVerbose(verbose: boolean): void {
    verboseMode = verbose;
}

export function isVerbose(): boolean {
    return verboseMode;
}

export function debug(...args: unknown[]): void {
    if (verboseMode && !silentMode) {
        console.error('[chunkline]', ...args);
    }
}

/**
 * Log to stdout. Silenced in silent mode.
 */
export function log(...args: unknown[]): void {
    if (!silentMode) {
        console.log(...args);
    }
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn('[chunkline] Warning:', ...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}

export const CONSOLE_LOGGER: Logger = { debug, log, warn, error };
