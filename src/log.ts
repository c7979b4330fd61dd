/**
 * Namespaced logging for Attendance Digest.
 *
 * Library and CLI code should use these functions instead of raw console.* calls.
 */

const PREFIX = "Attendance Digest";

let _debugEnabled = false;

/** Call after settings are loaded to sync the debug gate. */
export function setDebugEnabled(enabled: boolean): void {
	_debugEnabled = enabled;
}

/** Debug-level logging — gated behind settings.debugMode. */
export function debug(...args: unknown[]): void {
	if (!_debugEnabled) return;
	console.debug(`${PREFIX}:`, ...args);
}

/** Progress messages for a normal run. Written to stderr so stdout stays clean for the report. */
export function info(...args: unknown[]): void {
	console.error(`${PREFIX}:`, ...args);
}

/** Warning-level logging — non-fatal issues worth investigating. */
export function warn(...args: unknown[]): void {
	console.warn(`${PREFIX}:`, ...args);
}

/** Error-level logging — unexpected failures. */
export function error(...args: unknown[]): void {
	console.error(`${PREFIX}:`, ...args);
}
