/**
 * Diagnostic logging.
 *
 * Lines go to stderr, and only when NPM_STATE_DEBUG=1 is set or
 * `setDebugLogging(true)` was called (the CLI does so for --verbose).
 * User-facing output does not go through here.
 */

export type LogCategory = 'command' | 'reconcile' | 'parse' | 'config';

let forced = false;

export function setDebugLogging(enabled: boolean): void {
    forced = enabled;
}

export function isDebugEnabled(): boolean {
    return forced || process.env.NPM_STATE_DEBUG === '1';
}

/**
 * @example
 * logDebug('command', 'Running npm', { argv, cwd });
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
    if (!isDebugEnabled()) return;

    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [DEBUG] [${category}] ${message}`);
    if (metadata) {
        console.error(JSON.stringify(metadata, null, 2));
    }
}

export function logWarning(category: LogCategory, message: string, error?: Error): void {
    if (!isDebugEnabled()) return;

    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [WARN] [${category}] ${message}`);
    if (error) {
        console.error(`Error: ${error.message}`);
    }
}
