import type { LoggerTransport, LogEntry } from '../types.js';

/**
 * Discards all log entries. Used when logging must be fully suppressed.
 */
export class SilentTransport implements LoggerTransport {
    write(_entry: LogEntry): void {}

    destroy(): void {}
}
