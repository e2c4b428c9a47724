// Centralized logging utility for the Monarch portfolio tools
// Provides structured logs with timestamps; all levels can be routed to stderr for MCP stdio mode

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
    'DEBUG': LogLevel.DEBUG,
    'INFO': LogLevel.INFO,
    'WARN': LogLevel.WARN,
    'ERROR': LogLevel.ERROR
};

let currentLogLevel = LOG_LEVEL_MAP[(process.env.LOG_LEVEL || 'INFO').toUpperCase()] ?? LogLevel.INFO;
let logStream: 'console' | 'stderr' = 'console';

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
    [LogLevel.DEBUG]: 'DEBUG',
    [LogLevel.INFO]: 'INFO',
    [LogLevel.WARN]: 'WARN',
    [LogLevel.ERROR]: 'ERROR'
};

export function setLogLevel(level: LogLevel): void {
    currentLogLevel = level;
}

export function getLogLevel(): LogLevel {
    return currentLogLevel;
}

/**
 * Send every level to stderr. stdout belongs to the MCP transport when serving over stdio.
 */
export function setLogStream(stream: 'console' | 'stderr'): void {
    logStream = stream;
}

/**
 * Format a log line without printing it
 */
export function formatLogLine(level: LogLevel, tag: string, message: string, data?: unknown, now: Date = new Date()): string {
    const levelName = LOG_LEVEL_NAMES[level];
    const formattedTag = `[${tag}]`.padEnd(12);

    let logLine = `${now.toISOString()} ${levelName.padEnd(5)} ${formattedTag} ${message}`;

    if (data !== undefined) {
        if (data instanceof Error) {
            logLine += `\n  Error: ${data.message}`;
            if (data.stack) {
                logLine += `\n  Stack: ${data.stack.split('\n').slice(1, 4).join('\n        ')}`;
            }
        } else if (typeof data === 'object') {
            try {
                const serialized = JSON.stringify(data, null, 2);
                // Truncate very long objects
                const maxLen = 2000;
                if (serialized.length > maxLen) {
                    logLine += `\n  Data: ${serialized.substring(0, maxLen)}... [truncated]`;
                } else {
                    logLine += `\n  Data: ${serialized}`;
                }
            } catch {
                logLine += `\n  Data: [Unserializable Object]`;
            }
        } else {
            logLine += `\n  Data: ${String(data)}`;
        }
    }

    return logLine;
}

/**
 * Log a message with structured formatting
 * @param level - Log level (DEBUG, INFO, WARN, ERROR)
 * @param tag - Context tag (e.g., 'AUTH', 'API', 'PORTFOLIO')
 * @param message - Human-readable message
 * @param data - Optional additional data to serialize
 */
export function log(level: LogLevel, tag: string, message: string, data?: unknown): void {
    if (level < currentLogLevel) return;

    const logLine = formatLogLine(level, tag, message, data);

    if (logStream === 'stderr') {
        console.error(logLine);
        return;
    }

    // Use appropriate console method based on level
    switch (level) {
        case LogLevel.ERROR:
            console.error(logLine);
            break;
        case LogLevel.WARN:
            console.warn(logLine);
            break;
        default:
            console.log(logLine);
    }
}

// Convenience functions
export const logDebug = (tag: string, message: string, data?: unknown) => log(LogLevel.DEBUG, tag, message, data);
export const logInfo = (tag: string, message: string, data?: unknown) => log(LogLevel.INFO, tag, message, data);
export const logWarn = (tag: string, message: string, data?: unknown) => log(LogLevel.WARN, tag, message, data);
export const logError = (tag: string, message: string, data?: unknown) => log(LogLevel.ERROR, tag, message, data);

/**
 * Create a timer for measuring operation duration
 */
export function createTimer(): () => number {
    const start = Date.now();
    return () => Date.now() - start;
}
