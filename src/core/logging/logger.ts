/**
 * @file Lifecycle Logger
 *
 * Marker-prefixed, chalk-coloured messages for startup, shutdown and fatal
 * errors. Writes to stderr so stdout stays owned by the chart surface.
 *
 * @module core/logging/logger
 */

import chalk, { type ChalkInstance } from 'chalk';

/**
 * Standard markers for the console dialect.
 */
export const MARKERS = {
    AFFIRMATIVE: '●',
    INFO: '○',
    ERROR: '>> ERROR:',
    WARNING: '>> WARNING:',
} as const;

export type LogLevel = 'success' | 'info' | 'warning' | 'error';

export type LogSink = (line: string) => void;

export interface Logger {
    success(message: string): void;
    info(message: string): void;
    warn(message: string): void;
    error(message: string): void;
}

/**
 * Format one log line with its marker and colour.
 */
export function logLine_format(level: LogLevel, message: string, colors: ChalkInstance = chalk): string {
    switch (level) {
        case 'success': return colors.cyan(`${MARKERS.AFFIRMATIVE} ${message}`);
        case 'info':    return colors.gray(`${MARKERS.INFO} ${message}`);
        case 'warning': return colors.yellow(`${MARKERS.WARNING} ${message}`);
        case 'error':   return colors.red(`${MARKERS.ERROR} ${message}`);
    }
}

/**
 * Build a logger bound to a sink (stderr by default).
 */
export function logger_create(
    sink: LogSink = (line: string): void => { process.stderr.write(`${line}\n`); },
    colors: ChalkInstance = chalk,
): Logger {
    return {
        success: (message: string): void => sink(logLine_format('success', message, colors)),
        info:    (message: string): void => sink(logLine_format('info', message, colors)),
        warn:    (message: string): void => sink(logLine_format('warning', message, colors)),
        error:   (message: string): void => sink(logLine_format('error', message, colors)),
    };
}
