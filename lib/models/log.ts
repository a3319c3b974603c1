import { IFileSystem } from '../interfaces';

export type LogLevel = 'Debug' | 'Info' | 'Warning' | 'Error' | 'Success';

/**
 * Levels a caller may pick as the minimum; Success always ranks with Info
 */
export type MinimumLogLevel = Exclude<LogLevel, 'Success'>;

export type LogData = Record<string, unknown>;

/**
 * A single structured log record, as written to the JSON-lines sink
 */
export type LogEntry = Readonly<{
    timestamp: string;
    level: LogLevel;
    message: string;
    component: string;
    sessionId: string;
    data: LogData;
}>

export type LoggerOptions = {
    sessionId: string;
    minimumLevel?: MinimumLogLevel;
    /** No file sinks when omitted */
    logDirectory?: string;
    silent?: boolean;
    /** Log file base name, timestamp is appended */
    filePrefix?: string;
    fileSystem?: IFileSystem;
    now?: () => Date;
}

/**
 * Logger bound to one component tag
 * Every method reports whether all sinks accepted the entry and never throws
 */
export interface ComponentLogger {
    readonly component: string;
    debug(message: string, data?: LogData): boolean;
    info(message: string, data?: LogData): boolean;
    warn(message: string, data?: LogData): boolean;
    error(message: string, data?: LogData): boolean;
    success(message: string, data?: LogData): boolean;
}
