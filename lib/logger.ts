import * as path from 'path';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { ComponentLogger, LogData, LogEntry, LogLevel, LoggerOptions, MinimumLogLevel } from './models';

const LEVEL_RANK: Record<LogLevel, number> = {
    Debug: 0,
    Info: 1,
    Success: 1,
    Warning: 2,
    Error: 3,
};

const CONSOLE_ICONS: Record<LogLevel, string> = {
    Debug: '·',
    Info: '○',
    Success: '✓',
    Warning: '⚠',
    Error: '✗',
};

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(value: number, length: number = 2): string {
    return String(value).padStart(length, '0');
}

/**
 * Formats a date as yyyyMMdd-HHmmss (local time) for file names
 */
export function formatFileTimestamp(date: Date): string {
    return `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}-`
        + `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
}

/**
 * Formats a date as yyyy-MM-dd HH:mm:ss.SSS (local time) for text log lines
 */
export function formatLineTimestamp(date: Date): string {
    return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} `
        + `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
}

/**
 * Formats milliseconds as seconds with one decimal, e.g. "12.3s"
 */
export function formatDuration(ms: number): string {
    return `${(ms / 1000).toFixed(1)}s`;
}

/**
 * Session logger writing to console, a text file and a JSON-lines file
 *
 * Sinks are best effort: a failing sink makes the call return false but
 * never throws, so logging can't abort a run.
 */
export class Logger {
    readonly sessionId: string;
    private minimumLevel: MinimumLogLevel;
    private silent: boolean;
    private fileSystem: IFileSystem;
    private now: () => Date;
    private logDirectory?: string;
    private textLogPath?: string;
    private jsonLogPath?: string;
    private directoryReady = false;
    private timers: Map<string, number> = new Map();

    constructor(options: LoggerOptions) {
        this.sessionId = options.sessionId;
        this.minimumLevel = options.minimumLevel ?? 'Info';
        this.silent = options.silent ?? false;
        this.fileSystem = options.fileSystem || new NodeFileSystem();
        this.now = options.now ?? (() => new Date());

        if (options.logDirectory) {
            const prefix = options.filePrefix ?? 'update';
            const stamp = formatFileTimestamp(this.now());
            this.logDirectory = options.logDirectory;
            this.textLogPath = path.join(options.logDirectory, `${prefix}-${stamp}.log`);
            this.jsonLogPath = path.join(options.logDirectory, `${prefix}-${stamp}.jsonl`);
        }
    }

    get logFiles(): { text?: string; json?: string } {
        return { text: this.textLogPath, json: this.jsonLogPath };
    }

    isEnabled(level: LogLevel): boolean {
        return LEVEL_RANK[level] >= LEVEL_RANK[this.minimumLevel];
    }

    /**
     * Writes one entry to every sink
     * Returns false if any sink failed; filtered entries count as written
     */
    log(level: LogLevel, component: string, message: string, data: LogData = {}): boolean {
        if (!this.isEnabled(level)) {
            return true;
        }

        const entry: LogEntry = {
            timestamp: this.now().toISOString(),
            level,
            message,
            component,
            sessionId: this.sessionId,
            data,
        };

        const consoleWritten = this.writeConsole(entry);
        const textWritten = this.writeText(entry);
        const jsonWritten = this.writeJson(entry);
        return consoleWritten && textWritten && jsonWritten;
    }

    forComponent(component: string): ComponentLogger {
        return new ScopedLogger(this, component);
    }

    startTimer(name: string): void {
        this.timers.set(name, this.now().getTime());
    }

    /**
     * Stops a timer and logs its duration at Debug
     * Returns the elapsed milliseconds, or undefined for an unknown timer
     */
    stopTimer(name: string, component: string = 'Logger'): number | undefined {
        const startedAt = this.timers.get(name);
        if (startedAt === undefined) {
            return undefined;
        }
        this.timers.delete(name);
        const elapsed = this.now().getTime() - startedAt;
        this.log('Debug', component, `${name} finished in ${formatDuration(elapsed)}`, { timer: name, durationMs: elapsed });
        return elapsed;
    }

    /**
     * Deletes .log and .jsonl files older than the retention period
     * Returns how many files were removed
     */
    rotateLogs(retentionDays: number): number {
        if (!this.logDirectory || !this.fileSystem.existsSync(this.logDirectory)) {
            return 0;
        }

        const cutoff = this.now().getTime() - retentionDays * DAY_MS;
        let removed = 0;

        let names: string[];
        try {
            names = this.fileSystem.readdirSync(this.logDirectory);
        } catch (error) {
            this.log('Warning', 'Logger', `Could not list log directory ${this.logDirectory}`, { error: String(error) });
            return 0;
        }

        for (const name of names) {
            if (!name.endsWith('.log') && !name.endsWith('.jsonl')) {
                continue;
            }
            const filePath = path.join(this.logDirectory, name);
            if (filePath === this.textLogPath || filePath === this.jsonLogPath) {
                continue;
            }
            try {
                if (this.fileSystem.getModifiedTime(filePath) < cutoff) {
                    this.fileSystem.unlinkSync(filePath);
                    removed++;
                }
            } catch (error) {
                this.log('Debug', 'Logger', `Could not rotate ${filePath}`, { error: String(error) });
            }
        }

        if (removed > 0) {
            this.log('Info', 'Logger', `Removed ${removed} log file(s) older than ${retentionDays} days`);
        }
        return removed;
    }

    private writeConsole(entry: LogEntry): boolean {
        if (this.silent) {
            return true;
        }

        const icon = CONSOLE_ICONS[entry.level];
        const showComponent = entry.level === 'Debug' || entry.level === 'Warning' || entry.level === 'Error';
        const line = showComponent
            ? `${icon} [${entry.component}] ${entry.message}`
            : `${icon} ${entry.message}`;

        try {
            if (entry.level === 'Error') {
                console.error(line);
            } else if (entry.level === 'Warning') {
                console.warn(line);
            } else {
                console.log(line);
            }
            return true;
        } catch {
            return false;
        }
    }

    private writeText(entry: LogEntry): boolean {
        if (!this.textLogPath) {
            return true;
        }
        const line = `[${formatLineTimestamp(new Date(entry.timestamp))}] [${entry.level.toUpperCase()}] [${entry.component}] ${entry.message}\n`;
        return this.append(this.textLogPath, line);
    }

    private writeJson(entry: LogEntry): boolean {
        if (!this.jsonLogPath) {
            return true;
        }
        let line: string;
        try {
            line = JSON.stringify(entry) + '\n';
        } catch {
            // Unserializable data (cycles, BigInt) still gets the message through
            line = JSON.stringify({ ...entry, data: { unserializable: true } }) + '\n';
        }
        return this.append(this.jsonLogPath, line);
    }

    private append(filePath: string, line: string): boolean {
        try {
            if (!this.directoryReady && this.logDirectory) {
                this.fileSystem.mkdirSync(this.logDirectory, { recursive: true });
                this.directoryReady = true;
            }
            this.fileSystem.appendFileSync(filePath, line);
            return true;
        } catch {
            return false;
        }
    }
}

/**
 * Component-tagged view over a session logger
 */
class ScopedLogger implements ComponentLogger {
    readonly component: string;
    private logger: Logger;

    constructor(logger: Logger, component: string) {
        this.logger = logger;
        this.component = component;
    }

    debug(message: string, data?: LogData): boolean {
        return this.logger.log('Debug', this.component, message, data);
    }

    info(message: string, data?: LogData): boolean {
        return this.logger.log('Info', this.component, message, data);
    }

    warn(message: string, data?: LogData): boolean {
        return this.logger.log('Warning', this.component, message, data);
    }

    error(message: string, data?: LogData): boolean {
        return this.logger.log('Error', this.component, message, data);
    }

    success(message: string, data?: LogData): boolean {
        return this.logger.log('Success', this.component, message, data);
    }
}

/**
 * Logger that drops everything; used when a caller supplies none
 */
export const nullLogger: ComponentLogger = {
    component: 'null',
    debug: () => true,
    info: () => true,
    warn: () => true,
    error: () => true,
    success: () => true,
};
