/**
 * Mock helpers and factories for testing
 *
 * Note: These types use jest.Mock which is available in test files
 * that have @types/jest installed and configured.
 */
import { EventEmitter } from 'events';
import * as path from 'path';
import { Readable, Writable } from 'stream';
import {
    IEnvironmentStore,
    IFileSystem,
    IHttpClient,
    IProcessExecutor,
    IProgressBar,
    IProgressBarFactory,
    IProgressMultiBar,
} from '../../interfaces';
import { createSessionContext, CreateContextOptions, SessionContext } from '../../context';
import { createDefaultConfiguration } from '../../../data/default-config';
import { Configuration, PathScope } from '../../models';

export type MockProcessSpec = {
    exitCode?: number | null;
    stdout?: string;
    stderr?: string;
    /** Emits an 'error' event instead of closing */
    error?: NodeJS.ErrnoException;
    /** Never closes; used with fake timers to hit the timeout */
    hang?: boolean;
}

export type SpawnCall = {
    command: string;
    args: string[];
    options: any;
}

/**
 * Fake child process: emits its output and close (or error) on the next tick
 */
export function createMockProcess(spec: MockProcessSpec = {}): any {
    const child: any = new EventEmitter();
    child.stdout = new EventEmitter();
    child.stderr = new EventEmitter();
    child.pid = 4242;
    child.kill = jest.fn();

    if (!spec.hang) {
        setImmediate(() => {
            if (spec.error) {
                child.emit('error', spec.error);
                return;
            }
            if (spec.stdout) child.stdout.emit('data', Buffer.from(spec.stdout));
            if (spec.stderr) child.stderr.emit('data', Buffer.from(spec.stderr));
            child.emit('close', spec.exitCode === undefined ? 0 : spec.exitCode);
        });
    }

    return child;
}

export interface MockProcessExecutor extends IProcessExecutor {
    spawn: jest.Mock;
    terminate: jest.Mock;
    calls: SpawnCall[];
}

/**
 * Executor whose processes behave as the handler says; every call is recorded
 */
export function createMockProcessExecutor(
    handler: (command: string, args: string[]) => MockProcessSpec = () => ({}),
): MockProcessExecutor {
    const calls: SpawnCall[] = [];
    return {
        calls,
        spawn: jest.fn((command: string, args: string[], options: any) => {
            calls.push({ command, args, options });
            return createMockProcess(handler(command, args));
        }),
        terminate: jest.fn((child: any) => child.kill()),
    };
}

/**
 * In-memory file system keyed by exact path strings
 */
export class MemoryFileSystem implements IFileSystem {
    files: Map<string, { content: string; mtime: number }> = new Map();
    directories: Set<string> = new Set();
    failWritesUnder: string | null = null;

    constructor(files: Record<string, string> = {}) {
        Object.entries(files).forEach(([filePath, content]) => this.writeFileSync(filePath, content));
    }

    existsSync(target: string): boolean {
        if (this.files.has(target) || this.directories.has(target)) {
            return true;
        }
        const prefix = target.endsWith(path.sep) ? target : target + path.sep;
        return Array.from(this.files.keys()).some(file => file.startsWith(prefix));
    }

    isFile(target: string): boolean {
        return this.files.has(target);
    }

    mkdirSync(target: string): void {
        this.checkWritable(target);
        this.directories.add(target);
    }

    readdirSync(target: string): string[] {
        const names = new Set<string>();
        for (const file of this.files.keys()) {
            if (path.dirname(file) === target) {
                names.add(path.basename(file));
            }
        }
        return Array.from(names).sort();
    }

    readFileSync(target: string): string {
        const file = this.files.get(target);
        if (!file) {
            const error: NodeJS.ErrnoException = new Error(`ENOENT: no such file or directory, open '${target}'`);
            error.code = 'ENOENT';
            throw error;
        }
        return file.content;
    }

    writeFileSync(target: string, data: string): void {
        this.checkWritable(target);
        this.files.set(target, { content: data, mtime: Date.now() });
    }

    appendFileSync(target: string, data: string): void {
        this.checkWritable(target);
        const existing = this.files.get(target)?.content ?? '';
        this.files.set(target, { content: existing + data, mtime: Date.now() });
    }

    unlinkSync(target: string): void {
        this.files.delete(target);
    }

    getModifiedTime(target: string): number {
        const file = this.files.get(target);
        if (!file) {
            throw new Error(`ENOENT: ${target}`);
        }
        return file.mtime;
    }

    setModifiedTime(target: string, mtime: number): void {
        const file = this.files.get(target);
        if (file) {
            file.mtime = mtime;
        }
    }

    /** Like fs, every chunk lands in the file as it is written */
    createWriteStream(target: string): Writable {
        const chunks: Buffer[] = [];
        return new Writable({
            write: (chunk: Buffer, _encoding, callback) => {
                chunks.push(Buffer.from(chunk));
                try {
                    this.writeFileSync(target, Buffer.concat(chunks).toString('utf8'));
                    callback();
                } catch (error) {
                    callback(error instanceof Error ? error : new Error(String(error)));
                }
            },
            final: (callback) => {
                if (!this.files.has(target)) {
                    this.writeFileSync(target, '');
                }
                callback();
            },
        });
    }

    filesUnder(directory: string): string[] {
        return Array.from(this.files.keys()).filter(file => path.dirname(file) === directory).sort();
    }

    private checkWritable(target: string): void {
        if (this.failWritesUnder && target.startsWith(this.failWritesUnder)) {
            const error: NodeJS.ErrnoException = new Error(`EACCES: permission denied, open '${target}'`);
            error.code = 'EACCES';
            throw error;
        }
    }
}

/**
 * PATH store held in memory; writes can be made to fail or to be silently dropped
 */
export class MemoryEnvironmentStore implements IEnvironmentStore {
    values: Record<PathScope, string>;
    writes: Array<{ scope: PathScope; value: string }> = [];
    failWritesTo: PathScope | null = null;
    /** How many writes to failWritesTo fail before they start succeeding */
    failWritesRemaining = Infinity;
    dropWritesTo: PathScope | null = null;
    failReads = false;

    constructor(values: Partial<Record<PathScope, string>> = {}) {
        this.values = {
            User: values.User ?? 'C:\\Users\\test\\bin',
            Machine: values.Machine ?? 'C:\\Windows\\system32;C:\\Windows;C:\\Windows\\System32\\Wbem;C:\\Windows\\System32\\WindowsPowerShell\\v1.0',
            Process: values.Process ?? 'C:\\Windows\\system32;C:\\Users\\test\\bin',
        };
    }

    async getPath(scope: PathScope): Promise<string> {
        if (this.failReads) {
            throw new Error('registry unavailable');
        }
        return this.values[scope];
    }

    async setPath(scope: PathScope, value: string): Promise<void> {
        this.writes.push({ scope, value });
        if (this.failWritesTo === scope && this.failWritesRemaining > 0) {
            this.failWritesRemaining--;
            throw new Error(`Access denied writing ${scope} PATH`);
        }
        if (this.dropWritesTo === scope) {
            return;
        }
        this.values[scope] = value;
    }
}

export interface MockHttpClient extends IHttpClient {
    request: jest.Mock;
}

/**
 * HTTP client answering every request with the body as a stream
 */
export function createMockHttpClient(body: string = 'Write-Output "installed"', headers: Record<string, string> = {}): MockHttpClient {
    return {
        request: jest.fn(async () => ({
            data: Readable.from([Buffer.from(body)]),
            status: 200,
            statusText: 'OK',
            headers: { 'content-length': String(Buffer.byteLength(body)), ...headers },
            config: {},
        })),
    };
}

export type MockProgress = {
    factory: IProgressBarFactory & { createMultiBar: jest.Mock };
    multibar: IProgressMultiBar & { create: jest.Mock; stop: jest.Mock };
    bar: IProgressBar & { setTotal: jest.Mock; update: jest.Mock; stop: jest.Mock };
}

export function createMockProgress(): MockProgress {
    const bar = { setTotal: jest.fn(), update: jest.fn(), stop: jest.fn() };
    const multibar = { create: jest.fn(() => bar), stop: jest.fn() };
    const factory = { createMultiBar: jest.fn(() => multibar) };
    return { factory, multibar, bar };
}

export function createTestConfiguration(): Configuration {
    const config = createDefaultConfiguration();
    config.Advanced.retryDelaySeconds = 0;
    config.Advanced.maxRetries = 0;
    return config;
}

export type TestContext = {
    ctx: SessionContext;
    fileSystem: MemoryFileSystem;
    environment: MemoryEnvironmentStore;
    executor: MockProcessExecutor;
}

/**
 * Session context over in-memory collaborators; the tools directory is the only PATH entry
 */
export function createTestContext(
    overrides: Partial<CreateContextOptions> & { handler?: (command: string, args: string[]) => MockProcessSpec; files?: string[] } = {},
): TestContext {
    const fileSystem = overrides.fileSystem instanceof MemoryFileSystem ? overrides.fileSystem : new MemoryFileSystem();
    (overrides.files ?? []).forEach(file => fileSystem.writeFileSync(file, ''));
    const environment = overrides.environment instanceof MemoryEnvironmentStore ? overrides.environment : new MemoryEnvironmentStore();
    const executor = createMockProcessExecutor(overrides.handler);

    const ctx = createSessionContext({
        config: createTestConfiguration(),
        configPath: '/test/pmu/config.json',
        sessionId: 'test-session',
        silent: true,
        env: { PATH: '/tools' },
        ...overrides,
        fileSystem,
        environment,
        processExecutor: executor,
    });

    return { ctx, fileSystem, environment, executor };
}
