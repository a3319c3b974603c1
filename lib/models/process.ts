import { IFileSystem, IProcessExecutor } from '../interfaces';
import { ComponentLogger } from './log';

/**
 * Outcome of a single process invocation
 */
export type ProcessResult = Readonly<{
    /** Resolved executable that was launched */
    filePath: string;
    arguments: string;
    /** -1 when the process was killed on timeout */
    exitCode: number;
    durationMs: number;
    timedOut: boolean;
    success: boolean;
    stdout: string;
    stderr: string;
}>

/**
 * Options for executing a single process
 * Used by low-level execution functions like runProcess, resolveExecutable
 */
export type RunProcessOptions = {
    workingDirectory?: string;
    timeoutSeconds?: number;
    env?: NodeJS.ProcessEnv;
    /** Extra directories searched after PATH */
    searchPaths?: string[];
    processExecutor?: IProcessExecutor;
    fileSystem?: IFileSystem;
    logger?: ComponentLogger;
}

/**
 * Options for re-running an operation until it succeeds
 */
export type RetryOptions = {
    maxRetries?: number;
    retryDelaySeconds?: number;
    /** Shown in log messages, e.g. the command being retried */
    label?: string;
    logger?: ComponentLogger;
    sleep?: (ms: number) => Promise<void>;
}

export type RetryProcessOptions = RunProcessOptions & RetryOptions;

/**
 * Executable and arguments actually handed to spawn
 */
export type LaunchCommand = {
    command: string;
    args: string[];
    verbatim: boolean;
}

/**
 * Availability record produced by the command prober
 */
export type CommandProbeResult = {
    command: string;
    available: boolean;
    path: string | null;
    /** First non-empty line of the probe output */
    version: string | null;
    exitCode: number | null;
    error: string | null;
}
