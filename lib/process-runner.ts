import * as path from 'path';
import { ChildProcess } from 'child_process';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { IProcessExecutor, NodeProcessExecutor } from './interfaces/process-interface';
import { splitArguments } from './cli';
import { ExecutableNotFoundError, ProcessLaunchError } from './errors';
import { formatDuration, nullLogger } from './logger';
import { LaunchCommand, ProcessResult, RunProcessOptions } from './models';

/**
 * Extensions tried, in order, when a command is given without one
 * The same order ranks PATH matches: native executables before scripts
 */
export const RESOLUTION_EXTENSIONS = ['.exe', '.cmd', '.bat', '.ps1'];

export const DEFAULT_TIMEOUT_SECONDS = 300;

type ResolveOptions = Pick<RunProcessOptions, 'env' | 'searchPaths' | 'fileSystem'>;

function hasKnownExtension(name: string): boolean {
    return RESOLUTION_EXTENSIONS.includes(path.extname(name).toLowerCase());
}

function hasDirectoryPart(name: string): boolean {
    return name.includes('/') || name.includes('\\');
}

/**
 * Lists the directories of the PATH variable, unquoted and without blanks
 */
export function getPathDirectories(env: NodeJS.ProcessEnv = process.env): string[] {
    const value = env.PATH ?? env.Path ?? '';
    return value
        .split(path.delimiter)
        .map(dir => dir.trim().replace(/^"(.*)"$/, '$1'))
        .filter(dir => dir.length > 0);
}

/**
 * Ranks a resolved file by extension; lower is preferred
 */
export function extensionRank(filePath: string): number {
    const index = RESOLUTION_EXTENSIONS.indexOf(path.extname(filePath).toLowerCase());
    return index === -1 ? RESOLUTION_EXTENSIONS.length : index;
}

/**
 * Finds every file on PATH (then on the extra search paths) matching a command name
 * Results keep directory order
 */
export function findOnPath(name: string, options: ResolveOptions = {}): string[] {
    const fileSys = options.fileSystem || new NodeFileSystem();
    if (hasDirectoryPart(name)) {
        return [];
    }

    const directories = [...getPathDirectories(options.env), ...(options.searchPaths ?? [])];
    const candidates = hasKnownExtension(name)
        ? [name]
        : [...RESOLUTION_EXTENSIONS.map(ext => name + ext), name];

    const matches: string[] = [];
    for (const dir of directories) {
        for (const candidate of candidates) {
            const fullPath = path.join(dir, candidate);
            if (!matches.includes(fullPath) && fileSys.isFile(fullPath)) {
                matches.push(fullPath);
            }
        }
    }
    return matches;
}

/**
 * Picks the best match: lowest extension rank, then earliest on PATH
 */
export function pickPreferred(matches: string[]): string | null {
    if (matches.length === 0) {
        return null;
    }
    return matches
        .map((match, index) => ({ match, index, rank: extensionRank(match) }))
        .sort((a, b) => a.rank - b.rank || a.index - b.index)[0].match;
}

/**
 * Resolves an executable: the literal path, then the path plus each known
 * extension, then a PATH lookup
 * Throws ExecutableNotFoundError when nothing matches
 */
export function resolveExecutable(filePath: string, options: ResolveOptions = {}): string {
    const fileSys = options.fileSystem || new NodeFileSystem();

    if (fileSys.isFile(filePath)) {
        return filePath;
    }

    for (const ext of RESOLUTION_EXTENSIONS) {
        if (fileSys.isFile(filePath + ext)) {
            return filePath + ext;
        }
    }

    const found = pickPreferred(findOnPath(filePath, { ...options, fileSystem: fileSys }));
    if (found) {
        return found;
    }

    throw new ExecutableNotFoundError(filePath);
}

/**
 * Quotes one argument for a cmd.exe command line
 */
function quoteForCmd(arg: string): string {
    if (arg === '') {
        return '""';
    }
    if (/[\s"&|<>^()%!,;=]/.test(arg)) {
        return `"${arg.replace(/"/g, '""')}"`;
    }
    return arg;
}

/**
 * Builds what actually gets spawned: batch files run through cmd.exe,
 * PowerShell scripts through powershell.exe, everything else directly
 */
export function buildLaunchCommand(resolvedPath: string, args: string[]): LaunchCommand {
    const ext = path.extname(resolvedPath).toLowerCase();

    if (ext === '.ps1') {
        return {
            command: 'powershell.exe',
            args: ['-NoProfile', '-NonInteractive', '-ExecutionPolicy', 'Bypass', '-File', resolvedPath, ...args],
            verbatim: false,
        };
    }

    if (ext === '.cmd' || ext === '.bat') {
        const commandLine = [resolvedPath, ...args].map(quoteForCmd).join(' ');
        return {
            command: process.env.ComSpec ?? 'cmd.exe',
            args: ['/d', '/s', '/c', `"${commandLine}"`],
            verbatim: true,
        };
    }

    return { command: resolvedPath, args, verbatim: false };
}

function toErrnoException(error: unknown): NodeJS.ErrnoException {
    return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs an executable with an argument string and waits for it up to the timeout
 *
 * Any exit code is reported as-is; success means exit code 0. A timeout kills
 * the process and reports exit code -1. Resolution failures throw
 * ExecutableNotFoundError and launch failures reject with ProcessLaunchError.
 */
export async function runProcess(
    filePath: string,
    argumentString: string = '',
    options: RunProcessOptions = {},
): Promise<ProcessResult> {
    const {
        workingDirectory,
        timeoutSeconds = DEFAULT_TIMEOUT_SECONDS,
        env,
        processExecutor,
        logger = nullLogger,
    } = options;
    const executor = processExecutor || new NodeProcessExecutor();

    const resolvedPath = resolveExecutable(filePath, options);
    const launch = buildLaunchCommand(resolvedPath, splitArguments(argumentString));
    const name = path.basename(resolvedPath);

    logger.debug(`Starting ${name} ${argumentString}`.trim(), {
        filePath: resolvedPath,
        arguments: argumentString,
        timeoutSeconds,
        workingDirectory,
    });

    return new Promise((resolve, reject) => {
        const startTime = Date.now();
        let child: ChildProcess;

        try {
            child = executor.spawn(launch.command, launch.args, {
                cwd: workingDirectory,
                env,
                shell: false,
                windowsHide: true,
                windowsVerbatimArguments: launch.verbatim,
                stdio: ['ignore', 'pipe', 'pipe'],
            });
        } catch (error) {
            reject(new ProcessLaunchError(resolvedPath, toErrnoException(error)));
            return;
        }

        let stdout = '';
        let stderr = '';
        let settled = false;

        child.stdout?.on('data', (chunk: Buffer | string) => {
            stdout += chunk.toString();
        });
        child.stderr?.on('data', (chunk: Buffer | string) => {
            stderr += chunk.toString();
        });

        const timeoutId = timeoutSeconds > 0 ? setTimeout(() => {
            if (settled) return;
            settled = true;
            executor.terminate(child, error => logger.warn(`taskkill failed for process ${child.pid}: ${error.message}`));
            logger.warn(`${name} timed out after ${timeoutSeconds}s and was terminated`, {
                filePath: resolvedPath,
                arguments: argumentString,
                timeoutSeconds,
            });
            resolve({
                filePath: resolvedPath,
                arguments: argumentString,
                exitCode: -1,
                durationMs: timeoutSeconds * 1000,
                timedOut: true,
                success: false,
                stdout,
                stderr,
            });
        }, timeoutSeconds * 1000) : null;

        child.on('close', (code: number | null) => {
            if (timeoutId) clearTimeout(timeoutId);
            if (settled) return;
            settled = true;

            const exitCode = code ?? -1;
            const durationMs = Date.now() - startTime;
            const success = exitCode === 0;
            const data = { filePath: resolvedPath, arguments: argumentString, exitCode, durationMs };
            if (success) {
                logger.debug(`${name} exited with code 0 after ${formatDuration(durationMs)}`, data);
            } else {
                logger.debug(`${name} exited with code ${exitCode} after ${formatDuration(durationMs)}`, { ...data, stderr: stderr.trim() });
            }

            resolve({
                filePath: resolvedPath,
                arguments: argumentString,
                exitCode,
                durationMs,
                timedOut: false,
                success,
                stdout,
                stderr,
            });
        });

        child.on('error', (error: NodeJS.ErrnoException) => {
            if (timeoutId) clearTimeout(timeoutId);
            if (settled) return;
            settled = true;
            reject(new ProcessLaunchError(resolvedPath, error));
        });
    });
}
