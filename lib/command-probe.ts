import * as path from 'path';
import { NodeFileSystem } from './interfaces/fs-interface';
import { getErrorMessage } from './errors';
import { nullLogger } from './logger';
import { findOnPath, pickPreferred, RESOLUTION_EXTENSIONS, runProcess } from './process-runner';
import { CommandProbeResult, RunProcessOptions } from './models';

export const DEFAULT_PROBE_TIMEOUT_SECONDS = 15;

/**
 * Resolves a command name to one file, preferring .exe > .cmd > .bat > .ps1
 * An explicit path is accepted as-is when it exists
 */
export function resolveCommand(command: string, options: RunProcessOptions = {}): string | null {
    const fileSys = options.fileSystem || new NodeFileSystem();

    if (command.includes('/') || command.includes('\\')) {
        if (fileSys.isFile(command)) {
            return command;
        }
        const withExtension = RESOLUTION_EXTENSIONS.map(ext => command + ext).find(candidate => fileSys.isFile(candidate));
        return withExtension ?? null;
    }

    return pickPreferred(findOnPath(command, { ...options, fileSystem: fileSys }));
}

/**
 * Checks whether a command is installed and answers a version probe
 * Never throws; every failure is reported as available: false
 */
export async function testCommand(
    command: string,
    testArgs: string = '--version',
    options: RunProcessOptions = {},
): Promise<CommandProbeResult> {
    const logger = options.logger ?? nullLogger;

    try {
        const resolved = resolveCommand(command, options);
        if (!resolved) {
            logger.debug(`${command} not found`);
            return {
                command,
                available: false,
                path: null,
                version: null,
                exitCode: null,
                error: `Command not found: ${command}`,
            };
        }

        const result = await runProcess(resolved, testArgs, {
            ...options,
            timeoutSeconds: options.timeoutSeconds ?? DEFAULT_PROBE_TIMEOUT_SECONDS,
        });
        const firstLine = `${result.stdout}\n${result.stderr}`
            .split(/\r?\n/)
            .map(line => line.trim())
            .find(line => line.length > 0) ?? null;

        if (result.success) {
            logger.debug(`${path.basename(resolved)} is available${firstLine ? ` (${firstLine})` : ''}`);
            return {
                command,
                available: true,
                path: resolved,
                version: firstLine,
                exitCode: result.exitCode,
                error: null,
            };
        }

        const error = result.timedOut
            ? `Version probe timed out after ${result.durationMs / 1000}s`
            : `Version probe exited with code ${result.exitCode}`;
        logger.debug(`${command}: ${error}`);
        return {
            command,
            available: false,
            path: resolved,
            version: firstLine,
            exitCode: result.exitCode,
            error,
        };
    } catch (error) {
        logger.debug(`${command} probe failed: ${getErrorMessage(error)}`);
        return {
            command,
            available: false,
            path: null,
            version: null,
            exitCode: null,
            error: getErrorMessage(error),
        };
    }
}
