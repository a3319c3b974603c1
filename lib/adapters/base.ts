import { SessionContext, processOptions } from '../context';
import { getErrorMessage } from '../errors';
import { formatDuration } from '../logger';
import { testCommand } from '../command-probe';
import { runProcess } from '../process-runner';
import { withRetry } from '../retry';
import {
    CommandProbeResult,
    ComponentLogger,
    PackageManagerInfo,
    PackageManagerName,
    PackageManagerOperation,
    PackageManagerResult,
    ProcessResult,
    RetryProcessOptions,
    UpdateOptions,
} from '../models';

/**
 * Uniform surface every package manager is driven through
 */
export interface PackageManagerAdapter {
    readonly name: PackageManagerName;
    readonly displayName: string;
    readonly description: string;
    /** Executable looked up on PATH */
    readonly command: string;
    test(ctx: SessionContext): Promise<CommandProbeResult>;
    update(ctx: SessionContext, options: UpdateOptions): Promise<PackageManagerResult>;
    info(ctx: SessionContext): Promise<PackageManagerInfo>;
}

/**
 * Shared behaviour of the command-line package managers
 *
 * Subclasses supply the command and dry-run arguments and may widen the
 * accepted exit codes, add discovery directories or run preparation steps.
 */
export abstract class CommandLineAdapter implements PackageManagerAdapter {
    abstract readonly name: PackageManagerName;
    abstract readonly displayName: string;
    abstract readonly description: string;
    abstract readonly command: string;
    /** Arguments for a read-only check of what would be updated */
    protected abstract readonly dryRunArgs: string;
    protected readonly versionArgs: string = '--version';

    /**
     * Extra directories searched after PATH
     */
    protected searchPaths(_ctx: SessionContext): string[] {
        return [];
    }

    /**
     * Decides whether an exit code counts as success
     */
    protected isAcceptedExitCode(exitCode: number, _dryRun: boolean): boolean {
        return exitCode === 0;
    }

    /**
     * Arguments for a real update, from the configuration
     */
    protected updateArgs(ctx: SessionContext): string {
        return ctx.config.PackageManagers[this.name].args;
    }

    /**
     * Runs before a real update; failures must not prevent the update
     */
    protected async prepare(_ctx: SessionContext, _options: RetryProcessOptions): Promise<void> {
        return;
    }

    protected logger(ctx: SessionContext): ComponentLogger {
        return ctx.logger.forComponent(this.displayName);
    }

    protected options(ctx: SessionContext): RetryProcessOptions {
        return {
            ...processOptions(ctx, this.displayName),
            searchPaths: this.searchPaths(ctx),
        };
    }

    async test(ctx: SessionContext): Promise<CommandProbeResult> {
        return testCommand(this.command, this.versionArgs, {
            ...this.options(ctx),
            timeoutSeconds: ctx.config.Advanced.probeTimeoutSeconds,
        });
    }

    async info(ctx: SessionContext): Promise<PackageManagerInfo> {
        const probe = await this.test(ctx);
        return {
            name: this.name,
            displayName: this.displayName,
            description: this.description,
            available: probe.available,
            path: probe.path,
            version: probe.version,
            error: probe.error,
        };
    }

    async update(ctx: SessionContext, { dryRun }: UpdateOptions): Promise<PackageManagerResult> {
        const settings = ctx.config.PackageManagers[this.name];
        const operation: PackageManagerOperation = dryRun ? 'dry-run-check' : 'update';
        const args = dryRun ? this.dryRunArgs : this.updateArgs(ctx);
        const logger = this.logger(ctx);
        const options: RetryProcessOptions = {
            ...this.options(ctx),
            timeoutSeconds: settings.timeout,
            label: `${this.displayName} ${operation}`,
        };
        const startTime = Date.now();

        logger.info(dryRun ? `Checking ${this.displayName} for updates (dry run)` : `Updating ${this.displayName} packages`);

        try {
            if (!dryRun) {
                await this.prepare(ctx, options);
            }

            const result = await withRetry(
                async () => this.toResult(await runProcess(this.command, args, options), operation, dryRun),
                options,
            );

            if (result.success) {
                logger.success(`${this.displayName} ${operation} completed in ${formatDuration(result.durationMs)}`, {
                    exitCode: result.exitCode,
                });
            } else {
                logger.error(`${this.displayName} ${operation} failed: ${result.error}`, {
                    exitCode: result.exitCode,
                    timedOut: result.timedOut,
                });
            }
            return result;
        } catch (error) {
            const message = getErrorMessage(error);
            logger.error(`${this.displayName} ${operation} failed: ${message}`);
            return {
                packageManager: this.name,
                operation,
                success: false,
                exitCode: -1,
                durationMs: Date.now() - startTime,
                timedOut: false,
                error: message,
            };
        }
    }

    /**
     * Maps a process outcome to the adapter's policy
     */
    protected toResult(run: ProcessResult, operation: PackageManagerOperation, dryRun: boolean): PackageManagerResult {
        const success = !run.timedOut && this.isAcceptedExitCode(run.exitCode, dryRun);
        const output = run.stdout.trim();
        const result: PackageManagerResult = {
            packageManager: this.name,
            operation,
            success,
            exitCode: run.exitCode,
            durationMs: run.durationMs,
            timedOut: run.timedOut,
        };
        if (output) {
            result.output = output;
        }
        if (!success) {
            result.error = run.timedOut
                ? `Timed out after ${formatDuration(run.durationMs)}`
                : describeExit(run);
        }
        return result;
    }
}

function describeExit(run: ProcessResult): string {
    const detail = run.stderr
        .split(/\r?\n/)
        .map(line => line.trim())
        .find(line => line.length > 0);
    return detail ? `Exited with code ${run.exitCode}: ${detail}` : `Exited with code ${run.exitCode}`;
}
