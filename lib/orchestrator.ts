import { AdapterRegistry, createAdapterRegistry, PackageManagerAdapter } from './adapters';
import { getEnabledPackageManagers } from './config';
import { SessionContext } from './context';
import { getErrorMessage } from './errors';
import { formatDuration } from './logger';
import {
    AdapterStatus,
    PackageManagerName,
    PackageManagerResult,
    SkippedPackageManager,
    UpdateSummary,
} from './models';

export type RunUpdatesOptions = {
    /** Names to restrict the run to; empty or omitted means every enabled manager */
    selected?: string[];
    dryRun?: boolean;
    adapters?: AdapterRegistry;
    onStatusChange?: (name: PackageManagerName, status: AdapterStatus) => void;
}

/**
 * Matches a user-supplied name against adapter names and commands, e.g. "choco"
 */
export function findAdapter(adapters: AdapterRegistry, requested: string): PackageManagerAdapter | undefined {
    const wanted = requested.trim().toLowerCase();
    return Object.values(adapters).find(adapter => adapter.name === wanted || adapter.command === wanted);
}

/**
 * Works out which enabled managers to run, in registry order
 */
export function selectPackageManagers(ctx: SessionContext, adapters: AdapterRegistry, selected: string[] = []): PackageManagerName[] {
    const logger = ctx.logger.forComponent('Orchestrator');
    const enabled = getEnabledPackageManagers(ctx.config);
    if (selected.length === 0) {
        return enabled;
    }

    const requested = new Set<PackageManagerName>();
    for (const name of selected) {
        const adapter = findAdapter(adapters, name);
        if (!adapter) {
            logger.warn(`Unknown package manager '${name}' ignored`);
            continue;
        }
        if (!enabled.includes(adapter.name)) {
            logger.warn(`${adapter.displayName} is disabled in the configuration and will not run`);
            continue;
        }
        requested.add(adapter.name);
    }
    return enabled.filter(name => requested.has(name));
}

/**
 * Runs every selected package manager one after another and summarizes the run
 * A failing manager never stops the ones after it
 */
export async function runUpdates(ctx: SessionContext, options: RunUpdatesOptions = {}): Promise<UpdateSummary> {
    const adapters = options.adapters ?? createAdapterRegistry();
    const dryRun = options.dryRun ?? ctx.dryRun;
    const notify = options.onStatusChange ?? (() => undefined);
    const logger = ctx.logger.forComponent('Orchestrator');
    const startTime = Date.now();

    const names = selectPackageManagers(ctx, adapters, options.selected);
    logger.info(`${dryRun ? 'Dry run' : 'Update run'} started for: ${names.length > 0 ? names.join(', ') : '(none)'}`, {
        sessionId: ctx.sessionId,
        dryRun,
    });
    names.forEach(name => notify(name, 'pending'));

    const results: PackageManagerResult[] = [];
    const skipped: SkippedPackageManager[] = [];

    for (const name of names) {
        const adapter = adapters[name];
        try {
            notify(name, 'checking');
            const probe = await adapter.test(ctx);
            if (!probe.available) {
                const reason = probe.error ?? 'not available';
                logger.warn(`Skipping ${adapter.displayName}: ${reason}`);
                skipped.push({ packageManager: name, reason });
                notify(name, 'skipped');
                continue;
            }

            notify(name, 'updating');
            const result = await adapter.update(ctx, { dryRun });
            results.push(result);
            notify(name, result.success ? 'completed' : 'failed');
        } catch (error) {
            logger.error(`${adapter.displayName} failed unexpectedly: ${getErrorMessage(error)}`);
            results.push({
                packageManager: name,
                operation: dryRun ? 'dry-run-check' : 'update',
                success: false,
                exitCode: -1,
                durationMs: 0,
                timedOut: false,
                error: getErrorMessage(error),
            });
            notify(name, 'failed');
        }
    }

    const successful = results.filter(result => result.success).length;
    const failed = results.length - successful;
    const summary: UpdateSummary = {
        sessionId: ctx.sessionId,
        dryRun,
        results,
        skipped,
        successful,
        failed,
        skippedCount: skipped.length,
        durationMs: Date.now() - startTime,
        exitCode: failed > 0 ? 1 : 0,
    };

    const message = `Run finished in ${formatDuration(summary.durationMs)}: ${successful} succeeded, ${failed} failed, ${skipped.length} skipped`;
    const data = { successful, failed, skipped: skipped.length, durationMs: summary.durationMs };
    if (failed > 0) {
        logger.error(message, data);
    } else {
        logger.success(message, data);
    }
    return summary;
}
