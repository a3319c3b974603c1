import { AdapterRegistry, createAdapterRegistry } from './adapters';
import { getEnabledPackageManagers, saveConfiguration, setPackageManagersEnabled } from './config';
import { SessionContext } from './context';
import { getErrorMessage } from './errors';
import { formatDuration } from './logger';
import { installPackageManagers } from './installer';
import { findAdapter, runUpdates } from './orchestrator';
import { formatBackupList, listPathBackups, recoverPath } from './path-recovery';
import { registerScheduledTask, unregisterScheduledTask } from './scheduler';
import { StatusDisplay } from './ui';
import { CliOptions, PackageManagerName } from './models';

/**
 * Collaborators a command may need beyond the session context
 */
export type CommandDependencies = {
    adapters?: AdapterRegistry;
    confirm?: (question: string) => Promise<boolean>;
    write?: (text: string) => void;
}

function writer(ctx: SessionContext, deps: CommandDependencies): (line: string) => void {
    const write = deps.write ?? ((text: string) => process.stdout.write(text));
    return (line: string) => {
        if (!ctx.silent) {
            write(line + '\n');
        }
    };
}

/**
 * Maps user-supplied names to package managers; names that match nothing are returned separately
 */
export function resolvePackageManagerNames(
    adapters: AdapterRegistry,
    names: string[],
): { names: PackageManagerName[]; unknown: string[] } {
    const resolved: PackageManagerName[] = [];
    const unknown: string[] = [];
    for (const name of names) {
        const adapter = findAdapter(adapters, name);
        if (!adapter) {
            unknown.push(name);
        } else if (!resolved.includes(adapter.name)) {
            resolved.push(adapter.name);
        }
    }
    return { names: resolved, unknown };
}

/**
 * Runs the update orchestrator and prints the per-manager table and totals
 */
export async function runUpdate(ctx: SessionContext, options: CliOptions, deps: CommandDependencies = {}): Promise<number> {
    const adapters = deps.adapters ?? createAdapterRegistry();
    const print = writer(ctx, deps);

    ctx.logger.rotateLogs(ctx.config.Advanced.logRetentionDays);

    const display = new StatusDisplay([], text => print(text.replace(/\n$/, '')));
    const summary = await runUpdates(ctx, {
        selected: options.selected,
        dryRun: options.dryRun,
        adapters,
        onStatusChange: (name, status) => display.setStatus(adapters[name].displayName, status),
    });

    summary.skipped.forEach(skip => {
        display.setStatus(adapters[skip.packageManager].displayName, 'skipped', skip.reason);
    });

    print('');
    display.print();
    print('');
    print(summary.dryRun ? 'Dry run completed.' : 'Update completed.');
    print(`Successful: ${summary.successful}`);
    print(`Failed: ${summary.failed}`);
    print(`Skipped: ${summary.skippedCount}`);
    print(`Duration: ${formatDuration(summary.durationMs)}`);

    const failures = summary.results.filter(result => !result.success);
    if (failures.length > 0) {
        print('');
        print('Failures:');
        failures.forEach(result => {
            print(`  ✗ ${adapters[result.packageManager].displayName}: ${result.error ?? 'Unknown error'}`);
        });
    }

    return summary.exitCode;
}

/**
 * Prints availability and version of every package manager
 */
export async function showStatus(ctx: SessionContext, deps: CommandDependencies = {}): Promise<number> {
    const adapters = deps.adapters ?? createAdapterRegistry();
    const print = writer(ctx, deps);
    const enabled = getEnabledPackageManagers(ctx.config);

    print('Package manager status:');
    for (const adapter of Object.values(adapters)) {
        const info = await adapter.info(ctx);
        const state = enabled.includes(adapter.name) ? 'enabled' : 'disabled';
        if (info.available) {
            print(`  ✓ ${info.displayName.padEnd(12)} ${(info.version ?? 'unknown version').padEnd(30)} ${state}  ${info.path ?? ''}`.trimEnd());
        } else {
            print(`  ✗ ${info.displayName.padEnd(12)} ${'not available'.padEnd(30)} ${state}  ${info.error ?? ''}`.trimEnd());
        }
        ctx.logger.forComponent('Status').debug(`${info.displayName}: ${info.available ? 'available' : 'not available'}`, { ...info });
    }
    return 0;
}

/**
 * Applies --enable/--disable, saves the file and prints the effective configuration
 */
export async function configure(ctx: SessionContext, options: CliOptions, deps: CommandDependencies = {}): Promise<number> {
    const adapters = deps.adapters ?? createAdapterRegistry();
    const print = writer(ctx, deps);
    const logger = ctx.logger.forComponent('Configure');

    const enable = resolvePackageManagerNames(adapters, options.enable);
    const disable = resolvePackageManagerNames(adapters, options.disable);
    const unknown = [...enable.unknown, ...disable.unknown];
    if (unknown.length > 0) {
        logger.error(`Unknown package manager(s): ${unknown.join(', ')}`);
        return 1;
    }

    if (enable.names.length > 0 || disable.names.length > 0) {
        try {
            ctx.config = saveConfiguration(
                ctx.configPath,
                setPackageManagersEnabled(ctx.config, enable.names, disable.names),
                ctx.fileSystem,
            );
        } catch (error) {
            logger.error(`Could not save configuration to ${ctx.configPath}: ${getErrorMessage(error)}`);
            return 1;
        }
        enable.names.forEach(name => logger.success(`${adapters[name].displayName} enabled`));
        disable.names.forEach(name => logger.success(`${adapters[name].displayName} disabled`));
    }

    print(`Configuration file: ${ctx.configPath}`);
    print(JSON.stringify(ctx.config, null, 2));
    return 0;
}

/**
 * Installs missing package managers
 */
export async function install(ctx: SessionContext, options: CliOptions, deps: CommandDependencies = {}): Promise<number> {
    const adapters = deps.adapters ?? createAdapterRegistry();
    const print = writer(ctx, deps);

    const requested = resolvePackageManagerNames(adapters, options.selected);
    if (requested.unknown.length > 0) {
        ctx.logger.forComponent('Installer').error(`Unknown package manager(s): ${requested.unknown.join(', ')}`);
        return 1;
    }

    const results = await installPackageManagers(ctx, requested.names, { adapters, confirm: deps.confirm });

    print('');
    results.forEach(result => {
        const name = adapters[result.packageManager].displayName;
        if (!result.success) {
            print(`  ✗ ${name}: ${result.error ?? 'Unknown error'}`);
        } else if (result.skipped) {
            print(`  ⊘ ${name}: skipped`);
        } else {
            print(`  ✓ ${name}: installed${result.executablePath ? ` at ${result.executablePath}` : ''}`);
        }
    });

    return results.some(result => !result.success) ? 1 : 0;
}

export async function registerTask(ctx: SessionContext): Promise<number> {
    const result = await registerScheduledTask(ctx);
    return result.success ? 0 : 1;
}

export async function unregisterTask(ctx: SessionContext): Promise<number> {
    const result = await unregisterScheduledTask(ctx);
    return result.success ? 0 : 1;
}

/**
 * Prints stored PATH backups, newest first
 */
export async function listBackups(ctx: SessionContext, deps: CommandDependencies = {}): Promise<number> {
    const print = writer(ctx, deps);
    formatBackupList(listPathBackups(ctx)).forEach(line => print(line));
    return 0;
}

/**
 * Restores PATH from a stored backup; a declined confirmation is not a failure
 */
export async function restorePath(ctx: SessionContext, options: CliOptions, deps: CommandDependencies = {}): Promise<number> {
    const result = await recoverPath(ctx, {
        backupId: options.backupId,
        filePath: options.backupFile,
        confirm: deps.confirm,
    });
    return result.success || result.cancelled ? 0 : 1;
}
