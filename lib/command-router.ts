import { AdapterRegistry } from './adapters';
import {
    configure,
    install,
    listBackups,
    registerTask,
    restorePath,
    runUpdate,
    showStatus,
    unregisterTask,
} from './commands';
import { getDefaultConfigPath, loadConfiguration } from './config';
import { createSessionContext, SessionContext } from './context';
import { getErrorMessage } from './errors';
import {
    IEnvironmentStore,
    IFileSystem,
    IHttpClient,
    IProcessExecutor,
    IProgressBarFactory,
    NodeFileSystem,
} from './interfaces';
import { CliOptions, LoadedConfiguration, Operation } from './models';

/**
 * Everything the router can hand down instead of the real OS
 */
export type RouterDependencies = {
    fileSystem?: IFileSystem;
    processExecutor?: IProcessExecutor;
    environment?: IEnvironmentStore;
    httpClient?: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
    adapters?: AdapterRegistry;
    confirm?: (question: string) => Promise<boolean>;
    write?: (text: string) => void;
    env?: NodeJS.ProcessEnv;
    sessionId?: string;
}

/**
 * Runs one parsed command line and returns the process exit code
 */
export async function executeOperation(options: CliOptions, deps: RouterDependencies = {}): Promise<number> {
    const write = deps.write ?? ((text: string) => process.stdout.write(text));

    if (options.help || options.operation === 'help') {
        write(getHelpText(options.help ? options.operation : 'help'));
        return 0;
    }

    const fileSystem = deps.fileSystem || new NodeFileSystem();
    const configPath = options.configPath ?? getDefaultConfigPath(deps.env);

    let loaded: LoadedConfiguration;
    try {
        loaded = loadConfiguration(configPath, fileSystem);
    } catch (error) {
        console.error(`✗ ${getErrorMessage(error)}`);
        return 1;
    }

    const ctx = createSessionContext({
        config: loaded.config,
        configPath,
        sessionId: deps.sessionId,
        logLevel: options.logLevel,
        dryRun: options.dryRun,
        silent: options.silent,
        logPrefix: options.operation === 'update' ? 'update' : options.operation,
        processExecutor: deps.processExecutor,
        fileSystem,
        environment: deps.environment,
        httpClient: deps.httpClient,
        progressBarFactory: deps.progressBarFactory,
        env: deps.env,
    });

    const logger = ctx.logger.forComponent('Config');
    if (loaded.created) {
        logger.info(`Created default configuration at ${configPath}`);
    }
    loaded.warnings.forEach(warning => logger.warn(warning));

    try {
        return await dispatch(ctx, options, deps);
    } catch (error) {
        ctx.logger.log('Error', 'Main', `${options.operation} failed: ${getErrorMessage(error)}`, {
            stack: error instanceof Error ? error.stack : undefined,
        });
        return 1;
    }
}

async function dispatch(ctx: SessionContext, options: CliOptions, deps: RouterDependencies): Promise<number> {
    const commandDeps = { adapters: deps.adapters, confirm: deps.confirm, write: deps.write };

    switch (options.operation) {
        case 'update':
            return runUpdate(ctx, options, commandDeps);
        case 'status':
            return showStatus(ctx, commandDeps);
        case 'configure':
            return configure(ctx, options, commandDeps);
        case 'install':
            return install(ctx, options, commandDeps);
        case 'register-task':
            return registerTask(ctx);
        case 'unregister-task':
            return unregisterTask(ctx);
        case 'list-backups':
            return listBackups(ctx, commandDeps);
        case 'restore-path':
            return restorePath(ctx, options, commandDeps);
        case 'help':
            (deps.write ?? ((text: string) => process.stdout.write(text)))(getHelpText('help'));
            return 0;
    }
}

const COMMON_OPTIONS = `
Options:
  --selected <names...>   Only these package managers (alias -SelectedPackageManagers)
  --dry-run               Report what would change without changing anything (alias -DryRun)
  --log-level <level>     Debug, Info, Warning or Error (default: Info)
  --silent                No console output; log files are still written
  --config <path>         Configuration file (alias -ConfigPath)
  --help, -h              Show help for the operation
`;

const HELP: Record<Operation, string> = {
    help: `
Package Manager Updater

Usage:
  pmu [operation] [options]

Operations:
  update              Update every enabled package manager (default)
  status              Show which package managers are installed
  configure           Create or show the configuration; --enable/--disable toggle managers
  install             Install missing package managers
  register-task       Register the daily scheduled update task
  unregister-task     Remove the scheduled update task
  list-backups        List stored PATH backups
  restore-path        Restore PATH from a backup (--backup-id <id> or --file <path>)
  help                Show this help message

Package managers: winget, chocolatey (choco), scoop, npm, pip, conda
${COMMON_OPTIONS}
Examples:
  pmu update --dry-run
  pmu update --selected winget npm
  pmu -SelectedPackageManagers scoop -LogLevel Debug
  pmu configure --disable pip conda
  pmu restore-path --backup-id install-scoop-20240101-030000
`,
    update: `
update - Update every enabled package manager

Usage:
  pmu update [names...] [options]

Runs the package managers one after another. Unavailable ones are skipped,
a failing one does not stop the rest. Exit code is 1 if any update failed.
${COMMON_OPTIONS}`,
    status: `
status - Show which package managers are installed, their version and whether they are enabled

Usage:
  pmu status [--config <path>]
`,
    configure: `
configure - Create the configuration file if it is missing and print it

Usage:
  pmu configure [--enable <names...>] [--disable <names...>] [--config <path>]

Examples:
  pmu configure --enable conda
  pmu configure --disable pip,npm
`,
    install: `
install - Install missing package managers

Usage:
  pmu install [names...] [--dry-run] [--config <path>]

Without names the configured PackageManagerInstaller.defaultPackageManagers are installed.
Each install asks for confirmation unless PackageManagerInstaller.autoAccept is set.
`,
    'register-task': `
register-task - Register a daily scheduled task running "update --silent" as SYSTEM

Usage:
  pmu register-task [--config <path>]

Task name and time come from Advanced.scheduledTaskName and Advanced.scheduledTaskTime.
`,
    'unregister-task': `
unregister-task - Remove the scheduled update task

Usage:
  pmu unregister-task [--config <path>]
`,
    'list-backups': `
list-backups - List stored PATH backups, newest first

Usage:
  pmu list-backups [--config <path>]
`,
    'restore-path': `
restore-path - Restore user PATH from a stored backup

Usage:
  pmu restore-path --backup-id <id>
  pmu restore-path --file <backup.json>

The current PATH is saved as an emergency backup before restoring.
`,
};

export function getHelpText(operation: Operation): string {
    return HELP[operation];
}
