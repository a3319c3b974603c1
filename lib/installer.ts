import * as path from 'path';
import { AdapterRegistry, createAdapterRegistry, knownInstallDirectories } from './adapters';
import { askConfirmation } from './cli';
import { resolveCommand } from './command-probe';
import { getDataDirectories } from './config';
import { SessionContext, processOptions } from './context';
import { downloadWithProgress } from './download';
import { getErrorMessage } from './errors';
import { formatFileTimestamp } from './logger';
import { runProcess } from './process-runner';
import { InstallMethod, InstallResult, InstallTarget, PackageManagerName, ProcessResult } from './models';

export const CHOCOLATEY_INSTALL_SCRIPT_URL = 'https://community.chocolatey.org/install.ps1';
export const SCOOP_INSTALL_SCRIPT_URL = 'https://get.scoop.sh';
const DOWNLOAD_TIMEOUT_SECONDS = 60;

/**
 * Where each package manager can be installed from and where it lands
 */
export function getInstallTarget(name: PackageManagerName, env: NodeJS.ProcessEnv = process.env): InstallTarget {
    const candidateDirectories = knownInstallDirectories(name, env);
    switch (name) {
        case 'winget':
            return { executable: 'winget', candidateDirectories };
        case 'chocolatey':
            return { wingetId: 'Chocolatey.Chocolatey', scriptUrl: CHOCOLATEY_INSTALL_SCRIPT_URL, executable: 'choco', candidateDirectories };
        case 'scoop':
            return { scriptUrl: SCOOP_INSTALL_SCRIPT_URL, executable: 'scoop', candidateDirectories };
        case 'npm':
            return { wingetId: 'OpenJS.NodeJS.LTS', chocolateyPackage: 'nodejs-lts', executable: 'npm', candidateDirectories };
        case 'pip':
            return { wingetId: 'Python.Python.3.12', chocolateyPackage: 'python312', executable: 'pip', candidateDirectories };
        case 'conda':
            return { wingetId: 'Anaconda.Miniconda3', chocolateyPackage: 'miniconda3', executable: 'conda', candidateDirectories };
    }
}

/**
 * Methods a target supports, in fallback order
 */
export function availableInstallMethods(target: InstallTarget): InstallMethod[] {
    const methods: InstallMethod[] = [];
    if (target.wingetId) methods.push('winget');
    if (target.chocolateyPackage) methods.push('chocolatey');
    if (target.scriptUrl) methods.push('script');
    return methods;
}

export type InstallOptions = {
    adapters?: AdapterRegistry;
    /** Asks the user; defaults to a readline prompt */
    confirm?: (question: string) => Promise<boolean>;
    now?: () => Date;
}

/**
 * Runs the chosen install method for one target
 */
async function runInstallMethod(
    ctx: SessionContext,
    name: PackageManagerName,
    method: InstallMethod,
    target: InstallTarget,
    now: Date,
): Promise<ProcessResult> {
    const logger = ctx.logger.forComponent('Installer');
    const options = {
        ...processOptions(ctx, 'Installer'),
        logger,
        timeoutSeconds: ctx.config.PackageManagers[name].timeout,
    };
    const autoAccept = ctx.config.PackageManagerInstaller.autoAccept;

    if (method === 'winget') {
        const flags = autoAccept ? ' --accept-source-agreements --accept-package-agreements --silent' : '';
        return runProcess('winget', `install --id ${target.wingetId} -e${flags}`, options);
    }

    if (method === 'chocolatey') {
        return runProcess('choco', `install ${target.chocolateyPackage} -y`, options);
    }

    if (!target.scriptUrl) {
        throw new Error(`No install script is known for ${name}`);
    }
    const { downloadDirectory } = getDataDirectories(ctx.configPath);
    const scriptPath = path.join(downloadDirectory, `${name}-install-${formatFileTimestamp(now)}.ps1`);
    logger.info(`Downloading ${target.scriptUrl}`);
    await downloadWithProgress(`${name} installer`, target.scriptUrl, scriptPath, {
        fileSystem: ctx.fileSystem,
        httpClient: ctx.httpClient,
        progressBarFactory: ctx.progressBarFactory,
        timeoutSeconds: DOWNLOAD_TIMEOUT_SECONDS,
    });
    return runProcess(scriptPath, '', options);
}

/**
 * Installs one package manager and puts its executable directory on the user PATH
 */
export async function installPackageManager(
    ctx: SessionContext,
    name: PackageManagerName,
    options: InstallOptions = {},
): Promise<InstallResult> {
    const adapters = options.adapters ?? createAdapterRegistry();
    const confirm = options.confirm ?? askConfirmation;
    const now = (options.now ?? (() => new Date()))();
    const adapter = adapters[name];
    const settings = ctx.config.PackageManagerInstaller;
    const logger = ctx.logger.forComponent('Installer');

    const probe = await adapter.test(ctx);
    if (probe.available && !settings.forceReinstall) {
        logger.info(`${adapter.displayName} is already installed${probe.path ? ` at ${probe.path}` : ''}`);
        return { packageManager: name, success: true, skipped: true, executablePath: probe.path ?? undefined };
    }

    const target = getInstallTarget(name, ctx.env);
    const methods = availableInstallMethods(target);
    if (methods.length === 0) {
        const error = `${adapter.displayName} cannot be installed automatically; install App Installer from the Microsoft Store`;
        logger.error(error);
        return { packageManager: name, success: false, skipped: false, error };
    }

    const preferred = settings.preferredInstallMethods[name];
    const method = preferred && methods.includes(preferred) ? preferred : methods[0];
    if (preferred && preferred !== method) {
        logger.warn(`${adapter.displayName} cannot be installed with ${preferred}; using ${method}`);
    }

    if (ctx.dryRun) {
        logger.info(`Would install ${adapter.displayName} using ${method} (dry run)`);
        return { packageManager: name, success: true, skipped: true, method };
    }

    if (!settings.autoAccept) {
        const accepted = await confirm(`Install ${adapter.displayName} using ${method}?`);
        if (!accepted) {
            logger.info(`Installation of ${adapter.displayName} declined`);
            return { packageManager: name, success: true, skipped: true, method };
        }
    }

    try {
        logger.info(`Installing ${adapter.displayName} using ${method}`);
        const result = await runInstallMethod(ctx, name, method, target, now);
        if (!result.success) {
            const error = result.timedOut ? 'Installer timed out' : `Installer exited with code ${result.exitCode}`;
            logger.error(`${adapter.displayName} installation failed: ${error}`);
            return { packageManager: name, success: false, skipped: false, method, error };
        }

        const executablePath = resolveCommand(target.executable, {
            env: ctx.env,
            fileSystem: ctx.fileSystem,
            searchPaths: target.candidateDirectories,
        });
        if (!executablePath) {
            const error = `${adapter.displayName} was installed but ${target.executable} could not be found`;
            logger.error(error);
            return { packageManager: name, success: false, skipped: false, method, error };
        }

        const pathChange = await ctx.pathManager.addToPath(
            path.dirname(executablePath),
            'User',
            `install-${name}-${formatFileTimestamp(now)}`,
        );
        if (!pathChange.success) {
            logger.error(`${adapter.displayName} was installed but its directory could not be added to PATH: ${pathChange.error}`);
            return { packageManager: name, success: false, skipped: false, method, executablePath, pathChange, error: pathChange.error };
        }

        logger.success(`${adapter.displayName} installed at ${executablePath}`);
        return { packageManager: name, success: true, skipped: false, method, executablePath, pathChange };
    } catch (error) {
        logger.error(`${adapter.displayName} installation failed: ${getErrorMessage(error)}`);
        return { packageManager: name, success: false, skipped: false, method, error: getErrorMessage(error) };
    }
}

/**
 * Installs each requested package manager in turn; defaults to the configured list
 */
export async function installPackageManagers(
    ctx: SessionContext,
    names?: PackageManagerName[],
    options: InstallOptions = {},
): Promise<InstallResult[]> {
    const targets = names && names.length > 0 ? names : ctx.config.PackageManagerInstaller.defaultPackageManagers;
    const results: InstallResult[] = [];
    for (const name of targets) {
        results.push(await installPackageManager(ctx, name, options));
    }
    return results;
}
