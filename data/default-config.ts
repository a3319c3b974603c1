import { Configuration } from '../lib/models';

/**
 * Built-in configuration; a user file is deep-merged over a fresh copy of this
 */
export function createDefaultConfiguration(): Configuration {
    return {
        _metadata: {
            version: '1.0.0',
            description: 'Package manager updater configuration',
            lastModified: '',
        },
        PackageManagers: {
            winget: {
                enabled: true,
                args: 'upgrade --all --accept-source-agreements --accept-package-agreements --silent --disable-interactivity',
                timeout: 1800,
            },
            chocolatey: {
                enabled: true,
                args: 'upgrade all -y --no-progress',
                timeout: 1800,
            },
            scoop: {
                enabled: true,
                args: 'update *',
                timeout: 900,
            },
            npm: {
                enabled: true,
                args: 'update -g',
                timeout: 600,
            },
            pip: {
                enabled: true,
                args: 'list --outdated',
                timeout: 300,
            },
            conda: {
                enabled: true,
                args: 'update --all -y',
                timeout: 1800,
            },
        },
        Advanced: {
            logRetentionDays: 30,
            maxRetries: 2,
            retryDelaySeconds: 5,
            probeTimeoutSeconds: 15,
            scheduledTaskName: 'PackageManagerUpdater\\DailyUpdate',
            scheduledTaskTime: '03:00',
        },
        PackageManagerInstaller: {
            defaultPackageManagers: ['chocolatey', 'scoop'],
            autoAccept: false,
            forceReinstall: false,
            preferredInstallMethods: {
                chocolatey: 'script',
                scoop: 'script',
                npm: 'winget',
                pip: 'winget',
                conda: 'winget',
            },
        },
    };
}
