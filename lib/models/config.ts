import { PackageManagerName } from './package-manager';

export type ConfigMetadata = {
    version: string;
    description: string;
    lastModified: string;
}

/**
 * Per package manager settings
 */
export type PackageManagerSettings = {
    enabled: boolean;
    /** Arguments for the mutating update command */
    args: string;
    /** Seconds; positive integer up to MAX_TIMEOUT_SECONDS */
    timeout: number;
}

/** Longest delay a Node timer accepts (2^31-1 ms), in whole seconds */
export const MAX_TIMEOUT_SECONDS = 2147483;

export type AdvancedSettings = {
    logRetentionDays: number;
    maxRetries: number;
    retryDelaySeconds: number;
    probeTimeoutSeconds: number;
    scheduledTaskName: string;
    /** HH:mm, local time */
    scheduledTaskTime: string;
}

export type InstallMethod = 'winget' | 'chocolatey' | 'script';

export type InstallerSettings = {
    defaultPackageManagers: PackageManagerName[];
    autoAccept: boolean;
    forceReinstall: boolean;
    preferredInstallMethods: Partial<Record<PackageManagerName, InstallMethod>>;
}

export type Configuration = {
    _metadata: ConfigMetadata;
    PackageManagers: Record<PackageManagerName, PackageManagerSettings>;
    Advanced: AdvancedSettings;
    PackageManagerInstaller: InstallerSettings;
}

export type LoadedConfiguration = {
    config: Configuration;
    configPath: string;
    created: boolean;
    warnings: string[];
}
