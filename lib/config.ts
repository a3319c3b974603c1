import * as os from 'os';
import * as path from 'path';
import Ajv, { ErrorObject } from 'ajv';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { createDefaultConfiguration } from '../data/default-config';
import { configurationSchema } from '../data/config-schema';
import { ConfigurationError, getErrorMessage } from './errors';
import { isRecord, UnknownRecord } from './guards';
import {
    AdvancedSettings,
    ConfigMetadata,
    Configuration,
    InstallerSettings,
    InstallMethod,
    isPackageManagerName,
    LoadedConfiguration,
    MAX_TIMEOUT_SECONDS,
    PACKAGE_MANAGER_NAMES,
    PackageManagerName,
    PackageManagerSettings,
} from './models';

const INSTALL_METHODS: InstallMethod[] = ['winget', 'chocolatey', 'script'];

const ajv = new Ajv({ allErrors: true, strict: false });
const validateSchema = ajv.compile(configurationSchema);

/**
 * Default config location: %ProgramData%\PackageManagerUpdater on Windows,
 * ~/.package-manager-updater elsewhere
 */
export function getDefaultConfigPath(env: NodeJS.ProcessEnv = process.env): string {
    if (process.platform === 'win32') {
        return path.join(env.ProgramData ?? 'C:\\ProgramData', 'PackageManagerUpdater', 'config.json');
    }
    return path.join(os.homedir(), '.package-manager-updater', 'config.json');
}

export type DataDirectories = {
    logDirectory: string;
    backupDirectory: string;
    downloadDirectory: string;
}

/**
 * Logs, PATH backups and downloaded install scripts live next to the config file
 */
export function getDataDirectories(configPath: string): DataDirectories {
    const baseDirectory = path.dirname(path.resolve(configPath));
    return {
        logDirectory: path.join(baseDirectory, 'logs'),
        backupDirectory: path.join(baseDirectory, 'path-backups'),
        downloadDirectory: path.join(baseDirectory, 'downloads'),
    };
}

/**
 * Merges override into base: nested objects merge recursively, anything
 * else (arrays included) replaces the base value
 */
export function deepMerge(base: UnknownRecord, override: UnknownRecord): UnknownRecord {
    const result: UnknownRecord = { ...base };
    for (const [key, value] of Object.entries(override)) {
        const existing = result[key];
        result[key] = isRecord(existing) && isRecord(value) ? deepMerge(existing, value) : value;
    }
    return result;
}

function formatSchemaError(error: ErrorObject): string {
    const location = error.instancePath || '(root)';
    if (error.keyword === 'additionalProperties' && typeof error.params.additionalProperty === 'string') {
        return `${location}: unknown setting '${error.params.additionalProperty}' is ignored`;
    }
    return `${location}: ${error.message ?? 'is invalid'}`;
}

/**
 * Returns schema violations of a user config file as readable messages
 */
export function validateConfigurationFile(data: unknown): string[] {
    if (validateSchema(data)) {
        return [];
    }
    return (validateSchema.errors ?? []).map(formatSchemaError);
}

function isPositiveInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

function isTimeoutSeconds(value: unknown): value is number {
    return isPositiveInteger(value) && value <= MAX_TIMEOUT_SECONDS;
}

function isNonNegativeInteger(value: unknown): value is number {
    return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isInstallMethod(value: unknown): value is InstallMethod {
    return typeof value === 'string' && INSTALL_METHODS.some(method => method === value);
}

/**
 * Normalizes one top-level section; a section that is not an object falls back to its defaults whole
 */
function normalizeSection<T>(
    merged: UnknownRecord,
    key: string,
    fallback: T,
    normalize: (section: UnknownRecord) => T,
    warnings: string[],
): T {
    const section = merged[key];
    if (isRecord(section)) {
        return normalize(section);
    }
    warnings.push(`Configuration section '${key}' is missing or not an object; using defaults`);
    return fallback;
}

function pick<T>(
    section: UnknownRecord,
    key: string,
    fallback: T,
    accept: (value: unknown) => value is T,
    sectionName: string,
    warnings: string[],
): T {
    const value = section[key];
    if (accept(value)) {
        return value;
    }
    if (value !== undefined) {
        warnings.push(`${sectionName}.${key} has an invalid value (${JSON.stringify(value)}); using default ${JSON.stringify(fallback)}`);
    } else {
        warnings.push(`${sectionName}.${key} is missing; using default ${JSON.stringify(fallback)}`);
    }
    return fallback;
}

const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';
const isString = (value: unknown): value is string => typeof value === 'string';

function normalizePackageManagers(
    section: UnknownRecord,
    defaults: Record<PackageManagerName, PackageManagerSettings>,
    warnings: string[],
): Record<PackageManagerName, PackageManagerSettings> {
    for (const key of Object.keys(section)) {
        if (!isPackageManagerName(key)) {
            warnings.push(`Unknown package manager '${key}' in configuration is ignored`);
        }
    }

    const build = (name: PackageManagerName): PackageManagerSettings => {
        const fallback = defaults[name];
        const raw = section[name];
        const label = `PackageManagers.${name}`;
        if (!isRecord(raw)) {
            warnings.push(`${label} is missing or not an object; using defaults`);
            return { ...fallback };
        }
        return {
            enabled: pick(raw, 'enabled', fallback.enabled, isBoolean, label, warnings),
            args: pick(raw, 'args', fallback.args, isString, label, warnings),
            timeout: pick(raw, 'timeout', fallback.timeout, isTimeoutSeconds, label, warnings),
        };
    };

    return {
        winget: build('winget'),
        chocolatey: build('chocolatey'),
        scoop: build('scoop'),
        npm: build('npm'),
        pip: build('pip'),
        conda: build('conda'),
    };
}

function normalizeAdvanced(section: UnknownRecord, defaults: AdvancedSettings, warnings: string[]): AdvancedSettings {
    const label = 'Advanced';
    const isTime = (value: unknown): value is string => typeof value === 'string' && /^([01][0-9]|2[0-3]):[0-5][0-9]$/.test(value);
    const isNonEmpty = (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0;
    return {
        logRetentionDays: pick(section, 'logRetentionDays', defaults.logRetentionDays, isPositiveInteger, label, warnings),
        maxRetries: pick(section, 'maxRetries', defaults.maxRetries, isNonNegativeInteger, label, warnings),
        retryDelaySeconds: pick(section, 'retryDelaySeconds', defaults.retryDelaySeconds, isNonNegativeInteger, label, warnings),
        probeTimeoutSeconds: pick(section, 'probeTimeoutSeconds', defaults.probeTimeoutSeconds, isTimeoutSeconds, label, warnings),
        scheduledTaskName: pick(section, 'scheduledTaskName', defaults.scheduledTaskName, isNonEmpty, label, warnings),
        scheduledTaskTime: pick(section, 'scheduledTaskTime', defaults.scheduledTaskTime, isTime, label, warnings),
    };
}

function normalizeInstaller(section: UnknownRecord, defaults: InstallerSettings, warnings: string[]): InstallerSettings {
    const label = 'PackageManagerInstaller';

    let defaultPackageManagers = defaults.defaultPackageManagers;
    const rawList = section.defaultPackageManagers;
    if (Array.isArray(rawList)) {
        defaultPackageManagers = [];
        for (const entry of rawList) {
            if (typeof entry === 'string' && isPackageManagerName(entry)) {
                defaultPackageManagers.push(entry);
            } else {
                warnings.push(`${label}.defaultPackageManagers: unknown package manager ${JSON.stringify(entry)} is ignored`);
            }
        }
    } else if (rawList !== undefined) {
        warnings.push(`${label}.defaultPackageManagers must be a list; using defaults`);
    }

    const preferredInstallMethods: Partial<Record<PackageManagerName, InstallMethod>> = {};
    const rawMethods = section.preferredInstallMethods;
    if (isRecord(rawMethods)) {
        for (const [name, method] of Object.entries(rawMethods)) {
            if (isPackageManagerName(name) && isInstallMethod(method)) {
                preferredInstallMethods[name] = method;
            } else {
                warnings.push(`${label}.preferredInstallMethods.${name}: ${JSON.stringify(method)} is not a valid install method; ignored`);
            }
        }
    } else {
        Object.assign(preferredInstallMethods, defaults.preferredInstallMethods);
        if (rawMethods !== undefined) {
            warnings.push(`${label}.preferredInstallMethods must be an object; using defaults`);
        }
    }

    return {
        defaultPackageManagers: [...defaultPackageManagers],
        autoAccept: pick(section, 'autoAccept', defaults.autoAccept, isBoolean, label, warnings),
        forceReinstall: pick(section, 'forceReinstall', defaults.forceReinstall, isBoolean, label, warnings),
        preferredInstallMethods,
    };
}

function normalizeMetadata(section: UnknownRecord, defaults: ConfigMetadata): ConfigMetadata {
    return {
        version: isString(section.version) ? section.version : defaults.version,
        description: isString(section.description) ? section.description : defaults.description,
        lastModified: isString(section.lastModified) ? section.lastModified : defaults.lastModified,
    };
}

/**
 * Builds a typed configuration from merged data, restoring defaults for
 * anything that fails its invariant and recording a warning for each
 */
export function normalizeConfiguration(merged: UnknownRecord, warnings: string[] = []): Configuration {
    const defaults = createDefaultConfiguration();
    return {
        _metadata: normalizeMetadata(isRecord(merged._metadata) ? merged._metadata : {}, defaults._metadata),
        PackageManagers: normalizeSection(merged, 'PackageManagers', defaults.PackageManagers,
            section => normalizePackageManagers(section, defaults.PackageManagers, warnings), warnings),
        Advanced: normalizeSection(merged, 'Advanced', defaults.Advanced,
            section => normalizeAdvanced(section, defaults.Advanced, warnings), warnings),
        PackageManagerInstaller: normalizeSection(merged, 'PackageManagerInstaller', defaults.PackageManagerInstaller,
            section => normalizeInstaller(section, defaults.PackageManagerInstaller, warnings), warnings),
    };
}

/**
 * Merges user data over the defaults and normalizes the result
 */
export function mergeWithDefaults(userConfig: UnknownRecord, warnings: string[] = []): Configuration {
    return normalizeConfiguration(deepMerge(createDefaultConfiguration(), userConfig), warnings);
}

/**
 * Writes a configuration as indented JSON, stamping _metadata.lastModified
 */
export function saveConfiguration(
    configPath: string,
    config: Configuration,
    fileSystem?: IFileSystem,
    now: Date = new Date(),
): Configuration {
    const fileSys = fileSystem || new NodeFileSystem();
    const stamped: Configuration = {
        ...config,
        _metadata: { ...config._metadata, lastModified: now.toISOString() },
    };
    fileSys.mkdirSync(path.dirname(configPath), { recursive: true });
    fileSys.writeFileSync(configPath, JSON.stringify(stamped, null, 2) + '\n');
    return stamped;
}

/**
 * Loads the configuration file, creating it with defaults when missing
 * Throws ConfigurationError when the file exists but is not a JSON object
 */
export function loadConfiguration(configPath: string, fileSystem?: IFileSystem): LoadedConfiguration {
    const fileSys = fileSystem || new NodeFileSystem();
    const warnings: string[] = [];

    if (!fileSys.existsSync(configPath)) {
        let config = createDefaultConfiguration();
        try {
            config = saveConfiguration(configPath, config, fileSys);
        } catch (error) {
            warnings.push(`Could not create default configuration at ${configPath}: ${getErrorMessage(error)}`);
        }
        return { config, configPath, created: true, warnings };
    }

    let raw: unknown;
    try {
        // Notepad and Windows PowerShell 5.1 save UTF-8 with a byte order mark
        raw = JSON.parse(fileSys.readFileSync(configPath).replace(/^\uFEFF/, ''));
    } catch (error) {
        throw new ConfigurationError(configPath, getErrorMessage(error));
    }
    if (!isRecord(raw)) {
        throw new ConfigurationError(configPath, 'the top level must be a JSON object');
    }

    warnings.push(...validateConfigurationFile(raw));
    const config = mergeWithDefaults(raw, warnings);
    return { config, configPath, created: false, warnings };
}

/**
 * Lists enabled package managers in run order
 */
export function getEnabledPackageManagers(config: Configuration): PackageManagerName[] {
    return PACKAGE_MANAGER_NAMES.filter(name => config.PackageManagers[name].enabled);
}

/**
 * Returns a copy of the configuration with the given managers switched on or off
 * A name in both lists ends up disabled
 */
export function setPackageManagersEnabled(
    config: Configuration,
    enable: PackageManagerName[],
    disable: PackageManagerName[],
): Configuration {
    const packageManagers = { ...config.PackageManagers };
    for (const name of enable) {
        packageManagers[name] = { ...packageManagers[name], enabled: true };
    }
    for (const name of disable) {
        packageManagers[name] = { ...packageManagers[name], enabled: false };
    }
    return { ...config, PackageManagers: packageManagers };
}
