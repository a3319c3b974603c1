import { MAX_TIMEOUT_SECONDS } from '../lib/models/config';
import { PACKAGE_MANAGER_NAMES } from '../lib/models/package-manager';

const packageManagerSchema = {
    type: 'object',
    properties: {
        enabled: { type: 'boolean' },
        args: { type: 'string' },
        timeout: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_SECONDS },
    },
    additionalProperties: false,
};

/**
 * JSON Schema for the user configuration file
 * Every property is optional since the file is merged over the defaults
 */
export const configurationSchema = {
    type: 'object',
    properties: {
        _metadata: {
            type: 'object',
            properties: {
                version: { type: 'string' },
                description: { type: 'string' },
                lastModified: { type: 'string' },
            },
        },
        PackageManagers: {
            type: 'object',
            properties: Object.fromEntries(PACKAGE_MANAGER_NAMES.map(name => [name, packageManagerSchema])),
            additionalProperties: false,
        },
        Advanced: {
            type: 'object',
            properties: {
                logRetentionDays: { type: 'integer', minimum: 1 },
                maxRetries: { type: 'integer', minimum: 0 },
                retryDelaySeconds: { type: 'integer', minimum: 0 },
                probeTimeoutSeconds: { type: 'integer', minimum: 1, maximum: MAX_TIMEOUT_SECONDS },
                scheduledTaskName: { type: 'string', minLength: 1 },
                scheduledTaskTime: { type: 'string', pattern: '^([01][0-9]|2[0-3]):[0-5][0-9]$' },
            },
            additionalProperties: false,
        },
        PackageManagerInstaller: {
            type: 'object',
            properties: {
                defaultPackageManagers: {
                    type: 'array',
                    items: { type: 'string', enum: [...PACKAGE_MANAGER_NAMES] },
                },
                autoAccept: { type: 'boolean' },
                forceReinstall: { type: 'boolean' },
                preferredInstallMethods: {
                    type: 'object',
                    propertyNames: { enum: [...PACKAGE_MANAGER_NAMES] },
                    additionalProperties: { type: 'string', enum: ['winget', 'chocolatey', 'script'] },
                },
            },
            additionalProperties: false,
        },
    },
    additionalProperties: false,
};
