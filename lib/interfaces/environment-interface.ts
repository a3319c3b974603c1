import { PathScope } from '../models/path';
import { IRegistryAccess, NodeRegistryAccess } from './registry-interface';

/**
 * PATH variable access abstraction for testability
 */
export interface IEnvironmentStore {
    getPath(scope: PathScope): Promise<string>;
    setPath(scope: PathScope, value: string): Promise<void>;
}

const VALUE_VARIABLE = 'PMU_PATH_VALUE';

/**
 * Redirected PowerShell stdout uses the console's OEM code page, so the
 * value travels as base64 of its UTF-8 bytes
 */
export function buildGetPathCommand(scope: 'User' | 'Machine'): string {
    return 'powershell -NoProfile -NonInteractive -Command '
        + `"[Convert]::ToBase64String([Text.Encoding]::UTF8.GetBytes([string][Environment]::GetEnvironmentVariable('Path', '${scope}')))"`;
}

export function decodePathOutput(output: string): string {
    return Buffer.from(output.trim(), 'base64').toString('utf8');
}

/**
 * Default implementation: persistent scopes through PowerShell's
 * [Environment] API, the process scope through process.env
 */
export class NodeEnvironmentStore implements IEnvironmentStore {
    private registry: IRegistryAccess;

    constructor(registryAccess?: IRegistryAccess) {
        this.registry = registryAccess || new NodeRegistryAccess();
    }

    async getPath(scope: PathScope): Promise<string> {
        if (scope === 'Process') {
            return process.env.PATH ?? '';
        }

        const { stdout } = await this.registry.exec(buildGetPathCommand(scope));
        return decodePathOutput(stdout);
    }

    async setPath(scope: PathScope, value: string): Promise<void> {
        if (scope === 'Process') {
            process.env.PATH = value;
            return;
        }

        // PowerShell reads the new value from $env:PMU_PATH_VALUE
        await this.registry.exec(
            `powershell -NoProfile -NonInteractive -Command "[Environment]::SetEnvironmentVariable('Path', $env:${VALUE_VARIABLE}, '${scope}')"`,
            { env: { ...process.env, [VALUE_VARIABLE]: value } },
        );
    }
}
