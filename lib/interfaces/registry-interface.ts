import { exec } from 'child_process';
import { promisify } from 'util';

/**
 * Options passed through to the shell when running a registry command
 */
export type RegistryExecOptions = {
    env?: NodeJS.ProcessEnv;
}

/**
 * Registry access abstraction interface for testability
 */
export interface IRegistryAccess {
    exec(command: string, options?: RegistryExecOptions): Promise<{ stdout: string; stderr: string }>;
}

/**
 * Default implementation using Node.js child_process.exec
 */
export class NodeRegistryAccess implements IRegistryAccess {
    async exec(command: string, options: RegistryExecOptions = {}): Promise<{ stdout: string; stderr: string }> {
        const execAsync = promisify(exec);
        return execAsync(command, { env: options.env ?? process.env, windowsHide: true });
    }
}
