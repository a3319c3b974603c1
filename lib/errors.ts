/**
 * Raised when an executable cannot be resolved from a path, an extension or PATH
 */
export class ExecutableNotFoundError extends Error {
    readonly executable: string;

    constructor(executable: string) {
        super(`Executable not found: ${executable}`);
        this.name = 'ExecutableNotFoundError';
        this.executable = executable;
    }
}

/**
 * Raised when the OS refuses to start a resolved executable
 */
export class ProcessLaunchError extends Error {
    readonly executable: string;
    readonly code?: string;

    constructor(executable: string, cause: NodeJS.ErrnoException) {
        let message = `Failed to launch ${executable}: ${cause.message}`;
        if (cause.code === 'EACCES') {
            message = `Access denied launching ${executable}. This may require administrator privileges. (Original error: ${cause.message})`;
        } else if (cause.code === 'ENOENT') {
            message = `Executable disappeared before launch: ${executable}. (Original error: ${cause.message})`;
        }
        super(message);
        this.name = 'ProcessLaunchError';
        this.executable = executable;
        this.code = cause.code;
    }
}

/**
 * Raised when a PATH snapshot could not be persisted; the dependent change must not proceed
 */
export class PathBackupError extends Error {
    readonly backupId: string;

    constructor(backupId: string, reason: string) {
        super(`Failed to write PATH backup '${backupId}': ${reason}`);
        this.name = 'PathBackupError';
        this.backupId = backupId;
    }
}

/**
 * Raised when the configuration file exists but cannot be read or parsed
 */
export class ConfigurationError extends Error {
    readonly configPath: string;

    constructor(configPath: string, reason: string) {
        super(`Invalid configuration at ${configPath}: ${reason}`);
        this.name = 'ConfigurationError';
        this.configPath = configPath;
    }
}

/**
 * Extracts a printable message from any thrown value
 */
export function getErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
