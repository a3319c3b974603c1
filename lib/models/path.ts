import { IEnvironmentStore, IFileSystem } from '../interfaces';
import { ComponentLogger } from './log';

export type PathScope = 'User' | 'Machine' | 'Process';

/**
 * Scopes that persist beyond the current process
 */
export type PersistentPathScope = Exclude<PathScope, 'Process'>;

/**
 * Snapshot of every PATH value taken before a mutation
 */
export type PathBackup = Readonly<{
    backupId: string;
    userPath: string;
    machinePath: string;
    sessionPath: string;
    timestamp: string;
}>

/**
 * A backup as found on disk
 */
export type StoredPathBackup = {
    backup: PathBackup;
    filePath: string;
}

export type PathValidationResult = {
    valid: boolean;
    errors: string[];
    warnings: string[];
}

export type PathChangeResult = {
    success: boolean;
    /** False when the directory was already present */
    changed: boolean;
    scope: PersistentPathScope;
    directory: string;
    backupId: string;
    rolledBack: boolean;
    error?: string;
}

export type PathSafetyOptions = {
    backupDirectory: string;
    environment?: IEnvironmentStore;
    fileSystem?: IFileSystem;
    logger?: ComponentLogger;
    now?: () => Date;
    /** Expansion of %SystemRoot% when checking machine PATH entries */
    systemRoot?: string;
}
