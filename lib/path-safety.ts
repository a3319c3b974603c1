import * as path from 'path';
import { IEnvironmentStore, NodeEnvironmentStore } from './interfaces/environment-interface';
import { IFileSystem, NodeFileSystem } from './interfaces/fs-interface';
import { getErrorMessage, PathBackupError } from './errors';
import { isRecord } from './guards';
import { formatFileTimestamp, nullLogger } from './logger';
import {
    ComponentLogger,
    PathBackup,
    PathChangeResult,
    PathSafetyOptions,
    PathValidationResult,
    PersistentPathScope,
    StoredPathBackup,
} from './models';

/**
 * Longest environment variable value Windows accepts
 */
export const MAX_PATH_LENGTH = 8191;

export const PATH_SEPARATOR = ';';

/**
 * Directories the OS needs on the machine PATH to stay usable
 */
export const CRITICAL_MACHINE_DIRECTORIES = [
    '%SystemRoot%\\system32',
    '%SystemRoot%',
    '%SystemRoot%\\System32\\Wbem',
    '%SystemRoot%\\System32\\WindowsPowerShell\\v1.0',
];

const BACKUP_FILE_PREFIX = 'path-backup-';

/**
 * Splits a PATH value into its non-empty segments
 */
export function splitPath(value: string): string[] {
    return value.split(PATH_SEPARATOR).map(segment => segment.trim()).filter(segment => segment.length > 0);
}

/**
 * Compares segments case-insensitively, ignoring a trailing backslash
 */
function normalizeSegment(segment: string): string {
    const lower = segment.trim().toLowerCase();
    return lower.length > 3 ? lower.replace(/[\\/]+$/, '') : lower;
}

/**
 * Checks whether a PATH value contains a directory as a whole segment
 */
export function containsSegment(value: string, directory: string): boolean {
    const wanted = normalizeSegment(directory);
    return splitPath(value).some(segment => normalizeSegment(segment) === wanted);
}

function isPathBackup(value: unknown): value is PathBackup {
    return isRecord(value)
        && typeof value.backupId === 'string'
        && typeof value.userPath === 'string'
        && typeof value.machinePath === 'string'
        && typeof value.sessionPath === 'string'
        && typeof value.timestamp === 'string';
}

/**
 * Guards every PATH mutation: backup, validate, apply, verify, roll back
 */
export class PathSafetyManager {
    private environment: IEnvironmentStore;
    private fileSystem: IFileSystem;
    private logger: ComponentLogger;
    private backupDirectory: string;
    private now: () => Date;
    private systemRoot: string;
    private backups: Map<string, PathBackup> = new Map();

    constructor(options: PathSafetyOptions) {
        this.environment = options.environment || new NodeEnvironmentStore();
        this.fileSystem = options.fileSystem || new NodeFileSystem();
        this.logger = options.logger ?? nullLogger;
        this.backupDirectory = options.backupDirectory;
        this.now = options.now ?? (() => new Date());
        this.systemRoot = options.systemRoot ?? process.env.SystemRoot ?? 'C:\\Windows';
    }

    getBackup(backupId: string): PathBackup | undefined {
        return this.backups.get(backupId);
    }

    /**
     * Snapshots user, machine and process PATH and persists the snapshot
     * Throws PathBackupError when the snapshot can't be written or the id is taken
     */
    async backup(backupId: string): Promise<PathBackup> {
        if (this.backups.has(backupId)) {
            throw new PathBackupError(backupId, 'a backup with this identifier already exists in this session');
        }

        const now = this.now();
        const backup: PathBackup = {
            backupId,
            userPath: await this.environment.getPath('User'),
            machinePath: await this.environment.getPath('Machine'),
            sessionPath: await this.environment.getPath('Process'),
            timestamp: now.toISOString(),
        };

        const safeId = backupId.replace(/[^A-Za-z0-9._-]/g, '_');
        const baseName = `${BACKUP_FILE_PREFIX}${safeId}-${formatFileTimestamp(now)}`;

        try {
            this.fileSystem.mkdirSync(this.backupDirectory, { recursive: true });
            let filePath = path.join(this.backupDirectory, `${baseName}.json`);
            for (let suffix = 1; this.fileSystem.existsSync(filePath); suffix++) {
                filePath = path.join(this.backupDirectory, `${baseName}-${suffix}.json`);
            }
            this.fileSystem.writeFileSync(filePath, JSON.stringify(backup, null, 2));
            this.logger.info(`PATH backup '${backupId}' written to ${filePath}`);
        } catch (error) {
            this.logger.error(`Could not write PATH backup '${backupId}': ${getErrorMessage(error)}`);
            throw new PathBackupError(backupId, getErrorMessage(error));
        }

        this.backups.set(backupId, backup);
        return backup;
    }

    /**
     * Checks a candidate PATH value before it is written
     * Machine scope must keep every critical system directory; any scope
     * must fit in MAX_PATH_LENGTH. Suspicious segments only warn.
     */
    validate(candidate: string, scope: PersistentPathScope): PathValidationResult {
        const errors: string[] = [];
        const warnings: string[] = [];

        if (scope === 'Machine') {
            const segments = splitPath(candidate).map(normalizeSegment);
            for (const directory of CRITICAL_MACHINE_DIRECTORIES) {
                const literal = normalizeSegment(directory);
                const expanded = normalizeSegment(directory.replace(/%SystemRoot%/i, this.systemRoot));
                if (!segments.includes(literal) && !segments.includes(expanded)) {
                    errors.push(`Machine PATH is missing critical directory: ${directory}`);
                }
            }
        }

        if (candidate.length > MAX_PATH_LENGTH) {
            errors.push(`PATH length ${candidate.length} exceeds the maximum of ${MAX_PATH_LENGTH} characters`);
        }

        if (candidate.includes(PATH_SEPARATOR + PATH_SEPARATOR)) {
            warnings.push('PATH contains empty segments (;;)');
        }
        for (const segment of splitPath(candidate)) {
            if (segment.includes('..')) {
                warnings.push(`PATH contains a relative segment: ${segment}`);
            }
        }

        warnings.forEach(warning => this.logger.warn(warning, { scope }));
        errors.forEach(error => this.logger.error(error, { scope }));

        return { valid: errors.length === 0, errors, warnings };
    }

    /**
     * Appends a directory to the PATH of a scope
     *
     * Takes the backup first when backupId is new. Already-present directories
     * are a successful no-op. A failed verification or any exception restores
     * from backupId before the failure is returned.
     */
    async addToPath(directory: string, scope: PersistentPathScope, backupId: string): Promise<PathChangeResult> {
        const base = { scope, directory, backupId };

        if (!this.backups.has(backupId)) {
            try {
                await this.backup(backupId);
            } catch (error) {
                return { ...base, success: false, changed: false, rolledBack: false, error: getErrorMessage(error) };
            }
        }

        try {
            const current = await this.environment.getPath(scope);
            if (containsSegment(current, directory)) {
                this.logger.debug(`${directory} is already on the ${scope} PATH`);
                return { ...base, success: true, changed: false, rolledBack: false };
            }

            const candidate = current.length === 0 || current.endsWith(PATH_SEPARATOR)
                ? current + directory
                : current + PATH_SEPARATOR + directory;

            const validation = this.validate(candidate, scope);
            if (!validation.valid) {
                return { ...base, success: false, changed: false, rolledBack: false, error: validation.errors.join('; ') };
            }

            await this.environment.setPath(scope, candidate);

            if (scope === 'User') {
                const sessionPath = await this.environment.getPath('Process');
                if (!containsSegment(sessionPath, directory)) {
                    await this.environment.setPath('Process', sessionPath ? directory + PATH_SEPARATOR + sessionPath : directory);
                }
            }

            const written = await this.environment.getPath(scope);
            if (!containsSegment(written, directory)) {
                this.logger.error(`Verification failed: ${directory} is not on the ${scope} PATH after writing it`);
                const rolledBack = await this.restore(backupId, scope === 'Machine');
                return { ...base, success: false, changed: false, rolledBack, error: 'PATH verification failed after write' };
            }

            this.logger.success(`Added ${directory} to the ${scope} PATH`);
            return { ...base, success: true, changed: true, rolledBack: false };
        } catch (error) {
            this.logger.error(`Changing the ${scope} PATH failed: ${getErrorMessage(error)}`);
            const rolledBack = await this.restore(backupId, scope === 'Machine');
            return { ...base, success: false, changed: false, rolledBack, error: getErrorMessage(error) };
        }
    }

    /**
     * Restores user and process PATH (and machine PATH when asked) from a session backup
     * Returns false for an unknown identifier or a failed write
     */
    async restore(backupId: string, includeMachine: boolean = false): Promise<boolean> {
        const backup = this.backups.get(backupId);
        if (!backup) {
            this.logger.error(`No PATH backup found with identifier '${backupId}'`);
            return false;
        }
        return this.restoreFrom(backup, includeMachine);
    }

    /**
     * Writes a snapshot's values back, whatever session it came from
     */
    async restoreFrom(backup: PathBackup, includeMachine: boolean = false): Promise<boolean> {
        try {
            if (includeMachine) {
                await this.environment.setPath('Machine', backup.machinePath);
            }
            await this.environment.setPath('User', backup.userPath);
            await this.environment.setPath('Process', backup.sessionPath);
            this.logger.info(`Restored PATH from backup '${backup.backupId}' taken at ${backup.timestamp}`);
            return true;
        } catch (error) {
            this.logger.error(`Restoring PATH from backup '${backup.backupId}' failed: ${getErrorMessage(error)}`);
            return false;
        }
    }

    /**
     * Reads one persisted backup; throws if the file is not a PATH backup
     */
    loadBackupFile(filePath: string): PathBackup {
        const parsed: unknown = JSON.parse(this.fileSystem.readFileSync(filePath));
        if (!isPathBackup(parsed)) {
            throw new Error(`Not a PATH backup file: ${filePath}`);
        }
        return parsed;
    }

    /**
     * Lists persisted backups, newest first; unreadable files are skipped
     */
    listBackups(): StoredPathBackup[] {
        if (!this.fileSystem.existsSync(this.backupDirectory)) {
            return [];
        }

        const stored: StoredPathBackup[] = [];
        for (const name of this.fileSystem.readdirSync(this.backupDirectory)) {
            if (!name.startsWith(BACKUP_FILE_PREFIX) || !name.endsWith('.json')) {
                continue;
            }
            const filePath = path.join(this.backupDirectory, name);
            try {
                stored.push({ backup: this.loadBackupFile(filePath), filePath });
            } catch (error) {
                this.logger.warn(`Skipping unreadable backup ${filePath}: ${getErrorMessage(error)}`);
            }
        }

        return stored.sort((a, b) => b.backup.timestamp.localeCompare(a.backup.timestamp));
    }
}
