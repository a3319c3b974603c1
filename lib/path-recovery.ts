import { askConfirmation } from './cli';
import { SessionContext } from './context';
import { getErrorMessage } from './errors';
import { formatFileTimestamp } from './logger';
import { PathBackup, StoredPathBackup } from './models';

export type RecoverPathOptions = {
    backupId?: string;
    filePath?: string;
    confirm?: (question: string) => Promise<boolean>;
    now?: () => Date;
}

export type RecoverPathResult = {
    success: boolean;
    cancelled: boolean;
    backup?: PathBackup;
    emergencyBackupId?: string;
    error?: string;
}

/**
 * Formats stored backups as one line each, newest first
 */
export function formatBackupList(backups: StoredPathBackup[]): string[] {
    if (backups.length === 0) {
        return ['No PATH backups found'];
    }
    return backups.map(({ backup, filePath }) => `  ${backup.timestamp}  ${backup.backupId.padEnd(40)} ${filePath}`);
}

export function listPathBackups(ctx: SessionContext): StoredPathBackup[] {
    return ctx.pathManager.listBackups();
}

/**
 * Finds the newest stored backup with the given identifier
 */
function findBackup(ctx: SessionContext, backupId: string): PathBackup | undefined {
    return listPathBackups(ctx).find(stored => stored.backup.backupId === backupId)?.backup;
}

/**
 * Restores user and session PATH from a stored backup after explicit confirmation
 *
 * The current state is saved first as an emergency-<timestamp> backup; if that
 * backup can't be written nothing is restored.
 */
export async function recoverPath(ctx: SessionContext, options: RecoverPathOptions): Promise<RecoverPathResult> {
    const logger = ctx.logger.forComponent('PathRecovery');
    const confirm = options.confirm ?? askConfirmation;
    const now = (options.now ?? (() => new Date()))();

    let backup: PathBackup | undefined;
    try {
        if (options.filePath) {
            backup = ctx.pathManager.loadBackupFile(options.filePath);
        } else if (options.backupId) {
            backup = findBackup(ctx, options.backupId);
        }
    } catch (error) {
        logger.error(`Could not read backup: ${getErrorMessage(error)}`);
        return { success: false, cancelled: false, error: getErrorMessage(error) };
    }

    if (!backup) {
        const error = options.backupId
            ? `No PATH backup found with identifier '${options.backupId}'`
            : 'A backup identifier or backup file is required';
        logger.error(error);
        return { success: false, cancelled: false, error };
    }

    const accepted = await confirm(
        `Restore user PATH from backup '${backup.backupId}' taken at ${backup.timestamp}?`,
    );
    if (!accepted) {
        logger.info('PATH restore cancelled; nothing was changed');
        return { success: false, cancelled: true, backup };
    }

    const emergencyBackupId = `emergency-${formatFileTimestamp(now)}`;
    try {
        await ctx.pathManager.backup(emergencyBackupId);
    } catch (error) {
        logger.error(`Aborting restore: ${getErrorMessage(error)}`);
        return { success: false, cancelled: false, backup, error: getErrorMessage(error) };
    }

    const restored = await ctx.pathManager.restoreFrom(backup);
    if (!restored) {
        return { success: false, cancelled: false, backup, emergencyBackupId, error: 'Writing the restored PATH failed' };
    }

    logger.success(`PATH restored from '${backup.backupId}'; previous state saved as '${emergencyBackupId}'`);
    return { success: true, cancelled: false, backup, emergencyBackupId };
}
