import { formatBackupList, listPathBackups, recoverPath } from '../path-recovery';
import { createTestContext, TestContext } from './helpers/mocks';

const BACKUP_DIR = '/test/pmu/path-backups';

describe('path-recovery', () => {
    const now = new Date(2024, 0, 2, 3, 4, 5);
    let test: TestContext;
    let confirm: jest.Mock<Promise<boolean>, [string]>;

    beforeEach(async () => {
        test = createTestContext({ now: () => now });
        confirm = jest.fn<Promise<boolean>, [string]>(() => Promise.resolve(true));
        await test.ctx.pathManager.backup('install-scoop');
        test.environment.values.User = 'C:\\changed';
        test.environment.values.Process = 'C:\\changed';
        test.environment.writes = [];
    });

    describe('formatBackupList', () => {
        it('should say so when there are no backups', () => {
            expect(formatBackupList([])).toEqual(['No PATH backups found']);
        });

        it('should print one aligned line per backup', () => {
            const lines = formatBackupList(listPathBackups(test.ctx));

            expect(lines).toEqual([
                `  ${now.toISOString()}  ${'install-scoop'.padEnd(40)} ${BACKUP_DIR}/path-backup-install-scoop-20240102-030405.json`,
            ]);
        });
    });

    describe('recoverPath', () => {
        it('should save the current state and restore the chosen backup', async () => {
            const result = await recoverPath(test.ctx, { backupId: 'install-scoop', confirm, now: () => now });

            expect(result.success).toBe(true);
            expect(result.cancelled).toBe(false);
            expect(result.emergencyBackupId).toBe('emergency-20240102-030405');
            expect(confirm).toHaveBeenCalledWith(`Restore user PATH from backup 'install-scoop' taken at ${now.toISOString()}?`);
            expect(test.environment.values.User).toBe('C:\\Users\\test\\bin');
            expect(test.environment.values.Process).toBe('C:\\Windows\\system32;C:\\Users\\test\\bin');
            expect(test.environment.writes.map(write => write.scope)).toEqual(['User', 'Process']);

            const emergency = test.ctx.pathManager.loadBackupFile(`${BACKUP_DIR}/path-backup-emergency-20240102-030405-20240102-030405.json`);
            expect(emergency.userPath).toBe('C:\\changed');
        });

        it('should restore from an explicit backup file', async () => {
            const result = await recoverPath(test.ctx, {
                filePath: `${BACKUP_DIR}/path-backup-install-scoop-20240102-030405.json`,
                confirm,
                now: () => now,
            });

            expect(result.success).toBe(true);
            expect(result.backup?.backupId).toBe('install-scoop');
        });

        it('should change nothing when the user declines', async () => {
            confirm.mockResolvedValue(false);

            const result = await recoverPath(test.ctx, { backupId: 'install-scoop', confirm, now: () => now });

            expect(result).toMatchObject({ success: false, cancelled: true });
            expect(test.environment.writes).toEqual([]);
            expect(test.fileSystem.filesUnder(BACKUP_DIR)).toHaveLength(1);
        });

        it('should fail for an unknown identifier without asking', async () => {
            const result = await recoverPath(test.ctx, { backupId: 'nope', confirm });

            expect(result).toEqual({ success: false, cancelled: false, error: "No PATH backup found with identifier 'nope'" });
            expect(confirm).not.toHaveBeenCalled();
        });

        it('should require an identifier or a file', async () => {
            const result = await recoverPath(test.ctx, { confirm });

            expect(result.error).toBe('A backup identifier or backup file is required');
        });

        it('should report an unreadable backup file', async () => {
            const result = await recoverPath(test.ctx, { filePath: '/missing.json', confirm });

            expect(result.success).toBe(false);
            expect(result.error).toBe("ENOENT: no such file or directory, open '/missing.json'");
        });

        it('should not restore when the emergency backup cannot be written', async () => {
            test.fileSystem.failWritesUnder = BACKUP_DIR;

            const result = await recoverPath(test.ctx, { backupId: 'install-scoop', confirm, now: () => now });

            expect(result.success).toBe(false);
            expect(result.error).toBe(
                `Failed to write PATH backup 'emergency-20240102-030405': EACCES: permission denied, open '${BACKUP_DIR}'`,
            );
            expect(test.environment.values.User).toBe('C:\\changed');
        });

        it('should report a failed restore write', async () => {
            test.environment.failWritesTo = 'User';

            const result = await recoverPath(test.ctx, { backupId: 'install-scoop', confirm, now: () => now });

            expect(result.success).toBe(false);
            expect(result.emergencyBackupId).toBe('emergency-20240102-030405');
            expect(result.error).toBe('Writing the restored PATH failed');
        });
    });
});
