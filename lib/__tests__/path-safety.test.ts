import { PathSafetyManager, containsSegment, splitPath } from '../path-safety';
import { PathBackupError } from '../errors';
import { MemoryEnvironmentStore, MemoryFileSystem } from './helpers/mocks';

const BACKUP_DIR = '/test/pmu/path-backups';
const ORIGINAL_USER = 'C:\\Users\\test\\bin';
const ORIGINAL_PROCESS = 'C:\\Windows\\system32;C:\\Users\\test\\bin';

describe('path-safety', () => {
    let fileSystem: MemoryFileSystem;
    let environment: MemoryEnvironmentStore;
    let now: Date;

    function createManager(): PathSafetyManager {
        return new PathSafetyManager({
            backupDirectory: BACKUP_DIR,
            environment,
            fileSystem,
            now: () => now,
            systemRoot: 'C:\\Windows',
        });
    }

    beforeEach(() => {
        fileSystem = new MemoryFileSystem();
        environment = new MemoryEnvironmentStore();
        now = new Date(2024, 0, 2, 3, 4, 5);
    });

    describe('segments', () => {
        it('should split on semicolons and drop blanks', () => {
            expect(splitPath('C:\\a; ;C:\\b;')).toEqual(['C:\\a', 'C:\\b']);
        });

        it('should match whole segments case-insensitively and ignore a trailing backslash', () => {
            expect(containsSegment('C:\\Tools\\bin;C:\\x', 'c:\\tools\\BIN\\')).toBe(true);
            expect(containsSegment('C:\\Tools\\bin2', 'C:\\Tools\\bin')).toBe(false);
        });
    });

    describe('backup', () => {
        it('should snapshot every scope and persist it', async () => {
            const manager = createManager();

            const backup = await manager.backup('install-scoop');

            expect(backup).toEqual({
                backupId: 'install-scoop',
                userPath: ORIGINAL_USER,
                machinePath: environment.values.Machine,
                sessionPath: ORIGINAL_PROCESS,
                timestamp: now.toISOString(),
            });
            const filePath = `${BACKUP_DIR}/path-backup-install-scoop-20240102-030405.json`;
            expect(JSON.parse(fileSystem.readFileSync(filePath))).toEqual(backup);
            expect(manager.getBackup('install-scoop')).toBe(backup);
        });

        it('should reject an identifier already used in the session', async () => {
            const manager = createManager();
            await manager.backup('same');

            await expect(manager.backup('same')).rejects.toBeInstanceOf(PathBackupError);
        });

        it('should not overwrite a backup file from another session', async () => {
            await createManager().backup('same');
            await createManager().backup('same');

            expect(fileSystem.filesUnder(BACKUP_DIR)).toEqual([
                `${BACKUP_DIR}/path-backup-same-20240102-030405-1.json`,
                `${BACKUP_DIR}/path-backup-same-20240102-030405.json`,
            ]);
        });

        it('should replace unsafe characters in the file name', async () => {
            await createManager().backup('emergency:1/2');

            expect(fileSystem.filesUnder(BACKUP_DIR)).toEqual([
                `${BACKUP_DIR}/path-backup-emergency_1_2-20240102-030405.json`,
            ]);
        });

        it('should throw PathBackupError when the snapshot cannot be written', async () => {
            fileSystem.failWritesUnder = BACKUP_DIR;
            const manager = createManager();

            await expect(manager.backup('x')).rejects.toThrow(
                `Failed to write PATH backup 'x': EACCES: permission denied, open '${BACKUP_DIR}'`,
            );
            expect(manager.getBackup('x')).toBeUndefined();
        });
    });

    describe('validate', () => {
        it('should accept a machine PATH with the critical directories in literal form', () => {
            const result = createManager().validate(
                '%SystemRoot%\\system32;%SystemRoot%;%SystemRoot%\\System32\\Wbem;%SystemRoot%\\System32\\WindowsPowerShell\\v1.0',
                'Machine',
            );
            expect(result).toEqual({ valid: true, errors: [], warnings: [] });
        });

        it('should reject a machine PATH missing a critical directory', () => {
            const result = createManager().validate(
                'C:\\Windows\\system32;C:\\Windows;C:\\Windows\\System32\\WindowsPowerShell\\v1.0',
                'Machine',
            );
            expect(result.valid).toBe(false);
            expect(result.errors).toEqual(['Machine PATH is missing critical directory: %SystemRoot%\\System32\\Wbem']);
        });

        it('should not require system directories on the user PATH', () => {
            expect(createManager().validate('C:\\Users\\test\\bin', 'User').valid).toBe(true);
        });

        it('should reject values over the length limit', () => {
            const result = createManager().validate('C:\\' + 'a'.repeat(8200), 'User');
            expect(result.errors).toEqual(['PATH length 8203 exceeds the maximum of 8191 characters']);
        });

        it('should warn about empty and relative segments without failing', () => {
            const result = createManager().validate('C:\\a;;C:\\b\\..\\c', 'User');
            expect(result).toEqual({
                valid: true,
                errors: [],
                warnings: ['PATH contains empty segments (;;)', 'PATH contains a relative segment: C:\\b\\..\\c'],
            });
        });
    });

    describe('addToPath', () => {
        it('should append to the user PATH and prepend to the process PATH', async () => {
            const result = await createManager().addToPath('C:\\tools', 'User', 'install-npm');

            expect(result).toEqual({
                scope: 'User',
                directory: 'C:\\tools',
                backupId: 'install-npm',
                success: true,
                changed: true,
                rolledBack: false,
            });
            expect(environment.values.User).toBe('C:\\Users\\test\\bin;C:\\tools');
            expect(environment.values.Process).toBe('C:\\tools;C:\\Windows\\system32;C:\\Users\\test\\bin');
            expect(fileSystem.filesUnder(BACKUP_DIR)).toHaveLength(1);
        });

        it('should do nothing when the directory is already present', async () => {
            const result = await createManager().addToPath('c:\\users\\TEST\\bin\\', 'User', 'noop');

            expect(result.success).toBe(true);
            expect(result.changed).toBe(false);
            expect(environment.writes).toEqual([]);
        });

        it('should refuse to change PATH when the backup cannot be written', async () => {
            fileSystem.failWritesUnder = BACKUP_DIR;

            const result = await createManager().addToPath('C:\\tools', 'User', 'install-npm');

            expect(result.success).toBe(false);
            expect(result.rolledBack).toBe(false);
            expect(result.error).toBe(`Failed to write PATH backup 'install-npm': EACCES: permission denied, open '${BACKUP_DIR}'`);
            expect(environment.writes).toEqual([]);
        });

        it('should roll back when the written value does not contain the directory', async () => {
            environment.dropWritesTo = 'User';

            const result = await createManager().addToPath('C:\\tools', 'User', 'install-npm');

            expect(result.success).toBe(false);
            expect(result.rolledBack).toBe(true);
            expect(result.error).toBe('PATH verification failed after write');
            expect(environment.values.Process).toBe(ORIGINAL_PROCESS);
            expect(environment.writes.some(write => write.scope === 'Machine')).toBe(false);
        });

        it('should roll back when writing throws', async () => {
            environment.failWritesTo = 'User';
            environment.failWritesRemaining = 1;

            const result = await createManager().addToPath('C:\\tools', 'User', 'install-npm');

            expect(result.success).toBe(false);
            expect(result.rolledBack).toBe(true);
            expect(result.error).toBe('Access denied writing User PATH');
            expect(environment.values.User).toBe(ORIGINAL_USER);
        });

        it('should report a failed rollback', async () => {
            environment.failWritesTo = 'User';

            const result = await createManager().addToPath('C:\\tools', 'User', 'install-npm');

            expect(result.success).toBe(false);
            expect(result.rolledBack).toBe(false);
        });

        it('should not write a machine PATH that fails validation', async () => {
            environment.values.Machine = 'C:\\Windows';

            const result = await createManager().addToPath('C:\\tools', 'Machine', 'machine-change');

            expect(result.success).toBe(false);
            expect(result.changed).toBe(false);
            expect(environment.writes).toEqual([]);
        });

        it('should reuse an existing backup for several changes', async () => {
            const manager = createManager();

            await manager.addToPath('C:\\one', 'User', 'batch');
            const second = await manager.addToPath('C:\\two', 'User', 'batch');

            expect(second.success).toBe(true);
            expect(environment.values.User).toBe('C:\\Users\\test\\bin;C:\\one;C:\\two');
            expect(fileSystem.filesUnder(BACKUP_DIR)).toHaveLength(1);
        });
    });

    describe('restore', () => {
        it('should return false for an unknown identifier', async () => {
            expect(await createManager().restore('missing')).toBe(false);
            expect(environment.writes).toEqual([]);
        });

        it('should bring back the exact values that were backed up', async () => {
            const user = 'C:\\Users\\Jürgen\\bin;;C:\\Tools\\ ;C:\\Program Files\\Ünïcode';
            const session = 'C:\\Windows\\system32;' + user;
            environment = new MemoryEnvironmentStore({ User: user, Process: session });
            const manager = createManager();
            await manager.backup('round-trip');
            await environment.setPath('User', 'C:\\changed');
            await environment.setPath('Process', 'C:\\changed;C:\\other');

            expect(await manager.restore('round-trip')).toBe(true);

            expect(environment.values.User).toBe(user);
            expect(environment.values.Process).toBe(session);
        });

        it('should only write the machine PATH when asked', async () => {
            const manager = createManager();
            await manager.backup('snap');

            await manager.restore('snap');
            expect(environment.writes.map(write => write.scope)).toEqual(['User', 'Process']);

            await manager.restore('snap', true);
            expect(environment.writes.map(write => write.scope)).toEqual(['User', 'Process', 'Machine', 'User', 'Process']);
        });
    });

    describe('listBackups', () => {
        it('should list persisted backups newest first and skip unreadable files', async () => {
            await createManager().backup('older');
            now = new Date(2024, 0, 3, 3, 4, 5);
            await createManager().backup('newer');
            fileSystem.writeFileSync(`${BACKUP_DIR}/path-backup-broken.json`, '{not json');
            fileSystem.writeFileSync(`${BACKUP_DIR}/notes.json`, '{}');

            const listed = createManager().listBackups();

            expect(listed.map(entry => entry.backup.backupId)).toEqual(['newer', 'older']);
            expect(listed[0].filePath).toBe(`${BACKUP_DIR}/path-backup-newer-20240103-030405.json`);
        });

        it('should return an empty list when no backup directory exists', () => {
            expect(createManager().listBackups()).toEqual([]);
        });

        it('should reject a JSON file that is not a backup', () => {
            fileSystem.writeFileSync('/tmp/other.json', '{"backupId": 1}');

            expect(() => createManager().loadBackupFile('/tmp/other.json')).toThrow('Not a PATH backup file: /tmp/other.json');
        });
    });
});
