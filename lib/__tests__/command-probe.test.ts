import { resolveCommand, testCommand } from '../command-probe';
import { createMockProcessExecutor, MemoryFileSystem } from './helpers/mocks';

describe('command-probe', () => {
    afterEach(() => {
        jest.useRealTimers();
    });

    describe('resolveCommand', () => {
        it('should prefer .exe over .cmd across PATH directories', () => {
            const fileSystem = new MemoryFileSystem({ '/a/npm.cmd': '', '/b/npm.exe': '' });
            expect(resolveCommand('npm', { fileSystem, env: { PATH: '/a:/b' } })).toBe('/b/npm.exe');
        });

        it('should prefer .cmd over .ps1 in the same directory', () => {
            const fileSystem = new MemoryFileSystem({ '/a/scoop.ps1': '', '/a/scoop.cmd': '' });
            expect(resolveCommand('scoop', { fileSystem, env: { PATH: '/a' } })).toBe('/a/scoop.cmd');
        });

        it('should accept an explicit path without extension', () => {
            const fileSystem = new MemoryFileSystem({ '/opt/conda/Scripts/conda.exe': '' });
            expect(resolveCommand('/opt/conda/Scripts/conda', { fileSystem })).toBe('/opt/conda/Scripts/conda.exe');
        });

        it('should return null when nothing matches', () => {
            expect(resolveCommand('pip', { fileSystem: new MemoryFileSystem(), env: { PATH: '/a' } })).toBeNull();
        });
    });

    describe('testCommand', () => {
        it('should report an available command with its version line', async () => {
            const fileSystem = new MemoryFileSystem({ '/tools/winget.exe': '' });
            const executor = createMockProcessExecutor(() => ({ stdout: '\nv1.7.10861\nextra\n' }));

            const result = await testCommand('winget', '--version', { fileSystem, processExecutor: executor, env: { PATH: '/tools' } });

            expect(result).toEqual({
                command: 'winget',
                available: true,
                path: '/tools/winget.exe',
                version: 'v1.7.10861',
                exitCode: 0,
                error: null,
            });
            expect(executor.calls[0].args).toEqual(['--version']);
        });

        it('should report a missing command without throwing', async () => {
            const executor = createMockProcessExecutor();

            const result = await testCommand('scoop', '--version', {
                fileSystem: new MemoryFileSystem(),
                processExecutor: executor,
                env: { PATH: '/tools' },
            });

            expect(result).toEqual({
                command: 'scoop',
                available: false,
                path: null,
                version: null,
                exitCode: null,
                error: 'Command not found: scoop',
            });
            expect(executor.spawn).not.toHaveBeenCalled();
        });

        it('should report a failing probe as unavailable', async () => {
            const fileSystem = new MemoryFileSystem({ '/tools/pip.exe': '' });
            const executor = createMockProcessExecutor(() => ({ exitCode: 2, stderr: 'No module named pip\n' }));

            const result = await testCommand('pip', '--version', { fileSystem, processExecutor: executor, env: { PATH: '/tools' } });

            expect(result.available).toBe(false);
            expect(result.path).toBe('/tools/pip.exe');
            expect(result.exitCode).toBe(2);
            expect(result.version).toBe('No module named pip');
            expect(result.error).toBe('Version probe exited with code 2');
        });

        it('should report a launch failure as unavailable', async () => {
            const fileSystem = new MemoryFileSystem({ '/tools/npm.exe': '' });
            const launchError: NodeJS.ErrnoException = new Error('spawn UNKNOWN');
            launchError.code = 'UNKNOWN';
            const executor = createMockProcessExecutor(() => ({ error: launchError }));

            const result = await testCommand('npm', '--version', { fileSystem, processExecutor: executor, env: { PATH: '/tools' } });

            expect(result.available).toBe(false);
            expect(result.error).toBe('Failed to launch /tools/npm.exe: spawn UNKNOWN');
        });

        it('should time out a hanging probe after the default 15 seconds', async () => {
            jest.useFakeTimers();
            const fileSystem = new MemoryFileSystem({ '/tools/conda.exe': '' });
            const executor = createMockProcessExecutor(() => ({ hang: true }));

            const promise = testCommand('conda', '--version', { fileSystem, processExecutor: executor, env: { PATH: '/tools' } });
            await jest.runAllTimersAsync();
            const result = await promise;

            expect(result.available).toBe(false);
            expect(result.exitCode).toBe(-1);
            expect(result.error).toBe('Version probe timed out after 15s');
        });

        it('should look in extra search paths', async () => {
            const fileSystem = new MemoryFileSystem({ '/opt/conda/condabin/conda.bat': '' });
            const executor = createMockProcessExecutor(() => ({ stdout: 'conda 24.1.2' }));

            const result = await testCommand('conda', '--version', {
                fileSystem,
                processExecutor: executor,
                env: { PATH: '/tools' },
                searchPaths: ['/opt/conda/Scripts', '/opt/conda/condabin'],
            });

            expect(result.available).toBe(true);
            expect(result.path).toBe('/opt/conda/condabin/conda.bat');
            expect(result.version).toBe('conda 24.1.2');
        });
    });
});
