import { CommandLineAdapter } from './base';

export class NpmAdapter extends CommandLineAdapter {
    readonly name = 'npm';
    readonly displayName = 'npm';
    readonly description = 'Node.js global packages';
    readonly command = 'npm';
    protected readonly dryRunArgs = 'outdated -g';

    /**
     * npm outdated exits 1 whenever something is outdated
     */
    protected isAcceptedExitCode(exitCode: number, dryRun: boolean): boolean {
        return exitCode === 0 || (dryRun && exitCode === 1);
    }
}
