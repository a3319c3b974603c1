import { SessionContext } from '../context';
import { getErrorMessage } from '../errors';
import { runProcess } from '../process-runner';
import { RetryProcessOptions } from '../models';
import { CommandLineAdapter } from './base';
import { knownInstallDirectories } from './locations';

/**
 * Channels whose terms of service must be accepted before conda updates non-interactively
 */
export const CONDA_TOS_CHANNELS = [
    'https://repo.anaconda.com/pkgs/main',
    'https://repo.anaconda.com/pkgs/r',
    'https://repo.anaconda.com/pkgs/msys2',
];

export class CondaAdapter extends CommandLineAdapter {
    readonly name = 'conda';
    readonly displayName = 'Conda';
    readonly description = 'Anaconda / Miniconda environments';
    readonly command = 'conda';
    protected readonly dryRunArgs = 'update --all --dry-run';

    /**
     * Miniconda and Anaconda usually stay off PATH, so their install roots are searched too
     */
    protected searchPaths(ctx: SessionContext): string[] {
        return knownInstallDirectories('conda', ctx.env);
    }

    /**
     * Accepts channel terms and turns on always_yes; none of it is fatal
     */
    protected async prepare(ctx: SessionContext, options: RetryProcessOptions): Promise<void> {
        const logger = this.logger(ctx);

        for (const channel of CONDA_TOS_CHANNELS) {
            try {
                const result = await runProcess(this.command, `tos accept --override-channels --channel ${channel}`, options);
                if (!result.success) {
                    logger.debug(`Accepting terms for ${channel} exited with code ${result.exitCode}; continuing`);
                }
            } catch (error) {
                logger.debug(`Accepting terms for ${channel} failed: ${getErrorMessage(error)}; continuing`);
            }
        }

        try {
            const result = await runProcess(this.command, 'config --set always_yes true', options);
            if (!result.success) {
                logger.warn(`Setting always_yes exited with code ${result.exitCode}; continuing`);
            }
        } catch (error) {
            logger.warn(`Setting always_yes failed: ${getErrorMessage(error)}; continuing`);
        }
    }
}
