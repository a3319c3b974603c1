import { SessionContext } from '../context';
import { CommandLineAdapter } from './base';

/**
 * pip has no safe bulk upgrade, so both modes only list outdated packages
 */
export class PipAdapter extends CommandLineAdapter {
    readonly name = 'pip';
    readonly displayName = 'pip';
    readonly description = 'Python packages (lists outdated packages only)';
    readonly command = 'pip';
    protected readonly dryRunArgs = 'list --outdated';

    protected updateArgs(ctx: SessionContext): string {
        const configured = ctx.config.PackageManagers.pip.args.trim();
        if (configured !== this.dryRunArgs) {
            this.logger(ctx).warn(`PackageManagers.pip.args ('${configured}') is ignored; pip only runs '${this.dryRunArgs}'`);
        }
        return this.dryRunArgs;
    }
}
