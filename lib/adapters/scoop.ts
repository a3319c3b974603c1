import { CommandLineAdapter } from './base';

export class ScoopAdapter extends CommandLineAdapter {
    readonly name = 'scoop';
    readonly displayName = 'Scoop';
    readonly description = 'Command-line installer for Windows';
    readonly command = 'scoop';
    protected readonly dryRunArgs = 'status';
}
