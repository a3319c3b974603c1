import { CommandLineAdapter } from './base';

export class ChocolateyAdapter extends CommandLineAdapter {
    readonly name = 'chocolatey';
    readonly displayName = 'Chocolatey';
    readonly description = 'Community package manager for Windows';
    readonly command = 'choco';
    protected readonly dryRunArgs = 'outdated';
}
