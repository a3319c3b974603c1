import { PackageManagerName } from '../models';
import { PackageManagerAdapter } from './base';
import { ChocolateyAdapter } from './chocolatey';
import { CondaAdapter } from './conda';
import { NpmAdapter } from './npm';
import { PipAdapter } from './pip';
import { ScoopAdapter } from './scoop';
import { WingetAdapter } from './winget';

export type { PackageManagerAdapter } from './base';
export { CommandLineAdapter } from './base';
export { WINGET_UPDATE_NOT_APPLICABLE } from './winget';
export { CONDA_TOS_CHANNELS } from './conda';
export { knownInstallDirectories } from './locations';

export type AdapterRegistry = Record<PackageManagerName, PackageManagerAdapter>;

/**
 * Creates one adapter per supported package manager
 */
export function createAdapterRegistry(): AdapterRegistry {
    return {
        winget: new WingetAdapter(),
        chocolatey: new ChocolateyAdapter(),
        scoop: new ScoopAdapter(),
        npm: new NpmAdapter(),
        pip: new PipAdapter(),
        conda: new CondaAdapter(),
    };
}
