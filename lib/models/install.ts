import { InstallMethod } from './config';
import { PackageManagerName } from './package-manager';
import { PathChangeResult } from './path';

/**
 * Result of installing one package manager
 */
export type InstallResult = {
    packageManager: PackageManagerName;
    success: boolean;
    skipped: boolean;
    method?: InstallMethod;
    executablePath?: string;
    pathChange?: PathChangeResult;
    error?: string;
}

/**
 * Where an installed package manager's executable is expected to land
 */
export type InstallTarget = {
    wingetId?: string;
    chocolateyPackage?: string;
    scriptUrl?: string;
    executable: string;
    candidateDirectories: string[];
}
