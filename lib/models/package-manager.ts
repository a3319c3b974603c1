/**
 * Every package manager the updater knows about, in run order
 */
export const PACKAGE_MANAGER_NAMES = ['winget', 'chocolatey', 'scoop', 'npm', 'pip', 'conda'] as const;

export type PackageManagerName = typeof PACKAGE_MANAGER_NAMES[number];

export type PackageManagerOperation = 'update' | 'dry-run-check';

/**
 * Normalized result of one adapter update run
 */
export type PackageManagerResult = {
    packageManager: PackageManagerName;
    operation: PackageManagerOperation;
    success: boolean;
    exitCode: number;
    durationMs: number;
    timedOut: boolean;
    error?: string;
    output?: string;
}

export type PackageManagerInfo = {
    name: PackageManagerName;
    displayName: string;
    description: string;
    available: boolean;
    path: string | null;
    version: string | null;
    error: string | null;
}

export type UpdateOptions = {
    dryRun: boolean;
}

export type AdapterStatus = 'pending' | 'checking' | 'updating' | 'completed' | 'failed' | 'skipped';

export type SkippedPackageManager = {
    packageManager: PackageManagerName;
    reason: string;
}

/**
 * Aggregate of one orchestrator run
 */
export type UpdateSummary = {
    sessionId: string;
    dryRun: boolean;
    results: PackageManagerResult[];
    skipped: SkippedPackageManager[];
    successful: number;
    failed: number;
    skippedCount: number;
    durationMs: number;
    exitCode: 0 | 1;
}

/**
 * Checks whether a string names a supported package manager
 */
export function isPackageManagerName(value: string): value is PackageManagerName {
    return PACKAGE_MANAGER_NAMES.some(name => name === value);
}
