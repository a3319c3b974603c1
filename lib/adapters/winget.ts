import { CommandLineAdapter } from './base';

/**
 * winget's APPINSTALLER_CLI_ERROR_UPDATE_NOT_APPLICABLE (0x8A15002B) as a
 * signed 32-bit exit code; some packages had no applicable upgrade
 */
export const WINGET_UPDATE_NOT_APPLICABLE = -1978335189;

export class WingetAdapter extends CommandLineAdapter {
    readonly name = 'winget';
    readonly displayName = 'Winget';
    readonly description = 'Windows Package Manager';
    readonly command = 'winget';
    protected readonly dryRunArgs = 'upgrade --include-unknown --accept-source-agreements';

    protected isAcceptedExitCode(exitCode: number): boolean {
        // Exit codes may arrive unsigned
        const signed = exitCode | 0;
        return signed === 0 || signed === WINGET_UPDATE_NOT_APPLICABLE;
    }
}
