import * as cliProgress from 'cli-progress';
import { AdapterStatus } from './package-manager';

/**
 * Options for configuring a progress bar
 */
export type ProgressBarProps = {
    format?: string;
    barCompleteChar?: string;
    barIncompleteChar?: string;
    hideCursor?: boolean;
    clearOnComplete?: boolean;
    stopOnComplete?: boolean;
    preset?: cliProgress.Preset;
}

export type StatusLine = {
    name: string;
    status: AdapterStatus;
    detail?: string;
}
