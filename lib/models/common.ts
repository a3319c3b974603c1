import { MinimumLogLevel } from './log';

export type Operation =
    | 'update'
    | 'status'
    | 'configure'
    | 'install'
    | 'register-task'
    | 'unregister-task'
    | 'list-backups'
    | 'restore-path'
    | 'help';

/**
 * Parsed command line
 */
export type CliOptions = {
    operation: Operation;
    selected: string[];
    enable: string[];
    disable: string[];
    dryRun: boolean;
    silent: boolean;
    logLevel: MinimumLogLevel;
    configPath?: string;
    backupId?: string;
    backupFile?: string;
    help: boolean;
}

export type ParseResult =
    | { ok: true; options: CliOptions }
    | { ok: false; error: string };
