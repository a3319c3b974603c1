import * as readline from 'readline';
import { CliOptions, MinimumLogLevel, Operation, ParseResult } from './models';

/**
 * Splits an argument string into individual arguments
 * Handles single and double quoted arguments with spaces; a quote of the
 * other kind inside a quoted argument is kept literally
 */
export function splitArguments(input: string): string[] {
    const trimmed = input.trim();
    if (!trimmed) {
        return [];
    }

    const parts: string[] = [];
    let current = '';
    let hasToken = false;
    let quote: string | null = null;

    for (let i = 0; i < trimmed.length; i++) {
        const char = trimmed[i];
        if (quote) {
            if (char === quote) {
                quote = null;
            } else {
                current += char;
            }
        } else if (char === '"' || char === "'") {
            quote = char;
            hasToken = true;
        } else if (char === ' ' || char === '\t') {
            if (hasToken) {
                parts.push(current);
                current = '';
                hasToken = false;
            }
        } else {
            current += char;
            hasToken = true;
        }
    }
    if (hasToken) {
        parts.push(current);
    }

    return parts;
}

const OPERATIONS: Record<string, Operation> = {
    update: 'update',
    status: 'status',
    configure: 'configure',
    config: 'configure',
    install: 'install',
    registertask: 'register-task',
    unregistertask: 'unregister-task',
    listbackups: 'list-backups',
    restorepath: 'restore-path',
    help: 'help',
};

const LOG_LEVELS: MinimumLogLevel[] = ['Debug', 'Info', 'Warning', 'Error'];

/**
 * Lowercases and drops dashes/underscores so -DryRun, --dry-run and dry_run compare equal
 */
function normalizeName(token: string): string {
    return token.replace(/^-+/, '').toLowerCase().replace(/[-_]/g, '');
}

function isFlag(token: string): boolean {
    return token.startsWith('-') && token.length > 1;
}

/**
 * Parses process arguments (without node and script path) into CLI options
 */
export function parseCliArgs(argv: string[]): ParseResult {
    const options: CliOptions = {
        operation: 'update',
        selected: [],
        enable: [],
        disable: [],
        dryRun: false,
        silent: false,
        logLevel: 'Info',
        help: false,
    };
    let operationSeen = false;

    // Values of list flags run until the next flag; commas also separate
    const takeList = (index: number, inline: string | undefined): { values: string[]; next: number } => {
        const values: string[] = [];
        let next = index;
        if (inline !== undefined) {
            values.push(inline);
        } else {
            while (next + 1 < argv.length && !isFlag(argv[next + 1])) {
                next++;
                values.push(argv[next]);
            }
        }
        return {
            values: values.flatMap(v => v.split(',')).map(v => v.trim()).filter(v => v.length > 0),
            next,
        };
    };

    for (let i = 0; i < argv.length; i++) {
        const token = argv[i];

        if (!isFlag(token)) {
            if (!operationSeen) {
                const operation = OPERATIONS[normalizeName(token)];
                if (!operation) {
                    return { ok: false, error: `Unknown operation: ${token}` };
                }
                options.operation = operation;
                operationSeen = true;
            } else {
                options.selected.push(...token.split(',').map(v => v.trim()).filter(v => v.length > 0));
            }
            continue;
        }

        const eqIndex = token.indexOf('=');
        const name = normalizeName(eqIndex === -1 ? token : token.slice(0, eqIndex));
        const inline = eqIndex === -1 ? undefined : token.slice(eqIndex + 1);

        const takeValue = (): string | undefined => {
            if (inline !== undefined) {
                return inline;
            }
            if (i + 1 < argv.length && !isFlag(argv[i + 1])) {
                i++;
                return argv[i];
            }
            return undefined;
        };

        switch (name) {
            case 'selectedpackagemanagers':
            case 'selected':
            case 'packagemanagers': {
                const { values, next } = takeList(i, inline);
                options.selected.push(...values);
                i = next;
                break;
            }
            case 'enable': {
                const { values, next } = takeList(i, inline);
                options.enable.push(...values);
                i = next;
                break;
            }
            case 'disable': {
                const { values, next } = takeList(i, inline);
                options.disable.push(...values);
                i = next;
                break;
            }
            case 'dryrun':
                options.dryRun = true;
                break;
            case 'silent':
                options.silent = true;
                break;
            case 'loglevel': {
                const value = takeValue();
                const level = LOG_LEVELS.find(l => l.toLowerCase() === value?.toLowerCase());
                if (!level) {
                    return { ok: false, error: `Invalid log level: ${value ?? '(missing)'}. Expected one of ${LOG_LEVELS.join(', ')}` };
                }
                options.logLevel = level;
                break;
            }
            case 'configpath':
            case 'config': {
                const value = takeValue();
                if (!value) {
                    return { ok: false, error: `${token} requires a path` };
                }
                options.configPath = value;
                break;
            }
            case 'backupid': {
                const value = takeValue();
                if (!value) {
                    return { ok: false, error: `${token} requires a backup identifier` };
                }
                options.backupId = value;
                break;
            }
            case 'file':
            case 'backupfile': {
                const value = takeValue();
                if (!value) {
                    return { ok: false, error: `${token} requires a file path` };
                }
                options.backupFile = value;
                break;
            }
            case 'help':
            case 'h':
            case '?':
                options.help = true;
                break;
            default:
                return { ok: false, error: `Unknown option: ${token}` };
        }
    }

    return { ok: true, options };
}

/**
 * Asks a yes/no question on the terminal
 * Resolves true only for an explicit "y" or "yes"
 */
export function askConfirmation(
    question: string,
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): Promise<boolean> {
    const rl = readline.createInterface({ input, output });

    return new Promise((resolve) => {
        let answered = false;
        rl.question(`${question} [y/N] `, (answer: string) => {
            answered = true;
            rl.close();
            const normalized = answer.trim().toLowerCase();
            resolve(normalized === 'y' || normalized === 'yes');
        });
        rl.on('close', () => {
            if (!answered) {
                resolve(false);
            }
        });
    });
}
