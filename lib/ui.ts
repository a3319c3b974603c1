import * as cliProgress from 'cli-progress';
import { IProgressBar, IProgressMultiBar, IProgressBarFactory, ProgressPayload } from './interfaces/progress-interface';
import { AdapterStatus, ProgressBarProps, StatusLine } from './models';

/**
 * Wrapper for cli-progress progress bar to match our interface
 */
class CliProgressBarWrapper implements IProgressBar {
    private bar: cliProgress.SingleBar;

    constructor(bar: cliProgress.SingleBar) {
        this.bar = bar;
    }

    setTotal(total: number): void {
        this.bar.setTotal(total);
    }

    update(value: number): void {
        this.bar.update(value);
    }

    stop(): void {
        this.bar.stop();
    }
}

/**
 * Wrapper for cli-progress multi-bar to match our interface
 */
class CliProgressMultiBarWrapper implements IProgressMultiBar {
    private multibar: cliProgress.MultiBar;

    constructor(multibar: cliProgress.MultiBar) {
        this.multibar = multibar;
    }

    create(total: number, startValue: number, payload: ProgressPayload): IProgressBar {
        const bar = this.multibar.create(total, startValue, payload);
        return new CliProgressBarWrapper(bar);
    }

    stop(): void {
        this.multibar.stop();
    }
}

/**
 * Default progress bar factory implementation
 */
export class CliProgressBarFactory implements IProgressBarFactory {
    createMultiBar(options?: ProgressBarProps): IProgressMultiBar {
        const multibar = new cliProgress.MultiBar({
            format: options?.format ?? '{name} |{bar}| {percentage}% | {value}/{total} bytes | ETA: {eta}s',
            barCompleteChar: options?.barCompleteChar ?? '\u2588',
            barIncompleteChar: options?.barIncompleteChar ?? '\u2591',
            hideCursor: options?.hideCursor ?? true,
            clearOnComplete: options?.clearOnComplete ?? true,
            stopOnComplete: options?.stopOnComplete ?? true,
        }, options?.preset ?? cliProgress.Presets.shades_classic);

        return new CliProgressMultiBarWrapper(multibar);
    }
}

const STATUS_TEXT: Record<AdapterStatus, { icon: string; text: string }> = {
    pending: { icon: '○', text: 'Pending' },
    checking: { icon: '○', text: 'Checking...' },
    updating: { icon: '○', text: 'Updating...' },
    completed: { icon: '✓', text: 'Completed' },
    failed: { icon: '✗', text: 'Failed' },
    skipped: { icon: '⊘', text: 'Skipped' },
};

/**
 * Formats one status row, e.g. "  ✓ [1/6] Winget                    Completed"
 */
export function formatStatusLine(line: StatusLine, index: number, total: number): string {
    const { icon, text } = STATUS_TEXT[line.status];
    const prefix = total > 1 ? `[${index + 1}/${total}] ` : '';
    const detail = line.detail ? ` (${line.detail})` : '';
    return `  ${icon} ${prefix}${line.name.padEnd(25)} ${text}${detail}`;
}

/**
 * Tracks per-package-manager status during a run and prints it as a table
 */
export class StatusDisplay {
    private statusLines: Map<string, StatusLine> = new Map();
    private items: string[];
    private write: (text: string) => void;

    constructor(items: string[], write: (text: string) => void = text => process.stdout.write(text)) {
        this.items = items;
        this.write = write;
        items.forEach(name => {
            this.statusLines.set(name, { name, status: 'pending' });
        });
    }

    setStatus(name: string, status: AdapterStatus, detail?: string): void {
        if (!this.statusLines.has(name)) {
            this.items.push(name);
        }
        this.statusLines.set(name, { name, status, detail });
    }

    getStatus(name: string): AdapterStatus | undefined {
        return this.statusLines.get(name)?.status;
    }

    render(): string[] {
        const total = this.items.length;
        return this.items.map((name, index) => {
            const line: StatusLine = this.statusLines.get(name) ?? { name, status: 'pending' };
            return formatStatusLine(line, index, total);
        });
    }

    print(): void {
        this.render().forEach(line => this.write(line + '\n'));
    }
}
