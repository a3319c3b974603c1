import { ProgressBarProps } from '../models/ui';

/** Values a bar's format string can reference, e.g. {name} */
export type ProgressPayload = {
    name: string;
}

/**
 * One download bar
 */
export interface IProgressBar {
    setTotal(total: number): void;
    update(value: number): void;
    stop(): void;
}

export interface IProgressMultiBar {
    create(total: number, startValue: number, payload: ProgressPayload): IProgressBar;
    stop(): void;
}

export interface IProgressBarFactory {
    createMultiBar(options?: ProgressBarProps): IProgressMultiBar;
}
