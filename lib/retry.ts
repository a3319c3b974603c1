import { getErrorMessage } from './errors';
import { nullLogger } from './logger';
import { runProcess } from './process-runner';
import { ProcessResult, RetryOptions, RetryProcessOptions } from './models';

export const DEFAULT_MAX_RETRIES = 2;
export const DEFAULT_RETRY_DELAY_SECONDS = 5;

export function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Runs an attempt up to maxRetries + 1 times, stopping at the first success
 *
 * When every attempt fails the last failed result is returned. A throwing
 * attempt counts as a failure while attempts remain; on the last attempt the
 * error propagates.
 */
export async function withRetry<T extends { success: boolean }>(
    attempt: (attemptNumber: number) => Promise<T>,
    options: RetryOptions = {},
): Promise<T> {
    const {
        maxRetries = DEFAULT_MAX_RETRIES,
        retryDelaySeconds = DEFAULT_RETRY_DELAY_SECONDS,
        label = 'operation',
        logger = nullLogger,
        sleep: wait = sleep,
    } = options;
    const totalAttempts = Math.max(0, Math.floor(maxRetries)) + 1;

    for (let attemptNumber = 1; ; attemptNumber++) {
        const isLast = attemptNumber >= totalAttempts;

        try {
            const result = await attempt(attemptNumber);
            if (result.success) {
                if (attemptNumber > 1) {
                    logger.info(`${label} succeeded on attempt ${attemptNumber} of ${totalAttempts}`);
                }
                return result;
            }
            if (isLast) {
                logger.warn(`${label} failed after ${totalAttempts} attempt(s)`, { attempts: totalAttempts });
                return result;
            }
            logger.debug(`${label} failed on attempt ${attemptNumber} of ${totalAttempts}, retrying in ${retryDelaySeconds}s`);
        } catch (error) {
            logger.warn(`${label} threw on attempt ${attemptNumber} of ${totalAttempts}: ${getErrorMessage(error)}`, {
                attempt: attemptNumber,
            });
            if (isLast) {
                throw error;
            }
        }

        if (retryDelaySeconds > 0) {
            await wait(retryDelaySeconds * 1000);
        }
    }
}

/**
 * Runs a process with retries; see withRetry for the failure semantics
 */
export async function runProcessWithRetry(
    filePath: string,
    argumentString: string,
    options: RetryProcessOptions = {},
): Promise<ProcessResult> {
    return withRetry(
        () => runProcess(filePath, argumentString, options),
        { ...options, label: options.label ?? `${filePath} ${argumentString}`.trim() },
    );
}
