import * as path from 'path';
import { getDefaultConfigPath } from './config';
import { SessionContext, processOptions } from './context';
import { runProcess } from './process-runner';
import { ProcessResult } from './models';

const SCHTASKS_TIMEOUT_SECONDS = 60;

export type ScheduledTaskOptions = {
    taskName?: string;
    /** HH:mm, local time */
    time?: string;
    nodePath?: string;
    scriptPath?: string;
}

/**
 * Registers a daily task that runs a silent update as SYSTEM
 */
export async function registerScheduledTask(ctx: SessionContext, options: ScheduledTaskOptions = {}): Promise<ProcessResult> {
    const logger = ctx.logger.forComponent('Scheduler');
    const taskName = options.taskName ?? ctx.config.Advanced.scheduledTaskName;
    const time = options.time ?? ctx.config.Advanced.scheduledTaskTime;
    const nodePath = options.nodePath ?? process.execPath;
    const scriptPath = path.resolve(options.scriptPath ?? process.argv[1] ?? 'main.js');

    // The task must read the same configuration file it was registered with
    const configPath = path.resolve(ctx.configPath);
    const configArgument = configPath === path.resolve(getDefaultConfigPath(ctx.env)) ? '' : ` --config "${configPath}"`;

    // Single quotes keep the inner double quotes of /TR intact
    const taskCommand = `"${nodePath}" "${scriptPath}" update --silent${configArgument}`;
    const args = `/Create /TN '${taskName}' /TR '${taskCommand}' /SC DAILY /ST ${time} /RU SYSTEM /RL HIGHEST /F`;

    const result = await runProcess('schtasks', args, {
        ...processOptions(ctx, 'Scheduler'),
        timeoutSeconds: SCHTASKS_TIMEOUT_SECONDS,
    });
    if (result.success) {
        logger.success(`Scheduled task '${taskName}' registered to run daily at ${time}`);
    } else {
        logger.error(`Registering scheduled task '${taskName}' failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return result;
}

/**
 * Removes the scheduled task
 */
export async function unregisterScheduledTask(ctx: SessionContext, taskName?: string): Promise<ProcessResult> {
    const logger = ctx.logger.forComponent('Scheduler');
    const name = taskName ?? ctx.config.Advanced.scheduledTaskName;

    const result = await runProcess('schtasks', `/Delete /TN '${name}' /F`, {
        ...processOptions(ctx, 'Scheduler'),
        timeoutSeconds: SCHTASKS_TIMEOUT_SECONDS,
    });
    if (result.success) {
        logger.success(`Scheduled task '${name}' removed`);
    } else {
        logger.error(`Removing scheduled task '${name}' failed with exit code ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return result;
}
