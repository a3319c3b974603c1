import { randomUUID } from 'crypto';
import { IFileSystem, IHttpClient, IProcessExecutor, IProgressBarFactory, NodeFileSystem, NodeProcessExecutor } from './interfaces';
import { IEnvironmentStore } from './interfaces/environment-interface';
import { getDataDirectories } from './config';
import { Logger } from './logger';
import { PathSafetyManager } from './path-safety';
import { Configuration, MinimumLogLevel, RetryProcessOptions } from './models';

/**
 * Everything one run shares: configuration, logger, PATH manager and the
 * injectable OS collaborators
 */
export type SessionContext = {
    sessionId: string;
    config: Configuration;
    configPath: string;
    logger: Logger;
    pathManager: PathSafetyManager;
    processExecutor: IProcessExecutor;
    fileSystem: IFileSystem;
    /** Environment used for executable lookup and child processes */
    env: NodeJS.ProcessEnv;
    httpClient?: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
    dryRun: boolean;
    silent: boolean;
}

export type CreateContextOptions = {
    config: Configuration;
    configPath: string;
    sessionId?: string;
    logLevel?: MinimumLogLevel;
    dryRun?: boolean;
    silent?: boolean;
    /** Log file base name, defaults to "update" */
    logPrefix?: string;
    processExecutor?: IProcessExecutor;
    fileSystem?: IFileSystem;
    environment?: IEnvironmentStore;
    httpClient?: IHttpClient;
    progressBarFactory?: IProgressBarFactory;
    env?: NodeJS.ProcessEnv;
    now?: () => Date;
}

/**
 * Builds the context for one run; logs and PATH backups live beside the config file
 */
export function createSessionContext(options: CreateContextOptions): SessionContext {
    const fileSystem = options.fileSystem || new NodeFileSystem();
    const sessionId = options.sessionId ?? randomUUID();
    const silent = options.silent ?? false;
    const { logDirectory, backupDirectory } = getDataDirectories(options.configPath);

    const logger = new Logger({
        sessionId,
        minimumLevel: options.logLevel,
        logDirectory,
        silent,
        filePrefix: options.logPrefix,
        fileSystem,
        now: options.now,
    });

    const pathManager = new PathSafetyManager({
        backupDirectory,
        environment: options.environment,
        fileSystem,
        logger: logger.forComponent('PathSafety'),
        now: options.now,
    });

    return {
        sessionId,
        config: options.config,
        configPath: options.configPath,
        logger,
        pathManager,
        processExecutor: options.processExecutor || new NodeProcessExecutor(),
        fileSystem,
        env: options.env ?? process.env,
        httpClient: options.httpClient,
        progressBarFactory: options.progressBarFactory,
        dryRun: options.dryRun ?? false,
        silent,
    };
}

/**
 * Process options for a component: the session's executor, file system and
 * environment plus the configured retry policy
 */
export function processOptions(ctx: SessionContext, component: string): RetryProcessOptions {
    return {
        env: ctx.env,
        processExecutor: ctx.processExecutor,
        fileSystem: ctx.fileSystem,
        logger: ctx.logger.forComponent(component),
        maxRetries: ctx.config.Advanced.maxRetries,
        retryDelaySeconds: ctx.config.Advanced.retryDelaySeconds,
    };
}
