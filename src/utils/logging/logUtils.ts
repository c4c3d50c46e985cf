// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types';

import chalk from 'chalk';

type LogLevel = 'info' | 'success' | 'warn' | 'error' | 'debug';

interface ILevelStyle {
    tag: string;
    color: (text: string) => string;
    sink: keyof ILogFacility;
}

const LEVEL_STYLES: Record<LogLevel, ILevelStyle> = {
    info: { tag: 'INFO', color: chalk.blue, sink: 'log' },
    success: { tag: 'SUCCESS', color: chalk.green, sink: 'log' },
    warn: { tag: 'WARNING', color: chalk.yellow, sink: 'warn' },
    error: { tag: 'ERROR', color: chalk.red, sink: 'error' },
    debug: { tag: 'DEBUG', color: chalk.magenta, sink: 'log' },
};

const loggerMap: Record<string, ILogger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger printing `[LEVEL] name :: message` lines to a log facility. Every message is also
 * kept per level so pipelines and tests can inspect what was reported.
 */
class Logger implements ILogger {
    infoMessages: string[] = [];
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    successMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly logger: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.emit('info', message, this.infoMessages);
    }

    success(message: string) {
        this.emit('success', message, this.successMessages);
    }

    warn(message: string) {
        this.emit('warn', message, this.warnMessages);
    }

    error(message: string) {
        this.emit('error', message, this.errorMessages);
    }

    debug(message: string) {
        this.emit('debug', message, this.debugMessages);
    }

    private emit(level: LogLevel, message: string, store: string[]): void {
        store.push(message);
        if (level === 'debug' && !this.verbose) {
            return;
        }
        const { tag, color, sink } = LEVEL_STYLES[level];
        this.logger[sink](color(`[${tag}] ${this.name} :: ${message}`));
    }
}

/**
 * Wraps a logger so that debug lines carry the name of the engine stage emitting them
 * (`embed :: ...`). Other levels pass through unchanged and every message lands in the
 * wrapped logger's stores.
 *
 * @param {ILogger | undefined} logger - The logger to wrap; nothing is logged without one.
 * @param {string} stage - Short stage name, e.g. `embed`, `extract` or `capacity`.
 * @return {ILogger | undefined} The wrapped logger, or undefined when no logger was given.
 */
export function stageLogger(logger: ILogger | undefined, stage: string): ILogger | undefined {
    if (!logger) {
        return undefined;
    }
    return {
        get infoMessages() {
            return logger.infoMessages;
        },
        get successMessages() {
            return logger.successMessages;
        },
        get warnMessages() {
            return logger.warnMessages;
        },
        get debugMessages() {
            return logger.debugMessages;
        },
        get errorMessages() {
            return logger.errorMessages;
        },
        verbose: logger.verbose,
        info: (message: string) => logger.info(message),
        success: (message: string) => logger.success(message),
        warn: (message: string) => logger.warn(message),
        error: (message: string) => logger.error(message),
        debug: (message: string) => logger.debug(`${stage} :: ${message}`),
    };
}

/**
 * Retrieves logger by name. If the logger does not already exist, it creates a new one.
 * The log facility and verbosity of an existing logger are not changed.
 *
 * @param {string} name - The name identifier for the logger.
 * @param {ILogFacility} [logFacility=console] - The log facility where logs will be sent.
 * @param {boolean} [verbose=false] - Optional flag to enable verbose logging.
 * @return {ILogger} The logger instance associated with the provided name.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    const logger = loggerMap[name];
    if (logger) {
        return logger;
    }
    const created = new Logger(name, logFacility, verbose);
    loggerMap[name] = created;
    return created;
}
