// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';

const loggerMap: Record<string, ILogger> = {};

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing colored, level-prefixed lines to a log facility.
 * Warnings, errors and debug lines are also kept in memory so callers can inspect them after a run.
 */
class Logger implements ILogger {
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];

    constructor(
        readonly name: string,
        readonly facility: ILogFacility,
        readonly verbose = false,
    ) {}

    info(message: string) {
        this.facility.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
    }

    success(message: string) {
        this.facility.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
    }

    warn(message: string) {
        this.facility.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
        this.warnMessages.push(message);
    }

    error(message: string) {
        this.facility.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
        this.errorMessages.push(message);
    }

    debug(message: string) {
        if (this.verbose) {
            this.facility.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
        }
        this.debugMessages.push(message);
    }
}

/**
 * Retrieves logger by name. If the logger does not already exist, it creates a new one.
 *
 * @param name - The name identifier for the logger.
 * @param logFacility - Where the lines are sent; defaults to the console.
 * @param verbose - Print debug lines as well.
 * @return The logger registered under `name`.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    const existing = loggerMap[name];
    if (existing) {
        return existing;
    }
    const logger = new Logger(name, logFacility, verbose);
    loggerMap[name] = logger;
    return logger;
}
