// src/utils/logging/logUtils.ts

import type { ILogFacility, ILogger } from '../../@types/index.ts';

import chalk from 'chalk';

const loggerMap = new Map<string, ILogger>();

export const NoopLogFacility: ILogFacility = {
    log: (..._input: unknown[]): void => {},
    warn: (..._input: unknown[]): void => {},
    error: (..._input: unknown[]): void => {},
};

/**
 * Named logger writing chalk-coloured, level-tagged lines to a log facility.
 * Debug lines are only written in verbose mode but are always kept in `debugMessages`.
 */
class Logger implements ILogger {
    debugMessages: string[] = [];
    errorMessages: string[] = [];

    constructor(
        readonly name: string,
        private readonly facility: ILogFacility,
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
 * Retrieves a logger by name, creating it on first use. Later calls with the
 * same name return the existing logger and ignore the other arguments.
 *
 * @param {string} name - The name identifier for the logger.
 * @param {ILogFacility} [logFacility=console] - Where log lines are written.
 * @param {boolean} [verbose=false] - Whether debug lines are written.
 */
export function getLogger(name: string, logFacility: ILogFacility = console, verbose: boolean = false): ILogger {
    let logger = loggerMap.get(name);
    if (!logger) {
        logger = new Logger(name, logFacility, verbose);
        loggerMap.set(name, logger);
    }
    return logger;
}
