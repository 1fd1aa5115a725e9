// tests/helpers/mockLogger.ts

import type { ILogger } from '../../src/@types/index.ts';

export class MockLogger implements ILogger {
    readonly name = 'mock';
    debugMessages: string[] = [];
    warnMessages: string[] = [];
    errorMessages: string[] = [];
    infoMessages: string[] = [];
    verbose: boolean;

    constructor(verbose: boolean = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        this.infoMessages.push(message);
    }
    success(_message: string): void {}
    warn(message: string): void {
        this.warnMessages.push(message);
    }
    error(message: string): void {
        this.errorMessages.push(message);
    }
    debug(message: string): void {
        if (this.verbose) {
            this.debugMessages.push(message);
        }
    }
}
