// tests/helpers/mockLogger.ts

import type { ILogger } from '../../src/@types';

export class MockLogger implements ILogger {
    infoMessages: string[] = [];
    warnMessages: string[] = [];
    successMessages: string[] = [];
    debugMessages: string[] = [];
    errorMessages: string[] = [];
    verbose: boolean;

    constructor(verbose: boolean = false) {
        this.verbose = verbose;
    }

    info(message: string): void {
        this.infoMessages.push(message);
    }
    success(message: string): void {
        this.successMessages.push(message);
    }
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
