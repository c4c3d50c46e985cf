// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions, R> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    get currentState(): S {
        return this.state;
    }

    /**
     * Executes the state transitions defined in `stateTransitions` in order and returns the machine's result.
     * Optionally updates a progress bar if enabled in the options.
     * On failure the machine moves to its error state, logs the failing state and rethrows.
     *
     * @return {Promise<R>} The result produced once every handler has completed.
     */
    async run(): Promise<R> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.bind(this)();
            }
            this.transitionTo(this.getCompletionState());
            return this.getResult();
        } catch (error) {
            return this.handleError(error instanceof Error ? error : new Error(String(error)));
        }
    }

    /**
     * Moves to the next state. Logs the transition when verbose and advances the progress bar.
     *
     * @param {S} nextState - The next state to transition to.
     * @return {void}
     */
    protected transitionTo(nextState: S): void {
        const { logger, verbose, progressBar } = this.options;
        if (verbose) {
            logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
        }
        progressBar?.increment({ state: nextState });
        this.state = nextState;
    }

    /**
     * Returns a value produced by an earlier state, failing when that state has not produced it.
     *
     * @param {T | null} value - The value to check.
     * @param {string} description - What the value is, for the error message.
     * @return {T} The non-null value.
     */
    protected requireState<T>(value: T | null, description: string): T {
        if (value === null) {
            throw new Error(`${description} is not available in state "${this.state}".`);
        }
        return value;
    }

    /**
     * Logs the failing state, moves to the error state and re-throws the error.
     *
     * @param {Error} error - The error object that needs to be handled.
     * @return {never}
     */
    protected handleError(error: Error): never {
        const { logger, progressBar } = this.options;
        const failedState = this.state;
        this.state = this.getErrorState();
        if (progressBar) {
            progressBar.stop();
            console.error(`\n\nFailed reason :: ${failedState} failed: ${error.message}`);
        } else {
            logger.error(`Error occurred during "${failedState}": ${error.message}`);
        }
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
    protected abstract getResult(): R;
}
