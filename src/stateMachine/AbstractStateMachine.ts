// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

export abstract class AbstractStateMachine<S, O extends IStateMachineOptions> {
    protected state: S;
    protected readonly options: O;
    protected stateTransitions: Array<{ state: S; handler: () => Promise<void> | void }>;

    protected constructor(initialState: S, options: O) {
        this.state = initialState;
        this.options = options;
        this.stateTransitions = [];
    }

    /**
     * Runs every transition in `stateTransitions` in order, moving to the completion state at the end.
     * A failing handler moves the machine to the error state; the error is logged and rethrown as is.
     *
     * @return {Promise<void>} Resolves once all handlers have completed.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const failure = error instanceof Error ? error : new Error(String(error));
            this.transitionTo(this.getErrorState(), failure);
            this.handleError(failure);
        }
    }

    /**
     * Moves to `nextState`. Entering the error state logs which state failed; any other transition
     * is logged in verbose mode and advances the progress bar.
     *
     * @param {S} nextState - The next state to transition to.
     * @param {Error} [error] - The failure that caused a move to the error state.
     * @return {void}
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${this.state}": ${error.message}`);
            this.state = this.getErrorState();
            return;
        }
        if (this.options.verbose) {
            logger.debug(`STATE :: Transitioning from state "${this.state}" -> "${nextState}"`);
        }
        this.options.progressBar?.increment({ state: nextState });
        this.state = nextState;
    }

    /**
     * Stops the progress bar, if any, and rethrows `error`.
     *
     * @param {Error} error - The error that ended the run.
     * @return {never}
     */
    protected handleError(error: Error): never {
        this.options.progressBar?.stop();
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
