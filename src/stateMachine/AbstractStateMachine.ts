// src/stateMachine/AbstractStateMachine.ts

import type { ILogger, IProgressBar } from '../@types/index.ts';

interface IStateMachineOptions {
    logger: ILogger;
    verbose: boolean;
    progressBar?: IProgressBar;
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
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

    get currentState(): S {
        return this.state;
    }

    /**
     * Runs every transition in `stateTransitions` in order, updating the state
     * and the optional progress bar before each handler. A failing handler moves
     * the machine to the error state; the error is logged and re-thrown.
     */
    async run(): Promise<void> {
        try {
            for (const transition of this.stateTransitions) {
                this.transitionTo(transition.state);
                await transition.handler.call(this);
            }
            this.transitionTo(this.getCompletionState());
        } catch (error) {
            const err = toError(error);
            this.transitionTo(this.getErrorState(), err);
            this.handleError(err);
        }
    }

    /**
     * Moves to `nextState`. Entering the error state with an error logs it;
     * other transitions are logged at debug level when verbose.
     */
    protected transitionTo(nextState: S, error?: Error): void {
        const { logger } = this.options;
        if (nextState === this.getErrorState() && error) {
            logger.error(`Error occurred during "${String(this.state)}": ${error.message}`);
            this.state = nextState;
            return;
        }
        if (this.options.verbose) {
            logger.debug(`STATE :: Transitioning from state "${String(this.state)}" -> "${String(nextState)}"`);
        }
        this.options.progressBar?.increment({ state: nextState });
        this.state = nextState;
    }

    /**
     * Re-throws the error that stopped the machine, after stopping the progress bar.
     */
    protected handleError(error: Error): never {
        this.options.progressBar?.stop();
        throw error;
    }

    protected abstract getCompletionState(): S;
    protected abstract getErrorState(): S;
}
