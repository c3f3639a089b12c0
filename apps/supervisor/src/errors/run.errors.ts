export class InvalidRequestError extends Error {
    readonly code = 'INVALID_REQUEST';

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'InvalidRequestError';
    }
}

export class StreamConsumedError extends Error {
    readonly code = 'STREAM_CONSUMED';

    constructor(runId: string) {
        super(`Event stream for run ${runId} has already been consumed`);
        this.name = 'StreamConsumedError';
    }
}

export class StreamUnavailableError extends Error {
    readonly code = 'STREAM_UNAVAILABLE';

    constructor(runId: string) {
        super(`Run ${runId} was submitted in synchronous mode and has no event stream`);
        this.name = 'StreamUnavailableError';
    }
}
