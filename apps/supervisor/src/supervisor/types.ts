export enum runState {
    ACTIVE = 'active',
    AGGREGATING = 'aggregating',
    COMPLETE = 'complete',
    ERROR = 'error',
}

export type RunMode = 'synchronous' | 'streaming';

export interface RunRequest {
    prompt: string;
    /** Extra sources to process alongside any found in the prompt. */
    urls?: string[];
}

export interface SubmitOptions {
    mode?: RunMode;
    sessionId?: string;
}

export interface RunHandle {
    readonly runId: string;
    readonly sessionId: string;
    readonly mode: RunMode;
    readonly taskCount: number;
    readonly state: runState;
}
