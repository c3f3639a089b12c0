import { TaskFailure, taskStatus } from '../dispatch/task';

export type RunErrorCode =
    | 'INVALID_REQUEST'
    | 'ALL_TASKS_FAILED'
    | 'REQUIRED_TASK_FAILED'
    | 'RUN_DEADLINE_EXCEEDED'
    | 'AGGREGATION_FAILED'
    | 'SUPERVISOR_STOPPED';

export interface RunFailure {
    code: RunErrorCode;
    message: string;
}

export interface TaskOutcome {
    taskId: string;
    recipient: string;
    label: string;
    status: taskStatus;
    attempts: number;
    result?: string;
    error?: TaskFailure;
    receivedAt?: Date;
}

export interface AggregatedResult {
    runId: string;
    sessionId: string;
    status: 'complete' | 'error';
    /** True when the run closed before every task reached a terminal state. */
    partial: boolean;
    response: string;
    tasks: TaskOutcome[];
    error?: RunFailure;
}

export interface SummaryItem {
    label: string;
    recipient: string;
    text: string;
}

// LLM-backed in production; must not be handed failed tasks.
export interface Summarizer {
    merge(items: SummaryItem[]): Promise<string>;
}
