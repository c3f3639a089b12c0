/**
 * Lifecycle states for dispatched tasks.
 * Tasks progress: PENDING → IN_FLIGHT → SUCCEEDED/FAILED/TIMED_OUT,
 * dropping back to PENDING while a retry is scheduled.
 */
export enum taskStatus {
    PENDING = 'pending',
    IN_FLIGHT = 'in_flight',
    SUCCEEDED = 'succeeded',
    FAILED = 'failed',
    TIMED_OUT = 'timed_out',
}

const TERMINAL: ReadonlySet<taskStatus> = new Set([
    taskStatus.SUCCEEDED,
    taskStatus.FAILED,
    taskStatus.TIMED_OUT,
]);

export function isTerminal(status: taskStatus): boolean {
    return TERMINAL.has(status);
}

export type TaskTarget =
    | { kind: 'unicast'; recipient: string; topic: string }
    | { kind: 'broadcast'; group: string; topic: string; recipient: string; recipients: string[] };

export type TaskFailureCode =
    | 'TASK_TIMEOUT'
    | 'TASK_DELIVERY_FAILED'
    | 'WORKER_ERROR'
    | 'UNAUTHORIZED'
    | 'AUTHORIZATION_ERROR';

export interface TaskFailure {
    code: TaskFailureCode;
    message: string;
}

/**
 * One unit of work addressed to exactly one worker.
 * Owned by a single Run; only that Run's dispatch loop mutates it.
 */
export interface Task {
    id: string;
    runId: string;
    /** Human label used in aggregated output: a farm, a URL, a logistics step. */
    label: string;
    target: TaskTarget;
    payload: string;
    attempt: number;
    maxAttempts: number;
    status: taskStatus;
    result?: string;
    error?: TaskFailure;
    lastError?: TaskFailure;
    dispatchedAt?: Date;
    receivedAt?: Date;
    completedAt?: Date;
}
