import { TaskFailure } from '../dispatch/task';

// Task-level failures. They never leave the Run: retryable ones are
// redispatched, the rest become a terminal task status.

export class TaskTimeoutError extends Error {
    readonly code = 'TASK_TIMEOUT';
    readonly retryable = true;

    constructor(public readonly taskId: string, timeoutMs: number) {
        super(`No reply for task ${taskId} within ${timeoutMs}ms`);
        this.name = 'TaskTimeoutError';
    }
}

export class TaskDeliveryError extends Error {
    readonly code = 'TASK_DELIVERY_FAILED';
    readonly retryable = true;

    constructor(public readonly taskId: string, topic: string, cause: unknown) {
        super(`Could not deliver task ${taskId} to ${topic}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'TaskDeliveryError';
    }
}

export class WorkerReplyError extends Error {
    readonly code = 'WORKER_ERROR';
    readonly retryable = true;

    constructor(public readonly taskId: string, sender: string, reason: string) {
        super(`${sender} reported an error: ${reason}`);
        this.name = 'WorkerReplyError';
    }
}

// Retrying cannot change an authorization decision.
export class UnauthorizedError extends Error {
    readonly code = 'UNAUTHORIZED';
    readonly retryable = false;

    constructor(public readonly recipient: string) {
        super(`${recipient} failed identity verification`);
        this.name = 'UnauthorizedError';
    }
}

export class AuthorizationCheckError extends Error {
    readonly code = 'AUTHORIZATION_ERROR';
    readonly retryable = false;

    constructor(public readonly recipient: string, cause: unknown) {
        super(`Could not verify ${recipient}: ${cause instanceof Error ? cause.message : String(cause)}`);
        this.name = 'AuthorizationCheckError';
    }
}

export type TaskFailureError =
    | TaskTimeoutError
    | TaskDeliveryError
    | WorkerReplyError
    | UnauthorizedError
    | AuthorizationCheckError;

export function toFailure(err: TaskFailureError): TaskFailure {
    return { code: err.code, message: err.message };
}
