import { TaskFailure } from '../dispatch/task';
import { AggregatedResult } from '../aggregation/types';

interface EventBase {
    runId: string;
    sessionId: string;
    at: Date;
}

export interface TaskCompletedEvent extends EventBase {
    type: 'task_completed';
    taskId: string;
    recipient: string;
    label: string;
    attempt: number;
    result: string;
    /** When the supervisor decoded the reply. */
    receivedAt: Date;
}

export interface TaskFailedEvent extends EventBase {
    type: 'task_failed';
    taskId: string;
    recipient: string;
    label: string;
    attempt: number;
    error: TaskFailure;
}

export interface RunCompletedEvent extends EventBase {
    type: 'run_completed';
    result: AggregatedResult;
}

/** Events a streaming caller sees, in completion order. */
export type RunEvent = TaskCompletedEvent | TaskFailedEvent | RunCompletedEvent;

export interface RunStartedEvent extends EventBase {
    type: 'run_started';
    mode: string;
    taskCount: number;
}

export interface TaskDispatchedEvent extends EventBase {
    type: 'task_dispatched';
    taskId: string;
    recipient: string;
    topic: string;
    attempt: number;
}

export interface TaskRetryingEvent extends EventBase {
    type: 'task_retrying';
    taskId: string;
    recipient: string;
    attempt: number;
    delayMs: number;
    error: TaskFailure;
}

export interface ReplyDiscardedEvent extends EventBase {
    type: 'reply_discarded';
    taskId: string;
    sender: string;
    attempt: number;
    receivedAt: Date;
    reason: string;
}

export type LifecycleEvent =
    | RunEvent
    | RunStartedEvent
    | TaskDispatchedEvent
    | TaskRetryingEvent
    | ReplyDiscardedEvent;

export type LifecycleEventType = LifecycleEvent['type'];
