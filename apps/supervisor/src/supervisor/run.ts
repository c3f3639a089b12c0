import { encodeMessage, ReplyMessage, TaskAssignment, TaskMessage, Transport } from '@switchyard/sdk';
import { v7 as uuidv7 } from 'uuid';
import { aggregate, AggregatedResult, RunFailure, Summarizer, toOutcome } from '../aggregation';
import { Authorizer } from '../auth/authorizer';
import { DispatchPlan, FailureTolerance } from '../decomposition/types';
import { DispatchTable } from '../dispatch/dispatch-table';
import { Task, TaskFailure, taskStatus } from '../dispatch/task';
import {
    AuthorizationCheckError,
    TaskDeliveryError,
    TaskFailureError,
    TaskTimeoutError,
    toFailure,
    UnauthorizedError,
    WorkerReplyError,
} from '../errors/task.errors';
import { StreamConsumedError, StreamUnavailableError } from '../errors/run.errors';
import { emitSafely, EventSink } from '../observability/event-sink';
import { LifecycleEvent, RunEvent } from '../observability/events';
import { BackoffPolicy } from '../utils/backoff';
import { AsyncEventQueue } from './event-queue';
import { RunHandle, RunMode, runState } from './types';

const TAG = '[run]';

export interface RunSettings {
    maxAttempts: number;
    taskTimeoutMs: number;
    runDeadlineMs: number;
    /** Delay between initial dispatches; 0 sends everything at once. */
    dispatchStaggerMs: number;
    backoff: BackoffPolicy;
}

export interface RunDeps {
    transport: Transport;
    authorizer: Authorizer;
    summarizer: Summarizer;
    sink: EventSink;
    /** Topic workers reply on. */
    replyTo: string;
    onSettled?: (run: Run) => void;
}

export interface RunInit {
    runId: string;
    sessionId: string;
    mode: RunMode;
    plan: DispatchPlan;
}

// Tasks that can share one message: same topic, same payload.
function groupForDelivery(tasks: Task[]): Task[][] {
    const groups = new Map<string, Task[]>();
    for (const task of tasks) {
        const key = `${task.target.topic}\u0000${task.payload}`;
        const group = groups.get(key);
        if (group) group.push(task);
        else groups.set(key, [task]);
    }
    return Array.from(groups.values());
}

/**
 * One prompt's worth of work. Owns its dispatch table, timers and event
 * stream; every mutation happens on the event loop in response to a timer,
 * a publish outcome or a routed reply.
 */
export class Run implements RunHandle {
    readonly runId: string;
    readonly sessionId: string;
    readonly mode: RunMode;
    readonly taskCount: number;

    private status = runState.ACTIVE;
    private closed = false;
    private streamTaken = false;
    private readonly table = new DispatchTable();
    private readonly tolerance: FailureTolerance;
    private readonly timers = new Map<string, NodeJS.Timeout>();
    private readonly waits = new Set<() => void>();
    private deadlineTimer: NodeJS.Timeout | null = null;
    private readonly queue = new AsyncEventQueue<RunEvent>();
    private readonly completion: Promise<AggregatedResult>;
    private resolveCompletion: (result: AggregatedResult) => void = () => undefined;

    constructor(init: RunInit, private readonly settings: RunSettings, private readonly deps: RunDeps) {
        this.runId = init.runId;
        this.sessionId = init.sessionId;
        this.mode = init.mode;
        this.tolerance = init.plan.tolerance;
        this.taskCount = init.plan.tasks.length;
        this.completion = new Promise<AggregatedResult>(resolve => {
            this.resolveCompletion = resolve;
        });

        for (const planned of init.plan.tasks) {
            this.table.put({
                id: uuidv7(),
                runId: this.runId,
                label: planned.label,
                target: planned.target,
                payload: planned.payload,
                attempt: 0,
                maxAttempts: settings.maxAttempts,
                status: taskStatus.PENDING,
            });
        }
    }

    get state(): runState {
        return this.status;
    }

    start(): void {
        this.emit({ ...this.base(), type: 'run_started', mode: this.mode, taskCount: this.taskCount });
        this.deadlineTimer = setTimeout(() => {
            console.warn(`${TAG} ${this.runId} deadline of ${this.settings.runDeadlineMs}ms reached`);
            this.close({
                code: 'RUN_DEADLINE_EXCEEDED',
                message: `Run did not complete within ${this.settings.runDeadlineMs}ms`,
            });
        }, this.settings.runDeadlineMs);

        this.dispatchInitial().catch(
            err => console.error(`${TAG} ${this.runId} initial dispatch failed:`, err),
        );
    }

    result(): Promise<AggregatedResult> {
        return this.completion;
    }

    events(): AsyncIterable<RunEvent> {
        if (this.mode !== 'streaming') throw new StreamUnavailableError(this.runId);
        if (this.streamTaken) throw new StreamConsumedError(this.runId);
        this.streamTaken = true;
        return this.queue;
    }

    cancel(failure: RunFailure): void {
        this.close(failure);
    }

    handleReply(reply: ReplyMessage, receivedAt: Date = new Date()): void {
        if (this.closed) return this.discard(reply, receivedAt, 'run is closed');

        const task = this.table.get(reply.taskId);
        if (!task) return this.discard(reply, receivedAt, 'unknown task');
        if (task.status !== taskStatus.IN_FLIGHT) return this.discard(reply, receivedAt, `task is ${task.status}`);
        if (reply.sender !== task.target.recipient) {
            return this.discard(reply, receivedAt, `expected reply from ${task.target.recipient}`);
        }

        if (!reply.ok) {
            // A failure from an earlier attempt says nothing about the one in flight.
            if (reply.attempt !== task.attempt) return this.discard(reply, receivedAt, `stale failure from attempt ${reply.attempt}`);
            this.fail(task.id, task.attempt, new WorkerReplyError(task.id, reply.sender, reply.error));
            return;
        }

        this.clearTimer(task.id);
        const done = this.table.transition(task.id, taskStatus.SUCCEEDED, {
            result: reply.body,
            receivedAt,
            completedAt: new Date(),
        });
        this.publish({
            ...this.base(),
            type: 'task_completed',
            taskId: done.id,
            recipient: done.target.recipient,
            label: done.label,
            attempt: done.attempt,
            result: reply.body,
            receivedAt,
        });
        this.checkCompletion();
    }

    private async dispatchInitial(): Promise<void> {
        const tasks = this.table.tasks();
        const denials = await Promise.all(tasks.map(task => this.authorize(task)));
        if (this.closed) return;

        const authorized: Task[] = [];
        tasks.forEach((task, idx) => {
            const denial = denials[idx];
            if (denial) {
                console.warn(`${TAG} ${this.runId} ${denial.message}`);
                this.finalize(task.id, taskStatus.FAILED, toFailure(denial));
            } else {
                authorized.push(task);
            }
        });

        if (this.settings.dispatchStaggerMs > 0) {
            for (const [idx, task] of authorized.entries()) {
                if (idx > 0) await this.wait(this.settings.dispatchStaggerMs);
                if (this.closed) return;
                this.dispatchIds([task.id]);
            }
        } else {
            for (const group of groupForDelivery(authorized)) {
                this.dispatchIds(group.map(t => t.id));
            }
        }
        this.checkCompletion();
    }

    private async authorize(task: Task): Promise<TaskFailureError | null> {
        const recipient = task.target.recipient;
        try {
            const allowed = await this.deps.authorizer.authorize(recipient);
            return allowed ? null : new UnauthorizedError(recipient);
        } catch (err) {
            return new AuthorizationCheckError(recipient, err);
        }
    }

    private dispatchIds(ids: string[]): void {
        if (this.closed || ids.length === 0) return;

        const dispatchedAt = new Date();
        const assignments: TaskAssignment[] = [];
        let topic = '';
        let payload = '';
        for (const id of ids) {
            const current = this.table.get(id);
            if (!current) continue;
            const task = this.table.transition(id, taskStatus.IN_FLIGHT, { attempt: current.attempt + 1, dispatchedAt });
            topic = task.target.topic;
            payload = task.payload;
            assignments.push({ taskId: task.id, recipient: task.target.recipient, attempt: task.attempt });
            this.armTimeout(task);
            this.emit({
                ...this.base(),
                type: 'task_dispatched',
                taskId: task.id,
                recipient: task.target.recipient,
                topic,
                attempt: task.attempt,
            });
        }
        if (assignments.length === 0) return;

        const message: TaskMessage = {
            type: 'task',
            runId: this.runId,
            sessionId: this.sessionId,
            replyTo: this.deps.replyTo,
            payload,
            assignments,
        };
        Promise.resolve()
            .then(() => this.deps.transport.publish(topic, encodeMessage(message)))
            .catch(err => {
                for (const a of assignments) {
                    this.fail(a.taskId, a.attempt, new TaskDeliveryError(a.taskId, topic, err));
                }
            });
    }

    private armTimeout(task: Task): void {
        const timeoutMs = this.settings.taskTimeoutMs;
        this.setTimer(task.id, () => this.fail(task.id, task.attempt, new TaskTimeoutError(task.id, timeoutMs)), timeoutMs);
    }

    private fail(taskId: string, attempt: number, err: TaskFailureError): void {
        if (this.closed) return;
        const task = this.table.get(taskId);
        // Only the attempt currently in flight can fail.
        if (!task || task.status !== taskStatus.IN_FLIGHT || task.attempt !== attempt) return;

        this.clearTimer(taskId);
        const failure = toFailure(err);

        if (err.retryable && task.attempt < task.maxAttempts) {
            this.table.transition(taskId, taskStatus.PENDING, { lastError: failure });
            const delayMs = this.settings.backoff.delay(task.attempt);
            console.warn(`${TAG} ${this.runId} task ${taskId} attempt ${attempt}/${task.maxAttempts} failed (${failure.code}), retrying in ${delayMs}ms`);
            this.emit({
                ...this.base(),
                type: 'task_retrying',
                taskId,
                recipient: task.target.recipient,
                attempt,
                delayMs,
                error: failure,
            });
            this.setTimer(taskId, () => this.retry(taskId), delayMs);
            return;
        }

        this.finalize(taskId, err.code === 'TASK_TIMEOUT' ? taskStatus.TIMED_OUT : taskStatus.FAILED, failure);
        this.checkCompletion();
    }

    private retry(taskId: string): void {
        const task = this.table.get(taskId);
        if (this.closed || !task || task.status !== taskStatus.PENDING) return;
        this.dispatchIds([taskId]);
    }

    private finalize(taskId: string, next: taskStatus.FAILED | taskStatus.TIMED_OUT, failure: TaskFailure): void {
        const task = this.table.transition(taskId, next, { error: failure, completedAt: new Date() });
        console.error(`${TAG} ${this.runId} task ${taskId} (${task.label}) ${next} after ${task.attempt} attempt(s): ${failure.message}`);
        this.publish({
            ...this.base(),
            type: 'task_failed',
            taskId,
            recipient: task.target.recipient,
            label: task.label,
            attempt: task.attempt,
            error: failure,
        });
    }

    private checkCompletion(): void {
        if (!this.closed && this.table.allTerminal()) this.close();
    }

    private close(interruption?: RunFailure): void {
        if (this.closed) return;
        this.closed = true;
        this.status = runState.AGGREGATING;

        if (this.deadlineTimer) clearTimeout(this.deadlineTimer);
        this.deadlineTimer = null;
        for (const timer of this.timers.values()) clearTimeout(timer);
        this.timers.clear();
        for (const release of Array.from(this.waits)) release();
        this.waits.clear();

        this.finish(interruption).catch(err => console.error(`${TAG} ${this.runId} failed to settle:`, err));
    }

    private async finish(interruption?: RunFailure): Promise<void> {
        let result: AggregatedResult;
        try {
            result = await aggregate({
                runId: this.runId,
                sessionId: this.sessionId,
                tasks: this.table.tasks(),
                tolerance: this.tolerance,
                summarizer: this.deps.summarizer,
                interruption,
            });
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            result = {
                runId: this.runId,
                sessionId: this.sessionId,
                status: 'error',
                partial: false,
                response: `Failed to aggregate results: ${message}`,
                tasks: this.table.tasks().map(toOutcome),
                error: { code: 'AGGREGATION_FAILED', message },
            };
        }

        this.status = result.status === 'complete' ? runState.COMPLETE : runState.ERROR;
        this.publish({ ...this.base(), type: 'run_completed', result });
        this.queue.close();
        console.log(`${TAG} ${this.runId} ${this.status}${result.error ? ` (${result.error.code})` : ''}`);
        this.resolveCompletion(result);
        this.deps.onSettled?.(this);
    }

    private discard(reply: ReplyMessage, receivedAt: Date, reason: string): void {
        console.warn(`${TAG} ${this.runId} discarded reply for task ${reply.taskId} from ${reply.sender}: ${reason}`);
        this.emit({
            ...this.base(),
            type: 'reply_discarded',
            taskId: reply.taskId,
            sender: reply.sender,
            attempt: reply.attempt,
            receivedAt,
            reason,
        });
    }

    // Stream-visible events also go to the sink.
    private publish(event: RunEvent): void {
        if (this.mode === 'streaming') this.queue.push(event);
        this.emit(event);
    }

    private emit(event: LifecycleEvent): void {
        void emitSafely(this.deps.sink, event);
    }

    private base(): { runId: string; sessionId: string; at: Date } {
        return { runId: this.runId, sessionId: this.sessionId, at: new Date() };
    }

    private setTimer(taskId: string, fn: () => void, ms: number): void {
        this.clearTimer(taskId);
        this.timers.set(taskId, setTimeout(() => {
            this.timers.delete(taskId);
            fn();
        }, ms));
    }

    private clearTimer(taskId: string): void {
        const timer = this.timers.get(taskId);
        if (timer) clearTimeout(timer);
        this.timers.delete(taskId);
    }

    private wait(ms: number): Promise<void> {
        return new Promise<void>(resolve => {
            const release = (): void => {
                clearTimeout(timer);
                this.waits.delete(release);
                resolve();
            };
            const timer = setTimeout(release, ms);
            this.waits.add(release);
        });
    }
}
