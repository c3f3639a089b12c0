import { decodeMessage, Envelope, replyTopic, Subscription, Transport } from '@switchyard/sdk';
import { v7 as uuidv7 } from 'uuid';
import { AggregatedResult, Summarizer } from '../aggregation';
import { allowAll, Authorizer } from '../auth/authorizer';
import { Decomposer, DispatchPlan } from '../decomposition/types';
import { InvalidRequestError } from '../errors/run.errors';
import { emitSafely, EventSink, noopSink } from '../observability/event-sink';
import { RunEvent } from '../observability/events';
import { BackoffPolicy, fixedBackoff } from '../utils/backoff';
import { Run } from './run';
import { RunHandle, RunRequest, SubmitOptions } from './types';

const TAG = '[supervisor]';

export interface SupervisorConfig {
    /** Unique per process; names the reply topic. */
    instanceId?: string;
    maxAttempts?: number;
    taskTimeoutMs?: number;
    runDeadlineMs?: number;
    dispatchStaggerMs?: number;
    backoff?: BackoffPolicy;
}

export interface SupervisorDeps {
    transport: Transport;
    decomposer: Decomposer;
    summarizer: Summarizer;
    authorizer?: Authorizer;
    sink?: EventSink;
}

/**
 * Accepts prompts, turns each into a Run and routes worker replies back to
 * the Run that owns the task. Runs never share state.
 */
export class Supervisor {
    readonly instanceId: string;
    private readonly topic: string;
    private readonly active = new Map<string, Run>();
    private readonly handles = new WeakMap<RunHandle, Run>();
    private subscription: Subscription | null = null;
    private running = false;

    private readonly maxAttempts: number;
    private readonly taskTimeoutMs: number;
    private readonly runDeadlineMs: number;
    private readonly dispatchStaggerMs: number;
    private readonly backoff: BackoffPolicy;
    private readonly authorizer: Authorizer;
    private readonly sink: EventSink;

    constructor(config: SupervisorConfig, private readonly deps: SupervisorDeps) {
        this.instanceId = config.instanceId ?? uuidv7();
        this.topic = replyTopic(this.instanceId);
        this.maxAttempts = config.maxAttempts ?? 3;
        this.taskTimeoutMs = config.taskTimeoutMs ?? 30000;
        this.runDeadlineMs = config.runDeadlineMs ?? 120000;
        this.dispatchStaggerMs = config.dispatchStaggerMs ?? 0;
        this.backoff = config.backoff ?? fixedBackoff(1000);
        this.authorizer = deps.authorizer ?? allowAll;
        this.sink = deps.sink ?? noopSink;

        if (this.maxAttempts < 1) {
            throw new Error(`${TAG} maxAttempts must be at least 1, got ${this.maxAttempts}`);
        }
    }

    async start(): Promise<void> {
        if (this.running) {
            console.warn(`${TAG} already running`);
            return;
        }
        this.subscription = await this.deps.transport.subscribe(this.topic, (message) => this.onReply(message));
        this.running = true;
        console.log(`${TAG} ${this.instanceId} listening for replies on ${this.topic} (${this.deps.transport.name})`);
    }

    async stop(): Promise<void> {
        this.running = false;
        const runs = Array.from(this.active.values());
        for (const run of runs) {
            run.cancel({ code: 'SUPERVISOR_STOPPED', message: 'Supervisor stopped before the run completed' });
        }
        await Promise.all(runs.map(run => run.result()));

        const sub = this.subscription;
        this.subscription = null;
        if (sub) await sub.unsubscribe();
        console.log(`${TAG} ${this.instanceId} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    get activeRuns(): number {
        return this.active.size;
    }

    async submit(request: RunRequest, options: SubmitOptions = {}): Promise<RunHandle> {
        const prompt = typeof request.prompt === 'string' ? request.prompt.trim() : '';
        if (!prompt) {
            throw new InvalidRequestError('Prompt must be a non-empty string.');
        }
        if (!this.running) {
            throw new Error(`${TAG} not started`);
        }

        let plan: DispatchPlan;
        try {
            plan = await this.deps.decomposer.decompose({ ...request, prompt });
        } catch (err) {
            if (err instanceof InvalidRequestError) throw err;
            throw new InvalidRequestError(
                `Could not plan the request: ${err instanceof Error ? err.message : String(err)}`,
                { cause: err },
            );
        }
        if (plan.tasks.length === 0) {
            throw new InvalidRequestError('The request produced no tasks to dispatch.');
        }

        const run = new Run(
            {
                runId: uuidv7(),
                sessionId: options.sessionId ?? uuidv7(),
                mode: options.mode ?? 'synchronous',
                plan,
            },
            {
                maxAttempts: this.maxAttempts,
                taskTimeoutMs: this.taskTimeoutMs,
                runDeadlineMs: this.runDeadlineMs,
                dispatchStaggerMs: this.dispatchStaggerMs,
                backoff: this.backoff,
            },
            {
                transport: this.deps.transport,
                authorizer: this.authorizer,
                summarizer: this.deps.summarizer,
                sink: this.sink,
                replyTo: this.topic,
                onSettled: (settled) => this.active.delete(settled.runId),
            },
        );

        this.active.set(run.runId, run);
        this.handles.set(run, run);
        console.log(`${TAG} run ${run.runId} submitted: ${run.taskCount} task(s), ${run.mode}`);
        run.start();
        return run;
    }

    awaitResult(handle: RunHandle): Promise<AggregatedResult> {
        return this.lookup(handle).result();
    }

    stream(handle: RunHandle): AsyncIterable<RunEvent> {
        return this.lookup(handle).events();
    }

    /** Submit and wait; invalid requests come back as an INVALID_REQUEST result. */
    async run(request: RunRequest, options: SubmitOptions = {}): Promise<AggregatedResult> {
        let handle: RunHandle;
        try {
            handle = await this.submit(request, { ...options, mode: 'synchronous' });
        } catch (err) {
            if (!(err instanceof InvalidRequestError)) throw err;
            return {
                runId: '',
                sessionId: options.sessionId ?? '',
                status: 'error',
                partial: false,
                response: err.message,
                tasks: [],
                error: { code: err.code, message: err.message },
            };
        }
        return this.awaitResult(handle);
    }

    private lookup(handle: RunHandle): Run {
        const run = this.handles.get(handle);
        if (!run) {
            throw new Error(`${TAG} run ${handle.runId} was not submitted to this supervisor`);
        }
        return run;
    }

    private onReply(raw: string): void {
        let message: Envelope;
        try {
            message = decodeMessage(raw);
        } catch (err) {
            console.error(`${TAG} dropped undecodable reply:`, err);
            return;
        }
        if (message.type !== 'reply') return;
        const receivedAt = new Date();

        const run = this.active.get(message.runId);
        if (!run) {
            console.warn(`${TAG} reply for unknown or finished run ${message.runId} (task ${message.taskId}) discarded`);
            void emitSafely(this.sink, {
                type: 'reply_discarded',
                runId: message.runId,
                sessionId: message.sessionId,
                at: new Date(),
                taskId: message.taskId,
                sender: message.sender,
                attempt: message.attempt,
                receivedAt,
                reason: 'unknown run',
            });
            return;
        }
        run.handleReply(message, receivedAt);
    }
}
