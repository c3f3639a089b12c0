import { agentTopic, Subscription, Transport } from './transport';
import { CapabilityContext, Envelope, ReplyMessage, TaskAssignment, TaskMessage, WorkerCapability } from './types';
import { decodeMessage, encodeMessage } from './utils/serialization';

const TAG = '[worker]';

export interface WorkerAgentConfig {
    name: string;
    transport: Transport;
    capability: WorkerCapability;
    /** Broadcast topics this agent also listens on. */
    groups?: string[];
}

/**
 * Stateless agent: receives task messages on its own topic (and any group
 * topics), runs its capability once per assignment addressed to it, and
 * replies on the message's replyTo topic.
 *
 * No deduplication is done: a retried taskId is simply processed again.
 */
export class WorkerAgent {
    readonly name: string;
    private readonly transport: Transport;
    private readonly capability: WorkerCapability;
    private readonly groups: string[];
    private subscriptions: Subscription[] = [];
    private running = false;
    private handled = 0;

    constructor(config: WorkerAgentConfig) {
        this.name = config.name;
        this.transport = config.transport;
        this.capability = config.capability;
        this.groups = config.groups ?? [];
    }

    async start(): Promise<void> {
        if (this.running) {
            console.warn(`${TAG} ${this.name} already running`);
            return;
        }
        this.running = true;

        const topics = [agentTopic(this.name), ...this.groups];
        for (const topic of topics) {
            this.subscriptions.push(
                await this.transport.subscribe(topic, (message) => this.onMessage(message)),
            );
        }
        console.log(`${TAG} ${this.name} listening on ${topics.join(', ')}`);
    }

    async stop(): Promise<void> {
        this.running = false;
        const subs = this.subscriptions;
        this.subscriptions = [];
        await Promise.all(subs.map((sub) => sub.unsubscribe()));
        console.log(`${TAG} ${this.name} stopped`);
    }

    isRunning(): boolean {
        return this.running;
    }

    get handledCount(): number {
        return this.handled;
    }

    private onMessage(raw: string): void {
        if (!this.running) return;

        let message: Envelope;
        try {
            message = decodeMessage(raw);
        } catch (err) {
            console.error(`${TAG} ${this.name} dropped undecodable message:`, err);
            return;
        }
        if (message.type !== 'task') return;

        for (const assignment of message.assignments) {
            if (assignment.recipient !== this.name) continue;
            this.handle(message, assignment).catch(
                err => console.error(`${TAG} ${this.name} task ${assignment.taskId} handler error:`, err),
            );
        }
    }

    private async handle(message: TaskMessage, assignment: TaskAssignment): Promise<void> {
        const ctx: CapabilityContext = {
            taskId: assignment.taskId,
            runId: message.runId,
            sessionId: message.sessionId,
            attempt: assignment.attempt,
        };
        const base = {
            type: 'reply' as const,
            runId: message.runId,
            sessionId: message.sessionId,
            taskId: assignment.taskId,
            sender: this.name,
            attempt: assignment.attempt,
        };

        let reply: ReplyMessage;
        try {
            const body = await this.capability(message.payload, ctx);
            reply = { ...base, ok: true, body };
        } catch (err) {
            console.error(`${TAG} ${this.name} task ${assignment.taskId} (attempt ${assignment.attempt}) failed:`, err);
            reply = { ...base, ok: false, error: err instanceof Error ? err.message : String(err) };
        }
        this.handled++;

        try {
            await this.transport.publish(message.replyTo, encodeMessage(reply));
        } catch (err) {
            console.error(`${TAG} ${this.name} could not reply for task ${assignment.taskId}:`, err);
        }
    }
}
