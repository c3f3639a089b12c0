// Messages exchanged between a supervisor and its worker agents.
// Every message is correlated by runId + taskId; the supervisor never
// relies on delivery order.

export interface TaskAssignment {
    taskId: string;
    recipient: string;
    attempt: number;
}

/**
 * A unit of work published to a worker topic. Unicast messages carry one
 * assignment; broadcast messages list every recipient they address.
 */
export interface TaskMessage {
    type: 'task';
    runId: string;
    sessionId: string;
    replyTo: string;
    payload: string;
    assignments: TaskAssignment[];
}

interface ReplyBase {
    type: 'reply';
    runId: string;
    /** Echoed from the task message so a late reply still names its session. */
    sessionId: string;
    taskId: string;
    sender: string;
    attempt: number;
}

export interface SuccessReply extends ReplyBase {
    ok: true;
    body: string;
}

export interface FailureReply extends ReplyBase {
    ok: false;
    error: string;
}

export type ReplyMessage = SuccessReply | FailureReply;

export type Envelope = TaskMessage | ReplyMessage;

export interface CapabilityContext {
    taskId: string;
    runId: string;
    sessionId: string;
    attempt: number;
}

// The external work a worker performs: scrape, estimate, fulfil...
export type WorkerCapability = (payload: string, ctx: CapabilityContext) => Promise<string>;
