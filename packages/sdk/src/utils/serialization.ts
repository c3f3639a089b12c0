import superjson from 'superjson';
import { Envelope, ReplyMessage, TaskAssignment, TaskMessage } from '../types';

const MAX_PAYLOAD_SIZE = 1024 * 1024; // 1MB

export class SerializationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SerializationError';
    }
}

export function serialize(value: unknown): string {
    if (value === undefined) return '';

    try {
        const stringified = superjson.stringify(value);

        if (Buffer.byteLength(stringified) > MAX_PAYLOAD_SIZE) {
            throw new SerializationError(
                `Payload size exceeds maximum limit of 1MB. Current size: ${(Buffer.byteLength(stringified) / 1024 / 1024).toFixed(2)}MB`
            );
        }

        return stringified;
    } catch (err) {
        if (err instanceof SerializationError) throw err;
        throw new SerializationError(`Failed to serialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

export function deserialize<T>(value: string | null | undefined): T | undefined {
    if (!value || value.trim() === '') return undefined;

    try {
        return superjson.parse<T>(value);
    } catch (err) {
        throw new SerializationError(`Failed to deserialize data: ${err instanceof Error ? err.message : String(err)}`);
    }
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAssignment(value: unknown): value is TaskAssignment {
    return isRecord(value)
        && typeof value.taskId === 'string'
        && typeof value.recipient === 'string'
        && typeof value.attempt === 'number';
}

export function isTaskMessage(value: unknown): value is TaskMessage {
    return isRecord(value)
        && value.type === 'task'
        && typeof value.runId === 'string'
        && typeof value.sessionId === 'string'
        && typeof value.replyTo === 'string'
        && typeof value.payload === 'string'
        && Array.isArray(value.assignments)
        && value.assignments.every(isAssignment);
}

export function isReplyMessage(value: unknown): value is ReplyMessage {
    if (!isRecord(value)) return false;
    if (value.type !== 'reply'
        || typeof value.runId !== 'string'
        || typeof value.sessionId !== 'string'
        || typeof value.taskId !== 'string'
        || typeof value.sender !== 'string'
        || typeof value.attempt !== 'number') {
        return false;
    }
    if (value.ok === true) return typeof value.body === 'string';
    if (value.ok === false) return typeof value.error === 'string';
    return false;
}

export function encodeMessage(message: Envelope): string {
    return serialize(message);
}

// Rejects anything that is not a well-formed task or reply envelope.
export function decodeMessage(raw: string): Envelope {
    const value = deserialize<unknown>(raw);
    if (isTaskMessage(value) || isReplyMessage(value)) return value;
    throw new SerializationError('Message is not a task or reply envelope');
}
