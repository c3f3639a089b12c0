import {
    serialize,
    deserialize,
    encodeMessage,
    decodeMessage,
    isReplyMessage,
    SerializationError,
} from '../src/utils/serialization';
import { ReplyMessage, TaskMessage } from '../src/types';

describe('Serialization Utils', () => {
    test('should keep dates and maps intact', () => {
        const date = new Date('2026-01-02T03:04:05.000Z');
        const map = new Map([['colombia', 5000]]);

        const output = deserialize<{ date: Date; map: Map<string, number> }>(serialize({ date, map }));

        expect(output?.date).toBeInstanceOf(Date);
        expect(output?.date.toISOString()).toBe('2026-01-02T03:04:05.000Z');
        expect(output?.map.get('colombia')).toBe(5000);
    });

    test('should enforce 1MB size limit', () => {
        const largeString = 'a'.repeat(1024 * 1024 + 1);
        expect(() => serialize(largeString)).toThrow(SerializationError);
        expect(() => serialize(largeString)).toThrow(/Payload size exceeds maximum limit/);
    });

    test('should handle undefined', () => {
        expect(serialize(undefined)).toBe('');
        expect(deserialize('')).toBeUndefined();
    });
});

describe('message envelopes', () => {
    const task: TaskMessage = {
        type: 'task',
        runId: 'run-1',
        sessionId: 'session-1',
        replyTo: 'supervisor.test.replies',
        payload: 'How much coffee does the Colombia farm have?',
        assignments: [{ taskId: 'task-1', recipient: 'colombia', attempt: 1 }],
    };

    test('decodes an encoded task message', () => {
        expect(decodeMessage(encodeMessage(task))).toEqual(task);
    });

    test('decodes failure replies', () => {
        const reply: ReplyMessage = {
            type: 'reply',
            runId: 'run-1',
            sessionId: 'session-1',
            taskId: 'task-1',
            sender: 'colombia',
            attempt: 2,
            ok: false,
            error: 'inventory service unavailable',
        };
        expect(decodeMessage(encodeMessage(reply))).toEqual(reply);
    });

    test('rejects payloads that are not envelopes', () => {
        expect(() => decodeMessage(serialize({ type: 'task', runId: 'run-1' }))).toThrow(
            'Message is not a task or reply envelope',
        );
        expect(() => decodeMessage('not json at all')).toThrow(SerializationError);
    });

    test('requires a body on successful replies', () => {
        expect(isReplyMessage({
            type: 'reply', runId: 'r', sessionId: 's-1', taskId: 't', sender: 's', attempt: 1, ok: true,
        })).toBe(false);
        expect(isReplyMessage({
            type: 'reply', runId: 'r', sessionId: 's-1', taskId: 't', sender: 's', attempt: 1, ok: true, body: '5000 lbs',
        })).toBe(true);
    });

    test('requires the session id on replies', () => {
        expect(isReplyMessage({
            type: 'reply', runId: 'r', taskId: 't', sender: 's', attempt: 1, ok: true, body: '5000 lbs',
        })).toBe(false);
    });
});
