import { InMemoryTransport } from '../src/memory-transport';
import { agentTopic } from '../src/transport';
import { ReplyMessage, TaskMessage } from '../src/types';
import { decodeMessage, encodeMessage } from '../src/utils/serialization';
import { WorkerAgent } from '../src/worker';

const REPLY_TOPIC = 'supervisor.test.replies';

function taskMessage(overrides: Partial<TaskMessage> = {}): TaskMessage {
    return {
        type: 'task',
        runId: 'run-1',
        sessionId: 'session-1',
        replyTo: REPLY_TOPIC,
        payload: 'How much coffee do you have?',
        assignments: [{ taskId: 'task-1', recipient: 'colombia', attempt: 1 }],
        ...overrides,
    };
}

describe('WorkerAgent', () => {
    let transport: InMemoryTransport;
    let replies: ReplyMessage[];

    beforeEach(async () => {
        transport = new InMemoryTransport();
        replies = [];
        await transport.subscribe(REPLY_TOPIC, (raw) => {
            const message = decodeMessage(raw);
            if (message.type === 'reply') replies.push(message);
        });
    });

    afterEach(async () => {
        await transport.close();
    });

    const waitForReplies = async (count: number) => {
        for (let i = 0; i < 50 && replies.length < count; i++) {
            await new Promise(resolve => setTimeout(resolve, 5));
        }
    };

    it('runs its capability and replies with the result', async () => {
        const capability = jest.fn().mockResolvedValue('5000 lbs');
        const agent = new WorkerAgent({ name: 'colombia', transport, capability });
        await agent.start();

        await transport.publish(agentTopic('colombia'), encodeMessage(taskMessage()));
        await waitForReplies(1);

        expect(capability).toHaveBeenCalledWith('How much coffee do you have?', {
            taskId: 'task-1',
            runId: 'run-1',
            sessionId: 'session-1',
            attempt: 1,
        });
        expect(replies).toEqual([{
            type: 'reply',
            runId: 'run-1',
            sessionId: 'session-1',
            taskId: 'task-1',
            sender: 'colombia',
            attempt: 1,
            ok: true,
            body: '5000 lbs',
        }]);
        expect(agent.handledCount).toBe(1);
        await agent.stop();
    });

    it('turns a capability error into a failure reply', async () => {
        const agent = new WorkerAgent({
            name: 'brazil',
            transport,
            capability: async () => { throw new Error('yield estimator offline'); },
        });
        await agent.start();

        await transport.publish(agentTopic('brazil'), encodeMessage(taskMessage({
            assignments: [{ taskId: 'task-9', recipient: 'brazil', attempt: 3 }],
        })));
        await waitForReplies(1);

        expect(replies).toHaveLength(1);
        expect(replies[0]).toMatchObject({ taskId: 'task-9', sender: 'brazil', attempt: 3, ok: false, error: 'yield estimator offline' });
        await agent.stop();
    });

    it('only handles broadcast assignments addressed to itself', async () => {
        const capability = jest.fn().mockResolvedValue('6200 lbs');
        const agent = new WorkerAgent({ name: 'vietnam', transport, capability, groups: ['farm_broadcast'] });
        await agent.start();

        await transport.publish('farm_broadcast', encodeMessage(taskMessage({
            assignments: [
                { taskId: 'task-b', recipient: 'brazil', attempt: 1 },
                { taskId: 'task-v', recipient: 'vietnam', attempt: 1 },
            ],
        })));
        await waitForReplies(1);

        expect(capability).toHaveBeenCalledTimes(1);
        expect(replies.map(r => r.taskId)).toEqual(['task-v']);
        await agent.stop();
    });

    it('processes a redelivered task again', async () => {
        const capability = jest.fn().mockResolvedValue('order_id: 54321');
        const agent = new WorkerAgent({ name: 'colombia', transport, capability });
        await agent.start();

        await transport.publish(agentTopic('colombia'), encodeMessage(taskMessage()));
        await transport.publish(agentTopic('colombia'), encodeMessage(taskMessage({
            assignments: [{ taskId: 'task-1', recipient: 'colombia', attempt: 2 }],
        })));
        await waitForReplies(2);

        expect(capability).toHaveBeenCalledTimes(2);
        expect(replies.map(r => r.attempt)).toEqual([1, 2]);
        await agent.stop();
    });

    it('ignores messages after stop', async () => {
        const capability = jest.fn().mockResolvedValue('ok');
        const agent = new WorkerAgent({ name: 'colombia', transport, capability });
        await agent.start();
        await agent.stop();

        expect(agent.isRunning()).toBe(false);
        expect(transport.subscriberCount(agentTopic('colombia'))).toBe(0);
    });
});
