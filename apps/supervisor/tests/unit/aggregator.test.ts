import { aggregate, AggregationInput } from '../../src/aggregation/aggregator';
import { LineSummarizer } from '../../src/aggregation/summarizers';
import { Summarizer, SummaryItem } from '../../src/aggregation/types';
import { Task, taskStatus } from '../../src/dispatch/task';
import { makeTask } from '../helpers/fixtures';

function succeeded(label: string, result: string, attempt = 1): Task {
    return makeTask({
        id: `task-${label}`,
        label,
        target: { kind: 'unicast', recipient: label, topic: `agents.${label}` },
        status: taskStatus.SUCCEEDED,
        attempt,
        result,
    });
}

function failed(label: string, message: string, attempt = 3, status = taskStatus.FAILED): Task {
    return makeTask({
        id: `task-${label}`,
        label,
        target: { kind: 'unicast', recipient: label, topic: `agents.${label}` },
        status,
        attempt,
        error: { code: 'WORKER_ERROR', message },
    });
}

function input(tasks: Task[], overrides: Partial<AggregationInput> = {}): AggregationInput {
    return {
        runId: 'run-1',
        sessionId: 'session-1',
        tasks,
        tolerance: 'partial',
        summarizer: new LineSummarizer(),
        ...overrides,
    };
}

describe('aggregate', () => {
    it('returns a single result verbatim', async () => {
        const result = await aggregate(input([succeeded('colombia', '5000 lbs')]));

        expect(result).toMatchObject({
            runId: 'run-1',
            sessionId: 'session-1',
            status: 'complete',
            partial: false,
            response: '5000 lbs',
        });
        expect(result.error).toBeUndefined();
        expect(result.tasks[0]).toEqual({
            taskId: 'task-colombia',
            recipient: 'colombia',
            label: 'colombia',
            status: taskStatus.SUCCEEDED,
            attempts: 1,
            result: '5000 lbs',
        });
    });

    it('names the unreachable recipient when the only task fails', async () => {
        const result = await aggregate(input([failed('colombia', 'connection refused')]));

        expect(result.status).toBe('error');
        expect(result.response).toBe('Failed to reach colombia: connection refused');
        expect(result.error).toEqual({ code: 'ALL_TASKS_FAILED', message: 'All 1 task(s) failed.' });
    });

    it('merges successes in dispatch order and annotates failures', async () => {
        const lines = new LineSummarizer();
        const summarizer: Summarizer = { merge: jest.fn((items: SummaryItem[]) => lines.merge(items)) };
        const result = await aggregate(input([
            succeeded('brazil', '8500 lbs'),
            failed('vietnam', 'vietnam failed identity verification', 0),
            succeeded('colombia', '5000 lbs', 2),
        ], { summarizer }));

        expect(summarizer.merge).toHaveBeenCalledWith([
            { label: 'brazil', recipient: 'brazil', text: '8500 lbs' },
            { label: 'colombia', recipient: 'colombia', text: '5000 lbs' },
        ]);
        expect(result.status).toBe('complete');
        expect(result.response).toBe(
            'brazil : 8500 lbs\ncolombia : 5000 lbs\n\n'
            + 'Failed to process:\n- vietnam (attempts: 0): vietnam failed identity verification',
        );
    });

    it('reports every failure when nothing succeeded', async () => {
        const summarizer: Summarizer = { merge: jest.fn() };
        const result = await aggregate(input([
            failed('brazil', 'boom'),
            failed('colombia', 'no reply', 3, taskStatus.TIMED_OUT),
        ], { summarizer }));

        expect(summarizer.merge).not.toHaveBeenCalled();
        expect(result.status).toBe('error');
        expect(result.error?.code).toBe('ALL_TASKS_FAILED');
        expect(result.response).toBe('Failed to process:\n- brazil (attempts: 3): boom\n- colombia (attempts: 3): no reply');
    });

    it('fails a strict plan when any task failed', async () => {
        const result = await aggregate(input([
            succeeded('farm', 'RECEIVED_ORDER done'),
            failed('accountant', 'ledger offline'),
        ], { tolerance: 'strict' }));

        expect(result.status).toBe('error');
        expect(result.error).toEqual({ code: 'REQUIRED_TASK_FAILED', message: '1 required task(s) failed: accountant' });
        expect(result.response).toBe(
            'farm : RECEIVED_ORDER done\n\nFailed to process:\n- accountant (attempts: 3): ledger offline',
        );
    });

    it('completes a strict plan when everything succeeded', async () => {
        const result = await aggregate(input([succeeded('farm', 'a'), succeeded('shipper', 'b')], { tolerance: 'strict' }));
        expect(result.status).toBe('complete');
        expect(result.response).toBe('farm : a\nshipper : b');
    });

    it('reports a summarizer failure as AGGREGATION_FAILED', async () => {
        const summarizer: Summarizer = { merge: jest.fn().mockRejectedValue(new Error('model unavailable')) };
        const result = await aggregate(input([succeeded('a', '1'), succeeded('b', '2')], { summarizer }));

        expect(result.status).toBe('error');
        expect(result.error).toEqual({ code: 'AGGREGATION_FAILED', message: 'model unavailable' });
        expect(result.response).toBe('Failed to aggregate results: model unavailable');
    });

    it('marks an interrupted run partial and counts unfinished tasks', async () => {
        const stuck = makeTask({ id: 'task-colombia', label: 'colombia', status: taskStatus.IN_FLIGHT, attempt: 1 });
        const result = await aggregate(input([
            succeeded('brazil', '8500 lbs'),
            stuck,
            succeeded('vietnam', '6200 lbs'),
        ], { interruption: { code: 'RUN_DEADLINE_EXCEEDED', message: 'Run did not complete within 300ms' } }));

        expect(result.partial).toBe(true);
        expect(result.status).toBe('error');
        expect(result.error?.code).toBe('RUN_DEADLINE_EXCEEDED');
        expect(result.response).toBe(
            'brazil : 8500 lbs\nvietnam : 6200 lbs\n\nIncomplete: 1 task(s) did not finish before the deadline.',
        );
        expect(result.tasks.map(t => t.status)).toEqual([taskStatus.SUCCEEDED, taskStatus.IN_FLIGHT, taskStatus.SUCCEEDED]);
    });
});
