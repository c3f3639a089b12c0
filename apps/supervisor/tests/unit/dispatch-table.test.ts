import { DispatchTable } from '../../src/dispatch/dispatch-table';
import { taskStatus } from '../../src/dispatch/task';
import { InvalidTransitionError } from '../../src/errors/invalid-transition.error';
import { makeTask } from '../helpers/fixtures';

describe('DispatchTable', () => {
    let table: DispatchTable;

    beforeEach(() => {
        table = new DispatchTable();
    });

    it('keeps tasks in insertion order', () => {
        table.put(makeTask({ id: 'b' }));
        table.put(makeTask({ id: 'a' }));
        table.put(makeTask({ id: 'c' }));

        expect(table.tasks().map(t => t.id)).toEqual(['b', 'a', 'c']);
        expect(table.size).toBe(3);
    });

    it('rejects duplicate ids', () => {
        table.put(makeTask({ id: 'a' }));
        expect(() => table.put(makeTask({ id: 'a' }))).toThrow('Task a is already in the dispatch table');
    });

    it('walks the happy path', () => {
        table.put(makeTask({ id: 'a' }));

        const inFlight = table.transition('a', taskStatus.IN_FLIGHT, { attempt: 1 });
        expect(inFlight.status).toBe(taskStatus.IN_FLIGHT);
        expect(inFlight.attempt).toBe(1);

        const done = table.transition('a', taskStatus.SUCCEEDED, { result: '5000 lbs' });
        expect(done.status).toBe(taskStatus.SUCCEEDED);
        expect(table.get('a')?.result).toBe('5000 lbs');
        expect(table.allTerminal()).toBe(true);
    });

    it('lets a pending task fail before dispatch', () => {
        table.put(makeTask({ id: 'a' }));
        const failed = table.transition('a', taskStatus.FAILED, { error: { code: 'UNAUTHORIZED', message: 'denied' } });
        expect(failed.status).toBe(taskStatus.FAILED);
        expect(failed.attempt).toBe(0);
    });

    it('refuses to move a terminal task and leaves it untouched', () => {
        table.put(makeTask({ id: 'a' }));
        table.transition('a', taskStatus.IN_FLIGHT, { attempt: 1 });
        table.transition('a', taskStatus.SUCCEEDED, { result: 'first' });

        expect(() => table.transition('a', taskStatus.FAILED, { error: { code: 'WORKER_ERROR', message: 'late' } }))
            .toThrow(InvalidTransitionError);
        expect(() => table.transition('a', taskStatus.SUCCEEDED, { result: 'second' }))
            .toThrow(InvalidTransitionError);

        const task = table.get('a');
        expect(task?.status).toBe(taskStatus.SUCCEEDED);
        expect(task?.result).toBe('first');
        expect(task?.error).toBeUndefined();
    });

    it('rejects skipping in_flight', () => {
        table.put(makeTask({ id: 'a' }));
        expect(() => table.transition('a', taskStatus.SUCCEEDED)).toThrow(InvalidTransitionError);
        expect(() => table.transition('a', taskStatus.TIMED_OUT)).toThrow(InvalidTransitionError);
        expect(table.get('a')?.status).toBe(taskStatus.PENDING);
    });

    it('rejects unknown tasks', () => {
        expect(() => table.transition('missing', taskStatus.IN_FLIGHT)).toThrow('unknown task');
    });

    it('allows a retry only while attempts remain', () => {
        table.put(makeTask({ id: 'a', maxAttempts: 2 }));

        table.transition('a', taskStatus.IN_FLIGHT, { attempt: 1 });
        table.transition('a', taskStatus.PENDING);
        expect(table.pendingForRetry().map(t => t.id)).toEqual(['a']);

        table.transition('a', taskStatus.IN_FLIGHT, { attempt: 2 });
        expect(() => table.transition('a', taskStatus.PENDING)).toThrow('no attempts left');
        expect(table.transition('a', taskStatus.TIMED_OUT).status).toBe(taskStatus.TIMED_OUT);
    });

    it('never dispatches past maxAttempts', () => {
        table.put(makeTask({ id: 'a', maxAttempts: 1 }));
        expect(() => table.transition('a', taskStatus.IN_FLIGHT, { attempt: 2 })).toThrow('attempt 2 exceeds 1');
    });

    it('does not count never-dispatched tasks as waiting for retry', () => {
        table.put(makeTask({ id: 'a' }));
        table.put(makeTask({ id: 'b' }));
        expect(table.pendingForRetry()).toEqual([]);
        expect(table.allTerminal()).toBe(false);
    });
});
