import { WorkerCapability } from '@switchyard/sdk';
import { Task, taskStatus } from '../../src/dispatch/task';
import { EventSink } from '../../src/observability/event-sink';
import { LifecycleEvent, LifecycleEventType } from '../../src/observability/events';

export function makeTask(overrides: Partial<Task> = {}): Task {
    return {
        id: 'task-1',
        runId: 'run-1',
        label: 'colombia',
        target: { kind: 'unicast', recipient: 'colombia', topic: 'agents.colombia' },
        payload: 'How much coffee do you have?',
        attempt: 0,
        maxAttempts: 3,
        status: taskStatus.PENDING,
        ...overrides,
    };
}

export class RecordingSink implements EventSink {
    readonly events: LifecycleEvent[] = [];

    emit(event: LifecycleEvent): void {
        this.events.push(event);
    }

    ofType<K extends LifecycleEventType>(type: K): Extract<LifecycleEvent, { type: K }>[] {
        return this.events.filter((e): e is Extract<LifecycleEvent, { type: K }> => e.type === type);
    }
}

export type Step = string | Error | 'hang';

/**
 * Capability that plays back one step per call: a string is replied, an
 * Error is thrown and 'hang' never answers. The last step repeats.
 */
export function scripted(...steps: Step[]): jest.Mock<Promise<string>, Parameters<WorkerCapability>> {
    let call = 0;
    return jest.fn<Promise<string>, Parameters<WorkerCapability>>(async () => {
        const step = steps[Math.min(call, steps.length - 1)];
        call++;
        if (step === 'hang') return new Promise<string>(() => undefined);
        if (step instanceof Error) throw step;
        return step;
    });
}
