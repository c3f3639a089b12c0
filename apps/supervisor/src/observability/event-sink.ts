import { LifecycleEvent } from './events';

const TAG = '[sink]';

export interface EventSink {
    emit(event: LifecycleEvent): void | Promise<void>;
}

export const noopSink: EventSink = { emit: () => undefined };

export class ConsoleEventSink implements EventSink {
    emit(event: LifecycleEvent): void {
        switch (event.type) {
            case 'run_started':
                console.log(`[console] run ${event.runId} started (${event.mode}, ${event.taskCount} task(s))`);
                break;
            case 'task_dispatched':
                console.log(`[console] task ${event.taskId} -> ${event.recipient} on ${event.topic} (attempt ${event.attempt})`);
                break;
            case 'task_retrying':
                console.warn(`[console] task ${event.taskId} retrying in ${event.delayMs}ms after ${event.error.code}`);
                break;
            case 'task_completed':
                console.log(`[console] task ${event.taskId} completed by ${event.recipient}`);
                break;
            case 'task_failed':
                console.warn(`[console] task ${event.taskId} failed: ${event.error.code} ${event.error.message}`);
                break;
            case 'reply_discarded':
                console.warn(`[console] discarded reply for ${event.taskId} from ${event.sender}: ${event.reason}`);
                break;
            case 'run_completed':
                console.log(`[console] run ${event.runId} ${event.result.status}${event.result.error ? ` (${event.result.error.code})` : ''}`);
                break;
        }
    }
}

export class CompositeEventSink implements EventSink {
    constructor(private readonly sinks: EventSink[]) { }

    async emit(event: LifecycleEvent): Promise<void> {
        await Promise.all(this.sinks.map(sink => emitSafely(sink, event)));
    }
}

// Sink failures are logged and never reach the dispatch loop.
export function emitSafely(sink: EventSink, event: LifecycleEvent): Promise<void> {
    return Promise.resolve()
        .then(() => sink.emit(event))
        .catch(err => console.error(`${TAG} failed to record ${event.type} for run ${event.runId}:`, err));
}
