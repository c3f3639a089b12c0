import { RunEventRepository } from '../repositories/run-event.repository';
import { EventSink } from './event-sink';
import { LifecycleEvent } from './events';

export class PostgresEventSink implements EventSink {
    constructor(private readonly repository: RunEventRepository) { }

    async emit(event: LifecycleEvent): Promise<void> {
        await this.repository.insert(event);
    }
}
