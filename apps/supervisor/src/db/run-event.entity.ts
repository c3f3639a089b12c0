import { LifecycleEventType } from '../observability/events';

/**
 * One lifecycle event as stored in run_events.
 * payload holds the full event minus the columns lifted out of it.
 */
export interface RunEventEntity {
    id: string;
    run_id: string;
    session_id: string;
    event_type: LifecycleEventType;
    task_id: string | null;
    payload: Record<string, unknown>;
    created_at: Date;
}
