import { Pool } from 'pg';
import { v7 as uuidv7 } from 'uuid';
import { RunEventEntity } from '../db/run-event.entity';
import { LifecycleEvent } from '../observability/events';

export class RunEventRepository {
    constructor(private readonly pool: Pool) { }

    async insert(event: LifecycleEvent): Promise<RunEventEntity> {
        const { type, runId, sessionId, at, ...rest } = event;
        const taskId = 'taskId' in event ? event.taskId : null;

        const res = await this.pool.query<RunEventEntity>(
            `INSERT INTO run_events (id, run_id, session_id, event_type, task_id, payload, created_at)
             VALUES ($1, $2, $3, $4, $5, $6, $7)
             RETURNING *`,
            [uuidv7(), runId, sessionId, type, taskId, JSON.stringify(rest), at],
        );
        return res.rows[0];
    }

    async findByRunId(runId: string): Promise<RunEventEntity[]> {
        const res = await this.pool.query<RunEventEntity>(
            'SELECT * FROM run_events WHERE run_id = $1 ORDER BY created_at ASC, id ASC',
            [runId],
        );
        return res.rows;
    }
}
