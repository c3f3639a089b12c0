import { Pool } from 'pg';

export const RUN_EVENTS_DDL = `
CREATE TABLE IF NOT EXISTS run_events (
    id          UUID PRIMARY KEY,
    run_id      TEXT NOT NULL,
    session_id  TEXT NOT NULL,
    event_type  TEXT NOT NULL,
    task_id     TEXT,
    payload     JSONB NOT NULL DEFAULT '{}'::jsonb,
    created_at  TIMESTAMPTZ NOT NULL DEFAULT NOW()
);
CREATE INDEX IF NOT EXISTS idx_run_events_run_id ON run_events (run_id, created_at);
`;

export async function ensureSchema(pool: Pool): Promise<void> {
    await pool.query(RUN_EVENTS_DDL);
}
