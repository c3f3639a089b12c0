/**
 * Connection factories for Postgres and Redis.
 * Both are optional: the supervisor runs without a database and on the
 * in-memory transport unless configured otherwise.
 */
import 'dotenv/config';
import Redis from 'ioredis';
import { Pool } from 'pg';

const TAG = '[db]';

/**
 * Postgres connection pool:
 * - max: 20 connections
 * - idleTimeoutMillis: 30s (release idle connections)
 * - connectionTimeoutMillis: 2s (fail fast on connection issues)
 */
export function createPool(connectionString: string): Pool {
    const pool = new Pool({
        connectionString,
        max: 20,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    // Event persistence is best-effort, so an idle client error is logged rather than fatal.
    pool.on('error', (err) => {
        console.error(`${TAG} unexpected error on idle client`, err);
    });
    return pool;
}

/** Redis client; pub/sub needs one connection per role. */
export function createRedis(url: string = 'redis://localhost:6379'): Redis {
    return new Redis(url, { maxRetriesPerRequest: 3 });
}
