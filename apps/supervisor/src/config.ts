import { ConfigError } from './errors/config.error';

export type AgentProfile = 'exchange' | 'news' | 'logistics';
export type TransportKind = 'redis' | 'memory';

export interface SupervisorSettings {
    port: number;
    profile: AgentProfile;
    transport: TransportKind;
    redisUrl: string;
    /** Event persistence is off when unset. */
    databaseUrl?: string;
    taskTimeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
    dispatchStaggerMs: number;
    runDeadlineMs: number;
    farmBroadcastTopic: string;
    /** Agent that answers order status lookups. */
    ordersAgent: string;
    logisticsGroupTopic: string;
    /** Empty means every agent is allowed. */
    authorizedAgents: string[];
    mockWorkers: boolean;
    supervisorId?: string;
}

type Env = Record<string, string | undefined>;

const PROFILES: readonly AgentProfile[] = ['exchange', 'news', 'logistics'];
const TRANSPORTS: readonly TransportKind[] = ['redis', 'memory'];

function int(env: Env, key: string, fallback: string, min: number): number {
    const raw = env[key] || fallback;
    const value = parseInt(raw, 10);
    if (Number.isNaN(value) || String(value) !== raw.trim()) {
        throw new ConfigError(key, `expected an integer, got '${raw}'`);
    }
    if (value < min) {
        throw new ConfigError(key, `must be >= ${min}, got ${value}`);
    }
    return value;
}

function oneOf<T extends string>(env: Env, key: string, allowed: readonly T[], fallback: T): T {
    const raw = (env[key] || fallback).trim().toLowerCase();
    const match = allowed.find(option => option === raw);
    if (!match) {
        throw new ConfigError(key, `expected one of ${allowed.join(', ')}, got '${raw}'`);
    }
    return match;
}

function flag(env: Env, key: string): boolean {
    return ['1', 'true', 'yes', 'on'].includes((env[key] || '').trim().toLowerCase());
}

export function loadConfig(env: Env = process.env): SupervisorSettings {
    const profile = oneOf(env, 'AGENT_PROFILE', PROFILES, 'exchange');

    const settings: SupervisorSettings = {
        port: int(env, 'PORT', '8000', 0),
        profile,
        transport: oneOf(env, 'TRANSPORT', TRANSPORTS, 'memory'),
        redisUrl: env.REDIS_URL || 'redis://localhost:6379',
        taskTimeoutMs: int(env, 'TASK_TIMEOUT_MS', '30000', 1),
        maxAttempts: int(env, 'MAX_ATTEMPTS', '3', 1),
        retryDelayMs: int(env, 'RETRY_DELAY_MS', '1000', 0),
        // Scrapers are rate limited, so news runs space out their first dispatches.
        dispatchStaggerMs: int(env, 'DISPATCH_STAGGER_MS', profile === 'news' ? '1000' : '0', 0),
        runDeadlineMs: int(env, 'RUN_DEADLINE_MS', '120000', 1),
        farmBroadcastTopic: env.FARM_BROADCAST_TOPIC || 'farm_broadcast',
        ordersAgent: env.ORDERS_AGENT || 'orders',
        logisticsGroupTopic: env.LOGISTICS_GROUP_TOPIC || 'logistics_group',
        authorizedAgents: (env.AUTHORIZED_AGENTS || '')
            .split(',')
            .map(name => name.trim())
            .filter(name => name.length > 0),
        mockWorkers: flag(env, 'MOCK_WORKERS'),
    };

    if (env.DATABASE_URL) settings.databaseUrl = env.DATABASE_URL;
    if (env.SUPERVISOR_ID) settings.supervisorId = env.SUPERVISOR_ID;
    return settings;
}
