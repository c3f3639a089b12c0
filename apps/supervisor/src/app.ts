import http from 'node:http';
import { InMemoryTransport, Transport, WorkerAgent } from '@switchyard/sdk';
import { Pool } from 'pg';
import { LineSummarizer, ReportSummarizer, Summarizer } from './aggregation';
import { allowAll, Authorizer, StaticAuthorizer } from './auth/authorizer';
import { AgentProfile, SupervisorSettings } from './config';
import { createPool, createRedis } from './db';
import { ensureSchema } from './db/schema';
import { FarmDecomposer } from './decomposition/farm.decomposer';
import { LogisticsDecomposer } from './decomposition/logistics.decomposer';
import { NewsDecomposer } from './decomposition/news.decomposer';
import { Decomposer } from './decomposition/types';
import { createHttpServer } from './http/server';
import { CompositeEventSink, ConsoleEventSink, EventSink } from './observability/event-sink';
import { PostgresEventSink } from './observability/postgres-event-sink';
import { RunEventRepository } from './repositories/run-event.repository';
import { Supervisor } from './supervisor/supervisor';
import { RedisTransport } from './transport/redis-transport';
import { fixedBackoff } from './utils/backoff';
import { startMockWorkers } from './workers/mock-capabilities';

const TAG = '[switchyard]';

export interface App {
    settings: SupervisorSettings;
    transport: Transport;
    supervisor: Supervisor;
    server: http.Server;
    workers: WorkerAgent[];
    close(): Promise<void>;
}

export interface AppOverrides {
    transport?: Transport;
    pool?: Pool;
}

export function strategyFor(settings: SupervisorSettings): { decomposer: Decomposer; summarizer: Summarizer } {
    const profile: AgentProfile = settings.profile;
    switch (profile) {
        case 'exchange':
            return {
                decomposer: new FarmDecomposer({
                    broadcastTopic: settings.farmBroadcastTopic,
                    ordersAgent: settings.ordersAgent,
                }),
                summarizer: new LineSummarizer({ totals: true }),
            };
        case 'news':
            return { decomposer: new NewsDecomposer(), summarizer: new ReportSummarizer() };
        case 'logistics':
            return {
                decomposer: new LogisticsDecomposer({ groupTopic: settings.logisticsGroupTopic }),
                summarizer: new LineSummarizer(),
            };
    }
}

function createTransport(settings: SupervisorSettings): Transport {
    if (settings.transport === 'redis') {
        return new RedisTransport(createRedis(settings.redisUrl), createRedis(settings.redisUrl));
    }
    return new InMemoryTransport();
}

/**
 * Wires a supervisor for the configured profile. Nothing listens on a port
 * until the caller starts the returned server.
 */
export async function createApp(settings: SupervisorSettings, overrides: AppOverrides = {}): Promise<App> {
    const transport = overrides.transport ?? createTransport(settings);

    let pool: Pool | null = overrides.pool ?? null;
    if (!pool && settings.databaseUrl) pool = createPool(settings.databaseUrl);

    const sinks: EventSink[] = [new ConsoleEventSink()];
    if (pool) {
        await ensureSchema(pool);
        sinks.push(new PostgresEventSink(new RunEventRepository(pool)));
        console.log(`${TAG} persisting run events to postgres`);
    }

    const authorizer: Authorizer = settings.authorizedAgents.length > 0
        ? new StaticAuthorizer(settings.authorizedAgents)
        : allowAll;

    const { decomposer, summarizer } = strategyFor(settings);
    const supervisor = new Supervisor(
        {
            instanceId: settings.supervisorId,
            maxAttempts: settings.maxAttempts,
            taskTimeoutMs: settings.taskTimeoutMs,
            runDeadlineMs: settings.runDeadlineMs,
            dispatchStaggerMs: settings.dispatchStaggerMs,
            backoff: fixedBackoff(settings.retryDelayMs),
        },
        { transport, decomposer, summarizer, authorizer, sink: new CompositeEventSink(sinks) },
    );
    await supervisor.start();

    const workers = settings.mockWorkers
        ? await startMockWorkers(transport, {
            profile: settings.profile,
            farmBroadcastTopic: settings.farmBroadcastTopic,
            ordersAgent: settings.ordersAgent,
            logisticsGroupTopic: settings.logisticsGroupTopic,
        })
        : [];

    const server = createHttpServer({ supervisor, transportName: transport.name });
    const ownedPool = overrides.pool ? null : pool;

    return {
        settings,
        transport,
        supervisor,
        server,
        workers,
        close: async () => {
            if (server.listening) {
                await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
            }
            await supervisor.stop();
            await Promise.all(workers.map(w => w.stop()));
            await transport.close();
            if (ownedPool) await ownedPool.end();
        },
    };
}
