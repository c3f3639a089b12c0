import http, { IncomingMessage, ServerResponse } from 'node:http';
import { z } from 'zod';
import { AggregatedResult } from '../aggregation';
import { InvalidRequestError } from '../errors/run.errors';
import { Supervisor } from '../supervisor/supervisor';
import { RunRequest } from '../supervisor/types';

const TAG = '[http]';
const MAX_BODY_BYTES = 1024 * 1024;

export const PromptRequestSchema = z.object({
    prompt: z.string({ required_error: 'prompt is required', invalid_type_error: 'prompt must be a string' }),
    urls: z.array(z.string()).optional(),
    session_id: z.string().min(1).optional(),
});

export type PromptRequest = z.infer<typeof PromptRequestSchema>;

export class HttpError extends Error {
    constructor(public readonly status: number, message: string) {
        super(message);
        this.name = 'HttpError';
    }
}

export interface HttpServerOptions {
    supervisor: Supervisor;
    /** Reported by GET /transport/config. */
    transportName: string;
}

const CORS_HEADERS = {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
};

export function statusFor(result: AggregatedResult): number {
    switch (result.error?.code) {
        case undefined:
            return 200;
        case 'INVALID_REQUEST':
            return 400;
        case 'RUN_DEADLINE_EXCEEDED':
            return 504;
        case 'SUPERVISOR_STOPPED':
            return 503;
        default:
            return 502;
    }
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
    res.writeHead(status, { ...CORS_HEADERS, 'Content-Type': 'application/json' });
    res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let settled = false;
        const settle = (fn: () => void): void => {
            if (settled) return;
            settled = true;
            fn();
        };

        const onData = (chunk: Buffer): void => {
            size += chunk.length;
            if (size > MAX_BODY_BYTES) {
                // Stop buffering but keep draining so the 413 still reaches the client.
                req.off('data', onData);
                req.resume();
                settle(() => reject(new HttpError(413, 'Request body exceeds 1MB')));
                return;
            }
            chunks.push(chunk);
        };

        req.on('data', onData);
        req.on('end', () => settle(() => resolve(Buffer.concat(chunks).toString('utf8'))));
        req.on('error', err => settle(() => reject(err)));
        req.on('close', () => settle(() => reject(new HttpError(400, 'Request closed before the body was read'))));
    });
}

async function parsePromptRequest(req: IncomingMessage): Promise<PromptRequest> {
    const raw = await readBody(req);
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch {
        throw new HttpError(400, 'Request body must be valid JSON');
    }
    const parsed = PromptRequestSchema.safeParse(json);
    if (!parsed.success) {
        throw new HttpError(400, parsed.error.issues.map(issue => issue.message).join('; '));
    }
    return parsed.data;
}

function toRunRequest(body: PromptRequest): RunRequest {
    return body.urls ? { prompt: body.prompt, urls: body.urls } : { prompt: body.prompt };
}

function resultBody(result: AggregatedResult): Record<string, unknown> {
    const body: Record<string, unknown> = { response: result.response, session_id: result.sessionId };
    if (result.error) body.error = result.error;
    return body;
}

export function createHttpServer(options: HttpServerOptions): http.Server {
    const { supervisor, transportName } = options;

    async function prompt(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const body = await parsePromptRequest(req);
        const handle = await supervisor.submit(toRunRequest(body), { mode: 'synchronous', sessionId: body.session_id });
        const result = await supervisor.awaitResult(handle);
        sendJson(res, statusFor(result), resultBody(result));
    }

    async function promptStream(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const body = await parsePromptRequest(req);
        const handle = await supervisor.submit(toRunRequest(body), { mode: 'streaming', sessionId: body.session_id });
        const events = supervisor.stream(handle);

        res.writeHead(200, {
            ...CORS_HEADERS,
            'Content-Type': 'application/x-ndjson',
            'Cache-Control': 'no-cache',
            Connection: 'keep-alive',
        });
        const writeLine = (line: Record<string, unknown>): void => {
            if (!res.writableEnded && !res.destroyed) res.write(`${JSON.stringify(line)}\n`);
        };

        for await (const event of events) {
            if (event.type === 'run_completed') {
                writeLine(resultBody(event.result));
            } else {
                writeLine({ response: event, session_id: handle.sessionId });
            }
        }
        res.end();
    }

    async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
        const { pathname } = new URL(req.url ?? '/', 'http://localhost');
        const method = req.method ?? 'GET';

        if (method === 'OPTIONS') {
            res.writeHead(204, CORS_HEADERS);
            res.end();
            return;
        }
        if (method === 'GET' && pathname === '/health') {
            sendJson(res, 200, { status: 'ok' });
            return;
        }
        if (method === 'GET' && pathname === '/transport/config') {
            sendJson(res, 200, { transport: transportName });
            return;
        }
        if (method === 'POST' && pathname === '/agent/prompt') {
            await prompt(req, res);
            return;
        }
        if (method === 'POST' && pathname === '/agent/prompt/stream') {
            await promptStream(req, res);
            return;
        }
        sendJson(res, 404, { error: 'not found' });
    }

    return http.createServer((req, res) => {
        route(req, res).catch((err: unknown) => {
            if (res.headersSent) {
                console.error(`${TAG} ${req.method} ${req.url} failed mid-response:`, err);
                res.end();
                return;
            }
            if (err instanceof HttpError) {
                sendJson(res, err.status, { error: err.message });
            } else if (err instanceof InvalidRequestError) {
                sendJson(res, 400, { error: err.message });
            } else {
                console.error(`${TAG} ${req.method} ${req.url} failed:`, err);
                sendJson(res, 500, { error: 'internal server error' });
            }
        });
    });
}
