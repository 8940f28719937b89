import express from 'express';
import http from 'http';
import { WebSocket, WebSocketServer } from 'ws';
import CommandGateway from './command-gateway';
import { CommandError, CommandErrorCode } from './errors';
import HistoryStore from './history';
import LiveFeedPublisher, { FeedViewer, toStatusPayload } from './live-feed';
import Registry from './registry';
import { parseCommandRequest, parseSetpointRequest, WriteRequest } from './requests';
import { Scheduler, systemScheduler } from './scheduler';
import SharedState from './shared-state';
import { Logger } from './types';

export interface ApiDeps {
    state: SharedState;
    gateway: CommandGateway;
    registry: Registry;
    history?: HistoryStore;
    scheduler?: Scheduler;
    logger?: Logger;
}

export interface ApiResponse {
    status: number;
    body: unknown;
}

const ERROR_STATUS: Record<CommandErrorCode, number> = {
    UNKNOWN_SETPOINT: 400,
    INVALID_COMMAND: 400,
    INVALID_REQUEST: 400,
    WRITE_FAILED: 502
};

function errorResponse(e: unknown, logger: Logger): ApiResponse {
    if (e instanceof CommandError) {
        return { status: ERROR_STATUS[e.code], body: { error: e.message } };
    }
    const message = e instanceof Error ? e.message : String(e);
    logger.error(`[Bridge] Request failed: ${message}`);
    return { status: 500, body: { error: message } };
}

export function getStatus(deps: ApiDeps): ApiResponse {
    const scheduler = deps.scheduler ?? systemScheduler;
    return { status: 200, body: toStatusPayload(deps.state.read(), scheduler.now()) };
}

export function getRegistry(deps: ApiDeps): ApiResponse {
    const { registry } = deps;
    return {
        status: 200,
        body: {
            variables: registry.variables.map(({ name, kind, unit }) => ({ name, kind, unit: unit ?? null })),
            setpoints: registry.setpoints.map(({ name, kind, unit }) => ({ name, kind, unit: unit ?? null }))
        }
    };
}

export function getHistory(deps: ApiDeps): ApiResponse {
    if (!deps.history) return { status: 404, body: { error: 'History is disabled' } };
    return { status: 200, body: deps.history.list() };
}

export async function executeWrite(gateway: CommandGateway, request: WriteRequest): Promise<ApiResponse> {
    switch (request.type) {
        case 'setpoint': {
            const ack = await gateway.setSetpoint(request.name, request.value);
            return { status: 200, body: { status: 'ok', name: ack.name, value: ack.value } };
        }
        case 'command': {
            const ack = await gateway.toggleOrSet(request.name, request.action);
            return { status: 200, body: { status: 'ok', name: ack.name, state: ack.state } };
        }
    }
}

export async function postSetpoint(deps: ApiDeps, body: unknown): Promise<ApiResponse> {
    try {
        return await executeWrite(deps.gateway, parseSetpointRequest(body));
    } catch (e) {
        return errorResponse(e, deps.logger ?? console);
    }
}

export async function postCommand(deps: ApiDeps, body: unknown): Promise<ApiResponse> {
    try {
        return await executeWrite(deps.gateway, parseCommandRequest(body));
    } catch (e) {
        return errorResponse(e, deps.logger ?? console);
    }
}

/**
 * Route wiring. Handlers above do the work; this only moves JSON in and out.
 */
export function createApp(deps: ApiDeps): express.Express {
    const app = express();
    const logger = deps.logger ?? console;
    const reply = (res: express.Response, r: ApiResponse) => res.status(r.status).json(r.body);

    app.use(express.json());

    app.get('/api/status', (req, res) => reply(res, getStatus(deps)));
    app.get('/api/registry', (req, res) => reply(res, getRegistry(deps)));
    app.get('/api/history', (req, res) => reply(res, getHistory(deps)));

    app.post('/api/setpoint', (req, res, next) => {
        postSetpoint(deps, req.body).then(r => reply(res, r)).catch(next);
    });

    app.post('/api/command', (req, res, next) => {
        postCommand(deps, req.body).then(r => reply(res, r)).catch(next);
    });

    const onError: express.ErrorRequestHandler = (err, req, res, next) => {
        if (res.headersSent) return next(err);
        if (err instanceof SyntaxError) {
            res.status(400).json({ error: 'Request body is not valid JSON' });
            return;
        }
        reply(res, errorResponse(err, logger));
    };
    app.use(onError);

    return app;
}

/**
 * One live feed subscription per WebSocket on `/ws/live`
 */
export function attachLiveFeed(server: http.Server, publisher: LiveFeedPublisher, logger: Logger = console): WebSocketServer {
    const wss = new WebSocketServer({ server, path: '/ws/live' });
    let nextId = 1;

    // The HTTP server's own errors are re-emitted here
    wss.on('error', err => logger.error(`[Bridge] Live feed server error: ${err.message}`));

    wss.on('connection', (socket: WebSocket) => {
        const viewer: FeedViewer = {
            id: `ws-${nextId++}`,
            send: frame => new Promise<void>((resolve, reject) => {
                socket.send(frame, err => (err ? reject(err) : resolve()));
            }),
            close: () => socket.terminate()
        };

        socket.on('close', () => publisher.unsubscribe(viewer.id));
        socket.on('error', err => logger.warn(`[Bridge] Viewer ${viewer.id} socket error: ${err.message}`));

        publisher.subscribe(viewer).catch(err => {
            logger.error(`[Bridge] Viewer ${viewer.id} feed failed: ${err instanceof Error ? err.message : String(err)}`);
        });
    });

    return wss;
}
