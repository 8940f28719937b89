import http from 'http';
import { WebSocketServer } from 'ws';
import AcquisitionLoop from './acquisition-loop';
import { attachLiveFeed, createApp } from './api';
import CommandGateway from './command-gateway';
import { BridgeConfig } from './config';
import HistoryStore from './history';
import LiveFeedPublisher from './live-feed';
import ModbusClientAdapter, { ProtocolClient } from './modbus-client';
import Registry from './registry';
import { Scheduler, systemScheduler } from './scheduler';
import SharedState from './shared-state';
import { Logger } from './types';

export interface BridgeDeps {
    client?: ProtocolClient;
    registry?: Registry;
    scheduler?: Scheduler;
    logger?: Logger;
}

/**
 * Composition root: one shared state handed to the loop, the gateway and the publisher.
 */
export class Bridge {
    public readonly registry: Registry;
    public readonly state: SharedState;
    public readonly client: ProtocolClient;
    public readonly loop: AcquisitionLoop;
    public readonly gateway: CommandGateway;
    public readonly publisher: LiveFeedPublisher;
    public readonly history?: HistoryStore;
    private config: BridgeConfig;
    private logger: Logger;
    private server: http.Server | null;
    private wss: WebSocketServer | null;
    private loopDone: Promise<void> | null;

    constructor(config: BridgeConfig, deps: BridgeDeps = {}) {
        const scheduler = deps.scheduler ?? systemScheduler;
        this.config = config;
        this.logger = deps.logger ?? console;
        this.registry = deps.registry ?? Registry.load(config.registerMap);
        this.state = new SharedState(this.registry, () => scheduler.now());
        this.client = deps.client ?? new ModbusClientAdapter(config.modbus);

        if (config.history.file) {
            this.history = new HistoryStore(config.history.file, {
                minReadingIntervalMs: config.history.intervalMs,
                maxEntries: config.history.maxEntries,
                logger: this.logger,
                clock: () => scheduler.now()
            });
        }

        this.loop = new AcquisitionLoop(this.client, this.state, this.registry, config.acquisition, {
            scheduler,
            logger: this.logger,
            history: this.history
        });
        this.gateway = new CommandGateway(this.client, this.state, this.registry, {
            setpointCacheMode: config.setpointCacheMode,
            logger: this.logger,
            history: this.history
        });
        this.publisher = new LiveFeedPublisher(this.state, {
            intervalMs: config.publishIntervalMs,
            scheduler,
            logger: this.logger
        });
        this.server = null;
        this.wss = null;
        this.loopDone = null;
    }

    /**
     * Serve the API, then attach the live feed and start polling.
     * Resolves once the HTTP server is listening; rejects if it cannot listen.
     */
    async start(): Promise<void> {
        const { host, port } = this.config.modbus;
        this.logger.log(`[Bridge] Starting: controller ${host}:${port}, ${this.registry.variables.length} variables, ${this.registry.setpoints.length} setpoints`);

        const app = createApp({
            state: this.state,
            gateway: this.gateway,
            registry: this.registry,
            history: this.history,
            logger: this.logger
        });
        const server = http.createServer(app);

        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this.config.httpPort, () => {
                server.off('error', reject);
                resolve();
            });
        });
        this.server = server;
        this.wss = attachLiveFeed(server, this.publisher, this.logger);
        this.logger.log(`[Bridge] Listening on port ${this.config.httpPort}`);

        const loopDone = this.loop.start();
        loopDone.catch(err => this.logger.error('[Bridge] Acquisition loop crashed:', err));
        this.loopDone = loopDone;
    }

    /**
     * Settles when the acquisition loop exits; rejects on a fatal programming error.
     */
    get done(): Promise<void> {
        return this.loopDone ?? Promise.resolve();
    }

    /**
     * Ordered shutdown: viewers and HTTP first, then the loop, then the transport.
     */
    async stop(): Promise<void> {
        this.logger.log('[Bridge] Shutting down...');
        await this.publisher.close();

        const wss = this.wss;
        this.wss = null;
        if (wss) {
            for (const socket of wss.clients) socket.terminate();
            await new Promise<void>(resolve => wss.close(() => resolve()));
        }

        const server = this.server;
        this.server = null;
        if (server) {
            await new Promise<void>((resolve, reject) => server.close(err => (err ? reject(err) : resolve())));
        }

        // The loop must be stopped before the transport closes so no read races the close
        await this.loop.stop();
        await this.client.close();
        this.logger.log('[Bridge] Stopped');
    }
}

export default Bridge;
