import * as CONST from './constants';
import { decodeBlock } from './codec';
import { ProtocolError } from './errors';
import { HistorySink } from './history';
import { ProtocolClient, ProtocolSession } from './modbus-client';
import Registry from './registry';
import { Scheduler, systemScheduler } from './scheduler';
import SharedState from './shared-state';
import { Logger, ProcessValue } from './types';

export interface AcquisitionOptions {
    readIntervalMs: number;
    reconnectCooldownMs: number;
    connectAttempts: number;
    connectBackoffMs: number;
}

export interface AcquisitionDeps {
    scheduler?: Scheduler;
    logger?: Logger;
    history?: HistorySink;
}

export type CycleOutcome = 'ok' | 'setpoints-skipped' | 'disconnected';

/**
 * Polls the controller for the lifetime of the process.
 *
 * Disconnected: run a bounded reconnect sequence, then cool down if it fails.
 * Connected: read the variable block and the setpoint block once per tick and
 * publish the decoded result to the shared state in a single update.
 */
export class AcquisitionLoop {
    private options: AcquisitionOptions;
    private scheduler: Scheduler;
    private logger: Logger;
    private history?: HistorySink;
    private abort: AbortController | null;
    private running: Promise<void> | null;

    constructor(
        private client: ProtocolClient,
        private state: SharedState,
        private registry: Registry,
        options: Partial<AcquisitionOptions> = {},
        deps: AcquisitionDeps = {}
    ) {
        this.options = {
            readIntervalMs: options.readIntervalMs ?? CONST.DEFAULT_READ_INTERVAL,
            reconnectCooldownMs: options.reconnectCooldownMs ?? CONST.DEFAULT_RECONNECT_COOLDOWN,
            connectAttempts: options.connectAttempts ?? CONST.DEFAULT_CONNECT_ATTEMPTS,
            connectBackoffMs: options.connectBackoffMs ?? CONST.DEFAULT_CONNECT_BACKOFF
        };
        this.scheduler = deps.scheduler ?? systemScheduler;
        this.logger = deps.logger ?? console;
        this.history = deps.history;
        this.abort = null;
        this.running = null;
    }

    get isRunning(): boolean {
        return this.running !== null;
    }

    /**
     * Launch the loop. The returned promise settles when `stop()` completes,
     * or rejects on a programming error (never on a controller failure).
     */
    start(): Promise<void> {
        if (this.running) return this.running;
        const abort = new AbortController();
        this.abort = abort;
        this.running = this.run(abort.signal).finally(() => {
            this.running = null;
            this.abort = null;
        });
        return this.running;
    }

    /**
     * Signal the loop and wait until the current tick has finished.
     */
    async stop(): Promise<void> {
        const running = this.running;
        if (!running) return;
        this.abort?.abort();
        await running;
    }

    /**
     * Up to `connectAttempts` connects, `connectBackoffMs` apart.
     * Leaves the status Connected on success, Disconnected on exhaustion.
     */
    async connectWithRetry(signal?: AbortSignal): Promise<boolean> {
        const { connectAttempts, connectBackoffMs } = this.options;
        this.state.setStatus('connecting');

        for (let attempt = 1; attempt <= connectAttempts; attempt++) {
            if (signal?.aborted) break;
            this.logger.log(`[Bridge] Connecting to controller (attempt ${attempt}/${connectAttempts})`);
            try {
                await this.client.connect();
                this.state.setStatus('connected');
                this.logger.log('[Bridge] Connected to controller');
                return true;
            } catch (e) {
                this.logger.warn(`[Bridge] Connect attempt ${attempt} failed: ${e instanceof Error ? e.message : String(e)}`);
                if (attempt < connectAttempts) {
                    await this.scheduler.sleep(connectBackoffMs, signal);
                }
            }
        }

        this.state.setStatus('disconnected');
        if (!signal?.aborted) {
            this.logger.error(`[Bridge] Could not connect after ${connectAttempts} attempts`);
        }
        return false;
    }

    /**
     * One read cycle: variable block, then setpoint block, committed before the
     * connection is released so a queued write never lands between read and commit.
     */
    runCycle(): Promise<CycleOutcome> {
        return this.client.exclusive(session => this.readAndCommit(session));
    }

    private async readAndCommit(session: ProtocolSession): Promise<CycleOutcome> {
        const { variableBlock, setpointBlock } = this.registry;

        let registers: number[];
        try {
            registers = await session.readBlock(variableBlock.start, variableBlock.count);
        } catch (e) {
            this.state.setStatus('disconnected');
            this.logReadFailure('variable', e);
            return 'disconnected';
        }

        if (registers.length < variableBlock.count) {
            this.logger.debug(`[Bridge] Short variable window: ${registers.length}/${variableBlock.count} registers`);
        }
        const values = decodeBlock(registers, variableBlock.start, this.registry.variables);
        this.logValues(values);

        let setpoints: Record<string, ProcessValue> | undefined;
        try {
            const spRegisters = await session.readBlock(setpointBlock.start, setpointBlock.count);
            setpoints = decodeBlock(spRegisters, setpointBlock.start, this.registry.setpoints);
        } catch (e) {
            this.logReadFailure('setpoint', e);
            if (e instanceof ProtocolError && e.kind === 'transport') {
                this.state.applyReading(values, 'disconnected');
                return 'disconnected';
            }
        }

        const snapshot = this.state.applyReading(values, 'connected', setpoints);
        this.history?.recordReading(snapshot);
        return setpoints ? 'ok' : 'setpoints-skipped';
    }

    private async run(signal: AbortSignal): Promise<void> {
        const { readIntervalMs, reconnectCooldownMs } = this.options;

        while (!signal.aborted) {
            if (this.state.read().status !== 'connected') {
                const connected = await this.connectWithRetry(signal);
                if (!connected) {
                    await this.scheduler.sleep(reconnectCooldownMs, signal);
                    continue;
                }
            }

            await this.runCycle();
            await this.scheduler.sleep(readIntervalMs, signal);
        }
        this.logger.log('[Bridge] Acquisition loop stopped');
    }

    /**
     * Anything other than a ProtocolError is a programming error and propagates.
     */
    private logReadFailure(block: string, error: unknown): void {
        if (!(error instanceof ProtocolError)) throw error;
        if (error.kind === 'transport') {
            this.logger.error(`[Bridge] Connection lost reading ${block} block: ${error.message}`);
        } else {
            this.logger.warn(`[Bridge] Controller rejected ${block} block read: ${error.message}`);
        }
    }

    private logValues(values: Record<string, ProcessValue>): void {
        for (const [name, value] of Object.entries(values)) {
            this.logger.debug(`[Bridge] ${name}: ${value.value}`);
        }
    }
}

export default AcquisitionLoop;
