import ModbusRTU from "modbus-serial";
import * as CONST from './constants';
import { ConnectionError, ProtocolError } from './errors';

export interface ModbusClientOptions {
    host: string;
    port: number;
    unitId: number;
    timeout?: number;
}

/**
 * Register access granted to a unit of work that holds the connection.
 */
export interface ProtocolSession {
    readBlock(startAddress: number, count: number): Promise<number[]>;
    writeRegister(address: number, value: number): Promise<void>;
}

/**
 * Transport contract used by the acquisition loop and the command gateway.
 */
export interface ProtocolClient extends ProtocolSession {
    readonly isConnected: boolean;
    connect(): Promise<void>;
    /**
     * Run `work` as one queued job: no other operation reaches the controller
     * until it settles. Use the given session, not the client, inside `work`.
     */
    exclusive<T>(work: (session: ProtocolSession) => Promise<T>): Promise<T>;
    close(): Promise<void>;
}

/**
 * Owns the single Modbus TCP connection to the controller.
 *
 * Every operation (connect, read, write, close) is appended to one promise
 * queue, so at most one request is ever outstanding on the socket and a write
 * never interleaves with a read in progress.
 */
export class ModbusClientAdapter implements ProtocolClient {
    private client: ModbusRTU | null;
    private queue: Promise<unknown>;
    private options: Required<ModbusClientOptions>;
    private session: ProtocolSession;

    constructor(options: ModbusClientOptions) {
        this.client = null;
        this.queue = Promise.resolve();
        this.options = { ...options, timeout: options.timeout ?? CONST.DEFAULT_TIMEOUT };
        this.session = {
            readBlock: (startAddress, count) => this.read(startAddress, count),
            writeRegister: (address, value) => this.write(address, value)
        };
    }

    get isConnected(): boolean {
        return this.client !== null && this.client.isOpen;
    }

    /**
     * Open the connection. Resolves immediately when already connected.
     * @throws {ConnectionError}
     */
    connect(): Promise<void> {
        return this.enqueue(async () => {
            if (this.isConnected) return;
            this.invalidate();

            const { host, port, unitId, timeout } = this.options;
            const client = new ModbusRTU();
            client.setTimeout(timeout);
            try {
                await client.connectTCP(host, { port: port });
                client.setID(unitId);
            } catch (e) {
                try { client.close(() => undefined); } catch (closeError) { /* socket never opened */ }
                throw new ConnectionError(host, port, e instanceof Error ? e.message : String(e));
            }
            this.client = client;
        });
    }

    /**
     * Read `count` holding registers starting at `startAddress` in one round-trip.
     * @throws {ProtocolError}
     */
    readBlock(startAddress: number, count: number): Promise<number[]> {
        return this.enqueue(() => this.read(startAddress, count));
    }

    /**
     * Write a single holding register (FC6).
     * @throws {ProtocolError}
     */
    writeRegister(address: number, value: number): Promise<void> {
        return this.enqueue(() => this.write(address, value));
    }

    exclusive<T>(work: (session: ProtocolSession) => Promise<T>): Promise<T> {
        return this.enqueue(() => work(this.session));
    }

    /**
     * Release the socket once queued operations have settled. Safe when already closed.
     */
    close(): Promise<void> {
        return this.enqueue(async () => {
            this.invalidate();
        });
    }

    private read(startAddress: number, count: number): Promise<number[]> {
        const operation = `read ${count} registers @${startAddress}`;
        return this.execute(operation, async client => {
            const res = await client.readHoldingRegisters(startAddress, count);
            return res.data;
        });
    }

    private write(address: number, value: number): Promise<void> {
        const operation = `write register ${address}`;
        return this.execute(operation, async client => {
            await client.writeRegister(address, value);
        });
    }

    private enqueue<T>(action: () => Promise<T>): Promise<T> {
        const result = this.queue.then(action);
        // Keep the chain alive for the next caller; the error still reaches this caller through `result`
        this.queue = result.catch(() => undefined);
        return result;
    }

    private async execute<T>(operation: string, action: (client: ModbusRTU) => Promise<T>): Promise<T> {
        const client = this.client;
        if (!client || !client.isOpen) {
            this.invalidate();
            throw new ProtocolError('transport', operation, 'Port Not Open');
        }

        try {
            return await action(client);
        } catch (e) {
            const error = classifyError(operation, e);
            if (error.kind === 'transport') {
                this.invalidate();
            }
            throw error;
        }
    }

    private invalidate(): void {
        const client = this.client;
        this.client = null;
        if (client) {
            try { client.close(() => undefined); } catch (e) { /* already closed */ }
        }
    }
}

/**
 * Exception responses from the controller carry a numeric `modbusCode`;
 * every other failure (reset, timeout, closed port) is a transport failure.
 */
export function classifyError(operation: string, error: unknown): ProtocolError {
    if (error instanceof ProtocolError) return error;
    const message = error instanceof Error ? error.message : String(error);
    if (typeof error === 'object' && error !== null && 'modbusCode' in error && typeof error.modbusCode === 'number') {
        return new ProtocolError('protocol', operation, message, error.modbusCode);
    }
    return new ProtocolError('transport', operation, message);
}

export default ModbusClientAdapter;
