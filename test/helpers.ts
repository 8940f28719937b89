import { ProtocolClient, ProtocolSession } from '../src/modbus-client';
import Registry from '../src/registry';
import { Scheduler } from '../src/scheduler';
import { Logger } from '../src/types';

export interface FakeClient extends ProtocolClient {
    isConnected: boolean;
    connect: jest.Mock<Promise<void>, []>;
    readBlock: jest.Mock<Promise<number[]>, [number, number]>;
    writeRegister: jest.Mock<Promise<void>, [number, number]>;
    exclusive<T>(work: (session: ProtocolSession) => Promise<T>): Promise<T>;
    close: jest.Mock<Promise<void>, []>;
}

/**
 * In-process stand-in for the controller: `blocks` maps a start address to the registers it returns.
 */
export function createFakeClient(blocks: Record<number, number[]> = {}): FakeClient {
    const client: FakeClient = {
        isConnected: false,
        connect: jest.fn(async (): Promise<void> => {
            client.isConnected = true;
        }),
        readBlock: jest.fn(async (start: number, count: number): Promise<number[]> => (blocks[start] ?? []).slice(0, count)),
        writeRegister: jest.fn(async (_address: number, _value: number): Promise<void> => undefined),
        // Session calls go through the same mocks so tests can assert on them
        exclusive: <T>(work: (session: ProtocolSession) => Promise<T>): Promise<T> => work(client),
        close: jest.fn(async (): Promise<void> => {
            client.isConnected = false;
        })
    };
    return client;
}

/**
 * Sleeps resolve immediately; `now()` advances by every requested sleep.
 */
export class FakeScheduler implements Scheduler {
    public sleeps: number[] = [];
    public onSleep: (count: number) => void = () => undefined;
    private elapsed = 0;

    constructor(private start: Date = new Date('2024-05-01T12:00:00.000Z')) { }

    now(): Date {
        return new Date(this.start.getTime() + this.elapsed);
    }

    async sleep(ms: number): Promise<void> {
        this.sleeps.push(ms);
        this.elapsed += ms;
        this.onSleep(this.sleeps.length);
    }
}

export function silentLogger(): jest.Mocked<Logger> {
    return {
        log: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn()
    };
}

export function loadRegistry(): Registry {
    return Registry.load();
}

/**
 * A 20-register variable window for the shipped map, padded with zeros
 */
export function variableWindow(head: number[]): number[] {
    return [...head, ...new Array<number>(20 - head.length).fill(0)];
}
