import fs from 'fs-extra';
import path from 'path';
import * as CONST from './constants';
import { Logger, Snapshot } from './types';

export interface ReadingRecord {
    timestamp: string;
    values: Record<string, number | boolean>;
}

export interface SetpointChange {
    name: string;
    rawValue: number;
    value: number | boolean;
}

export interface SetpointChangeRecord extends SetpointChange {
    timestamp: string;
}

export interface HistoryData {
    readings: ReadingRecord[];
    setpointChanges: SetpointChangeRecord[];
}

/**
 * Optional destination for past readings and setpoint changes.
 * Implementations must not throw: history never affects polling or writes.
 */
export interface HistorySink {
    recordReading(snapshot: Snapshot): void;
    recordSetpointChange(change: SetpointChange): void;
}

export interface HistoryStoreOptions {
    minReadingIntervalMs?: number;
    maxEntries?: number;
    logger?: Logger;
    clock?: () => Date;
}

/**
 * Append-only history kept in a single JSON file.
 */
export class HistoryStore implements HistorySink {
    private filePath: string;
    private data: HistoryData;
    private minReadingIntervalMs: number;
    private maxEntries: number;
    private lastReadingAt: number | null;
    private logger: Logger;
    private clock: () => Date;

    constructor(filePath: string, options: HistoryStoreOptions = {}) {
        this.filePath = filePath;
        this.data = { readings: [], setpointChanges: [] };
        this.minReadingIntervalMs = options.minReadingIntervalMs ?? CONST.DEFAULT_HISTORY_INTERVAL;
        this.maxEntries = options.maxEntries ?? CONST.DEFAULT_HISTORY_MAX_ENTRIES;
        this.lastReadingAt = null;
        this.logger = options.logger ?? console;
        this.clock = options.clock ?? (() => new Date());
        this.load();
    }

    load(): void {
        try {
            if (fs.existsSync(this.filePath)) {
                const raw: unknown = fs.readJsonSync(this.filePath);
                this.data = toHistoryData(raw);
            }
        } catch (e) {
            this.logger.error("[Bridge] Failed to load history:", e instanceof Error ? e.message : String(e));
            this.data = { readings: [], setpointChanges: [] };
        }
    }

    save(): void {
        try {
            fs.ensureDirSync(path.dirname(this.filePath));
            fs.writeJsonSync(this.filePath, this.data, { spaces: 2 });
        } catch (e) {
            this.logger.error("[Bridge] Failed to save history:", e instanceof Error ? e.message : String(e));
        }
    }

    list(): HistoryData {
        return {
            readings: [...this.data.readings],
            setpointChanges: [...this.data.setpointChanges]
        };
    }

    /**
     * Persist a reading when connected and at least `minReadingIntervalMs` after the previous one
     */
    recordReading(snapshot: Snapshot): void {
        if (snapshot.status !== 'connected') return;
        const now = this.clock();
        if (this.lastReadingAt !== null && now.getTime() - this.lastReadingAt < this.minReadingIntervalMs) return;
        this.lastReadingAt = now.getTime();

        const values: Record<string, number | boolean> = {};
        for (const [name, value] of Object.entries(snapshot.values)) values[name] = value.value;

        this.data.readings = capped([...this.data.readings, { timestamp: now.toISOString(), values }], this.maxEntries);
        this.save();
    }

    recordSetpointChange(change: SetpointChange): void {
        const record: SetpointChangeRecord = { timestamp: this.clock().toISOString(), ...change };
        this.data.setpointChanges = capped([...this.data.setpointChanges, record], this.maxEntries);
        this.save();
    }
}

function capped<T>(list: T[], max: number): T[] {
    return list.length > max ? list.slice(list.length - max) : list;
}

function toHistoryData(raw: unknown): HistoryData {
    if (typeof raw !== 'object' || raw === null) return { readings: [], setpointChanges: [] };
    const readings = 'readings' in raw && Array.isArray(raw.readings) ? raw.readings.filter(isReading) : [];
    const setpointChanges = 'setpointChanges' in raw && Array.isArray(raw.setpointChanges) ? raw.setpointChanges.filter(isSetpointChange) : [];
    return { readings, setpointChanges };
}

function isReading(value: unknown): value is ReadingRecord {
    return typeof value === 'object' && value !== null
        && 'timestamp' in value && typeof value.timestamp === 'string'
        && 'values' in value && typeof value.values === 'object' && value.values !== null;
}

function isSetpointChange(value: unknown): value is SetpointChangeRecord {
    return typeof value === 'object' && value !== null
        && 'timestamp' in value && typeof value.timestamp === 'string'
        && 'name' in value && typeof value.name === 'string'
        && 'rawValue' in value && typeof value.rawValue === 'number';
}

export default HistoryStore;
