import os from 'os';
import path from 'path';
import fs from 'fs-extra';
import HistoryStore from '../src/history';
import SharedState from '../src/shared-state';
import { loadRegistry, silentLogger } from './helpers';

describe('HistoryStore', () => {
    const registry = loadRegistry();
    let dir: string;
    let file: string;
    let now: Date;
    const clock = () => now;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'history-'));
        file = path.join(dir, 'nested', 'history.json');
        now = new Date('2024-05-01T12:00:00.000Z');
    });

    afterEach(() => {
        fs.removeSync(dir);
    });

    function connectedSnapshot(soilTemp: number) {
        const state = new SharedState(registry);
        return state.applyReading({ soil_temp: { kind: 'float', value: soilTemp } }, 'connected');
    }

    test('records readings at most once per interval', () => {
        const store = new HistoryStore(file, { clock, logger: silentLogger(), minReadingIntervalMs: 60000 });

        store.recordReading(connectedSnapshot(25));
        now = new Date('2024-05-01T12:00:30.000Z');
        store.recordReading(connectedSnapshot(26));
        now = new Date('2024-05-01T12:01:00.000Z');
        store.recordReading(connectedSnapshot(27));

        const readings = store.list().readings;
        expect(readings.map(r => r.timestamp)).toEqual(['2024-05-01T12:00:00.000Z', '2024-05-01T12:01:00.000Z']);
        expect(readings[1].values.soil_temp).toBe(27);
        expect(readings[1].values.lamp_status).toBe(false);
    });

    test('skips readings while disconnected', () => {
        const store = new HistoryStore(file, { clock, logger: silentLogger() });
        store.recordReading(new SharedState(registry).read());
        expect(store.list().readings).toEqual([]);
    });

    test('keeps only the newest entries', () => {
        const store = new HistoryStore(file, { clock, logger: silentLogger(), maxEntries: 2 });
        store.recordSetpointChange({ name: 'soil_temp_sp', rawValue: 2400, value: 24 });
        store.recordSetpointChange({ name: 'soil_temp_sp', rawValue: 2500, value: 25 });
        store.recordSetpointChange({ name: 'air_humidity_sp', rawValue: 7000, value: 70 });

        expect(store.list().setpointChanges).toEqual([
            { timestamp: '2024-05-01T12:00:00.000Z', name: 'soil_temp_sp', rawValue: 2500, value: 25 },
            { timestamp: '2024-05-01T12:00:00.000Z', name: 'air_humidity_sp', rawValue: 7000, value: 70 }
        ]);
    });

    test('persists to disk and reloads', () => {
        const store = new HistoryStore(file, { clock, logger: silentLogger() });
        store.recordSetpointChange({ name: 'soil_humidity_sp', rawValue: 6000, value: 60 });
        store.recordReading(connectedSnapshot(25));

        const reloaded = new HistoryStore(file, { clock, logger: silentLogger() });
        expect(reloaded.list()).toEqual(store.list());
        expect(fs.readJsonSync(file).setpointChanges).toHaveLength(1);
    });

    test('starts empty and logs when the file is corrupt', () => {
        fs.outputFileSync(file, '{not json');
        const logger = silentLogger();

        const store = new HistoryStore(file, { clock, logger });

        expect(store.list()).toEqual({ readings: [], setpointChanges: [] });
        expect(logger.error).toHaveBeenCalledTimes(1);
    });

    test('drops malformed entries on load', () => {
        fs.outputJsonSync(file, {
            readings: [{ timestamp: '2024-05-01T11:00:00.000Z', values: { soil_temp: 20 } }, { values: 3 }],
            setpointChanges: 'nope'
        });

        const store = new HistoryStore(file, { clock, logger: silentLogger() });

        expect(store.list()).toEqual({
            readings: [{ timestamp: '2024-05-01T11:00:00.000Z', values: { soil_temp: 20 } }],
            setpointChanges: []
        });
    });
});
