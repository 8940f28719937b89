import { defaultValue } from './codec';
import Registry from './registry';
import { ConnectionStatus, ProcessValue, Snapshot, ValueMap } from './types';

/**
 * Single source of truth for current values, setpoints and connection status.
 *
 * The current snapshot is a frozen object that is replaced wholesale on every
 * update, so a reader holding a snapshot can never see fields from two
 * different updates.
 */
export class SharedState {
    private current: Snapshot;
    private clock: () => Date;

    constructor(registry: Registry, clock: () => Date = () => new Date()) {
        this.clock = clock;
        const values: Record<string, ProcessValue> = {};
        const setpoints: Record<string, ProcessValue> = {};
        for (const variable of registry.variables) values[variable.name] = defaultValue(variable.kind);
        for (const setpoint of registry.setpoints) setpoints[setpoint.name] = defaultValue(setpoint.kind);

        const initial: Snapshot = {
            status: 'disconnected',
            values: Object.freeze(values),
            setpoints: Object.freeze(setpoints),
            lastUpdated: null,
            revision: 0
        };
        this.current = Object.freeze(initial);
    }

    read(): Snapshot {
        return this.current;
    }

    /**
     * Merge one cycle of decoded values (and optionally setpoints) with a status.
     * Names missing from the update keep their previous value.
     */
    applyReading(values: ValueMap, status: ConnectionStatus, setpoints?: ValueMap): Snapshot {
        const prev = this.current;
        return this.commit({
            status,
            values: merge(prev.values, values, 'value'),
            setpoints: setpoints ? merge(prev.setpoints, setpoints, 'setpoint') : prev.setpoints,
            lastUpdated: this.clock()
        });
    }

    applySetpoints(setpoints: ValueMap): Snapshot {
        const prev = this.current;
        return this.commit({
            status: prev.status,
            values: prev.values,
            setpoints: merge(prev.setpoints, setpoints, 'setpoint'),
            lastUpdated: this.clock()
        });
    }

    setStatus(status: ConnectionStatus): Snapshot {
        const prev = this.current;
        if (prev.status === status) return prev;
        return this.commit({ ...prev, status });
    }

    /**
     * Record the cached result of an operator write for a known variable or setpoint.
     */
    applyCommandResult(name: string, value: ProcessValue): Snapshot {
        const prev = this.current;
        if (name in prev.values) {
            return this.commit({ ...prev, values: merge(prev.values, { [name]: value }, 'value') });
        }
        if (name in prev.setpoints) {
            return this.commit({ ...prev, setpoints: merge(prev.setpoints, { [name]: value }, 'setpoint') });
        }
        throw new Error(`Unknown state key "${name}"`);
    }

    private commit(next: Omit<Snapshot, 'revision'>): Snapshot {
        this.current = Object.freeze({ ...next, revision: this.current.revision + 1 });
        return this.current;
    }
}

function merge(base: ValueMap, update: ValueMap, label: string): ValueMap {
    const next: Record<string, ProcessValue> = { ...base };
    for (const [name, value] of Object.entries(update)) {
        if (!(name in base)) throw new Error(`Unknown ${label} "${name}"`);
        next[name] = value;
    }
    return Object.freeze(next);
}

export default SharedState;
