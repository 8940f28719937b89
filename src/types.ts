/**
 * Shared type definitions for the bridge
 */

export type VariableKind = 'float' | 'bool' | 'int';

export interface VariableDescriptor {
    readonly name: string;
    readonly register: number;
    readonly kind: VariableKind;
    readonly scale: number;
    readonly unit?: string;
}

/**
 * Setpoints live in their own offset block and carry no scale factor.
 */
export interface SetpointDescriptor {
    readonly name: string;
    readonly register: number;
    readonly kind: VariableKind;
    readonly unit?: string;
}

export interface RegisterBlock {
    readonly start: number;
    readonly count: number;
}

export type ProcessValue =
    | { readonly kind: 'float'; readonly value: number }
    | { readonly kind: 'int'; readonly value: number }
    | { readonly kind: 'bool'; readonly value: boolean };

export type ValueMap = Readonly<Record<string, ProcessValue>>;

export type ConnectionStatus = 'disconnected' | 'connecting' | 'connected';

/**
 * Atomically consistent copy of the shared state.
 * `revision` increases by one on every update.
 */
export interface Snapshot {
    readonly status: ConnectionStatus;
    readonly values: ValueMap;
    readonly setpoints: ValueMap;
    readonly lastUpdated: Date | null;
    readonly revision: number;
}

/**
 * Wire shape of the status query and of every live feed frame.
 */
export interface StatusPayload {
    timestamp: string;
    connected: boolean;
    values: Record<string, number | boolean>;
    setpoints: Record<string, number | boolean>;
}

export interface Logger {
    log(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    error(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
}
