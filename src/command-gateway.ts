import * as CONST from './constants';
import { decode, defaultValue } from './codec';
import { CommandError, ProtocolError } from './errors';
import { HistorySink } from './history';
import { ProtocolClient, ProtocolSession } from './modbus-client';
import Registry from './registry';
import SharedState from './shared-state';
import { Logger } from './types';

/**
 * What the cache holds after a successful setpoint write:
 * `reset` stores the kind's neutral value until the next read cycle,
 * `written` stores the decoded written value.
 */
export type SetpointCacheMode = 'reset' | 'written';

export type CommandAction = 'toggle' | boolean;

export interface SetpointAck {
    name: string;
    value: number;
}

export interface CommandAck {
    name: string;
    state: boolean;
}

export interface CommandGatewayOptions {
    setpointCacheMode?: SetpointCacheMode;
    logger?: Logger;
    history?: HistorySink;
}

/**
 * Validates and executes operator writes. Failed writes are reported once and never retried.
 */
export class CommandGateway {
    private setpointCacheMode: SetpointCacheMode;
    private logger: Logger;
    private history?: HistorySink;
    private resetWarned: boolean;

    constructor(
        private client: ProtocolClient,
        private state: SharedState,
        private registry: Registry,
        options: CommandGatewayOptions = {}
    ) {
        this.setpointCacheMode = options.setpointCacheMode ?? 'reset';
        this.logger = options.logger ?? console;
        this.history = options.history;
        this.resetWarned = false;
    }

    /**
     * Write a pre-scaled raw value to a setpoint register.
     * @throws {CommandError} UNKNOWN_SETPOINT, INVALID_REQUEST or WRITE_FAILED
     */
    async setSetpoint(name: string, rawValue: number): Promise<SetpointAck> {
        const setpoint = this.registry.getSetpoint(name);
        if (!setpoint) {
            throw new CommandError('UNKNOWN_SETPOINT', `Unknown setpoint: ${name}`);
        }

        if (!Number.isInteger(rawValue) || rawValue < 0 || rawValue > CONST.UINT16_MAX) {
            throw new CommandError('INVALID_REQUEST', `Setpoint value must be an integer 0-${CONST.UINT16_MAX}`);
        }
        const written = decode(rawValue, setpoint);

        await this.client.exclusive(session => this.write(session, setpoint.register, rawValue));

        if (this.setpointCacheMode === 'written') {
            this.state.applyCommandResult(name, written);
        } else {
            if (!this.resetWarned) {
                this.logger.warn('[Bridge] Setpoint cache is reset to its default after writes until the next read cycle (SETPOINT_CACHE_MODE=reset)');
                this.resetWarned = true;
            }
            this.state.applyCommandResult(name, defaultValue(setpoint.kind));
        }
        this.history?.recordSetpointChange({ name, rawValue, value: written.value });

        return { name, value: rawValue };
    }

    /**
     * Toggle or set a boolean process variable. The cache is updated optimistically on success.
     * The current state is read once the connection is held, so back-to-back toggles alternate.
     * @throws {CommandError} INVALID_COMMAND or WRITE_FAILED
     */
    async toggleOrSet(name: string, action: CommandAction): Promise<CommandAck> {
        const variable = this.registry.getBooleanVariable(name);
        if (!variable) {
            throw new CommandError('INVALID_COMMAND', `Invalid command: ${name}`);
        }

        return this.client.exclusive(async session => {
            const cached = this.state.read().values[name];
            const current = cached !== undefined && cached.kind === 'bool' ? cached.value : false;
            const next = action === 'toggle' ? !current : action;

            await this.write(session, variable.register, next ? 1 : 0);
            this.state.applyCommandResult(name, { kind: 'bool', value: next });

            return { name, state: next };
        });
    }

    private async write(session: ProtocolSession, address: number, value: number): Promise<void> {
        if (this.state.read().status !== 'connected') {
            this.logger.error(`[Bridge] Write to register ${address} refused: not connected`);
            throw new CommandError('WRITE_FAILED', 'Not connected to controller');
        }

        try {
            await session.writeRegister(address, value);
        } catch (e) {
            if (!(e instanceof ProtocolError)) throw e;
            if (e.kind === 'transport') {
                this.state.setStatus('disconnected');
            }
            this.logger.error(`[Bridge] Write to register ${address} failed: ${e.message}`);
            throw new CommandError('WRITE_FAILED', `Write failed: ${e.message}`);
        }
        this.logger.log(`[Bridge] Wrote register ${address}: ${value}`);
    }
}

export default CommandGateway;
