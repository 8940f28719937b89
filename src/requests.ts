/**
 * Boundary validation for operator write requests
 */

import * as CONST from './constants';
import { CommandAction } from './command-gateway';
import { CommandError } from './errors';

export interface SetpointRequest {
    type: 'setpoint';
    name: string;
    value: number;
}

export interface CommandRequest {
    type: 'command';
    name: string;
    action: CommandAction;
}

export type WriteRequest = SetpointRequest | CommandRequest;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireName(body: Record<string, unknown>): string {
    const name = body.name;
    if (typeof name !== 'string' || name.trim() === '') {
        throw new CommandError('INVALID_REQUEST', 'Field "name" must be a non-empty string');
    }
    return name;
}

/**
 * `{name, value}` where value is the raw register integer (numeric strings accepted)
 * @throws {CommandError} INVALID_REQUEST
 */
export function parseSetpointRequest(body: unknown): SetpointRequest {
    if (!isRecord(body)) throw new CommandError('INVALID_REQUEST', 'Request body must be a JSON object');
    const name = requireName(body);

    const raw = body.value;
    const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 0 || value > CONST.UINT16_MAX) {
        throw new CommandError('INVALID_REQUEST', `Field "value" must be an integer 0-${CONST.UINT16_MAX}`);
    }
    return { type: 'setpoint', name, value };
}

/**
 * `{name, action}` where action is "toggle", a boolean, or 0/1
 * @throws {CommandError} INVALID_REQUEST
 */
export function parseCommandRequest(body: unknown): CommandRequest {
    if (!isRecord(body)) throw new CommandError('INVALID_REQUEST', 'Request body must be a JSON object');
    const name = requireName(body);

    const raw = body.action;
    let action: CommandAction;
    if (raw === 'toggle' || typeof raw === 'boolean') {
        action = raw;
    } else if (raw === 0 || raw === 1) {
        action = raw === 1;
    } else {
        throw new CommandError('INVALID_REQUEST', 'Field "action" must be "toggle", true, false, 0 or 1');
    }
    return { type: 'command', name, action };
}
