/**
 * Register Codec
 * Pure conversions between raw 16-bit holding registers and typed process values
 */

import * as CONST from './constants';
import { RegistryError } from './errors';
import { ProcessValue, VariableKind } from './types';

export interface CodecDescriptor {
    name: string;
    kind: VariableKind;
    scale?: number;
}

function scaleOf(descriptor: CodecDescriptor): number {
    const scale = descriptor.scale ?? 1;
    if (!Number.isFinite(scale) || scale === 0) {
        throw new RegistryError(`"${descriptor.name}" has scale ${scale}`);
    }
    return scale;
}

function assertRaw(raw: number, descriptor: CodecDescriptor): void {
    if (!Number.isInteger(raw) || raw < 0 || raw > CONST.UINT16_MAX) {
        throw new RangeError(`Raw value ${raw} for "${descriptor.name}" is not a 16-bit register value`);
    }
}

/**
 * Decode one raw register into a tagged process value
 *
 * Floats use the fixed two-decimal convention: raw / 100 * scale.
 */
export function decode(raw: number, descriptor: CodecDescriptor): ProcessValue {
    assertRaw(raw, descriptor);
    const scale = scaleOf(descriptor);

    switch (descriptor.kind) {
        case 'float':
            return { kind: 'float', value: (raw / CONST.FLOAT_DECIMAL_FACTOR) * scale };
        case 'bool':
            return { kind: 'bool', value: raw !== 0 };
        case 'int':
            return { kind: 'int', value: Math.trunc(raw * scale) };
        default:
            throw new RegistryError(`"${descriptor.name}" has unknown kind ${String(descriptor.kind)}`);
    }
}

/**
 * Encode a value into the raw register representation.
 * Out-of-range values throw instead of being clamped.
 */
export function encode(value: number | boolean, descriptor: CodecDescriptor): number {
    const scale = scaleOf(descriptor);
    let raw: number;

    switch (descriptor.kind) {
        case 'bool':
            raw = value ? 1 : 0;
            break;
        case 'float':
            // toFixed strips binary noise (0.29 * 100 = 28.999...) before truncating
            raw = Math.trunc(Number(((Number(value) / scale) * CONST.FLOAT_DECIMAL_FACTOR).toFixed(6)));
            break;
        case 'int':
            raw = Math.trunc(Number(value) / scale);
            break;
        default:
            throw new RegistryError(`"${descriptor.name}" has unknown kind ${String(descriptor.kind)}`);
    }

    if (!Number.isInteger(raw) || raw < 0 || raw > CONST.UINT16_MAX) {
        throw new RangeError(`Value ${String(value)} for "${descriptor.name}" does not fit a 16-bit register`);
    }
    return raw;
}

/**
 * Neutral value for a kind, used for initial state and reset setpoints
 */
export function defaultValue(kind: VariableKind): ProcessValue {
    switch (kind) {
        case 'bool':
            return { kind: 'bool', value: false };
        case 'int':
            return { kind: 'int', value: 0 };
        default:
            return { kind: 'float', value: 0 };
    }
}

/**
 * Decode every descriptor whose register falls inside the returned window.
 * Registers past the end of a short window are skipped, never read as zero.
 */
export function decodeBlock<T extends CodecDescriptor & { register: number }>(
    registers: readonly number[],
    blockStart: number,
    descriptors: readonly T[]
): Record<string, ProcessValue> {
    const decoded: Record<string, ProcessValue> = {};
    for (const descriptor of descriptors) {
        const offset = descriptor.register - blockStart;
        if (offset < 0 || offset >= registers.length) continue;
        decoded[descriptor.name] = decode(registers[offset], descriptor);
    }
    return decoded;
}
