/**
 * Variable Registry
 * Static mapping from symbolic names to holding register addresses, kinds and scales
 */

import fs from 'fs-extra';
import path from 'path';
import * as CONST from './constants';
import { RegistryError } from './errors';
import { RegisterBlock, SetpointDescriptor, VariableDescriptor, VariableKind } from './types';

export const DEFAULT_REGISTER_MAP = path.join(__dirname, '..', 'config', 'register-map.json');

const KINDS: readonly VariableKind[] = ['float', 'bool', 'int'];

export interface RegistryDefinition {
    variables: VariableDescriptor[];
    setpoints: SetpointDescriptor[];
    variableBlock: RegisterBlock;
    setpointBlock: RegisterBlock;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isKind(value: unknown): value is VariableKind {
    return typeof value === 'string' && KINDS.some(kind => kind === value);
}

function parseBlock(raw: unknown, fallback: RegisterBlock, label: string): RegisterBlock {
    if (raw === undefined) return fallback;
    if (!isRecord(raw) || typeof raw.start !== 'number' || typeof raw.count !== 'number') {
        throw new RegistryError(`block "${label}" needs numeric start and count`);
    }
    return { start: raw.start, count: raw.count };
}

function parseEntries(raw: unknown, label: string): Array<[string, Record<string, unknown>]> {
    if (!isRecord(raw)) throw new RegistryError(`"${label}" must be an object of name -> descriptor`);
    return Object.entries(raw).map(([name, entry]) => {
        if (!isRecord(entry)) throw new RegistryError(`${label}.${name} must be an object`);
        return [name, entry];
    });
}

/**
 * Turn the JSON register map into descriptors. Validation happens in the Registry constructor.
 */
export function parseRegisterMap(raw: unknown): RegistryDefinition {
    if (!isRecord(raw)) throw new RegistryError('root must be an object');
    const blocks = isRecord(raw.blocks) ? raw.blocks : {};

    const variables = parseEntries(raw.variables, 'variables').map(([name, entry]): VariableDescriptor => {
        if (typeof entry.register !== 'number') throw new RegistryError(`variables.${name} has no register`);
        if (!isKind(entry.kind)) throw new RegistryError(`variables.${name} has unknown kind ${String(entry.kind)}`);
        return {
            name,
            register: entry.register,
            kind: entry.kind,
            scale: typeof entry.scale === 'number' ? entry.scale : 1,
            unit: typeof entry.unit === 'string' ? entry.unit : undefined
        };
    });

    const setpoints = parseEntries(raw.setpoints, 'setpoints').map(([name, entry]): SetpointDescriptor => {
        if (typeof entry.register !== 'number') throw new RegistryError(`setpoints.${name} has no register`);
        if (!isKind(entry.kind)) throw new RegistryError(`setpoints.${name} has unknown kind ${String(entry.kind)}`);
        return {
            name,
            register: entry.register,
            kind: entry.kind,
            unit: typeof entry.unit === 'string' ? entry.unit : undefined
        };
    });

    return {
        variables,
        setpoints,
        variableBlock: parseBlock(blocks.variables, { start: CONST.VARIABLE_BLOCK_START, count: CONST.VARIABLE_BLOCK_COUNT }, 'variables'),
        setpointBlock: parseBlock(blocks.setpoints, { start: CONST.SETPOINT_BLOCK_START, count: CONST.SETPOINT_BLOCK_COUNT }, 'setpoints')
    };
}

function checkBlock(block: RegisterBlock, label: string): void {
    if (!Number.isInteger(block.start) || block.start < 0 || block.start > CONST.UINT16_MAX) {
        throw new RegistryError(`block "${label}" start ${block.start} is not a register address`);
    }
    if (!Number.isInteger(block.count) || block.count < 1 || block.count > CONST.MAX_BLOCK_REGISTERS) {
        throw new RegistryError(`block "${label}" count ${block.count} must be 1-${CONST.MAX_BLOCK_REGISTERS}`);
    }
}

function checkDescriptors(entries: ReadonlyArray<{ name: string; register: number }>, block: RegisterBlock, label: string): void {
    const seen = new Map<number, string>();
    for (const entry of entries) {
        if (!Number.isInteger(entry.register) || entry.register < block.start || entry.register >= block.start + block.count) {
            throw new RegistryError(`${label}.${entry.name} register ${entry.register} is outside ${block.start}-${block.start + block.count - 1}`);
        }
        const other = seen.get(entry.register);
        if (other) {
            throw new RegistryError(`${label}.${entry.name} reuses register ${entry.register} of ${other}`);
        }
        seen.set(entry.register, entry.name);
    }
}

export class Registry {
    public readonly variables: readonly VariableDescriptor[];
    public readonly setpoints: readonly SetpointDescriptor[];
    public readonly variableBlock: RegisterBlock;
    public readonly setpointBlock: RegisterBlock;
    private variablesByName: Map<string, VariableDescriptor>;
    private setpointsByName: Map<string, SetpointDescriptor>;

    constructor(definition: RegistryDefinition) {
        checkBlock(definition.variableBlock, 'variables');
        checkBlock(definition.setpointBlock, 'setpoints');
        checkDescriptors(definition.variables, definition.variableBlock, 'variables');
        checkDescriptors(definition.setpoints, definition.setpointBlock, 'setpoints');

        for (const variable of definition.variables) {
            if (!Number.isFinite(variable.scale) || variable.scale === 0) {
                throw new RegistryError(`variables.${variable.name} has scale ${variable.scale}`);
            }
        }

        const names = new Set<string>();
        for (const { name } of [...definition.variables, ...definition.setpoints]) {
            if (names.has(name)) throw new RegistryError(`name "${name}" is defined twice`);
            names.add(name);
        }

        this.variables = Object.freeze([...definition.variables]);
        this.setpoints = Object.freeze([...definition.setpoints]);
        this.variableBlock = definition.variableBlock;
        this.setpointBlock = definition.setpointBlock;
        this.variablesByName = new Map(this.variables.map(v => [v.name, v]));
        this.setpointsByName = new Map(this.setpoints.map(s => [s.name, s]));
    }

    /**
     * Load and validate a register map file
     * @throws {RegistryError} If the file is unreadable or the map is invalid
     */
    static load(filePath: string = DEFAULT_REGISTER_MAP): Registry {
        let raw: unknown;
        try {
            raw = fs.readJsonSync(filePath);
        } catch (e) {
            const reason = e instanceof Error ? e.message : String(e);
            throw new RegistryError(`cannot read ${filePath}: ${reason}`);
        }
        return new Registry(parseRegisterMap(raw));
    }

    getVariable(name: string): VariableDescriptor | undefined {
        return this.variablesByName.get(name);
    }

    getSetpoint(name: string): SetpointDescriptor | undefined {
        return this.setpointsByName.get(name);
    }

    /**
     * Boolean process variables are the equipment that operators can toggle
     */
    getBooleanVariable(name: string): VariableDescriptor | undefined {
        const variable = this.variablesByName.get(name);
        return variable && variable.kind === 'bool' ? variable : undefined;
    }
}

export default Registry;
