import { decode, decodeBlock, defaultValue, encode } from '../src/codec';
import { RegistryError } from '../src/errors';

const floatVar = { name: 'soil_temp', kind: 'float' as const, scale: 1 };
const boolVar = { name: 'lamp_status', kind: 'bool' as const, scale: 1 };
const intVar = { name: 'pump_cycles', kind: 'int' as const, scale: 2 };

describe('codec', () => {
    describe('decode', () => {
        test('floats use two implied decimals', () => {
            expect(decode(2500, floatVar)).toEqual({ kind: 'float', value: 25 });
            expect(decode(1234, floatVar)).toEqual({ kind: 'float', value: 12.34 });
        });
        test('floats apply the scale after the decimal shift', () => {
            expect(decode(1000, { ...floatVar, scale: 10 })).toEqual({ kind: 'float', value: 100 });
        });
        test('bool is true for any non-zero register', () => {
            expect(decode(0, boolVar).value).toBe(false);
            expect(decode(1, boolVar).value).toBe(true);
            expect(decode(255, boolVar).value).toBe(true);
        });
        test('int multiplies by scale and truncates', () => {
            expect(decode(7, intVar)).toEqual({ kind: 'int', value: 14 });
            expect(decode(7, { ...intVar, scale: 0.5 })).toEqual({ kind: 'int', value: 3 });
        });
        test('setpoint descriptors without scale use 1', () => {
            expect(decode(6000, { name: 'soil_humidity_sp', kind: 'float' })).toEqual({ kind: 'float', value: 60 });
        });
        test('rejects values that are not 16-bit registers', () => {
            expect(() => decode(70000, floatVar)).toThrow(RangeError);
            expect(() => decode(-1, floatVar)).toThrow(RangeError);
        });
        test('rejects an invalid descriptor', () => {
            expect(() => decode(1, { ...floatVar, scale: 0 })).toThrow(RegistryError);
        });
    });

    describe('encode', () => {
        test('floats round trip for two-decimal values', () => {
            for (const v of [0, 0.01, 0.29, 12.34, 25, 60.5, 655.35]) {
                expect(decode(encode(v, floatVar), floatVar).value).toBeCloseTo(v, 6);
            }
        });
        test('floats truncate extra decimals', () => {
            expect(encode(12.349, floatVar)).toBe(1234);
        });
        test('bool round trips', () => {
            expect(encode(true, boolVar)).toBe(1);
            expect(encode(false, boolVar)).toBe(0);
            expect(decode(encode(true, boolVar), boolVar).value).toBe(true);
            expect(decode(encode(false, boolVar), boolVar).value).toBe(false);
        });
        test('int divides by scale and truncates', () => {
            expect(encode(15, intVar)).toBe(7);
        });
        test('out-of-range values throw instead of clamping', () => {
            expect(() => encode(655.36, floatVar)).toThrow(RangeError);
            expect(() => encode(-1, floatVar)).toThrow(RangeError);
        });
    });

    describe('decodeBlock', () => {
        const descriptors = [
            { name: 'a', register: 100, kind: 'float' as const },
            { name: 'b', register: 101, kind: 'float' as const },
            { name: 'c', register: 105, kind: 'bool' as const }
        ];

        test('decodes relative to the block start', () => {
            expect(decodeBlock([100, 200, 0, 0, 0, 1], 100, descriptors)).toEqual({
                a: { kind: 'float', value: 1 },
                b: { kind: 'float', value: 2 },
                c: { kind: 'bool', value: true }
            });
        });
        test('skips descriptors past the end of a short window', () => {
            expect(decodeBlock([100, 200], 100, descriptors)).toEqual({
                a: { kind: 'float', value: 1 },
                b: { kind: 'float', value: 2 }
            });
            expect(decodeBlock([], 100, descriptors)).toEqual({});
        });
    });

    test('defaultValue is neutral per kind', () => {
        expect(defaultValue('float')).toEqual({ kind: 'float', value: 0 });
        expect(defaultValue('int')).toEqual({ kind: 'int', value: 0 });
        expect(defaultValue('bool')).toEqual({ kind: 'bool', value: false });
    });
});
