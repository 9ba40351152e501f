/**
 * @file Value Codec Unit Tests
 *
 * Covers scalar parsing rules (booleans, integer clamping, float32 text),
 * sequence splitting and the tagged-variant encode/decode switch.
 *
 * @module
 */

import { describe, it, expect } from 'vitest';
import {
    boolean_decode,
    boolean_encode,
    double_decode,
    double_encode,
    float_decode,
    float_encode,
    integer_decode,
    integer_encode,
    kindCodec_get,
    paramValue_decode,
    paramValue_encode,
    paramValue_initial,
    sequence_split
} from './codec.js';
import { kind_isKnown, PARAM_KINDS } from './kinds.js';

describe('codec', (): void => {
    describe('boolean', (): void => {
        it('prints true/false', (): void => {
            expect(boolean_encode(true)).toBe('true');
            expect(boolean_encode(false)).toBe('false');
        });

        it('accepts words and numeric truthiness', (): void => {
            expect(boolean_decode('yes')).toBe(true);
            expect(boolean_decode('no')).toBe(false);
            expect(boolean_decode('2')).toBe(true);
            expect(boolean_decode('0')).toBe(false);
            expect(boolean_decode('-1')).toBe(false);
            expect(boolean_decode('maybe')).toBe(false);
        });
    });

    describe('integer', (): void => {
        it('parses the leading integer', (): void => {
            expect(integer_decode('3.7')).toBe(3);
            expect(integer_decode('  12x')).toBe(12);
            expect(integer_decode('abc')).toBe(0);
        });

        it('clamps to the int32 range', (): void => {
            expect(integer_decode('99999999999')).toBe(2147483647);
            expect(integer_decode('-99999999999')).toBe(-2147483648);
        });

        it('never prints a negative zero', (): void => {
            expect(integer_encode(-0)).toBe('0');
            expect(integer_encode(-7)).toBe('-7');
        });
    });

    describe('double', (): void => {
        it('parses the leading number and falls back to 0', (): void => {
            expect(double_decode('0.333abc')).toBe(0.333);
            expect(double_decode('x')).toBe(0);
            expect(double_decode('NaN')).toBeNaN();
            expect(double_decode('-Infinity')).toBe(-Infinity);
        });

        it('prints shortest round-trip text', (): void => {
            expect(double_encode(0.1 + 0.2)).toBe('0.30000000000000004');
            expect(double_encode(-0)).toBe('-0');
            expect(double_encode(2)).toBe('2');
        });
    });

    describe('float', (): void => {
        it('prints the shortest text reproducing the float32', (): void => {
            expect(float_encode(0.333)).toBe('0.333');
            expect(float_encode(1 / 3)).toBe('0.33333334');
            expect(float_encode(-0)).toBe('-0');
        });

        it('rounds decoded values to float32', (): void => {
            expect(float_decode('0.1')).toBe(Math.fround(0.1));
        });
    });

    describe('sequence_split', (): void => {
        it('treats empty text as an empty list', (): void => {
            expect(sequence_split('')).toEqual([]);
        });

        it('drops one trailing empty element', (): void => {
            expect(sequence_split('1,2,')).toEqual(['1', '2']);
        });

        it('keeps inner empty elements', (): void => {
            expect(sequence_split('a,,b')).toEqual(['a', '', 'b']);
        });
    });

    describe('tagged values', (): void => {
        it('decodes sequences under their element kind', (): void => {
            expect(paramValue_decode('integer-vector', '1,2.9,x')).toEqual({ kind: 'integer-vector', value: [1, 2, 0] });
            expect(paramValue_decode('point', '1.5,2,3')).toEqual({ kind: 'point', value: ['1.5', '2', '3'] });
        });

        it('encodes through the matching kind codec', (): void => {
            expect(paramValue_encode({ kind: 'float-vector', value: [0.5, Math.fround(0.2)] })).toBe('0.5,0.2');
            expect(paramValue_encode({ kind: 'string-enumeration', value: 'linear' })).toBe('linear');
        });

        it('gives every kind a zero value whose text decodes back to it', (): void => {
            for (const kind of PARAM_KINDS) {
                const initial = paramValue_initial(kind);
                expect(initial.kind).toBe(kind);
                expect(paramValue_decode(kind, paramValue_encode(initial))).toEqual(initial);
            }
        });

        it('exposes typed per-kind codecs', (): void => {
            const codec = kindCodec_get('double-vector');
            expect(codec.decode('1,2,3,4')).toEqual([1, 2, 3, 4]);
            expect(codec.encode([0.25])).toBe('0.25');
        });
    });

    it('recognizes kind labels', (): void => {
        expect(kind_isKnown('file')).toBe(true);
        expect(kind_isKnown('vector')).toBe(false);
    });
});
