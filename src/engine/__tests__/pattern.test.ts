/**
 * Unit tests for the pattern generator
 */

import { describe, it, expect } from 'vitest';
import { generatePattern, isPatternMode, PATTERN_MODES } from '../pattern.js';
import { PaletteError } from '../../lib/errors.js';

const COLOURS = ['#010203', '#0A0B0C', '#AABBCC', '#112233'];
const [A, B, C, D] = COLOURS;

/**
 * Kind of the PaletteError thrown by fn, if any
 */
function thrownKind(fn: () => unknown): string | undefined {
    try {
        fn();
    } catch (error) {
        return error instanceof PaletteError ? error.kind : 'not a PaletteError';
    }
    return undefined;
}

describe('generatePattern', () => {
    describe('repeat mode', () => {
        it('should cycle the four colours', () => {
            const seq = generatePattern(COLOURS, 8, 'repeat');

            expect(seq).toHaveLength(8);
            expect(seq.slice(0, 4)).toEqual(COLOURS);
            expect(seq.slice(4, 8)).toEqual(COLOURS);
        });

        it('should stop mid-cycle when length is not a multiple of four', () => {
            expect(generatePattern(COLOURS, 6, 'repeat')).toEqual([A, B, C, D, A, B]);
        });

        it('should default to 16 colours in repeat mode', () => {
            const seq = generatePattern(COLOURS);
            expect(seq).toHaveLength(16);
            expect(seq[12]).toBe(A);
            expect(seq[15]).toBe(D);
        });
    });

    describe('mirror mode', () => {
        it('should bounce back through the palette', () => {
            expect(generatePattern(COLOURS, 8, 'mirror')).toEqual([A, B, C, D, D, C, B, A]);
        });

        it('should continue the eight-colour cycle past one bounce', () => {
            expect(generatePattern(COLOURS, 11, 'mirror')).toEqual([A, B, C, D, D, C, B, A, A, B, C]);
        });
    });

    describe('rotate mode', () => {
        it('should match repeat within a single call', () => {
            for (const length of [0, 1, 4, 7, 16, 33]) {
                expect(generatePattern(COLOURS, length, 'rotate')).toEqual(generatePattern(COLOURS, length, 'repeat'));
            }
        });
    });

    describe('length contract', () => {
        it('should produce exactly the requested number of colours in every mode', () => {
            for (const mode of PATTERN_MODES) {
                for (const length of [0, 1, 3, 8, 9, 64]) {
                    expect(generatePattern(COLOURS, length, mode)).toHaveLength(length);
                }
            }
        });

        it('should return an empty pattern for length 0', () => {
            expect(generatePattern(COLOURS, 0, 'mirror')).toEqual([]);
        });
    });

    describe('invalid inputs', () => {
        it('should reject a palette with fewer than four colours', () => {
            expect(() => generatePattern(['#000000'], 4, 'repeat')).toThrow(PaletteError);
            expect(thrownKind(() => generatePattern(['#000000'], 4, 'repeat'))).toBe('InvalidInput');
        });

        it('should reject a palette with more than four colours', () => {
            expect(thrownKind(() => generatePattern([...COLOURS, '#FFFFFF'], 4, 'repeat'))).toBe('InvalidInput');
        });

        it('should reject an unknown mode', () => {
            expect(() => generatePattern(COLOURS, 4, 'bogus')).toThrow('ERROR-PP-01: Unknown pattern mode: bogus');
            expect(thrownKind(() => generatePattern(COLOURS, 4, 'bogus'))).toBe('InvalidInput');
        });

        it('should reject negative and fractional lengths', () => {
            expect(thrownKind(() => generatePattern(COLOURS, -1, 'repeat'))).toBe('InvalidInput');
            expect(thrownKind(() => generatePattern(COLOURS, 2.5, 'repeat'))).toBe('InvalidInput');
        });
    });

    it('should not modify the input palette', () => {
        const colours = [...COLOURS];
        generatePattern(colours, 8, 'mirror');
        expect(colours).toEqual(COLOURS);
    });
});

describe('isPatternMode', () => {
    it('should accept only the known modes', () => {
        expect(isPatternMode('repeat')).toBe(true);
        expect(isPatternMode('mirror')).toBe(true);
        expect(isPatternMode('rotate')).toBe(true);
        expect(isPatternMode('Repeat')).toBe(false);
        expect(isPatternMode('')).toBe(false);
    });
});
