/**
 * Pattern Generator
 * Expands a four-colour palette into a fixed-length colour sequence
 */

import { PaletteError } from "../lib/errors.js";
import { toPalette, type ColourHex } from "./palette.js";

export const PATTERN_MODES = ["repeat", "mirror", "rotate"] as const;

export type PatternMode = (typeof PATTERN_MODES)[number];

export const DEFAULT_PATTERN_LENGTH = 16;

export function isPatternMode(value: string): value is PatternMode {
    return PATTERN_MODES.some((mode) => mode === value);
}

/**
 * Generates a repeatable colour sequence from four colours
 *
 * - repeat: ABCDABCD...
 * - mirror: ABCDDCBAABCD...
 * - rotate: same sequence as repeat; animation comes from the caller
 *   rotating the base between calls (see RotationTracker)
 *
 * @param colours - Exactly four hex colours
 * @param length - Number of entries to produce (non-negative integer)
 * @param mode - One of PATTERN_MODES
 * @throws PaletteError (InvalidInput) on a bad palette, length or mode
 */
export function generatePattern(
    colours: readonly ColourHex[],
    length: number = DEFAULT_PATTERN_LENGTH,
    mode: string = "repeat"
): ColourHex[] {
    const base = toPalette(colours);

    if (!Number.isInteger(length) || length < 0) {
        throw new PaletteError("InvalidInput", `Pattern length must be a non-negative integer, got ${length}`);
    }

    if (!isPatternMode(mode)) {
        throw new PaletteError("InvalidInput", `Unknown pattern mode: ${mode}`);
    }

    // mirror bounces: base then base reversed, an 8-entry cycle
    const cycle: readonly ColourHex[] = mode === "mirror" ? [...base, ...[...base].reverse()] : base;

    return Array.from({ length }, (_, i) => cycle[i % cycle.length]);
}
