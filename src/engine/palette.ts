/**
 * Palette value types
 */

import { PaletteError } from "../lib/errors.js";

/**
 * One colour as `#RRGGBB`, uppercase
 */
export type ColourHex = string;

/**
 * Exactly four colours; order is the base cycle for patterns and rotation
 */
export type Palette = readonly [ColourHex, ColourHex, ColourHex, ColourHex];

export const PALETTE_SIZE = 4;

export const COLOUR_HEX_PATTERN = /^#[0-9A-F]{6}$/;

/**
 * Narrows a colour list to a Palette, refusing anything but four entries
 */
export function toPalette(colours: readonly ColourHex[]): Palette {
    if (colours.length !== PALETTE_SIZE) {
        throw new PaletteError(
            "InvalidInput",
            `Palette must contain exactly ${PALETTE_SIZE} colours, got ${colours.length}`
        );
    }
    return [colours[0], colours[1], colours[2], colours[3]];
}
