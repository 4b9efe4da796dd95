/**
 * Digest-mode palette: four colours sliced out of an MD5 digest
 */

import { createHash } from "crypto";
import { rgbToHex } from "../lib/color/hex.js";
import { PALETTE_SIZE, toPalette, type Palette } from "./palette.js";

const BYTES_PER_COLOUR = 3;

/**
 * Derives four colours from the MD5 of the given content.
 * Colour i is the three digest bytes starting at i*3, wrapping to the
 * start of the digest when it runs short.
 *
 * Strings are hashed as UTF-8.
 */
export function digestPalette(content: string | Buffer): Palette {
    const digest = createHash("md5").update(content).digest();
    const colours: string[] = [];

    for (let i = 0; i < PALETTE_SIZE; i++) {
        const start = (i * BYTES_PER_COLOUR) % digest.length;
        colours.push(
            rgbToHex({
                r: digest[start],
                g: digest[(start + 1) % digest.length],
                b: digest[(start + 2) % digest.length],
            })
        );
    }

    return toPalette(colours);
}
