/**
 * Palette Extractor
 * Turns an artwork locator (or any opaque identifier) into four dominant colours
 */

import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { extname, join } from "path";
import sharp from "sharp";
import { isNearWhite, rgbToHex, type RGB } from "../lib/color/hex.js";
import { PaletteError, describeError } from "../lib/errors.js";
import { createLogger } from "../lib/log.js";
import { digestPalette } from "./digest.js";
import { httpFetcher, type ImageFetcher } from "./fetch.js";
import { PALETTE_SIZE, toPalette, type ColourHex, type Palette } from "./palette.js";

export const DEFAULT_MAX_DIMENSION = 200;
export const DEFAULT_FETCH_TIMEOUT_MS = 15000;
export const MAX_QUANTIZED_COLOURS = 8;

const log = createLogger("palette");

export interface ExtractPaletteOptions {
    fetcher?: ImageFetcher;
    timeoutMs?: number;
    /** Longest side after downscaling (default: 200) */
    maxDimension?: number;
    /** Parent directory for the per-call working directory (default: OS temp dir) */
    tmpDir?: string;
}

/**
 * Pixel count of one quantized colour
 */
export interface ColourCount {
    hex: ColourHex;
    rgb: RGB;
    count: number;
}

export function isFetchableSource(sourceIdentifier: string): boolean {
    return sourceIdentifier.startsWith("http://") || sourceIdentifier.startsWith("https://");
}

/**
 * File name for a downloaded artwork, keeping a short extension from the URL path
 */
export function artworkFileName(url: string): string {
    let ext = "";
    try {
        ext = extname(new URL(url).pathname);
    } catch {
        ext = "";
    }
    if (!ext || ext.length > 6) {
        ext = ".jpg";
    }
    return `artwork${ext}`;
}

/**
 * Writes `data` into a fresh working directory, hands the file path to `use`,
 * then removes the directory whatever happened. A failed removal is logged
 * and never replaces the caller's result or error.
 */
async function withTemporaryFile<T>(
    parentDir: string,
    fileName: string,
    data: Buffer,
    use: (path: string) => Promise<T>
): Promise<T> {
    const workDir = await mkdtemp(join(parentDir, "palette-"));
    try {
        const path = join(workDir, fileName);
        await writeFile(path, data);
        return await use(path);
    } finally {
        await rm(workDir, { recursive: true, force: true }).catch((error: unknown) => {
            log.warn(`Failed to remove ${workDir}: ${describeError(error)}`);
        });
    }
}

/**
 * Flattens onto white, downscales, quantizes to at most eight colours and
 * counts pixels per quantized colour (in first-seen order).
 *
 * @throws PaletteError (DecodeFailure) when the input is not a decodable image
 */
export async function quantizeImage(
    input: string | Buffer,
    maxDimension: number = DEFAULT_MAX_DIMENSION
): Promise<ColourCount[]> {
    let pixels: Buffer;
    let channels: number;

    try {
        const quantized = await sharp(input)
            .flatten({ background: { r: 255, g: 255, b: 255 } })
            .resize(maxDimension, maxDimension, {
                fit: "inside",
                withoutEnlargement: true,
            })
            .png({ palette: true, colours: MAX_QUANTIZED_COLOURS, dither: 0 })
            .toBuffer();

        const { data, info } = await sharp(quantized)
            .removeAlpha()
            .raw()
            .toBuffer({ resolveWithObject: true });
        pixels = data;
        channels = info.channels;
    } catch (error) {
        throw new PaletteError("DecodeFailure", `Unable to decode image: ${describeError(error)}`, {
            cause: error,
        });
    }

    const counts = new Map<string, ColourCount>();
    for (let i = 0; i + 2 < pixels.length; i += channels) {
        const rgb: RGB = { r: pixels[i], g: pixels[i + 1], b: pixels[i + 2] };
        const hex = rgbToHex(rgb);
        const entry = counts.get(hex);
        if (entry) {
            entry.count++;
        } else {
            counts.set(hex, { hex, rgb, count: 1 });
        }
    }

    return [...counts.values()];
}

/**
 * Most frequent colours first, near-white dropped, duplicates dropped
 */
export function selectDominantColours(
    counts: readonly ColourCount[],
    limit: number = PALETTE_SIZE
): ColourHex[] {
    const sorted = [...counts].sort((a, b) => b.count - a.count);
    const colours: ColourHex[] = [];

    for (const { hex, rgb } of sorted) {
        if (colours.length >= limit) {
            break;
        }
        if (isNearWhite(rgb) || colours.includes(hex)) {
            continue;
        }
        colours.push(hex);
    }

    return colours;
}

/**
 * Tops `found` up to four colours from `fallback`, skipping colours already held
 *
 * @throws PaletteError (PaletteExhausted) when four distinct colours cannot be reached
 */
export function completePalette(found: readonly ColourHex[], fallback: readonly ColourHex[]): Palette {
    const colours = found.slice(0, PALETTE_SIZE);

    for (const colour of fallback) {
        if (colours.length >= PALETTE_SIZE) {
            break;
        }
        if (!colours.includes(colour)) {
            colours.push(colour);
        }
    }

    if (colours.length < PALETTE_SIZE) {
        throw new PaletteError(
            "PaletteExhausted",
            `Only ${colours.length} distinct colour(s) available after fallback`
        );
    }

    return toPalette(colours);
}

/**
 * Extracts the top-4 colours for a source identifier.
 *
 * Identifiers that are not http(s) URLs are hashed (digest mode), so the same
 * string always yields the same palette. URLs are downloaded into a temporary
 * directory that is removed once the colours have been read.
 */
export async function extractPalette(
    sourceIdentifier: string,
    options: ExtractPaletteOptions = {}
): Promise<Palette> {
    if (!isFetchableSource(sourceIdentifier)) {
        return digestPalette(sourceIdentifier);
    }

    const {
        fetcher = httpFetcher,
        timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
        maxDimension = DEFAULT_MAX_DIMENSION,
        tmpDir = tmpdir(),
    } = options;

    const bytes = await fetcher(sourceIdentifier, { timeoutMs });

    const found = await withTemporaryFile(tmpDir, artworkFileName(sourceIdentifier), bytes, async (path) =>
        selectDominantColours(await quantizeImage(path, maxDimension))
    );

    if (found.length < PALETTE_SIZE) {
        log.debug(`${found.length} dominant colour(s) in ${sourceIdentifier}, topping up from digest`);
    }

    return completePalette(found, digestPalette(bytes));
}
