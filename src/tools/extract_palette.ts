/**
 * Palette extraction tool
 * Returns the four dominant colours of an artwork URL (or the digest palette of any other string)
 */

import { extractPalette, isFetchableSource } from "../engine/extract.js";
import type { ImageFetcher } from "../engine/fetch.js";
import type { ColourHex } from "../engine/palette.js";
import { loadConfig } from "../lib/config.js";
import { toToolFailure, type ToolDefinition, type ToolFailure } from "./types.js";

export interface ExtractPaletteInput {
    source: string;
    maxDimension?: number;
}

export interface ExtractPaletteSuccess {
    ok: true;
    source: string;
    mode: "digest" | "image";
    palette: ColourHex[];
}

export type ExtractPaletteOutput = ExtractPaletteSuccess | ToolFailure;

export interface ExtractPaletteDeps {
    fetcher?: ImageFetcher;
}

export async function extractPaletteHandler(
    input: ExtractPaletteInput,
    deps: ExtractPaletteDeps = {}
): Promise<ExtractPaletteOutput> {
    const config = loadConfig();

    try {
        const palette = await extractPalette(input.source, {
            fetcher: deps.fetcher,
            timeoutMs: config.fetchTimeoutMs,
            maxDimension: input.maxDimension ?? config.maxDimension,
            tmpDir: config.tmpDir,
        });
        return {
            ok: true,
            source: input.source,
            mode: isFetchableSource(input.source) ? "image" : "digest",
            palette: [...palette],
        };
    } catch (error) {
        return toToolFailure(error);
    }
}

/**
 * Extract palette tool definition for MCP
 */
export const extractPaletteTool = {
    name: "extract_palette",
    description:
        "Extracts four dominant colours from an artwork image URL. Near-white background is ignored. Non-URL identifiers get a deterministic hash-derived palette.",
    inputSchema: {
        type: "object",
        properties: {
            source: {
                type: "string",
                description: "Artwork URL (http/https) or any opaque identifier",
            },
            maxDimension: {
                type: "number",
                description: "Longest side the image is downscaled to before quantizing (default: 200)",
                default: 200,
            },
        },
        required: ["source"],
    },
} satisfies ToolDefinition;
