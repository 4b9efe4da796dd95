/**
 * Tools aggregator - Exports all tool definitions and handlers
 */

import { healthTool, healthHandler } from "./health.js";
import { extractPaletteTool, extractPaletteHandler, type ExtractPaletteInput } from "./extract_palette.js";
import { generatePatternTool, generatePatternHandler, type GeneratePatternInput } from "./generate_pattern.js";
import {
    pollArtworkTool,
    pollArtworkHandler,
    resetRotationTool,
    resetRotationHandler,
    type PollArtworkInput,
} from "./poll_artwork.js";
import type { ToolDefinition } from "./types.js";

export type { ToolDefinition } from "./types.js";

/**
 * All tool definitions
 */
export const tools: ToolDefinition[] = [
    healthTool,
    extractPaletteTool,
    generatePatternTool,
    pollArtworkTool,
    resetRotationTool,
];

/**
 * Tool handlers map
 */
export const toolHandlers = {
    health: () => healthHandler(tools.length),
    extract_palette: (input: ExtractPaletteInput) => extractPaletteHandler(input),
    generate_pattern: (input: GeneratePatternInput) => generatePatternHandler(input),
    poll_artwork: (input: PollArtworkInput) => pollArtworkHandler(input),
    reset_rotation: () => resetRotationHandler(),
};
