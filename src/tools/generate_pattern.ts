/**
 * Pattern generation tool
 */

import { DEFAULT_PATTERN_LENGTH, PATTERN_MODES, generatePattern } from "../engine/pattern.js";
import type { ColourHex } from "../engine/palette.js";
import { toToolFailure, type ToolDefinition, type ToolFailure } from "./types.js";

export interface GeneratePatternInput {
    colors: ColourHex[];
    length?: number;
    mode?: string;
}

export interface GeneratePatternSuccess {
    ok: true;
    mode: string;
    length: number;
    pattern: ColourHex[];
}

export type GeneratePatternOutput = GeneratePatternSuccess | ToolFailure;

export function generatePatternHandler(input: GeneratePatternInput): GeneratePatternOutput {
    const { colors, length = DEFAULT_PATTERN_LENGTH, mode = "repeat" } = input;

    try {
        const pattern = generatePattern(colors, length, mode);
        return { ok: true, mode, length, pattern };
    } catch (error) {
        return toToolFailure(error);
    }
}

/**
 * Generate pattern tool definition for MCP
 */
export const generatePatternTool = {
    name: "generate_pattern",
    description:
        "Expands exactly four hex colours into a fixed-length sequence. Modes: repeat (ABCDABCD), mirror (ABCDDCBA), rotate (same as repeat within one call).",
    inputSchema: {
        type: "object",
        properties: {
            colors: {
                type: "array",
                description: "Exactly four hex colours (e.g., #1A2B3C)",
                items: { type: "string" },
            },
            length: {
                type: "number",
                description: "Number of colours to produce (default: 16)",
                default: DEFAULT_PATTERN_LENGTH,
                minimum: 0,
            },
            mode: {
                type: "string",
                description: "Pattern mode (default: repeat)",
                enum: [...PATTERN_MODES],
                default: "repeat",
            },
        },
        required: ["colors"],
    },
} satisfies ToolDefinition;
