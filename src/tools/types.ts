/**
 * Shared tool shapes
 */

import { isPaletteError, type PaletteErrorKind } from "../lib/errors.js";

/**
 * Tool definition as listed to MCP clients
 */
export interface ToolDefinition {
    name: string;
    description: string;
    inputSchema: {
        type: "object";
        properties?: Record<string, unknown>;
        required?: string[];
    };
}

export interface ToolFailure {
    ok: false;
    error: string;
    kind: PaletteErrorKind;
}

/**
 * Converts a PaletteError into a failure result; anything else is rethrown
 */
export function toToolFailure(error: unknown): ToolFailure {
    if (isPaletteError(error)) {
        return { ok: false, error: error.message, kind: error.kind };
    }
    throw error;
}
