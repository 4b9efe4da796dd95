/**
 * Health check tool - Returns server status and rotation session state
 */

import { readFileSync } from "fs";
import { resolve } from "path";
import { z } from "zod";
import { loadConfig } from "../lib/config.js";
import { getRotationSession, hasRotationSession } from "./poll_artwork.js";
import type { ToolDefinition } from "./types.js";

export interface HealthOutput {
    ok: true;
    version: string;
    uptimeSec: number;
    toolCount: number;
    rotation: {
        active: boolean;
        artwork: string | null;
        phase: number;
    };
    config: {
        maxDimension: number;
        fetchTimeoutMs: number;
        patternLength: number;
        patternMode: string;
    };
}

// Track server start time
const startTime = Date.now();

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Get version from VERSION or package.json
 */
function getVersion(configured?: string): string {
    if (configured) {
        return configured;
    }

    try {
        const packagePath = resolve(process.cwd(), "package.json");
        const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packagePath, "utf-8")));
        return parsed.success ? parsed.data.version : "unknown";
    } catch {
        return "unknown";
    }
}

/**
 * @param toolCount - Number of tools the server lists
 */
export function healthHandler(toolCount: number): HealthOutput {
    const config = loadConfig();
    const active = hasRotationSession();
    const state = active ? getRotationSession().state : null;

    return {
        ok: true,
        version: getVersion(config.version),
        uptimeSec: Math.floor((Date.now() - startTime) / 1000),
        toolCount,
        rotation: {
            active,
            artwork: state?.previousSourceIdentifier ?? null,
            phase: state?.phase ?? 0,
        },
        config: {
            maxDimension: config.maxDimension,
            fetchTimeoutMs: config.fetchTimeoutMs,
            patternLength: config.patternLength,
            patternMode: config.patternMode,
        },
    };
}

export const healthTool = {
    name: "health",
    description: "Returns server health status including version, uptime, tool count, rotation session state and effective configuration",
    inputSchema: {
        type: "object",
        properties: {},
    },
} satisfies ToolDefinition;
