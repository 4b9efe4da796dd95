/**
 * Environment configuration
 */

import { z } from "zod";
import { DEFAULT_FETCH_TIMEOUT_MS, DEFAULT_MAX_DIMENSION } from "../engine/extract.js";
import { DEFAULT_PATTERN_LENGTH, PATTERN_MODES, type PatternMode } from "../engine/pattern.js";

export interface PaletteConfig {
    fetchTimeoutMs: number;
    maxDimension: number;
    tmpDir?: string;
    snapshotPath?: string;
    patternLength: number;
    patternMode: PatternMode;
    version?: string;
}

const envSchema = z.object({
    PALETTE_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_FETCH_TIMEOUT_MS),
    PALETTE_MAX_DIMENSION: z.coerce.number().int().positive().default(DEFAULT_MAX_DIMENSION),
    PALETTE_TMP_DIR: z.string().min(1).optional(),
    PALETTE_SNAPSHOT_PATH: z.string().min(1).optional(),
    PALETTE_PATTERN_LENGTH: z.coerce.number().int().min(0).default(DEFAULT_PATTERN_LENGTH),
    PALETTE_PATTERN_MODE: z.enum(PATTERN_MODES).default("repeat"),
    VERSION: z.string().min(1).optional(),
});

/**
 * Reads and validates configuration from the environment
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PaletteConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; ");
        throw new Error(`Invalid configuration: ${problems}`);
    }

    const vars = parsed.data;
    return {
        fetchTimeoutMs: vars.PALETTE_FETCH_TIMEOUT_MS,
        maxDimension: vars.PALETTE_MAX_DIMENSION,
        tmpDir: vars.PALETTE_TMP_DIR,
        snapshotPath: vars.PALETTE_SNAPSHOT_PATH,
        patternLength: vars.PALETTE_PATTERN_LENGTH,
        patternMode: vars.PALETTE_PATTERN_MODE,
        version: vars.VERSION,
    };
}
