/**
 * Rotation session tools
 * One RotationTracker per server process, stepped by poll_artwork
 */

import { extractPalette } from "../engine/extract.js";
import { generatePattern } from "../engine/pattern.js";
import { RotationTracker } from "../engine/rotation.js";
import { loadConfig } from "../lib/config.js";
import { buildSnapshot, writeSnapshot, type PaletteSnapshot } from "../output/snapshot.js";
import { toToolFailure, type ToolDefinition, type ToolFailure } from "./types.js";

export interface PollArtworkInput {
    artwork: string | null;
    length?: number;
    mode?: string;
}

export type PollArtworkOutput =
    | { ok: true; idle: false; snapshot: PaletteSnapshot }
    | { ok: true; idle: true; phase: number }
    | ToolFailure;

let session: RotationTracker | null = null;

/**
 * Session tracker, created on first use from the current configuration
 */
export function getRotationSession(): RotationTracker {
    if (!session) {
        const config = loadConfig();
        session = new RotationTracker({
            extract: (sourceIdentifier) =>
                extractPalette(sourceIdentifier, {
                    timeoutMs: config.fetchTimeoutMs,
                    maxDimension: config.maxDimension,
                    tmpDir: config.tmpDir,
                }),
            length: config.patternLength,
            mode: config.patternMode,
        });
    }
    return session;
}

export function hasRotationSession(): boolean {
    return session !== null;
}

/**
 * Steps the session with the artwork now playing
 */
export async function pollArtworkHandler(input: PollArtworkInput): Promise<PollArtworkOutput> {
    const config = loadConfig();
    const tracker = getRotationSession();

    try {
        const frame = await tracker.poll(input.artwork);

        const snapshot = frame
            ? buildSnapshot({
                  artwork: frame.artwork,
                  base: frame.base,
                  phase: frame.phase,
                  pattern:
                      input.length !== undefined || input.mode !== undefined
                          ? generatePattern(
                                frame.base,
                                input.length ?? config.patternLength,
                                input.mode ?? config.patternMode
                            )
                          : frame.pattern,
              })
            : buildSnapshot({ artwork: null, phase: tracker.state.phase });

        if (config.snapshotPath) {
            await writeSnapshot(config.snapshotPath, snapshot);
        }

        return frame ? { ok: true, idle: false, snapshot } : { ok: true, idle: true, phase: snapshot.phase };
    } catch (error) {
        return toToolFailure(error);
    }
}

/**
 * Discards the session; the next poll starts from scratch
 */
export function resetRotationHandler(): { ok: true } {
    session = null;
    return { ok: true };
}

export const pollArtworkTool = {
    name: "poll_artwork",
    description:
        "Reports the artwork currently playing. A new artwork gets a freshly extracted palette at phase 0; the same artwork again rotates the palette one step (phase 0-3). Null means nothing is playing and leaves the session unchanged.",
    inputSchema: {
        type: "object",
        properties: {
            artwork: {
                type: ["string", "null"],
                description: "Artwork URL or identifier, or null when nothing is playing",
            },
            length: {
                type: "number",
                description: "Pattern length override (default: PALETTE_PATTERN_LENGTH or 16)",
                minimum: 0,
            },
            mode: {
                type: "string",
                description: "Pattern mode override (default: PALETTE_PATTERN_MODE or repeat)",
            },
        },
        required: ["artwork"],
    },
} satisfies ToolDefinition;

export const resetRotationTool = {
    name: "reset_rotation",
    description: "Forgets the last artwork and phase of the rotation session",
    inputSchema: {
        type: "object",
        properties: {},
    },
} satisfies ToolDefinition;
