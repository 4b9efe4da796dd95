/**
 * Palette snapshot: the JSON record written after each poll
 */

import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { ColourHex } from "../engine/palette.js";
import { describeError } from "../lib/errors.js";
import { createLogger } from "../lib/log.js";

const log = createLogger("snapshot");

export interface PaletteSnapshot {
    /** Local time, `YYYY-MM-DD HH:MM:SS` */
    timestamp: string;
    artwork_identifier: string | null;
    /** Rotated base palette; empty when nothing was produced */
    base_palette: ColourHex[];
    phase: number;
    pattern: ColourHex[] | null;
}

export interface SnapshotInput {
    artwork: string | null;
    base?: readonly ColourHex[];
    phase: number;
    pattern?: readonly ColourHex[] | null;
    now?: Date;
}

function pad(value: number): string {
    return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
    return (
        `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
        `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
    );
}

export function buildSnapshot(input: SnapshotInput): PaletteSnapshot {
    return {
        timestamp: formatTimestamp(input.now ?? new Date()),
        artwork_identifier: input.artwork,
        base_palette: [...(input.base ?? [])],
        phase: input.phase,
        pattern: input.pattern ? [...input.pattern] : null,
    };
}

/**
 * Writes the snapshot as JSON, creating parent directories.
 * Failures are logged and reported through the return value only.
 */
export async function writeSnapshot(path: string, snapshot: PaletteSnapshot): Promise<boolean> {
    try {
        await mkdir(dirname(path), { recursive: true });
        await writeFile(path, JSON.stringify(snapshot), "utf-8");
        return true;
    } catch (error) {
        log.warn(`Could not write snapshot to ${path}: ${describeError(error)}`);
        return false;
    }
}
