/**
 * Rotation Tracker
 * Animates a palette across repeated polls of the same artwork
 */

import { extractPalette } from "./extract.js";
import { DEFAULT_PATTERN_LENGTH, generatePattern, type PatternMode } from "./pattern.js";
import { PALETTE_SIZE, type ColourHex, type Palette } from "./palette.js";

export interface RotationState {
    previousSourceIdentifier: string | null;
    basePalette: Palette | null;
    /** 0..3 */
    phase: number;
}

/**
 * State once an artwork has been seen
 */
export interface ActiveRotationState extends RotationState {
    previousSourceIdentifier: string;
    basePalette: Palette;
}

export type PaletteSource = (sourceIdentifier: string) => Promise<Palette>;

/**
 * One poll's output
 */
export interface RotationFrame {
    artwork: string;
    /** Base palette rotated left by `phase` */
    base: Palette;
    phase: number;
    pattern: ColourHex[];
}

export interface RotationTrackerOptions {
    extract?: PaletteSource;
    length?: number;
    mode?: PatternMode;
}

export function createRotationState(): RotationState {
    return { previousSourceIdentifier: null, basePalette: null, phase: 0 };
}

/**
 * Left-rotates the palette: [A,B,C,D] at phase 2 is [C,D,A,B]
 */
export function rotatePalette(palette: Palette, phase: number): Palette {
    const offset = ((phase % PALETTE_SIZE) + PALETTE_SIZE) % PALETTE_SIZE;
    return [
        palette[offset],
        palette[(offset + 1) % PALETTE_SIZE],
        palette[(offset + 2) % PALETTE_SIZE],
        palette[(offset + 3) % PALETTE_SIZE],
    ];
}

/**
 * Transition for an observed artwork id.
 * A new id extracts a fresh palette and resets the phase; the same id keeps
 * the palette and advances the phase mod 4. Extraction errors propagate and
 * no new state is produced.
 */
export async function advanceRotation(
    state: RotationState,
    sourceIdentifier: string,
    extract: PaletteSource
): Promise<ActiveRotationState> {
    if (sourceIdentifier === state.previousSourceIdentifier && state.basePalette !== null) {
        return {
            previousSourceIdentifier: sourceIdentifier,
            basePalette: state.basePalette,
            phase: (state.phase + 1) % PALETTE_SIZE,
        };
    }

    const basePalette = await extract(sourceIdentifier);
    return { previousSourceIdentifier: sourceIdentifier, basePalette, phase: 0 };
}

/**
 * Owns one RotationState. Overlapping polls are queued and applied in call
 * order, so the state only ever has one writer.
 */
export class RotationTracker {
    private current: RotationState = createRotationState();
    private queue: Promise<unknown> = Promise.resolve();
    private readonly extract: PaletteSource;
    private readonly length: number;
    private readonly mode: PatternMode;

    constructor(options: RotationTrackerOptions = {}) {
        this.extract = options.extract ?? ((sourceIdentifier) => extractPalette(sourceIdentifier));
        this.length = options.length ?? DEFAULT_PATTERN_LENGTH;
        this.mode = options.mode ?? "repeat";
    }

    get state(): Readonly<RotationState> {
        return this.current;
    }

    /**
     * Steps the state machine with the artwork now playing.
     * Returns null (and changes nothing) when nothing is playing.
     */
    poll(sourceIdentifier: string | null): Promise<RotationFrame | null> {
        const result = this.queue.then(() => this.step(sourceIdentifier));
        // The caller receives the rejection through `result`; the queue only
        // needs to know the step has settled.
        this.queue = result.catch(() => undefined);
        return result;
    }

    reset(): void {
        this.current = createRotationState();
    }

    private async step(sourceIdentifier: string | null): Promise<RotationFrame | null> {
        if (sourceIdentifier === null) {
            return null;
        }

        const next = await advanceRotation(this.current, sourceIdentifier, this.extract);
        this.current = next;

        const base = rotatePalette(next.basePalette, next.phase);
        return {
            artwork: next.previousSourceIdentifier,
            base,
            phase: next.phase,
            pattern: generatePattern(base, this.length, this.mode),
        };
    }
}
