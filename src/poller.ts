/**
 * Playback polling loop
 * Feeds the artwork now playing through the RotationTracker once per interval
 */

import { setTimeout as delay } from "timers/promises";
import type { RotationFrame, RotationTracker } from "./engine/rotation.js";
import { describeError } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";
import type { OutputDriver } from "./output/driver.js";
import { buildSnapshot, formatTimestamp, writeSnapshot } from "./output/snapshot.js";

const log = createLogger("poller");

/**
 * Reports the artwork identifier of whatever is playing, or null
 */
export interface PlaybackSource {
    currentArtwork(): Promise<string | null>;
}

export interface PollLoopOptions {
    source: PlaybackSource;
    tracker: RotationTracker;
    driver?: OutputDriver;
    intervalMs: number;
    /** Stop after this many polls (default: run until the source fails) */
    maxLoops?: number;
    snapshotPath?: string;
    sleep?: (ms: number) => Promise<void>;
    now?: () => Date;
    print?: (line: string) => void;
}

/**
 * Runs the loop and resolves with a process exit code:
 * 0 after `maxLoops` polls, 1 when the playback source fails.
 * Extraction errors are reported for that poll and the loop carries on.
 */
export async function runPollLoop(options: PollLoopOptions): Promise<number> {
    const {
        source,
        tracker,
        driver,
        intervalMs,
        maxLoops,
        snapshotPath,
        sleep = (ms: number) => delay(ms),
        now = () => new Date(),
        print = (line: string) => console.log(line),
    } = options;

    let loops = 0;
    await driver?.connect();

    try {
        while (true) {
            let artwork: string | null;
            try {
                artwork = await source.currentArtwork();
            } catch (error) {
                log.error(`Error fetching playback: ${describeError(error)}`);
                return 1;
            }

            const polledAt = now();
            let frame: RotationFrame | null = null;
            let patternText: string | null = null;
            try {
                frame = await tracker.poll(artwork);
                patternText = frame ? frame.pattern.join(",") : null;
            } catch (error) {
                patternText = `(error extracting colours: ${describeError(error)})`;
            }

            print(`[${formatTimestamp(polledAt)}] Artwork: ${artwork} | Pattern: ${patternText}`);

            if (frame && driver) {
                await driver.send(frame.pattern);
            }

            if (snapshotPath) {
                await writeSnapshot(
                    snapshotPath,
                    buildSnapshot({
                        artwork,
                        base: frame?.base,
                        phase: tracker.state.phase,
                        pattern: frame?.pattern ?? null,
                        now: polledAt,
                    })
                );
            }

            loops++;
            if (maxLoops !== undefined && loops >= maxLoops) {
                return 0;
            }

            await sleep(intervalMs);
        }
    } finally {
        await driver?.close();
    }
}
