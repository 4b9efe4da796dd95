#!/usr/bin/env node
/**
 * Command-line demo for the palette engine
 *
 * Usage:
 *   palettepulse demo [identifier]
 *   palettepulse pattern <c1> <c2> <c3> <c4> [--length N] [--mode repeat|mirror|rotate]
 *   palettepulse poll <identifier>... [--interval MS] [--loops N]
 */

import { pathToFileURL } from "url";
import { z } from "zod";
import { extractPalette } from "./engine/extract.js";
import { DEFAULT_PATTERN_LENGTH, generatePattern } from "./engine/pattern.js";
import { RotationTracker } from "./engine/rotation.js";
import { loadConfig } from "./lib/config.js";
import { normalizeHex } from "./lib/color/hex.js";
import { describeError } from "./lib/errors.js";
import { ConsoleOutputDriver, type LineWriter } from "./output/driver.js";
import { runPollLoop, type PlaybackSource } from "./poller.js";

export const USAGE = [
    "Usage:",
    "  palettepulse demo [identifier]",
    "  palettepulse pattern <c1> <c2> <c3> <c4> [--length N] [--mode repeat|mirror|rotate]",
    "  palettepulse poll <identifier>... [--interval MS] [--loops N]",
].join("\n");

const DEFAULT_DEMO_IDENTIFIER = "demo-artwork";

const flagsSchema = z.object({
    length: z.coerce.number().int().min(0).default(DEFAULT_PATTERN_LENGTH),
    mode: z.string().default("repeat"),
    interval: z.coerce.number().int().min(0).default(60_000),
    loops: z.coerce.number().int().positive().optional(),
});

type CliFlags = z.infer<typeof flagsSchema>;

/**
 * Splits `--name value` pairs from positional arguments
 */
function splitArgs(args: string[]): { positional: string[]; flags: CliFlags } {
    const positional: string[] = [];
    const raw: Record<string, string> = {};

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg.startsWith("--")) {
            const value = args[i + 1];
            if (value === undefined) {
                throw new Error(`Missing value for ${arg}`);
            }
            raw[arg.slice(2)] = value;
            i++;
        } else {
            positional.push(arg);
        }
    }

    const parsed = flagsSchema.safeParse(raw);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new Error(`Invalid --${issue?.path.join(".") ?? "flag"}: ${issue?.message ?? "bad value"}`);
    }
    return { positional, flags: parsed.data };
}

/**
 * Cycles through a fixed list of artwork identifiers
 */
function scriptedSource(identifiers: string[]): PlaybackSource {
    let index = 0;
    return {
        async currentArtwork() {
            const artwork = identifiers[index % identifiers.length];
            index++;
            return artwork;
        },
    };
}

/**
 * Runs one command and resolves with its exit code
 */
export async function main(argv: string[], print: LineWriter = (line) => console.log(line)): Promise<number> {
    const [command, ...rest] = argv;

    try {
        const { positional, flags } = splitArgs(rest);
        const config = loadConfig();
        const extractOptions = {
            timeoutMs: config.fetchTimeoutMs,
            maxDimension: config.maxDimension,
            tmpDir: config.tmpDir,
        };

        switch (command) {
            case "demo": {
                const palette = await extractPalette(positional[0] ?? DEFAULT_DEMO_IDENTIFIER, extractOptions);
                const pattern = generatePattern(palette, DEFAULT_PATTERN_LENGTH, "repeat");

                const driver = new ConsoleOutputDriver(print);
                driver.connect();
                driver.send(pattern);
                driver.close();
                return 0;
            }
            case "pattern": {
                const colours = positional.map((colour) => normalizeHex(colour) ?? colour);
                print(generatePattern(colours, flags.length, flags.mode).join(","));
                return 0;
            }
            case "poll": {
                if (positional.length === 0) {
                    break;
                }
                const tracker = new RotationTracker({
                    extract: (sourceIdentifier) => extractPalette(sourceIdentifier, extractOptions),
                    length: config.patternLength,
                    mode: config.patternMode,
                });
                return await runPollLoop({
                    source: scriptedSource(positional),
                    tracker,
                    intervalMs: flags.interval,
                    maxLoops: flags.loops ?? positional.length,
                    snapshotPath: config.snapshotPath,
                    print,
                });
            }
        }
    } catch (error) {
        console.error(describeError(error));
        return 1;
    }

    print(USAGE);
    return 1;
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main(process.argv.slice(2))
        .then((code) => {
            process.exitCode = code;
        })
        .catch((error: unknown) => {
            console.error(describeError(error));
            process.exitCode = 1;
        });
}
