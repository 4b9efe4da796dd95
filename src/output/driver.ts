/**
 * Output drivers: sinks for generated patterns
 */

import type { ColourHex } from "../engine/palette.js";

/**
 * Anything that can display a pattern: a console, an LED strip, a lamp
 */
export interface OutputDriver {
    connect(): void | Promise<void>;
    send(colours: readonly ColourHex[]): void | Promise<void>;
    close(): void | Promise<void>;
}

export type LineWriter = (line: string) => void;

/**
 * Prints patterns to stdout
 */
export class ConsoleOutputDriver implements OutputDriver {
    private readonly write: LineWriter;

    constructor(write: LineWriter = (line) => console.log(line)) {
        this.write = write;
    }

    connect(): void {
        this.write("ConsoleOutputDriver: connected");
    }

    send(colours: readonly ColourHex[]): void {
        this.write("ConsoleOutputDriver: sending pattern:");
        this.write(colours.join(", "));
    }

    close(): void {
        this.write("ConsoleOutputDriver: closed");
    }
}
