#!/usr/bin/env node
import { describeError } from "./lib/errors.js";
import { PalettePulseServer } from "./server.js";

const server = new PalettePulseServer();
server.run().catch((error: unknown) => {
    console.error(`[MCP Error] ${describeError(error)}`);
    process.exit(1);
});
