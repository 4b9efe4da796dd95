import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { PATTERN_MODES } from "./engine/pattern.js";
import { normalizeHex } from "./lib/color/hex.js";
import { describeError } from "./lib/errors.js";
import { createLogger } from "./lib/log.js";
import { tools, toolHandlers } from "./tools/index.js";

const log = createLogger("MCP Error");
const serverLog = createLogger("palettepulse-mcp");

const hexColourSchema = z
    .string()
    .regex(/^#?[0-9a-fA-F]{6}$/, "Colours must be 6-digit hex values")
    .transform((hex) => normalizeHex(hex) ?? hex);

const toolSchemas = {
    extract_palette: z.object({
        source: z.string(),
        maxDimension: z.number().int().positive().optional(),
    }),
    generate_pattern: z.object({
        colors: z.array(hexColourSchema),
        length: z.number().int().min(0).optional(),
        mode: z.string().optional(),
    }),
    poll_artwork: z.object({
        artwork: z.string().min(1).nullable(),
        length: z.number().int().min(0).optional(),
        mode: z.enum(PATTERN_MODES).optional(),
    }),
};

function textResult(result: unknown) {
    return {
        content: [
            {
                type: "text" as const,
                text: JSON.stringify(result, null, 2),
            },
        ],
    };
}

function parseArguments<T extends z.ZodTypeAny>(schema: T, args: unknown, toolName: string): z.infer<T> {
    const parseResult = schema.safeParse(args ?? {});
    if (!parseResult.success) {
        throw new McpError(
            ErrorCode.InvalidParams,
            parseResult.error.issues[0]?.message || `Invalid parameters for ${toolName}`
        );
    }
    return parseResult.data;
}

/**
 * PalettePulse MCP Server
 * Artwork palettes and animated colour patterns
 */
export class PalettePulseServer {
    private server: Server;

    constructor() {
        this.server = new Server(
            {
                name: "palettepulse-mcp",
                version: "0.1.0",
            },
            {
                capabilities: {
                    tools: {},
                },
            }
        );

        this.setupToolHandlers();

        this.server.onerror = (error) => log.error("Server error", error);

        // Only set up SIGINT handler if not in test environment
        if (process.env.NODE_ENV !== "test" && typeof process.env.VITEST === "undefined") {
            process.on("SIGINT", () => {
                this.server
                    .close()
                    .catch((error: unknown) => log.error(`Failed to close cleanly: ${describeError(error)}`))
                    .finally(() => process.exit(0));
            });
        }
    }

    private setupToolHandlers() {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools,
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            const toolName = request.params.name;
            const args = request.params.arguments;

            try {
                switch (toolName) {
                    case "health":
                        return textResult(toolHandlers.health());
                    case "extract_palette":
                        return textResult(
                            await toolHandlers.extract_palette(parseArguments(toolSchemas.extract_palette, args, toolName))
                        );
                    case "generate_pattern":
                        return textResult(
                            toolHandlers.generate_pattern(parseArguments(toolSchemas.generate_pattern, args, toolName))
                        );
                    case "poll_artwork":
                        return textResult(
                            await toolHandlers.poll_artwork(parseArguments(toolSchemas.poll_artwork, args, toolName))
                        );
                    case "reset_rotation":
                        return textResult(toolHandlers.reset_rotation());
                }
            } catch (error) {
                if (error instanceof McpError) {
                    throw error;
                }
                throw new McpError(ErrorCode.InternalError, `Failed to run ${toolName}: ${describeError(error)}`);
            }

            throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${toolName}`);
        });
    }

    async run(transport?: Transport) {
        const serverTransport = transport ?? new StdioServerTransport();
        await this.server.connect(serverTransport);
        if (!transport) {
            serverLog.info("PalettePulse MCP server running on stdio");
        }
    }
}
