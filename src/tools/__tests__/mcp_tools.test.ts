/**
 * Integration tests for MCP tool handlers using InMemoryTransport
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { PalettePulseServer } from '../../server.js';
import { resetRotationHandler } from '../poll_artwork.js';
import { digestPalette } from '../../engine/digest.js';

describe('MCP Tool Handlers - Integration Tests', () => {
    let server: PalettePulseServer;
    let client: Client;
    let serverTransport: InMemoryTransport;
    let clientTransport: InMemoryTransport;

    async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
        const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }, CallToolResultSchema));

        expect(result.content).toHaveLength(1);
        const [first] = result.content;
        expect(first.type).toBe('text');
        return JSON.parse(first.type === 'text' ? first.text : '');
    }

    beforeEach(async () => {
        resetRotationHandler();
        [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

        server = new PalettePulseServer();
        await server.run(serverTransport);

        client = new Client(
            {
                name: 'test-client',
                version: '1.0.0',
            },
            {
                capabilities: {},
            }
        );
        await client.connect(clientTransport);
    });

    afterEach(async () => {
        await client.close();
        await serverTransport.close();
    });

    it('should list every tool', async () => {
        const { tools } = await client.listTools();

        expect(tools.map((t) => t.name)).toEqual([
            'health',
            'extract_palette',
            'generate_pattern',
            'poll_artwork',
            'reset_rotation',
        ]);
        for (const tool of tools) {
            expect(tool.inputSchema.type).toBe('object');
        }
    });

    it('should report toolCount in health', async () => {
        const parsed = await callJson('health');
        expect(parsed).toMatchObject({ ok: true, toolCount: 5, rotation: { active: false } });
    });

    it('should extract a digest palette', async () => {
        expect(await callJson('extract_palette', { source: 'abc' })).toEqual({
            ok: true,
            source: 'abc',
            mode: 'digest',
            palette: ['#900150', '#983CD2', '#4FB0D6', '#963F7D'],
        });
    });

    it('should normalise colours before generating a pattern', async () => {
        const parsed = await callJson('generate_pattern', {
            colors: ['ff0000', '#00ff00', '#0000FF', '#abcdef'],
            length: 6,
        });

        expect(parsed).toEqual({
            ok: true,
            mode: 'repeat',
            length: 6,
            pattern: ['#FF0000', '#00FF00', '#0000FF', '#ABCDEF', '#FF0000', '#00FF00'],
        });
    });

    it('should return a tool-level failure for a short palette', async () => {
        expect(await callJson('generate_pattern', { colors: ['#FF0000'] })).toEqual({
            ok: false,
            error: 'ERROR-PP-01: Palette must contain exactly 4 colours, got 1',
            kind: 'InvalidInput',
        });
    });

    it('should reject a malformed hex colour', async () => {
        await expect(
            client.callTool({ name: 'generate_pattern', arguments: { colors: ['#GGGGGG'] } }, CallToolResultSchema)
        ).rejects.toThrow(/Colours must be 6-digit hex values/);
    });

    it('should reject an unknown tool', async () => {
        await expect(client.callTool({ name: 'bogus', arguments: {} }, CallToolResultSchema)).rejects.toThrow(
            /Unknown tool: bogus/
        );
    });

    it('should rotate the session across poll_artwork calls and reset it', async () => {
        const base = digestPalette('album-1');

        expect(await callJson('poll_artwork', { artwork: 'album-1' })).toMatchObject({
            idle: false,
            snapshot: { phase: 0, base_palette: [...base] },
        });
        expect(await callJson('poll_artwork', { artwork: 'album-1' })).toMatchObject({
            snapshot: { phase: 1, base_palette: [base[1], base[2], base[3], base[0]] },
        });
        expect(await callJson('poll_artwork', { artwork: null })).toEqual({ ok: true, idle: true, phase: 1 });

        expect(await callJson('reset_rotation')).toEqual({ ok: true });
        expect(await callJson('poll_artwork', { artwork: 'album-1' })).toMatchObject({ snapshot: { phase: 0 } });
    });

    it('should reject an unknown poll_artwork mode', async () => {
        await expect(
            client.callTool({ name: 'poll_artwork', arguments: { artwork: 'album-1', mode: 'sparkle' } }, CallToolResultSchema)
        ).rejects.toThrow();
    });
});
