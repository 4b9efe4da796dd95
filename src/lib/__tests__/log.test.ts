/**
 * Unit tests for the scoped logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createLogger } from '../log.js';

describe('createLogger', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('should prefix errors with the scope and pass details through', () => {
        const failure = new Error('boom');
        createLogger('poller').error('Error fetching playback', failure);

        expect(console.error).toHaveBeenCalledWith('[poller] Error fetching playback', failure);
    });

    it('should keep info, warn and debug quiet under the test runner', () => {
        const log = createLogger('palettepulse-mcp');

        log.info('PalettePulse MCP server running on stdio');
        log.warn('Failed to remove /tmp/palette-x');
        log.debug('2 dominant colour(s)');

        expect(console.error).not.toHaveBeenCalled();
    });
});
