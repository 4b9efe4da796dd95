/**
 * Unit tests for HTTP retrieval
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import { httpFetcher } from '../fetch.js';

const URL_UNDER_TEST = 'https://images.example.test/cover.jpg';

describe('httpFetcher', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    it('should return the response body with a timeout signal attached', async () => {
        const fetchMock = vi.fn(async (_input: string, _init?: unknown) => new Response(new Uint8Array([1, 2, 3]), { status: 200 }));
        vi.stubGlobal('fetch', fetchMock);

        const bytes = await httpFetcher(URL_UNDER_TEST, { timeoutMs: 500 });

        expect([...bytes]).toEqual([1, 2, 3]);
        expect(fetchMock).toHaveBeenCalledWith(
            URL_UNDER_TEST,
            expect.objectContaining({ signal: expect.any(AbortSignal) })
        );
    });

    it('should fail with RetrievalFailure on a non-success status', async () => {
        vi.stubGlobal('fetch', vi.fn(async () => new Response('missing', { status: 404 })));

        const attempt = httpFetcher(URL_UNDER_TEST, { timeoutMs: 500 });

        await expect(attempt).rejects.toHaveProperty('kind', 'RetrievalFailure');
        await expect(attempt).rejects.toThrow(`ERROR-PP-02: Failed to fetch ${URL_UNDER_TEST}: HTTP 404`);
    });

    it('should fail with RetrievalFailure when the timeout elapses', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(
                (_input: string, init?: { signal?: AbortSignal | null }) =>
                    new Promise<Response>((_resolve, reject) => {
                        const signal = init?.signal;
                        if (signal) {
                            signal.addEventListener('abort', () => reject(signal.reason));
                        }
                    })
            )
        );

        const attempt = httpFetcher(URL_UNDER_TEST, { timeoutMs: 20 });

        await expect(attempt).rejects.toHaveProperty('kind', 'RetrievalFailure');
        await expect(attempt).rejects.toThrow(`ERROR-PP-02: Failed to fetch ${URL_UNDER_TEST}: The operation was aborted due to timeout`);
    });

    it('should fail with RetrievalFailure on a network error', async () => {
        vi.stubGlobal(
            'fetch',
            vi.fn(async () => {
                throw new TypeError('fetch failed');
            })
        );

        const attempt = httpFetcher(URL_UNDER_TEST, { timeoutMs: 500 });

        await expect(attempt).rejects.toHaveProperty('kind', 'RetrievalFailure');
        await expect(attempt).rejects.toThrow('fetch failed');
    });
});
