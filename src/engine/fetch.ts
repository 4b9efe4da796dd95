/**
 * Artwork retrieval over HTTP(S)
 */

import { PaletteError, describeError } from "../lib/errors.js";

export interface FetchOptions {
    timeoutMs: number;
}

/**
 * Supplies the raw bytes behind a locator, or fails with RetrievalFailure
 */
export type ImageFetcher = (url: string, options: FetchOptions) => Promise<Buffer>;

/**
 * Fetches the resource with a bounded timeout. No retries.
 */
export const httpFetcher: ImageFetcher = async (url, { timeoutMs }) => {
    let response: Response;
    try {
        response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    } catch (error) {
        throw new PaletteError("RetrievalFailure", `Failed to fetch ${url}: ${describeError(error)}`, {
            cause: error,
        });
    }

    if (!response.ok) {
        throw new PaletteError("RetrievalFailure", `Failed to fetch ${url}: HTTP ${response.status}`);
    }

    try {
        return Buffer.from(await response.arrayBuffer());
    } catch (error) {
        throw new PaletteError("RetrievalFailure", `Failed to read body of ${url}: ${describeError(error)}`, {
            cause: error,
        });
    }
};
