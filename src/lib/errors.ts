/**
 * Error kinds raised by the palette engine
 */

export type PaletteErrorKind =
    | "InvalidInput"
    | "RetrievalFailure"
    | "DecodeFailure"
    | "PaletteExhausted";

/**
 * Stable message prefixes, one per kind
 */
export const PALETTE_ERROR_CODES: Record<PaletteErrorKind, string> = {
    InvalidInput: "ERROR-PP-01",
    RetrievalFailure: "ERROR-PP-02",
    DecodeFailure: "ERROR-PP-03",
    PaletteExhausted: "ERROR-PP-04",
};

export class PaletteError extends Error {
    readonly kind: PaletteErrorKind;
    readonly code: string;

    constructor(kind: PaletteErrorKind, detail: string, options?: { cause?: unknown }) {
        super(`${PALETTE_ERROR_CODES[kind]}: ${detail}`, options);
        this.name = "PaletteError";
        this.kind = kind;
        this.code = PALETTE_ERROR_CODES[kind];
    }
}

export function isPaletteError(error: unknown): error is PaletteError {
    return error instanceof PaletteError;
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
