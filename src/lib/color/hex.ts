/**
 * Hex colour helpers
 */

/**
 * RGB color (0-255 range)
 */
export interface RGB {
    r: number;
    g: number;
    b: number;
}

/**
 * Channel value at or above which a colour counts as near-white
 */
export const NEAR_WHITE_THRESHOLD = 245;

/**
 * Converts RGB to an uppercase `#RRGGBB` string
 */
export function rgbToHex(rgb: RGB): string {
    return `#${[rgb.r, rgb.g, rgb.b]
        .map((val) => Math.max(0, Math.min(255, Math.round(val))).toString(16).padStart(2, "0"))
        .join("")
        .toUpperCase()}`;
}

/**
 * Converts hex string to RGB
 * @param hex - Hex color string (with or without #)
 * @returns RGB object or null if invalid
 */
export function hexToRgb(hex: string): RGB | null {
    const cleaned = hex.replace(/^#/, "");
    if (!/^[0-9a-fA-F]{6}$/.test(cleaned)) {
        return null;
    }
    return {
        r: parseInt(cleaned.substring(0, 2), 16),
        g: parseInt(cleaned.substring(2, 4), 16),
        b: parseInt(cleaned.substring(4, 6), 16),
    };
}

/**
 * Canonical `#RRGGBB` form of a hex string, or null if it is not one
 */
export function normalizeHex(hex: string): string | null {
    const rgb = hexToRgb(hex);
    return rgb ? rgbToHex(rgb) : null;
}

export function isNearWhite(rgb: RGB, threshold: number = NEAR_WHITE_THRESHOLD): boolean {
    return rgb.r >= threshold && rgb.g >= threshold && rgb.b >= threshold;
}
