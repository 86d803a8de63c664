/**
 * Core color types.
 *
 * The index works in plain RGB with Euclidean distance. Decoded images are
 * carried as straight RGBA buffers, the layout pngjs produces.
 */

/**
 * An RGB color tuple.
 * Each channel is an integer between 0 and 255 (inclusive).
 */
export type Rgb = readonly [number, number, number];

/**
 * A decoded image: `data` holds width × height × 4 bytes, row-major RGBA.
 */
export interface RgbaImage {
    width: number;
    height: number;
    data: Uint8Array;
}

/**
 * Returns true if the channel value is a valid 8-bit color channel (integer 0-255).
 */
function isValidChannel(val: unknown): boolean {
    return typeof val === 'number' && Number.isInteger(val) && val >= 0 && val <= 255;
}

/**
 * Returns true if the color is a valid 3-element RGB tuple with each channel 0-255.
 */
export function isValidRgb(color: unknown): color is Rgb {
    if (!Array.isArray(color) || color.length !== 3) {
        return false;
    }
    return color.every(isValidChannel);
}

/**
 * Allocates a fully transparent image.
 */
export function createImage(width: number, height: number): RgbaImage {
    return { width, height, data: new Uint8Array(width * height * 4) };
}
