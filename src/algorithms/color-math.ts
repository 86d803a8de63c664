import { type Rgb } from '../types/color.js';

/**
 * Euclidean distance between two RGB triples.
 * Channel differences are bounded by 255, so no overflow handling is needed.
 */
export function colorDistance(a: Rgb, b: Rgb): number {
    const dr = a[0] - b[0];
    const dg = a[1] - b[1];
    const db = a[2] - b[2];
    return Math.sqrt(dr * dr + dg * dg + db * db);
}

/**
 * Component-wise mean of a list of colors, each channel rounded to the nearest integer.
 * Returns [0, 0, 0] for an empty list.
 */
export function meanColor(colors: readonly Rgb[]): Rgb {
    if (colors.length === 0) {
        return [0, 0, 0];
    }

    let sumR = 0, sumG = 0, sumB = 0;
    for (const c of colors) {
        sumR += c[0];
        sumG += c[1];
        sumB += c[2];
    }

    const n = colors.length;
    return [Math.round(sumR / n), Math.round(sumG / n), Math.round(sumB / n)];
}
