import { type Rgb, type RgbaImage } from '../types/color.js';

/**
 * Averages the RGB channels of every pixel inside a rectangle of `image`.
 * The rectangle is clipped to the image bounds; alpha is ignored.
 *
 * @returns The rounded mean color, or [0, 0, 0] when the clipped rectangle is empty.
 */
export function averageRegion(image: RgbaImage, x: number, y: number, w: number, h: number): Rgb {
    const x0 = Math.max(0, x);
    const y0 = Math.max(0, y);
    const x1 = Math.min(image.width, x + w);
    const y1 = Math.min(image.height, y + h);

    if (x1 <= x0 || y1 <= y0) {
        return [0, 0, 0];
    }

    let sumR = 0, sumG = 0, sumB = 0;
    for (let py = y0; py < y1; py++) {
        for (let px = x0; px < x1; px++) {
            const idx = (py * image.width + px) * 4;
            sumR += image.data[idx];
            sumG += image.data[idx + 1];
            sumB += image.data[idx + 2];
        }
    }

    const count = (x1 - x0) * (y1 - y0);
    return [Math.round(sumR / count), Math.round(sumG / count), Math.round(sumB / count)];
}

/**
 * Average color of a whole image.
 */
export function averageImage(image: RgbaImage): Rgb {
    return averageRegion(image, 0, 0, image.width, image.height);
}
