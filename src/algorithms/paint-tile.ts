import { type RgbaImage } from '../types/color.js';

/**
 * Paints `tile` into the `w × h` region of `dest` starting at (x, y),
 * scaling with nearest-neighbor sampling. Pixels falling outside `dest` are dropped.
 * The tile's pixels replace the destination's, alpha included.
 */
export function paintTile(
    dest: RgbaImage,
    tile: RgbaImage,
    x: number,
    y: number,
    w: number,
    h: number,
): void {
    if (w <= 0 || h <= 0 || tile.width === 0 || tile.height === 0) return;

    for (let dy = 0; dy < h; dy++) {
        const py = y + dy;
        if (py < 0 || py >= dest.height) continue;

        const sy = Math.floor((dy * tile.height) / h);

        for (let dx = 0; dx < w; dx++) {
            const px = x + dx;
            if (px < 0 || px >= dest.width) continue;

            const sx = Math.floor((dx * tile.width) / w);
            const src = (sy * tile.width + sx) * 4;
            const dst = (py * dest.width + px) * 4;

            dest.data[dst] = tile.data[src];
            dest.data[dst + 1] = tile.data[src + 1];
            dest.data[dst + 2] = tile.data[src + 2];
            dest.data[dst + 3] = tile.data[src + 3];
        }
    }
}
