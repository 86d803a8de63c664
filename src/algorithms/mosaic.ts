import { type Rgb, type RgbaImage, createImage } from '../types/color.js';
import { averageRegion } from './region-average.js';
import { paintTile } from './paint-tile.js';

/**
 * Chooses the tile image to paint for a cell with the given average color.
 */
export type TilePicker = (target: Rgb) => RgbaImage;

/**
 * Renders a photo-mosaic of `source`.
 *
 * The source is cut into a grid of `tileSize` × `tileSize` cells, walked row by row.
 * Each cell's average color is handed to `pick`, and the returned tile is scaled into
 * the same cell of the output. Edge cells are clipped to the source bounds.
 *
 * @returns A new image with the same dimensions as `source`.
 */
export function renderMosaic(source: RgbaImage, tileSize: number, pick: TilePicker): RgbaImage {
    if (!Number.isInteger(tileSize) || tileSize < 1) {
        throw new RangeError(`tileSize must be a positive integer, got ${String(tileSize)}`);
    }

    const out = createImage(source.width, source.height);

    for (let y = 0; y < source.height; y += tileSize) {
        for (let x = 0; x < source.width; x += tileSize) {
            const w = Math.min(tileSize, source.width - x);
            const h = Math.min(tileSize, source.height - y);
            const target = averageRegion(source, x, y, w, h);
            paintTile(out, pick(target), x, y, w, h);
        }
    }

    return out;
}

/**
 * Number of cells `renderMosaic` visits for an image of the given size.
 */
export function cellCount(width: number, height: number, tileSize: number): number {
    return Math.ceil(width / tileSize) * Math.ceil(height / tileSize);
}
