import { type RgbaImage } from './color.js';

/**
 * A candidate tile: a decoded image plus where it came from.
 * Used as the element handle of the session's index.
 */
export interface TileImage extends RgbaImage {
    /** File name (or synthetic name for solid-color tiles) */
    name: string;
    /** Absolute source path, absent for synthetic tiles */
    path?: string;
}
