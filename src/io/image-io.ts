import * as fs from 'fs/promises';
import * as path from 'node:path';
import { PNG } from 'pngjs';
import { type RgbaImage } from '../types/color.js';
import { type TileImage } from '../types/tile.js';
import { hasErrorCode } from './fs-errors.js';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

export interface TileLoadResult {
    /** Decoded tiles, ordered by file name */
    tiles: TileImage[];
    /** File names that could not be decoded */
    skipped: string[];
}

/**
 * Reads and decodes a PNG file into straight RGBA.
 *
 * @param filePath - Absolute path to the PNG file
 */
export async function loadPngFile(filePath: string): Promise<RgbaImage> {
    let buf: Buffer;
    try {
        buf = await fs.readFile(filePath);
    } catch (e: unknown) {
        if (hasErrorCode(e, 'ENOENT')) {
            throw new DomainError(errors.imageFileNotFound(filePath));
        }
        throw e;
    }

    try {
        const png = PNG.sync.read(buf);
        return { width: png.width, height: png.height, data: png.data };
    } catch {
        throw new DomainError(errors.invalidImageFile(filePath));
    }
}

/**
 * Encodes an RGBA image as PNG and writes it, creating the parent directory if needed.
 *
 * @param filePath - Absolute path of the PNG file to write
 */
export async function savePngFile(filePath: string, image: RgbaImage): Promise<void> {
    const png = new PNG({ width: image.width, height: image.height });
    png.data = Buffer.from(image.data);

    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, PNG.sync.write(png));
}

/**
 * Decodes every `.png` file directly inside `dir`, in file-name order.
 * Files that fail to decode are reported in `skipped` rather than aborting the load.
 *
 * @param dir - Absolute path to the tile directory
 */
export async function loadTileDirectory(dir: string): Promise<TileLoadResult> {
    let names: string[];
    try {
        names = await fs.readdir(dir);
    } catch (e: unknown) {
        if (hasErrorCode(e, 'ENOENT', 'ENOTDIR')) {
            throw new DomainError(errors.tileDirectoryNotFound(dir));
        }
        throw e;
    }

    const tiles: TileImage[] = [];
    const skipped: string[] = [];

    for (const name of names.filter((n) => n.toLowerCase().endsWith('.png')).sort()) {
        const filePath = path.join(dir, name);
        try {
            const image = await loadPngFile(filePath);
            tiles.push({ ...image, name, path: filePath });
        } catch (e: unknown) {
            if (!(e instanceof DomainError)) throw e;
            console.error(`Skipping tile ${name}: ${e.message}`);
            skipped.push(name);
        }
    }

    return { tiles, skipped };
}
