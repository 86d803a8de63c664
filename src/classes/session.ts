import { type Rgb } from '../types/color.js';
import { type TileImage } from '../types/tile.js';
import {
    type IndexConfig,
    type PartialIndexConfig,
    DEFAULT_CONFIG,
    parseIndexConfig,
} from '../types/config.js';
import { loadConfigFile, saveConfigFile } from '../io/config-io.js';
import { loadPngFile, savePngFile, loadTileDirectory } from '../io/image-io.js';
import { averageImage } from '../algorithms/region-average.js';
import { renderMosaic, cellCount } from '../algorithms/mosaic.js';
import { BucketIndexClass, type BalanceReport } from './bucket-index.js';
import { DomainError } from '../errors.js';
import * as errors from '../errors.js';

/** Side length of the solid tiles created by addColorTile(). */
export const SOLID_TILE_SIZE = 8;

export interface QueryResult {
    tile: TileImage;
    /** Average color of the chosen tile */
    color: Rgb;
    /** Average color of the bucket it came from */
    bucketColor: Rgb;
}

export interface RenderResult {
    outputPath: string;
    width: number;
    height: number;
    cells: number;
    distinctTiles: number;
}

/**
 * In-memory mosaic session singleton.
 * Holds the active thresholds and the tile index, and enforces the
 * load → balance → query order. Nothing here is persisted between runs.
 */
export class SessionClass {
    private static _instance: SessionClass | null = null;

    /** Active thresholds; applied to the next index created. */
    private _config: IndexConfig = { ...DEFAULT_CONFIG };

    /** The tile index, or null until the first tile is added. */
    private _index: BucketIndexClass<TileImage> | null = null;

    private constructor() {
        // Singleton; use SessionClass.instance()
    }

    /**
     * Returns the singleton SessionClass instance.
     */
    static instance(): SessionClass {
        if (SessionClass._instance === null) {
            SessionClass._instance = new SessionClass();
        }
        return SessionClass._instance;
    }

    /**
     * Resets the singleton for testing. Clears all state.
     */
    static reset(): void {
        SessionClass._instance = null;
    }

    get config(): IndexConfig {
        return { ...this._config };
    }

    get index(): BucketIndexClass<TileImage> | null {
        return this._index;
    }

    // ------------------------------------------------------------------------
    // Configuration
    // ------------------------------------------------------------------------

    /**
     * Merges `changes` into the active config. Thresholds are fixed per index,
     * so any loaded index is discarded. Throws `invalidConfig` if the result is invalid.
     */
    configure(changes: PartialIndexConfig): IndexConfig {
        this._config = parseIndexConfig({ ...this._config, ...changes });
        this._index = null;
        return this.config;
    }

    /**
     * Reads a config file and applies it with configure().
     */
    async loadConfig(filePath: string): Promise<IndexConfig> {
        const changes = await loadConfigFile(filePath);
        return this.configure(changes);
    }

    /**
     * Writes the active config to a file.
     */
    async saveConfig(filePath: string): Promise<void> {
        await saveConfigFile(filePath, this._config);
    }

    // ------------------------------------------------------------------------
    // Load phase
    // ------------------------------------------------------------------------

    private ensureIndex(): BucketIndexClass<TileImage> {
        if (this._index === null) {
            this._index = new BucketIndexClass<TileImage>(this._config);
        }
        return this._index;
    }

    /**
     * Averages a tile and inserts it into the index.
     */
    addTile(tile: TileImage): Rgb {
        const color = averageImage(tile);
        this.ensureIndex().addElement(color, tile);
        return color;
    }

    /**
     * Inserts a synthetic tile filled with a single color.
     */
    addColorTile(color: Rgb, name?: string): TileImage {
        const data = new Uint8Array(SOLID_TILE_SIZE * SOLID_TILE_SIZE * 4);
        for (let i = 0; i < SOLID_TILE_SIZE * SOLID_TILE_SIZE; i++) {
            data.set([color[0], color[1], color[2], 255], i * 4);
        }
        const tile: TileImage = {
            name: name ?? `rgb(${color.join(',')})`,
            width: SOLID_TILE_SIZE,
            height: SOLID_TILE_SIZE,
            data,
        };
        this.addTile(tile);
        return tile;
    }

    /**
     * Loads every PNG in `dir` into the index.
     * @returns Names of the loaded and skipped files.
     */
    async loadTiles(dir: string): Promise<{ loaded: string[]; skipped: string[] }> {
        const { tiles, skipped } = await loadTileDirectory(dir);
        for (const tile of tiles) {
            this.addTile(tile);
        }
        return { loaded: tiles.map((t) => t.name), skipped };
    }

    /**
     * Runs the one balancing pass with the active config.
     */
    balance(): BalanceReport {
        const report = this.requireIndex().balanceBuckets();
        console.error(
            `Balanced index: split ${String(report.bucketsSplit)} into ${String(report.bucketsFromSplits)}, ` +
                `merged ${String(report.bucketsMerged)} into ${String(report.mergeGroups)}, ` +
                `${String(report.bucketCount)} bucket(s) total`,
        );
        return report;
    }

    // ------------------------------------------------------------------------
    // Query phase
    // ------------------------------------------------------------------------

    private requireIndex(): BucketIndexClass<TileImage> {
        if (this._index === null) {
            throw new DomainError(errors.noIndexLoaded());
        }
        return this._index;
    }

    private requireBalancedIndex(): BucketIndexClass<TileImage> {
        const index = this.requireIndex();
        if (!index.isBalanced) {
            throw new DomainError(errors.indexNotBalanced());
        }
        return index;
    }

    /**
     * Returns the tile chosen for `target`.
     */
    query(target: Rgb): QueryResult {
        const { element, bucketColor } = this.requireBalancedIndex().getClosestMatch(target);
        return { tile: element.handle, color: element.color, bucketColor };
    }

    /**
     * Renders a mosaic of the PNG at `sourcePath` and writes it to `outputPath`.
     */
    async render(sourcePath: string, tileSize: number, outputPath: string): Promise<RenderResult> {
        const index = this.requireBalancedIndex();
        const source = await loadPngFile(sourcePath);

        const used = new Set<TileImage>();
        const output = renderMosaic(source, tileSize, (target) => {
            const tile = index.getClosestElement(target).handle;
            used.add(tile);
            return tile;
        });

        try {
            await savePngFile(outputPath, output);
        } catch (e: unknown) {
            console.error(`Failed to write ${outputPath}:`, e);
            throw new DomainError(errors.cannotWritePath(outputPath));
        }

        return {
            outputPath,
            width: output.width,
            height: output.height,
            cells: cellCount(output.width, output.height, tileSize),
            distinctTiles: used.size,
        };
    }

    // ------------------------------------------------------------------------
    // Session Info
    // ------------------------------------------------------------------------

    /**
     * Returns a summary of the current session state.
     * Matches the expected shape for the `mosaic_index info` tool action.
     */
    info() {
        return {
            config: this.config,
            balanced: this._index?.isBalanced ?? false,
            index: this._index ? this._index.summarize() : null,
        };
    }
}

/**
 * Module-level accessor for the session singleton.
 * Tool handlers import this function to get the session.
 */
export function getSession(): SessionClass {
    return SessionClass.instance();
}
