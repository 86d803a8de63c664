import { z } from 'zod';
import * as path from 'node:path';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getSession } from '../classes/session.js';
import { isValidRgb } from '../types/color.js';
import { type PartialIndexConfig } from '../types/config.js';
import * as errors from '../errors.js';

/**
 * Zod input schema for the `mosaic_index` tool.
 *
 * Actions: info, configure, load_config, save_config, load_tiles, add_color, balance, query
 */
const mosaicIndexInputSchema = {
    action: z
        .enum(['info', 'configure', 'load_config', 'save_config', 'load_tiles', 'add_color', 'balance', 'query'])
        .describe('Action to perform on the tile index'),
    path: z
        .string()
        .optional()
        .describe('For load_config/save_config: config JSON path. For load_tiles: directory of PNG tiles.'),
    color: z
        .array(z.number())
        .optional()
        .describe('RGB color [r, g, b], each 0–255 (required for add_color and query)'),
    name: z.string().optional().describe('For add_color: tile name (defaults to "rgb(r,g,b)")'),
    distance_threshold: z
        .number()
        .optional()
        .describe('For configure: max color distance for joining an existing bucket'),
    min_bucket_size: z
        .number()
        .optional()
        .describe('For configure: buckets below this size are merge candidates'),
    max_bucket_size: z.number().optional().describe('For configure: buckets above this size are split'),
    merge_threshold: z
        .number()
        .optional()
        .describe('For configure: max distance between small buckets merged during balance'),
};

/**
 * Registers the `mosaic_index` tool on the MCP server.
 */
export function registerMosaicIndexTool(server: McpServer): void {
    server.registerTool(
        'mosaic_index',
        {
            title: 'Mosaic Index',
            description:
                'Color-bucket index of mosaic tiles. Configure thresholds, load tiles, balance once, then query by color.',
            inputSchema: mosaicIndexInputSchema,
        },
        async (args) => {
            const session = getSession();

            switch (args.action) {
                case 'info':
                    return handleInfo(session);
                case 'configure':
                    return handleConfigure(session, args);
                case 'load_config':
                    return handleLoadConfig(session, args.path);
                case 'save_config':
                    return handleSaveConfig(session, args.path);
                case 'load_tiles':
                    return handleLoadTiles(session, args.path);
                case 'add_color':
                    return handleAddColor(session, args.color, args.name);
                case 'balance':
                    return handleBalance(session);
                case 'query':
                    return handleQuery(session, args.color);
                default:
                    return errors.invalidArgument(`Unknown mosaic_index action: ${String(args.action)}`);
            }
        },
    );
}

// ---------------------------------------------------------------------------
// Action handlers
// ---------------------------------------------------------------------------

type Session = ReturnType<typeof getSession>;

function textResult(payload: unknown) {
    return {
        content: [
            {
                type: 'text' as const,
                text: JSON.stringify(payload),
            },
        ],
    };
}

function handleInfo(session: Session) {
    return textResult(session.info());
}

function handleConfigure(session: Session, fields: PartialIndexConfig) {
    // Only keys the caller actually passed; undefined would overwrite the current value
    const changes: PartialIndexConfig = {};
    if (fields.distance_threshold !== undefined) changes.distance_threshold = fields.distance_threshold;
    if (fields.min_bucket_size !== undefined) changes.min_bucket_size = fields.min_bucket_size;
    if (fields.max_bucket_size !== undefined) changes.max_bucket_size = fields.max_bucket_size;
    if (fields.merge_threshold !== undefined) changes.merge_threshold = fields.merge_threshold;

    if (Object.keys(changes).length === 0) {
        return errors.invalidArgument(
            'mosaic_index configure requires at least one of distance_threshold, min_bucket_size, max_bucket_size, merge_threshold.',
        );
    }

    try {
        const config = session.configure(changes);
        return textResult({ message: 'Configuration updated. Any loaded tiles were discarded.', config });
    } catch (e: unknown) {
        return errors.toErrorResponse(e);
    }
}

async function handleLoadConfig(session: Session, filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument('mosaic_index load_config requires "path".');
    }

    try {
        const config = await session.loadConfig(path.resolve(filePath));
        return textResult({ message: 'Configuration loaded. Any loaded tiles were discarded.', config });
    } catch (e: unknown) {
        return errors.toErrorResponse(e);
    }
}

async function handleSaveConfig(session: Session, filePath: string | undefined) {
    if (!filePath) {
        return errors.invalidArgument('mosaic_index save_config requires "path".');
    }

    const resolved = path.resolve(filePath);
    try {
        await session.saveConfig(resolved);
    } catch {
        return errors.cannotWritePath(resolved);
    }
    return textResult({ message: 'Configuration saved.', path: resolved });
}

async function handleLoadTiles(session: Session, dirPath: string | undefined) {
    if (!dirPath) {
        return errors.invalidArgument('mosaic_index load_tiles requires "path" (tile directory).');
    }

    try {
        const result = await session.loadTiles(path.resolve(dirPath));
        return textResult({
            message: `Loaded ${String(result.loaded.length)} tile(s).`,
            skipped: result.skipped,
            bucketCount: session.index?.buckets.length ?? 0,
        });
    } catch (e: unknown) {
        return errors.toErrorResponse(e);
    }
}

function handleAddColor(session: Session, color: number[] | undefined, name: string | undefined) {
    if (color === undefined) {
        return errors.invalidArgument('mosaic_index add_color requires "color".');
    }
    if (!isValidRgb(color)) {
        return errors.invalidColor();
    }

    try {
        const tile = session.addColorTile(color, name);
        return textResult({ message: `Tile '${tile.name}' added.`, elementCount: session.index?.elementCount ?? 0 });
    } catch (e: unknown) {
        return errors.toErrorResponse(e);
    }
}

function handleBalance(session: Session) {
    try {
        return textResult(session.balance());
    } catch (e: unknown) {
        return errors.toErrorResponse(e);
    }
}

function handleQuery(session: Session, color: number[] | undefined) {
    if (color === undefined) {
        return errors.invalidArgument('mosaic_index query requires "color".');
    }
    if (!isValidRgb(color)) {
        return errors.invalidColor();
    }

    try {
        const result = session.query(color);
        return textResult({
            tile: result.tile.name,
            path: result.tile.path ?? null,
            color: result.color,
            bucketColor: result.bucketColor,
        });
    } catch (e: unknown) {
        return errors.toErrorResponse(e);
    }
}
