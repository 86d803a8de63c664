import { z } from 'zod';
import * as path from 'node:path';
import { type McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { getSession } from '../classes/session.js';
import * as errors from '../errors.js';

const mosaicRenderInputSchema = {
    source_path: z.string().describe('PNG image to turn into a mosaic'),
    output_path: z.string().describe('Where to write the rendered mosaic PNG'),
    tile_size: z
        .number()
        .int()
        .min(1)
        .describe('Edge length in pixels of each mosaic cell; one tile is chosen per cell'),
};

/**
 * Registers the `mosaic_render` tool on the MCP server.
 */
export function registerMosaicRenderTool(server: McpServer): void {
    server.registerTool(
        'mosaic_render',
        {
            title: 'Mosaic Render',
            description:
                'Render a photo-mosaic of a PNG using the balanced tile index. Each cell is replaced by the tile whose color best matches it.',
            inputSchema: mosaicRenderInputSchema,
        },
        async (args) => {
            const session = getSession();
            const source = path.resolve(args.source_path);
            const output = path.resolve(args.output_path);

            try {
                const result = await session.render(source, args.tile_size, output);
                return {
                    content: [
                        {
                            type: 'text' as const,
                            text: JSON.stringify({
                                message: `Mosaic written to ${result.outputPath}.`,
                                ...result,
                            }),
                        },
                    ],
                };
            } catch (e: unknown) {
                return errors.toErrorResponse(e);
            }
        },
    );
}
