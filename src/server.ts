import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { registerMosaicIndexTool } from './tools/mosaic-index.js';
import { registerMosaicRenderTool } from './tools/mosaic-render.js';

/**
 * Builds the MCP server with every tilematch tool registered.
 */
export function createServer(): McpServer {
  const server = new McpServer({
    name: 'tilematch',
    version: '1.0.0',
  });

  registerMosaicIndexTool(server);
  registerMosaicRenderTool(server);

  return server;
}
