/**
 * MCP server for cardpack
 *
 * Serves context packs and card management over the Model Context Protocol.
 */

export { runMcpServer, createToolHandler, TOOLS } from './server.js';
export type { ToolResult, ToolDeps } from './server.js';
