/**
 * MCP tools
 */

export { ALL_TOOLS, callTool, hasTool } from './registry.js';
export { collect, toConnectionView } from './context.js';
export type { ConnectionView, ToolContext } from './context.js';
export * from './discovery/index.js';
export * from './exploration/index.js';
