/**
 * MCP Infrastructure
 *
 * Response building and structured error handling shared by every tool.
 */

// Response Building
export {
  ResponseBuilder,
  createResponseBuilder,
  type MCPResponse,
  type MCPResponseMeta,
  type ResponseHints,
  type ToolContent,
  type TruncationInfo,
} from './response-builder.js';

// Error Handling
export { handleError, parseArgs } from './error-handler.js';
