import type { EducationConfig } from '@edu-sessions/core';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';

import { registerEducationTools } from './educationTools.js';

/**
 * Creates an MCP server exposing the education process tools.
 * The caller connects it to a transport (stdio, streamable HTTP).
 */
export function createEducationMcpServer(config: EducationConfig): McpServer {
  const server = new McpServer({ name: 'edu-sessions', version: '0.1.0' });
  registerEducationTools(server, config);
  return server;
}
