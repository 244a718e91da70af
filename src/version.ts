// This module centralizes server identity values so protocol metadata, tools, and routes stay in sync.

export const MCP_SERVER_NAME = 'mcp-agent-gateway';
export const MCP_SERVER_VERSION = '0.1.0';
export const MCP_PROTOCOL_VERSION = '2025-03-26';
