import { Protocol, ProtocolAdapters } from '../../core';
import { A2aProtocolAdapter } from './a2a';
import { McpProtocolAdapter } from './mcp';

export * from './mcp';
export * from './a2a';

/**
 * Adapters for every supported transport
 */
export function createProtocolAdapters(): ProtocolAdapters {
  return {
    [Protocol.MCP]: new McpProtocolAdapter(),
    [Protocol.A2A]: new A2aProtocolAdapter(),
  };
}
