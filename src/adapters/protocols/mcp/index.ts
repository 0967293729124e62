export * from './mcp-protocol.adapter';
export * from './mcp-webhook.factory';
