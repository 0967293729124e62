export * from './mcp-webhook-payload.dto';
export * from './a2a-task.dto';
