/**
 * Transports an AdCP agent can deliver task updates over
 */
export enum Protocol {
  /**
   * Plain JSON webhook posts, optionally HMAC-signed
   */
  MCP = 'mcp',

  /**
   * Agent-to-agent task protocol (Task / TaskStatusUpdateEvent objects)
   */
  A2A = 'a2a',
}
