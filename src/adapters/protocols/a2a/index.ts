export * from './a2a-protocol.adapter';
export * from './a2a-webhook.factory';
