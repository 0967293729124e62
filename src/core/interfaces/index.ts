// Interface and type exports
export * from './common.types';
export * from './webhook-payloads';
export * from './protocol.adapter';
export * from './lifecycle-hooks.interface';
export * from './logger.interface';
