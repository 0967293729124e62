/**
 * Injection tokens for the AdCP module
 */

export const ADCP_MODULE_OPTIONS = Symbol('ADCP_MODULE_OPTIONS');
export const ADCP_CONFIG = Symbol('ADCP_CONFIG');
export const RESPONSE_TYPE_REGISTRY = Symbol('RESPONSE_TYPE_REGISTRY');
export const PROTOCOL_ADAPTERS = Symbol('PROTOCOL_ADAPTERS');
export const WEBHOOK_PROCESSOR = Symbol('WEBHOOK_PROCESSOR');
