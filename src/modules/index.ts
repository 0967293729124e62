/**
 * NestJS integration
 */

export * from './adcp';
