export * from './task-status.enum';
export * from './protocol.enum';
