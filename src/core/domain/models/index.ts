export * from './task-result.model';
