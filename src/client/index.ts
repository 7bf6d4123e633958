export * from './types';
export * from './json';
export * from './task-monitor';
export * from './vcd-client';
