export * from './types';
export * from './environment';
export * from './environment-orchestrator';
