export * from './types';
export * from './validator';
export * from './loader';
export * from './roles';
