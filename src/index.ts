// Main entry point for the vCloud Director test environment harness
export * from './types';
export * from './config';
export * from './logging';
export * from './client';
export * from './provisioning';
export * from './orchestration';
