export * from './types';
export * from './resource-locator';
export * from './session';
export * from './base-manager';
export * from './pvdc-manager';
export * from './vcenter-manager';
export * from './org-manager';
export * from './vdc-manager';
export * from './catalog-manager';
export * from './vapp-manager';
