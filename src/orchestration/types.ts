// Orchestration-specific types
import type { CommonRole } from '../config/roles';
import type { ProvisionedResource, ResourceHandle, ResourceKind } from '../types';

/** Handles a provisioning step can depend on, in the order they are resolved. */
export type ContextDependency =
  | 'vcenter'
  | 'pvdc'
  | 'org'
  | 'users'
  | 'vdc'
  | 'network'
  | 'catalog'
  | 'template'
  | 'vapp';

export interface ProvisioningContext {
  vcenterAttached: boolean;
  pvdcName: string | null;
  pvdcHref: ResourceHandle | null;
  orgHref: ResourceHandle | null;
  userHrefs: Map<CommonRole, ResourceHandle>;
  vdcHref: ResourceHandle | null;
  networkPresent: boolean;
  catalogHref: ResourceHandle | null;
  templateHref: ResourceHandle | null;
  vappHref: ResourceHandle | null;
}

export type StepResult = ProvisionedResource | ProvisionedResource[] | null;

export interface ProvisioningStep {
  name: string;
  requires: ContextDependency[];
  execute(): Promise<StepResult>;
}

export interface InspectionEntry {
  kind: ResourceKind;
  name: string;
  href: ResourceHandle | null;
}
