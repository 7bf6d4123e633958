import { v4 as uuidv4 } from 'uuid';
import type {
  ProvisionedResource,
  ProvisioningMetadata,
  ProvisioningReport,
  TeardownReport,
  TestbedConfig
} from '../types';
import { PvdcManager } from '../provisioning/pvdc-manager';
import { VcenterManager } from '../provisioning/vcenter-manager';
import { OrgManager } from '../provisioning/org-manager';
import { VdcManager } from '../provisioning/vdc-manager';
import { CatalogManager } from '../provisioning/catalog-manager';
import { VAppManager } from '../provisioning/vapp-manager';
import type { DeletionOutcome } from '../provisioning/types';
import { Environment, type EnvironmentDependencies } from './environment';
import type { InspectionEntry, ProvisioningStep, StepResult } from './types';

export interface TeardownOptions {
  /** Tear down even in developer mode. */
  force?: boolean;
}

/**
 * Runs the provisioning steps against one {@link Environment} in dependency
 * order, and reverses the disposable part of them on teardown.
 */
export class EnvironmentOrchestrator {
  private readonly vcenterManager: VcenterManager;
  private readonly pvdcManager: PvdcManager;
  private readonly orgManager: OrgManager;
  private readonly vdcManager: VdcManager;
  private readonly catalogManager: CatalogManager;
  private readonly vappManager: VAppManager;

  constructor(private readonly environment: Environment) {
    this.vcenterManager = new VcenterManager(environment);
    this.pvdcManager = new PvdcManager(environment);
    this.orgManager = new OrgManager(environment);
    this.vdcManager = new VdcManager(environment);
    this.catalogManager = new CatalogManager(environment);
    this.vappManager = new VAppManager(environment);
  }

  /** The provisioning sequence; each step may only rely on the steps before it. */
  steps(): ProvisioningStep[] {
    return [
      { name: 'vcenter', requires: [], execute: () => this.vcenterManager.ensure() },
      { name: 'pvdc', requires: [], execute: () => this.pvdcManager.ensure() },
      { name: 'org', requires: [], execute: () => this.orgManager.ensureOrg() },
      { name: 'users', requires: ['org'], execute: () => this.orgManager.ensureUsers() },
      { name: 'vdc', requires: ['pvdc', 'org'], execute: () => this.vdcManager.ensureVdc() },
      { name: 'network', requires: ['vdc'], execute: () => this.vdcManager.ensureNetwork() },
      {
        name: 'catalog',
        requires: ['org', 'users'],
        execute: async () => {
          const catalog = await this.catalogManager.ensureCatalog();
          await this.catalogManager.ensureShared();
          return catalog;
        }
      },
      { name: 'template', requires: ['catalog', 'users'], execute: () => this.catalogManager.ensureTemplate() },
      { name: 'vapp', requires: ['vdc', 'network', 'template'], execute: () => this.vappManager.ensure() }
    ];
  }

  async ensure(): Promise<ProvisioningReport> {
    const startTime = Date.now();
    const metadata: ProvisioningMetadata = { runId: uuidv4(), timestamp: new Date() };
    const logger = this.environment.logger;
    logger.info(`Provisioning run ${metadata.runId} against ${this.environment.config.vcd.host}`);

    const resources: ProvisionedResource[] = [];
    for (const step of this.steps()) {
      for (const dependency of step.requires) {
        this.environment.assertResolved(dependency, step.name);
      }
      logger.debug(`Running step ${step.name}`);
      resources.push(...toResources(await step.execute()));
    }

    metadata.duration = Date.now() - startTime;
    const created = resources.filter(resource => resource.status === 'created').length;
    logger.info(`Provisioning run ${metadata.runId} finished: ${created} created, ${resources.length - created} reused`);
    return { resources, metadata };
  }

  /** Resolve every target that exists without creating anything. */
  async inspect(): Promise<InspectionEntry[]> {
    const vcd = this.environment.config.vcd;
    const entries: InspectionEntry[] = [];

    const vcName = this.environment.config.vc?.vcenter_host_name;
    if (vcName !== undefined) {
      const vcenter = await this.vcenterManager.lookup();
      entries.push({ kind: 'vcenter', name: vcName, href: vcenter?.href ?? null });
    }
    const pvdc = await this.pvdcManager.lookup();
    entries.push({ kind: 'pvdc', name: pvdc?.name ?? vcd.default_pvdc_name, href: pvdc?.href ?? null });

    const org = await this.orgManager.lookupOrg();
    entries.push({ kind: 'org', name: vcd.default_org_name, href: org?.href ?? null });
    for (const { username, user } of await this.orgManager.lookupUsers()) {
      entries.push({ kind: 'user', name: username, href: user?.href ?? null });
    }

    const vdc = await this.vdcManager.lookupVdc();
    entries.push({ kind: 'vdc', name: vcd.default_ovdc_name, href: vdc?.href ?? null });
    const network = await this.vdcManager.lookupNetwork();
    entries.push({ kind: 'network', name: vcd.default_ovdc_network_name, href: network?.href ?? null });

    const catalog = await this.catalogManager.lookupCatalog();
    entries.push({ kind: 'catalog', name: vcd.default_catalog_name, href: catalog?.href ?? null });
    const template = await this.catalogManager.lookupTemplate();
    entries.push({ kind: 'catalogItem', name: vcd.default_template_file_name, href: template?.href ?? null });

    const vapp = await this.vappManager.lookup();
    entries.push({ kind: 'vapp', name: vcd.default_vapp_name, href: vapp?.href ?? null });
    return entries;
  }

  /**
   * Delete the vApp, then the VDC, and clear the environment. The org, its
   * users, the catalog and the network are left for the next run.
   */
  async teardown(options: TeardownOptions = {}): Promise<TeardownReport> {
    const report: TeardownReport = { skipped: false, deleted: [], alreadyAbsent: [] };
    if (this.environment.isDeveloperMode() && !options.force) {
      this.environment.logger.info('Developer mode is on, skipping teardown');
      return { ...report, skipped: true };
    }

    try {
      if (!this.environment.has('org')) {
        await this.orgManager.lookupOrg();
      }
      if (!this.environment.has('vdc')) {
        await this.vdcManager.lookupVdc();
      }

      record(report, await this.vappManager.delete());
      record(report, await this.vdcManager.deleteVdc());
    } finally {
      await this.environment.reset();
    }
    return report;
  }
}

function toResources(result: StepResult): ProvisionedResource[] {
  if (result === null) {
    return [];
  }
  return Array.isArray(result) ? result : [result];
}

function record(report: TeardownReport, outcome: DeletionOutcome): void {
  const entry = { kind: outcome.kind, name: outcome.name };
  if (outcome.deleted) {
    report.deleted.push(entry);
  } else {
    report.alreadyAbsent.push(entry);
  }
}

export interface EnsureResult {
  environment: Environment;
  report: ProvisioningReport;
}

/**
 * Bring the remote test environment to the configured state, reusing
 * whatever already exists. Safe to call repeatedly. An environment built
 * from a configuration is reset before a failure propagates.
 */
export async function ensureEnvironment(
  target: Environment | TestbedConfig,
  dependencies: EnvironmentDependencies = {}
): Promise<EnsureResult> {
  if (target instanceof Environment) {
    return { environment: target, report: await new EnvironmentOrchestrator(target).ensure() };
  }

  const environment = Environment.init(target, dependencies);
  try {
    return { environment, report: await new EnvironmentOrchestrator(environment).ensure() };
  } catch (error) {
    await environment.reset();
    throw error;
  }
}

export async function teardownEnvironment(environment: Environment, options: TeardownOptions = {}): Promise<TeardownReport> {
  return new EnvironmentOrchestrator(environment).teardown(options);
}

export async function inspectEnvironment(environment: Environment): Promise<InspectionEntry[]> {
  return new EnvironmentOrchestrator(environment).inspect();
}
