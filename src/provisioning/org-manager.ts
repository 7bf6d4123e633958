import {
  RoleProvisioningError,
  type ProvisionedResource,
  type ResourceDescriptor,
  type RoleFailure
} from '../types';
import { ALL_ROLES, ROLE_DISPLAY_NAME, usernameForRole, type CommonRole } from '../config/roles';
import type { Environment } from '../orchestration/environment';
import type { VcdSession } from '../client/types';
import { BaseManager } from './base-manager';
import { findResource, locateResource } from './resource-locator';

export interface UserLookup {
  role: CommonRole;
  username: string;
  user: ResourceDescriptor | null;
}

/** The test organization and its one user per {@link CommonRole}. */
export class OrgManager extends BaseManager {
  constructor(environment: Environment) {
    super(environment, 'org');
  }

  async ensureOrg(): Promise<ProvisionedResource> {
    const client = await this.environment.getSysAdminClient();
    const name = this.environment.getDefaultOrgName();

    const existing = await this.findOrg(client);
    if (existing !== null) {
      this.environment.setOrgHref(existing.href);
      return this.provisioned(existing, 'reused');
    }

    this.logger.info(`Creating org ${name}`);
    const outcome = await client.createResource(null, { kind: 'org', name, fullName: name, isEnabled: true });
    await this.waitForTask(client, outcome.task);

    const org = await this.relocate(() => client.listResources('org'), name, 'org');
    this.environment.setOrgHref(org.href);
    return this.provisioned(org, 'created');
  }

  /**
   * Make sure every role has its user. Roles are handled one after another
   * and a failure for one role does not stop the others.
   * @throws RoleProvisioningError listing every role that failed
   */
  async ensureUsers(): Promise<ProvisionedResource[]> {
    const orgHref = this.environment.require('org', 'users');
    const client = await this.environment.getSysAdminClient();
    const [roles, users] = await Promise.all([
      client.listResources('role', orgHref),
      client.listResources('user', orgHref)
    ]);

    const results: ProvisionedResource[] = [];
    const failures: RoleFailure[] = [];
    for (const role of ALL_ROLES) {
      const username = usernameForRole(role);
      try {
        results.push(await this.ensureUser(client, orgHref, role, roles, users));
      } catch (error) {
        this.logger.error(`Failed to provision user ${username}: ${error instanceof Error ? error.message : String(error)}`);
        failures.push({ role: ROLE_DISPLAY_NAME[role], username, error: error instanceof Error ? error : new Error(String(error)) });
      }
    }

    if (failures.length > 0) {
      throw new RoleProvisioningError(failures);
    }
    return results;
  }

  async lookupOrg(): Promise<ResourceDescriptor | null> {
    const org = await this.findOrg(await this.environment.getSysAdminClient());
    if (org !== null) {
      this.environment.setOrgHref(org.href);
    }
    return org;
  }

  /** Users of the test org by role; every user is null when the org does not exist. */
  async lookupUsers(): Promise<UserLookup[]> {
    if (!this.environment.has('org')) {
      return ALL_ROLES.map(role => ({ role, username: usernameForRole(role), user: null }));
    }
    const orgHref = this.environment.require('org');
    const client = await this.environment.getSysAdminClient();
    const users = await client.listResources('user', orgHref);

    const lookups: UserLookup[] = [];
    for (const role of ALL_ROLES) {
      const username = usernameForRole(role);
      const user = await findResource(users, username, { kind: 'user' });
      if (user !== null) {
        this.environment.setUserHref(role, user.href);
      }
      lookups.push({ role, username, user });
    }
    return lookups;
  }

  private async ensureUser(
    client: VcdSession,
    orgHref: string,
    role: CommonRole,
    roles: ResourceDescriptor[],
    users: ResourceDescriptor[]
  ): Promise<ProvisionedResource> {
    const username = usernameForRole(role);
    const existing = await findResource(users, username, { kind: 'user' });
    if (existing !== null) {
      this.environment.setUserHref(role, existing.href);
      return this.provisioned(existing, 'reused');
    }

    const roleRecord = await locateResource(roles, ROLE_DISPLAY_NAME[role], { kind: 'role' });
    this.logger.info(`Creating user ${username} with role ${roleRecord.name}`);
    const outcome = await client.createResource(orgHref, {
      kind: 'user',
      name: username,
      password: this.environment.config.vcd.default_org_user_password,
      roleHref: roleRecord.href,
      isEnabled: true
    });
    await this.waitForTask(client, outcome.task);

    this.environment.setUserHref(role, outcome.descriptor.href);
    return this.provisioned(outcome.descriptor, 'created');
  }

  private async findOrg(client: VcdSession): Promise<ResourceDescriptor | null> {
    return findResource(() => client.listResources('org'), this.environment.getDefaultOrgName(), { kind: 'org' });
  }
}
