import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CatalogManager } from '../catalog-manager';
import { OrgManager } from '../org-manager';
import { ConfigurationError, DependencyNotResolvedError } from '../../types';
import { testConfig } from '../../__tests__/fixtures/config';
import {
  createTemplateDir,
  createTestEnvironment,
  type TestEnvironment
} from '../../__tests__/fixtures/environment';

async function withOrgAndUsers(templateDir: string): Promise<TestEnvironment & { manager: CatalogManager }> {
  const setup = createTestEnvironment(testConfig({ templateDir }));
  const orgs = new OrgManager(setup.environment);
  await orgs.ensureOrg();
  await orgs.ensureUsers();
  setup.vcd.clearMutations();
  return { ...setup, manager: new CatalogManager(setup.environment) };
}

describe('CatalogManager', () => {
  let templateDir: string;

  beforeEach(async () => {
    templateDir = await createTemplateDir();
  });

  afterEach(async () => {
    await rm(templateDir, { recursive: true, force: true });
  });

  describe('ensureCatalog', () => {
    it('should require the catalog author', async () => {
      const setup = createTestEnvironment(testConfig({ templateDir }));
      await new OrgManager(setup.environment).ensureOrg();

      await expect(new CatalogManager(setup.environment).ensureCatalog()).rejects.toThrow(
        new DependencyNotResolvedError('user catalog_author', 'catalog')
      );
    });

    it('should create the catalog as the catalog author', async () => {
      const { vcd, environment, manager } = await withOrgAndUsers(templateDir);

      const result = await manager.ensureCatalog();

      const href = vcd.hrefOf('catalog', 'test_catalog');
      expect(result).toEqual({ kind: 'catalog', name: 'test_catalog', href, status: 'created' });
      expect(environment.require('catalog')).toBe(href);
      expect(vcd.logins).toContain('catalog_author@test_org');
      expect(vcd.logouts).toEqual(['catalog_author@test_org']);
    });

    it('should reuse the catalog on the next call', async () => {
      const { vcd, manager } = await withOrgAndUsers(templateDir);

      await manager.ensureCatalog();
      const second = await manager.ensureCatalog();

      expect(second.status).toBe('reused');
      expect(vcd.mutations).toEqual([{ operation: 'create', kind: 'catalog', name: 'test_catalog' }]);
    });
  });

  describe('ensureShared', () => {
    it('should share the catalog only once', async () => {
      const { vcd, manager } = await withOrgAndUsers(templateDir);
      await manager.ensureCatalog();
      vcd.clearMutations();

      await expect(manager.ensureShared()).resolves.toBe(true);
      await expect(manager.ensureShared()).resolves.toBe(false);
      expect(vcd.isShared(vcd.hrefOf('catalog', 'test_catalog'))).toBe(true);
      expect(vcd.mutations).toEqual([{ operation: 'share', kind: 'catalog', name: 'test_catalog' }]);
    });
  });

  describe('ensureTemplate', () => {
    it('should upload the template and record the vApp template behind it', async () => {
      const { vcd, environment, manager } = await withOrgAndUsers(templateDir);
      await manager.ensureCatalog();

      const result = await manager.ensureTemplate();

      expect(result).toMatchObject({ kind: 'catalogItem', name: 'tiny.ovf', status: 'created' });
      const item = vcd.get(vcd.hrefOf('catalogItem', 'tiny.ovf'));
      expect(environment.require('template')).toBe(item.attributes.entityHref);
      expect(environment.require('template')).toMatch(/\/api\/vAppTemplate\/vappTemplate-/);
    });

    it('should reuse an uploaded template', async () => {
      const { vcd, environment, manager } = await withOrgAndUsers(templateDir);
      await manager.ensureCatalog();
      await manager.ensureTemplate();
      const templateHref = environment.require('template');
      vcd.clearMutations();

      const second = await manager.ensureTemplate();

      expect(second.status).toBe('reused');
      expect(environment.require('template')).toBe(templateHref);
      expect(vcd.mutations).toEqual([]);
    });

    it('should refuse to upload a template file that is missing', async () => {
      const emptyDir = await mkdtemp(join(tmpdir(), 'vcd-testbed-empty-'));
      try {
        const { vcd, environment, manager } = await withOrgAndUsers(emptyDir);
        await manager.ensureCatalog();
        vcd.clearMutations();

        const error = await manager.ensureTemplate().catch((caught: unknown) => caught);

        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toMatchObject({
          message: expect.stringMatching(new RegExp(`^Template ${join(emptyDir, 'tiny.ovf')} cannot be read`))
        });
        expect(vcd.mutations).toEqual([]);
        expect(environment.has('template')).toBe(false);
        expect(vcd.activeSessions).toBe(1);
      } finally {
        await rm(emptyDir, { recursive: true, force: true });
      }
    });
  });

  describe('lookup', () => {
    it('should find nothing before the org exists', async () => {
      const { environment } = createTestEnvironment(testConfig({ templateDir }));
      const manager = new CatalogManager(environment);

      await expect(manager.lookupCatalog()).resolves.toBeNull();
      await expect(manager.lookupTemplate()).resolves.toBeNull();
    });

    it('should resolve the catalog and template that exist', async () => {
      const { environment, manager } = await withOrgAndUsers(templateDir);
      await manager.ensureCatalog();
      await manager.ensureTemplate();
      const templateHref = environment.require('template');
      const orgHref = environment.require('org');
      await environment.reset();
      environment.setOrgHref(orgHref);

      await expect(manager.lookupCatalog()).resolves.toMatchObject({ name: 'test_catalog' });
      await expect(manager.lookupTemplate()).resolves.toMatchObject({ name: 'tiny.ovf' });
      expect(environment.require('template')).toBe(templateHref);
    });
  });
});
