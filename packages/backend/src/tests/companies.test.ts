import { describe, it, expect } from 'vitest';
import { companiesService } from '../services/companies.service.js';
import { createCompanySchema, updateCompanySchema } from '../schemas/company.schema.js';
import { useTestDatabase, seedOrg, seedProject, expectOk, TEST_NOW } from './setup.js';

describe('companiesService', () => {
  useTestDatabase();

  describe('list', () => {
    it('shows a SuperAdmin every company by name', async () => {
      const acme = seedOrg('Acme Corp');
      seedOrg('Bluebell Ltd');

      const names = expectOk(await companiesService.list(acme.superAdminId)).map((c) => c.name);
      expect(names).toEqual(['Acme Corp', 'Bluebell Ltd']);
    });

    it('shows everyone else only their own company', async () => {
      const acme = seedOrg('Acme Corp');
      seedOrg('Bluebell Ltd');

      const companies = expectOk(await companiesService.list(acme.adminId));
      expect(companies).toEqual([
        {
          id: acme.companyId,
          name: 'Acme Corp',
          description: null,
          isActive: true,
          createdAt: TEST_NOW,
          updatedAt: TEST_NOW,
        },
      ]);
    });
  });

  describe('getById', () => {
    it('hides another company from an Admin', async () => {
      const acme = seedOrg('Acme Corp');
      const bluebell = seedOrg('Bluebell Ltd');

      const result = await companiesService.getById(acme.adminId, bluebell.companyId);
      expect(result).toEqual({ ok: false, kind: 'not_found', message: 'Company not found' });
    });

    it('lets a SuperAdmin read another company', async () => {
      const acme = seedOrg('Acme Corp');
      const bluebell = seedOrg('Bluebell Ltd');

      const company = expectOk(await companiesService.getById(acme.superAdminId, bluebell.companyId));
      expect(company.name).toBe('Bluebell Ltd');
    });

    it('rejects an unknown caller', async () => {
      const result = await companiesService.getById(999, 1);
      expect(result).toEqual({ ok: false, kind: 'unauthorized', message: 'User not found' });
    });
  });

  describe('create', () => {
    it('creates a company for a SuperAdmin', async () => {
      const org = seedOrg();
      const input = createCompanySchema.parse({ name: '  Cobalt Inc ', description: 'Shipping' });

      const result = await companiesService.create(org.superAdminId, input);
      expect(result.ok).toBe(true);
      expect(result.kind).toBe('created');
      if (result.ok) {
        expect(result.data.name).toBe('Cobalt Inc');
        expect(result.data.description).toBe('Shipping');
      }
    });

    it('is reserved to the SuperAdmin', async () => {
      const org = seedOrg();
      const result = await companiesService.create(org.adminId, { name: 'Cobalt Inc' });
      expect(result).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'Only a super administrator can create companies',
      });
    });

    it('rejects a duplicate name', async () => {
      const org = seedOrg('Acme Corp');
      const result = await companiesService.create(org.superAdminId, { name: 'Acme Corp' });
      expect(result).toEqual({
        ok: false,
        kind: 'bad_request',
        message: "A company named 'Acme Corp' already exists",
      });
    });
  });

  describe('update', () => {
    it('lets an Admin rename the company', async () => {
      const org = seedOrg();
      const input = updateCompanySchema.parse({ name: 'Acme Holdings', isActive: false });

      const company = expectOk(await companiesService.update(org.adminId, org.companyId, input));
      expect(company.name).toBe('Acme Holdings');
      expect(company.isActive).toBe(false);
    });

    it('forbids a Manager', async () => {
      const org = seedOrg();
      const result = await companiesService.update(org.managerId, org.companyId, { name: 'X' });
      expect(result).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'Only administrators can update the company',
      });
    });
  });

  describe('delete', () => {
    it('refuses while projects remain', async () => {
      const org = seedOrg();
      await seedProject(org.adminId, org.managerId);

      const result = await companiesService.delete(org.superAdminId, org.companyId);
      expect(result).toEqual({
        ok: false,
        kind: 'bad_request',
        message: 'Cannot delete a company that still has projects',
        details: { projectCount: 1 },
      });
    });

    it('soft deletes an empty company', async () => {
      const org = seedOrg();

      expectOk(await companiesService.delete(org.superAdminId, org.companyId));
      const after = await companiesService.getById(org.superAdminId, org.companyId);
      expect(after).toEqual({ ok: false, kind: 'not_found', message: 'Company not found' });
    });

    it('forbids an Admin', async () => {
      const org = seedOrg();
      const result = await companiesService.delete(org.adminId, org.companyId);
      expect(result).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'Only a super administrator can manage companies',
      });
    });
  });
});
