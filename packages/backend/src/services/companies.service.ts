import { getDb, fromFlag, toFlag, insertedId, withUniqueGuard } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError, ForbiddenError } from '../lib/errors.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { authorize, assertAllowed } from '../engine/access/index.js';
import type { ActorContext } from '../engine/access/index.js';
import { SystemRole, ActivityAction, EntityType } from '../types/index.js';
import type { CompanyDto } from '../types/index.js';
import type { CreateCompanyInput, UpdateCompanyInput } from '../schemas/company.schema.js';
import type { CompanyRow } from './records.js';
import { resolveActor } from './identity.service.js';
import { logActivity } from './audit.service.js';

function toCompanyDto(row: CompanyRow): CompanyDto {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    isActive: fromFlag(row.is_active),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function findActiveCompany(db: Db, id: number): CompanyRow | undefined {
  return db
    .prepare<[number], CompanyRow>('SELECT * FROM companies WHERE id = ? AND is_deleted = 0')
    .get(id);
}

function assertNameAvailable(db: Db, name: string, exceptId?: number): void {
  const clash = db
    .prepare<[string, number], { id: number }>(
      'SELECT id FROM companies WHERE name = ? AND is_deleted = 0 AND id != ?'
    )
    .get(name, exceptId ?? 0);
  if (clash) {
    throw new ValidationError(`A company named '${name}' already exists`);
  }
}

function requireCompanyAccess(
  actor: ActorContext,
  id: number,
  action: 'read' | 'update' | 'delete'
): CompanyRow {
  const company = findActiveCompany(getDb(), id);
  if (!company) {
    throw new NotFoundError('Company');
  }
  assertAllowed(authorize(actor, action, { kind: 'company', companyId: company.id }));
  return company;
}

class CompaniesService {
  async list(actorId: number): Promise<ServiceResult<CompanyDto[]>> {
    return runService('companies.list', () => {
      const actor = resolveActor(actorId);
      const db = getDb();

      if (actor.systemRole === SystemRole.SUPER_ADMIN) {
        const rows = db
          .prepare<[], CompanyRow>('SELECT * FROM companies WHERE is_deleted = 0 ORDER BY name')
          .all();
        return success(rows.map(toCompanyDto));
      }

      if (actor.companyId === null) {
        return success([]);
      }
      const own = findActiveCompany(db, actor.companyId);
      return success(own ? [toCompanyDto(own)] : []);
    });
  }

  async getById(actorId: number, id: number): Promise<ServiceResult<CompanyDto>> {
    return runService('companies.getById', () => {
      const actor = resolveActor(actorId);
      return success(toCompanyDto(requireCompanyAccess(actor, id, 'read')));
    });
  }

  async create(actorId: number, input: CreateCompanyInput): Promise<ServiceResult<CompanyDto>> {
    return runService('companies.create', () => {
      const actor = resolveActor(actorId);
      if (actor.systemRole !== SystemRole.SUPER_ADMIN) {
        throw new ForbiddenError('Only a super administrator can create companies');
      }

      const db = getDb();
      assertNameAvailable(db, input.name);

      const now = nowIso();
      const id = withUniqueGuard(`A company named '${input.name}' already exists`, () =>
        insertedId(
          db
            .prepare(
              `INSERT INTO companies (name, description, is_active, created_at, updated_at)
               VALUES (?, ?, 1, ?, ?)`
            )
            .run(input.name, input.description ?? null, now, now)
        )
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.COMPANY,
        entityId: id,
        description: `Created company '${input.name}'`,
      });

      const row = findActiveCompany(db, id);
      if (!row) {
        throw new NotFoundError('Company');
      }
      return created(toCompanyDto(row));
    });
  }

  async update(
    actorId: number,
    id: number,
    input: UpdateCompanyInput
  ): Promise<ServiceResult<CompanyDto>> {
    return runService('companies.update', () => {
      const actor = resolveActor(actorId);
      const company = requireCompanyAccess(actor, id, 'update');
      const db = getDb();

      if (input.name !== undefined && input.name !== company.name) {
        assertNameAvailable(db, input.name, company.id);
      }

      withUniqueGuard(`A company named '${input.name}' already exists`, () =>
        db
          .prepare(
            `UPDATE companies SET name = ?, description = ?, is_active = ?, updated_at = ?
             WHERE id = ?`
          )
          .run(
            input.name ?? company.name,
            input.description !== undefined ? input.description : company.description,
            input.isActive !== undefined ? toFlag(input.isActive) : company.is_active,
            nowIso(),
            company.id
          )
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.UPDATED,
        entityType: EntityType.COMPANY,
        entityId: company.id,
        description: `Updated company '${input.name ?? company.name}'`,
      });

      return success(toCompanyDto(requireCompanyAccess(actor, id, 'read')));
    });
  }

  async delete(actorId: number, id: number): Promise<ServiceResult<null>> {
    return runService('companies.delete', () => {
      const actor = resolveActor(actorId);
      const company = requireCompanyAccess(actor, id, 'delete');
      const db = getDb();

      const activeProjects = db
        .prepare<[number], { total: number }>(
          'SELECT COUNT(*) AS total FROM projects WHERE company_id = ? AND is_deleted = 0'
        )
        .get(company.id);
      if (activeProjects && activeProjects.total > 0) {
        throw new ValidationError('Cannot delete a company that still has projects', {
          projectCount: activeProjects.total,
        });
      }

      const now = nowIso();
      db.prepare(
        'UPDATE companies SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
      ).run(now, actor.userId, now, company.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.COMPANY,
        entityId: company.id,
        description: `Deleted company '${company.name}'`,
      });

      return success(null);
    });
  }
}

export const companiesService = new CompaniesService();
