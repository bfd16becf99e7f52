import { describe, it, expect } from 'vitest';
import { authorize, assertAllowed } from '../engine/access/index.js';
import type { ActorContext, AccessTarget, MembershipFacts } from '../engine/access/index.js';
import { SystemRole, ProjectRole } from '../types/index.js';
import { ForbiddenError, NotFoundError } from '../lib/errors.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const COMPANY = 1;
const OTHER_COMPANY = 2;

function actor(systemRole: SystemRole, overrides: Partial<ActorContext> = {}): ActorContext {
  return { userId: 10, systemRole, companyId: COMPANY, managerId: null, ...overrides };
}

function membership(projectRole: ProjectRole | null, managerIsMember = false): MembershipFacts {
  return { projectRole, managerIsMember };
}

const NO_MEMBERSHIP = membership(null);

function workItem(
  facts: MembershipFacts,
  createdById: number,
  assignedToId: number | null = null,
  companyId = COMPANY
): AccessTarget {
  return { kind: 'work_item', companyId, membership: facts, createdById, assignedToId };
}

// ---------------------------------------------------------------------------
// Tenancy
// ---------------------------------------------------------------------------

describe('authorize: tenancy', () => {
  const roles = [
    SystemRole.MEMBER,
    SystemRole.QA,
    SystemRole.MANAGER,
    SystemRole.ADMIN,
    SystemRole.SUPER_ADMIN,
  ];

  it.each(roles)('hides another company project from %s', (role) => {
    const decision = authorize(actor(role), 'read', {
      kind: 'project',
      companyId: OTHER_COMPANY,
      membership: membership(ProjectRole.ADMIN),
    });
    expect(decision).toEqual({
      allowed: false,
      outcome: 'not_found',
      resource: 'Project',
      reason: 'Project not found',
    });
  });

  it('hides everything from an actor without a company', () => {
    const decision = authorize(actor(SystemRole.ADMIN, { companyId: null }), 'read', workItem(NO_MEMBERSHIP, 10));
    expect(decision.allowed).toBe(false);
  });

  it('lets a SuperAdmin read another company record but not change it', () => {
    const superAdmin = actor(SystemRole.SUPER_ADMIN);
    expect(authorize(superAdmin, 'read', { kind: 'company', companyId: OTHER_COMPANY }).allowed).toBe(true);
    expect(authorize(superAdmin, 'update', { kind: 'company', companyId: OTHER_COMPANY })).toEqual({
      allowed: false,
      outcome: 'not_found',
      resource: 'Company',
      reason: 'Company not found',
    });
  });

  it('hides another company from an Admin', () => {
    const decision = authorize(actor(SystemRole.ADMIN), 'read', { kind: 'company', companyId: OTHER_COMPANY });
    expect(decision.allowed).toBe(false);
  });
});

describe('authorize: company record', () => {
  const own = { kind: 'company', companyId: COMPANY } as const;

  it('lets anyone in the company read it', () => {
    expect(authorize(actor(SystemRole.MEMBER), 'read', own).allowed).toBe(true);
  });

  it('needs Admin to update it', () => {
    expect(authorize(actor(SystemRole.ADMIN), 'update', own).allowed).toBe(true);
    expect(authorize(actor(SystemRole.MANAGER), 'update', own)).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'Only administrators can update the company',
    });
  });

  it('needs SuperAdmin to delete it', () => {
    expect(authorize(actor(SystemRole.SUPER_ADMIN), 'delete', own).allowed).toBe(true);
    expect(authorize(actor(SystemRole.ADMIN), 'delete', own).allowed).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Admin and Manager
// ---------------------------------------------------------------------------

describe('authorize: administrators', () => {
  it('allows Admin every action without membership', () => {
    const target: AccessTarget = { kind: 'sprint', companyId: COMPANY, membership: NO_MEMBERSHIP };
    expect(authorize(actor(SystemRole.ADMIN), 'manage', target).allowed).toBe(true);
    expect(authorize(actor(SystemRole.ADMIN), 'delete', target).allowed).toBe(true);
  });
});

describe('authorize: managers', () => {
  const manager = actor(SystemRole.MANAGER);

  it('reads any project in the company without membership', () => {
    const target: AccessTarget = { kind: 'project', companyId: COMPANY, membership: NO_MEMBERSHIP };
    expect(authorize(manager, 'read', target).allowed).toBe(true);
  });

  it('needs membership to write', () => {
    expect(authorize(manager, 'update', workItem(NO_MEMBERSHIP, 99))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You are not a member of this project',
    });
    expect(authorize(manager, 'update', workItem(membership(ProjectRole.MEMBER), 99)).allowed).toBe(true);
  });

  it('needs a manager project role to manage', () => {
    const asMember: AccessTarget = { kind: 'sprint', companyId: COMPANY, membership: membership(ProjectRole.MEMBER) };
    const asManager: AccessTarget = { kind: 'sprint', companyId: COMPANY, membership: membership(ProjectRole.MANAGER) };
    expect(authorize(manager, 'manage', asMember)).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'Project manager role required',
    });
    expect(authorize(manager, 'manage', asManager).allowed).toBe(true);
  });

  it('cannot delete projects', () => {
    const target: AccessTarget = { kind: 'project', companyId: COMPANY, membership: membership(ProjectRole.ADMIN) };
    expect(authorize(manager, 'delete', target).allowed).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Member and QA
// ---------------------------------------------------------------------------

describe('authorize: contributors', () => {
  const member = actor(SystemRole.MEMBER);
  const qa = actor(SystemRole.QA);
  const inProject = membership(ProjectRole.MEMBER);

  it('sees nothing in a project without membership', () => {
    expect(authorize(member, 'read', workItem(NO_MEMBERSHIP, 10))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You do not have access to this project',
    });
  });

  it('sees a project through the direct manager membership', () => {
    const viaManager = membership(null, true);
    expect(authorize(member, 'read', { kind: 'project', companyId: COMPANY, membership: viaManager }).allowed).toBe(true);
  });

  it('reads only items it created or is assigned to', () => {
    expect(authorize(member, 'read', workItem(inProject, 10)).allowed).toBe(true);
    expect(authorize(member, 'read', workItem(inProject, 99, 10)).allowed).toBe(true);
    expect(authorize(member, 'read', workItem(inProject, 99, 98))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You can only access work items you created or are assigned to',
    });
  });

  it('forbids Members to create or delete work items', () => {
    expect(authorize(member, 'create', workItem(inProject, 10)).allowed).toBe(false);
    expect(authorize(member, 'delete', workItem(inProject, 10))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'Members cannot delete work items',
    });
  });

  it('lets QA create items and delete only its own', () => {
    expect(authorize(qa, 'create', workItem(inProject, 10)).allowed).toBe(true);
    expect(authorize(qa, 'delete', workItem(inProject, 10)).allowed).toBe(true);
    expect(authorize(qa, 'delete', workItem(inProject, 99, 10))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'QA users can only delete work items they created',
    });
  });

  it('reads statuses and sprints but cannot change them', () => {
    const sprint: AccessTarget = { kind: 'sprint', companyId: COMPANY, membership: inProject };
    expect(authorize(member, 'read', sprint).allowed).toBe(true);
    expect(authorize(member, 'update', sprint).allowed).toBe(false);
    expect(authorize(member, 'manage', sprint).allowed).toBe(false);
  });

  it('reads file tickets it created or holds', () => {
    const held: AccessTarget = {
      kind: 'file_ticket',
      companyId: COMPANY,
      membership: inProject,
      createdById: 99,
      currentHolderId: 10,
    };
    expect(authorize(member, 'read', held).allowed).toBe(true);
    expect(authorize(member, 'delete', held).allowed).toBe(false);
  });

  it('keeps a ticket open to its holder outside the project', () => {
    const held: AccessTarget = {
      kind: 'file_ticket',
      companyId: COMPANY,
      membership: NO_MEMBERSHIP,
      createdById: 99,
      currentHolderId: 10,
    };
    expect(authorize(member, 'read', held).allowed).toBe(true);
    expect(authorize(member, 'update', held).allowed).toBe(true);
    expect(authorize(member, 'delete', held)).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You do not have access to this project',
    });
    expect(authorize(member, 'read', { ...held, currentHolderId: 98 })).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You do not have access to this project',
    });
  });
});

describe('authorize: boards', () => {
  const inProject = membership(ProjectRole.MEMBER);

  it('hides another user personal board from every role', () => {
    const target: AccessTarget = { kind: 'board', companyId: COMPANY, membership: inProject, ownerId: 99 };
    expect(authorize(actor(SystemRole.ADMIN), 'read', target)).toEqual({
      allowed: false,
      outcome: 'not_found',
      resource: 'Board',
      reason: 'Board not found',
    });
  });

  it('lets a Manager outside the project create and edit a personal board', () => {
    const own: AccessTarget = { kind: 'board', companyId: COMPANY, membership: NO_MEMBERSHIP, ownerId: 10 };
    const shared: AccessTarget = { kind: 'board', companyId: COMPANY, membership: NO_MEMBERSHIP, ownerId: null };
    expect(authorize(actor(SystemRole.MANAGER), 'create', own).allowed).toBe(true);
    expect(authorize(actor(SystemRole.MANAGER), 'delete', own).allowed).toBe(true);
    expect(authorize(actor(SystemRole.MANAGER), 'manage', shared)).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You are not a member of this project',
    });
  });

  it('lets a Member edit its own board but not the default board', () => {
    const own: AccessTarget = { kind: 'board', companyId: COMPANY, membership: inProject, ownerId: 10 };
    const shared: AccessTarget = { kind: 'board', companyId: COMPANY, membership: inProject, ownerId: null };
    expect(authorize(actor(SystemRole.MEMBER), 'update', own).allowed).toBe(true);
    expect(authorize(actor(SystemRole.MEMBER), 'update', shared).allowed).toBe(false);
    expect(authorize(actor(SystemRole.MEMBER), 'read', shared).allowed).toBe(true);
  });
});

describe('authorize: comments', () => {
  function comment(facts: MembershipFacts, authorId: number): AccessTarget {
    return { kind: 'comment', companyId: COMPANY, membership: facts, authorId };
  }

  it('lets the author delete their comment whatever the role', () => {
    expect(authorize(actor(SystemRole.MEMBER), 'delete', comment(membership(null, true), 10)).allowed).toBe(true);
    expect(authorize(actor(SystemRole.MANAGER), 'delete', comment(NO_MEMBERSHIP, 10)).allowed).toBe(true);
  });

  it("keeps contributors off someone else's comment", () => {
    expect(authorize(actor(SystemRole.QA), 'delete', comment(membership(ProjectRole.MEMBER), 99))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'You can only change comments you wrote',
    });
  });

  it('lets project managers and admins moderate', () => {
    expect(authorize(actor(SystemRole.MANAGER), 'delete', comment(membership(ProjectRole.MANAGER), 99)).allowed).toBe(
      true
    );
    expect(authorize(actor(SystemRole.MANAGER), 'delete', comment(membership(ProjectRole.MEMBER), 99))).toEqual({
      allowed: false,
      outcome: 'forbidden',
      reason: 'Project manager role required',
    });
    expect(authorize(actor(SystemRole.ADMIN), 'delete', comment(NO_MEMBERSHIP, 99)).allowed).toBe(true);
  });
});

describe('assertAllowed', () => {
  it('passes an allowed decision', () => {
    expect(() => assertAllowed({ allowed: true })).not.toThrow();
  });

  it('throws NotFoundError for a hidden target', () => {
    expect(() =>
      assertAllowed({ allowed: false, outcome: 'not_found', resource: 'Sprint', reason: 'Sprint not found' })
    ).toThrow(NotFoundError);
  });

  it('throws ForbiddenError with the reason', () => {
    expect(() => assertAllowed({ allowed: false, outcome: 'forbidden', reason: 'nope' })).toThrow(
      new ForbiddenError('nope')
    );
  });
});
