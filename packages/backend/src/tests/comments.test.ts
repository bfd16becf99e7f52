import { describe, it, expect } from 'vitest';
import { commentsService } from '../services/comments.service.js';
import { workItemsService } from '../services/work-items.service.js';
import { listWorkItemActivity } from '../services/audit.service.js';
import { createCommentSchema } from '../schemas/comment.schema.js';
import { createWorkItemSchema } from '../schemas/work-item.schema.js';
import { SystemRole, ProjectRole, WorkItemType } from '../types/index.js';
import type { CommentDto, ProjectDto, WorkItemDto } from '../types/index.js';
import { useTestDatabase, seedOrg, seedProject, seedUser, seedMembership, expectOk, TEST_NOW } from './setup.js';
import type { Org } from './setup.js';

/** A bug filed by QA and assigned to the member, so both contributors can open it. */
async function setup(): Promise<{ org: Org; project: ProjectDto; item: WorkItemDto }> {
  const org = seedOrg();
  const project = await seedProject(org.adminId, org.managerId);
  const input = createWorkItemSchema.parse({
    title: 'Crash on save',
    type: WorkItemType.BUG,
    assignedToId: org.memberId,
  });
  const item = expectOk(await workItemsService.create(org.qaId, project.id, input));
  return { org, project, item };
}

async function comment(actorId: number, projectId: number, itemId: number, content: string): Promise<CommentDto> {
  const input = createCommentSchema.parse({ content });
  return expectOk(await commentsService.create(actorId, projectId, itemId, input));
}

describe('commentsService', () => {
  useTestDatabase();

  describe('create and list', () => {
    it('adds a trimmed comment under the author name', async () => {
      const { org, project, item } = await setup();

      const added = await comment(org.memberId, project.id, item.id, '  Reproduced on staging  ');
      expect(added).toEqual({
        id: expect.any(Number),
        workItemId: item.id,
        content: 'Reproduced on staging',
        authorId: org.memberId,
        authorName: 'Max Member',
        createdAt: TEST_NOW,
      });
    });

    it('records the comment on the item history', async () => {
      const { org, project, item } = await setup();
      await comment(org.memberId, project.id, item.id, 'Reproduced on staging');

      const history = expectOk(await listWorkItemActivity(org.adminId, project.id, item.id));
      expect([history[0].action, history[0].entityType, history[0].description]).toEqual([
        'Commented',
        'WorkItem',
        'Commented on ACM-1',
      ]);
    });

    it('lists comments newest first', async () => {
      const { org, project, item } = await setup();
      await comment(org.memberId, project.id, item.id, 'First look');
      await comment(org.managerId, project.id, item.id, 'Second look');

      const comments = expectOk(await commentsService.list(org.qaId, project.id, item.id));
      expect(comments.map((c) => [c.content, c.authorName])).toEqual([
        ['Second look', 'Mia Manager'],
        ['First look', 'Max Member'],
      ]);
    });

    it('keeps comments as private as the item', async () => {
      const { org, project } = await setup();
      const input = createWorkItemSchema.parse({ title: 'Budget review' });
      const adminItem = expectOk(await workItemsService.create(org.adminId, project.id, input));

      const denied = await commentsService.create(
        org.memberId,
        project.id,
        adminItem.id,
        createCommentSchema.parse({ content: 'Can I help?' })
      );
      expect(denied).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You can only access work items you created or are assigned to',
      });
      expect(await commentsService.list(org.memberId, project.id, adminItem.id)).toEqual(denied);
    });

    it('rejects blank content', () => {
      expect(createCommentSchema.safeParse({ content: '   ' }).success).toBe(false);
    });
  });

  describe('delete', () => {
    it('lets the author remove their own comment', async () => {
      const { org, project, item } = await setup();
      const own = await comment(org.memberId, project.id, item.id, 'Wrong ticket, sorry');

      expect(await commentsService.delete(org.memberId, project.id, item.id, own.id)).toEqual({
        ok: true,
        kind: 'success',
        data: null,
      });
      expect(expectOk(await commentsService.list(org.memberId, project.id, item.id))).toEqual([]);

      const history = expectOk(await listWorkItemActivity(org.adminId, project.id, item.id));
      expect([history[0].action, history[0].entityType, history[0].description]).toEqual([
        'Deleted',
        'Comment',
        'Deleted a comment on ACM-1',
      ]);
    });

    it("does not let a contributor remove someone else's comment", async () => {
      const { org, project, item } = await setup();
      const own = await comment(org.memberId, project.id, item.id, 'Reproduced on staging');

      expect(await commentsService.delete(org.qaId, project.id, item.id, own.id)).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You can only change comments you wrote',
      });
    });

    it('lets a project manager or an admin moderate', async () => {
      const { org, project, item } = await setup();
      const first = await comment(org.memberId, project.id, item.id, 'First look');
      const second = await comment(org.qaId, project.id, item.id, 'Second look');

      expectOk(await commentsService.delete(org.managerId, project.id, item.id, first.id));
      expectOk(await commentsService.delete(org.adminId, project.id, item.id, second.id));

      expect(expectOk(await commentsService.list(org.adminId, project.id, item.id))).toEqual([]);
    });

    it('needs a manager project role for a Manager to moderate', async () => {
      const { org, project, item } = await setup();
      const target = await comment(org.memberId, project.id, item.id, 'Reproduced on staging');
      const outsider = seedUser({ companyId: org.companyId, role: SystemRole.MANAGER });
      const plainMember = seedUser({ companyId: org.companyId, role: SystemRole.MANAGER });
      seedMembership(project.id, plainMember, ProjectRole.MEMBER);

      expect(await commentsService.delete(outsider, project.id, item.id, target.id)).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You are not a member of this project',
      });
      expect(await commentsService.delete(plainMember, project.id, item.id, target.id)).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'Project manager role required',
      });
    });

    it('reports a comment of another item as not found', async () => {
      const { org, project, item } = await setup();
      const other = expectOk(
        await workItemsService.create(org.adminId, project.id, createWorkItemSchema.parse({ title: 'Other' }))
      );
      const onOther = await comment(org.adminId, project.id, other.id, 'Elsewhere');

      expect(await commentsService.delete(org.adminId, project.id, item.id, onOther.id)).toEqual({
        ok: false,
        kind: 'not_found',
        message: 'Comment not found',
      });
    });
  });
});
