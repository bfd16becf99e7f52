import { getDb, insertedId } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError } from '../lib/errors.js';
import { moduleLogger } from '../lib/logger.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { authorize, assertAllowed } from '../engine/access/index.js';
import { ActivityAction, EntityType } from '../types/index.js';
import type { CommentDto } from '../types/index.js';
import type { CreateCommentInput } from '../schemas/comment.schema.js';
import type { CommentRow } from './records.js';
import { resolveActor } from './identity.service.js';
import { requireWorkItemAccess } from './access.helpers.js';
import { logActivity } from './audit.service.js';
import { formatItemKey } from './work-items.service.js';

const log = moduleLogger('comments');

interface CommentViewRow extends CommentRow {
  author_name: string;
}

const SELECT_COMMENT = `
  SELECT c.*, u.first_name || ' ' || u.last_name AS author_name
  FROM comments c
  JOIN users u ON u.id = c.author_id`;

function toCommentDto(row: CommentViewRow): CommentDto {
  return {
    id: row.id,
    workItemId: row.work_item_id,
    content: row.content,
    authorId: row.author_id,
    authorName: row.author_name,
    createdAt: row.created_at,
  };
}

function loadCommentDto(db: Db, id: number): CommentDto {
  const row = db
    .prepare<[number], CommentViewRow>(`${SELECT_COMMENT} WHERE c.id = ? AND c.is_deleted = 0`)
    .get(id);
  if (!row) {
    throw new NotFoundError('Comment');
  }
  return toCommentDto(row);
}

/**
 * Discussion on a work item. Whoever can read the item can read and add
 * comments; removal is for the author and for project managers.
 */
class CommentsService {
  /** Newest first. */
  async list(actorId: number, projectId: number, workItemId: number): Promise<ServiceResult<CommentDto[]>> {
    return runService('comments.list', () => {
      const actor = resolveActor(actorId);
      const { item } = requireWorkItemAccess(actor, projectId, workItemId, 'read');
      const rows = getDb()
        .prepare<[number], CommentViewRow>(
          `${SELECT_COMMENT} WHERE c.work_item_id = ? AND c.is_deleted = 0 ORDER BY c.created_at DESC, c.id DESC`
        )
        .all(item.id);
      return success(rows.map(toCommentDto));
    });
  }

  async create(
    actorId: number,
    projectId: number,
    workItemId: number,
    input: CreateCommentInput
  ): Promise<ServiceResult<CommentDto>> {
    return runService('comments.create', () => {
      const actor = resolveActor(actorId);
      const { project, item } = requireWorkItemAccess(actor, projectId, workItemId, 'read');

      const now = nowIso();
      const db = getDb();
      const id = insertedId(
        db
          .prepare(
            `INSERT INTO comments (work_item_id, author_id, content, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?)`
          )
          .run(item.id, actor.userId, input.content, now, now)
      );

      logActivity({
        userId: actor.userId,
        action: ActivityAction.COMMENTED,
        entityType: EntityType.WORK_ITEM,
        entityId: item.id,
        projectId: project.id,
        workItemId: item.id,
        description: `Commented on ${formatItemKey(project.key, item.item_number)}`,
      });

      return created(loadCommentDto(db, id));
    });
  }

  /** Soft delete. */
  async delete(
    actorId: number,
    projectId: number,
    workItemId: number,
    commentId: number
  ): Promise<ServiceResult<null>> {
    return runService('comments.delete', () => {
      const actor = resolveActor(actorId);
      const { project, membership, item } = requireWorkItemAccess(actor, projectId, workItemId, 'read');
      const db = getDb();
      const comment = db
        .prepare<[number, number], CommentRow>(
          'SELECT * FROM comments WHERE id = ? AND work_item_id = ? AND is_deleted = 0'
        )
        .get(commentId, item.id);
      if (!comment) {
        throw new NotFoundError('Comment');
      }
      assertAllowed(
        authorize(actor, 'delete', {
          kind: 'comment',
          companyId: project.company_id,
          membership,
          authorId: comment.author_id,
        })
      );

      const now = nowIso();
      db.prepare(
        'UPDATE comments SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
      ).run(now, actor.userId, now, comment.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.COMMENT,
        entityId: comment.id,
        projectId: project.id,
        workItemId: item.id,
        description: `Deleted a comment on ${formatItemKey(project.key, item.item_number)}`,
      });

      if (comment.author_id !== actor.userId) {
        log.info(
          { commentId: comment.id, authorId: comment.author_id, actorId: actor.userId },
          'Comment removed by moderator'
        );
      }
      return success(null);
    });
  }
}

export const commentsService = new CommentsService();
