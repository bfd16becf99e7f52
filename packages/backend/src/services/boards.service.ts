import { getDb, fromFlag, insertedId, transaction } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { nowIso } from '../lib/clock.js';
import { NotFoundError, ValidationError } from '../lib/errors.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { authorize, assertAllowed } from '../engine/access/index.js';
import type { ActorContext, AccessAction } from '../engine/access/index.js';
import { ActivityAction, EntityType } from '../types/index.js';
import type { BoardDto, BoardColumnDto } from '../types/index.js';
import type { CreateBoardInput, AddColumnInput } from '../schemas/board.schema.js';
import type { BoardRow, BoardColumnRow } from './records.js';
import type { ProjectAccess } from './access.helpers.js';
import { resolveActor } from './identity.service.js';
import { requireProjectAccess } from './access.helpers.js';
import { findProjectStatus } from './workflow-statuses.service.js';
import { logActivity } from './audit.service.js';

export const DEFAULT_BOARD_NAME = 'Main Board';

/** Insert the default board and one column per status, inside the caller's transaction. */
export function createDefaultBoard(tx: Db, projectId: number, statusIds: number[], now: string): number {
  const boardId = insertedId(
    tx
      .prepare(
        `INSERT INTO boards (project_id, name, owner_id, is_default, created_at, updated_at)
         VALUES (?, ?, NULL, 1, ?, ?)`
      )
      .run(projectId, DEFAULT_BOARD_NAME, now, now)
  );
  insertColumns(tx, boardId, statusIds, now);
  return boardId;
}

function insertColumns(tx: Db, boardId: number, statusIds: number[], now: string): void {
  const insert = tx.prepare(
    'INSERT INTO board_columns (board_id, status_id, sort_order, created_at) VALUES (?, ?, ?, ?)'
  );
  statusIds.forEach((statusId, index) => {
    insert.run(boardId, statusId, index + 1, now);
  });
}

interface ColumnWithStatusRow extends BoardColumnRow {
  status_name: string;
  color: string;
}

function listColumns(db: Db, boardId: number): ColumnWithStatusRow[] {
  return db
    .prepare<[number], ColumnWithStatusRow>(
      `SELECT c.*, s.name AS status_name, s.color
       FROM board_columns c
       JOIN workflow_statuses s ON s.id = c.status_id AND s.is_deleted = 0
       WHERE c.board_id = ?
       ORDER BY c.sort_order, c.id`
    )
    .all(boardId);
}

function toColumnDto(row: ColumnWithStatusRow): BoardColumnDto {
  return {
    id: row.id,
    statusId: row.status_id,
    statusName: row.status_name,
    color: row.color,
    order: row.sort_order,
  };
}

function toBoardDto(db: Db, row: BoardRow): BoardDto {
  return {
    id: row.id,
    projectId: row.project_id,
    name: row.name,
    isDefault: fromFlag(row.is_default),
    ownerId: row.owner_id,
    columns: listColumns(db, row.id).map(toColumnDto),
  };
}

function findDefaultBoard(db: Db, projectId: number): BoardRow | undefined {
  return db
    .prepare<[number], BoardRow>(
      'SELECT * FROM boards WHERE project_id = ? AND is_default = 1 AND is_deleted = 0'
    )
    .get(projectId);
}

/** Load a live board of the project and check `action` on it. */
function requireBoard(
  actor: ActorContext,
  access: ProjectAccess,
  boardId: number,
  action: AccessAction
): BoardRow {
  const board = getDb()
    .prepare<[number, number], BoardRow>(
      'SELECT * FROM boards WHERE id = ? AND project_id = ? AND is_deleted = 0'
    )
    .get(boardId, access.project.id);
  if (!board) {
    throw new NotFoundError('Board');
  }
  assertAllowed(
    authorize(actor, action, {
      kind: 'board',
      companyId: access.project.company_id,
      membership: access.membership,
      ownerId: board.owner_id,
    })
  );
  return board;
}

/** Changing the default board is a project-management action; a personal board is its owner's. */
function editAction(board: BoardRow): AccessAction {
  return fromFlag(board.is_default) ? 'manage' : 'update';
}

class BoardsService {
  async list(actorId: number, projectId: number): Promise<ServiceResult<BoardDto[]>> {
    return runService('boards.list', () => {
      const actor = resolveActor(actorId);
      const { project } = requireProjectAccess(actor, projectId, 'read');
      const db = getDb();
      const rows = db
        .prepare<[number, number], BoardRow>(
          `SELECT * FROM boards
           WHERE project_id = ? AND is_deleted = 0 AND (is_default = 1 OR owner_id = ?)
           ORDER BY is_default DESC, name`
        )
        .all(project.id, actor.userId);
      return success(rows.map((row) => toBoardDto(db, row)));
    });
  }

  async getById(actorId: number, projectId: number, boardId: number): Promise<ServiceResult<BoardDto>> {
    return runService('boards.getById', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      return success(toBoardDto(getDb(), requireBoard(actor, access, boardId, 'read')));
    });
  }

  /** A personal board starts as a copy of the default board's columns. */
  async createPersonal(
    actorId: number,
    projectId: number,
    input: CreateBoardInput
  ): Promise<ServiceResult<BoardDto>> {
    return runService('boards.createPersonal', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      assertAllowed(
        authorize(actor, 'create', {
          kind: 'board',
          companyId: access.project.company_id,
          membership: access.membership,
          ownerId: actor.userId,
        })
      );
      const db = getDb();

      const boardId = transaction((tx) => {
        const template = findDefaultBoard(tx, access.project.id);
        const statusIds = template ? listColumns(tx, template.id).map((c) => c.status_id) : [];
        const now = nowIso();
        const id = insertedId(
          tx
            .prepare(
              `INSERT INTO boards (project_id, name, owner_id, is_default, created_at, updated_at)
               VALUES (?, ?, ?, 0, ?, ?)`
            )
            .run(access.project.id, input.name, actor.userId, now, now)
        );
        insertColumns(tx, id, statusIds, now);
        return id;
      });

      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.BOARD,
        entityId: boardId,
        projectId: access.project.id,
        description: `Created board '${input.name}'`,
      });

      return created(toBoardDto(db, requireBoard(actor, access, boardId, 'read')));
    });
  }

  async addColumn(
    actorId: number,
    projectId: number,
    boardId: number,
    input: AddColumnInput
  ): Promise<ServiceResult<BoardDto>> {
    return runService('boards.addColumn', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      const board = requireBoard(actor, access, boardId, 'read');
      assertAllowed(
        authorize(actor, editAction(board), {
          kind: 'board',
          companyId: access.project.company_id,
          membership: access.membership,
          ownerId: board.owner_id,
        })
      );
      const db = getDb();

      const status = findProjectStatus(db, access.project.id, input.statusId);
      if (!status) {
        throw new ValidationError('Status does not belong to this project', {
          statusId: input.statusId,
        });
      }

      transaction((tx) => {
        const existing = tx
          .prepare<[number, number], { id: number }>(
            'SELECT id FROM board_columns WHERE board_id = ? AND status_id = ?'
          )
          .get(board.id, status.id);
        if (existing) {
          throw new ValidationError(`Status '${status.name}' already has a column on this board`);
        }
        const maxRow = tx
          .prepare<[number], { max_order: number | null }>(
            'SELECT MAX(sort_order) AS max_order FROM board_columns WHERE board_id = ?'
          )
          .get(board.id);
        tx.prepare(
          'INSERT INTO board_columns (board_id, status_id, sort_order, created_at) VALUES (?, ?, ?, ?)'
        ).run(board.id, status.id, (maxRow?.max_order ?? 0) + 1, nowIso());
      });

      logActivity({
        userId: actor.userId,
        action: ActivityAction.UPDATED,
        entityType: EntityType.BOARD,
        entityId: board.id,
        projectId: access.project.id,
        newValue: status.name,
        description: `Added column '${status.name}' to board '${board.name}'`,
      });

      return success(toBoardDto(db, board));
    });
  }

  async removeColumn(
    actorId: number,
    projectId: number,
    boardId: number,
    columnId: number
  ): Promise<ServiceResult<BoardDto>> {
    return runService('boards.removeColumn', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      const board = requireBoard(actor, access, boardId, 'read');
      assertAllowed(
        authorize(actor, editAction(board), {
          kind: 'board',
          companyId: access.project.company_id,
          membership: access.membership,
          ownerId: board.owner_id,
        })
      );
      const db = getDb();

      const result = db
        .prepare('DELETE FROM board_columns WHERE id = ? AND board_id = ?')
        .run(columnId, board.id);
      if (result.changes === 0) {
        throw new NotFoundError('Board column');
      }

      logActivity({
        userId: actor.userId,
        action: ActivityAction.UPDATED,
        entityType: EntityType.BOARD,
        entityId: board.id,
        projectId: access.project.id,
        description: `Removed a column from board '${board.name}'`,
      });

      return success(toBoardDto(db, board));
    });
  }

  async delete(actorId: number, projectId: number, boardId: number): Promise<ServiceResult<null>> {
    return runService('boards.delete', () => {
      const actor = resolveActor(actorId);
      const access = requireProjectAccess(actor, projectId, 'read');
      const board = requireBoard(actor, access, boardId, 'read');
      if (fromFlag(board.is_default)) {
        throw new ValidationError('The default board cannot be deleted');
      }
      assertAllowed(
        authorize(actor, 'delete', {
          kind: 'board',
          companyId: access.project.company_id,
          membership: access.membership,
          ownerId: board.owner_id,
        })
      );

      const now = nowIso();
      getDb()
        .prepare(
          'UPDATE boards SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
        )
        .run(now, actor.userId, now, board.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.BOARD,
        entityId: board.id,
        projectId: access.project.id,
        description: `Deleted board '${board.name}'`,
      });

      return success(null);
    });
  }
}

export const boardsService = new BoardsService();
