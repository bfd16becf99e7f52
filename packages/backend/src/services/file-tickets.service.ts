import { getDb, insertedId, transaction, withSequenceRetry } from '../lib/db.js';
import type { Db } from '../lib/db.js';
import { now, nowIso } from '../lib/clock.js';
import { ForbiddenError, NotFoundError, ValidationError } from '../lib/errors.js';
import { moduleLogger } from '../lib/logger.js';
import { runService, success, created } from '../lib/service-result.js';
import type { ServiceResult } from '../lib/service-result.js';
import { authorize, assertAllowed } from '../engine/access/index.js';
import { fileTicketLifecycle, CUSTODY_STATES } from '../engine/graph/index.js';
import { FileTicketStatus, ActivityAction, EntityType } from '../types/index.js';
import type { FileTicketDto, FileTicketTransferDto } from '../types/index.js';
import type {
  CreateFileTicketInput,
  UpdateFileTicketInput,
  TransferFileTicketInput,
  FileTicketFiltersInput,
} from '../schemas/file-ticket.schema.js';
import type { FileTicketRow, FileTicketTransferRow } from './records.js';
import { resolveActor } from './identity.service.js';
import {
  fullName,
  requireProjectAccess,
  requireTenantProject,
  requireFileTicketAccess,
  requireCompanyUser,
} from './access.helpers.js';
import { logActivity } from './audit.service.js';

const log = moduleLogger('file-tickets');

interface FileTicketViewRow extends FileTicketRow {
  holder_first_name: string | null;
  holder_last_name: string | null;
}

interface TransferViewRow extends FileTicketTransferRow {
  from_first_name: string;
  from_last_name: string;
  to_first_name: string;
  to_last_name: string;
}

const SELECT_TICKET = `
  SELECT f.*, h.first_name AS holder_first_name, h.last_name AS holder_last_name
  FROM file_tickets f
  LEFT JOIN users h ON h.id = f.current_holder_id`;

/** `FT-{year}-{sequence}`, sequence zero-padded to four digits. */
export function formatTicketNumber(year: number, sequence: number): string {
  return `FT-${year}-${String(sequence).padStart(4, '0')}`;
}

function toFileTicketDto(row: FileTicketViewRow): FileTicketDto {
  return {
    id: row.id,
    projectId: row.project_id,
    ticketNumber: row.ticket_number,
    title: row.title,
    description: row.description,
    type: row.type,
    status: row.status,
    dueDate: row.due_date,
    createdById: row.created_by_id,
    currentHolderId: row.current_holder_id,
    currentHolderName:
      row.holder_first_name !== null && row.holder_last_name !== null
        ? `${row.holder_first_name} ${row.holder_last_name}`
        : null,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toTransferDto(row: TransferViewRow): FileTicketTransferDto {
  return {
    id: row.id,
    fromUserId: row.from_user_id,
    fromUserName: `${row.from_first_name} ${row.from_last_name}`,
    toUserId: row.to_user_id,
    toUserName: `${row.to_first_name} ${row.to_last_name}`,
    transferredAt: row.transferred_at,
    receivedAt: row.received_at,
    notes: row.notes,
  };
}

function loadFileTicketDto(db: Db, id: number): FileTicketDto {
  const row = db.prepare<[number], FileTicketViewRow>(`${SELECT_TICKET} WHERE f.id = ?`).get(id);
  if (!row) {
    throw new NotFoundError('File ticket');
  }
  return toFileTicketDto(row);
}

/** Newest first. */
function loadTransfers(db: Db, ticketId: number): FileTicketTransferDto[] {
  return db
    .prepare<[number], TransferViewRow>(
      `SELECT t.*,
         fu.first_name AS from_first_name, fu.last_name AS from_last_name,
         tu.first_name AS to_first_name, tu.last_name AS to_last_name
       FROM file_ticket_transfers t
       JOIN users fu ON fu.id = t.from_user_id
       JOIN users tu ON tu.id = t.to_user_id
       WHERE t.file_ticket_id = ?
       ORDER BY t.transferred_at DESC, t.id DESC`
    )
    .all(ticketId)
    .map(toTransferDto);
}

function nextTicketNumber(tx: Db, year: number): string {
  const prefix = `FT-${year}-`;
  const row = tx
    .prepare<[number, string], { max_seq: number | null }>(
      `SELECT MAX(CAST(substr(ticket_number, ?) AS INTEGER)) AS max_seq
       FROM file_tickets WHERE ticket_number LIKE ?`
    )
    .get(prefix.length + 1, `${prefix}%`);
  return formatTicketNumber(year, (row?.max_seq ?? 0) + 1);
}

class FileTicketsService {
  async list(
    actorId: number,
    projectId: number,
    filters: FileTicketFiltersInput
  ): Promise<ServiceResult<FileTicketDto[]>> {
    return runService('fileTickets.list', () => {
      const actor = resolveActor(actorId);
      // Without project visibility the list narrows to tickets the actor created or holds.
      const { project, membership } = requireTenantProject(actor, projectId);

      const clauses = ['f.project_id = ?', 'f.is_deleted = 0'];
      const params: unknown[] = [project.id];
      if (filters.status !== undefined) {
        clauses.push('f.status = ?');
        params.push(filters.status);
      }
      if (filters.type !== undefined) {
        clauses.push('f.type = ?');
        params.push(filters.type);
      }
      if (filters.currentHolderId !== undefined) {
        clauses.push('f.current_holder_id = ?');
        params.push(filters.currentHolderId);
      }

      const rows = getDb()
        .prepare<unknown[], FileTicketViewRow>(
          `${SELECT_TICKET} WHERE ${clauses.join(' AND ')} ORDER BY f.created_at DESC, f.id DESC`
        )
        .all(...params);

      const visible = rows.filter(
        (row) =>
          authorize(actor, 'read', {
            kind: 'file_ticket',
            companyId: project.company_id,
            membership,
            createdById: row.created_by_id,
            currentHolderId: row.current_holder_id,
          }).allowed
      );
      return success(visible.map(toFileTicketDto));
    });
  }

  async getById(actorId: number, projectId: number, id: number): Promise<ServiceResult<FileTicketDto>> {
    return runService('fileTickets.getById', () => {
      const actor = resolveActor(actorId);
      const { ticket } = requireFileTicketAccess(actor, projectId, id, 'read');
      const db = getDb();
      return success({ ...loadFileTicketDto(db, ticket.id), transfers: loadTransfers(db, ticket.id) });
    });
  }

  async create(
    actorId: number,
    projectId: number,
    input: CreateFileTicketInput
  ): Promise<ServiceResult<FileTicketDto>> {
    return runService('fileTickets.create', () => {
      const actor = resolveActor(actorId);
      const { project, membership } = requireProjectAccess(actor, projectId, 'read');
      const holderId = input.currentHolderId ?? actor.userId;
      assertAllowed(
        authorize(actor, 'create', {
          kind: 'file_ticket',
          companyId: project.company_id,
          membership,
          createdById: actor.userId,
          currentHolderId: holderId,
        })
      );

      const db = getDb();
      if (input.currentHolderId !== undefined) {
        requireCompanyUser(db, input.currentHolderId, project.company_id, 'Holder must be a user of this company');
      }

      const year = now().getUTCFullYear();
      const id = withSequenceRetry('file-ticket number', () =>
        transaction((tx) => {
          const stamp = nowIso();
          return insertedId(
            tx
              .prepare(
                `INSERT INTO file_tickets
                   (project_id, ticket_number, title, description, type, status, due_date,
                    created_by_id, current_holder_id, created_at, updated_at)
                 VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
              )
              .run(
                project.id,
                nextTicketNumber(tx, year),
                input.title,
                input.description ?? null,
                input.type,
                FileTicketStatus.CREATED,
                input.dueDate ? input.dueDate.toISOString() : null,
                actor.userId,
                holderId,
                stamp,
                stamp
              )
          );
        })
      );

      const dto = loadFileTicketDto(db, id);
      log.debug({ fileTicketId: id, ticketNumber: dto.ticketNumber }, 'File ticket created');
      logActivity({
        userId: actor.userId,
        action: ActivityAction.CREATED,
        entityType: EntityType.FILE_TICKET,
        entityId: id,
        projectId: project.id,
        fileTicketId: id,
        description: `File ticket '${dto.ticketNumber}' created`,
      });

      return created(dto);
    });
  }

  async update(
    actorId: number,
    projectId: number,
    id: number,
    input: UpdateFileTicketInput
  ): Promise<ServiceResult<FileTicketDto>> {
    return runService('fileTickets.update', () => {
      const actor = resolveActor(actorId);
      const { project, ticket } = requireFileTicketAccess(actor, projectId, id, 'update');

      const status = input.status ?? ticket.status;
      if (status !== ticket.status) {
        if (CUSTODY_STATES.includes(status)) {
          throw new ValidationError(`${status} is set by transfer and receive only`, {
            currentStatus: ticket.status,
            attemptedStatus: status,
          });
        }
        fileTicketLifecycle.assertTransition(ticket.status, status);
      }

      const db = getDb();
      db.prepare(
        `UPDATE file_tickets SET title = ?, description = ?, due_date = ?, status = ?, updated_at = ?
         WHERE id = ?`
      ).run(
        input.title ?? ticket.title,
        input.description !== undefined ? input.description : ticket.description,
        input.dueDate !== undefined ? (input.dueDate ? input.dueDate.toISOString() : null) : ticket.due_date,
        status,
        nowIso(),
        ticket.id
      );

      const statusChanged = status !== ticket.status;
      logActivity({
        userId: actor.userId,
        action: statusChanged ? ActivityAction.STATUS_CHANGED : ActivityAction.UPDATED,
        entityType: EntityType.FILE_TICKET,
        entityId: ticket.id,
        projectId: project.id,
        fileTicketId: ticket.id,
        oldValue: statusChanged ? ticket.status : null,
        newValue: statusChanged ? status : null,
        description: `File ticket '${ticket.ticket_number}' updated`,
      });

      return success(loadFileTicketDto(db, ticket.id));
    });
  }

  /** Hand the ticket to another user of the same company. */
  async transfer(
    actorId: number,
    projectId: number,
    id: number,
    input: TransferFileTicketInput
  ): Promise<ServiceResult<FileTicketDto>> {
    return runService('fileTickets.transfer', () => {
      const actor = resolveActor(actorId);
      const { project, ticket } = requireFileTicketAccess(actor, projectId, id, 'update');
      fileTicketLifecycle.assertTransition(ticket.status, FileTicketStatus.IN_TRANSIT);

      const db = getDb();
      const recipient = requireCompanyUser(
        db,
        input.toUserId,
        project.company_id,
        'Target user not found or not in same company'
      );
      const fromUserId = ticket.current_holder_id ?? actor.userId;
      const previousHolder = db
        .prepare<[number], { first_name: string; last_name: string }>(
          'SELECT first_name, last_name FROM users WHERE id = ?'
        )
        .get(fromUserId);

      transaction((tx) => {
        const stamp = nowIso();
        tx.prepare(
          `INSERT INTO file_ticket_transfers (file_ticket_id, from_user_id, to_user_id, transferred_at, notes)
           VALUES (?, ?, ?, ?, ?)`
        ).run(ticket.id, fromUserId, recipient.id, stamp, input.notes ?? null);
        tx.prepare(
          'UPDATE file_tickets SET current_holder_id = ?, status = ?, updated_at = ? WHERE id = ?'
        ).run(recipient.id, FileTicketStatus.IN_TRANSIT, stamp, ticket.id);
      });

      const fromName = previousHolder ? fullName(previousHolder) : 'Unknown';
      const toName = fullName(recipient);
      logActivity({
        userId: actor.userId,
        action: ActivityAction.TRANSFERRED,
        entityType: EntityType.FILE_TICKET,
        entityId: ticket.id,
        projectId: project.id,
        fileTicketId: ticket.id,
        oldValue: fromName,
        newValue: toName,
        description: `File transferred from ${fromName} to ${toName}`,
      });

      return success(loadFileTicketDto(db, ticket.id));
    });
  }

  /**
   * Acknowledge custody. Stamps the newest unreceived transfer addressed to
   * the caller when there is one; the status moves to RECEIVED either way.
   */
  async receive(actorId: number, projectId: number, id: number): Promise<ServiceResult<FileTicketDto>> {
    return runService('fileTickets.receive', () => {
      const actor = resolveActor(actorId);
      const { project, ticket } = requireFileTicketAccess(actor, projectId, id, 'read');
      if (ticket.current_holder_id !== actor.userId) {
        throw new ForbiddenError('Only the current holder can receive this file ticket');
      }
      fileTicketLifecycle.assertTransition(ticket.status, FileTicketStatus.RECEIVED);

      const stamped = transaction((tx) => {
        const stamp = nowIso();
        const open = tx
          .prepare<[number, number], { id: number }>(
            `SELECT id FROM file_ticket_transfers
             WHERE file_ticket_id = ? AND to_user_id = ? AND received_at IS NULL
             ORDER BY transferred_at DESC, id DESC
             LIMIT 1`
          )
          .get(ticket.id, actor.userId);
        if (open) {
          tx.prepare('UPDATE file_ticket_transfers SET received_at = ? WHERE id = ?').run(stamp, open.id);
        }
        tx.prepare('UPDATE file_tickets SET status = ?, updated_at = ? WHERE id = ?').run(
          FileTicketStatus.RECEIVED,
          stamp,
          ticket.id
        );
        return open !== undefined;
      });

      if (!stamped) {
        log.debug({ fileTicketId: ticket.id, userId: actor.userId }, 'Receive with no open transfer');
      }
      logActivity({
        userId: actor.userId,
        action: ActivityAction.RECEIVED,
        entityType: EntityType.FILE_TICKET,
        entityId: ticket.id,
        projectId: project.id,
        fileTicketId: ticket.id,
        description: 'File ticket received',
      });

      return success(loadFileTicketDto(getDb(), ticket.id));
    });
  }

  async listTransfers(
    actorId: number,
    projectId: number,
    id: number
  ): Promise<ServiceResult<FileTicketTransferDto[]>> {
    return runService('fileTickets.listTransfers', () => {
      const actor = resolveActor(actorId);
      const { ticket } = requireFileTicketAccess(actor, projectId, id, 'read');
      return success(loadTransfers(getDb(), ticket.id));
    });
  }

  async delete(actorId: number, projectId: number, id: number): Promise<ServiceResult<null>> {
    return runService('fileTickets.delete', () => {
      const actor = resolveActor(actorId);
      const { project, ticket } = requireFileTicketAccess(actor, projectId, id, 'delete');
      const stamp = nowIso();
      getDb()
        .prepare(
          'UPDATE file_tickets SET is_deleted = 1, deleted_at = ?, deleted_by = ?, updated_at = ? WHERE id = ?'
        )
        .run(stamp, actor.userId, stamp, ticket.id);

      logActivity({
        userId: actor.userId,
        action: ActivityAction.DELETED,
        entityType: EntityType.FILE_TICKET,
        entityId: ticket.id,
        projectId: project.id,
        fileTicketId: ticket.id,
        description: `File ticket '${ticket.ticket_number}' deleted`,
      });

      return success(null);
    });
  }
}

export const fileTicketsService = new FileTicketsService();
