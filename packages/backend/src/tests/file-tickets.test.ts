import { describe, it, expect } from 'vitest';
import { fileTicketsService, formatTicketNumber } from '../services/file-tickets.service.js';
import { listFileTicketActivity } from '../services/audit.service.js';
import { createFileTicketSchema } from '../schemas/file-ticket.schema.js';
import { setClock } from '../lib/clock.js';
import { FileTicketStatus, FileTicketType, SystemRole } from '../types/index.js';
import type { FileTicketDto, ProjectDto } from '../types/index.js';
import { useTestDatabase, seedOrg, seedUser, seedProject, expectOk, TEST_NOW } from './setup.js';
import type { Org } from './setup.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

async function setup(): Promise<{ org: Org; project: ProjectDto }> {
  const org = seedOrg();
  const project = await seedProject(org.adminId, org.managerId);
  return { org, project };
}

async function createTicket(
  actorId: number,
  projectId: number,
  fields: Record<string, unknown> = {}
): Promise<FileTicketDto> {
  const input = createFileTicketSchema.parse({ title: 'Lease agreement', ...fields });
  return expectOk(await fileTicketsService.create(actorId, projectId, input));
}

describe('formatTicketNumber', () => {
  it('pads the sequence to four digits', () => {
    expect(formatTicketNumber(2026, 7)).toBe('FT-2026-0007');
    expect(formatTicketNumber(2026, 12345)).toBe('FT-2026-12345');
  });
});

describe('fileTicketsService', () => {
  useTestDatabase();

  describe('create', () => {
    it('numbers tickets by year and gives them to the creator', async () => {
      const { org, project } = await setup();

      const ticket = await createTicket(org.memberId, project.id);
      expect(ticket).toEqual({
        id: expect.any(Number),
        projectId: project.id,
        ticketNumber: 'FT-2026-0001',
        title: 'Lease agreement',
        description: null,
        type: FileTicketType.PHYSICAL,
        status: FileTicketStatus.CREATED,
        dueDate: null,
        createdById: org.memberId,
        currentHolderId: org.memberId,
        currentHolderName: 'Max Member',
        createdAt: TEST_NOW,
        updatedAt: TEST_NOW,
      });

      const other = await seedProject(org.adminId, org.managerId, 'OTH', 'Other');
      const second = await createTicket(org.adminId, other.id);
      expect(second.ticketNumber).toBe('FT-2026-0002');
    });

    it('restarts the sequence in a new year', async () => {
      const { org, project } = await setup();
      await createTicket(org.adminId, project.id);

      setClock({ now: () => new Date('2027-01-04T08:00:00.000Z') });
      const ticket = await createTicket(org.adminId, project.id);
      expect(ticket.ticketNumber).toBe('FT-2027-0001');
    });

    it('rejects a holder from another company', async () => {
      const { org, project } = await setup();
      const other = seedOrg('Bluebell Ltd');
      const input = createFileTicketSchema.parse({ title: 'Deed', currentHolderId: other.adminId });

      const result = await fileTicketsService.create(org.adminId, project.id, input);
      expect(result).toEqual({
        ok: false,
        kind: 'bad_request',
        message: 'Holder must be a user of this company',
        details: { userId: other.adminId },
      });
    });
  });

  describe('custody chain', () => {
    it('transfers and receives', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.memberId, project.id);

      const moved = expectOk(
        await fileTicketsService.transfer(org.memberId, project.id, ticket.id, {
          toUserId: org.qaId,
          notes: 'For review',
        })
      );
      expect(moved.status).toBe(FileTicketStatus.IN_TRANSIT);
      expect(moved.currentHolderName).toBe('Quinn Tester');

      const notHolder = await fileTicketsService.receive(org.memberId, project.id, ticket.id);
      expect(notHolder).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'Only the current holder can receive this file ticket',
      });

      const received = expectOk(await fileTicketsService.receive(org.qaId, project.id, ticket.id));
      expect(received.status).toBe(FileTicketStatus.RECEIVED);

      const transfers = expectOk(await fileTicketsService.listTransfers(org.qaId, project.id, ticket.id));
      expect(transfers).toEqual([
        {
          id: expect.any(Number),
          fromUserId: org.memberId,
          fromUserName: 'Max Member',
          toUserId: org.qaId,
          toUserName: 'Quinn Tester',
          transferredAt: TEST_NOW,
          receivedAt: TEST_NOW,
          notes: 'For review',
        },
      ]);
    });

    it('accepts a second receive without touching the ledger', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.memberId, project.id);
      expectOk(await fileTicketsService.transfer(org.memberId, project.id, ticket.id, { toUserId: org.qaId }));
      expectOk(await fileTicketsService.receive(org.qaId, project.id, ticket.id));

      const again = expectOk(await fileTicketsService.receive(org.qaId, project.id, ticket.id));
      expect(again.status).toBe(FileTicketStatus.RECEIVED);

      const detail = expectOk(await fileTicketsService.getById(org.qaId, project.id, ticket.id));
      expect(detail.transfers).toHaveLength(1);

      const entries = expectOk(await listFileTicketActivity(org.qaId, project.id, ticket.id));
      expect(entries.map((e) => e.action)).toEqual(['Received', 'Received', 'Transferred', 'Created']);
      expect(entries[2].description).toBe('File transferred from Max Member to Quinn Tester');
    });

    it('rejects a recipient from another company', async () => {
      const { org, project } = await setup();
      const other = seedOrg('Bluebell Ltd');
      const ticket = await createTicket(org.memberId, project.id);

      const result = await fileTicketsService.transfer(org.memberId, project.id, ticket.id, {
        toUserId: other.memberId,
      });
      expect(result).toEqual({
        ok: false,
        kind: 'bad_request',
        message: 'Target user not found or not in same company',
        details: { userId: other.memberId },
      });
    });

    it('hides a ticket from Members who neither created nor hold it', async () => {
      const { org, project } = await setup();
      const bystander = seedUser({ companyId: org.companyId, role: SystemRole.MEMBER, managerId: org.managerId });
      const ticket = await createTicket(org.memberId, project.id);

      const result = await fileTicketsService.getById(bystander, project.id, ticket.id);
      expect(result).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You can only access file tickets you created or currently hold',
      });
      expect(expectOk(await fileTicketsService.list(bystander, project.id, {}))).toEqual([]);
    });
  });

  describe('holders outside the project', () => {
    async function handToOutsider() {
      const { org, project } = await setup();
      const outsideManager = seedUser({ companyId: org.companyId, role: SystemRole.MANAGER });
      const outsider = seedUser({
        companyId: org.companyId,
        role: SystemRole.MEMBER,
        managerId: outsideManager,
        firstName: 'Olive',
        lastName: 'Outside',
      });
      const ticket = await createTicket(org.adminId, project.id);
      expectOk(await fileTicketsService.transfer(org.adminId, project.id, ticket.id, { toUserId: outsider }));
      return { org, project, outsider, ticket };
    }

    it('lets a same-company holder who cannot see the project receive the ticket', async () => {
      const { project, outsider, ticket } = await handToOutsider();

      const received = expectOk(await fileTicketsService.receive(outsider, project.id, ticket.id));
      expect(received.status).toBe(FileTicketStatus.RECEIVED);
      expect(received.currentHolderName).toBe('Olive Outside');

      const detail = expectOk(await fileTicketsService.getById(outsider, project.id, ticket.id));
      expect(detail.transfers?.map((t) => t.receivedAt)).toEqual([TEST_NOW]);
    });

    it('lists only the tickets the outsider holds', async () => {
      const { org, project, outsider, ticket } = await handToOutsider();
      await createTicket(org.adminId, project.id, { title: 'Survey plan' });

      const listed = expectOk(await fileTicketsService.list(outsider, project.id, {}));
      expect(listed.map((t) => t.id)).toEqual([ticket.id]);
    });

    it('keeps the project closed to the outsider otherwise', async () => {
      const { project, outsider } = await handToOutsider();

      const missing = await fileTicketsService.getById(outsider, project.id, 9999);
      expect(missing).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You do not have access to this project',
      });
      const create = await fileTicketsService.create(
        outsider,
        project.id,
        createFileTicketSchema.parse({ title: 'Side letter' })
      );
      expect(create).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You do not have access to this project',
      });
    });
  });

  describe('processing', () => {
    it('follows the processing path to COMPLETED', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.adminId, project.id);

      for (const status of [FileTicketStatus.PROCESSING, FileTicketStatus.APPROVED, FileTicketStatus.COMPLETED]) {
        const updated = expectOk(await fileTicketsService.update(org.adminId, project.id, ticket.id, { status }));
        expect(updated.status).toBe(status);
      }

      const frozen = await fileTicketsService.transfer(org.adminId, project.id, ticket.id, { toUserId: org.qaId });
      expect(frozen).toEqual({
        ok: false,
        kind: 'bad_request',
        message: 'Cannot change a file ticket that is COMPLETED',
        details: { currentStatus: 'COMPLETED', attemptedStatus: 'IN_TRANSIT' },
      });
    });

    it('does not skip review', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.adminId, project.id);
      expectOk(await fileTicketsService.update(org.adminId, project.id, ticket.id, { status: FileTicketStatus.PROCESSING }));

      const result = await fileTicketsService.update(org.adminId, project.id, ticket.id, {
        status: FileTicketStatus.COMPLETED,
      });
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.message).toBe('Cannot move file ticket from PROCESSING to COMPLETED');
      }
    });

    it('keeps custody states to transfer and receive', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.adminId, project.id);

      const result = await fileTicketsService.update(org.adminId, project.id, ticket.id, {
        status: FileTicketStatus.IN_TRANSIT,
      });
      expect(result).toEqual({
        ok: false,
        kind: 'bad_request',
        message: 'IN_TRANSIT is set by transfer and receive only',
        details: { currentStatus: 'CREATED', attemptedStatus: 'IN_TRANSIT' },
      });
    });

    it('can be marked lost from any open state', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.adminId, project.id);

      const lost = expectOk(
        await fileTicketsService.update(org.adminId, project.id, ticket.id, { status: FileTicketStatus.LOST })
      );
      expect(lost.status).toBe(FileTicketStatus.LOST);
    });
  });

  describe('list and delete', () => {
    it('lists newest first and filters by holder', async () => {
      const { org, project } = await setup();
      const first = await createTicket(org.adminId, project.id);
      const second = await createTicket(org.adminId, project.id, { currentHolderId: org.qaId });

      const all = expectOk(await fileTicketsService.list(org.adminId, project.id, {}));
      expect(all.map((t) => t.id)).toEqual([second.id, first.id]);

      const held = expectOk(await fileTicketsService.list(org.qaId, project.id, {}));
      expect(held.map((t) => t.id)).toEqual([second.id]);

      const byHolder = expectOk(
        await fileTicketsService.list(org.adminId, project.id, { currentHolderId: org.adminId })
      );
      expect(byHolder.map((t) => t.id)).toEqual([first.id]);
    });

    it('lets only the creator delete', async () => {
      const { org, project } = await setup();
      const ticket = await createTicket(org.memberId, project.id, { currentHolderId: org.qaId });

      const denied = await fileTicketsService.delete(org.qaId, project.id, ticket.id);
      expect(denied).toEqual({
        ok: false,
        kind: 'forbidden',
        message: 'You can only delete file tickets you created',
      });

      expect(await fileTicketsService.delete(org.memberId, project.id, ticket.id)).toEqual({
        ok: true,
        kind: 'success',
        data: null,
      });
      const gone = await fileTicketsService.getById(org.memberId, project.id, ticket.id);
      expect(gone).toEqual({ ok: false, kind: 'not_found', message: 'File ticket not found' });
    });
  });
});
