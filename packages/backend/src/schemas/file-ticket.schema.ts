import { z } from 'zod';
import { FileTicketStatus, FileTicketType } from '../types/index.js';
import { idSchema } from './common.schema.js';

export const createFileTicketSchema = z.object({
  title: z.string().trim().min(1).max(300),
  description: z.string().max(5000).optional(),
  type: z.nativeEnum(FileTicketType).default(FileTicketType.PHYSICAL),
  dueDate: z.coerce.date().optional(),
  currentHolderId: z.number().int().positive().optional(),
});

export type CreateFileTicketInput = z.infer<typeof createFileTicketSchema>;

export const updateFileTicketSchema = z.object({
  title: z.string().trim().min(1).max(300).optional(),
  description: z.string().max(5000).nullable().optional(),
  dueDate: z.coerce.date().nullable().optional(),
  status: z.nativeEnum(FileTicketStatus).optional(),
});

export type UpdateFileTicketInput = z.infer<typeof updateFileTicketSchema>;

export const transferFileTicketSchema = z.object({
  toUserId: z.number().int().positive(),
  notes: z.string().max(1000).optional(),
});

export type TransferFileTicketInput = z.infer<typeof transferFileTicketSchema>;

export const fileTicketFiltersSchema = z.object({
  status: z.nativeEnum(FileTicketStatus).optional(),
  type: z.nativeEnum(FileTicketType).optional(),
  currentHolderId: idSchema.optional(),
});

export type FileTicketFiltersInput = z.infer<typeof fileTicketFiltersSchema>;
