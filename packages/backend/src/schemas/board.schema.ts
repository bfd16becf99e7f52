import { z } from 'zod';
import { idSchema } from './common.schema.js';

export const createBoardSchema = z.object({
  name: z.string().trim().min(1).max(100),
});

export type CreateBoardInput = z.infer<typeof createBoardSchema>;

export const addColumnSchema = z.object({
  statusId: z.number().int().positive(),
});

export type AddColumnInput = z.infer<typeof addColumnSchema>;

export const boardColumnParamsSchema = z.object({
  projectId: idSchema,
  id: idSchema,
  columnId: idSchema,
});
