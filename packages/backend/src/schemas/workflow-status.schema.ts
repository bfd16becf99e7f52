import { z } from 'zod';
import { hexColorSchema } from './common.schema.js';

export const createWorkflowStatusSchema = z.object({
  name: z.string().trim().min(1).max(50),
  description: z.string().max(500).optional(),
  color: hexColorSchema.optional(),
  order: z.number().int().positive().optional(),
});

export type CreateWorkflowStatusInput = z.infer<typeof createWorkflowStatusSchema>;

export const updateWorkflowStatusSchema = z.object({
  name: z.string().trim().min(1).max(50).optional(),
  description: z.string().max(500).nullable().optional(),
  color: hexColorSchema.optional(),
  order: z.number().int().positive().optional(),
});

export type UpdateWorkflowStatusInput = z.infer<typeof updateWorkflowStatusSchema>;

export const reorderStatusesSchema = z.object({
  statusIds: z
    .array(z.number().int().positive())
    .min(1)
    .refine((ids) => new Set(ids).size === ids.length, 'statusIds must not contain duplicates'),
});

export type ReorderStatusesInput = z.infer<typeof reorderStatusesSchema>;
