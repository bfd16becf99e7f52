import { z } from 'zod';

export const idSchema = z.coerce.number().int().positive();

export const idParamsSchema = z.object({
  id: idSchema,
});

export const projectParamsSchema = z.object({
  projectId: idSchema,
});

export const projectEntityParamsSchema = z.object({
  projectId: idSchema,
  id: idSchema,
});

export const paginationSchema = z.object({
  page: z.coerce.number().int().positive().optional().default(1),
  limit: z.coerce.number().int().positive().max(100).optional().default(50),
});

export type PaginationInput = z.infer<typeof paginationSchema>;

export const hexColorSchema = z
  .string()
  .regex(/^#[0-9A-Fa-f]{6}$/, 'Color must be a hex value such as #3B82F6');

/** Query-string booleans arrive as text. */
export const queryBooleanSchema = z
  .enum(['true', 'false'])
  .transform((v) => v === 'true');
