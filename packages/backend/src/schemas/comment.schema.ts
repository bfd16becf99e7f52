import { z } from 'zod';
import { idSchema } from './common.schema.js';

export const createCommentSchema = z.object({
  content: z.string().trim().min(1).max(5000),
});

export type CreateCommentInput = z.infer<typeof createCommentSchema>;

export const commentParamsSchema = z.object({
  projectId: idSchema,
  id: idSchema,
  commentId: idSchema,
});
