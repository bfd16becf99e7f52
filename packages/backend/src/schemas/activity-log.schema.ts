import { z } from 'zod';
import { idSchema, paginationSchema } from './common.schema.js';

const dateRangeSchema = z.object({
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
});

export const companyActivityFiltersSchema = paginationSchema.merge(dateRangeSchema).extend({
  userId: idSchema.optional(),
  projectId: idSchema.optional(),
});

export type CompanyActivityFiltersInput = z.infer<typeof companyActivityFiltersSchema>;

export const projectActivityFiltersSchema = paginationSchema.merge(dateRangeSchema).extend({
  userId: idSchema.optional(),
  entityType: z.string().min(1).optional(),
  entityId: idSchema.optional(),
});

export type ProjectActivityFiltersInput = z.infer<typeof projectActivityFiltersSchema>;
