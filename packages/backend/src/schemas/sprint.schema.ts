import { z } from 'zod';
import { SprintStatus } from '../types/index.js';

export const createSprintSchema = z
  .object({
    name: z.string().trim().min(1).max(100),
    goal: z.string().max(1000).optional(),
    startDate: z.coerce.date(),
    endDate: z.coerce.date(),
  })
  .refine((data) => data.startDate <= data.endDate, {
    message: 'startDate must be on or before endDate',
    path: ['endDate'],
  });

export type CreateSprintInput = z.infer<typeof createSprintSchema>;

export const updateSprintSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  goal: z.string().max(1000).nullable().optional(),
  startDate: z.coerce.date().optional(),
  endDate: z.coerce.date().optional(),
  status: z.nativeEnum(SprintStatus).optional(),
});

export type UpdateSprintInput = z.infer<typeof updateSprintSchema>;
