import { z } from 'zod';
import { ProjectRole } from '../types/index.js';
import { queryBooleanSchema } from './common.schema.js';

const projectKeySchema = z
  .string()
  .trim()
  .min(2)
  .max(10)
  .regex(/^[A-Za-z][A-Za-z0-9]*$/, 'Key must start with a letter and contain only letters and digits')
  .transform((key) => key.toUpperCase());

export const createProjectSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    description: z.string().max(2000).optional(),
    key: projectKeySchema,
    startDate: z.coerce.date().optional(),
    endDate: z.coerce.date().optional(),
    managerId: z.number().int().positive(),
  })
  .refine((data) => !data.startDate || !data.endDate || data.startDate <= data.endDate, {
    message: 'startDate must be on or before endDate',
    path: ['endDate'],
  });

export type CreateProjectInput = z.infer<typeof createProjectSchema>;

export const updateProjectSchema = z.object({
  name: z.string().trim().min(1).max(200).optional(),
  description: z.string().max(2000).nullable().optional(),
  key: projectKeySchema.optional(),
  startDate: z.coerce.date().nullable().optional(),
  endDate: z.coerce.date().nullable().optional(),
  isActive: z.boolean().optional(),
});

export type UpdateProjectInput = z.infer<typeof updateProjectSchema>;

export const addMemberSchema = z.object({
  userId: z.number().int().positive(),
  role: z.nativeEnum(ProjectRole).default(ProjectRole.MEMBER),
});

export type AddMemberInput = z.infer<typeof addMemberSchema>;

export const updateMemberRoleSchema = z.object({
  role: z.nativeEnum(ProjectRole),
});

export type UpdateMemberRoleInput = z.infer<typeof updateMemberRoleSchema>;

export const availableUsersFiltersSchema = z.object({
  search: z.string().trim().min(1).optional(),
  unassignedOnly: queryBooleanSchema.optional(),
});

export type AvailableUsersFiltersInput = z.infer<typeof availableUsersFiltersSchema>;
