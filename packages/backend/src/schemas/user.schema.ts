import { z } from 'zod';
import { SystemRole } from '../types/index.js';

export const createUserSchema = z.object({
  email: z.string().trim().toLowerCase().email(),
  firstName: z.string().trim().min(1).max(100),
  lastName: z.string().trim().min(1).max(100),
  phone: z.string().max(30).optional(),
  systemRole: z.nativeEnum(SystemRole).default(SystemRole.MEMBER),
  managerId: z.number().int().positive().optional(),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const updateUserSchema = z.object({
  firstName: z.string().trim().min(1).max(100).optional(),
  lastName: z.string().trim().min(1).max(100).optional(),
  phone: z.string().max(30).nullable().optional(),
  systemRole: z.nativeEnum(SystemRole).optional(),
  managerId: z.number().int().positive().nullable().optional(),
});

export type UpdateUserInput = z.infer<typeof updateUserSchema>;

export const userFiltersSchema = z.object({
  search: z.string().trim().min(1).optional(),
});

export type UserFiltersInput = z.infer<typeof userFiltersSchema>;

export const transferSuperAdminSchema = z.object({
  targetUserId: z.number().int().positive(),
});

export type TransferSuperAdminInput = z.infer<typeof transferSuperAdminSchema>;
