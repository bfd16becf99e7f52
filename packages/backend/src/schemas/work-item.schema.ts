import { z } from 'zod';
import { WorkItemType, Priority } from '../types/index.js';
import { idSchema, queryBooleanSchema } from './common.schema.js';

const hoursSchema = z.number().nonnegative().max(10000);

export const createWorkItemSchema = z.object({
  title: z.string().trim().min(1).max(300),
  description: z.string().max(10000).optional(),
  type: z.nativeEnum(WorkItemType).default(WorkItemType.TASK),
  priority: z.nativeEnum(Priority).default(Priority.MEDIUM),
  dueDate: z.coerce.date().optional(),
  estimatedHours: hoursSchema.optional(),
  statusId: z.number().int().positive().optional(),
  assignedToId: z.number().int().positive().optional(),
  sprintId: z.number().int().positive().optional(),
  parentId: z.number().int().positive().optional(),
});

export type CreateWorkItemInput = z.infer<typeof createWorkItemSchema>;

export const updateWorkItemSchema = z.object({
  title: z.string().trim().min(1).max(300).optional(),
  description: z.string().max(10000).nullable().optional(),
  type: z.nativeEnum(WorkItemType).optional(),
  priority: z.nativeEnum(Priority).optional(),
  dueDate: z.coerce.date().nullable().optional(),
  estimatedHours: hoursSchema.nullable().optional(),
  actualHours: hoursSchema.nullable().optional(),
  statusId: z.number().int().positive().optional(),
  assignedToId: z.number().int().positive().nullable().optional(),
  /** null moves the item to the backlog */
  sprintId: z.number().int().positive().nullable().optional(),
  isInBacklog: z.boolean().optional(),
  queueOrder: z.number().int().nullable().optional(),
  /** 0 detaches the item from its parent */
  parentId: z.number().int().nonnegative().optional(),
});

export type UpdateWorkItemInput = z.infer<typeof updateWorkItemSchema>;

export const workItemFiltersSchema = z.object({
  sprintId: idSchema.optional(),
  backlog: queryBooleanSchema.optional(),
  assignedToId: idSchema.optional(),
  statusId: idSchema.optional(),
  parentId: idSchema.optional(),
  type: z.nativeEnum(WorkItemType).optional(),
  search: z.string().trim().min(1).optional(),
});

export type WorkItemFiltersInput = z.infer<typeof workItemFiltersSchema>;

export const moveToSprintSchema = z.object({
  workItemIds: z.array(z.number().int().positive()).min(1).max(200),
  sprintId: z.number().int().positive().nullable(),
});

export type MoveToSprintInput = z.infer<typeof moveToSprintSchema>;
