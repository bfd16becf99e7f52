// Domain enums. Stored as their string values; rank order lives in lib/permissions.ts.

export const SystemRole = {
  MEMBER: 'MEMBER',
  QA: 'QA',
  MANAGER: 'MANAGER',
  ADMIN: 'ADMIN',
  SUPER_ADMIN: 'SUPER_ADMIN',
} as const;
export type SystemRole = (typeof SystemRole)[keyof typeof SystemRole];

export const ProjectRole = {
  VIEWER: 'VIEWER',
  MEMBER: 'MEMBER',
  MANAGER: 'MANAGER',
  ADMIN: 'ADMIN',
} as const;
export type ProjectRole = (typeof ProjectRole)[keyof typeof ProjectRole];

export const CoreStatusType = {
  NEW: 'NEW',
  IN_PROGRESS: 'IN_PROGRESS',
  REVIEW: 'REVIEW',
  DONE: 'DONE',
  BLOCKED: 'BLOCKED',
} as const;
export type CoreStatusType = (typeof CoreStatusType)[keyof typeof CoreStatusType];

export const WorkItemType = {
  EPIC: 'EPIC',
  FEATURE: 'FEATURE',
  STORY: 'STORY',
  TASK: 'TASK',
  BUG: 'BUG',
  SUBTASK: 'SUBTASK',
} as const;
export type WorkItemType = (typeof WorkItemType)[keyof typeof WorkItemType];

export const Priority = {
  LOW: 'LOW',
  MEDIUM: 'MEDIUM',
  HIGH: 'HIGH',
  CRITICAL: 'CRITICAL',
} as const;
export type Priority = (typeof Priority)[keyof typeof Priority];

export const SprintStatus = {
  PLANNING: 'PLANNING',
  ACTIVE: 'ACTIVE',
  COMPLETED: 'COMPLETED',
} as const;
export type SprintStatus = (typeof SprintStatus)[keyof typeof SprintStatus];

export const FileTicketStatus = {
  CREATED: 'CREATED',
  IN_TRANSIT: 'IN_TRANSIT',
  RECEIVED: 'RECEIVED',
  PROCESSING: 'PROCESSING',
  APPROVED: 'APPROVED',
  REJECTED: 'REJECTED',
  COMPLETED: 'COMPLETED',
  LOST: 'LOST',
} as const;
export type FileTicketStatus = (typeof FileTicketStatus)[keyof typeof FileTicketStatus];

export const FileTicketType = {
  PHYSICAL: 'PHYSICAL',
  DIGITAL: 'DIGITAL',
} as const;
export type FileTicketType = (typeof FileTicketType)[keyof typeof FileTicketType];

export const ActivityAction = {
  CREATED: 'Created',
  UPDATED: 'Updated',
  DELETED: 'Deleted',
  STATUS_CHANGED: 'StatusChanged',
  TRANSFERRED: 'Transferred',
  RECEIVED: 'Received',
  STARTED: 'Started',
  COMPLETED: 'Completed',
  MEMBER_ADDED: 'MemberAdded',
  MEMBER_REMOVED: 'MemberRemoved',
  MEMBER_ROLE_CHANGED: 'MemberRoleChanged',
  REORDERED: 'Reordered',
  COMMENTED: 'Commented',
  SUPER_ADMIN_TRANSFERRED: 'SuperAdminTransferred',
} as const;
export type ActivityAction = (typeof ActivityAction)[keyof typeof ActivityAction];

export const EntityType = {
  COMPANY: 'Company',
  USER: 'User',
  PROJECT: 'Project',
  PROJECT_MEMBER: 'ProjectMember',
  WORKFLOW_STATUS: 'WorkflowStatus',
  WORK_ITEM: 'WorkItem',
  COMMENT: 'Comment',
  SPRINT: 'Sprint',
  BOARD: 'Board',
  FILE_TICKET: 'FileTicket',
} as const;
export type EntityType = (typeof EntityType)[keyof typeof EntityType];

// Pagination
export interface PaginationParams {
  page?: number;
  limit?: number;
}

export interface PaginatedResponse<T> {
  data: T[];
  pagination: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
}

// DTOs returned by services

export interface CompanyDto {
  id: number;
  name: string;
  description: string | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface UserDto {
  id: number;
  email: string;
  firstName: string;
  lastName: string;
  fullName: string;
  phone: string | null;
  systemRole: SystemRole;
  companyId: number | null;
  managerId: number | null;
  managerName: string | null;
  createdAt: string;
}

export interface UserProjectAssignmentDto {
  projectId: number;
  projectName: string;
  projectKey: string;
  role: ProjectRole;
}

export interface ProjectManagerDto {
  userId: number;
  fullName: string;
  email: string;
}

export interface ProjectDto {
  id: number;
  companyId: number;
  name: string;
  description: string | null;
  key: string;
  startDate: string | null;
  endDate: string | null;
  isActive: boolean;
  createdAt: string;
  managers: ProjectManagerDto[];
}

export interface ProjectMemberDto {
  id: number;
  projectId: number;
  userId: number;
  fullName: string;
  email: string;
  systemRole: SystemRole;
  role: ProjectRole;
  joinedAt: string;
}

export interface WorkflowStatusDto {
  id: number;
  projectId: number;
  name: string;
  description: string | null;
  order: number;
  color: string;
  isCore: boolean;
  coreType: CoreStatusType | null;
}

export interface WorkItemDto {
  id: number;
  projectId: number;
  itemNumber: number;
  itemKey: string;
  title: string;
  description: string | null;
  type: WorkItemType;
  priority: Priority;
  dueDate: string | null;
  estimatedHours: number | null;
  actualHours: number | null;
  statusId: number;
  statusName: string;
  statusColor: string;
  assignedToId: number | null;
  assignedToName: string | null;
  sprintId: number | null;
  isInBacklog: boolean;
  queueOrder: number | null;
  parentId: number | null;
  parentKey: string | null;
  childCount: number;
  createdById: number;
  createdAt: string;
  updatedAt: string;
}

export interface SprintDto {
  id: number;
  projectId: number;
  name: string;
  goal: string | null;
  startDate: string;
  endDate: string;
  status: SprintStatus;
  workItemCount: number;
  createdAt: string;
}

export interface CommentDto {
  id: number;
  workItemId: number;
  content: string;
  authorId: number;
  authorName: string;
  createdAt: string;
}

export interface BoardColumnDto {
  id: number;
  statusId: number;
  statusName: string;
  color: string;
  order: number;
}

export interface BoardDto {
  id: number;
  projectId: number;
  name: string;
  isDefault: boolean;
  ownerId: number | null;
  columns: BoardColumnDto[];
}

export interface FileTicketTransferDto {
  id: number;
  fromUserId: number;
  fromUserName: string;
  toUserId: number;
  toUserName: string;
  transferredAt: string;
  receivedAt: string | null;
  notes: string | null;
}

export interface FileTicketDto {
  id: number;
  projectId: number;
  ticketNumber: string;
  title: string;
  description: string | null;
  type: FileTicketType;
  status: FileTicketStatus;
  dueDate: string | null;
  createdById: number;
  currentHolderId: number | null;
  currentHolderName: string | null;
  createdAt: string;
  updatedAt: string;
  transfers?: FileTicketTransferDto[];
}

export interface ActivityLogDto {
  id: number;
  action: string;
  entityType: string;
  entityId: number;
  oldValue: string | null;
  newValue: string | null;
  description: string | null;
  timestamp: string;
  userId: number;
  userName: string;
  projectId: number | null;
  projectName: string | null;
}

export interface StatusCountDto {
  statusId: number;
  name: string;
  color: string;
  count: number;
}

export interface TypeCountDto {
  type: WorkItemType;
  count: number;
}

export interface PriorityCountDto {
  priority: Priority;
  count: number;
}

export interface SprintCountDto {
  sprintId: number;
  name: string;
  status: SprintStatus;
  count: number;
}

export interface MemberWorkloadDto {
  userId: number;
  fullName: string;
  assigned: number;
  completed: number;
}

export interface DashboardDto {
  projectId: number;
  totalWorkItems: number;
  completedWorkItems: number;
  inProgressWorkItems: number;
  blockedWorkItems: number;
  backlogWorkItems: number;
  totalSprints: number;
  activeSprints: number;
  totalFileTickets: number;
  openFileTickets: number;
  byStatus: StatusCountDto[];
  byType: TypeCountDto[];
  byPriority: PriorityCountDto[];
  bySprint: SprintCountDto[];
  workload: MemberWorkloadDto[];
}
