import type {
  SystemRole,
  ProjectRole,
  CoreStatusType,
  WorkItemType,
  Priority,
  SprintStatus,
  FileTicketStatus,
  FileTicketType,
} from '../types/index.js';

// Row shapes as stored. Flags are 0/1; timestamps are ISO strings.

interface SoftDeletable {
  is_deleted: number;
  deleted_at: string | null;
  deleted_by: number | null;
  created_at: string;
  updated_at: string;
}

export interface CompanyRow extends SoftDeletable {
  id: number;
  name: string;
  description: string | null;
  is_active: number;
}

export interface UserRow extends SoftDeletable {
  id: number;
  email: string;
  first_name: string;
  last_name: string;
  phone: string | null;
  system_role: SystemRole;
  company_id: number | null;
  manager_id: number | null;
}

export interface ProjectRow extends SoftDeletable {
  id: number;
  company_id: number;
  name: string;
  description: string | null;
  key: string;
  start_date: string | null;
  end_date: string | null;
  is_active: number;
}

export interface ProjectMemberRow extends SoftDeletable {
  id: number;
  project_id: number;
  user_id: number;
  role: ProjectRole;
  joined_at: string;
}

export interface WorkflowStatusRow extends SoftDeletable {
  id: number;
  project_id: number;
  name: string;
  description: string | null;
  sort_order: number;
  color: string;
  is_core: number;
  core_type: CoreStatusType | null;
}

export interface SprintRow extends SoftDeletable {
  id: number;
  project_id: number;
  name: string;
  goal: string | null;
  start_date: string;
  end_date: string;
  status: SprintStatus;
}

export interface WorkItemRow extends SoftDeletable {
  id: number;
  project_id: number;
  item_number: number;
  title: string;
  description: string | null;
  type: WorkItemType;
  priority: Priority;
  due_date: string | null;
  estimated_hours: number | null;
  actual_hours: number | null;
  status_id: number;
  assigned_to_id: number | null;
  sprint_id: number | null;
  is_in_backlog: number;
  queue_order: number | null;
  parent_id: number | null;
  created_by_id: number;
}

export interface CommentRow extends SoftDeletable {
  id: number;
  work_item_id: number;
  author_id: number;
  content: string;
}

export interface BoardRow extends SoftDeletable {
  id: number;
  project_id: number;
  name: string;
  owner_id: number | null;
  is_default: number;
}

export interface BoardColumnRow {
  id: number;
  board_id: number;
  status_id: number;
  sort_order: number;
  created_at: string;
}

export interface FileTicketRow extends SoftDeletable {
  id: number;
  project_id: number;
  ticket_number: string;
  title: string;
  description: string | null;
  type: FileTicketType;
  status: FileTicketStatus;
  due_date: string | null;
  created_by_id: number;
  current_holder_id: number | null;
}

export interface FileTicketTransferRow {
  id: number;
  file_ticket_id: number;
  from_user_id: number;
  to_user_id: number;
  transferred_at: string;
  received_at: string | null;
  notes: string | null;
}

export interface ActivityLogRow {
  id: number;
  user_id: number;
  action: string;
  entity_type: string;
  entity_id: number;
  old_value: string | null;
  new_value: string | null;
  description: string | null;
  project_id: number | null;
  work_item_id: number | null;
  file_ticket_id: number | null;
  timestamp: string;
}
