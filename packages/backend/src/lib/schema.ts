/**
 * SQLite schema. Applied on every open; all statements are idempotent.
 *
 * Soft-deleted rows stay in place, so uniqueness that only applies to live
 * rows is expressed with partial indexes.
 */
export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS companies (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  name TEXT NOT NULL,
  description TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_companies_name ON companies(name) WHERE is_deleted = 0;

CREATE TABLE IF NOT EXISTS users (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  email TEXT NOT NULL,
  first_name TEXT NOT NULL,
  last_name TEXT NOT NULL,
  phone TEXT,
  system_role TEXT NOT NULL DEFAULT 'MEMBER'
    CHECK (system_role IN ('MEMBER', 'QA', 'MANAGER', 'ADMIN', 'SUPER_ADMIN')),
  company_id INTEGER REFERENCES companies(id),
  manager_id INTEGER REFERENCES users(id),
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_users_company_email ON users(company_id, email) WHERE is_deleted = 0;
CREATE INDEX IF NOT EXISTS ix_users_manager ON users(manager_id);

CREATE TABLE IF NOT EXISTS projects (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  company_id INTEGER NOT NULL REFERENCES companies(id),
  name TEXT NOT NULL,
  description TEXT,
  key TEXT NOT NULL,
  start_date TEXT,
  end_date TEXT,
  is_active INTEGER NOT NULL DEFAULT 1,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_projects_company_key ON projects(company_id, key) WHERE is_deleted = 0;

CREATE TABLE IF NOT EXISTS project_members (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id),
  user_id INTEGER NOT NULL REFERENCES users(id),
  role TEXT NOT NULL DEFAULT 'MEMBER'
    CHECK (role IN ('VIEWER', 'MEMBER', 'MANAGER', 'ADMIN')),
  joined_at TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (project_id, user_id)
);

CREATE TABLE IF NOT EXISTS workflow_statuses (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id),
  name TEXT NOT NULL,
  description TEXT,
  sort_order INTEGER NOT NULL,
  color TEXT NOT NULL DEFAULT '#6B7280',
  is_core INTEGER NOT NULL DEFAULT 0,
  core_type TEXT CHECK (core_type IN ('NEW', 'IN_PROGRESS', 'REVIEW', 'DONE', 'BLOCKED')),
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CHECK ((is_core = 1) = (core_type IS NOT NULL))
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_statuses_project_name ON workflow_statuses(project_id, name) WHERE is_deleted = 0;

CREATE TABLE IF NOT EXISTS sprints (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id),
  name TEXT NOT NULL,
  goal TEXT,
  start_date TEXT NOT NULL,
  end_date TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'PLANNING' CHECK (status IN ('PLANNING', 'ACTIVE', 'COMPLETED')),
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS work_items (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id),
  item_number INTEGER NOT NULL,
  title TEXT NOT NULL,
  description TEXT,
  type TEXT NOT NULL CHECK (type IN ('EPIC', 'FEATURE', 'STORY', 'TASK', 'BUG', 'SUBTASK')),
  priority TEXT NOT NULL DEFAULT 'MEDIUM' CHECK (priority IN ('LOW', 'MEDIUM', 'HIGH', 'CRITICAL')),
  due_date TEXT,
  estimated_hours REAL,
  actual_hours REAL,
  status_id INTEGER NOT NULL REFERENCES workflow_statuses(id),
  assigned_to_id INTEGER REFERENCES users(id),
  sprint_id INTEGER REFERENCES sprints(id),
  is_in_backlog INTEGER NOT NULL DEFAULT 1,
  queue_order INTEGER,
  parent_id INTEGER REFERENCES work_items(id),
  created_by_id INTEGER NOT NULL REFERENCES users(id),
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  UNIQUE (project_id, item_number),
  CHECK ((sprint_id IS NULL AND is_in_backlog = 1) OR (sprint_id IS NOT NULL AND is_in_backlog = 0))
);
CREATE INDEX IF NOT EXISTS ix_work_items_sprint ON work_items(sprint_id);
CREATE INDEX IF NOT EXISTS ix_work_items_parent ON work_items(parent_id);

CREATE TABLE IF NOT EXISTS comments (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  work_item_id INTEGER NOT NULL REFERENCES work_items(id),
  author_id INTEGER NOT NULL REFERENCES users(id),
  content TEXT NOT NULL,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_comments_work_item ON comments(work_item_id);

CREATE TABLE IF NOT EXISTS boards (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id),
  name TEXT NOT NULL,
  owner_id INTEGER REFERENCES users(id),
  is_default INTEGER NOT NULL DEFAULT 0,
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL,
  CHECK ((is_default = 1 AND owner_id IS NULL) OR (is_default = 0 AND owner_id IS NOT NULL))
);
CREATE UNIQUE INDEX IF NOT EXISTS ux_boards_default ON boards(project_id) WHERE is_default = 1 AND is_deleted = 0;

CREATE TABLE IF NOT EXISTS board_columns (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  board_id INTEGER NOT NULL REFERENCES boards(id) ON DELETE CASCADE,
  status_id INTEGER NOT NULL REFERENCES workflow_statuses(id),
  sort_order INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  UNIQUE (board_id, status_id)
);

CREATE TABLE IF NOT EXISTS file_tickets (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  project_id INTEGER NOT NULL REFERENCES projects(id),
  ticket_number TEXT NOT NULL UNIQUE,
  title TEXT NOT NULL,
  description TEXT,
  type TEXT NOT NULL DEFAULT 'PHYSICAL' CHECK (type IN ('PHYSICAL', 'DIGITAL')),
  status TEXT NOT NULL DEFAULT 'CREATED'
    CHECK (status IN ('CREATED', 'IN_TRANSIT', 'RECEIVED', 'PROCESSING', 'APPROVED', 'REJECTED', 'COMPLETED', 'LOST')),
  due_date TEXT,
  created_by_id INTEGER NOT NULL REFERENCES users(id),
  current_holder_id INTEGER REFERENCES users(id),
  is_deleted INTEGER NOT NULL DEFAULT 0,
  deleted_at TEXT,
  deleted_by INTEGER,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS file_ticket_transfers (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  file_ticket_id INTEGER NOT NULL REFERENCES file_tickets(id),
  from_user_id INTEGER NOT NULL REFERENCES users(id),
  to_user_id INTEGER NOT NULL REFERENCES users(id),
  transferred_at TEXT NOT NULL,
  received_at TEXT,
  notes TEXT
);
CREATE INDEX IF NOT EXISTS ix_transfers_ticket ON file_ticket_transfers(file_ticket_id);

CREATE TABLE IF NOT EXISTS activity_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  user_id INTEGER NOT NULL REFERENCES users(id),
  action TEXT NOT NULL,
  entity_type TEXT NOT NULL,
  entity_id INTEGER NOT NULL,
  old_value TEXT,
  new_value TEXT,
  description TEXT,
  project_id INTEGER REFERENCES projects(id),
  work_item_id INTEGER REFERENCES work_items(id),
  file_ticket_id INTEGER REFERENCES file_tickets(id),
  timestamp TEXT NOT NULL
);
CREATE INDEX IF NOT EXISTS ix_activity_project ON activity_logs(project_id, timestamp);
`;
