/**
 * Task, user and statistics type definitions.
 */

/** A task as persisted: six flat fields, one record per line. */
export interface Task {
  username: string;
  title: string;
  description: string;
  /** Assignment date (YYYY-MM-DD). */
  assignedDate: string;
  /** Due date (YYYY-MM-DD). Not validated on load. */
  dueDate: string;
  /** `Yes` or `No`. Loaded as is; any other value counts as neither. */
  completed: string;
}

/**
 * A task as loaded from storage, carrying the identifier assigned at load time.
 * The id is the 1-based record position and is not written back.
 */
export interface StoredTask extends Task {
  id: number;
}

/** Registered users, keyed by username, in file order. */
export type UserTable = Map<string, string>;

/** Aggregate metrics over all tasks. */
export interface TaskStats {
  total: number;
  completed: number;
  uncompleted: number;
  overdueUncompleted: number;
  incompletePercent: number;
  overduePercent: number;
}

/** Per-user metrics. */
export interface UserTaskStats {
  tasks: number;
  completed: number;
  overdue: number;
  percentTotal: number;
  percentCompleted: number;
  percentIncomplete: number;
  percentOverdue: number;
}

/** Per-user metrics plus global counts. */
export interface UserStats {
  totalUsers: number;
  totalTasks: number;
  /** One entry per registered user, in user order. */
  users: Map<string, UserTaskStats>;
}
