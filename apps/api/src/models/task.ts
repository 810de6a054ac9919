import type { RequestScope } from '../database/request-scope.js';
import { scopedQuery } from './scoped-query.js';

export const TASK_COLORS = ['green', 'purple', 'orange', 'cyan', 'pink', 'yellow'] as const;

export type TaskColor = (typeof TASK_COLORS)[number];

/**
 * Task row. `tenant_id` is assigned by the database from the session claim
 * and is never supplied by the application.
 */
export interface Task {
  id: string;
  tenant_id: string;
  title: string;
  description: string | null;
  color: TaskColor;
  date_time: Date;
  end_time: Date | null;
  duration_minutes: number | null;
  completed: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface TaskInput {
  title: string;
  description: string;
  color: TaskColor;
  date_time: Date;
  end_time: Date | null;
  duration_minutes: number | null;
  completed: boolean;
}

export interface TaskFilter {
  completed?: boolean;
}

const TASK_COLUMNS = `id, tenant_id, title, description, color, date_time, end_time,
  duration_minutes, completed, created_at, updated_at`;

/**
 * Task repository - row visibility is decided by the database.
 *
 * IMPORTANT: no statement here filters by tenant. Every call runs on the
 * scope's bound connection, where the tasks policies restrict reads and
 * writes to the session's tenant. The scope owns the transaction; nothing
 * here commits or rolls back.
 */
export class TaskRepository {
  /**
   * List visible tasks, newest first
   */
  static async findAll(scope: RequestScope, filter: TaskFilter = {}): Promise<Task[]> {
    return scopedQuery(scope, 'TaskRepository.findAll', async (connection) => {
      if (filter.completed === undefined) {
        const result = await connection.query<Task>(
          `SELECT ${TASK_COLUMNS} FROM tasks ORDER BY date_time DESC`
        );
        return result.rows;
      }
      const result = await connection.query<Task>(
        `SELECT ${TASK_COLUMNS} FROM tasks WHERE completed = $1 ORDER BY date_time DESC`,
        [filter.completed]
      );
      return result.rows;
    });
  }

  /**
   * Find a task by ID; null when it does not exist or is not visible
   */
  static async findById(scope: RequestScope, id: string): Promise<Task | null> {
    return scopedQuery(scope, 'TaskRepository.findById', async (connection) => {
      const result = await connection.query<Task>(
        `SELECT ${TASK_COLUMNS} FROM tasks WHERE id = $1`,
        [id]
      );
      return result.rows[0] ?? null;
    });
  }

  static async create(scope: RequestScope, input: TaskInput): Promise<Task> {
    return scopedQuery(scope, 'TaskRepository.create', async (connection) => {
      const result = await connection.query<Task>(
        `INSERT INTO tasks (title, description, color, date_time, end_time, duration_minutes, completed)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING ${TASK_COLUMNS}`,
        [
          input.title,
          input.description,
          input.color,
          input.date_time,
          input.end_time,
          input.duration_minutes,
          input.completed,
        ]
      );
      const task = result.rows[0];
      if (!task) {
        throw new Error('INSERT returned no row');
      }
      return task;
    });
  }

  /**
   * Replace a task's fields. Null when the task is not visible.
   */
  static async update(scope: RequestScope, id: string, input: TaskInput): Promise<Task | null> {
    return scopedQuery(scope, 'TaskRepository.update', async (connection) => {
      const result = await connection.query<Task>(
        `UPDATE tasks
         SET title = $1, description = $2, color = $3, date_time = $4,
             end_time = $5, duration_minutes = $6, completed = $7
         WHERE id = $8
         RETURNING ${TASK_COLUMNS}`,
        [
          input.title,
          input.description,
          input.color,
          input.date_time,
          input.end_time,
          input.duration_minutes,
          input.completed,
          id,
        ]
      );
      return result.rows[0] ?? null;
    });
  }

  static async setCompleted(scope: RequestScope, id: string, completed: boolean): Promise<Task | null> {
    return scopedQuery(scope, 'TaskRepository.setCompleted', async (connection) => {
      const result = await connection.query<Task>(
        `UPDATE tasks SET completed = $1 WHERE id = $2 RETURNING ${TASK_COLUMNS}`,
        [completed, id]
      );
      return result.rows[0] ?? null;
    });
  }

  /**
   * Delete a task; false when nothing visible matched
   */
  static async delete(scope: RequestScope, id: string): Promise<boolean> {
    return scopedQuery(scope, 'TaskRepository.delete', async (connection) => {
      const result = await connection.query<{ id: string }>(
        'DELETE FROM tasks WHERE id = $1 RETURNING id',
        [id]
      );
      return result.rows.length > 0;
    });
  }
}

/**
 * Duration in minutes: explicit duration first, otherwise end minus start.
 */
export function effectiveDurationMinutes(task: Pick<Task, 'date_time' | 'end_time' | 'duration_minutes'>): number | null {
  if (task.duration_minutes !== null) {
    return task.duration_minutes;
  }
  if (task.end_time !== null) {
    return Math.floor((task.end_time.getTime() - task.date_time.getTime()) / 60_000);
  }
  return null;
}

/**
 * A task is overdue when it is not completed and its deadline (end time,
 * or start time when there is none) lies before `now`.
 */
export function isOverdue(task: Pick<Task, 'date_time' | 'end_time' | 'completed'>, now: Date): boolean {
  if (task.completed) {
    return false;
  }
  const deadline = task.end_time ?? task.date_time;
  return deadline.getTime() < now.getTime();
}
