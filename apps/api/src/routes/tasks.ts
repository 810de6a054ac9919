import { Router } from 'express';
import { z } from 'zod';
import type { RequestScopeFactory } from '../database/request-scope.js';
import { scopedHandler, validateRequest } from '../middleware/index.js';
import {
  TASK_COLORS,
  TaskRepository,
  effectiveDurationMinutes,
  isOverdue,
  type Task,
  type TaskInput,
} from '../models/task.js';
import { NotFoundError } from '../utils/errors.js';

/**
 * Task body schema. `end_time` and `duration_minutes` are two ways of
 * saying how long a task lasts, so at most one may be given.
 */
export const taskBodySchema = z
  .object({
    title: z.string().min(1, 'Title is required').max(150, 'Title must be at most 150 characters'),
    description: z.string().min(1, 'Description is required'),
    color: z.enum(TASK_COLORS).default('green'),
    date_time: z.coerce.date(),
    end_time: z.coerce.date().nullable().optional(),
    duration_minutes: z
      .number()
      .int()
      .min(5, 'Duration must be at least 5 minutes')
      .max(1440, 'Duration must be at most 1440 minutes')
      .nullable()
      .optional(),
    completed: z.boolean().default(false),
  })
  .superRefine((body, ctx) => {
    if (body.end_time != null && body.duration_minutes != null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_time'],
        message: 'Provide either end_time or duration_minutes, not both',
      });
    }
    if (body.end_time != null && body.end_time.getTime() <= body.date_time.getTime()) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['end_time'],
        message: 'end_time must be after date_time',
      });
    }
  })
  .transform(
    (body): TaskInput => ({
      title: body.title,
      description: body.description,
      color: body.color,
      date_time: body.date_time,
      end_time: body.end_time ?? null,
      duration_minutes: body.duration_minutes ?? null,
      completed: body.completed,
    })
  );

const taskIdParamsSchema = z.object({
  id: z.string().uuid('Invalid task ID'),
});

const listQuerySchema = z.object({
  completed: z.enum(['true', 'false']).optional(),
});

const completedBodySchema = z.object({
  completed: z.boolean(),
});

type CompletedBody = z.output<typeof completedBodySchema>;

/**
 * API representation of a task, with derived fields
 */
export function presentTask(task: Task, now: Date = new Date()) {
  return {
    ...task,
    effective_duration_minutes: effectiveDurationMinutes(task),
    overdue: isOverdue(task, now),
  };
}

/**
 * Task routes. Every handler runs in its own RequestScope; which rows
 * exist is decided by the database for the caller's tenant, so a task
 * owned by someone else is indistinguishable from a missing one.
 */
export function createTasksRouter(scopes: RequestScopeFactory): Router {
  const router = Router();

  /**
   * GET /tasks
   * List tasks, newest first. `?completed=true|false` filters.
   */
  router.get(
    '/',
    validateRequest({ query: listQuerySchema }),
    scopedHandler(scopes, async (scope, req) => {
      const { completed } = req.query;
      const tasks = await TaskRepository.findAll(
        scope,
        completed === 'true' || completed === 'false' ? { completed: completed === 'true' } : {}
      );
      const now = new Date();
      return {
        status: 200,
        body: { success: true, data: tasks.map((task) => presentTask(task, now)) },
      };
    })
  );

  /**
   * GET /tasks/:id
   */
  router.get(
    '/:id',
    validateRequest({ params: taskIdParamsSchema }),
    scopedHandler(scopes, async (scope, req) => {
      const task = await TaskRepository.findById(scope, req.params.id);
      if (!task) {
        throw new NotFoundError('Task');
      }
      return { status: 200, body: { success: true, data: presentTask(task) } };
    })
  );

  /**
   * POST /tasks
   */
  router.post(
    '/',
    validateRequest({ body: taskBodySchema }),
    scopedHandler<TaskInput>(scopes, async (scope, req) => {
      const task = await TaskRepository.create(scope, req.body);
      return { status: 201, body: { success: true, data: presentTask(task) } };
    })
  );

  /**
   * PUT /tasks/:id
   * Full replacement of the task's fields.
   */
  router.put(
    '/:id',
    validateRequest({ params: taskIdParamsSchema, body: taskBodySchema }),
    scopedHandler<TaskInput>(scopes, async (scope, req) => {
      const task = await TaskRepository.update(scope, req.params.id, req.body);
      if (!task) {
        throw new NotFoundError('Task');
      }
      return { status: 200, body: { success: true, data: presentTask(task) } };
    })
  );

  /**
   * PATCH /tasks/:id/completed
   */
  router.patch(
    '/:id/completed',
    validateRequest({ params: taskIdParamsSchema, body: completedBodySchema }),
    scopedHandler<CompletedBody>(scopes, async (scope, req) => {
      const task = await TaskRepository.setCompleted(scope, req.params.id, req.body.completed);
      if (!task) {
        throw new NotFoundError('Task');
      }
      return { status: 200, body: { success: true, data: presentTask(task) } };
    })
  );

  /**
   * DELETE /tasks/:id
   */
  router.delete(
    '/:id',
    validateRequest({ params: taskIdParamsSchema }),
    scopedHandler(scopes, async (scope, req) => {
      const deleted = await TaskRepository.delete(scope, req.params.id);
      if (!deleted) {
        throw new NotFoundError('Task');
      }
      return { status: 204 };
    })
  );

  return router;
}
