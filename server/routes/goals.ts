import type { Express, Request } from "express";
import { z } from "zod";
import { authOf, requireAuth } from "../auth.js";
import { badRequest, notFound, validationError, wrap } from "../errors.js";
import {
  createGoal,
  createMilestone,
  createTask,
  deleteGoal,
  deleteMilestone,
  deleteTask,
  getGoal,
  getGoalWithMilestones,
  getMilestone,
  getTask,
  listGoals,
  updateGoal,
  updateMilestone,
  updateTask,
} from "../goals.js";
import { goalDetailJson, goalJson, goalListItemJson, milestoneJson, taskJson } from "../serializers.js";
import { GOAL_CATEGORIES, GOAL_STATUSES, TASK_PRIORITIES, TASK_STATUSES } from "../types.js";

const DateKey = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD");

const CreateGoalSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().max(2000).nullable().optional(),
  category: z.enum(GOAL_CATEGORIES).optional(),
  target_date: DateKey.nullable().optional(),
});

const UpdateGoalSchema = CreateGoalSchema.partial().extend({
  status: z.enum(GOAL_STATUSES).optional(),
});

const CreateMilestoneSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().max(2000).nullable().optional(),
  target_date: DateKey.nullable().optional(),
});

const UpdateMilestoneSchema = CreateMilestoneSchema.partial().extend({
  is_completed: z.boolean().optional(),
});

const CreateTaskSchema = z.object({
  title: z.string().trim().min(1).max(200),
  description: z.string().max(2000).nullable().optional(),
  due_date: DateKey.nullable().optional(),
  priority: z.enum(TASK_PRIORITIES).optional(),
});

const UpdateTaskSchema = CreateTaskSchema.partial().extend({
  status: z.enum(TASK_STATUSES).optional(),
});

const MilestoneQuery = z.object({ milestone_id: z.string().min(1) });

async function ownedGoal(req: Request) {
  const goal = await getGoal(String(req.params.id), authOf(req).userId);
  if (!goal) throw notFound("Goal not found");
  return goal;
}

async function ownedTask(req: Request) {
  const goal = await ownedGoal(req);
  const task = await getTask(goal.id, String(req.params.taskId));
  if (!task) throw notFound("Task not found");
  return task;
}

async function ownedMilestone(req: Request) {
  const goal = await ownedGoal(req);
  const milestone = await getMilestone(goal.id, String(req.params.mid));
  if (!milestone) throw notFound("Milestone not found");
  return milestone;
}

export function registerGoalRoutes(app: Express) {
  // -----------------------------
  // Goals
  // -----------------------------
  app.get(
    "/api/goals",
    requireAuth,
    wrap(async (req, res) => {
      const goals = await listGoals(authOf(req).userId);
      return res.json({ goals: goals.map(goalListItemJson) });
    }),
  );

  app.post(
    "/api/goals",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = CreateGoalSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const goal = await createGoal(authOf(req).userId, {
        title: parsed.data.title,
        description: parsed.data.description,
        category: parsed.data.category,
        targetDate: parsed.data.target_date,
      });
      return res.status(201).json(goalJson(goal));
    }),
  );

  app.get(
    "/api/goals/:id",
    requireAuth,
    wrap(async (req, res) => {
      const goal = await getGoalWithMilestones(String(req.params.id), authOf(req).userId);
      if (!goal) throw notFound("Goal not found");
      return res.json(goalDetailJson(goal));
    }),
  );

  app.put(
    "/api/goals/:id",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = UpdateGoalSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const goal = await ownedGoal(req);
      const updated = await updateGoal(goal, {
        title: parsed.data.title,
        description: parsed.data.description,
        category: parsed.data.category,
        targetDate: parsed.data.target_date,
        status: parsed.data.status,
      });
      return res.json(goalJson(updated));
    }),
  );

  app.delete(
    "/api/goals/:id",
    requireAuth,
    wrap(async (req, res) => {
      const goal = await ownedGoal(req);
      await deleteGoal(goal.id);
      return res.status(204).end();
    }),
  );

  // -----------------------------
  // Tasks
  // -----------------------------
  app.post(
    "/api/goals/:id/tasks",
    requireAuth,
    wrap(async (req, res) => {
      const query = MilestoneQuery.safeParse(req.query);
      if (!query.success) throw badRequest("milestone_id is required");
      const parsed = CreateTaskSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const goal = await ownedGoal(req);
      const milestone = await getMilestone(goal.id, query.data.milestone_id);
      if (!milestone) throw notFound("Milestone not found");

      const task = await createTask(goal.id, milestone.id, {
        title: parsed.data.title,
        description: parsed.data.description,
        dueDate: parsed.data.due_date,
        priority: parsed.data.priority,
      });
      return res.status(201).json(taskJson(task));
    }),
  );

  app.put(
    "/api/goals/:id/tasks/:taskId",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = UpdateTaskSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const task = await ownedTask(req);
      const updated = await updateTask(task, {
        title: parsed.data.title,
        description: parsed.data.description,
        dueDate: parsed.data.due_date,
        priority: parsed.data.priority,
        status: parsed.data.status,
      });
      return res.json(taskJson(updated));
    }),
  );

  app.post(
    "/api/goals/:id/tasks/:taskId/complete",
    requireAuth,
    wrap(async (req, res) => {
      const task = await ownedTask(req);
      return res.json(taskJson(await updateTask(task, { status: "completed" })));
    }),
  );

  app.post(
    "/api/goals/:id/tasks/:taskId/uncomplete",
    requireAuth,
    wrap(async (req, res) => {
      const task = await ownedTask(req);
      return res.json(taskJson(await updateTask(task, { status: "pending" })));
    }),
  );

  app.delete(
    "/api/goals/:id/tasks/:taskId",
    requireAuth,
    wrap(async (req, res) => {
      const task = await ownedTask(req);
      await deleteTask(task);
      return res.status(204).end();
    }),
  );

  // -----------------------------
  // Milestones
  // -----------------------------
  app.post(
    "/api/goals/:id/milestones",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = CreateMilestoneSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const goal = await ownedGoal(req);
      const milestone = await createMilestone(goal.id, {
        title: parsed.data.title,
        description: parsed.data.description,
        targetDate: parsed.data.target_date,
      });
      return res.status(201).json(milestoneJson(milestone));
    }),
  );

  app.put(
    "/api/goals/:id/milestones/:mid",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = UpdateMilestoneSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const milestone = await ownedMilestone(req);
      const updated = await updateMilestone(milestone, {
        title: parsed.data.title,
        description: parsed.data.description,
        targetDate: parsed.data.target_date,
        isCompleted: parsed.data.is_completed,
      });
      return res.json(milestoneJson(updated));
    }),
  );

  app.delete(
    "/api/goals/:id/milestones/:mid",
    requireAuth,
    wrap(async (req, res) => {
      const milestone = await ownedMilestone(req);
      await deleteMilestone(milestone);
      return res.status(204).end();
    }),
  );
}
