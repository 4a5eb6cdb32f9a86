// Goal service: goal / milestone / task CRUD plus the progress rules that tie them together.
import { nanoid } from "nanoid";
import { badRequest } from "./errors.js";
import { q, withTransaction, nowIso, dayKeyFromIso, toInt, toNumOrNull, readJsonbArray, type Query } from "./db.js";
import { finalizeChatSession } from "./storage.js";
import {
  calculateStreak,
  computeGoalProgress,
  longestStreak,
  milestoneTransition,
  nextTaskStreak,
  percent,
  pickUpcoming,
} from "./progress.js";
import {
  BURNOUT_RISKS,
  GOAL_CATEGORIES,
  GOAL_STATUSES,
  GOAL_TYPES,
  TASK_FREQUENCIES,
  TASK_PRIORITIES,
  TASK_STATUSES,
  pickEnum,
  type BurnoutRisk,
  type ExtractedGoal,
  type Goal,
  type GoalCategory,
  type GoalListItem,
  type GoalStatus,
  type GoalType,
  type GoalWithMilestones,
  type Milestone,
  type Task,
  type TaskFrequency,
  type TaskPriority,
  type TaskStatus,
} from "./types.js";

type Row = Record<string, unknown>;

function str(v: unknown) {
  return v === null || v === undefined ? "" : String(v);
}

function strOrNull(v: unknown) {
  return v === null || v === undefined ? null : String(v);
}

function mapGoal(r: Row): Goal {
  return {
    id: str(r.id),
    userId: str(r.user_id),
    chatSessionId: strOrNull(r.chat_session_id),
    title: str(r.title),
    description: strOrNull(r.description),
    category: pickEnum(GOAL_CATEGORIES, r.category, "other"),
    targetDate: strOrNull(r.target_date),
    status: pickEnum(GOAL_STATUSES, r.status, "active"),
    progress: toInt(r.progress, 0),
    goalType: pickEnum(GOAL_TYPES, r.goal_type, "long_term"),
    motivationScore: toNumOrNull(r.motivation_score),
    feasibilityScore: toNumOrNull(r.feasibility_score),
    clarityScore: toNumOrNull(r.clarity_score),
    smartSpecific: strOrNull(r.smart_specific),
    smartMeasurable: strOrNull(r.smart_measurable),
    smartAchievable: strOrNull(r.smart_achievable),
    smartRelevant: strOrNull(r.smart_relevant),
    smartTimeBound: strOrNull(r.smart_time_bound),
    sustainabilityScore: toNumOrNull(r.sustainability_score),
    burnoutRisk: r.burnout_risk ? pickEnum(BURNOUT_RISKS, r.burnout_risk, "LOW") : null,
    identifiedObstacles: readJsonbArray(r.identified_obstacles),
    successCriteria: readJsonbArray(r.success_criteria),
    createdAt: str(r.created_at),
    updatedAt: str(r.updated_at),
  };
}

function mapMilestone(r: Row): Milestone {
  return {
    id: str(r.id),
    goalId: str(r.goal_id),
    title: str(r.title),
    description: strOrNull(r.description),
    targetDate: strOrNull(r.target_date),
    sortOrder: toInt(r.sort_order, 0),
    isCompleted: r.is_completed === true,
    completedAt: strOrNull(r.completed_at),
    createdAt: str(r.created_at),
  };
}

function mapTask(r: Row): Task {
  return {
    id: str(r.id),
    milestoneId: str(r.milestone_id),
    goalId: str(r.goal_id),
    title: str(r.title),
    description: strOrNull(r.description),
    dueDate: strOrNull(r.due_date),
    status: pickEnum(TASK_STATUSES, r.status, "pending"),
    priority: pickEnum(TASK_PRIORITIES, r.priority, "medium"),
    completedAt: strOrNull(r.completed_at),
    frequency: pickEnum(TASK_FREQUENCIES, r.frequency, "one_time"),
    estimatedMinutes: toNumOrNull(r.estimated_minutes),
    streakCount: toInt(r.streak_count, 0),
    bestStreak: toInt(r.best_streak, 0),
    lastCompletedAt: strOrNull(r.last_completed_at),
    timesCompleted: toInt(r.times_completed, 0),
    timesSkipped: toInt(r.times_skipped, 0),
    habitCue: strOrNull(r.habit_cue),
    habitReward: strOrNull(r.habit_reward),
    createdAt: str(r.created_at),
  };
}

/** -------- Goals -------- */

export type GoalInput = {
  title: string;
  description?: string | null;
  category?: GoalCategory;
  targetDate?: string | null;
};

async function insertGoal(db: Query, userId: string, input: GoalInput & { chatSessionId?: string | null }) {
  const now = nowIso();
  const rows = await db(
    `INSERT INTO goals (id, user_id, chat_session_id, title, description, category, target_date, status, progress,
                        created_at, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, 'active', 0, $8, $8) RETURNING *`,
    [
      nanoid(),
      userId,
      input.chatSessionId ?? null,
      input.title.trim(),
      input.description?.trim() || null,
      input.category ?? "other",
      input.targetDate ?? null,
      now,
    ],
  );
  return mapGoal(rows[0] ?? {});
}

export async function createGoal(userId: string, input: GoalInput) {
  return insertGoal(q, userId, input);
}

/**
 * Persists an extracted roadmap in one transaction. Milestones keep the order
 * they were extracted in; every task starts pending. When the goal came from
 * a chat session, that session is finalized in the same transaction, and a
 * session that is no longer active fails the whole write with a 400.
 */
export async function createGoalFromExtraction(userId: string, sessionId: string | null, extracted: ExtractedGoal) {
  return withTransaction(async (tx) => {
    const goal = await insertGoal(tx, userId, {
      title: extracted.title,
      description: extracted.description,
      category: extracted.category,
      targetDate: extracted.targetDate,
      chatSessionId: sessionId,
    });

    for (const [index, m] of extracted.milestones.entries()) {
      const milestone = await insertMilestone(tx, goal.id, {
        title: m.title,
        description: m.description,
        targetDate: m.targetDate,
        sortOrder: index,
      });
      for (const t of m.tasks) {
        await insertTask(tx, goal.id, milestone.id, {
          title: t.title,
          description: t.description,
          priority: t.priority,
        });
      }
    }

    // guarded UPDATE: a concurrent finalize rolls this write back
    if (sessionId && !(await finalizeChatSession(sessionId, goal.id, goal.title, tx))) {
      throw badRequest("Session already finalized");
    }
    return goal;
  });
}

/** Owner-scoped lookup; another user's goal reads as missing. */
export async function getGoal(goalId: string, userId: string) {
  const rows = await q("SELECT * FROM goals WHERE id = $1 AND user_id = $2", [goalId, userId]);
  return rows[0] ? mapGoal(rows[0]) : null;
}

export async function listTasksForGoal(goalId: string, db: Query = q) {
  const rows = await db("SELECT * FROM tasks WHERE goal_id = $1 ORDER BY created_at ASC, id ASC", [goalId]);
  return rows.map(mapTask);
}

export async function getGoalWithMilestones(goalId: string, userId: string): Promise<GoalWithMilestones | null> {
  const goal = await getGoal(goalId, userId);
  if (!goal) return null;

  const milestoneRows = await q("SELECT * FROM milestones WHERE goal_id = $1 ORDER BY sort_order ASC, created_at ASC", [
    goalId,
  ]);
  const tasks = await listTasksForGoal(goalId);

  return {
    ...goal,
    milestones: milestoneRows.map(mapMilestone).map((m) => ({
      ...m,
      tasks: tasks.filter((t) => t.milestoneId === m.id),
    })),
  };
}

export async function listGoals(userId: string): Promise<GoalListItem[]> {
  const rows = await q(
    `SELECT g.*,
       (SELECT COUNT(*) FROM milestones m WHERE m.goal_id = g.id)::int AS milestone_count,
       (SELECT COUNT(*) FROM tasks t WHERE t.goal_id = g.id)::int AS task_count,
       (SELECT COUNT(*) FROM tasks t WHERE t.goal_id = g.id AND t.status = 'completed')::int AS completed_task_count
     FROM goals g
     WHERE g.user_id = $1
     ORDER BY g.created_at DESC`,
    [userId],
  );
  return rows.map((r) => ({
    ...mapGoal(r),
    milestoneCount: toInt(r.milestone_count, 0),
    taskCount: toInt(r.task_count, 0),
    completedTaskCount: toInt(r.completed_task_count, 0),
  }));
}

export type GoalPatch = Partial<{
  title: string;
  description: string | null;
  category: GoalCategory;
  targetDate: string | null;
  status: GoalStatus;
}>;

export async function updateGoal(goal: Goal, patch: GoalPatch) {
  const next = {
    title: patch.title !== undefined ? patch.title.trim() : goal.title,
    description: patch.description !== undefined ? patch.description?.trim() || null : goal.description,
    category: patch.category ?? goal.category,
    targetDate: patch.targetDate !== undefined ? patch.targetDate : goal.targetDate,
    status: patch.status ?? goal.status,
  };
  const rows = await q(
    `UPDATE goals SET title = $2, description = $3, category = $4, target_date = $5, status = $6, updated_at = $7
     WHERE id = $1 RETURNING *`,
    [goal.id, next.title, next.description, next.category, next.targetDate, next.status, nowIso()],
  );
  return mapGoal(rows[0] ?? {});
}

export async function deleteGoal(goalId: string) {
  await withTransaction(async (tx) => {
    await tx("UPDATE chat_sessions SET goal_id = NULL WHERE goal_id = $1", [goalId]);
    await tx("DELETE FROM goals WHERE id = $1", [goalId]);
  });
}

/** Stores what the intake assessment learned about the goal. */
export async function applyGoalAssessment(
  goalId: string,
  a: {
    goalType: GoalType;
    motivationScore: number;
    feasibilityScore: number;
    clarityScore: number;
    identifiedObstacles: string[];
    successCriteria: string[];
  },
) {
  await q(
    `UPDATE goals SET goal_type = $2, motivation_score = $3, feasibility_score = $4, clarity_score = $5,
       identified_obstacles = $6::jsonb, success_criteria = $7::jsonb, updated_at = $8
     WHERE id = $1`,
    [
      goalId,
      a.goalType,
      a.motivationScore,
      a.feasibilityScore,
      a.clarityScore,
      JSON.stringify(a.identifiedObstacles),
      JSON.stringify(a.successCriteria),
      nowIso(),
    ],
  );
}

export async function applySmartBreakdown(
  goalId: string,
  smart: { specific: string; measurable: string; achievable: string; relevant: string; timeBound: string },
) {
  await q(
    `UPDATE goals SET smart_specific = $2, smart_measurable = $3, smart_achievable = $4, smart_relevant = $5,
       smart_time_bound = $6, updated_at = $7
     WHERE id = $1`,
    [goalId, smart.specific, smart.measurable, smart.achievable, smart.relevant, smart.timeBound, nowIso()],
  );
}

export async function setGoalSustainability(goalId: string, score: number, risk: BurnoutRisk) {
  await q("UPDATE goals SET sustainability_score = $2, burnout_risk = $3, updated_at = $4 WHERE id = $1", [
    goalId,
    Math.round(score),
    risk,
    nowIso(),
  ]);
}

/** Recomputes goal.progress from its tasks; returns the stored value. */
export async function recomputeGoalProgress(goalId: string, db: Query = q) {
  const goalRows = await db("SELECT progress FROM goals WHERE id = $1", [goalId]);
  const current = toInt(goalRows[0]?.progress, 0);
  const statusRows = await db("SELECT status FROM tasks WHERE goal_id = $1", [goalId]);
  const statuses = statusRows.map((r) => pickEnum(TASK_STATUSES, r.status, "pending"));
  const progress = computeGoalProgress(statuses, current);
  if (progress !== current) {
    await db("UPDATE goals SET progress = $2, updated_at = $3 WHERE id = $1", [goalId, progress, nowIso()]);
  }
  return progress;
}

/** -------- Milestones -------- */

async function insertMilestone(
  db: Query,
  goalId: string,
  input: { title: string; description?: string | null; targetDate?: string | null; sortOrder: number },
) {
  const rows = await db(
    `INSERT INTO milestones (id, goal_id, title, description, target_date, sort_order, is_completed, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, FALSE, $7) RETURNING *`,
    [
      nanoid(),
      goalId,
      input.title.trim(),
      input.description?.trim() || null,
      input.targetDate ?? null,
      input.sortOrder,
      nowIso(),
    ],
  );
  return mapMilestone(rows[0] ?? {});
}

export async function getMilestone(goalId: string, milestoneId: string) {
  const rows = await q("SELECT * FROM milestones WHERE id = $1 AND goal_id = $2", [milestoneId, goalId]);
  return rows[0] ? mapMilestone(rows[0]) : null;
}

/** Appended after the last milestone (order 0 for the first). */
export async function createMilestone(
  goalId: string,
  input: { title: string; description?: string | null; targetDate?: string | null },
) {
  const rows = await q("SELECT MAX(sort_order) AS max_order FROM milestones WHERE goal_id = $1", [goalId]);
  const max = toNumOrNull(rows[0]?.max_order);
  return insertMilestone(q, goalId, { ...input, sortOrder: max === null ? 0 : max + 1 });
}

export async function updateMilestone(
  milestone: Milestone,
  patch: Partial<{ title: string; description: string | null; targetDate: string | null; isCompleted: boolean }>,
) {
  let isCompleted = milestone.isCompleted;
  let completedAt = milestone.completedAt;
  if (patch.isCompleted !== undefined && patch.isCompleted !== milestone.isCompleted) {
    isCompleted = patch.isCompleted;
    completedAt = patch.isCompleted ? nowIso() : null;
  }
  const rows = await q(
    `UPDATE milestones SET title = $2, description = $3, target_date = $4, is_completed = $5, completed_at = $6
     WHERE id = $1 RETURNING *`,
    [
      milestone.id,
      patch.title !== undefined ? patch.title.trim() : milestone.title,
      patch.description !== undefined ? patch.description?.trim() || null : milestone.description,
      patch.targetDate !== undefined ? patch.targetDate : milestone.targetDate,
      isCompleted,
      completedAt,
    ],
  );
  return mapMilestone(rows[0] ?? {});
}

/** Deletes the milestone with its tasks, then recomputes goal progress. */
export async function deleteMilestone(milestone: Milestone) {
  await withTransaction(async (tx) => {
    await tx("DELETE FROM tasks WHERE milestone_id = $1", [milestone.id]);
    await tx("DELETE FROM milestones WHERE id = $1", [milestone.id]);
    await recomputeGoalProgress(milestone.goalId, tx);
  });
}

/** Applies the completion rule to one milestone; returns the stored state. */
export async function refreshMilestoneCompletion(milestoneId: string, db: Query = q) {
  const mRows = await db("SELECT * FROM milestones WHERE id = $1", [milestoneId]);
  if (!mRows[0]) return null;
  const milestone = mapMilestone(mRows[0]);

  const statusRows = await db("SELECT status FROM tasks WHERE milestone_id = $1", [milestoneId]);
  const statuses = statusRows.map((r) => pickEnum(TASK_STATUSES, r.status, "pending"));
  const next = milestoneTransition(statuses, milestone, nowIso());

  if (next.isCompleted !== milestone.isCompleted) {
    await db("UPDATE milestones SET is_completed = $2, completed_at = $3 WHERE id = $1", [
      milestoneId,
      next.isCompleted,
      next.completedAt,
    ]);
  }
  return { ...milestone, ...next };
}

/** -------- Tasks -------- */

export type TaskInput = {
  title: string;
  description?: string | null;
  dueDate?: string | null;
  priority?: TaskPriority;
  frequency?: TaskFrequency;
  estimatedMinutes?: number | null;
};

async function insertTask(db: Query, goalId: string, milestoneId: string, input: TaskInput) {
  const rows = await db(
    `INSERT INTO tasks (id, milestone_id, goal_id, title, description, due_date, status, priority, frequency,
                        estimated_minutes, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, 'pending', $7, $8, $9, $10) RETURNING *`,
    [
      nanoid(),
      milestoneId,
      goalId,
      input.title.trim(),
      input.description?.trim() || null,
      input.dueDate ?? null,
      input.priority ?? "medium",
      input.frequency ?? "one_time",
      input.estimatedMinutes ?? null,
      nowIso(),
    ],
  );
  return mapTask(rows[0] ?? {});
}

export async function getTask(goalId: string, taskId: string) {
  const rows = await q("SELECT * FROM tasks WHERE id = $1 AND goal_id = $2", [taskId, goalId]);
  return rows[0] ? mapTask(rows[0]) : null;
}

export async function createTask(goalId: string, milestoneId: string, input: TaskInput) {
  return withTransaction(async (tx) => {
    const task = await insertTask(tx, goalId, milestoneId, input);
    await recomputeGoalProgress(goalId, tx);
    await refreshMilestoneCompletion(milestoneId, tx);
    return task;
  });
}

export type TaskPatch = Partial<{
  title: string;
  description: string | null;
  dueDate: string | null;
  status: TaskStatus;
  priority: TaskPriority;
}>;

/** Status bookkeeping for a task moving from `task.status` to `status`. */
export function statusChangeFields(task: Task, status: TaskStatus, now: string) {
  const fields = {
    completedAt: task.completedAt,
    streakCount: task.streakCount,
    bestStreak: task.bestStreak,
    lastCompletedAt: task.lastCompletedAt,
    timesCompleted: task.timesCompleted,
    timesSkipped: task.timesSkipped,
  };

  if (status === "completed") {
    if (task.status !== "completed") {
      Object.assign(fields, nextTaskStreak(task, now));
      fields.completedAt = now;
    }
    return fields;
  }

  fields.completedAt = null;
  if (status === "skipped" && task.status !== "skipped") fields.timesSkipped += 1;
  return fields;
}

/**
 * Updates a task. A status change also re-derives goal progress and the
 * milestone's completion in the same transaction.
 */
export async function updateTask(task: Task, patch: TaskPatch) {
  return withTransaction(async (tx) => {
    const status = patch.status ?? task.status;
    const f = patch.status !== undefined ? statusChangeFields(task, patch.status, nowIso()) : task;

    const rows = await tx(
      `UPDATE tasks SET title = $2, description = $3, due_date = $4, status = $5, priority = $6,
         completed_at = $7, streak_count = $8, best_streak = $9, last_completed_at = $10,
         times_completed = $11, times_skipped = $12
       WHERE id = $1 RETURNING *`,
      [
        task.id,
        patch.title !== undefined ? patch.title.trim() : task.title,
        patch.description !== undefined ? patch.description?.trim() || null : task.description,
        patch.dueDate !== undefined ? patch.dueDate : task.dueDate,
        status,
        patch.priority ?? task.priority,
        f.completedAt,
        f.streakCount,
        f.bestStreak,
        f.lastCompletedAt,
        f.timesCompleted,
        f.timesSkipped,
      ],
    );

    if (patch.status !== undefined) {
      await recomputeGoalProgress(task.goalId, tx);
      await refreshMilestoneCompletion(task.milestoneId, tx);
    }
    return mapTask(rows[0] ?? {});
  });
}

export async function deleteTask(task: Task) {
  await withTransaction(async (tx) => {
    await tx("DELETE FROM tasks WHERE id = $1", [task.id]);
    await recomputeGoalProgress(task.goalId, tx);
    await refreshMilestoneCompletion(task.milestoneId, tx);
  });
}

/** -------- Dashboard -------- */

export type UpcomingTask = {
  id: string;
  title: string;
  goalId: string;
  goalTitle: string;
  dueDate: string | null;
  priority: TaskPriority;
  status: TaskStatus;
};

export type DashboardStats = {
  activeGoals: number;
  totalTasks: number;
  completedTasks: number;
  completionRate: number;
  currentStreak: number;
  upcomingTasks: UpcomingTask[];
};

async function completionDayKeys(userId: string) {
  const rows = await q(
    `SELECT DISTINCT substr(t.completed_at, 1, 10) AS day
     FROM tasks t JOIN goals g ON g.id = t.goal_id
     WHERE g.user_id = $1 AND t.completed_at IS NOT NULL`,
    [userId],
  );
  return rows.map((r) => str(r.day)).filter(Boolean);
}

export async function dashboardStats(userId: string, now = nowIso()): Promise<DashboardStats> {
  const countRows = await q(
    `SELECT
       (SELECT COUNT(*) FROM goals WHERE user_id = $1 AND status = 'active')::int AS active_goals,
       COUNT(t.id)::int AS total_tasks,
       COUNT(t.id) FILTER (WHERE t.status = 'completed')::int AS completed_tasks
     FROM goals g LEFT JOIN tasks t ON t.goal_id = g.id
     WHERE g.user_id = $1`,
    [userId],
  );
  const c = countRows[0] ?? {};
  const totalTasks = toInt(c.total_tasks, 0);
  const completedTasks = toInt(c.completed_tasks, 0);

  const days = await completionDayKeys(userId);

  const openRows = await q(
    `SELECT t.id, t.title, t.goal_id, g.title AS goal_title, t.due_date, t.priority, t.status
     FROM tasks t JOIN goals g ON g.id = t.goal_id
     WHERE g.user_id = $1 AND g.status = 'active' AND t.status IN ('pending', 'in_progress')`,
    [userId],
  );
  const open: UpcomingTask[] = openRows.map((r) => ({
    id: str(r.id),
    title: str(r.title),
    goalId: str(r.goal_id),
    goalTitle: str(r.goal_title),
    dueDate: strOrNull(r.due_date),
    priority: pickEnum(TASK_PRIORITIES, r.priority, "medium"),
    status: pickEnum(TASK_STATUSES, r.status, "pending"),
  }));

  return {
    activeGoals: toInt(c.active_goals, 0),
    totalTasks,
    completedTasks,
    completionRate: percent(completedTasks, totalTasks),
    currentStreak: calculateStreak(days, dayKeyFromIso(now)),
    upcomingTasks: pickUpcoming(open, 5),
  };
}

/** Lifetime numbers the profile keeps denormalized. */
export async function goalStatsForUser(userId: string) {
  const rows = await q(
    `SELECT
       (SELECT COUNT(*) FROM goals WHERE user_id = $1 AND status = 'completed')::int AS goals_completed,
       (SELECT AVG(progress) FROM goals WHERE user_id = $1) AS avg_progress,
       (SELECT COUNT(*) FROM tasks t JOIN goals g ON g.id = t.goal_id
          WHERE g.user_id = $1 AND t.status = 'completed')::int AS tasks_completed`,
    [userId],
  );
  const r = rows[0] ?? {};
  const days = await completionDayKeys(userId);
  return {
    totalGoalsCompleted: toInt(r.goals_completed, 0),
    totalTasksCompleted: toInt(r.tasks_completed, 0),
    avgCompletionRate: Math.round((toNumOrNull(r.avg_progress) ?? 0) * 10) / 10,
    longestStreak: longestStreak(days),
  };
}
