// Daily check-in: mark tasks done, record the day, run the check-in agents, keep what they found.
import { runDailyCheckin, loadAgentContext, summarizeTasks, type SustainabilityData } from "./agents.js";
import { dayKeyFromIso, nowIso } from "./db.js";
import { notFound } from "./errors.js";
import { getGoal, listTasksForGoal, setGoalSustainability, updateTask } from "./goals.js";
import { logger } from "./logger.js";
import { createInsight, upsertDailyProgress, upsertHabitLoop } from "./storage.js";
import type { HabitStrength, Task } from "./types.js";

export type CheckinInput = {
  goalId: string;
  completedTaskIds: string[];
  notes?: string | null;
  moodScore?: number | null;
  energyLevel?: number | null;
};

const RECOMMENDATION_TTL_DAYS = 14;

/** Counts for today's DailyProgress row, taken from the goal's tasks after the check-in. */
export function dailyCounts(tasks: Task[], today: string) {
  const completedToday = tasks.filter(
    (t) => t.status === "completed" && t.completedAt !== null && dayKeyFromIso(t.completedAt) === today,
  );
  const open = tasks.filter((t) => t.status === "pending" || t.status === "in_progress").length;
  return {
    tasksPlanned: open + completedToday.length,
    tasksCompleted: completedToday.length,
    tasksSkipped: tasks.filter((t) => t.status === "skipped").length,
    totalMinutesLogged: completedToday.reduce((sum, t) => sum + (t.estimatedMinutes ?? 0), 0),
  };
}

export function habitStrength(habitScore: number): HabitStrength {
  if (habitScore < 25) return "forming";
  if (habitScore < 50) return "developing";
  if (habitScore < 75) return "established";
  return "automatic";
}

async function keepSustainabilityFindings(
  userId: string,
  goalId: string,
  data: SustainabilityData,
  tasks: Task[],
  today: string,
) {
  await setGoalSustainability(goalId, data.sustainability_score, data.burnout_risk);

  const summary = summarizeTasks(tasks, today);
  for (const loop of data.habit_analysis.habit_loops) {
    await upsertHabitLoop({
      userId,
      goalId,
      name: loop.routine.slice(0, 100),
      cue: loop.cue,
      routine: loop.routine,
      reward: loop.reward,
      strength: habitStrength(data.habit_analysis.habit_score),
      daysTracked: data.habit_analysis.days_consistent,
      currentStreak: summary.streak_count,
      completionRate: summary.completion_rate / 100,
    });
  }

  const expiresAt = new Date(Date.now() + RECOMMENDATION_TTL_DAYS * 86_400_000).toISOString();
  for (const rec of data.recommendations) {
    await createInsight({
      userId,
      goalId,
      insightType: "recommendation",
      title: rec.length > 80 ? `${rec.slice(0, 77)}...` : rec,
      description: rec,
      sourceAgent: "sustainability",
      importance: 5,
      confidence: 0.7,
      expiresAt,
    });
  }

  if (data.burnout_risk === "HIGH") {
    await createInsight({
      userId,
      goalId,
      insightType: "warning",
      title: "High burnout risk",
      description:
        data.pattern_insights.failure_patterns.join("; ") ||
        "Your recent pace looks hard to sustain. Consider a lighter plan for the next few days.",
      sourceAgent: "sustainability",
      importance: 8,
      confidence: 0.7,
      data: { sustainability_score: data.sustainability_score },
    });
  }
}

export async function performCheckin(userId: string, input: CheckinInput) {
  const goal = await getGoal(input.goalId, userId);
  if (!goal) throw notFound("Goal not found");

  const before = await listTasksForGoal(goal.id);
  for (const id of new Set(input.completedTaskIds)) {
    const task = before.find((t) => t.id === id);
    if (!task || task.status === "completed") continue;
    await updateTask(task, { status: "completed" });
  }

  const today = dayKeyFromIso(nowIso());
  const tasks = await listTasksForGoal(goal.id);
  const dailyProgress = await upsertDailyProgress({
    userId,
    goalId: goal.id,
    date: today,
    ...dailyCounts(tasks, today),
    moodScore: input.moodScore,
    energyLevel: input.energyLevel,
    notes: input.notes,
  });

  const notes = input.notes?.trim();
  const ctx = await loadAgentContext(userId, {
    goalId: goal.id,
    messages: notes ? [{ role: "user", content: notes }] : [],
    additional: {
      request_type: "daily_checkin",
      mood_score: input.moodScore ?? null,
      energy_level: input.energyLevel ?? null,
    },
    withTasks: true,
  });
  const results = await runDailyCheckin(ctx);

  if (results.sustainability.success) {
    await keepSustainabilityFindings(userId, goal.id, results.sustainability.data, tasks, today);
  } else {
    logger.warn("Check-in without sustainability analysis", { goalId: goal.id });
  }

  return { results, dailyProgress };
}
