import type { Express } from "express";
import { z } from "zod";
import { authOf, requireAuth } from "../auth.js";
import { dayKeyFromIso, nowIso } from "../db.js";
import { notFound, validationError, wrap } from "../errors.js";
import { getGoal, goalStatsForUser } from "../goals.js";
import { addDaysToKey } from "../progress.js";
import { dailyProgressJson, habitLoopJson, insightJson, profileJson } from "../serializers.js";
import {
  getOrCreateProfile,
  listDailyProgress,
  listHabitLoops,
  listInsights,
  markInsightActionTaken,
  setProfileStats,
  updateProfile,
} from "../storage.js";
import { GOAL_TYPES, LEARNING_STYLES, MOTIVATION_TYPES, PERSONALITY_TYPES } from "../types.js";

const Level = z.number().int().min(1).max(10);
const ShortList = z.array(z.string().trim().min(1).max(100)).max(20);

const ProfileSchema = z.object({
  learning_style: z.enum(LEARNING_STYLES).nullable().optional(),
  motivation_type: z.enum(MOTIVATION_TYPES).nullable().optional(),
  personality_type: z.enum(PERSONALITY_TYPES).nullable().optional(),
  best_time_of_day: z.enum(["morning", "afternoon", "evening", "night"]).nullable().optional(),
  best_days: ShortList.optional(),
  avg_focus_duration: z.number().int().min(1).max(600).nullable().optional(),
  preferred_goal_type: z.enum(GOAL_TYPES).nullable().optional(),
  preferred_task_size: z.enum(["small", "medium", "large"]).nullable().optional(),
  preferred_reminder_frequency: z.enum(["daily", "weekly", "none"]).optional(),
  preferred_communication_style: z.enum(["supportive", "direct", "analytical", "playful"]).optional(),
  strengths: ShortList.optional(),
  challenges: ShortList.optional(),
  values: ShortList.optional(),
  current_stress_level: Level.optional(),
  current_motivation_level: Level.optional(),
  current_confidence_level: Level.optional(),
});

const GoalQuery = z.object({ goal_id: z.string().min(1).optional() });

const InsightsQuery = GoalQuery.extend({
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const ProgressQuery = GoalQuery.extend({
  days: z.coerce.number().int().min(1).max(365).default(14),
});

async function assertGoalOwned(goalId: string | undefined, userId: string) {
  if (goalId && !(await getGoal(goalId, userId))) throw notFound("Goal not found");
}

export function registerProfileRoutes(app: Express) {
  app.get(
    "/api/profile",
    requireAuth,
    wrap(async (req, res) => {
      const userId = authOf(req).userId;
      await getOrCreateProfile(userId);
      await setProfileStats(userId, await goalStatsForUser(userId));
      return res.json(profileJson(await getOrCreateProfile(userId)));
    }),
  );

  app.put(
    "/api/profile",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = ProfileSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);
      const b = parsed.data;

      const profile = await updateProfile(authOf(req).userId, {
        learningStyle: b.learning_style,
        motivationType: b.motivation_type,
        personalityType: b.personality_type,
        bestTimeOfDay: b.best_time_of_day,
        bestDays: b.best_days,
        avgFocusDuration: b.avg_focus_duration,
        preferredGoalType: b.preferred_goal_type,
        preferredTaskSize: b.preferred_task_size,
        preferredReminderFrequency: b.preferred_reminder_frequency,
        preferredCommunicationStyle: b.preferred_communication_style,
        strengths: b.strengths,
        challenges: b.challenges,
        values: b.values,
        currentStressLevel: b.current_stress_level,
        currentMotivationLevel: b.current_motivation_level,
        currentConfidenceLevel: b.current_confidence_level,
      });
      return res.json(profileJson(profile));
    }),
  );

  // -----------------------------
  // Habits, insights, daily progress
  // -----------------------------
  app.get(
    "/api/habits",
    requireAuth,
    wrap(async (req, res) => {
      const query = GoalQuery.safeParse(req.query);
      if (!query.success) throw validationError(query.error);

      const userId = authOf(req).userId;
      await assertGoalOwned(query.data.goal_id, userId);
      const habits = await listHabitLoops(userId, query.data.goal_id);
      return res.json({ habits: habits.map(habitLoopJson) });
    }),
  );

  app.get(
    "/api/insights",
    requireAuth,
    wrap(async (req, res) => {
      const query = InsightsQuery.safeParse(req.query);
      if (!query.success) throw validationError(query.error);

      const userId = authOf(req).userId;
      await assertGoalOwned(query.data.goal_id, userId);
      const insights = await listInsights(userId, { goalId: query.data.goal_id, limit: query.data.limit });
      return res.json({ insights: insights.map(insightJson) });
    }),
  );

  app.post(
    "/api/insights/:id/action",
    requireAuth,
    wrap(async (req, res) => {
      const insight = await markInsightActionTaken(authOf(req).userId, String(req.params.id));
      if (!insight) throw notFound("Insight not found");
      return res.json(insightJson(insight));
    }),
  );

  app.get(
    "/api/progress/daily",
    requireAuth,
    wrap(async (req, res) => {
      const query = ProgressQuery.safeParse(req.query);
      if (!query.success) throw validationError(query.error);

      const userId = authOf(req).userId;
      await assertGoalOwned(query.data.goal_id, userId);
      const sinceDayKey = addDaysToKey(dayKeyFromIso(nowIso()), -(query.data.days - 1));
      const rows = await listDailyProgress(userId, { goalId: query.data.goal_id, sinceDayKey });
      return res.json({ progress: rows.map(dailyProgressJson) });
    }),
  );
}
