import type { Express } from "express";
import { z } from "zod";
import { aiConfigured } from "../ai.js";
import { authOf, requireAuth } from "../auth.js";
import { getConfig } from "../config.js";
import { HttpError, serviceUnavailable, validationError, wrap } from "../errors.js";
import {
  evaluateCoaching,
  evaluateFrustration,
  evaluationEnabled,
  frustrationRecommendation,
} from "../evaluation.js";
import { listGoals } from "../goals.js";
import { errorContext, logger } from "../logger.js";
import { percent } from "../progress.js";
import { evaluationJson } from "../serializers.js";
import {
  chatActivityForUser,
  coachingDimensionAverages,
  evaluationAggregates,
  listEvaluations,
  type MetricAggregate,
} from "../storage.js";
import type { EvaluationMetric } from "../types.js";

const CoachingSchema = z.object({
  user_input: z.string().trim().min(1).max(5000),
  ai_response: z.string().trim().min(1).max(10000),
});

const FrustrationSchema = z.object({
  original_user_input: z.string().trim().min(1).max(5000),
  previous_ai_response: z.string().trim().min(1).max(10000),
  current_user_reply: z.string().trim().min(1).max(5000),
});

const TracesQuery = z.object({
  limit: z.coerce.number().int().min(1).max(50).default(10),
});

const PERIOD_DAYS = 30;

function periodStartIso(days = PERIOD_DAYS) {
  return new Date(Date.now() - days * 86_400_000).toISOString();
}

function avgOf(aggregates: MetricAggregate[], metric: EvaluationMetric) {
  const avg = aggregates.find((a) => a.metric === metric)?.avgScore ?? null;
  return avg === null ? null : Math.round(avg * 1000) / 1000;
}

/** Judge call for an explicit request: 503 without a key or when the model fails. */
async function runJudge<T>(label: string, run: () => Promise<T>) {
  if (!aiConfigured()) throw serviceUnavailable("AI service not configured");
  try {
    return await run();
  } catch (err) {
    if (err instanceof HttpError) throw err;
    logger.error("Evaluation failed", { evaluation: label, ...errorContext(err) });
    throw serviceUnavailable("AI service temporarily unavailable. Please try again.");
  }
}

export function registerAnalyticsRoutes(app: Express) {
  app.get(
    "/api/analytics/status",
    requireAuth,
    wrap(async (req, res) => {
      const userId = authOf(req).userId;
      const [recent, aggregates] = await Promise.all([listEvaluations(userId, 5), evaluationAggregates(userId)]);

      const byMetric: Record<string, { count: number; avg_score: number | null }> = {};
      for (const a of aggregates) byMetric[a.metric] = { count: a.count, avg_score: a.avgScore };

      return res.json({
        evaluation_enabled: evaluationEnabled(),
        model: getConfig().aiModel,
        recent_evaluations: recent.map(evaluationJson),
        summary: {
          total_evaluations: aggregates.reduce((sum, a) => sum + a.count, 0),
          by_metric: byMetric,
        },
      });
    }),
  );

  app.post(
    "/api/analytics/evaluate/coaching",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = CoachingSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const result = await runJudge("coaching_quality", () =>
        evaluateCoaching({ userId: authOf(req).userId }, parsed.data.user_input, parsed.data.ai_response),
      );
      return res.json({ score: result.score, reason: result.reason, ...result.dimensions });
    }),
  );

  app.post(
    "/api/analytics/evaluate/frustration",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = FrustrationSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const result = await runJudge("frustration", () =>
        evaluateFrustration(
          { userId: authOf(req).userId },
          {
            originalUserInput: parsed.data.original_user_input,
            previousAiResponse: parsed.data.previous_ai_response,
            currentUserReply: parsed.data.current_user_reply,
          },
        ),
      );
      return res.json({
        frustration_score: result.frustrationScore,
        indicators: result.indicators,
        recommendation: frustrationRecommendation(result.frustrationScore),
      });
    }),
  );

  app.get(
    "/api/analytics/performance",
    requireAuth,
    wrap(async (req, res) => {
      const userId = authOf(req).userId;
      const [aggregates, activity, goals] = await Promise.all([
        evaluationAggregates(userId, periodStartIso()),
        chatActivityForUser(userId),
        listGoals(userId),
      ]);

      return res.json({
        total_conversations: activity.sessions,
        avg_coaching_quality: avgOf(aggregates, "coaching_quality"),
        avg_goal_extraction_quality: avgOf(aggregates, "goal_extraction_quality"),
        avg_frustration_level: avgOf(aggregates, "frustration"),
        total_goals_created: goals.length,
        model_version: getConfig().aiModel,
        evaluation_period: `last ${PERIOD_DAYS} days`,
      });
    }),
  );

  app.get(
    "/api/analytics/metrics/coaching-quality",
    requireAuth,
    wrap(async (req, res) => {
      const userId = authOf(req).userId;
      const [dimensions, activity, goals] = await Promise.all([
        coachingDimensionAverages(userId, periodStartIso()),
        chatActivityForUser(userId),
        listGoals(userId),
      ]);

      const completed = goals.filter((g) => g.status === "completed").length;
      return res.json({
        ...dimensions,
        goal_completion_rate: percent(completed, goals.length),
        avg_session_length: activity.sessions > 0 ? Math.round((activity.messages / activity.sessions) * 10) / 10 : 0,
      });
    }),
  );

  app.get(
    "/api/analytics/traces/recent",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = TracesQuery.safeParse(req.query);
      if (!parsed.success) throw validationError(parsed.error);

      const evaluations = await listEvaluations(authOf(req).userId, parsed.data.limit);
      return res.json({ traces: evaluations.map(evaluationJson) });
    }),
  );
}
