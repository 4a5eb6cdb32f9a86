// LLM-as-judge: coaching quality, user frustration and goal-extraction quality. Every result lands in ai_evaluations.
import { z } from "zod";
import { aiConfigured, completeJson } from "./ai.js";
import { getConfig } from "./config.js";
import { errorContext, logger } from "./logger.js";
import {
  COACHING_QUALITY_TEMPLATE,
  FRUSTRATION_TEMPLATE,
  GOAL_EXTRACTION_QUALITY_TEMPLATE,
  JUDGE_SYSTEM,
  fillTemplate,
} from "./prompts.js";
import { COACHING_DIMENSIONS, recordEvaluation, type CoachingDimension } from "./storage.js";
import type { ExtractedGoal } from "./types.js";

export const PARSE_ERROR_REASON = "Evaluation parse error";

export function clamp01(n: number) {
  if (!Number.isFinite(n)) return 0;
  return Math.min(1, Math.max(0, n));
}

/** Number or numeric string; null, blank and non-numeric scores are rejected. */
const Score = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().refine(Number.isFinite),
);

const CoachingJudgment = z.object({
  score: Score,
  reason: z.string().optional(),
  smart_alignment: Score.nullish(),
  motivational_quality: Score.nullish(),
  actionability: Score.nullish(),
  clarity: Score.nullish(),
});

export type CoachingResult = {
  score: number;
  reason: string;
  dimensions: Partial<Record<CoachingDimension, number>>;
};

export function parseCoachingJudgment(data: unknown): CoachingResult {
  const parsed = CoachingJudgment.safeParse(data);
  if (!parsed.success) return { score: 0.5, reason: PARSE_ERROR_REASON, dimensions: {} };

  const dimensions: Partial<Record<CoachingDimension, number>> = {};
  for (const d of COACHING_DIMENSIONS) {
    const v = parsed.data[d];
    if (typeof v === "number") dimensions[d] = clamp01(v);
  }
  return { score: clamp01(parsed.data.score), reason: parsed.data.reason?.trim() ?? "", dimensions };
}

const FrustrationJudgment = z.object({
  frustration_score: Score,
  indicators: z.array(z.string()).optional(),
});

export type FrustrationResult = { frustrationScore: number; indicators: string[] };

export function parseFrustration(data: unknown): FrustrationResult {
  const parsed = FrustrationJudgment.safeParse(data);
  if (!parsed.success) return { frustrationScore: 0, indicators: [] };
  return {
    frustrationScore: clamp01(parsed.data.frustration_score),
    indicators: (parsed.data.indicators ?? []).map((s) => s.trim()).filter(Boolean),
  };
}

export function frustrationRecommendation(score: number) {
  if (score < 0.3) return "User seems engaged. Continue current approach.";
  if (score < 0.6) return "Minor friction detected. Consider asking clarifying questions.";
  return "High frustration detected. Consider rephrasing or offering alternatives.";
}

const ExtractionJudgment = z.object({
  score: Score,
  reason: z.string().optional(),
  improvements: z.array(z.string()).optional(),
});

export type ExtractionQualityResult = { score: number; reason: string; improvements: string[] };

export function parseExtractionQuality(data: unknown): ExtractionQualityResult {
  const parsed = ExtractionJudgment.safeParse(data);
  if (!parsed.success) return { score: 0.5, reason: PARSE_ERROR_REASON, improvements: [] };
  return {
    score: clamp01(parsed.data.score),
    reason: parsed.data.reason?.trim() ?? "",
    improvements: parsed.data.improvements ?? [],
  };
}

type JudgeScope = { userId: string; sessionId?: string | null };

export async function evaluateCoaching(scope: JudgeScope, userInput: string, aiResponse: string) {
  const { data } = await completeJson(
    JUDGE_SYSTEM,
    fillTemplate(COACHING_QUALITY_TEMPLATE, { user_input: userInput, ai_response: aiResponse }),
    { temperature: 0, maxTokens: 400 },
  );
  const result = parseCoachingJudgment(data);
  await recordEvaluation({
    userId: scope.userId,
    sessionId: scope.sessionId,
    metric: "coaching_quality",
    score: result.score,
    reason: result.reason,
    details: { ...result.dimensions, user_input: userInput.slice(0, 500) },
  });
  return result;
}

export async function evaluateFrustration(
  scope: JudgeScope,
  input: { originalUserInput: string; previousAiResponse: string; currentUserReply: string },
) {
  const { data } = await completeJson(
    JUDGE_SYSTEM,
    fillTemplate(FRUSTRATION_TEMPLATE, {
      original_user_input: input.originalUserInput,
      previous_ai_response: input.previousAiResponse,
      current_user_reply: input.currentUserReply,
    }),
    { temperature: 0, maxTokens: 300 },
  );
  const result = parseFrustration(data);
  await recordEvaluation({
    userId: scope.userId,
    sessionId: scope.sessionId,
    metric: "frustration",
    score: result.frustrationScore,
    reason: frustrationRecommendation(result.frustrationScore),
    details: { indicators: result.indicators },
  });
  return result;
}

export async function evaluateGoalExtraction(scope: JudgeScope, conversation: string, extracted: ExtractedGoal) {
  const { data } = await completeJson(
    JUDGE_SYSTEM,
    fillTemplate(GOAL_EXTRACTION_QUALITY_TEMPLATE, {
      conversation,
      extracted: JSON.stringify(extracted, null, 2),
    }),
    { temperature: 0, maxTokens: 500 },
  );
  const result = parseExtractionQuality(data);
  await recordEvaluation({
    userId: scope.userId,
    sessionId: scope.sessionId,
    metric: "goal_extraction_quality",
    score: result.score,
    reason: result.reason,
    details: {
      improvements: result.improvements,
      goal_title: extracted.title,
      milestone_count: extracted.milestones.length,
    },
  });
  return result;
}

export function evaluationEnabled() {
  return getConfig().aiEvaluationEnabled && aiConfigured();
}

/** Fire-and-forget judge run; a failure is logged and goes no further. */
export function judgeInBackground(label: string, run: () => Promise<unknown>) {
  if (!evaluationEnabled()) return;
  void run().catch((err: unknown) => {
    logger.warn("Background evaluation failed", { evaluation: label, ...errorContext(err) });
  });
}
