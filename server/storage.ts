// Postgres storage for everything outside the goal tree:
// users/profiles, chat, system prompts, evaluations, habit loops, insights, daily progress.
import { nanoid } from "nanoid";
import {
  q,
  nowIso,
  toInt,
  toNumOrNull,
  readJsonbArray,
  readJsonbObject,
  type Query,
} from "./db.js";
import {
  AUTH_PROVIDERS,
  CHAT_STATUSES,
  EVALUATION_METRICS,
  GOAL_TYPES,
  HABIT_STRENGTHS,
  INSIGHT_TYPES,
  LEARNING_STYLES,
  MESSAGE_ROLES,
  MOTIVATION_TYPES,
  PERSONALITY_TYPES,
  pickEnum,
  type AiEvaluation,
  type AuthProvider,
  type ChatMessage,
  type ChatSession,
  type DailyProgress,
  type EvaluationMetric,
  type HabitLoop,
  type HabitStrength,
  type InsightType,
  type MessageRole,
  type User,
  type UserInsight,
  type UserProfile,
} from "./types.js";

type Row = Record<string, unknown>;

function str(v: unknown): string {
  return v === null || v === undefined ? "" : String(v);
}

function strOrNull(v: unknown): string | null {
  return v === null || v === undefined ? null : String(v);
}

function bool(v: unknown): boolean {
  return v === true || v === "t" || v === "true" || v === 1;
}

function normalizeEmail(email: string) {
  return email.trim().toLowerCase();
}

/** -------- Users -------- */

function mapUser(r: Row): User {
  return {
    id: str(r.id),
    email: str(r.email),
    passwordHash: strOrNull(r.password_hash),
    name: strOrNull(r.name),
    avatarUrl: strOrNull(r.avatar_url),
    authProvider: pickEnum(AUTH_PROVIDERS, r.auth_provider, "email"),
    isActive: bool(r.is_active),
    tokenLimit: toInt(r.token_limit, 100000),
    tokensUsed: toInt(r.tokens_used, 0),
    quotaResetAt: strOrNull(r.quota_reset_at),
    createdAt: str(r.created_at),
    updatedAt: str(r.updated_at),
  };
}

export async function createUser(params: {
  email: string;
  passwordHash: string | null;
  name?: string | null;
  avatarUrl?: string | null;
  authProvider: AuthProvider;
}) {
  const now = nowIso();
  const rows = await q(
    `INSERT INTO users (id, email, password_hash, name, avatar_url, auth_provider, created_at, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $7)
     RETURNING *`,
    [
      nanoid(),
      normalizeEmail(params.email),
      params.passwordHash,
      params.name?.trim() || null,
      params.avatarUrl || null,
      params.authProvider,
      now,
    ],
  );
  const user = mapUser(rows[0] ?? {});
  await getOrCreateProfile(user.id);
  return user;
}

export async function findUserByEmail(email: string) {
  const rows = await q("SELECT * FROM users WHERE email = $1", [normalizeEmail(email)]);
  return rows[0] ? mapUser(rows[0]) : null;
}

export async function getUserById(id: string) {
  const rows = await q("SELECT * FROM users WHERE id = $1", [id]);
  return rows[0] ? mapUser(rows[0]) : null;
}

export async function updateUser(id: string, patch: { name?: string | null; avatarUrl?: string | null }) {
  const rows = await q(
    `UPDATE users SET
       name = CASE WHEN $2::boolean THEN $3 ELSE name END,
       avatar_url = CASE WHEN $4::boolean THEN $5 ELSE avatar_url END,
       updated_at = $6
     WHERE id = $1
     RETURNING *`,
    [
      id,
      patch.name !== undefined,
      patch.name?.trim() || null,
      patch.avatarUrl !== undefined,
      patch.avatarUrl || null,
      nowIso(),
    ],
  );
  return rows[0] ? mapUser(rows[0]) : null;
}

export async function addTokensUsed(userId: string, tokens: number) {
  if (!Number.isFinite(tokens) || tokens <= 0) return;
  await q("UPDATE users SET tokens_used = tokens_used + $2 WHERE id = $1", [userId, Math.round(tokens)]);
}

/** -------- Profiles -------- */

function mapProfile(r: Row): UserProfile {
  return {
    userId: str(r.user_id),
    learningStyle: r.learning_style ? pickEnum(LEARNING_STYLES, r.learning_style, "visual") : null,
    motivationType: r.motivation_type ? pickEnum(MOTIVATION_TYPES, r.motivation_type, "intrinsic") : null,
    personalityType: r.personality_type ? pickEnum(PERSONALITY_TYPES, r.personality_type, "driver") : null,
    bestTimeOfDay: strOrNull(r.best_time_of_day),
    bestDays: readJsonbArray(r.best_days),
    avgFocusDuration: toNumOrNull(r.avg_focus_duration),
    preferredGoalType: r.preferred_goal_type ? pickEnum(GOAL_TYPES, r.preferred_goal_type, "long_term") : null,
    preferredTaskSize: strOrNull(r.preferred_task_size),
    totalGoalsCompleted: toInt(r.total_goals_completed, 0),
    totalTasksCompleted: toInt(r.total_tasks_completed, 0),
    avgCompletionRate: toNumOrNull(r.avg_completion_rate) ?? 0,
    longestStreak: toInt(r.longest_streak, 0),
    currentStressLevel: toInt(r.current_stress_level, 5),
    currentMotivationLevel: toInt(r.current_motivation_level, 5),
    currentConfidenceLevel: toInt(r.current_confidence_level, 5),
    preferredReminderFrequency: str(r.preferred_reminder_frequency) || "daily",
    preferredCommunicationStyle: str(r.preferred_communication_style) || "supportive",
    strengths: readJsonbArray(r.strengths),
    challenges: readJsonbArray(r.challenges),
    values: readJsonbArray(r.values_json),
    createdAt: str(r.created_at),
    updatedAt: str(r.updated_at),
  };
}

export async function getOrCreateProfile(userId: string) {
  const now = nowIso();
  await q(
    `INSERT INTO user_profiles (user_id, created_at, updated_at) VALUES ($1, $2, $2)
     ON CONFLICT (user_id) DO NOTHING`,
    [userId, now],
  );
  const rows = await q("SELECT * FROM user_profiles WHERE user_id = $1", [userId]);
  return mapProfile(rows[0] ?? { user_id: userId });
}

export type ProfilePatch = Partial<
  Pick<
    UserProfile,
    | "learningStyle"
    | "motivationType"
    | "personalityType"
    | "bestTimeOfDay"
    | "bestDays"
    | "avgFocusDuration"
    | "preferredGoalType"
    | "preferredTaskSize"
    | "preferredReminderFrequency"
    | "preferredCommunicationStyle"
    | "strengths"
    | "challenges"
    | "values"
    | "currentStressLevel"
    | "currentMotivationLevel"
    | "currentConfidenceLevel"
  >
>;

const PROFILE_COLUMNS: Record<keyof ProfilePatch, { column: string; json?: boolean }> = {
  learningStyle: { column: "learning_style" },
  motivationType: { column: "motivation_type" },
  personalityType: { column: "personality_type" },
  bestTimeOfDay: { column: "best_time_of_day" },
  bestDays: { column: "best_days", json: true },
  avgFocusDuration: { column: "avg_focus_duration" },
  preferredGoalType: { column: "preferred_goal_type" },
  preferredTaskSize: { column: "preferred_task_size" },
  preferredReminderFrequency: { column: "preferred_reminder_frequency" },
  preferredCommunicationStyle: { column: "preferred_communication_style" },
  strengths: { column: "strengths", json: true },
  challenges: { column: "challenges", json: true },
  values: { column: "values_json", json: true },
  currentStressLevel: { column: "current_stress_level" },
  currentMotivationLevel: { column: "current_motivation_level" },
  currentConfidenceLevel: { column: "current_confidence_level" },
};

function isProfileKey(k: string): k is keyof ProfilePatch {
  return Object.prototype.hasOwnProperty.call(PROFILE_COLUMNS, k);
}

export async function updateProfile(userId: string, patch: ProfilePatch) {
  await getOrCreateProfile(userId);

  const sets: string[] = [];
  const params: unknown[] = [userId];
  for (const [key, value] of Object.entries(patch)) {
    if (value === undefined || !isProfileKey(key)) continue;
    const { column, json } = PROFILE_COLUMNS[key];
    params.push(json ? JSON.stringify(value) : value);
    sets.push(json ? `${column} = $${params.length}::jsonb` : `${column} = $${params.length}`);
  }
  params.push(nowIso());
  sets.push(`updated_at = $${params.length}`);

  const rows = await q(`UPDATE user_profiles SET ${sets.join(", ")} WHERE user_id = $1 RETURNING *`, params);
  return mapProfile(rows[0] ?? { user_id: userId });
}

export async function setProfileStats(
  userId: string,
  stats: { totalGoalsCompleted: number; totalTasksCompleted: number; avgCompletionRate: number; longestStreak: number },
) {
  await q(
    `UPDATE user_profiles SET
       total_goals_completed = $2,
       total_tasks_completed = $3,
       avg_completion_rate = $4,
       longest_streak = GREATEST(longest_streak, $5),
       updated_at = $6
     WHERE user_id = $1`,
    [userId, stats.totalGoalsCompleted, stats.totalTasksCompleted, stats.avgCompletionRate, stats.longestStreak, nowIso()],
  );
}

/** -------- Chat -------- */

function mapSession(r: Row): ChatSession {
  return {
    id: str(r.id),
    userId: str(r.user_id),
    title: strOrNull(r.title),
    status: pickEnum(CHAT_STATUSES, r.status, "active"),
    goalId: strOrNull(r.goal_id),
    createdAt: str(r.created_at),
    updatedAt: str(r.updated_at),
  };
}

function mapMessage(r: Row): ChatMessage {
  return {
    id: str(r.id),
    sessionId: str(r.session_id),
    role: pickEnum(MESSAGE_ROLES, r.role, "user"),
    content: str(r.content),
    createdAt: str(r.created_at),
  };
}

export async function createChatSession(userId: string) {
  const now = nowIso();
  const rows = await q(
    `INSERT INTO chat_sessions (id, user_id, status, created_at, updated_at)
     VALUES ($1, $2, 'active', $3, $3) RETURNING *`,
    [nanoid(), userId, now],
  );
  return mapSession(rows[0] ?? {});
}

export async function getChatSession(id: string) {
  const rows = await q("SELECT * FROM chat_sessions WHERE id = $1", [id]);
  return rows[0] ? mapSession(rows[0]) : null;
}

export type ChatSessionSummary = ChatSession & { messageCount: number; lastMessage: string | null };

export async function listChatSessions(userId: string): Promise<ChatSessionSummary[]> {
  const rows = await q(
    `SELECT s.*,
       (SELECT COUNT(*) FROM chat_messages m WHERE m.session_id = s.id)::int AS message_count,
       (SELECT m.content FROM chat_messages m WHERE m.session_id = s.id ORDER BY m.seq DESC LIMIT 1) AS last_message
     FROM chat_sessions s
     WHERE s.user_id = $1
     ORDER BY s.updated_at DESC`,
    [userId],
  );
  return rows.map((r) => ({
    ...mapSession(r),
    messageCount: toInt(r.message_count, 0),
    lastMessage: strOrNull(r.last_message),
  }));
}

export async function addChatMessage(sessionId: string, role: MessageRole, content: string) {
  const rows = await q(
    `INSERT INTO chat_messages (id, session_id, role, content, created_at)
     VALUES ($1, $2, $3, $4, $5) RETURNING *`,
    [nanoid(), sessionId, role, content, nowIso()],
  );
  return mapMessage(rows[0] ?? {});
}

export async function listChatMessages(sessionId: string) {
  const rows = await q("SELECT * FROM chat_messages WHERE session_id = $1 ORDER BY seq ASC", [sessionId]);
  return rows.map(mapMessage);
}

export async function touchChatSession(id: string) {
  await q("UPDATE chat_sessions SET updated_at = $2 WHERE id = $1", [id, nowIso()]);
}

export async function setChatSessionTitle(id: string, title: string) {
  await q("UPDATE chat_sessions SET title = $2 WHERE id = $1", [id, title]);
}

/** Finalizes a still-active session; false when another request got there first. */
export async function finalizeChatSession(id: string, goalId: string, title: string, db: Query = q) {
  const rows = await db(
    `UPDATE chat_sessions SET status = 'finalized', goal_id = $2, title = $3, updated_at = $4
     WHERE id = $1 AND status = 'active' RETURNING id`,
    [id, goalId, title, nowIso()],
  );
  return rows.length > 0;
}

export async function deleteChatSession(id: string) {
  await q("DELETE FROM chat_sessions WHERE id = $1", [id]);
}

export async function chatActivityForUser(userId: string) {
  const rows = await q(
    `SELECT
       (SELECT COUNT(*) FROM chat_sessions WHERE user_id = $1)::int AS sessions,
       (SELECT COUNT(*) FROM chat_messages m JOIN chat_sessions s ON s.id = m.session_id WHERE s.user_id = $1)::int AS messages`,
    [userId],
  );
  const r = rows[0] ?? {};
  return { sessions: toInt(r.sessions, 0), messages: toInt(r.messages, 0) };
}

/** -------- System prompts -------- */

export async function getSystemPrompt(key: string) {
  const rows = await q("SELECT content FROM system_prompts WHERE key = $1 AND is_active = TRUE", [key]);
  const content = rows[0]?.content;
  return typeof content === "string" && content.trim() ? content : null;
}

/** Inserts when missing; returns false if the key already existed. */
export async function insertSystemPromptIfMissing(key: string, description: string, content: string) {
  const now = nowIso();
  const rows = await q(
    `INSERT INTO system_prompts (id, key, description, content, is_active, created_at, updated_at)
     VALUES ($1, $2, $3, $4, TRUE, $5, $5)
     ON CONFLICT (key) DO NOTHING
     RETURNING id`,
    [nanoid(), key, description, content, now],
  );
  return rows.length > 0;
}

/** -------- AI evaluations -------- */

function mapEvaluation(r: Row): AiEvaluation {
  return {
    id: str(r.id),
    userId: str(r.user_id),
    sessionId: strOrNull(r.session_id),
    metric: pickEnum(EVALUATION_METRICS, r.metric, "coaching_quality"),
    score: toNumOrNull(r.score) ?? 0,
    reason: str(r.reason),
    details: readJsonbObject(r.details),
    createdAt: str(r.created_at),
  };
}

export async function recordEvaluation(params: {
  userId: string;
  sessionId?: string | null;
  metric: EvaluationMetric;
  score: number;
  reason: string;
  details?: Record<string, unknown>;
}) {
  const rows = await q(
    `INSERT INTO ai_evaluations (id, user_id, session_id, metric, score, reason, details, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7::jsonb, $8) RETURNING *`,
    [
      nanoid(),
      params.userId,
      params.sessionId ?? null,
      params.metric,
      params.score,
      params.reason,
      JSON.stringify(params.details ?? {}),
      nowIso(),
    ],
  );
  return mapEvaluation(rows[0] ?? {});
}

export async function listEvaluations(userId: string, limit: number) {
  const rows = await q("SELECT * FROM ai_evaluations WHERE user_id = $1 ORDER BY created_at DESC LIMIT $2", [
    userId,
    limit,
  ]);
  return rows.map(mapEvaluation);
}

export type MetricAggregate = { metric: EvaluationMetric; count: number; avgScore: number | null };

export async function evaluationAggregates(userId: string, sinceIso?: string): Promise<MetricAggregate[]> {
  const rows = await q(
    `SELECT metric, COUNT(*)::int AS count, AVG(score) AS avg_score
     FROM ai_evaluations
     WHERE user_id = $1 AND ($2::text IS NULL OR created_at >= $2)
     GROUP BY metric`,
    [userId, sinceIso ?? null],
  );
  return rows.map((r) => ({
    metric: pickEnum(EVALUATION_METRICS, r.metric, "coaching_quality"),
    count: toInt(r.count, 0),
    avgScore: toNumOrNull(r.avg_score),
  }));
}

export const COACHING_DIMENSIONS = ["smart_alignment", "motivational_quality", "actionability", "clarity"] as const;
export type CoachingDimension = (typeof COACHING_DIMENSIONS)[number];

export async function coachingDimensionAverages(userId: string, sinceIso: string) {
  const rows = await q(
    `SELECT
       AVG((details->>'smart_alignment')::double precision) AS smart_alignment,
       AVG((details->>'motivational_quality')::double precision) AS motivational_quality,
       AVG((details->>'actionability')::double precision) AS actionability,
       AVG((details->>'clarity')::double precision) AS clarity
     FROM ai_evaluations
     WHERE user_id = $1 AND metric = 'coaching_quality' AND created_at >= $2`,
    [userId, sinceIso],
  );
  const r = rows[0] ?? {};
  const out: Record<CoachingDimension, number | null> = {
    smart_alignment: null,
    motivational_quality: null,
    actionability: null,
    clarity: null,
  };
  for (const d of COACHING_DIMENSIONS) out[d] = toNumOrNull(r[d]);
  return out;
}

/** -------- Habit loops -------- */

function mapHabitLoop(r: Row): HabitLoop {
  return {
    id: str(r.id),
    userId: str(r.user_id),
    taskId: strOrNull(r.task_id),
    goalId: strOrNull(r.goal_id),
    name: str(r.name),
    description: strOrNull(r.description),
    cue: str(r.cue),
    routine: str(r.routine),
    reward: str(r.reward),
    strength: pickEnum(HABIT_STRENGTHS, r.strength, "forming"),
    daysTracked: toInt(r.days_tracked, 0),
    currentStreak: toInt(r.current_streak, 0),
    bestStreak: toInt(r.best_streak, 0),
    completionRate: toNumOrNull(r.completion_rate) ?? 0,
    targetTime: strOrNull(r.target_time),
    targetDays: readJsonbArray(r.target_days),
    isActive: bool(r.is_active),
    lastPerformedAt: strOrNull(r.last_performed_at),
    createdAt: str(r.created_at),
    updatedAt: str(r.updated_at),
  };
}

export async function listHabitLoops(userId: string, goalId?: string | null) {
  const rows = await q(
    `SELECT * FROM habit_loops
     WHERE user_id = $1 AND is_active = TRUE AND ($2::text IS NULL OR goal_id = $2)
     ORDER BY updated_at DESC`,
    [userId, goalId ?? null],
  );
  return rows.map(mapHabitLoop);
}

/** Keyed by (user, goal, name): an existing loop is refreshed, not duplicated. */
export async function upsertHabitLoop(params: {
  userId: string;
  goalId: string | null;
  name: string;
  cue: string;
  routine: string;
  reward: string;
  strength: HabitStrength;
  daysTracked: number;
  currentStreak: number;
  completionRate: number;
}) {
  const now = nowIso();
  const existing = await q(
    `SELECT id FROM habit_loops WHERE user_id = $1 AND goal_id IS NOT DISTINCT FROM $2 AND lower(name) = lower($3)`,
    [params.userId, params.goalId, params.name],
  );
  const id = existing[0]?.id;

  if (typeof id === "string") {
    const rows = await q(
      `UPDATE habit_loops SET
         cue = $2, routine = $3, reward = $4, strength = $5,
         days_tracked = $6, current_streak = $7,
         best_streak = GREATEST(best_streak, $7),
         completion_rate = $8, is_active = TRUE, updated_at = $9
       WHERE id = $1 RETURNING *`,
      [
        id,
        params.cue,
        params.routine,
        params.reward,
        params.strength,
        params.daysTracked,
        params.currentStreak,
        params.completionRate,
        now,
      ],
    );
    return mapHabitLoop(rows[0] ?? {});
  }

  const rows = await q(
    `INSERT INTO habit_loops
       (id, user_id, goal_id, name, cue, routine, reward, strength, days_tracked, current_streak, best_streak,
        completion_rate, created_at, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $10, $11, $12, $12) RETURNING *`,
    [
      nanoid(),
      params.userId,
      params.goalId,
      params.name,
      params.cue,
      params.routine,
      params.reward,
      params.strength,
      params.daysTracked,
      params.currentStreak,
      params.completionRate,
      now,
    ],
  );
  return mapHabitLoop(rows[0] ?? {});
}

/** -------- Insights -------- */

function mapInsight(r: Row): UserInsight {
  return {
    id: str(r.id),
    userId: str(r.user_id),
    goalId: strOrNull(r.goal_id),
    insightType: pickEnum(INSIGHT_TYPES, r.insight_type, "pattern"),
    title: str(r.title),
    description: str(r.description),
    sourceAgent: str(r.source_agent),
    importance: toInt(r.importance, 5),
    confidence: toNumOrNull(r.confidence) ?? 0.5,
    isActionable: bool(r.is_actionable),
    actionTaken: bool(r.action_taken),
    data: readJsonbObject(r.data),
    expiresAt: strOrNull(r.expires_at),
    createdAt: str(r.created_at),
  };
}

export async function createInsight(params: {
  userId: string;
  goalId: string | null;
  insightType: InsightType;
  title: string;
  description: string;
  sourceAgent: string;
  importance?: number;
  confidence?: number;
  isActionable?: boolean;
  data?: Record<string, unknown>;
  expiresAt?: string | null;
}) {
  const rows = await q(
    `INSERT INTO user_insights
       (id, user_id, goal_id, insight_type, title, description, source_agent, importance, confidence,
        is_actionable, data, expires_at, created_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11::jsonb, $12, $13) RETURNING *`,
    [
      nanoid(),
      params.userId,
      params.goalId,
      params.insightType,
      params.title.slice(0, 200),
      params.description,
      params.sourceAgent,
      Math.min(10, Math.max(1, Math.round(params.importance ?? 5))),
      Math.min(1, Math.max(0, params.confidence ?? 0.5)),
      params.isActionable ?? true,
      JSON.stringify(params.data ?? {}),
      params.expiresAt ?? null,
      nowIso(),
    ],
  );
  return mapInsight(rows[0] ?? {});
}

export async function listInsights(userId: string, opts: { goalId?: string | null; limit: number }) {
  const rows = await q(
    `SELECT * FROM user_insights
     WHERE user_id = $1
       AND ($2::text IS NULL OR goal_id = $2)
       AND (expires_at IS NULL OR expires_at > $3)
     ORDER BY importance DESC, created_at DESC
     LIMIT $4`,
    [userId, opts.goalId ?? null, nowIso(), opts.limit],
  );
  return rows.map(mapInsight);
}

export async function markInsightActionTaken(userId: string, insightId: string) {
  const rows = await q(
    `UPDATE user_insights SET action_taken = TRUE WHERE id = $1 AND user_id = $2 RETURNING *`,
    [insightId, userId],
  );
  return rows[0] ? mapInsight(rows[0]) : null;
}

/** -------- Daily progress -------- */

function mapDailyProgress(r: Row): DailyProgress {
  return {
    id: str(r.id),
    userId: str(r.user_id),
    goalId: str(r.goal_id),
    date: str(r.date),
    tasksPlanned: toInt(r.tasks_planned, 0),
    tasksCompleted: toInt(r.tasks_completed, 0),
    tasksSkipped: toInt(r.tasks_skipped, 0),
    completionRate: toNumOrNull(r.completion_rate) ?? 0,
    totalMinutesLogged: toInt(r.total_minutes_logged, 0),
    moodScore: toNumOrNull(r.mood_score),
    energyLevel: toNumOrNull(r.energy_level),
    notes: strOrNull(r.notes),
    createdAt: str(r.created_at),
    updatedAt: str(r.updated_at),
  };
}

/** One row per (user, goal, day); later check-ins that day overwrite counts, keep earlier mood/notes if omitted. */
export async function upsertDailyProgress(params: {
  userId: string;
  goalId: string;
  date: string;
  tasksPlanned: number;
  tasksCompleted: number;
  tasksSkipped: number;
  totalMinutesLogged: number;
  moodScore?: number | null;
  energyLevel?: number | null;
  notes?: string | null;
}) {
  const now = nowIso();
  const rate = params.tasksPlanned > 0 ? params.tasksCompleted / params.tasksPlanned : 0;
  const rows = await q(
    `INSERT INTO daily_progress
       (id, user_id, goal_id, date, tasks_planned, tasks_completed, tasks_skipped, completion_rate,
        total_minutes_logged, mood_score, energy_level, notes, created_at, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $13)
     ON CONFLICT (user_id, goal_id, date) DO UPDATE SET
       tasks_planned = EXCLUDED.tasks_planned,
       tasks_completed = EXCLUDED.tasks_completed,
       tasks_skipped = EXCLUDED.tasks_skipped,
       completion_rate = EXCLUDED.completion_rate,
       total_minutes_logged = EXCLUDED.total_minutes_logged,
       mood_score = COALESCE(EXCLUDED.mood_score, daily_progress.mood_score),
       energy_level = COALESCE(EXCLUDED.energy_level, daily_progress.energy_level),
       notes = COALESCE(EXCLUDED.notes, daily_progress.notes),
       updated_at = EXCLUDED.updated_at
     RETURNING *`,
    [
      nanoid(),
      params.userId,
      params.goalId,
      params.date,
      params.tasksPlanned,
      params.tasksCompleted,
      params.tasksSkipped,
      rate,
      params.totalMinutesLogged,
      params.moodScore ?? null,
      params.energyLevel ?? null,
      params.notes?.trim() || null,
      now,
    ],
  );
  return mapDailyProgress(rows[0] ?? {});
}

export async function listDailyProgress(userId: string, opts: { goalId?: string | null; sinceDayKey: string }) {
  const rows = await q(
    `SELECT * FROM daily_progress
     WHERE user_id = $1 AND ($2::text IS NULL OR goal_id = $2) AND date >= $3
     ORDER BY date DESC`,
    [userId, opts.goalId ?? null, opts.sinceDayKey],
  );
  return rows.map(mapDailyProgress);
}
