import pg from "pg";
import type { PoolClient, QueryResultRow } from "pg";
import { getConfig } from "./config.js";
import { logger } from "./logger.js";

const { Pool } = pg;

/** Runs one parameterized statement and returns its rows. */
export type Query = <T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]) => Promise<T[]>;

let pool: pg.Pool | null = null;

function getPool() {
  if (pool) return pool;

  const { databaseUrl, pgSslRequired } = getConfig();
  if (!databaseUrl) {
    throw new Error("DATABASE_URL is not set. Point it at a Postgres database.");
  }

  pool = new Pool({
    connectionString: databaseUrl,
    ssl: pgSslRequired ? { rejectUnauthorized: false } : undefined,
  });
  pool.on("error", (err) => logger.error("Idle Postgres client error", { error: err.message }));
  return pool;
}

export const q: Query = async (text, params = []) => {
  const res = await getPool().query(text, params);
  return res.rows;
};

function clientQuery(client: PoolClient): Query {
  return async (text, params = []) => {
    const res = await client.query(text, params);
    return res.rows;
  };
}

/** BEGIN / COMMIT on a single client; ROLLBACK and rethrow on failure. */
export async function withTransaction<T>(fn: (tx: Query) => Promise<T>): Promise<T> {
  const client = await getPool().connect();
  try {
    await client.query("BEGIN");
    const result = await fn(clientQuery(client));
    await client.query("COMMIT");
    return result;
  } catch (err) {
    await client.query("ROLLBACK").catch((rollbackErr: unknown) =>
      logger.error("Rollback failed", { error: String(rollbackErr) }),
    );
    throw err;
  } finally {
    client.release();
  }
}

export async function closeDb() {
  if (!pool) return;
  const p = pool;
  pool = null;
  await p.end();
}

/**
 * pg does NOT allow multiple SQL commands in one prepared statement,
 * so statements run one by one.
 */
export async function execMany(statements: string[]) {
  for (const s of statements) {
    const sql = s.trim();
    if (!sql) continue;
    await q(sql);
  }
}

export function nowIso() {
  return new Date().toISOString();
}

export function dayKeyFromIso(iso: string) {
  return iso.slice(0, 10);
}

export function toInt(v: unknown, fallback: number) {
  const n = Number(v);
  return Number.isFinite(n) ? Math.trunc(n) : fallback;
}

export function toNumOrNull(v: unknown): number | null {
  if (v === null || v === undefined) return null;
  const n = Number(v);
  return Number.isFinite(n) ? n : null;
}

export function normalizeStringList(value: unknown, max = 20): string[] {
  if (!Array.isArray(value)) return [];
  return value
    .map((t) => String(t ?? "").trim())
    .filter(Boolean)
    .slice(0, max);
}

/**
 * JSONB reader: pg usually hands back parsed arrays, some type parsers
 * return strings.
 */
export function readJsonbArray(value: unknown): string[] {
  if (Array.isArray(value)) return normalizeStringList(value, 50);
  if (typeof value === "string") {
    try {
      return normalizeStringList(JSON.parse(value), 50);
    } catch {
      return [];
    }
  }
  return [];
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function readJsonbObject(value: unknown): Record<string, unknown> {
  if (isRecord(value)) return value;
  if (typeof value === "string") {
    try {
      const parsed: unknown = JSON.parse(value);
      return isRecord(parsed) ? parsed : {};
    } catch {
      return {};
    }
  }
  return {};
}

/**
 * Creates tables if missing, then indexes.
 * Ids are nanoid text, timestamps ISO text (UTC).
 */
export async function ensureDb() {
  await execMany([
    `
    CREATE TABLE IF NOT EXISTS users (
      id TEXT PRIMARY KEY,
      email TEXT NOT NULL UNIQUE,
      password_hash TEXT,
      name TEXT,
      avatar_url TEXT,
      auth_provider TEXT NOT NULL DEFAULT 'email',
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      token_limit INTEGER NOT NULL DEFAULT 100000,
      tokens_used INTEGER NOT NULL DEFAULT 0,
      quota_reset_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS user_profiles (
      user_id TEXT PRIMARY KEY REFERENCES users(id) ON DELETE CASCADE,
      learning_style TEXT,
      motivation_type TEXT,
      personality_type TEXT,
      best_time_of_day TEXT,
      best_days JSONB NOT NULL DEFAULT '[]'::jsonb,
      avg_focus_duration INTEGER,
      preferred_goal_type TEXT,
      preferred_task_size TEXT,
      total_goals_completed INTEGER NOT NULL DEFAULT 0,
      total_tasks_completed INTEGER NOT NULL DEFAULT 0,
      avg_completion_rate DOUBLE PRECISION NOT NULL DEFAULT 0,
      longest_streak INTEGER NOT NULL DEFAULT 0,
      current_stress_level INTEGER NOT NULL DEFAULT 5,
      current_motivation_level INTEGER NOT NULL DEFAULT 5,
      current_confidence_level INTEGER NOT NULL DEFAULT 5,
      preferred_reminder_frequency TEXT NOT NULL DEFAULT 'daily',
      preferred_communication_style TEXT NOT NULL DEFAULT 'supportive',
      strengths JSONB NOT NULL DEFAULT '[]'::jsonb,
      challenges JSONB NOT NULL DEFAULT '[]'::jsonb,
      values_json JSONB NOT NULL DEFAULT '[]'::jsonb,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS chat_sessions (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      title TEXT,
      status TEXT NOT NULL DEFAULT 'active',
      goal_id TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS chat_messages (
      id TEXT PRIMARY KEY,
      seq BIGSERIAL,
      session_id TEXT NOT NULL REFERENCES chat_sessions(id) ON DELETE CASCADE,
      role TEXT NOT NULL,
      content TEXT NOT NULL,
      created_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS goals (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      chat_session_id TEXT REFERENCES chat_sessions(id) ON DELETE SET NULL,
      title TEXT NOT NULL,
      description TEXT,
      category TEXT NOT NULL DEFAULT 'other',
      target_date TEXT,
      status TEXT NOT NULL DEFAULT 'active',
      progress INTEGER NOT NULL DEFAULT 0,
      goal_type TEXT NOT NULL DEFAULT 'long_term',
      motivation_score INTEGER,
      feasibility_score INTEGER,
      clarity_score INTEGER,
      smart_specific TEXT,
      smart_measurable TEXT,
      smart_achievable TEXT,
      smart_relevant TEXT,
      smart_time_bound TEXT,
      sustainability_score INTEGER,
      burnout_risk TEXT,
      identified_obstacles JSONB NOT NULL DEFAULT '[]'::jsonb,
      success_criteria JSONB NOT NULL DEFAULT '[]'::jsonb,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS milestones (
      id TEXT PRIMARY KEY,
      goal_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT,
      target_date TEXT,
      sort_order INTEGER NOT NULL DEFAULT 0,
      is_completed BOOLEAN NOT NULL DEFAULT FALSE,
      completed_at TEXT,
      created_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS tasks (
      id TEXT PRIMARY KEY,
      milestone_id TEXT NOT NULL REFERENCES milestones(id) ON DELETE CASCADE,
      goal_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
      title TEXT NOT NULL,
      description TEXT,
      due_date TEXT,
      status TEXT NOT NULL DEFAULT 'pending',
      priority TEXT NOT NULL DEFAULT 'medium',
      completed_at TEXT,
      frequency TEXT NOT NULL DEFAULT 'one_time',
      estimated_minutes INTEGER,
      streak_count INTEGER NOT NULL DEFAULT 0,
      best_streak INTEGER NOT NULL DEFAULT 0,
      last_completed_at TEXT,
      times_completed INTEGER NOT NULL DEFAULT 0,
      times_skipped INTEGER NOT NULL DEFAULT 0,
      habit_cue TEXT,
      habit_reward TEXT,
      created_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS habit_loops (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      task_id TEXT REFERENCES tasks(id) ON DELETE SET NULL,
      goal_id TEXT REFERENCES goals(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      description TEXT,
      cue TEXT NOT NULL,
      routine TEXT NOT NULL,
      reward TEXT NOT NULL,
      strength TEXT NOT NULL DEFAULT 'forming',
      days_tracked INTEGER NOT NULL DEFAULT 0,
      current_streak INTEGER NOT NULL DEFAULT 0,
      best_streak INTEGER NOT NULL DEFAULT 0,
      completion_rate DOUBLE PRECISION NOT NULL DEFAULT 0,
      target_time TEXT,
      target_days JSONB NOT NULL DEFAULT '[]'::jsonb,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      last_performed_at TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS user_insights (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      goal_id TEXT REFERENCES goals(id) ON DELETE CASCADE,
      insight_type TEXT NOT NULL,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      source_agent TEXT NOT NULL,
      importance INTEGER NOT NULL DEFAULT 5,
      confidence DOUBLE PRECISION NOT NULL DEFAULT 0.5,
      is_actionable BOOLEAN NOT NULL DEFAULT TRUE,
      action_taken BOOLEAN NOT NULL DEFAULT FALSE,
      data JSONB NOT NULL DEFAULT '{}'::jsonb,
      expires_at TEXT,
      created_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS daily_progress (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      goal_id TEXT NOT NULL REFERENCES goals(id) ON DELETE CASCADE,
      date TEXT NOT NULL,
      tasks_planned INTEGER NOT NULL DEFAULT 0,
      tasks_completed INTEGER NOT NULL DEFAULT 0,
      tasks_skipped INTEGER NOT NULL DEFAULT 0,
      completion_rate DOUBLE PRECISION NOT NULL DEFAULT 0,
      total_minutes_logged INTEGER NOT NULL DEFAULT 0,
      mood_score INTEGER,
      energy_level INTEGER,
      notes TEXT,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL,
      UNIQUE (user_id, goal_id, date)
    )`,
    `
    CREATE TABLE IF NOT EXISTS system_prompts (
      id TEXT PRIMARY KEY,
      key TEXT NOT NULL UNIQUE,
      description TEXT,
      content TEXT NOT NULL,
      is_active BOOLEAN NOT NULL DEFAULT TRUE,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )`,
    `
    CREATE TABLE IF NOT EXISTS ai_evaluations (
      id TEXT PRIMARY KEY,
      user_id TEXT NOT NULL REFERENCES users(id) ON DELETE CASCADE,
      session_id TEXT REFERENCES chat_sessions(id) ON DELETE SET NULL,
      metric TEXT NOT NULL,
      score DOUBLE PRECISION NOT NULL,
      reason TEXT NOT NULL,
      details JSONB NOT NULL DEFAULT '{}'::jsonb,
      created_at TEXT NOT NULL
    )`,
  ]);

  await execMany([
    `CREATE INDEX IF NOT EXISTS idx_chat_sessions_user_updated ON chat_sessions(user_id, updated_at DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_chat_messages_session_created ON chat_messages(session_id, seq ASC)`,
    `CREATE INDEX IF NOT EXISTS idx_goals_user_created ON goals(user_id, created_at DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_milestones_goal_order ON milestones(goal_id, sort_order)`,
    `CREATE INDEX IF NOT EXISTS idx_tasks_milestone ON tasks(milestone_id)`,
    `CREATE INDEX IF NOT EXISTS idx_tasks_goal_status ON tasks(goal_id, status)`,
    `CREATE INDEX IF NOT EXISTS idx_tasks_completed_at ON tasks(goal_id, completed_at)`,
    `CREATE INDEX IF NOT EXISTS idx_habit_loops_user ON habit_loops(user_id, is_active)`,
    `CREATE INDEX IF NOT EXISTS idx_insights_user_created ON user_insights(user_id, created_at DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_daily_progress_user_date ON daily_progress(user_id, date DESC)`,
    `CREATE INDEX IF NOT EXISTS idx_ai_evaluations_user_created ON ai_evaluations(user_id, created_at DESC)`,
  ]);

  logger.info("Database schema ready");
}
