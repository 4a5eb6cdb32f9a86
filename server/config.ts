import dotenv from "dotenv";
import { z } from "zod";

dotenv.config();

const UNIT_SECONDS: Record<string, number> = { s: 1, m: 60, h: 3600, d: 86400 };

/** "90", "15m", "24h", "7d" → seconds */
export function durationToSeconds(v: string): number | null {
  const m = v.trim().match(/^(\d+)\s*([smhd])?$/i);
  if (!m) return null;
  const unit = (m[2] || "s").toLowerCase();
  return Number(m[1]) * (UNIT_SECONDS[unit] ?? 1);
}

const BoolFromEnv = z
  .string()
  .optional()
  .transform((v) => {
    if (v === undefined || v.trim() === "") return undefined;
    return ["1", "true", "yes", "on"].includes(v.trim().toLowerCase());
  });

const OptionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  DATABASE_URL: OptionalString,
  PGSSLMODE: OptionalString,
  JWT_SECRET: z.string().trim().min(16, "JWT_SECRET must be at least 16 characters"),
  JWT_EXPIRES_IN: z
    .string()
    .default("7d")
    .refine((v) => durationToSeconds(v) !== null, "use seconds or a number with s, m, h or d"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).optional(),

  OPENAI_API_KEY: OptionalString,
  AI_MODEL: z.string().default("gpt-4o-mini"),
  AI_EVALUATION_ENABLED: BoolFromEnv,

  FRONTEND_URL: z.string().default("http://localhost:5173"),
  CORS_ORIGINS: z.string().default("http://localhost:5173,http://127.0.0.1:5173"),

  GOOGLE_CLIENT_ID: OptionalString,
  GOOGLE_CLIENT_SECRET: OptionalString,
  GOOGLE_REDIRECT_URI: OptionalString,
  GITHUB_CLIENT_ID: OptionalString,
  GITHUB_CLIENT_SECRET: OptionalString,
  GITHUB_REDIRECT_URI: OptionalString,
});

export type OAuthClientConfig = {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
};

export type AppConfig = {
  env: "development" | "test" | "production";
  port: number;
  databaseUrl: string | undefined;
  pgSslRequired: boolean;
  jwtSecret: string;
  jwtExpiresInSeconds: number;
  openaiApiKey: string | undefined;
  aiModel: string;
  aiEvaluationEnabled: boolean;
  frontendUrl: string;
  corsOrigins: string[];
  google: OAuthClientConfig | null;
  github: OAuthClientConfig | null;
};

function oauthClient(
  clientId: string | undefined,
  clientSecret: string | undefined,
  redirectUri: string | undefined,
): OAuthClientConfig | null {
  if (!clientId || !clientSecret || !redirectUri) return null;
  return { clientId, clientSecret, redirectUri };
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const keys = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration (${keys})`);
  }
  const e = parsed.data;

  const databaseUrl = e.DATABASE_URL;
  const pgSslRequired =
    (e.PGSSLMODE || "").toLowerCase() === "require" ||
    (databaseUrl ?? "").toLowerCase().includes("sslmode=require");

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    databaseUrl,
    pgSslRequired,
    jwtSecret: e.JWT_SECRET,
    jwtExpiresInSeconds: durationToSeconds(e.JWT_EXPIRES_IN) ?? 7 * 86400,
    openaiApiKey: e.OPENAI_API_KEY,
    aiModel: e.AI_MODEL,
    aiEvaluationEnabled: e.AI_EVALUATION_ENABLED ?? true,
    frontendUrl: e.FRONTEND_URL.replace(/\/+$/, ""),
    corsOrigins: e.CORS_ORIGINS.split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    google: oauthClient(e.GOOGLE_CLIENT_ID, e.GOOGLE_CLIENT_SECRET, e.GOOGLE_REDIRECT_URI),
    github: oauthClient(e.GITHUB_CLIENT_ID, e.GITHUB_CLIENT_SECRET, e.GITHUB_REDIRECT_URI),
  };
}

let cached: AppConfig | null = null;

/** Parsed once from process.env on first use. */
export function getConfig(): AppConfig {
  if (!cached) cached = parseConfig(process.env);
  return cached;
}

/** Tests change env between cases. */
export function resetConfig() {
  cached = null;
}
