import express, { type Express } from "express";
import path from "node:path";
import cors from "cors";
import helmet from "helmet";
import morgan from "morgan";
import rateLimit from "express-rate-limit";
import { getConfig } from "./config.js";
import { errorHandler, notFound } from "./errors.js";
import { registerRoutes } from "./routes/index.js";

const FIFTEEN_MINUTES = 15 * 60 * 1000;

/** Origins from CORS_ORIGINS; requests without an Origin header (same-origin, curl) pass. */
export function corsOriginCheck(allowed: Set<string>) {
  return (origin: string | undefined, cb: (err: Error | null, ok?: boolean) => void) => {
    if (!origin || allowed.has(origin)) return cb(null, true);
    return cb(new Error("CORS blocked: origin not allowed"));
  };
}

export type AppOptions = {
  /** Serve the built SPA from here; null means it was not found, undefined means API only. */
  frontendDir?: string | null;
  /** Where the SPA was looked for, shown when it is missing. */
  frontendCandidates?: string[];
};

/** Static SPA plus the index.html fallback for client-side routes. */
function mountFrontend(app: Express, dir: string | null, candidates: string[]) {
  if (!dir) {
    app.get("/", (_req, res) => {
      res.status(200).send("API is running. Frontend build not found. Looked in: " + candidates.join(", "));
    });
    return;
  }
  app.use(express.static(dir));
  const index = path.join(dir, "index.html");
  app.get("*", (_req, res, next) => {
    res.sendFile(index, (err) => {
      if (err) next(notFound("Not found"));
    });
  });
}

export function createApp(opts: AppOptions = {}) {
  const config = getConfig();
  const app = express();

  app.set("trust proxy", 1);
  app.disable("x-powered-by");

  app.use(
    cors({
      origin: corsOriginCheck(new Set(config.corsOrigins)),
      credentials: true,
      methods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    }),
  );
  app.use(helmet({ crossOriginResourcePolicy: { policy: "same-site" } }));

  app.use(express.json({ limit: "1mb" }));
  if (config.env !== "test") app.use(morgan("dev"));

  app.use(
    "/api",
    rateLimit({
      windowMs: FIFTEEN_MINUTES,
      max: 300,
      standardHeaders: true,
      legacyHeaders: false,
      message: { error: "Too many requests. Try again later." },
    }),
  );

  // brute-force protection
  const authLimiter = rateLimit({
    windowMs: FIFTEEN_MINUTES,
    max: 30,
    standardHeaders: true,
    legacyHeaders: false,
    message: { error: "Too many auth attempts. Try again later." },
  });
  app.use("/api/auth/login", authLimiter);
  app.use("/api/auth/register", authLimiter);

  registerRoutes(app);

  app.use("/api", (_req, _res, next) => next(notFound("Not found")));
  if (opts.frontendDir !== undefined) mountFrontend(app, opts.frontendDir, opts.frontendCandidates ?? []);
  app.use(errorHandler);

  return app;
}
