import type { Express } from "express";
import { registerAgentRoutes } from "./agents.js";
import { registerAnalyticsRoutes } from "./analytics.js";
import { registerAuthRoutes } from "./auth.js";
import { registerChatRoutes } from "./chat.js";
import { registerDashboardRoutes } from "./dashboard.js";
import { registerGoalRoutes } from "./goals.js";
import { registerProfileRoutes } from "./profile.js";

export function registerRoutes(app: Express) {
  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  registerAuthRoutes(app);
  registerChatRoutes(app);
  registerGoalRoutes(app);
  registerDashboardRoutes(app);
  registerAgentRoutes(app);
  registerProfileRoutes(app);
  registerAnalyticsRoutes(app);
}
