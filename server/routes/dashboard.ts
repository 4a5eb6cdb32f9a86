import type { Express } from "express";
import { authOf, requireAuth } from "../auth.js";
import { notFound, wrap } from "../errors.js";
import { dashboardStats } from "../goals.js";
import { dashboardJson, quotaJson } from "../serializers.js";
import { getUserById } from "../storage.js";

export function registerDashboardRoutes(app: Express) {
  app.get(
    "/api/dashboard/stats",
    requireAuth,
    wrap(async (req, res) => {
      const stats = await dashboardStats(authOf(req).userId);
      return res.json(dashboardJson(stats));
    }),
  );

  app.get(
    "/api/dashboard/quota",
    requireAuth,
    wrap(async (req, res) => {
      const user = await getUserById(authOf(req).userId);
      if (!user) throw notFound("User not found");
      return res.json(quotaJson(user));
    }),
  );
}
