import type { Express } from "express";
import { z } from "zod";
import {
  AGENT_TYPES,
  agentInfo,
  executionAgent,
  loadAgentContext,
  psychologicalAgent,
  routeAgent,
  runIntakePipeline,
  supportAgent,
  sustainabilityAgent,
  type AgentResult,
} from "../agents.js";
import { authOf, requireAuth } from "../auth.js";
import { performCheckin } from "../checkin.js";
import { validationError, wrap } from "../errors.js";
import { agentResultJson, dailyProgressJson } from "../serializers.js";
import { GOAL_TYPES, MESSAGE_ROLES } from "../types.js";

const MessageItem = z.object({
  role: z.enum(MESSAGE_ROLES).default("user"),
  content: z.string().max(5000),
});

const RouteSchema = z.object({
  messages: z.array(MessageItem).max(100).default([]),
  goal_id: z.string().min(1).nullish(),
  session_id: z.string().min(1).nullish(),
  agent_type: z.enum(AGENT_TYPES).optional(),
  request_type: z.string().max(50).optional(),
});

const IntakeSchema = z.object({
  initial_message: z.string().trim().min(1).max(5000),
  session_id: z.string().min(1).nullish(),
});

const PlanSchema = z.object({
  goal_summary: z.string().trim().min(1).max(5000),
  goal_type: z.enum(GOAL_TYPES).default("long_term"),
  motivation_score: z.number().int().min(1).max(10).default(7),
  feasibility_score: z.number().int().min(1).max(10).default(7),
  obstacles: z.array(z.string().max(500)).max(20).default([]),
  goal_id: z.string().min(1).nullish(),
});

const CheckinSchema = z.object({
  goal_id: z.string().min(1),
  completed_task_ids: z.array(z.string().min(1)).max(200).default([]),
  notes: z.string().max(2000).nullish(),
  mood_score: z.number().int().min(1).max(10).nullish(),
  energy_level: z.number().int().min(1).max(10).nullish(),
});

const MotivationSchema = z.object({
  message: z.string().trim().min(1).max(5000),
  goal_id: z.string().min(1).nullish(),
});

const GoalQuery = z.object({ goal_id: z.string().min(1).optional() });

/** A field of the agent's output, null when the agent failed or left it out. */
function field(result: AgentResult<Record<string, unknown>>, key: string) {
  return result.data?.[key] ?? null;
}

function outcome(result: AgentResult<Record<string, unknown>>) {
  return { agent_type: result.agentType, success: result.success, message: result.message };
}

export function registerAgentRoutes(app: Express) {
  app.get(
    "/api/agents/info",
    requireAuth,
    wrap(async (_req, res) => {
      const agents = agentInfo();
      return res.json({ agents, total_agents: agents.length });
    }),
  );

  app.post(
    "/api/agents/route",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = RouteSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const additional: Record<string, unknown> = {};
      if (parsed.data.agent_type) additional.agent_type = parsed.data.agent_type;
      if (parsed.data.request_type) additional.request_type = parsed.data.request_type;

      const ctx = await loadAgentContext(authOf(req).userId, {
        goalId: parsed.data.goal_id,
        sessionId: parsed.data.session_id,
        messages: parsed.data.messages,
        additional,
        withTasks: true,
      });
      return res.json(agentResultJson(await routeAgent(ctx)));
    }),
  );

  app.post(
    "/api/agents/intake",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = IntakeSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const ctx = await loadAgentContext(authOf(req).userId, {
        sessionId: parsed.data.session_id,
        messages: [{ role: "user", content: parsed.data.initial_message }],
        additional: { agent_type: "foundation" },
      });
      return res.json(agentResultJson(await routeAgent(ctx)));
    }),
  );

  app.post(
    "/api/agents/plan",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = PlanSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);
      const b = parsed.data;

      const ctx = await loadAgentContext(authOf(req).userId, {
        goalId: b.goal_id,
        messages: [{ role: "user", content: b.goal_summary }],
        additional: {
          agent_type: "planning",
          previous_agent: "foundation",
          previous_output: {
            goal_summary: b.goal_summary,
            goal_type: b.goal_type,
            motivation_score: b.motivation_score,
            feasibility_score: b.feasibility_score,
            identified_obstacles: b.obstacles,
          },
        },
      });
      const result = await routeAgent(ctx);
      return res.json({
        ...outcome(result),
        smart_goal: field(result, "smart_goal"),
        milestones: field(result, "milestones"),
        task_schedule: field(result, "task_schedule"),
        critical_path: field(result, "critical_path"),
        total_estimated_hours: field(result, "total_estimated_hours"),
      });
    }),
  );

  app.get(
    "/api/agents/daily",
    requireAuth,
    wrap(async (req, res) => {
      const query = GoalQuery.safeParse(req.query);
      if (!query.success) throw validationError(query.error);

      const ctx = await loadAgentContext(authOf(req).userId, {
        goalId: query.data.goal_id,
        additional: { request_type: "daily_summary" },
        withTasks: true,
      });
      const result = await executionAgent.process(ctx);
      return res.json({
        ...outcome(result),
        daily_summary: field(result, "daily_summary"),
        next_actions: field(result, "next_actions"),
        blockers_identified: field(result, "blockers_identified"),
        motivational_message: field(result, "motivational_message"),
      });
    }),
  );

  app.post(
    "/api/agents/checkin",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = CheckinSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const { results, dailyProgress } = await performCheckin(authOf(req).userId, {
        goalId: parsed.data.goal_id,
        completedTaskIds: parsed.data.completed_task_ids,
        notes: parsed.data.notes,
        moodScore: parsed.data.mood_score,
        energyLevel: parsed.data.energy_level,
      });
      return res.json({
        execution: agentResultJson(results.execution),
        sustainability: agentResultJson(results.sustainability),
        psychological: results.psychological ? agentResultJson(results.psychological) : null,
        daily_progress: dailyProgressJson(dailyProgress),
      });
    }),
  );

  app.get(
    "/api/agents/insights",
    requireAuth,
    wrap(async (req, res) => {
      const query = GoalQuery.safeParse(req.query);
      if (!query.success) throw validationError(query.error);

      const ctx = await loadAgentContext(authOf(req).userId, {
        goalId: query.data.goal_id,
        additional: { request_type: "pattern_analysis" },
        withTasks: true,
      });
      const result = await sustainabilityAgent.process(ctx);
      return res.json({
        ...outcome(result),
        habit_analysis: field(result, "habit_analysis"),
        pattern_insights: field(result, "pattern_insights"),
        sustainability_score: field(result, "sustainability_score"),
        burnout_risk: field(result, "burnout_risk"),
        recommendations: field(result, "recommendations"),
      });
    }),
  );

  app.get(
    "/api/agents/resources",
    requireAuth,
    wrap(async (req, res) => {
      const query = GoalQuery.safeParse(req.query);
      if (!query.success) throw validationError(query.error);

      const ctx = await loadAgentContext(authOf(req).userId, {
        goalId: query.data.goal_id,
        additional: { request_type: "resources" },
      });
      const result = await supportAgent.process(ctx);
      return res.json({
        ...outcome(result),
        recommended_resources: field(result, "recommended_resources"),
        integration_suggestions: field(result, "integration_suggestions"),
        community_matches: field(result, "community_matches"),
        expert_recommendations: field(result, "expert_recommendations"),
      });
    }),
  );

  app.post(
    "/api/agents/motivation",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = MotivationSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const ctx = await loadAgentContext(authOf(req).userId, {
        goalId: parsed.data.goal_id,
        messages: [{ role: "user", content: parsed.data.message }],
        additional: { request_type: "motivation" },
        withTasks: true,
      });
      const result = await psychologicalAgent.process(ctx);
      return res.json({
        ...outcome(result),
        emotional_assessment: field(result, "emotional_assessment"),
        intervention: field(result, "intervention"),
        affirmations: field(result, "affirmations"),
        progress_celebration: field(result, "progress_celebration"),
      });
    }),
  );

  app.post(
    "/api/agents/pipeline/intake",
    requireAuth,
    wrap(async (req, res) => {
      const parsed = IntakeSchema.safeParse(req.body);
      if (!parsed.success) throw validationError(parsed.error);

      const ctx = await loadAgentContext(authOf(req).userId, {
        sessionId: parsed.data.session_id,
        messages: [{ role: "user", content: parsed.data.initial_message }],
      });
      const { foundation, planning } = await runIntakePipeline(ctx);
      return res.json({
        success: foundation.success && (planning?.success ?? false),
        foundation: agentResultJson(foundation),
        planning: planning ? agentResultJson(planning) : null,
      });
    }),
  );
}
