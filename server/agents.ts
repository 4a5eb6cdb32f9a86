// Coaching agents and the coordinator that routes between them.
import { nanoid } from "nanoid";
import { z } from "zod";
import { completeJson } from "./ai.js";
import { dayKeyFromIso, nowIso } from "./db.js";
import { applyGoalAssessment, applySmartBreakdown, getGoal, listTasksForGoal } from "./goals.js";
import { errorContext, logger } from "./logger.js";
import { calculateStreak, percent } from "./progress.js";
import { loadPrompt, type PromptKey } from "./prompts.js";
import { getOrCreateProfile, updateProfile } from "./storage.js";
import { notFound } from "./errors.js";
import {
  BURNOUT_RISKS,
  GOAL_TYPES,
  TASK_FREQUENCIES,
  TASK_PRIORITIES,
  pickEnum,
  type Goal,
  type MessageRole,
  type Task,
  type UserProfile,
} from "./types.js";

export const AGENT_TYPES = [
  "foundation",
  "planning",
  "execution",
  "sustainability",
  "support",
  "psychological",
] as const;
export type AgentType = (typeof AGENT_TYPES)[number];

export function isAgentType(v: unknown): v is AgentType {
  return typeof v === "string" && AGENT_TYPES.some((t) => t === v);
}

export type AgentMessage = { role: MessageRole; content: string };

export type AgentContext = {
  userId: string;
  goalId: string | null;
  sessionId: string | null;
  messages: AgentMessage[];
  userProfile: UserProfile | null;
  currentGoal: Goal | null;
  taskHistory: Task[];
  additional: Record<string, unknown>;
};

type AgentMeta = {
  agentType: AgentType;
  message: string;
  nextAgent: AgentType | null;
  requiresUserInput: boolean;
  timestamp: string;
  traceId: string;
};

export type AgentResult<T> = AgentMeta & ({ success: true; data: T } | { success: false; data: null });

export type Agent<T extends Record<string, unknown>> = {
  type: AgentType;
  name: string;
  description: string;
  process(ctx: AgentContext): Promise<AgentResult<T>>;
};

/** -------- Output schemas -------- */

const text = (fallback = "") => z.string().catch(fallback);
const optionalText = z.string().nullable().catch(null);
const stringList = z.array(z.string()).catch([]);
const jsonObject = z.record(z.unknown()).catch({});
const intIn = (min: number, max: number, fallback: number) =>
  z.coerce
    .number()
    .refine(Number.isFinite)
    .transform((n) => Math.min(max, Math.max(min, Math.round(n))))
    .catch(fallback);
const numIn = (min: number, max: number, fallback: number) =>
  z.coerce
    .number()
    .refine(Number.isFinite)
    .transform((n) => Math.min(max, Math.max(min, n)))
    .catch(fallback);
const oneOf = <T extends string>(values: readonly T[], fallback: T) =>
  z.unknown().transform((v) => pickEnum(values, v, fallback));

/** Keeps the items that parse, drops the rest. */
function listOf<T>(item: z.ZodType<T, z.ZodTypeDef, unknown>) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items.flatMap((raw) => {
        const parsed = item.safeParse(raw);
        return parsed.success ? [parsed.data] : [];
      }),
    );
}

const FoundationSchema = z.object({
  goal_summary: text(),
  goal_type: oneOf(GOAL_TYPES, "long_term"),
  motivation_score: intIn(1, 10, 5),
  feasibility_score: intIn(1, 10, 5),
  clarity_score: intIn(1, 10, 5),
  identified_obstacles: stringList,
  success_criteria: stringList,
  baseline_metrics: jsonObject,
  user_constraints: jsonObject,
  recommended_adjustments: stringList,
  message: text(),
});
export type FoundationOutput = z.infer<typeof FoundationSchema>;

const ScheduleItemSchema = z.object({
  title: z.string().min(1),
  description: optionalText,
  frequency: oneOf(TASK_FREQUENCIES, "one_time"),
  estimated_minutes: intIn(1, 600, 30),
  priority: oneOf(TASK_PRIORITIES, "medium"),
});

const PlanMilestoneSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).catch(""),
  title: z.string().min(1),
  description: optionalText,
  deadline: optionalText,
  success_criteria: stringList,
  tasks: listOf(ScheduleItemSchema),
});

const PlanningSchema = z.object({
  smart_goal: z
    .object({
      specific: text(),
      measurable: text(),
      achievable: text(),
      relevant: text(),
      time_bound: text(),
    })
    .catch({ specific: "", measurable: "", achievable: "", relevant: "", time_bound: "" }),
  milestones: listOf(PlanMilestoneSchema),
  task_schedule: z
    .object({
      daily: listOf(ScheduleItemSchema),
      weekly: listOf(ScheduleItemSchema),
      monthly: listOf(ScheduleItemSchema),
    })
    .catch({ daily: [], weekly: [], monthly: [] }),
  dependencies: listOf(z.record(z.string())),
  total_estimated_hours: intIn(0, 100000, 0),
  critical_path: stringList,
  message: text(),
});
export type PlanningOutput = z.infer<typeof PlanningSchema>;

const ExecutionSchema = z.object({
  adjustments_recommended: stringList,
  blockers_identified: stringList,
  next_actions: stringList,
  motivational_message: text(),
  message: text(),
});

const HabitLoopSchema = z.object({
  cue: z.string().min(1),
  routine: z.string().min(1),
  reward: z.string().min(1),
});

const SustainabilitySchema = z.object({
  habit_analysis: z
    .object({
      habit_score: intIn(0, 100, 0),
      days_consistent: intIn(0, 100000, 0),
      habit_loops: listOf(HabitLoopSchema),
    })
    .catch({ habit_score: 0, days_consistent: 0, habit_loops: [] }),
  pattern_insights: z
    .object({
      best_days: stringList,
      best_times: stringList,
      failure_patterns: stringList,
    })
    .catch({ best_days: [], best_times: [], failure_patterns: [] }),
  sustainability_score: intIn(0, 100, 50),
  burnout_risk: oneOf(BURNOUT_RISKS, "LOW"),
  recommendations: stringList,
  message: text(),
});
export type SustainabilityOutput = z.infer<typeof SustainabilitySchema>;

const RESOURCE_TYPES = ["COURSE", "BOOK", "TOOL", "COMMUNITY", "EXPERT"] as const;

const SupportSchema = z.object({
  recommended_resources: listOf(
    z.object({
      type: oneOf(RESOURCE_TYPES, "TOOL"),
      name: z.string().min(1),
      url: optionalText,
      relevance_score: numIn(0, 1, 0),
      time_commitment: optionalText,
      cost: text("Free"),
    }),
  ),
  integration_suggestions: stringList,
  community_matches: stringList,
  expert_recommendations: stringList,
  message: text(),
});

const PsychologicalSchema = z.object({
  emotional_assessment: z
    .object({
      motivation_level: intIn(1, 10, 5),
      stress_level: intIn(1, 10, 5),
      confidence_level: intIn(1, 10, 5),
      detected_patterns: stringList,
    })
    .catch({ motivation_level: 5, stress_level: 5, confidence_level: 5, detected_patterns: [] }),
  intervention: z
    .object({
      type: text(),
      technique: text(),
      message: text(),
      exercises: stringList,
    })
    .nullable()
    .catch(null),
  affirmations: stringList,
  progress_celebration: text(),
  message: text(),
});
export type PsychologicalOutput = z.infer<typeof PsychologicalSchema>;

/** -------- Prompt context -------- */

function section(title: string, body: string | null) {
  return body ? `## ${title}\n${body}` : null;
}

function goalBrief(g: Goal) {
  return {
    title: g.title,
    description: g.description,
    category: g.category,
    target_date: g.targetDate,
    status: g.status,
    progress: g.progress,
    goal_type: g.goalType,
    smart_specific: g.smartSpecific,
    identified_obstacles: g.identifiedObstacles,
  };
}

function profileBrief(p: UserProfile) {
  return {
    learning_style: p.learningStyle,
    motivation_type: p.motivationType,
    personality_type: p.personalityType,
    best_time_of_day: p.bestTimeOfDay,
    preferred_task_size: p.preferredTaskSize,
    preferred_communication_style: p.preferredCommunicationStyle,
    current_stress_level: p.currentStressLevel,
    current_motivation_level: p.currentMotivationLevel,
    current_confidence_level: p.currentConfidenceLevel,
    strengths: p.strengths,
    challenges: p.challenges,
  };
}

function taskLine(t: Task) {
  const extra = [`priority ${t.priority}`, `frequency ${t.frequency}`];
  if (t.completedAt) extra.push(`completed ${t.completedAt.slice(0, 10)}`);
  if (t.streakCount > 0) extra.push(`streak ${t.streakCount}`);
  if (t.timesSkipped > 0) extra.push(`skipped ${t.timesSkipped}x`);
  return `- [${t.status}] ${t.title} (${extra.join(", ")})`;
}

function checkinLine(additional: Record<string, unknown>) {
  const parts: string[] = [];
  if (typeof additional.mood_score === "number") parts.push(`mood ${additional.mood_score}/10`);
  if (typeof additional.energy_level === "number") parts.push(`energy ${additional.energy_level}/10`);
  return parts.length ? parts.join(", ") : null;
}

export function describeContext(ctx: AgentContext, extra: Array<string | null> = []) {
  const previous = ctx.additional.previous_output;
  const previousAgent = typeof ctx.additional.previous_agent === "string" ? ctx.additional.previous_agent : "previous";

  const parts = [
    section("Today", dayKeyFromIso(nowIso())),
    section("Goal", ctx.currentGoal ? JSON.stringify(goalBrief(ctx.currentGoal), null, 2) : null),
    section("User profile", ctx.userProfile ? JSON.stringify(profileBrief(ctx.userProfile), null, 2) : null),
    section("Task history", ctx.taskHistory.length ? ctx.taskHistory.slice(0, 60).map(taskLine).join("\n") : null),
    section(`Output of the ${previousAgent} agent`, previous !== undefined ? JSON.stringify(previous, null, 2) : null),
    section("Check-in", checkinLine(ctx.additional)),
    ...extra,
    section(
      "Conversation",
      ctx.messages.length
        ? ctx.messages
            .slice(-10)
            .map((m) => `${m.role.toUpperCase()}: ${m.content}`)
            .join("\n")
        : null,
    ),
  ];
  return parts.filter((p): p is string => p !== null).join("\n\n");
}

export type DailySummary = {
  tasks_completed: number;
  tasks_pending: number;
  streak_count: number;
  completion_rate: number;
};

/** Numbers the execution agent reports; taken from the task rows, never from the model. */
export function summarizeTasks(tasks: Task[], today: string): DailySummary {
  const completed = tasks.filter((t) => t.status === "completed").length;
  const pending = tasks.filter((t) => t.status === "pending" || t.status === "in_progress").length;
  const days = tasks.flatMap((t) => (t.completedAt ? [dayKeyFromIso(t.completedAt)] : []));
  return {
    tasks_completed: completed,
    tasks_pending: pending,
    streak_count: calculateStreak(days, today),
    completion_rate: percent(completed, tasks.length),
  };
}

/** -------- Agent factory -------- */

type Finished<D> = { data: D; message?: string; nextAgent?: AgentType | null; requiresUserInput?: boolean };

type AgentDefinition<O, D extends Record<string, unknown>> = {
  type: AgentType;
  name: string;
  description: string;
  promptKey: PromptKey;
  defaultMessage: string;
  schema: z.ZodType<O, z.ZodTypeDef, unknown>;
  buildPrompt(ctx: AgentContext): string;
  finish(ctx: AgentContext, output: O): Finished<D>;
  /** Writes the result back to storage; a failure here is logged, the result still returned. */
  persist?(ctx: AgentContext, data: D): Promise<void>;
};

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function meta(type: AgentType, message: string): AgentMeta {
  return {
    agentType: type,
    message,
    nextAgent: null,
    requiresUserInput: false,
    timestamp: nowIso(),
    traceId: nanoid(),
  };
}

function defineAgent<O, D extends Record<string, unknown>>(def: AgentDefinition<O, D>): Agent<D> {
  return {
    type: def.type,
    name: def.name,
    description: def.description,
    async process(ctx) {
      try {
        const system = await loadPrompt(def.promptKey);
        const { data } = await completeJson(system, def.buildPrompt(ctx), { temperature: 0.7 });
        const parsed = def.schema.safeParse(isRecord(data) ? data : {});
        if (!parsed.success) throw new Error("Model output did not match the expected shape");

        const done = def.finish(ctx, parsed.data);
        if (def.persist) {
          try {
            await def.persist(ctx, done.data);
          } catch (err) {
            logger.warn("Agent result not persisted", { agent: def.type, ...errorContext(err) });
          }
        }

        return {
          ...meta(def.type, done.message || def.defaultMessage),
          success: true,
          data: done.data,
          nextAgent: done.nextAgent ?? null,
          requiresUserInput: done.requiresUserInput ?? false,
        };
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        logger.error("Agent failed", { agent: def.type, ...errorContext(err) });
        return { ...meta(def.type, `Agent error: ${reason}`), success: false, data: null };
      }
    },
  };
}

function withoutMessage<T extends { message: string }>(output: T): Omit<T, "message"> {
  const { message: _message, ...rest } = output;
  return rest;
}

/** -------- Agents -------- */

export const foundationAgent = defineAgent({
  type: "foundation",
  name: "Foundation Agent",
  description: "Intake and assessment: goal type, motivation, feasibility, clarity, obstacles",
  promptKey: "foundation_system_prompt",
  defaultMessage: "Thanks for sharing your goal. Let's make sure it's clear and achievable.",
  schema: FoundationSchema,
  buildPrompt: (ctx) => describeContext(ctx),
  finish(ctx, output) {
    const clear = output.clarity_score >= 7;
    return {
      data: withoutMessage(output),
      message: output.message,
      requiresUserInput: !clear,
      nextAgent: clear && ctx.additional.previous_agent !== "planning" ? "planning" : null,
    };
  },
  async persist(ctx, data) {
    if (!ctx.currentGoal) return;
    await applyGoalAssessment(ctx.currentGoal.id, {
      goalType: data.goal_type,
      motivationScore: data.motivation_score,
      feasibilityScore: data.feasibility_score,
      clarityScore: data.clarity_score,
      identifiedObstacles: data.identified_obstacles,
      successCriteria: data.success_criteria,
    });
  },
});

export const planningAgent = defineAgent({
  type: "planning",
  name: "Planning Agent",
  description: "SMART conversion, milestones, task schedule and critical path",
  promptKey: "planning_system_prompt",
  defaultMessage: "Here is a SMART plan for your goal.",
  schema: PlanningSchema,
  buildPrompt: (ctx) => describeContext(ctx),
  finish(_ctx, output) {
    return {
      data: {
        ...withoutMessage(output),
        milestones: output.milestones.map((m, i) => ({ ...m, id: m.id || `m${i + 1}` })),
      },
      message: output.message,
    };
  },
  async persist(ctx, data) {
    if (!ctx.currentGoal || !data.smart_goal.specific) return;
    await applySmartBreakdown(ctx.currentGoal.id, {
      specific: data.smart_goal.specific,
      measurable: data.smart_goal.measurable,
      achievable: data.smart_goal.achievable,
      relevant: data.smart_goal.relevant,
      timeBound: data.smart_goal.time_bound,
    });
  },
});

export const executionAgent = defineAgent({
  type: "execution",
  name: "Execution Agent",
  description: "Daily task tracking, blockers and next actions",
  promptKey: "execution_system_prompt",
  defaultMessage: "Here's where you stand today.",
  schema: ExecutionSchema,
  buildPrompt(ctx) {
    const summary = summarizeTasks(ctx.taskHistory, dayKeyFromIso(nowIso()));
    return describeContext(ctx, [section("Daily summary", JSON.stringify(summary, null, 2))]);
  },
  finish(ctx, output) {
    return {
      data: {
        daily_summary: summarizeTasks(ctx.taskHistory, dayKeyFromIso(nowIso())),
        ...withoutMessage(output),
      },
      message: output.message || output.motivational_message,
    };
  },
});

export const sustainabilityAgent = defineAgent({
  type: "sustainability",
  name: "Sustainability Agent",
  description: "Habit formation, pattern detection and burnout risk",
  promptKey: "sustainability_system_prompt",
  defaultMessage: "Here's how your habits are shaping up.",
  schema: SustainabilitySchema,
  buildPrompt: (ctx) => describeContext(ctx),
  finish(_ctx, output) {
    return {
      data: withoutMessage(output),
      message: output.message,
      nextAgent: output.burnout_risk === "HIGH" ? "psychological" : null,
    };
  },
});

export const supportAgent = defineAgent({
  type: "support",
  name: "Support Agent",
  description: "Courses, books, tools, communities and experts that fit the goal",
  promptKey: "support_system_prompt",
  defaultMessage: "Here are some resources that could help.",
  schema: SupportSchema,
  buildPrompt: (ctx) => describeContext(ctx),
  finish: (_ctx, output) => ({ data: withoutMessage(output), message: output.message }),
});

export const psychologicalAgent = defineAgent({
  type: "psychological",
  name: "Psychological Agent",
  description: "Motivation, stress and confidence support",
  promptKey: "psychological_system_prompt",
  defaultMessage: "You're doing better than you think. Let's take the next small step together.",
  schema: PsychologicalSchema,
  buildPrompt: (ctx) => describeContext(ctx),
  finish: (_ctx, output) => ({ data: withoutMessage(output), message: output.message }),
  async persist(ctx, data) {
    await updateProfile(ctx.userId, {
      currentMotivationLevel: data.emotional_assessment.motivation_level,
      currentStressLevel: data.emotional_assessment.stress_level,
      currentConfidenceLevel: data.emotional_assessment.confidence_level,
    });
  },
});

export type SustainabilityData = Omit<SustainabilityOutput, "message">;

export const AGENTS: Record<AgentType, Agent<Record<string, unknown>>> = {
  foundation: foundationAgent,
  planning: planningAgent,
  execution: executionAgent,
  sustainability: sustainabilityAgent,
  support: supportAgent,
  psychological: psychologicalAgent,
};

export function agentInfo() {
  return AGENT_TYPES.map((t) => ({ type: t, name: AGENTS[t].name, description: AGENTS[t].description }));
}

/** -------- Coordinator -------- */

const EMOTIONAL_KEYWORDS = [
  "stressed",
  "anxious",
  "overwhelmed",
  "unmotivated",
  "can't do this",
  "giving up",
  "frustrated",
  "tired",
  "burned out",
  "discouraged",
  "stuck",
];
const RESOURCE_KEYWORDS = [
  "resources",
  "tools",
  "apps",
  "courses",
  "books",
  "learn more",
  "recommendations",
  "help me find",
];
const HABIT_KEYWORDS = ["habit", "routine", "pattern", "consistent", "streak", "burn out", "sustainable", "long-term"];

const REQUEST_TYPE_AGENTS: Record<string, AgentType> = {
  daily_checkin: "execution",
  pattern_analysis: "sustainability",
  resources: "support",
  motivation: "psychological",
};

export function determineAgent(ctx: AgentContext): AgentType {
  const requested = ctx.additional.agent_type;
  if (isAgentType(requested)) return requested;

  const requestType = ctx.additional.request_type;
  if (typeof requestType === "string" && requestType in REQUEST_TYPE_AGENTS) {
    return REQUEST_TYPE_AGENTS[requestType] ?? "foundation";
  }

  if (!ctx.goalId && ctx.messages.length <= 1) return "foundation";

  if (ctx.goalId && ctx.currentGoal) {
    return ctx.currentGoal.smartSpecific ? "execution" : "planning";
  }

  const last = ctx.messages[ctx.messages.length - 1]?.content.toLowerCase() ?? "";
  if (EMOTIONAL_KEYWORDS.some((k) => last.includes(k))) return "psychological";
  if (RESOURCE_KEYWORDS.some((k) => last.includes(k))) return "support";
  if (HABIT_KEYWORDS.some((k) => last.includes(k))) return "sustainability";

  return "foundation";
}

/** Context for the next agent in a chain; it is routed straight to `next`. */
export function chainContext(ctx: AgentContext, previous: AgentResult<Record<string, unknown>>, next: AgentType): AgentContext {
  return {
    ...ctx,
    additional: {
      ...ctx.additional,
      agent_type: next,
      previous_agent: previous.agentType,
      previous_output: previous.data ?? {},
    },
  };
}

export const MAX_CHAIN_DEPTH = 3;

export async function routeAgent(ctx: AgentContext, depth = 0): Promise<AgentResult<Record<string, unknown>>> {
  const type = determineAgent(ctx);
  logger.info("Routing to agent", { agent: type, depth });

  const response = await AGENTS[type].process(ctx);
  if (!response.success || !response.nextAgent || depth >= MAX_CHAIN_DEPTH) return response;

  logger.info("Chaining agent", { from: type, to: response.nextAgent });
  const chained = await routeAgent(chainContext(ctx, response, response.nextAgent), depth + 1);
  return { ...response, data: { ...response.data, chained_response: chained.data ?? {} } };
}

export type IntakeResults = {
  foundation: AgentResult<Record<string, unknown>>;
  planning: AgentResult<Record<string, unknown>> | null;
};

/** foundation, then planning on the assessed goal; stops when the assessment fails. */
export async function runIntakePipeline(ctx: AgentContext): Promise<IntakeResults> {
  const foundation = await foundationAgent.process(ctx);
  if (!foundation.success) return { foundation, planning: null };
  const planning = await planningAgent.process(chainContext(ctx, foundation, "planning"));
  return { foundation, planning };
}

export type CheckinResults = {
  execution: AgentResult<Record<string, unknown>>;
  sustainability: AgentResult<SustainabilityData>;
  psychological: AgentResult<Record<string, unknown>> | null;
};

/** execution, sustainability, and psychological support when burnout risk is MEDIUM or HIGH. */
export async function runDailyCheckin(ctx: AgentContext): Promise<CheckinResults> {
  const execution = await executionAgent.process(ctx);
  const sustainability = await sustainabilityAgent.process(chainContext(ctx, execution, "sustainability"));

  let psychological: AgentResult<Record<string, unknown>> | null = null;
  if (sustainability.success && sustainability.data.burnout_risk !== "LOW") {
    psychological = await psychologicalAgent.process(chainContext(ctx, sustainability, "psychological"));
  }
  return { execution, sustainability, psychological };
}

/** -------- Context loading -------- */

export async function loadAgentContext(
  userId: string,
  opts: {
    goalId?: string | null;
    sessionId?: string | null;
    messages?: AgentMessage[];
    additional?: Record<string, unknown>;
    withTasks?: boolean;
  } = {},
): Promise<AgentContext> {
  let currentGoal: Goal | null = null;
  if (opts.goalId) {
    currentGoal = await getGoal(opts.goalId, userId);
    if (!currentGoal) throw notFound("Goal not found");
  }
  const [userProfile, taskHistory] = await Promise.all([
    getOrCreateProfile(userId),
    currentGoal && opts.withTasks ? listTasksForGoal(currentGoal.id) : Promise.resolve([]),
  ]);

  return {
    userId,
    goalId: currentGoal?.id ?? null,
    sessionId: opts.sessionId ?? null,
    messages: opts.messages ?? [],
    userProfile,
    currentGoal,
    taskHistory,
    additional: opts.additional ?? {},
  };
}
