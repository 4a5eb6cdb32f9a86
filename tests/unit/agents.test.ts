import { beforeEach, describe, expect, it, vi } from "vitest";
import { makeGoal, makeProfile, makeTask } from "../helpers/fixtures";

const mocks = vi.hoisted(() => ({
  completeJson: vi.fn(),
  applyGoalAssessment: vi.fn(),
  applySmartBreakdown: vi.fn(),
  updateProfile: vi.fn(),
}));

vi.mock("../../server/ai", () => ({ completeJson: mocks.completeJson }));
vi.mock("../../server/prompts", () => ({ loadPrompt: vi.fn().mockResolvedValue("system prompt") }));
vi.mock("../../server/goals", () => ({
  applyGoalAssessment: mocks.applyGoalAssessment,
  applySmartBreakdown: mocks.applySmartBreakdown,
  getGoal: vi.fn(),
  listTasksForGoal: vi.fn(),
}));
vi.mock("../../server/storage", () => ({
  getOrCreateProfile: vi.fn(),
  updateProfile: mocks.updateProfile,
}));

import {
  agentInfo,
  chainContext,
  determineAgent,
  foundationAgent,
  planningAgent,
  routeAgent,
  runDailyCheckin,
  runIntakePipeline,
  summarizeTasks,
  type AgentContext,
} from "../../server/agents";

function ctx(overrides: Partial<AgentContext> = {}): AgentContext {
  return {
    userId: "user-1",
    goalId: null,
    sessionId: null,
    messages: [],
    userProfile: makeProfile(),
    currentGoal: null,
    taskHistory: [],
    additional: {},
    ...overrides,
  };
}

const say = (content: string) => [
  { role: "user" as const, content: "I want to get fit" },
  { role: "assistant" as const, content: "Tell me more" },
  { role: "user" as const, content },
];

function json(data: unknown) {
  return { data, raw: JSON.stringify(data), tokensUsed: 10 };
}

beforeEach(() => {
  vi.clearAllMocks();
});

describe("determineAgent", () => {
  it("honours an explicit agent type", () => {
    expect(determineAgent(ctx({ additional: { agent_type: "support" } }))).toBe("support");
  });

  it("maps request types", () => {
    expect(determineAgent(ctx({ additional: { request_type: "daily_checkin" } }))).toBe("execution");
    expect(determineAgent(ctx({ additional: { request_type: "pattern_analysis" } }))).toBe("sustainability");
    expect(determineAgent(ctx({ additional: { request_type: "resources" } }))).toBe("support");
    expect(determineAgent(ctx({ additional: { request_type: "motivation" } }))).toBe("psychological");
  });

  it("ignores an unknown agent type", () => {
    expect(determineAgent(ctx({ additional: { agent_type: "wizard" } }))).toBe("foundation");
  });

  it("starts new conversations at foundation", () => {
    expect(determineAgent(ctx({ messages: [{ role: "user", content: "I feel stressed" }] }))).toBe("foundation");
  });

  it("plans a goal without a SMART breakdown, tracks one with it", () => {
    const goal = makeGoal();
    expect(determineAgent(ctx({ goalId: goal.id, currentGoal: goal }))).toBe("planning");
    const planned = makeGoal({ smartSpecific: "Run 21km under 2h" });
    expect(determineAgent(ctx({ goalId: planned.id, currentGoal: planned }))).toBe("execution");
  });

  it("routes on keywords in the last message", () => {
    expect(determineAgent(ctx({ messages: say("Honestly I'm overwhelmed") }))).toBe("psychological");
    expect(determineAgent(ctx({ messages: say("Any BOOKS you'd suggest?") }))).toBe("support");
    expect(determineAgent(ctx({ messages: say("How do I keep a routine?") }))).toBe("sustainability");
    expect(determineAgent(ctx({ messages: say("Let's continue") }))).toBe("foundation");
  });
});

describe("summarizeTasks", () => {
  it("derives counts, streak and rate from the rows", () => {
    const tasks = [
      makeTask({ id: "a", status: "completed", completedAt: "2026-03-10T08:00:00.000Z" }),
      makeTask({ id: "b", status: "completed", completedAt: "2026-03-09T08:00:00.000Z" }),
      makeTask({ id: "c", status: "in_progress" }),
      makeTask({ id: "d", status: "skipped" }),
    ];
    expect(summarizeTasks(tasks, "2026-03-10")).toEqual({
      tasks_completed: 2,
      tasks_pending: 1,
      streak_count: 2,
      completion_rate: 50,
    });
  });
});

describe("chainContext", () => {
  it("pins the next agent and carries the previous output", async () => {
    mocks.completeJson.mockResolvedValueOnce(json({ clarity_score: 3, message: "Tell me more" }));
    const previous = await foundationAgent.process(ctx());
    const next = chainContext(ctx({ additional: { request_type: "x" } }), previous, "planning");
    expect(next.additional.agent_type).toBe("planning");
    expect(next.additional.previous_agent).toBe("foundation");
    expect(next.additional.request_type).toBe("x");
    expect(determineAgent(next)).toBe("planning");
  });
});

describe("agents", () => {
  it("asks for more input when the goal is unclear", async () => {
    mocks.completeJson.mockResolvedValueOnce(json({ clarity_score: 4, goal_summary: "Get fit", message: "What does fit mean?" }));
    const result = await foundationAgent.process(ctx());
    expect(result.success).toBe(true);
    expect(result.requiresUserInput).toBe(true);
    expect(result.nextAgent).toBeNull();
    expect(result.message).toBe("What does fit mean?");
    expect(result.data).toMatchObject({ goal_summary: "Get fit", clarity_score: 4, motivation_score: 5 });
  });

  it("clamps out-of-range scores and stores the assessment on a known goal", async () => {
    mocks.completeJson.mockResolvedValueOnce(
      json({ clarity_score: 14, motivation_score: "8", goal_type: "SHORT_TERM", identified_obstacles: ["time"] }),
    );
    const goal = makeGoal();
    const result = await foundationAgent.process(ctx({ goalId: goal.id, currentGoal: goal }));
    expect(result.nextAgent).toBe("planning");
    expect(mocks.applyGoalAssessment).toHaveBeenCalledWith("goal-1", {
      goalType: "short_term",
      motivationScore: 8,
      feasibilityScore: 5,
      clarityScore: 10,
      identifiedObstacles: ["time"],
      successCriteria: [],
    });
  });

  it("numbers planning milestones that came without ids", async () => {
    mocks.completeJson.mockResolvedValueOnce(
      json({
        smart_goal: { specific: "Run 21km", measurable: "race time", achievable: "yes", relevant: "health", time_bound: "Sept" },
        milestones: [{ title: "Base" }, { id: 7, title: "Build" }, { title: "" }],
      }),
    );
    const goal = makeGoal();
    const result = await planningAgent.process(ctx({ goalId: goal.id, currentGoal: goal }));
    expect(result.success && result.data.milestones.map((m) => m.id)).toEqual(["m1", "7"]);
    expect(mocks.applySmartBreakdown).toHaveBeenCalledWith("goal-1", {
      specific: "Run 21km",
      measurable: "race time",
      achievable: "yes",
      relevant: "health",
      timeBound: "Sept",
    });
  });

  it("reports a model failure as an unsuccessful result", async () => {
    mocks.completeJson.mockRejectedValueOnce(new Error("upstream timeout"));
    const result = await planningAgent.process(ctx());
    expect(result.success).toBe(false);
    expect(result.data).toBeNull();
    expect(result.message).toBe("Agent error: upstream timeout");
  });

  it("still returns the result when persisting fails", async () => {
    mocks.completeJson.mockResolvedValueOnce(json({ emotional_assessment: { stress_level: 9 } }));
    mocks.updateProfile.mockRejectedValueOnce(new Error("db down"));
    const result = await routeAgent(ctx({ additional: { agent_type: "psychological" } }));
    expect(result.success).toBe(true);
    expect(result.data).toMatchObject({
      emotional_assessment: { motivation_level: 5, stress_level: 9, confidence_level: 5, detected_patterns: [] },
    });
  });
});

describe("routeAgent", () => {
  it("chains foundation into planning and nests the result", async () => {
    mocks.completeJson
      .mockResolvedValueOnce(json({ clarity_score: 8, goal_summary: "Run a half marathon" }))
      .mockResolvedValueOnce(json({ critical_path: ["m1"], total_estimated_hours: 40 }));

    const result = await routeAgent(ctx({ messages: [{ role: "user", content: "Half marathon in September" }] }));

    expect(result.agentType).toBe("foundation");
    expect(result.nextAgent).toBe("planning");
    expect(mocks.completeJson).toHaveBeenCalledTimes(2);
    expect(result.data).toMatchObject({
      goal_summary: "Run a half marathon",
      chained_response: { critical_path: ["m1"], total_estimated_hours: 40 },
    });
  });

  it("does not chain after a failure", async () => {
    mocks.completeJson.mockRejectedValueOnce(new Error("boom"));
    const result = await routeAgent(ctx());
    expect(result.success).toBe(false);
    expect(mocks.completeJson).toHaveBeenCalledTimes(1);
  });
});

describe("pipelines", () => {
  it("stops intake when the assessment fails", async () => {
    mocks.completeJson.mockRejectedValueOnce(new Error("boom"));
    const { foundation, planning } = await runIntakePipeline(ctx());
    expect(foundation.success).toBe(false);
    expect(planning).toBeNull();
  });

  it("skips psychological support at low burnout risk", async () => {
    mocks.completeJson
      .mockResolvedValueOnce(json({ next_actions: ["stretch"] }))
      .mockResolvedValueOnce(json({ burnout_risk: "low", sustainability_score: 80 }));
    const results = await runDailyCheckin(ctx());
    expect(results.sustainability.success && results.sustainability.data.burnout_risk).toBe("LOW");
    expect(results.psychological).toBeNull();
    expect(mocks.completeJson).toHaveBeenCalledTimes(2);
  });

  it("adds psychological support at medium burnout risk", async () => {
    mocks.completeJson
      .mockResolvedValueOnce(json({}))
      .mockResolvedValueOnce(json({ burnout_risk: "MEDIUM" }))
      .mockResolvedValueOnce(json({ message: "Take a rest day" }));
    const results = await runDailyCheckin(ctx());
    expect(results.psychological?.message).toBe("Take a rest day");
  });
});

describe("agentInfo", () => {
  it("lists all six agents", () => {
    expect(agentInfo().map((a) => a.type)).toEqual([
      "foundation",
      "planning",
      "execution",
      "sustainability",
      "support",
      "psychological",
    ]);
  });
});
