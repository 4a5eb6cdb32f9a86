import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { makeGoal, makeTask } from "../helpers/fixtures";

const mocks = vi.hoisted(() => ({
  getGoal: vi.fn(),
  listTasksForGoal: vi.fn(),
  updateTask: vi.fn(),
  setGoalSustainability: vi.fn(),
  loadAgentContext: vi.fn(),
  runDailyCheckin: vi.fn(),
  summarizeTasks: vi.fn(),
  upsertDailyProgress: vi.fn(),
  upsertHabitLoop: vi.fn(),
  createInsight: vi.fn(),
}));

vi.mock("../../server/goals", () => ({
  getGoal: mocks.getGoal,
  listTasksForGoal: mocks.listTasksForGoal,
  updateTask: mocks.updateTask,
  setGoalSustainability: mocks.setGoalSustainability,
}));
vi.mock("../../server/agents", () => ({
  loadAgentContext: mocks.loadAgentContext,
  runDailyCheckin: mocks.runDailyCheckin,
  summarizeTasks: mocks.summarizeTasks,
}));
vi.mock("../../server/storage", () => ({
  upsertDailyProgress: mocks.upsertDailyProgress,
  upsertHabitLoop: mocks.upsertHabitLoop,
  createInsight: mocks.createInsight,
}));

import { dailyCounts, habitStrength, performCheckin } from "../../server/checkin";

const TODAY = "2026-03-10";

describe("dailyCounts", () => {
  it("counts open work plus what was finished today", () => {
    const tasks = [
      makeTask({ id: "a", status: "completed", completedAt: "2026-03-10T08:00:00.000Z", estimatedMinutes: 30 }),
      makeTask({ id: "b", status: "completed", completedAt: "2026-03-09T08:00:00.000Z", estimatedMinutes: 20 }),
      makeTask({ id: "c", status: "in_progress" }),
      makeTask({ id: "d", status: "pending" }),
      makeTask({ id: "e", status: "skipped" }),
    ];
    expect(dailyCounts(tasks, TODAY)).toEqual({
      tasksPlanned: 3,
      tasksCompleted: 1,
      tasksSkipped: 1,
      totalMinutesLogged: 30,
    });
  });

  it("treats a missing estimate as zero minutes", () => {
    const tasks = [makeTask({ status: "completed", completedAt: "2026-03-10T08:00:00.000Z" })];
    expect(dailyCounts(tasks, TODAY).totalMinutesLogged).toBe(0);
  });
});

describe("habitStrength", () => {
  it("buckets the habit score", () => {
    expect(habitStrength(0)).toBe("forming");
    expect(habitStrength(25)).toBe("developing");
    expect(habitStrength(74)).toBe("established");
    expect(habitStrength(75)).toBe("automatic");
  });
});

describe("performCheckin", () => {
  const meta = {
    message: "",
    nextAgent: null,
    requiresUserInput: false,
    timestamp: "2026-03-10T12:00:00.000Z",
    traceId: "trace-1",
  };

  beforeEach(() => {
    vi.clearAllMocks();
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-03-10T12:00:00.000Z"));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a goal the user does not own", async () => {
    mocks.getGoal.mockResolvedValueOnce(null);
    await expect(performCheckin("user-1", { goalId: "goal-x", completedTaskIds: [] })).rejects.toMatchObject({
      status: 404,
      message: "Goal not found",
    });
    expect(mocks.runDailyCheckin).not.toHaveBeenCalled();
  });

  it("completes tasks, records the day and keeps the sustainability findings", async () => {
    const pending = makeTask({ id: "t1" });
    const done = makeTask({ id: "t2", status: "completed", completedAt: "2026-03-09T08:00:00.000Z" });
    mocks.getGoal.mockResolvedValueOnce(makeGoal());
    mocks.listTasksForGoal.mockResolvedValueOnce([pending, done]).mockResolvedValueOnce([
      makeTask({ id: "t1", status: "completed", completedAt: "2026-03-10T11:00:00.000Z", estimatedMinutes: 30 }),
      done,
      makeTask({ id: "t3", status: "skipped" }),
    ]);
    mocks.upsertDailyProgress.mockResolvedValueOnce({ id: "dp-1" });
    mocks.loadAgentContext.mockResolvedValueOnce({ userId: "user-1" });
    mocks.summarizeTasks.mockReturnValueOnce({ tasks_completed: 2, tasks_pending: 0, streak_count: 2, completion_rate: 67 });
    mocks.runDailyCheckin.mockResolvedValueOnce({
      execution: { ...meta, agentType: "execution", success: true, data: {} },
      sustainability: {
        ...meta,
        agentType: "sustainability",
        success: true,
        data: {
          habit_analysis: {
            habit_score: 60,
            days_consistent: 5,
            habit_loops: [{ cue: "Alarm", routine: "Morning run", reward: "Coffee" }],
          },
          pattern_insights: { best_days: [], best_times: [], failure_patterns: ["Skips Mondays"] },
          sustainability_score: 40,
          burnout_risk: "HIGH",
          recommendations: ["Rest on Sundays"],
        },
      },
      psychological: null,
    });

    const out = await performCheckin("user-1", {
      goalId: "goal-1",
      completedTaskIds: ["t1", "t1", "t2", "ghost"],
      notes: " tired today ",
      moodScore: 7,
    });

    expect(out.dailyProgress).toEqual({ id: "dp-1" });
    expect(mocks.updateTask).toHaveBeenCalledTimes(1);
    expect(mocks.updateTask).toHaveBeenCalledWith(pending, { status: "completed" });
    expect(mocks.upsertDailyProgress).toHaveBeenCalledWith({
      userId: "user-1",
      goalId: "goal-1",
      date: TODAY,
      tasksPlanned: 1,
      tasksCompleted: 1,
      tasksSkipped: 1,
      totalMinutesLogged: 30,
      moodScore: 7,
      energyLevel: undefined,
      notes: " tired today ",
    });
    expect(mocks.loadAgentContext).toHaveBeenCalledWith("user-1", {
      goalId: "goal-1",
      messages: [{ role: "user", content: "tired today" }],
      additional: { request_type: "daily_checkin", mood_score: 7, energy_level: null },
      withTasks: true,
    });
    expect(mocks.setGoalSustainability).toHaveBeenCalledWith("goal-1", 40, "HIGH");
    expect(mocks.upsertHabitLoop).toHaveBeenCalledWith({
      userId: "user-1",
      goalId: "goal-1",
      name: "Morning run",
      cue: "Alarm",
      routine: "Morning run",
      reward: "Coffee",
      strength: "established",
      daysTracked: 5,
      currentStreak: 2,
      completionRate: 0.67,
    });
    expect(mocks.createInsight).toHaveBeenCalledTimes(2);
    expect(mocks.createInsight).toHaveBeenNthCalledWith(1, {
      userId: "user-1",
      goalId: "goal-1",
      insightType: "recommendation",
      title: "Rest on Sundays",
      description: "Rest on Sundays",
      sourceAgent: "sustainability",
      importance: 5,
      confidence: 0.7,
      expiresAt: "2026-03-24T12:00:00.000Z",
    });
    expect(mocks.createInsight).toHaveBeenNthCalledWith(
      2,
      expect.objectContaining({ insightType: "warning", title: "High burnout risk", description: "Skips Mondays" }),
    );
  });

  it("skips the findings when the sustainability agent failed", async () => {
    mocks.getGoal.mockResolvedValueOnce(makeGoal());
    mocks.listTasksForGoal.mockResolvedValue([]);
    mocks.loadAgentContext.mockResolvedValueOnce({ userId: "user-1" });
    mocks.runDailyCheckin.mockResolvedValueOnce({
      execution: { ...meta, agentType: "execution", success: true, data: {} },
      sustainability: { ...meta, agentType: "sustainability", success: false, data: null },
      psychological: null,
    });

    await performCheckin("user-1", { goalId: "goal-1", completedTaskIds: [] });

    expect(mocks.loadAgentContext).toHaveBeenCalledWith("user-1", expect.objectContaining({ messages: [] }));
    expect(mocks.setGoalSustainability).not.toHaveBeenCalled();
    expect(mocks.createInsight).not.toHaveBeenCalled();
  });
});
