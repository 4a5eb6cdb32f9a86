import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  createGoalFromExtraction,
  createMilestone,
  dashboardStats,
  statusChangeFields,
  updateTask,
} from "../../server/goals";
import type { ExtractedGoal } from "../../server/types";
import { makeTask } from "../helpers/fixtures";

type Row = Record<string, unknown>;

// Every statement, in order, including the transaction boundaries.
const db = vi.hoisted(() => {
  const statements: Array<{ text: string; params: unknown[] }> = [];
  const query = vi.fn();
  return { statements, query };
});

vi.mock("../../server/db", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../server/db")>();
  return {
    ...actual,
    q: db.query,
    withTransaction: async (fn: (tx: typeof db.query) => Promise<unknown>) => {
      db.statements.push({ text: "BEGIN", params: [] });
      try {
        const result = await fn(db.query);
        db.statements.push({ text: "COMMIT", params: [] });
        return result;
      } catch (err) {
        db.statements.push({ text: "ROLLBACK", params: [] });
        throw err;
      }
    },
  };
});

function answer(respond: (text: string, params: unknown[]) => Row[]) {
  db.query.mockImplementation(async (text: string, params: unknown[] = []) => {
    db.statements.push({ text, params });
    return respond(text, params);
  });
}

function ran(fragment: string) {
  return db.statements.filter((s) => s.text.includes(fragment));
}

/** RETURNING * rows for the INSERTs, built from their parameters. */
function insertedRow(text: string, params: unknown[]): Row[] {
  if (text.includes("INSERT INTO goals")) {
    const [id, user_id, chat_session_id, title, description, category, target_date, created_at] = params;
    return [
      { id, user_id, chat_session_id, title, description, category, target_date, status: "active", progress: 0, created_at },
    ];
  }
  if (text.includes("INSERT INTO milestones")) {
    const [id, goal_id, title, description, target_date, sort_order, created_at] = params;
    return [{ id, goal_id, title, description, target_date, sort_order, is_completed: false, created_at }];
  }
  if (text.includes("INSERT INTO tasks")) {
    const [id, milestone_id, goal_id, title, description, due_date, priority, frequency, estimated_minutes] = params;
    return [
      { id, milestone_id, goal_id, title, description, due_date, status: "pending", priority, frequency, estimated_minutes },
    ];
  }
  return [];
}

beforeEach(() => {
  db.statements.length = 0;
  db.query.mockReset();
});

const NOW = "2026-03-10T12:00:00.000Z";

describe("statusChangeFields", () => {
  it("extends the streak when a task is completed the day after its last completion", () => {
    const task = makeTask({
      streakCount: 3,
      bestStreak: 3,
      lastCompletedAt: "2026-03-09T07:30:00.000Z",
      timesCompleted: 5,
    });
    expect(statusChangeFields(task, "completed", NOW)).toEqual({
      completedAt: NOW,
      streakCount: 4,
      bestStreak: 4,
      lastCompletedAt: NOW,
      timesCompleted: 6,
      timesSkipped: 0,
    });
  });

  it("restarts the streak after a gap but keeps the best", () => {
    const task = makeTask({ streakCount: 6, bestStreak: 6, lastCompletedAt: "2026-03-01T07:30:00.000Z" });
    const fields = statusChangeFields(task, "completed", NOW);
    expect(fields.streakCount).toBe(1);
    expect(fields.bestStreak).toBe(6);
  });

  it("leaves an already completed task alone", () => {
    const task = makeTask({
      status: "completed",
      completedAt: "2026-03-08T10:00:00.000Z",
      streakCount: 2,
      bestStreak: 2,
      lastCompletedAt: "2026-03-08T10:00:00.000Z",
      timesCompleted: 2,
    });
    expect(statusChangeFields(task, "completed", NOW)).toEqual({
      completedAt: "2026-03-08T10:00:00.000Z",
      streakCount: 2,
      bestStreak: 2,
      lastCompletedAt: "2026-03-08T10:00:00.000Z",
      timesCompleted: 2,
      timesSkipped: 0,
    });
  });

  it("clears the completion time when a task is reopened", () => {
    const task = makeTask({ status: "completed", completedAt: NOW, lastCompletedAt: NOW, timesCompleted: 1, streakCount: 1 });
    const fields = statusChangeFields(task, "pending", NOW);
    expect(fields.completedAt).toBeNull();
    expect(fields.lastCompletedAt).toBe(NOW);
    expect(fields.timesCompleted).toBe(1);
  });

  it("counts a skip only on the transition into skipped", () => {
    expect(statusChangeFields(makeTask({ timesSkipped: 1 }), "skipped", NOW).timesSkipped).toBe(2);
    expect(statusChangeFields(makeTask({ status: "skipped", timesSkipped: 1 }), "skipped", NOW).timesSkipped).toBe(1);
  });
});

describe("createGoalFromExtraction", () => {
  const extracted: ExtractedGoal = {
    title: "Run a half marathon",
    description: null,
    category: "health",
    targetDate: "2026-09-01",
    milestones: [
      {
        title: "Build a base",
        description: null,
        targetDate: null,
        tasks: [
          { title: "Run 5k", description: null, priority: "high" },
          { title: "Stretch", description: null, priority: "low" },
        ],
      },
      {
        title: "Race week",
        description: null,
        targetDate: "2026-08-25",
        tasks: [{ title: "Taper", description: null, priority: "medium" }],
      },
    ],
  };

  it("writes the roadmap in order and finalizes the session in the same transaction", async () => {
    answer((text, params) => (text.includes("UPDATE chat_sessions") ? [{ id: "s-1" }] : insertedRow(text, params)));

    const goal = await createGoalFromExtraction("user-1", "s-1", extracted);

    expect(goal).toMatchObject({ title: "Run a half marathon", chatSessionId: "s-1", status: "active", progress: 0 });

    const milestones = ran("INSERT INTO milestones");
    expect(milestones.map((s) => [s.params[2], s.params[5]])).toEqual([
      ["Build a base", 0],
      ["Race week", 1],
    ]);

    const tasks = ran("INSERT INTO tasks");
    expect(tasks.map((s) => s.params[3])).toEqual(["Run 5k", "Stretch", "Taper"]);
    expect(tasks.map((s) => s.params[1])).toEqual([
      milestones[0]?.params[0],
      milestones[0]?.params[0],
      milestones[1]?.params[0],
    ]);
    expect(tasks.every((s) => s.text.includes("'pending'"))).toBe(true);

    const finalize = ran("UPDATE chat_sessions");
    expect(finalize).toHaveLength(1);
    expect(finalize[0]?.text).toContain("status = 'active'");
    expect(finalize[0]?.params.slice(0, 3)).toEqual(["s-1", goal.id, "Run a half marathon"]);
    expect(db.statements[0]?.text).toBe("BEGIN");
    expect(db.statements.at(-2)).toBe(finalize[0]);
    expect(db.statements.at(-1)?.text).toBe("COMMIT");
  });

  it("rolls the goal back when the session was finalized meanwhile", async () => {
    answer((text, params) => (text.includes("UPDATE chat_sessions") ? [] : insertedRow(text, params)));

    await expect(createGoalFromExtraction("user-1", "s-1", extracted)).rejects.toMatchObject({
      status: 400,
      message: "Session already finalized",
    });
    expect(ran("INSERT INTO goals")).toHaveLength(1);
    expect(ran("COMMIT")).toHaveLength(0);
    expect(db.statements.at(-1)?.text).toBe("ROLLBACK");
  });

  it("leaves sessions alone for a goal without one", async () => {
    answer(insertedRow);
    const goal = await createGoalFromExtraction("user-1", null, extracted);
    expect(goal.chatSessionId).toBeNull();
    expect(ran("chat_sessions")).toHaveLength(0);
    expect(db.statements.at(-1)?.text).toBe("COMMIT");
  });
});

describe("updateTask", () => {
  it("re-derives goal progress and milestone completion on a status change", async () => {
    answer((text, params) => {
      if (text.includes("UPDATE tasks SET")) {
        return [{ id: "task-1", milestone_id: "ms-1", goal_id: "goal-1", title: "Run 5k", status: params[4] }];
      }
      if (text.includes("SELECT progress FROM goals")) return [{ progress: 0 }];
      if (text.includes("SELECT status FROM tasks WHERE goal_id")) {
        return [{ status: "completed" }, { status: "pending" }, { status: "pending" }];
      }
      if (text.includes("SELECT * FROM milestones WHERE id")) {
        return [{ id: "ms-1", goal_id: "goal-1", title: "Build a base", sort_order: 0, is_completed: false }];
      }
      if (text.includes("SELECT status FROM tasks WHERE milestone_id")) {
        return [{ status: "completed" }, { status: "skipped" }];
      }
      return [];
    });

    const updated = await updateTask(makeTask(), { status: "completed" });

    expect(updated.status).toBe("completed");
    expect(ran("UPDATE goals SET progress")[0]?.params.slice(0, 2)).toEqual(["goal-1", 33]);
    expect(ran("UPDATE milestones SET is_completed")[0]?.params.slice(0, 2)).toEqual(["ms-1", true]);
    expect(db.statements[0]?.text).toBe("BEGIN");
    expect(db.statements.at(-1)?.text).toBe("COMMIT");
  });

  it("skips the recompute for edits that keep the status", async () => {
    answer((text) => (text.includes("UPDATE tasks SET") ? [{ id: "task-1", title: "Run 6k", status: "pending" }] : []));

    const updated = await updateTask(makeTask(), { title: " Run 6k " });

    expect(updated.title).toBe("Run 6k");
    expect(ran("UPDATE tasks SET")[0]?.params[1]).toBe("Run 6k");
    expect(ran("SELECT progress FROM goals")).toHaveLength(0);
    expect(ran("FROM milestones")).toHaveLength(0);
  });
});

describe("createMilestone", () => {
  it("appends after the highest sort order", async () => {
    answer((text, params) => (text.includes("MAX(sort_order)") ? [{ max_order: 2 }] : insertedRow(text, params)));
    const milestone = await createMilestone("goal-1", { title: " Race week " });
    expect(milestone).toMatchObject({ goalId: "goal-1", title: "Race week", sortOrder: 3, isCompleted: false });
  });

  it("starts at zero on an empty goal", async () => {
    answer((text, params) => (text.includes("MAX(sort_order)") ? [{ max_order: null }] : insertedRow(text, params)));
    expect((await createMilestone("goal-1", { title: "Build a base" })).sortOrder).toBe(0);
  });
});

describe("dashboardStats", () => {
  it("combines counts, the streak and the upcoming tasks", async () => {
    answer((text) => {
      if (text.includes("AS active_goals")) return [{ active_goals: 2, total_tasks: 3, completed_tasks: 1 }];
      if (text.includes("SELECT DISTINCT substr")) return [{ day: "2026-03-09" }, { day: "2026-03-10" }];
      if (text.includes("t.status IN ('pending'")) {
        return [
          { id: "a", title: "Stretch", goal_id: "goal-1", goal_title: "Run", due_date: null, priority: "low", status: "pending" },
          {
            id: "b",
            title: "Long run",
            goal_id: "goal-1",
            goal_title: "Run",
            due_date: "2026-03-12",
            priority: "high",
            status: "in_progress",
          },
        ];
      }
      return [];
    });

    expect(await dashboardStats("user-1", "2026-03-10T12:00:00.000Z")).toEqual({
      activeGoals: 2,
      totalTasks: 3,
      completedTasks: 1,
      completionRate: 33,
      currentStreak: 2,
      upcomingTasks: [
        {
          id: "b",
          title: "Long run",
          goalId: "goal-1",
          goalTitle: "Run",
          dueDate: "2026-03-12",
          priority: "high",
          status: "in_progress",
        },
        { id: "a", title: "Stretch", goalId: "goal-1", goalTitle: "Run", dueDate: null, priority: "low", status: "pending" },
      ],
    });
  });
});
