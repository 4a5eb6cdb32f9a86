import { mkdtempSync, rmSync, unlinkSync, writeFileSync } from "node:fs";
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import { makeGoal, makeProfile, makeTask, makeUser } from "../helpers/fixtures";

const storage = vi.hoisted(() => ({
  findUserByEmail: vi.fn(),
  createUser: vi.fn(),
  getUserById: vi.fn(),
  updateUser: vi.fn(),
  createChatSession: vi.fn(),
  getChatSession: vi.fn(),
  listChatMessages: vi.fn(),
  addChatMessage: vi.fn(),
  touchChatSession: vi.fn(),
  addTokensUsed: vi.fn(),
  setChatSessionTitle: vi.fn(),
  getSystemPrompt: vi.fn(),
  getOrCreateProfile: vi.fn(),
  markInsightActionTaken: vi.fn(),
  listEvaluations: vi.fn(),
}));

const goals = vi.hoisted(() => ({
  listGoals: vi.fn(),
  createGoal: vi.fn(),
  getGoal: vi.fn(),
  getGoalWithMilestones: vi.fn(),
  deleteGoal: vi.fn(),
  getTask: vi.fn(),
  updateTask: vi.fn(),
  createGoalFromExtraction: vi.fn(),
  dashboardStats: vi.fn(),
}));

const ai = vi.hoisted(() => ({
  GREETING: "Hi! What goal is on your mind?",
  aiConfigured: vi.fn(),
  completeJson: vi.fn(),
  generateChatResponse: vi.fn(),
  summarizeConversation: vi.fn(),
  extractGoal: vi.fn(),
  formatConversation: vi.fn(),
}));

const oauth = vi.hoisted(() => ({
  authorizeUrl: vi.fn(),
  fetchGoogleProfile: vi.fn(),
  fetchGithubProfile: vi.fn(),
  findOrCreateOAuthUser: vi.fn(),
}));

vi.mock("../../server/storage", () => storage);
vi.mock("../../server/goals", () => goals);
vi.mock("../../server/ai", () => ai);
vi.mock("../../server/oauth", () => oauth);

import { createApp } from "../../server/app";
import { hashPassword, signOAuthState, signToken, verifyToken } from "../../server/auth";
import { badRequest } from "../../server/errors";

let server: Server;
let baseUrl = "";
const token = signToken({ userId: "user-1", email: "ada@example.com" });

type CallOptions = { body?: unknown; auth?: string | null };

async function call(method: string, path: string, opts: CallOptions = {}) {
  const headers: Record<string, string> = { "Content-Type": "application/json" };
  const auth = opts.auth === undefined ? token : opts.auth;
  if (auth) headers.Authorization = `Bearer ${auth}`;
  const res = await fetch(`${baseUrl}${path}`, {
    method,
    headers,
    body: opts.body === undefined ? undefined : JSON.stringify(opts.body),
  });
  const text = await res.text();
  const body: unknown = text ? JSON.parse(text) : null;
  return { status: res.status, body };
}

beforeAll(async () => {
  server = createApp().listen(0);
  await new Promise<void>((resolve) => server.once("listening", () => resolve()));
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === "string") throw new Error("Server has no port");
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
  await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
});

beforeEach(() => {
  vi.resetAllMocks();
  storage.getUserById.mockResolvedValue(makeUser());
  storage.getSystemPrompt.mockResolvedValue(null);
  storage.getOrCreateProfile.mockResolvedValue(makeProfile());
  ai.aiConfigured.mockReturnValue(false);
});

describe("app", () => {
  it("answers the health check", async () => {
    expect(await call("GET", "/api/health", { auth: null })).toEqual({ status: 200, body: { ok: true } });
  });

  it("returns JSON for unknown API paths", async () => {
    expect(await call("GET", "/api/nope")).toEqual({ status: 404, body: { error: "Not found" } });
  });

  it("rejects an oversized body with its own status", async () => {
    const res = await call("POST", "/api/goals", { body: { title: "x", description: "a".repeat(1_100_000) } });
    expect(res).toEqual({ status: 413, body: { error: "request entity too large" } });
    expect(goals.createGoal).not.toHaveBeenCalled();
  });
});

describe("auth", () => {
  it("registers a new account without storing the raw password", async () => {
    storage.findUserByEmail.mockResolvedValueOnce(null);
    storage.createUser.mockResolvedValueOnce(makeUser({ id: "user-2", email: "new@example.com", name: "New" }));

    const { status, body } = await call("POST", "/api/auth/register", {
      auth: null,
      body: { email: "new@example.com", password: "long-enough-pw", name: "New" },
    });

    expect(status).toBe(201);
    expect(body).toMatchObject({
      token: expect.any(String),
      user: { id: "user-2", email: "new@example.com", name: "New", auth_provider: "email" },
    });
    const params = storage.createUser.mock.calls[0]?.[0];
    expect(params).toMatchObject({ email: "new@example.com", authProvider: "email" });
    expect(params.passwordHash).not.toBe("long-enough-pw");
  });

  it("refuses a duplicate email", async () => {
    storage.findUserByEmail.mockResolvedValueOnce(makeUser());
    const res = await call("POST", "/api/auth/register", {
      auth: null,
      body: { email: "ada@example.com", password: "long-enough-pw" },
    });
    expect(res).toEqual({ status: 400, body: { error: "Email already registered" } });
  });

  it("rejects a short password", async () => {
    const res = await call("POST", "/api/auth/register", {
      auth: null,
      body: { email: "new@example.com", password: "short" },
    });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: "Invalid request" });
    expect(storage.createUser).not.toHaveBeenCalled();
  });

  it("logs in with the right password only", async () => {
    const user = makeUser({ passwordHash: hashPassword("correct-horse") });
    storage.findUserByEmail.mockResolvedValue(user);

    const ok = await call("POST", "/api/auth/login", {
      auth: null,
      body: { email: "ada@example.com", password: "correct-horse" },
    });
    expect(ok.status).toBe(200);
    expect(ok.body).toMatchObject({ token: expect.any(String), user: { id: "user-1" } });

    const bad = await call("POST", "/api/auth/login", {
      auth: null,
      body: { email: "ada@example.com", password: "wrong-horse" },
    });
    expect(bad).toEqual({ status: 401, body: { error: "Invalid email or password" } });
  });

  it("does not let OAuth-only accounts log in with a password", async () => {
    storage.findUserByEmail.mockResolvedValueOnce(makeUser({ authProvider: "google", passwordHash: null }));
    const res = await call("POST", "/api/auth/login", {
      auth: null,
      body: { email: "ada@example.com", password: "anything" },
    });
    expect(res.status).toBe(401);
  });

  it("returns the current user", async () => {
    expect(await call("GET", "/api/auth/me")).toEqual({
      status: 200,
      body: {
        id: "user-1",
        email: "ada@example.com",
        name: "Ada",
        avatar_url: null,
        auth_provider: "email",
        is_active: true,
        created_at: "2026-03-01T09:00:00.000Z",
      },
    });
  });

  it("needs a token", async () => {
    expect(await call("GET", "/api/auth/me", { auth: null })).toEqual({ status: 401, body: { error: "Missing token" } });
    expect(await call("GET", "/api/auth/me", { auth: "not-a-jwt" })).toEqual({
      status: 401,
      body: { error: "Invalid token" },
    });
  });

  it("turns away deactivated accounts", async () => {
    storage.getUserById.mockResolvedValue(makeUser({ isActive: false }));
    expect(await call("GET", "/api/goals")).toEqual({ status: 401, body: { error: "Invalid token" } });
  });
});

describe("goals", () => {
  it("lists goals with their counts", async () => {
    goals.listGoals.mockResolvedValueOnce([{ ...makeGoal(), milestoneCount: 2, taskCount: 5, completedTaskCount: 1 }]);
    const { status, body } = await call("GET", "/api/goals");
    expect(status).toBe(200);
    expect(body).toMatchObject({
      goals: [{ id: "goal-1", title: "Run a half marathon", milestone_count: 2, task_count: 5, completed_task_count: 1 }],
    });
    expect(goals.listGoals).toHaveBeenCalledWith("user-1");
  });

  it("creates a goal", async () => {
    goals.createGoal.mockResolvedValueOnce(makeGoal({ title: "Learn Spanish", category: "education" }));
    const { status, body } = await call("POST", "/api/goals", {
      body: { title: "  Learn Spanish ", category: "education", target_date: "2026-12-31" },
    });
    expect(status).toBe(201);
    expect(body).toMatchObject({ title: "Learn Spanish", category: "education" });
    expect(goals.createGoal).toHaveBeenCalledWith("user-1", {
      title: "Learn Spanish",
      description: undefined,
      category: "education",
      targetDate: "2026-12-31",
    });
  });

  it("validates the target date", async () => {
    const res = await call("POST", "/api/goals", { body: { title: "Learn Spanish", target_date: "next year" } });
    expect(res.status).toBe(400);
    expect(goals.createGoal).not.toHaveBeenCalled();
  });

  it("hides goals the user does not own", async () => {
    goals.getGoalWithMilestones.mockResolvedValueOnce(null);
    expect(await call("GET", "/api/goals/goal-9")).toEqual({ status: 404, body: { error: "Goal not found" } });
    expect(goals.getGoalWithMilestones).toHaveBeenCalledWith("goal-9", "user-1");
  });

  it("deletes a goal", async () => {
    goals.getGoal.mockResolvedValueOnce(makeGoal());
    expect(await call("DELETE", "/api/goals/goal-1")).toEqual({ status: 204, body: null });
    expect(goals.deleteGoal).toHaveBeenCalledWith("goal-1");
  });

  it("completes a task", async () => {
    const task = makeTask();
    goals.getGoal.mockResolvedValueOnce(makeGoal());
    goals.getTask.mockResolvedValueOnce(task);
    goals.updateTask.mockResolvedValueOnce(makeTask({ status: "completed", streakCount: 1 }));

    const { status, body } = await call("POST", "/api/goals/goal-1/tasks/task-1/complete");

    expect(status).toBe(200);
    expect(body).toMatchObject({ id: "task-1", status: "completed", streak_count: 1 });
    expect(goals.getTask).toHaveBeenCalledWith("goal-1", "task-1");
    expect(goals.updateTask).toHaveBeenCalledWith(task, { status: "completed" });
  });

  it("needs a milestone to add a task to", async () => {
    expect(await call("POST", "/api/goals/goal-1/tasks", { body: { title: "Stretch" } })).toEqual({
      status: 400,
      body: { error: "milestone_id is required" },
    });
  });
});

describe("chat", () => {
  const session = {
    id: "s-1",
    userId: "user-1",
    title: null,
    status: "active",
    goalId: null,
    createdAt: "2026-03-01T09:00:00.000Z",
    updatedAt: "2026-03-01T09:00:00.000Z",
  };
  const greeting = {
    id: "m-0",
    sessionId: "s-1",
    role: "assistant",
    content: "Hi! What goal is on your mind?",
    createdAt: "2026-03-01T09:00:00.000Z",
  };

  it("starts a session with the greeting", async () => {
    storage.createChatSession.mockResolvedValueOnce(session);
    storage.addChatMessage.mockResolvedValueOnce(greeting);

    const { status, body } = await call("POST", "/api/chat/start");

    expect(status).toBe(201);
    expect(body).toMatchObject({
      id: "s-1",
      status: "active",
      messages: [{ id: "m-0", role: "assistant", content: "Hi! What goal is on your mind?" }],
    });
    expect(storage.addChatMessage).toHaveBeenCalledWith("s-1", "assistant", "Hi! What goal is on your mind?");
  });

  it("replies, charges tokens and names the session on the third message", async () => {
    storage.getChatSession.mockResolvedValueOnce(session);
    storage.listChatMessages.mockResolvedValueOnce([greeting]);
    storage.addChatMessage.mockImplementation(async (sessionId: string, role: string, content: string) => ({
      id: `m-${role}`,
      sessionId,
      role,
      content,
      createdAt: "2026-03-01T09:01:00.000Z",
    }));
    ai.generateChatResponse.mockResolvedValueOnce({ content: "How far do you run today?", tokensUsed: 12, fallback: false });
    ai.summarizeConversation.mockResolvedValueOnce("Half marathon training");

    const { status, body } = await call("POST", "/api/chat/s-1/message", { body: { content: " I want to run " } });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      user_message: { id: "m-user", content: "I want to run" },
      assistant_message: { id: "m-assistant", content: "How far do you run today?" },
      session_title: "Half marathon training",
    });
    expect(storage.addTokensUsed).toHaveBeenCalledWith("user-1", 12);
    expect(storage.setChatSessionTitle).toHaveBeenCalledWith("s-1", "Half marathon training");
  });

  it("refuses messages once the quota is spent", async () => {
    storage.getChatSession.mockResolvedValueOnce(session);
    storage.getUserById.mockResolvedValue(makeUser({ tokensUsed: 100000 }));
    const res = await call("POST", "/api/chat/s-1/message", { body: { content: "hello" } });
    expect(res).toEqual({ status: 429, body: { error: "Token quota exceeded" } });
    expect(ai.generateChatResponse).not.toHaveBeenCalled();
  });

  it("reports a model failure as unavailable", async () => {
    storage.getChatSession.mockResolvedValueOnce(session);
    storage.listChatMessages.mockResolvedValueOnce([greeting]);
    storage.addChatMessage.mockResolvedValueOnce({ ...greeting, id: "m-1", role: "user", content: "hello" });
    ai.generateChatResponse.mockRejectedValueOnce(new Error("upstream down"));

    expect(await call("POST", "/api/chat/s-1/message", { body: { content: "hello" } })).toEqual({
      status: 503,
      body: { error: "AI service temporarily unavailable. Please try again." },
    });
  });

  it("keeps other users out of a session", async () => {
    storage.getChatSession.mockResolvedValueOnce({ ...session, userId: "user-2" });
    expect(await call("GET", "/api/chat/s-1")).toEqual({ status: 403, body: { error: "Access denied" } });
  });

  describe("finalize", () => {
    const reply = { ...greeting, id: "m-1", role: "user", content: "I want to run a half marathon" };
    const extracted = {
      title: "Run a half marathon",
      description: null,
      category: "health",
      targetDate: "2026-09-01",
      milestones: [{ title: "Build a base", description: null, targetDate: null, tasks: [] }],
    };

    it("creates the goal and its roadmap", async () => {
      storage.getChatSession.mockResolvedValueOnce(session);
      storage.listChatMessages.mockResolvedValueOnce([greeting, reply]);
      ai.extractGoal.mockResolvedValueOnce({ goal: extracted, tokensUsed: 40 });
      goals.createGoalFromExtraction.mockResolvedValueOnce(makeGoal({ chatSessionId: "s-1" }));
      goals.getGoalWithMilestones.mockResolvedValueOnce({ ...makeGoal({ chatSessionId: "s-1" }), milestones: [] });

      const { status, body } = await call("POST", "/api/chat/s-1/finalize");

      expect(status).toBe(201);
      expect(body).toMatchObject({
        goal: { id: "goal-1", title: "Run a half marathon", chat_session_id: "s-1", milestones: [] },
        message: "Goal 'Run a half marathon' created with roadmap!",
      });
      expect(goals.createGoalFromExtraction).toHaveBeenCalledWith("user-1", "s-1", extracted);
      expect(storage.addTokensUsed).toHaveBeenCalledWith("user-1", 40);
      expect(goals.getGoalWithMilestones).toHaveBeenCalledWith("goal-1", "user-1");
    });

    it("refuses a session that is already finalized", async () => {
      storage.getChatSession.mockResolvedValueOnce({ ...session, status: "finalized", goalId: "goal-1" });
      expect(await call("POST", "/api/chat/s-1/finalize")).toEqual({
        status: 400,
        body: { error: "Session already finalized" },
      });
      expect(ai.extractGoal).not.toHaveBeenCalled();
    });

    it("refuses when another finalize won the race", async () => {
      storage.getChatSession.mockResolvedValueOnce(session);
      storage.listChatMessages.mockResolvedValueOnce([greeting, reply]);
      ai.extractGoal.mockResolvedValueOnce({ goal: extracted, tokensUsed: 40 });
      goals.createGoalFromExtraction.mockRejectedValueOnce(badRequest("Session already finalized"));

      expect(await call("POST", "/api/chat/s-1/finalize")).toEqual({
        status: 400,
        body: { error: "Session already finalized" },
      });
      expect(storage.addTokensUsed).not.toHaveBeenCalled();
    });

    it("needs at least two messages", async () => {
      storage.getChatSession.mockResolvedValueOnce(session);
      storage.listChatMessages.mockResolvedValueOnce([greeting]);
      expect(await call("POST", "/api/chat/s-1/finalize")).toEqual({
        status: 400,
        body: { error: "Not enough conversation to extract a goal" },
      });
    });

    it("422s when no goal comes out of the conversation", async () => {
      storage.getChatSession.mockResolvedValueOnce(session);
      storage.listChatMessages.mockResolvedValueOnce([greeting, reply]);
      ai.extractGoal.mockResolvedValueOnce({ goal: null, tokensUsed: 10 });
      expect(await call("POST", "/api/chat/s-1/finalize")).toEqual({
        status: 422,
        body: { error: "Could not extract a goal from this conversation" },
      });
      expect(goals.createGoalFromExtraction).not.toHaveBeenCalled();
    });

    it("reports an extraction failure as unavailable", async () => {
      storage.getChatSession.mockResolvedValueOnce(session);
      storage.listChatMessages.mockResolvedValueOnce([greeting, reply]);
      ai.extractGoal.mockRejectedValueOnce(new Error("upstream down"));
      expect(await call("POST", "/api/chat/s-1/finalize")).toEqual({
        status: 503,
        body: { error: "AI service temporarily unavailable. Please try again." },
      });
    });
  });
});

describe("dashboard", () => {
  it("returns the stats in snake_case", async () => {
    goals.dashboardStats.mockResolvedValueOnce({
      activeGoals: 2,
      totalTasks: 3,
      completedTasks: 1,
      completionRate: 33,
      currentStreak: 2,
      upcomingTasks: [
        {
          id: "task-1",
          title: "Run 5k",
          goalId: "goal-1",
          goalTitle: "Run a half marathon",
          dueDate: "2026-03-12",
          priority: "high",
          status: "pending",
        },
      ],
    });

    expect(await call("GET", "/api/dashboard/stats")).toEqual({
      status: 200,
      body: {
        active_goals: 2,
        total_tasks: 3,
        completed_tasks: 1,
        completion_rate: 33,
        current_streak: 2,
        upcoming_tasks: [
          {
            id: "task-1",
            title: "Run 5k",
            goal_id: "goal-1",
            goal_title: "Run a half marathon",
            due_date: "2026-03-12",
            priority: "high",
            status: "pending",
          },
        ],
      },
    });
    expect(goals.dashboardStats).toHaveBeenCalledWith("user-1");
  });

  it("reports the token quota", async () => {
    storage.getUserById.mockResolvedValue(makeUser({ tokenLimit: 1000, tokensUsed: 250 }));
    expect(await call("GET", "/api/dashboard/quota")).toEqual({
      status: 200,
      body: {
        token_limit: 1000,
        tokens_used: 250,
        tokens_remaining: 750,
        quota_reset_at: null,
        usage_percentage: 25,
      },
    });
  });
});

describe("oauth callback", () => {
  async function callback(query: string) {
    const res = await fetch(`${baseUrl}/api/auth/google/callback?${query}`, { redirect: "manual" });
    return { status: res.status, location: res.headers.get("location") ?? "" };
  }

  it("hands a token to the frontend", async () => {
    oauth.fetchGoogleProfile.mockResolvedValueOnce({ email: "ada@example.com", name: "Ada", avatarUrl: null });
    oauth.findOrCreateOAuthUser.mockResolvedValueOnce(makeUser({ authProvider: "google" }));

    const state = encodeURIComponent(signOAuthState("google"));
    const { status, location } = await callback(`code=abc&state=${state}`);

    expect(status).toBe(302);
    const prefix = "http://localhost:5173/oauth/callback?token=";
    expect(location.startsWith(prefix)).toBe(true);
    const issued = verifyToken(decodeURIComponent(location.slice(prefix.length)));
    expect(issued).toMatchObject({ userId: "user-1", email: "ada@example.com" });
    expect(oauth.fetchGoogleProfile).toHaveBeenCalledWith("abc");
    expect(oauth.findOrCreateOAuthUser).toHaveBeenCalledWith("google", {
      email: "ada@example.com",
      name: "Ada",
      avatarUrl: null,
    });
  });

  it("sends a bad state back to the login page", async () => {
    const state = encodeURIComponent(signOAuthState("github"));
    expect(await callback(`code=abc&state=${state}`)).toEqual({
      status: 302,
      location: "http://localhost:5173/login?error=oauth_failed",
    });
    expect(oauth.fetchGoogleProfile).not.toHaveBeenCalled();
  });

  it("sends a failed profile lookup back to the login page", async () => {
    oauth.fetchGoogleProfile.mockRejectedValueOnce(new Error("token exchange failed"));
    const state = encodeURIComponent(signOAuthState("google"));
    expect(await callback(`code=abc&state=${state}`)).toEqual({
      status: 302,
      location: "http://localhost:5173/login?error=oauth_failed",
    });
  });
});

describe("agents", () => {
  it("routes a first message to the foundation agent", async () => {
    ai.completeJson.mockResolvedValueOnce({
      data: { goal_summary: "Learn Spanish", clarity_score: 5, message: "What level are you aiming for?" },
      raw: "",
      tokensUsed: 0,
    });

    const { status, body } = await call("POST", "/api/agents/route", {
      body: { messages: [{ content: "I want to learn Spanish" }] },
    });

    expect(status).toBe(200);
    expect(body).toMatchObject({
      agent_type: "foundation",
      success: true,
      message: "What level are you aiming for?",
      next_agent: null,
      requires_user_input: true,
      data: { goal_summary: "Learn Spanish", clarity_score: 5 },
    });
  });

  it("reports a failed agent in the body", async () => {
    ai.completeJson.mockRejectedValueOnce(new Error("model timeout"));
    const { status, body } = await call("POST", "/api/agents/route", { body: { agent_type: "support" } });
    expect(status).toBe(200);
    expect(body).toMatchObject({ agent_type: "support", success: false, message: "Agent error: model timeout", data: {} });
  });

  it("lists the six agents", async () => {
    const { body } = await call("GET", "/api/agents/info");
    expect(body).toMatchObject({ total_agents: 6 });
  });

  it("404s a check-in for an unknown goal", async () => {
    goals.getGoal.mockResolvedValueOnce(null);
    expect(await call("POST", "/api/agents/checkin", { body: { goal_id: "goal-9" } })).toEqual({
      status: 404,
      body: { error: "Goal not found" },
    });
  });
});

describe("profile and analytics", () => {
  it("404s an insight that is not the user's", async () => {
    storage.markInsightActionTaken.mockResolvedValueOnce(null);
    expect(await call("POST", "/api/insights/ins-9/action")).toEqual({
      status: 404,
      body: { error: "Insight not found" },
    });
    expect(storage.markInsightActionTaken).toHaveBeenCalledWith("user-1", "ins-9");
  });

  it("lists recent judge results", async () => {
    storage.listEvaluations.mockResolvedValueOnce([
      {
        id: "ev-1",
        userId: "user-1",
        sessionId: "s-1",
        metric: "coaching_quality",
        score: 0.8,
        reason: "clear next step",
        details: { clarity: 0.9 },
        createdAt: "2026-03-02T10:00:00.000Z",
      },
    ]);

    expect(await call("GET", "/api/analytics/traces/recent?limit=2")).toEqual({
      status: 200,
      body: {
        traces: [
          {
            id: "ev-1",
            session_id: "s-1",
            metric: "coaching_quality",
            score: 0.8,
            reason: "clear next step",
            details: { clarity: 0.9 },
            created_at: "2026-03-02T10:00:00.000Z",
          },
        ],
      },
    });
    expect(storage.listEvaluations).toHaveBeenCalledWith("user-1", 2);
  });

  it("caps the trace limit", async () => {
    expect((await call("GET", "/api/analytics/traces/recent?limit=99")).status).toBe(400);
  });

  it("needs a model for an explicit evaluation", async () => {
    expect(
      await call("POST", "/api/analytics/evaluate/coaching", { body: { user_input: "hi", ai_response: "hello" } }),
    ).toEqual({ status: 503, body: { error: "AI service not configured" } });
  });
});

describe("frontend", () => {
  let spa: Server;
  let spaUrl = "";
  let dir = "";

  beforeAll(async () => {
    dir = mkdtempSync(path.join(tmpdir(), "milesync-spa-"));
    writeFileSync(path.join(dir, "index.html"), "<!doctype html><title>MileSync</title>");
    spa = createApp({ frontendDir: dir }).listen(0);
    await new Promise<void>((resolve) => spa.once("listening", () => resolve()));
    const address: AddressInfo | string | null = spa.address();
    if (address === null || typeof address === "string") throw new Error("Server has no port");
    spaUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => spa.close((err) => (err ? reject(err) : resolve())));
    rmSync(dir, { recursive: true, force: true });
  });

  it("serves index.html for client-side routes", async () => {
    const res = await fetch(`${spaUrl}/dashboard`);
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toContain("text/html");
    expect(await res.text()).toBe("<!doctype html><title>MileSync</title>");
  });

  it("keeps unknown API paths as JSON 404s", async () => {
    const res = await fetch(`${spaUrl}/api/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });

  it("404s through the error handler when the build is gone", async () => {
    unlinkSync(path.join(dir, "index.html"));
    const res = await fetch(`${spaUrl}/dashboard`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Not found" });
  });
});
