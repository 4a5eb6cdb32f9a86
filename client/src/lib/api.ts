import type {
  AgentResult,
  AuthResponse,
  ChatSessionDetail,
  ChatSessionSummary,
  CheckinResponse,
  CoachingMetrics,
  DailyProgress,
  DashboardStats,
  Evaluation,
  Goal,
  GoalCategory,
  GoalDetail,
  GoalListItem,
  GoalStatus,
  HabitLoop,
  Insight,
  Milestone,
  MotivationResponse,
  Performance,
  Profile,
  Quota,
  ResourcesResponse,
  SendMessageResponse,
  Task,
  TaskPriority,
  TaskStatus,
  User,
} from "./types";

const TOKEN_KEY = "milesync_token";

export function getToken() {
  try {
    return localStorage.getItem(TOKEN_KEY);
  } catch {
    return null;
  }
}

export function setToken(token: string | null) {
  try {
    if (!token) localStorage.removeItem(TOKEN_KEY);
    else localStorage.setItem(TOKEN_KEY, token);
  } catch {
    // storage unavailable (private mode)
  }
}

export class ApiError extends Error {
  constructor(
    public status: number,
    message: string,
  ) {
    super(message);
  }
}

function errorMessage(body: unknown, status: number) {
  if (body && typeof body === "object" && "error" in body && typeof body.error === "string") return body.error;
  if (typeof body === "string" && body.trim()) return body.trim().slice(0, 200);
  return `Request failed (${status})`;
}

function parseBody(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

async function request<T>(method: string, path: string, body?: unknown): Promise<T> {
  const token = getToken();

  let res: Response;
  try {
    res = await fetch(path, {
      method,
      headers: {
        Accept: "application/json",
        ...(body !== undefined ? { "Content-Type": "application/json" } : {}),
        ...(token ? { Authorization: `Bearer ${token}` } : {}),
      },
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });
  } catch (e) {
    throw new ApiError(0, e instanceof Error ? e.message : "Network error");
  }

  const text = await res.text();
  if (!res.ok) {
    if (res.status === 401) setToken(null);
    throw new ApiError(res.status, errorMessage(text ? parseBody(text) : null, res.status));
  }
  return text ? JSON.parse(text) : null;
}

export const apiGet = <T>(path: string) => request<T>("GET", path);
export const apiPost = <T>(path: string, body?: unknown) => request<T>("POST", path, body ?? {});
export const apiPut = <T>(path: string, body: unknown) => request<T>("PUT", path, body);
export const apiDelete = (path: string) => request<null>("DELETE", path);

function qs(params: Record<string, string | number | undefined>) {
  const out = new URLSearchParams();
  for (const [k, v] of Object.entries(params)) if (v !== undefined && v !== "") out.set(k, String(v));
  const s = out.toString();
  return s ? `?${s}` : "";
}

const enc = encodeURIComponent;

export type GoalFields = {
  title: string;
  description?: string | null;
  category?: GoalCategory;
  target_date?: string | null;
};

export type TaskFields = {
  title: string;
  description?: string | null;
  due_date?: string | null;
  priority?: TaskPriority;
};

export const api = {
  // auth
  async login(email: string, password: string) {
    const r = await apiPost<AuthResponse>("/api/auth/login", { email, password });
    setToken(r.token);
    return r;
  },
  async register(email: string, password: string, name?: string) {
    const r = await apiPost<AuthResponse>("/api/auth/register", { email, password, name: name || undefined });
    setToken(r.token);
    return r;
  },
  me: () => apiGet<User>("/api/auth/me"),
  updateMe: (patch: { name?: string | null; avatar_url?: string | null }) => apiPut<User>("/api/auth/me", patch),

  // chat
  startChat: () => apiPost<ChatSessionDetail>("/api/chat/start"),
  listSessions: () => apiGet<{ sessions: ChatSessionSummary[] }>("/api/chat/sessions"),
  getSession: (id: string) => apiGet<ChatSessionDetail>(`/api/chat/${enc(id)}`),
  sendMessage: (id: string, content: string) =>
    apiPost<SendMessageResponse>(`/api/chat/${enc(id)}/message`, { content }),
  finalize: (id: string) => apiPost<{ goal: GoalDetail; message: string }>(`/api/chat/${enc(id)}/finalize`),
  deleteSession: (id: string) => apiDelete(`/api/chat/${enc(id)}`),

  // goals
  listGoals: () => apiGet<{ goals: GoalListItem[] }>("/api/goals"),
  createGoal: (fields: GoalFields) => apiPost<Goal>("/api/goals", fields),
  getGoal: (id: string) => apiGet<GoalDetail>(`/api/goals/${enc(id)}`),
  updateGoal: (id: string, patch: Partial<GoalFields> & { status?: GoalStatus }) =>
    apiPut<Goal>(`/api/goals/${enc(id)}`, patch),
  deleteGoal: (id: string) => apiDelete(`/api/goals/${enc(id)}`),

  createTask: (goalId: string, milestoneId: string, fields: TaskFields) =>
    apiPost<Task>(`/api/goals/${enc(goalId)}/tasks${qs({ milestone_id: milestoneId })}`, fields),
  updateTask: (goalId: string, taskId: string, patch: Partial<TaskFields> & { status?: TaskStatus }) =>
    apiPut<Task>(`/api/goals/${enc(goalId)}/tasks/${enc(taskId)}`, patch),
  completeTask: (goalId: string, taskId: string) =>
    apiPost<Task>(`/api/goals/${enc(goalId)}/tasks/${enc(taskId)}/complete`),
  uncompleteTask: (goalId: string, taskId: string) =>
    apiPost<Task>(`/api/goals/${enc(goalId)}/tasks/${enc(taskId)}/uncomplete`),
  deleteTask: (goalId: string, taskId: string) => apiDelete(`/api/goals/${enc(goalId)}/tasks/${enc(taskId)}`),

  createMilestone: (goalId: string, fields: { title: string; description?: string | null; target_date?: string | null }) =>
    apiPost<Milestone>(`/api/goals/${enc(goalId)}/milestones`, fields),
  deleteMilestone: (goalId: string, milestoneId: string) =>
    apiDelete(`/api/goals/${enc(goalId)}/milestones/${enc(milestoneId)}`),

  // dashboard
  dashboard: () => apiGet<DashboardStats>("/api/dashboard/stats"),
  quota: () => apiGet<Quota>("/api/dashboard/quota"),

  // agents
  checkin: (payload: {
    goal_id: string;
    completed_task_ids: string[];
    notes?: string;
    mood_score?: number;
    energy_level?: number;
  }) => apiPost<CheckinResponse>("/api/agents/checkin", payload),
  resources: (goalId?: string) => apiGet<ResourcesResponse>(`/api/agents/resources${qs({ goal_id: goalId })}`),
  motivation: (message: string, goalId?: string) =>
    apiPost<MotivationResponse>("/api/agents/motivation", { message, goal_id: goalId }),
  intake: (initialMessage: string) =>
    apiPost<{ success: boolean; foundation: AgentResult; planning: AgentResult | null }>("/api/agents/pipeline/intake", {
      initial_message: initialMessage,
    }),

  // profile, habits, insights
  profile: () => apiGet<Profile>("/api/profile"),
  updateProfile: (patch: Record<string, string | number | string[] | null>) => apiPut<Profile>("/api/profile", patch),
  habits: (goalId?: string) => apiGet<{ habits: HabitLoop[] }>(`/api/habits${qs({ goal_id: goalId })}`),
  insights: (goalId?: string, limit = 20) =>
    apiGet<{ insights: Insight[] }>(`/api/insights${qs({ goal_id: goalId, limit })}`),
  markInsight: (id: string) => apiPost<Insight>(`/api/insights/${enc(id)}/action`),
  dailyProgress: (goalId?: string, days = 14) =>
    apiGet<{ progress: DailyProgress[] }>(`/api/progress/daily${qs({ goal_id: goalId, days })}`),

  // analytics
  performance: () => apiGet<Performance>("/api/analytics/performance"),
  coachingMetrics: () => apiGet<CoachingMetrics>("/api/analytics/metrics/coaching-quality"),
  traces: (limit = 10) => apiGet<{ traces: Evaluation[] }>(`/api/analytics/traces/recent${qs({ limit })}`),
};
