// Shapes returned by the /api endpoints.

export type User = {
  id: string;
  email: string;
  name: string | null;
  avatar_url: string | null;
  auth_provider: "email" | "google" | "github";
  is_active: boolean;
  created_at: string;
};

export type AuthResponse = { token: string; user: User };

export type ChatRole = "user" | "assistant" | "system";

export type ChatMessage = {
  id: string;
  session_id: string;
  role: ChatRole;
  content: string;
  created_at: string;
};

export type ChatSession = {
  id: string;
  title: string | null;
  status: "active" | "completed" | "finalized";
  goal_id: string | null;
  created_at: string;
  updated_at: string;
};

export type ChatSessionSummary = ChatSession & { message_count: number; last_message_preview: string | null };
export type ChatSessionDetail = ChatSession & { messages: ChatMessage[] };

export type SendMessageResponse = {
  user_message: ChatMessage;
  assistant_message: ChatMessage;
  session_title: string | null;
};

export type GoalCategory = "health" | "career" | "education" | "finance" | "personal" | "other";
export type GoalStatus = "active" | "completed" | "paused" | "abandoned";
export type TaskStatus = "pending" | "in_progress" | "completed" | "skipped";
export type TaskPriority = "low" | "medium" | "high";

export type Task = {
  id: string;
  milestone_id: string;
  goal_id: string;
  title: string;
  description: string | null;
  due_date: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  completed_at: string | null;
  frequency: string;
  estimated_minutes: number | null;
  streak_count: number;
  best_streak: number;
  times_completed: number;
  times_skipped: number;
  created_at: string;
};

export type Milestone = {
  id: string;
  goal_id: string;
  title: string;
  description: string | null;
  target_date: string | null;
  sort_order: number;
  is_completed: boolean;
  completed_at: string | null;
  created_at: string;
};

export type Goal = {
  id: string;
  title: string;
  description: string | null;
  category: GoalCategory;
  target_date: string | null;
  status: GoalStatus;
  progress: number;
  goal_type: string;
  smart_specific: string | null;
  smart_measurable: string | null;
  smart_achievable: string | null;
  smart_relevant: string | null;
  smart_time_bound: string | null;
  sustainability_score: number | null;
  burnout_risk: "LOW" | "MEDIUM" | "HIGH" | null;
  identified_obstacles: string[];
  success_criteria: string[];
  created_at: string;
  updated_at: string;
};

export type GoalListItem = Goal & { milestone_count: number; task_count: number; completed_task_count: number };
export type GoalDetail = Goal & { milestones: Array<Milestone & { tasks: Task[] }> };

export type DashboardStats = {
  active_goals: number;
  total_tasks: number;
  completed_tasks: number;
  completion_rate: number;
  current_streak: number;
  upcoming_tasks: Array<{
    id: string;
    title: string;
    goal_id: string;
    goal_title: string;
    due_date: string | null;
    priority: TaskPriority;
    status: TaskStatus;
  }>;
};

export type Quota = {
  token_limit: number;
  tokens_used: number;
  tokens_remaining: number;
  quota_reset_at: string | null;
  usage_percentage: number;
};

export type AgentResult = {
  agent_type: string;
  success: boolean;
  message: string;
  data: Record<string, unknown>;
  next_agent: string | null;
  requires_user_input: boolean;
  timestamp: string;
  trace_id: string;
};

export type DailyProgress = {
  id: string;
  goal_id: string;
  date: string;
  tasks_planned: number;
  tasks_completed: number;
  tasks_skipped: number;
  completion_rate: number;
  total_minutes_logged: number;
  mood_score: number | null;
  energy_level: number | null;
  notes: string | null;
};

export type CheckinResponse = {
  execution: AgentResult;
  sustainability: AgentResult;
  psychological: AgentResult | null;
  daily_progress: DailyProgress;
};

export type Resource = {
  type: "COURSE" | "BOOK" | "TOOL" | "COMMUNITY" | "EXPERT";
  name: string;
  url: string | null;
  relevance_score: number;
  time_commitment: string | null;
  cost: string;
};

export type ResourcesResponse = {
  agent_type: string;
  success: boolean;
  message: string;
  recommended_resources: Resource[] | null;
  integration_suggestions: string[] | null;
};

export type MotivationResponse = {
  agent_type: string;
  success: boolean;
  message: string;
  intervention: { type: string; technique: string; message: string; exercises: string[] } | null;
  affirmations: string[] | null;
  progress_celebration: string | null;
};

export type HabitLoop = {
  id: string;
  goal_id: string | null;
  name: string;
  cue: string;
  routine: string;
  reward: string;
  strength: "forming" | "developing" | "established" | "automatic";
  days_tracked: number;
  current_streak: number;
  completion_rate: number;
};

export type Insight = {
  id: string;
  goal_id: string | null;
  insight_type: string;
  title: string;
  description: string;
  source_agent: string | null;
  importance: number;
  action_taken: boolean;
  created_at: string;
};

export type Profile = {
  learning_style: string | null;
  motivation_type: string | null;
  personality_type: string | null;
  best_time_of_day: string | null;
  preferred_communication_style: string;
  preferred_reminder_frequency: string;
  total_goals_completed: number;
  total_tasks_completed: number;
  avg_completion_rate: number;
  longest_streak: number;
  current_stress_level: number;
  current_motivation_level: number;
  current_confidence_level: number;
  strengths: string[];
  challenges: string[];
};

export type Evaluation = {
  id: string;
  session_id: string | null;
  metric: string;
  score: number;
  reason: string;
  created_at: string;
};

export type Performance = {
  total_conversations: number;
  avg_coaching_quality: number | null;
  avg_goal_extraction_quality: number | null;
  avg_frustration_level: number | null;
  total_goals_created: number;
  model_version: string;
  evaluation_period: string;
};

export type CoachingMetrics = {
  smart_alignment: number | null;
  motivational_quality: number | null;
  actionability: number | null;
  clarity: number | null;
  goal_completion_rate: number;
  avg_session_length: number;
};
