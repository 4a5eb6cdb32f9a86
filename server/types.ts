export const AUTH_PROVIDERS = ["email", "google", "github"] as const;
export type AuthProvider = (typeof AUTH_PROVIDERS)[number];

export const CHAT_STATUSES = ["active", "completed", "finalized"] as const;
export type ChatStatus = (typeof CHAT_STATUSES)[number];

export const MESSAGE_ROLES = ["user", "assistant", "system"] as const;
export type MessageRole = (typeof MESSAGE_ROLES)[number];

export const GOAL_CATEGORIES = ["health", "career", "education", "finance", "personal", "other"] as const;
export type GoalCategory = (typeof GOAL_CATEGORIES)[number];

export const GOAL_STATUSES = ["active", "completed", "paused", "abandoned"] as const;
export type GoalStatus = (typeof GOAL_STATUSES)[number];

export const GOAL_TYPES = ["short_term", "long_term", "resolution"] as const;
export type GoalType = (typeof GOAL_TYPES)[number];

export const TASK_STATUSES = ["pending", "in_progress", "completed", "skipped"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ["low", "medium", "high"] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export const TASK_FREQUENCIES = ["daily", "weekly", "monthly", "one_time"] as const;
export type TaskFrequency = (typeof TASK_FREQUENCIES)[number];

export const HABIT_STRENGTHS = ["forming", "developing", "established", "automatic"] as const;
export type HabitStrength = (typeof HABIT_STRENGTHS)[number];

export const INSIGHT_TYPES = ["pattern", "strength", "weakness", "recommendation", "warning"] as const;
export type InsightType = (typeof INSIGHT_TYPES)[number];

export const LEARNING_STYLES = ["visual", "auditory", "reading", "kinesthetic"] as const;
export type LearningStyle = (typeof LEARNING_STYLES)[number];

export const MOTIVATION_TYPES = ["intrinsic", "extrinsic", "achievement", "affiliation", "power"] as const;
export type MotivationType = (typeof MOTIVATION_TYPES)[number];

export const PERSONALITY_TYPES = ["driver", "analytical", "expressive", "amiable"] as const;
export type PersonalityType = (typeof PERSONALITY_TYPES)[number];

export const BURNOUT_RISKS = ["LOW", "MEDIUM", "HIGH"] as const;
export type BurnoutRisk = (typeof BURNOUT_RISKS)[number];

export function pickEnum<T extends string>(values: readonly T[], v: unknown, fallback: T): T {
  const s = String(v ?? "").trim().toLowerCase();
  return values.find((x) => x.toLowerCase() === s) ?? fallback;
}

export type User = {
  id: string;
  email: string;
  passwordHash: string | null;
  name: string | null;
  avatarUrl: string | null;
  authProvider: AuthProvider;
  isActive: boolean;
  tokenLimit: number;
  tokensUsed: number;
  quotaResetAt: string | null;
  createdAt: string;
  updatedAt: string;
};

export type ChatSession = {
  id: string;
  userId: string;
  title: string | null;
  status: ChatStatus;
  goalId: string | null;
  createdAt: string;
  updatedAt: string;
};

export type ChatMessage = {
  id: string;
  sessionId: string;
  role: MessageRole;
  content: string;
  createdAt: string;
};

export type Goal = {
  id: string;
  userId: string;
  chatSessionId: string | null;
  title: string;
  description: string | null;
  category: GoalCategory;
  targetDate: string | null; // YYYY-MM-DD
  status: GoalStatus;
  progress: number; // 0..100
  goalType: GoalType;
  motivationScore: number | null;
  feasibilityScore: number | null;
  clarityScore: number | null;
  smartSpecific: string | null;
  smartMeasurable: string | null;
  smartAchievable: string | null;
  smartRelevant: string | null;
  smartTimeBound: string | null;
  sustainabilityScore: number | null;
  burnoutRisk: BurnoutRisk | null;
  identifiedObstacles: string[];
  successCriteria: string[];
  createdAt: string;
  updatedAt: string;
};

export type Milestone = {
  id: string;
  goalId: string;
  title: string;
  description: string | null;
  targetDate: string | null;
  sortOrder: number;
  isCompleted: boolean;
  completedAt: string | null;
  createdAt: string;
};

export type Task = {
  id: string;
  milestoneId: string;
  goalId: string;
  title: string;
  description: string | null;
  dueDate: string | null;
  status: TaskStatus;
  priority: TaskPriority;
  completedAt: string | null;
  frequency: TaskFrequency;
  estimatedMinutes: number | null;
  streakCount: number;
  bestStreak: number;
  lastCompletedAt: string | null;
  timesCompleted: number;
  timesSkipped: number;
  habitCue: string | null;
  habitReward: string | null;
  createdAt: string;
};

export type MilestoneWithTasks = Milestone & { tasks: Task[] };
export type GoalWithMilestones = Goal & { milestones: MilestoneWithTasks[] };

export type GoalListItem = Goal & {
  milestoneCount: number;
  taskCount: number;
  completedTaskCount: number;
};

export type HabitLoop = {
  id: string;
  userId: string;
  taskId: string | null;
  goalId: string | null;
  name: string;
  description: string | null;
  cue: string;
  routine: string;
  reward: string;
  strength: HabitStrength;
  daysTracked: number;
  currentStreak: number;
  bestStreak: number;
  completionRate: number;
  targetTime: string | null;
  targetDays: string[];
  isActive: boolean;
  lastPerformedAt: string | null;
  createdAt: string;
  updatedAt: string;
};

export type UserInsight = {
  id: string;
  userId: string;
  goalId: string | null;
  insightType: InsightType;
  title: string;
  description: string;
  sourceAgent: string;
  importance: number; // 1..10
  confidence: number; // 0..1
  isActionable: boolean;
  actionTaken: boolean;
  data: Record<string, unknown>;
  expiresAt: string | null;
  createdAt: string;
};

export type UserProfile = {
  userId: string;
  learningStyle: LearningStyle | null;
  motivationType: MotivationType | null;
  personalityType: PersonalityType | null;
  bestTimeOfDay: string | null;
  bestDays: string[];
  avgFocusDuration: number | null;
  preferredGoalType: GoalType | null;
  preferredTaskSize: string | null;
  totalGoalsCompleted: number;
  totalTasksCompleted: number;
  avgCompletionRate: number;
  longestStreak: number;
  currentStressLevel: number;
  currentMotivationLevel: number;
  currentConfidenceLevel: number;
  preferredReminderFrequency: string;
  preferredCommunicationStyle: string;
  strengths: string[];
  challenges: string[];
  values: string[];
  createdAt: string;
  updatedAt: string;
};

export type DailyProgress = {
  id: string;
  userId: string;
  goalId: string;
  date: string; // day key
  tasksPlanned: number;
  tasksCompleted: number;
  tasksSkipped: number;
  completionRate: number;
  totalMinutesLogged: number;
  moodScore: number | null;
  energyLevel: number | null;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
};

export const EVALUATION_METRICS = ["coaching_quality", "goal_extraction_quality", "frustration"] as const;
export type EvaluationMetric = (typeof EVALUATION_METRICS)[number];

export type AiEvaluation = {
  id: string;
  userId: string;
  sessionId: string | null;
  metric: EvaluationMetric;
  score: number;
  reason: string;
  details: Record<string, unknown>;
  createdAt: string;
};

/** Goal tree parsed out of a coaching conversation. */
export type ExtractedTask = {
  title: string;
  description: string | null;
  priority: TaskPriority;
};

export type ExtractedMilestone = {
  title: string;
  description: string | null;
  targetDate: string | null;
  tasks: ExtractedTask[];
};

export type ExtractedGoal = {
  title: string;
  description: string | null;
  category: GoalCategory;
  targetDate: string | null;
  milestones: ExtractedMilestone[];
};
