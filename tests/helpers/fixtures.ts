import type { Goal, Milestone, Task, User, UserProfile } from "../../server/types";

const T0 = "2026-03-01T09:00:00.000Z";

export function makeUser(overrides: Partial<User> = {}): User {
  return {
    id: "user-1",
    email: "ada@example.com",
    passwordHash: null,
    name: "Ada",
    avatarUrl: null,
    authProvider: "email",
    isActive: true,
    tokenLimit: 100000,
    tokensUsed: 0,
    quotaResetAt: null,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeGoal(overrides: Partial<Goal> = {}): Goal {
  return {
    id: "goal-1",
    userId: "user-1",
    chatSessionId: null,
    title: "Run a half marathon",
    description: null,
    category: "health",
    targetDate: "2026-09-01",
    status: "active",
    progress: 0,
    goalType: "long_term",
    motivationScore: null,
    feasibilityScore: null,
    clarityScore: null,
    smartSpecific: null,
    smartMeasurable: null,
    smartAchievable: null,
    smartRelevant: null,
    smartTimeBound: null,
    sustainabilityScore: null,
    burnoutRisk: null,
    identifiedObstacles: [],
    successCriteria: [],
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeMilestone(overrides: Partial<Milestone> = {}): Milestone {
  return {
    id: "ms-1",
    goalId: "goal-1",
    title: "Build a base",
    description: null,
    targetDate: null,
    sortOrder: 0,
    isCompleted: false,
    completedAt: null,
    createdAt: T0,
    ...overrides,
  };
}

export function makeTask(overrides: Partial<Task> = {}): Task {
  return {
    id: "task-1",
    milestoneId: "ms-1",
    goalId: "goal-1",
    title: "Run 5k",
    description: null,
    dueDate: null,
    status: "pending",
    priority: "medium",
    completedAt: null,
    frequency: "one_time",
    estimatedMinutes: null,
    streakCount: 0,
    bestStreak: 0,
    lastCompletedAt: null,
    timesCompleted: 0,
    timesSkipped: 0,
    habitCue: null,
    habitReward: null,
    createdAt: T0,
    ...overrides,
  };
}

export function makeProfile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    userId: "user-1",
    learningStyle: null,
    motivationType: null,
    personalityType: null,
    bestTimeOfDay: null,
    bestDays: [],
    avgFocusDuration: null,
    preferredGoalType: null,
    preferredTaskSize: null,
    totalGoalsCompleted: 0,
    totalTasksCompleted: 0,
    avgCompletionRate: 0,
    longestStreak: 0,
    currentStressLevel: 5,
    currentMotivationLevel: 5,
    currentConfidenceLevel: 5,
    preferredReminderFrequency: "daily",
    preferredCommunicationStyle: "supportive",
    strengths: [],
    challenges: [],
    values: [],
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}
