// API shapes: domain objects out as snake_case JSON.
import type { AgentResult } from "./agents.js";
import type { DashboardStats } from "./goals.js";
import type { ChatSessionSummary } from "./storage.js";
import type {
  AiEvaluation,
  ChatMessage,
  ChatSession,
  DailyProgress,
  Goal,
  GoalListItem,
  GoalWithMilestones,
  HabitLoop,
  Milestone,
  MilestoneWithTasks,
  Task,
  User,
  UserInsight,
  UserProfile,
} from "./types.js";

export function publicUser(u: User) {
  return {
    id: u.id,
    email: u.email,
    name: u.name,
    avatar_url: u.avatarUrl,
    auth_provider: u.authProvider,
    is_active: u.isActive,
    created_at: u.createdAt,
  };
}

export function chatSessionJson(s: ChatSession) {
  return {
    id: s.id,
    title: s.title,
    status: s.status,
    goal_id: s.goalId,
    created_at: s.createdAt,
    updated_at: s.updatedAt,
  };
}

export function chatSessionSummaryJson(s: ChatSessionSummary) {
  return {
    ...chatSessionJson(s),
    message_count: s.messageCount,
    last_message_preview: s.lastMessage === null ? null : s.lastMessage.slice(0, 100),
  };
}

export function chatMessageJson(m: ChatMessage) {
  return { id: m.id, session_id: m.sessionId, role: m.role, content: m.content, created_at: m.createdAt };
}

export function taskJson(t: Task) {
  return {
    id: t.id,
    milestone_id: t.milestoneId,
    goal_id: t.goalId,
    title: t.title,
    description: t.description,
    due_date: t.dueDate,
    status: t.status,
    priority: t.priority,
    completed_at: t.completedAt,
    frequency: t.frequency,
    estimated_minutes: t.estimatedMinutes,
    streak_count: t.streakCount,
    best_streak: t.bestStreak,
    last_completed_at: t.lastCompletedAt,
    times_completed: t.timesCompleted,
    times_skipped: t.timesSkipped,
    habit_cue: t.habitCue,
    habit_reward: t.habitReward,
    created_at: t.createdAt,
  };
}

export function milestoneJson(m: Milestone) {
  return {
    id: m.id,
    goal_id: m.goalId,
    title: m.title,
    description: m.description,
    target_date: m.targetDate,
    sort_order: m.sortOrder,
    is_completed: m.isCompleted,
    completed_at: m.completedAt,
    created_at: m.createdAt,
  };
}

export function goalJson(g: Goal) {
  return {
    id: g.id,
    user_id: g.userId,
    chat_session_id: g.chatSessionId,
    title: g.title,
    description: g.description,
    category: g.category,
    target_date: g.targetDate,
    status: g.status,
    progress: g.progress,
    goal_type: g.goalType,
    motivation_score: g.motivationScore,
    feasibility_score: g.feasibilityScore,
    clarity_score: g.clarityScore,
    smart_specific: g.smartSpecific,
    smart_measurable: g.smartMeasurable,
    smart_achievable: g.smartAchievable,
    smart_relevant: g.smartRelevant,
    smart_time_bound: g.smartTimeBound,
    sustainability_score: g.sustainabilityScore,
    burnout_risk: g.burnoutRisk,
    identified_obstacles: g.identifiedObstacles,
    success_criteria: g.successCriteria,
    created_at: g.createdAt,
    updated_at: g.updatedAt,
  };
}

export function goalListItemJson(g: GoalListItem) {
  return {
    ...goalJson(g),
    milestone_count: g.milestoneCount,
    task_count: g.taskCount,
    completed_task_count: g.completedTaskCount,
  };
}

function milestoneWithTasksJson(m: MilestoneWithTasks) {
  return { ...milestoneJson(m), tasks: m.tasks.map(taskJson) };
}

export function goalDetailJson(g: GoalWithMilestones) {
  return { ...goalJson(g), milestones: g.milestones.map(milestoneWithTasksJson) };
}

export function dashboardJson(s: DashboardStats) {
  return {
    active_goals: s.activeGoals,
    total_tasks: s.totalTasks,
    completed_tasks: s.completedTasks,
    completion_rate: s.completionRate,
    current_streak: s.currentStreak,
    upcoming_tasks: s.upcomingTasks.map((t) => ({
      id: t.id,
      title: t.title,
      goal_id: t.goalId,
      goal_title: t.goalTitle,
      due_date: t.dueDate,
      priority: t.priority,
      status: t.status,
    })),
  };
}

export function quotaJson(u: User) {
  const remaining = Math.max(0, u.tokenLimit - u.tokensUsed);
  const usage = u.tokenLimit > 0 ? Math.round((u.tokensUsed / u.tokenLimit) * 1000) / 10 : 0;
  return {
    token_limit: u.tokenLimit,
    tokens_used: u.tokensUsed,
    tokens_remaining: remaining,
    quota_reset_at: u.quotaResetAt,
    usage_percentage: usage,
  };
}

export function habitLoopJson(h: HabitLoop) {
  return {
    id: h.id,
    task_id: h.taskId,
    goal_id: h.goalId,
    name: h.name,
    description: h.description,
    cue: h.cue,
    routine: h.routine,
    reward: h.reward,
    strength: h.strength,
    days_tracked: h.daysTracked,
    current_streak: h.currentStreak,
    best_streak: h.bestStreak,
    completion_rate: h.completionRate,
    target_time: h.targetTime,
    target_days: h.targetDays,
    is_active: h.isActive,
    last_performed_at: h.lastPerformedAt,
    created_at: h.createdAt,
    updated_at: h.updatedAt,
  };
}

export function insightJson(i: UserInsight) {
  return {
    id: i.id,
    goal_id: i.goalId,
    insight_type: i.insightType,
    title: i.title,
    description: i.description,
    source_agent: i.sourceAgent,
    importance: i.importance,
    confidence: i.confidence,
    is_actionable: i.isActionable,
    action_taken: i.actionTaken,
    data: i.data,
    expires_at: i.expiresAt,
    created_at: i.createdAt,
  };
}

export function profileJson(p: UserProfile) {
  return {
    user_id: p.userId,
    learning_style: p.learningStyle,
    motivation_type: p.motivationType,
    personality_type: p.personalityType,
    best_time_of_day: p.bestTimeOfDay,
    best_days: p.bestDays,
    avg_focus_duration: p.avgFocusDuration,
    preferred_goal_type: p.preferredGoalType,
    preferred_task_size: p.preferredTaskSize,
    total_goals_completed: p.totalGoalsCompleted,
    total_tasks_completed: p.totalTasksCompleted,
    avg_completion_rate: p.avgCompletionRate,
    longest_streak: p.longestStreak,
    current_stress_level: p.currentStressLevel,
    current_motivation_level: p.currentMotivationLevel,
    current_confidence_level: p.currentConfidenceLevel,
    preferred_reminder_frequency: p.preferredReminderFrequency,
    preferred_communication_style: p.preferredCommunicationStyle,
    strengths: p.strengths,
    challenges: p.challenges,
    values: p.values,
    created_at: p.createdAt,
    updated_at: p.updatedAt,
  };
}

export function dailyProgressJson(d: DailyProgress) {
  return {
    id: d.id,
    goal_id: d.goalId,
    date: d.date,
    tasks_planned: d.tasksPlanned,
    tasks_completed: d.tasksCompleted,
    tasks_skipped: d.tasksSkipped,
    completion_rate: d.completionRate,
    total_minutes_logged: d.totalMinutesLogged,
    mood_score: d.moodScore,
    energy_level: d.energyLevel,
    notes: d.notes,
    created_at: d.createdAt,
    updated_at: d.updatedAt,
  };
}

export function evaluationJson(e: AiEvaluation) {
  return {
    id: e.id,
    session_id: e.sessionId,
    metric: e.metric,
    score: e.score,
    reason: e.reason,
    details: e.details,
    created_at: e.createdAt,
  };
}

export function agentResultJson(r: AgentResult<Record<string, unknown>>) {
  return {
    agent_type: r.agentType,
    success: r.success,
    message: r.message,
    data: r.data ?? {},
    next_agent: r.nextAgent,
    requires_user_input: r.requiresUserInput,
    timestamp: r.timestamp,
    trace_id: r.traceId,
  };
}
