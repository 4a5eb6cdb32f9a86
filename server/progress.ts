// Pure progress / streak arithmetic shared by the goal service, dashboard and agents.
import { dayKeyFromIso } from "./db.js";
import type { TaskPriority, TaskStatus } from "./types.js";

/** floor(completed / total * 100); 0 when there is nothing to count. */
export function percent(completed: number, total: number) {
  if (total <= 0) return 0;
  return Math.floor((completed / total) * 100);
}

/**
 * Goal progress from its task statuses.
 * A goal with no tasks keeps whatever progress it already had.
 */
export function computeGoalProgress(statuses: TaskStatus[], current: number) {
  if (statuses.length === 0) return current;
  const done = statuses.filter((s) => s === "completed").length;
  return percent(done, statuses.length);
}

/** Complete when nothing is left that is neither completed nor skipped. */
export function isMilestoneComplete(statuses: TaskStatus[]) {
  return statuses.every((s) => s === "completed" || s === "skipped");
}

export type MilestoneTransition = { isCompleted: boolean; completedAt: string | null };

export function milestoneTransition(
  statuses: TaskStatus[],
  prev: { isCompleted: boolean; completedAt: string | null },
  now: string,
): MilestoneTransition {
  const complete = isMilestoneComplete(statuses);
  if (complete && !prev.isCompleted) return { isCompleted: true, completedAt: now };
  if (!complete && prev.isCompleted) return { isCompleted: false, completedAt: null };
  return { isCompleted: prev.isCompleted, completedAt: prev.completedAt };
}

export function addDaysToKey(dayKey: string, days: number) {
  const d = new Date(`${dayKey}T00:00:00.000Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/**
 * Consecutive days (UTC day keys) with at least one completion, counting back
 * from today; if today has none yet, the run may still end yesterday.
 */
export function calculateStreak(completionDayKeys: Iterable<string>, today: string) {
  const days = new Set(completionDayKeys);
  let cursor = today;
  if (!days.has(cursor)) {
    cursor = addDaysToKey(today, -1);
    if (!days.has(cursor)) return 0;
  }
  let streak = 0;
  while (days.has(cursor)) {
    streak += 1;
    cursor = addDaysToKey(cursor, -1);
  }
  return streak;
}

/** Longest run of consecutive day keys anywhere in the set. */
export function longestStreak(completionDayKeys: Iterable<string>) {
  const sorted = Array.from(new Set(completionDayKeys)).sort();
  let best = 0;
  let run = 0;
  let prev: string | null = null;
  for (const day of sorted) {
    run = prev !== null && addDaysToKey(prev, 1) === day ? run + 1 : 1;
    best = Math.max(best, run);
    prev = day;
  }
  return best;
}

export type TaskStreakState = {
  streakCount: number;
  bestStreak: number;
  lastCompletedAt: string | null;
  timesCompleted: number;
};

/** Per-task streak after a completion at `nowIso`. */
export function nextTaskStreak(state: TaskStreakState, nowIso: string): TaskStreakState {
  const today = dayKeyFromIso(nowIso);
  let streak = 1;
  if (state.lastCompletedAt) {
    const last = dayKeyFromIso(state.lastCompletedAt);
    if (last === today) streak = Math.max(state.streakCount, 1);
    else if (addDaysToKey(last, 1) === today) streak = state.streakCount + 1;
  }
  return {
    streakCount: streak,
    bestStreak: Math.max(state.bestStreak, streak),
    lastCompletedAt: nowIso,
    timesCompleted: state.timesCompleted + 1,
  };
}

const PRIORITY_RANK: Record<TaskPriority, number> = { high: 0, medium: 1, low: 2 };

export type Rankable = { priority: TaskPriority; dueDate: string | null };

/** high → low priority, then earliest due date, undated last. */
export function compareUpcoming(a: Rankable, b: Rankable) {
  const p = PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority];
  if (p !== 0) return p;
  if (a.dueDate === b.dueDate) return 0;
  if (a.dueDate === null) return 1;
  if (b.dueDate === null) return -1;
  return a.dueDate < b.dueDate ? -1 : 1;
}

export function pickUpcoming<T extends Rankable & { status: TaskStatus }>(tasks: T[], limit = 5): T[] {
  return tasks
    .filter((t) => t.status === "pending" || t.status === "in_progress")
    .sort(compareUpcoming)
    .slice(0, limit);
}
