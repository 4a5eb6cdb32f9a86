import React from "react";
import { useNavigate, useParams } from "react-router-dom";
import { api } from "../lib/api";
import type { GoalDetail, GoalStatus, Task, TaskStatus } from "../lib/types";
import { errorText, fmtDate } from "../lib/utils";

const GOAL_STATUSES: GoalStatus[] = ["active", "paused", "completed", "abandoned"];
const TASK_STATUSES: TaskStatus[] = ["pending", "in_progress", "completed", "skipped"];

function isGoalStatus(v: string): v is GoalStatus {
  return GOAL_STATUSES.some((s) => s === v);
}

function isTaskStatus(v: string): v is TaskStatus {
  return TASK_STATUSES.some((s) => s === v);
}

function SmartBlock({ goal }: { goal: GoalDetail }) {
  const rows: Array<[string, string | null]> = [
    ["Specific", goal.smart_specific],
    ["Measurable", goal.smart_measurable],
    ["Achievable", goal.smart_achievable],
    ["Relevant", goal.smart_relevant],
    ["Time-bound", goal.smart_time_bound],
  ];
  if (rows.every(([, v]) => !v)) return null;
  return (
    <div className="body">
      <h3>SMART breakdown</h3>
      {rows.map(([label, v]) =>
        v ? (
          <div key={label} className="small">
            <b>{label}:</b> {v}
          </div>
        ) : null,
      )}
    </div>
  );
}

function TaskRow({
  task,
  onToggle,
  onStatus,
  onDelete,
}: {
  task: Task;
  onToggle: () => void;
  onStatus: (s: TaskStatus) => void;
  onDelete: () => void;
}) {
  const done = task.status === "completed";
  return (
    <div className="hdr" style={{ alignItems: "center", padding: "6px 0" }}>
      <label style={{ display: "flex", gap: 8, alignItems: "center", flex: 1 }}>
        <input type="checkbox" checked={done} onChange={onToggle} />
        <span style={{ textDecoration: done ? "line-through" : undefined }}>{task.title}</span>
        <span className="small">
          due {fmtDate(task.due_date)} • {task.priority}
          {task.streak_count > 0 ? ` • streak ${task.streak_count}` : ""}
        </span>
      </label>
      <div style={{ display: "flex", gap: 6 }}>
        <select
          className="input"
          style={{ width: 130 }}
          value={task.status}
          onChange={(e) => {
            if (isTaskStatus(e.target.value)) onStatus(e.target.value);
          }}
        >
          {TASK_STATUSES.map((s) => (
            <option key={s} value={s}>
              {s}
            </option>
          ))}
        </select>
        <button className="btn danger" onClick={onDelete}>
          ✕
        </button>
      </div>
    </div>
  );
}

function AddTaskForm({ onAdd }: { onAdd: (title: string, dueDate: string) => Promise<void> }) {
  const [title, setTitle] = React.useState("");
  const [dueDate, setDueDate] = React.useState("");
  return (
    <form
      style={{ display: "flex", gap: 6, marginTop: 6 }}
      onSubmit={(e) => {
        e.preventDefault();
        void onAdd(title.trim(), dueDate).then(() => {
          setTitle("");
          setDueDate("");
        });
      }}
    >
      <input className="input" placeholder="New task" value={title} onChange={(e) => setTitle(e.target.value)} />
      <input className="input" style={{ width: 170 }} type="date" value={dueDate} onChange={(e) => setDueDate(e.target.value)} />
      <button className="btn" disabled={!title.trim()}>
        Add
      </button>
    </form>
  );
}

export default function GoalDetailPage() {
  const { id = "" } = useParams();
  const nav = useNavigate();
  const [goal, setGoal] = React.useState<GoalDetail | null>(null);
  const [err, setErr] = React.useState<string | null>(null);
  const [milestoneTitle, setMilestoneTitle] = React.useState("");

  const load = React.useCallback(async () => {
    try {
      setGoal(await api.getGoal(id));
    } catch (e) {
      setErr(errorText(e, "Failed to load goal"));
    }
  }, [id]);

  React.useEffect(() => {
    void load();
  }, [load]);

  async function run(action: () => Promise<unknown>) {
    setErr(null);
    try {
      await action();
      await load();
    } catch (e) {
      setErr(errorText(e));
    }
  }

  if (!goal) {
    return (
      <div className="container">
        <div className="card">{err ? <div className="error">{err}</div> : <div className="sub">Loading…</div>}</div>
      </div>
    );
  }

  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h2>{goal.title}</h2>
            <div className="sub">
              {goal.category} • target {fmtDate(goal.target_date)}
              {goal.burnout_risk ? ` • burnout risk ${goal.burnout_risk}` : ""}
            </div>
            {goal.description ? <div className="small" style={{ marginTop: 6 }}>{goal.description}</div> : null}
          </div>
          <div style={{ display: "flex", gap: 8, alignItems: "center" }}>
            <select
              className="input"
              style={{ width: 140 }}
              value={goal.status}
              onChange={(e) => {
                const status = e.target.value;
                if (isGoalStatus(status)) void run(() => api.updateGoal(goal.id, { status }));
              }}
            >
              {GOAL_STATUSES.map((s) => (
                <option key={s} value={s}>
                  {s}
                </option>
              ))}
            </select>
            <button
              className="btn danger"
              onClick={() => {
                if (!window.confirm("Delete this goal and its roadmap?")) return;
                api
                  .deleteGoal(goal.id)
                  .then(() => nav("/goals"))
                  .catch((e: unknown) => setErr(errorText(e)));
              }}
            >
              Delete
            </button>
          </div>
        </div>

        <div className="progress" style={{ marginTop: 10 }}>
          <div style={{ width: `${goal.progress}%` }} />
        </div>
        <div className="small">{goal.progress}% complete</div>

        {err ? <div className="error small">{err}</div> : null}

        <SmartBlock goal={goal} />

        {goal.identified_obstacles.length > 0 ? (
          <div className="small body">
            <b>Obstacles:</b> {goal.identified_obstacles.join(", ")}
          </div>
        ) : null}

        <hr />

        <div className="list">
          {goal.milestones.map((m) => (
            <div key={m.id} className="card">
              <div className="hdr">
                <div>
                  <div style={{ fontWeight: 700 }}>
                    {m.is_completed ? "✓ " : ""}
                    {m.title}
                  </div>
                  <div className="small">target {fmtDate(m.target_date)}</div>
                </div>
                <button
                  className="btn danger"
                  onClick={() => {
                    if (window.confirm("Delete this milestone and its tasks?")) {
                      void run(() => api.deleteMilestone(goal.id, m.id));
                    }
                  }}
                >
                  Delete
                </button>
              </div>
              {m.tasks.map((t) => (
                <TaskRow
                  key={t.id}
                  task={t}
                  onToggle={() =>
                    void run(() =>
                      t.status === "completed" ? api.uncompleteTask(goal.id, t.id) : api.completeTask(goal.id, t.id),
                    )
                  }
                  onStatus={(status) => void run(() => api.updateTask(goal.id, t.id, { status }))}
                  onDelete={() => void run(() => api.deleteTask(goal.id, t.id))}
                />
              ))}
              <AddTaskForm
                onAdd={(title, dueDate) => run(() => api.createTask(goal.id, m.id, { title, due_date: dueDate || null }))}
              />
            </div>
          ))}
        </div>

        <form
          style={{ display: "flex", gap: 8, marginTop: 12 }}
          onSubmit={(e) => {
            e.preventDefault();
            void run(() => api.createMilestone(goal.id, { title: milestoneTitle.trim() })).then(() =>
              setMilestoneTitle(""),
            );
          }}
        >
          <input
            className="input"
            placeholder="New milestone"
            value={milestoneTitle}
            onChange={(e) => setMilestoneTitle(e.target.value)}
          />
          <button className="btn" disabled={!milestoneTitle.trim()}>
            Add milestone
          </button>
        </form>
      </div>
    </div>
  );
}
