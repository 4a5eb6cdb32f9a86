import React from "react";
import { api } from "../lib/api";
import type { AgentResult, CheckinResponse, GoalDetail, GoalListItem } from "../lib/types";
import { clamp, errorText } from "../lib/utils";

function AgentCard({ title, result }: { title: string; result: AgentResult }) {
  return (
    <div className="card">
      <div className="hdr">
        <div style={{ fontWeight: 700 }}>{title}</div>
        <span className="badge">{result.success ? "ok" : "unavailable"}</span>
      </div>
      <div className="small" style={{ whiteSpace: "pre-wrap" }}>
        {result.message}
      </div>
    </div>
  );
}

function Slider({ label, value, onChange }: { label: string; value: number; onChange: (n: number) => void }) {
  return (
    <div className="col">
      <div className="label">
        {label}: {value}/10
      </div>
      <input
        type="range"
        min={1}
        max={10}
        value={value}
        onChange={(e) => onChange(clamp(Number(e.target.value), 1, 10))}
        style={{ width: "100%" }}
      />
    </div>
  );
}

export default function CheckinPage() {
  const [goals, setGoals] = React.useState<GoalListItem[]>([]);
  const [goalId, setGoalId] = React.useState("");
  const [goal, setGoal] = React.useState<GoalDetail | null>(null);
  const [done, setDone] = React.useState<Set<string>>(new Set());
  const [mood, setMood] = React.useState(6);
  const [energy, setEnergy] = React.useState(6);
  const [notes, setNotes] = React.useState("");
  const [result, setResult] = React.useState<CheckinResponse | null>(null);
  const [busy, setBusy] = React.useState(false);
  const [err, setErr] = React.useState<string | null>(null);

  React.useEffect(() => {
    api
      .listGoals()
      .then((r) => {
        const active = r.goals.filter((g) => g.status === "active");
        setGoals(active);
        if (active[0]) setGoalId(active[0].id);
      })
      .catch((e: unknown) => setErr(errorText(e, "Failed to load goals")));
  }, []);

  React.useEffect(() => {
    if (!goalId) return;
    setDone(new Set());
    setResult(null);
    api
      .getGoal(goalId)
      .then(setGoal)
      .catch((e: unknown) => setErr(errorText(e, "Failed to load goal")));
  }, [goalId]);

  const openTasks = goal ? goal.milestones.flatMap((m) => m.tasks).filter((t) => t.status !== "completed") : [];

  function toggle(taskId: string) {
    setDone((prev) => {
      const next = new Set(prev);
      if (next.has(taskId)) next.delete(taskId);
      else next.add(taskId);
      return next;
    });
  }

  async function submit(e: React.FormEvent) {
    e.preventDefault();
    if (!goalId) return;
    setBusy(true);
    setErr(null);
    try {
      const r = await api.checkin({
        goal_id: goalId,
        completed_task_ids: [...done],
        notes: notes.trim() || undefined,
        mood_score: mood,
        energy_level: energy,
      });
      setResult(r);
      setDone(new Set());
      setGoal(await api.getGoal(goalId));
    } catch (e) {
      setErr(errorText(e, "Check-in failed"));
    } finally {
      setBusy(false);
    }
  }

  return (
    <div className="container">
      <div className="card">
        <h2>Daily check-in</h2>
        <div className="sub">Tick off what you did, say how you feel, get feedback on your pace.</div>

        {goals.length === 0 ? (
          <div className="sub body">No active goals to check in on.</div>
        ) : (
          <form onSubmit={submit} className="body">
            <div className="label">Goal</div>
            <select className="input" value={goalId} onChange={(e) => setGoalId(e.target.value)}>
              {goals.map((g) => (
                <option key={g.id} value={g.id}>
                  {g.title}
                </option>
              ))}
            </select>

            <h3 style={{ marginTop: 14 }}>What did you finish?</h3>
            <div className="list">
              {openTasks.length === 0 ? <div className="sub">All tasks are complete.</div> : null}
              {openTasks.map((t) => (
                <label key={t.id} style={{ display: "flex", gap: 8 }}>
                  <input type="checkbox" checked={done.has(t.id)} onChange={() => toggle(t.id)} />
                  {t.title}
                </label>
              ))}
            </div>

            <div className="row" style={{ marginTop: 14 }}>
              <Slider label="Mood" value={mood} onChange={setMood} />
              <Slider label="Energy" value={energy} onChange={setEnergy} />
            </div>

            <div className="label" style={{ marginTop: 10 }}>
              Notes
            </div>
            <textarea
              className="input"
              value={notes}
              onChange={(e) => setNotes(e.target.value)}
              maxLength={2000}
              placeholder="Anything blocking you? Anything that went well?"
            />

            <button className="btn primary" style={{ marginTop: 10 }} disabled={busy}>
              {busy ? "Checking in…" : "Check in"}
            </button>
          </form>
        )}

        {err ? <div className="error small">{err}</div> : null}

        {result ? (
          <>
            <hr />
            <div className="small">
              Today: {result.daily_progress.tasks_completed}/{result.daily_progress.tasks_planned} tasks (
              {Math.round(result.daily_progress.completion_rate * 100)}%)
            </div>
            <div className="list body">
              <AgentCard title="Today's plan" result={result.execution} />
              <AgentCard title="Sustainability" result={result.sustainability} />
              {result.psychological ? <AgentCard title="Support" result={result.psychological} /> : null}
            </div>
          </>
        ) : null}
      </div>
    </div>
  );
}
