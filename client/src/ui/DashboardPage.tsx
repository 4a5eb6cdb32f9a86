import React from "react";
import { Link } from "react-router-dom";
import { api } from "../lib/api";
import type { DashboardStats, Quota } from "../lib/types";
import { errorText, fmtDate } from "../lib/utils";

function Kpi({ label, value, hint }: { label: string; value: React.ReactNode; hint?: string }) {
  return (
    <div className="col">
      <div className="kpi">
        <div className="small">{label}</div>
        <div className="num">{value}</div>
        {hint ? <div className="small">{hint}</div> : null}
      </div>
    </div>
  );
}

export default function DashboardPage() {
  const [stats, setStats] = React.useState<DashboardStats | null>(null);
  const [quota, setQuota] = React.useState<Quota | null>(null);
  const [err, setErr] = React.useState<string | null>(null);
  const [busyTask, setBusyTask] = React.useState<string | null>(null);

  const load = React.useCallback(async () => {
    setErr(null);
    try {
      const [s, q] = await Promise.all([api.dashboard(), api.quota()]);
      setStats(s);
      setQuota(q);
    } catch (e) {
      setErr(errorText(e, "Failed to load dashboard"));
    }
  }, []);

  React.useEffect(() => {
    void load();
  }, [load]);

  async function complete(goalId: string, taskId: string) {
    setBusyTask(taskId);
    try {
      await api.completeTask(goalId, taskId);
      await load();
    } catch (e) {
      setErr(errorText(e));
    } finally {
      setBusyTask(null);
    }
  }

  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h2>Today</h2>
            <div className="sub">Where your goals stand and what is next.</div>
          </div>
          <Link className="btn primary" to="/chat">
            New goal with the coach
          </Link>
        </div>

        {err ? <div className="error small">{err}</div> : null}

        <div className="row body">
          <Kpi label="Active goals" value={stats?.active_goals ?? "—"} />
          <Kpi
            label="Tasks done"
            value={stats ? `${stats.completed_tasks}/${stats.total_tasks}` : "—"}
            hint={stats ? `${stats.completion_rate}% complete` : undefined}
          />
          <Kpi label="Current streak" value={stats ? `${stats.current_streak}d` : "—"} hint="Days in a row with a completed task" />
        </div>

        <hr />

        <h3>Upcoming tasks</h3>
        <div className="list">
          {stats && stats.upcoming_tasks.length === 0 ? (
            <div className="sub">Nothing pending. Start a chat to plan your next goal.</div>
          ) : null}
          {stats?.upcoming_tasks.map((t) => (
            <div key={t.id} className="card hdr" style={{ alignItems: "center" }}>
              <div>
                <div style={{ fontWeight: 700 }}>{t.title}</div>
                <div className="small">
                  <Link to={`/goals/${t.goal_id}`}>{t.goal_title}</Link> • due {fmtDate(t.due_date)} • {t.priority}
                </div>
              </div>
              <button className="btn" disabled={busyTask === t.id} onClick={() => void complete(t.goal_id, t.id)}>
                {busyTask === t.id ? "Saving…" : "Done"}
              </button>
            </div>
          ))}
        </div>

        {quota ? (
          <>
            <hr />
            <div className="small">
              AI usage: {quota.tokens_used.toLocaleString()} / {quota.token_limit.toLocaleString()} tokens (
              {quota.usage_percentage}%)
            </div>
            <div className="progress" style={{ marginTop: 6 }}>
              <div style={{ width: `${Math.min(100, quota.usage_percentage)}%` }} />
            </div>
          </>
        ) : null}
      </div>
    </div>
  );
}
