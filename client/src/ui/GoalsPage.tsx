import React from "react";
import { Link, useNavigate } from "react-router-dom";
import { api } from "../lib/api";
import type { GoalCategory, GoalListItem } from "../lib/types";
import { errorText, fmtDate } from "../lib/utils";

const CATEGORIES: GoalCategory[] = ["health", "career", "education", "finance", "personal", "other"];

function isCategory(v: string): v is GoalCategory {
  return CATEGORIES.some((c) => c === v);
}

export default function GoalsPage() {
  const nav = useNavigate();
  const [goals, setGoals] = React.useState<GoalListItem[]>([]);
  const [loading, setLoading] = React.useState(true);
  const [err, setErr] = React.useState<string | null>(null);

  const [title, setTitle] = React.useState("");
  const [category, setCategory] = React.useState<GoalCategory>("personal");
  const [targetDate, setTargetDate] = React.useState("");

  React.useEffect(() => {
    api
      .listGoals()
      .then((r) => setGoals(r.goals))
      .catch((e: unknown) => setErr(errorText(e, "Failed to load goals")))
      .finally(() => setLoading(false));
  }, []);

  async function create(e: React.FormEvent) {
    e.preventDefault();
    setErr(null);
    try {
      const goal = await api.createGoal({ title: title.trim(), category, target_date: targetDate || null });
      nav(`/goals/${goal.id}`);
    } catch (e) {
      setErr(errorText(e, "Failed to create goal"));
    }
  }

  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h2>Goals</h2>
            <div className="sub">Roadmaps from the coach, or ones you write yourself.</div>
          </div>
          {loading ? <span className="badge">Loading…</span> : <span className="badge">{goals.length}</span>}
        </div>

        <form onSubmit={create} className="row body" style={{ alignItems: "flex-end" }}>
          <div className="col">
            <div className="label">Title</div>
            <input className="input" value={title} onChange={(e) => setTitle(e.target.value)} maxLength={200} />
          </div>
          <div className="col" style={{ flex: "0 1 160px" }}>
            <div className="label">Category</div>
            <select
              className="input"
              value={category}
              onChange={(e) => {
                if (isCategory(e.target.value)) setCategory(e.target.value);
              }}
            >
              {CATEGORIES.map((c) => (
                <option key={c} value={c}>
                  {c}
                </option>
              ))}
            </select>
          </div>
          <div className="col" style={{ flex: "0 1 170px" }}>
            <div className="label">Target date</div>
            <input className="input" type="date" value={targetDate} onChange={(e) => setTargetDate(e.target.value)} />
          </div>
          <div className="col" style={{ flex: "0 1 140px" }}>
            <button className="btn primary" disabled={!title.trim()}>
              Add goal
            </button>
          </div>
        </form>

        {err ? <div className="error small">{err}</div> : null}
        <hr />

        <div className="list">
          {goals.length === 0 && !loading ? (
            <div className="sub">
              No goals yet. <Link to="/chat">Talk to the coach</Link> or add one above.
            </div>
          ) : null}
          {goals.map((g) => (
            <Link key={g.id} to={`/goals/${g.id}`} className="card" style={{ textDecoration: "none", color: "inherit" }}>
              <div className="hdr">
                <div>
                  <div style={{ fontWeight: 700 }}>{g.title}</div>
                  <div className="small">
                    {g.category} • {g.status} • target {fmtDate(g.target_date)}
                  </div>
                </div>
                <span className="badge">{g.progress}%</span>
              </div>
              <div className="progress" style={{ marginTop: 8 }}>
                <div style={{ width: `${g.progress}%` }} />
              </div>
              <div className="small" style={{ marginTop: 6 }}>
                {g.milestone_count} milestones • {g.completed_task_count}/{g.task_count} tasks done
              </div>
            </Link>
          ))}
        </div>
      </div>
    </div>
  );
}
