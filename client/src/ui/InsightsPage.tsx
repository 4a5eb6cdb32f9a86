import React from "react";
import { api } from "../lib/api";
import type { HabitLoop, Insight, MotivationResponse, ResourcesResponse } from "../lib/types";
import { errorText, fmtDateTime } from "../lib/utils";

function Habits({ habits }: { habits: HabitLoop[] }) {
  if (habits.length === 0) return <div className="sub">Habit loops show up after a few check-ins.</div>;
  return (
    <div className="list">
      {habits.map((h) => (
        <div key={h.id} className="card">
          <div className="hdr">
            <div style={{ fontWeight: 700 }}>{h.name}</div>
            <span className="badge">{h.strength}</span>
          </div>
          <div className="small">
            Cue: {h.cue} → Routine: {h.routine} → Reward: {h.reward}
          </div>
          <div className="small">
            {h.days_tracked} days tracked • streak {h.current_streak} • {Math.round(h.completion_rate * 100)}% done
          </div>
        </div>
      ))}
    </div>
  );
}

export default function InsightsPage() {
  const [habits, setHabits] = React.useState<HabitLoop[]>([]);
  const [insights, setInsights] = React.useState<Insight[]>([]);
  const [resources, setResources] = React.useState<ResourcesResponse | null>(null);
  const [motivation, setMotivation] = React.useState<MotivationResponse | null>(null);
  const [feeling, setFeeling] = React.useState("");
  const [busy, setBusy] = React.useState<"resources" | "motivation" | null>(null);
  const [err, setErr] = React.useState<string | null>(null);

  React.useEffect(() => {
    Promise.all([api.habits(), api.insights()])
      .then(([h, i]) => {
        setHabits(h.habits);
        setInsights(i.insights);
      })
      .catch((e: unknown) => setErr(errorText(e, "Failed to load insights")));
  }, []);

  async function markDone(id: string) {
    try {
      const updated = await api.markInsight(id);
      setInsights((prev) => prev.map((i) => (i.id === id ? updated : i)));
    } catch (e) {
      setErr(errorText(e));
    }
  }

  async function loadResources() {
    setBusy("resources");
    setErr(null);
    try {
      setResources(await api.resources());
    } catch (e) {
      setErr(errorText(e, "Could not load resources"));
    } finally {
      setBusy(null);
    }
  }

  async function askMotivation(e: React.FormEvent) {
    e.preventDefault();
    setBusy("motivation");
    setErr(null);
    try {
      setMotivation(await api.motivation(feeling.trim()));
    } catch (e) {
      setErr(errorText(e, "Could not reach the coach"));
    } finally {
      setBusy(null);
    }
  }

  return (
    <div className="container">
      <div className="card">
        <h2>Insights</h2>
        <div className="sub">Patterns the coach has noticed, and help when you need it.</div>
        {err ? <div className="error small">{err}</div> : null}

        <h3 style={{ marginTop: 14 }}>Habit loops</h3>
        <Habits habits={habits} />

        <hr />
        <h3>Recommendations</h3>
        <div className="list">
          {insights.length === 0 ? <div className="sub">No insights yet.</div> : null}
          {insights.map((i) => (
            <div key={i.id} className="card">
              <div className="hdr">
                <div>
                  <div style={{ fontWeight: 700 }}>{i.title}</div>
                  <div className="small">
                    {i.insight_type} • {fmtDateTime(i.created_at)}
                  </div>
                </div>
                {i.action_taken ? (
                  <span className="badge">Done</span>
                ) : (
                  <button className="btn" onClick={() => void markDone(i.id)}>
                    Mark done
                  </button>
                )}
              </div>
              <div className="small">{i.description}</div>
            </div>
          ))}
        </div>

        <hr />
        <div className="hdr">
          <h3>Resources</h3>
          <button className="btn" disabled={busy !== null} onClick={() => void loadResources()}>
            {busy === "resources" ? "Finding…" : "Suggest resources"}
          </button>
        </div>
        {resources ? (
          <div className="list">
            <div className="small">{resources.message}</div>
            {(resources.recommended_resources ?? []).map((r) => (
              <div key={`${r.type}-${r.name}`} className="small">
                <span className="badge">{r.type}</span>{" "}
                {r.url ? (
                  <a href={r.url} target="_blank" rel="noreferrer">
                    {r.name}
                  </a>
                ) : (
                  r.name
                )}{" "}
                • {r.cost}
                {r.time_commitment ? ` • ${r.time_commitment}` : ""}
              </div>
            ))}
          </div>
        ) : null}

        <hr />
        <h3>Need a push?</h3>
        <form onSubmit={askMotivation} style={{ display: "flex", gap: 8 }}>
          <input
            className="input"
            value={feeling}
            onChange={(e) => setFeeling(e.target.value)}
            placeholder="How are you feeling about your goals?"
          />
          <button className="btn primary" disabled={busy !== null || !feeling.trim()}>
            {busy === "motivation" ? "…" : "Talk"}
          </button>
        </form>
        {motivation ? (
          <div className="card body" style={{ marginTop: 10 }}>
            <div style={{ whiteSpace: "pre-wrap" }}>{motivation.message}</div>
            {motivation.intervention ? (
              <div className="small" style={{ marginTop: 8 }}>
                <b>{motivation.intervention.technique}:</b> {motivation.intervention.message}
              </div>
            ) : null}
            {(motivation.affirmations ?? []).map((a) => (
              <div key={a} className="small">
                • {a}
              </div>
            ))}
          </div>
        ) : null}
      </div>
    </div>
  );
}
