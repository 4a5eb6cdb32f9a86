import React from "react";
import { api } from "../lib/api";
import type { CoachingMetrics, Evaluation, Performance } from "../lib/types";
import { errorText, fmtDateTime, fmtScore } from "../lib/utils";

const METRIC_LABEL: Record<string, string> = {
  coaching_quality: "Coaching quality",
  goal_extraction_quality: "Roadmap quality",
  frustration: "Frustration",
};

export default function AnalyticsPage() {
  const [perf, setPerf] = React.useState<Performance | null>(null);
  const [metrics, setMetrics] = React.useState<CoachingMetrics | null>(null);
  const [traces, setTraces] = React.useState<Evaluation[]>([]);
  const [err, setErr] = React.useState<string | null>(null);

  React.useEffect(() => {
    Promise.all([api.performance(), api.coachingMetrics(), api.traces(20)])
      .then(([p, m, t]) => {
        setPerf(p);
        setMetrics(m);
        setTraces(t.traces);
      })
      .catch((e: unknown) => setErr(errorText(e, "Failed to load analytics")));
  }, []);

  const dims: Array<[string, number | null]> = metrics
    ? [
        ["SMART alignment", metrics.smart_alignment],
        ["Motivation", metrics.motivational_quality],
        ["Actionability", metrics.actionability],
        ["Clarity", metrics.clarity],
      ]
    : [];

  return (
    <div className="container">
      <div className="card">
        <h2>Coach analytics</h2>
        <div className="sub">How the AI coach has been doing for you{perf ? `, ${perf.evaluation_period}` : ""}.</div>
        {err ? <div className="error small">{err}</div> : null}

        {perf ? (
          <div className="row body">
            <div className="col">
              <div className="kpi">
                <div className="small">Conversations</div>
                <div className="num">{perf.total_conversations}</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">Coaching quality</div>
                <div className="num">{fmtScore(perf.avg_coaching_quality)}</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">Roadmap quality</div>
                <div className="num">{fmtScore(perf.avg_goal_extraction_quality)}</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">Frustration</div>
                <div className="num">{fmtScore(perf.avg_frustration_level)}</div>
              </div>
            </div>
          </div>
        ) : null}

        {metrics ? (
          <>
            <hr />
            <h3>Coaching dimensions</h3>
            <div className="list">
              {dims.map(([label, v]) => (
                <div key={label}>
                  <div className="small">
                    {label}: {fmtScore(v)}
                  </div>
                  <div className="progress">
                    <div style={{ width: `${Math.round((v ?? 0) * 100)}%` }} />
                  </div>
                </div>
              ))}
            </div>
            <div className="small" style={{ marginTop: 8 }}>
              Goal completion rate {metrics.goal_completion_rate}% • {metrics.avg_session_length} messages per conversation
            </div>
          </>
        ) : null}

        <hr />
        <h3>Recent evaluations</h3>
        <div className="list">
          {traces.length === 0 ? <div className="sub">No evaluations yet.</div> : null}
          {traces.map((t) => (
            <div key={t.id} className="card">
              <div className="hdr">
                <div style={{ fontWeight: 700 }}>{METRIC_LABEL[t.metric] ?? t.metric}</div>
                <span className="badge">{fmtScore(t.score)}</span>
              </div>
              <div className="small">{t.reason}</div>
              <div className="small">{fmtDateTime(t.created_at)}</div>
            </div>
          ))}
        </div>
      </div>
    </div>
  );
}
