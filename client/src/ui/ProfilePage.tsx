import React from "react";
import { api } from "../lib/api";
import type { Profile, User } from "../lib/types";
import { errorText } from "../lib/utils";

const STYLES = ["supportive", "direct", "analytical", "playful"];
const TIMES = ["", "morning", "afternoon", "evening", "night"];
const LEARNING = ["", "visual", "auditory", "reading", "kinesthetic"];

function listText(v: string[]) {
  return v.join(", ");
}

function parseList(s: string) {
  return s
    .split(",")
    .map((x) => x.trim())
    .filter(Boolean)
    .slice(0, 20);
}

function Choice({
  label,
  value,
  options,
  onChange,
}: {
  label: string;
  value: string;
  options: string[];
  onChange: (v: string) => void;
}) {
  return (
    <div className="col">
      <div className="label">{label}</div>
      <select className="input" value={value} onChange={(e) => onChange(e.target.value)}>
        {options.map((o) => (
          <option key={o} value={o}>
            {o || "not set"}
          </option>
        ))}
      </select>
    </div>
  );
}

export default function ProfilePage() {
  const [user, setUser] = React.useState<User | null>(null);
  const [profile, setProfile] = React.useState<Profile | null>(null);
  const [name, setName] = React.useState("");
  const [avatarUrl, setAvatarUrl] = React.useState("");
  const [style, setStyle] = React.useState("supportive");
  const [bestTime, setBestTime] = React.useState("");
  const [learning, setLearning] = React.useState("");
  const [strengths, setStrengths] = React.useState("");
  const [challenges, setChallenges] = React.useState("");
  const [msg, setMsg] = React.useState<string | null>(null);
  const [err, setErr] = React.useState<string | null>(null);

  React.useEffect(() => {
    Promise.all([api.me(), api.profile()])
      .then(([u, p]) => {
        setUser(u);
        setProfile(p);
        setName(u.name ?? "");
        setAvatarUrl(u.avatar_url ?? "");
        setStyle(p.preferred_communication_style);
        setBestTime(p.best_time_of_day ?? "");
        setLearning(p.learning_style ?? "");
        setStrengths(listText(p.strengths));
        setChallenges(listText(p.challenges));
      })
      .catch((e: unknown) => setErr(errorText(e, "Failed to load profile")));
  }, []);

  async function save(e: React.FormEvent) {
    e.preventDefault();
    setErr(null);
    setMsg(null);
    try {
      const [u, p] = await Promise.all([
        api.updateMe({ name: name.trim() || null, avatar_url: avatarUrl.trim() || null }),
        api.updateProfile({
          preferred_communication_style: style,
          best_time_of_day: bestTime || null,
          learning_style: learning || null,
          strengths: parseList(strengths),
          challenges: parseList(challenges),
        }),
      ]);
      setUser(u);
      setProfile(p);
      setMsg("Saved.");
    } catch (e) {
      setErr(errorText(e, "Save failed"));
    }
  }

  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h2>Profile</h2>
            <div className="sub">{user?.email}</div>
          </div>
          {user?.avatar_url ? (
            <img src={user.avatar_url} alt="" width={48} height={48} style={{ borderRadius: 999 }} />
          ) : null}
        </div>

        {profile ? (
          <div className="row body">
            <div className="col">
              <div className="kpi">
                <div className="small">Goals completed</div>
                <div className="num">{profile.total_goals_completed}</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">Tasks completed</div>
                <div className="num">{profile.total_tasks_completed}</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">Longest streak</div>
                <div className="num">{profile.longest_streak}d</div>
              </div>
            </div>
          </div>
        ) : null}

        <hr />

        <form onSubmit={save}>
          <div className="row">
            <div className="col">
              <div className="label">Name</div>
              <input className="input" value={name} onChange={(e) => setName(e.target.value)} maxLength={100} />
            </div>
            <div className="col">
              <div className="label">Avatar URL</div>
              <input className="input" value={avatarUrl} onChange={(e) => setAvatarUrl(e.target.value)} />
            </div>
          </div>
          <div className="row" style={{ marginTop: 10 }}>
            <Choice label="Coaching style" value={style} options={STYLES} onChange={setStyle} />
            <Choice label="Best time of day" value={bestTime} options={TIMES} onChange={setBestTime} />
            <Choice label="Learning style" value={learning} options={LEARNING} onChange={setLearning} />
          </div>
          <div className="row" style={{ marginTop: 10 }}>
            <div className="col">
              <div className="label">Strengths (comma separated)</div>
              <input className="input" value={strengths} onChange={(e) => setStrengths(e.target.value)} />
            </div>
            <div className="col">
              <div className="label">Challenges (comma separated)</div>
              <input className="input" value={challenges} onChange={(e) => setChallenges(e.target.value)} />
            </div>
          </div>
          <button className="btn primary" style={{ marginTop: 12 }}>
            Save
          </button>
          {msg ? <span className="small" style={{ marginLeft: 10 }}>{msg}</span> : null}
          {err ? <div className="error small">{err}</div> : null}
        </form>
      </div>
    </div>
  );
}
