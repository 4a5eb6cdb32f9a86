import React from "react";
import { Link, useNavigate, useParams } from "react-router-dom";
import { api } from "../lib/api";
import type { ChatMessage, ChatSession, ChatSessionSummary } from "../lib/types";
import { errorText, fmtDateTime } from "../lib/utils";

function SessionList({ activeId, sessions }: { activeId?: string; sessions: ChatSessionSummary[] }) {
  return (
    <div className="list">
      {sessions.length === 0 ? <div className="sub">No conversations yet.</div> : null}
      {sessions.map((s) => (
        <Link
          key={s.id}
          to={`/chat/${s.id}`}
          className="card"
          style={{ textDecoration: "none", color: "inherit", borderColor: s.id === activeId ? "var(--accent)" : undefined }}
        >
          <div style={{ fontWeight: 700 }}>{s.title || "New conversation"}</div>
          <div className="small">
            {s.status} • {s.message_count} messages • {fmtDateTime(s.updated_at)}
          </div>
          {s.last_message_preview ? <div className="small">{s.last_message_preview}</div> : null}
        </Link>
      ))}
    </div>
  );
}

export default function ChatPage() {
  const { id } = useParams();
  const nav = useNavigate();

  const [sessions, setSessions] = React.useState<ChatSessionSummary[]>([]);
  const [session, setSession] = React.useState<ChatSession | null>(null);
  const [messages, setMessages] = React.useState<ChatMessage[]>([]);
  const [draft, setDraft] = React.useState("");
  const [busy, setBusy] = React.useState<"send" | "finalize" | null>(null);
  const [err, setErr] = React.useState<string | null>(null);

  const loadSessions = React.useCallback(async () => {
    try {
      setSessions((await api.listSessions()).sessions);
    } catch (e) {
      setErr(errorText(e, "Failed to load conversations"));
    }
  }, []);

  React.useEffect(() => {
    void loadSessions();
  }, [loadSessions]);

  React.useEffect(() => {
    if (!id) {
      setSession(null);
      setMessages([]);
      return;
    }
    let cancelled = false;
    api
      .getSession(id)
      .then((detail) => {
        if (cancelled) return;
        setSession(detail);
        setMessages(detail.messages);
      })
      .catch((e: unknown) => {
        if (!cancelled) setErr(errorText(e, "Failed to load conversation"));
      });
    return () => {
      cancelled = true;
    };
  }, [id]);

  async function start() {
    setErr(null);
    try {
      const created = await api.startChat();
      await loadSessions();
      nav(`/chat/${created.id}`);
    } catch (e) {
      setErr(errorText(e, "Could not start a conversation"));
    }
  }

  async function send(e: React.FormEvent) {
    e.preventDefault();
    const content = draft.trim();
    if (!session || !content) return;
    setBusy("send");
    setErr(null);
    try {
      const r = await api.sendMessage(session.id, content);
      setMessages((prev) => [...prev, r.user_message, r.assistant_message]);
      setSession({ ...session, title: r.session_title });
      setDraft("");
      void loadSessions();
    } catch (e) {
      setErr(errorText(e, "Message failed"));
    } finally {
      setBusy(null);
    }
  }

  async function finalize() {
    if (!session) return;
    setBusy("finalize");
    setErr(null);
    try {
      const r = await api.finalize(session.id);
      nav(`/goals/${r.goal.id}`);
    } catch (e) {
      setErr(errorText(e, "Could not create the goal"));
    } finally {
      setBusy(null);
    }
  }

  async function remove() {
    if (!session || !window.confirm("Delete this conversation?")) return;
    try {
      await api.deleteSession(session.id);
      await loadSessions();
      nav("/chat");
    } catch (e) {
      setErr(errorText(e));
    }
  }

  const active = session?.status === "active";

  return (
    <div className="container">
      <div className="row">
        <div className="col" style={{ flex: "0 1 300px" }}>
          <div className="card">
            <div className="hdr" style={{ alignItems: "center" }}>
              <h3 style={{ margin: 0 }}>Conversations</h3>
              <button className="btn primary" onClick={() => void start()}>
                New
              </button>
            </div>
            <div className="body">
              <SessionList activeId={id} sessions={sessions} />
            </div>
          </div>
        </div>

        <div className="col" style={{ flex: "1 1 520px" }}>
          <div className="card">
            {!session ? (
              <div className="sub">Start a new conversation and tell the coach what you want to achieve.</div>
            ) : (
              <>
                <div className="hdr" style={{ alignItems: "center" }}>
                  <div>
                    <h3 style={{ margin: 0 }}>{session.title || "New conversation"}</h3>
                    <div className="small">{session.status}</div>
                  </div>
                  <div style={{ display: "flex", gap: 8 }}>
                    {session.goal_id ? (
                      <Link className="btn" to={`/goals/${session.goal_id}`}>
                        View goal
                      </Link>
                    ) : null}
                    {active ? (
                      <button
                        className="btn primary"
                        disabled={busy !== null || messages.length < 2}
                        onClick={() => void finalize()}
                      >
                        {busy === "finalize" ? "Building roadmap…" : "Create goal"}
                      </button>
                    ) : null}
                    <button className="btn danger" onClick={() => void remove()}>
                      Delete
                    </button>
                  </div>
                </div>

                <div className="list body">
                  {messages.map((m) => (
                    <div key={m.id} className={`bubble ${m.role === "user" ? "user" : "assistant"}`}>
                      {m.content}
                    </div>
                  ))}
                </div>

                {active ? (
                  <form onSubmit={send} style={{ display: "flex", gap: 8, marginTop: 12 }}>
                    <input
                      className="input"
                      value={draft}
                      onChange={(e) => setDraft(e.target.value)}
                      placeholder="Tell the coach about your goal…"
                      maxLength={5000}
                    />
                    <button className="btn primary" disabled={busy !== null || !draft.trim()}>
                      {busy === "send" ? "…" : "Send"}
                    </button>
                  </form>
                ) : null}
              </>
            )}
            {err ? <div className="error small" style={{ marginTop: 8 }}>{err}</div> : null}
          </div>
        </div>
      </div>
    </div>
  );
}
