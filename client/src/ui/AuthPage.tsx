import React from "react";
import { Link, useNavigate, useSearchParams } from "react-router-dom";
import { api } from "../lib/api";
import { errorText } from "../lib/utils";

export default function AuthPage({ mode }: { mode: "login" | "register" }) {
  const nav = useNavigate();
  const [params] = useSearchParams();
  const [name, setName] = React.useState("");
  const [email, setEmail] = React.useState("");
  const [password, setPassword] = React.useState("");
  const [err, setErr] = React.useState<string | null>(
    params.get("error") === "oauth_failed" ? "Sign-in with that provider failed. Try again." : null,
  );
  const [loading, setLoading] = React.useState(false);

  async function submit(e: React.FormEvent) {
    e.preventDefault();
    setErr(null);
    setLoading(true);
    try {
      if (mode === "register") await api.register(email, password, name.trim());
      else await api.login(email, password);
      nav("/dashboard");
    } catch (e) {
      setErr(errorText(e, "Failed"));
    } finally {
      setLoading(false);
    }
  }

  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h1>{mode === "register" ? "Create your account" : "Welcome back"}</h1>
            <div className="sub">
              {mode === "register" ? "Start with one goal. The coach helps with the rest." : "Pick up where you left off."}
            </div>
          </div>
        </div>

        <div className="body">
          <form onSubmit={submit} className="row" style={{ alignItems: "flex-end" }}>
            {mode === "register" && (
              <div className="col">
                <div className="label">Name</div>
                <input className="input" value={name} onChange={(e) => setName(e.target.value)} />
              </div>
            )}

            <div className="col">
              <div className="label">Email</div>
              <input
                className="input"
                type="email"
                value={email}
                onChange={(e) => setEmail(e.target.value)}
                autoCapitalize="none"
                autoCorrect="off"
                spellCheck={false}
              />
            </div>

            <div className="col">
              <div className="label">Password{mode === "register" ? " (8+ characters)" : ""}</div>
              <input className="input" type="password" value={password} onChange={(e) => setPassword(e.target.value)} />
            </div>

            <div className="col" style={{ flexBasis: 180 }}>
              <button className="btn primary" disabled={loading || !email.trim() || !password}>
                {loading ? "Working..." : mode === "register" ? "Sign up" : "Log in"}
              </button>
            </div>
          </form>

          {err && (
            <div style={{ marginTop: 12 }} className="card body">
              <div className="error" style={{ fontWeight: 700 }}>
                Error
              </div>
              <div className="small">{err}</div>
            </div>
          )}

          <hr />

          <div style={{ display: "flex", gap: 8, flexWrap: "wrap" }}>
            <a className="btn" href="/api/auth/google">
              Continue with Google
            </a>
            <a className="btn" href="/api/auth/github">
              Continue with GitHub
            </a>
          </div>

          <div className="small" style={{ marginTop: 12 }}>
            {mode === "register" ? (
              <>
                Already have an account? <Link to="/login">Log in</Link>
              </>
            ) : (
              <>
                New here? <Link to="/register">Create an account</Link>
              </>
            )}
          </div>
        </div>
      </div>
    </div>
  );
}
