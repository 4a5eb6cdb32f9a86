import React from "react";
import { Link } from "react-router-dom";
import { getToken } from "../lib/api";

export default function LandingPage() {
  const token = getToken();
  return (
    <div className="container">
      <div className="card">
        <div className="hdr">
          <div>
            <h1>Turn a vague wish into a plan</h1>
            <div className="sub">Talk it through with an AI coach. Leave with milestones and tasks you can start today.</div>
          </div>
          <span className="badge">Small steps, tracked</span>
        </div>
        <div className="body">
          <div className="row">
            <div className="col">
              <div className="kpi">
                <div className="small">1) Talk</div>
                <div className="num">Chat</div>
                <div className="small">The coach asks what you want, why, and by when.</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">2) Plan</div>
                <div className="num">Roadmap</div>
                <div className="small">One click turns the conversation into milestones and tasks.</div>
              </div>
            </div>
            <div className="col">
              <div className="kpi">
                <div className="small">3) Follow through</div>
                <div className="num">Streaks</div>
                <div className="small">Daily check-ins, progress and honest feedback on your pace.</div>
              </div>
            </div>
          </div>
          <hr />
          <div style={{ display: "flex", gap: 10, flexWrap: "wrap" }}>
            {token ? (
              <Link className="btn primary" to="/dashboard">
                Go to dashboard
              </Link>
            ) : (
              <>
                <Link className="btn primary" to="/register">
                  Get started
                </Link>
                <Link className="btn" to="/login">
                  Log in
                </Link>
              </>
            )}
          </div>
        </div>
      </div>
    </div>
  );
}
