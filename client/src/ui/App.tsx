import React from "react";
import { Routes, Route, Navigate, Link, useNavigate } from "react-router-dom";
import { getToken, setToken } from "../lib/api";
import AnalyticsPage from "./AnalyticsPage";
import AuthPage from "./AuthPage";
import ChatPage from "./ChatPage";
import CheckinPage from "./CheckinPage";
import DashboardPage from "./DashboardPage";
import GoalDetailPage from "./GoalDetailPage";
import GoalsPage from "./GoalsPage";
import InsightsPage from "./InsightsPage";
import LandingPage from "./LandingPage";
import OAuthCallbackPage from "./OAuthCallbackPage";
import ProfilePage from "./ProfilePage";

/** -------- App Shell -------- */

const NAV: Array<[string, string]> = [
  ["/dashboard", "Dashboard"],
  ["/chat", "Coach"],
  ["/goals", "Goals"],
  ["/checkin", "Check-in"],
  ["/insights", "Insights"],
  ["/analytics", "Analytics"],
  ["/profile", "Profile"],
];

function Topbar() {
  const nav = useNavigate();
  const token = getToken();
  return (
    <div className="container">
      <div className="card hdr">
        <div>
          <h1>MileSync</h1>
          <div className="sub">Goals → milestones → daily tasks</div>
        </div>
        <div style={{ display: "flex", gap: 8, alignItems: "center", flexWrap: "wrap" }}>
          {token ? (
            <>
              {NAV.map(([to, label]) => (
                <Link key={to} className="badge" to={to}>
                  {label}
                </Link>
              ))}
              <button
                className="btn"
                onClick={() => {
                  setToken(null);
                  nav("/login");
                }}
              >
                Log out
              </button>
            </>
          ) : (
            <Link className="badge" to="/login">
              Log in
            </Link>
          )}
        </div>
      </div>
    </div>
  );
}

function RequireAuth({ children }: { children: React.ReactNode }) {
  if (!getToken()) return <Navigate to="/login" replace />;
  return <>{children}</>;
}

const PRIVATE_ROUTES: Array<[string, React.ReactNode]> = [
  ["/dashboard", <DashboardPage />],
  ["/chat", <ChatPage />],
  ["/chat/:id", <ChatPage />],
  ["/goals", <GoalsPage />],
  ["/goals/:id", <GoalDetailPage />],
  ["/checkin", <CheckinPage />],
  ["/insights", <InsightsPage />],
  ["/analytics", <AnalyticsPage />],
  ["/profile", <ProfilePage />],
];

export default function App() {
  return (
    <>
      <Topbar />
      <Routes>
        <Route path="/" element={<LandingPage />} />
        <Route path="/login" element={<AuthPage mode="login" />} />
        <Route path="/register" element={<AuthPage mode="register" />} />
        <Route path="/oauth/callback" element={<OAuthCallbackPage />} />

        {PRIVATE_ROUTES.map(([path, page]) => (
          <Route key={path} path={path} element={<RequireAuth>{page}</RequireAuth>} />
        ))}

        <Route path="*" element={<Navigate to="/" replace />} />
      </Routes>
    </>
  );
}
