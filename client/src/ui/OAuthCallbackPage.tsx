import React from "react";
import { Navigate, useSearchParams } from "react-router-dom";
import { setToken } from "../lib/api";

/** Lands here from the provider redirect with ?token=… */
export default function OAuthCallbackPage() {
  const [params] = useSearchParams();
  const token = params.get("token");
  if (!token) return <Navigate to="/login?error=oauth_failed" replace />;
  setToken(token);
  return <Navigate to="/dashboard" replace />;
}
