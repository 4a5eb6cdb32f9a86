import React from "react";
import ReactDOM from "react-dom/client";
import { BrowserRouter } from "react-router-dom";
import App from "./ui/App";
import "./ui/styles.css";

class ErrorBoundary extends React.Component<{ children: React.ReactNode }, { err: string | null }> {
  state: { err: string | null } = { err: null };

  static getDerivedStateFromError(err: unknown) {
    return { err: err instanceof Error ? err.stack || err.message : String(err) };
  }

  render() {
    if (this.state.err) {
      return (
        <div className="container">
          <div className="card body">
            <div style={{ fontWeight: 800, marginBottom: 10 }}>App crashed</div>
            <pre style={{ whiteSpace: "pre-wrap" }}>{this.state.err}</pre>
          </div>
        </div>
      );
    }
    return this.props.children;
  }
}

const root = document.getElementById("root");
if (root) {
  ReactDOM.createRoot(root).render(
    <React.StrictMode>
      <ErrorBoundary>
        <BrowserRouter>
          <App />
        </BrowserRouter>
      </ErrorBoundary>
    </React.StrictMode>,
  );
}
