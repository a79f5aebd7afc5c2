"use client";
import React from "react";

type Props = { children: React.ReactNode; title?: string };
type State = { error: string | null };

export class ErrorBoundary extends React.Component<Props, State> {
  state: State = { error: null };
  static getDerivedStateFromError(err: unknown): State {
    return { error: err instanceof Error ? err.message : String(err) };
  }
  componentDidCatch(err: unknown) {
    console.error(JSON.stringify({ event: "client.render_failed", error: err instanceof Error ? err.message : String(err) }));
  }
  render() {
    if (this.state.error !== null) {
      return (
        <div role="alert" style={{ padding: 16 }}>
          <h3>{this.props.title ?? "Something went wrong"}</h3>
          <p>{this.state.error}</p>
          <button type="button" onClick={() => this.setState({ error: null })}>
            Try again
          </button>
        </div>
      );
    }
    return this.props.children;
  }
}
