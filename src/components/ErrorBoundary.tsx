// src/components/ErrorBoundary.tsx

import { Component, type ReactNode } from "react";
import { createLogger } from "../lib/logger";

type Props = { children: ReactNode; title?: string };
type State = { hasError: boolean; detail?: string };

const log = createLogger("ui");

export default class ErrorBoundary extends Component<Props, State> {
  state: State = { hasError: false };

  static getDerivedStateFromError(err: unknown): State {
    const msg = err instanceof Error ? err.message : String(err);
    return { hasError: true, detail: msg };
  }

  componentDidCatch(err: unknown) {
    log.error(`render failed${this.props.title ? ` (${this.props.title})` : ""}`, err);
  }

  handleRetry = () => this.setState({ hasError: false, detail: undefined });

  render() {
    if (this.state.hasError) {
      return (
        <div className="border rounded-xl p-4 bg-amber-50 text-amber-900">
          <div className="font-semibold mb-1">{this.props.title ?? "This panel failed to render."}</div>
          <div className="text-sm mb-3">
            Try again, or change the assumptions and reload.
            {this.state.detail ? (
              <details className="mt-2">
                <summary className="cursor-pointer">Error details</summary>
                <pre className="text-xs mt-1 whitespace-pre-wrap">{this.state.detail}</pre>
              </details>
            ) : null}
          </div>
          <button
            className="text-sm px-3 py-1 rounded border bg-white hover:bg-gray-50"
            onClick={this.handleRetry}
            aria-label="Retry rendering"
          >
            Retry
          </button>
        </div>
      );
    }
    return this.props.children;
  }
}
