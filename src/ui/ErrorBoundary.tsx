import React from 'react';

type ErrorBoundaryProps = {
  children: React.ReactNode;
  /** Text of the recovery button, e.g. "Start a new game". */
  resetLabel: string;
  /** Put the app back into a state that can render again; the boundary then retries its children. */
  onReset: () => void;
};

type ErrorBoundaryState = {
  error: Error | null;
};

/** Catches render failures below it, logs them and offers one way out. */
export class ErrorBoundary extends React.Component<ErrorBoundaryProps, ErrorBoundaryState> {
  state: ErrorBoundaryState = { error: null };

  static getDerivedStateFromError(error: Error): ErrorBoundaryState {
    return { error };
  }

  componentDidCatch(error: Error, info: React.ErrorInfo) {
    // eslint-disable-next-line no-console
    console.error('Render failed:', error.message, info.componentStack);
  }

  private handleReset = () => {
    this.props.onReset();
    this.setState({ error: null });
  };

  render() {
    const { error } = this.state;
    if (!error) return this.props.children;

    return (
      <div className="card" role="alert">
        <h2 style={{ marginTop: 0 }}>Something went wrong</h2>
        <pre className="errorText">{error.message || 'Unknown error'}</pre>
        <button type="button" className="btn btn-primary" onClick={this.handleReset}>
          {this.props.resetLabel}
        </button>
      </div>
    );
  }
}
