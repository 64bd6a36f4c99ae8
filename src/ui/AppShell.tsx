import { useEffect, useRef } from 'react';
import { Link, Outlet, useLocation, useNavigate } from 'react-router-dom';

import { ErrorBoundary } from './ErrorBoundary';

export function AppShell() {
  const location = useLocation();
  const navigate = useNavigate();
  const mainRef = useRef<HTMLElement | null>(null);

  // Keyboard focus follows route changes.
  useEffect(() => {
    mainRef.current?.focus();
  }, [location.pathname, location.search]);

  return (
    <div className="app">
      <header className="appHeader">
        <h1>
          <Link to="/" className="appTitle">
            Greedy Chess
          </Link>
        </h1>
      </header>

      <main className="content" ref={mainRef} tabIndex={-1}>
        <ErrorBoundary resetLabel="Back to Home" onReset={() => navigate('/')}>
          <Outlet />
        </ErrorBoundary>
      </main>
    </div>
  );
}
