import { useLocation } from 'react-router-dom';

import { OpponentLinks } from '../ui/OpponentLinks';

export function NotFoundPage() {
  const { pathname } = useLocation();

  return (
    <section className="stack">
      <div className="card">
        <h2>Page not found</h2>
        <p className="muted">
          Nothing lives at <code>{pathname}</code>. Start a game instead:
        </p>
        <OpponentLinks />
      </div>
    </section>
  );
}
