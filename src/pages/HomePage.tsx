import { OpponentLinks } from '../ui/OpponentLinks';

export function HomePage() {
  return (
    <section className="stack">
      <div className="card">
        <h2>Play</h2>
        <p className="muted">The computer looks one move ahead and grabs the most material it can.</p>
        <OpponentLinks />
      </div>
    </section>
  );
}
