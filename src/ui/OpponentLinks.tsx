import { Link } from 'react-router-dom';

import { OPPONENT_PRESETS, serializeAiColorParam } from '../domain/gameSetup';

/** One link per opponent preset, each starting a fresh game. */
export function OpponentLinks() {
  return (
    <nav className="actions" aria-label="Start a game">
      {OPPONENT_PRESETS.map((p, i) => (
        <Link key={p.id} to={`/game?ai=${serializeAiColorParam(p.aiColor)}`} className={i === 0 ? 'btn btn-primary' : 'btn'}>
          {p.label}
        </Link>
      ))}
    </nav>
  );
}
