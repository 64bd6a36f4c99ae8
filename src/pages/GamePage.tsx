import { useCallback, useMemo, useReducer, useState } from 'react';
import { Link, useSearchParams } from 'react-router-dom';

import type { AiConfig, ChessAi, Color, GameSessionSetup, Square } from '../domain';
import { GreedyBot, createGameSession, hasAnyMove, isAiTurn, materialScore, sessionReducer } from '../domain';
import { formatOpponent, gameSetupFromParams } from '../domain/gameSetup';
import { ChessBoard } from '../ui/ChessBoard';
import { ErrorBoundary } from '../ui/ErrorBoundary';
import { useAiTurn } from './game/useAiTurn';

export type GamePageProps = {
  setup?: GameSessionSetup;
  /** Bot to play against; defaults to the greedy one-ply bot. */
  ai?: ChessAi;
  aiConfig?: AiConfig;
  /** Pause before the bot answers (ms). */
  aiDelayMs?: number;
  /** Render a link back to the home page (needs a router). */
  showHomeLink?: boolean;
};

const DEFAULT_AI_DELAY_MS = 250;

function colorName(c: Color): string {
  return c === 'w' ? 'White' : 'Black';
}

export function GamePage({
  setup,
  ai,
  aiConfig,
  aiDelayMs = DEFAULT_AI_DELAY_MS,
  showHomeLink = false
}: GamePageProps) {
  const [state, dispatch] = useReducer(sessionReducer, setup ?? {}, createGameSession);

  const bot = useMemo<ChessAi>(() => ai ?? new GreedyBot(), [ai]);
  const config = useMemo<AiConfig>(() => aiConfig ?? {}, [aiConfig]);

  const aiTurn = useAiTurn({
    state,
    ai: state.aiColor === null ? null : bot,
    config,
    delayMs: aiDelayMs,
    dispatch,
    onError: (message) => {
      // eslint-disable-next-line no-console
      console.error('AI turn failed:', message);
    }
  });

  const handleSquareClick = useCallback((square: Square) => dispatch({ type: 'squareClicked', square }), []);

  const botToMove = isAiTurn(state);
  const humanStuck = !botToMove && !hasAnyMove(state);
  const whiteMaterial = materialScore(state.board, 'w');

  return (
    <section className="stack" aria-label="Game">
      <div className="card gameInfo">
        <h2 style={{ marginTop: 0 }}>{formatOpponent(state.aiColor)}</h2>
        <div>
          Side to move: <strong>{colorName(state.sideToMove)}</strong>
        </div>
        <div>
          Material (White): <strong>{whiteMaterial > 0 ? `+${whiteMaterial}` : String(whiteMaterial)}</strong>
        </div>
        {aiTurn.isThinking ? <div className="muted">Computer is thinking…</div> : null}
        {state.status.kind === 'noMoves' ? (
          <div role="status">{colorName(state.status.color)} had no moves and passed.</div>
        ) : null}
        {aiTurn.lastError ? <div role="alert">{aiTurn.lastError}</div> : null}
      </div>

      <ChessBoard
        board={state.board}
        selectedSquare={state.selectedSquare}
        legalMovesFromSelection={state.legalMovesFromSelection}
        lastMove={state.lastMove}
        onSquareClick={handleSquareClick}
        disabled={botToMove}
      />

      <div className="actions">
        {humanStuck ? (
          <button type="button" className="btn btn-secondary" onClick={() => dispatch({ type: 'passRequested' })}>
            Pass
          </button>
        ) : null}
        <button type="button" className="btn btn-primary" onClick={() => dispatch({ type: 'newGame' })}>
          New game
        </button>
        {showHomeLink ? (
          <Link to="/" className="btn btn-secondary">
            Back to Home
          </Link>
        ) : null}
      </div>
    </section>
  );
}

/**
 * Route element: reads `?ai=` and `?seed=` and restarts the game when they change.
 * A crashed game can be replaced by a fresh one without leaving the page.
 */
export function GameRoutePage() {
  const [params] = useSearchParams();
  const search = params.toString();
  const setup = useMemo(() => gameSetupFromParams(new URLSearchParams(search)), [search]);
  const [restarts, setRestarts] = useState(0);

  return (
    <ErrorBoundary resetLabel="Start a new game" onReset={() => setRestarts((n) => n + 1)}>
      <GamePage key={`${search}:${restarts}`} setup={{ aiColor: setup.aiColor }} aiConfig={setup.ai} showHomeLink />
    </ErrorBoundary>
  );
}
