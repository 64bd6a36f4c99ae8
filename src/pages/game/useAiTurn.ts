import { useEffect, useRef, useState } from 'react';

import type { Move } from '../../domain/chessTypes';
import { chooseMove } from '../../domain/ai/greedyBot';
import { defaultRng, makeSeededRng } from '../../domain/ai/rng';
import type { AiConfig, AiMoveResult, ChessAi } from '../../domain/ai/types';
import { cloneBoard } from '../../domain/board';
import { generateMoves } from '../../domain/movegen';
import type { GameSession, SessionAction } from '../../domain/session/gameSession';
import { isAiTurn } from '../../domain/session/gameSession';
import { squaresEqual } from '../../domain/square';

export type UseAiTurnArgs = {
  /** Current authoritative session (from the reducer). */
  state: GameSession;
  /** AI implementation. If null, no thinking occurs. */
  ai: ChessAi | null;
  config: AiConfig;
  /** Pause before the bot answers, so its move is visible as a separate step. */
  delayMs: number;
  dispatch: (action: SessionAction) => void;
  /** Optional hook for surfacing AI errors (toast/logging). */
  onError?: (message: string) => void;
};

export type UseAiTurnResult = {
  isThinking: boolean;
  lastError: string | null;
};

function sameMove(a: Move, b: Move): boolean {
  return squaresEqual(a.from, b.from) && squaresEqual(a.to, b.to);
}

/**
 * Plays the bot's turn whenever the session hands it the move.
 *
 * The bot works on a board snapshot. Its answer must be one of the generated moves;
 * otherwise the error is reported and the greedy choice is played instead, so the
 * turn always advances.
 */
export function useAiTurn(args: UseAiTurnArgs): UseAiTurnResult {
  const { state, ai, config, delayMs, dispatch, onError } = args;

  const [isThinking, setIsThinking] = useState(false);
  const [lastError, setLastError] = useState<string | null>(null);

  const onErrorRef = useRef(onError);
  onErrorRef.current = onError;

  const shouldThink = Boolean(ai) && isAiTurn(state);

  useEffect(() => {
    if (!shouldThink || !ai || state.aiColor === null) {
      setIsThinking(false);
      return;
    }

    const aiColor = state.aiColor;
    const snapshot = cloneBoard(state.board);
    setIsThinking(true);
    setLastError(null);

    const timer = setTimeout(() => {
      setIsThinking(false);

      const generated = generateMoves(snapshot, aiColor);
      if (generated.length === 0) {
        dispatch({ type: 'aiMoveApplied', move: null });
        return;
      }

      const playFallback = (msg: string) => {
        setLastError(msg);
        onErrorRef.current?.(msg);
        const rng = typeof config.seed === 'number' ? makeSeededRng(config.seed) : defaultRng;
        dispatch({ type: 'aiMoveApplied', move: chooseMove(snapshot, aiColor, rng) ?? generated[0] });
      };

      let result: AiMoveResult | null;
      try {
        result = ai.getMove({ board: cloneBoard(snapshot), aiColor, config });
      } catch (err) {
        const msg = err instanceof Error ? err.message : 'AI move failed.';
        playFallback(`${msg} Using fallback move.`);
        return;
      }

      if (!result) {
        playFallback('AI returned no move; using fallback move.');
        return;
      }
      const answer = result.move;
      if (!generated.some((m) => sameMove(m, answer))) {
        playFallback('AI produced an illegal move; using fallback move.');
        return;
      }
      dispatch({ type: 'aiMoveApplied', move: answer });
    }, delayMs);

    return () => {
      clearTimeout(timer);
    };
  }, [ai, config, delayMs, dispatch, shouldThink, state.aiColor, state.board]);

  return { isThinking, lastError };
}
