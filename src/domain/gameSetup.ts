import type { Color } from './chessTypes';
import type { AiConfig } from './ai/types';

/**
 * Game setup as carried in the URL (`#/game?ai=b&seed=42`).
 *
 * Missing or malformed values fall back to the defaults.
 */

export type GameSetup = {
  /** Side played by the bot, or null for two humans. */
  aiColor: Color | null;
  ai: AiConfig;
};

export const DEFAULT_GAME_SETUP: GameSetup = {
  aiColor: 'b',
  ai: {}
};

export const OPPONENT_PRESETS: Array<{ id: string; label: string; aiColor: Color | null }> = [
  { id: 'b', label: 'Play White vs computer', aiColor: 'b' },
  { id: 'w', label: 'Play Black vs computer', aiColor: 'w' },
  { id: 'none', label: 'Two players', aiColor: null }
];

// URL param encoding
export function serializeAiColorParam(aiColor: Color | null): string {
  return aiColor ?? 'none';
}

/** `undefined` means the param is absent or not understood. */
export function parseAiColorParam(param: string | null): Color | null | undefined {
  if (param === 'w' || param === 'b') return param;
  if (param === 'none') return null;
  return undefined;
}

export function parseSeedParam(param: string | null): number | undefined {
  if (!param) return undefined;
  if (!/^-?[0-9]+$/.test(param)) return undefined;
  const n = Number(param);
  if (!Number.isSafeInteger(n)) return undefined;
  return n;
}

export function gameSetupFromParams(params: URLSearchParams): GameSetup {
  const aiColor = parseAiColorParam(params.get('ai'));
  const seed = parseSeedParam(params.get('seed'));
  return {
    aiColor: aiColor === undefined ? DEFAULT_GAME_SETUP.aiColor : aiColor,
    ai: seed === undefined ? {} : { seed }
  };
}

export function formatOpponent(aiColor: Color | null): string {
  if (aiColor === null) return 'Two players';
  return aiColor === 'b' ? 'You play White' : 'You play Black';
}
