import {
  DEFAULT_GAME_SETUP,
  formatOpponent,
  gameSetupFromParams,
  parseAiColorParam,
  parseSeedParam,
  serializeAiColorParam
} from '../gameSetup';

describe('game setup params', () => {
  it('parses the bot side', () => {
    expect(parseAiColorParam('w')).toBe('w');
    expect(parseAiColorParam('b')).toBe('b');
    expect(parseAiColorParam('none')).toBeNull();
    expect(parseAiColorParam('white')).toBeUndefined();
    expect(parseAiColorParam(null)).toBeUndefined();
  });

  it('serializes the bot side back', () => {
    expect(serializeAiColorParam('w')).toBe('w');
    expect(serializeAiColorParam(null)).toBe('none');
  });

  it('parses integer seeds only', () => {
    expect(parseSeedParam('42')).toBe(42);
    expect(parseSeedParam('-7')).toBe(-7);
    expect(parseSeedParam('4.2')).toBeUndefined();
    expect(parseSeedParam('abc')).toBeUndefined();
    expect(parseSeedParam('99999999999999999999')).toBeUndefined();
    expect(parseSeedParam(null)).toBeUndefined();
  });

  it('builds a setup from URL params with defaults', () => {
    expect(gameSetupFromParams(new URLSearchParams(''))).toEqual(DEFAULT_GAME_SETUP);
    expect(gameSetupFromParams(new URLSearchParams('ai=none&seed=3'))).toEqual({ aiColor: null, ai: { seed: 3 } });
    expect(gameSetupFromParams(new URLSearchParams('ai=x&seed=y'))).toEqual({ aiColor: 'b', ai: {} });
  });

  it('describes the opponent', () => {
    expect(formatOpponent('b')).toBe('You play White');
    expect(formatOpponent('w')).toBe('You play Black');
    expect(formatOpponent(null)).toBe('Two players');
  });
});
