import {
  createEmptyBoard,
  createStartingBoard,
  fromPlacement,
  generateMoves,
  parseAlgebraicSquare,
  setPiece,
  toAlgebraic,
  toPlacement
} from '../index';
import type { Board, Move, Piece, Square } from '../chessTypes';

function piece(color: 'w' | 'b', type: Piece['type']): Piece {
  return { color, type };
}

function sq(a: string): Square {
  const s = parseAlgebraicSquare(a);
  if (s === null) throw new Error(`Bad square: ${a}`);
  return s;
}

function boardWith(pieces: Array<[string, Piece]>): Board {
  const b = createEmptyBoard();
  for (const [at, p] of pieces) setPiece(b, sq(at), p);
  return b;
}

function squares(moves: Move[]): string[] {
  return moves.map((m) => `${toAlgebraic(m.from)}-${toAlgebraic(m.to)}`);
}

describe('generateMoves', () => {
  it('starting position has 20 pseudo-legal moves for each side', () => {
    const board = createStartingBoard();
    expect(generateMoves(board, 'w')).toHaveLength(20);
    expect(generateMoves(board, 'b')).toHaveLength(20);
  });

  it('scans rank 0 first, then by file', () => {
    const board = createStartingBoard();

    // Black's knight on b8 sits on rank 0 and comes before any pawn.
    expect(squares(generateMoves(board, 'b')).slice(0, 4)).toEqual(['b8-a6', 'b8-c6', 'g8-f6', 'g8-h6']);
    // White's pawns (rank 6) come before its knights (rank 7).
    expect(squares(generateMoves(board, 'w')).slice(0, 2)).toEqual(['a2-a3', 'a2-a4']);
    expect(squares(generateMoves(board, 'w')).slice(-2)).toEqual(['g1-f3', 'g1-h3']);
  });

  it('a lone rook on (3,3) reaches its whole rank and file', () => {
    const board = createEmptyBoard();
    setPiece(board, { rank: 3, file: 3 }, piece('w', 'r'));

    const moves = generateMoves(board, 'w');
    expect(moves).toHaveLength(14);
    for (const m of moves) {
      expect(m.from).toEqual({ rank: 3, file: 3 });
      expect(m.to.rank === 3 || m.to.file === 3).toBe(true);
      expect(m.promotion).toBeUndefined();
    }
  });

  it('a lone queen in the center has 27 moves', () => {
    const board = boardWith([['d5', piece('b', 'q')]]);
    expect(generateMoves(board, 'b')).toHaveLength(27);
  });

  it('knight moves from the corner and the center', () => {
    const corner = boardWith([['a8', piece('w', 'n')]]);
    expect(squares(generateMoves(corner, 'w'))).toEqual(['a8-b6', 'a8-c7']);

    const center = boardWith([['d4', piece('w', 'n')]]);
    const ts = squares(generateMoves(center, 'w'));
    expect(ts).toHaveLength(8);
    for (const target of ['b3', 'b5', 'c2', 'c6', 'e2', 'e6', 'f3', 'f5']) {
      expect(ts).toContain(`d4-${target}`);
    }
  });

  it('knight may land on enemy pieces but not on its own', () => {
    const board = boardWith([
      ['a8', piece('w', 'n')],
      ['b6', piece('b', 'p')],
      ['c7', piece('w', 'p')]
    ]);
    expect(squares(generateMoves(board, 'w', sq('a8')))).toEqual(['a8-b6']);
  });

  it('pawn single+double push from its starting rank', () => {
    const board = boardWith([['e2', piece('w', 'p')]]);
    expect(squares(generateMoves(board, 'w'))).toEqual(['e2-e3', 'e2-e4']);

    const black = boardWith([['a7', piece('b', 'p')]]);
    expect(squares(generateMoves(black, 'b'))).toEqual(['a7-a6', 'a7-a5']);
  });

  it('pawn blocked directly ahead has no forward move, whatever is two squares ahead', () => {
    const freeBehindBlocker = boardWith([
      ['e2', piece('w', 'p')],
      ['e3', piece('b', 'n')]
    ]);
    expect(generateMoves(freeBehindBlocker, 'w', sq('e2'))).toHaveLength(0);

    const bothOccupied = boardWith([
      ['e2', piece('w', 'p')],
      ['e3', piece('w', 'n')],
      ['e4', piece('b', 'n')]
    ]);
    expect(generateMoves(bothOccupied, 'w', sq('e2'))).toHaveLength(0);
  });

  it('pawn double push needs the second square empty too', () => {
    const board = boardWith([
      ['d7', piece('b', 'p')],
      ['d5', piece('w', 'p')]
    ]);
    expect(squares(generateMoves(board, 'b', sq('d7')))).toEqual(['d7-d6']);
  });

  it('pawn captures diagonally only onto enemy pieces', () => {
    const board = boardWith([
      ['e4', piece('w', 'p')],
      ['d5', piece('b', 'n')],
      ['f5', piece('w', 'n')]
    ]);
    expect(squares(generateMoves(board, 'w', sq('e4')))).toEqual(['e4-e5', 'e4-d5']);
  });

  it('pawn next to the last rank yields one move per destination, without promotion variants', () => {
    const board = boardWith([
      ['a7', piece('w', 'p')],
      ['b8', piece('b', 'r')]
    ]);
    const moves = generateMoves(board, 'w');
    expect(squares(moves)).toEqual(['a7-a8', 'a7-b8']);
    expect(moves.every((m) => m.promotion === undefined)).toBe(true);
  });

  it('sliding piece is blocked by own piece', () => {
    const board = boardWith([
      ['c1', piece('w', 'b')],
      ['d2', piece('w', 'p')]
    ]);
    expect(squares(generateMoves(board, 'w', sq('c1')))).toEqual(['c1-b2', 'c1-a3']);
  });

  it('sliding piece captures the first enemy on a ray and stops there', () => {
    const board = boardWith([
      ['a1', piece('w', 'r')],
      ['a4', piece('b', 'p')]
    ]);
    const ts = squares(generateMoves(board, 'w', sq('a1')));
    expect(ts.slice(0, 3)).toEqual(['a1-a2', 'a1-a3', 'a1-a4']);
    expect(ts).not.toContain('a1-a5');
    expect(ts).toHaveLength(10);
  });

  it('king steps to its 8 neighbours and never castles', () => {
    const center = boardWith([['d5', piece('w', 'k')]]);
    expect(squares(generateMoves(center, 'w'))).toEqual([
      'd5-c6',
      'd5-d6',
      'd5-e6',
      'd5-c5',
      'd5-e5',
      'd5-c4',
      'd5-d4',
      'd5-e4'
    ]);

    const home = boardWith([
      ['e1', piece('w', 'k')],
      ['h1', piece('w', 'r')],
      ['a1', piece('w', 'r')]
    ]);
    const kingMoves = squares(generateMoves(home, 'w', sq('e1')));
    expect(kingMoves).toHaveLength(5);
    expect(kingMoves).not.toContain('e1-g1');
    expect(kingMoves).not.toContain('e1-c1');
  });

  it('does not filter moves that leave the own king attacked', () => {
    // The white king may step next to the black rook's file.
    const board = boardWith([
      ['e1', piece('w', 'k')],
      ['d8', piece('b', 'r')]
    ]);
    expect(squares(generateMoves(board, 'w'))).toContain('e1-d1');
  });

  it('origin filter yields nothing for empty, enemy or off-board squares', () => {
    const board = createStartingBoard();
    expect(generateMoves(board, 'w', sq('e4'))).toEqual([]);
    expect(generateMoves(board, 'w', sq('e7'))).toEqual([]);
    expect(generateMoves(board, 'w', { rank: -1, file: 4 })).toEqual([]);
    expect(generateMoves(board, 'w', { rank: 6, file: 8 })).toEqual([]);
  });

  it('never mutates the board', () => {
    const board = fromPlacement('r3k2r/pppq1ppp/2n2n2/3pp3/2BPP1b1/2N2N2/PPP2PPP/R2QK2R');
    const before = toPlacement(board);
    generateMoves(board, 'w');
    generateMoves(board, 'b');
    expect(toPlacement(board)).toBe(before);
  });
});
