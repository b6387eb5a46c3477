/*
 * Puzzles shared by the tests, as 81-character strings.
 */

/** Solvable by propagation alone, with a single solution. */
export const CLASSIC =
  '53..7....6..195....98....6.8...6...34..8.3..17...2...6.6....28....419..5....8..79';

export const CLASSIC_SOLUTION =
  '534678912672195348198342567859761423426853791713924856961537284287419635345286179';

/** A complete grid whose diagonals also hold every numeral once. */
export const DIAGONAL_GRID =
  '123456789456789123789123456935241867617538294842697531298314675371865942564972318';

/**
 * Every third cell of DIAGONAL_GRID.  It has more than one solution, and more
 * than one diagonal solution.
 */
export const SPARSE =
  '1..4..7..4..7..1..7..1..4..9..2..8..6..5..2..8..6..5..2..3..6..3..8..9..5..9..3..';

export const SPARSE_STANDARD_SOLUTION =
  '132485796458796132796132485945213867613578249827649513289351674364827951571964328';

export const SPARSE_DIAGONAL_SOLUTION =
  '168435792452796183793182456975213864634578219821649537289354671316827945547961328';

/** Has no repeated clue, but the top right cell has nothing left to hold. */
export const DEAD_END = '12345678.' + '........9' + '.'.repeat(63);

export const EMPTY = '.'.repeat(81);

/** What search finds first for an empty grid. */
export const EMPTY_STANDARD_SOLUTION =
  '123456789456789123789123456231674895875912364694538217317265948542897631968341572';
