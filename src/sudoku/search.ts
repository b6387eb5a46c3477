import {Board} from './board';
import {SearchLimitError} from './errors';
import {Loc} from './loc';
import {propagate} from './propagate';
import {DEFAULT_RULES, Rule} from './rules';

/** Counters describing how much work a search did. */
export declare interface SearchStats {
  /** Calls to the recursive search, the root included. */
  nodes: number;
  /** Numerals tried in the cells chosen for guessing. */
  guesses: number;
  /** Guesses that turned out wrong. */
  backtracks: number;
  /** The deepest level of guessing reached; 0 if no guess was needed. */
  maxDepth: number;
  /** Completed propagation rounds, across every board searched. */
  propagationRounds: number;
}

export declare interface SearchOptions {
  readonly rules?: readonly Rule[];
  /** The most search nodes to visit before giving up. */
  readonly maxSteps?: number;
}

export function emptyStats(): SearchStats {
  return {
    nodes: 0,
    guesses: 0,
    backtracks: 0,
    maxDepth: 0,
    propagationRounds: 0,
  };
}

/**
 * Picks the blank cell with the fewest candidates, the earliest in row-major
 * order among equals.  Returns null if every cell is fixed.
 */
export function chooseLoc(board: Board): Loc | null {
  let best: Loc | null = null;
  let bestCount = 10;
  for (const loc of Loc.ALL) {
    if (board.getNum(loc) !== null) continue;
    const count = board.countCandidates(loc);
    if (count < bestCount) {
      best = loc;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Finds a solution by propagation and depth-first guessing.  Takes ownership
 * of `board`, which is propagated in place.
 *
 * Guesses go to the cell chosen by `chooseLoc`, trying its candidates in
 * ascending order, so the solution found for a puzzle with several is always
 * the same one.
 *
 * @returns The solved board, or null if there is no solution.
 * @throws SearchLimitError if more than `maxSteps` nodes are visited.
 */
export function search(
  board: Board,
  options: SearchOptions = {},
  stats: SearchStats = emptyStats(),
): Board | null {
  const {rules = DEFAULT_RULES, maxSteps = Infinity} = options;
  const onRound = () => {
    ++stats.propagationRounds;
  };

  function visit(b: Board, depth: number): Board | null {
    if (++stats.nodes > maxSteps) throw new SearchLimitError(maxSteps);
    stats.maxDepth = Math.max(stats.maxDepth, depth);
    if (!propagate(b, rules, onRound)) return null;
    const loc = chooseLoc(b);
    if (!loc) return b.isSolved() ? b : null;
    for (const num of b.getNums(loc)) {
      ++stats.guesses;
      const next = b.clone();
      const solved = next.assign(loc, num) ? visit(next, depth + 1) : null;
      if (solved) return solved;
      ++stats.backtracks;
    }
    return null;
  }

  return visit(board, 0);
}
