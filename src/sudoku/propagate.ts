import {Board} from './board';
import {DEFAULT_RULES, Rule, RuleResult} from './rules';

/**
 * Applies the rules to the board round-robin, in the order given, until a
 * whole round goes by without changing anything.
 *
 * @param onRound Called once per completed round.
 * @returns false if a rule found a contradiction, or the board it settled on
 *     has a blank cell with no candidates.
 */
export function propagate(
  board: Board,
  rules: readonly Rule[] = DEFAULT_RULES,
  onRound?: () => void,
): boolean {
  for (;;) {
    const before = board.version;
    for (const rule of rules) {
      if (rule.apply(board) === RuleResult.CONTRADICTION) return false;
    }
    onRound?.();
    if (board.version === before) return !board.isContradiction();
  }
}
