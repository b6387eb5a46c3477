import {Loc} from './loc';
import {iota} from './ints';

/**
 * The kinds of Sudoku we solve.  A diagonal Sudoku also requires each of the
 * grid's two long diagonals to hold every numeral exactly once.
 */
export type Variant = 'standard' | 'diagonal';

export const VARIANTS: readonly Variant[] = ['standard', 'diagonal'];

export function isVariant(s: string): s is Variant {
  return VARIANTS.some(variant => variant === s);
}

export enum UnitKind {
  ROW = 'row',
  COL = 'column',
  BOX = 'box',
  MAIN_DIAGONAL = 'main diagonal',
  ANTI_DIAGONAL = 'anti-diagonal',
}

/** Nine locations that must between them hold each numeral once. */
export declare interface Unit {
  readonly kind: UnitKind;
  /** Which row, column, or box; always 0 for the diagonals. */
  readonly index: number;
  readonly locs: readonly Loc[];
}

/** Names a unit the way a person would, e.g. "row 3" or "main diagonal". */
export function describeUnit(unit: Unit): string {
  switch (unit.kind) {
    case UnitKind.MAIN_DIAGONAL:
    case UnitKind.ANTI_DIAGONAL:
      return unit.kind;
    default:
      return `${unit.kind} ${unit.index + 1}`;
  }
}

function unit(kind: UnitKind, index: number, locs: readonly Loc[]): Unit {
  return {kind, index, locs};
}

const ROWS = iota(9).map(r =>
  unit(
    UnitKind.ROW,
    r,
    iota(9).map(c => Loc.of(r, c)),
  ),
);
const COLS = iota(9).map(c =>
  unit(
    UnitKind.COL,
    c,
    iota(9).map(r => Loc.of(r, c)),
  ),
);
const BOXES = iota(9).map(b =>
  unit(
    UnitKind.BOX,
    b,
    Loc.ALL.filter(loc => loc.box === b),
  ),
);
const DIAGONALS = [
  unit(UnitKind.MAIN_DIAGONAL, 0, Loc.ALL.filter(loc => loc.onMainDiagonal)),
  unit(UnitKind.ANTI_DIAGONAL, 0, Loc.ALL.filter(loc => loc.onAntiDiagonal)),
];

/**
 * The units in force for one variant, along with each location's units and
 * peers (the other locations that share a unit with it).  Instances are
 * immutable and shared: use `Units.of`.
 */
export class Units {
  /** All the units, rows first, then columns, boxes, and any diagonals. */
  readonly all: readonly Unit[];
  private readonly unitsByLoc: ReadonlyArray<readonly Unit[]>;
  private readonly peersByLoc: ReadonlyArray<readonly Loc[]>;

  private constructor(readonly variant: Variant) {
    this.all =
      variant === 'diagonal'
        ? [...ROWS, ...COLS, ...BOXES, ...DIAGONALS]
        : [...ROWS, ...COLS, ...BOXES];
    this.unitsByLoc = Loc.ALL.map(loc =>
      this.all.filter(u => u.locs.includes(loc)),
    );
    this.peersByLoc = Loc.ALL.map(loc => {
      const peers = new Set<Loc>();
      for (const u of this.unitsByLoc[loc.index]) {
        for (const peer of u.locs) peers.add(peer);
      }
      peers.delete(loc);
      return [...peers].sort((a, b) => a.index - b.index);
    });
  }

  /** The units a location belongs to: 3, or 4 or 5 on a diagonal. */
  unitsOf(loc: Loc): readonly Unit[] {
    return this.unitsByLoc[loc.index];
  }

  /** The locations sharing at least one unit with the given location. */
  peersOf(loc: Loc): readonly Loc[] {
    return this.peersByLoc[loc.index];
  }

  private static readonly cache = new Map<Variant, Units>();

  /** Returns the shared Units for the given variant. */
  static of(variant: Variant): Units {
    let units = Units.cache.get(variant);
    if (!units) {
      units = new Units(variant);
      Units.cache.set(variant, units);
    }
    return units;
  }
}
