import {Loc} from './loc';
import {UnitKind, Units, describeUnit, isVariant} from './units';

describe(`Units`, () => {
  const standard = Units.of('standard');
  const diagonal = Units.of('diagonal');

  it(`is shared per variant`, () => {
    expect(Units.of('standard')).toBe(standard);
    expect(standard.variant).toBe('standard');
    expect(diagonal.variant).toBe('diagonal');
  });

  it(`has 27 units for standard and 29 for diagonal`, () => {
    expect(standard.all.length).toBe(27);
    expect(diagonal.all.length).toBe(29);
    for (const unit of diagonal.all) {
      expect(unit.locs.length, describeUnit(unit)).toBe(9);
    }
  });

  it(`lays out the diagonals`, () => {
    const [main, anti] = diagonal.all.slice(27);
    expect(main.kind).toBe(UnitKind.MAIN_DIAGONAL);
    expect(main.locs.map(loc => loc.index)).toEqual([
      0, 10, 20, 30, 40, 50, 60, 70, 80,
    ]);
    expect(anti.kind).toBe(UnitKind.ANTI_DIAGONAL);
    expect(anti.locs.map(loc => loc.index)).toEqual([
      8, 16, 24, 32, 40, 48, 56, 64, 72,
    ]);
  });

  it(`lays out the boxes`, () => {
    const box = standard.all[18 + 4];
    expect(box.kind).toBe(UnitKind.BOX);
    expect(box.locs.map(String)).toEqual([
      '(4, 4)',
      '(4, 5)',
      '(4, 6)',
      '(5, 4)',
      '(5, 5)',
      '(5, 6)',
      '(6, 4)',
      '(6, 5)',
      '(6, 6)',
    ]);
  });

  it(`finds each location's units`, () => {
    expect(standard.unitsOf(Loc.of(4, 4)).length).toBe(3);
    expect(diagonal.unitsOf(Loc.of(4, 4)).length).toBe(5);
    expect(diagonal.unitsOf(Loc.of(0, 0)).length).toBe(4);
    expect(diagonal.unitsOf(Loc.of(0, 1)).length).toBe(3);
  });

  it(`finds each location's peers`, () => {
    expect(standard.peersOf(Loc.of(4, 4)).length).toBe(20);
    expect(diagonal.peersOf(Loc.of(4, 4)).length).toBe(32);
    expect(diagonal.peersOf(Loc.of(0, 0)).length).toBe(26);
    expect(diagonal.peersOf(Loc.of(0, 1)).length).toBe(20);
    expect(standard.peersOf(Loc.of(0, 0))).not.toContain(Loc.of(0, 0));
    expect(diagonal.peersOf(Loc.of(0, 0))).toContain(Loc.of(8, 8));
    expect(standard.peersOf(Loc.of(0, 0))).not.toContain(Loc.of(8, 8));
  });

  it(`names units for people`, () => {
    expect(describeUnit(standard.all[2])).toBe('row 3');
    expect(describeUnit(standard.all[9])).toBe('column 1');
    expect(describeUnit(standard.all[26])).toBe('box 9');
    expect(describeUnit(diagonal.all[28])).toBe('anti-diagonal');
  });

  it(`recognizes variant names`, () => {
    expect(isVariant('diagonal')).toBe(true);
    expect(isVariant('samurai')).toBe(false);
  });
});
