import {checkIntRange} from './ints';
import {iota} from './iota';
import {Loc} from './loc';
import {ensureExhaustiveSwitch} from './utils';

/** The three shapes of constraint group. */
export type UnitKind = 'row' | 'col' | 'box';

/**
 * A constraint group: one of the 9 rows, 9 columns or 9 boxes of the grid,
 * whose 9 locations must hold distinct numerals.
 */
export class Unit extends Object {
  private constructor(
    readonly kind: UnitKind,
    readonly index: number,
    readonly locs: readonly Loc[],
  ) {
    super();
  }

  /** Names the unit, 1-based, like "row 3" or "box 9". */
  override toString(): string {
    return `${this.kind === 'col' ? 'column' : this.kind} ${this.index + 1}`;
  }

  static readonly ROWS: readonly Unit[] = iota(9).map(
    r => new Unit('row', r, iota(9).map(c => Loc.of(r, c))),
  );

  static readonly COLS: readonly Unit[] = iota(9).map(
    c => new Unit('col', c, iota(9).map(r => Loc.of(r, c))),
  );

  static readonly BOXES: readonly Unit[] = iota(9).map(
    b =>
      new Unit(
        'box',
        b,
        iota(9).map(i =>
          Loc.of(Math.floor(b / 3) * 3 + Math.floor(i / 3), (b % 3) * 3 + (i % 3)),
        ),
      ),
  );

  /** All 27 units: rows, then columns, then boxes. */
  static readonly ALL: readonly Unit[] = [
    ...Unit.ROWS,
    ...Unit.COLS,
    ...Unit.BOXES,
  ];

  /** Returns the given unit. */
  static of(kind: UnitKind, index: number): Unit {
    checkIntRange(index, 0, 9);
    switch (kind) {
      case 'row':
        return Unit.ROWS[index];
      case 'col':
        return Unit.COLS[index];
      case 'box':
        return Unit.BOXES[index];
      default:
        return ensureExhaustiveSwitch(kind);
    }
  }

  /** Returns the row, column and box containing the given location. */
  static forLoc(loc: Loc): readonly [Unit, Unit, Unit] {
    return [Unit.ROWS[loc.row], Unit.COLS[loc.col], Unit.BOXES[loc.box]];
  }
}
