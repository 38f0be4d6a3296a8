import type {Grid} from '../game/grid';
import type {Loc} from '../game/loc';
import type {Candidates} from './candidates';
import type {NumSet} from './num-set';

/** Records what an assignment or an elimination changed, so it can be undone. */
export type UndoRecord =
  | {
      readonly kind: 'assign';
      readonly loc: Loc;
      /** The location's candidates just before the assignment. */
      readonly prior: NumSet;
    }
  | {
      readonly kind: 'eliminate';
      readonly loc: Loc;
      readonly num: number;
    };

/**
 * The changes made along the current path of a search, most recent last.
 * Backtracking pops them back to a mark taken before a tentative assignment,
 * which restores the grid and candidates exactly.
 */
export class UndoTrail {
  private readonly records: UndoRecord[] = [];

  /** Returns a mark that `rollback` can return the trail to. */
  mark(): number {
    return this.records.length;
  }

  private pushAssign(loc: Loc, prior: NumSet): void {
    this.records.push({kind: 'assign', loc, prior});
  }

  private pushEliminate(loc: Loc, num: number): void {
    this.records.push({kind: 'eliminate', loc, num});
  }

  /**
   * Places a numeral and rules it out for the location's blank peers,
   * recording each change.
   *
   * @returns False if some peer is left without candidates.
   */
  place(loc: Loc, num: number, grid: Grid, candidates: Candidates): boolean {
    this.pushAssign(loc, candidates.get(loc));
    grid.set(loc, num);
    candidates.reset(loc);
    for (const peer of loc.peers) {
      if (grid.get(peer) || !candidates.eliminate(peer, num)) continue;
      this.pushEliminate(peer, num);
      if (!candidates.get(peer)) return false;
    }
    return true;
  }

  /** Undoes every record after the given mark, newest first. */
  rollback(mark: number, grid: Grid, candidates: Candidates): void {
    const {records} = this;
    while (records.length > mark) {
      const record = records.pop();
      if (!record) break;
      switch (record.kind) {
        case 'assign':
          grid.set(record.loc, null);
          candidates.reset(record.loc, record.prior);
          break;
        case 'eliminate':
          candidates.restore(record.loc, record.num);
          break;
      }
    }
  }
}
