import type { InspectionEntry } from '@shared/types';
import { InsufficientDataError, StateError } from './errors';
import type { WorkerId } from './types';

/**
 * Per-monkey tally of inspected items.
 */
export class InspectionCounter {
  private readonly tallies: number[];

  constructor(workerCount: number) {
    this.tallies = new Array<number>(workerCount).fill(0);
  }

  get size(): number {
    return this.tallies.length;
  }

  record(workerId: WorkerId): void {
    const current = this.tallies[workerId];
    if (current === undefined) {
      throw new StateError(`no inspection tally for monkey ${workerId}`, { workerId });
    }
    this.tallies[workerId] = current + 1;
  }

  count(workerId: WorkerId): number {
    return this.tallies[workerId] ?? 0;
  }

  counts(): number[] {
    return [...this.tallies];
  }

  total(): number {
    return this.tallies.reduce((sum, n) => sum + n, 0);
  }

  /**
   * The two busiest monkeys, highest count first. Equal counts are ordered
   * by ascending monkey id.
   */
  top(): [InspectionEntry, InspectionEntry] {
    const ranked = this.tallies
      .map((count, workerId) => ({ workerId, count }))
      .filter((entry) => entry.count > 0)
      .sort((a, b) => b.count - a.count || a.workerId - b.workerId);

    const [first, second] = ranked;
    if (!first || !second) {
      throw new InsufficientDataError(
        `need at least two monkeys with inspections, found ${ranked.length}`,
      );
    }
    return [first, second];
  }
}
