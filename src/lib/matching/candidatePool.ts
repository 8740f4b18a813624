import type { Student } from '../../types/fusion';

/**
 * Roster students not yet matched on the current sheet. One pool per sheet;
 * a student taken from it cannot receive a second row of that sheet.
 */
export class CandidatePool {
  private readonly available: Set<number>;

  constructor(roster: readonly Student[]) {
    this.available = new Set(roster.map((s) => s.rosterIndex));
  }

  has(rosterIndex: number): boolean {
    return this.available.has(rosterIndex);
  }

  take(rosterIndex: number): void {
    if (!this.available.delete(rosterIndex)) {
      throw new Error(`Roster index ${rosterIndex} is not available in this pool`);
    }
  }

  get size(): number {
    return this.available.size;
  }

  /** Available students in roster order. */
  remaining(roster: readonly Student[]): Student[] {
    return roster.filter((s) => this.available.has(s.rosterIndex));
  }
}
