/**
 * Memo table: (rule index, token position) to the outcome of evaluating the
 * rule there.
 */

export type MemoEntry =
  | { readonly state: "inProgress" }
  | { readonly state: "success"; readonly value: unknown; readonly end: number; readonly generation: number }
  | { readonly state: "failure"; readonly generation: number };

export const IN_PROGRESS: MemoEntry = Object.freeze({ state: "inProgress" });

export class MemoTable {
  // One map per rule, keyed by position.
  private readonly rules: Map<number, MemoEntry>[] = [];
  private count = 0;

  get(rule: number, position: number): MemoEntry | undefined {
    return this.rules[rule]?.get(position);
  }

  set(rule: number, position: number, entry: MemoEntry): void {
    let positions = this.rules[rule];
    if (positions === undefined) {
      positions = new Map();
      this.rules[rule] = positions;
    }
    if (!positions.has(position)) this.count++;
    positions.set(position, entry);
  }

  /** Number of (rule, position) pairs with an entry. */
  get size(): number {
    return this.count;
  }
}
