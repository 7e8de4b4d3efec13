/**
 * Append-only vector addressed by position. An index is only valid while it
 * is below the length observed at the time it is looked up, which is what
 * keeps every definition graph acyclic.
 */
export class IndexSpace<T> {
  #entries: T[] = [];

  get length(): number {
    return this.#entries.length;
  }

  append(entry: T): number {
    this.#entries.push(entry);
    return this.#entries.length - 1;
  }

  /** Returns `undefined` for any index outside `[0, bound)`. */
  get(index: number, bound = this.#entries.length): T | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined;
    if (index >= Math.min(bound, this.#entries.length)) return undefined;
    return this.#entries[index];
  }

  entries(): readonly T[] {
    return [...this.#entries];
  }
}
